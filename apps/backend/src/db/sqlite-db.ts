/**
 * SQLite persistence (better-sqlite3).
 *
 * Write transactions use BEGIN IMMEDIATE, so a competing writer surfaces
 * as SQLITE_BUSY at start() or commit(). Busy and locked errors map to
 * SOFT_ERROR (roll back and retry); every other failure is a HARD_ERROR.
 */

import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import type { FastifyBaseLogger } from "fastify";
import {
  amountAdd,
  amountCmp,
  amountMin,
  amountSubtract,
  amountToString,
  amountZero,
  hashContractTerms,
  parseAmount,
  type Amount,
  type AmountResult,
  type HashCode,
} from "@coinmerchant/primitives";
import {
  QueryStatus,
  type ContractRecord,
  type DbTransaction,
  type DepositRecord,
  type ErrorStatus,
  type Lookup,
  type MerchantDb,
  type Product,
  type RefundProof,
  type RefundRecord,
} from "./plugin.js";

const SCHEMA_SQL = readFileSync(fileURLToPath(new URL("./schema.sql", import.meta.url)), "utf8");

// ── Rows ─────────────────────────────────────────────────────────────

interface ContractRow {
  order_id: string;
  merchant_pub: string;
  contract_terms: string;
  h_contract_terms: string;
  timestamp: number;
  paid: number;
}

interface DepositRow {
  h_contract_terms: string;
  merchant_pub: string;
  coin_pub: string;
  exchange_url: string;
  amount_with_fee: string;
  deposit_fee: string;
  refund_fee: string;
  wire_fee: string;
  signkey_pub: string;
  exchange_proof: string;
}

interface RefundRow {
  coin_pub: string;
  exchange_url: string;
  rtransaction_id: number;
  reason: string;
  refund_amount: string;
  refund_fee: string;
}

interface ProofRow {
  exchange_pub: string;
  exchange_sig: string;
}

/** A stored value that does not parse back. */
class CorruptRowError extends Error {
  constructor(column: string, value: string) {
    super(`corrupt ${column}: ${value}`);
    this.name = "CorruptRowError";
  }
}

function storedAmount(column: string, text: string): Amount {
  const amount = parseAmount(text);
  if (!amount) throw new CorruptRowError(column, text);
  return amount;
}

function storedJson(column: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new CorruptRowError(column, text);
  }
}

function sum(a: Amount, b: Amount): Amount {
  const r: AmountResult = amountAdd(a, b);
  if (r.status !== "positive" && r.status !== "zero") {
    throw new Error(`refund arithmetic failed: ${r.status}`);
  }
  return r.amount;
}

function contractFromRow(row: ContractRow): ContractRecord {
  return {
    orderId: row.order_id,
    merchantPub: row.merchant_pub,
    contractTerms: storedJson("contract_terms", row.contract_terms),
    hContractTerms: row.h_contract_terms,
    timestamp: row.timestamp,
    paid: row.paid === 1,
  };
}

function depositFromRow(row: DepositRow): DepositRecord {
  return {
    hContractTerms: row.h_contract_terms,
    merchantPub: row.merchant_pub,
    coinPub: row.coin_pub,
    exchangeUrl: row.exchange_url,
    amountWithFee: storedAmount("amount_with_fee", row.amount_with_fee),
    depositFee: storedAmount("deposit_fee", row.deposit_fee),
    refundFee: storedAmount("refund_fee", row.refund_fee),
    wireFee: storedAmount("wire_fee", row.wire_fee),
    exchangeSigningPub: row.signkey_pub,
    exchangeProof: storedJson("exchange_proof", row.exchange_proof),
  };
}

function refundFromRow(row: RefundRow): RefundRecord {
  return {
    coinPub: row.coin_pub,
    exchangeUrl: row.exchange_url,
    rtransactionId: row.rtransaction_id,
    reason: row.reason,
    refundAmount: storedAmount("refund_amount", row.refund_amount),
    refundFee: storedAmount("refund_fee", row.refund_fee),
  };
}

function prepareStatements(db: Database.Database) {
  return {
    insertContract: db.prepare<[string, string, string, string, number]>(
      `INSERT INTO merchant_contract_terms (order_id, merchant_pub, contract_terms, h_contract_terms, timestamp)
       VALUES (?, ?, ?, ?, ?)`,
    ),
    contractByOrder: db.prepare<[string, string], ContractRow>(
      `SELECT * FROM merchant_contract_terms WHERE order_id = ? AND merchant_pub = ?`,
    ),
    contractByHash: db.prepare<[string, string], ContractRow>(
      `SELECT * FROM merchant_contract_terms WHERE h_contract_terms = ? AND merchant_pub = ?`,
    ),
    paidContractByHash: db.prepare<[string, string], ContractRow>(
      `SELECT * FROM merchant_contract_terms WHERE h_contract_terms = ? AND merchant_pub = ? AND paid = 1`,
    ),
    markPaid: db.prepare<[string, string]>(
      `UPDATE merchant_contract_terms SET paid = 1 WHERE h_contract_terms = ? AND merchant_pub = ?`,
    ),
    insertDeposit: db.prepare<[string, string, string, string, string, string, string, string, string, string]>(
      `INSERT INTO merchant_deposits
         (h_contract_terms, merchant_pub, coin_pub, exchange_url, amount_with_fee,
          deposit_fee, refund_fee, wire_fee, signkey_pub, exchange_proof)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (h_contract_terms, coin_pub) DO NOTHING`,
    ),
    depositsByContract: db.prepare<[string, string], DepositRow>(
      `SELECT * FROM merchant_deposits WHERE h_contract_terms = ? AND merchant_pub = ? ORDER BY row_id`,
    ),
    upsertSession: db.prepare<[string, string, string, string, number]>(
      `INSERT INTO merchant_session_info (session_id, fulfillment_url, merchant_pub, order_id, timestamp)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT (session_id, fulfillment_url, merchant_pub)
       DO UPDATE SET order_id = excluded.order_id, timestamp = excluded.timestamp`,
    ),
    sessionOrder: db.prepare<[string, string, string], { order_id: string }>(
      `SELECT order_id FROM merchant_session_info
       WHERE session_id = ? AND fulfillment_url = ? AND merchant_pub = ?`,
    ),
    refundsByContract: db.prepare<[string, string], RefundRow>(
      `SELECT r.coin_pub, d.exchange_url, r.rtransaction_id, r.reason, r.refund_amount, r.refund_fee
       FROM merchant_refunds r
       JOIN merchant_deposits d
         ON d.h_contract_terms = r.h_contract_terms AND d.coin_pub = r.coin_pub
       WHERE r.merchant_pub = ? AND r.h_contract_terms = ?
       ORDER BY r.rtransaction_id`,
    ),
    insertRefund: db.prepare<[string, string, string, string, string, string]>(
      `INSERT INTO merchant_refunds (merchant_pub, h_contract_terms, coin_pub, reason, refund_amount, refund_fee)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ),
    insertProof: db.prepare<[string, string, string, number, string, string]>(
      `INSERT INTO merchant_refund_proofs
         (h_contract_terms, merchant_pub, coin_pub, rtransaction_id, exchange_pub, exchange_sig)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT DO NOTHING`,
    ),
    proof: db.prepare<[string, string, string, number], ProofRow>(
      `SELECT exchange_pub, exchange_sig FROM merchant_refund_proofs
       WHERE h_contract_terms = ? AND merchant_pub = ? AND coin_pub = ? AND rtransaction_id = ?`,
    ),
    insertProduct: db.prepare<[string, string, string, string]>(
      `INSERT INTO merchant_products (instance_id, product_id, description, price) VALUES (?, ?, ?, ?)`,
    ),
    deleteProduct: db.prepare<[string, string]>(
      `DELETE FROM merchant_products WHERE instance_id = ? AND product_id = ?`,
    ),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

// ── Store ────────────────────────────────────────────────────────────

export class SqliteMerchantDb implements MerchantDb {
  private current: DbTransaction | null = null;
  private nextTxId = 1;

  private readonly stmts: Statements;

  constructor(
    private readonly db: Database.Database,
    private readonly log: FastifyBaseLogger,
    private readonly now: () => number = () => Date.now(),
  ) {
    db.exec(SCHEMA_SQL);
    this.stmts = prepareStatements(db);
  }

  /** Open (and create) the database file; ":memory:" for an in-process store. */
  static open(path: string, log: FastifyBaseLogger, now?: () => number): SqliteMerchantDb {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    const db = new Database(path);
    if (path !== ":memory:") db.pragma("journal_mode = WAL");
    return new SqliteMerchantDb(db, log, now);
  }

  // ── Transactions ───────────────────────────────────────────────────

  preflight(): void {
    if (!this.db.inTransaction) {
      this.current = null;
      return;
    }
    this.log.warn({ label: this.current?.label }, "preflight: rolling back leftover transaction");
    this.db.exec("ROLLBACK");
    this.current = null;
  }

  start(label: string): Lookup<DbTransaction> {
    if (this.current) {
      this.log.error({ label, open: this.current.label }, "start: transaction already open");
      return { status: QueryStatus.HARD_ERROR };
    }
    const status = this.guard(`start ${label}`, () => {
      this.db.exec("BEGIN IMMEDIATE");
      return QueryStatus.ONE_RESULT;
    });
    if (status !== QueryStatus.ONE_RESULT) return { status };
    const tx: DbTransaction = { id: this.nextTxId++, label };
    this.current = tx;
    return { status: QueryStatus.ONE_RESULT, value: tx };
  }

  commit(tx: DbTransaction): QueryStatus {
    if (!this.isCurrent(tx, "commit")) return QueryStatus.HARD_ERROR;
    const status = this.guard(`commit ${tx.label}`, () => {
      this.db.exec("COMMIT");
      return QueryStatus.NO_RESULTS;
    });
    if (status === QueryStatus.NO_RESULTS) this.current = null;
    return status;
  }

  rollback(tx: DbTransaction): void {
    if (this.current !== tx) return;
    this.current = null;
    if (this.db.inTransaction) this.db.exec("ROLLBACK");
  }

  // ── Contracts ──────────────────────────────────────────────────────

  insertContractTerms(orderId: string, merchantPub: string, contractTerms: unknown, timestamp: number): QueryStatus {
    return this.guard("insert contract terms", () => {
      const h = hashContractTerms(contractTerms);
      this.stmts.insertContract.run(orderId, merchantPub, JSON.stringify(contractTerms), h, timestamp);
      return QueryStatus.ONE_RESULT;
    });
  }

  findContractTerms(orderId: string, merchantPub: string): Lookup<ContractRecord> {
    return this.lookup("find contract terms", () => {
      const row = this.stmts.contractByOrder.get(orderId, merchantPub);
      return row ? contractFromRow(row) : undefined;
    });
  }

  findContractTermsFromHash(h: HashCode, merchantPub: string): Lookup<ContractRecord> {
    return this.lookup("find contract terms by hash", () => {
      const row = this.stmts.contractByHash.get(h, merchantPub);
      return row ? contractFromRow(row) : undefined;
    });
  }

  findPaidContractTermsFromHash(h: HashCode, merchantPub: string): Lookup<ContractRecord> {
    return this.lookup("find paid contract terms", () => {
      const row = this.stmts.paidContractByHash.get(h, merchantPub);
      return row ? contractFromRow(row) : undefined;
    });
  }

  markProposalPaid(tx: DbTransaction, h: HashCode, merchantPub: string): QueryStatus {
    if (!this.isCurrent(tx, "mark proposal paid")) return QueryStatus.HARD_ERROR;
    return this.guard("mark proposal paid", () =>
      this.stmts.markPaid.run(h, merchantPub).changes > 0 ? QueryStatus.ONE_RESULT : QueryStatus.NO_RESULTS,
    );
  }

  // ── Deposits ───────────────────────────────────────────────────────

  storeDeposit(record: DepositRecord): QueryStatus {
    return this.guard("store deposit", () => {
      const info = this.stmts.insertDeposit.run(
        record.hContractTerms,
        record.merchantPub,
        record.coinPub,
        record.exchangeUrl,
        amountToString(record.amountWithFee),
        amountToString(record.depositFee),
        amountToString(record.refundFee),
        amountToString(record.wireFee),
        record.exchangeSigningPub,
        JSON.stringify(record.exchangeProof),
      );
      return info.changes > 0 ? QueryStatus.ONE_RESULT : QueryStatus.NO_RESULTS;
    });
  }

  findPayments(h: HashCode, merchantPub: string, cb: (row: DepositRecord) => void): number {
    return this.guard("find payments", () => {
      const rows = this.stmts.depositsByContract.all(h, merchantPub).map(depositFromRow);
      for (const row of rows) cb(row);
      return rows.length;
    });
  }

  // ── Sessions ───────────────────────────────────────────────────────

  insertSessionInfo(
    tx: DbTransaction,
    sessionId: string,
    fulfillmentUrl: string,
    orderId: string,
    merchantPub: string,
  ): QueryStatus {
    if (!this.isCurrent(tx, "insert session info")) return QueryStatus.HARD_ERROR;
    return this.guard("insert session info", () => {
      this.stmts.upsertSession.run(sessionId, fulfillmentUrl, merchantPub, orderId, this.now());
      return QueryStatus.ONE_RESULT;
    });
  }

  findSessionInfo(sessionId: string, fulfillmentUrl: string, merchantPub: string): Lookup<string> {
    return this.lookup("find session info", () => this.stmts.sessionOrder.get(sessionId, fulfillmentUrl, merchantPub)?.order_id);
  }

  // ── Refunds ────────────────────────────────────────────────────────

  getRefundsFromContractTermsHash(merchantPub: string, h: HashCode, cb: (row: RefundRecord) => void): number {
    return this.guard("get refunds", () => {
      const rows = this.stmts.refundsByContract.all(merchantPub, h).map(refundFromRow);
      for (const row of rows) cb(row);
      return rows.length;
    });
  }

  /**
   * Distribute the increase over the deposited coins in deposit order,
   * each coin capped at its amount_with_fee minus what it already refunded.
   */
  increaseRefundForContract(
    tx: DbTransaction,
    h: HashCode,
    merchantPub: string,
    newTotal: Amount,
    reason: string,
  ): QueryStatus {
    if (!this.isCurrent(tx, "increase refund")) return QueryStatus.HARD_ERROR;
    return this.guard("increase refund", () => {
      const zero = amountZero(newTotal.currency);
      const refundedPerCoin = new Map<string, Amount>();
      let refunded = zero;
      for (const r of this.stmts.refundsByContract.all(merchantPub, h).map(refundFromRow)) {
        refunded = sum(refunded, r.refundAmount);
        refundedPerCoin.set(r.coinPub, sum(refundedPerCoin.get(r.coinPub) ?? zero, r.refundAmount));
      }
      if (amountCmp(newTotal, refunded) <= 0) return QueryStatus.ONE_RESULT;

      const deposits = this.stmts.depositsByContract.all(h, merchantPub).map(depositFromRow);
      const paid = deposits.reduce((acc, d) => sum(acc, d.amountWithFee), zero);
      if (amountCmp(newTotal, paid) > 0) return QueryStatus.NO_RESULTS;

      const delta = amountSubtract(newTotal, refunded);
      if (delta.status !== "positive") throw new Error(`refund delta: ${delta.status}`);
      let remaining = delta.amount;

      for (const d of deposits) {
        const room = amountSubtract(d.amountWithFee, refundedPerCoin.get(d.coinPub) ?? zero);
        if (room.status !== "positive") continue;
        const increment = amountMin(room.amount, remaining);
        this.stmts.insertRefund.run(
          merchantPub,
          h,
          d.coinPub,
          reason,
          amountToString(increment),
          amountToString(d.refundFee),
        );
        const left = amountSubtract(remaining, increment);
        if (left.status !== "positive") break;
        remaining = left.amount;
      }
      return QueryStatus.ONE_RESULT;
    });
  }

  putRefundProof(proof: RefundProof): QueryStatus {
    return this.guard("put refund proof", () => {
      const info = this.stmts.insertProof.run(
        proof.hContractTerms,
        proof.merchantPub,
        proof.coinPub,
        proof.rtransactionId,
        proof.exchangeSigningPub,
        proof.exchangeSig,
      );
      return info.changes > 0 ? QueryStatus.ONE_RESULT : QueryStatus.NO_RESULTS;
    });
  }

  getRefundProof(h: HashCode, merchantPub: string, coinPub: string, rtransactionId: number): Lookup<RefundProof> {
    return this.lookup("get refund proof", () => {
      const row = this.stmts.proof.get(h, merchantPub, coinPub, rtransactionId);
      if (!row) return undefined;
      return {
        hContractTerms: h,
        merchantPub,
        coinPub,
        rtransactionId,
        exchangeSigningPub: row.exchange_pub,
        exchangeSig: row.exchange_sig,
      };
    });
  }

  // ── Products ───────────────────────────────────────────────────────

  insertProduct(product: Product): QueryStatus {
    return this.guard("insert product", () => {
      this.stmts.insertProduct.run(product.instanceId, product.productId, product.description, amountToString(product.price));
      return QueryStatus.ONE_RESULT;
    });
  }

  deleteProduct(instanceId: string, productId: string): QueryStatus {
    return this.guard("delete product", () =>
      this.stmts.deleteProduct.run(instanceId, productId).changes > 0 ? QueryStatus.ONE_RESULT : QueryStatus.NO_RESULTS,
    );
  }

  close(): void {
    this.db.close();
  }

  // ── Internals ──────────────────────────────────────────────────────

  private isCurrent(tx: DbTransaction, op: string): boolean {
    if (this.current === tx) return true;
    this.log.error({ op, label: tx.label }, "operation requires the open transaction");
    return false;
  }

  private classify(op: string, err: unknown): ErrorStatus {
    if (err instanceof Database.SqliteError && /^SQLITE_(BUSY|LOCKED)/.test(err.code)) {
      this.log.info({ op, code: err.code }, "serialization failure");
      return QueryStatus.SOFT_ERROR;
    }
    this.log.error({ op, err }, "database failure");
    return QueryStatus.HARD_ERROR;
  }

  private guard<T extends number>(op: string, fn: () => T): T | ErrorStatus {
    try {
      return fn();
    } catch (err) {
      return this.classify(op, err);
    }
  }

  private lookup<T>(op: string, fn: () => T | undefined): Lookup<T> {
    try {
      const value = fn();
      return value === undefined
        ? { status: QueryStatus.NO_RESULTS }
        : { status: QueryStatus.ONE_RESULT, value };
    } catch (err) {
      return { status: this.classify(op, err) };
    }
  }
}
