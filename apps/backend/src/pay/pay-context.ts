/**
 * Pay state machine.
 *
 *   attempt (one synchronous DB transaction)
 *     reconcile stored deposits and refunds against the request coins
 *     abort-refund → refuse if paid, else refund what was paid, commit
 *     pay, coins missing → roll back, deposit them exchange by exchange,
 *                          then attempt again
 *     pay, all coins in  → fee check, mark paid (+ session), commit,
 *                          wake long-pollers, sign
 *
 * SOFT_ERROR anywhere, including storing a deposit, restarts the attempt;
 * after `maxRetries` of them the request fails. PAY_TIMEOUT starts at the
 * first exchange interaction and bounds all of them together.
 */

import type { FastifyBaseLogger } from "fastify";
import {
  amountAdd,
  amountCmp,
  amountToString,
  amountZero,
  sameCurrency,
  signPaymentOk,
  type Amount,
} from "@coinmerchant/primitives";
import type { ExchangeClient, ExchangeHandle, FindExchangeResult } from "@coinmerchant/exchange-client";
import type { Settings } from "../config.js";
import { QueryStatus, type DbTransaction, type DepositRecord, type MerchantDb, type RefundRecord } from "../db/plugin.js";
import { ShutdownError, errorReply, okReply, type Reply } from "../errors.js";
import type { MerchantInstance } from "../instances.js";
import type { LongPollHub } from "../long-poll/hub.js";
import type { Abortable, InFlightRegistry } from "../long-poll/registry.js";
import { signRefundPermissions, type RefundGrant } from "../refund/refund-permissions.js";
import { checkDenomination } from "./denomination.js";
import { depositFailureReply } from "./deposit-failure.js";
import type { ParsedPay, PayCoin } from "./parse.js";
import { checkPaymentSufficient } from "./payment-check.js";

export interface PayDeps {
  db: MerchantDb;
  exchanges: ExchangeClient;
  settings: Settings;
  registry: InFlightRegistry;
  hub: LongPollHub;
  log: FastifyBaseLogger;
  now: () => number;
}

type Interrupt = "timeout" | "shutdown";

type Attempt =
  | { kind: "reply"; reply: Reply }
  | { kind: "retry" }
  | { kind: "deposit" }
  | { kind: "paid"; refunds: RefundRecord[] }
  | { kind: "aborted"; grants: RefundGrant[] };

type DepositOutcome = Reply | "stored" | "retry" | "aborted";

const ABORT_REASON = "incomplete payment aborted";

function plus(a: Amount, b: Amount): Amount | null {
  const r = amountAdd(a, b);
  return r.status === "positive" || r.status === "zero" ? r.amount : null;
}

function overflow(what: string): Attempt {
  return { kind: "reply", reply: errorReply(500, "AMOUNT_OVERFLOW", `overflow summing ${what}`) };
}

function findExchangeFailureReply(url: string, found: Extract<FindExchangeResult, { ok: false }>): Reply {
  switch (found.ec) {
    case "KEYS_FETCH_FAILED":
      return errorReply(424, "EXCHANGE_KEYS_FAILURE", "could not obtain exchange keys", {
        exchange_url: url,
        exchange_http_status: found.httpStatus,
        exchange_reply: found.reply,
      });
    case "CURRENCY_MISMATCH":
      return errorReply(412, "EXCHANGE_CURRENCY_MISMATCH", "exchange uses a different currency", {
        exchange_url: url,
      });
    case "WIRE_FEE_UNAVAILABLE":
      return errorReply(424, "EXCHANGE_WIRE_FEE_UNAVAILABLE", "exchange publishes no wire fee for our wire method", {
        exchange_url: url,
        exchange_http_status: found.httpStatus,
      });
  }
}

export class PayContext implements Abortable {
  private readonly log: FastifyBaseLogger;
  private readonly interrupted: Promise<Interrupt>;
  private signalInterrupt: (reason: Interrupt) => void = () => {};
  private softErrors = 0;
  private timer: NodeJS.Timeout | null = null;
  private timedOut = false;
  private shuttingDown = false;
  private findController: AbortController | null = null;
  private depositController: AbortController | null = null;

  constructor(
    private readonly deps: PayDeps,
    private readonly instance: MerchantInstance,
    private readonly parsed: ParsedPay,
  ) {
    this.log = deps.log.child({ component: "pay", order_id: parsed.orderId });
    this.interrupted = new Promise<Interrupt>((resolve) => {
      this.signalInterrupt = resolve;
    });
  }

  async run(): Promise<Reply> {
    const unregister = this.deps.registry.add(this);
    try {
      return await this.loop();
    } finally {
      this.cleanup();
      unregister();
    }
  }

  /** Shutdown: cancel exchange traffic; run() then rejects with ShutdownError. */
  abort(): void {
    this.shuttingDown = true;
    this.signalInterrupt("shutdown");
    this.cleanup();
  }

  private cleanup(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.findController?.abort();
    this.findController = null;
    this.depositController?.abort();
    this.depositController = null;
  }

  private async loop(): Promise<Reply> {
    for (;;) {
      if (this.shuttingDown) throw new ShutdownError();
      const attempt = this.attempt();
      switch (attempt.kind) {
        case "reply":
          return attempt.reply;
        case "paid":
          return this.paid(attempt.refunds);
        case "aborted":
          return this.abortRefunded(attempt.grants);
        case "retry": {
          const exhausted = this.softError();
          if (exhausted) return exhausted;
          continue;
        }
        case "deposit": {
          const outcome = await this.depositMissing();
          if (outcome === "retry") {
            const exhausted = this.softError();
            if (exhausted) return exhausted;
          } else if (outcome !== "done") {
            return outcome;
          }
          continue;
        }
      }
    }
  }

  private softError(): Reply | null {
    this.softErrors++;
    if (this.softErrors < this.deps.settings.maxRetries) {
      this.log.debug({ attempt: this.softErrors }, "serialization failure, restarting");
      return null;
    }
    this.log.warn({ attempts: this.softErrors }, "pay retries exhausted");
    return errorReply(500, "DB_RETRIES_EXHAUSTED", "too many serialization failures");
  }

  // ── Transaction attempt ────────────────────────────────────────────

  private attempt(): Attempt {
    const { db } = this.deps;
    db.preflight();
    const started = db.start(`pay ${this.parsed.orderId}`);
    if (started.status === QueryStatus.SOFT_ERROR) return { kind: "retry" };
    if (started.status !== QueryStatus.ONE_RESULT) return this.hardError("start transaction");
    const tx = started.value;
    try {
      return this.attemptIn(tx);
    } finally {
      // no-op once committed
      db.rollback(tx);
    }
  }

  private attemptIn(tx: DbTransaction): Attempt {
    const { db } = this.deps;
    const p = this.parsed;
    const pub = this.instance.merchantPub;
    const zero = amountZero(p.amount.currency);

    for (const coin of p.coins) {
      coin.foundInDb = false;
      coin.refunded = false;
    }

    // check_coin_paid
    const deposits: DepositRecord[] = [];
    const paidRows = db.findPayments(p.hContractTerms, pub, (row) => deposits.push(row));
    if (paidRows < 0) return this.statusFailure(paidRows, "find payments");
    let totalPaid = zero;
    for (const row of deposits) {
      const coin = p.coins.find((c) => c.coinPub === row.coinPub);
      if (!coin) continue;
      if (!sameCurrency(row.amountWithFee, coin.amountWithFee) || amountCmp(row.amountWithFee, coin.amountWithFee) !== 0) {
        return {
          kind: "reply",
          reply: errorReply(409, "COIN_CONTRIBUTION_CONFLICT", "coin was deposited for this order with another amount", {
            coin_pub: coin.coinPub,
            stored_contribution: amountToString(row.amountWithFee),
          }),
        };
      }
      coin.foundInDb = true;
      coin.depositFee = row.depositFee;
      coin.refundFee = row.refundFee;
      coin.wireFee = row.wireFee;
      const sum = plus(totalPaid, row.amountWithFee);
      if (!sum) return overflow("payments");
      totalPaid = sum;
    }

    // check_coin_refunded
    const refunds: RefundRecord[] = [];
    const refundRows = db.getRefundsFromContractTermsHash(pub, p.hContractTerms, (row) => refunds.push(row));
    if (refundRows < 0) return this.statusFailure(refundRows, "get refunds");
    let totalRefunded = zero;
    for (const row of refunds) {
      const coin = p.coins.find((c) => c.coinPub === row.coinPub);
      if (!coin) continue;
      coin.refunded = true;
      const sum = plus(totalRefunded, row.refundAmount);
      if (!sum) return overflow("refunds");
      totalRefunded = sum;
    }

    if (p.mode === "abort-refund") return this.abortIn(tx, totalPaid);

    if (p.coins.some((c) => !c.foundInDb)) return { kind: "deposit" };

    const insufficient = checkPaymentSufficient({
      coins: p.coins,
      amount: p.amount,
      maxFee: p.maxFee,
      maxWireFee: p.maxWireFee,
      wireFeeAmortization: p.wireFeeAmortization,
      totalRefunded,
    });
    if (insufficient) return { kind: "reply", reply: insufficient };

    const marked = db.markProposalPaid(tx, p.hContractTerms, pub);
    if (marked !== QueryStatus.ONE_RESULT) return this.statusFailure(marked, "mark proposal paid");
    if (p.sessionId !== undefined && p.fulfillmentUrl !== undefined) {
      const session = db.insertSessionInfo(tx, p.sessionId, p.fulfillmentUrl, p.orderId, pub);
      if (session !== QueryStatus.ONE_RESULT) return this.statusFailure(session, "insert session info");
    }
    const committed = db.commit(tx);
    if (committed < 0) return this.statusFailure(committed, "commit");
    return { kind: "paid", refunds };
  }

  private abortIn(tx: DbTransaction, totalPaid: Amount): Attempt {
    const { db } = this.deps;
    const p = this.parsed;
    const pub = this.instance.merchantPub;

    const paid = db.findPaidContractTermsFromHash(p.hContractTerms, pub);
    if (paid.status === QueryStatus.ONE_RESULT) {
      return {
        kind: "reply",
        reply: errorReply(403, "ABORT_REFUND_REFUSED_PAYMENT_COMPLETE", "order is already paid"),
      };
    }
    if (paid.status !== QueryStatus.NO_RESULTS) return this.statusFailure(paid.status, "find paid contract");

    const increased = db.increaseRefundForContract(tx, p.hContractTerms, pub, totalPaid, ABORT_REASON);
    if (increased !== QueryStatus.ONE_RESULT) return this.statusFailure(increased, "increase refund");
    const committed = db.commit(tx);
    if (committed < 0) return this.statusFailure(committed, "commit");

    const grants = p.coins
      .filter((c) => c.foundInDb)
      .map((c): RefundGrant => ({
        coinPub: c.coinPub,
        rtransactionId: 0,
        refundAmount: c.amountWithFee,
        refundFee: c.refundFee,
      }));
    return { kind: "aborted", grants };
  }

  private statusFailure(status: number, op: string): Attempt {
    if (status === QueryStatus.SOFT_ERROR) return { kind: "retry" };
    return this.hardError(op);
  }

  private hardError(op: string): Attempt {
    this.log.error({ op }, "database failure");
    return { kind: "reply", reply: errorReply(500, "DB_HARD_ERROR", `${op} failed`) };
  }

  // ── Replies ────────────────────────────────────────────────────────

  private async paid(refunds: RefundRecord[]): Promise<Reply> {
    const p = this.parsed;
    const woken = this.deps.hub.resume(p.orderId, this.instance.merchantPub);
    this.log.info({ woken }, "order paid");
    const [sig, refundPermissions] = await Promise.all([
      signPaymentOk(this.instance.merchantPriv, p.hContractTerms),
      signRefundPermissions(
        this.instance,
        p.hContractTerms,
        refunds.map((r) => ({
          coinPub: r.coinPub,
          rtransactionId: r.rtransactionId,
          refundAmount: r.refundAmount,
          refundFee: r.refundFee,
        })),
      ),
    ]);
    return okReply({
      contract_terms: p.contractTerms,
      sig,
      h_contract_terms: p.hContractTerms,
      refund_permissions: refundPermissions,
    });
  }

  private async abortRefunded(grants: RefundGrant[]): Promise<Reply> {
    const p = this.parsed;
    this.log.info({ coins: grants.length }, "payment aborted, refund granted");
    return okReply({
      refund_permissions: await signRefundPermissions(this.instance, p.hContractTerms, grants),
      merchant_pub: this.instance.merchantPub,
      h_contract_terms: p.hContractTerms,
    });
  }

  // ── Deposit fan-out ────────────────────────────────────────────────

  private async depositMissing(): Promise<Reply | "retry" | "done"> {
    for (let url = this.nextExchange(); url !== null; url = this.nextExchange()) {
      const outcome = await this.depositAt(url);
      if (outcome !== "done") return outcome;
    }
    return "done";
  }

  private nextExchange(): string | null {
    return this.parsed.coins.find((c) => !c.foundInDb)?.exchangeUrl ?? null;
  }

  private armTimeout(): void {
    if (this.timer || this.timedOut) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.timedOut = true;
      this.log.info({ timeoutMs: this.deps.settings.payTimeoutMs }, "pay timed out");
      this.findController?.abort();
      this.signalInterrupt("timeout");
    }, this.deps.settings.payTimeoutMs);
  }

  private timeoutReply(url: string): Reply {
    return errorReply(408, "EXCHANGE_TIMEOUT", "exchange did not answer in time", { exchange_url: url });
  }

  private async depositAt(url: string): Promise<Reply | "retry" | "done"> {
    this.armTimeout();
    if (this.timedOut) return this.timeoutReply(url);

    const lookup = new AbortController();
    this.findController = lookup;
    let found: FindExchangeResult | Interrupt;
    try {
      found = await Promise.race([
        this.deps.exchanges.findExchange(url, this.parsed.wireMethod.wireMethod, lookup.signal),
        this.interrupted,
      ]);
    } catch (err) {
      if (!lookup.signal.aborted) throw err;
      found = this.shuttingDown ? "shutdown" : "timeout";
    } finally {
      if (this.findController === lookup) this.findController = null;
    }
    if (found === "shutdown" || this.shuttingDown) throw new ShutdownError();
    if (found === "timeout") return this.timeoutReply(url);
    if (!found.ok) return findExchangeFailureReply(url, found);

    const now = this.deps.now();
    const batch = this.parsed.coins.filter((c) => !c.foundInDb && c.exchangeUrl === url);
    for (const coin of batch) {
      const checked = checkDenomination(
        found.keys,
        coin.denomPub,
        found.trusted,
        this.deps.settings.auditorPubs,
        now,
        coin.coinPub,
      );
      if (!checked.ok) return checked.reply;
      coin.depositFee = checked.fees.depositFee;
      coin.refundFee = checked.fees.refundFee;
      coin.wireFee = found.wireFee ?? amountZero(coin.amountWithFee.currency);
    }

    const handle = found.handle;
    const deposits = new AbortController();
    this.depositController = deposits;
    let outcomes: DepositOutcome[] | Interrupt;
    try {
      outcomes = await Promise.race([
        Promise.all(batch.map((coin) => this.depositOne(handle, coin, deposits))),
        this.interrupted,
      ]);
    } finally {
      deposits.abort();
      if (this.depositController === deposits) this.depositController = null;
    }
    if (outcomes === "shutdown" || this.shuttingDown) throw new ShutdownError();
    if (outcomes === "timeout" || this.timedOut) return this.timeoutReply(url);

    const failure = outcomes.find((o): o is Reply => typeof o === "object");
    if (failure) return failure;
    if (outcomes.some((o) => o !== "stored")) return "retry";
    return "done";
  }

  /** Never rejects: every failure becomes an outcome. */
  private async depositOne(handle: ExchangeHandle, coin: PayCoin, batch: AbortController): Promise<DepositOutcome> {
    const p = this.parsed;
    try {
      const result = await this.deps.exchanges.deposit(
        handle,
        {
          amountWithFee: coin.amountWithFee,
          wireTransferDeadline: p.wireTransferDeadline,
          wire: p.wireMethod.jWire,
          hWire: p.wireMethod.hWire,
          hContractTerms: p.hContractTerms,
          coinPub: coin.coinPub,
          denomSig: coin.ubSig,
          denomPub: coin.denomPub,
          timestamp: p.timestamp,
          merchantPub: this.instance.merchantPub,
          refundDeadline: p.refundDeadline,
          coinSig: coin.coinSig,
          forwardToAuditor: this.deps.settings.forceAudit,
        },
        batch.signal,
      );
      if (batch.signal.aborted) return "aborted";
      if (!result.ok) {
        this.log.info({ coin_pub: coin.coinPub, status: result.httpStatus, ec: result.ec }, "deposit refused");
        batch.abort();
        return depositFailureReply(coin.coinPub, result);
      }

      const stored = this.deps.db.storeDeposit({
        hContractTerms: p.hContractTerms,
        merchantPub: this.instance.merchantPub,
        coinPub: coin.coinPub,
        exchangeUrl: handle.url,
        amountWithFee: coin.amountWithFee,
        depositFee: coin.depositFee,
        refundFee: coin.refundFee,
        wireFee: coin.wireFee,
        exchangeSigningPub: result.signingPub,
        exchangeProof: result.reply,
      });
      if (stored === QueryStatus.SOFT_ERROR) return "retry";
      if (stored === QueryStatus.HARD_ERROR) {
        batch.abort();
        return errorReply(500, "DB_STORE_DEPOSIT_FAILED", "could not record the deposit", { coin_pub: coin.coinPub });
      }
      coin.foundInDb = true;
      return "stored";
    } catch (err) {
      if (batch.signal.aborted) return "aborted";
      this.log.error({ err, coin_pub: coin.coinPub }, "deposit request failed");
      batch.abort();
      return errorReply(500, "INTERNAL", "deposit request failed", { coin_pub: coin.coinPub });
    }
  }
}
