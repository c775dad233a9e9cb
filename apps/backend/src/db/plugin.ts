/**
 * Persistence contract — what the pay and refund handlers need from the
 * database.
 *
 * Every operation reports a QueryStatus. Enumerations invoke a callback
 * per row and return the row count (or a negative error status).
 *
 * Operations taking a DbTransaction must run between start() and
 * commit()/rollback() on that same transaction. Every other operation is a
 * single statement; run outside a transaction, a SOFT_ERROR from one of
 * those is a contract violation.
 */

import type { Amount, HashCode } from "@coinmerchant/primitives";

export const QueryStatus = {
  HARD_ERROR: -2,
  SOFT_ERROR: -1,
  NO_RESULTS: 0,
  ONE_RESULT: 1,
} as const;

export type QueryStatus = (typeof QueryStatus)[keyof typeof QueryStatus];

export type ErrorStatus = typeof QueryStatus.HARD_ERROR | typeof QueryStatus.SOFT_ERROR;

/** Single-row lookup: the row, or why there is none. */
export type Lookup<T> =
  | { status: typeof QueryStatus.ONE_RESULT; value: T }
  | { status: ErrorStatus | typeof QueryStatus.NO_RESULTS };

/** Opaque handle of an open transaction. */
export interface DbTransaction {
  readonly id: number;
  readonly label: string;
}

export interface ContractRecord {
  orderId: string;
  merchantPub: string;
  /** Stored document, exactly as inserted. */
  contractTerms: unknown;
  hContractTerms: HashCode;
  timestamp: number;
  paid: boolean;
}

export interface DepositRecord {
  hContractTerms: HashCode;
  merchantPub: string;
  coinPub: string;
  exchangeUrl: string;
  amountWithFee: Amount;
  depositFee: Amount;
  refundFee: Amount;
  wireFee: Amount;
  exchangeSigningPub: string;
  /** The exchange's deposit confirmation. */
  exchangeProof: unknown;
}

export interface RefundRecord {
  coinPub: string;
  /** Exchange the refunded coin was deposited at. */
  exchangeUrl: string;
  rtransactionId: number;
  reason: string;
  refundAmount: Amount;
  refundFee: Amount;
}

export interface RefundProof {
  hContractTerms: HashCode;
  merchantPub: string;
  coinPub: string;
  rtransactionId: number;
  exchangeSigningPub: string;
  exchangeSig: string;
}

export interface Product {
  instanceId: string;
  productId: string;
  description: string;
  price: Amount;
}

export interface MerchantDb {
  /** Roll back anything a previous handler left open. Call before start(). */
  preflight(): void;
  start(label: string): Lookup<DbTransaction>;
  commit(tx: DbTransaction): QueryStatus;
  rollback(tx: DbTransaction): void;

  // ── Contracts ──────────────────────────────────────────────────────
  insertContractTerms(orderId: string, merchantPub: string, contractTerms: unknown, timestamp: number): QueryStatus;
  findContractTerms(orderId: string, merchantPub: string): Lookup<ContractRecord>;
  findContractTermsFromHash(h: HashCode, merchantPub: string): Lookup<ContractRecord>;
  /** ONE_RESULT only when the order is paid. */
  findPaidContractTermsFromHash(h: HashCode, merchantPub: string): Lookup<ContractRecord>;
  markProposalPaid(tx: DbTransaction, h: HashCode, merchantPub: string): QueryStatus;

  // ── Deposits ───────────────────────────────────────────────────────
  /** Idempotent on (h, coin_pub): a second store of the same coin is NO_RESULTS. */
  storeDeposit(record: DepositRecord): QueryStatus;
  findPayments(h: HashCode, merchantPub: string, cb: (row: DepositRecord) => void): number;

  // ── Sessions ───────────────────────────────────────────────────────
  insertSessionInfo(
    tx: DbTransaction,
    sessionId: string,
    fulfillmentUrl: string,
    orderId: string,
    merchantPub: string,
  ): QueryStatus;
  /** The order most recently paid in this session for this fulfillment URL. */
  findSessionInfo(sessionId: string, fulfillmentUrl: string, merchantPub: string): Lookup<string>;

  // ── Refunds ────────────────────────────────────────────────────────
  getRefundsFromContractTermsHash(merchantPub: string, h: HashCode, cb: (row: RefundRecord) => void): number;
  /**
   * Raise the refund total of an order to `newTotal`.
   * ONE_RESULT when applied or already at least `newTotal`;
   * NO_RESULTS when `newTotal` exceeds what was ever paid.
   */
  increaseRefundForContract(
    tx: DbTransaction,
    h: HashCode,
    merchantPub: string,
    newTotal: Amount,
    reason: string,
  ): QueryStatus;
  putRefundProof(proof: RefundProof): QueryStatus;
  getRefundProof(h: HashCode, merchantPub: string, coinPub: string, rtransactionId: number): Lookup<RefundProof>;

  // ── Products ───────────────────────────────────────────────────────
  insertProduct(product: Product): QueryStatus;
  deleteProduct(instanceId: string, productId: string): QueryStatus;

  close(): void;
}
