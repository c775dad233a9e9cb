/**
 * Exchange client interface — what the merchant backend needs from an
 * exchange. Swap HttpExchangeClient for MockExchangeClient in tests.
 *
 * Every operation takes an optional AbortSignal. An aborted operation
 * rejects with the signal's reason; callers drop the result.
 */

import type { Amount, HashCode } from "@coinmerchant/primitives";
import type { ExchangeKeys } from "./wire-format.js";

/** Exchange-side error codes the backend inspects. */
export const ExchangeErrorCode = {
  DEPOSIT_INSUFFICIENT_FUNDS: 1205,
  DEPOSIT_COIN_SIGNATURE_INVALID: 1206,
  REFUND_COIN_NOT_FOUND: 1501,
  REFUND_CONFLICT: 1502,
  /** Client-side: the exchange's confirmation did not verify. */
  CONFIRMATION_SIGNATURE_INVALID: 1999,
} as const;

export type FindExchangeFailure = "KEYS_FETCH_FAILED" | "CURRENCY_MISMATCH" | "WIRE_FEE_UNAVAILABLE";

export interface ExchangeHandle {
  readonly url: string;
  readonly keys: ExchangeKeys;
}

export type FindExchangeResult =
  | {
      ok: true;
      handle: ExchangeHandle;
      keys: ExchangeKeys;
      /** Fee for the requested wire method now; null when no method was requested. */
      wireFee: Amount | null;
      trusted: boolean;
    }
  | {
      ok: false;
      ec: FindExchangeFailure;
      httpStatus: number;
      reply: unknown;
    };

/** The merchant's bank account as committed to in the contract (h_wire). */
export interface WireDetails {
  payto_uri: string;
  salt: string;
}

export interface DepositParams {
  amountWithFee: Amount;
  wireTransferDeadline: number;
  wire: WireDetails;
  hWire: HashCode;
  hContractTerms: HashCode;
  coinPub: string;
  denomSig: string;
  denomPub: string;
  timestamp: number;
  merchantPub: string;
  refundDeadline: number;
  coinSig: string;
  /** Flag the deposit for forwarding to the auditor. */
  forwardToAuditor: boolean;
}

export interface RefundParams {
  refundAmount: Amount;
  refundFee: Amount;
  hContractTerms: HashCode;
  coinPub: string;
  rtransactionId: number;
  merchantPriv: Uint8Array;
}

/**
 * Result of a deposit or refund.
 * `reply` is the parsed JSON body, or null when the body was not JSON.
 */
export type ExchangeOpResult =
  | {
      ok: true;
      httpStatus: number;
      exchangeSig: string;
      signingPub: string;
      reply: unknown;
    }
  | {
      ok: false;
      httpStatus: number;
      ec: number | null;
      reply: unknown;
    };

export interface ExchangeClient {
  findExchange(url: string, wireMethod: string | null, signal?: AbortSignal): Promise<FindExchangeResult>;
  deposit(handle: ExchangeHandle, params: DepositParams, signal?: AbortSignal): Promise<ExchangeOpResult>;
  refund(handle: ExchangeHandle, params: RefundParams, signal?: AbortSignal): Promise<ExchangeOpResult>;
}

export interface HttpExchangeClientOptions {
  /** Currency every exchange must use. */
  currency: string;
  /** Exchange base URLs accepted without auditor consent. */
  trustedExchanges: readonly string[];
  /** How long fetched /keys stay cached. */
  keysTtlMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

