/**
 * Merchant error codes and reply helpers.
 *
 * Every error leaves the backend as (http status, numeric code, hint):
 *   { "error": "offer_expired", "code": 2113, "hint": "..." }
 * plus forwarded exchange fields where an exchange caused it.
 */

export const ErrorCode = {
  // ── Request parsing ────────────────────────────────────────────────
  JSON_INVALID: 2000,
  PARAMETER_MISSING: 2001,
  PARAMETER_MALFORMED: 2002,
  INSTANCE_UNKNOWN: 2003,
  REQUEST_REJECTED: 2004,

  // ── /pay ───────────────────────────────────────────────────────────
  WRONG_INSTANCE: 2100,
  CONTRACT_NOT_FOUND: 2101,
  CONTRACT_TERMS_INVALID: 2102,
  CURRENCY_MISMATCH: 2103,
  COIN_CURRENCY_MISMATCH: 2104,
  DUPLICATE_COIN: 2105,
  COIN_CONTRIBUTION_CONFLICT: 2106,
  WIRE_HASH_UNKNOWN: 2107,
  REFUND_DEADLINE_PAST_WIRE_TRANSFER_DEADLINE: 2108,
  FEES_EXCEED_PAYMENT: 2109,
  WIRE_FEE_CURRENCY_MISMATCH: 2110,
  PAYMENT_INSUFFICIENT: 2111,
  PAYMENT_INSUFFICIENT_DUE_TO_FEES: 2112,
  OFFER_EXPIRED: 2113,
  REFUNDED: 2114,
  ABORT_REFUND_REFUSED_PAYMENT_COMPLETE: 2115,
  AMOUNT_OVERFLOW: 2116,

  // ── Exchange interaction ───────────────────────────────────────────
  EXCHANGE_KEYS_FAILURE: 2200,
  EXCHANGE_CURRENCY_MISMATCH: 2201,
  EXCHANGE_WIRE_FEE_UNAVAILABLE: 2202,
  DENOMINATION_KEY_NOT_FOUND: 2203,
  DENOMINATION_DEPOSIT_EXPIRED: 2204,
  DENOMINATION_KEY_AUDITOR_FAILURE: 2205,
  EXCHANGE_FAILED: 2206,
  EXCHANGE_REPLY_MALFORMED: 2207,
  DEPOSIT_INSUFFICIENT_FUNDS: 2208,
  DEPOSIT_FAILED: 2209,
  EXCHANGE_TIMEOUT: 2210,

  // ── Refunds ────────────────────────────────────────────────────────
  INCONSISTENT_AMOUNT: 2300,
  REFUND_CURRENCY_MISMATCH: 2301,
  LOOKUP_NO_REFUND: 2302,
  REFUND_LOOKUP_FAILED: 2303,

  // ── Poll payment ───────────────────────────────────────────────────
  POLL_PAYMENT_CONTRACT_NOT_FOUND: 2400,

  // ── Database ───────────────────────────────────────────────────────
  DB_HARD_ERROR: 2500,
  DB_CONTRACT_VIOLATION: 2501,
  DB_RETRIES_EXHAUSTED: 2502,
  DB_STORE_DEPOSIT_FAILED: 2503,

  INTERNAL: 2999,
} as const;

export type ErrorName = keyof typeof ErrorCode;

/** A complete HTTP answer produced by a handler. */
export interface Reply {
  status: number;
  body: Record<string, unknown>;
}

export function errorReply(
  status: number,
  name: ErrorName,
  hint: string,
  extra: Record<string, unknown> = {},
): Reply {
  return {
    status,
    body: { error: name.toLowerCase(), code: ErrorCode[name], hint, ...extra },
  };
}

export function okReply(body: Record<string, unknown>): Reply {
  return { status: 200, body };
}

/**
 * Thrown by handler code that has already decided on a reply; the
 * server's error handler sends it as-is.
 */
export class MerchantError extends Error {
  constructor(readonly reply: Reply) {
    super(typeof reply.body.hint === "string" ? reply.body.hint : "merchant error");
    this.name = "MerchantError";
  }
}

/**
 * Raised into every in-flight handler when the server shuts down.
 * The handler drops its connection without a reply.
 */
export class ShutdownError extends Error {
  constructor() {
    super("server shutting down");
    this.name = "ShutdownError";
  }
}
