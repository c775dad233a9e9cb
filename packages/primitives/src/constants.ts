/**
 * Frozen protocol constants.
 *
 * FROZEN constants are part of signed payloads or stored data; changing
 * one invalidates every signature and row produced before.
 * DEFAULTS are overridable through backend configuration.
 */

// ── Amounts (frozen) ───────────────────────────────────────────────
export const FRAC_BASE = 100_000_000; // 10^8 fractional units per value unit
export const FRAC_DIGITS = 8;
export const MAX_AMOUNT_VALUE = 2 ** 52;
export const CURRENCY_LEN = 12; // bytes reserved in AmountNBO, incl. terminator
export const AMOUNT_NBO_SIZE = 8 + 4 + CURRENCY_LEN;

// ── Signature purposes (frozen) ────────────────────────────────────
export const SIGNATURE_PURPOSE_MERCHANT_REFUND = 1102;
export const SIGNATURE_PURPOSE_MERCHANT_PAYMENT_OK = 1104;

// ── Key and hash sizes (frozen) ────────────────────────────────────
export const HASH_SIZE = 32;
export const EDDSA_PUBLIC_KEY_SIZE = 32;

// ── Defaults ───────────────────────────────────────────────────────
export const PAY_TIMEOUT_MS_DEFAULT = 30_000;
export const MAX_RETRIES_DEFAULT = 5;
export const WIRE_FEE_AMORTIZATION_DEFAULT = 1;
