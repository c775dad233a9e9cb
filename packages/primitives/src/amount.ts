/**
 * Currency-tagged fixed-point amounts.
 *
 * An amount is `value + fraction / FRAC_BASE` units of `currency`.
 * Every operation combining two amounts checks the currency first;
 * results never silently clamp (a negative difference is reported,
 * not turned into zero).
 *
 * Wire format: "EUR:10.05" (at most 8 fractional digits).
 */

import {
  AMOUNT_NBO_SIZE,
  CURRENCY_LEN,
  FRAC_BASE,
  FRAC_DIGITS,
  MAX_AMOUNT_VALUE,
} from "./constants.js";

export interface Amount {
  currency: string;
  value: number;
  fraction: number;
}

export type AmountResult =
  | { status: "positive" | "zero"; amount: Amount }
  | { status: "overflow" | "negative" | "currency_mismatch" };

export class CurrencyMismatchError extends Error {
  constructor(
    readonly left: string,
    readonly right: string,
  ) {
    super(`currency mismatch: ${left} vs ${right}`);
    this.name = "CurrencyMismatchError";
  }
}

const AMOUNT_RE = /^([A-Za-z]{1,11}):([0-9]{1,16})(?:\.([0-9]{1,8}))?$/;

const BIG_FRAC_BASE = BigInt(FRAC_BASE);
const BIG_MAX_UNITS = BigInt(MAX_AMOUNT_VALUE) * BIG_FRAC_BASE + (BIG_FRAC_BASE - 1n);

// ── Construction / parsing ─────────────────────────────────────────

export function amountZero(currency: string): Amount {
  return { currency, value: 0, fraction: 0 };
}

/** Parse "CUR:V[.F]". Returns null for anything malformed or out of range. */
export function parseAmount(text: string): Amount | null {
  const match = AMOUNT_RE.exec(text);
  if (!match) return null;
  const [, currency, intPart, fracPart] = match;
  if (currency === undefined || intPart === undefined) return null;
  const value = Number(intPart);
  if (!Number.isSafeInteger(value) || value > MAX_AMOUNT_VALUE) return null;
  const fraction = fracPart ? Number(fracPart.padEnd(FRAC_DIGITS, "0")) : 0;
  return { currency: currency.toUpperCase(), value, fraction };
}

export function amountToString(amount: Amount): string {
  if (amount.fraction === 0) return `${amount.currency}:${amount.value}`;
  const frac = String(amount.fraction).padStart(FRAC_DIGITS, "0").replace(/0+$/, "");
  return `${amount.currency}:${amount.value}.${frac}`;
}

export function isValidAmount(amount: Amount): boolean {
  return (
    /^[A-Z]{1,11}$/.test(amount.currency) &&
    Number.isSafeInteger(amount.value) &&
    amount.value >= 0 &&
    amount.value <= MAX_AMOUNT_VALUE &&
    Number.isInteger(amount.fraction) &&
    amount.fraction >= 0 &&
    amount.fraction < FRAC_BASE
  );
}

// ── Comparison ─────────────────────────────────────────────────────

export function sameCurrency(a: Amount, b: Amount): boolean {
  return a.currency === b.currency;
}

/** Total order within one currency. Throws on mixed currencies. */
export function amountCmp(a: Amount, b: Amount): -1 | 0 | 1 {
  if (!sameCurrency(a, b)) throw new CurrencyMismatchError(a.currency, b.currency);
  const ua = toUnits(a);
  const ub = toUnits(b);
  if (ua < ub) return -1;
  if (ua > ub) return 1;
  return 0;
}

// ── Arithmetic ─────────────────────────────────────────────────────

export function amountAdd(a: Amount, b: Amount): AmountResult {
  if (!sameCurrency(a, b)) return { status: "currency_mismatch" };
  return fromUnits(a.currency, toUnits(a) + toUnits(b));
}

export function amountSubtract(a: Amount, b: Amount): AmountResult {
  if (!sameCurrency(a, b)) return { status: "currency_mismatch" };
  const diff = toUnits(a) - toUnits(b);
  if (diff < 0n) return { status: "negative" };
  return fromUnits(a.currency, diff);
}

/** Divide by a positive 32-bit integer, truncating in the smallest unit. */
export function amountDivide(a: Amount, divisor: number): AmountResult {
  if (!Number.isInteger(divisor) || divisor < 1 || divisor > 0xffff_ffff) {
    throw new RangeError(`invalid divisor: ${divisor}`);
  }
  return fromUnits(a.currency, toUnits(a) / BigInt(divisor));
}

export function amountMin(a: Amount, b: Amount): Amount {
  return amountCmp(a, b) <= 0 ? a : b;
}

// ── Network byte order ─────────────────────────────────────────────

/**
 * 24-byte encoding used inside signed structures:
 * u64 value BE || u32 fraction BE || 12-byte zero-padded currency.
 */
export function amountToNbo(amount: Amount): Uint8Array {
  const out = new Uint8Array(AMOUNT_NBO_SIZE);
  const view = new DataView(out.buffer);
  view.setBigUint64(0, BigInt(amount.value), false);
  view.setUint32(8, amount.fraction, false);
  const currency = new TextEncoder().encode(amount.currency);
  out.set(currency.subarray(0, CURRENCY_LEN - 1), 12);
  return out;
}

// ── Internals ──────────────────────────────────────────────────────

function toUnits(a: Amount): bigint {
  return BigInt(a.value) * BIG_FRAC_BASE + BigInt(a.fraction);
}

function fromUnits(currency: string, units: bigint): AmountResult {
  if (units > BIG_MAX_UNITS) return { status: "overflow" };
  const amount: Amount = {
    currency,
    value: Number(units / BIG_FRAC_BASE),
    fraction: Number(units % BIG_FRAC_BASE),
  };
  return { status: units === 0n ? "zero" : "positive", amount };
}
