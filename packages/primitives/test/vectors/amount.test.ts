/**
 * Amount arithmetic vectors.
 */

import { describe, it, expect } from "vitest";
import {
  amountAdd,
  amountCmp,
  amountDivide,
  amountSubtract,
  amountToNbo,
  amountToString,
  amountZero,
  CurrencyMismatchError,
  isValidAmount,
  parseAmount,
  type Amount,
} from "../../src/amount.js";
import { toHex } from "../../src/hash.js";

function amt(text: string): Amount {
  const a = parseAmount(text);
  if (!a) throw new Error(`bad test amount ${text}`);
  return a;
}

describe("parseAmount / amountToString", () => {
  it("parses value and fraction", () => {
    expect(parseAmount("EUR:10.05")).toEqual({ currency: "EUR", value: 10, fraction: 5_000_000 });
  });

  it("uppercases the currency", () => {
    expect(parseAmount("eur:1")).toEqual({ currency: "EUR", value: 1, fraction: 0 });
  });

  it("formats without a fraction when it is zero", () => {
    expect(amountToString(amt("EUR:10.00"))).toBe("EUR:10");
    expect(amountToString(amt("EUR:10.05"))).toBe("EUR:10.05");
    expect(amountToString(amt("KUDOS:0.00000001"))).toBe("KUDOS:0.00000001");
  });

  it("rejects malformed input", () => {
    expect(parseAmount("EUR")).toBeNull();
    expect(parseAmount("EUR:")).toBeNull();
    expect(parseAmount("EUR:-1")).toBeNull();
    expect(parseAmount("EUR:1.123456789")).toBeNull();
    expect(parseAmount("TWELVELETTER:1")).toBeNull();
    expect(parseAmount(":1")).toBeNull();
  });

  it("accepts the maximum value and rejects one above it", () => {
    expect(parseAmount("EUR:4503599627370496")).not.toBeNull();
    expect(parseAmount("EUR:4503599627370497")).toBeNull();
  });

  it("validates constructed amounts", () => {
    expect(isValidAmount({ currency: "EUR", value: 1, fraction: 99_999_999 })).toBe(true);
    expect(isValidAmount({ currency: "EUR", value: 1, fraction: 100_000_000 })).toBe(false);
    expect(isValidAmount({ currency: "eur", value: 1, fraction: 0 })).toBe(false);
    expect(isValidAmount({ currency: "EUR", value: -1, fraction: 0 })).toBe(false);
  });
});

describe("arithmetic", () => {
  it("adds with carry into the value", () => {
    const r = amountAdd(amt("EUR:5.60"), amt("EUR:5.60"));
    expect(r).toEqual({ status: "positive", amount: { currency: "EUR", value: 11, fraction: 20_000_000 } });
  });

  it("reports zero", () => {
    expect(amountAdd(amountZero("EUR"), amountZero("EUR")).status).toBe("zero");
    expect(amountSubtract(amt("EUR:3.3"), amt("EUR:3.30")).status).toBe("zero");
  });

  it("never clamps a negative difference", () => {
    expect(amountSubtract(amt("EUR:1"), amt("EUR:2"))).toEqual({ status: "negative" });
  });

  it("reports overflow above the maximum", () => {
    expect(amountAdd(amt("EUR:4503599627370496"), amt("EUR:1"))).toEqual({ status: "overflow" });
    expect(amountAdd(amt("EUR:4503599627370496"), amt("EUR:0.99999999")).status).toBe("positive");
  });

  it("reports currency mismatch", () => {
    expect(amountAdd(amt("EUR:1"), amt("USD:1"))).toEqual({ status: "currency_mismatch" });
    expect(amountSubtract(amt("EUR:1"), amt("USD:1"))).toEqual({ status: "currency_mismatch" });
    expect(() => amountCmp(amt("EUR:1"), amt("USD:1"))).toThrow(CurrencyMismatchError);
  });

  it("compares within a currency", () => {
    expect(amountCmp(amt("EUR:10.2"), amt("EUR:10.1"))).toBe(1);
    expect(amountCmp(amt("EUR:10.1"), amt("EUR:10.10"))).toBe(0);
    expect(amountCmp(amt("EUR:0.99999999"), amt("EUR:1"))).toBe(-1);
  });

  it("divides with truncation in the smallest unit", () => {
    expect(amountDivide(amt("EUR:2"), 4)).toEqual({
      status: "positive",
      amount: { currency: "EUR", value: 0, fraction: 50_000_000 },
    });
    expect(amountDivide(amt("EUR:0.00000001"), 3).status).toBe("zero");
    expect(() => amountDivide(amt("EUR:1"), 0)).toThrow(RangeError);
  });
});

describe("amountToNbo", () => {
  it("encodes value, fraction and padded currency big-endian", () => {
    expect(toHex(amountToNbo(amt("EUR:1.5")))).toBe(
      "0000000000000001" + "02faf080" + "455552" + "00".repeat(9),
    );
  });
});
