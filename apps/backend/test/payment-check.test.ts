/**
 * Payment sufficiency: price, deposit fees over max_fee, amortized wire
 * fees over max_wire_fee, and refunds.
 */

import { describe, it, expect } from "vitest";
import { errorReply } from "../src/errors.js";
import { checkPaymentSufficient, type SufficiencyInput } from "../src/pay/payment-check.js";
import { amt, coinPub } from "./fixtures.js";

function coin(n: number, amountWithFee: string, depositFee: string, wireFee = "EUR:0", exchangeUrl = "https://a.test/") {
  return {
    coinPub: coinPub(n),
    exchangeUrl,
    amountWithFee: amt(amountWithFee),
    depositFee: amt(depositFee),
    wireFee: amt(wireFee),
  };
}

function input(overrides: Partial<SufficiencyInput>): SufficiencyInput {
  return {
    coins: [],
    amount: amt("EUR:10"),
    maxFee: amt("EUR:0.10"),
    maxWireFee: amt("EUR:0"),
    wireFeeAmortization: 1,
    totalRefunded: amt("EUR:0"),
    ...overrides,
  };
}

const DUE_TO_FEES = errorReply(400, "PAYMENT_INSUFFICIENT_DUE_TO_FEES", "payment covers the price but not the fees");

describe("checkPaymentSufficient", () => {
  it("accepts a coin covering price and its own fee within max_fee", () => {
    expect(checkPaymentSufficient(input({ coins: [coin(1, "EUR:10.05", "EUR:0.05")] }))).toBeNull();
  });

  it("accepts a coin of exactly price plus deposit fee when max_fee is zero", () => {
    const maxFee = amt("EUR:0");
    expect(checkPaymentSufficient(input({ maxFee, coins: [coin(1, "EUR:10.05", "EUR:0.05")] }))).toBeNull();
    expect(checkPaymentSufficient(input({ maxFee, coins: [coin(1, "EUR:10.04", "EUR:0.05")] }))).toEqual(
      DUE_TO_FEES,
    );
  });

  it("makes the customer cover deposit fees above max_fee", () => {
    const covered = [coin(1, "EUR:5.10", "EUR:0.10"), coin(2, "EUR:5.10", "EUR:0.10")];
    expect(checkPaymentSufficient(input({ coins: covered }))).toBeNull();

    const short = [coin(1, "EUR:5.04", "EUR:0.10"), coin(2, "EUR:5.04", "EUR:0.10")];
    expect(checkPaymentSufficient(input({ coins: short }))).toEqual(DUE_TO_FEES);
  });

  it("amortizes the wire fee above max_wire_fee", () => {
    const base = { maxFee: amt("EUR:0"), maxWireFee: amt("EUR:0.50"), wireFeeAmortization: 4 };
    // (2.50 - 0.50) / 4 = 0.50 on top of the price
    expect(checkPaymentSufficient(input({ ...base, coins: [coin(1, "EUR:10.50", "EUR:0", "EUR:2.50")] }))).toBeNull();
    expect(checkPaymentSufficient(input({ ...base, coins: [coin(1, "EUR:10.49", "EUR:0", "EUR:2.50")] }))).toEqual(
      DUE_TO_FEES,
    );
  });

  it("lets max_fee absorb part of the wire fee share", () => {
    const base = { maxWireFee: amt("EUR:0.50"), wireFeeAmortization: 4 };
    expect(checkPaymentSufficient(input({ ...base, coins: [coin(1, "EUR:10.40", "EUR:0", "EUR:2.50")] }))).toBeNull();
    expect(checkPaymentSufficient(input({ ...base, coins: [coin(1, "EUR:10.39", "EUR:0", "EUR:2.50")] }))).toEqual(
      DUE_TO_FEES,
    );
  });

  it("charges the full wire fee with default amortization and zero max_wire_fee", () => {
    const maxFee = amt("EUR:0");
    expect(checkPaymentSufficient(input({ maxFee, coins: [coin(1, "EUR:10.30", "EUR:0", "EUR:0.30")] }))).toBeNull();
    expect(checkPaymentSufficient(input({ maxFee, coins: [coin(1, "EUR:10.29", "EUR:0", "EUR:0.30")] }))).toEqual(
      DUE_TO_FEES,
    );
  });

  it("counts the wire fee once per exchange", () => {
    const maxFee = amt("EUR:0");
    const sameExchange = [coin(1, "EUR:5.15", "EUR:0", "EUR:0.30"), coin(2, "EUR:5.15", "EUR:0", "EUR:0.30")];
    expect(checkPaymentSufficient(input({ maxFee, coins: sameExchange }))).toBeNull();

    const twoExchanges = [
      coin(1, "EUR:5.15", "EUR:0", "EUR:0.30", "https://a.test/"),
      coin(2, "EUR:5.15", "EUR:0", "EUR:0.30", "https://b.test/"),
    ];
    expect(checkPaymentSufficient(input({ maxFee, coins: twoExchanges }))).toEqual(DUE_TO_FEES);
  });

  it("reports a refunded contract", () => {
    expect(
      checkPaymentSufficient(input({ coins: [coin(1, "EUR:10.05", "EUR:0.05")], totalRefunded: amt("EUR:1") })),
    ).toEqual(errorReply(402, "REFUNDED", "contract was partially refunded; paid amount no longer covers it"));
  });

  it("reports a payment below the price", () => {
    expect(checkPaymentSufficient(input({ coins: [coin(1, "EUR:9", "EUR:0.05")] }))).toEqual(
      errorReply(400, "PAYMENT_INSUFFICIENT", "payment does not cover the price"),
    );
  });

  it("rejects a coin whose deposit fee exceeds its contribution", () => {
    expect(checkPaymentSufficient(input({ coins: [coin(7, "EUR:0.01", "EUR:0.05")] }))).toEqual(
      errorReply(400, "FEES_EXCEED_PAYMENT", "deposit fee exceeds coin contribution", { coin_pub: coinPub(7) }),
    );
  });

  it("rejects zero coins", () => {
    expect(checkPaymentSufficient(input({ coins: [] }))).toEqual(
      errorReply(400, "PAYMENT_INSUFFICIENT", "no coins given"),
    );
  });

  it("rejects wire fees in another currency", () => {
    expect(checkPaymentSufficient(input({ coins: [coin(1, "EUR:10.05", "EUR:0.05", "USD:0.30")] }))).toEqual(
      errorReply(412, "WIRE_FEE_CURRENCY_MISMATCH", "wire fee currency differs from max_wire_fee"),
    );
  });
});
