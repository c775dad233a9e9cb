/**
 * Signed structure layouts and sign/verify.
 */

import { describe, it, expect } from "vitest";
import { parseAmount, type Amount } from "../../src/amount.js";
import { generateKeypair } from "../../src/ed25519.js";
import { toHex } from "../../src/hash.js";
import {
  paymentResponsePayload,
  refundRequestPayload,
  signPaymentOk,
  signRefundRequest,
  verifyPaymentOk,
  verifyRefundRequest,
  type RefundRequestInput,
} from "../../src/signatures.js";

const H = "11".repeat(32);

function amt(text: string): Amount {
  const a = parseAmount(text);
  if (!a) throw new Error(`bad test amount ${text}`);
  return a;
}

function refundInput(merchantPub: string, overrides: Partial<RefundRequestInput> = {}): RefundRequestInput {
  return {
    h_contract_terms: H,
    coin_pub: "22".repeat(32),
    merchant_pub: merchantPub,
    rtransaction_id: 7,
    refund_amount: amt("EUR:1.5"),
    refund_fee: amt("EUR:0.01"),
    ...overrides,
  };
}

describe("PaymentResponsePS", () => {
  it("is size || purpose || h_contract_terms", () => {
    const payload = paymentResponsePayload(H);
    expect(payload.length).toBe(40);
    expect(toHex(payload)).toBe("00000028" + "00000450" + H);
  });

  it("signs and verifies", async () => {
    const kp = await generateKeypair();
    const pub = toHex(kp.publicKey);
    const sig = await signPaymentOk(kp.privateKey, H);
    expect(await verifyPaymentOk(pub, sig, H)).toBe(true);
    expect(await verifyPaymentOk(pub, sig, "12".repeat(32))).toBe(false);
  });

  it("treats malformed hex as invalid", async () => {
    expect(await verifyPaymentOk("zz", "00".repeat(64), H)).toBe(false);
  });

  it("rejects a short hash", () => {
    expect(() => paymentResponsePayload("11")).toThrow(RangeError);
  });
});

describe("RefundRequestPS", () => {
  it("is 160 bytes with the refund purpose", () => {
    const payload = refundRequestPayload(refundInput("33".repeat(32)));
    expect(payload.length).toBe(160);
    expect(toHex(payload.subarray(0, 8))).toBe("000000a0" + "0000044e");
  });

  it("places rtransaction_id big-endian after the three keys", () => {
    const payload = refundRequestPayload(refundInput("33".repeat(32)));
    expect(toHex(payload.subarray(104, 112))).toBe("0000000000000007");
  });

  it("rejects a negative rtransaction_id", () => {
    expect(() => refundRequestPayload(refundInput("33".repeat(32), { rtransaction_id: -1 }))).toThrow(
      RangeError,
    );
  });

  it("signs and verifies, binding every field", async () => {
    const kp = await generateKeypair();
    const pub = toHex(kp.publicKey);
    const input = refundInput(pub);
    const sig = await signRefundRequest(kp.privateKey, input);
    expect(await verifyRefundRequest(pub, sig, input)).toBe(true);
    expect(await verifyRefundRequest(pub, sig, { ...input, rtransaction_id: 8 })).toBe(false);
    expect(await verifyRefundRequest(pub, sig, { ...input, refund_fee: amt("EUR:0.02") })).toBe(false);
  });
});
