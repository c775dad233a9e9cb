/**
 * Signed structures — fixed binary layouts, big-endian.
 *
 * Every payload starts with the purpose header:
 *   u32 size (of the whole payload) || u32 purpose
 *
 * PaymentResponsePS  = header(MERCHANT_PAYMENT_OK) || h_contract_terms
 * RefundRequestPS    = header(MERCHANT_REFUND) || h_contract_terms ||
 *                      coin_pub || merchant_pub || u64 rtransaction_id ||
 *                      AmountNBO refund_amount || AmountNBO refund_fee
 */

import { amountToNbo, type Amount } from "./amount.js";
import {
  AMOUNT_NBO_SIZE,
  EDDSA_PUBLIC_KEY_SIZE,
  HASH_SIZE,
  SIGNATURE_PURPOSE_MERCHANT_PAYMENT_OK,
  SIGNATURE_PURPOSE_MERCHANT_REFUND,
} from "./constants.js";
import { ed25519Sign, ed25519Verify } from "./ed25519.js";
import { fromHex, isHex32, isHex64, toHex, type HashCode } from "./hash.js";

const PURPOSE_HEADER_SIZE = 8;

export interface RefundRequestInput {
  h_contract_terms: HashCode;
  coin_pub: string;
  merchant_pub: string;
  rtransaction_id: number;
  refund_amount: Amount;
  refund_fee: Amount;
}

function fixed(hex: string, size: number, field: string): Uint8Array {
  const bytes = fromHex(hex);
  if (bytes.length !== size) {
    throw new RangeError(`${field} must be ${size} bytes, got ${bytes.length}`);
  }
  return bytes;
}

function withPurpose(purpose: number, body: Uint8Array[]): Uint8Array {
  const size = PURPOSE_HEADER_SIZE + body.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(size);
  const view = new DataView(out.buffer);
  view.setUint32(0, size, false);
  view.setUint32(4, purpose, false);
  let offset = PURPOSE_HEADER_SIZE;
  for (const part of body) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

// ── PaymentResponsePS ──────────────────────────────────────────────

export function paymentResponsePayload(hContractTerms: HashCode): Uint8Array {
  return withPurpose(SIGNATURE_PURPOSE_MERCHANT_PAYMENT_OK, [
    fixed(hContractTerms, HASH_SIZE, "h_contract_terms"),
  ]);
}

/** Merchant signature confirming a completed payment (hex). */
export async function signPaymentOk(
  merchantPriv: Uint8Array,
  hContractTerms: HashCode,
): Promise<string> {
  return toHex(await ed25519Sign(merchantPriv, paymentResponsePayload(hContractTerms)));
}

export async function verifyPaymentOk(
  merchantPubHex: string,
  sigHex: string,
  hContractTerms: HashCode,
): Promise<boolean> {
  if (!isHex32(merchantPubHex) || !isHex64(sigHex)) return false;
  return ed25519Verify(fromHex(merchantPubHex), fromHex(sigHex), paymentResponsePayload(hContractTerms));
}

// ── RefundRequestPS ────────────────────────────────────────────────

export function refundRequestPayload(input: RefundRequestInput): Uint8Array {
  if (!Number.isSafeInteger(input.rtransaction_id) || input.rtransaction_id < 0) {
    throw new RangeError(`invalid rtransaction_id: ${input.rtransaction_id}`);
  }
  const rtid = new Uint8Array(8);
  new DataView(rtid.buffer).setBigUint64(0, BigInt(input.rtransaction_id), false);
  const payload = withPurpose(SIGNATURE_PURPOSE_MERCHANT_REFUND, [
    fixed(input.h_contract_terms, HASH_SIZE, "h_contract_terms"),
    fixed(input.coin_pub, EDDSA_PUBLIC_KEY_SIZE, "coin_pub"),
    fixed(input.merchant_pub, EDDSA_PUBLIC_KEY_SIZE, "merchant_pub"),
    rtid,
    amountToNbo(input.refund_amount),
    amountToNbo(input.refund_fee),
  ]);
  // header + 3 × 32 + 8 + 2 × AmountNBO
  if (payload.length !== PURPOSE_HEADER_SIZE + 3 * 32 + 8 + 2 * AMOUNT_NBO_SIZE) {
    throw new Error("RefundRequestPS size mismatch");
  }
  return payload;
}

/** Merchant signature authorizing a refund on one coin (hex). */
export async function signRefundRequest(
  merchantPriv: Uint8Array,
  input: RefundRequestInput,
): Promise<string> {
  return toHex(await ed25519Sign(merchantPriv, refundRequestPayload(input)));
}

export async function verifyRefundRequest(
  merchantPubHex: string,
  sigHex: string,
  input: RefundRequestInput,
): Promise<boolean> {
  if (!isHex32(merchantPubHex) || !isHex64(sigHex)) return false;
  return ed25519Verify(fromHex(merchantPubHex), fromHex(sigHex), refundRequestPayload(input));
}
