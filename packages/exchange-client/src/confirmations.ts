/**
 * Exchange confirmations — what the exchange signs when it accepts a
 * deposit or a refund. The signed message is the canonical hash of the
 * confirmation object, so both sides only have to agree on the fields.
 */

import {
  amountToString,
  ed25519Sign,
  ed25519Verify,
  fromHex,
  hashBytes,
  canonicalEncode,
  isHex32,
  isHex64,
  toHex,
  type Amount,
  type HashCode,
} from "@coinmerchant/primitives";

export interface DepositConfirmation {
  h_contract_terms: HashCode;
  h_wire: HashCode;
  coin_pub: string;
  merchant_pub: string;
  amount_with_fee: Amount;
  timestamp: number;
  refund_deadline: number;
}

export interface RefundConfirmation {
  h_contract_terms: HashCode;
  coin_pub: string;
  merchant_pub: string;
  rtransaction_id: number;
  refund_amount: Amount;
}

function depositMessage(c: DepositConfirmation): Uint8Array {
  return hashBytes(
    canonicalEncode({ purpose: "deposit", ...c, amount_with_fee: amountToString(c.amount_with_fee) }),
  );
}

function refundMessage(c: RefundConfirmation): Uint8Array {
  return hashBytes(
    canonicalEncode({ purpose: "refund", ...c, refund_amount: amountToString(c.refund_amount) }),
  );
}

export async function signDepositConfirmation(priv: Uint8Array, c: DepositConfirmation): Promise<string> {
  return toHex(await ed25519Sign(priv, depositMessage(c)));
}

export async function verifyDepositConfirmation(
  exchangePub: string,
  sig: string,
  c: DepositConfirmation,
): Promise<boolean> {
  if (!isHex32(exchangePub) || !isHex64(sig)) return false;
  return ed25519Verify(fromHex(exchangePub), fromHex(sig), depositMessage(c));
}

export async function signRefundConfirmation(priv: Uint8Array, c: RefundConfirmation): Promise<string> {
  return toHex(await ed25519Sign(priv, refundMessage(c)));
}

export async function verifyRefundConfirmation(
  exchangePub: string,
  sig: string,
  c: RefundConfirmation,
): Promise<boolean> {
  if (!isHex32(exchangePub) || !isHex64(sig)) return false;
  return ed25519Verify(fromHex(exchangePub), fromHex(sig), refundMessage(c));
}
