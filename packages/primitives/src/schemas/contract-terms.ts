/**
 * ContractTerms — the canonical order document.
 *
 * h_contract_terms = SHA256(canonical(ContractTerms)); immutable once
 * stored. Unknown fields are allowed (products, summary, extra) and take
 * part in the hash like every other field.
 *
 * Invariant checked by the backend, not the schema:
 *   refund_deadline <= wire_transfer_deadline
 */

import { Type, type Static } from "@sinclair/typebox";
import { AmountString, Hex32, Timestamp } from "./common.js";

export const ContractTerms = Type.Object(
  {
    order_id: Type.String({ minLength: 1 }),
    amount: AmountString,
    max_fee: AmountString,
    max_wire_fee: Type.Optional(AmountString),
    wire_fee_amortization: Type.Optional(Type.Integer()),
    timestamp: Timestamp,
    refund_deadline: Timestamp,
    pay_deadline: Timestamp,
    wire_transfer_deadline: Timestamp,
    h_wire: Hex32,
    merchant_pub: Hex32,
    fulfillment_url: Type.Optional(Type.String()),
    summary: Type.Optional(Type.String()),
  },
  { additionalProperties: true },
);

export type ContractTerms = Static<typeof ContractTerms>;
