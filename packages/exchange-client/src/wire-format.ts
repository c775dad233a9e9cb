/**
 * Exchange wire formats (GET /keys, GET /wire, deposit and refund replies).
 * Replies are checked against these before any field is read.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AmountString, Hex32, Hex64, Timestamp } from "@coinmerchant/primitives";

export const Denomination = Type.Object({
  denom_pub: Type.String({ minLength: 1 }),
  value: AmountString,
  fee_deposit: AmountString,
  fee_refund: AmountString,
  stamp_start: Timestamp,
  stamp_expire_deposit: Timestamp,
});
export type Denomination = Static<typeof Denomination>;

export const SigningKey = Type.Object({
  key: Hex32,
  stamp_start: Timestamp,
  stamp_expire: Timestamp,
});
export type SigningKey = Static<typeof SigningKey>;

export const Auditor = Type.Object({
  auditor_pub: Hex32,
  auditor_url: Type.String(),
  denomination_keys: Type.Array(Type.String()),
});
export type Auditor = Static<typeof Auditor>;

export const ExchangeKeys = Type.Object({
  currency: Type.String({ minLength: 1 }),
  master_public_key: Hex32,
  signkeys: Type.Array(SigningKey),
  denoms: Type.Array(Denomination),
  auditors: Type.Array(Auditor),
});
export type ExchangeKeys = Static<typeof ExchangeKeys>;

export const WireFee = Type.Object({
  wire_fee: AmountString,
  closing_fee: AmountString,
  start_date: Timestamp,
  end_date: Timestamp,
});
export type WireFee = Static<typeof WireFee>;

export const WireInfo = Type.Object({
  accounts: Type.Array(Type.Object({ payto_uri: Type.String() })),
  fees: Type.Record(Type.String(), Type.Array(WireFee)),
});
export type WireInfo = Static<typeof WireInfo>;

/** 200 reply to a deposit or refund: the exchange's confirmation. */
export const Confirmation = Type.Object({
  exchange_sig: Hex64,
  exchange_pub: Hex32,
});
export type Confirmation = Static<typeof Confirmation>;

/** Body of every non-200 exchange reply that is JSON. */
export const ExchangeErrorBody = Type.Object({
  code: Type.Integer(),
  hint: Type.Optional(Type.String()),
});
