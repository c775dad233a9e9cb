/**
 * POST /pay request body.
 *
 * mode "pay" deposits the coins; "abort-refund" asks the merchant to
 * refund whatever was already deposited for an order the wallet gives up on.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AmountString, Hex32, Hex64 } from "./common.js";

export const PayMode = Type.Union([Type.Literal("pay"), Type.Literal("abort-refund")]);
export type PayMode = Static<typeof PayMode>;

export const PayCoin = Type.Object({
  denom_pub: Type.String({ minLength: 1 }),
  contribution: AmountString,
  exchange_url: Type.String({ minLength: 1 }),
  coin_pub: Hex32,
  ub_sig: Type.String({ minLength: 1 }),
  coin_sig: Hex64,
});

export type PayCoin = Static<typeof PayCoin>;

export const PayRequest = Type.Object({
  mode: PayMode,
  coins: Type.Array(PayCoin),
  order_id: Type.String({ minLength: 1 }),
  merchant_pub: Hex32,
  session_id: Type.Optional(Type.String({ minLength: 1 })),
});

export type PayRequest = Static<typeof PayRequest>;
