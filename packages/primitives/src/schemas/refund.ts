/**
 * POST /refund request body (refund increase).
 */

import { Type, type Static } from "@sinclair/typebox";
import { AmountString } from "./common.js";

export const RefundIncreaseRequest = Type.Object({
  refund: AmountString,
  order_id: Type.String({ minLength: 1 }),
  reason: Type.String(),
});

export type RefundIncreaseRequest = Static<typeof RefundIncreaseRequest>;
