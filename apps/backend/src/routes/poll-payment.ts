/**
 * GET /public/poll-payment — payment status, long-polled.
 *
 *   order_id, h_contract  required
 *   timeout               seconds to wait for a change (default 0)
 *   refund                wait until refunds exceed this amount
 *   session_id            check payment within this session
 *   contract_url          echoed back to unpaid callers
 */

import type { FastifyInstance } from "fastify";
import { isHex32, parseAmount } from "@coinmerchant/primitives";
import { errorReply } from "../errors.js";
import { pollPayment } from "../long-poll/poll-payment.js";
import { uriContextFromRequest } from "../uri.js";
import {
  instancePaths,
  queryParam,
  withInstance,
  type InstanceParams,
  type QueryParams,
  type RouteContext,
} from "./context.js";

export function pollPaymentRoutes(app: FastifyInstance, ctx: RouteContext): void {
  for (const path of instancePaths("/public/poll-payment")) {
    app.get<{ Params: InstanceParams; Querystring: QueryParams }>(path, async (request, reply) =>
      withInstance(ctx, request.params.instance, reply, (instance) => {
        const q = request.query;
        const orderId = queryParam(q, "order_id");
        if (!orderId) return errorReply(400, "PARAMETER_MISSING", "order_id required");
        const hContract = queryParam(q, "h_contract");
        if (!hContract) return errorReply(400, "PARAMETER_MISSING", "h_contract required");
        if (!isHex32(hContract)) return errorReply(400, "PARAMETER_MALFORMED", "h_contract malformed");

        const timeoutText = queryParam(q, "timeout");
        let timeoutMs = 0;
        if (timeoutText !== undefined) {
          if (!/^[0-9]{1,9}$/.test(timeoutText)) {
            return errorReply(400, "PARAMETER_MALFORMED", "timeout must be non-negative number");
          }
          timeoutMs = Number(timeoutText) * 1000;
        }

        const refundText = queryParam(q, "refund");
        const minRefund = refundText === undefined ? null : parseAmount(refundText);
        if (refundText !== undefined && (minRefund === null || minRefund.currency !== ctx.settings.currency)) {
          return errorReply(400, "PARAMETER_MALFORMED", "invalid amount given for refund argument");
        }

        return pollPayment(
          { db: ctx.db, hub: ctx.hub, log: request.log, now: ctx.now },
          instance,
          {
            orderId,
            hContractTerms: hContract,
            timeoutMs,
            minRefund,
            sessionId: queryParam(q, "session_id"),
            contractUrl: queryParam(q, "contract_url"),
          },
          uriContextFromRequest(request, instance.id),
        );
      }),
    );
  }
}
