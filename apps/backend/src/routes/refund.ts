/**
 * POST /refund — increase the refund for an order.
 * GET  /refund?order_id= — collect the exchange's refund confirmations.
 */

import type { FastifyInstance } from "fastify";
import { RefundIncreaseRequest } from "@coinmerchant/primitives";
import { errorReply } from "../errors.js";
import { increaseRefund } from "../refund/refund-increase.js";
import { RefundLookupContext } from "../refund/refund-lookup.js";
import { uriContextFromRequest } from "../uri.js";
import {
  instancePaths,
  parseBody,
  queryParam,
  withInstance,
  type InstanceParams,
  type QueryParams,
  type RouteContext,
} from "./context.js";

export function refundRoutes(app: FastifyInstance, ctx: RouteContext): void {
  for (const path of instancePaths("/refund")) {
    app.post<{ Params: InstanceParams }>(path, async (request, reply) =>
      withInstance(ctx, request.params.instance, reply, (instance) => {
        const body = parseBody(RefundIncreaseRequest, request.body);
        const uri = uriContextFromRequest(request, instance.id);
        return increaseRefund({ ...ctx, log: request.log }, instance, body, uri);
      }),
    );

    app.get<{ Params: InstanceParams; Querystring: QueryParams }>(path, async (request, reply) =>
      withInstance(ctx, request.params.instance, reply, (instance) => {
        const orderId = queryParam(request.query, "order_id");
        if (!orderId) return errorReply(400, "PARAMETER_MISSING", "order_id required");
        const lookup = new RefundLookupContext({ ...ctx, log: request.log }, instance, orderId);
        return lookup.run();
      }),
    );
  }
}
