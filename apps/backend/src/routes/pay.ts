/**
 * POST /pay — pay for an order, or abort a partial payment.
 */

import type { FastifyInstance } from "fastify";
import { PayRequest } from "@coinmerchant/primitives";
import { parsePayRequest } from "../pay/parse.js";
import { PayContext } from "../pay/pay-context.js";
import { instancePaths, parseBody, withInstance, type InstanceParams, type RouteContext } from "./context.js";

export function payRoutes(app: FastifyInstance, ctx: RouteContext): void {
  for (const path of instancePaths("/pay")) {
    app.post<{ Params: InstanceParams }>(path, async (request, reply) =>
      withInstance(ctx, request.params.instance, reply, async (instance) => {
        const body = parseBody(PayRequest, request.body);
        const parsed = parsePayRequest(body, instance, ctx.settings, ctx.db, ctx.now(), request.log);
        const pay = new PayContext({ ...ctx, log: request.log }, instance, parsed);
        return pay.run();
      }),
    );
  }
}
