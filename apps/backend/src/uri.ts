/**
 * taler:// URIs handed to wallets.
 *
 *   taler://pay/<host>/<prefix>/<instance>/<order_id>[/<session_id>][?insecure=1]
 *   taler://refund/<host>/<prefix>/<instance>/<order_id>[?insecure=1]
 *
 * <prefix> is X-Forwarded-Prefix or "-", <instance> is "-" for the
 * default instance.
 */

import type { FastifyRequest } from "fastify";
import { DEFAULT_INSTANCE } from "./instances.js";

export interface UriContext {
  host: string;
  prefix: string;
  instanceId: string;
  https: boolean;
}

/** The parts of a request the URIs depend on. */
export type UriSource = Pick<FastifyRequest, "headers" | "protocol">;

function header(request: UriSource, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function uriContextFromRequest(request: UriSource, instanceId: string): UriContext {
  return {
    host: header(request, "x-forwarded-host") ?? header(request, "host") ?? "localhost",
    prefix: header(request, "x-forwarded-prefix") ?? "-",
    instanceId,
    https: header(request, "x-forwarded-proto") === "https" || request.protocol === "https",
  };
}

function base(kind: "pay" | "refund", ctx: UriContext): string {
  const instance = ctx.instanceId === DEFAULT_INSTANCE ? "-" : ctx.instanceId;
  return `taler://${kind}/${ctx.host}/${ctx.prefix}/${instance}`;
}

export function refundUri(ctx: UriContext, orderId: string): string {
  return `${base("refund", ctx)}/${orderId}${ctx.https ? "" : "?insecure=1"}`;
}

export function payUri(ctx: UriContext, orderId: string, sessionId?: string): string {
  const session = sessionId === undefined ? "" : `/${sessionId}`;
  return `${base("pay", ctx)}/${orderId}${session}${ctx.https ? "" : "?insecure=1"}`;
}

/** Where a wallet fetches the proposal when the frontend gave no contract URL. */
export function proposalUrl(ctx: UriContext, orderId: string): string {
  const scheme = ctx.https ? "https" : "http";
  const trimmed = ctx.prefix === "-" ? "" : ctx.prefix.replace(/^\/+|\/+$/g, "");
  const prefix = trimmed === "" ? "" : `/${trimmed}`;
  const query = new URLSearchParams({ instance: ctx.instanceId, order_id: orderId });
  return `${scheme}://${ctx.host}${prefix}/public/proposal?${query.toString()}`;
}
