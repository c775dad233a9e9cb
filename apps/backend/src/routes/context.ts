/**
 * What route modules share: dependencies, instance resolution, body
 * validation and the shutdown drop.
 *
 * Every route is mounted twice: at the root for the default instance and
 * under /instances/:instance/ for the others.
 */

import type { FastifyReply } from "fastify";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ExchangeClient } from "@coinmerchant/exchange-client";
import type { Settings } from "../config.js";
import type { MerchantDb } from "../db/plugin.js";
import { MerchantError, ShutdownError, errorReply, type Reply } from "../errors.js";
import { DEFAULT_INSTANCE, type InstanceRegistry, type MerchantInstance } from "../instances.js";
import type { LongPollHub } from "../long-poll/hub.js";
import type { InFlightRegistry } from "../long-poll/registry.js";

export interface RouteContext {
  db: MerchantDb;
  exchanges: ExchangeClient;
  instances: InstanceRegistry;
  settings: Settings;
  hub: LongPollHub;
  registry: InFlightRegistry;
  now: () => number;
}

export interface InstanceParams {
  instance?: string;
}

export type QueryParams = Record<string, string | string[] | undefined>;

export function instancePaths(path: string): string[] {
  return [path, `/instances/:instance${path}`];
}

export function send(reply: FastifyReply, r: Reply): FastifyReply {
  return reply.status(r.status).send(r.body);
}

/** First value of a query parameter. */
export function queryParam(query: QueryParams, name: string): string | undefined {
  const value = query[name];
  return Array.isArray(value) ? value[0] : value;
}

export function parseBody<T extends TSchema>(schema: T, body: unknown): Static<T> {
  if (Value.Check(schema, body)) return body;
  if (typeof body !== "object" || body === null) {
    throw new MerchantError(errorReply(400, "JSON_INVALID", "request body must be a JSON object"));
  }
  const first = Value.Errors(schema, body).First();
  throw new MerchantError(
    errorReply(400, "PARAMETER_MALFORMED", `invalid field ${first?.path || "/"}: ${first?.message ?? "malformed"}`),
  );
}

/**
 * Run `handler` holding a reference on the instance. A handler interrupted
 * by shutdown gets its connection dropped without a reply.
 */
export async function withInstance(
  ctx: RouteContext,
  instanceId: string | undefined,
  reply: FastifyReply,
  handler: (instance: MerchantInstance) => Promise<Reply> | Reply,
): Promise<FastifyReply> {
  const id = instanceId ?? DEFAULT_INSTANCE;
  const instance = ctx.instances.acquire(id);
  if (!instance) {
    return send(reply, errorReply(404, "INSTANCE_UNKNOWN", "no such instance", { instance: id }));
  }
  try {
    return send(reply, await handler(instance));
  } catch (err) {
    if (!(err instanceof ShutdownError)) throw err;
    reply.log.info("shutting down, dropping connection");
    reply.hijack();
    reply.raw.destroy();
    return reply;
  } finally {
    ctx.instances.release(instance);
  }
}
