/**
 * Merchant backend — accepts wallet coins for orders, deposits them with
 * exchanges, grants and reports refunds, and long-polls payment status.
 *
 * Routes (each also under /instances/:instance/):
 *   POST /pay                  — pay for an order or abort a partial payment
 *   POST /refund               — raise the refund total of a paid order
 *   GET  /refund               — refund permissions with exchange confirmations
 *   GET  /public/poll-payment  — payment status, long-polled
 *   GET  /health               — health check
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import { HttpExchangeClient, type ExchangeClient } from "@coinmerchant/exchange-client";
import { config, settingsFromConfig, type Settings } from "./config.js";
import type { MerchantDb } from "./db/plugin.js";
import { SqliteMerchantDb } from "./db/sqlite-db.js";
import { MerchantError, errorReply } from "./errors.js";
import { InstanceRegistry } from "./instances.js";
import { LongPollHub } from "./long-poll/hub.js";
import { InFlightRegistry } from "./long-poll/registry.js";
import { send, type RouteContext } from "./routes/context.js";
import { healthRoutes } from "./routes/health.js";
import { payRoutes } from "./routes/pay.js";
import { pollPaymentRoutes } from "./routes/poll-payment.js";
import { refundRoutes } from "./routes/refund.js";

/** Fastify's codes for a JSON body that does not parse. */
const JSON_BODY_ERRORS = new Set(["FST_ERR_CTP_EMPTY_JSON_BODY", "FST_ERR_CTP_INVALID_JSON_BODY"]);

export interface BackendDeps {
  db?: MerchantDb;
  exchanges?: ExchangeClient;
  instances?: InstanceRegistry;
  hub?: LongPollHub;
  registry?: InFlightRegistry;
  settings?: Partial<Settings>;
  logLevel?: string;
  now?: () => number;
}

export async function buildApp(deps?: BackendDeps) {
  const app = Fastify({
    logger: { level: deps?.logLevel ?? config.logLevel },
  });

  const settings = settingsFromConfig(deps?.settings);
  const now = deps?.now ?? (() => Date.now());
  const db = deps?.db ?? SqliteMerchantDb.open(config.databasePath, app.log.child({ component: "db" }));
  const exchanges =
    deps?.exchanges ??
    new HttpExchangeClient({ currency: settings.currency, trustedExchanges: settings.trustedExchanges });
  const instances = deps?.instances ?? (await InstanceRegistry.load(config.instancesFile));

  const hub = deps?.hub ?? new LongPollHub(now);
  const registry = deps?.registry ?? new InFlightRegistry();

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof MerchantError) return send(reply, error.reply);
    if (error instanceof SyntaxError || JSON_BODY_ERRORS.has(error.code)) {
      return send(reply, errorReply(400, "JSON_INVALID", error.message));
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return send(reply, errorReply(error.statusCode, "REQUEST_REJECTED", error.message));
    }
    request.log.error({ err: error }, "unhandled error");
    return send(reply, errorReply(500, "INTERNAL", "internal error"));
  });

  // Shutdown: cancel exchange requests, wake long-pollers; their handlers drop the connection.
  app.addHook("preClose", async () => {
    const aborted = registry.abortAll();
    const woken = hub.forceResumeAll();
    if (aborted + woken > 0) app.log.info({ aborted, woken }, "shutdown: released in-flight requests");
  });
  app.addHook("onClose", async () => {
    db.close();
  });

  const ctx: RouteContext = { db, exchanges, instances, settings, hub, registry, now };

  // Register routes
  payRoutes(app, ctx);
  refundRoutes(app, ctx);
  pollPaymentRoutes(app, ctx);
  healthRoutes(app, ctx);

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── merchant backend config ───");
  console.log(`  port:               ${config.port}`);
  console.log(`  currency:           ${config.currency}`);
  console.log(`  database:           ${config.databasePath}`);
  console.log(`  instances_file:     ${config.instancesFile}`);
  console.log(`  pay_timeout_ms:     ${config.payTimeoutMs}`);
  console.log(`  max_retries:        ${config.maxRetries}`);
  console.log(`  force_audit:        ${config.forceAudit}`);
  console.log(`  trusted_exchanges:  ${config.trustedExchanges.join(", ") || "(none)"}`);
  console.log(`  auditors:           ${config.auditorPubs.length}`);
  console.log("───────────────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "shutdown failed");
          process.exit(1);
        },
      );
    });
  }
}
