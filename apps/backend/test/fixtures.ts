/**
 * Shared test fixtures: instances, contract terms, coins, and a backend
 * wired to an in-memory database and the mock exchange.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { FastifyBaseLogger } from "fastify";
import { pino } from "pino";
import { MockExchangeClient, type MockDenominationConfig } from "@coinmerchant/exchange-client";
import { hashObject, parseAmount, type Amount } from "@coinmerchant/primitives";
import type { Settings } from "../src/config.js";
import { SqliteMerchantDb } from "../src/db/sqlite-db.js";
import { InstanceRegistry, type MerchantInstance } from "../src/instances.js";
import { LongPollHub } from "../src/long-poll/hub.js";
import { InFlightRegistry } from "../src/long-poll/registry.js";
import { buildApp } from "../src/server.js";

export const silentLog: FastifyBaseLogger = pino({ level: "silent" });

export const EXCHANGE_URL = "https://exchange.test/";
export const WIRE = { payto_uri: "payto://x-taler-bank/bank.test/shop", salt: "test-salt" };
export const H_WIRE = hashObject(WIRE);

/** denom-a: deposit fee 0.05; denom-b: deposit fee 0.10. */
export const DENOMS: MockDenominationConfig[] = [
  { denom_pub: "denom-a", value: "EUR:5", fee_deposit: "EUR:0.05", fee_refund: "EUR:0.01" },
  { denom_pub: "denom-b", value: "EUR:5", fee_deposit: "EUR:0.10", fee_refund: "EUR:0.02" },
];

export const TEST_SETTINGS: Settings = {
  currency: "EUR",
  payTimeoutMs: 5_000,
  maxRetries: 5,
  forceAudit: false,
  trustedExchanges: [],
  auditorPubs: [],
};

export function amt(text: string): Amount {
  const a = parseAmount(text);
  if (!a) throw new Error(`bad test amount ${text}`);
  return a;
}

export async function testInstances(): Promise<InstanceRegistry> {
  return InstanceRegistry.fromConfig({
    instances: [
      { id: "default", merchant_priv: "11".repeat(32), wire_methods: [{ ...WIRE, active: true }] },
      { id: "books", merchant_priv: "22".repeat(32), wire_methods: [{ ...WIRE, active: true }] },
    ],
  });
}

export function instanceOf(registry: InstanceRegistry, id: string): MerchantInstance {
  const instance = registry.acquire(id);
  if (!instance) throw new Error(`no instance ${id}`);
  registry.release(instance);
  return instance;
}

export function contractTerms(
  instance: MerchantInstance,
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  const now = Date.now();
  return {
    order_id: "order-1",
    amount: "EUR:10",
    max_fee: "EUR:0.10",
    max_wire_fee: "EUR:0",
    wire_fee_amortization: 1,
    timestamp: now,
    refund_deadline: now + 3_600_000,
    pay_deadline: now + 600_000,
    wire_transfer_deadline: now + 7_200_000,
    h_wire: H_WIRE,
    merchant_pub: instance.merchantPub,
    fulfillment_url: "https://shop.test/article/1",
    summary: "test article",
    ...overrides,
  };
}

export function coinPub(n: number): string {
  return n.toString(16).padStart(2, "0").repeat(32);
}

export function payCoin(n: number, contribution: string, overrides: Record<string, unknown> = {}) {
  return {
    denom_pub: "denom-a",
    contribution,
    exchange_url: "https://exchange.test",
    coin_pub: coinPub(n),
    ub_sig: "ub-sig",
    coin_sig: "ee".repeat(64),
    ...overrides,
  };
}

export interface Backend {
  app: Awaited<ReturnType<typeof buildApp>>;
  db: SqliteMerchantDb;
  exchange: MockExchangeClient;
  instances: InstanceRegistry;
  merchant: MerchantInstance;
  hub: LongPollHub;
  registry: InFlightRegistry;
  /** Store contract terms for the default instance (or `instance`). */
  addOrder(terms: Record<string, unknown>, instance?: MerchantInstance): void;
}

export interface BackendOptions {
  settings?: Partial<Settings>;
  db?: SqliteMerchantDb;
  /** Exchange stand-in to register the test exchange with. */
  client?: MockExchangeClient;
  exchange?: { wireFee?: string | null; trusted?: boolean; denoms?: MockDenominationConfig[] };
}

export async function startBackend(opts: BackendOptions = {}): Promise<Backend> {
  const db = opts.db ?? SqliteMerchantDb.open(":memory:", silentLog);
  const exchange = opts.client ?? new MockExchangeClient("EUR");
  await exchange.addExchange({
    url: EXCHANGE_URL,
    denoms: opts.exchange?.denoms ?? DENOMS,
    wireFee: opts.exchange?.wireFee,
    trusted: opts.exchange?.trusted,
  });
  const instances = await testInstances();
  const hub = new LongPollHub();
  const registry = new InFlightRegistry();
  const app = await buildApp({
    db,
    exchanges: exchange,
    instances,
    hub,
    registry,
    settings: { ...TEST_SETTINGS, ...opts.settings },
    logLevel: "silent",
  });
  const merchant = instanceOf(instances, "default");
  const addOrder = (terms: Record<string, unknown>, instance: MerchantInstance = merchant): void => {
    const orderId = terms.order_id;
    if (typeof orderId !== "string") throw new Error("order_id missing");
    const status = db.insertContractTerms(orderId, instance.merchantPub, terms, Date.now());
    if (status !== 1) throw new Error(`insert contract failed: ${status}`);
  };
  return { app, db, exchange, instances, merchant, hub, registry, addOrder };
}

/** Poll until `cond` holds. */
export async function waitFor(cond: () => boolean, timeoutMs = 2_000): Promise<void> {
  const until = Date.now() + timeoutMs;
  while (!cond()) {
    if (Date.now() > until) throw new Error("condition not met in time");
    await sleep(5);
  }
}

export type Json = Record<string, unknown>;

export function payBody(merchant: MerchantInstance, coins: unknown[], overrides: Json = {}): Json {
  return { mode: "pay", order_id: "order-1", merchant_pub: merchant.merchantPub, coins, ...overrides };
}

export function str(value: unknown): string {
  if (typeof value !== "string") throw new Error(`expected a string, got ${typeof value}`);
  return value;
}
