/**
 * Backend configuration.
 * All env access centralized here — no direct process.env elsewhere.
 */

import {
  MAX_RETRIES_DEFAULT,
  PAY_TIMEOUT_MS_DEFAULT,
} from "@coinmerchant/primitives";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

/** Comma-separated list, empty entries dropped. */
function list(val: string): string[] {
  return val
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export const config = {
  port: parseInt(env("MERCHANT_PORT", "9966"), 10),
  host: env("MERCHANT_HOST", "0.0.0.0"),
  /** The one currency this backend accepts. */
  currency: env("MERCHANT_CURRENCY", "EUR").toUpperCase(),
  databasePath: env("DATABASE_PATH", "./data/merchant.sqlite"),
  /** JSON file listing instances, their keys and wire methods. */
  instancesFile: env("INSTANCES_FILE", "./instances.json"),
  /** Upper bound on exchange interaction per /pay or /refund lookup. */
  payTimeoutMs: parseInt(env("PAY_TIMEOUT_MS", String(PAY_TIMEOUT_MS_DEFAULT)), 10),
  maxRetries: parseInt(env("MAX_RETRIES", String(MAX_RETRIES_DEFAULT)), 10),
  /** Flag every deposit for forwarding to the auditor. */
  forceAudit: env("FORCE_AUDIT", "false") === "true",
  /** Exchange base URLs accepted without auditor consent. */
  trustedExchanges: list(env("TRUSTED_EXCHANGES", "")),
  /** Auditor public keys (hex) whose listed denominations are accepted. */
  auditorPubs: list(env("AUDITOR_PUBS", "")),
  logLevel: env("LOG_LEVEL", "info"),
} as const;

/** The part of the configuration the request handlers read. */
export interface Settings {
  currency: string;
  payTimeoutMs: number;
  maxRetries: number;
  forceAudit: boolean;
  trustedExchanges: readonly string[];
  auditorPubs: readonly string[];
}

export function settingsFromConfig(overrides: Partial<Settings> = {}): Settings {
  return {
    currency: config.currency,
    payTimeoutMs: config.payTimeoutMs,
    maxRetries: config.maxRetries,
    forceAudit: config.forceAudit,
    trustedExchanges: config.trustedExchanges,
    auditorPubs: config.auditorPubs,
    ...overrides,
  };
}
