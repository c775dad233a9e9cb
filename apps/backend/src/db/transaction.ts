/**
 * Retry loop for short write transactions.
 *
 * SOFT_ERROR anywhere (start, body, commit) rolls back and restarts;
 * HARD_ERROR ends the loop at once. `maxRetries` bounds the total number
 * of attempts.
 */

import type { FastifyBaseLogger } from "fastify";
import { errorReply, type Reply } from "../errors.js";
import { QueryStatus, type DbTransaction, type MerchantDb } from "./plugin.js";

export type TransactionOutcome =
  | { ok: true; status: typeof QueryStatus.NO_RESULTS | typeof QueryStatus.ONE_RESULT }
  | { ok: false; reply: Reply };

export function runTransaction(
  db: MerchantDb,
  label: string,
  maxRetries: number,
  log: FastifyBaseLogger,
  body: (tx: DbTransaction) => QueryStatus,
): TransactionOutcome {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    db.preflight();
    const started = db.start(label);
    if (started.status === QueryStatus.SOFT_ERROR) continue;
    if (started.status !== QueryStatus.ONE_RESULT) {
      return { ok: false, reply: errorReply(500, "DB_HARD_ERROR", `could not start ${label}`) };
    }
    const tx = started.value;

    let status: QueryStatus;
    try {
      status = body(tx);
    } catch (err) {
      db.rollback(tx);
      throw err;
    }
    if (status === QueryStatus.SOFT_ERROR) {
      db.rollback(tx);
      log.debug({ label, attempt }, "soft error, retrying");
      continue;
    }
    if (status === QueryStatus.HARD_ERROR) {
      db.rollback(tx);
      return { ok: false, reply: errorReply(500, "DB_HARD_ERROR", `${label} failed`) };
    }

    const committed = db.commit(tx);
    if (committed === QueryStatus.SOFT_ERROR) {
      db.rollback(tx);
      continue;
    }
    if (committed === QueryStatus.HARD_ERROR) {
      db.rollback(tx);
      return { ok: false, reply: errorReply(500, "DB_HARD_ERROR", `commit of ${label} failed`) };
    }
    return { ok: true, status };
  }
  log.warn({ label, maxRetries }, "transaction retries exhausted");
  return { ok: false, reply: errorReply(500, "DB_RETRIES_EXHAUSTED", `${label}: too many serialization failures`) };
}

/** Map a failed single-statement lookup to a 500 reply. */
export function lookupFailure(
  status: typeof QueryStatus.HARD_ERROR | typeof QueryStatus.SOFT_ERROR,
  op: string,
  log: FastifyBaseLogger,
): Reply {
  if (status === QueryStatus.SOFT_ERROR) {
    log.error({ op }, "serialization failure outside a transaction");
    return errorReply(500, "DB_CONTRACT_VIOLATION", `${op}: unexpected serialization failure`);
  }
  return errorReply(500, "DB_HARD_ERROR", `${op} failed`);
}
