/**
 * POST /refund — raise the refund total of a paid order.
 */

import type { FastifyBaseLogger } from "fastify";
import { parseAmount, type RefundIncreaseRequest } from "@coinmerchant/primitives";
import type { Settings } from "../config.js";
import { QueryStatus, type MerchantDb } from "../db/plugin.js";
import { lookupFailure, runTransaction } from "../db/transaction.js";
import { errorReply, okReply, type Reply } from "../errors.js";
import type { MerchantInstance } from "../instances.js";
import { refundUri, type UriContext } from "../uri.js";

export interface RefundIncreaseDeps {
  db: MerchantDb;
  settings: Settings;
  log: FastifyBaseLogger;
}

export function increaseRefund(
  deps: RefundIncreaseDeps,
  instance: MerchantInstance,
  body: RefundIncreaseRequest,
  uri: UriContext,
): Reply {
  const { db, settings, log } = deps;
  const refund = parseAmount(body.refund);
  if (!refund) return errorReply(400, "PARAMETER_MALFORMED", "refund amount out of range");
  if (refund.currency !== settings.currency) {
    return errorReply(412, "REFUND_CURRENCY_MISMATCH", `refunds are in ${settings.currency}`);
  }

  const contract = db.findContractTerms(body.order_id, instance.merchantPub);
  if (contract.status === QueryStatus.NO_RESULTS) {
    return errorReply(404, "CONTRACT_NOT_FOUND", "unknown order", { order_id: body.order_id });
  }
  if (contract.status !== QueryStatus.ONE_RESULT) return lookupFailure(contract.status, "find contract terms", log);
  const h = contract.value.hContractTerms;

  const outcome = runTransaction(db, `refund increase ${body.order_id}`, settings.maxRetries, log, (tx) =>
    db.increaseRefundForContract(tx, h, instance.merchantPub, refund, body.reason),
  );
  if (!outcome.ok) return outcome.reply;
  if (outcome.status === QueryStatus.NO_RESULTS) {
    return errorReply(409, "INCONSISTENT_AMOUNT", "refund exceeds what was paid for the order", {
      order_id: body.order_id,
    });
  }
  // wallets learn of the refund through GET /refund; pollers are not woken here
  log.info({ order_id: body.order_id, refund: body.refund }, "refund increased");
  return okReply({ h_contract_terms: h, taler_refund_url: refundUri(uri, body.order_id) });
}
