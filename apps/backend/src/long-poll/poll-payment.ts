/**
 * Payment status for a wallet or frontend, optionally long-polled.
 *
 * Unpaid: wait on the hub until paid or the timeout passes, then answer
 * { paid: false, taler_pay_uri, contract_url }.
 * Paid: answer { paid: true, refunded, refund_amount? }; when the caller
 * named a refund threshold, wait until the timeout for refunds to exceed it.
 */

import type { FastifyBaseLogger } from "fastify";
import {
  amountAdd,
  amountCmp,
  amountToString,
  type Amount,
  type HashCode,
} from "@coinmerchant/primitives";
import { QueryStatus, type MerchantDb, type RefundRecord } from "../db/plugin.js";
import { lookupFailure } from "../db/transaction.js";
import { ShutdownError, errorReply, okReply, type Reply } from "../errors.js";
import type { MerchantInstance } from "../instances.js";
import { payUri, proposalUrl, type UriContext } from "../uri.js";
import type { LongPollHub } from "./hub.js";

export interface PollPaymentQuery {
  orderId: string;
  hContractTerms: HashCode;
  timeoutMs: number;
  minRefund: Amount | null;
  sessionId: string | undefined;
  contractUrl: string | undefined;
}

export interface PollPaymentDeps {
  db: MerchantDb;
  hub: LongPollHub;
  log: FastifyBaseLogger;
  now: () => number;
}

type PaidState = { paid: true } | { paid: false; alreadyPaidOrderId: string | undefined };

export async function pollPayment(
  deps: PollPaymentDeps,
  instance: MerchantInstance,
  query: PollPaymentQuery,
  uri: UriContext,
): Promise<Reply> {
  const { db, hub, log, now } = deps;
  const pub = instance.merchantPub;
  const deadline = now() + query.timeoutMs;

  const contract = db.findContractTermsFromHash(query.hContractTerms, pub);
  const mismatch = contract.status === QueryStatus.ONE_RESULT && contract.value.orderId !== query.orderId;
  if (contract.status === QueryStatus.NO_RESULTS || mismatch) {
    return errorReply(404, "POLL_PAYMENT_CONTRACT_NOT_FOUND", "order_id and h_contract match no proposal");
  }
  if (contract.status !== QueryStatus.ONE_RESULT) return lookupFailure(contract.status, "find contract terms", log);
  const fulfillmentUrl = fulfillmentOf(contract.value.contractTerms);

  let expired = false;
  for (;;) {
    const waiting = !expired && now() < deadline;

    const state = paidState(db, pub, query, fulfillmentUrl, log);
    if ("status" in state) return state;

    if (!state.paid) {
      if (waiting) {
        expired = await wait(hub, query.orderId, pub, deadline, null);
        continue;
      }
      return okReply({
        paid: false,
        taler_pay_uri: payUri(uri, query.orderId, query.sessionId),
        contract_url: query.contractUrl ?? proposalUrl(uri, query.orderId),
        ...(state.alreadyPaidOrderId === undefined ? {} : { already_paid_order_id: state.alreadyPaidOrderId }),
      });
    }

    const refunds: RefundRecord[] = [];
    const n = db.getRefundsFromContractTermsHash(pub, query.hContractTerms, (r) => refunds.push(r));
    if (n === QueryStatus.SOFT_ERROR || n === QueryStatus.HARD_ERROR) return lookupFailure(n, "get refunds", log);
    let refunded: Amount | null = null;
    for (const r of refunds) {
      if (refunded === null) {
        refunded = r.refundAmount;
        continue;
      }
      const sum = amountAdd(refunded, r.refundAmount);
      if (sum.status !== "positive" && sum.status !== "zero") {
        return errorReply(500, "AMOUNT_OVERFLOW", "overflow summing refunds");
      }
      refunded = sum.amount;
    }

    if (query.minRefund !== null && waiting && (refunded === null || amountCmp(refunded, query.minRefund) !== 1)) {
      expired = await wait(hub, query.orderId, pub, deadline, query.minRefund);
      continue;
    }
    return refunded === null
      ? okReply({ paid: true, refunded: false })
      : okReply({ paid: true, refunded: true, refund_amount: amountToString(refunded) });
  }
}

/** true once the deadline passed. */
async function wait(
  hub: LongPollHub,
  orderId: string,
  merchantPub: string,
  deadline: number,
  minRefund: Amount | null,
): Promise<boolean> {
  const reason = await hub.suspend(orderId, merchantPub, deadline, minRefund);
  if (reason === "shutdown") throw new ShutdownError();
  return reason === "timeout";
}

function paidState(
  db: MerchantDb,
  pub: string,
  query: PollPaymentQuery,
  fulfillmentUrl: string | undefined,
  log: FastifyBaseLogger,
): PaidState | Reply {
  if (query.sessionId !== undefined && fulfillmentUrl !== undefined) {
    const session = db.findSessionInfo(query.sessionId, fulfillmentUrl, pub);
    if (session.status === QueryStatus.ONE_RESULT) {
      return session.value === query.orderId
        ? { paid: true }
        : { paid: false, alreadyPaidOrderId: session.value };
    }
    if (session.status === QueryStatus.NO_RESULTS) return { paid: false, alreadyPaidOrderId: undefined };
    return lookupFailure(session.status, "find session info", log);
  }
  const paid = db.findPaidContractTermsFromHash(query.hContractTerms, pub);
  if (paid.status === QueryStatus.ONE_RESULT) return { paid: true };
  if (paid.status === QueryStatus.NO_RESULTS) return { paid: false, alreadyPaidOrderId: undefined };
  return lookupFailure(paid.status, "find paid contract", log);
}

function fulfillmentOf(terms: unknown): string | undefined {
  if (typeof terms !== "object" || terms === null || !("fulfillment_url" in terms)) return undefined;
  return typeof terms.fulfillment_url === "string" ? terms.fulfillment_url : undefined;
}
