/**
 * GET /refund — the exchange's confirmation for every refund of an order.
 *
 * Cached proofs answer directly; the rest are requested from the exchanges
 * concurrently, bounded by PAY_TIMEOUT. Items still open when it fires are
 * reported with exchange_http_status 0.
 */

import type { FastifyBaseLogger } from "fastify";
import { amountToString } from "@coinmerchant/primitives";
import type { ExchangeClient } from "@coinmerchant/exchange-client";
import type { Settings } from "../config.js";
import { QueryStatus, type MerchantDb, type RefundRecord } from "../db/plugin.js";
import { lookupFailure } from "../db/transaction.js";
import { ErrorCode, ShutdownError, errorReply, okReply, type Reply } from "../errors.js";
import type { MerchantInstance } from "../instances.js";
import type { Abortable, InFlightRegistry } from "../long-poll/registry.js";

export interface RefundLookupDeps {
  db: MerchantDb;
  exchanges: ExchangeClient;
  settings: Settings;
  registry: InFlightRegistry;
  log: FastifyBaseLogger;
}

type Interrupt = "timeout" | "shutdown";

type RefundItem = Record<string, unknown>;

function describe(r: RefundRecord): RefundItem {
  return {
    coin_pub: r.coinPub,
    rtransaction_id: r.rtransactionId,
    refund_amount: amountToString(r.refundAmount),
    refund_fee: amountToString(r.refundFee),
  };
}

function confirmed(r: RefundRecord, httpStatus: number, exchangePub: string, exchangeSig: string): RefundItem {
  return { ...describe(r), exchange_http_status: httpStatus, exchange_pub: exchangePub, exchange_sig: exchangeSig };
}

function failed(r: RefundRecord, httpStatus: number, code: number | null, reply: unknown): RefundItem {
  return { ...describe(r), exchange_http_status: httpStatus, exchange_code: code, exchange_reply: reply };
}

export class RefundLookupContext implements Abortable {
  private readonly log: FastifyBaseLogger;
  private readonly controller = new AbortController();
  private readonly interrupted: Promise<Interrupt>;
  private signalInterrupt: (reason: Interrupt) => void = () => {};
  private shuttingDown = false;

  constructor(
    private readonly deps: RefundLookupDeps,
    private readonly instance: MerchantInstance,
    private readonly orderId: string,
  ) {
    this.log = deps.log.child({ component: "refund-lookup", order_id: orderId });
    this.interrupted = new Promise<Interrupt>((resolve) => {
      this.signalInterrupt = resolve;
    });
  }

  abort(): void {
    this.shuttingDown = true;
    this.signalInterrupt("shutdown");
    this.controller.abort();
  }

  async run(): Promise<Reply> {
    const db = this.deps.db;
    const log = this.log;
    const pub = this.instance.merchantPub;

    const contract = db.findContractTerms(this.orderId, pub);
    if (contract.status === QueryStatus.NO_RESULTS) {
      return errorReply(404, "CONTRACT_NOT_FOUND", "unknown order", { order_id: this.orderId });
    }
    if (contract.status !== QueryStatus.ONE_RESULT) return lookupFailure(contract.status, "find contract terms", log);
    const h = contract.value.hContractTerms;

    const refunds: RefundRecord[] = [];
    const n = db.getRefundsFromContractTermsHash(pub, h, (r) => refunds.push(r));
    if (n === QueryStatus.SOFT_ERROR || n === QueryStatus.HARD_ERROR) return lookupFailure(n, "get refunds", log);
    if (refunds.length === 0) {
      return errorReply(404, "LOOKUP_NO_REFUND", "order has no refunds", { order_id: this.orderId });
    }

    const items: Array<RefundItem | null> = refunds.map(() => null);
    const pending: number[] = [];
    for (const [i, r] of refunds.entries()) {
      const cached = db.getRefundProof(h, pub, r.coinPub, r.rtransactionId);
      if (cached.status === QueryStatus.ONE_RESULT) {
        items[i] = confirmed(r, 200, cached.value.exchangeSigningPub, cached.value.exchangeSig);
      } else if (cached.status === QueryStatus.NO_RESULTS) {
        pending.push(i);
      } else {
        return lookupFailure(cached.status, "get refund proof", log);
      }
    }

    if (pending.length > 0) {
      const unregister = this.deps.registry.add(this);
      const timer = setTimeout(() => this.signalInterrupt("timeout"), this.deps.settings.payTimeoutMs);
      try {
        const done = Promise.all(
          pending.map(async (i) => {
            const r = refunds[i];
            if (r) items[i] = await this.fetchProof(h, r);
          }),
        );
        const outcome = await Promise.race([done.then(() => "done" as const), this.interrupted]);
        if (outcome === "shutdown" || this.shuttingDown) throw new ShutdownError();
        if (outcome === "timeout") log.info({ open: items.filter((x) => x === null).length }, "refund lookup timed out");
      } finally {
        clearTimeout(timer);
        this.controller.abort();
        unregister();
      }
    }

    return okReply({
      refunds: refunds.map(
        (r, i) => items[i] ?? failed(r, 0, ErrorCode.EXCHANGE_TIMEOUT, null),
      ),
      merchant_pub: pub,
      h_contract_terms: h,
    });
  }

  /** Never rejects; an aborted request leaves the item open (null). */
  private async fetchProof(h: string, r: RefundRecord): Promise<RefundItem | null> {
    const { db, exchanges } = this.deps;
    const signal = this.controller.signal;
    try {
      const found = await exchanges.findExchange(r.exchangeUrl, null, signal);
      if (!found.ok) return failed(r, found.httpStatus, ErrorCode.EXCHANGE_KEYS_FAILURE, found.reply);

      const result = await exchanges.refund(
        found.handle,
        {
          refundAmount: r.refundAmount,
          refundFee: r.refundFee,
          hContractTerms: h,
          coinPub: r.coinPub,
          rtransactionId: r.rtransactionId,
          merchantPriv: this.instance.merchantPriv,
        },
        signal,
      );
      if (!result.ok) return failed(r, result.httpStatus, result.ec, result.reply);
      if (result.httpStatus === 200) {
        const stored = db.putRefundProof({
          hContractTerms: h,
          merchantPub: this.instance.merchantPub,
          coinPub: r.coinPub,
          rtransactionId: r.rtransactionId,
          exchangeSigningPub: result.signingPub,
          exchangeSig: result.exchangeSig,
        });
        if (stored < 0) this.log.warn({ coin_pub: r.coinPub, status: stored }, "could not cache refund proof");
      }
      return confirmed(r, result.httpStatus, result.signingPub, result.exchangeSig);
    } catch (err) {
      if (signal.aborted) return null;
      this.log.error({ err, coin_pub: r.coinPub }, "refund request failed");
      return failed(r, 0, ErrorCode.REFUND_LOOKUP_FAILED, null);
    }
  }
}
