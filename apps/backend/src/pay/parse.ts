/**
 * /pay request → everything the state machine needs, or a MerchantError.
 *
 * Checks run in this order; the first failure wins:
 *   merchant_pub, coin list (empty, duplicates, amounts), contract lookup,
 *   contract shape, currencies, deadlines, wire hash.
 */

import type { FastifyBaseLogger } from "fastify";
import { Value } from "@sinclair/typebox/value";
import {
  ContractTerms,
  WIRE_FEE_AMORTIZATION_DEFAULT,
  amountZero,
  hashContractTerms,
  parseAmount,
  type Amount,
  type HashCode,
  type PayMode,
  type PayRequest,
} from "@coinmerchant/primitives";
import { normalizeExchangeUrl } from "@coinmerchant/exchange-client";
import type { Settings } from "../config.js";
import { QueryStatus, type MerchantDb } from "../db/plugin.js";
import { lookupFailure } from "../db/transaction.js";
import { MerchantError, errorReply, type ErrorName } from "../errors.js";
import { wireMethodFor, type MerchantInstance, type WireMethod } from "../instances.js";

/** One coin of the request plus what reconciliation and deposit learn about it. */
export interface PayCoin {
  coinPub: string;
  denomPub: string;
  ubSig: string;
  coinSig: string;
  exchangeUrl: string;
  amountWithFee: Amount;
  depositFee: Amount;
  refundFee: Amount;
  wireFee: Amount;
  foundInDb: boolean;
  refunded: boolean;
}

export interface ParsedPay {
  mode: PayMode;
  orderId: string;
  sessionId: string | undefined;
  /** The stored document, as stored. */
  contractTerms: unknown;
  hContractTerms: HashCode;
  amount: Amount;
  maxFee: Amount;
  maxWireFee: Amount;
  wireFeeAmortization: number;
  timestamp: number;
  refundDeadline: number;
  payDeadline: number;
  wireTransferDeadline: number;
  fulfillmentUrl: string | undefined;
  wireMethod: WireMethod;
  coins: PayCoin[];
}

function fail(status: number, name: ErrorName, hint: string, extra?: Record<string, unknown>): never {
  throw new MerchantError(errorReply(status, name, hint, extra));
}

function contractAmount(text: string, field: string): Amount {
  const amount = parseAmount(text);
  if (!amount) fail(500, "CONTRACT_TERMS_INVALID", `contract field ${field} is not a valid amount`);
  return amount;
}

export function parsePayRequest(
  body: PayRequest,
  instance: MerchantInstance,
  settings: Settings,
  db: MerchantDb,
  now: number,
  log: FastifyBaseLogger,
): ParsedPay {
  if (body.merchant_pub !== instance.merchantPub) {
    fail(400, "WRONG_INSTANCE", "merchant_pub does not belong to this instance");
  }
  if (body.coins.length === 0) {
    fail(400, "PAYMENT_INSUFFICIENT", "no coins given");
  }

  const seen = new Set<string>();
  const contributions: Amount[] = [];
  for (const coin of body.coins) {
    if (seen.has(coin.coin_pub)) {
      fail(400, "DUPLICATE_COIN", "coin listed twice", { coin_pub: coin.coin_pub });
    }
    seen.add(coin.coin_pub);
    const contribution = parseAmount(coin.contribution);
    if (!contribution) {
      fail(400, "PARAMETER_MALFORMED", "coin contribution out of range", { coin_pub: coin.coin_pub });
    }
    contributions.push(contribution);
  }

  const found = db.findContractTerms(body.order_id, instance.merchantPub);
  if (found.status === QueryStatus.NO_RESULTS) {
    fail(404, "CONTRACT_NOT_FOUND", "unknown order", { order_id: body.order_id });
  }
  if (found.status !== QueryStatus.ONE_RESULT) {
    throw new MerchantError(lookupFailure(found.status, "find contract terms", log));
  }

  const raw = found.value.contractTerms;
  if (!Value.Check(ContractTerms, raw)) {
    const first = Value.Errors(ContractTerms, raw).First();
    fail(500, "CONTRACT_TERMS_INVALID", `stored contract terms malformed at ${first?.path ?? "/"}`);
  }
  const amount = contractAmount(raw.amount, "amount");
  const maxFee = contractAmount(raw.max_fee, "max_fee");
  const maxWireFee =
    raw.max_wire_fee === undefined ? amountZero(amount.currency) : contractAmount(raw.max_wire_fee, "max_wire_fee");
  const wireFeeAmortization = raw.wire_fee_amortization ?? WIRE_FEE_AMORTIZATION_DEFAULT;
  if (wireFeeAmortization < 1) {
    fail(500, "CONTRACT_TERMS_INVALID", "wire_fee_amortization must be at least 1");
  }

  if (amount.currency !== settings.currency || maxFee.currency !== settings.currency) {
    fail(412, "CURRENCY_MISMATCH", `contract currency differs from ${settings.currency}`);
  }
  contributions.forEach((c, i) => {
    if (c.currency !== amount.currency) {
      fail(412, "COIN_CURRENCY_MISMATCH", "coin currency differs from contract", {
        coin_pub: body.coins[i]?.coin_pub,
      });
    }
  });

  if (raw.refund_deadline > raw.wire_transfer_deadline) {
    fail(500, "REFUND_DEADLINE_PAST_WIRE_TRANSFER_DEADLINE", "refund deadline after wire transfer deadline");
  }
  if (body.mode === "pay" && raw.pay_deadline < now) {
    fail(410, "OFFER_EXPIRED", "pay deadline has passed");
  }

  const wireMethod = wireMethodFor(instance, raw.h_wire);
  if (!wireMethod) {
    fail(500, "WIRE_HASH_UNKNOWN", "contract h_wire matches no wire method of this instance");
  }

  const zero = amountZero(amount.currency);
  const coins = body.coins.map((coin, i): PayCoin => ({
    coinPub: coin.coin_pub,
    denomPub: coin.denom_pub,
    ubSig: coin.ub_sig,
    coinSig: coin.coin_sig,
    exchangeUrl: normalizeExchangeUrl(coin.exchange_url),
    amountWithFee: contributions[i] ?? zero,
    depositFee: zero,
    refundFee: zero,
    wireFee: zero,
    foundInDb: false,
    refunded: false,
  }));

  return {
    mode: body.mode,
    orderId: body.order_id,
    sessionId: body.session_id,
    contractTerms: raw,
    hContractTerms: hashContractTerms(raw),
    amount,
    maxFee,
    maxWireFee,
    wireFeeAmortization,
    timestamp: raw.timestamp,
    refundDeadline: raw.refund_deadline,
    payDeadline: raw.pay_deadline,
    wireTransferDeadline: raw.wire_transfer_deadline,
    fulfillmentUrl: raw.fulfillment_url,
    wireMethod,
    coins,
  };
}
