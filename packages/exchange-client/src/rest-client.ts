/**
 * Exchange HTTP client.
 *
 * GET  /keys                       denominations, signing keys, auditors
 * GET  /wire                       accounts and wire fees per method
 * POST /coins/{coin_pub}/deposit   deposit one coin
 * POST /coins/{coin_pub}/refund    refund (part of) a deposited coin
 *
 * /keys replies are cached per exchange URL. Confirmation signatures are
 * checked against the exchange's advertised signing keys.
 */

import { Value } from "@sinclair/typebox/value";
import {
  amountToString,
  parseAmount,
  publicKeyFromPrivate,
  signRefundRequest,
  toHex,
  type Amount,
} from "@coinmerchant/primitives";
import { verifyDepositConfirmation, verifyRefundConfirmation } from "./confirmations.js";
import {
  ExchangeErrorCode,
  type DepositParams,
  type ExchangeClient,
  type ExchangeHandle,
  type ExchangeOpResult,
  type FindExchangeResult,
  type HttpExchangeClientOptions,
  type RefundParams,
} from "./types.js";
import { Confirmation, ExchangeErrorBody, ExchangeKeys, WireInfo } from "./wire-format.js";

const DEFAULT_KEYS_TTL_MS = 5 * 60 * 1000;

interface CachedKeys {
  keys: ExchangeKeys;
  expiresAt: number;
}

interface RawReply {
  status: number;
  /** Parsed JSON body; null when the body was empty or not JSON. */
  body: unknown;
}

/** Base URL with exactly one trailing slash. */
export function normalizeExchangeUrl(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

/** Wire fee for `method` whose validity window contains `now`. */
export function selectWireFee(wire: WireInfo, method: string, now: number): Amount | null {
  const fees = wire.fees[method];
  if (!fees) return null;
  for (const fee of fees) {
    if (fee.start_date <= now && now < fee.end_date) return parseAmount(fee.wire_fee);
  }
  return null;
}

export class HttpExchangeClient implements ExchangeClient {
  private readonly keysCache = new Map<string, CachedKeys>();
  private readonly trusted: Set<string>;
  private readonly currency: string;
  private readonly keysTtlMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(opts: HttpExchangeClientOptions) {
    this.currency = opts.currency;
    this.trusted = new Set(opts.trustedExchanges.map(normalizeExchangeUrl));
    this.keysTtlMs = opts.keysTtlMs ?? DEFAULT_KEYS_TTL_MS;
    this.fetchImpl = opts.fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.now = opts.now ?? Date.now;
  }

  /** JSON request helper; transport failures other than abort become status 0. */
  private async httpRequest(
    method: "GET" | "POST",
    url: string,
    body: unknown,
    signal: AbortSignal | undefined,
  ): Promise<RawReply> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: body === undefined ? {} : { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      return { status: 0, body: null };
    }
    const text = await res.text();
    let parsed: unknown = null;
    if (text.length > 0) {
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = null;
      }
    }
    return { status: res.status, body: parsed };
  }

  private async fetchKeys(base: string, signal: AbortSignal | undefined): Promise<ExchangeKeys | RawReply> {
    const cached = this.keysCache.get(base);
    if (cached && this.now() < cached.expiresAt) return cached.keys;

    const reply = await this.httpRequest("GET", new URL("keys", base).toString(), undefined, signal);
    if (reply.status !== 200 || !Value.Check(ExchangeKeys, reply.body)) return reply;
    this.keysCache.set(base, { keys: reply.body, expiresAt: this.now() + this.keysTtlMs });
    return reply.body;
  }

  async findExchange(url: string, wireMethod: string | null, signal?: AbortSignal): Promise<FindExchangeResult> {
    const base = normalizeExchangeUrl(url);
    const keys = await this.fetchKeys(base, signal);
    if ("status" in keys) {
      return { ok: false, ec: "KEYS_FETCH_FAILED", httpStatus: keys.status, reply: keys.body };
    }
    if (keys.currency.toUpperCase() !== this.currency) {
      return { ok: false, ec: "CURRENCY_MISMATCH", httpStatus: 200, reply: null };
    }

    let wireFee: Amount | null = null;
    if (wireMethod !== null) {
      const reply = await this.httpRequest("GET", new URL("wire", base).toString(), undefined, signal);
      if (reply.status === 200 && Value.Check(WireInfo, reply.body)) {
        wireFee = selectWireFee(reply.body, wireMethod, this.now());
      }
      if (!wireFee) {
        return { ok: false, ec: "WIRE_FEE_UNAVAILABLE", httpStatus: reply.status, reply: reply.body };
      }
    }

    return {
      ok: true,
      handle: { url: base, keys },
      keys,
      wireFee,
      trusted: this.trusted.has(base),
    };
  }

  async deposit(handle: ExchangeHandle, params: DepositParams, signal?: AbortSignal): Promise<ExchangeOpResult> {
    const url = new URL(`coins/${params.coinPub}/deposit`, handle.url).toString();
    const reply = await this.httpRequest(
      "POST",
      url,
      {
        contribution: amountToString(params.amountWithFee),
        wire: params.wire,
        h_wire: params.hWire,
        h_contract_terms: params.hContractTerms,
        ub_sig: params.denomSig,
        denom_pub: params.denomPub,
        timestamp: params.timestamp,
        merchant_pub: params.merchantPub,
        refund_deadline: params.refundDeadline,
        wire_transfer_deadline: params.wireTransferDeadline,
        coin_sig: params.coinSig,
        ...(params.forwardToAuditor ? { forward_to_auditor: true } : {}),
      },
      signal,
    );
    if (reply.status !== 200) return failure(reply);
    if (!Value.Check(Confirmation, reply.body) || !isSigningKey(handle, reply.body.exchange_pub)) {
      return invalidConfirmation(reply);
    }
    const valid = await verifyDepositConfirmation(reply.body.exchange_pub, reply.body.exchange_sig, {
      h_contract_terms: params.hContractTerms,
      h_wire: params.hWire,
      coin_pub: params.coinPub,
      merchant_pub: params.merchantPub,
      amount_with_fee: params.amountWithFee,
      timestamp: params.timestamp,
      refund_deadline: params.refundDeadline,
    });
    if (!valid) return invalidConfirmation(reply);
    return {
      ok: true,
      httpStatus: reply.status,
      exchangeSig: reply.body.exchange_sig,
      signingPub: reply.body.exchange_pub,
      reply: reply.body,
    };
  }

  async refund(handle: ExchangeHandle, params: RefundParams, signal?: AbortSignal): Promise<ExchangeOpResult> {
    const merchantPub = toHex(await publicKeyFromPrivate(params.merchantPriv));
    const merchantSig = await signRefundRequest(params.merchantPriv, {
      h_contract_terms: params.hContractTerms,
      coin_pub: params.coinPub,
      merchant_pub: merchantPub,
      rtransaction_id: params.rtransactionId,
      refund_amount: params.refundAmount,
      refund_fee: params.refundFee,
    });
    const url = new URL(`coins/${params.coinPub}/refund`, handle.url).toString();
    const reply = await this.httpRequest(
      "POST",
      url,
      {
        h_contract_terms: params.hContractTerms,
        merchant_pub: merchantPub,
        rtransaction_id: params.rtransactionId,
        refund_amount: amountToString(params.refundAmount),
        refund_fee: amountToString(params.refundFee),
        merchant_sig: merchantSig,
      },
      signal,
    );
    if (reply.status !== 200) return failure(reply);
    if (!Value.Check(Confirmation, reply.body) || !isSigningKey(handle, reply.body.exchange_pub)) {
      return invalidConfirmation(reply);
    }
    const valid = await verifyRefundConfirmation(reply.body.exchange_pub, reply.body.exchange_sig, {
      h_contract_terms: params.hContractTerms,
      coin_pub: params.coinPub,
      merchant_pub: merchantPub,
      rtransaction_id: params.rtransactionId,
      refund_amount: params.refundAmount,
    });
    if (!valid) return invalidConfirmation(reply);
    return {
      ok: true,
      httpStatus: reply.status,
      exchangeSig: reply.body.exchange_sig,
      signingPub: reply.body.exchange_pub,
      reply: reply.body,
    };
  }
}

function isSigningKey(handle: ExchangeHandle, pub: string): boolean {
  return handle.keys.signkeys.some((k) => k.key === pub);
}

function failure(reply: RawReply): ExchangeOpResult {
  const ec = Value.Check(ExchangeErrorBody, reply.body) ? reply.body.code : null;
  return { ok: false, httpStatus: reply.status, ec, reply: reply.body };
}

function invalidConfirmation(reply: RawReply): ExchangeOpResult {
  return {
    ok: false,
    httpStatus: reply.status,
    ec: ExchangeErrorCode.CONFIRMATION_SIGNATURE_INVALID,
    reply: reply.body,
  };
}
