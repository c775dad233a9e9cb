/**
 * Mock exchange client for testing.
 *
 * Holds one in-process exchange per URL with a real Ed25519 signing key,
 * so confirmations verify exactly like production ones. Coins are tracked
 * the way an exchange would: a second deposit of the same coin into the
 * same contract is idempotent, into another contract it is a double spend.
 *
 * Failures and latency are scripted per coin, per URL or per operation.
 */

import { setTimeout as sleep } from "node:timers/promises";
import {
  amountToString,
  generateKeypair,
  parseAmount,
  publicKeyFromPrivate,
  toHex,
  type Keypair,
  type Amount,
} from "@coinmerchant/primitives";
import { signDepositConfirmation, signRefundConfirmation } from "./confirmations.js";
import {
  ExchangeErrorCode,
  type DepositParams,
  type ExchangeClient,
  type ExchangeHandle,
  type ExchangeOpResult,
  type FindExchangeResult,
  type RefundParams,
} from "./types.js";
import type { Auditor, ExchangeKeys } from "./wire-format.js";
import { normalizeExchangeUrl } from "./rest-client.js";

const FAR_FUTURE = 8_000_000_000_000;

export interface MockDenominationConfig {
  denom_pub: string;
  value: string;
  fee_deposit: string;
  fee_refund: string;
  stamp_expire_deposit?: number;
}

export interface MockExchangeConfig {
  url: string;
  /** Defaults to the client's currency. */
  currency?: string;
  denoms: MockDenominationConfig[];
  /** Wire fee for every method; null makes /wire lookups fail. */
  wireFee?: string | null;
  trusted?: boolean;
  auditors?: Auditor[];
}

/** A scripted non-200 reply. `reply: null` simulates a non-JSON body. */
export interface ScriptedFailure {
  httpStatus: number;
  reply: unknown;
}

export type MockOp = "findExchange" | "deposit" | "refund";

export interface MockCall {
  op: MockOp;
  url: string;
  coinPub?: string;
}

interface MockExchange {
  config: MockExchangeConfig;
  keys: ExchangeKeys;
  signing: Keypair;
}

interface DepositedCoin {
  hContractTerms: string;
  amountWithFee: Amount;
  exchangeSig: string;
}

export class MockExchangeClient implements ExchangeClient {
  readonly calls: MockCall[] = [];
  private readonly exchanges = new Map<string, MockExchange>();
  private readonly deposited = new Map<string, DepositedCoin>();
  private readonly refunds: Array<{ coinPub: string; rtransactionId: number; amount: Amount }> = [];
  private readonly keysFailures = new Map<string, ScriptedFailure>();
  private readonly depositFailures = new Map<string, ScriptedFailure>();
  private readonly refundFailures = new Map<string, ScriptedFailure>();
  private readonly latency: Record<MockOp, number> = { findExchange: 0, deposit: 0, refund: 0 };

  constructor(private readonly currency: string = "EUR") {}

  /** Register an exchange. Returns its signing public key (hex). */
  async addExchange(config: MockExchangeConfig): Promise<string> {
    const signing = await generateKeypair();
    const pub = toHex(signing.publicKey);
    const keys: ExchangeKeys = {
      currency: config.currency ?? this.currency,
      master_public_key: pub,
      signkeys: [{ key: pub, stamp_start: 0, stamp_expire: FAR_FUTURE }],
      denoms: config.denoms.map((d) => ({
        denom_pub: d.denom_pub,
        value: d.value,
        fee_deposit: d.fee_deposit,
        fee_refund: d.fee_refund,
        stamp_start: 0,
        stamp_expire_deposit: d.stamp_expire_deposit ?? FAR_FUTURE,
      })),
      auditors: config.auditors ?? [],
    };
    this.exchanges.set(normalizeExchangeUrl(config.url), { config, keys, signing });
    return pub;
  }

  // ── Scripting ──────────────────────────────────────────────────────

  /** The next /keys fetch for `url` fails. */
  failKeys(url: string, failure: ScriptedFailure): void {
    this.keysFailures.set(normalizeExchangeUrl(url), failure);
  }

  /** The next deposit of `coinPub` fails. */
  failDeposit(coinPub: string, failure: ScriptedFailure): void {
    this.depositFailures.set(coinPub, failure);
  }

  /** The next refund of `coinPub` fails. */
  failRefund(coinPub: string, failure: ScriptedFailure): void {
    this.refundFailures.set(coinPub, failure);
  }

  /** Delay every call of `op` by `ms`. Aborting the signal cuts the delay short. */
  setLatency(op: MockOp, ms: number): void {
    this.latency[op] = ms;
  }

  // ── Inspection ─────────────────────────────────────────────────────

  callCount(op: MockOp): number {
    return this.calls.filter((c) => c.op === op).length;
  }

  isDeposited(coinPub: string): boolean {
    return this.deposited.has(coinPub);
  }

  refundsFor(coinPub: string): Array<{ rtransactionId: number; amount: Amount }> {
    return this.refunds
      .filter((r) => r.coinPub === coinPub)
      .map(({ rtransactionId, amount }) => ({ rtransactionId, amount }));
  }

  // ── ExchangeClient ─────────────────────────────────────────────────

  async findExchange(url: string, wireMethod: string | null, signal?: AbortSignal): Promise<FindExchangeResult> {
    const base = normalizeExchangeUrl(url);
    this.calls.push({ op: "findExchange", url: base });
    await this.delay("findExchange", signal);

    const failure = this.keysFailures.get(base);
    if (failure) {
      this.keysFailures.delete(base);
      return { ok: false, ec: "KEYS_FETCH_FAILED", httpStatus: failure.httpStatus, reply: failure.reply };
    }
    const exchange = this.exchanges.get(base);
    if (!exchange) {
      return { ok: false, ec: "KEYS_FETCH_FAILED", httpStatus: 404, reply: null };
    }
    if (exchange.keys.currency !== this.currency) {
      return { ok: false, ec: "CURRENCY_MISMATCH", httpStatus: 200, reply: null };
    }

    let wireFee: Amount | null = null;
    if (wireMethod !== null) {
      const configured = exchange.config.wireFee === undefined ? `${this.currency}:0` : exchange.config.wireFee;
      wireFee = configured === null ? null : parseConfiguredAmount(configured);
      if (!wireFee) {
        return { ok: false, ec: "WIRE_FEE_UNAVAILABLE", httpStatus: 404, reply: null };
      }
    }

    return {
      ok: true,
      handle: { url: base, keys: exchange.keys },
      keys: exchange.keys,
      wireFee,
      trusted: exchange.config.trusted ?? true,
    };
  }

  async deposit(handle: ExchangeHandle, params: DepositParams, signal?: AbortSignal): Promise<ExchangeOpResult> {
    this.calls.push({ op: "deposit", url: handle.url, coinPub: params.coinPub });
    await this.delay("deposit", signal);

    const failure = this.depositFailures.get(params.coinPub);
    if (failure) {
      this.depositFailures.delete(params.coinPub);
      return scripted(failure);
    }
    const exchange = this.requireExchange(handle);

    const prior = this.deposited.get(params.coinPub);
    if (prior && prior.hContractTerms !== params.hContractTerms) {
      const reply = { code: ExchangeErrorCode.DEPOSIT_INSUFFICIENT_FUNDS, hint: "coin already spent" };
      return { ok: false, httpStatus: 409, ec: reply.code, reply };
    }

    const exchangeSig =
      prior?.exchangeSig ??
      (await signDepositConfirmation(exchange.signing.privateKey, {
        h_contract_terms: params.hContractTerms,
        h_wire: params.hWire,
        coin_pub: params.coinPub,
        merchant_pub: params.merchantPub,
        amount_with_fee: params.amountWithFee,
        timestamp: params.timestamp,
        refund_deadline: params.refundDeadline,
      }));
    signal?.throwIfAborted();
    this.deposited.set(params.coinPub, {
      hContractTerms: params.hContractTerms,
      amountWithFee: params.amountWithFee,
      exchangeSig,
    });

    const signingPub = toHex(exchange.signing.publicKey);
    return {
      ok: true,
      httpStatus: 200,
      exchangeSig,
      signingPub,
      reply: { exchange_sig: exchangeSig, exchange_pub: signingPub },
    };
  }

  async refund(handle: ExchangeHandle, params: RefundParams, signal?: AbortSignal): Promise<ExchangeOpResult> {
    this.calls.push({ op: "refund", url: handle.url, coinPub: params.coinPub });
    await this.delay("refund", signal);

    const failure = this.refundFailures.get(params.coinPub);
    if (failure) {
      this.refundFailures.delete(params.coinPub);
      return scripted(failure);
    }
    const exchange = this.requireExchange(handle);

    const deposit = this.deposited.get(params.coinPub);
    if (!deposit || deposit.hContractTerms !== params.hContractTerms) {
      const reply = { code: ExchangeErrorCode.REFUND_COIN_NOT_FOUND, hint: "coin not deposited for this contract" };
      return { ok: false, httpStatus: 404, ec: reply.code, reply };
    }

    const merchantPub = toHex(await publicKeyFromPrivate(params.merchantPriv));
    const exchangeSig = await signRefundConfirmation(exchange.signing.privateKey, {
      h_contract_terms: params.hContractTerms,
      coin_pub: params.coinPub,
      merchant_pub: merchantPub,
      rtransaction_id: params.rtransactionId,
      refund_amount: params.refundAmount,
    });
    signal?.throwIfAborted();
    this.refunds.push({ coinPub: params.coinPub, rtransactionId: params.rtransactionId, amount: params.refundAmount });

    const signingPub = toHex(exchange.signing.publicKey);
    return {
      ok: true,
      httpStatus: 200,
      exchangeSig,
      signingPub,
      reply: {
        exchange_sig: exchangeSig,
        exchange_pub: signingPub,
        refund_amount: amountToString(params.refundAmount),
      },
    };
  }

  // ── Internals ──────────────────────────────────────────────────────

  private async delay(op: MockOp, signal: AbortSignal | undefined): Promise<void> {
    signal?.throwIfAborted();
    const ms = this.latency[op];
    if (ms > 0) await sleep(ms, undefined, { signal });
  }

  private requireExchange(handle: ExchangeHandle): MockExchange {
    const exchange = this.exchanges.get(handle.url);
    if (!exchange) throw new Error(`MockExchangeClient: unknown exchange ${handle.url}`);
    return exchange;
  }
}

function scripted(failure: ScriptedFailure): ExchangeOpResult {
  const reply = failure.reply;
  const ec =
    typeof reply === "object" && reply !== null && "code" in reply && typeof reply.code === "number"
      ? reply.code
      : null;
  return { ok: false, httpStatus: failure.httpStatus, ec, reply };
}

function parseConfiguredAmount(text: string): Amount {
  const amount = parseAmount(text);
  if (!amount) throw new Error(`MockExchangeClient: invalid amount ${text}`);
  return amount;
}
