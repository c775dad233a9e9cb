import { describe, it, expect } from "vitest";
import { parseAmount, type Amount } from "@coinmerchant/primitives";
import { verifyDepositConfirmation } from "../src/confirmations.js";
import { MockExchangeClient } from "../src/mock-client.js";
import type { DepositParams, ExchangeHandle } from "../src/types.js";

const URL_A = "https://a.exchange.test/";

function amt(text: string): Amount {
  const a = parseAmount(text);
  if (!a) throw new Error(`bad test amount ${text}`);
  return a;
}

function depositParams(overrides: Partial<DepositParams> = {}): DepositParams {
  return {
    amountWithFee: amt("EUR:5"),
    wireTransferDeadline: 3000,
    wire: { payto_uri: "payto://x-taler-bank/bank.test/shop", salt: "test-salt" },
    hWire: "aa".repeat(32),
    hContractTerms: "bb".repeat(32),
    coinPub: "cc".repeat(32),
    denomSig: "ub-sig",
    denomPub: "denom-1",
    timestamp: 1000,
    merchantPub: "dd".repeat(32),
    refundDeadline: 2000,
    coinSig: "ee".repeat(64),
    forwardToAuditor: false,
    ...overrides,
  };
}

async function setup(): Promise<{ client: MockExchangeClient; handle: ExchangeHandle; signingPub: string }> {
  const client = new MockExchangeClient("EUR");
  const signingPub = await client.addExchange({
    url: URL_A,
    denoms: [{ denom_pub: "denom-1", value: "EUR:5", fee_deposit: "EUR:0.01", fee_refund: "EUR:0.01" }],
    wireFee: "EUR:0.02",
  });
  const found = await client.findExchange(URL_A, "x-taler-bank");
  if (!found.ok) throw new Error("exchange not found");
  return { client, handle: found.handle, signingPub };
}

describe("MockExchangeClient", () => {
  it("finds a configured exchange with its wire fee", async () => {
    const { client } = await setup();
    const found = await client.findExchange("https://a.exchange.test", "x-taler-bank");
    expect(found.ok && found.wireFee).toEqual(amt("EUR:0.02"));
    expect(found.ok && found.trusted).toBe(true);
  });

  it("fails for unknown exchanges", async () => {
    const client = new MockExchangeClient();
    const found = await client.findExchange("https://nowhere.test/", null);
    expect(found).toEqual({ ok: false, ec: "KEYS_FETCH_FAILED", httpStatus: 404, reply: null });
  });

  it("signs deposit confirmations with the exchange key", async () => {
    const { client, handle, signingPub } = await setup();
    const params = depositParams();
    const result = await client.deposit(handle, params);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.signingPub).toBe(signingPub);
    const valid = await verifyDepositConfirmation(signingPub, result.exchangeSig, {
      h_contract_terms: params.hContractTerms,
      h_wire: params.hWire,
      coin_pub: params.coinPub,
      merchant_pub: params.merchantPub,
      amount_with_fee: params.amountWithFee,
      timestamp: params.timestamp,
      refund_deadline: params.refundDeadline,
    });
    expect(valid).toBe(true);
  });

  it("replays a deposit into the same contract and refuses a double spend", async () => {
    const { client, handle } = await setup();
    const first = await client.deposit(handle, depositParams());
    const replay = await client.deposit(handle, depositParams());
    expect(replay.ok && first.ok && replay.exchangeSig === first.exchangeSig).toBe(true);

    const spend = await client.deposit(handle, depositParams({ hContractTerms: "ff".repeat(32) }));
    expect(spend.ok === false && spend.httpStatus).toBe(409);
    expect(spend.ok === false && spend.ec).toBe(1205);
  });

  it("plays a scripted failure once", async () => {
    const { client, handle } = await setup();
    client.failDeposit("cc".repeat(32), { httpStatus: 502, reply: null });
    expect(await client.deposit(handle, depositParams())).toEqual({ ok: false, httpStatus: 502, ec: null, reply: null });
    expect((await client.deposit(handle, depositParams())).ok).toBe(true);
    expect(client.callCount("deposit")).toBe(2);
  });

  it("cuts a delayed call short on abort", async () => {
    const { client, handle } = await setup();
    client.setLatency("deposit", 10_000);
    const ctrl = new AbortController();
    const pending = client.deposit(handle, depositParams(), ctrl.signal);
    ctrl.abort();
    await expect(pending).rejects.toThrow();
    expect(client.isDeposited("cc".repeat(32))).toBe(false);
  });

  it("refunds only deposited coins", async () => {
    const { client, handle } = await setup();
    const refund = {
      refundAmount: amt("EUR:1"),
      refundFee: amt("EUR:0.01"),
      hContractTerms: "bb".repeat(32),
      coinPub: "cc".repeat(32),
      rtransactionId: 1,
      merchantPriv: new Uint8Array(32).fill(7),
    };
    const before = await client.refund(handle, refund);
    expect(before.ok === false && before.httpStatus).toBe(404);

    await client.deposit(handle, depositParams());
    const after = await client.refund(handle, refund);
    expect(after.ok).toBe(true);
    expect(client.refundsFor("cc".repeat(32))).toEqual([{ rtransactionId: 1, amount: amt("EUR:1") }]);
  });
});
