import { describe, it, expect } from "vitest";
import { errorReply } from "../src/errors.js";
import { depositFailureReply } from "../src/pay/deposit-failure.js";
import { coinPub } from "./fixtures.js";

const COIN = coinPub(3);

describe("depositFailureReply", () => {
  it("maps exchange server errors to 503", () => {
    const reply = { code: 9, hint: "database down" };
    expect(depositFailureReply(COIN, { httpStatus: 502, ec: 9, reply })).toEqual(
      errorReply(503, "EXCHANGE_FAILED", "exchange failed to process the deposit", {
        coin_pub: COIN,
        exchange_http_status: 502,
        exchange_code: 9,
        exchange_reply: reply,
      }),
    );
  });

  it("summarizes a reply that is not JSON", () => {
    expect(depositFailureReply(COIN, { httpStatus: 400, ec: null, reply: null })).toEqual(
      errorReply(424, "EXCHANGE_REPLY_MALFORMED", "exchange reply to deposit was not JSON", {
        coin_pub: COIN,
        exchange_http_status: 400,
        exchange_code: null,
        exchange_reply_invalid: true,
      }),
    );
  });

  it("reports a double spend as 409", () => {
    const reply = { code: 1205, hint: "coin already spent" };
    const mapped = depositFailureReply(COIN, { httpStatus: 409, ec: 1205, reply });
    expect(mapped.status).toBe(409);
    expect(mapped.body).toMatchObject({ error: "deposit_insufficient_funds", exchange_reply: reply });
  });

  it("forwards any other refusal as 424", () => {
    const reply = { code: 1206, hint: "bad coin signature" };
    const mapped = depositFailureReply(COIN, { httpStatus: 401, ec: 1206, reply });
    expect(mapped.status).toBe(424);
    expect(mapped.body).toMatchObject({ error: "deposit_failed", exchange_code: 1206, exchange_http_status: 401 });
  });
});
