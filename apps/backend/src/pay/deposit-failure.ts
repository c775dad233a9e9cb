/**
 * Exchange deposit failure → merchant reply.
 *
 *   5xx            503 EXCHANGE_FAILED
 *   non-JSON body  424 EXCHANGE_REPLY_MALFORMED
 *   ec 1205        409 DEPOSIT_INSUFFICIENT_FUNDS (double spend)
 *   anything else  424 DEPOSIT_FAILED
 */

import { ExchangeErrorCode } from "@coinmerchant/exchange-client";
import { errorReply, type Reply } from "../errors.js";

export interface DepositFailure {
  httpStatus: number;
  ec: number | null;
  reply: unknown;
}

export function depositFailureReply(coinPub: string, failure: DepositFailure): Reply {
  const forwarded = {
    coin_pub: coinPub,
    exchange_http_status: failure.httpStatus,
    exchange_code: failure.ec,
  };
  if (failure.httpStatus >= 500) {
    return errorReply(503, "EXCHANGE_FAILED", "exchange failed to process the deposit", {
      ...forwarded,
      exchange_reply: failure.reply,
    });
  }
  if (failure.reply === null) {
    return errorReply(424, "EXCHANGE_REPLY_MALFORMED", "exchange reply to deposit was not JSON", {
      ...forwarded,
      exchange_reply_invalid: true,
    });
  }
  if (failure.ec === ExchangeErrorCode.DEPOSIT_INSUFFICIENT_FUNDS) {
    return errorReply(409, "DEPOSIT_INSUFFICIENT_FUNDS", "coin was already spent", {
      ...forwarded,
      exchange_reply: failure.reply,
    });
  }
  return errorReply(424, "DEPOSIT_FAILED", "exchange refused the deposit", {
    ...forwarded,
    exchange_reply: failure.reply,
  });
}
