/**
 * Is what the coins carry enough for the order once fees and refunds are
 * accounted for?
 *
 *   acc_fee     Σ deposit_fee over all coins
 *             + max(0, Σ wire_fee (once per exchange) − max_wire_fee) ÷ amortization
 *   needed      amount + max(0, acc_fee − max_fee)
 *   sufficient  Σ amount_with_fee − total_refunded ≥ needed
 */

import {
  amountAdd,
  amountCmp,
  amountDivide,
  amountSubtract,
  amountZero,
  type Amount,
  type AmountResult,
} from "@coinmerchant/primitives";
import { errorReply, type Reply } from "../errors.js";

export interface SufficiencyInput {
  coins: ReadonlyArray<{
    coinPub: string;
    exchangeUrl: string;
    amountWithFee: Amount;
    depositFee: Amount;
    wireFee: Amount;
  }>;
  amount: Amount;
  maxFee: Amount;
  maxWireFee: Amount;
  wireFeeAmortization: number;
  totalRefunded: Amount;
}

class ArithmeticFailure {
  constructor(readonly reply: Reply) {}
}

function take(r: AmountResult, what: string): Amount {
  if (r.status === "positive" || r.status === "zero") return r.amount;
  if (r.status === "currency_mismatch") {
    throw new ArithmeticFailure(errorReply(412, "WIRE_FEE_CURRENCY_MISMATCH", `currency mismatch in ${what}`));
  }
  throw new ArithmeticFailure(errorReply(500, "AMOUNT_OVERFLOW", `${r.status} computing ${what}`));
}

/** null when the payment is sufficient, otherwise the reply to send. */
export function checkPaymentSufficient(input: SufficiencyInput): Reply | null {
  try {
    return classify(input);
  } catch (err) {
    if (err instanceof ArithmeticFailure) return err.reply;
    throw err;
  }
}

function classify(input: SufficiencyInput): Reply | null {
  const { coins, amount, maxFee, maxWireFee, wireFeeAmortization, totalRefunded } = input;
  if (coins.length === 0) return errorReply(400, "PAYMENT_INSUFFICIENT", "no coins given");

  const zero = amountZero(amount.currency);
  let accFee = zero;
  let accAmount = zero;
  const wireFees = new Map<string, Amount>();
  for (const coin of coins) {
    if (amountCmp(coin.depositFee, coin.amountWithFee) > 0) {
      return errorReply(400, "FEES_EXCEED_PAYMENT", "deposit fee exceeds coin contribution", {
        coin_pub: coin.coinPub,
      });
    }
    accFee = take(amountAdd(accFee, coin.depositFee), "deposit fees");
    accAmount = take(amountAdd(accAmount, coin.amountWithFee), "coin total");
    if (!wireFees.has(coin.exchangeUrl)) wireFees.set(coin.exchangeUrl, coin.wireFee);
  }

  let totalWireFee: Amount | null = null;
  for (const fee of wireFees.values()) {
    totalWireFee = totalWireFee === null ? fee : take(amountAdd(totalWireFee, fee), "wire fees");
  }
  if (totalWireFee !== null) {
    if (totalWireFee.currency !== maxWireFee.currency) {
      return errorReply(412, "WIRE_FEE_CURRENCY_MISMATCH", "wire fee currency differs from max_wire_fee");
    }
    const delta = amountSubtract(totalWireFee, maxWireFee);
    if (delta.status === "positive") {
      const share = take(amountDivide(delta.amount, wireFeeAmortization), "wire fee share");
      accFee = take(amountAdd(accFee, share), "fees");
    }
  }

  let totalNeeded = amount;
  const excess = amountSubtract(accFee, maxFee);
  if (excess.status === "currency_mismatch") {
    return errorReply(412, "CURRENCY_MISMATCH", "max_fee currency differs from the coins");
  }
  if (excess.status === "positive") {
    totalNeeded = take(amountAdd(amount, excess.amount), "amount due");
  }

  const final = amountSubtract(accAmount, totalRefunded);
  if ((final.status === "positive" || final.status === "zero") && amountCmp(final.amount, totalNeeded) >= 0) {
    return null;
  }
  if (amountCmp(accAmount, totalNeeded) >= 0) {
    return errorReply(402, "REFUNDED", "contract was partially refunded; paid amount no longer covers it");
  }
  if (amountCmp(accAmount, amount) >= 0) {
    return errorReply(400, "PAYMENT_INSUFFICIENT_DUE_TO_FEES", "payment covers the price but not the fees");
  }
  return errorReply(400, "PAYMENT_INSUFFICIENT", "payment does not cover the price");
}
