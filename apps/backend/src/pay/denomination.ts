/**
 * Denomination check before a deposit: the coin's denomination must be in
 * the exchange's keys, still depositable, and either the exchange is
 * trusted or one of our auditors vouches for the denomination.
 */

import { parseAmount, type Amount } from "@coinmerchant/primitives";
import type { Denomination, ExchangeKeys } from "@coinmerchant/exchange-client";
import { errorReply, type Reply } from "../errors.js";

export interface DenominationFees {
  denomination: Denomination;
  depositFee: Amount;
  refundFee: Amount;
}

export function checkDenomination(
  keys: ExchangeKeys,
  denomPub: string,
  trusted: boolean,
  auditorPubs: readonly string[],
  now: number,
  coinPub: string,
): { ok: true; fees: DenominationFees } | { ok: false; reply: Reply } {
  const denomination = keys.denoms.find((d) => d.denom_pub === denomPub);
  if (!denomination) {
    return {
      ok: false,
      reply: errorReply(424, "DENOMINATION_KEY_NOT_FOUND", "exchange does not offer the coin's denomination", {
        coin_pub: coinPub,
      }),
    };
  }
  if (denomination.stamp_expire_deposit <= now) {
    return {
      ok: false,
      reply: errorReply(410, "DENOMINATION_DEPOSIT_EXPIRED", "denomination can no longer be deposited", {
        coin_pub: coinPub,
      }),
    };
  }
  if (!trusted && !auditedByUs(keys, denomPub, auditorPubs)) {
    return {
      ok: false,
      reply: errorReply(400, "DENOMINATION_KEY_AUDITOR_FAILURE", "denomination not audited by an accepted auditor", {
        coin_pub: coinPub,
      }),
    };
  }

  const depositFee = parseAmount(denomination.fee_deposit);
  const refundFee = parseAmount(denomination.fee_refund);
  if (!depositFee || !refundFee) {
    return {
      ok: false,
      reply: errorReply(424, "EXCHANGE_REPLY_MALFORMED", "denomination fees out of range", {
        coin_pub: coinPub,
        exchange_reply_invalid: true,
      }),
    };
  }
  return { ok: true, fees: { denomination, depositFee, refundFee } };
}

function auditedByUs(keys: ExchangeKeys, denomPub: string, auditorPubs: readonly string[]): boolean {
  return keys.auditors.some(
    (a) => auditorPubs.includes(a.auditor_pub) && a.denomination_keys.includes(denomPub),
  );
}
