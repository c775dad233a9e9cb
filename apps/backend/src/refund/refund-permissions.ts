/**
 * Merchant-signed refund permissions (RefundRequestPS), one per refunded
 * coin; wallets take them to the exchange.
 */

import { amountToString, signRefundRequest, type Amount, type HashCode } from "@coinmerchant/primitives";
import type { MerchantInstance } from "../instances.js";

export interface RefundGrant {
  coinPub: string;
  rtransactionId: number;
  refundAmount: Amount;
  refundFee: Amount;
}

export interface RefundPermission {
  rtransaction_id: number;
  coin_pub: string;
  refund_amount: string;
  refund_fee: string;
  merchant_sig: string;
}

export async function signRefundPermissions(
  instance: MerchantInstance,
  hContractTerms: HashCode,
  grants: readonly RefundGrant[],
): Promise<RefundPermission[]> {
  return Promise.all(
    grants.map(async (g) => ({
      rtransaction_id: g.rtransactionId,
      coin_pub: g.coinPub,
      refund_amount: amountToString(g.refundAmount),
      refund_fee: amountToString(g.refundFee),
      merchant_sig: await signRefundRequest(instance.merchantPriv, {
        h_contract_terms: hContractTerms,
        coin_pub: g.coinPub,
        merchant_pub: instance.merchantPub,
        rtransaction_id: g.rtransactionId,
        refund_amount: g.refundAmount,
        refund_fee: g.refundFee,
      }),
    })),
  );
}
