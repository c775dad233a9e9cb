/**
 * Schema barrel export.
 * All wire types shared between the backend and the exchange client.
 */

export { Hex32, Hex64, AmountString, Timestamp } from "./common.js";
export { ContractTerms } from "./contract-terms.js";
export { PayMode, PayCoin, PayRequest } from "./pay.js";
export { RefundIncreaseRequest } from "./refund.js";
