/**
 * @coinmerchant/exchange-client — exchange client abstraction.
 *
 * The backend's pay and refund handlers go through the ExchangeClient
 * interface. Swap HttpExchangeClient for MockExchangeClient in tests.
 */

export {
  ExchangeErrorCode,
  type ExchangeClient,
  type ExchangeHandle,
  type FindExchangeFailure,
  type FindExchangeResult,
  type DepositParams,
  type RefundParams,
  type ExchangeOpResult,
  type WireDetails,
  type HttpExchangeClientOptions,
} from "./types.js";

export {
  Denomination,
  SigningKey,
  Auditor,
  ExchangeKeys,
  WireFee,
  WireInfo,
  Confirmation,
} from "./wire-format.js";

export {
  signDepositConfirmation,
  verifyDepositConfirmation,
  signRefundConfirmation,
  verifyRefundConfirmation,
  type DepositConfirmation,
  type RefundConfirmation,
} from "./confirmations.js";

export { HttpExchangeClient, normalizeExchangeUrl, selectWireFee } from "./rest-client.js";
export {
  MockExchangeClient,
  type MockExchangeConfig,
  type MockDenominationConfig,
  type ScriptedFailure,
  type MockCall,
  type MockOp,
} from "./mock-client.js";
