/**
 * @coinmerchant/primitives — frozen payment primitives.
 *
 * Amount arithmetic, canonical encoding, hashing, Ed25519 and the signed
 * merchant structures. No I/O, no state. The backend and the exchange
 * client import from here, never the reverse.
 */

// Amounts
export {
  amountZero,
  parseAmount,
  amountToString,
  isValidAmount,
  sameCurrency,
  amountCmp,
  amountAdd,
  amountSubtract,
  amountDivide,
  amountMin,
  amountToNbo,
  CurrencyMismatchError,
  type Amount,
  type AmountResult,
} from "./amount.js";

// Canonical encoding + hashing
export { canonicalEncode, canonicalDecode, CanonicalEncodingError } from "./canonical.js";
export {
  hashObject,
  hashContractTerms,
  hashBytes,
  computePayKey,
  fromHex,
  toHex,
  isHex32,
  isHex64,
  type HashCode,
} from "./hash.js";

// Ed25519
export {
  generateKeypair,
  publicKeyFromPrivate,
  ed25519Sign,
  ed25519Verify,
  type Keypair,
} from "./ed25519.js";

// Signed merchant structures
export {
  paymentResponsePayload,
  signPaymentOk,
  verifyPaymentOk,
  refundRequestPayload,
  signRefundRequest,
  verifyRefundRequest,
  type RefundRequestInput,
} from "./signatures.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
