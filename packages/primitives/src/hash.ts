/**
 * Hashing and hex helpers.
 *
 * h_contract_terms = SHA256(canonical(contract_terms))
 * h_wire           = SHA256(canonical({ payto_uri, salt }))
 * pay key          = SHA256(utf8(order_id) || merchant_pub)
 *
 * All hashes are 32 bytes, represented as lowercase hex strings.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, concatBytes, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { canonicalEncode } from "./canonical.js";

/** 32-byte hex-encoded SHA256 hash. */
export type HashCode = string;

const HEX32_RE = /^[0-9a-f]{64}$/;
const HEX64_RE = /^[0-9a-f]{128}$/;

/** SHA256 of canonically-encoded object → hex. */
export function hashObject(obj: unknown): HashCode {
  return bytesToHex(sha256(canonicalEncode(obj)));
}

/** Hash of a contract terms document; the authoritative order identity. */
export function hashContractTerms(contractTerms: unknown): HashCode {
  return hashObject(contractTerms);
}

/** Raw SHA256 hash of bytes → Uint8Array (32 bytes). */
export function hashBytes(bytes: Uint8Array): Uint8Array {
  return sha256(bytes);
}

/** Key under which long-pollers for an order wait. */
export function computePayKey(orderId: string, merchantPubHex: string): HashCode {
  return bytesToHex(sha256(concatBytes(utf8ToBytes(orderId), hexToBytes(merchantPubHex))));
}

/** Convert hex string to bytes. */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

/** Convert bytes to hex string. */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

export function isHex32(s: string): boolean {
  return HEX32_RE.test(s);
}

export function isHex64(s: string): boolean {
  return HEX64_RE.test(s);
}
