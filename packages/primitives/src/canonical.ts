/**
 * Canonical serialization — deterministic CBOR encoding.
 *
 * Rules:
 *   1. Stable field order (lexicographic by key)
 *   2. No floats (integers only for all numeric values)
 *   3. Deterministic encoding (same object → identical bytes, always)
 *   4. CBOR (RFC 8949) with canonical map key ordering
 *
 * Contract terms are hashed over this encoding, so two JSON documents
 * that differ only in key order or whitespace hash identically.
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

export class CanonicalEncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CanonicalEncodingError";
  }
}

/**
 * Sort object keys lexicographically (recursive, depth-first).
 * Rejects non-integer numbers; undefined fields are dropped the way
 * JSON.stringify drops them.
 */
function sortKeys(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (obj instanceof Uint8Array) return obj;
  if (Array.isArray(obj)) return obj.map(sortKeys);
  if (typeof obj === "number") {
    if (!Number.isSafeInteger(obj)) {
      throw new CanonicalEncodingError(`non-integer number in canonical input: ${obj}`);
    }
    return obj;
  }
  if (typeof obj === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (value === undefined) continue;
      sorted[key] = sortKeys(value);
    }
    return sorted;
  }
  return obj;
}

/**
 * Canonical encode: sort keys lexicographically, then CBOR encode.
 * This is the ONLY way to serialize objects for hashing.
 */
export function canonicalEncode(obj: unknown): Uint8Array {
  const sorted = sortKeys(obj);
  return encoder.encode(sorted);
}

/**
 * Decode canonical CBOR bytes back to an object.
 */
export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
