/**
 * Canonical serialization vectors.
 * Contract hashes depend on these; if one breaks, the encoder is wrong.
 */

import { describe, it, expect } from "vitest";
import { canonicalDecode, canonicalEncode, CanonicalEncodingError } from "../../src/canonical.js";
import { toHex } from "../../src/hash.js";

describe("canonical serialization", () => {
  it("is independent of key insertion order", () => {
    const a = canonicalEncode({ order_id: "o1", amount: "EUR:1", max_fee: "EUR:0" });
    const b = canonicalEncode({ max_fee: "EUR:0", order_id: "o1", amount: "EUR:1" });
    expect(toHex(a)).toBe(toHex(b));
  });

  it("sorts nested keys", () => {
    const decoded = canonicalDecode(canonicalEncode({ z: { b: 2, a: 1 }, a: [{ y: 1, x: 2 }] }));
    expect(JSON.stringify(decoded)).toBe('{"a":[{"x":2,"y":1}],"z":{"a":1,"b":2}}');
  });

  it("drops undefined fields", () => {
    expect(toHex(canonicalEncode({ a: 1, b: undefined }))).toBe(toHex(canonicalEncode({ a: 1 })));
  });

  it("rejects non-integer numbers", () => {
    expect(() => canonicalEncode({ amount: 1.5 })).toThrow(CanonicalEncodingError);
  });

  it("keeps integers as integers", () => {
    const decoded = canonicalDecode(canonicalEncode({ pay_deadline: 1_700_000_000_000 }));
    expect(decoded).toEqual({ pay_deadline: 1_700_000_000_000 });
  });
});
