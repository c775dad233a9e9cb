/**
 * Shared wire scalars.
 */

import { Type } from "@sinclair/typebox";

/** 32 bytes, lowercase hex (public keys, hashes). */
export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

/** 64 bytes, lowercase hex (signatures). */
export const Hex64 = Type.String({ pattern: "^[0-9a-f]{128}$" });

/** "CUR:V[.F]" — see amount.ts for range checks beyond the pattern. */
export const AmountString = Type.String({
  pattern: "^[A-Za-z]{1,11}:[0-9]{1,16}(\\.[0-9]{1,8})?$",
});

/** Milliseconds since the Unix epoch. */
export const Timestamp = Type.Integer({ minimum: 0 });
