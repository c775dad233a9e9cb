/**
 * Ed25519 sign + verify.
 *
 * Keys are 32-byte seeds (private) and 32-byte points (public); signatures
 * are 64 bytes. The async variants of @noble/ed25519 use the runtime's
 * SubtleCrypto SHA-512, available in Node 20.
 */

import { getPublicKeyAsync, signAsync, utils, verifyAsync } from "@noble/ed25519";

export interface Keypair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

/** Generate an Ed25519 keypair (test/dev helper). */
export async function generateKeypair(): Promise<Keypair> {
  const privateKey = utils.randomPrivateKey();
  const publicKey = await getPublicKeyAsync(privateKey);
  return { publicKey, privateKey };
}

export async function publicKeyFromPrivate(privateKey: Uint8Array): Promise<Uint8Array> {
  return getPublicKeyAsync(privateKey);
}

export async function ed25519Sign(
  privateKey: Uint8Array,
  message: Uint8Array,
): Promise<Uint8Array> {
  return signAsync(message, privateKey);
}

/**
 * Verify an Ed25519 signature. Malformed keys or signatures verify as false.
 */
export async function ed25519Verify(
  publicKey: Uint8Array,
  signature: Uint8Array,
  message: Uint8Array,
): Promise<boolean> {
  try {
    return await verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}
