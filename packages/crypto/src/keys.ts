/**
 * Ed25519 key handling.
 *
 * Keys travel as raw lowercase hex: a 32-byte public key and a 32-byte
 * seed.
 */

import { ed25519 } from "@noble/curves/ed25519";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import type { KeyPair, PublicKey, SecretKey } from "@mintwire/types";

const KEY_HEX = /^[0-9a-f]{64}$/;

export function isKeyHex(value: string): boolean {
  return KEY_HEX.test(value);
}

export function generateKeyPair(): KeyPair {
  const seed = ed25519.utils.randomPrivateKey();
  return {
    publicKey: bytesToHex(ed25519.getPublicKey(seed)),
    secretKey: bytesToHex(seed),
  };
}

/**
 * @throws {Error} if the secret key is not 64 lowercase hex characters
 */
export function secretKeyBytes(secretKey: SecretKey): Uint8Array {
  if (!isKeyHex(secretKey)) {
    throw new Error("Secret key must be 32 bytes of lowercase hex");
  }
  return hexToBytes(secretKey);
}

/**
 * @throws {Error} if the public key is not 64 lowercase hex characters
 */
export function publicKeyBytes(publicKey: PublicKey): Uint8Array {
  if (!isKeyHex(publicKey)) {
    throw new Error("Public key must be 32 bytes of lowercase hex");
  }
  return hexToBytes(publicKey);
}

export function derivePublicKey(secretKey: SecretKey): PublicKey {
  return bytesToHex(ed25519.getPublicKey(secretKeyBytes(secretKey)));
}
