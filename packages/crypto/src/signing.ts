/**
 * Canonical Signing and Hashing
 *
 * Every signed or hashed structure is first serialized with RFC 8785
 * (JCS) canonical JSON, so the same value always yields the same bytes
 * regardless of key order.
 *
 * Design:
 * - Ed25519 signatures over the canonical UTF-8 bytes
 * - SHA-256 content addressing
 * - Verification never throws: malformed keys or signatures are invalid
 */

import { createHash } from "node:crypto";
import { ed25519 } from "@noble/curves/ed25519";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { canonicalize } from "json-canonicalize";
import type { Hash, PublicKey, SecretKey, Signature } from "@mintwire/types";
import { isKeyHex, publicKeyBytes, secretKeyBytes } from "./keys.js";

const SIGNATURE_HEX = /^[0-9a-f]{128}$/;

/**
 * Canonical byte serialization of a JSON value.
 */
export function canonicalBytes(value: unknown): Buffer {
  return Buffer.from(canonicalize(value), "utf8");
}

/**
 * SHA-256 of the canonical serialization, hex-encoded.
 */
export function hashValue(value: unknown): Hash {
  return createHash("sha256").update(canonicalBytes(value)).digest("hex");
}

export function sign(secretKey: SecretKey, value: unknown): Signature {
  return bytesToHex(ed25519.sign(canonicalBytes(value), secretKeyBytes(secretKey)));
}

/**
 * Check that `signature` was made by the owner of `publicKey` over `value`.
 */
export function verifySignature(
  publicKey: PublicKey,
  value: unknown,
  signature: Signature,
): boolean {
  if (!isKeyHex(publicKey) || !SIGNATURE_HEX.test(signature)) {
    return false;
  }
  try {
    return ed25519.verify(hexToBytes(signature), canonicalBytes(value), publicKeyBytes(publicKey));
  } catch {
    // not every 32-byte string decodes to a curve point
    return false;
  }
}
