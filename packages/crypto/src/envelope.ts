/**
 * Signed Envelope
 *
 * Pairs a value with a signature over its canonical serialization.
 * Built once by the signer (bank, notary, or a client issuing a
 * privileged request) and checked once by the receiver against the
 * authority key it already knows.
 */

import type { PublicKey, SecretKey, Signature } from "@mintwire/types";
import { sign, verifySignature } from "./signing.js";

export interface WithSignature<T> {
  readonly value: T;
  readonly signature: Signature;
}

export function mkWithSignature<T>(secretKey: SecretKey, value: T): WithSignature<T> {
  return { value, signature: sign(secretKey, value) };
}

export function verifyWithSignature<T>(
  publicKey: PublicKey,
  envelope: WithSignature<T>,
): boolean {
  return verifySignature(publicKey, envelope.value, envelope.signature);
}
