/**
 * Transaction identity and signatures.
 *
 * An address is its owner's public key, so a signature over a
 * transaction is validated directly against the signing address.
 */

import type { Address, SecretKey, Signature, Transaction, TransactionId } from "@mintwire/types";
import { hashValue, sign, verifySignature } from "./signing.js";

export function transactionId(tx: Transaction): TransactionId {
  return hashValue(tx);
}

export function signTransaction(secretKey: SecretKey, tx: Transaction): Signature {
  return sign(secretKey, tx);
}

export function validateSignature(
  signature: Signature,
  address: Address,
  tx: Transaction,
): boolean {
  return verifySignature(address, tx, signature);
}
