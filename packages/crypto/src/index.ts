/**
 * @mintwire/crypto — Keys, canonical signing and signed envelopes.
 *
 * Pipeline:
 * 1. Serialize — RFC 8785 canonical JSON
 * 2. Hash — SHA-256 content addressing
 * 3. Sign / verify — Ed25519 over the canonical bytes
 */

// Keys
export {
  generateKeyPair,
  derivePublicKey,
  isKeyHex,
  secretKeyBytes,
  publicKeyBytes,
} from "./keys.js";

// Signing
export { canonicalBytes, hashValue, sign, verifySignature } from "./signing.js";

// Envelope
export { mkWithSignature, verifyWithSignature } from "./envelope.js";
export type { WithSignature } from "./envelope.js";

// Transactions
export { transactionId, signTransaction, validateSignature } from "./transaction.js";
