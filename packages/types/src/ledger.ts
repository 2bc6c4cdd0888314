/**
 * Ledger Types
 *
 * Primitives shared by every node role: keys, addresses, coins,
 * transactions, blocks and the payloads mintettes report back.
 *
 * Rules:
 * - Every value is plain JSON so it can be canonically serialized and signed
 * - Keys, signatures and hashes are lowercase hex strings
 * - Absent values are `null`, never `undefined`
 */

import type { AddressStrategyEntry } from "./strategy.js";

// =============================================================================
// Keys & Identity
// =============================================================================

/** Hex-encoded 32-byte Ed25519 public key. */
export type PublicKey = string;

/** Hex-encoded 32-byte Ed25519 seed. */
export type SecretKey = string;

/** Hex-encoded 64-byte Ed25519 signature. */
export type Signature = string;

/** SHA-256 digest, hex-encoded. */
export type Hash = string;

/**
 * Identity of a fund-holding entity. Wraps the owner's public key,
 * so equality and hashing are by value.
 */
export type Address = PublicKey;

/** An address that denotes a multisignature target. */
export type MSAddress = Address;

export type TransactionId = Hash;

/** Height of the blockchain; one block per period. */
export type PeriodId = number;

/** Index of a mintette in the bank's current roster. */
export type MintetteId = number;

export interface KeyPair {
  readonly publicKey: PublicKey;
  readonly secretKey: SecretKey;
}

// =============================================================================
// Transactions
// =============================================================================

export interface Coin {
  /** Currency color (0 is the uncolored base currency) */
  readonly color: number;
  readonly amount: number;
}

/**
 * Reference to an unspent output: the transaction that created it,
 * its position in that transaction's outputs, and the coin it carries.
 */
export interface AddrId {
  readonly txId: TransactionId;
  readonly index: number;
  readonly coin: Coin;
}

/** String key for maps and sets keyed by AddrId. */
export type AddrIdKey = `${TransactionId}:${number}`;

export function addrIdKey(addrId: AddrId): AddrIdKey {
  return `${addrId.txId}:${addrId.index}`;
}

export interface TxOutput {
  readonly address: Address;
  readonly coin: Coin;
}

/**
 * A transaction. Immutable once constructed; its TransactionId is the
 * hash of its canonical serialization.
 */
export interface Transaction {
  readonly inputs: readonly AddrId[];
  readonly outputs: readonly TxOutput[];
}

/** A signature over a transaction, paired with the address that made it. */
export interface TxSignature {
  readonly address: Address;
  readonly signature: Signature;
}

// =============================================================================
// Roster
// =============================================================================

export interface Mintette {
  readonly host: string;
  readonly port: number;
}

export interface Explorer {
  readonly host: string;
  readonly port: number;
  /** Key the explorer signs its own answers with */
  readonly key: PublicKey;
}

/**
 * Mintettes and explorers as the bank reported them at one point in time.
 * Multi-step operations fetch one snapshot and pass it through.
 */
export interface RosterSnapshot {
  readonly mintettes: readonly Mintette[];
  readonly explorers: readonly Explorer[];
}

// =============================================================================
// Action Log
// =============================================================================

/** Position of a mintette's action log: hash of the last entry and its index. */
export interface ActionLogHead {
  readonly hash: Hash;
  readonly index: number;
}

export interface MintetteHead {
  readonly mintetteKey: PublicKey;
  readonly head: ActionLogHead;
}

/** A mintette's promise that an addrid was not spent before. */
export interface CheckConfirmation {
  readonly mintetteKey: PublicKey;
  readonly mintetteSignature: Signature;
  readonly head: ActionLogHead;
  readonly periodId: PeriodId;
}

export interface CheckConfirmationEntry {
  readonly mintetteId: MintetteId;
  readonly addrId: AddrId;
  readonly confirmation: CheckConfirmation;
}

/** Confirmations collected from every mintette owning an input of a transaction. */
export type CheckConfirmations = readonly CheckConfirmationEntry[];

export interface CommitAcknowledgment {
  readonly mintetteKey: PublicKey;
  readonly mintetteSignature: Signature;
  readonly head: ActionLogHead;
}

export type ActionLogEntry =
  | { readonly kind: "query"; readonly tx: Transaction }
  | {
      readonly kind: "commit";
      readonly tx: Transaction;
      readonly confirmations: CheckConfirmations;
    }
  | { readonly kind: "close_epoch"; readonly heads: readonly MintetteHead[] };

export interface HashedActionLogEntry {
  readonly entry: ActionLogEntry;
  readonly hash: Hash;
}

export type ActionLog = readonly HashedActionLogEntry[];

export interface UtxoEntry {
  readonly addrId: AddrId;
  readonly address: Address;
}

export type Utxo = readonly UtxoEntry[];

// =============================================================================
// Blocks & Periods
// =============================================================================

/** A mintette's key certified by the bank. */
export interface DpkEntry {
  readonly publicKey: PublicKey;
  readonly signature: Signature;
}

/** Lower-level block produced by one mintette during a period. */
export interface LBlock {
  readonly hash: Hash;
  readonly transactions: readonly Transaction[];
  readonly signature: Signature;
  readonly heads: readonly MintetteHead[];
}

export interface PeriodResult {
  readonly periodId: PeriodId;
  readonly blocks: readonly LBlock[];
  readonly actionLog: ActionLog;
}

/** Higher-level block: the bank's merge of a period's lower-level blocks. */
export interface HBlock {
  readonly hash: Hash;
  readonly prevHash: Hash;
  readonly transactions: readonly Transaction[];
  readonly signature: Signature;
  readonly dpk: readonly DpkEntry[];
  /** Strategies registered for addresses during the period */
  readonly addresses: readonly AddressStrategyEntry[];
}

export interface HBlockMetadata {
  /** ISO 8601 timestamp of block creation */
  readonly timestamp: string;
}

export interface WithMetadata<V, M> {
  readonly value: V;
  readonly metadata: M;
}

/** Data the bank hands to mintettes when a new period starts. */
export interface NewPeriodData {
  readonly periodId: PeriodId;
  readonly mintettes: readonly Mintette[];
  readonly hblock: HBlock;
  readonly dpk: readonly DpkEntry[];
}

// =============================================================================
// Bank Control
// =============================================================================

/** Administrative command executed by the bank; always sent bank-signed. */
export type BankControlCommand =
  | {
      readonly kind: "add_mintette";
      readonly mintette: Mintette;
      readonly publicKey: PublicKey;
    }
  | { readonly kind: "remove_mintette"; readonly host: string; readonly port: number }
  | {
      readonly kind: "add_explorer";
      readonly explorer: Explorer;
      readonly periodId: PeriodId;
    }
  | { readonly kind: "remove_explorer"; readonly host: string; readonly port: number };

/**
 * Proof that a trusted party's hot key was certified by its master key:
 * the master public key and its signature over the hot key.
 */
export interface MasterKeyCertificate {
  readonly masterKey: PublicKey;
  readonly signature: Signature;
}
