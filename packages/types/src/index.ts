/**
 * @mintwire/types — Shared types for the mintwire stack.
 *
 * - Ledger primitives (keys, addresses, transactions, blocks)
 * - Payloads exchanged with the bank, mintettes, notary and explorers
 * - Strategy and allocation data shapes
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Values are plain JSON; maps travel as arrays of entries
 */

// Ledger types
export type {
  PublicKey,
  SecretKey,
  Signature,
  Hash,
  Address,
  MSAddress,
  TransactionId,
  PeriodId,
  MintetteId,
  KeyPair,
  Coin,
  AddrId,
  AddrIdKey,
  TxOutput,
  Transaction,
  TxSignature,
  Mintette,
  Explorer,
  RosterSnapshot,
  ActionLogHead,
  MintetteHead,
  CheckConfirmation,
  CheckConfirmationEntry,
  CheckConfirmations,
  CommitAcknowledgment,
  ActionLogEntry,
  HashedActionLogEntry,
  ActionLog,
  UtxoEntry,
  Utxo,
  DpkEntry,
  LBlock,
  PeriodResult,
  HBlock,
  HBlockMetadata,
  WithMetadata,
  NewPeriodData,
  BankControlCommand,
  MasterKeyCertificate,
} from "./ledger.js";
export { addrIdKey } from "./ledger.js";

// Strategy types
export type {
  DefaultStrategy,
  MOfNStrategy,
  TxStrategy,
  AddressStrategyEntry,
  AddressToTxStrategyMap,
  AllocationAddress,
  PartyAddress,
  AllocationStrategy,
  AllocationConfirmation,
  AllocationInfo,
  MSAllocationEntry,
} from "./strategy.js";

// Either
export type { Either } from "./either.js";
export { left, right, isLeft, isRight, assertNever } from "./either.js";
