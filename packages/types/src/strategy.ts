/**
 * Strategy Types
 *
 * Data shapes for transaction-authorization policies and for the
 * negotiation that allocates a multisignature address.
 *
 * Design:
 * - Closed unions discriminated by `kind`; consumers match exhaustively
 * - Set-valued fields are stored deduplicated and sorted, so equal sets
 *   serialize (and therefore hash and sign) identically
 * - Decision logic lives in @mintwire/strategy
 */

import type { Address, MSAddress, PublicKey } from "./ledger.js";

// =============================================================================
// Transaction Strategy
// =============================================================================

/** One valid signature from the spending address itself. */
export interface DefaultStrategy {
  readonly kind: "default";
}

/** At least `m` distinct members of `addresses` must have signed. */
export interface MOfNStrategy {
  readonly kind: "m_of_n";
  readonly m: number;
  /** Candidate signers, deduplicated and sorted */
  readonly addresses: readonly Address[];
}

export type TxStrategy = DefaultStrategy | MOfNStrategy;

export interface AddressStrategyEntry {
  readonly address: Address;
  readonly strategy: TxStrategy;
}

export type AddressToTxStrategyMap = ReadonlyMap<Address, TxStrategy>;

// =============================================================================
// Allocation
// =============================================================================

/**
 * A party of a pending multisignature allocation: either trusted
 * infrastructure or an ordinary user.
 */
export type AllocationAddress =
  | { readonly kind: "trust"; readonly address: Address }
  | { readonly kind: "user"; readonly address: Address };

/**
 * Identity of a party sending a request to the notary. A trusted party
 * signs allocation requests with a hot key distinct from its master key.
 */
export type PartyAddress =
  | {
      readonly kind: "trust";
      readonly partyAddress: Address;
      readonly hotTrustKey: PublicKey;
    }
  | { readonly kind: "user"; readonly partyAddress: Address };

export interface AllocationStrategy {
  /** Number of signatures a transaction needs */
  readonly sigNumber: number;
  /** Every party of the address, deduplicated and sorted */
  readonly allParties: readonly AllocationAddress[];
}

/** The concrete address a party confirmed an allocation with. */
export interface AllocationConfirmation {
  readonly party: AllocationAddress;
  readonly address: Address;
}

/**
 * Progress of a pending allocation. The notary appends confirmations
 * as they arrive; each party appears at most once.
 */
export interface AllocationInfo {
  readonly allocationStrategy: AllocationStrategy;
  readonly currentConfirmations: readonly AllocationConfirmation[];
}

export interface MSAllocationEntry {
  readonly msAddress: MSAddress;
  readonly info: AllocationInfo;
}
