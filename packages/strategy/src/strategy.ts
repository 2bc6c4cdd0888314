/**
 * Strategy Decisions
 *
 * Pure predicates deciding whether collected signatures authorize a
 * transaction, and projections between allocation and transaction
 * strategies.
 *
 * Design:
 * - Only signatures that validate over the transaction count
 * - Each quorum member counts once, however many signatures it sent
 * - Signatures from non-members never count
 */

import { validateSignature } from "@mintwire/crypto";
import { assertNever } from "@mintwire/types";
import type {
  Address,
  AllocationAddress,
  AllocationInfo,
  AllocationStrategy,
  PartyAddress,
  Transaction,
  TxSignature,
  TxStrategy,
} from "@mintwire/types";
import { sameAllocationAddress, uniqueAddresses } from "./construct.js";

// =============================================================================
// Transaction Authorization
// =============================================================================

/**
 * How far a transaction is from satisfying a strategy.
 */
export interface StrategyProgress {
  /** Whether enough distinct signers were collected */
  readonly met: boolean;

  /** Required number of distinct valid signers */
  readonly required: number;

  /** Members that produced a valid signature, sorted */
  readonly collected: readonly Address[];

  /** Members still missing a valid signature, sorted */
  readonly missing: readonly Address[];
}

function signersAmong(
  members: readonly Address[],
  signatures: readonly TxSignature[],
  tx: Transaction,
): Set<Address> {
  const memberSet = new Set(members);
  const signed = new Set<Address>();
  for (const { address, signature } of signatures) {
    if (signed.has(address) || !memberSet.has(address)) continue;
    if (validateSignature(signature, address, tx)) {
      signed.add(address);
    }
  }
  return signed;
}

/**
 * Compute quorum progress for `tx` spending from `ownerAddress`.
 *
 * A default strategy has the owner as its only member and needs one
 * signature; an M-of-N strategy needs `m` of its members.
 */
export function strategyProgress(
  strategy: TxStrategy,
  ownerAddress: Address,
  signatures: readonly TxSignature[],
  tx: Transaction,
): StrategyProgress {
  let members: readonly Address[];
  let required: number;

  switch (strategy.kind) {
    case "default":
      members = [ownerAddress];
      required = 1;
      break;
    case "m_of_n":
      members = uniqueAddresses(strategy.addresses);
      required = strategy.m;
      break;
    default:
      return assertNever(strategy);
  }

  const signed = signersAmong(members, signatures, tx);
  return {
    met: signed.size >= required,
    required,
    collected: members.filter((a) => signed.has(a)),
    missing: members.filter((a) => !signed.has(a)),
  };
}

/**
 * Whether the signatures collected so far let `tx` spend from
 * `ownerAddress` under `strategy`.
 *
 * An M-of-N strategy with `m = 0` is satisfied by no signatures at all;
 * the constructors never build one.
 */
export function isStrategyCompleted(
  strategy: TxStrategy,
  ownerAddress: Address,
  signatures: readonly TxSignature[],
  tx: Transaction,
): boolean {
  return strategyProgress(strategy, ownerAddress, signatures, tx).met;
}

// =============================================================================
// Allocation
// =============================================================================

/**
 * The transaction strategy a completed allocation registers.
 *
 * Trust and user parties sharing one address collapse into a single
 * quorum member.
 */
export function allocateTxFromAlloc(strategy: AllocationStrategy): TxStrategy {
  return {
    kind: "m_of_n",
    m: strategy.sigNumber,
    addresses: uniqueAddresses(strategy.allParties.map((p) => p.address)),
  };
}

/** Drops the hot key of a trusted party. */
export function partyToAllocation(party: PartyAddress): AllocationAddress {
  switch (party.kind) {
    case "trust":
      return { kind: "trust", address: party.partyAddress };
    case "user":
      return { kind: "user", address: party.partyAddress };
    default:
      return assertNever(party);
  }
}

export function confirmationOf(info: AllocationInfo, party: AllocationAddress): Address | null {
  const found = info.currentConfirmations.find((c) => sameAllocationAddress(c.party, party));
  return found === undefined ? null : found.address;
}

/** Every party of the allocation has confirmed. */
export function isAllocationComplete(info: AllocationInfo): boolean {
  return info.allocationStrategy.allParties.every((p) => confirmationOf(info, p) !== null);
}
