/**
 * Strategy Construction
 *
 * Constructors validate and normalize strategy values. Set-valued fields
 * are deduplicated and sorted so equal sets compare, serialize and sign
 * identically.
 *
 * Rules enforced here (and by the wire schemas):
 * - `m` is an integer in 1..|set|
 * - `sigNumber` is an integer in 1..|distinct party addresses|, the size
 *   of the quorum the allocation registers
 * - a quorum over an empty set is never constructed
 */

import type {
  Address,
  AllocationAddress,
  AllocationStrategy,
  DefaultStrategy,
  MOfNStrategy,
  PartyAddress,
  PublicKey,
} from "@mintwire/types";

// =============================================================================
// Errors
// =============================================================================

export class InvalidStrategyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStrategyError";
  }
}

// =============================================================================
// Ordering & Identity
// =============================================================================

const KIND_ORDER = { trust: 0, user: 1 } as const;

/** Orders by (kind, address); trusted parties sort first. */
export function compareAllocationAddress(a: AllocationAddress, b: AllocationAddress): number {
  const byKind = KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
  if (byKind !== 0) return byKind;
  if (a.address < b.address) return -1;
  if (a.address > b.address) return 1;
  return 0;
}

export type AllocationAddressKey = `${AllocationAddress["kind"]}:${Address}`;

/** String key for maps and sets keyed by AllocationAddress. */
export function allocationAddressKey(a: AllocationAddress): AllocationAddressKey {
  return `${a.kind}:${a.address}`;
}

export function sameAllocationAddress(a: AllocationAddress, b: AllocationAddress): boolean {
  return a.kind === b.kind && a.address === b.address;
}

export function uniqueAddresses(addresses: Iterable<Address>): readonly Address[] {
  return [...new Set(addresses)].sort();
}

export function uniqueParties(parties: Iterable<AllocationAddress>): readonly AllocationAddress[] {
  const byKey = new Map<AllocationAddressKey, AllocationAddress>();
  for (const party of parties) {
    byKey.set(allocationAddressKey(party), party);
  }
  return [...byKey.values()].sort(compareAllocationAddress);
}

function checkThreshold(label: string, required: number, available: number): void {
  if (!Number.isInteger(required) || required < 1 || required > available) {
    throw new InvalidStrategyError(
      `${label} must be an integer between 1 and ${available}, got ${required}`,
    );
  }
}

// =============================================================================
// Constructors
// =============================================================================

export function defaultStrategy(): DefaultStrategy {
  return { kind: "default" };
}

/**
 * @throws {InvalidStrategyError} if `m` is not in 1..|distinct addresses|
 */
export function mOfNStrategy(m: number, addresses: Iterable<Address>): MOfNStrategy {
  const members = uniqueAddresses(addresses);
  checkThreshold("m", m, members.length);
  return { kind: "m_of_n", m, addresses: members };
}

/**
 * Trust and user parties sharing an address count once towards the bound.
 *
 * @throws {InvalidStrategyError} if `sigNumber` is not in 1..|distinct party addresses|
 */
export function allocationStrategy(
  sigNumber: number,
  parties: Iterable<AllocationAddress>,
): AllocationStrategy {
  const allParties = uniqueParties(parties);
  checkThreshold("sigNumber", sigNumber, uniqueAddresses(allParties.map((p) => p.address)).length);
  return { sigNumber, allParties };
}

export function trustAlloc(address: Address): AllocationAddress {
  return { kind: "trust", address };
}

export function userAlloc(address: Address): AllocationAddress {
  return { kind: "user", address };
}

export function trustParty(partyAddress: Address, hotTrustKey: PublicKey): PartyAddress {
  return { kind: "trust", partyAddress, hotTrustKey };
}

export function userParty(partyAddress: Address): PartyAddress {
  return { kind: "user", partyAddress };
}
