/**
 * Human-readable renderings of strategy values for log lines.
 */

import { assertNever } from "@mintwire/types";
import type {
  AllocationAddress,
  AllocationInfo,
  AllocationStrategy,
  PartyAddress,
  TxStrategy,
} from "@mintwire/types";

function list(items: readonly string[]): string {
  return `[${items.join(", ")}]`;
}

export function formatTxStrategy(strategy: TxStrategy): string {
  switch (strategy.kind) {
    case "default":
      return "DefaultStrategy";
    case "m_of_n":
      return `TxStrategy { m: ${strategy.m}, addresses: ${list(strategy.addresses)} }`;
    default:
      return assertNever(strategy);
  }
}

export function formatAllocationAddress(a: AllocationAddress): string {
  switch (a.kind) {
    case "trust":
      return `TrustA : ${a.address}`;
    case "user":
      return `UserA : ${a.address}`;
    default:
      return assertNever(a);
  }
}

export function formatPartyAddress(p: PartyAddress): string {
  switch (p.kind) {
    case "trust":
      return `TrustP : party = ${p.partyAddress}, hot = ${p.hotTrustKey}`;
    case "user":
      return `UserP : ${p.partyAddress}`;
    default:
      return assertNever(p);
  }
}

export function formatAllocationStrategy(s: AllocationStrategy): string {
  return (
    `AllocationStrategy { sigNumber: ${s.sigNumber}, ` +
    `allParties: ${list(s.allParties.map(formatAllocationAddress))} }`
  );
}

export function formatAllocationInfo(info: AllocationInfo): string {
  const confirmations = info.currentConfirmations.map(
    (c) => `${formatAllocationAddress(c.party)} -> ${c.address}`,
  );
  return (
    `AllocationInfo { allocationStrategy: ${formatAllocationStrategy(info.allocationStrategy)}, ` +
    `currentConfirmations: ${list(confirmations)} }`
  );
}
