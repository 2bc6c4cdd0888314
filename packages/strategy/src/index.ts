/**
 * @mintwire/strategy — Transaction authorization and multisignature allocation.
 *
 * Decides whether collected signatures authorize spending from an address
 * (single signer or M-of-N), and projects the allocation negotiated through
 * the notary into the strategy registered for the new address.
 */

// Construction
export {
  InvalidStrategyError,
  defaultStrategy,
  mOfNStrategy,
  allocationStrategy,
  trustAlloc,
  userAlloc,
  trustParty,
  userParty,
  compareAllocationAddress,
  allocationAddressKey,
  sameAllocationAddress,
  uniqueAddresses,
  uniqueParties,
} from "./construct.js";
export type { AllocationAddressKey } from "./construct.js";

// Decisions
export {
  isStrategyCompleted,
  strategyProgress,
  allocateTxFromAlloc,
  partyToAllocation,
  confirmationOf,
  isAllocationComplete,
} from "./strategy.js";
export type { StrategyProgress } from "./strategy.js";

// Formatting
export {
  formatTxStrategy,
  formatAllocationAddress,
  formatPartyAddress,
  formatAllocationStrategy,
  formatAllocationInfo,
} from "./format.js";

// Wire schemas
export {
  KeySchema,
  AddressSchema,
  TxStrategySchema,
  AddressStrategyEntrySchema,
  AddressStrategyMapSchema,
  AllocationAddressSchema,
  PartyAddressSchema,
  AllocationStrategySchema,
  AllocationInfoSchema,
} from "./schemas.js";
