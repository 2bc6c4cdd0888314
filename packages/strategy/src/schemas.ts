/**
 * Wire schemas for strategy values.
 *
 * Decoding applies the same rules as the constructors: thresholds in
 * 1..|set|, sets deduplicated and sorted, one confirmation per party.
 */

import { z } from "zod";
import type {
  AddressStrategyEntry,
  AddressToTxStrategyMap,
  AllocationAddress,
  AllocationInfo,
  AllocationStrategy,
  PartyAddress,
  TxStrategy,
} from "@mintwire/types";
import { allocationAddressKey, uniqueAddresses, uniqueParties } from "./construct.js";

// =============================================================================
// Shared Schemas
// =============================================================================

export const KeySchema = z.string().regex(/^[0-9a-f]{64}$/, "expected 32 bytes of lowercase hex");

export const AddressSchema = KeySchema;

// =============================================================================
// Transaction Strategy
// =============================================================================

const DefaultStrategySchema = z.object({ kind: z.literal("default") });

const MOfNStrategySchema = z
  .object({
    kind: z.literal("m_of_n"),
    m: z.number().int(),
    addresses: z.array(AddressSchema),
  })
  .refine((s) => s.m >= 1 && s.m <= new Set(s.addresses).size, {
    message: "m must be between 1 and the number of distinct addresses",
    path: ["m"],
  })
  .transform((s) => ({ kind: s.kind, m: s.m, addresses: uniqueAddresses(s.addresses) }));

export const TxStrategySchema: z.ZodType<TxStrategy, z.ZodTypeDef, unknown> = z.union([
  DefaultStrategySchema,
  MOfNStrategySchema,
]);

export const AddressStrategyEntrySchema: z.ZodType<AddressStrategyEntry, z.ZodTypeDef, unknown> =
  z.object({
    address: AddressSchema,
    strategy: TxStrategySchema,
  });

/** Decodes `{ address, strategy }[]` into a map. Repeated addresses are rejected. */
export const AddressStrategyMapSchema: z.ZodType<AddressToTxStrategyMap, z.ZodTypeDef, unknown> = z
  .array(AddressStrategyEntrySchema)
  .refine((entries) => new Set(entries.map((e) => e.address)).size === entries.length, {
    message: "each address may carry only one strategy",
  })
  .transform((entries) => new Map(entries.map((e) => [e.address, e.strategy])));

// =============================================================================
// Allocation
// =============================================================================

export const AllocationAddressSchema: z.ZodType<AllocationAddress, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("trust"), address: AddressSchema }),
    z.object({ kind: z.literal("user"), address: AddressSchema }),
  ]);

export const PartyAddressSchema: z.ZodType<PartyAddress, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("trust"),
      partyAddress: AddressSchema,
      hotTrustKey: KeySchema,
    }),
    z.object({ kind: z.literal("user"), partyAddress: AddressSchema }),
  ]);

export const AllocationStrategySchema: z.ZodType<AllocationStrategy, z.ZodTypeDef, unknown> = z
  .object({
    sigNumber: z.number().int(),
    allParties: z.array(AllocationAddressSchema),
  })
  .transform((s) => ({ sigNumber: s.sigNumber, allParties: uniqueParties(s.allParties) }))
  .refine(
    (s) =>
      s.sigNumber >= 1 && s.sigNumber <= new Set(s.allParties.map((p) => p.address)).size,
    {
      message: "sigNumber must be between 1 and the number of distinct party addresses",
      path: ["sigNumber"],
    },
  );

export const AllocationInfoSchema: z.ZodType<AllocationInfo, z.ZodTypeDef, unknown> = z
  .object({
    allocationStrategy: AllocationStrategySchema,
    currentConfirmations: z.array(
      z.object({ party: AllocationAddressSchema, address: AddressSchema }),
    ),
  })
  .refine(
    (info) =>
      new Set(info.currentConfirmations.map((c) => allocationAddressKey(c.party))).size ===
      info.currentConfirmations.length,
    { message: "each party may confirm only once", path: ["currentConfirmations"] },
  );
