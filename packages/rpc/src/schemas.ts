/**
 * Wire Schemas
 *
 * Zod codecs for the ledger payloads returned by remote methods. Every
 * result is decoded before it reaches the caller; a mismatch is a
 * protocol error.
 */

import { z } from "zod";
import {
  AddressSchema,
  AddressStrategyEntrySchema,
  AllocationInfoSchema,
  KeySchema,
  TxStrategySchema,
} from "@mintwire/strategy";
import type {
  ActionLog,
  ActionLogEntry,
  AddrId,
  AddressStrategyEntry,
  CheckConfirmation,
  CheckConfirmationEntry,
  Coin,
  CommitAcknowledgment,
  Either,
  Explorer,
  HBlock,
  LBlock,
  Mintette,
  MintetteHead,
  MSAllocationEntry,
  PeriodResult,
  Transaction,
  TxSignature,
  Utxo,
} from "@mintwire/types";

// =============================================================================
// Primitives
// =============================================================================

export const HashSchema = z.string().regex(/^[0-9a-f]{64}$/, "expected a SHA-256 hex digest");

export const SignatureSchema = z
  .string()
  .regex(/^[0-9a-f]{128}$/, "expected 64 bytes of lowercase hex");

export const PeriodIdSchema = z.number().int().min(0);

const PortSchema = z.number().int().min(1).max(65535);

// =============================================================================
// Transactions
// =============================================================================

export const CoinSchema: z.ZodType<Coin, z.ZodTypeDef, unknown> = z.object({
  color: z.number().int(),
  amount: z.number().nonnegative(),
});

export const AddrIdSchema: z.ZodType<AddrId, z.ZodTypeDef, unknown> = z.object({
  txId: HashSchema,
  index: z.number().int().min(0),
  coin: CoinSchema,
});

export const TransactionSchema: z.ZodType<Transaction, z.ZodTypeDef, unknown> = z.object({
  inputs: z.array(AddrIdSchema),
  outputs: z.array(z.object({ address: AddressSchema, coin: CoinSchema })),
});

export const TxSignatureSchema: z.ZodType<TxSignature, z.ZodTypeDef, unknown> = z.object({
  address: AddressSchema,
  signature: SignatureSchema,
});

// =============================================================================
// Roster
// =============================================================================

export const MintetteSchema: z.ZodType<Mintette, z.ZodTypeDef, unknown> = z.object({
  host: z.string().min(1),
  port: PortSchema,
});

export const ExplorerSchema: z.ZodType<Explorer, z.ZodTypeDef, unknown> = z.object({
  host: z.string().min(1),
  port: PortSchema,
  key: KeySchema,
});

// =============================================================================
// Action Log
// =============================================================================

const ActionLogHeadSchema = z.object({
  hash: HashSchema,
  index: z.number().int().min(0),
});

export const MintetteHeadSchema: z.ZodType<MintetteHead, z.ZodTypeDef, unknown> = z.object({
  mintetteKey: KeySchema,
  head: ActionLogHeadSchema,
});

export const CheckConfirmationSchema: z.ZodType<CheckConfirmation, z.ZodTypeDef, unknown> =
  z.object({
    mintetteKey: KeySchema,
    mintetteSignature: SignatureSchema,
    head: ActionLogHeadSchema,
    periodId: PeriodIdSchema,
  });

export const CheckConfirmationEntrySchema: z.ZodType<
  CheckConfirmationEntry,
  z.ZodTypeDef,
  unknown
> = z.object({
  mintetteId: z.number().int().min(0),
  addrId: AddrIdSchema,
  confirmation: CheckConfirmationSchema,
});

export const CommitAcknowledgmentSchema: z.ZodType<CommitAcknowledgment, z.ZodTypeDef, unknown> =
  z.object({
    mintetteKey: KeySchema,
    mintetteSignature: SignatureSchema,
    head: ActionLogHeadSchema,
  });

const ActionLogEntrySchema: z.ZodType<ActionLogEntry, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("query"), tx: TransactionSchema }),
    z.object({
      kind: z.literal("commit"),
      tx: TransactionSchema,
      confirmations: z.array(CheckConfirmationEntrySchema),
    }),
    z.object({ kind: z.literal("close_epoch"), heads: z.array(MintetteHeadSchema) }),
  ]);

export const ActionLogSchema: z.ZodType<ActionLog, z.ZodTypeDef, unknown> = z.array(
  z.object({ entry: ActionLogEntrySchema, hash: HashSchema }),
);

export const UtxoSchema: z.ZodType<Utxo, z.ZodTypeDef, unknown> = z.array(
  z.object({ addrId: AddrIdSchema, address: AddressSchema }),
);

// =============================================================================
// Blocks & Periods
// =============================================================================

const DpkEntrySchema = z.object({ publicKey: KeySchema, signature: SignatureSchema });

export const HBlockSchema: z.ZodType<HBlock, z.ZodTypeDef, unknown> = z.object({
  hash: HashSchema,
  prevHash: HashSchema,
  transactions: z.array(TransactionSchema),
  signature: SignatureSchema,
  dpk: z.array(DpkEntrySchema),
  addresses: z.array(AddressStrategyEntrySchema),
});

export const LBlockSchema: z.ZodType<LBlock, z.ZodTypeDef, unknown> = z.object({
  hash: HashSchema,
  transactions: z.array(TransactionSchema),
  signature: SignatureSchema,
  heads: z.array(MintetteHeadSchema),
});

export const PeriodResultSchema: z.ZodType<PeriodResult, z.ZodTypeDef, unknown> = z.object({
  periodId: PeriodIdSchema,
  blocks: z.array(LBlockSchema),
  actionLog: ActionLogSchema,
});

// =============================================================================
// Notary
// =============================================================================

export const CompleteMSAddressSchema: z.ZodType<AddressStrategyEntry, z.ZodTypeDef, unknown> =
  z.object({ address: AddressSchema, strategy: TxStrategySchema });

export const MSAllocationEntrySchema: z.ZodType<MSAllocationEntry, z.ZodTypeDef, unknown> =
  z.object({ msAddress: AddressSchema, info: AllocationInfoSchema });

// =============================================================================
// Envelopes
// =============================================================================

/** A signed answer; `value` is verified before it is decoded. */
export const SignedEnvelopeSchema = z
  .object({ value: z.unknown(), signature: z.string() })
  .refine((envelope) => envelope.value !== undefined, {
    message: "signed envelope carries no value",
    path: ["value"],
  });

/** An application-level Either whose right side is decoded separately. */
export const EitherEnvelopeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("left"), value: z.string() }),
  z.object({ kind: z.literal("right"), value: z.unknown() }),
]);

export const CheckResultSchema: z.ZodType<Either<string, CheckConfirmation>, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("left"), value: z.string() }),
    z.object({ kind: z.literal("right"), value: CheckConfirmationSchema }),
  ]);

export const CommitResultSchema: z.ZodType<
  Either<string, CommitAcknowledgment>,
  z.ZodTypeDef,
  unknown
> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("left"), value: z.string() }),
  z.object({ kind: z.literal("right"), value: CommitAcknowledgmentSchema }),
]);

/** Per-addrid answers of a batch double-spend check. */
export const CheckBatchResultSchema = z.array(
  z.object({ addrId: AddrIdSchema, result: CheckResultSchema }),
);

/** Schema for methods whose success carries no data. */
export const UnitSchema: z.ZodType<null, z.ZodTypeDef, unknown> = z
  .null()
  .or(z.undefined())
  .transform(() => null);

/**
 * Render zod issues as one line for error messages.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
