/**
 * Mintette Client
 *
 * Double-spend checks, commits and period hand-over with a single
 * mintette, plus the diagnostic dump methods.
 *
 * Design:
 * - Mintette answers are not signed; the channel is trusted
 * - Check and commit return the mintette's Either as a value, so a
 *   refusal is data rather than a failed call
 * - Dump methods address mintettes by index in a roster snapshot and
 *   fail locally, without a call, when the index is out of range
 */

import { mkWithSignature } from "@mintwire/crypto";
import { addrIdKey } from "@mintwire/types";
import type {
  ActionLog,
  AddrId,
  AddrIdKey,
  CheckConfirmation,
  CheckConfirmations,
  CommitAcknowledgment,
  Either,
  Mintette,
  MintetteId,
  NewPeriodData,
  PeriodId,
  PeriodResult,
  SecretKey,
  Transaction,
  TxSignature,
  Utxo,
} from "@mintwire/types";
import type { RpcContext } from "../call.js";
import { invoke } from "../call.js";
import type { CallResult } from "../errors.js";
import { fail, methodError, ok } from "../errors.js";
import {
  ActionLogSchema,
  CheckBatchResultSchema,
  CheckResultSchema,
  CommitResultSchema,
  PeriodIdSchema,
  PeriodResultSchema,
  UnitSchema,
  UtxoSchema,
} from "../schemas.js";
import { formatEndpoint } from "../transport.js";

// =============================================================================
// Types
// =============================================================================

/** Signatures offered for one input of a transaction. */
export interface CheckRequestEntry {
  readonly addrId: AddrId;
  readonly signatures: readonly TxSignature[];
}

export type CheckBatchResult = ReadonlyMap<AddrIdKey, Either<string, CheckConfirmation>>;

const CheckBatchMapSchema = CheckBatchResultSchema.transform(
  (entries) =>
    new Map<AddrIdKey, Either<string, CheckConfirmation>>(
      entries.map((e) => [addrIdKey(e.addrId), e.result]),
    ),
);

const MaybePeriodIdSchema = PeriodIdSchema.nullable();
const MaybeActionLogSchema = ActionLogSchema.nullable();

// =============================================================================
// Client
// =============================================================================

export class MintetteClient {
  private readonly ctx: RpcContext;

  constructor(ctx: RpcContext) {
    this.ctx = ctx;
  }

  /**
   * Hand a mintette the data of a new period, signed with the bank key.
   */
  async announceNewPeriod(
    mintette: Mintette,
    bankSk: SecretKey,
    data: NewPeriodData,
  ): Promise<CallResult<null>> {
    return invoke(this.ctx, {
      endpoint: mintette,
      namespace: "mintette",
      method: "announceNewPeriod",
      params: [mkWithSignature(bankSk, data)],
      result: UnitSchema,
      unwrapEither: true,
      describe: `Announce new period ${data.periodId} to mintette ${formatEndpoint(mintette)}`,
    });
  }

  async checkNotDoubleSpent(
    mintette: Mintette,
    tx: Transaction,
    addrId: AddrId,
    signatures: readonly TxSignature[],
  ): Promise<CallResult<Either<string, CheckConfirmation>>> {
    const { logger } = this.ctx;
    const key = addrIdKey(addrId);
    return invoke(this.ctx, {
      endpoint: mintette,
      namespace: "mintette",
      method: "checkTx",
      params: [tx, addrId, signatures],
      result: CheckResultSchema,
      unwrapEither: false,
      describe: `Checking addrid (${key}) of a transaction`,
      onSuccess: (answer) => {
        if (answer.kind === "left") {
          logger.error(`Checking double spending failed: ${answer.value}`);
        } else {
          logger.debug({ head: answer.value.head }, `Confirmed addrid (${key})`);
        }
      },
    });
  }

  /**
   * Check several inputs of one transaction in a single call. Each addrid
   * gets its own answer; one refused input does not fail the batch.
   */
  async checkNotDoubleSpentBatch(
    mintette: Mintette,
    tx: Transaction,
    entries: readonly CheckRequestEntry[],
  ): Promise<CallResult<CheckBatchResult>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: mintette,
      namespace: "mintette",
      method: "checkTxBatch",
      params: [tx, entries],
      result: CheckBatchMapSchema,
      unwrapEither: true,
      describe: `Checking addrids (${entries.map((e) => addrIdKey(e.addrId)).join(", ")}) of a transaction`,
      onSuccess: (answers) => {
        const refused = [...answers.values()].filter((a) => a.kind === "left").length;
        logger.debug({ checked: answers.size, refused }, "Confirmed signatures of a transaction");
      },
    });
  }

  async commitTx(
    mintette: Mintette,
    tx: Transaction,
    confirmations: CheckConfirmations,
  ): Promise<CallResult<Either<string, CommitAcknowledgment>>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: mintette,
      namespace: "mintette",
      method: "commitTx",
      params: [tx, confirmations],
      result: CommitResultSchema,
      unwrapEither: false,
      describe: `Commit transaction with ${tx.inputs.length} inputs`,
      onSuccess: (answer) => {
        if (answer.kind === "left") {
          logger.error(`Commit tx failed: ${answer.value}`);
        } else {
          logger.debug("Successfully committed transaction");
        }
      },
    });
  }

  /**
   * Close a period on a mintette and collect its blocks and action log.
   */
  async sendPeriodFinished(
    mintette: Mintette,
    bankSk: SecretKey,
    periodId: PeriodId,
  ): Promise<CallResult<PeriodResult>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: mintette,
      namespace: "mintette",
      method: "periodFinished",
      params: [mkWithSignature(bankSk, periodId)],
      result: PeriodResultSchema,
      unwrapEither: true,
      describe: `Send period ${periodId} finished to mintette ${formatEndpoint(mintette)}`,
      onSuccess: (result) =>
        logger.debug(
          { blocks: result.blocks.length, logEntries: result.actionLog.length },
          `Received period result from mintette ${formatEndpoint(mintette)}`,
        ),
    });
  }

  /** The period a mintette is in, or null if it has none yet. */
  async getMintettePeriod(mintette: Mintette): Promise<CallResult<PeriodId | null>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: mintette,
      namespace: "mintette",
      method: "getMintettePeriod",
      result: MaybePeriodIdSchema,
      unwrapEither: true,
      describe: `Getting mintette period from mintette ${formatEndpoint(mintette)}`,
      onSuccess: (periodId) => {
        if (periodId === null) {
          logger.error(`getMintettePeriod failed for mintette ${formatEndpoint(mintette)}`);
        } else {
          logger.debug(`Successfully got the period: ${periodId}`);
        }
      },
    });
  }

  // ===========================================================================
  // Diagnostics
  // ===========================================================================

  async getMintetteLogs(
    mintettes: readonly Mintette[],
    mintetteId: MintetteId,
    periodId: PeriodId,
  ): Promise<CallResult<ActionLog | null>> {
    const { logger } = this.ctx;
    const target = this.lookup(mintettes, mintetteId);
    if (!target.ok) return target;

    return invoke(this.ctx, {
      endpoint: target.value,
      namespace: "dump",
      method: "getMintetteLogs",
      params: [periodId],
      result: MaybeActionLogSchema,
      unwrapEither: true,
      describe: `Getting logs of mintette ${mintetteId} with period id ${periodId}`,
      onSuccess: (log) => {
        if (log === null) {
          logger.warn(`Getting logs of mintette ${mintetteId} with period id ${periodId} failed`);
        } else {
          logger.debug(`Successfully got ${log.length} log entries for period id ${periodId}`);
        }
      },
    });
  }

  async getMintetteUtxo(
    mintettes: readonly Mintette[],
    mintetteId: MintetteId,
  ): Promise<CallResult<Utxo>> {
    const { logger } = this.ctx;
    const target = this.lookup(mintettes, mintetteId);
    if (!target.ok) return target;

    return invoke(this.ctx, {
      endpoint: target.value,
      namespace: "dump",
      method: "getMintetteUtxo",
      result: UtxoSchema,
      unwrapEither: true,
      describe: `Getting utxo of mintette ${mintetteId}`,
      onSuccess: (utxo) => logger.debug(`Current utxo has ${utxo.length} entries`),
    });
  }

  private lookup(mintettes: readonly Mintette[], mintetteId: MintetteId): CallResult<Mintette> {
    const mintette = mintettes[mintetteId];
    if (mintette === undefined) {
      const message = `Mintette with index ${mintetteId} doesn't exist`;
      this.ctx.logger.warn(message);
      return fail(methodError(message));
    }
    return ok(mintette);
  }
}
