/**
 * Bank Client
 *
 * Queries the bank's authoritative state. Every getter answer is signed
 * by the bank and verified against the configured bank key before it is
 * decoded.
 */

import { z } from "zod";
import { mkWithSignature } from "@mintwire/crypto";
import { AddressStrategyMapSchema } from "@mintwire/strategy";
import type {
  AddressToTxStrategyMap,
  BankControlCommand,
  Explorer,
  HBlock,
  Mintette,
  PeriodId,
  RosterSnapshot,
  SecretKey,
} from "@mintwire/types";
import type { RpcContext } from "../call.js";
import { invoke, reportFailure } from "../call.js";
import type { CallResult } from "../errors.js";
import { methodError, ok } from "../errors.js";
import {
  ExplorerSchema,
  HBlockSchema,
  MintetteSchema,
  PeriodIdSchema,
  UnitSchema,
} from "../schemas.js";

const MintettesSchema = z.array(MintetteSchema);
const ExplorersSchema = z.array(ExplorerSchema);
const HBlocksSchema = z.array(HBlockSchema);

/** Inclusive list of heights; empty when `from > to`. */
export function heightRange(from: PeriodId, to: PeriodId): PeriodId[] {
  const heights: PeriodId[] = [];
  for (let h = from; h <= to; h++) {
    heights.push(h);
  }
  return heights;
}

export class BankClient {
  private readonly ctx: RpcContext;

  constructor(ctx: RpcContext) {
    this.ctx = ctx;
  }

  /**
   * Send an administrative command, signed with the bank's own key.
   */
  async sendBankLocalControlRequest(
    bankSk: SecretKey,
    command: BankControlCommand,
  ): Promise<CallResult<null>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.bankEndpoint,
      namespace: "bank",
      method: "localControlRequest",
      params: [mkWithSignature(bankSk, command)],
      result: UnitSchema,
      unwrapEither: true,
      describe: `Sending control request to bank: ${command.kind}`,
      onSuccess: () => logger.debug("Sent control request successfully"),
    });
  }

  async getAddresses(): Promise<CallResult<AddressToTxStrategyMap>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.bankEndpoint,
      namespace: "bank",
      method: "getAddresses",
      result: AddressStrategyMapSchema,
      signedBy: "bank",
      unwrapEither: true,
      describe: "Getting list of addresses",
      onSuccess: (addresses) =>
        logger.debug({ count: addresses.size }, "Successfully got list of addresses"),
    });
  }

  async getMintettes(): Promise<CallResult<readonly Mintette[]>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.bankEndpoint,
      namespace: "bank",
      method: "getMintettes",
      result: MintettesSchema,
      signedBy: "bank",
      unwrapEither: true,
      describe: "Getting list of mintettes",
      onSuccess: (mintettes) =>
        logger.debug({ mintettes }, "Successfully got list of mintettes"),
    });
  }

  async getExplorers(): Promise<CallResult<readonly Explorer[]>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.bankEndpoint,
      namespace: "bank",
      method: "getExplorers",
      result: ExplorersSchema,
      signedBy: "bank",
      unwrapEither: true,
      describe: "Getting list of explorers",
      onSuccess: (explorers) =>
        logger.debug({ explorers }, "Successfully got list of explorers"),
    });
  }

  async getBlockchainHeight(): Promise<CallResult<PeriodId>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.bankEndpoint,
      namespace: "bank",
      method: "getBlockchainHeight",
      result: PeriodIdSchema,
      signedBy: "bank",
      unwrapEither: true,
      describe: "Getting blockchain height",
      onSuccess: (height) => logger.debug(`Blockchain height is ${height}`),
    });
  }

  async getStatisticsId(): Promise<CallResult<number>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.bankEndpoint,
      namespace: "bank",
      method: "getStatisticsId",
      result: z.number().int(),
      signedBy: "bank",
      unwrapEither: true,
      describe: "Getting statistics id",
      onSuccess: (id) => logger.debug(`Statistics id is ${id}`),
    });
  }

  /**
   * Higher-level blocks with heights `from..to` inclusive. The range is
   * clamped to the chain tip first, so asking past it gives a short
   * answer; a range that clamps to nothing gives no blocks and no call.
   */
  async getBlocksByHeight(from: PeriodId, to: PeriodId): Promise<CallResult<readonly HBlock[]>> {
    const { logger } = this.ctx;
    if (!Number.isSafeInteger(from) || !Number.isSafeInteger(to)) {
      return reportFailure(
        logger,
        methodError(`Block heights must be integers, got ${from} and ${to}`),
      );
    }
    const lower = Math.max(from, 0);
    if (lower > to) return ok([]);

    const tip = await this.getBlockchainHeight();
    if (!tip.ok) return tip;
    const upper = Math.min(to, tip.value);
    if (lower > upper) return ok([]);

    return invoke(this.ctx, {
      endpoint: this.ctx.node.bankEndpoint,
      namespace: "bank",
      method: "getHBlocks",
      params: [heightRange(lower, upper)],
      result: HBlocksSchema,
      signedBy: "bank",
      unwrapEither: true,
      describe: `Getting higher-level blocks between ${lower} and ${upper}`,
      onSuccess: (blocks) =>
        logger.debug(`Got ${blocks.length} higher-level blocks between ${lower} and ${upper}`),
    });
  }

  async getBlockByHeight(height: PeriodId): Promise<CallResult<HBlock>> {
    const { logger } = this.ctx;
    const result = await invoke(this.ctx, {
      endpoint: this.ctx.node.bankEndpoint,
      namespace: "bank",
      method: "getHBlocks",
      params: [[height]],
      result: HBlocksSchema,
      signedBy: "bank",
      unwrapEither: true,
      describe: `Getting block with height ${height}`,
    });
    if (!result.ok) return result;

    const block = result.value[0];
    if (block === undefined) {
      return reportFailure(logger, methodError(`Block with height ${height} doesn't exist`));
    }
    logger.debug({ hash: block.hash }, `Successfully got block with height ${height}`);
    return ok(block);
  }

  async getGenesisBlock(): Promise<CallResult<HBlock>> {
    return this.getBlockByHeight(0);
  }

  /**
   * Fetch mintettes and explorers once, for operations that must agree
   * on a single roster.
   */
  async getRosterSnapshot(): Promise<CallResult<RosterSnapshot>> {
    const mintettes = await this.getMintettes();
    if (!mintettes.ok) return mintettes;
    const explorers = await this.getExplorers();
    if (!explorers.ok) return explorers;
    return ok({ mintettes: mintettes.value, explorers: explorers.value });
  }
}
