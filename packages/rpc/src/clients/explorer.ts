/**
 * Explorer Client
 *
 * Explorers index committed blocks for read queries. The bank pushes new
 * blocks to them; readers ask a random one. A failed explorer call is
 * reported as is; no other explorer is tried.
 */

import { mkWithSignature } from "@mintwire/crypto";
import type {
  Explorer,
  HBlock,
  HBlockMetadata,
  PeriodId,
  SecretKey,
  Transaction,
  TransactionId,
  WithMetadata,
} from "@mintwire/types";
import type { RpcContext } from "../call.js";
import { invoke, reportFailure } from "../call.js";
import type { CallResult } from "../errors.js";
import { methodError } from "../errors.js";
import { PeriodIdSchema, TransactionSchema } from "../schemas.js";
import { formatEndpoint } from "../transport.js";

const MaybeTransactionSchema = TransactionSchema.nullable();

export class ExplorerClient {
  private readonly ctx: RpcContext;

  constructor(ctx: RpcContext) {
    this.ctx = ctx;
  }

  /**
   * Push a new block, signed with the bank key. Answers with the period
   * id the explorer reports afterwards.
   */
  async announceNewBlock(
    explorer: Explorer,
    bankSk: SecretKey,
    periodId: PeriodId,
    block: WithMetadata<HBlock, HBlockMetadata>,
  ): Promise<CallResult<PeriodId>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: explorer,
      namespace: "explorer",
      method: "newBlock",
      params: [mkWithSignature(bankSk, { periodId, block })],
      result: PeriodIdSchema,
      unwrapEither: false,
      describe: `Announcing new (${periodId}-th) block to ${formatEndpoint(explorer)}`,
      onSuccess: (reported) =>
        logger.debug(`Received periodId ${reported} from explorer ${formatEndpoint(explorer)}`),
    });
  }

  /**
   * Run `query` against one explorer picked uniformly at random.
   */
  async askExplorer<T>(
    explorers: readonly Explorer[],
    query: (explorer: Explorer) => Promise<CallResult<T>>,
  ): Promise<CallResult<T>> {
    const random = this.ctx.random ?? Math.random;
    const index = Math.min(Math.floor(random() * explorers.length), explorers.length - 1);
    const explorer = explorers[index];
    if (explorer === undefined) {
      return reportFailure(this.ctx.logger, methodError("There are no active explorers"));
    }
    return query(explorer);
  }

  async getTransactionById(
    txId: TransactionId,
    explorer: Explorer,
  ): Promise<CallResult<Transaction | null>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: explorer,
      namespace: "explorer",
      method: "getTransaction",
      params: [txId],
      result: MaybeTransactionSchema,
      unwrapEither: false,
      describe: `Getting transaction by id ${txId}`,
      onSuccess: (tx) =>
        logger.debug(
          tx === null ? `Transaction ${txId} is unknown` : `Successfully got transaction by id ${txId}`,
        ),
    });
  }
}
