/**
 * Notary Client
 *
 * Multisignature allocation and partial-signature collection. Every
 * Notary answer is an Either; read methods are additionally signed by
 * the notary and verified against the configured notary key.
 */

import { z } from "zod";
import { mkWithSignature } from "@mintwire/crypto";
import {
  formatAllocationAddress,
  formatAllocationStrategy,
  formatPartyAddress,
} from "@mintwire/strategy";
import type {
  Address,
  AddressStrategyEntry,
  AllocationAddress,
  AllocationStrategy,
  HBlock,
  MasterKeyCertificate,
  MSAddress,
  MSAllocationEntry,
  PartyAddress,
  PeriodId,
  SecretKey,
  Signature,
  Transaction,
  TxSignature,
} from "@mintwire/types";
import type { RpcContext } from "../call.js";
import { invoke } from "../call.js";
import type { CallResult } from "../errors.js";
import {
  CompleteMSAddressSchema,
  MSAllocationEntrySchema,
  PeriodIdSchema,
  TransactionSchema,
  TxSignatureSchema,
  UnitSchema,
} from "../schemas.js";

const TxSignaturesSchema = z.array(TxSignatureSchema);
const TransactionsSchema = z.array(TransactionSchema);
const CompleteMSAddressesSchema = z.array(CompleteMSAddressSchema);
const MSAllocationsSchema = z.array(MSAllocationEntrySchema);

export class NotaryClient {
  private readonly ctx: RpcContext;

  constructor(ctx: RpcContext) {
    this.ctx = ctx;
  }

  /**
   * Register one party's consent to a multisignature address.
   *
   * `signature` is the party's signature over `{ msAddress, strategy }`;
   * a trusted party also passes the certificate of its hot key.
   */
  async allocateMultisignatureAddress(
    msAddress: MSAddress,
    party: PartyAddress,
    strategy: AllocationStrategy,
    signature: Signature,
    masterCheck: MasterKeyCertificate | null,
  ): Promise<CallResult<null>> {
    const { logger } = this.ctx;
    logger.debug(
      { masterKey: masterCheck?.masterKey ?? null },
      `Allocate new ms address ${msAddress} from party ${formatPartyAddress(party)}, ` +
        `strategy ${formatAllocationStrategy(strategy)}`,
    );
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "allocateMultisig",
      params: [msAddress, party, strategy, signature, masterCheck],
      result: UnitSchema,
      unwrapEither: true,
      describe: "Sending multisignature allocation to Notary",
    });
  }

  /**
   * Forward the blocks of the periods the notary missed, signed with
   * the bank key.
   */
  async announceNewPeriodsToNotary(
    bankSk: SecretKey,
    lastPeriodId: PeriodId,
    blocks: readonly HBlock[],
  ): Promise<CallResult<null>> {
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "announceNewPeriodsToNotary",
      params: [mkWithSignature(bankSk, { periodId: lastPeriodId, blocks })],
      result: UnitSchema,
      unwrapEither: true,
      describe: `Announce ${blocks.length} new periods to Notary, latest periodId ${lastPeriodId}`,
    });
  }

  async getNotaryPeriod(): Promise<CallResult<PeriodId>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "getNotaryPeriod",
      result: PeriodIdSchema,
      signedBy: "notary",
      unwrapEither: true,
      describe: "Getting period of Notary",
      onSuccess: (periodId) => logger.debug(`Notary's last period is ${periodId}`),
    });
  }

  /** Signatures the notary holds for `tx` spending from `address`. */
  async getTxSignatures(
    tx: Transaction,
    address: Address,
  ): Promise<CallResult<readonly TxSignature[]>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "getSignatures",
      params: [tx, address],
      result: TxSignaturesSchema,
      signedBy: "notary",
      unwrapEither: true,
      describe: `Getting signatures for tx spending from ${address}`,
      onSuccess: (signatures) =>
        logger.debug(`Received ${signatures.length} signatures from Notary`),
    });
  }

  /** Transactions waiting for a signature from any of `parties`. */
  async pollPendingTransactions(
    parties: readonly Address[],
  ): Promise<CallResult<readonly Transaction[]>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "pollPendingTransactions",
      params: [parties],
      result: TransactionsSchema,
      signedBy: "notary",
      unwrapEither: true,
      describe: `Polling transactions to sign for ${parties.length} addresses`,
      onSuccess: (txs) => logger.debug(`Received ${txs.length} transactions to sign`),
    });
  }

  /**
   * Add one party's signature to `tx`; answers with every signature
   * collected so far.
   */
  async publishTxToNotary(
    tx: Transaction,
    address: Address,
    signature: TxSignature,
  ): Promise<CallResult<readonly TxSignature[]>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "publishTransaction",
      params: [tx, address, signature],
      result: TxSignaturesSchema,
      signedBy: "notary",
      unwrapEither: true,
      describe: `Sending signature of ${signature.address} to Notary`,
      onSuccess: (signatures) =>
        logger.debug(`Received ${signatures.length} signatures from Notary`),
    });
  }

  async queryNotaryCompleteMSAddresses(): Promise<CallResult<readonly AddressStrategyEntry[]>> {
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "queryCompleteMS",
      result: CompleteMSAddressesSchema,
      signedBy: "notary",
      unwrapEither: true,
      describe: "Querying Notary complete MS addresses",
    });
  }

  /** Pending allocations `party` takes part in. */
  async queryNotaryMyMSAllocations(
    party: AllocationAddress,
  ): Promise<CallResult<readonly MSAllocationEntry[]>> {
    const { logger } = this.ctx;
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "queryMyAllocMS",
      params: [party],
      result: MSAllocationsSchema,
      signedBy: "notary",
      unwrapEither: true,
      describe: `Calling Notary for MS addresses of ${formatAllocationAddress(party)}`,
      onSuccess: (entries) => logger.debug(`Retrieved ${entries.length} allocations from Notary`),
    });
  }

  /**
   * Drop completed addresses from the notary; `signature` covers the
   * address list.
   */
  async removeNotaryCompleteMSAddresses(
    addresses: readonly Address[],
    signature: Signature,
  ): Promise<CallResult<null>> {
    return invoke(this.ctx, {
      endpoint: this.ctx.node.notaryEndpoint,
      namespace: "notary",
      method: "removeCompleteMS",
      params: [addresses, signature],
      result: UnitSchema,
      unwrapEither: true,
      describe: "Removing Notary complete MS addresses",
    });
  }
}
