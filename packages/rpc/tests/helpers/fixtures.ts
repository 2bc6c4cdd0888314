/**
 * Shared test data: authority keys, a context over a FakeTransport,
 * a log-capturing pino logger and sample ledger payloads.
 */

import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";
import { generateKeyPair, mkWithSignature } from "@mintwire/crypto";
import type { WithSignature } from "@mintwire/crypto";
import { right } from "@mintwire/types";
import type {
  AddrId,
  CheckConfirmation,
  Either,
  Explorer,
  HBlock,
  Mintette,
  SecretKey,
  Transaction,
} from "@mintwire/types";
import type { RpcContext } from "../../src/call.js";
import type { NodeContext } from "../../src/config.js";
import { FakeTransport } from "./fake-transport.js";

// =============================================================================
// Keys & Context
// =============================================================================

export const bankKeys = generateKeyPair();
export const notaryKeys = generateKeyPair();

export const node: NodeContext = {
  bankEndpoint: { host: "bank.test", port: 8123 },
  notaryEndpoint: { host: "notary.test", port: 4001 },
  bankPublicKey: bankKeys.publicKey,
  notaryPublicKey: notaryKeys.publicKey,
};

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

const LogLineSchema = z.object({ level: z.number(), msg: z.string() });

export interface LogEntry {
  readonly level: number;
  readonly msg: string;
}

/**
 * A debug-level logger that keeps every line it writes.
 */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        entries.push(LogLineSchema.parse(JSON.parse(line)));
      },
    },
  );
  return { logger, entries };
}

export interface TestSetup {
  readonly transport: FakeTransport;
  readonly ctx: RpcContext;
  readonly entries: LogEntry[];
}

export function setup(random?: () => number): TestSetup {
  const transport = new FakeTransport();
  const { logger, entries } = captureLogger();
  const ctx: RpcContext =
    random === undefined ? { transport, node, logger } : { transport, node, logger, random };
  return { transport, ctx, entries };
}

/** How the bank and notary answer read methods. */
export function signedRight<T>(secretKey: SecretKey, value: T): WithSignature<Either<string, T>> {
  return mkWithSignature(secretKey, right(value));
}

// =============================================================================
// Sample Payloads
// =============================================================================

export const ALICE = "a1".repeat(32);
export const BOB = "b2".repeat(32);
export const SIG = "5e".repeat(64);

export const addrIdA: AddrId = { txId: "0a".repeat(32), index: 0, coin: { color: 0, amount: 10 } };
export const addrIdB: AddrId = { txId: "0a".repeat(32), index: 1, coin: { color: 0, amount: 5 } };
export const addrIdC: AddrId = { txId: "0c".repeat(32), index: 0, coin: { color: 1, amount: 2 } };

export const tx: Transaction = {
  inputs: [addrIdA, addrIdB],
  outputs: [{ address: BOB, coin: { color: 0, amount: 15 } }],
};

export const block: HBlock = {
  hash: "11".repeat(32),
  prevHash: "00".repeat(32),
  transactions: [tx],
  signature: SIG,
  dpk: [{ publicKey: ALICE, signature: SIG }],
  addresses: [{ address: ALICE, strategy: { kind: "default" } }],
};

export const confirmation: CheckConfirmation = {
  mintetteKey: ALICE,
  mintetteSignature: SIG,
  head: { hash: "22".repeat(32), index: 3 },
  periodId: 4,
};

export const mintettes: readonly Mintette[] = [
  { host: "m0.test", port: 2000 },
  { host: "m1.test", port: 2001 },
  { host: "m2.test", port: 2002 },
];

export const explorers: readonly Explorer[] = [
  { host: "e0.test", port: 3000, key: ALICE },
  { host: "e1.test", port: 3001, key: ALICE },
  { host: "e2.test", port: 3002, key: BOB },
];
