/**
 * Ledger Client
 *
 * Groups the role clients behind one object:
 * client.bank, client.mintette, client.notary, client.explorer.
 */

import type { Logger } from "pino";
import type { RpcContext } from "./call.js";
import { BankClient } from "./clients/bank.js";
import { ExplorerClient } from "./clients/explorer.js";
import { MintetteClient } from "./clients/mintette.js";
import { NotaryClient } from "./clients/notary.js";
import { loadConfig, toNodeContext } from "./config.js";
import type { FetchFn } from "./http-transport.js";
import { HttpTransport } from "./http-transport.js";
import { createLogger } from "./logger.js";
import { formatEndpoint } from "./transport.js";

export class LedgerClient {
  public readonly bank: BankClient;
  public readonly mintette: MintetteClient;
  public readonly notary: NotaryClient;
  public readonly explorer: ExplorerClient;

  constructor(ctx: RpcContext) {
    this.bank = new BankClient(ctx);
    this.mintette = new MintetteClient(ctx);
    this.notary = new NotaryClient(ctx);
    this.explorer = new ExplorerClient(ctx);
  }
}

export interface CreateLedgerClientOptions {
  /** Use this logger instead of one built from LOG_LEVEL / NODE_ENV */
  readonly logger?: Logger;

  /** Custom fetch function (for testing) */
  readonly fetchFn?: FetchFn;
}

/**
 * Build a client over HTTP from environment variables.
 *
 * @throws {z.ZodError} if the environment is invalid
 */
export function createLedgerClient(
  env: Record<string, string | undefined> = process.env,
  options: CreateLedgerClientOptions = {},
): LedgerClient {
  const config = loadConfig(env);
  const logger = options.logger ?? createLogger(config);
  const transport = new HttpTransport({
    timeoutMs: config.CALL_TIMEOUT_MS,
    fetchFn: options.fetchFn,
  });
  const node = toNodeContext(config);
  logger.debug(
    { bank: formatEndpoint(node.bankEndpoint), notary: formatEndpoint(node.notaryEndpoint) },
    "Ledger client configured",
  );
  return new LedgerClient({ transport, node, logger });
}
