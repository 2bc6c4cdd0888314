/**
 * @mintwire/rpc — Typed clients for the bank, mintettes, notary and explorers.
 *
 * Design:
 * - One call combinator: transport faults, signed envelopes, Either
 *   payloads and result decoding are checked in a fixed order
 * - Failures are values (`CallResult<T>`); `orThrow` for exceptions
 * - Roster state is passed in as a snapshot, never cached
 * - Transport is an interface; HttpTransport is the default
 */

// Errors
export {
  protocolError,
  timeoutError,
  methodError,
  badSignature,
  formatCommunicationError,
  ok,
  fail,
  orThrow,
  CommunicationException,
} from "./errors.js";
export type {
  CallResult,
  CommunicationError,
  CommunicationErrorKind,
  Signer,
} from "./errors.js";

// Transport
export { TransportError, formatEndpoint } from "./transport.js";
export type {
  Endpoint,
  Namespace,
  RpcRequest,
  Transport,
  TransportFaultKind,
} from "./transport.js";
export { HttpTransport } from "./http-transport.js";
export type { FetchFn, HttpTransportOptions } from "./http-transport.js";

// Call wrapping
export {
  invoke,
  signerKey,
  translateTransportError,
  reportFailure,
  CALLER_SIDE_PREFIX,
} from "./call.js";
export type { InvokeOptions, RpcContext } from "./call.js";

// Configuration & logging
export { ConfigSchema, loadConfig, toNodeContext } from "./config.js";
export type { NodeContext, RpcConfig } from "./config.js";
export { createLogger } from "./logger.js";

// Wire schemas
export {
  HashSchema,
  SignatureSchema,
  PeriodIdSchema,
  CoinSchema,
  AddrIdSchema,
  TransactionSchema,
  TxSignatureSchema,
  MintetteSchema,
  ExplorerSchema,
  MintetteHeadSchema,
  CheckConfirmationSchema,
  CheckConfirmationEntrySchema,
  CommitAcknowledgmentSchema,
  ActionLogSchema,
  UtxoSchema,
  HBlockSchema,
  LBlockSchema,
  PeriodResultSchema,
  CompleteMSAddressSchema,
  MSAllocationEntrySchema,
  SignedEnvelopeSchema,
  EitherEnvelopeSchema,
  CheckResultSchema,
  CommitResultSchema,
  CheckBatchResultSchema,
  UnitSchema,
  describeIssues,
} from "./schemas.js";

// Role clients
export { BankClient, heightRange } from "./clients/bank.js";
export { MintetteClient } from "./clients/mintette.js";
export type { CheckRequestEntry, CheckBatchResult } from "./clients/mintette.js";
export { NotaryClient } from "./clients/notary.js";
export { ExplorerClient } from "./clients/explorer.js";
export { LedgerClient, createLedgerClient } from "./client.js";
export type { CreateLedgerClientOptions } from "./client.js";
