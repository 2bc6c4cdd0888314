/**
 * Call Wrapping
 *
 * One combinator runs every remote operation. Checks run in a fixed
 * order, and the first failure wins:
 *
 * 1. Transport faults (protocol or result type → protocol_error,
 *    server fault → method_error, deadline → timeout_error)
 * 2. Decoding of the signed envelope, when the operation is signed
 * 3. Verification against the signer's known key → bad_signature
 * 4. Either unwrapping; `left` → method_error with the caller-side prefix
 * 5. Decoding of the payload with the operation's schema → protocol_error
 *
 * Every failure is logged at error level where it is detected and
 * returned as a value. Nothing is retried.
 */

import type { z } from "zod";
import type { Logger } from "pino";
import { verifyWithSignature } from "@mintwire/crypto";
import type { PublicKey } from "@mintwire/types";
import { assertNever } from "@mintwire/types";
import type { NodeContext } from "./config.js";
import type { CallResult, CommunicationError, Signer } from "./errors.js";
import {
  badSignature,
  fail,
  formatCommunicationError,
  methodError,
  ok,
  protocolError,
  timeoutError,
} from "./errors.js";
import { EitherEnvelopeSchema, SignedEnvelopeSchema, describeIssues } from "./schemas.js";
import type { Endpoint, Namespace, Transport } from "./transport.js";
import { TransportError } from "./transport.js";

// =============================================================================
// Context
// =============================================================================

/**
 * Everything a role client needs to issue calls.
 */
export interface RpcContext {
  readonly transport: Transport;
  readonly node: NodeContext;
  readonly logger: Logger;

  /** Uniform source in [0, 1) used to pick an explorer (default: Math.random) */
  readonly random?: () => number;
}

export const CALLER_SIDE_PREFIX = "Error on caller side has occurred: ";

// =============================================================================
// Invoke
// =============================================================================

export interface InvokeOptions<T> {
  readonly endpoint: Endpoint;
  readonly namespace: Namespace;
  readonly method: string;
  readonly params?: readonly unknown[];

  /** Decoder for the final payload */
  readonly result: z.ZodType<T, z.ZodTypeDef, unknown>;

  /** Authority whose signature must cover the answer */
  readonly signedBy?: Signer;

  /** Whether the answer is an application-level Either to unwrap */
  readonly unwrapEither: boolean;

  /** Debug line logged before the call */
  readonly describe: string;

  /** Called with the decoded payload after a successful call */
  readonly onSuccess?: (value: T) => void;
}

export function signerKey(node: NodeContext, signer: Signer): PublicKey {
  switch (signer) {
    case "bank":
      return node.bankPublicKey;
    case "notary":
      return node.notaryPublicKey;
    default:
      return assertNever(signer);
  }
}

export function translateTransportError(error: TransportError): CommunicationError {
  switch (error.kind) {
    case "protocol":
    case "result_type":
      return protocolError(error.message);
    case "server":
      return methodError(error.message);
    case "timeout":
      return timeoutError(error.message);
    default:
      return assertNever(error.kind);
  }
}

/**
 * Log a failure at error level and return it as a call result.
 */
export function reportFailure<T>(logger: Logger, error: CommunicationError): CallResult<T> {
  logger.error({ kind: error.kind }, formatCommunicationError(error));
  return fail(error);
}

export async function invoke<T>(ctx: RpcContext, options: InvokeOptions<T>): Promise<CallResult<T>> {
  const { logger } = ctx;
  const operation = `${options.namespace}.${options.method}`;
  logger.debug(options.describe);

  let payload: unknown;
  try {
    payload = await ctx.transport.call({
      endpoint: options.endpoint,
      namespace: options.namespace,
      method: options.method,
      params: options.params ?? [],
    });
  } catch (error) {
    if (!(error instanceof TransportError)) {
      throw error;
    }
    return reportFailure(logger, translateTransportError(error));
  }

  if (options.signedBy !== undefined) {
    const envelope = SignedEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      return reportFailure(
        logger,
        protocolError(`${operation} did not return a signed envelope: ${describeIssues(envelope.error)}`),
      );
    }
    const signed = { value: envelope.data.value, signature: envelope.data.signature };
    if (!verifyWithSignature(signerKey(ctx.node, options.signedBy), signed)) {
      return reportFailure(logger, badSignature(options.signedBy));
    }
    payload = signed.value;
  }

  if (options.unwrapEither) {
    const either = EitherEnvelopeSchema.safeParse(payload);
    if (!either.success) {
      return reportFailure(
        logger,
        protocolError(`${operation} did not return an Either: ${describeIssues(either.error)}`),
      );
    }
    if (either.data.kind === "left") {
      return reportFailure(logger, methodError(`${CALLER_SIDE_PREFIX}${either.data.value}`));
    }
    payload = either.data.value;
  }

  const decoded = options.result.safeParse(payload);
  if (!decoded.success) {
    return reportFailure(
      logger,
      protocolError(`Unexpected result of ${operation}: ${describeIssues(decoded.error)}`),
    );
  }

  options.onSuccess?.(decoded.data);
  return ok(decoded.data);
}
