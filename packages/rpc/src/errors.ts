/**
 * Communication Errors
 *
 * Closed taxonomy of the ways a remote call can fail. Failures travel
 * as values (`CallResult<T>`); callers that prefer exceptions use
 * `orThrow`.
 *
 * - protocol_error: undecodable message or result-shape mismatch
 * - timeout_error: no answer within the transport deadline
 * - method_error: the remote method reported a failure, or a local
 *   precondition failed before any call was issued
 * - bad_signature: a decoded answer failed verification against the
 *   named authority key
 */

import { assertNever } from "@mintwire/types";

// =============================================================================
// Error Values
// =============================================================================

/** Authorities whose answers are verified against a known key. */
export type Signer = "bank" | "notary";

export type CommunicationError =
  | { readonly kind: "protocol_error"; readonly message: string }
  | { readonly kind: "timeout_error"; readonly message: string }
  | { readonly kind: "method_error"; readonly message: string }
  | { readonly kind: "bad_signature"; readonly signer: Signer };

export type CommunicationErrorKind = CommunicationError["kind"];

export function protocolError(message: string): CommunicationError {
  return { kind: "protocol_error", message };
}

export function timeoutError(message: string): CommunicationError {
  return { kind: "timeout_error", message };
}

export function methodError(message: string): CommunicationError {
  return { kind: "method_error", message };
}

export function badSignature(signer: Signer): CommunicationError {
  return { kind: "bad_signature", signer };
}

export function formatCommunicationError(error: CommunicationError): string {
  switch (error.kind) {
    case "protocol_error":
      return `internal error: ${error.message}`;
    case "timeout_error":
      return `timeout error: ${error.message}`;
    case "method_error":
      return `method error: ${error.message}`;
    case "bad_signature":
      return `${error.signer} has provided a bad signature`;
    default:
      return assertNever(error);
  }
}

// =============================================================================
// Call Results
// =============================================================================

export type CallResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: CommunicationError };

export function ok<T>(value: T): CallResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: CommunicationError): CallResult<T> {
  return { ok: false, error };
}

// =============================================================================
// Exceptions
// =============================================================================

/**
 * A CommunicationError raised as an exception.
 */
export class CommunicationException extends Error {
  public readonly error: CommunicationError;

  constructor(error: CommunicationError) {
    super(formatCommunicationError(error));
    this.name = "CommunicationException";
    this.error = error;
  }
}

/**
 * Unwrap a call result, throwing CommunicationException on failure.
 */
export function orThrow<T>(result: CallResult<T>): T {
  if (!result.ok) {
    throw new CommunicationException(result.error);
  }
  return result.value;
}
