/**
 * Transport
 *
 * The call primitive every role client is built on. A transport moves
 * `{ namespace, method, params }` to an endpoint and returns the raw
 * decoded result. It knows nothing about signatures or Either payloads.
 *
 * Faults are thrown as TransportError; the call layer translates them
 * into CommunicationError values.
 */

// =============================================================================
// Requests
// =============================================================================

export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/** Method namespaces, one per role plus the diagnostic dump namespace. */
export type Namespace = "bank" | "mintette" | "notary" | "explorer" | "dump";

export interface RpcRequest {
  readonly endpoint: Endpoint;
  readonly namespace: Namespace;
  readonly method: string;
  readonly params: readonly unknown[];
}

export interface Transport {
  /**
   * Issue one request and resolve with the undecoded result.
   *
   * @throws {TransportError} on any transport-level fault
   */
  call(request: RpcRequest): Promise<unknown>;
}

// =============================================================================
// Faults
// =============================================================================

/**
 * - protocol: the message could not be delivered or decoded
 * - result_type: a response arrived without a result of the expected shape
 * - server: the remote side reported an execution fault
 * - timeout: no response before the deadline
 */
export type TransportFaultKind = "protocol" | "result_type" | "server" | "timeout";

export class TransportError extends Error {
  public readonly kind: TransportFaultKind;

  constructor(kind: TransportFaultKind, message: string) {
    super(message);
    this.name = "TransportError";
    this.kind = kind;
  }
}

export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}
