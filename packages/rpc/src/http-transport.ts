/**
 * HTTP Transport
 *
 * Carries RPC requests as JSON over HTTP POST to `http://host:port/rpc`.
 *
 * Wire format:
 * - request body: `{ namespace, method, params }`
 * - success body: `{ result }`
 * - failure body: `{ error: { message } }`
 *
 * Design:
 * - Native fetch, replaceable through `fetchFn` for tests
 * - AbortController deadline per call
 * - No retries; a timeout is reported to the caller
 */

import { z } from "zod";
import type { RpcRequest, Transport } from "./transport.js";
import { TransportError, formatEndpoint } from "./transport.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  /** Per-call deadline in milliseconds (default: 10000) */
  readonly timeoutMs?: number;

  /** Custom fetch function (for testing) */
  readonly fetchFn?: FetchFn;
}

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class HttpTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  async call(request: RpcRequest): Promise<unknown> {
    const url = `http://${formatEndpoint(request.endpoint)}/rpc`;
    const target = `${request.namespace}.${request.method} at ${formatEndpoint(request.endpoint)}`;

    const { status, text } = await this.post(url, target, {
      namespace: request.namespace,
      method: request.method,
      params: request.params,
    });

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new TransportError(
        "protocol",
        `Malformed response from ${target}: ${describeFailure(error)}`,
      );
    }

    const errorBody = ErrorBodySchema.safeParse(body);
    if (errorBody.success) {
      throw new TransportError("server", errorBody.data.error.message);
    }

    if (status < 200 || status >= 300) {
      throw new TransportError("protocol", `HTTP ${status} from ${target}`);
    }

    if (typeof body !== "object" || body === null || !("result" in body)) {
      throw new TransportError("result_type", `Response from ${target} carries no result`);
    }

    return body.result;
  }

  /**
   * POST a JSON body and read the response text under one deadline.
   */
  private async post(
    url: string,
    target: string,
    payload: unknown,
  ): Promise<{ status: number; text: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      return { status: response.status, text: await response.text() };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportError(
          "timeout",
          `Call to ${target} timed out after ${this.timeoutMs}ms`,
        );
      }
      throw new TransportError("protocol", `Call to ${target} failed: ${describeFailure(error)}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
