/**
 * In-process Transport stand-in: records every request and answers
 * from handlers registered per `namespace.method`.
 */

import type { RpcRequest, Transport } from "../../src/transport.js";
import { TransportError } from "../../src/transport.js";

export type Handler = (request: RpcRequest) => unknown;

export class FakeTransport implements Transport {
  readonly calls: RpcRequest[] = [];
  private readonly handlers = new Map<string, Handler>();

  on(namespace: RpcRequest["namespace"], method: string, handler: Handler): this {
    this.handlers.set(`${namespace}.${method}`, handler);
    return this;
  }

  /** Answer every call to `namespace.method` with `result`. */
  reply(namespace: RpcRequest["namespace"], method: string, result: unknown): this {
    return this.on(namespace, method, () => result);
  }

  /** Fail every call to `namespace.method` with a transport fault. */
  fault(
    namespace: RpcRequest["namespace"],
    method: string,
    kind: TransportError["kind"],
    message: string,
  ): this {
    return this.on(namespace, method, () => {
      throw new TransportError(kind, message);
    });
  }

  async call(request: RpcRequest): Promise<unknown> {
    this.calls.push(request);
    const key = `${request.namespace}.${request.method}`;
    const handler = this.handlers.get(key);
    if (handler === undefined) {
      throw new TransportError("server", `No handler for ${key}`);
    }
    return handler(request);
  }
}
