/**
 * Logger construction: JSON lines by default, pretty-printed in development.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { RpcConfig } from "./config.js";

export function createLogger(config: Pick<RpcConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    name: "mintwire",
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
