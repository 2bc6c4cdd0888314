/**
 * Configuration
 *
 * Loads and validates client configuration from environment variables
 * using Zod. The bank and notary public keys are the fixed authorities
 * every signed answer is verified against.
 */

import { z } from "zod";
import { KeySchema } from "@mintwire/strategy";
import type { PublicKey } from "@mintwire/types";
import type { Endpoint } from "./transport.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Bank
  BANK_HOST: z.string().min(1).default("127.0.0.1"),
  BANK_PORT: z.coerce.number().int().min(1).max(65535).default(8123),
  BANK_PUBLIC_KEY: KeySchema,

  // Notary
  NOTARY_HOST: z.string().min(1).default("127.0.0.1"),
  NOTARY_PORT: z.coerce.number().int().min(1).max(65535).default(4001),
  NOTARY_PUBLIC_KEY: KeySchema,

  // Transport
  CALL_TIMEOUT_MS: z.coerce.number().int().min(1).default(10000),
});

export type RpcConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Node Context
// =============================================================================

/**
 * Where the bank and notary live and which keys they sign with.
 */
export interface NodeContext {
  readonly bankEndpoint: Endpoint;
  readonly notaryEndpoint: Endpoint;
  readonly bankPublicKey: PublicKey;
  readonly notaryPublicKey: PublicKey;
}

export function toNodeContext(config: RpcConfig): NodeContext {
  return {
    bankEndpoint: { host: config.BANK_HOST, port: config.BANK_PORT },
    notaryEndpoint: { host: config.NOTARY_HOST, port: config.NOTARY_PORT },
    bankPublicKey: config.BANK_PUBLIC_KEY,
    notaryPublicKey: config.NOTARY_PUBLIC_KEY,
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): RpcConfig {
  return ConfigSchema.parse(env);
}
