// This module defines the client configuration value and its environment loader.

import { z } from 'zod';
import { JsonRpcClientError } from '../utils/errors.js';

/**
 * Configuration read synchronously on every validation.
 *
 * A client holds its config by reference, so flipping `validate` on a live
 * client affects the next call.
 */
export interface ClientConfig {
  validate: boolean;
}

export interface EnvironmentConfig {
  client: ClientConfig;
  httpTimeoutMs: number;
  logLevel: string;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

const booleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const environmentSchema = z.object({
  JSONRPC_VALIDATE: booleanFlagSchema.optional(),
  JSONRPC_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()
});

// This helper builds a fresh config value with validation on unless overridden.
export function createClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return {
    validate: overrides.validate ?? true
  };
}

// This function parses supported environment variables and raises a controlled error on bad values.
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new JsonRpcClientError('invalid_config', `Invalid client configuration in: ${fields}`, {
      details: parsed.error.issues
    });
  }

  return {
    client: createClientConfig({ validate: parsed.data.JSONRPC_VALIDATE }),
    httpTimeoutMs: parsed.data.JSONRPC_HTTP_TIMEOUT_MS ?? DEFAULT_HTTP_TIMEOUT_MS,
    logLevel: parsed.data.LOG_LEVEL ?? 'info'
  };
}
