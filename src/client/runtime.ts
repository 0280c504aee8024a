// This module builds a ready HTTP-backed client from environment configuration.

import type { Logger } from 'pino';
import { loadClientConfig } from '../config/client-config.js';
import { HttpTransport } from '../http/transport.js';
import type { IdGenerator } from '../jsonrpc/ids.js';
import { createLogger } from '../utils/logger.js';
import { JsonRpcClient } from './client.js';

export interface HttpClientOptions {
  env?: NodeJS.ProcessEnv;
  headers?: Record<string, string>;
  logger?: Logger;
  ids?: IdGenerator;
}

// This factory wires env config, logger and HTTP transport into one client for `url`.
export function createHttpClient(url: string, options: HttpClientOptions = {}): JsonRpcClient {
  const environment = loadClientConfig(options.env);
  const logger = options.logger ?? createLogger({ level: environment.logLevel });

  logger.debug(
    {
      event: 'jsonrpc_http_client_built',
      url,
      validate: environment.client.validate,
      timeoutMs: environment.httpTimeoutMs
    },
    'jsonrpc_http_client_built'
  );

  const transport = new HttpTransport({
    url,
    headers: options.headers,
    timeoutMs: environment.httpTimeoutMs,
    logger
  });

  return new JsonRpcClient({
    transport,
    config: environment.client,
    logger,
    ids: options.ids
  });
}
