// This module posts serialized JSON-RPC messages over HTTP with a per-request timeout and no retries.

import type { Logger } from 'pino';
import type { Transport } from '../client/transport.js';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../config/client-config.js';
import { ReceivedNon2xxResponseError, TransportError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { formatUserAgent } from '../version.js';

export interface HttpTransportOptions {
  url: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  logger?: Logger;
}

export class HttpTransport implements Transport {
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  public constructor(options: HttpTransportOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': formatUserAgent(),
      ...options.headers
    };
    this.logger = options.logger?.child({
      component: 'http_transport'
    });
  }

  // This helper writes one structured transport event only when a logger is available.
  private log(level: 'debug' | 'warn' | 'error', event: string, details: Record<string, unknown>): void {
    this.logger?.[level](
      {
        event,
        ...details
      },
      event
    );
  }

  public async send(message: string): Promise<string> {
    const abortController = new AbortController();
    const timer = setTimeout(() => abortController.abort(), this.timeoutMs);
    const startedAt = Date.now();

    this.log('debug', 'http_transport_request_started', {
      url: this.url,
      headers: sanitizeForLog(this.headers),
      bytes: Buffer.byteLength(message),
      timeoutMs: this.timeoutMs
    });

    let response: Response;
    let body: string;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: this.headers,
        body: message,
        signal: abortController.signal
      });
      body = await response.text();
    } catch (error) {
      const timedOut = abortController.signal.aborted;
      this.log('error', 'http_transport_request_failed', {
        url: this.url,
        timedOut,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      });

      const detail = error instanceof Error ? error.message : 'unknown transport error';
      throw new TransportError(
        timedOut ? `JSON-RPC request timed out after ${this.timeoutMs}ms.` : `JSON-RPC request failed: ${detail}`,
        error
      );
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      this.log('warn', 'http_transport_non_2xx', {
        url: this.url,
        status: response.status,
        durationMs: Date.now() - startedAt,
        bodyPreview: sanitizeForLog(body)
      });
      throw new ReceivedNon2xxResponseError(response.status, body);
    }

    this.log('debug', 'http_transport_request_completed', {
      url: this.url,
      status: response.status,
      durationMs: Date.now() - startedAt
    });

    return body;
  }
}
