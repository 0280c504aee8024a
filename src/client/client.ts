// This module orchestrates request building, transmission through an injected transport, and reply processing.

import type { Logger } from 'pino';
import { createClientConfig, type ClientConfig } from '../config/client-config.js';
import type { IdGenerator } from '../jsonrpc/ids.js';
import { buildNotification, buildRequest, type ParamsInput } from '../jsonrpc/request.js';
import { processResponse } from '../jsonrpc/response.js';
import { validate, validateBatch } from '../jsonrpc/validator.js';
import type { JsonRpcId, JsonRpcRequest, OutboundMessage } from '../types/jsonrpc.js';
import { InvalidCallOptionsError } from '../utils/errors.js';
import { toLogText } from '../utils/json.js';
import { createLogger } from '../utils/logger.js';
import { createMethodProxy, type DynamicMethods, type MethodProxy, type RemoteMethods } from './proxy.js';
import type { Transport } from './transport.js';

export interface JsonRpcClientOptions {
  transport: Transport;
  // Held by reference: later changes to `validate` apply to the next call.
  config?: ClientConfig;
  logger?: Logger;
  ids?: IdGenerator;
}

export interface CallOptions {
  notification?: boolean;
  // Rejected together with `notification: true`, since notifications carry no id.
  id?: JsonRpcId;
}

function isBatch(message: JsonRpcRequest | readonly JsonRpcRequest[]): message is readonly JsonRpcRequest[] {
  return Array.isArray(message);
}

export class JsonRpcClient {
  public readonly config: ClientConfig;
  private readonly transport: Transport;
  private readonly ids?: IdGenerator;
  private readonly requestLogger: Logger;
  private readonly responseLogger: Logger;

  public constructor(options: JsonRpcClientOptions) {
    this.transport = options.transport;
    this.config = options.config ?? createClientConfig();
    this.ids = options.ids;

    const logger = options.logger ?? createLogger();
    this.requestLogger = logger.child({ component: 'jsonrpc_client.request' });
    this.responseLogger = logger.child({ component: 'jsonrpc_client.response' });
  }

  // This helper renders and writes one protocol record; a failing render or sink is reported but never changes control flow.
  private emit(logger: Logger, event: string, render: () => string): void {
    try {
      logger.info({ event }, render());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      process.emitWarning(`Dropped ${event} log record: ${message}`, { code: 'JSONRPC_LOG_SINK_FAILED' });
    }
  }

  public logRequest(text: string): void {
    this.emit(this.requestLogger, 'jsonrpc_request', () => text);
  }

  public logResponse(reply: unknown): void {
    this.emit(this.responseLogger, 'jsonrpc_response', () => toLogText(reply));
  }

  // This helper validates structured messages and renders the exact text handed to the transport.
  private serialize(message: OutboundMessage): string {
    if (typeof message === 'string') {
      return message;
    }

    if (isBatch(message)) {
      validateBatch(message, 'request', this.config);
    } else {
      validate(message, 'request', this.config);
    }

    return JSON.stringify(message);
  }

  /**
   * Sends a prebuilt request, a batch, or raw text and processes the reply.
   *
   * Raw strings go out verbatim without request validation.
   */
  public async send(message: OutboundMessage): Promise<unknown> {
    const text = this.serialize(message);
    this.logRequest(text);

    const reply = await this.transport.send(text);
    return this.processResponse(reply);
  }

  public processResponse(reply: unknown): unknown {
    this.logResponse(reply);
    return processResponse(reply, this.config);
  }

  // This method is the explicit calling convention: positional or named params, optional explicit id.
  public async call(method: string, params: ParamsInput = {}, options: CallOptions = {}): Promise<unknown> {
    if (options.notification && options.id !== undefined) {
      throw new InvalidCallOptionsError(method);
    }

    const message = options.notification
      ? buildNotification(method, params)
      : buildRequest(method, params, { ids: this.ids, id: options.id });

    return this.send(message);
  }

  public async request(method: string, ...args: unknown[]): Promise<unknown> {
    return this.call(method, { args });
  }

  // Notifications carry no id; any reply the transport still returns is processed like a request's.
  public async notify(method: string, ...args: unknown[]): Promise<unknown> {
    return this.call(method, { args }, { notification: true });
  }

  public async batch(requests: readonly JsonRpcRequest[]): Promise<unknown> {
    return this.send(requests);
  }

  public proxy<M extends RemoteMethods<M> = DynamicMethods>(): MethodProxy<M> {
    return createMethodProxy<M>((method, args) => this.request(method, ...args));
  }
}
