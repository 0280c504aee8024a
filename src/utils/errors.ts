// This module provides the typed error taxonomy raised by request building, validation, response processing and transports.

import type { JsonRpcId } from '../types/jsonrpc.js';

export interface ErrorContext {
  details?: unknown;
  cause?: unknown;
}

export class JsonRpcClientError extends Error {
  public readonly reason: string;
  public readonly details?: unknown;

  public constructor(reason: string, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'JsonRpcClientError';
    this.reason = reason;
    this.details = context.details;
  }
}

// Raised when reply text cannot be parsed as JSON; the parse failure stays available as `cause`.
export class ParseResponseError extends JsonRpcClientError {
  public readonly raw: string;

  public constructor(raw: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : 'unknown parse failure';
    super('parse_error', `Failed to parse JSON-RPC response: ${detail}`, { cause });
    this.name = 'ParseResponseError';
    this.raw = raw;
  }
}

export type SchemaKind = 'request' | 'response';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends JsonRpcClientError {
  public readonly kind: SchemaKind;
  public readonly issues: ValidationIssue[];

  public constructor(kind: SchemaKind, issues: ValidationIssue[]) {
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
    super('validation_error', `Invalid JSON-RPC ${kind}: ${summary}`, { details: issues });
    this.name = 'ValidationError';
    this.kind = kind;
    this.issues = issues;
  }
}

/**
 * The remote peer answered with a well-formed `error` member.
 *
 * This is an expected outcome rather than a bug signal: callers catch it and
 * branch on `code`. `data` is left `undefined` when the peer sent none, so an
 * empty string or `null` payload stays distinguishable.
 */
export class ReceivedErrorResponse extends JsonRpcClientError {
  public readonly code: number;
  public readonly codeName: string;
  public readonly data: unknown;
  public readonly id: JsonRpcId | undefined;

  public constructor(code: number, message: string, data?: unknown, id?: JsonRpcId) {
    const codeName = errorCodeName(code);
    super('received_error_response', message, { details: { code, codeName, data } });
    this.name = 'ReceivedErrorResponse';
    this.code = code;
    this.codeName = codeName;
    this.data = data;
    this.id = id;
  }

  public get hasData(): boolean {
    return this.data !== undefined;
  }
}

// Raised before any I/O when positional and named params are supplied together.
export class InvalidParamsUsageError extends JsonRpcClientError {
  public constructor(method: string) {
    super('invalid_params_usage', `Cannot combine positional and named params when calling "${method}".`);
    this.name = 'InvalidParamsUsageError';
  }
}

// Raised before any I/O when a notification is asked to carry an explicit id.
export class InvalidCallOptionsError extends JsonRpcClientError {
  public constructor(method: string) {
    super('invalid_call_options', `Cannot send "${method}" as a notification with an explicit id.`);
    this.name = 'InvalidCallOptionsError';
  }
}

export class ReceivedNon2xxResponseError extends JsonRpcClientError {
  public readonly status: number;
  public readonly body: string;

  public constructor(status: number, body: string) {
    super('non_2xx_response', `Received HTTP ${status} from JSON-RPC endpoint.`, { details: { status } });
    this.name = 'ReceivedNon2xxResponseError';
    this.status = status;
    this.body = body;
  }
}

export class TransportError extends JsonRpcClientError {
  public constructor(message: string, cause?: unknown) {
    super('transport_error', message, { cause });
    this.name = 'TransportError';
  }
}

export const JSON_RPC_ERROR_CODES = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603
} as const;

// This helper names standard JSON-RPC error codes for log lines and messages.
export function errorCodeName(code: number): string {
  switch (code) {
    case JSON_RPC_ERROR_CODES.parseError:
      return 'parse_error';
    case JSON_RPC_ERROR_CODES.invalidRequest:
      return 'invalid_request';
    case JSON_RPC_ERROR_CODES.methodNotFound:
      return 'method_not_found';
    case JSON_RPC_ERROR_CODES.invalidParams:
      return 'invalid_params';
    case JSON_RPC_ERROR_CODES.internalError:
      return 'internal_error';
    default:
      return code <= -32000 && code >= -32099 ? 'server_error' : 'application_error';
  }
}
