// This module reduces raw replies to a result value, null, or an unchanged batch, raising typed errors on failure.

import type { ClientConfig } from '../config/client-config.js';
import type { JsonRpcId } from '../types/jsonrpc.js';
import { ReceivedErrorResponse } from '../utils/errors.js';
import { isRecord, parseJson } from '../utils/json.js';
import { validate, validateBatch } from './validator.js';

// This helper reads the reply id when it has a JSON-RPC id shape.
function readId(value: Record<string, unknown>): JsonRpcId | undefined {
  const id = value.id;
  return typeof id === 'string' || typeof id === 'number' || id === null ? id : undefined;
}

// Validated replies pass through unchanged here; unvalidated ones are coerced field by field.
function toReceivedError(error: unknown, id: JsonRpcId | undefined): ReceivedErrorResponse {
  if (!isRecord(error)) {
    return new ReceivedErrorResponse(Number.NaN, String(error), undefined, id);
  }

  return new ReceivedErrorResponse(Number(error.code), String(error.message ?? ''), error.data, id);
}

/**
 * Processes one raw reply.
 *
 * 1. `null`, `undefined` and `''` mean "no reply" and yield `null`.
 * 2. Strings are parsed as JSON (`ParseResponseError` on failure).
 * 3. Arrays are batches: each member is validated, then the array is returned
 *    as-is. Members carrying `error` are neither unwrapped nor raised.
 * 4. Single objects are validated, then either raise
 *    `ReceivedErrorResponse` or yield their `result`.
 */
export function processResponse(response: unknown, config: ClientConfig): unknown {
  if (response === null || response === undefined || response === '') {
    return null;
  }

  const payload = typeof response === 'string' ? parseJson(response) : response;

  if (Array.isArray(payload)) {
    return validateBatch(payload, 'response', config);
  }

  validate(payload, 'response', config);

  if (!isRecord(payload)) {
    return undefined;
  }

  if ('error' in payload && payload.error !== undefined) {
    throw toReceivedError(payload.error, readId(payload));
  }

  return payload.result;
}
