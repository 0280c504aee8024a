// This module builds JSON-RPC request and notification objects; it never serializes or transmits them.

import type { JsonRpcId, JsonRpcNotification, JsonRpcParams, JsonRpcRequest } from '../types/jsonrpc.js';
import { InvalidParamsUsageError } from '../utils/errors.js';
import { JSONRPC_VERSION } from '../version.js';
import { defaultIdGenerator, type IdGenerator } from './ids.js';

export interface ParamsInput {
  args?: readonly unknown[];
  kwargs?: Readonly<Record<string, unknown>>;
}

export interface BuildRequestOptions {
  ids?: IdGenerator;
  // An explicit id, `null` included, bypasses the generator.
  id?: JsonRpcId;
}

// This helper resolves the params member and rejects mixed positional and named usage.
function resolveParams(method: string, input: ParamsInput): JsonRpcParams | undefined {
  const hasArgs = input.args !== undefined && input.args.length > 0;
  const hasKwargs = input.kwargs !== undefined && Object.keys(input.kwargs).length > 0;

  if (hasArgs && hasKwargs) {
    throw new InvalidParamsUsageError(method);
  }

  if (hasArgs && input.args) {
    return [...input.args];
  }

  if (hasKwargs && input.kwargs) {
    return { ...input.kwargs };
  }

  return undefined;
}

// This helper builds an id-less message; the peer must not answer it.
export function buildNotification(method: string, params: ParamsInput = {}): JsonRpcNotification {
  const resolved = resolveParams(method, params);
  return resolved === undefined ? { jsonrpc: JSONRPC_VERSION, method } : { jsonrpc: JSONRPC_VERSION, method, params: resolved };
}

/**
 * Builds a request that expects a reply.
 *
 * Params are resolved first so a mixed positional/named call fails before an
 * id is drawn from the generator.
 */
export function buildRequest(method: string, params: ParamsInput = {}, options: BuildRequestOptions = {}): JsonRpcRequest {
  const notification = buildNotification(method, params);
  const id = options.id !== undefined ? options.id : (options.ids ?? defaultIdGenerator).next();

  return {
    ...notification,
    id
  };
}

// This guard reports whether a built message lacks an id member entirely (`id: null` is still a request).
export function isNotification(request: JsonRpcRequest): boolean {
  return !('id' in request);
}
