// This test suite verifies JSON-RPC schema validation, the validate switch and JSON Schema export.

import { describe, expect, it } from 'vitest';
import { createClientConfig } from '../src/config/client-config.js';
import { jsonSchemaDocuments } from '../src/jsonrpc/schemas.js';
import { validate, validateBatch } from '../src/jsonrpc/validator.js';
import { ValidationError } from '../src/utils/errors.js';

const enabled = createClientConfig();
const disabled = createClientConfig({ validate: false });

// This helper captures the thrown validation error for field-level assertions.
function validationFailure(run: () => unknown): ValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ValidationError.');
}

describe('request validation', () => {
  it('returns the same object for a valid request', () => {
    const request = { jsonrpc: '2.0', method: 'multiply', params: [3, 5], id: 1 };

    expect(validate(request, 'request', enabled)).toBe(request);
    expect(validate({ jsonrpc: '2.0', method: 'notify', params: { a: 1 } }, 'request', enabled)).toEqual({
      jsonrpc: '2.0',
      method: 'notify',
      params: { a: 1 }
    });
  });

  it('rejects a missing or wrong protocol version', () => {
    expect(() => validate({ method: 'go' }, 'request', enabled)).toThrow(ValidationError);
    expect(() => validate({ jsonrpc: '1.0', method: 'go' }, 'request', enabled)).toThrow(ValidationError);
  });

  it('rejects a non-string method', () => {
    const error = validationFailure(() => validate({ jsonrpc: '2.0', method: 42 }, 'request', enabled));

    expect(error.kind).toBe('request');
    expect(error.issues.map((issue) => issue.path)).toEqual(['method']);
  });

  it('rejects scalar params and fractional ids', () => {
    expect(() => validate({ jsonrpc: '2.0', method: 'go', params: 'x' }, 'request', enabled)).toThrow(ValidationError);
    expect(() => validate({ jsonrpc: '2.0', method: 'go', id: 1.5 }, 'request', enabled)).toThrow(ValidationError);
  });
});

describe('response validation', () => {
  it('accepts success and error responses', () => {
    expect(() => validate({ jsonrpc: '2.0', result: null, id: null }, 'response', enabled)).not.toThrow();
    expect(() =>
      validate({ jsonrpc: '2.0', error: { code: -32601, message: 'Method not found', data: [1] }, id: 'a' }, 'response', enabled)
    ).not.toThrow();
  });

  it('rejects responses carrying both result and error', () => {
    const error = validationFailure(() =>
      validate({ jsonrpc: '2.0', result: 1, error: { code: 1, message: 'x' }, id: 1 }, 'response', enabled)
    );

    expect(error.issues).toEqual([{ path: 'error', message: 'A response must not contain both result and error.' }]);
  });

  it('rejects responses carrying neither result nor error', () => {
    const error = validationFailure(() => validate({ jsonrpc: '2.0', id: 1 }, 'response', enabled));

    expect(error.issues).toEqual([{ path: '', message: 'A response must contain either result or error.' }]);
    expect(error.message).toBe('Invalid JSON-RPC response: A response must contain either result or error.');
  });

  it('rejects error objects lacking code or message', () => {
    const missingCode = validationFailure(() => validate({ jsonrpc: '2.0', error: { message: 'x' }, id: 1 }, 'response', enabled));
    const missingMessage = validationFailure(() => validate({ jsonrpc: '2.0', error: { code: -1 }, id: 1 }, 'response', enabled));

    expect(missingCode.issues.map((issue) => issue.path)).toEqual(['error.code']);
    expect(missingMessage.issues.map((issue) => issue.path)).toEqual(['error.message']);
  });

  it('rejects a missing id, unknown members and non-objects', () => {
    expect(() => validate({ jsonrpc: '2.0', result: 5 }, 'response', enabled)).toThrow(ValidationError);
    expect(() => validate({ json: '2.0' }, 'response', enabled)).toThrow(ValidationError);
    expect(() => validate(15, 'response', enabled)).toThrow(ValidationError);
  });

  it('passes anything through when validation is disabled', () => {
    const malformed = { json: '2.0' };

    expect(validate(malformed, 'response', disabled)).toBe(malformed);
    expect(validateBatch([], 'response', disabled)).toEqual([]);
  });
});

describe('batch validation', () => {
  it('rejects empty batches', () => {
    const error = validationFailure(() => validateBatch([], 'request', enabled));

    expect(error.message).toBe('Invalid JSON-RPC request: A request batch must contain at least one object.');
  });

  it('prefixes member issues with the member index', () => {
    const error = validationFailure(() =>
      validateBatch([{ jsonrpc: '2.0', result: 5, id: 1 }, { jsonrpc: '2.0', id: 2 }], 'response', enabled)
    );

    expect(error.issues).toEqual([{ path: '1', message: 'A response must contain either result or error.' }]);
  });

  it('returns the same array when every member is valid', () => {
    const batch = [
      { jsonrpc: '2.0', method: 'a', id: 1 },
      { jsonrpc: '2.0', method: 'b' }
    ];

    expect(validateBatch(batch, 'request', enabled)).toBe(batch);
  });
});

describe('json schema documents', () => {
  it('exports request and response contracts', () => {
    const documents = jsonSchemaDocuments();

    expect(documents.request).toMatchObject({ $ref: '#/definitions/JsonRpcRequest' });
    expect(documents.request.definitions?.JsonRpcRequest).toMatchObject({
      type: 'object',
      required: ['jsonrpc', 'method'],
      additionalProperties: false
    });
    expect(documents.response.definitions?.JsonRpcResponse).toMatchObject({
      type: 'object',
      required: ['jsonrpc', 'id']
    });
  });
});
