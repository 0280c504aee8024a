// This module defines strict JSON-RPC 2.0 object contracts with zod and exposes them as JSON Schema documents.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const idSchema = z.union([z.number().int(), z.string(), z.null()]);

const paramsSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

export const errorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional()
});

export const requestSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    method: z.string(),
    params: paramsSchema.optional(),
    id: idSchema.optional()
  })
  .strict();

export const responseSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: idSchema,
    result: z.unknown().optional(),
    error: errorObjectSchema.optional()
  })
  .strict()
  .superRefine((payload, ctx) => {
    // zod keeps keys that were present in the input, so presence (not value) decides here.
    const hasResult = 'result' in payload;
    const hasError = 'error' in payload;

    if (hasResult && hasError) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['error'],
        message: 'A response must not contain both result and error.'
      });
    }

    if (!hasResult && !hasError) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [],
        message: 'A response must contain either result or error.'
      });
    }
  });

// This helper exports both contracts for tooling that speaks JSON Schema rather than zod.
export function jsonSchemaDocuments() {
  return {
    request: zodToJsonSchema(requestSchema, 'JsonRpcRequest'),
    response: zodToJsonSchema(responseSchema, 'JsonRpcResponse')
  };
}
