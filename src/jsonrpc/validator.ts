// This module checks candidate objects against the JSON-RPC schemas unless validation is switched off.

import type { ZodIssue } from 'zod';
import type { ClientConfig } from '../config/client-config.js';
import { ValidationError, type SchemaKind, type ValidationIssue } from '../utils/errors.js';
import { requestSchema, responseSchema } from './schemas.js';

function toValidationIssues(issues: readonly ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
}

/**
 * Returns `value` untouched when it matches the schema for `kind`.
 *
 * The original object is returned rather than zod's parsed copy, so opaque
 * members such as `result` and `error.data` keep their identity.
 */
export function validate<T>(value: T, kind: SchemaKind, config: ClientConfig): T {
  if (!config.validate) {
    return value;
  }

  const schema = kind === 'request' ? requestSchema : responseSchema;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(kind, toValidationIssues(parsed.error.issues));
  }

  return value;
}

// This function validates every batch member in order and raises on the first failure.
export function validateBatch<T>(values: readonly T[], kind: SchemaKind, config: ClientConfig): readonly T[] {
  if (!config.validate) {
    return values;
  }

  if (values.length === 0) {
    throw new ValidationError(kind, [{ path: '', message: `A ${kind} batch must contain at least one object.` }]);
  }

  values.forEach((value, index) => {
    try {
      validate(value, kind, config);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError(
          kind,
          error.issues.map((issue) => ({
            path: issue.path ? `${index}.${issue.path}` : String(index),
            message: issue.message
          }))
        );
      }
      throw error;
    }
  });

  return values;
}
