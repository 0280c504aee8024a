// This utility module keeps JSON parsing and shape checks explicit for reply handling.

import { ParseResponseError } from './errors.js';

// This helper parses reply text and wraps syntax failures so the original error survives as the cause.
export function parseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ParseResponseError(value, error);
  }
}

// This guard narrows unknown values to plain JSON objects (arrays excluded).
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// This helper renders a reply for log lines without altering text payloads.
export function toLogText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'string') {
    return value;
  }

  return JSON.stringify(value) ?? String(value);
}
