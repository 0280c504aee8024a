// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { CLIENT_NAME } from '../version.js';

const LOG_LIMITS = {
  depth: 5,
  stringLength: 1024,
  arrayItems: 30,
  objectKeys: 30
} as const;

// Header and field names matching these fragments are logged as a hash only.
const SENSITIVE_KEY_FRAGMENTS = ['token', 'password', 'authorization', 'cookie', 'secret', 'api_key', 'apikey'];

// Obvious secrets are removed before JSON log lines are written.
const REDACT_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'headers.cookie',
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.token',
  '*.password',
  '*.apiKey'
];

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => normalized.includes(fragment));
}

// Correlates a secret across log lines without printing it.
function redact(value: unknown): string {
  const serialized = typeof value === 'string' ? value : JSON.stringify(value ?? '');
  return `[redacted:${createHash('sha256').update(serialized).digest('hex').slice(0, 12)}]`;
}

function truncateString(value: string): string {
  const overflow = value.length - LOG_LIMITS.stringLength;
  return overflow > 0 ? `${value.slice(0, LOG_LIMITS.stringLength)}...[truncated:${overflow}]` : value;
}

function sanitizeArray(items: readonly unknown[], depth: number): unknown[] {
  const kept = items.slice(0, LOG_LIMITS.arrayItems).map((item) => sanitizeForLog(item, depth + 1));
  const dropped = items.length - kept.length;
  return dropped > 0 ? [...kept, `[truncated-items:${dropped}]`] : kept;
}

function sanitizeObject(source: object, depth: number): Record<string, unknown> {
  const entries = Object.entries(source);
  const target: Record<string, unknown> = {};

  for (const [key, entryValue] of entries.slice(0, LOG_LIMITS.objectKeys)) {
    target[key] = isSensitiveKey(key) ? redact(entryValue) : sanitizeForLog(entryValue, depth + 1);
  }

  if (entries.length > LOG_LIMITS.objectKeys) {
    target.__truncatedKeys = entries.length - LOG_LIMITS.objectKeys;
  }

  return target;
}

/**
 * Sanitizes diagnostic payloads such as transport headers and body previews.
 *
 * Strings are truncated, arrays and objects are bounded, and sensitive keys
 * are replaced by `[redacted:<hash>]`. Protocol payload lines (the request and
 * response records) bypass this helper so they stay byte-exact.
 */
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (depth > LOG_LIMITS.depth) {
    return '[depth-limited]';
  }

  if (typeof value === 'string') {
    return truncateString(value);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return sanitizeArray(value, depth);
  }

  if (typeof value === 'object') {
    return sanitizeObject(value, depth);
  }

  return String(value);
}

// This helper flattens a failure for transport log lines, naming one level of `cause` (fetch hides socket errors there).
export function errorForLog(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const shaped: Record<string, unknown> = { name: error.name, message: error.message };
  if (error.cause !== undefined) {
    shaped.cause = error.cause instanceof Error ? `${error.cause.name}: ${error.cause.message}` : String(error.cause);
  }
  shaped.stack = error.stack;
  return shaped;
}

// This helper builds pino options shared by every logger this package creates.
export function buildLoggerOptions(level = process.env.LOG_LEVEL ?? 'info'): LoggerOptions {
  return {
    level,
    base: {
      service: CLIENT_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// This helper builds the root logger, writing to stdout unless a destination stream is given.
export function createLogger(options: { level?: string; destination?: DestinationStream } = {}): Logger {
  const loggerOptions = buildLoggerOptions(options.level);
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
