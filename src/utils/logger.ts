// This module centralizes structured logging configuration and safe payload shaping.

import type { FastifyBaseLogger } from 'fastify';
import pino, { type LoggerOptions } from 'pino';
import { SERVER_NAME } from '../version.js';

export type AppLogger = FastifyBaseLogger;

const MAX_LOG_DEPTH = 5;
const MAX_LOG_STRING_LENGTH = 1024;
const MAX_LOG_ARRAY_ITEMS = 30;
const MAX_LOG_OBJECT_KEYS = 30;
const REDACTED = '[redacted]';

// This list ensures that obvious secrets are redacted before writing JSON logs.
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
  '*.authorization',
  '*.token',
  '*.apiToken'
];

// This helper returns true for field names that should never be logged in cleartext.
export function isSensitiveKey(key: string): boolean {
  const normalized = key.trim().toLowerCase();
  return (
    normalized.includes('token') ||
    normalized.includes('secret') ||
    normalized.includes('password') ||
    normalized.includes('credential') ||
    normalized.includes('authorization') ||
    normalized.includes('bearer') ||
    normalized.includes('cookie') ||
    normalized === 'api_key' ||
    normalized === 'apikey'
  );
}

// This helper truncates large strings so high-volume logs stay bounded and readable.
function truncateString(value: string): string {
  if (value.length <= MAX_LOG_STRING_LENGTH) {
    return value;
  }

  return `${value.slice(0, MAX_LOG_STRING_LENGTH)}...[truncated:${value.length - MAX_LOG_STRING_LENGTH}]`;
}

// This helper sanitizes arbitrary payloads recursively while preserving debug utility.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (depth > MAX_LOG_DEPTH) {
    return '[depth-limited]';
  }

  if (typeof value === 'string') {
    return truncateString(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    const truncatedArray = value.slice(0, MAX_LOG_ARRAY_ITEMS).map((item) => sanitizeForLog(item, depth + 1));
    if (value.length > MAX_LOG_ARRAY_ITEMS) {
      truncatedArray.push(`[truncated-items:${value.length - MAX_LOG_ARRAY_ITEMS}]`);
    }
    return truncatedArray;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    const target: Record<string, unknown> = {};

    for (const [key, entryValue] of entries.slice(0, MAX_LOG_OBJECT_KEYS)) {
      target[key] = isSensitiveKey(key) ? REDACTED : sanitizeForLog(entryValue, depth + 1);
    }

    if (entries.length > MAX_LOG_OBJECT_KEYS) {
      target.__truncatedKeys = entries.length - MAX_LOG_OBJECT_KEYS;
    }

    return target;
  }

  return String(value);
}

// This helper redacts credentials from JSON-RPC params for audit records; strings stay whole, depth is bounded.
export function redactAuditParams(value: unknown, depth = 0): unknown {
  if (depth > MAX_LOG_DEPTH) {
    return '[depth-limited]';
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactAuditParams(item, depth + 1));
  }

  if (typeof value === 'object' && value !== null) {
    const target: Record<string, unknown> = {};
    for (const [key, entryValue] of Object.entries(value)) {
      target[key] = isSensitiveKey(key) ? REDACTED : redactAuditParams(entryValue, depth + 1);
    }
    return target;
  }

  return value ?? null;
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause: error.cause instanceof Error ? { name: error.cause.name, message: error.cause.message } : undefined
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one Fastify-compatible logger configuration with strict redaction.
export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// This helper creates a standalone logger for code paths that run before the HTTP server exists.
export function createLogger(level: string): AppLogger {
  return pino(buildLoggerOptions(level));
}
