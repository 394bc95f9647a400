// This module parses strict RFC3339 UTC timestamps and compiles bounded log query windows.

import type { LogWindow } from '../types/domain.js';
import { validationError } from './errors.js';

export const MAX_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

const UTC_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?Z$/;

// This function parses one RFC3339 timestamp and rejects every offset other than a literal Z.
export function parseUtcTimestamp(value: string, field: string): Date {
  const match = UTC_TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw validationError('invalid_utc_time', `${field} must be an RFC3339 UTC timestamp ending with Z.`, {
      field
    });
  }

  const [, year, month, day, hour, minute, second, fraction] = match;
  const millis = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;
  // setUTCFullYear keeps years 0-99 literal where Date.UTC would shift them into the 1900s.
  const parsed = new Date(0);
  parsed.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  parsed.setUTCHours(Number(hour), Number(minute), Number(second), millis);
  const epochMs = parsed.getTime();

  // Date setters roll invalid components over (Feb 30 -> Mar 2), so reject anything that changed.
  if (
    Number.isNaN(epochMs) ||
    parsed.getUTCFullYear() !== Number(year) ||
    parsed.getUTCMonth() !== Number(month) - 1 ||
    parsed.getUTCDate() !== Number(day) ||
    parsed.getUTCHours() !== Number(hour) ||
    parsed.getUTCMinutes() !== Number(minute) ||
    parsed.getUTCSeconds() !== Number(second)
  ) {
    throw validationError('invalid_utc_time', `${field} is not a valid calendar timestamp.`, { field });
  }

  return parsed;
}

// This function validates ordering and width of one log window.
export function resolveLogWindow(startUtc: string, endUtc: string, allowLargeWindow: boolean): LogWindow {
  const start = parseUtcTimestamp(startUtc, 'start_utc');
  const end = parseUtcTimestamp(endUtc, 'end_utc');

  if (start.getTime() >= end.getTime()) {
    throw validationError('invalid_time_range', 'start_utc must be strictly earlier than end_utc.');
  }

  const widthMs = end.getTime() - start.getTime();
  if (widthMs > MAX_WINDOW_MS && !allowLargeWindow) {
    throw validationError('window_too_large', 'Time window must not exceed 7 days unless allow_large_window is true.', {
      maxWindowMs: MAX_WINDOW_MS,
      requestedWindowMs: widthMs
    });
  }

  return { start, end };
}

// This helper renders one instant in the canonical millisecond UTC form used in outputs.
export function formatUtc(value: Date): string {
  return value.toISOString();
}
