// This test suite verifies strict UTC timestamp parsing and log window bounds.

import { describe, expect, it } from 'vitest';
import { MAX_WINDOW_MS, parseUtcTimestamp, resolveLogWindow } from '../src/utils/time-window.js';
import { captureAppError } from './helpers/fakes.js';

describe('utc timestamp parsing', () => {
  it('accepts Z-suffixed timestamps with optional fractions', () => {
    expect(parseUtcTimestamp('2025-01-15T10:00:00Z', 'start_utc').toISOString()).toBe('2025-01-15T10:00:00.000Z');
    expect(parseUtcTimestamp('2025-01-15T10:00:00.123456Z', 'start_utc').toISOString()).toBe('2025-01-15T10:00:00.123Z');
  });

  it('keeps two-digit years literal', () => {
    expect(parseUtcTimestamp('0050-01-01T00:00:00Z', 'start_utc').getUTCFullYear()).toBe(50);
    expect(parseUtcTimestamp('0000-03-01T12:30:00Z', 'start_utc').toISOString()).toBe('0000-03-01T12:30:00.000Z');
  });

  it('rejects offsets other than Z', () => {
    const error = captureAppError(() => parseUtcTimestamp('2025-01-15T10:00:00+02:00', 'start_utc'));
    expect(error.code).toBe('invalid_utc_time');
    expect(error.statusCode).toBe(400);
    expect(error.details).toEqual({ field: 'start_utc' });
  });

  it('rejects impossible calendar dates', () => {
    expect(captureAppError(() => parseUtcTimestamp('2025-02-30T00:00:00Z', 'end_utc')).code).toBe('invalid_utc_time');
    expect(captureAppError(() => parseUtcTimestamp('2025-01-15T24:00:00Z', 'end_utc')).code).toBe('invalid_utc_time');
  });
});

describe('log window resolution', () => {
  it('requires start strictly before end', () => {
    const error = captureAppError(() => resolveLogWindow('2025-01-15T10:00:00Z', '2025-01-15T10:00:00Z', false));
    expect(error.code).toBe('invalid_time_range');
  });

  it('caps the window at seven days unless explicitly allowed', () => {
    const error = captureAppError(() => resolveLogWindow('2025-01-01T00:00:00Z', '2025-01-09T00:00:00Z', false));
    expect(error.code).toBe('window_too_large');
    expect(error.details).toEqual({ maxWindowMs: MAX_WINDOW_MS, requestedWindowMs: 8 * 24 * 60 * 60 * 1000 });

    const wide = resolveLogWindow('2025-01-01T00:00:00Z', '2025-01-09T00:00:00Z', true);
    expect(wide.end.getTime() - wide.start.getTime()).toBe(8 * 24 * 60 * 60 * 1000);
  });

  it('accepts exactly seven days', () => {
    const window = resolveLogWindow('2025-01-01T00:00:00Z', '2025-01-08T00:00:00Z', false);
    expect(window.start.toISOString()).toBe('2025-01-01T00:00:00.000Z');
    expect(window.end.toISOString()).toBe('2025-01-08T00:00:00.000Z');
  });
});
