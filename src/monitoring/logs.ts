// This module implements the list_logs query: window and filter validation, client-side filtering, and shaping.

import { RE2JS } from 're2js';
import type { ListLogsOutput, LogEntry, LogOrder, LogWindow } from '../types/domain.js';
import { validationError } from '../utils/errors.js';
import { formatUtc, resolveLogWindow } from '../utils/time-window.js';
import { withTimeout } from '../utils/timeout.js';
import { parseWithCodes } from '../utils/validation.js';
import { PRIORITY_LEVELS, listLogsErrorCodes, listLogsSchema, type ListLogsInput } from '../mcp/tool-schemas.js';
import type { MonitoringContext } from './context.js';

export type MessageMatcher = (message: string) => boolean;

export interface LogQuery {
  window: LogWindow;
  priorityThreshold?: number;
  unit?: string;
  excludeUnits: string[];
  grep?: MessageMatcher;
  order: LogOrder;
  limit: number;
}

// This helper compiles the grep argument: plain substring, or a regular expression when wrapped in slashes.
export function buildMessageMatcher(grep: string | undefined): MessageMatcher | undefined {
  const trimmed = grep?.trim();
  if (!trimmed) {
    return undefined;
  }

  if (trimmed.length >= 2 && trimmed.startsWith('/') && trimmed.endsWith('/')) {
    const pattern = trimmed.slice(1, -1);
    // RE2 semantics: matching time is linear in the message length, with no backtracking.
    let expression: RE2JS;
    try {
      expression = RE2JS.compile(pattern);
    } catch (error) {
      throw validationError('invalid_grep', 'grep regular expression is invalid.', {
        reason: error instanceof Error ? error.message : String(error)
      });
    }
    return (message) => expression.matcher(message).find();
  }

  return (message) => message.includes(trimmed);
}

// This helper maps an integer or alias priority onto the numeric journald threshold.
export function resolvePriority(priority: ListLogsInput['priority']): number | undefined {
  if (priority === undefined) {
    return undefined;
  }

  return typeof priority === 'number' ? priority : PRIORITY_LEVELS[priority];
}

// This function validates raw tool arguments into a normalized log query.
export function buildLogQuery(args: unknown): LogQuery {
  const input = parseWithCodes(listLogsSchema, args ?? {}, listLogsErrorCodes);

  return {
    window: resolveLogWindow(input.start_utc, input.end_utc, input.allow_large_window),
    priorityThreshold: resolvePriority(input.priority),
    unit: input.unit,
    excludeUnits: input.exclude_units ?? [],
    grep: buildMessageMatcher(input.grep),
    order: input.order,
    limit: input.limit
  };
}

// This helper trims messages and blanks control characters other than newline, carriage return, and tab.
export function sanitizeLogMessage(message: string | undefined): string | undefined {
  if (message === undefined) {
    return undefined;
  }

  // eslint-disable-next-line no-control-regex
  const sanitized = message.trim().replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/g, ' ').trim();
  return sanitized.length > 0 ? sanitized : undefined;
}

// This function filters, sanitizes, orders, and truncates reader output for one validated query.
export function selectLogEntries(
  entries: LogEntry[],
  query: LogQuery,
  generatedAt: Date
): ListLogsOutput {
  const startMs = query.window.start.getTime();
  const endMs = query.window.end.getTime();
  const excluded = new Set(query.excludeUnits.map((unit) => unit.toLowerCase()));
  const { grep, priorityThreshold } = query;

  const matching: Array<{ entry: LogEntry; timestampMs: number }> = [];
  for (const rawEntry of entries) {
    const timestampMs = Date.parse(rawEntry.timestamp_utc);
    if (Number.isNaN(timestampMs) || timestampMs < startMs || timestampMs > endMs) {
      continue;
    }

    if (priorityThreshold !== undefined && rawEntry.priority > priorityThreshold) {
      continue;
    }

    if (rawEntry.unit && excluded.has(rawEntry.unit.toLowerCase())) {
      continue;
    }

    const message = sanitizeLogMessage(rawEntry.message);
    if (grep && (message === undefined || !grep(message))) {
      continue;
    }

    const entry: LogEntry = { ...rawEntry };
    if (message === undefined) {
      delete entry.message;
    } else {
      entry.message = message;
    }
    matching.push({ entry, timestampMs });
  }

  const direction = query.order === 'asc' ? 1 : -1;
  matching.sort((left, right) => (left.timestampMs - right.timestampMs) * direction);

  const selected = matching.slice(0, query.limit).map((item) => item.entry);

  return {
    entries: selected,
    total_scanned: entries.length,
    returned: selected.length,
    truncated: matching.length > selected.length,
    generated_at_utc: formatUtc(generatedAt),
    window: {
      start_utc: formatUtc(query.window.start),
      end_utc: formatUtc(query.window.end)
    }
  };
}

// This function runs list_logs end to end against the log-reader collaborator.
export async function listLogs(args: unknown, context: MonitoringContext): Promise<ListLogsOutput> {
  const query = buildLogQuery(args);
  return runLogQuery(query, context);
}

// This function executes an already-validated log query.
export async function runLogQuery(query: LogQuery, context: MonitoringContext): Promise<ListLogsOutput> {
  const startedAt = Date.now();
  const entries = await withTimeout(
    context.logReader.read({
      window: query.window,
      priorityThreshold: query.priorityThreshold,
      unit: query.unit
    }),
    context.adapterTimeoutMs,
    'log read'
  );

  context.logger.debug(
    {
      event: 'list_logs_entries_loaded',
      entryCount: entries.length,
      durationMs: Date.now() - startedAt
    },
    'list_logs_entries_loaded'
  );

  return selectLogEntries(entries, query, context.now());
}
