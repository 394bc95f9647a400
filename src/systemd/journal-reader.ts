// This module reads journald records through journalctl JSON output.

import { z } from 'zod';
import type { LogEntry, LogReadRequest, LogReader } from '../types/domain.js';
import type { AppLogger } from '../utils/logger.js';
import { runCommand, type CommandRunner } from './command.js';

export const DEFAULT_PRIORITY = 6;

const numericString = z.union([z.string(), z.number()]).transform((value) => String(value));

// journald emits MESSAGE as an array of bytes when it is not valid UTF-8.
const messageSchema = z.union([z.string(), z.array(z.number().int().min(0).max(255))]).nullable();

const journalRecordSchema = z
  .object({
    __REALTIME_TIMESTAMP: numericString,
    __CURSOR: z.string().optional(),
    _SYSTEMD_UNIT: z.string().optional(),
    PRIORITY: numericString.optional(),
    _HOSTNAME: z.string().optional(),
    _PID: numericString.optional(),
    MESSAGE: messageSchema.optional()
  })
  .passthrough();

export interface JournalctlLogReaderOptions {
  timeoutMs: number;
  maxEntries: number;
  logger: AppLogger;
  run?: CommandRunner;
  journalctlPath?: string;
}

// This function builds journalctl arguments; the window is widened to whole seconds and narrowed again by the core.
export function buildJournalctlArgs(request: LogReadRequest, maxEntries: number): string[] {
  const since = Math.floor(request.window.start.getTime() / 1000);
  const until = Math.ceil(request.window.end.getTime() / 1000);
  const args = [
    '--no-pager',
    '--output=json',
    '--utc',
    `--since=@${since}`,
    `--until=@${until}`,
    '--reverse',
    `--lines=${maxEntries}`
  ];

  if (request.priorityThreshold !== undefined) {
    args.push(`--priority=${request.priorityThreshold}`);
  }

  if (request.unit) {
    args.push(`--unit=${request.unit}`);
  }

  return args;
}

function decodeMessage(message: string | number[] | null | undefined): string | undefined {
  if (message === null || message === undefined) {
    return undefined;
  }
  return typeof message === 'string' ? message : Buffer.from(message).toString('utf8');
}

function parseOptionalInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number(value);
}

// This function parses one journalctl JSON line; unparseable lines return null.
export function parseJournalLine(line: string): LogEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = journalRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const record = parsed.data;
  const micros = parseOptionalInteger(record.__REALTIME_TIMESTAMP);
  if (micros === undefined) {
    return null;
  }

  const priority = parseOptionalInteger(record.PRIORITY);
  const entry: LogEntry = {
    timestamp_utc: new Date(Math.floor(micros / 1000)).toISOString(),
    priority: priority !== undefined && priority <= 7 ? priority : DEFAULT_PRIORITY
  };

  if (record._SYSTEMD_UNIT) {
    entry.unit = record._SYSTEMD_UNIT;
  }
  if (record._HOSTNAME) {
    entry.hostname = record._HOSTNAME;
  }

  const pid = parseOptionalInteger(record._PID);
  if (pid !== undefined) {
    entry.pid = pid;
  }

  const message = decodeMessage(record.MESSAGE);
  if (message !== undefined) {
    entry.message = message;
  }

  if (record.__CURSOR) {
    entry.cursor = record.__CURSOR;
  }

  return entry;
}

export class JournalctlLogReader implements LogReader {
  private readonly run: CommandRunner;
  private readonly journalctlPath: string;

  public constructor(private readonly options: JournalctlLogReaderOptions) {
    this.run = options.run ?? runCommand;
    this.journalctlPath = options.journalctlPath ?? 'journalctl';
  }

  public async read(request: LogReadRequest): Promise<LogEntry[]> {
    const startedAt = Date.now();
    const args = buildJournalctlArgs(request, this.options.maxEntries);
    const { stdout } = await this.run(this.journalctlPath, args, { timeoutMs: this.options.timeoutMs });

    const entries: LogEntry[] = [];
    let skipped = 0;
    for (const line of stdout.split('\n')) {
      if (!line.trim()) {
        continue;
      }
      const entry = parseJournalLine(line);
      if (entry) {
        entries.push(entry);
      } else {
        skipped += 1;
      }
    }

    this.options.logger.debug(
      {
        event: 'journalctl_read_completed',
        entryCount: entries.length,
        skippedLines: skipped,
        durationMs: Date.now() - startedAt
      },
      'journalctl_read_completed'
    );

    return entries;
  }
}
