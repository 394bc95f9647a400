// This module lists systemd service units through systemctl and enriches them with per-unit properties.

import { z } from 'zod';
import type { ServiceRecord, UnitLister } from '../types/domain.js';
import { AdapterError } from '../utils/errors.js';
import { errorForLog, type AppLogger } from '../utils/logger.js';
import { runCommand, type CommandRunner } from './command.js';

export const SHOW_PROPERTIES = ['Id', 'UnitFileState', 'ActiveEnterTimestamp', 'MainPID', 'ExecMainStatus', 'Result'];
const SHOW_CHUNK_SIZE = 100;

const listUnitsSchema = z.array(
  z
    .object({
      unit: z.string(),
      load: z.string(),
      active: z.string(),
      sub: z.string(),
      description: z.string().default('')
    })
    .passthrough()
);

export interface SystemctlUnitListerOptions {
  timeoutMs: number;
  logger: AppLogger;
  run?: CommandRunner;
  systemctlPath?: string;
}

// This helper parses "Key=Value" lines of systemctl show output into a flat record.
export function parseSystemctlShow(output: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of output.split('\n')) {
    const idx = line.indexOf('=');
    if (idx > 0) {
      result[line.substring(0, idx)] = line.substring(idx + 1);
    }
  }

  return result;
}

// This helper splits multi-unit systemctl show output into one property record per unit.
export function parseShowBlocks(output: string): Map<string, Record<string, string>> {
  const blocks = new Map<string, Record<string, string>>();
  for (const chunk of output.split(/\n\s*\n/)) {
    const properties = parseSystemctlShow(chunk);
    if (properties.Id) {
      blocks.set(properties.Id, properties);
    }
  }
  return blocks;
}

// This helper converts a "@<seconds>" unix timestamp into canonical UTC; zero means never entered.
export function parseUnixTimestamp(value: string | undefined): string | undefined {
  const match = value ? /^@(\d+)$/.exec(value.trim()) : null;
  if (!match) {
    return undefined;
  }

  const seconds = Number(match[1]);
  return seconds > 0 ? new Date(seconds * 1000).toISOString() : undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  if (!value || !/^-?\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number(value.trim());
}

// This function maps one show block onto the optional ServiceRecord fields.
export function applyShowProperties(record: ServiceRecord, properties: Record<string, string> | undefined): ServiceRecord {
  if (!properties) {
    return record;
  }

  const enriched: ServiceRecord = { ...record };
  if (properties.UnitFileState) {
    enriched.unit_file_state = properties.UnitFileState;
  }

  const since = parseUnixTimestamp(properties.ActiveEnterTimestamp);
  if (since) {
    enriched.since_utc = since;
  }

  const mainPid = parseInteger(properties.MainPID);
  if (mainPid !== undefined && mainPid > 0) {
    enriched.main_pid = mainPid;
  }

  const execMainStatus = parseInteger(properties.ExecMainStatus);
  if (execMainStatus !== undefined) {
    enriched.exec_main_status = execMainStatus;
  }

  if (properties.Result) {
    enriched.result = properties.Result;
  }

  return enriched;
}

// This function parses systemctl list-units JSON output and keeps service units only.
export function parseListUnits(stdout: string): ServiceRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout.trim() || '[]');
  } catch (error) {
    throw new AdapterError('adapter_error', 'systemctl list-units returned invalid JSON.', { cause: error });
  }

  const parsed = listUnitsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AdapterError('adapter_error', 'systemctl list-units returned an unexpected shape.', {
      cause: parsed.error
    });
  }

  return parsed.data
    .filter((unit) => unit.unit.endsWith('.service'))
    .map((unit) => ({
      unit: unit.unit,
      description: unit.description,
      load_state: unit.load,
      active_state: unit.active,
      sub_state: unit.sub
    }));
}

export class SystemctlUnitLister implements UnitLister {
  private readonly run: CommandRunner;
  private readonly systemctlPath: string;

  public constructor(private readonly options: SystemctlUnitListerOptions) {
    this.run = options.run ?? runCommand;
    this.systemctlPath = options.systemctlPath ?? 'systemctl';
  }

  public async listUnits(): Promise<ServiceRecord[]> {
    const startedAt = Date.now();
    const { stdout } = await this.run(
      this.systemctlPath,
      ['list-units', '--type=service', '--all', '--no-pager', '--no-legend', '--output=json'],
      { timeoutMs: this.options.timeoutMs }
    );
    const records = parseListUnits(stdout);

    let enriched = records;
    try {
      enriched = await this.enrich(records);
    } catch (error) {
      this.options.logger.warn(
        {
          event: 'systemctl_show_failed',
          unitCount: records.length,
          error: errorForLog(error)
        },
        'systemctl_show_failed'
      );
    }

    this.options.logger.debug(
      {
        event: 'systemctl_list_units_completed',
        unitCount: enriched.length,
        durationMs: Date.now() - startedAt
      },
      'systemctl_list_units_completed'
    );

    return enriched;
  }

  // This method loads per-unit properties in bounded chunks so argument lists stay short.
  private async enrich(records: ServiceRecord[]): Promise<ServiceRecord[]> {
    const properties = new Map<string, Record<string, string>>();

    for (let offset = 0; offset < records.length; offset += SHOW_CHUNK_SIZE) {
      const units = records.slice(offset, offset + SHOW_CHUNK_SIZE).map((record) => record.unit);
      const { stdout } = await this.run(
        this.systemctlPath,
        ['show', '--no-pager', '--timestamp=unix', `--property=${SHOW_PROPERTIES.join(',')}`, '--', ...units],
        { timeoutMs: this.options.timeoutMs }
      );
      for (const [id, block] of parseShowBlocks(stdout)) {
        properties.set(id, block);
      }
    }

    return records.map((record) => applyShowProperties(record, properties.get(record.unit)));
  }
}
