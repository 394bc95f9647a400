// This test suite verifies systemctl output parsing and unit enrichment through a fake runner.

import { describe, expect, it } from 'vitest';
import type { CommandRunner } from '../src/systemd/command.js';
import {
  SystemctlUnitLister,
  parseListUnits,
  parseShowBlocks,
  parseUnixTimestamp
} from '../src/systemd/unit-lister.js';
import { AdapterError } from '../src/utils/errors.js';
import { captureAppError, captureAsyncAppError, silentLogger } from './helpers/fakes.js';

const listUnitsOutput = JSON.stringify([
  { unit: 'nginx.service', load: 'loaded', active: 'active', sub: 'running', description: 'Web server' },
  { unit: 'dbus.socket', load: 'loaded', active: 'active', sub: 'running', description: 'Bus socket' },
  { unit: 'backup.service', load: 'loaded', active: 'failed', sub: 'failed', description: 'Nightly backup' }
]);

const showOutput = [
  'Id=nginx.service',
  'UnitFileState=enabled',
  'ActiveEnterTimestamp=@1736935200',
  'MainPID=812',
  'ExecMainStatus=0',
  'Result=success',
  '',
  'Id=backup.service',
  'UnitFileState=static',
  'ActiveEnterTimestamp=',
  'MainPID=0',
  'ExecMainStatus=2',
  'Result=exit-code',
  ''
].join('\n');

describe('systemctl parsing', () => {
  it('keeps service units only', () => {
    expect(parseListUnits(listUnitsOutput).map((record) => record.unit)).toEqual(['nginx.service', 'backup.service']);
    expect(parseListUnits('')).toEqual([]);
  });

  it('rejects unexpected list-units output', () => {
    expect(captureAppError(() => parseListUnits('not json')).code).toBe('adapter_error');
    expect(captureAppError(() => parseListUnits('{"unit":"x"}')).code).toBe('adapter_error');
  });

  it('splits show output into per-unit blocks', () => {
    const blocks = parseShowBlocks(showOutput);

    expect([...blocks.keys()]).toEqual(['nginx.service', 'backup.service']);
    expect(blocks.get('backup.service')?.Result).toBe('exit-code');
  });

  it('converts unix timestamps and ignores empty ones', () => {
    expect(parseUnixTimestamp('@1736935200')).toBe('2025-01-15T10:00:00.000Z');
    expect(parseUnixTimestamp('@0')).toBeUndefined();
    expect(parseUnixTimestamp('')).toBeUndefined();
    expect(parseUnixTimestamp(undefined)).toBeUndefined();
  });
});

describe('SystemctlUnitLister', () => {
  it('lists and enriches service units', async () => {
    const argsSeen: string[][] = [];
    const run: CommandRunner = async (_command, args) => {
      argsSeen.push([...args]);
      return { stdout: args[0] === 'show' ? showOutput : listUnitsOutput, stderr: '' };
    };
    const lister = new SystemctlUnitLister({ timeoutMs: 1000, logger: silentLogger(), run });

    const records = await lister.listUnits();

    expect(records).toEqual([
      {
        unit: 'nginx.service',
        description: 'Web server',
        load_state: 'loaded',
        active_state: 'active',
        sub_state: 'running',
        unit_file_state: 'enabled',
        since_utc: '2025-01-15T10:00:00.000Z',
        main_pid: 812,
        exec_main_status: 0,
        result: 'success'
      },
      {
        unit: 'backup.service',
        description: 'Nightly backup',
        load_state: 'loaded',
        active_state: 'failed',
        sub_state: 'failed',
        unit_file_state: 'static',
        exec_main_status: 2,
        result: 'exit-code'
      }
    ]);
    expect(argsSeen).toHaveLength(2);
    expect(argsSeen[1]?.slice(-3)).toEqual(['--', 'nginx.service', 'backup.service']);
  });

  it('returns base records when enrichment fails', async () => {
    const run: CommandRunner = async (_command, args) => {
      if (args[0] === 'show') {
        throw new AdapterError('adapter_error', 'systemctl show failed.');
      }
      return { stdout: listUnitsOutput, stderr: '' };
    };
    const lister = new SystemctlUnitLister({ timeoutMs: 1000, logger: silentLogger(), run });

    const records = await lister.listUnits();

    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      unit: 'nginx.service',
      description: 'Web server',
      load_state: 'loaded',
      active_state: 'active',
      sub_state: 'running'
    });
  });

  it('fails when the unit listing itself fails', async () => {
    const run: CommandRunner = async () => {
      throw new AdapterError('adapter_error', 'systemctl failed.');
    };
    const lister = new SystemctlUnitLister({ timeoutMs: 1000, logger: silentLogger(), run });

    expect((await captureAsyncAppError(lister.listUnits())).code).toBe('adapter_error');
  });
});
