// This module runs host binaries without a shell and maps failures onto adapter errors.

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { AdapterError } from '../utils/errors.js';

const execFileAsync = promisify(execFile);

export const DEFAULT_MAX_BUFFER_BYTES = 64 * 1024 * 1024;

export interface CommandOptions {
  timeoutMs: number;
  maxBufferBytes?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[], options: CommandOptions) => Promise<CommandResult>;

// This helper trims stderr so adapter errors stay readable in server-side logs.
function stderrExcerpt(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    const trimmed = error.stderr.trim();
    return trimmed ? trimmed.slice(0, 512) : undefined;
  }
  return undefined;
}

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

function wasKilled(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'killed' in error && error.killed === true;
}

// This function executes one command with a hard timeout; output is forced to uncoloured C-locale text.
export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      encoding: 'utf8',
      timeout: options.timeoutMs,
      maxBuffer: options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES,
      env: { ...process.env, SYSTEMD_COLORS: '0', SYSTEMD_PAGER: '', LC_ALL: 'C' },
      windowsHide: true
    });
    return { stdout, stderr };
  } catch (error) {
    if (errorCode(error) === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
      throw new AdapterError('adapter_error', `${command} produced more output than the buffer allows.`, {
        cause: error
      });
    }

    if (wasKilled(error)) {
      throw new AdapterError('adapter_timeout', `${command} did not finish within ${options.timeoutMs}ms.`, {
        cause: error
      });
    }

    const excerpt = stderrExcerpt(error);
    throw new AdapterError('adapter_error', `${command} failed${excerpt ? `: ${excerpt}` : '.'}`, { cause: error });
  }
};
