// This module loads and validates the immutable process configuration from environment variables.

import { isIP } from 'node:net';
import { z } from 'zod';
import type { CidrRule } from '../types/domain.js';
import { formatCidr, parseCidr } from '../utils/cidr.js';
import { AppError } from '../utils/errors.js';

export const MIN_API_TOKEN_LENGTH = 16;

export interface AppConfig {
  apiToken: string;
  bindAddr: string;
  bindPort: number;
  allowedCidr: CidrRule | null;
  trustedProxies: readonly CidrRule[];
  logLevel: string;
  adapterTimeoutMs: number;
  journalMaxEntries: number;
  bodyLimitBytes: number;
}

export class ConfigError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super(500, 'invalid_config', message, details);
    this.name = 'ConfigError';
  }
}

// This helper turns blank environment values into undefined so defaults apply.
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function integerFromEnv(min: number, max: number, fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));
}

const envSchema = z.object({
  MCP_API_TOKEN: z
    .string({ required_error: 'MCP_API_TOKEN is required.' })
    .trim()
    .min(MIN_API_TOKEN_LENGTH, `MCP_API_TOKEN must be at least ${MIN_API_TOKEN_LENGTH} characters.`),
  BIND_ADDR: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .refine((value) => isIP(value) !== 0, 'BIND_ADDR must be an IPv4 or IPv6 address.')
      .default('127.0.0.1')
  ),
  BIND_PORT: integerFromEnv(1, 65_535, 8080),
  MCP_ALLOWED_CIDR: z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform((value, ctx) => {
        const rule = parseCidr(value);
        if (!rule) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'MCP_ALLOWED_CIDR must be a valid CIDR range with a non-zero prefix.'
          });
          return z.NEVER;
        }
        return rule;
      })
      .optional()
  ),
  MCP_TRUSTED_PROXIES: z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform((value, ctx) => {
        const rules: CidrRule[] = [];
        for (const item of value.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0)) {
          const rule = parseCidr(item, { allowBareIp: true });
          if (!rule) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `MCP_TRUSTED_PROXIES entry is not a valid IP or CIDR: ${item}`
            });
            return z.NEVER;
          }
          rules.push(rule);
        }
        return rules;
      })
      .default('')
  ),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
  MCP_ADAPTER_TIMEOUT_MS: integerFromEnv(100, 300_000, 10_000),
  MCP_JOURNAL_MAX_ENTRIES: integerFromEnv(1, 1_000_000, 10_000),
  MCP_BODY_LIMIT_BYTES: integerFromEnv(1024, 16 * 1024 * 1024, 1024 * 1024)
});

// This function builds the frozen runtime configuration and fails startup on any invalid value.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? issue.path.join('.') : 'environment';
    throw new ConfigError(issue?.message ?? 'Invalid configuration.', { variable });
  }

  const values = parsed.data;
  return Object.freeze({
    apiToken: values.MCP_API_TOKEN,
    bindAddr: values.BIND_ADDR,
    bindPort: values.BIND_PORT,
    allowedCidr: values.MCP_ALLOWED_CIDR ?? null,
    trustedProxies: Object.freeze(values.MCP_TRUSTED_PROXIES),
    logLevel: values.LOG_LEVEL,
    adapterTimeoutMs: values.MCP_ADAPTER_TIMEOUT_MS,
    journalMaxEntries: values.MCP_JOURNAL_MAX_ENTRIES,
    bodyLimitBytes: values.MCP_BODY_LIMIT_BYTES
  });
}

// This helper returns a log-safe description of the active configuration.
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    bindAddr: config.bindAddr,
    bindPort: config.bindPort,
    allowedCidr: config.allowedCidr ? formatCidr(config.allowedCidr) : null,
    trustedProxies: config.trustedProxies.map(formatCidr),
    logLevel: config.logLevel,
    adapterTimeoutMs: config.adapterTimeoutMs,
    journalMaxEntries: config.journalMaxEntries,
    bodyLimitBytes: config.bodyLimitBytes
  };
}
