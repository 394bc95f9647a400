// This module defines MCP tool contracts with strict input validation and published output shapes.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { SERVICE_STATES } from '../types/domain.js';
import type { JsonSchema, McpTool } from '../types/mcp.js';
import type { FieldErrorCodes } from '../utils/validation.js';

export const DEFAULT_LIMIT = 200;
export const MAX_LIMIT = 1000;

export const UNIT_NAME_PATTERN = /^[A-Za-z0-9._@:-]+$/;

export const PRIORITY_NAMES = [
  'emerg',
  'panic',
  'alert',
  'crit',
  'critical',
  'err',
  'error',
  'warning',
  'warn',
  'notice',
  'info',
  'informational',
  'debug',
  '0',
  '1',
  '2',
  '3',
  '4',
  '5',
  '6',
  '7'
] as const;

export type PriorityName = (typeof PRIORITY_NAMES)[number];

// Aliases accepted for journald priorities; digits map to themselves.
export const PRIORITY_LEVELS: Readonly<Record<PriorityName, number>> = {
  emerg: 0,
  panic: 0,
  alert: 1,
  crit: 2,
  critical: 2,
  err: 3,
  error: 3,
  warning: 4,
  warn: 4,
  notice: 5,
  info: 6,
  informational: 6,
  debug: 7,
  '0': 0,
  '1': 1,
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7
};

// This helper lowercases and trims string inputs before enum checks so matching is case-insensitive.
function normalizeToken(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toLowerCase() : value;
}

const limitSchema = z
  .number()
  .int()
  .min(1)
  .max(MAX_LIMIT)
  .default(DEFAULT_LIMIT)
  .describe(`Maximum number of items to return (1-${MAX_LIMIT}).`);

export const unitNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(256)
  .regex(UNIT_NAME_PATTERN, 'Unit names may contain only ASCII letters, digits, and . - _ @ :');

export const listServicesSchema = z
  .object({
    state: z
      .preprocess(normalizeToken, z.enum(SERVICE_STATES))
      .optional()
      .describe('Filter by active state (case-insensitive).'),
    name_contains: z.string().max(256).optional().describe('Plain substring the unit name must contain.'),
    limit: limitSchema
  })
  .strict();

export const listLogsSchema = z
  .object({
    priority: z
      .preprocess(normalizeToken, z.union([z.number().int().min(0).max(7), z.enum(PRIORITY_NAMES)]))
      .optional()
      .describe('Minimum severity: 0-7 or an alias such as "err"; includes more severe entries.'),
    unit: unitNameSchema.optional().describe('Only entries from this systemd unit.'),
    start_utc: z.string({ required_error: 'start_utc is required.' }).describe('Window start, RFC3339 UTC ending with Z.'),
    end_utc: z.string({ required_error: 'end_utc is required.' }).describe('Window end, RFC3339 UTC ending with Z.'),
    grep: z
      .string()
      .max(512)
      .optional()
      .describe('Substring the message must contain; wrap in slashes (/re/) for a regular expression.'),
    exclude_units: z.array(unitNameSchema).max(100).optional().describe('Units whose entries are dropped.'),
    order: z.preprocess(normalizeToken, z.enum(['asc', 'desc'])).default('desc').describe('Timestamp sort order.'),
    allow_large_window: z.boolean().default(false).describe('Permit windows wider than 7 days.'),
    limit: limitSchema
  })
  .strict();

export type ListServicesInput = z.output<typeof listServicesSchema>;
export type ListLogsInput = z.output<typeof listLogsSchema>;

export const listServicesErrorCodes: FieldErrorCodes = {
  invalid: {
    state: 'invalid_state',
    name_contains: 'invalid_name_contains',
    limit: 'invalid_limit'
  }
};

export const listLogsErrorCodes: FieldErrorCodes = {
  invalid: {
    priority: 'invalid_priority',
    unit: 'invalid_unit',
    exclude_units: 'invalid_unit',
    start_utc: 'invalid_utc_time',
    end_utc: 'invalid_utc_time',
    grep: 'invalid_grep',
    order: 'invalid_order',
    allow_large_window: 'invalid_allow_large_window',
    limit: 'invalid_limit'
  },
  missing: {
    start_utc: 'missing_time_range',
    end_utc: 'missing_time_range'
  }
};

export const serviceRecordSchema = z
  .object({
    unit: z.string(),
    description: z.string(),
    load_state: z.string(),
    active_state: z.string(),
    sub_state: z.string(),
    unit_file_state: z.string().optional(),
    since_utc: z.string().optional(),
    main_pid: z.number().int().optional(),
    exec_main_status: z.number().int().optional(),
    result: z.string().optional()
  })
  .strict();

export const logEntrySchema = z
  .object({
    timestamp_utc: z.string(),
    unit: z.string().optional(),
    priority: z.number().int().min(0).max(7),
    hostname: z.string().optional(),
    pid: z.number().int().optional(),
    message: z.string().optional(),
    cursor: z.string().optional()
  })
  .strict();

export const listServicesOutputSchema = z
  .object({
    services: z.array(serviceRecordSchema),
    total: z.number().int().min(0),
    returned: z.number().int().min(0),
    truncated: z.boolean(),
    generated_at_utc: z.string()
  })
  .strict();

export const listLogsOutputSchema = z
  .object({
    entries: z.array(logEntrySchema),
    total_scanned: z.number().int().min(0),
    returned: z.number().int().min(0),
    truncated: z.boolean(),
    generated_at_utc: z.string(),
    window: z
      .object({
        start_utc: z.string(),
        end_utc: z.string()
      })
      .strict()
  })
  .strict();

// This helper converts one zod schema into an inline JSON Schema document for tool discovery.
export function toJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  return zodToJsonSchema(schema, { $refStrategy: 'none', target: 'jsonSchema7' });
}

export const TOOL_NAMES = ['list_services', 'list_logs'] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

const toolDefinitions: Record<ToolName, { title: string; description: string; input: z.ZodTypeAny; output: z.ZodTypeAny }> = {
  list_services: {
    title: 'List services',
    description: 'List systemd service units with load, active, and sub state. Sorted by unit; failed units first when state=failed.',
    input: listServicesSchema,
    output: listServicesOutputSchema
  },
  list_logs: {
    title: 'List logs',
    description: 'Read journald entries inside a bounded UTC window with priority, unit, grep, and exclusion filters.',
    input: listLogsSchema,
    output: listLogsOutputSchema
  }
};

// Built once; tool discovery is static for the process lifetime.
const toolList: readonly McpTool[] = Object.freeze(
  TOOL_NAMES.map((name) => ({
    name,
    title: toolDefinitions[name].title,
    description: toolDefinitions[name].description,
    inputSchema: toJsonSchema(toolDefinitions[name].input),
    outputSchema: toJsonSchema(toolDefinitions[name].output)
  }))
);

// This helper exports MCP tool metadata so discovery always reflects the implemented tool surface.
export function buildToolList(): readonly McpTool[] {
  return toolList;
}

// This guard narrows an arbitrary tool name to a registered one.
export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}
