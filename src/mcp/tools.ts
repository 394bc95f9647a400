// This module implements MCP tool handlers on top of the monitoring query layer.

import type { ListLogsOutput, ListServicesOutput } from '../types/domain.js';
import type { ToolCallResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import type { MonitoringContext } from '../monitoring/context.js';
import { listLogs } from '../monitoring/logs.js';
import { listServices } from '../monitoring/services.js';
import { isToolName, type ToolName } from './tool-schemas.js';

// This helper wraps structured objects in both a short text summary and the structured field.
export function mcpResult(summary: string, payload: Record<string, unknown>): ToolCallResult {
  return {
    content: [{ type: 'text', text: summary }],
    structuredContent: payload
  };
}

// This helper renders the text block clients without structured-content support display.
export function summarizeServices(output: ListServicesOutput): string {
  const suffix = output.truncated ? ' (truncated)' : '';
  return `Returned ${output.returned} of ${output.total} services${suffix}`;
}

export function summarizeLogs(output: ListLogsOutput): string {
  const suffix = output.truncated ? ' (truncated)' : '';
  return `Returned ${output.returned} log entries from ${output.total_scanned} scanned${suffix}`;
}

async function handleListServices(args: unknown, context: MonitoringContext): Promise<ToolCallResult> {
  const output = await listServices(args, context);
  return mcpResult(summarizeServices(output), output);
}

async function handleListLogs(args: unknown, context: MonitoringContext): Promise<ToolCallResult> {
  const output = await listLogs(args, context);
  return mcpResult(summarizeLogs(output), output);
}

const toolHandlers: Record<ToolName, (args: unknown, context: MonitoringContext) => Promise<ToolCallResult>> = {
  list_services: handleListServices,
  list_logs: handleListLogs
};

// This function dispatches one tool call by name and logs its lifecycle.
export async function executeTool(toolName: string, args: unknown, context: MonitoringContext): Promise<ToolCallResult> {
  if (!isToolName(toolName)) {
    context.logger.warn(
      {
        event: 'mcp_tool_not_found',
        toolName: sanitizeForLog(toolName)
      },
      'mcp_tool_not_found'
    );
    throw new AppError(404, 'tool_not_found', `Unknown tool: ${toolName}`, { name: toolName });
  }

  const startedAt = Date.now();
  context.logger.debug(
    {
      event: 'mcp_tool_execution_started',
      toolName,
      args: sanitizeForLog(args)
    },
    'mcp_tool_execution_started'
  );

  try {
    const result = await toolHandlers[toolName](args, context);

    context.logger.debug(
      {
        event: 'mcp_tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt,
        summary: result.content[0]?.text
      },
      'mcp_tool_execution_completed'
    );

    return result;
  } catch (error) {
    context.logger.warn(
      {
        event: 'mcp_tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );
    throw error;
  }
}
