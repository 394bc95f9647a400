// This module owns the MCP method table, capability advertisement, and protocol version negotiation.

import { z } from 'zod';
import type { MonitoringContext } from '../monitoring/context.js';
import type { JsonRpcRequest, ServerCapabilities } from '../types/mcp.js';
import { parseWithCodes, type FieldErrorCodes } from '../utils/validation.js';
import { DEFAULT_PROTOCOL_VERSION, SERVER_NAME, SERVER_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from '../version.js';
import { buildResourceList, readResource } from './resources.js';
import { buildToolList } from './tool-schemas.js';
import { executeTool } from './tools.js';

export type MethodParams = JsonRpcRequest['params'];
export type MethodHandler = (params: MethodParams, context: MonitoringContext) => Promise<Record<string, unknown>>;

const initializeParamsSchema = z.object({
  protocolVersion: z.string().min(1),
  clientInfo: z
    .object({
      name: z.string(),
      version: z.string()
    })
    .passthrough(),
  capabilities: z.record(z.unknown())
});

const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional()
});

const resourceReadParamsSchema = z.object({
  uri: z.string().min(1)
});

// Protocol-level params report invalid_params regardless of the failing field.
const protocolErrorCodes: FieldErrorCodes = { invalid: {} };

// This helper picks the client's protocol version when supported and otherwise offers the default.
export function negotiateProtocolVersion(requested: string): string {
  return SUPPORTED_PROTOCOL_VERSIONS.find((version) => version === requested) ?? DEFAULT_PROTOCOL_VERSION;
}

// This function derives advertised capabilities from the methods actually registered.
export function buildServerCapabilities(methodNames: Iterable<string>): ServerCapabilities {
  const names = new Set(methodNames);
  const capabilities: ServerCapabilities = {};

  if (names.has('tools/list') && names.has('tools/call')) {
    capabilities.tools = { listChanged: false };
  }

  if (names.has('resources/list') && names.has('resources/read')) {
    capabilities.resources = { subscribe: false, listChanged: false };
  }

  if (names.has('prompts/list') && names.has('prompts/get')) {
    capabilities.prompts = { listChanged: false };
  }

  return capabilities;
}

async function handleInitialize(params: MethodParams, context: MonitoringContext): Promise<Record<string, unknown>> {
  const input = parseWithCodes(initializeParamsSchema, params, protocolErrorCodes);
  const protocolVersion = negotiateProtocolVersion(input.protocolVersion);

  context.logger.info(
    {
      event: 'mcp_initialize',
      requestedProtocolVersion: input.protocolVersion,
      protocolVersion,
      clientName: input.clientInfo.name,
      clientVersion: input.clientInfo.version
    },
    'mcp_initialize'
  );

  return {
    protocolVersion,
    capabilities: serverCapabilities,
    serverInfo: {
      name: SERVER_NAME,
      version: SERVER_VERSION
    }
  };
}

async function handlePing(): Promise<Record<string, unknown>> {
  return {};
}

async function handleInitialized(): Promise<Record<string, unknown>> {
  return {};
}

async function handleToolsList(): Promise<Record<string, unknown>> {
  return { tools: buildToolList() };
}

async function handleToolsCall(params: MethodParams, context: MonitoringContext): Promise<Record<string, unknown>> {
  const input = parseWithCodes(toolCallParamsSchema, params, protocolErrorCodes);
  return executeTool(input.name, input.arguments, context);
}

async function handleResourcesList(): Promise<Record<string, unknown>> {
  return { resources: buildResourceList() };
}

async function handleResourcesRead(params: MethodParams, context: MonitoringContext): Promise<Record<string, unknown>> {
  const input = parseWithCodes(resourceReadParamsSchema, params, protocolErrorCodes);
  return readResource(input.uri, context);
}

const methodTable: ReadonlyMap<string, MethodHandler> = new Map<string, MethodHandler>([
  ['initialize', handleInitialize],
  ['ping', handlePing],
  ['notifications/initialized', handleInitialized],
  ['tools/list', handleToolsList],
  ['tools/call', handleToolsCall],
  ['resources/list', handleResourcesList],
  ['resources/read', handleResourcesRead]
]);

const serverCapabilities: ServerCapabilities = Object.freeze(buildServerCapabilities(methodTable.keys()));

// This helper resolves a method name to its handler, or undefined when the method is not registered.
export function lookupMethod(method: string): MethodHandler | undefined {
  return methodTable.get(method);
}
