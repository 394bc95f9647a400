// This file defines JSON-RPC and MCP protocol payload types used by the HTTP transport.

import type { zodToJsonSchema } from 'zod-to-json-schema';

export type JsonRpcId = string | number;
export type JsonSchema = ReturnType<typeof zodToJsonSchema>;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown> | unknown[];
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: Record<string, unknown>;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export interface McpTool {
  name: string;
  title: string;
  description: string;
  inputSchema: JsonSchema;
  outputSchema: JsonSchema;
}

export interface McpResource {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ServerCapabilities {
  tools?: { listChanged: boolean };
  resources?: { subscribe: boolean; listChanged: boolean };
  prompts?: { listChanged: boolean };
}

// Results are type aliases so they stay assignable to JSON-RPC result records.
export type ToolCallResult = {
  content: Array<{ type: 'text'; text: string }>;
  structuredContent: Record<string, unknown>;
};

export type ResourceReadResult = {
  contents: Array<{ uri: string; mimeType: string; text: string }>;
};
