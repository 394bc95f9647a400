// This module decodes JSON-RPC 2.0 envelopes and builds canonical success and error responses.

import type { AppError } from '../utils/errors.js';
import type {
  JsonRpcError,
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcSuccessResponse
} from '../types/mcp.js';

export const JSON_RPC_ERRORS = {
  parseError: { code: -32700, message: 'Parse error' },
  invalidRequest: { code: -32600, message: 'Invalid Request' },
  methodNotFound: { code: -32601, message: 'Method not found' },
  invalidParams: { code: -32602, message: 'Invalid params' },
  internalError: { code: -32603, message: 'Internal error' }
} as const;

export type DecodedPayload =
  | { kind: 'parse_error' }
  | { kind: 'empty_batch' }
  | { kind: 'single'; member: unknown }
  | { kind: 'batch'; members: unknown[] };

export type EnvelopeCheck =
  | { valid: true; request: JsonRpcRequest }
  | { valid: false; id: JsonRpcId | null; reason: string };

// This helper decodes one raw request body without throwing.
export function decodePayload(raw: string): DecodedPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { kind: 'parse_error' };
  }

  if (Array.isArray(parsed)) {
    return parsed.length === 0 ? { kind: 'empty_batch' } : { kind: 'batch', members: parsed };
  }

  return { kind: 'single', member: parsed };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// This guard accepts only the id types JSON-RPC allows on requests; null is rejected.
export function isJsonRpcId(value: unknown): value is JsonRpcId {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

// This function validates one batch member or single payload as a JSON-RPC request object.
export function validateEnvelope(value: unknown): EnvelopeCheck {
  if (!isRecord(value)) {
    return { valid: false, id: null, reason: 'Request must be a JSON object.' };
  }

  const hasId = Object.prototype.hasOwnProperty.call(value, 'id');
  const rawId = value.id;
  const id = isJsonRpcId(rawId) ? rawId : null;

  if (value.jsonrpc !== '2.0') {
    return { valid: false, id, reason: 'jsonrpc must equal "2.0".' };
  }

  const method = value.method;
  if (typeof method !== 'string' || method.length === 0) {
    return { valid: false, id, reason: 'method must be a non-empty string.' };
  }

  if (hasId && id === null) {
    return { valid: false, id: null, reason: 'id must be a string or a number.' };
  }

  const params = value.params;
  if (params !== undefined && !isRecord(params) && !Array.isArray(params)) {
    return { valid: false, id, reason: 'params must be an object or an array.' };
  }

  const request: JsonRpcRequest = { jsonrpc: '2.0', method };
  if (id !== null) {
    request.id = id;
  }
  if (params !== undefined) {
    request.params = params;
  }

  return { valid: true, request };
}

// This helper returns true when a request carries no id and therefore expects no response.
export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === undefined;
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId | null, error: JsonRpcError): JsonRpcErrorResponse {
  return {
    jsonrpc: '2.0',
    id,
    error
  };
}

// This helper creates a canonical JSON-RPC success payload.
export function rpcResult(id: JsonRpcId, result: Record<string, unknown>): JsonRpcSuccessResponse {
  return {
    jsonrpc: '2.0',
    id,
    result
  };
}

// This helper maps application errors into JSON-RPC codes; server-side failures stay opaque.
export function mapAppErrorToRpc(error: AppError): JsonRpcError {
  if (error.statusCode >= 500) {
    return { ...JSON_RPC_ERRORS.internalError, data: { code: error.code } };
  }

  const data: Record<string, unknown> = {
    code: error.code,
    message: error.message,
    details: error.details ?? {}
  };

  if (error.statusCode === 404) {
    return { ...JSON_RPC_ERRORS.methodNotFound, data };
  }

  return { ...JSON_RPC_ERRORS.invalidParams, data };
}
