// This module runs decoded JSON-RPC payloads through the method table and aggregates responses.

import type { MonitoringContext } from '../monitoring/context.js';
import type { JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { errorForLog, redactAuditParams, sanitizeForLog } from '../utils/logger.js';
import { lookupMethod } from './registry.js';
import {
  JSON_RPC_ERRORS,
  decodePayload,
  isNotification,
  mapAppErrorToRpc,
  rpcError,
  rpcResult,
  validateEnvelope
} from './rpc.js';

export type DispatchOutcome =
  | { kind: 'single'; response: JsonRpcResponse }
  | { kind: 'batch'; responses: JsonRpcResponse[] }
  | { kind: 'none' };

type CallOutcome = 'success' | 'failure';

// This helper emits the per-call audit record with credentials redacted from params.
function auditCall(
  request: JsonRpcRequest,
  outcome: CallOutcome,
  startedAt: number,
  context: MonitoringContext,
  errorCode?: string
): void {
  context.logger.info(
    {
      event: 'mcp_audit',
      method: request.method,
      rpcRequestId: request.id ?? null,
      notification: isNotification(request),
      params: redactAuditParams(request.params),
      outcome,
      errorCode,
      durationMs: Date.now() - startedAt
    },
    'mcp_audit'
  );
}

// This function executes one validated request and returns null for notifications.
export async function handleRequest(
  request: JsonRpcRequest,
  context: MonitoringContext
): Promise<JsonRpcResponse | null> {
  const startedAt = Date.now();
  const handler = lookupMethod(request.method);

  if (!handler) {
    auditCall(request, 'failure', startedAt, context, 'method_not_found');
    if (request.id === undefined) {
      return null;
    }
    return rpcError(request.id, {
      ...JSON_RPC_ERRORS.methodNotFound,
      data: {
        code: 'method_not_found',
        message: `Unknown method: ${request.method}`,
        details: { method: request.method }
      }
    });
  }

  try {
    const result = await handler(request.params, context);
    auditCall(request, 'success', startedAt, context);
    return request.id === undefined ? null : rpcResult(request.id, result);
  } catch (error) {
    const appError = normalizeError(error);
    auditCall(request, 'failure', startedAt, context, appError.code);

    if (appError.statusCode >= 500) {
      context.logger.error(
        {
          event: 'mcp_rpc_request_failed',
          method: request.method,
          rpcRequestId: request.id ?? null,
          code: appError.code,
          statusCode: appError.statusCode,
          details: sanitizeForLog(appError.details),
          error: errorForLog(error)
        },
        'mcp_rpc_request_failed'
      );
    }

    return request.id === undefined ? null : rpcError(request.id, mapAppErrorToRpc(appError));
  }
}

// This helper validates one member and either answers it with -32600 or executes it.
async function handleMember(member: unknown, context: MonitoringContext): Promise<JsonRpcResponse | null> {
  const envelope = validateEnvelope(member);
  if (!envelope.valid) {
    context.logger.warn(
      {
        event: 'mcp_invalid_request',
        rpcRequestId: envelope.id,
        reason: envelope.reason
      },
      'mcp_invalid_request'
    );
    return rpcError(envelope.id, {
      ...JSON_RPC_ERRORS.invalidRequest,
      data: { code: 'invalid_request', message: envelope.reason, details: {} }
    });
  }

  const { request } = envelope;
  try {
    return await handleRequest(request, context);
  } catch (error) {
    // A failure outside the method handler still answers only this member.
    context.logger.error(
      {
        event: 'mcp_member_failed',
        method: request.method,
        rpcRequestId: request.id ?? null,
        error: errorForLog(error)
      },
      'mcp_member_failed'
    );
    return request.id === undefined
      ? null
      : rpcError(request.id, { ...JSON_RPC_ERRORS.internalError, data: { code: 'internal_error' } });
  }
}

// This function decodes one raw HTTP body and returns the responses to send, if any.
export async function dispatchMcpPayload(raw: string, context: MonitoringContext): Promise<DispatchOutcome> {
  const decoded = decodePayload(raw);

  switch (decoded.kind) {
    case 'parse_error': {
      context.logger.warn({ event: 'mcp_parse_error', bodyLength: raw.length }, 'mcp_parse_error');
      return {
        kind: 'single',
        response: rpcError(null, {
          ...JSON_RPC_ERRORS.parseError,
          data: { code: 'parse_error', message: 'Request body is not valid JSON.', details: {} }
        })
      };
    }

    case 'empty_batch': {
      return {
        kind: 'single',
        response: rpcError(null, {
          ...JSON_RPC_ERRORS.invalidRequest,
          data: { code: 'invalid_request', message: 'Batch must not be empty.', details: {} }
        })
      };
    }

    case 'single': {
      const response = await handleMember(decoded.member, context);
      return response ? { kind: 'single', response } : { kind: 'none' };
    }

    case 'batch': {
      context.logger.debug(
        { event: 'mcp_batch_received', batchSize: decoded.members.length },
        'mcp_batch_received'
      );
      const settled = await Promise.all(decoded.members.map((member) => handleMember(member, context)));
      const responses = settled.filter((response): response is JsonRpcResponse => response !== null);
      return responses.length > 0 ? { kind: 'batch', responses } : { kind: 'none' };
    }
  }
}
