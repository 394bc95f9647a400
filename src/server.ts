// This module wires HTTP routes, request lifecycle logging, and error rendering for the gateway.

import Fastify, { type FastifyInstance } from 'fastify';
import type { AppConfig } from './config/config.js';
import { BEARER_CHALLENGE, createAccessGate } from './http/auth.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import type { LogReader, UnitLister } from './types/domain.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_ENDPOINT_PATH, SERVER_NAME, SERVER_VERSION } from './version.js';

export interface ServerDeps {
  config: AppConfig;
  unitLister: UnitLister;
  logReader: LogReader;
  now?: () => Date;
}

export interface ServerResources {
  app: FastifyInstance;
}

// This helper classifies framework and application failures into the HTTP error envelope.
export function toHttpError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    const statusCode = error.statusCode;
    if (statusCode === 415) {
      return new AppError(415, 'unsupported_media_type', 'Content-Type must be application/json.');
    }
    if (statusCode === 413) {
      return new AppError(413, 'payload_too_large', 'Request body exceeds the configured limit.');
    }
    if (statusCode >= 400 && statusCode < 500) {
      return new AppError(statusCode, 'bad_request', error.message);
    }
  }

  return normalizeError(error);
}

// This function builds and configures the full HTTP application.
export function createServer(deps: ServerDeps): ServerResources {
  const { config } = deps;

  // Proxy headers are evaluated by the MCP access gate only, against the trusted proxy list.
  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: config.bodyLimitBytes,
    trustProxy: false
  });

  // The JSON-RPC codec parses bodies itself so malformed JSON becomes a -32700 response.
  app.removeContentTypeParser(['application/json', 'text/plain']);
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.addHook('onRequest', async (request) => {
    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        peerAddress: request.raw.socket.remoteAddress ?? null,
        userAgent: request.headers['user-agent'] ?? null,
        contentLength: request.headers['content-length'] ?? null
      },
      'http_request_start'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs: reply.elapsedTime
      },
      'http_request_complete'
    );
  });

  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  app.get('/.well-known/mcp', async () => {
    return {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      mcp_endpoint: MCP_ENDPOINT_PATH
    };
  });

  registerMcpRoutes(app, {
    gate: createAccessGate(config),
    monitoring: {
      unitLister: deps.unitLister,
      logReader: deps.logReader,
      adapterTimeoutMs: config.adapterTimeoutMs,
      now: deps.now ?? (() => new Date())
    }
  });

  // This handler maps exceptions into the {code, message, details} envelope; 5xx bodies stay generic.
  app.setErrorHandler((error, request, reply) => {
    const normalized = toHttpError(error);
    const status = normalized.statusCode;
    const logPayload = {
      event: 'http_request_failed',
      requestId: request.id,
      statusCode: status,
      code: normalized.code,
      details: sanitizeForLog(normalized.details),
      error: errorForLog(error)
    };

    if (status >= 500) {
      request.log.error(logPayload, 'http_request_failed');
    } else {
      request.log.warn(logPayload, 'http_request_failed');
    }

    if (status === 401) {
      reply.header('WWW-Authenticate', BEARER_CHALLENGE);
    }

    reply.status(status).send({
      code: normalized.code,
      message: status >= 500 ? 'Internal server error.' : normalized.message,
      details: status >= 500 ? {} : normalized.details ?? {}
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      code: error.code,
      message: error.message,
      details: {}
    });
  });

  return { app };
}
