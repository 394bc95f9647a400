// This module binds the JSON-RPC dispatch engine to the streamable HTTP MCP endpoint.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AccessGate } from '../http/auth.js';
import type { MonitoringContext } from '../monitoring/context.js';
import type { AuthContext } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { MCP_ENDPOINT_PATH } from '../version.js';
import { dispatchMcpPayload } from './dispatch.js';

declare module 'fastify' {
  interface FastifyRequest {
    mcpAuth: AuthContext | null;
  }
}

export interface McpRouteDeps {
  gate: AccessGate;
  monitoring: Omit<MonitoringContext, 'logger'>;
}

// This function registers the MCP routes; every route under the endpoint passes the access gate first.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  fastify.decorateRequest('mcpAuth', null);

  // Uses the raw socket address; X-Forwarded-For is only honoured by the gate for trusted proxies.
  const authorize = async (request: FastifyRequest): Promise<void> => {
    request.mcpAuth = deps.gate(
      {
        peerAddress: request.raw.socket.remoteAddress,
        headers: request.headers
      },
      request.log
    );
  };

  fastify.post(MCP_ENDPOINT_PATH, { onRequest: authorize }, async (request: FastifyRequest, reply: FastifyReply) => {
    const auth = request.mcpAuth;
    const requestLogger = request.log.child({
      component: 'mcp',
      clientIp: auth?.clientIp ?? null
    });

    const raw = typeof request.body === 'string' ? request.body : '';
    const outcome = await dispatchMcpPayload(raw, { ...deps.monitoring, logger: requestLogger });

    switch (outcome.kind) {
      case 'none':
        reply.code(202).send();
        return;
      case 'single':
        reply.code(200).send(outcome.response);
        return;
      case 'batch':
        reply.code(200).send(outcome.responses);
        return;
    }
  });

  // This route keeps SSE transport disabled because this service answers only POST.
  fastify.get(MCP_ENDPOINT_PATH, { onRequest: authorize }, async (_request, reply) => {
    reply.header('Allow', 'POST');
    throw new AppError(405, 'method_not_allowed', 'Use POST for MCP requests.');
  });
}
