// This module contains the source-address restriction and bearer token guard for the MCP endpoint.

import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import type { AppConfig } from '../config/config.js';
import type { AuthContext } from '../types/domain.js';
import { IpRuleSet, normalizeIp } from '../utils/cidr.js';
import { AppError } from '../utils/errors.js';
import type { AppLogger } from '../utils/logger.js';

export const BEARER_CHALLENGE = 'Bearer realm="mcp"';

export interface GateInput {
  peerAddress: string | undefined;
  headers: IncomingHttpHeaders;
}

export type AccessGate = (input: GateInput, logger: AppLogger) => AuthContext;

// Per-process key; digests of equal length make comparison time independent of the inputs.
const comparisonKey = randomBytes(32);

// This helper extracts bearer tokens from Authorization headers; the scheme is case-insensitive.
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const trimmed = authHeader.trim();
  const separator = trimmed.indexOf(' ');
  if (separator === -1) {
    return null;
  }

  const scheme = trimmed.slice(0, separator);
  const token = trimmed.slice(separator + 1).trim();
  if (scheme.toLowerCase() !== 'bearer' || !token) {
    return null;
  }

  return token;
}

// This helper compares secrets through keyed digests so neither length nor mismatch position leaks timing.
export function constantTimeEquals(left: string, right: string): boolean {
  const leftDigest = createHmac('sha256', comparisonKey).update(left, 'utf8').digest();
  const rightDigest = createHmac('sha256', comparisonKey).update(right, 'utf8').digest();
  return timingSafeEqual(leftDigest, rightDigest);
}

// This helper returns the left-most X-Forwarded-For entry, if any.
function firstForwardedFor(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) {
    return undefined;
  }

  const first = value.split(',')[0]?.trim();
  return first ? first : undefined;
}

// This function resolves the effective client IP, honouring X-Forwarded-For only from trusted proxies.
export function resolveClientIp(
  peerAddress: string | undefined,
  forwardedFor: string | string[] | undefined,
  trustedProxies: IpRuleSet
): string | null {
  const peer = peerAddress ? normalizeIp(peerAddress) : null;
  if (!peer) {
    return null;
  }

  if (trustedProxies.size === 0 || !trustedProxies.contains(peer)) {
    return peer;
  }

  const forwarded = firstForwardedFor(forwardedFor);
  return forwarded ? normalizeIp(forwarded) : null;
}

// This function builds the MCP access gate once from the frozen configuration.
export function createAccessGate(config: AppConfig): AccessGate {
  const allowed = config.allowedCidr ? new IpRuleSet([config.allowedCidr]) : null;
  const trustedProxies = new IpRuleSet(config.trustedProxies);

  return function authorizeRequest(input: GateInput, logger: AppLogger): AuthContext {
    const clientIp = resolveClientIp(input.peerAddress, input.headers['x-forwarded-for'], trustedProxies);

    const deny = (statusCode: 401 | 403, code: string, message: string): AppError => {
      logger.warn(
        {
          event: 'mcp_auth_denied',
          reason: code,
          clientIp,
          peerAddress: input.peerAddress ?? null
        },
        'mcp_auth_denied'
      );
      return new AppError(statusCode, code, message);
    };

    if (allowed && (!clientIp || !allowed.contains(clientIp))) {
      throw deny(403, 'ip_restricted', 'Client address is not allowed.');
    }

    const authorization = input.headers.authorization;
    if (authorization === undefined) {
      throw deny(401, 'missing_token', 'Missing bearer token.');
    }

    const token = extractBearerToken(authorization);
    if (!token || !constantTimeEquals(token, config.apiToken)) {
      throw deny(401, 'invalid_token', 'Invalid bearer token.');
    }

    const resolvedIp = clientIp ?? input.peerAddress ?? 'unknown';
    logger.debug({ event: 'mcp_auth_success', clientIp: resolvedIp }, 'mcp_auth_success');

    return { authenticated: true, clientIp: resolvedIp };
  };
}
