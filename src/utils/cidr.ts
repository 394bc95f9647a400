// This module validates CIDR and IP rules and matches client addresses against them.

import { BlockList, isIP } from 'node:net';
import type { CidrRule, IpFamily } from '../types/domain.js';

const IPV4_MAPPED_PREFIX = '::ffff:';

// This helper maps a numeric isIP() result to the family label BlockList expects.
function familyOf(address: string): IpFamily | null {
  const version = isIP(address);
  if (version === 4) {
    return 'ipv4';
  }
  if (version === 6) {
    return 'ipv6';
  }
  return null;
}

// This helper canonicalizes one address so IPv4-mapped IPv6 peers match IPv4 rules.
export function normalizeIp(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed.toLowerCase().startsWith(IPV4_MAPPED_PREFIX)) {
    const embedded = trimmed.slice(IPV4_MAPPED_PREFIX.length);
    if (isIP(embedded) === 4) {
      return embedded;
    }
  }

  return isIP(trimmed) === 0 ? null : trimmed.toLowerCase();
}

// This function parses one CIDR string; allow-all ranges are rejected so filtering cannot be disabled by accident.
export function parseCidr(value: string, options: { allowBareIp?: boolean } = {}): CidrRule | null {
  const trimmed = value.trim();
  const slashIndex = trimmed.indexOf('/');

  if (slashIndex === -1) {
    const address = options.allowBareIp ? normalizeIp(trimmed) : null;
    const family = address ? familyOf(address) : null;
    if (!address || !family) {
      return null;
    }
    return { network: address, prefix: family === 'ipv4' ? 32 : 128, family };
  }

  const address = normalizeIp(trimmed.slice(0, slashIndex));
  const prefixRaw = trimmed.slice(slashIndex + 1);
  const family = address ? familyOf(address) : null;
  if (!address || !family || !/^\d{1,3}$/.test(prefixRaw)) {
    return null;
  }

  const prefix = Number(prefixRaw);
  const maxPrefix = family === 'ipv4' ? 32 : 128;
  if (prefix < 1 || prefix > maxPrefix) {
    return null;
  }

  return { network: address, prefix, family };
}

// This helper renders one rule back to canonical CIDR notation for logs and diagnostics.
export function formatCidr(rule: CidrRule): string {
  return `${rule.network}/${rule.prefix}`;
}

// This class answers membership checks for a fixed list of CIDR rules.
export class IpRuleSet {
  private readonly matcher = new BlockList();
  public readonly size: number;

  public constructor(rules: readonly CidrRule[]) {
    for (const rule of rules) {
      this.matcher.addSubnet(rule.network, rule.prefix, rule.family);
    }
    this.size = rules.length;
  }

  public contains(address: string): boolean {
    const normalized = normalizeIp(address);
    const family = normalized ? familyOf(normalized) : null;
    if (!normalized || !family) {
      return false;
    }

    return this.matcher.check(normalized, family);
  }
}
