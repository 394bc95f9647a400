// This test suite verifies environment configuration defaults, validation, and immutability.

import { describe, expect, it } from 'vitest';
import { ConfigError, describeConfig, loadConfig } from '../src/config/config.js';
import { TEST_TOKEN } from './helpers/fakes.js';

function configErrorFor(env: Record<string, string>): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConfigError.');
}

describe('loadConfig', () => {
  it('applies defaults when only the token is set', () => {
    const config = loadConfig({ MCP_API_TOKEN: TEST_TOKEN });

    expect(config).toEqual({
      apiToken: TEST_TOKEN,
      bindAddr: '127.0.0.1',
      bindPort: 8080,
      allowedCidr: null,
      trustedProxies: [],
      logLevel: 'info',
      adapterTimeoutMs: 10_000,
      journalMaxEntries: 10_000,
      bodyLimitBytes: 1_048_576
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('trims the token and treats blank values as unset', () => {
    const config = loadConfig({ MCP_API_TOKEN: `  ${TEST_TOKEN}  `, BIND_PORT: '', MCP_ALLOWED_CIDR: ' ' });

    expect(config.apiToken).toBe(TEST_TOKEN);
    expect(config.bindPort).toBe(8080);
    expect(config.allowedCidr).toBeNull();
  });

  it('parses address rules', () => {
    const config = loadConfig({
      MCP_API_TOKEN: TEST_TOKEN,
      BIND_ADDR: '0.0.0.0',
      BIND_PORT: '9090',
      MCP_ALLOWED_CIDR: '192.168.0.0/16',
      MCP_TRUSTED_PROXIES: '127.0.0.1, 10.0.0.0/8'
    });

    expect(config.bindAddr).toBe('0.0.0.0');
    expect(config.bindPort).toBe(9090);
    expect(config.allowedCidr).toEqual({ network: '192.168.0.0', prefix: 16, family: 'ipv4' });
    expect(config.trustedProxies).toEqual([
      { network: '127.0.0.1', prefix: 32, family: 'ipv4' },
      { network: '10.0.0.0', prefix: 8, family: 'ipv4' }
    ]);
    expect(describeConfig(config)).toMatchObject({
      allowedCidr: '192.168.0.0/16',
      trustedProxies: ['127.0.0.1/32', '10.0.0.0/8']
    });
    expect(describeConfig(config)).not.toHaveProperty('apiToken');
  });

  it('names the offending variable on failure', () => {
    expect(configErrorFor({}).details).toEqual({ variable: 'MCP_API_TOKEN' });
    expect(configErrorFor({ MCP_API_TOKEN: 'short' }).details).toEqual({ variable: 'MCP_API_TOKEN' });
    expect(configErrorFor({ MCP_API_TOKEN: TEST_TOKEN, BIND_ADDR: 'localhost' }).details).toEqual({
      variable: 'BIND_ADDR'
    });
    expect(configErrorFor({ MCP_API_TOKEN: TEST_TOKEN, BIND_PORT: '70000' }).details).toEqual({
      variable: 'BIND_PORT'
    });
    expect(configErrorFor({ MCP_API_TOKEN: TEST_TOKEN, MCP_ALLOWED_CIDR: '0.0.0.0/0' }).details).toEqual({
      variable: 'MCP_ALLOWED_CIDR'
    });
    expect(configErrorFor({ MCP_API_TOKEN: TEST_TOKEN, MCP_TRUSTED_PROXIES: '127.0.0.1,nope' }).details).toEqual({
      variable: 'MCP_TRUSTED_PROXIES'
    });
    expect(configErrorFor({ MCP_API_TOKEN: TEST_TOKEN, LOG_LEVEL: 'loud' }).details).toEqual({
      variable: 'LOG_LEVEL'
    });
  });

  it('reports configuration failures as internal errors', () => {
    const error = configErrorFor({});
    expect(error.code).toBe('invalid_config');
    expect(error.statusCode).toBe(500);
  });
});
