// This module centralizes server identity values so protocol metadata and discovery stay in sync.

export const SERVER_NAME = 'systemd-monitor-mcp';
export const SERVER_VERSION = '0.1.0';

// Newest first; the first entry is the version offered when a client asks for an unknown one.
export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-06-18', '2025-03-26', '2024-11-05'] as const;
export const DEFAULT_PROTOCOL_VERSION = SUPPORTED_PROTOCOL_VERSIONS[0];

export const MCP_ENDPOINT_PATH = '/mcp';
