// This module exposes fixed read-only MCP resources backed by the monitoring queries.

import type { McpResource, ResourceReadResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import type { MonitoringContext } from '../monitoring/context.js';
import { runLogQuery } from '../monitoring/logs.js';
import { listServices } from '../monitoring/services.js';
import { DEFAULT_LIMIT, MAX_LIMIT } from './tool-schemas.js';

export const RESOURCE_MIME_TYPE = 'application/json';
export const RECENT_LOGS_WINDOW_MS = 60 * 60 * 1000;

export const RESOURCE_URIS = {
  servicesSnapshot: 'resource://services/snapshot',
  failedServices: 'resource://services/failed',
  recentLogs: 'resource://logs/recent'
} as const;

type ResourceReader = (context: MonitoringContext) => Promise<Record<string, unknown>>;

interface ResourceDefinition {
  resource: McpResource;
  read: ResourceReader;
}

async function readServicesSnapshot(context: MonitoringContext): Promise<Record<string, unknown>> {
  return listServices({ limit: MAX_LIMIT }, context);
}

async function readFailedServices(context: MonitoringContext): Promise<Record<string, unknown>> {
  return listServices({ state: 'failed', limit: MAX_LIMIT }, context);
}

// The recent-log window is anchored on the injected clock so reads stay reproducible in tests.
async function readRecentLogs(context: MonitoringContext): Promise<Record<string, unknown>> {
  const end = context.now();
  const start = new Date(end.getTime() - RECENT_LOGS_WINDOW_MS);
  return runLogQuery(
    {
      window: { start, end },
      excludeUnits: [],
      order: 'desc',
      limit: DEFAULT_LIMIT
    },
    context
  );
}

const resourceDefinitions: readonly ResourceDefinition[] = [
  {
    resource: {
      uri: RESOURCE_URIS.servicesSnapshot,
      name: 'Services snapshot',
      description: 'All systemd service units with their current state.',
      mimeType: RESOURCE_MIME_TYPE
    },
    read: readServicesSnapshot
  },
  {
    resource: {
      uri: RESOURCE_URIS.failedServices,
      name: 'Failed services',
      description: 'Service units whose active state is failed.',
      mimeType: RESOURCE_MIME_TYPE
    },
    read: readFailedServices
  },
  {
    resource: {
      uri: RESOURCE_URIS.recentLogs,
      name: 'Recent logs',
      description: 'Journal entries from the last hour, newest first.',
      mimeType: RESOURCE_MIME_TYPE
    },
    read: readRecentLogs
  }
];

const resourceList: readonly McpResource[] = Object.freeze(resourceDefinitions.map((definition) => definition.resource));

// This helper returns the static resource catalog for resources/list.
export function buildResourceList(): readonly McpResource[] {
  return resourceList;
}

// This function reads one resource by URI and renders it as a JSON text content block.
export async function readResource(uri: string, context: MonitoringContext): Promise<ResourceReadResult> {
  const definition = resourceDefinitions.find((candidate) => candidate.resource.uri === uri);
  if (!definition) {
    throw new AppError(404, 'resource_not_found', `Unknown resource: ${uri}`, { uri });
  }

  const payload = await definition.read(context);
  context.logger.debug(
    {
      event: 'mcp_resource_read',
      uri
    },
    'mcp_resource_read'
  );

  return {
    contents: [
      {
        uri,
        mimeType: definition.resource.mimeType,
        text: JSON.stringify(payload)
      }
    ]
  };
}
