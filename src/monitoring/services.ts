// This module implements the list_services query: validation, filtering, ordering, and result shaping.

import type { ListServicesOutput, ServiceRecord } from '../types/domain.js';
import { formatUtc } from '../utils/time-window.js';
import { withTimeout } from '../utils/timeout.js';
import { parseWithCodes } from '../utils/validation.js';
import { listServicesErrorCodes, listServicesSchema, type ListServicesInput } from '../mcp/tool-schemas.js';
import type { MonitoringContext } from './context.js';

export interface ServiceQuery {
  state?: string;
  nameContains?: string;
  limit: number;
}

// This function validates raw tool arguments into a normalized service query.
export function buildServiceQuery(args: unknown): ServiceQuery {
  const input: ListServicesInput = parseWithCodes(listServicesSchema, args ?? {}, listServicesErrorCodes);
  const nameContains = input.name_contains?.trim();

  return {
    state: input.state,
    nameContains: nameContains ? nameContains : undefined,
    limit: input.limit
  };
}

function isFailed(service: ServiceRecord): boolean {
  return service.active_state.toLowerCase() === 'failed';
}

// Code-unit ordering keeps results identical regardless of host locale.
function compareUnits(left: ServiceRecord, right: ServiceRecord): number {
  if (left.unit < right.unit) {
    return -1;
  }
  return left.unit > right.unit ? 1 : 0;
}

// This helper orders services by unit, optionally hoisting failed units to the front.
export function sortServices(services: ServiceRecord[], failedFirst: boolean): ServiceRecord[] {
  return [...services].sort((left, right) => {
    if (failedFirst) {
      const rank = Number(isFailed(right)) - Number(isFailed(left));
      if (rank !== 0) {
        return rank;
      }
    }
    return compareUnits(left, right);
  });
}

// This function applies one validated query to an already-fetched unit list.
export function selectServices(services: ServiceRecord[], query: ServiceQuery, generatedAt: Date): ListServicesOutput {
  const { state, nameContains } = query;
  const matching = services
    .filter((service) => !state || service.active_state.toLowerCase() === state)
    .filter((service) => !nameContains || service.unit.includes(nameContains));

  const ordered = sortServices(matching, state === 'failed');
  const selected = ordered.slice(0, query.limit);

  return {
    services: selected,
    total: ordered.length,
    returned: selected.length,
    truncated: ordered.length > selected.length,
    generated_at_utc: formatUtc(generatedAt)
  };
}

// This function runs list_services end to end against the unit-lister collaborator.
export async function listServices(args: unknown, context: MonitoringContext): Promise<ListServicesOutput> {
  const query = buildServiceQuery(args);
  const startedAt = Date.now();
  const units = await withTimeout(context.unitLister.listUnits(), context.adapterTimeoutMs, 'unit listing');

  context.logger.debug(
    {
      event: 'list_services_units_loaded',
      unitCount: units.length,
      durationMs: Date.now() - startedAt
    },
    'list_services_units_loaded'
  );

  return selectServices(units, query, context.now());
}
