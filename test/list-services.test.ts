// This test suite verifies list_services filtering, ordering, truncation, and error codes.

import { describe, expect, it } from 'vitest';
import { listServices, sortServices } from '../src/monitoring/services.js';
import { AdapterError } from '../src/utils/errors.js';
import { FakeUnitLister, captureAsyncAppError, makeContext, service } from './helpers/fakes.js';

const units = [
  service('b.service', 'active'),
  service('nginx.service', 'active'),
  service('d.service', 'failed', 'failed'),
  service('c.service', 'inactive', 'dead'),
  service('a.service', 'failed', 'failed')
];

function contextWith(lister: FakeUnitLister = new FakeUnitLister(units)) {
  return makeContext({ unitLister: lister });
}

describe('service ordering', () => {
  it('puts failed units first with each group ascending', () => {
    const ordered = sortServices(units, true);
    expect(ordered.map((record) => record.unit)).toEqual([
      'a.service',
      'd.service',
      'b.service',
      'c.service',
      'nginx.service'
    ]);
  });

  it('sorts purely by name without the failed grouping', () => {
    expect(sortServices(units, false).map((record) => record.unit)).toEqual([
      'a.service',
      'b.service',
      'c.service',
      'd.service',
      'nginx.service'
    ]);
  });
});

describe('list_services', () => {
  it('returns every unit sorted by name with default limit', async () => {
    const result = await listServices({}, contextWith());

    expect(result.services.map((record) => record.unit)).toEqual([
      'a.service',
      'b.service',
      'c.service',
      'd.service',
      'nginx.service'
    ]);
    expect(result.total).toBe(5);
    expect(result.returned).toBe(5);
    expect(result.truncated).toBe(false);
    expect(result.generated_at_utc).toBe('2025-01-15T12:00:00.000Z');
  });

  it('filters by state case-insensitively after trimming', async () => {
    const result = await listServices({ state: ' FAILED ' }, contextWith());

    expect(result.services.map((record) => record.unit)).toEqual(['a.service', 'd.service']);
    expect(result.total).toBe(2);
  });

  it('filters by plain substring and ignores a blank filter', async () => {
    const filtered = await listServices({ name_contains: 'ngin' }, contextWith());
    expect(filtered.services.map((record) => record.unit)).toEqual(['nginx.service']);

    const blank = await listServices({ name_contains: '   ' }, contextWith());
    expect(blank.total).toBe(5);
  });

  it('truncates to the limit and reports the full total', async () => {
    const result = await listServices({ limit: 2 }, contextWith());

    expect(result.services.map((record) => record.unit)).toEqual(['a.service', 'b.service']);
    expect(result.total).toBe(5);
    expect(result.returned).toBe(2);
    expect(result.truncated).toBe(true);
  });

  it('accepts the largest limit', async () => {
    const result = await listServices({ limit: 1000 }, contextWith());
    expect(result.returned).toBe(5);
    expect(result.truncated).toBe(false);
  });

  it('maps invalid arguments onto stable error codes', async () => {
    expect((await captureAsyncAppError(listServices({ state: 'bogus' }, contextWith()))).code).toBe('invalid_state');
    expect((await captureAsyncAppError(listServices({ limit: 0 }, contextWith()))).code).toBe('invalid_limit');
    expect((await captureAsyncAppError(listServices({ limit: 1001 }, contextWith()))).code).toBe('invalid_limit');
    expect((await captureAsyncAppError(listServices({ limit: 1.5 }, contextWith()))).code).toBe('invalid_limit');
    expect((await captureAsyncAppError(listServices({ extra: true }, contextWith()))).code).toBe('invalid_params');
  });

  it('does not call the unit lister when arguments are invalid', async () => {
    const lister = new FakeUnitLister(units);
    await captureAsyncAppError(listServices({ state: 'bogus' }, contextWith(lister)));
    expect(lister.calls).toBe(0);
  });

  it('propagates adapter failures', async () => {
    const context = contextWith(new FakeUnitLister(new AdapterError('adapter_error', 'systemctl failed.')));
    const error = await captureAsyncAppError(listServices({}, context));

    expect(error.code).toBe('adapter_error');
    expect(error.statusCode).toBe(502);
  });

  it('bounds a stalled unit lister with the adapter timeout', async () => {
    const context = makeContext({ unitLister: new FakeUnitLister('hang'), adapterTimeoutMs: 20 });
    const error = await captureAsyncAppError(listServices({}, context));

    expect(error.code).toBe('adapter_timeout');
  });
});
