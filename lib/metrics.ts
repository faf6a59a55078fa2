import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { LookupOutcome } from '../cache/cacheManager.js';

export interface DashboardMetrics {
  registry: Registry;
  cacheLookups: Counter<'outcome'>;
  fetchFailures: Counter<'source' | 'kind'>;
  httpRequestDuration: Histogram<'route' | 'status_code'>;
  recordCacheLookup(outcome: LookupOutcome): void;
  recordFetchFailure(source: string, kind: string): void;
}

/**
 * One registry per process (or per test), so repeated construction never
 * collides on metric names.
 */
export function createMetrics(options: { defaultMetrics?: boolean } = {}): DashboardMetrics {
  const registry = new Registry();
  if (options.defaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const cacheLookups = new Counter({
    name: 'macro_cache_lookups_total',
    help: 'Cache lookups by outcome',
    labelNames: ['outcome'] as const,
    registers: [registry],
  });

  const fetchFailures = new Counter({
    name: 'macro_upstream_fetch_failures_total',
    help: 'Upstream fetch failures by source and kind',
    labelNames: ['source', 'kind'] as const,
    registers: [registry],
  });

  const httpRequestDuration = new Histogram({
    name: 'macro_http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['route', 'status_code'] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry],
  });

  return {
    registry,
    cacheLookups,
    fetchFailures,
    httpRequestDuration,
    recordCacheLookup: (outcome) => cacheLookups.inc({ outcome }),
    recordFetchFailure: (source, kind) => fetchFailures.inc({ source, kind }),
  };
}
