/**
 * Prometheus metrics registry: prom-client with dashboard-specific metrics.
 * Uses globalThis to survive HMR re-registration in development.
 */

import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';

declare global {
  // eslint-disable-next-line no-var
  var __zendeskPulseRegistry: Registry | undefined;
}

function createRegistry(): Registry {
  if (globalThis.__zendeskPulseRegistry) return globalThis.__zendeskPulseRegistry;

  const reg = new Registry();
  if (process.env.NODE_ENV !== 'test') {
    collectDefaultMetrics({ register: reg });
  }
  globalThis.__zendeskPulseRegistry = reg;
  return reg;
}

export const registry = createRegistry();

function counter(name: string, help: string, labelNames: string[]): Counter {
  const existing = registry.getSingleMetric(name);
  if (existing instanceof Counter) return existing;
  return new Counter({ name, help, labelNames, registers: [registry] });
}

function gauge(name: string, help: string, labelNames: string[]): Gauge {
  const existing = registry.getSingleMetric(name);
  if (existing instanceof Gauge) return existing;
  return new Gauge({ name, help, labelNames, registers: [registry] });
}

function histogram(name: string, help: string, labelNames: string[], buckets: number[]): Histogram {
  const existing = registry.getSingleMetric(name);
  if (existing instanceof Histogram) return existing;
  return new Histogram({ name, help, labelNames, buckets, registers: [registry] });
}

// ---- Cache metrics ----

export const cacheLookupsTotal = counter(
  'cache_lookups_total',
  'Cache lookups by cache name and result (hit, miss, stale)',
  ['cache', 'result'],
);

export const cacheEntries = gauge(
  'cache_entries',
  'Entries currently held per cache, expired ones included',
  ['cache'],
);

// ---- Zendesk metrics ----

export const zendeskRequestDuration = histogram(
  'zendesk_request_duration_seconds',
  'Duration of Zendesk API requests in seconds',
  ['status'],
  [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
);

export const userResolutionFailuresTotal = counter(
  'user_resolution_failures_total',
  'Author or requester lookups that fell back to a placeholder name',
  [],
);

// ---- Webhook metrics ----

export const webhooksReceivedTotal = counter(
  'webhooks_received_total',
  'Inbound Zendesk webhooks by outcome',
  ['outcome'],
);
