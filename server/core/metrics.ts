import client from 'prom-client';
import { JOB_STATES } from './JobRegistry.js';
import type { Orchestrator } from './Orchestrator.js';

export type AppMetrics = {
  registry: client.Registry;
  httpRequests: client.Counter<'route' | 'method' | 'code'>;
  httpDuration: client.Histogram<'route' | 'method' | 'code'>;
};

/**
 * One registry per app so several apps (tests) can live in one process.
 * Core gauges are sampled from the orchestrator at scrape time.
 */
export function createMetrics(orchestrator: Orchestrator, prefix = 'mediagate_'): AppMetrics {
  const registry = new client.Registry();
  client.collectDefaultMetrics({ register: registry, prefix });

  const httpRequests = new client.Counter({
    name: 'http_requests_total',
    help: 'HTTP requests count',
    labelNames: ['route', 'method', 'code'] as const,
    registers: [registry],
  });

  const httpDuration = new client.Histogram({
    name: 'http_request_duration_seconds',
    help: 'HTTP request duration in seconds',
    labelNames: ['route', 'method', 'code'] as const,
    buckets: [0.05, 0.1, 0.3, 0.6, 1, 3, 5, 15, 60],
    registers: [registry],
  });

  new client.Gauge({
    name: `${prefix}jobs`,
    help: 'Jobs in the registry by state',
    labelNames: ['state'] as const,
    registers: [registry],
    collect() {
      const stats = orchestrator.registry.stats();
      for (const state of JOB_STATES) this.set({ state }, stats[state]);
    },
  });

  new client.Gauge({
    name: `${prefix}jobs_waiting`,
    help: 'Number of queued jobs waiting for a worker',
    registers: [registry],
    collect() {
      this.set(orchestrator.pool.stats().queued);
    },
  });

  new client.Gauge({
    name: `${prefix}jobs_running`,
    help: 'Number of jobs holding a worker slot',
    registers: [registry],
    collect() {
      this.set(orchestrator.pool.stats().running);
    },
  });

  new client.Gauge({
    name: `${prefix}cache_entries`,
    help: 'Live entries in the lookup caches',
    registers: [registry],
    collect() {
      this.set(orchestrator.cache.size() + orchestrator.streamCache.size());
    },
  });

  new client.Gauge({
    name: `${prefix}cache_lookups`,
    help: 'Lookup cache hits and misses since start',
    labelNames: ['result'] as const,
    registers: [registry],
    collect() {
      const stats = orchestrator.cache.stats();
      this.set({ result: 'hit' }, stats.hits);
      this.set({ result: 'miss' }, stats.misses);
    },
  });

  new client.Gauge({
    name: `${prefix}rate_limit_rejections`,
    help: 'Requests rejected by the per-client rate limiter since start',
    registers: [registry],
    collect() {
      this.set(orchestrator.limiter.rejectedCount());
    },
  });

  return { registry, httpRequests, httpDuration };
}
