import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'bandsplit-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger operations by name and outcome (ok, or the ledger error kind)
 */
export const ledgerOperationsTotal = new Counter({
  name: 'ledger_operations_total',
  help: 'Ledger operations by operation and outcome',
  labelNames: ['operation', 'outcome'] as const,
  registers: [registry],
});

/**
 * Amounts moving in and out of band pools
 */
export const ledgerAmount = new Histogram({
  name: 'ledger_amount',
  help: 'Amounts deposited into and withdrawn from band pools',
  labelNames: ['direction'] as const, // deposit, withdrawal, emergency
  buckets: [10, 50, 100, 500, 1000, 5000, 10000, 50000, 100000],
  registers: [registry],
});

export const bandsTotal = new Gauge({
  name: 'bands_total',
  help: 'Number of bands created',
  registers: [registry],
});

/**
 * Funds currently held in custody across all band pools
 */
export const pooledBalanceTotal = new Gauge({
  name: 'pooled_balance_total',
  help: 'Total balance pooled across all bands',
  registers: [registry],
});

// ============================================
// Event Bus Metrics
// ============================================

export const eventsPublishedTotal = new Counter({
  name: 'events_published_total',
  help: 'Domain events published by type and status',
  labelNames: ['event_type', 'status'] as const,
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
