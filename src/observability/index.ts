// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export type { LogContext } from './log-context';
export {
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
  runWithContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerOperationsTotal,
  ledgerAmount,
  bandsTotal,
  pooledBalanceTotal,
  eventsPublishedTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';

// Tracing exports
export {
  initTracing,
  shutdownTracing,
  getTracer,
  withSpan,
  traceLedgerOperation,
} from './tracing';
