import { AsyncLocalStorage } from 'async_hooks';

/**
 * Log context stored in AsyncLocalStorage
 * Provides request-scoped context for logging
 */
export interface LogContext {
  correlationId: string;
  principal?: string;
  bandId?: number;
  [key: string]: unknown;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Add additional context to the current log context
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
