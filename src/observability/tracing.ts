import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { trace, SpanStatusCode, Span, Tracer } from '@opentelemetry/api';
import { config } from '../config';
import { logger } from './logger';

let sdk: NodeSDK | null = null;

/**
 * Initialize OpenTelemetry SDK
 * Should be called before any other code that needs tracing
 */
export const initTracing = (): void => {
  if (!config.otel.enabled) {
    logger.debug('Tracing disabled');
    return;
  }

  try {
    sdk = new NodeSDK({
      serviceName: config.otel.serviceName,
      traceExporter: new OTLPTraceExporter({
        url: config.otel.exporterEndpoint,
      }),
      instrumentations: [
        getNodeAutoInstrumentations({
          '@opentelemetry/instrumentation-express': { enabled: true },
          '@opentelemetry/instrumentation-ioredis': { enabled: true },
          '@opentelemetry/instrumentation-http': { enabled: true },
          // Disable file system instrumentation to reduce noise
          '@opentelemetry/instrumentation-fs': { enabled: false },
        }),
      ],
    });

    sdk.start();
    logger.info({ endpoint: config.otel.exporterEndpoint }, 'OpenTelemetry tracing initialized');
  } catch (error) {
    logger.warn({ error }, 'Failed to initialize OpenTelemetry tracing');
  }
};

export const shutdownTracing = async (): Promise<void> => {
  if (sdk) {
    try {
      await sdk.shutdown();
      sdk = null;
      logger.info('OpenTelemetry tracing shut down');
    } catch (error) {
      logger.error({ error }, 'Error shutting down OpenTelemetry');
    }
  }
};

export const getTracer = (name: string): Tracer => {
  return trace.getTracer(name);
};

/**
 * Run fn inside an active span, recording its outcome on the span
 */
export const withSpan = async <T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> => {
  const tracer = getTracer('bandsplit-ledger');

  return tracer.startActiveSpan(name, async (span) => {
    Object.entries(attributes).forEach(([key, value]) => {
      span.setAttribute(key, value);
    });

    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      span.end();
    }
  });
};

/**
 * Create a span for a ledger operation
 */
export const traceLedgerOperation = async <T>(
  operation: string,
  attributes: Record<string, string | number | boolean>,
  fn: () => Promise<T>
): Promise<T> => {
  return withSpan(
    `ledger.${operation}`,
    {
      'ledger.operation': operation,
      ...attributes,
    },
    async () => fn()
  );
};
