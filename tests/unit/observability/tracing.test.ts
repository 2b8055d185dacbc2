/**
 * Tracing Module Unit Tests
 *
 * Tests OpenTelemetry tracing initialization and ledger operation spans.
 */

// Mock span
const mockSpan = {
  setAttribute: jest.fn(),
  setStatus: jest.fn(),
  end: jest.fn(),
};

// Mock tracer
const mockTracer = {
  startActiveSpan: jest.fn((_name: string, fn: (span: typeof mockSpan) => Promise<unknown>) => {
    return fn(mockSpan);
  }),
};

jest.mock('@opentelemetry/api', () => ({
  trace: {
    getTracer: jest.fn().mockReturnValue(mockTracer),
  },
  SpanStatusCode: {
    OK: 1,
    ERROR: 2,
  },
}));

// Mock SDK
const mockSDKInstance = {
  start: jest.fn(),
  shutdown: jest.fn().mockResolvedValue(undefined),
};

jest.mock('@opentelemetry/sdk-node', () => ({
  NodeSDK: jest.fn().mockImplementation(() => mockSDKInstance),
}));

jest.mock('@opentelemetry/exporter-trace-otlp-http', () => ({
  OTLPTraceExporter: jest.fn(),
}));

jest.mock('@opentelemetry/auto-instrumentations-node', () => ({
  getNodeAutoInstrumentations: jest.fn().mockReturnValue([]),
}));

// Mock logger
const mockLogger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

jest.mock('../../../src/observability/logger', () => ({
  logger: mockLogger,
}));

// Tracing is switched per test
let mockOtelEnabled = false;

jest.mock('../../../src/config', () => ({
  config: {
    otel: {
      get enabled() {
        return mockOtelEnabled;
      },
      serviceName: 'bandsplit-ledger',
      exporterEndpoint: 'http://localhost:4318/v1/traces',
    },
  },
}));

describe('Tracing Module', () => {
  let tracing: typeof import('../../../src/observability/tracing');

  beforeEach(async () => {
    jest.clearAllMocks();
    mockOtelEnabled = false;
    jest.resetModules();

    tracing = await import('../../../src/observability/tracing');
  });

  describe('initTracing', () => {
    it('should skip the SDK when tracing is disabled', () => {
      tracing.initTracing();

      expect(mockLogger.debug).toHaveBeenCalledWith('Tracing disabled');
      expect(mockSDKInstance.start).not.toHaveBeenCalled();
    });

    it('should start the SDK when tracing is enabled', () => {
      mockOtelEnabled = true;

      tracing.initTracing();

      expect(mockSDKInstance.start).toHaveBeenCalled();
      expect(mockLogger.info).toHaveBeenCalledWith(
        { endpoint: 'http://localhost:4318/v1/traces' },
        'OpenTelemetry tracing initialized'
      );
    });

    it('should log and continue when the SDK fails to start', () => {
      mockOtelEnabled = true;
      mockSDKInstance.start.mockImplementationOnce(() => {
        throw new Error('Failed to initialize');
      });

      tracing.initTracing();

      expect(mockLogger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ error: expect.any(Error) }),
        'Failed to initialize OpenTelemetry tracing'
      );
    });
  });

  describe('shutdownTracing', () => {
    it('should do nothing when the SDK never started', async () => {
      await tracing.shutdownTracing();

      expect(mockSDKInstance.shutdown).not.toHaveBeenCalled();
    });

    it('should shut the SDK down once started', async () => {
      mockOtelEnabled = true;
      tracing.initTracing();

      await tracing.shutdownTracing();

      expect(mockSDKInstance.shutdown).toHaveBeenCalled();
      expect(mockLogger.info).toHaveBeenCalledWith('OpenTelemetry tracing shut down');
    });
  });

  describe('traceLedgerOperation', () => {
    it('should name the span after the operation and tag its attributes', async () => {
      const result = await tracing.traceLedgerOperation(
        'deposit_payment',
        { 'ledger.band_id': 3 },
        async () => 'done'
      );

      expect(result).toBe('done');
      expect(mockTracer.startActiveSpan).toHaveBeenCalledWith('ledger.deposit_payment', expect.any(Function));
      expect(mockSpan.setAttribute).toHaveBeenCalledWith('ledger.operation', 'deposit_payment');
      expect(mockSpan.setAttribute).toHaveBeenCalledWith('ledger.band_id', 3);
      expect(mockSpan.setStatus).toHaveBeenCalledWith({ code: 1 });
      expect(mockSpan.end).toHaveBeenCalled();
    });

    it('should mark the span as failed and rethrow', async () => {
      await expect(
        tracing.traceLedgerOperation('withdraw_earnings', {}, async () => {
          throw new Error('Band 9 not found');
        })
      ).rejects.toThrow('Band 9 not found');

      expect(mockSpan.setStatus).toHaveBeenCalledWith({ code: 2, message: 'Band 9 not found' });
      expect(mockSpan.end).toHaveBeenCalled();
    });
  });
});
