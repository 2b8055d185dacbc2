/**
 * EventBus Unit Tests
 *
 * Tests publishing ledger events over Redis pub/sub.
 */

import { EventType } from '../../../src/types/events';

// Mock Redis
const mockOn = jest.fn();
const mockQuit = jest.fn().mockResolvedValue('OK');
const mockPublish = jest.fn().mockResolvedValue(1);

jest.mock('ioredis', () => {
  return jest.fn().mockImplementation(() => ({
    on: mockOn,
    quit: mockQuit,
    publish: mockPublish,
  }));
});

// Mock config
jest.mock('../../../src/config', () => ({
  config: {
    redis: {
      host: 'localhost',
      port: 6379,
    },
  },
}));

// Mock logger
const mockLogger = {
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
};
jest.mock('../../../src/observability', () => ({
  createServiceLogger: () => mockLogger,
}));

describe('EventBus', () => {
  let eventBus: typeof import('../../../src/events/eventBus').eventBus;

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.resetModules();

    // Simulate immediate connection by calling connect callback
    mockOn.mockImplementation((event: string, callback: () => void) => {
      if (event === 'connect') {
        setImmediate(() => callback());
      }
    });

    const module = await import('../../../src/events/eventBus');
    eventBus = module.eventBus;
  });

  afterEach(async () => {
    await eventBus.disconnect();
  });

  describe('getStatus', () => {
    it('should return connected: false initially', () => {
      expect(eventBus.getStatus()).toEqual({ connected: false });
    });
  });

  describe('connect', () => {
    it('should connect successfully when Redis connects', async () => {
      await eventBus.connect();
      expect(eventBus.getStatus().connected).toBe(true);
    });

    it('should not reconnect if already connected', async () => {
      await eventBus.connect();
      await eventBus.connect();

      expect(eventBus.getStatus().connected).toBe(true);
      expect(mockOn.mock.calls.filter((call) => call[0] === 'connect')).toHaveLength(1);
    });

    it('should reject on connection errors', async () => {
      mockOn.mockImplementation((event: string, callback: (err?: Error) => void) => {
        if (event === 'error') {
          setImmediate(() => callback(new Error('Connection refused')));
        }
      });

      await expect(eventBus.connect()).rejects.toThrow('Connection refused');
      expect(eventBus.getStatus().connected).toBe(false);
    });
  });

  describe('disconnect', () => {
    it('should quit the publisher', async () => {
      await eventBus.connect();
      await eventBus.disconnect();

      expect(mockQuit).toHaveBeenCalledTimes(1);
      expect(eventBus.getStatus().connected).toBe(false);
    });

    it('should do nothing when not connected', async () => {
      await eventBus.disconnect();

      expect(mockQuit).not.toHaveBeenCalled();
    });
  });

  describe('publish', () => {
    it('should publish on the channel named after the event type', async () => {
      await eventBus.connect();

      const timestamp = new Date('2024-06-01T12:00:00.000Z');
      await eventBus.publish({
        eventType: EventType.PAYMENT_DEPOSITED,
        bandId: 4,
        timestamp,
        payload: { depositor: 'payer', amount: 1000, newBalance: 1000 },
      });

      expect(mockPublish).toHaveBeenCalledWith(EventType.PAYMENT_DEPOSITED, expect.any(String));
      const message: unknown = JSON.parse(mockPublish.mock.calls[0][1]);
      expect(message).toEqual({
        eventType: 'PAYMENT_DEPOSITED',
        bandId: 4,
        timestamp: '2024-06-01T12:00:00.000Z',
        payload: { depositor: 'payer', amount: 1000, newBalance: 1000 },
      });
    });

    it('should throw when not connected', async () => {
      await expect(
        eventBus.publish({
          eventType: EventType.BAND_CREATED,
          bandId: 1,
          timestamp: new Date(),
          payload: { name: 'Band', owner: 'owner' },
        })
      ).rejects.toThrow('Event bus not connected');

      expect(mockPublish).not.toHaveBeenCalled();
    });
  });
});
