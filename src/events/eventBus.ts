import Redis from 'ioredis';
import { config } from '../config';
import { createServiceLogger } from '../observability';
import { EventPublisher, LedgerEvent } from '../types/events';

const log = createServiceLogger('event-bus');

/**
 * Publishes ledger events to Redis pub/sub, one channel per event type
 */
class EventBus implements EventPublisher {
  private publisher: Redis | null = null;
  private isConnected = false;

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    const publisher = new Redis({
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });
    this.publisher = publisher;

    await new Promise<void>((resolve, reject) => {
      publisher.on('connect', () => resolve());
      publisher.on('error', (err) => reject(err));
    });

    this.isConnected = true;
    log.info('Event bus connected to Redis');
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    if (this.publisher) {
      await this.publisher.quit();
      this.publisher = null;
    }

    this.isConnected = false;
    log.info('Event bus disconnected');
  }

  async publish(event: LedgerEvent): Promise<void> {
    if (!this.publisher || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    const message = JSON.stringify({
      ...event,
      timestamp: event.timestamp || new Date(),
    });

    await this.publisher.publish(event.eventType, message);
    log.debug({ eventType: event.eventType, bandId: event.bandId }, 'Event published');
  }

  getStatus(): { connected: boolean } {
    return { connected: this.isConnected };
  }
}

export const eventBus = new EventBus();
