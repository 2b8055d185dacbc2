import { connectRedis } from './config/redis';
import { eventBus } from './events/eventBus';
import { logger } from './observability';

export interface BackingServiceStatus {
  redis: boolean;
  eventBus: boolean;
}

/**
 * Connect Redis and the event bus.
 *
 * The ledger runs in-process, so a failed connection leaves the service
 * up in the same "degraded" state GET /health reports. Ledger events are
 * then dropped; rate limiting and idempotent replay go without Redis.
 */
export const connectBackingServices = async (): Promise<BackingServiceStatus> => {
  const status: BackingServiceStatus = { redis: false, eventBus: false };

  try {
    await connectRedis();
    status.redis = true;
    logger.info('Redis connected successfully');
  } catch (error) {
    logger.warn({ error }, 'Redis unavailable, starting degraded');
  }

  try {
    await eventBus.connect();
    status.eventBus = true;
    logger.info('Event bus connected successfully');
  } catch (error) {
    logger.warn({ error }, 'Event bus unavailable, ledger events will not be published');
  }

  return status;
};
