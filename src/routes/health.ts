import { Router, Request, Response } from 'express';
import { isRedisConnected } from '../config/redis';
import { eventBus } from '../events/eventBus';
import { ledgerService } from '../services/ledger';

const router = Router();

/**
 * The ledger itself is in-process; Redis only backs events, rate limits
 * and idempotency, so a Redis outage reports "degraded" rather than down.
 */
router.get('/', (_req: Request, res: Response) => {
  const eventBusStatus = eventBus.getStatus();
  const redisConnected = isRedisConnected();

  const isHealthy = eventBusStatus.connected && redisConnected;

  res.status(200).json({
    status: isHealthy ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    services: {
      ledger: {
        totalBands: ledgerService.getTotalBands(),
      },
      redis: {
        connected: redisConnected,
      },
      eventBus: {
        connected: eventBusStatus.connected,
      },
    },
  });
});

router.get('/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    timestamp: new Date().toISOString(),
  });
});

/**
 * Ready once the app serves requests; a Redis outage only marks it degraded
 */
router.get('/ready', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'ready',
    degraded: !(eventBus.getStatus().connected && isRedisConnected()),
    timestamp: new Date().toISOString(),
  });
});

export default router;
