import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, globalLimiter, notFoundHandler } from './middlewares';
import healthRoutes from './routes/health';
import { accountRoutes } from './services/account';
import { ledgerRoutes } from './services/ledger';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  app.use(globalLimiter);

  // Routes
  app.use('/health', healthRoutes);
  app.use('/bands', ledgerRoutes);
  app.use('/accounts', accountRoutes);

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  app.get('/', (_req, res) => {
    res.json({
      name: 'Band Split Ledger API',
      version: '1.0.0',
      description: 'Pooled band revenue with percentage-based member withdrawals',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
