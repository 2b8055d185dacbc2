import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Normalize path to prevent high cardinality in metrics
 * Replaces band ids and member identities with placeholders
 */
export const normalizePath = (path: string): string => {
  return path
    .replace(/\/bands\/\d+/g, '/bands/:bandId')
    .replace(/\/members\/[^/]+/g, '/members/:member');
};

/**
 * Get the route pattern from Express request
 * Falls back to normalized path if no route is available
 */
const getRoutePath = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return (req.baseUrl || '') + routePath;
  }

  return normalizePath(req.originalUrl.split('?')[0]);
};

/**
 * HTTP metrics middleware
 * Records request count and duration for Prometheus
 */
export const metricsMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;

    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: res.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  });

  next();
};
