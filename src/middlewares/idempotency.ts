/**
 * Idempotency Middleware
 *
 * Prevents duplicate processing of ledger mutations by caching responses
 * keyed by the X-Idempotency-Key header.
 */

import { Response, NextFunction } from 'express';

import { AuthRequest } from '../auth/auth.types';
import { config } from '../config';
import { getRedisClient, isRedisConnected } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

interface CachedResponse {
  statusCode: number;
  body: unknown;
  cachedAt: string;
}

/**
 * Idempotency key TTL (24 hours)
 */
const IDEMPOTENCY_TTL = 24 * 60 * 60;

const KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

const isCachedResponse = (value: unknown): value is CachedResponse =>
  typeof value === 'object' &&
  value !== null &&
  'statusCode' in value &&
  typeof value.statusCode === 'number' &&
  'body' in value &&
  'cachedAt' in value &&
  typeof value.cachedAt === 'string';

const idempotencyKeyOf = (req: AuthRequest): string | undefined => {
  const header = req.headers['x-idempotency-key'];
  return typeof header === 'string' ? header : undefined;
};

/**
 * Idempotency middleware
 *
 * - Client sends X-Idempotency-Key header with a unique key
 * - First request: processed normally, response cached
 * - Subsequent requests with same key: cached response returned
 *
 * Keys are scoped per caller principal and request path.
 */
export const idempotencyMiddleware = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const idempotencyKey = idempotencyKeyOf(req);

  if (!idempotencyKey) {
    next();
    return;
  }

  // Skip in test environment or if Redis is not connected
  if (config.isTest || !isRedisConnected()) {
    next();
    return;
  }

  const principal = req.principal || req.ip || 'anonymous';
  const cacheKey = `idempotency:${principal}:${req.method}:${req.originalUrl}:${idempotencyKey}`;

  try {
    const redis = getRedisClient();
    const cached = await redis.get(cacheKey);

    if (cached) {
      const parsed: unknown = JSON.parse(cached);
      if (isCachedResponse(parsed)) {
        logger.info(
          { idempotencyKey, principal, cachedAt: parsed.cachedAt },
          'Returning cached idempotent response'
        );

        res.setHeader('X-Idempotent-Replayed', 'true');
        res.status(parsed.statusCode).json(parsed.body);
        return;
      }
      logger.warn({ idempotencyKey, principal }, 'Ignoring malformed idempotency cache entry');
    }

    const originalJson = res.json.bind(res);

    res.json = function (body: unknown) {
      const responseToCache: CachedResponse = {
        statusCode: res.statusCode,
        body,
        cachedAt: new Date().toISOString(),
      };

      redis
        .setex(cacheKey, IDEMPOTENCY_TTL, JSON.stringify(responseToCache))
        .then(() => {
          logger.debug(
            { idempotencyKey, principal, statusCode: res.statusCode },
            'Cached idempotent response'
          );
        })
        .catch((err: unknown) => {
          logger.error({ err, idempotencyKey }, 'Failed to cache idempotent response');
        });

      return originalJson(body);
    };

    next();
  } catch (error) {
    // Redis trouble must not block the ledger; the request proceeds uncached
    logger.error({ error, idempotencyKey }, 'Idempotency middleware error');
    next();
  }
};

/**
 * Idempotency for POST, PUT and PATCH only
 */
export const idempotencyForMutations = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const mutationMethods = ['POST', 'PUT', 'PATCH'];

  if (!mutationMethods.includes(req.method)) {
    next();
    return;
  }

  return idempotencyMiddleware(req, res, next);
};

/**
 * Keys must be alphanumeric with dashes/underscores, max 64 chars
 */
export const validateIdempotencyKey = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  const idempotencyKey = idempotencyKeyOf(req);

  if (idempotencyKey && !KEY_PATTERN.test(idempotencyKey)) {
    next(
      new ApiError(
        ErrorCode.INVALID_INPUT,
        'Invalid X-Idempotency-Key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
      )
    );
    return;
  }

  next();
};
