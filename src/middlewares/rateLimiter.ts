/**
 * Rate Limiting Middleware
 *
 * Provides rate limiting for API endpoints using a Redis store so limits are
 * shared across instances.
 *
 * Environment-based configuration:
 * - Production: Strict limits to prevent abuse
 * - Development: Relaxed limits for easier testing
 * - Test: Very lenient limits and an in-memory store
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting.
 */

import { NextFunction, Request, Response } from 'express';
import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';

import { AuthRequest } from '../auth/auth.types';
import { config } from '../config';
import { getRedisClient } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

/**
 * Create a Redis store for rate limiting
 * Falls back to memory store in test environment
 */
const createStore = (prefix: string) => {
  if (config.isTest) {
    return undefined;
  }

  try {
    const client = getRedisClient();
    return new RedisStore({
      // @ts-expect-error - RedisStore expects a specific sendCommand signature
      sendCommand: (...args: string[]) => client.call(...args),
      prefix,
    });
  } catch (error) {
    logger.warn({ error }, 'Failed to create Redis store for rate limiting, using memory store');
    return undefined;
  }
};

type Limiter = (req: Request, res: Response, next: NextFunction) => void;

const noopLimiter: Limiter = (_req, _res, next) => next();

const createLimiter = (limiter: RateLimitRequestHandler): Limiter => {
  if (config.rateLimit.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

/**
 * Global rate limiter
 * Applied to all routes except health checks and metrics
 */
export const globalLimiter: Limiter = createLimiter(
  rateLimit({
    store: createStore('rl:global:'),
    windowMs: config.rateLimit.global.windowMs,
    limit: config.rateLimit.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      error: {
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: 'Too many requests, please try again later',
      },
    },
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
    passOnStoreError: true,
  })
);

/**
 * Ledger mutation rate limiter
 * Keyed by caller principal when authenticated, otherwise by IP
 */
export const ledgerLimiter: Limiter = createLimiter(
  rateLimit({
    store: createStore('rl:ledger:'),
    windowMs: config.rateLimit.ledger.windowMs,
    limit: config.rateLimit.ledger.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      success: false,
      error: {
        code: ErrorCode.TOO_MANY_LEDGER_OPERATIONS,
        message: 'Too many ledger operations, please try again later',
      },
    },
    keyGenerator: (req: AuthRequest) => req.principal || req.ip || 'unknown',
    passOnStoreError: true,
    validate: false,
  })
);
