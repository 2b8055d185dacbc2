/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, REDIS_CONFIG, LEDGER_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

/**
 * Local development flag
 * Set LOCAL_DEV=true to use localhost URLs even in non-development environments
 */
export const isLocalDev = process.env.LOCAL_DEV === 'true';

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction
  ? process.env.REDIS_PASSWORD || undefined
  : undefined;

export const REDIS_CONFIG = {
  host: REDIS_HOST,
  port: REDIS_PORT,
  password: REDIS_PASSWORD,
  maxRetriesPerRequest: isProduction ? 5 : 3,
  connectTimeout: isProduction ? 10000 : 5000,
  lazyConnect: true,
};

// =============================================================================
// JWT / IDENTITY CONFIGURATION
// =============================================================================

/**
 * JWT secret shared with the identity provider that issues caller tokens.
 * Required in production (see validateProductionEnv).
 */
export const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production';

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  issuer: process.env.JWT_ISSUER || undefined,
  accessTokenExpiresIn: process.env.JWT_ACCESS_TOKEN_EXPIRES_IN || (isProduction ? '15m' : '1h'),
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment
 *
 * In test/development environments, rate limits are significantly relaxed.
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting (NOT recommended for production).
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  // Global rate limiter (all routes)
  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10)
      : isTest
      ? 10000
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  // Ledger mutations (deposits, withdrawals, member changes)
  ledger: {
    windowMs: parseInt(process.env.LEDGER_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.LEDGER_RATE_LIMIT_MAX || '20', 10)
      : isTest
      ? 10000
      : parseInt(process.env.LEDGER_RATE_LIMIT_MAX || '200', 10),
  },
};

// =============================================================================
// LEDGER CONFIGURATION
// =============================================================================

/**
 * Ledger configuration
 *
 * custodyAccount holds the pooled funds of every band.
 * fundingEnabled exposes POST /accounts/me/fund in every environment unless
 * ACCOUNT_FUNDING_ENABLED=false; it is the only way assets enter the service.
 */
export const LEDGER_CONFIG = {
  custodyAccount: process.env.LEDGER_CUSTODY_ACCOUNT || 'ledger-custody',
  fundingEnabled: process.env.ACCOUNT_FUNDING_ENABLED !== 'false',
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

export const OTEL_CONFIG = {
  enabled: !isTest && (isProduction || process.env.OTEL_ENABLED === 'true'),
  serviceName: process.env.OTEL_SERVICE_NAME || 'bandsplit-ledger',
  exporterEndpoint:
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['JWT_SECRET', 'REDIS_HOST', 'REDIS_PASSWORD', 'CORS_ORIGINS'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  redisHost: REDIS_HOST,
  custodyAccount: LEDGER_CONFIG.custodyAccount,
});
