import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  REDIS_CONFIG,
  JWT_CONFIG,
  RATE_LIMIT_CONFIG,
  LEDGER_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export {
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  validateProductionEnv,
  getEnvironmentInfo,
};

export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * For environment-specific values, you can also import directly from './environments'
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,

  // Server
  port: API_CONFIG.port,

  redis: REDIS_CONFIG,

  jwt: JWT_CONFIG,

  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  rateLimit: RATE_LIMIT_CONFIG,

  ledger: LEDGER_CONFIG,

  logging: LOG_CONFIG,

  otel: OTEL_CONFIG,
};
