/**
 * Configuration for the server application
 */

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  defaultMaxRuns: number; // Run quota used when an event/category has no run configuration
  prizeDiscountPercent: number; // Discount applied to gross prizes when the event sets none
  prizePointBase: number; // Prize currency per championship point
  transactionTimeoutMs: number; // Timeout for a store transaction; a timeout rolls it back
  seedFile: string | null; // Optional JSON file with competitors, categories and events
  // Rate limiting configuration
  rateLimitEnabled: boolean;
  rateLimitWindowMs: number;
  rateLimitMax: number;
}

/**
 * Validates that environment variables produced usable values.
 * Throws an error if validation fails.
 */
export function validateConfig(config: ServerConfig): void {
  if (config.port < 1 || config.port > 65535) {
    throw new Error('PORT must be between 1 and 65535');
  }

  if (!Number.isInteger(config.defaultMaxRuns) || config.defaultMaxRuns < 1) {
    throw new Error('DEFAULT_MAX_RUNS must be a positive integer');
  }

  if (config.prizeDiscountPercent < 0 || config.prizeDiscountPercent > 100) {
    throw new Error('PRIZE_DISCOUNT_PERCENT must be between 0 and 100');
  }

  if (!(config.prizePointBase > 0)) {
    throw new Error('PRIZE_POINT_BASE must be positive');
  }

  if (!(config.transactionTimeoutMs > 0)) {
    throw new Error('TRANSACTION_TIMEOUT_MS must be positive');
  }
}

export const getConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const nodeEnv = env.NODE_ENV || 'development';
  const config: ServerConfig = {
    port: parseInt(env.PORT || '3000', 10),
    nodeEnv,
    defaultMaxRuns: parseInt(env.DEFAULT_MAX_RUNS || '5', 10),
    prizeDiscountPercent: parseFloat(env.PRIZE_DISCOUNT_PERCENT || '5'),
    prizePointBase: parseFloat(env.PRIZE_POINT_BASE || '100'), // R$100 = 1 point
    transactionTimeoutMs: parseInt(env.TRANSACTION_TIMEOUT_MS || '10000', 10),
    seedFile: env.SEED_FILE || null,
    // Rate limiting configuration (enabled by default, set RATE_LIMIT_ENABLED=false to disable)
    rateLimitEnabled: env.RATE_LIMIT_ENABLED !== 'false',
    rateLimitWindowMs: parseInt(env.RATE_LIMIT_WINDOW_MS || '900000', 10), // Default 15 minutes
    rateLimitMax: parseInt(env.RATE_LIMIT_MAX || '300', 10),
  };

  // Validate configuration (skip in test environment to allow flexibility)
  if (nodeEnv !== 'test') {
    validateConfig(config);
  }

  return config;
};

export const config = getConfig();
