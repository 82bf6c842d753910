import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigSchema, LogLevelSchema, type Config, type LogLevel } from './schema.js';
import { POLYMARKET_ENDPOINTS, SIZING, TIMING, EXECUTOR } from './constants.js';
import { parseUserAddresses } from '../utils/address.js';
import { parseTieredMultipliers, validateSizingConfig } from '../services/copyTrading/PositionSizingStrategy.js';

// Load environment variables
dotenv.config();

type Env = Record<string, string | undefined>;

/**
 * Parse boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse number from environment variable
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  return parseOptionalNumber(value) ?? defaultValue;
}

/**
 * Parse an optional number; blank or unparseable values are treated as unset
 */
function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

function normalizePrivateKey(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.startsWith('0x') ? trimmed : `0x${trimmed}`;
}

/**
 * Build the sizing policy from environment variables.
 *
 * `COPY_PERCENTAGE` without `COPY_STRATEGY` selects the legacy mode: a plain
 * percentage strategy whose copy size already includes `TRADE_MULTIPLIER`.
 */
function buildSizingFromEnv(env: Env): Record<string, unknown> {
  const shared = {
    maxOrderSizeUsd: parseNumber(env['MAX_ORDER_SIZE_USD'], 100),
    minOrderSizeUsd: parseNumber(env['MIN_ORDER_SIZE_USD'], 1),
    maxPositionSizeUsd: parseOptionalNumber(env['MAX_POSITION_SIZE_USD']),
    maxDailyVolumeUsd: parseOptionalNumber(env['MAX_DAILY_VOLUME_USD']),
    tieredMultipliers:
      env['TIERED_MULTIPLIERS'] !== undefined ? parseTieredMultipliers(env['TIERED_MULTIPLIERS']) : undefined,
  };

  const tradeMultiplier = parseNumber(env['TRADE_MULTIPLIER'], 1.0);

  if (env['COPY_PERCENTAGE'] !== undefined && env['COPY_STRATEGY'] === undefined) {
    const copyPercentage = parseNumber(env['COPY_PERCENTAGE'], 10);
    return {
      ...shared,
      strategy: 'PERCENTAGE',
      copySize: copyPercentage * tradeMultiplier,
    };
  }

  const strategyName = (env['COPY_STRATEGY'] ?? 'PERCENTAGE').toUpperCase();
  const strategy = strategyName === 'FIXED' || strategyName === 'ADAPTIVE' ? strategyName : 'PERCENTAGE';
  const copySize = parseNumber(env['COPY_SIZE'], 10);

  const sizing: Record<string, unknown> = {
    ...shared,
    strategy,
    copySize,
    tradeMultiplier: Math.abs(tradeMultiplier - 1) > SIZING.MULTIPLIER_EPSILON ? tradeMultiplier : undefined,
  };

  if (strategy === 'ADAPTIVE') {
    sizing['adaptiveMinPercent'] = parseNumber(env['ADAPTIVE_MIN_PERCENT'], copySize);
    sizing['adaptiveMaxPercent'] = parseNumber(env['ADAPTIVE_MAX_PERCENT'], copySize);
    sizing['adaptiveThreshold'] = parseNumber(env['ADAPTIVE_THRESHOLD_USD'], SIZING.DEFAULT_ADAPTIVE_THRESHOLD_USD);
  }

  return sizing;
}

/**
 * Build configuration object from environment variables
 */
export function buildConfigFromEnv(env: Env = process.env): unknown {
  return {
    env: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',

    accounts: {
      userAddresses: parseUserAddresses(env['USER_ADDRESSES'] ?? ''),
      proxyWallet: env['PROXY_WALLET']?.trim(),
      privateKey: normalizePrivateKey(env['PRIVATE_KEY']),
    },

    polymarket: {
      clobHost: env['CLOB_HTTP_URL'],
      dataApiUrl: env['DATA_API_URL'] || POLYMARKET_ENDPOINTS.DATA_API,
      rtdsUrl: env['RTDS_URL'] || POLYMARKET_ENDPOINTS.RTDS,
      chainId: parseNumber(env['CLOB_CHAIN_ID'], 137),
    },

    chain: {
      rpcUrl: env['RPC_URL'],
      usdcContractAddress: env['USDC_CONTRACT_ADDRESS']?.trim(),
    },

    network: {
      requestTimeoutMs: parseNumber(env['REQUEST_TIMEOUT_MS'], TIMING.REQUEST_TIMEOUT_MS),
      networkRetryLimit: parseNumber(env['NETWORK_RETRY_LIMIT'], 3),
      retryLimit: parseNumber(env['RETRY_LIMIT'], 3),
    },

    feed: {
      reconnectBaseDelayMs: parseNumber(env['RECONNECT_BASE_DELAY_MS'], TIMING.RECONNECT_BASE_DELAY_MS),
      reconnectMaxAttempts: parseNumber(env['RECONNECT_MAX_ATTEMPTS'], TIMING.RECONNECT_MAX_ATTEMPTS),
      reconnectBackoffCap: parseNumber(env['RECONNECT_BACKOFF_CAP'], TIMING.RECONNECT_BACKOFF_CAP),
    },

    executor: {
      maxEventAgeHours: parseNumber(env['TOO_OLD_TIMESTAMP'], 24),
      dedupCapacity: parseNumber(env['DEDUP_CAPACITY'], EXECUTOR.DEDUP_CAPACITY),
      channelCapacity: parseNumber(env['CHANNEL_CAPACITY'], EXECUTOR.CHANNEL_CAPACITY),
    },

    sizing: buildSizingFromEnv(env),

    api: {
      enabled: parseBoolean(env['API_ENABLED'], true),
      port: parseNumber(env['API_PORT'], 3000),
      enableMetrics: parseBoolean(env['ENABLE_METRICS'], true),
    },
  };
}

/**
 * Validate and load configuration
 */
export function loadConfig(env: Env = process.env): Config {
  let config: Config;

  try {
    config = ConfigSchema.parse(buildConfigFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
      throw new Error(`Configuration validation failed:\n${issues}`);
    }
    throw error;
  }

  const sizingErrors = validateSizingConfig(config.sizing);
  if (sizingErrors.length > 0) {
    const issues = sizingErrors.map((message) => `  - sizing: ${message}`).join('\n');
    throw new Error(`Configuration validation failed:\n${issues}`);
  }

  return config;
}

// Singleton config instance
let configInstance: Config | null = null;

/**
 * Get the configuration instance (lazy loaded)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Log level straight from the environment, so logging works before (or without)
 * a complete configuration
 */
export function getLogLevel(env: Env = process.env): LogLevel {
  return LogLevelSchema.catch('info').parse(env['LOG_LEVEL']);
}

// Re-export types and constants
export * from './schema.js';
export * from './constants.js';
