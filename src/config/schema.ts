import { z } from 'zod';
import { POLYMARKET_ENDPOINTS, TIMING, EXECUTOR, SIZING_STRATEGIES } from './constants.js';
import { isValidEthereumAddress } from '../utils/address.js';

const AddressSchema = z.string().refine(isValidEthereumAddress, { message: 'Invalid Ethereum address' });

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Accounts: who we copy and who we trade as
const AccountsConfigSchema = z.object({
  userAddresses: z.array(AddressSchema).min(1, 'USER_ADDRESSES must contain at least one address'),
  // Proxy wallet that holds the USDC and the positions (shown on the Polymarket profile)
  proxyWallet: AddressSchema,
  privateKey: z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'PRIVATE_KEY must be 32 bytes of hex'),
});

// Polymarket endpoints
const PolymarketConfigSchema = z.object({
  clobHost: z.string().url(),
  dataApiUrl: z.string().url().default(POLYMARKET_ENDPOINTS.DATA_API),
  rtdsUrl: z
    .string()
    .url()
    .refine((url) => /^wss?:\/\//i.test(url), { message: 'RTDS_URL must be a ws:// or wss:// URL' })
    .default(POLYMARKET_ENDPOINTS.RTDS),
  chainId: z.number().int().positive().default(137),
});

// Polygon RPC
const ChainConfigSchema = z.object({
  rpcUrl: z.string().min(1),
  usdcContractAddress: AddressSchema,
});

// Outbound HTTP knobs
const NetworkConfigSchema = z.object({
  requestTimeoutMs: z.number().positive().default(TIMING.REQUEST_TIMEOUT_MS),
  networkRetryLimit: z.number().int().min(1).max(10).default(3),
  // Retries for CLOB credential derivation
  retryLimit: z.number().int().min(1).max(10).default(3),
});

// Live feed reconnect policy
const FeedConfigSchema = z.object({
  reconnectBaseDelayMs: z.number().positive().default(TIMING.RECONNECT_BASE_DELAY_MS),
  reconnectMaxAttempts: z.number().int().min(1).default(TIMING.RECONNECT_MAX_ATTEMPTS),
  reconnectBackoffCap: z.number().int().min(1).default(TIMING.RECONNECT_BACKOFF_CAP),
});

// Executor filters and buffers
const ExecutorConfigSchema = z.object({
  maxEventAgeHours: z.number().positive().default(24),
  dedupCapacity: z.number().int().positive().default(EXECUTOR.DEDUP_CAPACITY),
  channelCapacity: z.number().int().positive().default(EXECUTOR.CHANNEL_CAPACITY),
});

// Multiplier tier: [min, max) -> multiplier, open-ended when max is absent
export const MultiplierTierSchema = z.object({
  min: z.number().min(0),
  max: z.number().optional(),
  multiplier: z.number().min(0),
});

// Order sizing policy
export const SizingConfigSchema = z.object({
  strategy: z.nativeEnum(SIZING_STRATEGIES).default(SIZING_STRATEGIES.PERCENTAGE),
  copySize: z.number().min(0).default(10),
  maxOrderSizeUsd: z.number().positive().default(100),
  minOrderSizeUsd: z.number().min(0).default(1),
  maxPositionSizeUsd: z.number().positive().optional(),
  // Declared for operators; the sizing steps do not enforce it
  maxDailyVolumeUsd: z.number().positive().optional(),
  adaptiveMinPercent: z.number().min(0).optional(),
  adaptiveMaxPercent: z.number().min(0).optional(),
  adaptiveThreshold: z.number().positive().optional(),
  tieredMultipliers: z.array(MultiplierTierSchema).optional(),
  tradeMultiplier: z.number().min(0).optional(),
});

// HTTP status/metrics server
const ApiConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().min(1).max(65535).default(3000),
  enableMetrics: z.boolean().default(true),
});

// Main configuration schema
export const ConfigSchema = z.object({
  env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: LogLevelSchema.default('info'),

  accounts: AccountsConfigSchema,
  polymarket: PolymarketConfigSchema,
  chain: ChainConfigSchema,
  network: NetworkConfigSchema,
  feed: FeedConfigSchema,
  executor: ExecutorConfigSchema,
  sizing: SizingConfigSchema,
  api: ApiConfigSchema,
});

// Export types
export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type AccountsConfig = z.infer<typeof AccountsConfigSchema>;
export type PolymarketConfig = z.infer<typeof PolymarketConfigSchema>;
export type ChainConfig = z.infer<typeof ChainConfigSchema>;
export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;
export type FeedConfig = z.infer<typeof FeedConfigSchema>;
export type ExecutorConfig = z.infer<typeof ExecutorConfigSchema>;
export type SizingPolicyConfig = z.infer<typeof SizingConfigSchema>;
export type MultiplierTier = z.infer<typeof MultiplierTierSchema>;
export type SizingStrategy = SizingPolicyConfig['strategy'];
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
