import { describe, it, expect } from 'vitest';
import { loadConfig, getLogLevel } from '../../src/config/index.js';

const TRADER = '0x1111111111111111111111111111111111111111';
const PROXY = '0x2222222222222222222222222222222222222222';
const USDC = '0x3333333333333333333333333333333333333333';
const TEST_KEY = 'ab'.repeat(32);

function baseEnv(overrides: Record<string, string | undefined> = {}): Record<string, string | undefined> {
  return {
    USER_ADDRESSES: TRADER,
    PROXY_WALLET: PROXY,
    PRIVATE_KEY: TEST_KEY,
    CLOB_HTTP_URL: 'https://clob.example.com',
    RPC_URL: 'http://localhost:8545',
    USDC_CONTRACT_ADDRESS: USDC,
    ...overrides,
  };
}

describe('Configuration', () => {
  describe('loadConfig', () => {
    it('should apply defaults for optional settings', () => {
      const config = loadConfig(baseEnv());

      expect(config.accounts.userAddresses).toEqual([TRADER]);
      expect(config.accounts.privateKey).toBe(`0x${TEST_KEY}`);
      expect(config.polymarket.rtdsUrl).toBe('wss://ws-live-data.polymarket.com');
      expect(config.polymarket.dataApiUrl).toBe('https://data-api.polymarket.com');
      expect(config.polymarket.chainId).toBe(137);
      expect(config.executor).toEqual({ maxEventAgeHours: 24, dedupCapacity: 1000, channelCapacity: 100 });
      expect(config.feed).toEqual({ reconnectBaseDelayMs: 5000, reconnectMaxAttempts: 10, reconnectBackoffCap: 5 });
      expect(config.network).toEqual({ requestTimeoutMs: 10000, networkRetryLimit: 3, retryLimit: 3 });
      expect(config.api).toEqual({ enabled: true, port: 3000, enableMetrics: true });
      expect(config.sizing.strategy).toBe('PERCENTAGE');
      expect(config.sizing.copySize).toBe(10);
      expect(config.sizing.maxOrderSizeUsd).toBe(100);
      expect(config.sizing.minOrderSizeUsd).toBe(1);
      expect(config.sizing.tradeMultiplier).toBeUndefined();
      expect(config.sizing.tieredMultipliers).toBeUndefined();
    });

    it('should lower-case tracked addresses from a JSON array', () => {
      const mixed = '0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA';
      const config = loadConfig(baseEnv({ USER_ADDRESSES: JSON.stringify([mixed, TRADER]) }));

      expect(config.accounts.userAddresses).toEqual([mixed.toLowerCase(), TRADER]);
    });

    it('should fold the trade multiplier into copySize in legacy mode', () => {
      const config = loadConfig(baseEnv({ COPY_PERCENTAGE: '5', TRADE_MULTIPLIER: '2' }));

      expect(config.sizing.strategy).toBe('PERCENTAGE');
      expect(config.sizing.copySize).toBe(10);
      expect(config.sizing.tradeMultiplier).toBeUndefined();
    });

    it('should ignore COPY_PERCENTAGE when a strategy is set', () => {
      const config = loadConfig(baseEnv({ COPY_PERCENTAGE: '5', COPY_STRATEGY: 'FIXED', COPY_SIZE: '20' }));

      expect(config.sizing.strategy).toBe('FIXED');
      expect(config.sizing.copySize).toBe(20);
    });

    it('should default ADAPTIVE bounds to copySize and threshold to 500', () => {
      const config = loadConfig(baseEnv({ COPY_STRATEGY: 'adaptive', COPY_SIZE: '8' }));

      expect(config.sizing.strategy).toBe('ADAPTIVE');
      expect(config.sizing.adaptiveMinPercent).toBe(8);
      expect(config.sizing.adaptiveMaxPercent).toBe(8);
      expect(config.sizing.adaptiveThreshold).toBe(500);
    });

    it('should fall back to PERCENTAGE for an unknown strategy', () => {
      const config = loadConfig(baseEnv({ COPY_STRATEGY: 'MARTINGALE' }));
      expect(config.sizing.strategy).toBe('PERCENTAGE');
    });

    it('should keep a non-unit trade multiplier', () => {
      const config = loadConfig(baseEnv({ TRADE_MULTIPLIER: '1.5' }));
      expect(config.sizing.tradeMultiplier).toBe(1.5);
    });

    it('should fall back to defaults for unparseable numbers', () => {
      const config = loadConfig(baseEnv({ MAX_ORDER_SIZE_USD: 'abc', TOO_OLD_TIMESTAMP: '' }));

      expect(config.sizing.maxOrderSizeUsd).toBe(100);
      expect(config.executor.maxEventAgeHours).toBe(24);
    });

    it('should parse tiered multipliers', () => {
      const config = loadConfig(baseEnv({ TIERED_MULTIPLIERS: '0-500:1.0,500+:1.5' }));

      expect(config.sizing.tieredMultipliers).toEqual([
        { min: 0, max: 500, multiplier: 1.0 },
        { min: 500, multiplier: 1.5 },
      ]);
    });

    it('should fail on malformed tiers', () => {
      expect(() => loadConfig(baseEnv({ TIERED_MULTIPLIERS: '100-50:1' }))).toThrow(
        'max must be > min in tier: 100-50:1'
      );
    });

    it('should report missing tracked addresses', () => {
      expect(() => loadConfig(baseEnv({ USER_ADDRESSES: undefined }))).toThrow(
        'Configuration validation failed:\n  - accounts.userAddresses: USER_ADDRESSES must contain at least one address'
      );
    });

    it('should accept a plain ws feed URL', () => {
      const config = loadConfig(baseEnv({ RTDS_URL: 'ws://127.0.0.1:9000' }));

      expect(config.polymarket.rtdsUrl).toBe('ws://127.0.0.1:9000');
    });

    it('should reject a feed URL that is not a websocket URL', () => {
      expect(() => loadConfig(baseEnv({ RTDS_URL: 'https://ws-live-data.example.com' }))).toThrow(
        'Configuration validation failed:\n  - polymarket.rtdsUrl: RTDS_URL must be a ws:// or wss:// URL'
      );
      expect(() => loadConfig(baseEnv({ RTDS_URL: 'not a url' }))).toThrow('polymarket.rtdsUrl');
    });

    it('should report a missing private key by path', () => {
      expect(() => loadConfig(baseEnv({ PRIVATE_KEY: undefined }))).toThrow('accounts.privateKey');
    });

    it('should report inconsistent sizing', () => {
      expect(() => loadConfig(baseEnv({ MIN_ORDER_SIZE_USD: '500' }))).toThrow(
        'Configuration validation failed:\n  - sizing: MIN_ORDER_SIZE_USD ($500) must not exceed MAX_ORDER_SIZE_USD ($100)'
      );
    });
  });

  describe('getLogLevel', () => {
    it('should read LOG_LEVEL and fall back to info', () => {
      expect(getLogLevel({ LOG_LEVEL: 'warn' })).toBe('warn');
      expect(getLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info');
      expect(getLogLevel({})).toBe('info');
    });
  });
});
