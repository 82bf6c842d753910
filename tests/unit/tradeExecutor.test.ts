import { describe, it, expect, beforeEach } from 'vitest';
import { TradeExecutor, type QueuedTrade, type TradeExecutorConfig } from '../../src/services/copyTrading/TradeExecutor.js';
import { DedupLedger } from '../../src/services/copyTrading/DedupLedger.js';
import { TradeChannel } from '../../src/services/copyTrading/TradeChannel.js';
import type { ExecutionOutcome } from '../../src/services/copyTrading/types.js';
import {
  PROXY,
  TRADER,
  createMockEvent,
  createMockPosition,
  FakeBalanceSource,
  FakeOrderSubmitter,
  FakePositionSource,
} from '../mocks/polymarket.js';

const NOW = 1_700_000_000_000;
const HOUR_MS = 3600 * 1000;

const config: TradeExecutorConfig = {
  proxyWallet: PROXY,
  maxEventAgeHours: 24,
  dedupCapacity: 1000,
  sizing: {
    strategy: 'PERCENTAGE',
    copySize: 10,
    maxOrderSizeUsd: 100,
    minOrderSizeUsd: 1,
  },
};

describe('TradeExecutor', () => {
  let positions: FakePositionSource;
  let balances: FakeBalanceSource;
  let submitter: FakeOrderSubmitter;

  function createExecutor(overrides: Partial<TradeExecutorConfig> = {}): TradeExecutor {
    return new TradeExecutor({ ...config, ...overrides }, { positions, balances, submitter, now: () => NOW });
  }

  beforeEach(() => {
    positions = new FakePositionSource();
    balances = new FakeBalanceSource(1000);
    submitter = new FakeOrderSubmitter();
  });

  describe('onEvent', () => {
    it('should size and submit a fresh trade', async () => {
      const executor = createExecutor();
      const outcome = await executor.onEvent(createMockEvent({ timestamp: NOW / 1000 }), TRADER);

      expect(outcome.status).toBe('submitted');
      if (outcome.status !== 'submitted') return;
      expect(outcome.decision.finalAmount).toBeCloseTo(5, 10);
      expect(outcome.order.orderId).toBe('order-1');

      expect(submitter.requests).toHaveLength(1);
      expect(submitter.requests[0]).toMatchObject({
        assetId: 'asset-yes',
        marketId: '0xmarket',
        side: 'BUY',
        price: 0.5,
      });
      expect(submitter.requests[0]?.amountUsd).toBeCloseTo(5, 10);
      expect(positions.calls.sort()).toEqual([TRADER, PROXY].sort());
    });

    it('should accept millisecond timestamps', async () => {
      const executor = createExecutor();
      const outcome = await executor.onEvent(createMockEvent({ timestamp: NOW - 1000 }), TRADER);

      expect(outcome.status).toBe('submitted');
    });

    it('should copy the trader side', async () => {
      const executor = createExecutor();
      await executor.onEvent(createMockEvent({ timestamp: NOW / 1000, side: 'SELL' }), TRADER);

      expect(submitter.requests[0]?.side).toBe('SELL');
    });

    it('should drop trades older than the age limit', async () => {
      const executor = createExecutor();
      const stale = createMockEvent({ timestamp: (NOW - 25 * HOUR_MS) / 1000 });

      const outcome = await executor.onEvent(stale, TRADER);

      expect(outcome).toMatchObject({ status: 'skipped', reason: 'stale' });
      expect(positions.calls).toEqual([]);
      expect(submitter.requests).toEqual([]);
    });

    it('should keep a trade exactly at the age limit', async () => {
      const executor = createExecutor();
      const outcome = await executor.onEvent(createMockEvent({ timestamp: (NOW - 24 * HOUR_MS) / 1000 }), TRADER);

      expect(outcome.status).toBe('submitted');
    });

    it('should drop trades without a transaction hash', async () => {
      const executor = createExecutor();
      const outcome = await executor.onEvent(
        createMockEvent({ timestamp: NOW / 1000, transactionHash: undefined }),
        TRADER
      );

      expect(outcome).toMatchObject({ status: 'skipped', reason: 'missing_transaction' });
      expect(submitter.requests).toEqual([]);
    });

    it('should process a repeated trade only once', async () => {
      const executor = createExecutor();
      const event = createMockEvent({ timestamp: NOW / 1000 });

      const first = await executor.onEvent(event, TRADER);
      const second = await executor.onEvent(event, TRADER);

      expect(first.status).toBe('submitted');
      expect(second).toMatchObject({ status: 'skipped', reason: 'duplicate' });
      expect(submitter.requests).toHaveLength(1);
    });

    it('should key trades by source address and transaction', async () => {
      const executor = createExecutor();
      const event = createMockEvent({ timestamp: NOW / 1000 });
      const otherTrader = '0x4444444444444444444444444444444444444444';

      await executor.onEvent(event, TRADER);
      const outcome = await executor.onEvent(event, otherTrader);

      expect(outcome.status).toBe('submitted');
      expect(submitter.requests).toHaveLength(2);
    });

    it('should share a ledger between executors', async () => {
      const ledger = new DedupLedger();
      const a = new TradeExecutor(config, { positions, balances, submitter, ledger, now: () => NOW });
      const b = new TradeExecutor(config, { positions, balances, submitter, ledger, now: () => NOW });
      const event = createMockEvent({ timestamp: NOW / 1000 });

      const outcomes = await Promise.all([a.onEvent(event, TRADER), b.onEvent(event, TRADER)]);

      expect(outcomes.map((o) => o.status).sort()).toEqual(['skipped', 'submitted']);
      expect(submitter.requests).toHaveLength(1);
    });

    it('should fail without submitting when positions cannot be fetched', async () => {
      positions.set(PROXY, new Error('data api down'));
      const executor = createExecutor();
      const event = createMockEvent({ timestamp: NOW / 1000 });

      const outcome = await executor.onEvent(event, TRADER);

      expect(outcome).toMatchObject({ status: 'failed', stage: 'state', error: 'data api down' });
      expect(submitter.requests).toEqual([]);

      // The key was recorded before the fetch
      const retry = await executor.onEvent(event, TRADER);
      expect(retry).toMatchObject({ status: 'skipped', reason: 'duplicate' });
    });

    it('should treat a failed balance lookup as zero', async () => {
      balances = new FakeBalanceSource(new Error('rpc down'));
      const executor = createExecutor();

      const outcome = await executor.onEvent(createMockEvent({ timestamp: NOW / 1000 }), TRADER);

      expect(outcome.status).toBe('submitted');
      if (outcome.status !== 'submitted') return;
      expect(outcome.decision.reducedByBalance).toBe(true);
      expect(outcome.decision.belowMinimum).toBe(true);
      expect(submitter.requests[0]?.amountUsd).toBe(1);
    });

    it('should size against our position in the same market', async () => {
      positions.set(PROXY, [
        createMockPosition({ conditionId: '0xother', currentValue: 1000 }),
        createMockPosition({ conditionId: '0xmarket', currentValue: 18 }),
      ]);
      const executor = createExecutor({ sizing: { ...config.sizing, maxPositionSizeUsd: 20 } });

      const outcome = await executor.onEvent(createMockEvent({ timestamp: NOW / 1000 }), TRADER);

      expect(outcome.status).toBe('submitted');
      expect(submitter.requests[0]?.amountUsd).toBeCloseTo(2, 10);
    });

    it('should report a rejected order without retrying', async () => {
      submitter = new FakeOrderSubmitter({ error: new Error('Order rejected: not enough balance') });
      const executor = createExecutor();

      const outcome = await executor.onEvent(createMockEvent({ timestamp: NOW / 1000 }), TRADER);

      expect(outcome).toMatchObject({
        status: 'failed',
        stage: 'submit',
        error: 'Order rejected: not enough balance',
      });
      if (outcome.status !== 'failed') return;
      expect(outcome.decision?.finalAmount).toBeCloseTo(5, 10);
    });

    it('should serialize submissions', async () => {
      submitter = new FakeOrderSubmitter({ delayMs: 20 });
      const executor = createExecutor();

      const outcomes = await Promise.all(
        ['0xa', '0xb', '0xc'].map((tx) =>
          executor.onEvent(createMockEvent({ timestamp: NOW / 1000, transactionHash: tx }), TRADER)
        )
      );

      expect(outcomes.every((o) => o.status === 'submitted')).toBe(true);
      expect(submitter.maxActive).toBe(1);
      expect(submitter.requests).toHaveLength(3);
    });

    it('should emit one event per outcome', async () => {
      const executor = createExecutor();
      const seen: string[] = [];
      executor.on('tradeDetected', () => seen.push('detected'));
      executor.on('tradeCopied', () => seen.push('copied'));
      executor.on('tradeSkipped', (outcome: ExecutionOutcome) => {
        if (outcome.status === 'skipped') seen.push(`skipped:${outcome.reason}`);
      });

      const event = createMockEvent({ timestamp: NOW / 1000 });
      await executor.onEvent(event, TRADER);
      await executor.onEvent(event, TRADER);

      expect(seen).toEqual(['detected', 'copied', 'skipped:duplicate']);
    });
  });

  describe('run', () => {
    it('should handle queued trades until the channel closes', async () => {
      const executor = createExecutor();
      const channel = new TradeChannel<QueuedTrade>(10);
      const controller = new AbortController();

      await channel.send({ event: createMockEvent({ timestamp: NOW / 1000, transactionHash: '0x1' }), sourceAddress: TRADER });
      await channel.send({ event: createMockEvent({ timestamp: NOW / 1000, transactionHash: '0x2' }), sourceAddress: TRADER });
      channel.close();

      await executor.run(channel, controller.signal);

      expect(submitter.requests).toHaveLength(2);
      expect(executor.getInFlightCount()).toBe(0);
    });

    it('should wait for in-flight trades before resolving', async () => {
      submitter = new FakeOrderSubmitter({ delayMs: 30 });
      const executor = createExecutor();
      const channel = new TradeChannel<QueuedTrade>(10);
      const controller = new AbortController();

      const running = executor.run(channel, controller.signal);
      await channel.send({ event: createMockEvent({ timestamp: NOW / 1000 }), sourceAddress: TRADER });
      await new Promise((resolve) => setTimeout(resolve, 5));
      expect(executor.getInFlightCount()).toBe(1);

      controller.abort();
      channel.close();
      await running;

      expect(submitter.requests).toHaveLength(1);
      expect(executor.getInFlightCount()).toBe(0);
    });

    it('should limit the number of trades handled at once', async () => {
      submitter = new FakeOrderSubmitter({ delayMs: 20 });
      const executor = createExecutor({ maxInFlight: 2 });
      const channel = new TradeChannel<QueuedTrade>(10);
      const controller = new AbortController();
      let peakInFlight = 0;
      executor.on('tradeDetected', () => {
        peakInFlight = Math.max(peakInFlight, executor.getInFlightCount());
      });

      for (let i = 0; i < 6; i++) {
        await channel.send({
          event: createMockEvent({ timestamp: NOW / 1000, transactionHash: `0x${i}` }),
          sourceAddress: TRADER,
        });
      }
      const running = executor.run(channel, controller.signal);
      await new Promise((resolve) => setTimeout(resolve, 5));
      // Two trades taken, the rest still queued
      expect(channel.size).toBe(4);

      channel.close();
      await running;

      expect(peakInFlight).toBe(2);
      expect(submitter.requests).toHaveLength(6);
    });

    it('should not start when already aborted', async () => {
      const executor = createExecutor();
      const channel = new TradeChannel<QueuedTrade>(10);
      const controller = new AbortController();
      controller.abort();

      await channel.send({ event: createMockEvent({ timestamp: NOW / 1000 }), sourceAddress: TRADER });
      await executor.run(channel, controller.signal);

      expect(submitter.requests).toEqual([]);
      expect(channel.size).toBe(1);
    });
  });
});
