/**
 * Copy Trading Service
 *
 * Main orchestrator for copy trading.
 * Coordinates between:
 * - ActivityFeedMonitor: streams trades of tracked traders
 * - TradeChannel: bounded FIFO hand-off from the feed to the executor
 * - TradeExecutor: filters, sizes and submits copy orders
 *
 * One AbortController gates both loops; stop() aborts it, closes the channel
 * and waits for both loops to drain.
 */

import { EventEmitter } from 'events';
import type { Config } from '../../config/schema.js';
import type { IBalanceSource, IOrderSubmitter, IPositionSource } from '../../clients/shared/interfaces.js';
import { ActivityFeedMonitor, type ActivityFeedMonitorConfig } from '../../clients/polymarket/ActivityFeedMonitor.js';
import type { CopyTradingState, CopyTradingStats, ExecutionOutcome, TrackedEvent } from './types.js';
import { TradeChannel } from './TradeChannel.js';
import { TradeExecutor, type QueuedTrade, type TradeExecutorConfig } from './TradeExecutor.js';
import { logPortfolioSnapshot } from './PortfolioSnapshot.js';
import { FEED_STATES } from '../../config/constants.js';
import { createComponentLogger } from '../../utils/logger.js';
import { formatDuration } from '../../utils/time.js';
import * as metrics from '../../utils/metrics.js';

const log = createComponentLogger('CopyTradingService');

/**
 * Copy trading service configuration
 */
export interface CopyTradingServiceConfig {
  userAddresses: string[];
  proxyWallet: string;
  channelCapacity: number;
  // Log both portfolios before streaming
  snapshotOnStart: boolean;
  feed: Omit<Partial<ActivityFeedMonitorConfig>, 'userAddresses'>;
  executor: Omit<TradeExecutorConfig, 'proxyWallet'>;
}

export interface CopyTradingServiceDeps {
  positions: IPositionSource;
  balances: IBalanceSource;
  submitter: IOrderSubmitter;
}

/**
 * Map the application config onto the service config
 */
export function serviceConfigFromAppConfig(config: Config): CopyTradingServiceConfig {
  return {
    userAddresses: config.accounts.userAddresses,
    proxyWallet: config.accounts.proxyWallet,
    channelCapacity: config.executor.channelCapacity,
    snapshotOnStart: true,
    feed: {
      url: config.polymarket.rtdsUrl,
      reconnectBaseDelayMs: config.feed.reconnectBaseDelayMs,
      reconnectMaxAttempts: config.feed.reconnectMaxAttempts,
      reconnectBackoffCap: config.feed.reconnectBackoffCap,
    },
    executor: {
      maxEventAgeHours: config.executor.maxEventAgeHours,
      dedupCapacity: config.executor.dedupCapacity,
      sizing: config.sizing,
    },
  };
}

/**
 * Copy Trading Service
 */
export class CopyTradingService extends EventEmitter {
  private config: CopyTradingServiceConfig;
  private deps: CopyTradingServiceDeps;

  // Sub-services, created per run
  private monitor: ActivityFeedMonitor | null = null;
  private executor: TradeExecutor | null = null;
  private channel: TradeChannel<QueuedTrade> | null = null;
  private abortController: AbortController | null = null;
  private monitorTask: Promise<void> | null = null;
  private executorTask: Promise<void> | null = null;

  // State
  private isRunning: boolean = false;
  private startedAt?: number;
  private stats: CopyTradingStats = { tradesReceived: 0, tradesCopied: 0, tradesSkipped: 0, tradesFailed: 0 };
  private lastTradeAt?: Date;
  private lastError?: string;

  constructor(config: CopyTradingServiceConfig, deps: CopyTradingServiceDeps) {
    super();
    this.config = config;
    this.deps = deps;
  }

  /**
   * Start streaming and executing
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      log.warn('Copy trading service already running');
      return;
    }

    log.info('Starting copy trading service', {
      trackedTraders: this.config.userAddresses.length,
      strategy: this.config.executor.sizing.strategy,
      copySize: this.config.executor.sizing.copySize,
    });

    this.isRunning = true;
    this.startedAt = Date.now();
    metrics.copyTradingTrackedTraders.set(this.config.userAddresses.length);

    const abortController = new AbortController();
    const channel = new TradeChannel<QueuedTrade>(this.config.channelCapacity);
    this.abortController = abortController;
    this.channel = channel;

    this.executor = new TradeExecutor(
      { ...this.config.executor, proxyWallet: this.config.proxyWallet, maxInFlight: this.config.channelCapacity },
      this.deps
    );
    this.wireExecutor(this.executor);

    this.monitor = new ActivityFeedMonitor(
      { ...this.config.feed, userAddresses: this.config.userAddresses },
      async (event, sourceAddress) => {
        this.stats.tradesReceived++;
        await channel.send({ event, sourceAddress });
      }
    );
    this.monitor.on('fatal', (error: Error) => {
      this.lastError = error.message;
      this.emit('fatal', error);
    });

    if (this.config.snapshotOnStart) {
      await logPortfolioSnapshot(
        this.config.proxyWallet,
        this.config.userAddresses,
        this.deps.positions,
        this.deps.balances
      );
    }

    this.executorTask = this.executor.run(channel, abortController.signal).catch((error: unknown) => {
      this.recordLoopError('Trade executor', error);
    });
    this.monitorTask = this.monitor.run(abortController.signal).catch((error: unknown) => {
      this.recordLoopError('Activity feed', error);
    });

    this.emit('started');
  }

  /**
   * Stop both loops and wait for in-flight trades
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    log.info('Stopping copy trading service');

    this.isRunning = false;
    this.abortController?.abort();
    this.channel?.close();

    await Promise.all([this.monitorTask, this.executorTask]);

    log.info('Copy trading service stopped', {
      uptime: this.startedAt ? formatDuration(Date.now() - this.startedAt) : undefined,
      ...this.stats,
    });

    this.monitorTask = null;
    this.executorTask = null;
    this.emit('stopped');
  }

  /**
   * Get service state
   */
  getState(): CopyTradingState {
    const state: CopyTradingState = {
      isRunning: this.isRunning,
      feedState: this.monitor?.state ?? FEED_STATES.DISCONNECTED,
      trackedTradersCount: this.config.userAddresses.length,
      inFlightTrades: this.executor?.getInFlightCount() ?? 0,
      stats: { ...this.stats },
    };
    if (this.lastTradeAt) {
      state.lastTradeAt = this.lastTradeAt;
    }
    if (this.lastError) {
      state.lastError = this.lastError;
    }
    return state;
  }

  /**
   * Check if service is running
   */
  isServiceRunning(): boolean {
    return this.isRunning;
  }

  private wireExecutor(executor: TradeExecutor): void {
    executor.on('tradeDetected', (event: TrackedEvent) => {
      this.emit('tradeDetected', event);
    });
    executor.on('tradeSkipped', (outcome: ExecutionOutcome) => {
      this.stats.tradesSkipped++;
      this.emit('tradeSkipped', outcome);
    });
    executor.on('tradeFailed', (outcome: ExecutionOutcome) => {
      this.stats.tradesFailed++;
      if (outcome.status === 'failed') {
        this.lastError = outcome.error;
      }
      this.emit('tradeFailed', outcome);
    });
    executor.on('tradeCopied', (outcome: ExecutionOutcome) => {
      this.stats.tradesCopied++;
      this.lastTradeAt = new Date();
      this.emit('tradeCopied', outcome);
    });
  }

  private recordLoopError(loop: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.lastError = message;
    log.error(`${loop} loop crashed`, { error: message });
    this.emit('fatal', error instanceof Error ? error : new Error(message));
  }
}
