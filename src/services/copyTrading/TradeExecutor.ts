/**
 * Trade Executor
 *
 * Turns tracked trades into copy orders.
 *
 * Flow per trade:
 * 1. Drop trades older than `maxEventAgeHours` and trades without a transaction hash
 * 2. Drop trades already recorded in the dedup ledger
 * 3. Fetch both accounts' positions and our USDC balance
 * 4. Size the order with the sizing policy
 * 5. Submit under the signer mutex; failures are logged and not retried
 */

import { EventEmitter } from 'events';
import type { SizingPolicyConfig } from '../../config/schema.js';
import { EXECUTOR } from '../../config/constants.js';
import type { IBalanceSource, IOrderSubmitter, IPositionSource } from '../../clients/shared/interfaces.js';
import type { ExecutionOutcome, SizingDecision, SkipReason, TrackedEvent, UserPosition } from './types.js';
import { computeOrder } from './PositionSizingStrategy.js';
import { DedupLedger, tradeKey } from './DedupLedger.js';
import type { TradeChannel } from './TradeChannel.js';
import { Mutex } from '../../utils/mutex.js';
import { createComponentLogger } from '../../utils/logger.js';
import { shortAddress } from '../../utils/address.js';
import { toMilliseconds } from '../../utils/time.js';
import * as metrics from '../../utils/metrics.js';

const log = createComponentLogger('TradeExecutor');

/**
 * A trade waiting in the channel, with the tracked address it matched
 */
export interface QueuedTrade {
  event: TrackedEvent;
  sourceAddress: string;
}

/**
 * Trade executor configuration
 */
export interface TradeExecutorConfig {
  proxyWallet: string;
  maxEventAgeHours: number;
  dedupCapacity: number;
  sizing: SizingPolicyConfig;
  // Trades handled at once; the next trade stays in the channel until a slot frees
  maxInFlight?: number;
}

/**
 * Collaborators; the mutex and ledger may be shared with other executors
 */
export interface TradeExecutorDeps {
  positions: IPositionSource;
  balances: IBalanceSource;
  submitter: IOrderSubmitter;
  signerMutex?: Mutex;
  ledger?: DedupLedger;
  now?: () => number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TradeExecutor extends EventEmitter {
  private config: TradeExecutorConfig;
  private positions: IPositionSource;
  private balances: IBalanceSource;
  private submitter: IOrderSubmitter;
  private signerMutex: Mutex;
  private ledger: DedupLedger;
  private now: () => number;
  private maxInFlight: number;
  private inFlight = new Set<Promise<void>>();

  constructor(config: TradeExecutorConfig, deps: TradeExecutorDeps) {
    super();
    this.config = config;
    this.positions = deps.positions;
    this.balances = deps.balances;
    this.submitter = deps.submitter;
    this.signerMutex = deps.signerMutex ?? new Mutex();
    this.ledger = deps.ledger ?? new DedupLedger(config.dedupCapacity);
    this.now = deps.now ?? Date.now;
    this.maxInFlight = Math.max(1, config.maxInFlight ?? EXECUTOR.CHANNEL_CAPACITY);
  }

  /**
   * Number of trades currently being handled
   */
  getInFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Consume the channel until it closes or the signal aborts, handling each
   * trade as its own task with at most `maxInFlight` running. Waits for
   * in-flight trades before resolving.
   */
  async run(channel: TradeChannel<QueuedTrade>, signal: AbortSignal): Promise<void> {
    log.info('Trade executor started - ready to execute trades', { maxInFlight: this.maxInFlight });

    while (!signal.aborted) {
      // Tasks never reject, so the race only waits for a free slot
      while (this.inFlight.size >= this.maxInFlight) {
        await Promise.race(this.inFlight);
      }
      if (signal.aborted) break;

      const item = await channel.receive();
      if (item === undefined) {
        log.warn('Trade channel closed');
        break;
      }
      if (signal.aborted) break;

      const task: Promise<void> = this.onEvent(item.event, item.sourceAddress)
        .then(
          () => undefined,
          (error: unknown) => {
            log.error('Error executing trade', { error: errorMessage(error) });
          }
        )
        .finally(() => {
          this.inFlight.delete(task);
        });
      this.inFlight.add(task);
    }

    if (this.inFlight.size > 0) {
      log.info('Waiting for in-flight trades', { count: this.inFlight.size });
    }
    await Promise.all([...this.inFlight]);
    log.info('Trade executor stopped');
  }

  /**
   * Handle one tracked trade end to end
   */
  async onEvent(event: TrackedEvent, sourceAddress: string): Promise<ExecutionOutcome> {
    const startedAt = this.now();

    // 1. Staleness
    const ageHours = (startedAt - toMilliseconds(event.timestamp, EXECUTOR.MS_TIMESTAMP_THRESHOLD)) / (1000 * 3600);
    if (ageHours > this.config.maxEventAgeHours) {
      return this.skip('stale', event, sourceAddress);
    }

    // 2. Identity
    const transactionHash = event.transactionHash;
    if (!transactionHash) {
      return this.skip('missing_transaction', event, sourceAddress);
    }

    // 3. Dedup
    const isNew = await this.ledger.checkAndInsert(tradeKey(sourceAddress, transactionHash));
    if (!isNew) {
      return this.skip('duplicate', event, sourceAddress);
    }

    log.info(`New trade detected for ${shortAddress(sourceAddress)} - executing immediately`, {
      side: event.side,
      notional: Number(event.notional.toFixed(2)),
      price: event.price,
      title: event.title,
      slug: event.slug,
      transactionHash,
    });
    metrics.recordCopyTradeDetected(sourceAddress, event.side);
    this.emit('tradeDetected', event);

    // 4. State
    let myPositions: UserPosition[];
    let traderPositions: UserPosition[];
    try {
      [myPositions, traderPositions] = await Promise.all([
        this.positions.getPositions(this.config.proxyWallet),
        this.positions.getPositions(sourceAddress),
      ]);
    } catch (error) {
      return this.fail('state', errorMessage(error), event, sourceAddress);
    }

    let myBalance: number;
    try {
      myBalance = await this.balances.getBalance(this.config.proxyWallet);
    } catch (error) {
      log.warn('Balance lookup failed, treating balance as 0', { error: errorMessage(error) });
      myBalance = 0;
    }

    // 5. Decision
    const myPosition = myPositions.find((p) => p.conditionId === event.marketId);
    const traderPosition = traderPositions.find((p) => p.conditionId === event.marketId);
    const traderCapital = traderPositions.reduce((sum, p) => sum + p.currentValue, 0);

    log.info('Balances', {
      myBalance: Number(myBalance.toFixed(2)),
      traderPositionsValue: Number(traderCapital.toFixed(2)),
      trader: shortAddress(sourceAddress),
      myPositionValue: myPosition ? Number(myPosition.currentValue.toFixed(2)) : 0,
      traderPositionValue: traderPosition ? Number(traderPosition.currentValue.toFixed(2)) : 0,
    });

    const decision = computeOrder(this.config.sizing, event.notional, myBalance, myPosition?.currentValue ?? 0);
    log.info('Order sized', {
      side: event.side,
      amount: Number(decision.finalAmount.toFixed(2)),
      reasoning: decision.reasoning,
    });

    // 6. Submission
    try {
      const order = await this.signerMutex.runExclusive(() =>
        this.submitter.submitOrder({
          assetId: event.assetId,
          marketId: event.marketId,
          side: event.side,
          amountUsd: decision.finalAmount,
          price: event.price,
        })
      );

      metrics.recordCopyTradeSuccess(sourceAddress, decision.strategy, event.side);
      metrics.copyTradingCopyLatency.labels(sourceAddress).observe(this.now() - startedAt);

      const outcome: ExecutionOutcome = { status: 'submitted', event, decision, order };
      this.emit('tradeCopied', outcome);
      return outcome;
    } catch (error) {
      return this.fail('submit', errorMessage(error), event, sourceAddress, decision);
    }
  }

  private skip(reason: SkipReason, event: TrackedEvent, sourceAddress: string): ExecutionOutcome {
    log.debug('Trade skipped', { reason, trader: shortAddress(sourceAddress) });
    metrics.recordCopyTradeSkipped(sourceAddress, reason);

    const outcome = { status: 'skipped', reason, event } as const;
    this.emit('tradeSkipped', outcome);
    return outcome;
  }

  private fail(
    stage: 'state' | 'submit',
    error: string,
    event: TrackedEvent,
    sourceAddress: string,
    decision?: SizingDecision
  ): ExecutionOutcome {
    log.error(stage === 'state' ? 'Failed to fetch positions' : 'Failed to submit copy order', {
      trader: shortAddress(sourceAddress),
      marketId: event.marketId,
      error,
    });
    metrics.recordCopyTradeFailed(sourceAddress, stage);

    const outcome = { status: 'failed', stage, error, event, decision } as const;
    this.emit('tradeFailed', outcome);
    return outcome;
  }
}
