/**
 * Copy Trading Service Type Definitions
 *
 * This module defines the types shared by the copy trading pipeline:
 * - Tracked trade events coming off the activity feed
 * - Position sizing decisions
 * - Executor outcomes and service events
 * - Position snapshots from the data API
 */

import type { FeedState, OrderSide } from '../../config/constants.js';
import type { SizingStrategy } from '../../config/schema.js';

/**
 * Trade observed on a tracked account
 */
export interface TrackedEvent {
  // Seconds or milliseconds since epoch; normalized by magnitude
  timestamp: number;
  sourceAddress: string;
  marketId: string; // Condition id
  assetId: string; // Outcome token id
  side: OrderSide;
  size: number;
  price: number;
  notional: number; // size * price
  transactionHash?: string;
  // Descriptive
  title?: string;
  slug?: string;
  eventSlug?: string;
  outcome?: string;
  outcomeIndex?: number;
  traderName?: string;
}

/**
 * Position sizing calculation result
 */
export interface SizingDecision {
  traderOrderSize: number;
  baseAmount: number; // Before limits
  finalAmount: number; // After limits
  multiplierUsed: number;
  strategy: SizingStrategy;
  cappedByMax: boolean;
  reducedByBalance: boolean;
  belowMinimum: boolean;
  reasoning: string;
}

/**
 * Position held by an account, as reported by the data API
 */
export interface UserPosition {
  proxyWallet?: string;
  asset?: string;
  conditionId: string;
  size: number;
  avgPrice?: number;
  initialValue: number;
  currentValue: number;
  cashPnl?: number;
  percentPnl: number;
  curPrice?: number;
  title?: string;
  slug?: string;
  outcome?: string;
}

/**
 * Aggregated view over a set of positions
 */
export interface PortfolioSummary {
  positionCount: number;
  totalValue: number;
  initialValue: number;
  // Value-weighted average of percentPnl
  weightedPnlPercent: number;
  topPositions: UserPosition[];
}

/**
 * Result of submitting a copy order
 */
export interface SubmittedOrder {
  orderId?: string;
  side: OrderSide;
  amountUsd: number;
  price: number;
  size: number;
}

export type SkipReason = 'stale' | 'missing_transaction' | 'duplicate';

export type FailureStage = 'state' | 'submit';

/**
 * What the executor did with a tracked event
 */
export type ExecutionOutcome =
  | { status: 'skipped'; reason: SkipReason; event: TrackedEvent }
  | { status: 'failed'; stage: FailureStage; error: string; event: TrackedEvent; decision?: SizingDecision }
  | { status: 'submitted'; event: TrackedEvent; decision: SizingDecision; order: SubmittedOrder };

/**
 * Copy trading service state
 */
export interface CopyTradingState {
  isRunning: boolean;
  feedState: FeedState;
  trackedTradersCount: number;
  inFlightTrades: number;
  stats: CopyTradingStats;
  lastTradeAt?: Date;
  lastError?: string;
}

/**
 * Running counters by outcome
 */
export interface CopyTradingStats {
  tradesReceived: number;
  tradesCopied: number;
  tradesSkipped: number;
  tradesFailed: number;
}
