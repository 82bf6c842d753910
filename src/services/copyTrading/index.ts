/**
 * Copy Trading Module
 *
 * Mirrors the trades of tracked Polymarket traders onto the controlled account.
 *
 * Main Components:
 * - CopyTradingService: Main orchestrator
 * - TradeExecutor: Filters, sizes and submits copy orders
 * - DedupLedger / TradeChannel: Per-trade identity and the feed hand-off
 * - PositionSizingStrategy: Calculates copy sizes (PERCENTAGE, FIXED, ADAPTIVE)
 */

// Main service
export { CopyTradingService, serviceConfigFromAppConfig } from './CopyTradingService.js';
export type { CopyTradingServiceConfig, CopyTradingServiceDeps } from './CopyTradingService.js';

// Sub-services
export { TradeExecutor } from './TradeExecutor.js';
export type { QueuedTrade, TradeExecutorConfig, TradeExecutorDeps } from './TradeExecutor.js';
export { DedupLedger, tradeKey } from './DedupLedger.js';
export { TradeChannel } from './TradeChannel.js';
export { logPortfolioSnapshot, summarizePositions } from './PortfolioSnapshot.js';

// Position sizing
export {
  computeOrder,
  calculateAdaptivePercent,
  getTradeMultiplier,
  parseTieredMultipliers,
  validateSizingConfig,
} from './PositionSizingStrategy.js';

// Types
export type {
  TrackedEvent,
  SizingDecision,
  UserPosition,
  PortfolioSummary,
  SubmittedOrder,
  SkipReason,
  FailureStage,
  ExecutionOutcome,
  CopyTradingState,
  CopyTradingStats,
} from './types.js';
