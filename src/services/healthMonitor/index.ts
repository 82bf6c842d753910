/**
 * Health Monitor Module
 *
 * Startup system check and the component checks behind /health.
 */

export {
  checkRpcProvider,
  checkWalletBalance,
  checkPolymarketDataApi,
  checkCopyTradingService,
  runSystemCheck,
  getOverallHealth,
} from './HealthChecks.js';

export type {
  HealthCheckResult,
  BlockNumberSource,
  BalanceSource,
  Pingable,
  StateSource,
  SystemCheckDeps,
} from './HealthChecks.js';
