/**
 * Health Checks
 *
 * Individual health check functions for the components the copy trader
 * depends on. Each check returns a standardized HealthCheckResult.
 *
 * Checks include:
 * - RPC provider connectivity
 * - Controlled account USDC balance
 * - Polymarket Data API
 * - Copy trading service state
 */

import { createComponentLogger } from '../../utils/logger.js';
import { updateHealthStatus } from '../../utils/metrics.js';
import { FEED_STATES } from '../../config/constants.js';
import type { CopyTradingState } from '../copyTrading/types.js';

const log = createComponentLogger('HealthChecks');

/**
 * Health check result
 */
export interface HealthCheckResult {
  name: string;
  status: 'healthy' | 'degraded' | 'unhealthy';
  message: string;
  latencyMs?: number;
  details?: Record<string, unknown>;
  timestamp: Date;
}

export interface BlockNumberSource {
  getBlockNumber(): Promise<number>;
}

export interface BalanceSource {
  getBalance(address: string): Promise<number>;
}

export interface Pingable {
  ping(): Promise<void>;
}

export interface StateSource {
  getState(): CopyTradingState;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Check RPC provider connectivity
 */
export async function checkRpcProvider(chain: BlockNumberSource): Promise<HealthCheckResult> {
  const startTime = Date.now();
  const name = 'rpc_provider';

  try {
    const blockNumber = await chain.getBlockNumber();

    return {
      name,
      status: 'healthy',
      message: 'RPC provider connected',
      latencyMs: Date.now() - startTime,
      details: { blockNumber },
      timestamp: new Date(),
    };
  } catch (error) {
    log.error('RPC health check failed', { error: errorMessage(error) });

    return {
      name,
      status: 'unhealthy',
      message: `RPC provider check failed: ${errorMessage(error)}`,
      latencyMs: Date.now() - startTime,
      timestamp: new Date(),
    };
  }
}

/**
 * Check the controlled account's USDC balance
 */
export async function checkWalletBalance(
  balances: BalanceSource,
  walletAddress: string,
  minBalanceUsdc: number = 1
): Promise<HealthCheckResult> {
  const startTime = Date.now();
  const name = 'wallet_balance';

  try {
    const balance = await balances.getBalance(walletAddress);

    let status: HealthCheckResult['status'];
    let message: string;

    if (balance <= 0) {
      status = 'degraded';
      message = 'USDC balance is zero';
    } else if (balance < minBalanceUsdc) {
      status = 'degraded';
      message = 'USDC balance below minimum order size';
    } else {
      status = 'healthy';
      message = 'Wallet balance sufficient';
    }

    return {
      name,
      status,
      message,
      latencyMs: Date.now() - startTime,
      details: {
        balanceUsdc: Number(balance.toFixed(2)),
        walletAddress: walletAddress.slice(0, 10) + '...',
      },
      timestamp: new Date(),
    };
  } catch (error) {
    log.error('Wallet balance check failed', { error: errorMessage(error) });

    return {
      name,
      status: 'unhealthy',
      message: `Wallet balance check failed: ${errorMessage(error)}`,
      latencyMs: Date.now() - startTime,
      timestamp: new Date(),
    };
  }
}

/**
 * Check Polymarket Data API
 */
export async function checkPolymarketDataApi(dataApi: Pingable): Promise<HealthCheckResult> {
  const startTime = Date.now();
  const name = 'polymarket_data_api';

  try {
    await dataApi.ping();

    return {
      name,
      status: 'healthy',
      message: 'Polymarket Data API accessible',
      latencyMs: Date.now() - startTime,
      timestamp: new Date(),
    };
  } catch (error) {
    log.error('Polymarket Data API check failed', { error: errorMessage(error) });

    return {
      name,
      status: 'unhealthy',
      message: `Data API check failed: ${errorMessage(error)}`,
      latencyMs: Date.now() - startTime,
      timestamp: new Date(),
    };
  }
}

/**
 * Check copy trading service state
 */
export function checkCopyTradingService(service: StateSource): HealthCheckResult {
  const name = 'copy_trading_service';
  const state = service.getState();

  let status: HealthCheckResult['status'];
  let message: string;

  if (state.feedState === FEED_STATES.FAILED) {
    status = 'unhealthy';
    message = 'Activity feed gave up reconnecting; restart required';
  } else if (state.isRunning && state.feedState === FEED_STATES.STREAMING) {
    status = 'healthy';
    message = `Copy trading active with ${state.trackedTradersCount} traders`;
  } else if (state.isRunning) {
    status = 'degraded';
    message = `Copy trading running, feed ${state.feedState}`;
  } else {
    status = 'healthy';
    message = 'Copy trading service stopped';
  }

  return {
    name,
    status,
    message,
    details: {
      isRunning: state.isRunning,
      feedState: state.feedState,
      tradersTracked: state.trackedTradersCount,
      inFlightTrades: state.inFlightTrades,
      ...state.stats,
      lastTradeAt: state.lastTradeAt?.toISOString(),
      lastError: state.lastError,
    },
    timestamp: new Date(),
  };
}

export interface SystemCheckDeps {
  chain: BlockNumberSource;
  balances: BalanceSource;
  dataApi: Pingable;
  walletAddress: string;
  minBalanceUsdc?: number;
}

/**
 * Startup system check. Never throws; the caller decides what a
 * degraded result means.
 */
export async function runSystemCheck(deps: SystemCheckDeps): Promise<HealthCheckResult[]> {
  const results = await Promise.all([
    checkRpcProvider(deps.chain),
    checkWalletBalance(deps.balances, deps.walletAddress, deps.minBalanceUsdc),
    checkPolymarketDataApi(deps.dataApi),
  ]);

  for (const result of results) {
    updateHealthStatus(result.name, result.status === 'healthy', result.latencyMs);
    if (result.status !== 'healthy') {
      log.warn(`System check: ${result.name} ${result.status}`, { message: result.message });
    } else {
      log.info(`System check: ${result.name} ok`, { latencyMs: result.latencyMs });
    }
  }

  return results;
}

/**
 * Get overall system health from individual checks
 */
export function getOverallHealth(results: HealthCheckResult[]): 'healthy' | 'degraded' | 'unhealthy' {
  const hasUnhealthy = results.some((r) => r.status === 'unhealthy');
  const hasDegraded = results.some((r) => r.status === 'degraded');

  if (hasUnhealthy) return 'unhealthy';
  if (hasDegraded) return 'degraded';
  return 'healthy';
}
