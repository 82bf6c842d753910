/**
 * Portfolio Snapshot
 *
 * Logs the controlled account's positions and balance, then each tracked
 * trader's positions, once before streaming starts. Informational only: a
 * failed lookup is logged and never stops startup.
 */

import type { IBalanceSource, IPositionSource } from '../../clients/shared/interfaces.js';
import type { PortfolioSummary, UserPosition } from './types.js';
import { SNAPSHOT } from '../../config/constants.js';
import { createComponentLogger } from '../../utils/logger.js';
import { shortAddress } from '../../utils/address.js';
import { accountBalance } from '../../utils/metrics.js';

const log = createComponentLogger('PortfolioSnapshot');

/**
 * Summarize positions: totals, value-weighted P&L and the best performers
 */
export function summarizePositions(positions: UserPosition[], topN: number): PortfolioSummary {
  let totalValue = 0;
  let initialValue = 0;
  let weightedPnl = 0;

  for (const position of positions) {
    totalValue += position.currentValue;
    initialValue += position.initialValue;
    weightedPnl += position.currentValue * position.percentPnl;
  }

  const topPositions = [...positions].sort((a, b) => b.percentPnl - a.percentPnl).slice(0, topN);

  return {
    positionCount: positions.length,
    totalValue,
    initialValue,
    weightedPnlPercent: totalValue > 0 ? weightedPnl / totalValue : 0,
    topPositions,
  };
}

function describePositions(positions: UserPosition[]): Array<Record<string, unknown>> {
  return positions.map((p) => ({
    title: p.title ?? p.conditionId,
    outcome: p.outcome,
    value: Number(p.currentValue.toFixed(2)),
    pnlPercent: Number(p.percentPnl.toFixed(2)),
  }));
}

export interface PortfolioSnapshotResult {
  mine: PortfolioSummary | null;
  balance: number | null;
  traders: Map<string, PortfolioSummary | null>;
}

/**
 * Gather and log the startup snapshot
 */
export async function logPortfolioSnapshot(
  proxyWallet: string,
  userAddresses: string[],
  positions: IPositionSource,
  balances: IBalanceSource
): Promise<PortfolioSnapshotResult> {
  let balance: number | null = null;
  try {
    balance = await balances.getBalance(proxyWallet);
    accountBalance.labels('controlled').set(balance);
  } catch (error) {
    log.warn('Failed to fetch your balance', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  let mine: PortfolioSummary | null = null;
  try {
    mine = summarizePositions(await positions.getPositions(proxyWallet), SNAPSHOT.MY_TOP_POSITIONS);
    log.info('Your positions', {
      wallet: shortAddress(proxyWallet),
      count: mine.positionCount,
      currentValue: Number(mine.totalValue.toFixed(2)),
      initialValue: Number(mine.initialValue.toFixed(2)),
      pnlPercent: Number(mine.weightedPnlPercent.toFixed(2)),
      balance: balance === null ? undefined : Number(balance.toFixed(2)),
      top: describePositions(mine.topPositions),
    });
  } catch (error) {
    log.error('Failed to fetch your positions', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const traders = new Map<string, PortfolioSummary | null>();
  for (const address of userAddresses) {
    try {
      const summary = summarizePositions(await positions.getPositions(address), SNAPSHOT.TRADER_TOP_POSITIONS);
      traders.set(address, summary);
      log.info('Trader positions', {
        trader: shortAddress(address),
        count: summary.positionCount,
        pnlPercent: Number(summary.weightedPnlPercent.toFixed(2)),
        top: describePositions(summary.topPositions),
      });
    } catch (error) {
      traders.set(address, null);
      log.warn('Failed to fetch trader positions', {
        trader: shortAddress(address),
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { mine, balance, traders };
}
