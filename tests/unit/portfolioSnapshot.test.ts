import { describe, it, expect } from 'vitest';
import { summarizePositions, logPortfolioSnapshot } from '../../src/services/copyTrading/PortfolioSnapshot.js';
import {
  PROXY,
  TRADER,
  createMockPosition,
  FakeBalanceSource,
  FakePositionSource,
} from '../mocks/polymarket.js';

const winner = createMockPosition({ conditionId: '0xa', currentValue: 100, initialValue: 80, percentPnl: 25 });
const loser = createMockPosition({ conditionId: '0xb', currentValue: 300, initialValue: 400, percentPnl: -25 });
const worthless = createMockPosition({ conditionId: '0xc', currentValue: 0, initialValue: 10, percentPnl: 50 });

describe('Portfolio Snapshot', () => {
  describe('summarizePositions', () => {
    it('should total values and weight P&L by current value', () => {
      const summary = summarizePositions([winner, loser, worthless], 2);

      expect(summary.positionCount).toBe(3);
      expect(summary.totalValue).toBe(400);
      expect(summary.initialValue).toBe(490);
      // (100 * 25 + 300 * -25 + 0 * 50) / 400
      expect(summary.weightedPnlPercent).toBe(-12.5);
      expect(summary.topPositions.map((p) => p.conditionId)).toEqual(['0xc', '0xa']);
    });

    it('should report zero P&L for an empty portfolio', () => {
      expect(summarizePositions([], 5)).toEqual({
        positionCount: 0,
        totalValue: 0,
        initialValue: 0,
        weightedPnlPercent: 0,
        topPositions: [],
      });
    });
  });

  describe('logPortfolioSnapshot', () => {
    it('should summarize both sides and tolerate a failed trader lookup', async () => {
      const positions = new FakePositionSource()
        .set(PROXY, [winner])
        .set(TRADER, new Error('timeout'));

      const result = await logPortfolioSnapshot(PROXY, [TRADER], positions, new FakeBalanceSource(250));

      expect(result.balance).toBe(250);
      expect(result.mine?.positionCount).toBe(1);
      expect(result.mine?.weightedPnlPercent).toBe(25);
      expect(result.traders.get(TRADER)).toBeNull();
    });

    it('should continue when the balance lookup fails', async () => {
      const positions = new FakePositionSource().set(TRADER, [winner, loser]);

      const result = await logPortfolioSnapshot(PROXY, [TRADER], positions, new FakeBalanceSource(new Error('rpc down')));

      expect(result.balance).toBeNull();
      expect(result.mine?.positionCount).toBe(0);
      expect(result.traders.get(TRADER)?.totalValue).toBe(400);
    });
  });
});
