/**
 * Polymarket collaborator fakes for testing
 */

import type {
  CopyOrderRequest,
  IBalanceSource,
  IOrderSubmitter,
  IPositionSource,
} from '../../src/clients/shared/interfaces.js';
import type { SubmittedOrder, TrackedEvent, UserPosition } from '../../src/services/copyTrading/types.js';

export const TRADER = '0x1111111111111111111111111111111111111111';
export const PROXY = '0x2222222222222222222222222222222222222222';

/**
 * Mock tracked trade
 */
export function createMockEvent(overrides?: Partial<TrackedEvent>): TrackedEvent {
  return {
    timestamp: Math.floor(Date.now() / 1000),
    sourceAddress: TRADER,
    marketId: '0xmarket',
    assetId: 'asset-yes',
    side: 'BUY',
    size: 100,
    price: 0.5,
    notional: 50,
    transactionHash: '0xtx1',
    title: 'Test Market',
    ...overrides,
  };
}

/**
 * Mock position
 */
export function createMockPosition(overrides?: Partial<UserPosition>): UserPosition {
  return {
    conditionId: '0xmarket',
    size: 100,
    initialValue: 50,
    currentValue: 60,
    percentPnl: 20,
    title: 'Test Market',
    outcome: 'Yes',
    ...overrides,
  };
}

/**
 * Positions per address; an address mapped to an Error rejects
 */
export class FakePositionSource implements IPositionSource {
  calls: string[] = [];
  private positions = new Map<string, UserPosition[] | Error>();

  set(address: string, value: UserPosition[] | Error): this {
    this.positions.set(address, value);
    return this;
  }

  async getPositions(address: string): Promise<UserPosition[]> {
    this.calls.push(address);
    const value = this.positions.get(address);
    if (value instanceof Error) throw value;
    return value ?? [];
  }
}

export class FakeBalanceSource implements IBalanceSource {
  constructor(private balance: number | Error) {}

  async getBalance(_address: string): Promise<number> {
    if (this.balance instanceof Error) throw this.balance;
    return this.balance;
  }
}

/**
 * Records submitted orders and the peak number of overlapping submissions
 */
export class FakeOrderSubmitter implements IOrderSubmitter {
  requests: CopyOrderRequest[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private options: { delayMs?: number; error?: Error } = {}
  ) {}

  async submitOrder(request: CopyOrderRequest): Promise<SubmittedOrder> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.options.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
      }
      if (this.options.error) throw this.options.error;

      this.requests.push(request);
      return {
        orderId: `order-${this.requests.length}`,
        side: request.side,
        amountUsd: request.amountUsd,
        price: request.price,
        size: Math.floor((request.amountUsd / request.price) * 100) / 100,
      };
    } finally {
      this.active--;
    }
  }
}
