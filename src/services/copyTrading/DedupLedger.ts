import { Mutex } from '../../utils/mutex.js';
import { EXECUTOR } from '../../config/constants.js';

/**
 * Identity of a trade: `sourceAddress:transactionHash`
 */
export function tradeKey(sourceAddress: string, transactionHash: string): string {
  return `${sourceAddress}:${transactionHash}`;
}

/**
 * Bounded set of trades already handled.
 *
 * On overflow the whole set is cleared and only the key that overflowed it is
 * kept, so a trade seen just before a reset can be processed twice.
 */
export class DedupLedger {
  private readonly capacity: number;
  private seen = new Set<string>();
  private mutex = new Mutex();

  constructor(capacity: number = EXECUTOR.DEDUP_CAPACITY) {
    this.capacity = capacity;
  }

  /**
   * Record a key
   * @returns true if the key is new, false if it was already recorded
   */
  async checkAndInsert(key: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      if (this.seen.has(key)) {
        return false;
      }

      this.seen.add(key);
      if (this.seen.size > this.capacity) {
        this.seen.clear();
        this.seen.add(key);
      }
      return true;
    });
  }

  get size(): number {
    return this.seen.size;
  }
}
