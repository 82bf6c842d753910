import type { OrderSide } from '../../config/constants.js';
import type { SubmittedOrder, UserPosition } from '../../services/copyTrading/types.js';

// ============================================
// Collaborator Interfaces
// ============================================

/**
 * Position lookup by account address
 */
export interface IPositionSource {
  /** Fetch all open positions for an account; rejects on transport failure */
  getPositions(address: string): Promise<UserPosition[]>;
}

/**
 * Token balance lookup
 */
export interface IBalanceSource {
  /** USDC balance of an account as a decimal number */
  getBalance(address: string): Promise<number>;
}

/**
 * Contract-type check used to pick a signature scheme
 */
export interface IContractInspector {
  isContract(address: string): Promise<boolean>;
}

/**
 * Copy order to place on the exchange
 */
export interface CopyOrderRequest {
  /** Outcome token to trade */
  assetId: string;
  /** Condition id of the market */
  marketId: string;
  side: OrderSide;
  /** Order notional in USD */
  amountUsd: number;
  /** Limit price (0-1) */
  price: number;
}

/**
 * Order submission
 */
export interface IOrderSubmitter {
  submitOrder(request: CopyOrderRequest): Promise<SubmittedOrder>;
}
