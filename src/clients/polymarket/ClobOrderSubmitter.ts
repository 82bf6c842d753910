import { ClobClient, Side, OrderType, type ApiKeyCreds, type TickSize } from '@polymarket/clob-client';
import { Wallet } from 'ethers';
import { ORDER_SIDES, SIGNATURE_TYPES } from '../../config/constants.js';
import type { CopyOrderRequest, IContractInspector, IOrderSubmitter } from '../shared/interfaces.js';
import type { SubmittedOrder } from '../../services/copyTrading/types.js';
import { OrderResponseSchema, type SignatureType } from './types.js';
import { logger, type Logger } from '../../utils/logger.js';
import { retry } from '../../utils/retry.js';
import { shortAddress } from '../../utils/address.js';
import { startTimer } from '../../utils/metrics.js';

export interface ClobOrderSubmitterConfig {
  clobHost: string;
  chainId: number;
  privateKey: string;
  // Proxy wallet that funds the orders
  proxyWallet: string;
  // Attempts for API credential derivation
  retryLimit: number;
}

const TICK_SIZES: readonly TickSize[] = ['0.1', '0.01', '0.001', '0.0001'];

function isTickSize(value: string): value is TickSize {
  return TICK_SIZES.some((tick) => tick === value);
}

/**
 * Snap a price onto the market's tick grid, inside (0, 1)
 */
export function roundToTick(price: number, tickSize: TickSize): number {
  const tick = Number(tickSize);
  const decimals = tickSize.length - 2;
  const snapped = Math.round(price / tick) * tick;
  const bounded = Math.min(1 - tick, Math.max(tick, snapped));
  return Number(bounded.toFixed(decimals));
}

/**
 * Shares to trade for a USD notional, rounded down to 2 decimals
 */
export function sharesForAmount(amountUsd: number, price: number): number {
  if (price <= 0) return 0;
  return Math.floor((amountUsd / price) * 100) / 100;
}

/**
 * Places copy orders on the Polymarket CLOB
 * Wraps the official @polymarket/clob-client SDK; the signer is owned here and
 * callers serialize submissions
 */
export class ClobOrderSubmitter implements IOrderSubmitter {
  private config: ClobOrderSubmitterConfig;
  private inspector: IContractInspector;
  private log: Logger;
  private client: ClobClient | null = null;
  private signer: Wallet;

  constructor(config: ClobOrderSubmitterConfig, inspector: IContractInspector) {
    this.config = config;
    this.inspector = inspector;
    this.log = logger('ClobOrderSubmitter');
    this.signer = new Wallet(config.privateKey);
  }

  /**
   * Derive API credentials and build the trading client
   */
  async connect(): Promise<void> {
    if (this.client) {
      this.log.warn('Already connected');
      return;
    }

    const timer = startTimer();

    // Smart-contract proxy wallets sign through the Gnosis Safe scheme
    const isContract = await this.inspector.isContract(this.config.proxyWallet);
    const signatureType: SignatureType = isContract ? SIGNATURE_TYPES.GNOSIS : SIGNATURE_TYPES.EOA;

    this.log.info('Wallet initialized', {
      signer: shortAddress(this.signer.address),
      proxyWallet: shortAddress(this.config.proxyWallet),
      signatureType: isContract ? 'GNOSIS' : 'EOA',
    });

    const tempClient = new ClobClient(this.config.clobHost, this.config.chainId, this.signer);

    let apiCreds: ApiKeyCreds;
    try {
      apiCreds = await retry(
        async () => {
          const creds = await tempClient.createOrDeriveApiKey();
          if (!creds.key || !creds.secret || !creds.passphrase) {
            throw new Error('createOrDeriveApiKey returned incomplete credentials (missing key/secret/passphrase)');
          }
          return creds;
        },
        {
          maxAttempts: this.config.retryLimit,
          initialDelayMs: 1000,
          retryOn: () => true,
          onRetry: (attempt, error) => {
            this.log.warn(`API key derivation attempt ${attempt} failed`, {
              error: error instanceof Error ? error.message : String(error),
            });
          },
        }
      );
    } catch (error) {
      const errMsg = error instanceof Error ? error.message : String(error);
      this.log.error('Failed to derive API credentials', {
        error: errMsg,
        walletAddress: shortAddress(this.signer.address),
      });
      throw new Error(`Unable to derive Polymarket API credentials: ${errMsg}`);
    }

    this.client = new ClobClient(
      this.config.clobHost,
      this.config.chainId,
      this.signer,
      apiCreds,
      signatureType,
      this.config.proxyWallet
    );

    this.log.info('Connected to Polymarket CLOB', {
      chainId: this.config.chainId,
      durationMs: Math.round(timer()),
    });
  }

  isConnected(): boolean {
    return this.client !== null;
  }

  /**
   * Place a GTC limit order at the observed trade price
   */
  async submitOrder(request: CopyOrderRequest): Promise<SubmittedOrder> {
    if (!this.client) {
      throw new Error('CLOB client not connected. Call connect() first.');
    }

    const timer = startTimer();

    const [rawTickSize, negRisk] = await Promise.all([
      this.client.getTickSize(request.assetId),
      this.client.getNegRisk(request.assetId),
    ]);
    const tickSize: TickSize = isTickSize(rawTickSize) ? rawTickSize : '0.01';

    const price = roundToTick(request.price, tickSize);
    const size = sharesForAmount(request.amountUsd, price);
    if (size <= 0) {
      throw new Error(`Order size rounds to zero ($${request.amountUsd.toFixed(2)} at ${price})`);
    }

    const raw: unknown = await this.client.createAndPostOrder(
      {
        tokenID: request.assetId,
        price,
        side: request.side === ORDER_SIDES.BUY ? Side.BUY : Side.SELL,
        size,
      },
      { tickSize, negRisk },
      OrderType.GTC
    );

    const parsed = OrderResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('Unexpected order response from CLOB');
    }
    const response = parsed.data;
    if (response.success === false || (response.errorMsg !== undefined && response.errorMsg !== '')) {
      throw new Error(`Order rejected: ${response.errorMsg || 'unknown error'}`);
    }

    this.log.info('Order placed', {
      orderId: response.orderID,
      marketId: request.marketId,
      side: request.side,
      price,
      size,
      durationMs: Math.round(timer()),
    });

    return {
      orderId: response.orderID,
      side: request.side,
      amountUsd: request.amountUsd,
      price,
      size,
    };
  }
}
