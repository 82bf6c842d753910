/**
 * Polymarket data API client
 *
 * Position lookups for the controlled account and for tracked traders.
 * Requests time out after `requestTimeoutMs` and transient failures are
 * retried up to `networkRetryLimit` attempts.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { IPositionSource } from '../shared/interfaces.js';
import type { UserPosition } from '../../services/copyTrading/types.js';
import { DataApiPositionSchema } from './types.js';
import { createComponentLogger } from '../../utils/logger.js';
import { retry } from '../../utils/retry.js';
import { shortAddress } from '../../utils/address.js';
import { POLYMARKET_ENDPOINTS, TIMING } from '../../config/constants.js';

const log = createComponentLogger('DataApiClient');

export interface DataApiClientConfig {
  dataApiUrl: string;
  requestTimeoutMs: number;
  networkRetryLimit: number;
}

const DEFAULT_CONFIG: DataApiClientConfig = {
  dataApiUrl: POLYMARKET_ENDPOINTS.DATA_API,
  requestTimeoutMs: TIMING.REQUEST_TIMEOUT_MS,
  networkRetryLimit: 3,
};

/**
 * Keep the rows that match the position shape, drop the rest
 */
export function parsePositions(data: unknown): UserPosition[] {
  const rows = z.array(z.unknown()).safeParse(data);
  if (!rows.success) return [];

  const positions: UserPosition[] = [];
  for (const row of rows.data) {
    const parsed = DataApiPositionSchema.safeParse(row);
    if (parsed.success) {
      positions.push(parsed.data);
    }
  }
  return positions;
}

export class DataApiClient implements IPositionSource {
  private config: DataApiClientConfig;
  private httpClient: AxiosInstance;

  constructor(config: Partial<DataApiClientConfig> = {}, httpClient?: AxiosInstance) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.httpClient =
      httpClient ??
      axios.create({
        baseURL: this.config.dataApiUrl,
        timeout: this.config.requestTimeoutMs,
        headers: {
          'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
        },
      });
  }

  /**
   * Fetch positions for an account
   */
  async getPositions(address: string): Promise<UserPosition[]> {
    try {
      const response = await retry(
        () => this.httpClient.get<unknown>('/positions', { params: { user: address } }),
        { maxAttempts: this.config.networkRetryLimit }
      );
      return parsePositions(response.data);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        log.error('Failed to fetch positions', {
          address: shortAddress(address),
          status: error.response?.status,
          message: error.message,
        });
      }
      throw error;
    }
  }

  /**
   * Reachability probe for the startup system check
   */
  async ping(): Promise<void> {
    await this.httpClient.get<unknown>('/positions', {
      params: { user: '0x0000000000000000000000000000000000000000', limit: 1 },
    });
  }
}
