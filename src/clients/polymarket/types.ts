/**
 * Polymarket-specific types
 * These represent the raw data structures from the Polymarket APIs
 */

import { z } from 'zod';
import type { SIGNATURE_TYPES } from '../../config/constants.js';

export type SignatureType = (typeof SIGNATURE_TYPES)[keyof typeof SIGNATURE_TYPES];

// Numbers sometimes arrive as strings
const NumericSchema = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

// ============================================
// Real-Time Data Service (RTDS) Types
// ============================================

/**
 * Trade activity pushed on the `activity` / `trades` topic
 */
export const RtdsActivitySchema = z.object({
  proxyWallet: z.string(),
  asset: z.string(),
  conditionId: z.string(),
  side: z.string().transform((s) => s.toUpperCase()).pipe(z.enum(['BUY', 'SELL'])),
  size: NumericSchema,
  price: NumericSchema,
  timestamp: NumericSchema.optional(),
  transactionHash: z.string().optional(),
  title: z.string().optional(),
  slug: z.string().optional(),
  eventSlug: z.string().optional(),
  outcome: z.string().optional(),
  outcomeIndex: z.number().optional(),
  name: z.string().optional(),
  pseudonym: z.string().optional(),
});

export type RtdsActivity = z.infer<typeof RtdsActivitySchema>;

/**
 * Any frame the feed pushes. Only a few fields matter for routing.
 */
export const RtdsFrameSchema = z
  .object({
    action: z.string().optional(),
    status: z.string().optional(),
    topic: z.string().optional(),
    type: z.string().optional(),
    payload: z.unknown().optional(),
  })
  .passthrough();

export type RtdsFrame = z.infer<typeof RtdsFrameSchema>;

export interface RtdsSubscription {
  topic: string;
  type: string;
  filters?: string;
}

export interface RtdsSubscribeMessage {
  action: 'subscribe';
  subscriptions: RtdsSubscription[];
}

// ============================================
// Data API Types
// ============================================

/**
 * Position row from GET /positions?user=
 */
export const DataApiPositionSchema = z.object({
  proxyWallet: z.string().optional(),
  asset: z.string().optional(),
  conditionId: z.string(),
  size: NumericSchema.default(0),
  avgPrice: NumericSchema.optional(),
  initialValue: NumericSchema.default(0),
  currentValue: NumericSchema.default(0),
  cashPnl: NumericSchema.optional(),
  percentPnl: NumericSchema.default(0),
  curPrice: NumericSchema.optional(),
  title: z.string().optional(),
  slug: z.string().optional(),
  outcome: z.string().optional(),
});

export type DataApiPosition = z.infer<typeof DataApiPositionSchema>;

// ============================================
// CLOB API Types
// ============================================

/**
 * Response body of a posted order
 */
export const OrderResponseSchema = z
  .object({
    success: z.boolean().optional(),
    errorMsg: z.string().optional(),
    orderID: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();
