/**
 * Position Sizing Strategy
 *
 * Turns a tracked trader's order notional into the amount we copy:
 * - PERCENTAGE: copy a fixed percentage of the trader's order
 * - FIXED: copy a fixed USD amount per trade
 * - ADAPTIVE: copy a larger share of small trades and a smaller share of large ones
 *
 * The result is scaled by tiered (or flat) multipliers, then bounded by the
 * max order size, the optional position limit, the available balance and the
 * minimum order size, in that order.
 */

import type { MultiplierTier, SizingPolicyConfig } from '../../config/schema.js';
import { SIZING } from '../../config/constants.js';
import type { SizingDecision } from './types.js';

/**
 * Linear interpolation with t clamped to [0, 1]
 */
function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * Math.max(0, Math.min(1, t));
}

/**
 * Effective copy percentage for the ADAPTIVE strategy.
 *
 * Below the threshold the percentage moves from `adaptiveMaxPercent` (tiny
 * trades) to `copySize` (at the threshold). Above it the percentage moves from
 * `copySize` to `adaptiveMinPercent`, reached at twice the threshold.
 */
export function calculateAdaptivePercent(config: SizingPolicyConfig, traderOrderSize: number): number {
  const minPercent = config.adaptiveMinPercent ?? config.copySize;
  const maxPercent = config.adaptiveMaxPercent ?? config.copySize;
  const threshold = config.adaptiveThreshold ?? SIZING.DEFAULT_ADAPTIVE_THRESHOLD_USD;

  if (traderOrderSize >= threshold) {
    const factor = Math.min(1, traderOrderSize / threshold - 1);
    return lerp(config.copySize, minPercent, factor);
  }

  const factor = traderOrderSize / threshold;
  return lerp(maxPercent, config.copySize, factor);
}

/**
 * Resolve the multiplier for a trade size.
 *
 * The first tier whose [min, max) contains the size wins; an open-ended tier
 * matches anything at or above its min. When no tier matches, the last tier's
 * multiplier applies. Without tiers the flat trade multiplier is used.
 */
export function getTradeMultiplier(config: SizingPolicyConfig, traderOrderSize: number): number {
  const tiers = config.tieredMultipliers;
  if (tiers && tiers.length > 0) {
    for (const tier of tiers) {
      if (traderOrderSize < tier.min) continue;
      if (tier.max === undefined || traderOrderSize < tier.max) {
        return tier.multiplier;
      }
    }
    const lastTier = tiers[tiers.length - 1];
    return lastTier ? lastTier.multiplier : 1.0;
  }
  return config.tradeMultiplier ?? 1.0;
}

/**
 * Calculate the copy order size.
 *
 * @param traderOrderSize - The trader's order notional in USD
 * @param availableBalance - Our spendable USDC balance
 * @param currentPositionSize - Our current position value in this market
 */
export function computeOrder(
  config: SizingPolicyConfig,
  traderOrderSize: number,
  availableBalance: number,
  currentPositionSize: number = 0
): SizingDecision {
  let baseAmount: number;
  let reasoning: string;

  // Step 1: base amount by strategy
  switch (config.strategy) {
    case 'PERCENTAGE':
      baseAmount = traderOrderSize * (config.copySize / 100);
      reasoning = `${config.copySize}% of trader's $${traderOrderSize.toFixed(2)} = $${baseAmount.toFixed(2)}`;
      break;

    case 'FIXED':
      baseAmount = config.copySize;
      reasoning = `Fixed amount: $${baseAmount.toFixed(2)}`;
      break;

    case 'ADAPTIVE': {
      const adaptivePercent = calculateAdaptivePercent(config, traderOrderSize);
      baseAmount = traderOrderSize * (adaptivePercent / 100);
      reasoning = `Adaptive ${adaptivePercent.toFixed(1)}% of trader's $${traderOrderSize.toFixed(2)} = $${baseAmount.toFixed(2)}`;
      break;
    }
  }

  // Step 2: tiered or flat multiplier
  const multiplier = getTradeMultiplier(config, traderOrderSize);
  let finalAmount = baseAmount * multiplier;

  if (Math.abs(multiplier - 1) > SIZING.MULTIPLIER_EPSILON) {
    reasoning += ` -> ${multiplier}x multiplier: $${baseAmount.toFixed(2)} -> $${finalAmount.toFixed(2)}`;
  }

  let cappedByMax = false;
  let reducedByBalance = false;
  let belowMinimum = false;

  // Step 3: max order size
  if (finalAmount > config.maxOrderSizeUsd) {
    finalAmount = config.maxOrderSizeUsd;
    cappedByMax = true;
    reasoning += ` -> Capped at max $${config.maxOrderSizeUsd}`;
  }

  // Step 4: position limit
  if (config.maxPositionSizeUsd !== undefined) {
    const newTotal = currentPositionSize + finalAmount;
    if (newTotal > config.maxPositionSizeUsd) {
      const allowed = Math.max(0, config.maxPositionSizeUsd - currentPositionSize);
      if (allowed < config.minOrderSizeUsd) {
        finalAmount = 0;
        reasoning += ' -> Position limit reached';
      } else {
        finalAmount = allowed;
        reasoning += ` -> Reduced to fit position limit ($${allowed.toFixed(2)})`;
      }
    }
  }

  // Step 5: available balance, keeping 1% for price movement and fees
  const maxAffordable = availableBalance * SIZING.BALANCE_SAFETY_MARGIN;
  if (finalAmount > maxAffordable) {
    finalAmount = maxAffordable;
    reducedByBalance = true;
    reasoning += ` -> Reduced to fit balance ($${maxAffordable.toFixed(2)})`;
  }

  // Step 6: round up to the minimum viable order
  if (finalAmount < config.minOrderSizeUsd) {
    belowMinimum = true;
    reasoning += ` -> Below minimum $${config.minOrderSizeUsd}`;
    finalAmount = config.minOrderSizeUsd;
  }

  return {
    traderOrderSize,
    baseAmount,
    finalAmount,
    multiplierUsed: multiplier,
    strategy: config.strategy,
    cappedByMax,
    reducedByBalance,
    belowMinimum,
    reasoning,
  };
}

function parseTierNumber(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function formatTier(tier: MultiplierTier): string {
  return tier.max === undefined ? `${tier.min}+` : `${tier.min}-${tier.max}`;
}

/**
 * Parse tiered multipliers.
 * Format: "0-100:2.0,100-500:1.0,500+:0.5"
 *
 * Throws on the first malformed segment, then on an open-ended tier that is
 * not last or on overlapping tiers. Returns tiers sorted by min.
 */
export function parseTieredMultipliers(value: string): MultiplierTier[] {
  const trimmed = value.trim();
  if (trimmed === '') return [];

  const tiers: MultiplierTier[] = [];
  const parts = trimmed.split(',').map((p) => p.trim()).filter((p) => p);

  for (const part of parts) {
    const splitPart = part.split(':');
    const range = splitPart[0]?.trim() ?? '';
    const multiplierStr = splitPart[1];

    if (multiplierStr === undefined || splitPart.length > 2) {
      throw new Error(`Invalid tier (expected range:multiplier): ${part}`);
    }

    const multiplier = parseTierNumber(multiplierStr);
    if (multiplier === null || multiplier < 0) {
      throw new Error(`Invalid multiplier in tier: ${part}`);
    }

    if (range.endsWith('+')) {
      // "500+" has no upper bound
      const min = parseTierNumber(range.slice(0, -1));
      if (min === null || min < 0) {
        throw new Error(`Invalid minimum in tier: ${part}`);
      }
      tiers.push({ min, multiplier });
      continue;
    }

    const dash = range.indexOf('-');
    if (dash < 0) {
      throw new Error(`Invalid range format in tier: ${part}`);
    }

    const min = parseTierNumber(range.slice(0, dash));
    const max = parseTierNumber(range.slice(dash + 1));
    if (min === null || min < 0) {
      throw new Error(`Invalid minimum in tier: ${part}`);
    }
    if (max === null) {
      throw new Error(`Invalid maximum in tier: ${part}`);
    }
    if (max <= min) {
      throw new Error(`max must be > min in tier: ${part}`);
    }
    tiers.push({ min, max, multiplier });
  }

  tiers.sort((a, b) => a.min - b.min);

  for (let i = 0; i < tiers.length - 1; i++) {
    const current = tiers[i];
    const next = tiers[i + 1];
    if (!current || !next) continue;

    if (current.max === undefined) {
      throw new Error(`Tier with open-ended upper bound must be last: ${formatTier(current)}`);
    }
    if (current.max > next.min) {
      throw new Error(`Overlapping tiers: ${formatTier(current)} and ${formatTier(next)}`);
    }
  }

  return tiers;
}

/**
 * Validate a sizing policy
 *
 * @returns Array of validation errors (empty if valid)
 */
export function validateSizingConfig(config: SizingPolicyConfig): string[] {
  const errors: string[] = [];

  if (config.copySize < 0) {
    errors.push(`COPY_SIZE (${config.copySize}) must not be negative`);
  }
  if (config.maxOrderSizeUsd <= 0) {
    errors.push(`MAX_ORDER_SIZE_USD ($${config.maxOrderSizeUsd}) must be positive`);
  }
  if (config.minOrderSizeUsd > config.maxOrderSizeUsd) {
    errors.push(
      `MIN_ORDER_SIZE_USD ($${config.minOrderSizeUsd}) must not exceed MAX_ORDER_SIZE_USD ($${config.maxOrderSizeUsd})`
    );
  }
  if (config.maxPositionSizeUsd !== undefined && config.maxPositionSizeUsd < config.minOrderSizeUsd) {
    errors.push(
      `MAX_POSITION_SIZE_USD ($${config.maxPositionSizeUsd}) is below MIN_ORDER_SIZE_USD ($${config.minOrderSizeUsd})`
    );
  }
  if (config.strategy === 'ADAPTIVE') {
    if (config.adaptiveThreshold !== undefined && config.adaptiveThreshold <= 0) {
      errors.push(`ADAPTIVE_THRESHOLD_USD ($${config.adaptiveThreshold}) must be positive`);
    }
    const minPercent = config.adaptiveMinPercent ?? config.copySize;
    const maxPercent = config.adaptiveMaxPercent ?? config.copySize;
    if (minPercent > maxPercent) {
      errors.push(`ADAPTIVE_MIN_PERCENT (${minPercent}) must not exceed ADAPTIVE_MAX_PERCENT (${maxPercent})`);
    }
  }

  return errors;
}
