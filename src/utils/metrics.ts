import client, { Counter, Gauge, Histogram, Registry } from 'prom-client';

// Create a custom registry
const registry = new Registry();

// Add default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================
// Copy Trading Metrics
// ============================================

export const copyTradingTradesDetected = new Counter({
  name: 'copy_trading_trades_detected_total',
  help: 'Total trades detected from tracked traders',
  labelNames: ['trader_address', 'side'] as const,
  registers: [registry],
});

export const copyTradingTradesCopied = new Counter({
  name: 'copy_trading_trades_copied_total',
  help: 'Total trades successfully copied',
  labelNames: ['trader_address', 'sizing_strategy', 'side'] as const,
  registers: [registry],
});

export const copyTradingTradesSkipped = new Counter({
  name: 'copy_trading_trades_skipped_total',
  help: 'Total trades skipped (not copied)',
  labelNames: ['trader_address', 'reason'] as const,
  registers: [registry],
});

export const copyTradingTradesFailed = new Counter({
  name: 'copy_trading_trades_failed_total',
  help: 'Total copy trade failures',
  labelNames: ['trader_address', 'error_type'] as const,
  registers: [registry],
});

export const copyTradingCopyLatency = new Histogram({
  name: 'copy_trading_copy_latency_ms',
  help: 'Time between receiving a trade and submitting the copy',
  labelNames: ['trader_address'] as const,
  buckets: [100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [registry],
});

export const copyTradingTrackedTraders = new Gauge({
  name: 'copy_trading_tracked_traders',
  help: 'Number of traders being tracked',
  registers: [registry],
});

// ============================================
// Feed Metrics
// ============================================

export const wsConnections = new Gauge({
  name: 'ws_connections',
  help: 'Current number of WebSocket connections',
  labelNames: ['feed', 'state'] as const,
  registers: [registry],
});

export const wsMessages = new Counter({
  name: 'ws_messages_total',
  help: 'Total number of WebSocket messages',
  labelNames: ['feed', 'direction', 'type'] as const,
  registers: [registry],
});

export const wsReconnections = new Counter({
  name: 'ws_reconnections_total',
  help: 'Total number of WebSocket reconnections',
  labelNames: ['feed'] as const,
  registers: [registry],
});

// ============================================
// Health Monitoring Metrics
// ============================================

export const healthCheckStatus = new Gauge({
  name: 'health_check_status',
  help: 'Health check status (1=healthy, 0=unhealthy)',
  labelNames: ['component'] as const,
  registers: [registry],
});

export const healthCheckLatency = new Histogram({
  name: 'health_check_latency_ms',
  help: 'Health check latency in milliseconds',
  labelNames: ['component'] as const,
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [registry],
});

export const accountBalance = new Gauge({
  name: 'account_balance_usd',
  help: 'Account balance in USD',
  labelNames: ['account'] as const,
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Get all metrics as string for Prometheus scraping
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get content type for metrics response
 */
export function getContentType(): string {
  return registry.contentType;
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}

/**
 * Timer utility for measuring duration
 */
export function startTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    return Number(end - start) / 1_000_000; // Convert to milliseconds
  };
}

/**
 * Helper to record copy trade detection
 */
export function recordCopyTradeDetected(traderAddress: string, side: string): void {
  copyTradingTradesDetected.labels(traderAddress, side).inc();
}

/**
 * Helper to record successful copy trade
 */
export function recordCopyTradeSuccess(traderAddress: string, sizingStrategy: string, side: string): void {
  copyTradingTradesCopied.labels(traderAddress, sizingStrategy, side).inc();
}

/**
 * Helper to record skipped copy trade
 */
export function recordCopyTradeSkipped(traderAddress: string, reason: string): void {
  copyTradingTradesSkipped.labels(traderAddress, reason).inc();
}

/**
 * Helper to record failed copy trade
 */
export function recordCopyTradeFailed(traderAddress: string, errorType: string): void {
  copyTradingTradesFailed.labels(traderAddress, errorType).inc();
}

/**
 * Helper to update health check status
 */
export function updateHealthStatus(component: string, healthy: boolean, latencyMs?: number): void {
  healthCheckStatus.labels(component).set(healthy ? 1 : 0);
  if (latencyMs !== undefined) {
    healthCheckLatency.labels(component).observe(latencyMs);
  }
}
