// Order sides as used on the activity feed and the CLOB
export const ORDER_SIDES = {
  BUY: 'BUY',
  SELL: 'SELL',
} as const;

export type OrderSide = (typeof ORDER_SIDES)[keyof typeof ORDER_SIDES];

// Sizing strategies
export const SIZING_STRATEGIES = {
  PERCENTAGE: 'PERCENTAGE',
  FIXED: 'FIXED',
  ADAPTIVE: 'ADAPTIVE',
} as const;

// Signature schemes understood by the CLOB
export const SIGNATURE_TYPES = {
  EOA: 0,
  PROXY: 1,
  GNOSIS: 2,
} as const;

// Feed connection states
export const FEED_STATES = {
  DISCONNECTED: 'disconnected',
  CONNECTING: 'connecting',
  SUBSCRIBED: 'subscribed',
  STREAMING: 'streaming',
  CLOSED: 'closed',
  ERRORED: 'errored',
  STOPPED: 'stopped',
  FAILED: 'failed',
} as const;

export type FeedState = (typeof FEED_STATES)[keyof typeof FEED_STATES];

// API endpoints
export const POLYMARKET_ENDPOINTS = {
  CLOB: 'https://clob.polymarket.com',
  DATA_API: 'https://data-api.polymarket.com',
  RTDS: 'wss://ws-live-data.polymarket.com',
} as const;

// Feed topics
export const FEED_TOPICS = {
  ACTIVITY: 'activity',
  TRADES: 'trades',
} as const;

// Timing constants
export const TIMING = {
  WEBSOCKET_HEARTBEAT_MS: 30000,
  WEBSOCKET_PONG_TIMEOUT_MS: 10000,
  RECONNECT_BASE_DELAY_MS: 5000,
  RECONNECT_BACKOFF_CAP: 5,
  RECONNECT_MAX_ATTEMPTS: 10,
  REQUEST_TIMEOUT_MS: 10000,
} as const;

// Sizing constants
export const SIZING = {
  BALANCE_SAFETY_MARGIN: 0.99,
  DEFAULT_ADAPTIVE_THRESHOLD_USD: 500,
  MULTIPLIER_EPSILON: 1e-9,
} as const;

// Executor constants
export const EXECUTOR = {
  DEDUP_CAPACITY: 1000,
  CHANNEL_CAPACITY: 100,
  MS_TIMESTAMP_THRESHOLD: 1_000_000_000_000,
} as const;

// Startup snapshot
export const SNAPSHOT = {
  MY_TOP_POSITIONS: 5,
  TRADER_TOP_POSITIONS: 3,
} as const;
