import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { FEED_STATES, FEED_TOPICS, POLYMARKET_ENDPOINTS, TIMING } from '../../config/constants.js';
import type { FeedState } from '../../config/constants.js';
import type { TrackedEvent } from '../../services/copyTrading/types.js';
import { RtdsActivitySchema, RtdsFrameSchema, type RtdsActivity, type RtdsSubscribeMessage } from './types.js';
import { logger, type Logger } from '../../utils/logger.js';
import { normalizeAddress, shortAddress } from '../../utils/address.js';
import { sleep } from '../../utils/time.js';
import { wsConnections, wsMessages, wsReconnections } from '../../utils/metrics.js';

const FEED_NAME = 'rtds';

/**
 * Activity feed monitor configuration
 */
export interface ActivityFeedMonitorConfig {
  url: string;
  userAddresses: string[];
  reconnectBaseDelayMs: number;
  reconnectMaxAttempts: number;
  reconnectBackoffCap: number;
  heartbeatIntervalMs: number;
  pongTimeoutMs: number;
}

const DEFAULT_CONFIG: Omit<ActivityFeedMonitorConfig, 'userAddresses'> = {
  url: POLYMARKET_ENDPOINTS.RTDS,
  reconnectBaseDelayMs: TIMING.RECONNECT_BASE_DELAY_MS,
  reconnectMaxAttempts: TIMING.RECONNECT_MAX_ATTEMPTS,
  reconnectBackoffCap: TIMING.RECONNECT_BACKOFF_CAP,
  heartbeatIntervalMs: TIMING.WEBSOCKET_HEARTBEAT_MS,
  pongTimeoutMs: TIMING.WEBSOCKET_PONG_TIMEOUT_MS,
};

/**
 * Receives matched trades; may wait (bounded channel)
 */
export type TrackedTradeSink = (event: TrackedEvent, sourceAddress: string) => Promise<void>;

/**
 * Result of classifying one feed frame
 */
export type FeedMessage =
  | { kind: 'ack' }
  | { kind: 'trade'; event: TrackedEvent; sourceAddress: string }
  | { kind: 'ignored' };

/**
 * Linear backoff: attempt 1 waits one base delay, growing by one base delay
 * per attempt until `capFactor` base delays
 */
export function computeReconnectDelay(attempt: number, baseDelayMs: number, capFactor: number): number {
  return baseDelayMs * Math.min(Math.max(attempt, 1), capFactor);
}

/**
 * Subscribe request covering every tracked address
 */
export function buildSubscribeMessage(userAddresses: string[]): RtdsSubscribeMessage {
  return {
    action: 'subscribe',
    subscriptions: userAddresses.map(() => ({
      topic: FEED_TOPICS.ACTIVITY,
      type: FEED_TOPICS.TRADES,
    })),
  };
}

export function toTrackedEvent(activity: RtdsActivity): TrackedEvent {
  return {
    timestamp: activity.timestamp ?? 0,
    sourceAddress: normalizeAddress(activity.proxyWallet),
    marketId: activity.conditionId,
    assetId: activity.asset,
    side: activity.side,
    size: activity.size,
    price: activity.price,
    notional: activity.size * activity.price,
    transactionHash: activity.transactionHash,
    title: activity.title,
    slug: activity.slug,
    eventSlug: activity.eventSlug,
    outcome: activity.outcome,
    outcomeIndex: activity.outcomeIndex,
    traderName: activity.name ?? activity.pseudonym,
  };
}

/**
 * Classify a raw feed frame. Acknowledgements and tracked trades are
 * recognized; everything else (other topics, malformed frames, untracked
 * wallets) is ignored.
 */
export function parseFeedMessage(data: string, trackedAddresses: ReadonlySet<string>): FeedMessage {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return { kind: 'ignored' };
  }

  const frame = RtdsFrameSchema.safeParse(json);
  if (!frame.success) return { kind: 'ignored' };

  const { action, status, topic, type, payload } = frame.data;
  if (action === 'subscribed' || status === 'subscribed') {
    return { kind: 'ack' };
  }

  if (topic !== FEED_TOPICS.ACTIVITY || type !== FEED_TOPICS.TRADES) {
    return { kind: 'ignored' };
  }

  const activity = RtdsActivitySchema.safeParse(payload);
  if (!activity.success) return { kind: 'ignored' };

  const sourceAddress = normalizeAddress(activity.data.proxyWallet);
  if (!trackedAddresses.has(sourceAddress)) {
    return { kind: 'ignored' };
  }

  return { kind: 'trade', event: toTrackedEvent(activity.data), sourceAddress };
}

/**
 * Live activity feed client for the Polymarket real-time data service.
 *
 * Subscribes to trade activity, forwards trades from tracked wallets to the
 * sink in arrival order, and reconnects with linear capped backoff. After
 * `reconnectMaxAttempts` consecutive failures it stops for good and emits
 * `fatal`.
 */
export class ActivityFeedMonitor extends EventEmitter {
  private config: ActivityFeedMonitorConfig;
  private log: Logger;
  private sink: TrackedTradeSink;
  private trackedAddresses: Set<string>;
  private _state: FeedState = FEED_STATES.DISCONNECTED;
  private reconnectAttempts = 0;
  private pingInterval: NodeJS.Timeout | null = null;
  private pongTimeout: NodeJS.Timeout | null = null;
  // Serializes forwarding so events reach the sink in arrival order
  private forwardChain: Promise<void> = Promise.resolve();
  private pendingForwards = 0;

  constructor(
    config: Partial<ActivityFeedMonitorConfig> & Pick<ActivityFeedMonitorConfig, 'userAddresses'>,
    sink: TrackedTradeSink
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.sink = sink;
    this.trackedAddresses = new Set(this.config.userAddresses.map(normalizeAddress));
    this.log = logger('ActivityFeedMonitor');
  }

  get state(): FeedState {
    return this._state;
  }

  getReconnectAttempts(): number {
    return this.reconnectAttempts;
  }

  private setState(newState: FeedState): void {
    const oldState = this._state;
    if (oldState === newState) return;
    this._state = newState;

    // Update metrics
    if (oldState !== FEED_STATES.DISCONNECTED) {
      wsConnections.labels(FEED_NAME, oldState).dec();
    }
    if (newState !== FEED_STATES.DISCONNECTED) {
      wsConnections.labels(FEED_NAME, newState).inc();
    }

    this.log.debug('State changed', { from: oldState, to: newState });
    this.emit('stateChange', newState);
  }

  /**
   * Connect, stream and reconnect until the signal aborts or the reconnect
   * budget is exhausted. Resolves once no more connections will be made.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.reconnectAttempts = 0;

    while (!signal.aborted) {
      await this.connectAndStream(signal);

      if (signal.aborted) break;

      this.reconnectAttempts++;
      const attempt = this.reconnectAttempts;

      if (attempt >= this.config.reconnectMaxAttempts) {
        this.setState(FEED_STATES.FAILED);
        this.log.error('Max reconnection attempts reached, giving up on the activity feed', {
          attempts: attempt,
        });
        this.emit('fatal', new Error(`Activity feed failed after ${attempt} reconnection attempts`));
        await this.forwardChain;
        return;
      }

      const delayMs = computeReconnectDelay(attempt, this.config.reconnectBaseDelayMs, this.config.reconnectBackoffCap);
      this.setState(FEED_STATES.DISCONNECTED);
      wsReconnections.labels(FEED_NAME).inc();

      this.log.info('Scheduling reconnection', {
        attempt,
        maxAttempts: this.config.reconnectMaxAttempts,
        delayMs,
      });
      this.emit('reconnecting', { attempt, delayMs });

      await sleep(delayMs, signal);
    }

    await this.forwardChain;
    this.setState(FEED_STATES.STOPPED);
    this.log.info('Activity feed stopped');
  }

  // ============================================
  // Private Methods
  // ============================================

  /**
   * One connection lifetime. Resolves when the socket closes or errors.
   */
  private connectAndStream(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      this.setState(FEED_STATES.CONNECTING);
      this.log.info('Connecting to activity feed', { url: this.config.url });

      const ws = new WebSocket(this.config.url);
      let finished = false;

      const onAbort = (): void => {
        ws.close(1000, 'Client stop');
      };

      const finish = (): void => {
        if (finished) return;
        finished = true;
        this.stopHeartbeat();
        signal.removeEventListener('abort', onAbort);
        resolve();
      };

      signal.addEventListener('abort', onAbort, { once: true });

      ws.on('open', () => {
        this.sendMessage(ws, buildSubscribeMessage(this.config.userAddresses));
        this.setState(FEED_STATES.SUBSCRIBED);
        this.reconnectAttempts = 0;
        this.log.info(`Subscribed to activity feed for ${this.config.userAddresses.length} trader(s)`);
        this.emit('subscribed');

        this.startHeartbeat(ws);
        this.setState(FEED_STATES.STREAMING);
      });

      ws.on('message', (data: WebSocket.RawData) => {
        if (signal.aborted) return;
        this.handleMessage(ws, data.toString());
      });

      ws.on('pong', () => {
        this.clearPongTimeout();
      });

      ws.on('close', (code: number, reason: Buffer) => {
        if (!signal.aborted) {
          this.log.warn('Activity feed closed', { code, reason: reason.toString() });
          this.setState(FEED_STATES.CLOSED);
        }
        finish();
      });

      ws.on('error', (error: Error) => {
        if (!signal.aborted) {
          this.log.error('Activity feed error', { error: error.message });
          this.setState(FEED_STATES.ERRORED);
        }
        finish();
      });
    });
  }

  private handleMessage(ws: WebSocket, data: string): void {
    const message = parseFeedMessage(data, this.trackedAddresses);

    switch (message.kind) {
      case 'ack':
        wsMessages.labels(FEED_NAME, 'inbound', 'ack').inc();
        this.log.info('Activity feed subscription confirmed');
        break;
      case 'trade': {
        wsMessages.labels(FEED_NAME, 'inbound', 'trade').inc();
        const { event, sourceAddress } = message;
        this.log.debug('Tracked trade received', {
          trader: shortAddress(sourceAddress),
          side: event.side,
          notional: event.notional,
        });
        // Stop reading from the socket until the sink has taken every pending trade
        this.pendingForwards++;
        ws.pause();
        this.forwardChain = this.forwardChain
          .then(() => this.sink(event, sourceAddress))
          .catch((error: unknown) => {
            this.log.error('Error forwarding trade to executor', {
              error: error instanceof Error ? error.message : String(error),
            });
          })
          .finally(() => {
            this.pendingForwards--;
            if (this.pendingForwards === 0 && ws.readyState === WebSocket.OPEN) {
              ws.resume();
            }
          });
        break;
      }
      case 'ignored':
        wsMessages.labels(FEED_NAME, 'inbound', 'ignored').inc();
        break;
    }
  }

  private sendMessage(ws: WebSocket, message: unknown): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
      wsMessages.labels(FEED_NAME, 'outbound', 'command').inc();
    } else {
      this.log.warn('Cannot send message - WebSocket not connected');
    }
  }

  private startHeartbeat(ws: WebSocket): void {
    this.stopHeartbeat();

    this.pingInterval = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
        wsMessages.labels(FEED_NAME, 'outbound', 'ping').inc();

        // An unanswered ping keeps its original deadline
        if (this.pongTimeout) return;
        this.pongTimeout = setTimeout(() => {
          this.log.warn('Pong timeout - closing connection');
          ws.terminate();
        }, this.config.pongTimeoutMs);
      }
    }, this.config.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    this.clearPongTimeout();
  }

  private clearPongTimeout(): void {
    if (this.pongTimeout) {
      clearTimeout(this.pongTimeout);
      this.pongTimeout = null;
    }
  }
}
