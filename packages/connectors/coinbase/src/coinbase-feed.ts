// CoinbaseFeed - WebSocket client for the public ticker channel and the
// authenticated user channel. Ticker updates become market events; the
// user channel's received/match/done messages become order lifecycle
// events keyed by client and exchange order id.

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import {
  createLogger,
  sanitizeUrl,
  type ExchangeCredentials,
  type ExchangeEvent,
  type FeedHandlers,
  type MarketEvent,
  type Unsubscribe,
} from '@ordercraft/core';
import { currentTimestamp, signRequest } from './coinbase-auth.js';
import {
  feedMessageSchema,
  fillId,
  type CoinbaseFeedMessage,
  type CoinbaseMatchMessage,
  type CoinbaseSubscribeMessage,
} from './types.js';

const logger = createLogger('CoinbaseFeed');

export interface CoinbaseFeedOptions {
  wsUrl: string;
  /** Without credentials only the public ticker channel is subscribed. */
  credentials?: ExchangeCredentials;
}

export interface CoinbaseFeedEvents {
  connected: () => void;
  disconnected: () => void;
  error: (error: Error) => void;
}

export declare interface CoinbaseFeed {
  on<U extends keyof CoinbaseFeedEvents>(event: U, listener: CoinbaseFeedEvents[U]): this;
  emit<U extends keyof CoinbaseFeedEvents>(
    event: U,
    ...args: Parameters<CoinbaseFeedEvents[U]>
  ): boolean;
}

interface Subscription {
  symbols: Set<string>;
  handlers: FeedHandlers;
}

export class CoinbaseFeed extends EventEmitter {
  private readonly wsUrl: string;
  private readonly credentials?: ExchangeCredentials;

  private ws: WebSocket | null = null;
  private reconnectAttempt = 0;
  private hasConnected = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private shouldReconnect = false;
  private subscriptions = new Set<Subscription>();
  /** exchange order id -> client order id, learned from received messages */
  private clientIds = new Map<string, string>();

  // Exponential backoff config (1s, 2s, 4s, 8s, ... 60s max)
  private readonly MIN_RECONNECT_DELAY_MS = 1000;
  private readonly MAX_RECONNECT_DELAY_MS = 60000;

  constructor(options: CoinbaseFeedOptions) {
    super();
    this.wsUrl = options.wsUrl;
    this.credentials = options.credentials;
  }

  /**
   * Connect to the feed. Reconnects automatically until disconnect().
   */
  connect(): void {
    if (this.ws) {
      logger.warn('CoinbaseFeed already connected');
      return;
    }

    this.shouldReconnect = true;
    this.attemptConnection();
  }

  disconnect(): void {
    this.shouldReconnect = false;
    this.hasConnected = false;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }

    logger.info('CoinbaseFeed disconnected');
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  subscribe(symbols: string[], handlers: FeedHandlers): Unsubscribe {
    const subscription: Subscription = { symbols: new Set(symbols), handlers };
    this.subscriptions.add(subscription);
    this.sendSubscribe(symbols);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }

  /**
   * Record an exchange id learned from a REST response, so that match
   * messages (which carry no client id) can be attributed.
   */
  trackOrder(exchangeOrderId: string, clientOrderId: string): void {
    this.clientIds.set(exchangeOrderId, clientOrderId);
  }

  // --- Private methods ---

  private attemptConnection(): void {
    const safeUrl = sanitizeUrl(this.wsUrl);
    logger.info({ url: safeUrl }, 'Connecting to Coinbase feed');

    this.ws = new WebSocket(this.wsUrl);

    this.ws.on('open', () => {
      logger.info({ url: safeUrl }, 'Coinbase feed connected');
      this.reconnectAttempt = 0;
      this.emit('connected');
      this.sendSubscribe(this.allSymbols());

      if (this.hasConnected) {
        // user-channel messages sent while we were down are gone
        for (const subscription of this.subscriptions) {
          subscription.handlers.onReconnect?.();
        }
      }
      this.hasConnected = true;
    });

    this.ws.on('message', (data: WebSocket.Data) => {
      this.handleMessage(data);
    });

    this.ws.on('close', () => {
      logger.info({ url: safeUrl }, 'Coinbase feed disconnected');
      this.ws = null;
      this.emit('disconnected');
      this.scheduleReconnect();
    });

    this.ws.on('error', (err: Error) => {
      logger.error({ url: safeUrl, error: err.message }, 'Coinbase feed error');
      this.emit('error', err);
    });
  }

  private allSymbols(): string[] {
    const all = new Set<string>();
    for (const subscription of this.subscriptions) {
      for (const symbol of subscription.symbols) all.add(symbol);
    }
    return [...all];
  }

  private sendSubscribe(symbols: string[]): void {
    if (symbols.length === 0 || !this.ws || this.ws.readyState !== WebSocket.OPEN) {
      return;
    }

    const message: CoinbaseSubscribeMessage = {
      type: 'subscribe',
      product_ids: symbols,
      channels: this.credentials ? ['ticker', 'user'] : ['ticker'],
    };
    if (this.credentials) {
      const timestamp = currentTimestamp();
      message.key = this.credentials.apiKey;
      message.passphrase = this.credentials.passphrase;
      message.timestamp = timestamp;
      message.signature = signRequest(this.credentials.apiSecret, timestamp, 'GET', '/users/self/verify');
    }

    this.ws.send(JSON.stringify(message));
    logger.debug({ product_ids: symbols, channels: message.channels }, 'Sent subscribe message');
  }

  private handleMessage(data: WebSocket.Data): void {
    let json: unknown;
    try {
      json = JSON.parse(data.toString());
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error({ error: error.message }, 'Failed to parse feed message');
      return;
    }

    const parsed = feedMessageSchema.safeParse(json);
    if (!parsed.success) {
      // subscriptions, heartbeat, open, change, error...
      logger.debug({ message: json }, 'Ignored feed message');
      return;
    }

    this.dispatch(parsed.data);
  }

  private dispatch(message: CoinbaseFeedMessage): void {
    const timestamp = message.time ? Date.parse(message.time) : Date.now();

    switch (message.type) {
      case 'ticker': {
        const event: MarketEvent = {
          type: 'ticker',
          symbol: message.product_id,
          sequence: message.sequence,
          best_bid: parseFloat(message.best_bid),
          best_ask: parseFloat(message.best_ask),
          last_trade_price: message.price === undefined ? undefined : parseFloat(message.price),
          timestamp,
        };
        this.publishMarket(message.product_id, event);
        break;
      }

      case 'received':
        if (message.client_oid) {
          this.clientIds.set(message.order_id, message.client_oid);
        }
        this.publishOrder(message.product_id, {
          type: 'ack',
          exchange_order_id: message.order_id,
          client_order_id: message.client_oid ?? this.clientIds.get(message.order_id),
          sequence: message.sequence,
          timestamp,
        });
        break;

      case 'match':
        for (const orderId of this.ownOrderIds(message)) {
          this.publishOrder(message.product_id, {
            type: 'fill',
            exchange_order_id: orderId,
            client_order_id: this.clientIds.get(orderId),
            exchange_fill_id: fillId(orderId, message.trade_id),
            quantity: parseFloat(message.size),
            price: parseFloat(message.price),
            sequence: message.sequence,
            timestamp,
          });
        }
        break;

      case 'done': {
        const base = {
          exchange_order_id: message.order_id,
          client_order_id: message.client_oid ?? this.clientIds.get(message.order_id),
          sequence: message.sequence,
          timestamp,
        };
        if (message.reason === 'filled') {
          this.publishOrder(message.product_id, { type: 'filled', ...base });
        } else if (message.reason === 'canceled') {
          this.publishOrder(message.product_id, { type: 'cancelled', ...base });
        } else {
          this.publishOrder(message.product_id, { type: 'rejected', reason: message.reason, ...base });
        }
        this.clientIds.delete(message.order_id);
        break;
      }
    }
  }

  /**
   * The side(s) of a match that belong to this account. Unknown ids are
   * passed on too: reconciliation ignores orders it does not track.
   */
  private ownOrderIds(message: CoinbaseMatchMessage): string[] {
    const known = [message.maker_order_id, message.taker_order_id].filter((id) => this.clientIds.has(id));
    return known.length > 0 ? known : [message.maker_order_id, message.taker_order_id];
  }

  private publishMarket(symbol: string, event: MarketEvent): void {
    for (const subscription of this.subscriptions) {
      if (subscription.symbols.has(symbol)) {
        subscription.handlers.onMarketEvent(event);
      }
    }
  }

  private publishOrder(symbol: string, event: ExchangeEvent): void {
    for (const subscription of this.subscriptions) {
      if (subscription.symbols.has(symbol)) {
        subscription.handlers.onExchangeEvent(event);
      }
    }
  }

  /**
   * Schedule reconnection with exponential backoff.
   */
  private scheduleReconnect(): void {
    if (!this.shouldReconnect) {
      return;
    }

    const delay = Math.min(
      Math.pow(2, this.reconnectAttempt) * this.MIN_RECONNECT_DELAY_MS,
      this.MAX_RECONNECT_DELAY_MS,
    );

    logger.info({ attempt: this.reconnectAttempt + 1, delayMs: delay }, 'Scheduling reconnection');
    this.reconnectAttempt++;

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.attemptConnection();
    }, delay);
  }
}
