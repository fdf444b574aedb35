// ============================================================
// MarketDataFeed: normalizes exchange ticker/trade updates into
// one immutable MarketSnapshot per symbol. Updates carrying a
// sequence at or below the current snapshot are discarded.
// ============================================================

import { EventEmitter } from 'events';
import type { MarketEvent, MarketSnapshot, OrderSide } from '../../shared/protocol.js';
import { createLogger } from '../../shared/logger.js';
import type { PriceSource } from '../risk/risk-controller.js';

const logger = createLogger('MarketDataFeed');

export interface MarketDataFeedEvents {
  snapshot: (snapshot: MarketSnapshot) => void;
}

export declare interface MarketDataFeed {
  on<U extends keyof MarketDataFeedEvents>(event: U, listener: MarketDataFeedEvents[U]): this;
  emit<U extends keyof MarketDataFeedEvents>(
    event: U,
    ...args: Parameters<MarketDataFeedEvents[U]>
  ): boolean;
}

export class MarketDataFeed extends EventEmitter implements PriceSource {
  private snapshots = new Map<string, MarketSnapshot>();
  private receivedAt = new Map<string, number>();
  private discarded = 0;

  constructor(private readonly now: () => number = Date.now) {
    super();
  }

  /**
   * Apply a market event. Returns the new snapshot, or null when the
   * event was stale.
   */
  ingest(event: MarketEvent): MarketSnapshot | null {
    const previous = this.snapshots.get(event.symbol);
    if (previous && event.sequence <= previous.sequence) {
      this.discarded++;
      logger.trace({ symbol: event.symbol, sequence: event.sequence, current: previous.sequence }, 'Stale market update discarded');
      return null;
    }

    const snapshot: MarketSnapshot = Object.freeze(
      event.type === 'ticker'
        ? {
            symbol: event.symbol,
            sequence: event.sequence,
            best_bid: event.best_bid,
            best_ask: event.best_ask,
            last_trade_price: event.last_trade_price ?? previous?.last_trade_price ?? null,
            timestamp: event.timestamp,
          }
        : {
            symbol: event.symbol,
            sequence: event.sequence,
            best_bid: previous?.best_bid ?? null,
            best_ask: previous?.best_ask ?? null,
            last_trade_price: event.price,
            timestamp: event.timestamp,
          },
    );

    this.snapshots.set(event.symbol, snapshot);
    this.receivedAt.set(event.symbol, this.now());
    this.emit('snapshot', snapshot);
    return snapshot;
  }

  getSnapshot(symbol: string): MarketSnapshot | undefined {
    return this.snapshots.get(symbol);
  }

  getSnapshots(): MarketSnapshot[] {
    return Array.from(this.snapshots.values());
  }

  /**
   * Price a market order would likely trade at: the ask for buys, the bid
   * for sells, falling back to the last trade.
   */
  referencePrice(symbol: string, side: OrderSide): number | null {
    const snapshot = this.snapshots.get(symbol);
    if (!snapshot) return null;
    const touch = side === 'buy' ? snapshot.best_ask : snapshot.best_bid;
    return touch ?? snapshot.last_trade_price;
  }

  /**
   * True when no update for the symbol arrived within `maxAgeMs`.
   */
  isStale(symbol: string, maxAgeMs: number, now: number = this.now()): boolean {
    const receivedAt = this.receivedAt.get(symbol);
    return receivedAt === undefined || now - receivedAt > maxAgeMs;
  }

  discardedCount(): number {
    return this.discarded;
  }
}
