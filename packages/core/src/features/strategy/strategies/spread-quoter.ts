// ============================================================
// SpreadQuoter: keeps one bid at the best bid and one ask at
// the best ask, within its own inventory limit.
// ============================================================

import { z } from 'zod';
import {
  addQuantity,
  type Fill,
  type Intent,
  type IntentResult,
  type MarketSnapshot,
  type Order,
  type OrderSide,
} from '../../../shared/protocol.js';
import type { Strategy, StrategyContext } from '../strategy.js';

export const spreadQuoterOptionsSchema = z.object({
  order_size: z.number().positive(),
  max_position: z.number().positive(),
  requote_bps: z.number().nonnegative().default(10),
});

export type SpreadQuoterOptions = z.infer<typeof spreadQuoterOptionsSchema>;

export class SpreadQuoter implements Strategy {
  private readonly options: SpreadQuoterOptions;
  private inventory = new Map<string, number>();
  private cancelling = new Set<string>();

  constructor(options: SpreadQuoterOptions) {
    this.options = options;
  }

  onMarketUpdate(snapshot: MarketSnapshot, context: StrategyContext): Intent[] {
    if (snapshot.best_bid === null || snapshot.best_ask === null) {
      return [];
    }

    const live = context.liveOrders(snapshot.symbol);
    return [
      ...this.quoteSide(snapshot.symbol, 'buy', snapshot.best_bid, live),
      ...this.quoteSide(snapshot.symbol, 'sell', snapshot.best_ask, live),
    ];
  }

  onFill(fill: Fill, context: StrategyContext): Intent[] {
    const order = context.order(fill.order_id);
    if (!order) return [];

    const delta = order.side === 'buy' ? fill.quantity : -fill.quantity;
    this.inventory.set(order.symbol, addQuantity(this.getInventory(order.symbol), delta));
    return [];
  }

  onIntentResult(result: IntentResult): void {
    if (result.kind === 'cancel') {
      this.cancelling.delete(result.intent.client_order_id);
    }
  }

  getInventory(symbol: string): number {
    return this.inventory.get(symbol) ?? 0;
  }

  // --- Private methods ---

  private quoteSide(symbol: string, side: OrderSide, target: number, live: Order[]): Intent[] {
    const resting = live.filter((o) => o.side === side);
    const intents: Intent[] = [];

    for (const order of resting) {
      if (this.cancelling.has(order.client_order_id) || order.state === 'unknown' || order.price === null) {
        continue;
      }
      const driftBps = (Math.abs(order.price - target) / target) * 10_000;
      if (driftBps > this.options.requote_bps) {
        this.cancelling.add(order.client_order_id);
        intents.push({ kind: 'cancel', client_order_id: order.client_order_id });
      }
    }

    // Replace a quote only once the old one is gone
    if (resting.length > 0 || !this.withinInventory(symbol, side)) {
      return intents;
    }

    intents.push({
      kind: 'place',
      symbol,
      side,
      type: 'limit',
      quantity: this.options.order_size,
      price: target,
    });
    return intents;
  }

  private withinInventory(symbol: string, side: OrderSide): boolean {
    const size = side === 'buy' ? this.options.order_size : -this.options.order_size;
    return Math.abs(addQuantity(this.getInventory(symbol), size)) <= this.options.max_position;
  }
}
