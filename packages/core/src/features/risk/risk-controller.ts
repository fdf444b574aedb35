// ============================================================
// RiskController: admission gate in front of the gateway.
// Decisions are synchronous and depend only on the intent, the
// position, the ledger and the limits.
// ============================================================

import {
  addQuantity,
  type AccountFill,
  type DenyReason,
  type Fill,
  type Intent,
  type Order,
  type OrderSide,
  type PlaceOrderIntent,
  type Position,
} from '../../shared/protocol.js';
import type { OrderLedgerView } from '../orders/order-ledger.js';
import { PositionBook } from './position-book.js';

export interface RiskLimits {
  max_open_orders_per_symbol: number;
  max_position_per_symbol: number;
  max_order_notional: number;
}

export interface RiskLimitsConfig extends RiskLimits {
  symbols?: Record<string, Partial<RiskLimits>>;
}

export type AdmissionDecision =
  | { allowed: true }
  | { allowed: false; reason: DenyReason };

export interface PriceSource {
  referencePrice(symbol: string, side: OrderSide): number | null;
}

function tighten(limits: RiskLimits, overrides?: Partial<RiskLimits>): RiskLimits {
  if (!overrides) return limits;
  return {
    max_open_orders_per_symbol: Math.min(limits.max_open_orders_per_symbol, overrides.max_open_orders_per_symbol ?? Infinity),
    max_position_per_symbol: Math.min(limits.max_position_per_symbol, overrides.max_position_per_symbol ?? Infinity),
    max_order_notional: Math.min(limits.max_order_notional, overrides.max_order_notional ?? Infinity),
  };
}

export class RiskController {
  private config: RiskLimitsConfig;
  private readonly prices: PriceSource;
  private readonly positions: PositionBook;

  constructor(config: RiskLimitsConfig, prices: PriceSource, positions: PositionBook = new PositionBook()) {
    this.config = config;
    this.prices = prices;
    this.positions = positions;
  }

  /**
   * Limits for a symbol: global limits with per-symbol values replacing them.
   */
  limitsFor(symbol: string): RiskLimits {
    const symbolLimits = this.config.symbols?.[symbol] ?? {};
    return {
      max_open_orders_per_symbol: symbolLimits.max_open_orders_per_symbol ?? this.config.max_open_orders_per_symbol,
      max_position_per_symbol: symbolLimits.max_position_per_symbol ?? this.config.max_position_per_symbol,
      max_order_notional: symbolLimits.max_order_notional ?? this.config.max_order_notional,
    };
  }

  /**
   * Decide whether an intent may go to the exchange.
   * `overrides` can only tighten the symbol's limits.
   */
  admit(
    intent: Intent,
    position: Position,
    ledger: OrderLedgerView,
    overrides?: Partial<RiskLimits>,
  ): AdmissionDecision {
    if (intent.kind === 'cancel') {
      return { allowed: true };
    }

    if (!this.isWellFormed(intent)) {
      return { allowed: false, reason: 'invalid_order' };
    }

    const limits = tighten(this.limitsFor(intent.symbol), overrides);
    const live = ledger.liveOrders(intent.symbol);

    // 1. Open order count
    if (live.length >= limits.max_open_orders_per_symbol) {
      return { allowed: false, reason: 'exceeds_order_count' };
    }

    // 2. Worst-case net position if every live order on this side fills.
    // Orders that shrink exposure pass even above the limit.
    const baseline = this.projectPosition(intent.side, position, live);
    const projected = addQuantity(baseline, intent.side === 'buy' ? intent.quantity : -intent.quantity);
    if (Math.abs(projected) > limits.max_position_per_symbol && Math.abs(projected) > Math.abs(baseline)) {
      return { allowed: false, reason: 'exceeds_position_limit' };
    }

    // 3. Notional of this order
    const price = intent.type === 'limit' ? intent.price ?? null : this.prices.referencePrice(intent.symbol, intent.side);
    if (price === null) {
      return { allowed: false, reason: 'no_reference_price' };
    }
    if (intent.quantity * price > limits.max_order_notional) {
      return { allowed: false, reason: 'notional_too_large' };
    }

    return { allowed: true };
  }

  getPosition(symbol: string): Position {
    return this.positions.get(symbol);
  }

  getPositions(): Position[] {
    return this.positions.getAll();
  }

  /**
   * Positions change only here, as a result of an applied fill.
   */
  applyFill(order: Order, fill: Fill): Position {
    return this.positions.applyFill(order.symbol, order.side, fill);
  }

  /**
   * Fold a fill from the account's history into positions at startup.
   */
  restoreFill(fill: AccountFill): Position {
    const { exchange_order_id, symbol, side, ...execution } = fill;
    return this.positions.applyFill(symbol, side, { order_id: exchange_order_id, ...execution });
  }

  onPositionUpdate(listener: (position: Position) => void): void {
    this.positions.on('position_update', listener);
  }

  updateLimits(config: RiskLimitsConfig): void {
    this.config = config;
  }

  // --- Private methods ---

  private isWellFormed(intent: PlaceOrderIntent): boolean {
    if (!Number.isFinite(intent.quantity) || intent.quantity <= 0) {
      return false;
    }
    if (intent.type === 'limit') {
      return intent.price !== undefined && Number.isFinite(intent.price) && intent.price > 0;
    }
    return true;
  }

  private projectPosition(side: OrderSide, position: Position, live: Order[]): number {
    let projected = position.net_quantity;
    for (const order of live) {
      if (order.side !== side) continue;
      const remaining = addQuantity(order.quantity, -order.filled_quantity);
      projected = addQuantity(projected, side === 'buy' ? remaining : -remaining);
    }
    return projected;
  }
}
