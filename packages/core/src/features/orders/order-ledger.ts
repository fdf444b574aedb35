// ============================================================
// OrderLedger: authoritative in-process record of the orders
// this system believes exist. Only the ReconciliationEngine
// holds the writable ledger; everyone else gets the read view.
// ============================================================

import {
  addQuantity,
  isTerminal,
  LIVE_STATES,
  type Fill,
  type Order,
  type OrderDraft,
  type OrderState,
} from '../../shared/protocol.js';

const ALLOWED_TRANSITIONS: Record<OrderState, ReadonlySet<OrderState>> = {
  pending: new Set(['open', 'partially_filled', 'filled', 'cancelled', 'rejected', 'unknown']),
  open: new Set(['partially_filled', 'filled', 'cancelled', 'unknown']),
  partially_filled: new Set(['filled', 'cancelled', 'unknown']),
  unknown: new Set(['pending', 'open', 'partially_filled', 'filled', 'cancelled', 'rejected']),
  filled: new Set(),
  cancelled: new Set(),
  rejected: new Set(),
};

export function canTransition(from: OrderState, to: OrderState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

export type TransitionResult =
  | { applied: true; order: Order }
  | { applied: false; reason: 'unknown_order' | 'quarantined' | 'unchanged' | 'invalid_transition'; order?: Order };

export type FillResult =
  | { status: 'applied'; order: Order; fill: Fill }
  | { status: 'duplicate' | 'unknown_order' | 'quarantined' }
  | { status: 'overfill' | 'terminal'; order: Order };

export interface OrderFilter {
  strategyId?: string;
  symbol?: string;
  states?: ReadonlyArray<OrderState>;
}

/**
 * Read-only view handed to the strategy runner and risk controller.
 * Returned orders are copies.
 */
export interface OrderLedgerView {
  get(clientOrderId: string): Order | undefined;
  getByExchangeId(exchangeOrderId: string): Order | undefined;
  list(filter?: OrderFilter): Order[];
  liveOrders(symbol?: string): Order[];
  fillsFor(clientOrderId: string): Fill[];
  size(): number;
}

export class OrderLedger implements OrderLedgerView {
  private orders = new Map<string, Order>();
  private exchangeIndex = new Map<string, string>();
  private fills = new Map<string, Fill[]>();
  private seenFillIds = new Set<string>();

  constructor(private readonly now: () => number = Date.now) {}

  // --- Read view ---

  get(clientOrderId: string): Order | undefined {
    const order = this.orders.get(clientOrderId);
    return order ? { ...order } : undefined;
  }

  getByExchangeId(exchangeOrderId: string): Order | undefined {
    const clientOrderId = this.exchangeIndex.get(exchangeOrderId);
    return clientOrderId === undefined ? undefined : this.get(clientOrderId);
  }

  list(filter: OrderFilter = {}): Order[] {
    const result: Order[] = [];
    for (const order of this.orders.values()) {
      if (filter.strategyId !== undefined && order.strategy_id !== filter.strategyId) continue;
      if (filter.symbol !== undefined && order.symbol !== filter.symbol) continue;
      if (filter.states && !filter.states.includes(order.state)) continue;
      result.push({ ...order });
    }
    return result;
  }

  liveOrders(symbol?: string): Order[] {
    return this.list({ symbol, states: [...LIVE_STATES] });
  }

  fillsFor(clientOrderId: string): Fill[] {
    return [...(this.fills.get(clientOrderId) ?? [])];
  }

  size(): number {
    return this.orders.size;
  }

  // --- Mutation (reconciliation only) ---

  /**
   * Start tracking a new order in the pending state.
   */
  insert(draft: OrderDraft): Order {
    if (this.orders.has(draft.client_order_id)) {
      throw new Error(`Duplicate client_order_id: ${draft.client_order_id}`);
    }
    if (!(draft.quantity > 0)) {
      throw new Error(`Order quantity must be positive: ${draft.quantity}`);
    }

    const now = this.now();
    const order: Order = {
      ...draft,
      exchange_order_id: null,
      filled_quantity: 0,
      state: 'pending',
      created_at: now,
      last_updated_at: now,
      last_sequence: 0,
      quarantined: false,
    };
    this.orders.set(order.client_order_id, order);
    this.fills.set(order.client_order_id, []);
    return { ...order };
  }

  transition(clientOrderId: string, next: OrderState, reason?: string): TransitionResult {
    const order = this.orders.get(clientOrderId);
    if (!order) {
      return { applied: false, reason: 'unknown_order' };
    }
    if (order.quarantined) {
      return { applied: false, reason: 'quarantined', order: { ...order } };
    }
    if (order.state === next) {
      return { applied: false, reason: 'unchanged', order: { ...order } };
    }
    if (!canTransition(order.state, next)) {
      return { applied: false, reason: 'invalid_transition', order: { ...order } };
    }

    order.state = next;
    order.last_updated_at = this.now();
    if (next === 'rejected' && reason) {
      order.reject_reason = reason;
    }
    return { applied: true, order: { ...order } };
  }

  /**
   * Apply an execution. Idempotent per exchange_fill_id; refuses fills
   * that would push filled_quantity past quantity.
   */
  applyFill(fill: Fill): FillResult {
    if (this.seenFillIds.has(fill.exchange_fill_id)) {
      return { status: 'duplicate' };
    }
    const order = this.orders.get(fill.order_id);
    if (!order) {
      return { status: 'unknown_order' };
    }
    if (order.quarantined) {
      return { status: 'quarantined' };
    }
    if (isTerminal(order.state) && order.state !== 'filled') {
      return { status: 'terminal', order: { ...order } };
    }

    const filled = addQuantity(order.filled_quantity, fill.quantity);
    if (!(fill.quantity > 0) || filled > order.quantity) {
      return { status: 'overfill', order: { ...order } };
    }

    this.seenFillIds.add(fill.exchange_fill_id);
    this.fills.get(order.client_order_id)?.push({ ...fill });
    order.filled_quantity = filled;
    order.state = filled === order.quantity ? 'filled' : 'partially_filled';
    order.last_updated_at = this.now();
    return { status: 'applied', order: { ...order }, fill: { ...fill } };
  }

  assignExchangeId(clientOrderId: string, exchangeOrderId: string): void {
    const order = this.orders.get(clientOrderId);
    if (!order || order.exchange_order_id === exchangeOrderId) {
      return;
    }
    if (order.exchange_order_id !== null) {
      this.exchangeIndex.delete(order.exchange_order_id);
    }
    order.exchange_order_id = exchangeOrderId;
    this.exchangeIndex.set(exchangeOrderId, clientOrderId);
  }

  recordSequence(clientOrderId: string, sequence: number): void {
    const order = this.orders.get(clientOrderId);
    if (order && sequence > order.last_sequence) {
      order.last_sequence = sequence;
    }
  }

  quarantine(clientOrderId: string): Order | undefined {
    const order = this.orders.get(clientOrderId);
    if (!order) {
      return undefined;
    }
    order.quarantined = true;
    order.last_updated_at = this.now();
    return { ...order };
  }

  /**
   * Drop terminal orders whose last update is older than the retention
   * window. Quarantined orders are kept for the operator.
   */
  evictExpired(retentionMs: number, now: number = this.now()): string[] {
    const evicted: string[] = [];
    for (const [id, order] of this.orders) {
      if (!isTerminal(order.state) || order.quarantined) continue;
      if (now - order.last_updated_at < retentionMs) continue;

      this.orders.delete(id);
      if (order.exchange_order_id !== null) {
        this.exchangeIndex.delete(order.exchange_order_id);
      }
      for (const fill of this.fills.get(id) ?? []) {
        this.seenFillIds.delete(fill.exchange_fill_id);
      }
      this.fills.delete(id);
      evicted.push(id);
    }
    return evicted;
  }
}
