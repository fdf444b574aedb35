import { describe, it, expect, beforeEach } from 'vitest';
import { OrderLedger, canTransition } from '../order-ledger.js';
import type { Fill, OrderDraft } from '../../../shared/protocol.js';

// ============================================================
// Helpers
// ============================================================

function draft(overrides: Partial<OrderDraft> = {}): OrderDraft {
  return {
    client_order_id: 'c-1',
    strategy_id: 's-1',
    symbol: 'BTC-USD',
    side: 'buy',
    type: 'limit',
    price: 100,
    quantity: 1,
    ...overrides,
  };
}

function fill(id: string, quantity: number, orderId = 'c-1'): Fill {
  return { order_id: orderId, exchange_fill_id: id, quantity, price: 100, timestamp: 1 };
}

describe('OrderLedger', () => {
  let clock: number;
  let ledger: OrderLedger;

  beforeEach(() => {
    clock = 1000;
    ledger = new OrderLedger(() => clock);
  });

  // ============================================================
  // insert
  // ============================================================

  describe('insert', () => {
    it('tracks a new order as pending with nothing filled', () => {
      const order = ledger.insert(draft());

      expect(order).toEqual({
        ...draft(),
        exchange_order_id: null,
        filled_quantity: 0,
        state: 'pending',
        created_at: 1000,
        last_updated_at: 1000,
        last_sequence: 0,
        quarantined: false,
      });
      expect(ledger.size()).toBe(1);
    });

    it('rejects a duplicate client_order_id', () => {
      ledger.insert(draft());
      expect(() => ledger.insert(draft())).toThrow('Duplicate client_order_id: c-1');
    });

    it('rejects a non-positive quantity', () => {
      expect(() => ledger.insert(draft({ quantity: 0 }))).toThrow('Order quantity must be positive: 0');
    });

    it('returns copies that cannot mutate the ledger', () => {
      const order = ledger.insert(draft());
      order.state = 'filled';

      expect(ledger.get('c-1')?.state).toBe('pending');
    });
  });

  // ============================================================
  // transitions
  // ============================================================

  describe('transition', () => {
    it('follows the allowed lifecycle edges', () => {
      expect(canTransition('pending', 'open')).toBe(true);
      expect(canTransition('open', 'partially_filled')).toBe(true);
      expect(canTransition('partially_filled', 'filled')).toBe(true);
      expect(canTransition('unknown', 'open')).toBe(true);
      expect(canTransition('open', 'pending')).toBe(false);
      expect(canTransition('open', 'rejected')).toBe(false);
      expect(canTransition('filled', 'cancelled')).toBe(false);
      expect(canTransition('cancelled', 'open')).toBe(false);
    });

    it('applies an allowed transition and stamps the update time', () => {
      ledger.insert(draft());
      clock = 2000;

      const result = ledger.transition('c-1', 'open');

      expect(result.applied).toBe(true);
      expect(ledger.get('c-1')?.state).toBe('open');
      expect(ledger.get('c-1')?.last_updated_at).toBe(2000);
    });

    it('never leaves a terminal state', () => {
      ledger.insert(draft());
      ledger.transition('c-1', 'cancelled');

      expect(ledger.transition('c-1', 'open')).toMatchObject({ applied: false, reason: 'invalid_transition' });
      expect(ledger.get('c-1')?.state).toBe('cancelled');
    });

    it('reports an unchanged state without applying', () => {
      ledger.insert(draft());
      expect(ledger.transition('c-1', 'pending')).toMatchObject({ applied: false, reason: 'unchanged' });
    });

    it('records a reject reason', () => {
      ledger.insert(draft());
      ledger.transition('c-1', 'rejected', 'Insufficient funds');

      expect(ledger.get('c-1')?.reject_reason).toBe('Insufficient funds');
    });

    it('ignores unknown orders', () => {
      expect(ledger.transition('missing', 'open')).toEqual({ applied: false, reason: 'unknown_order' });
    });

    it('refuses to transition a quarantined order', () => {
      ledger.insert(draft());
      ledger.quarantine('c-1');

      expect(ledger.transition('c-1', 'open')).toMatchObject({ applied: false, reason: 'quarantined' });
    });
  });

  // ============================================================
  // fills
  // ============================================================

  describe('applyFill', () => {
    beforeEach(() => {
      ledger.insert(draft({ quantity: 1 }));
      ledger.transition('c-1', 'open');
    });

    it('moves to partially_filled then filled as quantity accumulates', () => {
      expect(ledger.applyFill(fill('f-1', 0.4))).toMatchObject({ status: 'applied' });
      expect(ledger.get('c-1')).toMatchObject({ state: 'partially_filled', filled_quantity: 0.4 });

      expect(ledger.applyFill(fill('f-2', 0.6))).toMatchObject({ status: 'applied' });
      expect(ledger.get('c-1')).toMatchObject({ state: 'filled', filled_quantity: 1 });
    });

    it('sums decimal fills exactly', () => {
      ledger.applyFill(fill('f-1', 0.1));
      ledger.applyFill(fill('f-2', 0.2));
      ledger.applyFill(fill('f-3', 0.7));

      expect(ledger.get('c-1')).toMatchObject({ state: 'filled', filled_quantity: 1 });
    });

    it('applies each exchange_fill_id once', () => {
      ledger.applyFill(fill('f-1', 0.5));

      expect(ledger.applyFill(fill('f-1', 0.5))).toEqual({ status: 'duplicate' });
      expect(ledger.get('c-1')?.filled_quantity).toBe(0.5);
      expect(ledger.fillsFor('c-1')).toHaveLength(1);
    });

    it('refuses a fill beyond the order quantity', () => {
      ledger.applyFill(fill('f-1', 0.8));

      expect(ledger.applyFill(fill('f-2', 0.3))).toMatchObject({ status: 'overfill' });
      expect(ledger.get('c-1')?.filled_quantity).toBe(0.8);
    });

    it('refuses fills on cancelled orders', () => {
      ledger.transition('c-1', 'cancelled');
      expect(ledger.applyFill(fill('f-1', 0.1))).toMatchObject({ status: 'terminal' });
    });

    it('reports unknown orders', () => {
      expect(ledger.applyFill(fill('f-1', 0.1, 'missing'))).toEqual({ status: 'unknown_order' });
    });

    it('keeps filled_quantity monotonic across any fill sequence', () => {
      const quantities = [0.3, 0.3, 0.5, 0.2, 0.4, 0.1];
      let previous = 0;
      quantities.forEach((q, i) => {
        ledger.applyFill(fill(`f-${i}`, q));
        const current = ledger.get('c-1')?.filled_quantity ?? 0;
        expect(current).toBeGreaterThanOrEqual(previous);
        expect(current).toBeLessThanOrEqual(1);
        previous = current;
      });
      // 0.3 + 0.3 + 0.2 + 0.1 accepted; 0.5 and 0.4 would overfill
      expect(previous).toBe(0.9);
    });
  });

  // ============================================================
  // indexes and views
  // ============================================================

  describe('views', () => {
    it('looks orders up by exchange id', () => {
      ledger.insert(draft());
      ledger.assignExchangeId('c-1', 'ex-1');

      expect(ledger.getByExchangeId('ex-1')?.client_order_id).toBe('c-1');
      expect(ledger.getByExchangeId('ex-2')).toBeUndefined();
    });

    it('filters by strategy, symbol and state', () => {
      ledger.insert(draft({ client_order_id: 'a', strategy_id: 's-1', symbol: 'BTC-USD' }));
      ledger.insert(draft({ client_order_id: 'b', strategy_id: 's-2', symbol: 'BTC-USD' }));
      ledger.insert(draft({ client_order_id: 'c', strategy_id: 's-1', symbol: 'ETH-USD' }));
      ledger.transition('c', 'cancelled');

      expect(ledger.list({ strategyId: 's-1' }).map((o) => o.client_order_id)).toEqual(['a', 'c']);
      expect(ledger.list({ symbol: 'BTC-USD' }).map((o) => o.client_order_id)).toEqual(['a', 'b']);
      expect(ledger.liveOrders().map((o) => o.client_order_id)).toEqual(['a', 'b']);
      expect(ledger.liveOrders('ETH-USD')).toEqual([]);
    });

    it('tracks the highest applied sequence', () => {
      ledger.insert(draft());
      ledger.recordSequence('c-1', 5);
      ledger.recordSequence('c-1', 3);

      expect(ledger.get('c-1')?.last_sequence).toBe(5);
    });
  });

  // ============================================================
  // eviction
  // ============================================================

  describe('evictExpired', () => {
    it('drops terminal orders past retention and keeps the rest', () => {
      ledger.insert(draft({ client_order_id: 'old' }));
      ledger.transition('old', 'cancelled');
      ledger.insert(draft({ client_order_id: 'live' }));
      ledger.insert(draft({ client_order_id: 'stuck' }));
      ledger.transition('stuck', 'rejected');
      ledger.quarantine('stuck');

      clock = 10_000;
      ledger.insert(draft({ client_order_id: 'recent' }));
      ledger.transition('recent', 'cancelled');

      const evicted = ledger.evictExpired(5000);

      expect(evicted).toEqual(['old']);
      expect(ledger.get('old')).toBeUndefined();
      expect(ledger.get('live')).toBeDefined();
      expect(ledger.get('stuck')).toBeDefined();
      expect(ledger.get('recent')).toBeDefined();
    });
  });
});
