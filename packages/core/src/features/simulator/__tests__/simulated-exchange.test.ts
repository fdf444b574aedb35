import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SimulatedExchange } from '../simulated-exchange.js';
import { ExchangeRequestError } from '../../../shared/errors.js';
import type { ExchangeEvent, MarketEvent, OrderRequest } from '../../../shared/protocol.js';

// Silence pino logger
vi.mock('pino', () => {
  const noop = () => {};
  const logger: Record<string, unknown> = {
    info: noop,
    warn: noop,
    error: noop,
    debug: noop,
    trace: noop,
    child: () => logger,
  };
  return { default: () => logger };
});

// ============================================================
// Helpers
// ============================================================

function request(overrides: Partial<OrderRequest> = {}): OrderRequest {
  return {
    client_order_id: 'c-1',
    symbol: 'BTC-USD',
    side: 'buy',
    type: 'limit',
    price: 99,
    quantity: 1,
    ...overrides,
  };
}

async function captureError(promise: Promise<unknown>): Promise<ExchangeRequestError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ExchangeRequestError) return error;
    throw error;
  }
  throw new Error('Expected the call to fail');
}

describe('SimulatedExchange', () => {
  let exchange: SimulatedExchange;
  let market: MarketEvent[];
  let events: ExchangeEvent[];

  beforeEach(() => {
    exchange = new SimulatedExchange(() => 42);
    market = [];
    events = [];
    exchange.subscribe(['BTC-USD'], {
      onMarketEvent: (event) => market.push(event),
      onExchangeEvent: (event) => events.push(event),
    });
  });

  // ============================================================
  // Orders
  // ============================================================

  describe('submitOrder', () => {
    it('acknowledges a resting order', async () => {
      const ack = await exchange.submitOrder(request());

      expect(ack).toEqual({ client_order_id: 'c-1', exchange_order_id: 'sim-000001' });
      expect(events).toEqual([
        { type: 'ack', client_order_id: 'c-1', exchange_order_id: 'sim-000001', sequence: 1, timestamp: 42 },
      ]);
      expect(await exchange.queryOrder('c-1')).toEqual({
        client_order_id: 'c-1',
        exchange_order_id: 'sim-000001',
        state: 'open',
        filled_quantity: 0,
        fills: [],
      });
    });

    it('treats a repeated client_order_id as the same order', async () => {
      await exchange.submitOrder(request());
      const again = await exchange.submitOrder(request({ quantity: 5 }));

      expect(again.exchange_order_id).toBe('sim-000001');
      expect(events).toHaveLength(1);
    });

    it.each([
      [{ quantity: 0 }, 'Invalid quantity'],
      [{ price: null }, 'Limit order requires a positive price'],
      [{ type: 'market' as const, price: null }, 'No liquidity for BTC-USD'],
    ])('rejects %o', async (overrides, message) => {
      const error = await captureError(exchange.submitOrder(request(overrides)));

      expect(error.kind).toBe('rejected');
      expect(error.message).toBe(message);
      expect(await exchange.queryOrder('c-1')).toBeNull();
    });

    it('fills a crossing limit order at its own price', async () => {
      exchange.tick('BTC-USD', 98, 99.5);
      await exchange.submitOrder(request({ price: 100 }));

      expect(events.map((e) => [e.type, e.sequence])).toEqual([
        ['ack', 1],
        ['fill', 2],
        ['filled', 3],
      ]);
      expect(events[1]).toMatchObject({ exchange_fill_id: 'sim-fill-000001', quantity: 1, price: 100 });
    });

    it('fills a market order at the touch', async () => {
      exchange.tick('BTC-USD', 98, 99.5);
      await exchange.submitOrder(request({ type: 'market', price: null, side: 'sell' }));

      expect(events[1]).toMatchObject({ type: 'fill', price: 98 });
      expect((await exchange.queryOrder('c-1'))?.state).toBe('filled');
    });
  });

  // ============================================================
  // Market data and matching
  // ============================================================

  describe('tick', () => {
    it('publishes sequenced quotes per symbol', () => {
      exchange.tick('BTC-USD', 98, 99);
      exchange.tick('BTC-USD', 98.5, 99.5, 99);

      expect(market).toEqual([
        { type: 'ticker', symbol: 'BTC-USD', sequence: 1, best_bid: 98, best_ask: 99, last_trade_price: undefined, timestamp: 42 },
        { type: 'ticker', symbol: 'BTC-USD', sequence: 2, best_bid: 98.5, best_ask: 99.5, last_trade_price: 99, timestamp: 42 },
      ]);
    });

    it('fills resting orders the quote crosses', async () => {
      await exchange.submitOrder(request({ price: 99 }));
      exchange.tick('BTC-USD', 98, 100);
      expect((await exchange.queryOrder('c-1'))?.state).toBe('open');

      exchange.tick('BTC-USD', 97, 98.5);

      const report = await exchange.queryOrder('c-1');
      expect(report).toMatchObject({ state: 'filled', filled_quantity: 1 });
      expect(report?.fills).toEqual([{ exchange_fill_id: 'sim-fill-000001', quantity: 1, price: 99, timestamp: 42 }]);
    });

    it('does not deliver other symbols to a subscriber', () => {
      exchange.tick('ETH-USD', 9, 10);
      expect(market).toHaveLength(0);
    });
  });

  describe('fillOrder', () => {
    it('partially fills and then completes an order', async () => {
      await exchange.submitOrder(request({ quantity: 1 }));

      exchange.fillOrder('c-1', 0.4);
      expect(await exchange.queryOrder('c-1')).toMatchObject({ state: 'partially_filled', filled_quantity: 0.4 });

      exchange.fillOrder('c-1', 5, 98);
      const report = await exchange.queryOrder('c-1');
      expect(report).toMatchObject({ state: 'filled', filled_quantity: 1 });
      expect(report?.fills.map((f) => [f.quantity, f.price])).toEqual([
        [0.4, 99],
        [0.6, 98],
      ]);
    });

    it('throws for terminal or missing orders', () => {
      expect(() => exchange.fillOrder('missing', 1)).toThrow('No open simulated order missing');
    });
  });

  // ============================================================
  // Cancels
  // ============================================================

  describe('cancelOrder', () => {
    it('cancels a resting order and publishes it', async () => {
      await exchange.submitOrder(request());
      await exchange.cancelOrder('c-1');

      expect(events.at(-1)).toMatchObject({ type: 'cancelled', client_order_id: 'c-1', sequence: 2 });
      expect((await exchange.queryOrder('c-1'))?.state).toBe('cancelled');
    });

    it('reports already_terminal for a finished order', async () => {
      await exchange.submitOrder(request());
      exchange.fillOrder('c-1', 1);

      const error = await captureError(exchange.cancelOrder('c-1'));
      expect(error.kind).toBe('already_terminal');
    });

    it('reports not_found for an unknown order', async () => {
      const error = await captureError(exchange.cancelOrder('nope'));
      expect(error.kind).toBe('not_found');
      expect(error.status).toBe(404);
    });
  });

  // ============================================================
  // Scripted faults
  // ============================================================

  describe('failNext', () => {
    it('fails before the order lands by default', async () => {
      exchange.failNext('submit', 'timeout');

      const error = await captureError(exchange.submitOrder(request()));

      expect(error.kind).toBe('timeout');
      expect(await exchange.queryOrder('c-1')).toBeNull();
      await expect(exchange.submitOrder(request())).resolves.toMatchObject({ exchange_order_id: 'sim-000001' });
    });

    it('can fail after the order landed', async () => {
      exchange.failNext('submit', 'timeout', { applied: true });

      const error = await captureError(exchange.submitOrder(request()));

      expect(error.message).toBe('Simulated timeout on submit (order landed)');
      expect((await exchange.queryOrder('c-1'))?.state).toBe('open');
    });

    it('consumes faults in order, one per call', async () => {
      exchange.failNext('query', 'server');
      exchange.failNext('query', 'network');

      expect((await captureError(exchange.queryOrder('c-1'))).kind).toBe('server');
      expect((await captureError(exchange.queryOrder('c-1'))).kind).toBe('network');
      await expect(exchange.queryOrder('c-1')).resolves.toBeNull();
      expect(exchange.callCount('query')).toBe(3);
    });

    it('applies a cancel before a lost response', async () => {
      await exchange.submitOrder(request());
      exchange.failNext('cancel', 'timeout', { applied: true });

      await captureError(exchange.cancelOrder('c-1'));

      expect((await exchange.queryOrder('c-1'))?.state).toBe('cancelled');
    });
  });

  // ============================================================
  // Account state
  // ============================================================

  describe('listOpenOrders and listFills', () => {
    it('lists resting orders of the requested symbols with their fills', async () => {
      await exchange.submitOrder(request({ client_order_id: 'c-1', quantity: 2 }));
      await exchange.submitOrder(request({ client_order_id: 'c-2' }));
      await exchange.submitOrder(request({ client_order_id: 'c-3', symbol: 'ETH-USD' }));
      exchange.fillOrder('c-1', 0.5);
      exchange.fillOrder('c-2', 1);

      const open = await exchange.listOpenOrders(['BTC-USD']);

      expect(open).toEqual([
        {
          client_order_id: 'c-1',
          exchange_order_id: 'sim-000001',
          state: 'partially_filled',
          filled_quantity: 0.5,
          fills: [{ exchange_fill_id: 'sim-fill-000001', quantity: 0.5, price: 99, timestamp: 42 }],
          symbol: 'BTC-USD',
          side: 'buy',
          type: 'limit',
          price: 99,
          quantity: 2,
        },
      ]);
    });

    it('lists every fill of the requested symbols with its order', async () => {
      await exchange.submitOrder(request({ client_order_id: 'c-1', quantity: 2 }));
      await exchange.submitOrder(request({ client_order_id: 'c-2', side: 'sell', price: 101 }));
      exchange.fillOrder('c-1', 0.5);
      exchange.fillOrder('c-2', 1);

      const fills = await exchange.listFills(['BTC-USD']);

      expect(fills.map((f) => [f.exchange_fill_id, f.exchange_order_id, f.side, f.quantity, f.price])).toEqual([
        ['sim-fill-000001', 'sim-000001', 'buy', 0.5, 99],
        ['sim-fill-000002', 'sim-000002', 'sell', 1, 101],
      ]);
      expect(await exchange.listFills(['ETH-USD'])).toEqual([]);
    });
  });

  // ============================================================
  // Stream outages
  // ============================================================

  describe('dropStream and reconnect', () => {
    it('loses order events while down and notifies subscribers on reconnect', async () => {
      const onReconnect = vi.fn();
      exchange.subscribe(['BTC-USD', 'ETH-USD'], {
        onMarketEvent: () => {},
        onExchangeEvent: () => {},
        onReconnect,
      });
      await exchange.submitOrder(request());

      exchange.dropStream();
      exchange.fillOrder('c-1', 1);
      expect(events.map((e) => e.type)).toEqual(['ack']);

      exchange.reconnect();
      expect(onReconnect).toHaveBeenCalledTimes(1);

      await exchange.submitOrder(request({ client_order_id: 'c-2' }));
      expect(events.map((e) => e.type)).toEqual(['ack', 'ack']);
      expect((await exchange.queryOrder('c-1'))?.state).toBe('filled');
    });
  });

  // ============================================================
  // Lifecycle
  // ============================================================

  describe('lifecycle', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('reports health from the connection state', async () => {
      expect(exchange.isHealthy()).toBe(false);
      await exchange.connect();
      expect(exchange.isHealthy()).toBe(true);
      await exchange.disconnect();
      expect(exchange.isHealthy()).toBe(false);
    });

    it('ticks every interval during a random walk until stopped', () => {
      vi.useFakeTimers();
      exchange.startRandomWalk({ prices: { 'BTC-USD': 100 }, intervalMs: 500 });
      expect(market).toHaveLength(1);

      vi.advanceTimersByTime(1500);
      expect(market).toHaveLength(4);

      exchange.stopRandomWalk();
      vi.advanceTimersByTime(1500);
      expect(market).toHaveLength(4);

      for (const event of market) {
        if (event.type !== 'ticker') throw new Error('expected ticker');
        expect(event.best_bid).toBeLessThan(event.best_ask);
      }
    });

    it('stops delivering after unsubscribe', () => {
      const seen: MarketEvent[] = [];
      const unsubscribe = exchange.subscribe(['BTC-USD'], {
        onMarketEvent: (event) => seen.push(event),
        onExchangeEvent: () => {},
      });
      unsubscribe();

      exchange.tick('BTC-USD', 1, 2);
      expect(seen).toHaveLength(0);
    });
  });
});
