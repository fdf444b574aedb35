// ============================================================
// SimulatedExchange: in-process ExchangeClient for --simulate
// mode and tests. Orders rest against a single top-of-book
// quote per symbol; scripted faults reproduce lost responses.
// ============================================================

import type { ExchangeClient, FeedHandlers, Unsubscribe } from '../execution/exchange-client.js';
import {
  addQuantity,
  isTerminal,
  roundQuantity,
  type AccountFill,
  type ExchangeEvent,
  type ExchangeFill,
  type OpenOrderReport,
  type OrderAck,
  type OrderRequest,
  type OrderStatusReport,
  type ReportedOrderState,
} from '../../shared/protocol.js';
import { ExchangeRequestError, type ExchangeErrorKind } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';

const logger = createLogger('SimulatedExchange');

export type SimulatedOperation = 'submit' | 'cancel' | 'query';

export interface FaultOptions {
  /**
   * The request takes effect on the exchange before the error is thrown,
   * as when a response is lost after the order landed.
   */
  applied?: boolean;
}

interface ScriptedFault {
  kind: ExchangeErrorKind;
  applied: boolean;
}

interface Quote {
  bid: number;
  ask: number;
  sequence: number;
}

interface SimulatedOrder {
  request: OrderRequest;
  exchange_order_id: string;
  state: ReportedOrderState;
  filled_quantity: number;
  fills: ExchangeFill[];
  sequence: number;
}

export interface RandomWalkOptions {
  /** Starting mid price per symbol. */
  prices: Record<string, number>;
  intervalMs?: number;
  /** Largest relative move per tick (default: 0.001 = 10 bps). */
  volatility?: number;
  /** Quoted spread in basis points (default: 2). */
  spreadBps?: number;
}

export class SimulatedExchange implements ExchangeClient {
  readonly exchange = 'simulated';
  private readonly now: () => number;
  private connected = false;
  private orders = new Map<string, SimulatedOrder>();
  private quotes = new Map<string, Quote>();
  private handlers = new Map<string, Set<FeedHandlers>>();
  private faults: Record<SimulatedOperation, ScriptedFault[]> = { submit: [], cancel: [], query: [] };
  private orderCounter = 0;
  private fillCounter = 0;
  private walkTimer: NodeJS.Timeout | null = null;
  private calls: Record<SimulatedOperation, number> = { submit: 0, cancel: 0, query: 0 };
  private streamDown = false;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async connect(): Promise<void> {
    this.connected = true;
    logger.info('Simulated exchange connected');
  }

  async disconnect(): Promise<void> {
    this.stopRandomWalk();
    this.connected = false;
    logger.info('Simulated exchange disconnected');
  }

  isHealthy(): boolean {
    return this.connected;
  }

  async submitOrder(request: OrderRequest): Promise<OrderAck> {
    this.calls.submit++;
    const fault = this.takeFault('submit');
    if (fault && !fault.applied) {
      throw new ExchangeRequestError(fault.kind, `Simulated ${fault.kind} on submit`);
    }

    // client_order_id is the idempotency key: a repeat returns the original
    const existing = this.orders.get(request.client_order_id);
    if (existing) {
      return { client_order_id: request.client_order_id, exchange_order_id: existing.exchange_order_id };
    }

    const problem = this.validate(request);
    if (problem) {
      throw new ExchangeRequestError('rejected', problem, 400);
    }

    this.orderCounter++;
    const order: SimulatedOrder = {
      request: { ...request },
      exchange_order_id: `sim-${String(this.orderCounter).padStart(6, '0')}`,
      state: 'open',
      filled_quantity: 0,
      fills: [],
      sequence: 0,
    };
    this.orders.set(request.client_order_id, order);
    logger.debug({ client_order_id: request.client_order_id, exchange_order_id: order.exchange_order_id }, 'Order received');

    this.publish(order, { type: 'ack', exchange_order_id: order.exchange_order_id });
    this.match(order);

    if (fault) {
      throw new ExchangeRequestError(fault.kind, `Simulated ${fault.kind} on submit (order landed)`);
    }
    return { client_order_id: request.client_order_id, exchange_order_id: order.exchange_order_id };
  }

  async cancelOrder(clientOrderId: string): Promise<void> {
    this.calls.cancel++;
    const fault = this.takeFault('cancel');
    if (fault && !fault.applied) {
      throw new ExchangeRequestError(fault.kind, `Simulated ${fault.kind} on cancel`);
    }

    const order = this.orders.get(clientOrderId);
    if (!order) {
      throw new ExchangeRequestError('not_found', `Order ${clientOrderId} not found`, 404);
    }
    if (isTerminal(order.state)) {
      throw new ExchangeRequestError('already_terminal', `Order ${clientOrderId} is already ${order.state}`, 400);
    }

    order.state = 'cancelled';
    this.publish(order, { type: 'cancelled' });

    if (fault) {
      throw new ExchangeRequestError(fault.kind, `Simulated ${fault.kind} on cancel (cancel landed)`);
    }
  }

  async queryOrder(clientOrderId: string): Promise<OrderStatusReport | null> {
    this.calls.query++;
    const fault = this.takeFault('query');
    if (fault) {
      throw new ExchangeRequestError(fault.kind, `Simulated ${fault.kind} on query`);
    }

    const order = this.orders.get(clientOrderId);
    if (!order) {
      return null;
    }
    return report(order);
  }

  async listOpenOrders(symbols: string[]): Promise<OpenOrderReport[]> {
    const wanted = new Set(symbols);
    const result: OpenOrderReport[] = [];
    for (const order of this.orders.values()) {
      if (wanted.has(order.request.symbol) && !isTerminal(order.state)) {
        const { symbol, side, type, price, quantity } = order.request;
        result.push({ ...report(order), symbol, side, type, price, quantity });
      }
    }
    return result;
  }

  async listFills(symbols: string[]): Promise<AccountFill[]> {
    const wanted = new Set(symbols);
    const result: AccountFill[] = [];
    for (const order of this.orders.values()) {
      if (!wanted.has(order.request.symbol)) continue;
      for (const fill of order.fills) {
        result.push({
          ...fill,
          exchange_order_id: order.exchange_order_id,
          symbol: order.request.symbol,
          side: order.request.side,
        });
      }
    }
    return result.sort((a, b) => a.timestamp - b.timestamp);
  }

  subscribe(symbols: string[], handlers: FeedHandlers): Unsubscribe {
    for (const symbol of symbols) {
      let set = this.handlers.get(symbol);
      if (!set) {
        set = new Set();
        this.handlers.set(symbol, set);
      }
      set.add(handlers);
    }
    return () => {
      for (const symbol of symbols) {
        this.handlers.get(symbol)?.delete(handlers);
      }
    };
  }

  // --- Simulation controls ---

  /**
   * Make the next call of `operation` fail with `kind`. Faults queue up
   * and are consumed one per call.
   */
  failNext(operation: SimulatedOperation, kind: ExchangeErrorKind, options: FaultOptions = {}): void {
    this.faults[operation].push({ kind, applied: options.applied ?? false });
  }

  /**
   * Publish a new top-of-book quote and fill any resting order it crosses.
   */
  tick(symbol: string, bid: number, ask: number, lastTradePrice?: number): void {
    const previous = this.quotes.get(symbol);
    const quote: Quote = { bid, ask, sequence: (previous?.sequence ?? 0) + 1 };
    this.quotes.set(symbol, quote);

    for (const handler of this.handlers.get(symbol) ?? []) {
      handler.onMarketEvent({
        type: 'ticker',
        symbol,
        sequence: quote.sequence,
        best_bid: bid,
        best_ask: ask,
        last_trade_price: lastTradePrice,
        timestamp: this.now(),
      });
    }

    for (const order of this.orders.values()) {
      if (order.request.symbol === symbol && !isTerminal(order.state)) {
        this.match(order);
      }
    }
  }

  /**
   * Execute part or all of a resting order directly.
   */
  fillOrder(clientOrderId: string, quantity: number, price?: number): void {
    const order = this.orders.get(clientOrderId);
    if (!order || isTerminal(order.state)) {
      throw new Error(`No open simulated order ${clientOrderId}`);
    }
    const remaining = roundQuantity(order.request.quantity - order.filled_quantity);
    this.execute(order, Math.min(quantity, remaining), price ?? order.request.price ?? 0);
  }

  startRandomWalk(options: RandomWalkOptions): void {
    this.stopRandomWalk();
    const volatility = options.volatility ?? 0.001;
    const halfSpread = (options.spreadBps ?? 2) / 20_000;
    const mids = new Map(Object.entries(options.prices));

    const step = (): void => {
      for (const [symbol, mid] of mids) {
        const next = mid * (1 + (Math.random() * 2 - 1) * volatility);
        mids.set(symbol, next);
        this.tick(symbol, roundPrice(next * (1 - halfSpread)), roundPrice(next * (1 + halfSpread)));
      }
    };

    step();
    this.walkTimer = setInterval(step, options.intervalMs ?? 1000);
    logger.info({ symbols: [...mids.keys()], intervalMs: options.intervalMs ?? 1000 }, 'Random walk started');
  }

  stopRandomWalk(): void {
    if (this.walkTimer) {
      clearInterval(this.walkTimer);
      this.walkTimer = null;
    }
  }

  /**
   * Simulate a dropped order stream: order events are lost until
   * reconnect().
   */
  dropStream(): void {
    this.streamDown = true;
  }

  /**
   * Restore the order stream and tell every subscriber it reconnected.
   */
  reconnect(): void {
    this.streamDown = false;
    const notified = new Set<FeedHandlers>();
    for (const set of this.handlers.values()) {
      for (const handler of set) {
        if (notified.has(handler)) continue;
        notified.add(handler);
        handler.onReconnect?.();
      }
    }
  }

  /** Number of calls received per operation, faults included. */
  callCount(operation: SimulatedOperation): number {
    return this.calls[operation];
  }

  // --- Private methods ---

  private takeFault(operation: SimulatedOperation): ScriptedFault | undefined {
    return this.faults[operation].shift();
  }

  private validate(request: OrderRequest): string | null {
    if (!(request.quantity > 0)) {
      return 'Invalid quantity';
    }
    if (request.type === 'limit' && !(request.price !== null && request.price > 0)) {
      return 'Limit order requires a positive price';
    }
    if (request.type === 'market' && !this.quotes.has(request.symbol)) {
      return `No liquidity for ${request.symbol}`;
    }
    return null;
  }

  private match(order: SimulatedOrder): void {
    const quote = this.quotes.get(order.request.symbol);
    if (!quote) return;

    const { side, type, price } = order.request;
    const touch = side === 'buy' ? quote.ask : quote.bid;
    let fillPrice: number | null = null;

    if (type === 'market') {
      fillPrice = touch;
    } else if (price !== null && (side === 'buy' ? price >= touch : price <= touch)) {
      fillPrice = price;
    }

    if (fillPrice !== null) {
      this.execute(order, roundQuantity(order.request.quantity - order.filled_quantity), fillPrice);
    }
  }

  private execute(order: SimulatedOrder, quantity: number, price: number): void {
    if (!(quantity > 0)) return;

    this.fillCounter++;
    const fill: ExchangeFill = {
      exchange_fill_id: `sim-fill-${String(this.fillCounter).padStart(6, '0')}`,
      quantity,
      price,
      timestamp: this.now(),
    };
    order.fills.push(fill);
    order.filled_quantity = addQuantity(order.filled_quantity, quantity);
    order.state = order.filled_quantity >= order.request.quantity ? 'filled' : 'partially_filled';

    this.publish(order, { type: 'fill', ...fill });
    if (order.state === 'filled') {
      this.publish(order, { type: 'filled' });
    }
  }

  private publish(order: SimulatedOrder, body: DistributiveOmit<ExchangeEvent, 'sequence' | 'client_order_id' | 'timestamp'>): void {
    order.sequence++;
    const event: ExchangeEvent = {
      ...body,
      client_order_id: order.request.client_order_id,
      exchange_order_id: order.exchange_order_id,
      sequence: order.sequence,
      timestamp: this.now(),
    };
    if (this.streamDown) return;
    for (const handler of this.handlers.get(order.request.symbol) ?? []) {
      handler.onExchangeEvent(event);
    }
  }
}

function report(order: SimulatedOrder): OrderStatusReport {
  return {
    client_order_id: order.request.client_order_id,
    exchange_order_id: order.exchange_order_id,
    state: order.state,
    filled_quantity: order.filled_quantity,
    fills: order.fills.map((f) => ({ ...f })),
  };
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}
