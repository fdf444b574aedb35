// ============================================================
// ReconciliationEngine: the single writer of the order ledger.
// Merges gateway outcomes and exchange-reported events into
// local order state, one order at a time.
// ============================================================

import { EventEmitter } from 'events';
import {
  isTerminal,
  type Alert,
  type AlertCode,
  type ExchangeEvent,
  type ExchangeFill,
  type Fill,
  type Order,
  type OpenOrderReport,
  type OrderDraft,
  type OrderState,
  type OrderStatusReport,
} from '../../shared/protocol.js';
import { DataIntegrityError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { CancelOutcome, StatusOutcome, SubmitOutcome } from '../execution/exchange-gateway.js';
import { canTransition, OrderLedger, type OrderLedgerView, type TransitionResult } from '../orders/order-ledger.js';

const logger = createLogger('ReconciliationEngine');

/** Owner recorded for orders found resting on the exchange at startup. */
export const ADOPTED_STRATEGY_ID = 'adopted';

/** The part of the gateway reconciliation needs. */
export interface StatusSource {
  queryStatus(clientOrderId: string): Promise<StatusOutcome>;
}

export interface ReconciliationEvents {
  order_update: (order: Order) => void;
  fill: (fill: Fill, order: Order) => void;
  alert: (alert: Alert) => void;
}

export declare interface ReconciliationEngine {
  on<U extends keyof ReconciliationEvents>(event: U, listener: ReconciliationEvents[U]): this;
  emit<U extends keyof ReconciliationEvents>(
    event: U,
    ...args: Parameters<ReconciliationEvents[U]>
  ): boolean;
}

export class ReconciliationEngine extends EventEmitter {
  private readonly ledger: OrderLedger;
  private readonly status: StatusSource;
  private readonly now: () => number;
  private queues = new Map<string, Promise<void>>();

  constructor(ledger: OrderLedger, status: StatusSource, now: () => number = Date.now) {
    super();
    this.ledger = ledger;
    this.status = status;
    this.now = now;
  }

  /**
   * Read-only ledger access for the rest of the system.
   */
  get view(): OrderLedgerView {
    return this.ledger;
  }

  /**
   * Register a new order as pending. Synchronous so that admission and
   * registration happen in the same tick.
   */
  track(draft: OrderDraft): Order {
    const order = this.ledger.insert(draft);
    logger.info({
      client_order_id: order.client_order_id,
      strategy_id: order.strategy_id,
      symbol: order.symbol,
      side: order.side,
      type: order.type,
      price: order.price,
      quantity: order.quantity,
    }, 'Order tracked');
    this.emit('order_update', order);
    return order;
  }

  /**
   * Start tracking an order that was already resting on the exchange.
   * Its fills are recorded without emitting `fill`: positions were
   * rebuilt from the same account history.
   */
  adopt(report: OpenOrderReport, fills: ExchangeFill[] = []): Order | undefined {
    const existing = this.ledger.get(report.client_order_id);
    if (existing) return existing;

    this.ledger.insert({
      client_order_id: report.client_order_id,
      strategy_id: ADOPTED_STRATEGY_ID,
      symbol: report.symbol,
      side: report.side,
      type: report.type,
      price: report.price,
      quantity: report.quantity,
    });
    logger.info({
      client_order_id: report.client_order_id,
      exchange_order_id: report.exchange_order_id,
      symbol: report.symbol,
      state: report.state,
      filled_quantity: report.filled_quantity,
    }, 'Resting order adopted');

    const id = report.client_order_id;
    this.ledger.assignExchangeId(id, report.exchange_order_id);
    try {
      for (const fill of [...report.fills, ...fills]) {
        this.applyFill(id, fill, false);
      }
    } catch (error) {
      if (!(error instanceof DataIntegrityError)) throw error;
      this.quarantine(error);
      return this.ledger.get(id);
    }

    const current = this.ledger.get(id);
    if (!current) return undefined;
    if (report.filled_quantity > current.filled_quantity) {
      logger.warn({ client_order_id: id, reported: report.filled_quantity, applied: current.filled_quantity }, 'Adopted order ahead of its fills');
    }
    if (current.state === 'pending' && report.state !== 'pending') {
      this.ledger.transition(id, 'open');
    }

    const order = this.ledger.get(id);
    if (order) {
      this.emit('order_update', order);
    }
    return order;
  }

  recordSubmitOutcome(clientOrderId: string, outcome: SubmitOutcome): Promise<void> {
    return this.enqueue(clientOrderId, async () => {
      switch (outcome.status) {
        case 'accepted':
          if (outcome.exchange_order_id !== null) {
            this.ledger.assignExchangeId(clientOrderId, outcome.exchange_order_id);
          }
          if (outcome.report) {
            this.applyReport(clientOrderId, outcome.report);
          } else if (this.ledger.get(clientOrderId)?.state === 'pending') {
            this.moveTo(clientOrderId, 'open');
          }
          break;
        case 'rejected':
          this.moveTo(clientOrderId, 'rejected', outcome.reason);
          break;
        case 'unavailable':
          this.moveTo(clientOrderId, 'unknown');
          this.raiseAlert('GATEWAY_UNAVAILABLE', clientOrderId, outcome.error.message);
          break;
      }
    });
  }

  /**
   * A confirmed cancel is not applied directly: the exchange's own report
   * decides, so fills that raced the cancel are replayed first.
   */
  recordCancelOutcome(clientOrderId: string, outcome: CancelOutcome): Promise<void> {
    return this.enqueue(clientOrderId, async () => {
      const order = this.ledger.get(clientOrderId);
      if (!order) return;

      switch (outcome.status) {
        case 'cancelled':
        case 'already_terminal':
          await this.resolveNow(clientOrderId, 'cancelled');
          break;
        case 'not_found':
          await this.resolveNow(clientOrderId, order.exchange_order_id === null ? 'rejected' : 'cancelled');
          break;
        case 'unavailable':
          if (!isTerminal(order.state)) {
            this.moveTo(clientOrderId, 'unknown');
          }
          this.raiseAlert('GATEWAY_UNAVAILABLE', clientOrderId, outcome.error.message);
          break;
      }
    });
  }

  /**
   * Apply an exchange-reported event. Events for one order are applied in
   * arrival order; an event whose sequence is not above the last applied
   * one for that order is a no-op.
   */
  ingest(event: ExchangeEvent): Promise<void> {
    const order = this.locate(event);
    if (!order) {
      logger.debug({ type: event.type, exchange_order_id: event.exchange_order_id }, 'Event for untracked order ignored');
      return Promise.resolve();
    }
    return this.enqueue(order.client_order_id, () => this.applyEvent(order.client_order_id, event));
  }

  /**
   * Query the exchange and adopt its view of the order.
   * `onNotFound` is the state to assume when the exchange has no record.
   */
  resolve(clientOrderId: string, onNotFound: OrderState | null = null): Promise<void> {
    return this.enqueue(clientOrderId, () => this.resolveNow(clientOrderId, onNotFound));
  }

  /**
   * Resolve every order left in the unknown state. One the exchange has no
   * record of was never placed if it was never acknowledged, and is gone
   * (cancelled) if it was.
   */
  async resolveUnknown(): Promise<void> {
    const unknown = this.ledger.list({ states: ['unknown'] }).filter((o) => !o.quarantined);
    await Promise.all(unknown.map((o) =>
      this.resolve(o.client_order_id, o.exchange_order_id === null ? 'rejected' : 'cancelled')));
  }

  /**
   * Re-query every live order, as after a gap in the event stream.
   */
  async resolveLive(): Promise<void> {
    const live = this.ledger.liveOrders().filter((o) => !o.quarantined);
    await Promise.all(live.map((o) => this.resolve(o.client_order_id)));
  }

  evictExpired(retentionMs: number): string[] {
    const evicted = this.ledger.evictExpired(retentionMs, this.now());
    if (evicted.length > 0) {
      logger.debug({ count: evicted.length }, 'Evicted terminal orders past retention');
    }
    return evicted;
  }

  /**
   * Resolves once every queued reconciliation task has finished.
   */
  async idle(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all([...this.queues.values()]);
    }
  }

  isIdle(): boolean {
    return this.queues.size === 0;
  }

  // --- Private methods ---

  private enqueue(clientOrderId: string, task: () => Promise<void>): Promise<void> {
    const previous = this.queues.get(clientOrderId) ?? Promise.resolve();
    const next = previous.then(task).catch((error: unknown) => {
      if (error instanceof DataIntegrityError) {
        this.quarantine(error);
        return;
      }
      logger.error({ err: error, client_order_id: clientOrderId }, 'Reconciliation task failed');
    });
    this.queues.set(clientOrderId, next);
    void next.finally(() => {
      if (this.queues.get(clientOrderId) === next) {
        this.queues.delete(clientOrderId);
      }
    });
    return next;
  }

  private locate(event: ExchangeEvent): Order | undefined {
    if (event.client_order_id !== undefined) {
      const order = this.ledger.get(event.client_order_id);
      if (order) return order;
    }
    if (event.exchange_order_id !== undefined) {
      return this.ledger.getByExchangeId(event.exchange_order_id);
    }
    return undefined;
  }

  private async applyEvent(clientOrderId: string, event: ExchangeEvent): Promise<void> {
    const order = this.ledger.get(clientOrderId);
    if (!order) return;

    if (order.quarantined) {
      logger.debug({ client_order_id: clientOrderId, type: event.type }, 'Event for quarantined order dropped');
      return;
    }
    if (event.sequence <= order.last_sequence) {
      logger.debug({
        client_order_id: clientOrderId,
        type: event.type,
        sequence: event.sequence,
        last_sequence: order.last_sequence,
      }, 'Stale exchange event dropped');
      return;
    }

    this.ledger.recordSequence(clientOrderId, event.sequence);
    if (event.exchange_order_id !== undefined) {
      this.ledger.assignExchangeId(clientOrderId, event.exchange_order_id);
    }

    switch (event.type) {
      case 'ack':
        if (order.state === 'unknown') {
          // Ambiguous order confirmed live: catch up on anything missed
          await this.resolveNow(clientOrderId, null);
          if (this.ledger.get(clientOrderId)?.state === 'unknown') {
            this.moveTo(clientOrderId, 'open');
          }
        } else if (order.state === 'pending') {
          this.moveTo(clientOrderId, 'open');
        }
        break;

      case 'fill':
        this.applyFill(clientOrderId, {
          exchange_fill_id: event.exchange_fill_id,
          quantity: event.quantity,
          price: event.price,
          timestamp: event.timestamp,
        });
        break;

      case 'filled':
        if (order.state === 'cancelled' || order.state === 'rejected') {
          throw new DataIntegrityError(clientOrderId, `Exchange reported filled for ${order.state} order`);
        }
        if (order.filled_quantity < order.quantity) {
          // Done-filled ahead of its fills: replay them from the exchange
          await this.resolveNow(clientOrderId, null);
          const after = this.ledger.get(clientOrderId);
          if (after && after.state !== 'filled') {
            throw new DataIntegrityError(
              clientOrderId,
              `Exchange reported filled but fills sum to ${after.filled_quantity} of ${after.quantity}`,
            );
          }
        }
        break;

      case 'cancelled':
        if (order.state === 'filled' || order.state === 'rejected') {
          throw new DataIntegrityError(clientOrderId, `Exchange reported cancelled for ${order.state} order`);
        }
        this.moveTo(clientOrderId, 'cancelled');
        break;

      case 'rejected':
        if (order.state === 'pending' || order.state === 'unknown') {
          this.moveTo(clientOrderId, 'rejected', event.reason);
        } else if (order.state !== 'rejected') {
          throw new DataIntegrityError(clientOrderId, `Exchange reported rejected for ${order.state} order`);
        }
        break;
    }
  }

  private async resolveNow(clientOrderId: string, onNotFound: OrderState | null): Promise<void> {
    const order = this.ledger.get(clientOrderId);
    if (!order || order.quarantined) return;

    const outcome = await this.status.queryStatus(clientOrderId);
    switch (outcome.status) {
      case 'found':
        this.applyReport(clientOrderId, outcome.report);
        break;
      case 'not_found':
        logger.info({ client_order_id: clientOrderId, assumed: onNotFound }, 'Order not found on exchange');
        if (onNotFound !== null && !isTerminal(order.state)) {
          this.moveTo(clientOrderId, onNotFound, 'not_found_on_exchange');
        }
        break;
      case 'unavailable':
        if (!isTerminal(order.state)) {
          this.moveTo(clientOrderId, 'unknown');
        }
        this.raiseAlert('GATEWAY_UNAVAILABLE', clientOrderId, outcome.error.message);
        break;
    }
  }

  /**
   * Adopt an exchange status report: replay its fills first, then move to
   * the reported state.
   */
  private applyReport(clientOrderId: string, report: OrderStatusReport): void {
    if (report.exchange_order_id !== null) {
      this.ledger.assignExchangeId(clientOrderId, report.exchange_order_id);
    }
    for (const fill of report.fills) {
      this.applyFill(clientOrderId, fill);
    }

    const current = this.ledger.get(clientOrderId);
    if (!current) return;

    if (report.state === 'filled' && current.filled_quantity < current.quantity) {
      throw new DataIntegrityError(
        clientOrderId,
        `Status reports filled but fills sum to ${current.filled_quantity} of ${current.quantity}`,
      );
    }
    if (report.filled_quantity > current.filled_quantity) {
      logger.warn({
        client_order_id: clientOrderId,
        reported: report.filled_quantity,
        applied: current.filled_quantity,
      }, 'Status report ahead of applied fills');
    }

    const target: OrderState = report.state === 'open' && current.filled_quantity > 0
      ? 'partially_filled'
      : report.state;

    if (target === current.state) return;

    if (canTransition(current.state, target)) {
      this.moveTo(clientOrderId, target, report.reason);
      return;
    }
    if (isTerminal(current.state) && isTerminal(target)) {
      throw new DataIntegrityError(clientOrderId, `Ledger has ${current.state} but exchange reports ${target}`);
    }
    logger.debug({ client_order_id: clientOrderId, ledger: current.state, reported: target }, 'Status report behind ledger ignored');
  }

  private applyFill(clientOrderId: string, fill: ExchangeFill, emit = true): void {
    const result = this.ledger.applyFill({ order_id: clientOrderId, ...fill });

    switch (result.status) {
      case 'applied':
        logger.info({
          client_order_id: clientOrderId,
          exchange_fill_id: fill.exchange_fill_id,
          quantity: fill.quantity,
          price: fill.price,
          filled_quantity: result.order.filled_quantity,
          state: result.order.state,
        }, 'Fill applied');
        if (emit) {
          this.emit('fill', result.fill, result.order);
          this.emit('order_update', result.order);
        }
        break;
      case 'duplicate':
        logger.debug({ client_order_id: clientOrderId, exchange_fill_id: fill.exchange_fill_id }, 'Duplicate fill ignored');
        break;
      case 'overfill':
        throw new DataIntegrityError(
          clientOrderId,
          `Fill ${fill.exchange_fill_id} of ${fill.quantity} exceeds remaining quantity ` +
          `(${result.order.filled_quantity} of ${result.order.quantity} filled)`,
        );
      case 'terminal':
        throw new DataIntegrityError(clientOrderId, `Fill ${fill.exchange_fill_id} reported for ${result.order.state} order`);
      case 'unknown_order':
      case 'quarantined':
        break;
    }
  }

  private moveTo(clientOrderId: string, next: OrderState, reason?: string): TransitionResult {
    const result = this.ledger.transition(clientOrderId, next, reason);
    if (result.applied) {
      logger.info({ client_order_id: clientOrderId, state: next, reason }, 'Order state changed');
      this.emit('order_update', result.order);
    } else if (result.reason === 'invalid_transition') {
      logger.warn({ client_order_id: clientOrderId, from: result.order?.state, to: next }, 'Invalid order transition ignored');
    }
    return result;
  }

  private quarantine(error: DataIntegrityError): void {
    const order = this.ledger.quarantine(error.clientOrderId);
    if (order) {
      this.emit('order_update', order);
    }
    this.raiseAlert('DATA_INTEGRITY', error.clientOrderId, error.message);
  }

  private raiseAlert(code: AlertCode, clientOrderId: string, message: string): void {
    const alert: Alert = { code, client_order_id: clientOrderId, message, timestamp: this.now() };
    logger.error(alert, 'Operator alert');
    this.emit('alert', alert);
  }
}
