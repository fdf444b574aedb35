// ============================================================
// StrategyRunner: hosts strategy instances, feeds them market
// and fill events, and turns their intents into admitted
// gateway calls.
// ============================================================

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  isTerminal,
  LIVE_STATES,
  type CancelOrderIntent,
  type Fill,
  type Intent,
  type IntentResult,
  type MarketSnapshot,
  type Order,
  type OrderRequest,
  type PlaceOrderIntent,
} from '../../shared/protocol.js';
import { createLogger } from '../../shared/logger.js';
import type { CancelOutcome, SubmitOutcome } from '../execution/exchange-gateway.js';
import { ADOPTED_STRATEGY_ID, type ReconciliationEngine } from '../reconciliation/reconciliation-engine.js';
import type { RiskController } from '../risk/risk-controller.js';
import type { Strategy, StrategyContext, StrategyRegistration } from './strategy.js';

const logger = createLogger('StrategyRunner');

/** The gateway operations the runner drives. */
export interface OrderGateway {
  submit(request: OrderRequest): Promise<SubmitOutcome>;
  cancel(clientOrderId: string): Promise<CancelOutcome>;
}

export interface SnapshotSource {
  getSnapshot(symbol: string): MarketSnapshot | undefined;
}

export interface StrategyRunnerDeps {
  gateway: OrderGateway;
  reconciler: ReconciliationEngine;
  risk: RiskController;
  market: SnapshotSource;
  newOrderId?: () => string;
}

export interface StrategyStatus {
  id: string;
  symbols: string[];
  market_updates: number;
  fills: number;
  intents: number;
  admitted: number;
  denied: number;
  callback_errors: number;
}

export interface StrategyRunnerEvents {
  intent_result: (strategyId: string, result: IntentResult) => void;
}

export declare interface StrategyRunner {
  on<U extends keyof StrategyRunnerEvents>(event: U, listener: StrategyRunnerEvents[U]): this;
  emit<U extends keyof StrategyRunnerEvents>(
    event: U,
    ...args: Parameters<StrategyRunnerEvents[U]>
  ): boolean;
}

interface StrategyHost {
  id: string;
  strategy: Strategy;
  symbols: Set<string>;
  registration: StrategyRegistration;
  context: StrategyContext;
  mailbox: Promise<void>;
  status: StrategyStatus;
}

export class StrategyRunner extends EventEmitter {
  private readonly deps: StrategyRunnerDeps;
  private readonly newOrderId: () => string;
  private hosts = new Map<string, StrategyHost>();
  private inFlight = new Set<Promise<void>>();
  private queued = 0;
  private running = false;

  constructor(deps: StrategyRunnerDeps) {
    super();
    this.deps = deps;
    this.newOrderId = deps.newOrderId ?? uuidv4;
  }

  /**
   * Register a strategy instance. Only allowed before start().
   */
  register(registration: StrategyRegistration): this {
    if (this.running) {
      throw new Error(`Cannot register strategy ${registration.id}: runner already started`);
    }
    if (this.hosts.has(registration.id)) {
      throw new Error(`Duplicate strategy id: ${registration.id}`);
    }
    if (registration.id === ADOPTED_STRATEGY_ID) {
      throw new Error(`Strategy id ${ADOPTED_STRATEGY_ID} is reserved for adopted orders`);
    }
    if (registration.symbols.length === 0) {
      throw new Error(`Strategy ${registration.id} has no symbols`);
    }

    this.hosts.set(registration.id, {
      id: registration.id,
      strategy: registration.strategy,
      symbols: new Set(registration.symbols),
      registration,
      context: this.createContext(registration),
      mailbox: Promise.resolve(),
      status: {
        id: registration.id,
        symbols: [...registration.symbols],
        market_updates: 0,
        fills: 0,
        intents: 0,
        admitted: 0,
        denied: 0,
        callback_errors: 0,
      },
    });
    logger.info({ strategy_id: registration.id, symbols: registration.symbols }, 'Strategy registered');
    return this;
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * All symbols any registered strategy trades.
   */
  symbols(): string[] {
    const all = new Set<string>();
    for (const host of this.hosts.values()) {
      for (const symbol of host.symbols) all.add(symbol);
    }
    return [...all];
  }

  handleMarketUpdate(snapshot: MarketSnapshot): void {
    if (!this.running) return;
    for (const host of this.hosts.values()) {
      if (!host.symbols.has(snapshot.symbol)) continue;
      this.post(host, () => {
        host.status.market_updates++;
        this.process(host, () => host.strategy.onMarketUpdate(snapshot, host.context));
      });
    }
  }

  handleFill(fill: Fill, order: Order): void {
    if (!this.running) return;
    const host = this.hosts.get(order.strategy_id);
    if (!host) return;
    this.post(host, () => {
      host.status.fills++;
      this.process(host, () => host.strategy.onFill(fill, host.context));
    });
  }

  /**
   * Resolves once every mailbox is drained and no gateway call is in flight.
   */
  async idle(): Promise<void> {
    while (!this.isIdle()) {
      await Promise.all([...this.inFlight, ...Array.from(this.hosts.values(), (h) => h.mailbox)]);
    }
  }

  isIdle(): boolean {
    return this.queued === 0 && this.inFlight.size === 0;
  }

  getStatus(): StrategyStatus[] {
    return Array.from(this.hosts.values(), (h) => ({ ...h.status, symbols: [...h.status.symbols] }));
  }

  // --- Private methods ---

  /**
   * Append work to a strategy's mailbox so its callbacks never overlap.
   */
  private post(host: StrategyHost, work: () => void): void {
    this.queued++;
    host.mailbox = host.mailbox
      .then(work)
      .catch((error: unknown) => {
        logger.error({ err: error, strategy_id: host.id }, 'Strategy mailbox task failed');
      })
      .finally(() => {
        this.queued--;
      });
  }

  private process(host: StrategyHost, produce: () => Intent[]): void {
    let intents: Intent[];
    try {
      intents = produce();
    } catch (error) {
      host.status.callback_errors++;
      logger.error({ err: error, strategy_id: host.id }, 'Strategy callback threw');
      return;
    }

    for (const intent of intents) {
      host.status.intents++;
      if (intent.kind === 'place') {
        this.dispatchPlace(host, intent);
      } else {
        this.dispatchCancel(host, intent);
      }
    }
  }

  private dispatchPlace(host: StrategyHost, intent: PlaceOrderIntent): void {
    const { risk, reconciler } = this.deps;

    if (!host.symbols.has(intent.symbol)) {
      this.deny(host, { kind: 'place', status: 'denied', intent, reason: 'symbol_not_permitted' });
      return;
    }

    // Admission and registration share one synchronous step, so a second
    // intent always sees the first one's pending order.
    const decision = risk.admit(intent, risk.getPosition(intent.symbol), reconciler.view, host.registration.limits);
    if (!decision.allowed) {
      this.deny(host, { kind: 'place', status: 'denied', intent, reason: decision.reason });
      return;
    }

    const order = reconciler.track({
      client_order_id: this.newOrderId(),
      strategy_id: host.id,
      symbol: intent.symbol,
      side: intent.side,
      type: intent.type,
      price: intent.type === 'limit' ? intent.price ?? null : null,
      quantity: intent.quantity,
    });
    host.status.admitted++;
    logger.info({
      strategy_id: host.id,
      client_order_id: order.client_order_id,
      symbol: intent.symbol,
      side: intent.side,
      quantity: intent.quantity,
      price: intent.price,
    }, 'Intent admitted');

    this.background(this.submit(host, intent, order));
  }

  private async submit(host: StrategyHost, intent: PlaceOrderIntent, order: Order): Promise<void> {
    const { gateway, reconciler } = this.deps;
    const outcome = await gateway.submit({
      client_order_id: order.client_order_id,
      symbol: order.symbol,
      side: order.side,
      type: order.type,
      price: order.price,
      quantity: order.quantity,
    });
    await reconciler.recordSubmitOutcome(order.client_order_id, outcome);

    const id = order.client_order_id;
    switch (outcome.status) {
      case 'accepted':
        this.deliver(host, {
          kind: 'place',
          status: 'accepted',
          intent,
          client_order_id: id,
          exchange_order_id: outcome.exchange_order_id,
        });
        break;
      case 'rejected':
        this.deliver(host, { kind: 'place', status: 'rejected', intent, client_order_id: id, reason: outcome.reason });
        break;
      case 'unavailable':
        this.deliver(host, { kind: 'place', status: 'unknown', intent, client_order_id: id });
        break;
    }
  }

  private dispatchCancel(host: StrategyHost, intent: CancelOrderIntent): void {
    const { risk, reconciler } = this.deps;
    const order = reconciler.view.get(intent.client_order_id);

    if (!order || order.strategy_id !== host.id) {
      this.deny(host, { kind: 'cancel', status: 'denied', intent, reason: 'unknown_order' });
      return;
    }

    const decision = risk.admit(intent, risk.getPosition(order.symbol), reconciler.view, host.registration.limits);
    if (!decision.allowed) {
      this.deny(host, { kind: 'cancel', status: 'denied', intent, reason: decision.reason });
      return;
    }
    host.status.admitted++;

    if (isTerminal(order.state)) {
      this.report(host, { kind: 'cancel', status: 'already_terminal', intent });
      return;
    }

    this.background(this.cancel(host, intent, order));
  }

  private async cancel(host: StrategyHost, intent: CancelOrderIntent, order: Order): Promise<void> {
    const { gateway, reconciler } = this.deps;
    const id = order.client_order_id;

    if (order.state === 'unknown') {
      // Unknown orders must be reconciled before anything else is sent
      await reconciler.resolve(id);
      const current = reconciler.view.get(id);
      if (current && isTerminal(current.state)) {
        this.deliver(host, { kind: 'cancel', status: 'already_terminal', intent });
        return;
      }
    }

    const outcome = await gateway.cancel(id);
    await reconciler.recordCancelOutcome(id, outcome);
    this.deliver(host, { kind: 'cancel', status: outcome.status, intent });
  }

  private deny(host: StrategyHost, result: Extract<IntentResult, { status: 'denied' }>): void {
    host.status.denied++;
    logger.info({ strategy_id: host.id, kind: result.kind, reason: result.reason }, 'Intent denied');
    this.report(host, result);
  }

  /**
   * Synchronous delivery, used while the strategy's own mailbox task runs.
   */
  private report(host: StrategyHost, result: IntentResult): void {
    this.emit('intent_result', host.id, result);
    if (!host.strategy.onIntentResult) return;
    try {
      host.strategy.onIntentResult(result, host.context);
    } catch (error) {
      host.status.callback_errors++;
      logger.error({ err: error, strategy_id: host.id }, 'Strategy onIntentResult threw');
    }
  }

  /**
   * Delivery from an async gateway completion, serialized through the mailbox.
   */
  private deliver(host: StrategyHost, result: IntentResult): void {
    this.post(host, () => this.report(host, result));
  }

  private background(task: Promise<void>): void {
    const tracked = task.catch((error: unknown) => {
      logger.error({ err: error }, 'Intent execution failed');
    });
    this.inFlight.add(tracked);
    void tracked.finally(() => this.inFlight.delete(tracked));
  }

  private createContext(registration: StrategyRegistration): StrategyContext {
    const { reconciler, market } = this.deps;
    const strategyId = registration.id;
    const symbols = [...registration.symbols];
    const allowed = new Set(symbols);

    return {
      strategyId,
      symbols,
      snapshot: (symbol) => (allowed.has(symbol) ? market.getSnapshot(symbol) : undefined),
      order: (clientOrderId) => {
        const order = reconciler.view.get(clientOrderId);
        return order && order.strategy_id === strategyId ? order : undefined;
      },
      orders: (filter = {}) => reconciler.view.list({ ...filter, strategyId }),
      liveOrders: (symbol) => reconciler.view.list({ symbol, strategyId, states: [...LIVE_STATES] }),
    };
  }
}
