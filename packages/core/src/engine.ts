// ============================================================
// TradingEngine: wires the market feed, gateway, ledger,
// reconciliation, risk and strategy runner around one
// exchange client, and owns their lifecycle.
// ============================================================

import { EventEmitter } from 'events';
import type { EngineConfig } from './shared/config.js';
import { createLogger } from './shared/logger.js';
import type { Alert, Fill, IntentResult, MarketSnapshot, Order, Position } from './shared/protocol.js';
import type { ExchangeClient, Unsubscribe } from './features/execution/exchange-client.js';
import { ExchangeGateway } from './features/execution/exchange-gateway.js';
import { MarketDataFeed } from './features/market-data/market-data-feed.js';
import { OrderLedger, type OrderLedgerView } from './features/orders/order-ledger.js';
import { ReconciliationEngine } from './features/reconciliation/reconciliation-engine.js';
import { RiskController, type RiskLimitsConfig } from './features/risk/risk-controller.js';
import { StrategyRunner, type StrategyStatus } from './features/strategy/strategy-runner.js';
import type { StrategyRegistration } from './features/strategy/strategy.js';

const logger = createLogger('TradingEngine');

const EVICTION_INTERVAL_MS = 60_000;

export type EngineState = 'stopped' | 'starting' | 'running' | 'stopping';

export interface EngineStatus {
  state: EngineState;
  exchange: string;
  exchangeHealthy: boolean;
  strategies: StrategyStatus[];
  trackedOrders: number;
  liveOrders: number;
  quarantinedOrders: number;
  positions: Position[];
  queuedRequests: number;
  uptimeSeconds: number;
}

export interface TradingEngineOptions {
  riskLimits: RiskLimitsConfig;
  now?: () => number;
  newOrderId?: () => string;
}

export interface TradingEngineEvents {
  snapshot: (snapshot: MarketSnapshot) => void;
  order_update: (order: Order) => void;
  fill: (fill: Fill, order: Order) => void;
  position_update: (position: Position) => void;
  intent_result: (strategyId: string, result: IntentResult) => void;
  alert: (alert: Alert) => void;
  stopped: () => void;
}

export declare interface TradingEngine {
  on<U extends keyof TradingEngineEvents>(event: U, listener: TradingEngineEvents[U]): this;
  emit<U extends keyof TradingEngineEvents>(
    event: U,
    ...args: Parameters<TradingEngineEvents[U]>
  ): boolean;
}

export class TradingEngine extends EventEmitter {
  private readonly config: EngineConfig;
  private readonly client: ExchangeClient;
  private readonly now: () => number;

  readonly feed: MarketDataFeed;
  readonly gateway: ExchangeGateway;
  readonly reconciler: ReconciliationEngine;
  readonly risk: RiskController;
  readonly runner: StrategyRunner;

  private state: EngineState = 'stopped';
  private startTime = 0;
  private unsubscribe: Unsubscribe | null = null;
  private resolveTimer: NodeJS.Timeout | null = null;
  private evictionTimer: NodeJS.Timeout | null = null;

  constructor(config: EngineConfig, client: ExchangeClient, options: TradingEngineOptions) {
    super();
    this.config = config;
    this.client = client;
    this.now = options.now ?? Date.now;

    this.feed = new MarketDataFeed(this.now);
    this.gateway = new ExchangeGateway(client, { rateLimit: config.rateLimit, retry: config.retry });
    this.reconciler = new ReconciliationEngine(new OrderLedger(this.now), this.gateway, this.now);
    this.risk = new RiskController(options.riskLimits, this.feed);
    this.runner = new StrategyRunner({
      gateway: this.gateway,
      reconciler: this.reconciler,
      risk: this.risk,
      market: this.feed,
      newOrderId: options.newOrderId,
    });

    this.wirePipelineEvents();
  }

  get orders(): OrderLedgerView {
    return this.reconciler.view;
  }

  /**
   * Add a strategy. Only allowed before start().
   */
  registerStrategy(registration: StrategyRegistration): this {
    this.runner.register(registration);
    return this;
  }

  async start(): Promise<void> {
    if (this.state !== 'stopped') {
      throw new Error(`Cannot start engine: state is ${this.state}`);
    }

    this.state = 'starting';
    this.startTime = this.now();
    logger.info({ exchange: this.client.exchange }, 'Starting trading engine');

    try {
      await this.client.connect();
    } catch (error) {
      this.state = 'stopped';
      throw error;
    }

    const symbols = this.runner.symbols();
    this.unsubscribe = this.client.subscribe(symbols, {
      onMarketEvent: (event) => {
        this.feed.ingest(event);
      },
      onExchangeEvent: (event) => {
        void this.reconciler.ingest(event);
      },
      onReconnect: () => {
        logger.warn({ exchange: this.client.exchange }, 'Exchange stream reconnected, re-querying live orders');
        void this.reconciler.resolveLive();
      },
    });

    try {
      await this.syncAccount(symbols);
    } catch (error) {
      logger.error({ err: error, exchange: this.client.exchange }, 'Account sync failed');
      this.unsubscribe?.();
      this.unsubscribe = null;
      await this.disconnectClient();
      this.state = 'stopped';
      throw error;
    }

    this.runner.start();

    this.resolveTimer = setInterval(() => {
      void this.reconciler.resolveUnknown();
    }, this.config.resolveIntervalMs);
    this.evictionTimer = setInterval(() => {
      this.reconciler.evictExpired(this.config.auditRetentionMs);
    }, Math.min(EVICTION_INTERVAL_MS, Math.max(this.config.auditRetentionMs, 1000)));

    this.state = 'running';
    logger.info({ exchange: this.client.exchange, symbols, strategies: this.runner.getStatus().length }, 'Trading engine started');
  }

  /**
   * Stop the engine: no new intents, optionally cancel live orders, wait
   * for in-flight work, disconnect.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped' || this.state === 'stopping') {
      return;
    }

    this.state = 'stopping';
    logger.info('Stopping trading engine');

    this.runner.stop();
    if (this.resolveTimer) {
      clearInterval(this.resolveTimer);
      this.resolveTimer = null;
    }
    if (this.evictionTimer) {
      clearInterval(this.evictionTimer);
      this.evictionTimer = null;
    }

    await this.runner.idle();

    if (this.config.cancelOnShutdown) {
      await this.cancelLiveOrders();
    }

    await this.reconciler.idle();

    this.unsubscribe?.();
    this.unsubscribe = null;
    this.gateway.dispose();

    await this.disconnectClient();

    this.state = 'stopped';
    logger.info('Trading engine stopped');
    this.emit('stopped');
  }

  /**
   * Resolves once strategies, gateway calls and reconciliation are all quiet.
   */
  async idle(): Promise<void> {
    while (!this.runner.isIdle() || !this.reconciler.isIdle()) {
      await this.runner.idle();
      await this.reconciler.idle();
    }
  }

  getStatus(): EngineStatus {
    const view = this.reconciler.view;
    return {
      state: this.state,
      exchange: this.client.exchange,
      exchangeHealthy: this.client.isHealthy(),
      strategies: this.runner.getStatus(),
      trackedOrders: view.size(),
      liveOrders: view.liveOrders().length,
      quarantinedOrders: view.list().filter((o) => o.quarantined).length,
      positions: this.risk.getPositions(),
      queuedRequests: this.gateway.queuedRequests(),
      uptimeSeconds: this.startTime > 0 && this.state !== 'stopped'
        ? Math.floor((this.now() - this.startTime) / 1000)
        : 0,
    };
  }

  // --- Private methods ---

  /**
   * Rebuild positions from the account's fill history and take over
   * orders already resting on the exchange, before any strategy runs.
   */
  private async syncAccount(symbols: string[]): Promise<void> {
    const outcome = await this.gateway.fetchAccount(symbols);
    if (outcome.status === 'unavailable') {
      throw outcome.error;
    }

    for (const fill of outcome.fills) {
      this.risk.restoreFill(fill);
    }

    let adopted = 0;
    for (const report of outcome.orders) {
      if (!(report.quantity > 0)) {
        logger.warn({ exchange_order_id: report.exchange_order_id }, 'Resting order without a size skipped');
        continue;
      }
      const history = outcome.fills
        .filter((f) => f.exchange_order_id === report.exchange_order_id)
        .map(({ exchange_fill_id, quantity, price, timestamp }) => ({ exchange_fill_id, quantity, price, timestamp }));
      if (this.reconciler.adopt(report, history)) {
        adopted++;
      }
    }

    logger.info({ fills: outcome.fills.length, orders: adopted, positions: this.risk.getPositions().length }, 'Account state restored');
  }

  private async disconnectClient(): Promise<void> {
    try {
      await this.client.disconnect();
    } catch (error) {
      logger.error({ err: error, exchange: this.client.exchange }, 'Error disconnecting exchange client');
    }
  }

  private async cancelLiveOrders(): Promise<void> {
    const live = this.reconciler.view.liveOrders().filter((o) => !o.quarantined);
    logger.info({ count: live.length }, 'Cancelling live orders before shutdown');

    await Promise.all(live.map(async (order) => {
      const outcome = await this.gateway.cancel(order.client_order_id);
      await this.reconciler.recordCancelOutcome(order.client_order_id, outcome);
    }));
  }

  private wirePipelineEvents(): void {
    this.feed.on('snapshot', (snapshot) => {
      this.emit('snapshot', snapshot);
      this.runner.handleMarketUpdate(snapshot);
    });

    // Positions move only on fills the ledger accepted
    this.reconciler.on('fill', (fill, order) => {
      this.risk.applyFill(order, fill);
      this.emit('fill', fill, order);
      this.runner.handleFill(fill, order);
    });

    this.reconciler.on('order_update', (order) => {
      this.emit('order_update', order);
    });

    this.reconciler.on('alert', (alert) => {
      this.emit('alert', alert);
    });

    this.risk.onPositionUpdate((position) => {
      this.emit('position_update', position);
    });

    this.runner.on('intent_result', (strategyId, result) => {
      this.emit('intent_result', strategyId, result);
    });
  }
}
