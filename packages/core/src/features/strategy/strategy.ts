import type {
  Fill,
  Intent,
  IntentResult,
  MarketSnapshot,
  Order,
  OrderState,
} from '../../shared/protocol.js';
import type { RiskLimits } from '../risk/risk-controller.js';

/**
 * What a strategy may look at: snapshots for its own symbols and its own
 * orders. Everything returned is a copy.
 */
export interface StrategyContext {
  readonly strategyId: string;
  readonly symbols: ReadonlyArray<string>;
  snapshot(symbol: string): MarketSnapshot | undefined;
  order(clientOrderId: string): Order | undefined;
  orders(filter?: { symbol?: string; states?: ReadonlyArray<OrderState> }): Order[];
  liveOrders(symbol?: string): Order[];
}

/**
 * A pluggable trading strategy. Callbacks must be synchronous and free of
 * I/O; they return intents and never talk to the exchange themselves.
 */
export interface Strategy {
  onMarketUpdate(snapshot: MarketSnapshot, context: StrategyContext): Intent[];
  onFill(fill: Fill, context: StrategyContext): Intent[];
  onIntentResult?(result: IntentResult, context: StrategyContext): void;
}

export interface StrategyRegistration {
  id: string;
  strategy: Strategy;
  symbols: string[];
  /** Per-strategy tightening of the risk limits. */
  limits?: Partial<RiskLimits>;
}
