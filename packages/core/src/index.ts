// Shared
export * from './shared/protocol.js';
export * from './shared/config.js';
export * from './shared/errors.js';
export { createLogger, sanitizeUrl, setLogLevel, type Logger } from './shared/logger.js';

// Features: execution
export type { ExchangeClient, FeedHandlers, Unsubscribe } from './features/execution/exchange-client.js';
export { RateLimiter } from './features/execution/rate-limiter.js';
export {
  ExchangeGateway,
  backoffDelay,
  type ExchangeGatewayOptions,
  type SyncOutcome,
  type SubmitOutcome,
  type CancelOutcome,
  type StatusOutcome,
} from './features/execution/exchange-gateway.js';

// Features: market data
export { MarketDataFeed, type MarketDataFeedEvents } from './features/market-data/market-data-feed.js';

// Features: orders
export {
  OrderLedger,
  canTransition,
  type OrderLedgerView,
  type OrderFilter,
  type TransitionResult,
  type FillResult,
} from './features/orders/order-ledger.js';

// Features: reconciliation
export {
  ReconciliationEngine,
  ADOPTED_STRATEGY_ID,
  type ReconciliationEvents,
  type StatusSource,
} from './features/reconciliation/reconciliation-engine.js';

// Features: risk
export { PositionBook } from './features/risk/position-book.js';
export {
  RiskController,
  type RiskLimits,
  type RiskLimitsConfig,
  type AdmissionDecision,
  type PriceSource,
} from './features/risk/risk-controller.js';

// Features: strategy
export * from './features/strategy/index.js';

// Features: simulator
export {
  SimulatedExchange,
  type SimulatedOperation,
  type FaultOptions,
  type RandomWalkOptions,
} from './features/simulator/simulated-exchange.js';

// Root
export {
  TradingEngine,
  type EngineState,
  type EngineStatus,
  type TradingEngineOptions,
  type TradingEngineEvents,
} from './engine.js';
