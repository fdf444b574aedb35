import type {
  AccountFill,
  ExchangeEvent,
  MarketEvent,
  OrderAck,
  OrderRequest,
  OrderStatusReport,
  OpenOrderReport,
} from '../../shared/protocol.js';

export interface FeedHandlers {
  onMarketEvent(event: MarketEvent): void;
  onExchangeEvent(event: ExchangeEvent): void;
  /**
   * The stream came back after a drop. Order events sent in between are
   * lost, so live orders must be re-queried.
   */
  onReconnect?(): void;
}

export type Unsubscribe = () => void;

/**
 * Capability interface every exchange connector implements.
 *
 * Failures are thrown as ExchangeRequestError so the gateway can tell a
 * business rejection from a request that may or may not have landed.
 */
export interface ExchangeClient {
  readonly exchange: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** `client_order_id` is sent as the exchange-side idempotency key. */
  submitOrder(request: OrderRequest): Promise<OrderAck>;
  /** Throws `not_found` or `already_terminal` ExchangeRequestErrors. */
  cancelOrder(clientOrderId: string): Promise<void>;
  /** Resolves null when the exchange has no order with this id. */
  queryOrder(clientOrderId: string): Promise<OrderStatusReport | null>;
  /**
   * Resting orders on the account for these symbols. An order placed
   * without a client id is reported under its exchange id.
   */
  listOpenOrders(symbols: string[]): Promise<OpenOrderReport[]>;
  /** Every account fill for these symbols, oldest first. */
  listFills(symbols: string[]): Promise<AccountFill[]>;
  subscribe(symbols: string[], handlers: FeedHandlers): Unsubscribe;
  isHealthy(): boolean;
}
