// --- Orders ---

export type OrderSide = 'buy' | 'sell';

export type OrderType = 'limit' | 'market';

export type OrderState =
  | 'pending'
  | 'open'
  | 'partially_filled'
  | 'filled'
  | 'cancelled'
  | 'rejected'
  | 'unknown';

export const TERMINAL_STATES: ReadonlySet<OrderState> = new Set(['filled', 'cancelled', 'rejected']);

/** States that still reserve capacity against risk limits. */
export const LIVE_STATES: ReadonlySet<OrderState> = new Set(['pending', 'open', 'partially_filled', 'unknown']);

export function isTerminal(state: OrderState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface Order {
  client_order_id: string;
  exchange_order_id: string | null;
  strategy_id: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  price: number | null;
  quantity: number;
  filled_quantity: number;
  state: OrderState;
  created_at: number;
  last_updated_at: number;
  /** Highest exchange event sequence applied to this order (0 = none). */
  last_sequence: number;
  quarantined: boolean;
  reject_reason?: string;
}

/** What a caller supplies to start tracking an order. */
export interface OrderDraft {
  client_order_id: string;
  strategy_id: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  price: number | null;
  quantity: number;
}

export interface Fill {
  order_id: string;
  exchange_fill_id: string;
  quantity: number;
  price: number;
  timestamp: number;
}

// --- Positions ---

export interface Position {
  symbol: string;
  net_quantity: number;
  average_entry_price: number;
  realized_pnl: number;
  updated_at: number;
}

// --- Market data ---

export interface MarketSnapshot {
  symbol: string;
  sequence: number;
  best_bid: number | null;
  best_ask: number | null;
  last_trade_price: number | null;
  timestamp: number;
}

export type TickerEvent = {
  type: 'ticker';
  symbol: string;
  sequence: number;
  best_bid: number;
  best_ask: number;
  last_trade_price?: number;
  timestamp: number;
};

export type TradeEvent = {
  type: 'trade';
  symbol: string;
  sequence: number;
  price: number;
  size: number;
  timestamp: number;
};

export type MarketEvent = TickerEvent | TradeEvent;

// --- Private exchange events (order lifecycle) ---

interface ExchangeEventBase {
  /** Either identifier may be missing, but not both. */
  client_order_id?: string;
  exchange_order_id?: string;
  sequence: number;
  timestamp: number;
}

export type AckEvent = ExchangeEventBase & { type: 'ack'; exchange_order_id: string };

export type FillEvent = ExchangeEventBase & {
  type: 'fill';
  exchange_fill_id: string;
  quantity: number;
  price: number;
};

/** Exchange reports the order done with reason "filled". */
export type FilledEvent = ExchangeEventBase & { type: 'filled' };

export type CancelledEvent = ExchangeEventBase & { type: 'cancelled' };

export type RejectedEvent = ExchangeEventBase & { type: 'rejected'; reason: string };

export type ExchangeEvent = AckEvent | FillEvent | FilledEvent | CancelledEvent | RejectedEvent;

// --- Exchange client request/response shapes ---

export interface OrderRequest {
  client_order_id: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  price: number | null;
  quantity: number;
}

export interface OrderAck {
  client_order_id: string;
  exchange_order_id: string;
}

export type ReportedOrderState = Exclude<OrderState, 'unknown'>;

export interface ExchangeFill {
  exchange_fill_id: string;
  quantity: number;
  price: number;
  timestamp: number;
}

export interface OrderStatusReport {
  client_order_id: string;
  exchange_order_id: string | null;
  state: ReportedOrderState;
  filled_quantity: number;
  fills: ExchangeFill[];
  reason?: string;
}

/** A resting order found on the account, with everything needed to track it. */
export interface OpenOrderReport extends OrderStatusReport {
  exchange_order_id: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  price: number | null;
  quantity: number;
}

/** A historical execution on the account, used to rebuild positions. */
export interface AccountFill extends ExchangeFill {
  exchange_order_id: string;
  symbol: string;
  side: OrderSide;
}

// --- Strategy intents ---

export type PlaceOrderIntent = {
  kind: 'place';
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  price?: number;
};

export type CancelOrderIntent = {
  kind: 'cancel';
  client_order_id: string;
};

export type Intent = PlaceOrderIntent | CancelOrderIntent;

export type DenyReason =
  | 'exceeds_position_limit'
  | 'exceeds_order_count'
  | 'notional_too_large'
  | 'no_reference_price'
  | 'invalid_order'
  | 'symbol_not_permitted'
  | 'unknown_order';

export type IntentResult =
  | { kind: 'place'; status: 'denied'; intent: PlaceOrderIntent; reason: DenyReason }
  | { kind: 'place'; status: 'accepted'; intent: PlaceOrderIntent; client_order_id: string; exchange_order_id: string | null }
  | { kind: 'place'; status: 'rejected'; intent: PlaceOrderIntent; client_order_id: string; reason: string }
  | { kind: 'place'; status: 'unknown'; intent: PlaceOrderIntent; client_order_id: string }
  | { kind: 'cancel'; status: 'denied'; intent: CancelOrderIntent; reason: DenyReason }
  | {
      kind: 'cancel';
      status: 'cancelled' | 'not_found' | 'already_terminal' | 'unavailable';
      intent: CancelOrderIntent;
    };

// --- Operator alerts ---

export type AlertCode = 'DATA_INTEGRITY' | 'GATEWAY_UNAVAILABLE';

export interface Alert {
  code: AlertCode;
  client_order_id: string;
  message: string;
  timestamp: number;
}

// --- Quantity arithmetic ---

const QUANTITY_SCALE = 1e8;

/** Round to the exchange base increment (1e-8) so fills sum exactly. */
export function roundQuantity(value: number): number {
  return Math.round(value * QUANTITY_SCALE) / QUANTITY_SCALE;
}

export function addQuantity(a: number, b: number): number {
  return roundQuantity(a + b);
}
