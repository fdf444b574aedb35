import {
  ExchangeRequestError,
  type AccountFill,
  type ExchangeClient,
  type ExchangeCredentials,
  type FeedHandlers,
  type OrderAck,
  type OrderRequest,
  type OpenOrderReport,
  type OrderStatusReport,
  type ReportedOrderState,
  type Unsubscribe,
} from '@ordercraft/core';
import { CoinbaseApi } from './coinbase-api.js';
import { CoinbaseFeed } from './coinbase-feed.js';
import { fillId, formatDecimal, type CoinbaseFill, type CoinbaseOrder, type CoinbaseOrderRequest } from './types.js';

export interface CoinbaseConnectorConfig {
  apiUrl: string;
  wsUrl: string;
  credentials: ExchangeCredentials;
  requestTimeoutMs?: number;
}

/**
 * Map a Coinbase order status to the state the ledger understands.
 */
export function mapOrderState(order: CoinbaseOrder): ReportedOrderState {
  switch (order.status) {
    case 'received':
    case 'pending':
      return 'pending';
    case 'open':
    case 'active':
      return 'open';
    case 'rejected':
      return 'rejected';
    case 'done':
      if (order.done_reason === 'filled') return 'filled';
      if (order.done_reason === 'rejected') return 'rejected';
      return 'cancelled';
    default:
      return 'open';
  }
}

export class CoinbaseConnector implements ExchangeClient {
  public readonly exchange = 'coinbase';
  private readonly api: CoinbaseApi;
  private readonly feed: CoinbaseFeed;
  /** Adopted orders placed without a client_oid, addressed by exchange id. */
  private readonly foreignOrders = new Set<string>();

  constructor(config: CoinbaseConnectorConfig) {
    this.api = new CoinbaseApi({
      apiUrl: config.apiUrl,
      credentials: config.credentials,
      timeoutMs: config.requestTimeoutMs,
    });
    this.feed = new CoinbaseFeed({ wsUrl: config.wsUrl, credentials: config.credentials });
  }

  async connect(): Promise<void> {
    this.feed.connect();
  }

  async disconnect(): Promise<void> {
    this.feed.disconnect();
  }

  isHealthy(): boolean {
    return this.feed.isConnected();
  }

  async submitOrder(request: OrderRequest): Promise<OrderAck> {
    const order = await this.api.placeOrder(this.mapToCoinbaseOrder(request));
    if (order.status === 'rejected') {
      throw new ExchangeRequestError('rejected', order.reject_reason ?? 'Order rejected');
    }

    this.feed.trackOrder(order.id, request.client_order_id);
    return { client_order_id: request.client_order_id, exchange_order_id: order.id };
  }

  async cancelOrder(clientOrderId: string): Promise<void> {
    if (this.foreignOrders.has(clientOrderId)) {
      await this.api.cancelOrder(clientOrderId);
      return;
    }
    await this.api.cancelOrderByClientId(clientOrderId);
  }

  async queryOrder(clientOrderId: string): Promise<OrderStatusReport | null> {
    const order = this.foreignOrders.has(clientOrderId)
      ? await this.api.getOrder(clientOrderId)
      : await this.api.getOrderByClientId(clientOrderId);
    if (!order) {
      return null;
    }

    const fills = await this.api.getFills(order.id);
    return {
      client_order_id: clientOrderId,
      exchange_order_id: order.id,
      state: mapOrderState(order),
      filled_quantity: parseFloat(order.filled_size),
      fills: fills.map((fill) => this.mapFill(fill)),
      reason: order.reject_reason,
    };
  }

  async listOpenOrders(symbols: string[]): Promise<OpenOrderReport[]> {
    const wanted = new Set(symbols);
    const orders = (await this.api.getOpenOrders()).filter((order) => wanted.has(order.product_id));

    const reports: OpenOrderReport[] = [];
    for (const order of orders) {
      const clientOrderId = order.client_oid || order.id;
      if (!order.client_oid) {
        this.foreignOrders.add(order.id);
      }
      this.feed.trackOrder(order.id, clientOrderId);

      const filled = parseFloat(order.filled_size);
      const fills = filled > 0 ? await this.api.getFills(order.id) : [];
      reports.push({
        client_order_id: clientOrderId,
        exchange_order_id: order.id,
        state: mapOrderState(order),
        filled_quantity: filled,
        fills: fills.map((fill) => this.mapFill(fill)),
        symbol: order.product_id,
        side: order.side,
        type: order.type === 'market' ? 'market' : 'limit',
        price: order.price === undefined ? null : parseFloat(order.price),
        quantity: order.size === undefined ? filled : parseFloat(order.size),
      });
    }
    return reports;
  }

  async listFills(symbols: string[]): Promise<AccountFill[]> {
    const fills: AccountFill[] = [];
    for (const symbol of symbols) {
      // newest first on the wire
      const page = await this.api.getProductFills(symbol);
      for (const fill of page.reverse()) {
        fills.push({
          ...this.mapFill(fill),
          exchange_order_id: fill.order_id,
          symbol: fill.product_id,
          side: fill.side,
        });
      }
    }
    return fills.sort((a, b) => a.timestamp - b.timestamp);
  }

  subscribe(symbols: string[], handlers: FeedHandlers): Unsubscribe {
    return this.feed.subscribe(symbols, handlers);
  }

  // --- Mapping helpers ---

  private mapToCoinbaseOrder(request: OrderRequest): CoinbaseOrderRequest {
    const order: CoinbaseOrderRequest = {
      client_oid: request.client_order_id,
      product_id: request.symbol,
      side: request.side,
      type: request.type,
      size: formatDecimal(request.quantity),
    };
    if (request.type === 'limit' && request.price !== null) {
      order.price = formatDecimal(request.price);
      order.time_in_force = 'GTC';
    }
    return order;
  }

  private mapFill(fill: CoinbaseFill): OrderStatusReport['fills'][number] {
    return {
      exchange_fill_id: fillId(fill.order_id, fill.trade_id),
      quantity: parseFloat(fill.size),
      price: parseFloat(fill.price),
      timestamp: Date.parse(fill.created_at),
    };
  }
}
