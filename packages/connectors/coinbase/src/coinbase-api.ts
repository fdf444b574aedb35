import { z } from 'zod';
import { createLogger, ExchangeRequestError, type ExchangeCredentials } from '@ordercraft/core';
import { buildAuthHeaders } from './coinbase-auth.js';
import {
  coinbaseErrorSchema,
  coinbaseFillSchema,
  coinbaseOrderSchema,
  type CoinbaseFill,
  type CoinbaseOrder,
  type CoinbaseOrderRequest,
} from './types.js';

const logger = createLogger('CoinbaseApi');

const MAX_ERROR_BODY = 200;

/** Coinbase's default page size for list endpoints. */
const PAGE_SIZE = 100;

export interface CoinbaseApiConfig {
  apiUrl: string;
  credentials: ExchangeCredentials;
  timeoutMs?: number;
}

/**
 * Map an HTTP failure to the error kind the gateway acts on.
 */
export function classifyHttpError(status: number, message: string): ExchangeRequestError {
  if (status === 429) {
    return new ExchangeRequestError('rate_limited', message, status);
  }
  if (status >= 500) {
    return new ExchangeRequestError('server', message, status);
  }
  if (status === 404) {
    return new ExchangeRequestError('not_found', message, status);
  }
  if (status === 400 && /done|already/i.test(message)) {
    return new ExchangeRequestError('already_terminal', message, status);
  }
  return new ExchangeRequestError('rejected', message, status);
}

export class CoinbaseApi {
  private readonly apiUrl: string;
  private readonly credentials: ExchangeCredentials;
  private readonly timeoutMs: number;

  constructor(config: CoinbaseApiConfig) {
    this.apiUrl = config.apiUrl.replace(/\/+$/, '');
    this.credentials = config.credentials;
    this.timeoutMs = config.timeoutMs ?? 10_000;
  }

  /**
   * Place an order. `client_oid` makes the request idempotent.
   */
  async placeOrder(order: CoinbaseOrderRequest): Promise<CoinbaseOrder> {
    return this.request('POST', '/orders', coinbaseOrderSchema, order);
  }

  /**
   * Cancel an order by its client id. Resolves with the exchange order id.
   */
  async cancelOrderByClientId(clientOid: string): Promise<string> {
    return this.request('DELETE', `/orders/client:${encodeURIComponent(clientOid)}`, z.string());
  }

  /**
   * Look up an order by its client id. Resolves null when the exchange has
   * no such order.
   */
  async getOrderByClientId(clientOid: string): Promise<CoinbaseOrder | null> {
    try {
      return await this.request('GET', `/orders/client:${encodeURIComponent(clientOid)}`, coinbaseOrderSchema);
    } catch (error) {
      if (error instanceof ExchangeRequestError && error.kind === 'not_found') {
        return null;
      }
      throw error;
    }
  }

  /**
   * All fills for one exchange order, across every page.
   */
  async getFills(orderId: string): Promise<CoinbaseFill[]> {
    return this.requestAll(`/fills?order_id=${encodeURIComponent(orderId)}`, coinbaseFillSchema);
  }

  /**
   * All fills on the account for one product, newest first.
   */
  async getProductFills(productId: string): Promise<CoinbaseFill[]> {
    return this.requestAll(`/fills?product_id=${encodeURIComponent(productId)}`, coinbaseFillSchema);
  }

  /**
   * Every open, pending or active order on the account.
   */
  async getOpenOrders(): Promise<CoinbaseOrder[]> {
    return this.requestAll('/orders', coinbaseOrderSchema);
  }

  /**
   * Look up an order by its exchange id. Resolves null when it is gone.
   */
  async getOrder(orderId: string): Promise<CoinbaseOrder | null> {
    try {
      return await this.request('GET', `/orders/${encodeURIComponent(orderId)}`, coinbaseOrderSchema);
    } catch (error) {
      if (error instanceof ExchangeRequestError && error.kind === 'not_found') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Cancel an order by its exchange id.
   */
  async cancelOrder(orderId: string): Promise<string> {
    return this.request('DELETE', `/orders/${encodeURIComponent(orderId)}`, z.string());
  }

  /**
   * Follow the `cb-after` cursor until a short page or no cursor comes back.
   */
  private async requestAll<T>(path: string, itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const schema = z.array(itemSchema);
    const items: T[] = [];
    let after: string | null = null;

    for (;;) {
      const pagePath: string = after === null
        ? path
        : `${path}${path.includes('?') ? '&' : '?'}after=${encodeURIComponent(after)}`;
      const page = await this.send('GET', pagePath, schema);
      items.push(...page.data);

      if (page.after === null || page.after === after || page.data.length < PAGE_SIZE) {
        return items;
      }
      after = page.after;
    }
  }

  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    payload?: unknown,
  ): Promise<T> {
    const page = await this.send(method, path, schema, payload);
    return page.data;
  }

  /**
   * Execute a signed request and validate the response body.
   */
  private async send<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    payload?: unknown,
  ): Promise<{ data: T; after: string | null }> {
    const body = payload === undefined ? '' : JSON.stringify(payload);
    const headers = buildAuthHeaders(this.credentials, method, path, body);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(`${this.apiUrl}${path}`, {
        method,
        headers,
        body: body === '' ? undefined : body,
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ExchangeRequestError('timeout', `${method} ${path} timed out after ${this.timeoutMs}ms`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ExchangeRequestError('network', `${method} ${path} failed: ${message}`);
    } finally {
      clearTimeout(timer);
    }

    const data = parseJson(text);

    if (!response.ok) {
      const parsed = coinbaseErrorSchema.safeParse(data);
      const message = parsed.success ? parsed.data.message : truncate(text);
      logger.warn({ method, path, status: response.status, message }, 'Coinbase API error');
      throw classifyHttpError(response.status, message);
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ExchangeRequestError(
        'server',
        `Coinbase API returned an unexpected response (${response.status}): ${truncate(text)}`,
        response.status,
      );
    }
    return { data: result.data, after: response.headers.get('cb-after') };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}...` : text;
}
