// ============================================================
// ExchangeGateway: rate-limited, retrying front for an
// ExchangeClient. Every operation resolves to an explicit
// outcome; transport failures never escape as exceptions.
// ============================================================

import type { AccountFill, OpenOrderReport, OrderRequest, OrderStatusReport } from '../../shared/protocol.js';
import type { RateLimitConfig, RetryConfig } from '../../shared/config.js';
import { GatewayUnavailableError, toExchangeError, type ExchangeRequestError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { ExchangeClient } from './exchange-client.js';
import { RateLimiter } from './rate-limiter.js';

const logger = createLogger('ExchangeGateway');

export type SubmitOutcome =
  | { status: 'accepted'; exchange_order_id: string | null; report?: OrderStatusReport }
  | { status: 'rejected'; reason: string }
  | { status: 'unavailable'; error: GatewayUnavailableError };

export type CancelOutcome =
  | { status: 'cancelled' }
  | { status: 'not_found' }
  | { status: 'already_terminal' }
  | { status: 'unavailable'; error: GatewayUnavailableError };

export type StatusOutcome =
  | { status: 'found'; report: OrderStatusReport }
  | { status: 'not_found' }
  | { status: 'unavailable'; error: GatewayUnavailableError };

export type SyncOutcome =
  | { status: 'synced'; orders: OpenOrderReport[]; fills: AccountFill[] }
  | { status: 'unavailable'; error: GatewayUnavailableError };

export interface ExchangeGatewayOptions {
  rateLimit: RateLimitConfig;
  retry: RetryConfig;
}

/**
 * Delay before retry number `retry` (1-based): base * 2^(retry-1), capped.
 */
export function backoffDelay(retry: number, config: RetryConfig): number {
  const delay = config.baseDelayMs * 2 ** (retry - 1);
  return Math.min(delay, config.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ExchangeGateway {
  private readonly client: ExchangeClient;
  private readonly limiter: RateLimiter;
  private readonly retry: RetryConfig;

  constructor(client: ExchangeClient, options: ExchangeGatewayOptions) {
    this.client = client;
    this.limiter = new RateLimiter(options.rateLimit);
    this.retry = options.retry;
  }

  /**
   * Submit an order. After a failure that may have reached the exchange,
   * the next attempt looks the order up by client_order_id before it
   * resubmits anything.
   */
  async submit(request: OrderRequest): Promise<SubmitOutcome> {
    const id = request.client_order_id;
    let ambiguous = false;
    let lastError: ExchangeRequestError | null = null;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        await sleep(backoffDelay(attempt - 1, this.retry));
      }

      if (ambiguous) {
        let report: OrderStatusReport | null;
        try {
          report = await this.limiter.schedule(() => this.client.queryOrder(id));
        } catch (error) {
          lastError = toExchangeError(error);
          logger.warn({ client_order_id: id, attempt, kind: lastError.kind }, 'Status query after ambiguous submit failed');
          continue;
        }

        if (report) {
          logger.info({ client_order_id: id, state: report.state }, 'Ambiguous submission found on exchange');
          if (report.state === 'rejected') {
            return { status: 'rejected', reason: report.reason ?? 'rejected' };
          }
          return { status: 'accepted', exchange_order_id: report.exchange_order_id, report };
        }
        logger.info({ client_order_id: id }, 'Ambiguous submission not on exchange, resubmitting');
        ambiguous = false;
      }

      try {
        const ack = await this.limiter.schedule(() => this.client.submitOrder(request));
        logger.info({ client_order_id: id, exchange_order_id: ack.exchange_order_id, attempt }, 'Order accepted');
        return { status: 'accepted', exchange_order_id: ack.exchange_order_id };
      } catch (error) {
        lastError = toExchangeError(error);
        if (!lastError.retryable) {
          logger.info({ client_order_id: id, reason: lastError.message }, 'Order rejected by exchange');
          return { status: 'rejected', reason: lastError.message };
        }
        // A 429 was refused before processing; anything else might have landed
        ambiguous = lastError.kind !== 'rate_limited';
        logger.warn({ client_order_id: id, attempt, kind: lastError.kind, ambiguous }, 'Order submission failed');
      }
    }

    return this.unavailable('submit', { client_order_id: id }, lastError);
  }

  /**
   * Cancel an order by client_order_id.
   */
  async cancel(clientOrderId: string): Promise<CancelOutcome> {
    let lastError: ExchangeRequestError | null = null;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        await sleep(backoffDelay(attempt - 1, this.retry));
      }

      try {
        await this.limiter.schedule(() => this.client.cancelOrder(clientOrderId));
        logger.info({ client_order_id: clientOrderId }, 'Cancel accepted');
        return { status: 'cancelled' };
      } catch (error) {
        lastError = toExchangeError(error);
        if (lastError.kind === 'not_found') {
          return { status: 'not_found' };
        }
        if (lastError.kind === 'already_terminal') {
          return { status: 'already_terminal' };
        }
        if (!lastError.retryable) {
          break;
        }
        logger.warn({ client_order_id: clientOrderId, attempt, kind: lastError.kind }, 'Cancel failed');
      }
    }

    return this.unavailable('cancel', { client_order_id: clientOrderId }, lastError);
  }

  /**
   * Look up the exchange's view of an order by client_order_id.
   */
  async queryStatus(clientOrderId: string): Promise<StatusOutcome> {
    let lastError: ExchangeRequestError | null = null;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        await sleep(backoffDelay(attempt - 1, this.retry));
      }

      try {
        const report = await this.limiter.schedule(() => this.client.queryOrder(clientOrderId));
        return report ? { status: 'found', report } : { status: 'not_found' };
      } catch (error) {
        lastError = toExchangeError(error);
        if (lastError.kind === 'not_found') {
          return { status: 'not_found' };
        }
        if (!lastError.retryable) {
          break;
        }
        logger.warn({ client_order_id: clientOrderId, attempt, kind: lastError.kind }, 'Status query failed');
      }
    }

    return this.unavailable('query_status', { client_order_id: clientOrderId }, lastError);
  }

  /**
   * Read the account's resting orders and fill history for `symbols`.
   * Orders are listed first, so every fill they carry is also in the
   * history.
   */
  async fetchAccount(symbols: string[]): Promise<SyncOutcome> {
    let lastError: ExchangeRequestError | null = null;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        await sleep(backoffDelay(attempt - 1, this.retry));
      }

      try {
        const orders = await this.limiter.schedule(() => this.client.listOpenOrders(symbols));
        const fills = await this.limiter.schedule(() => this.client.listFills(symbols));
        logger.info({ symbols, orders: orders.length, fills: fills.length }, 'Account state fetched');
        return { status: 'synced', orders, fills };
      } catch (error) {
        lastError = toExchangeError(error);
        if (!lastError.retryable) {
          break;
        }
        logger.warn({ attempt, kind: lastError.kind }, 'Account fetch failed');
      }
    }

    return this.unavailable('fetch_account', { symbols }, lastError);
  }

  /**
   * Requests waiting on the rate limiter.
   */
  queuedRequests(): number {
    return this.limiter.pending();
  }

  dispose(): void {
    this.limiter.dispose();
  }

  private unavailable(
    operation: string,
    context: Record<string, unknown>,
    lastError: ExchangeRequestError | null,
  ): { status: 'unavailable'; error: GatewayUnavailableError } {
    const error = new GatewayUnavailableError(operation, this.retry.maxAttempts, lastError ?? undefined);
    logger.error({ ...context, operation, lastError: lastError?.message }, 'Gateway unavailable');
    return { status: 'unavailable', error };
  }
}
