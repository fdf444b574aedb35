// ============================================================
// Error taxonomy shared by the gateway, connectors and
// reconciliation. Business outcomes are values; these classes
// cover transport failures and integrity faults only.
// ============================================================

export type ExchangeErrorKind =
  | 'timeout'
  | 'network'
  | 'server'
  | 'rate_limited'
  | 'rejected'
  | 'not_found'
  | 'already_terminal';

const RETRYABLE_KINDS: ReadonlySet<ExchangeErrorKind> = new Set([
  'timeout',
  'network',
  'server',
  'rate_limited',
]);

/**
 * Thrown by ExchangeClient implementations. `kind` tells the gateway
 * whether the request may have reached the exchange.
 */
export class ExchangeRequestError extends Error {
  readonly kind: ExchangeErrorKind;
  readonly status?: number;

  constructor(kind: ExchangeErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ExchangeRequestError';
    this.kind = kind;
    this.status = status;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export class GatewayUnavailableError extends Error {
  readonly operation: string;
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause?: unknown) {
    super(`${operation} failed after ${attempts} attempt(s)`, { cause });
    this.name = 'GatewayUnavailableError';
    this.operation = operation;
    this.attempts = attempts;
  }
}

export class DataIntegrityError extends Error {
  readonly clientOrderId: string;

  constructor(clientOrderId: string, message: string) {
    super(message);
    this.name = 'DataIntegrityError';
    this.clientOrderId = clientOrderId;
  }
}

/**
 * Normalize anything a connector threw into an ExchangeRequestError.
 * Unrecognized errors are treated as network failures.
 */
export function toExchangeError(error: unknown): ExchangeRequestError {
  if (error instanceof ExchangeRequestError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExchangeRequestError('network', message);
}
