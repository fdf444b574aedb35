// CoinbaseApi unit tests: request signing, error mapping, response validation

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('pino', () => {
  const noop = () => {};
  const logger: Record<string, unknown> = {
    info: noop,
    warn: noop,
    error: noop,
    debug: noop,
    trace: noop,
    child: () => logger,
  };
  return { default: () => logger };
});

let fetchMock: ReturnType<typeof vi.fn>;

beforeEach(() => {
  fetchMock = vi.fn();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

const { CoinbaseApi, classifyHttpError } = await import('../coinbase-api.js');
const { ExchangeRequestError } = await import('@ordercraft/core');

function createApi(timeoutMs = 1000) {
  return new CoinbaseApi({
    apiUrl: 'https://api.exchange.test/',
    credentials: { apiKey: 'test-key', apiSecret: 'dGVzdC1zZWNyZXQ=', passphrase: 'test-passphrase' },
    timeoutMs,
  });
}

function respond(status: number, body: unknown, headers: Record<string, string> = {}) {
  fetchMock.mockResolvedValueOnce({
    ok: status >= 200 && status < 300,
    status,
    headers: new Headers(headers),
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  });
}

function fills(from: number, count: number) {
  return Array.from({ length: count }, (_, i) => ({
    trade_id: from + i,
    product_id: 'BTC-USD',
    order_id: 'ex-1',
    side: 'buy',
    price: '100',
    size: '0.01',
    created_at: '2024-01-01T00:00:00.000Z',
  }));
}

const ORDER = {
  id: 'ex-1',
  client_oid: 'c-1',
  product_id: 'BTC-USD',
  side: 'buy',
  type: 'limit',
  price: '100.5',
  size: '0.01',
  filled_size: '0',
  status: 'open',
  created_at: '2024-01-01T00:00:00.000Z',
};

async function captureError(promise: Promise<unknown>): Promise<InstanceType<typeof ExchangeRequestError>> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ExchangeRequestError) return error;
    throw error;
  }
  throw new Error('Expected the request to fail');
}

// ============================================================
// classifyHttpError
// ============================================================

describe('classifyHttpError', () => {
  it.each([
    [429, 'slow down', 'rate_limited'],
    [500, 'boom', 'server'],
    [503, 'maintenance', 'server'],
    [404, 'NotFound', 'not_found'],
    [400, 'Order already done', 'already_terminal'],
    [400, 'Insufficient funds', 'rejected'],
    [401, 'invalid signature', 'rejected'],
  ])('maps %i "%s" to %s', (status, message, kind) => {
    const error = classifyHttpError(status, message);
    expect(error.kind).toBe(kind);
    expect(error.status).toBe(status);
  });
});

// ============================================================
// Requests
// ============================================================

describe('CoinbaseApi', () => {
  it('posts orders with signed headers and strips the trailing slash', async () => {
    respond(200, ORDER);
    const api = createApi();

    const order = await api.placeOrder({
      client_oid: 'c-1',
      product_id: 'BTC-USD',
      side: 'buy',
      type: 'limit',
      size: '0.01',
      price: '100.5',
    });

    expect(order.id).toBe('ex-1');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.exchange.test/orders');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toMatchObject({ client_oid: 'c-1', size: '0.01' });
    expect(init.headers['CB-ACCESS-KEY']).toBe('test-key');
    expect(init.headers['CB-ACCESS-PASSPHRASE']).toBe('test-passphrase');
    expect(typeof init.headers['CB-ACCESS-SIGN']).toBe('string');
  });

  it('defaults filled_size to "0" when absent', async () => {
    const { filled_size: _omitted, ...withoutFilled } = ORDER;
    respond(200, withoutFilled);

    const order = await createApi().getOrderByClientId('c-1');

    expect(order?.filled_size).toBe('0');
  });

  it('sends GET requests without a body', async () => {
    respond(200, []);
    await createApi().getFills('ex-1');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.exchange.test/fills?order_id=ex-1');
    expect(init.body).toBeUndefined();
  });

  it('follows the cb-after cursor until a short page', async () => {
    respond(200, fills(1, 100), { 'cb-after': '100' });
    respond(200, fills(101, 50), { 'cb-after': '150' });

    const result = await createApi().getFills('ex-1');

    expect(result).toHaveLength(150);
    expect(result[149].trade_id).toBe(150);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.exchange.test/fills?order_id=ex-1');
    expect(fetchMock.mock.calls[1][0]).toBe('https://api.exchange.test/fills?order_id=ex-1&after=100');
  });

  it('stops at a full page that carries no cursor', async () => {
    respond(200, fills(1, 100));

    const result = await createApi().getFills('ex-1');

    expect(result).toHaveLength(100);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('pages open orders with a query string of its own', async () => {
    respond(200, Array.from({ length: 100 }, (_, i) => ({ ...ORDER, id: `ex-${i + 1}` })), { 'cb-after': 'cursor-1' });
    respond(200, [{ ...ORDER, id: 'ex-101' }]);

    const orders = await createApi().getOpenOrders();

    expect(orders.map((o) => o.id).slice(-2)).toEqual(['ex-100', 'ex-101']);
    expect(fetchMock.mock.calls[1][0]).toBe('https://api.exchange.test/orders?after=cursor-1');
  });

  it('cancels by client id', async () => {
    respond(200, 'ex-1');
    const result = await createApi().cancelOrderByClientId('c-1');

    expect(result).toBe('ex-1');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.exchange.test/orders/client:c-1');
    expect(init.method).toBe('DELETE');
  });

  it('resolves null when an order lookup returns 404', async () => {
    respond(404, { message: 'NotFound' });
    await expect(createApi().getOrderByClientId('missing')).resolves.toBeNull();
  });

  it('uses the error message from the JSON body', async () => {
    respond(400, { message: 'Insufficient funds' });
    const error = await captureError(createApi().getFills('ex-1'));

    expect(error.kind).toBe('rejected');
    expect(error.message).toBe('Insufficient funds');
  });

  it('maps 429 to a retryable rate_limited error', async () => {
    respond(429, { message: 'Rate limit exceeded' });
    const error = await captureError(createApi().getFills('ex-1'));

    expect(error.kind).toBe('rate_limited');
    expect(error.retryable).toBe(true);
  });

  it('truncates a long non-JSON error body', async () => {
    respond(502, 'X'.repeat(500));
    const error = await captureError(createApi().getFills('ex-1'));

    expect(error.kind).toBe('server');
    expect(error.message).toBe(`${'X'.repeat(200)}...`);
  });

  it('rejects a response that does not match the expected shape', async () => {
    respond(200, { unexpected: true });
    const error = await captureError(createApi().getOrderByClientId('c-1'));

    expect(error.kind).toBe('server');
    expect(error.message).toBe('Coinbase API returned an unexpected response (200): {"unexpected":true}');
  });

  it('maps transport failures to network errors', async () => {
    fetchMock.mockRejectedValueOnce(new Error('ECONNRESET'));
    const error = await captureError(createApi().getFills('ex-1'));

    expect(error.kind).toBe('network');
    expect(error.message).toBe('GET /fills?order_id=ex-1 failed: ECONNRESET');
  });

  it('aborts slow requests with a timeout error', async () => {
    fetchMock.mockImplementationOnce(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
        }),
    );
    const error = await captureError(createApi(10).getFills('ex-1'));

    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('GET /fills?order_id=ex-1 timed out after 10ms');
  });
});
