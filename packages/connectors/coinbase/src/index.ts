export { CoinbaseConnector, mapOrderState } from './coinbase-connector.js';
export type { CoinbaseConnectorConfig } from './coinbase-connector.js';
export { CoinbaseApi, classifyHttpError } from './coinbase-api.js';
export type { CoinbaseApiConfig } from './coinbase-api.js';
export { CoinbaseFeed } from './coinbase-feed.js';
export type { CoinbaseFeedOptions, CoinbaseFeedEvents } from './coinbase-feed.js';
export { signRequest, buildAuthHeaders, currentTimestamp } from './coinbase-auth.js';
export * from './types.js';
