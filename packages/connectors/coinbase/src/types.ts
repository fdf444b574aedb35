// Coinbase Exchange wire types. Numeric fields arrive as decimal strings.

import { z } from 'zod';

export interface CoinbaseOrderRequest {
  client_oid: string;
  product_id: string;
  side: 'buy' | 'sell';
  type: 'limit' | 'market';
  size: string;
  price?: string;
  time_in_force?: 'GTC' | 'GTT' | 'IOC' | 'FOK';
}

export const coinbaseOrderSchema = z.object({
  id: z.string(),
  client_oid: z.string().optional(),
  product_id: z.string(),
  side: z.enum(['buy', 'sell']),
  type: z.string(),
  price: z.string().optional(),
  size: z.string().optional(),
  filled_size: z.string().default('0'),
  status: z.string(),
  done_reason: z.string().optional(),
  reject_reason: z.string().optional(),
  created_at: z.string(),
});

export type CoinbaseOrder = z.infer<typeof coinbaseOrderSchema>;

export const coinbaseFillSchema = z.object({
  trade_id: z.union([z.number(), z.string()]),
  product_id: z.string(),
  order_id: z.string(),
  side: z.enum(['buy', 'sell']),
  price: z.string(),
  size: z.string(),
  created_at: z.string(),
  liquidity: z.string().optional(),
  fee: z.string().optional(),
});

export type CoinbaseFill = z.infer<typeof coinbaseFillSchema>;

export const coinbaseErrorSchema = z.object({
  message: z.string(),
});

// --- WebSocket feed messages ---

const tickerMessageSchema = z.object({
  type: z.literal('ticker'),
  sequence: z.number(),
  product_id: z.string(),
  price: z.string().optional(),
  best_bid: z.string(),
  best_ask: z.string(),
  time: z.string().optional(),
});

const receivedMessageSchema = z.object({
  type: z.literal('received'),
  sequence: z.number(),
  product_id: z.string(),
  order_id: z.string(),
  client_oid: z.string().optional(),
  time: z.string(),
});

const matchMessageSchema = z.object({
  type: z.literal('match'),
  sequence: z.number(),
  product_id: z.string(),
  trade_id: z.number(),
  maker_order_id: z.string(),
  taker_order_id: z.string(),
  size: z.string(),
  price: z.string(),
  time: z.string(),
});

const doneMessageSchema = z.object({
  type: z.literal('done'),
  sequence: z.number(),
  product_id: z.string(),
  order_id: z.string(),
  reason: z.string(),
  client_oid: z.string().optional(),
  time: z.string(),
});

export const feedMessageSchema = z.discriminatedUnion('type', [
  tickerMessageSchema,
  receivedMessageSchema,
  matchMessageSchema,
  doneMessageSchema,
]);

export type CoinbaseFeedMessage = z.infer<typeof feedMessageSchema>;
export type CoinbaseTickerMessage = z.infer<typeof tickerMessageSchema>;
export type CoinbaseMatchMessage = z.infer<typeof matchMessageSchema>;

export interface CoinbaseSubscribeMessage {
  type: 'subscribe';
  product_ids: string[];
  channels: string[];
  key?: string;
  passphrase?: string;
  signature?: string;
  timestamp?: string;
}

/**
 * Fill identifier used on both the REST and WebSocket paths, so the same
 * execution deduplicates no matter which path reports it first.
 */
export function fillId(orderId: string, tradeId: number | string): string {
  return `${orderId}:${tradeId}`;
}

/**
 * Decimal string with at most 8 places, no exponent and no trailing zeros.
 */
export function formatDecimal(value: number): string {
  return value.toFixed(8).replace(/\.?0+$/, '');
}
