/**
 * Order book markets: Manifest and OpenBook.
 */

import { ToolError } from '../errors.js';
import { parseLiteral } from '../kit/arguments.js';
import type { BookOrder } from '../kit/interface.js';
import { isRecord } from '../schema/validator.js';
import { defineTool, type ToolDefinition } from './tool.js';

const BOOK_SIDES = ['buy', 'sell'] as const;

function parseBookOrder(value: unknown, index: number): BookOrder {
  if (
    !isRecord(value) ||
    typeof value.quantity !== 'number' ||
    typeof value.side !== 'string' ||
    typeof value.price !== 'number'
  ) {
    throw new ToolError(
      `Invalid order at index ${index}: expected { quantity: number, side: string, price: number }`,
      'INVALID_ARGUMENT',
    );
  }
  return {
    quantity: value.quantity,
    side: parseLiteral('side', value.side, BOOK_SIDES),
    price: value.price,
  };
}

const MARKET_ID_SCHEMA = { market_id: { type: 'string', required: true } } as const;

export const manifestCreateMarketTool = defineTool({
  name: 'manifest_create_market',
  description: `Create a Manifest market.

Input (JSON string):
{ "base_mint": "base token mint", "quote_mint": "quote token mint" }

Output data: { "market_data": {...} }`,
  schema: {
    base_mint: { type: 'string', required: true },
    quote_mint: { type: 'string', required: true },
  },
  delegate: 'createManifestMarket',
  async run(kit, args) {
    return { market_data: await kit.createManifestMarket(args.base_mint, args.quote_mint) };
  },
});

export const manifestPlaceLimitOrderTool = defineTool({
  name: 'manifest_place_limit_order',
  description: `Place a limit order on a Manifest market.

Input (JSON string):
{ "market_id": "market address", "quantity": 1.5, "side": "buy" | "sell", "price": 150 }

Output data: { "order_details": {...} }`,
  schema: {
    market_id: { type: 'string', required: true },
    quantity: { type: 'number', required: true },
    side: { type: 'string', required: true },
    price: { type: 'number', required: true },
  },
  delegate: 'placeLimitOrder',
  async run(kit, args) {
    const details = await kit.placeLimitOrder({
      marketId: args.market_id,
      quantity: args.quantity,
      side: parseLiteral('side', args.side, BOOK_SIDES),
      price: args.price,
    });
    return { order_details: details };
  },
});

export const manifestPlaceBatchOrdersTool = defineTool({
  name: 'manifest_place_batch_orders',
  description: `Place several orders on a Manifest market at once.

Input (JSON string):
{
  "market_id": "market address",
  "orders": [{ "quantity": 1, "side": "buy", "price": 149 }, { "quantity": 1, "side": "sell", "price": 151 }]
}

Output data: { "batch_order_details": {...} }`,
  schema: {
    market_id: { type: 'string', required: true },
    orders: { type: 'array', required: true },
  },
  delegate: 'placeBatchOrders',
  async run(kit, args) {
    const orders = args.orders.map(parseBookOrder);
    return { batch_order_details: await kit.placeBatchOrders(args.market_id, orders) };
  },
});

export const manifestCancelAllOrdersTool = defineTool({
  name: 'manifest_cancel_all_orders',
  description: `Cancel every open order on a Manifest market.

Input (JSON string):
{ "market_id": "market address" }

Output data: { "cancellation_result": {...} }`,
  schema: MARKET_ID_SCHEMA,
  delegate: 'cancelAllOrders',
  async run(kit, args) {
    return { cancellation_result: await kit.cancelAllOrders(args.market_id) };
  },
});

export const manifestWithdrawAllTool = defineTool({
  name: 'manifest_withdraw_all',
  description: `Withdraw all funds from a Manifest market.

Input (JSON string):
{ "market_id": "market address" }

Output data: { "withdrawal_result": {...} }`,
  schema: MARKET_ID_SCHEMA,
  delegate: 'withdrawAll',
  async run(kit, args) {
    return { withdrawal_result: await kit.withdrawAll(args.market_id) };
  },
});

export const openbookCreateMarketTool = defineTool({
  name: 'openbook_create_market',
  description: `Create an OpenBook market.

Input (JSON string):
{
  "base_mint": "base token mint",
  "quote_mint": "quote token mint",
  "lot_size": 1 (optional, default 1),
  "tick_size": 0.01 (optional, default 0.01)
}

Output data: { "market_data": {...} }`,
  schema: {
    base_mint: { type: 'string', required: true },
    quote_mint: { type: 'string', required: true },
    lot_size: { type: 'number' },
    tick_size: { type: 'number' },
  },
  delegate: 'createOpenbookMarket',
  async run(kit, args) {
    const market = await kit.createOpenbookMarket({
      baseMint: args.base_mint,
      quoteMint: args.quote_mint,
      lotSize: args.lot_size ?? 1,
      tickSize: args.tick_size ?? 0.01,
    });
    return { market_data: market };
  },
});

export const orderbookTools: ToolDefinition[] = [
  manifestCreateMarketTool,
  manifestPlaceLimitOrderTool,
  manifestPlaceBatchOrdersTool,
  manifestCancelAllOrdersTool,
  manifestWithdrawAllTool,
  openbookCreateMarketTool,
];
