/**
 * Perpetuals on Adrena and Flash Trade.
 */

import { optional, parseLiteral } from '../kit/arguments.js';
import type { OpenPerpTradeParams } from '../kit/interface.js';
import { defineTool, type ToolDefinition } from './tool.js';

const CLOSE_SCHEMA = {
  price: { type: 'number', required: true },
  trade_mint: { type: 'string', required: true },
} as const;

const OPEN_SCHEMA = {
  price: { type: 'number', required: true },
  collateral_amount: { type: 'number', required: true },
  collateral_mint: { type: 'string' },
  leverage: { type: 'number' },
  trade_mint: { type: 'string' },
  slippage: { type: 'number' },
} as const;

interface OpenInput {
  price: number;
  collateral_amount: number;
  collateral_mint?: string | null;
  leverage?: number | null;
  trade_mint?: string | null;
  slippage?: number | null;
}

function toOpenParams(args: OpenInput): OpenPerpTradeParams {
  return {
    price: args.price,
    collateralAmount: args.collateral_amount,
    collateralMint: optional(args.collateral_mint),
    leverage: optional(args.leverage),
    tradeMint: optional(args.trade_mint),
    slippage: optional(args.slippage),
  };
}

const OPEN_INPUT = `Input (JSON string):
{
  "price": 150,
  "collateral_amount": 10,
  "collateral_mint": "mint address" (optional),
  "leverage": 5 (optional),
  "trade_mint": "mint address" (optional),
  "slippage": 0.3 (optional)
}`;

const CLOSE_INPUT = `Input (JSON string):
{ "price": 150, "trade_mint": "mint address of the traded token" }`;

export const openPerpTradeLongTool = defineTool({
  name: 'open_perp_trade_long',
  description: `Open a long perpetual position on Adrena.

${OPEN_INPUT}

Output data: { "transaction": ... }`,
  schema: OPEN_SCHEMA,
  delegate: 'openPerpTradeLong',
  async run(kit, args) {
    return { transaction: await kit.openPerpTradeLong(toOpenParams(args)) };
  },
});

export const openPerpTradeShortTool = defineTool({
  name: 'open_perp_trade_short',
  description: `Open a short perpetual position on Adrena.

${OPEN_INPUT}

Output data: { "transaction": ... }`,
  schema: OPEN_SCHEMA,
  delegate: 'openPerpTradeShort',
  async run(kit, args) {
    return { transaction: await kit.openPerpTradeShort(toOpenParams(args)) };
  },
});

export const closePerpTradeLongTool = defineTool({
  name: 'close_perp_trade_long',
  description: `Close a long perpetual position on Adrena.

${CLOSE_INPUT}

Output data: { "transaction": ... }`,
  schema: CLOSE_SCHEMA,
  delegate: 'closePerpTradeLong',
  async run(kit, args) {
    return { transaction: await kit.closePerpTradeLong({ price: args.price, tradeMint: args.trade_mint }) };
  },
});

export const closePerpTradeShortTool = defineTool({
  name: 'close_perp_trade_short',
  description: `Close a short perpetual position on Adrena.

${CLOSE_INPUT}

Output data: { "transaction": ... }`,
  schema: CLOSE_SCHEMA,
  delegate: 'closePerpTradeShort',
  async run(kit, args) {
    return { transaction: await kit.closePerpTradeShort({ price: args.price, tradeMint: args.trade_mint }) };
  },
});

export const flashOpenTradeTool = defineTool({
  name: 'flash_open_trade',
  description: `Open a leveraged position on Flash Trade.

Input (JSON string):
{ "token": "SOL", "side": "buy" | "sell", "collateralUsd": 100, "leverage": 5 }

Output data: { "transaction": ... }`,
  schema: {
    token: { type: 'string', required: true },
    side: { type: 'string', required: true },
    collateralUsd: { type: 'number', required: true },
    leverage: { type: 'number', required: true },
  },
  delegate: 'flashOpenTrade',
  async run(kit, args) {
    const transaction = await kit.flashOpenTrade({
      token: args.token,
      side: parseLiteral('side', args.side, ['buy', 'sell']),
      collateralUsd: args.collateralUsd,
      leverage: args.leverage,
    });
    return { transaction };
  },
});

export const flashCloseTradeTool = defineTool({
  name: 'flash_close_trade',
  description: `Close a position on Flash Trade.

Input (JSON string):
{ "token": "SOL", "side": "buy" | "sell" }

Output data: { "transaction": ... }`,
  schema: {
    token: { type: 'string', required: true },
    side: { type: 'string', required: true },
  },
  delegate: 'flashCloseTrade',
  async run(kit, args) {
    const side = parseLiteral('side', args.side, ['buy', 'sell']);
    return { transaction: await kit.flashCloseTrade(args.token, side) };
  },
});

export const perpTools: ToolDefinition[] = [
  closePerpTradeShortTool,
  closePerpTradeLongTool,
  openPerpTradeLongTool,
  openPerpTradeShortTool,
  flashOpenTradeTool,
  flashCloseTradeTool,
];
