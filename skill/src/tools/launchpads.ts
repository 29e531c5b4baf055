/**
 * Token launchpads: Pump.fun bonding curves and Moonshot.
 */

import { parsePublicKey } from '../kit/arguments.js';
import type { PumpTradeParams } from '../kit/interface.js';
import { defineTool, type ToolDefinition } from './tool.js';

const PUMP_TRADE_SCHEMA = {
  mint: { type: 'string', required: true },
  bonding_curve: { type: 'string', required: true },
  associated_bonding_curve: { type: 'string', required: true },
  amount: { type: 'integer', required: true, min: 1 },
  slippage: { type: 'number', min: 0, max: 100 },
  max_retries: { type: 'integer', min: 1 },
} as const;

interface PumpTradeInput {
  mint: string;
  bonding_curve: string;
  associated_bonding_curve: string;
  amount: number;
  slippage?: number | null;
  max_retries?: number | null;
}

function toPumpTrade(args: PumpTradeInput): PumpTradeParams {
  return {
    mint: parsePublicKey('mint', args.mint),
    bondingCurve: parsePublicKey('bonding_curve', args.bonding_curve),
    associatedBondingCurve: parsePublicKey('associated_bonding_curve', args.associated_bonding_curve),
    amount: args.amount,
    slippage: args.slippage ?? 0.5,
    maxRetries: args.max_retries ?? 3,
  };
}

const PUMP_TRADE_INPUT = `Input (JSON string):
{
  "mint": "token mint address",
  "bonding_curve": "bonding curve address",
  "associated_bonding_curve": "associated bonding curve address",
  "amount": 1000,
  "slippage": 0.5 (optional, percent, default 0.5),
  "max_retries": 3 (optional, default 3)
}`;

export const launchPumpFunTokenTool = defineTool({
  name: 'solana_launch_pump_fun_token',
  description: `Launch a Pump.fun token on Solana.

Input (JSON string):
{
  "token_name": "MyToken",
  "token_ticker": "MTK",
  "description": "A test token",
  "image_url": "https://example.com/image.png",
  "options": {...} (optional, launch options such as socials or initial buy)
}

Output data: { "result": ... }`,
  schema: {
    token_name: { type: 'string', required: true },
    token_ticker: { type: 'string', required: true },
    description: { type: 'string', required: true },
    image_url: { type: 'string', required: true },
    options: { type: 'object' },
  },
  delegate: 'launchPumpFunToken',
  successMessage: 'Pump Fun token launched successfully',
  async run(kit, args) {
    const result = await kit.launchPumpFunToken({
      tokenName: args.token_name,
      tokenTicker: args.token_ticker,
      description: args.description,
      imageUrl: args.image_url,
      options: args.options ?? undefined,
    });
    return { result };
  },
});

export const getPumpCurveStateTool = defineTool({
  name: 'solana_get_pump_curve_state',
  description: `Get the state of a Pump.fun bonding curve.

Input (JSON string):
{ "conn": "RPC endpoint or connection name", "curve_address": "bonding curve address" }

Output data: { "curve_state": {...} }`,
  schema: {
    conn: { type: 'string', required: true },
    curve_address: { type: 'string', required: true },
  },
  delegate: 'getPumpCurveState',
  async run(kit, args) {
    const state = await kit.getPumpCurveState(args.conn, parsePublicKey('curve_address', args.curve_address));
    return { curve_state: state };
  },
});

export const calculatePumpCurvePriceTool = defineTool({
  name: 'solana_calculate_pump_curve_price',
  description: `Calculate the token price implied by a bonding curve state.

Input (JSON string):
{ "curve_state": "serialized bonding curve state" }

Output data: { "price": 0.0001 }`,
  schema: { curve_state: { type: 'string', required: true } },
  delegate: 'calculatePumpCurvePrice',
  async run(kit, args) {
    return { price: await kit.calculatePumpCurvePrice(args.curve_state) };
  },
});

export const buyTokenTool = defineTool({
  name: 'solana_buy_token',
  description: `Buy tokens on a Pump.fun bonding curve.

${PUMP_TRADE_INPUT}

Output data: { "transaction": {...} }`,
  schema: PUMP_TRADE_SCHEMA,
  delegate: 'buyToken',
  async run(kit, args) {
    return { transaction: await kit.buyToken(toPumpTrade(args)) };
  },
});

export const sellTokenTool = defineTool({
  name: 'solana_sell_token',
  description: `Sell tokens on a Pump.fun bonding curve.

${PUMP_TRADE_INPUT}

Output data: { "transaction": {...} }`,
  schema: PUMP_TRADE_SCHEMA,
  delegate: 'sellToken',
  async run(kit, args) {
    return { transaction: await kit.sellToken(toPumpTrade(args)) };
  },
});

export const buyUsingMoonshotTool = defineTool({
  name: 'solana_buy_using_moonshot',
  description: `Buy a token using Moonshot.

Input (JSON string):
{
  "mint_str": "mint address of the token to buy",
  "collateral_amount": 0.01 (optional, SOL to spend, default 0.01),
  "slippage_bps": 500 (optional, default 500)
}

Output data: { "result": ... }`,
  schema: {
    mint_str: { type: 'string', required: true },
    collateral_amount: { type: 'number', min: 0 },
    slippage_bps: { type: 'integer', min: 0, max: 10000 },
  },
  delegate: 'buyUsingMoonshot',
  successMessage: 'Token purchased successfully using Moonshot.',
  async run(kit, args) {
    const result = await kit.buyUsingMoonshot(args.mint_str, args.collateral_amount ?? 0.01, args.slippage_bps ?? 500);
    return { result };
  },
});

export const sellUsingMoonshotTool = defineTool({
  name: 'solana_sell_using_moonshot',
  description: `Sell a token using Moonshot.

Input (JSON string):
{
  "mint_str": "mint address of the token to sell",
  "token_balance": 0.01 (optional, amount to sell, default 0.01),
  "slippage_bps": 500 (optional, default 500)
}

Output data: { "result": ... }`,
  schema: {
    mint_str: { type: 'string', required: true },
    token_balance: { type: 'number', min: 0 },
    slippage_bps: { type: 'integer', min: 0, max: 10000 },
  },
  delegate: 'sellUsingMoonshot',
  successMessage: 'Token sold successfully using Moonshot.',
  async run(kit, args) {
    const result = await kit.sellUsingMoonshot(args.mint_str, args.token_balance ?? 0.01, args.slippage_bps ?? 500);
    return { result };
  },
});

export const launchpadTools: ToolDefinition[] = [
  launchPumpFunTokenTool,
  getPumpCurveStateTool,
  calculatePumpCurvePriceTool,
  buyTokenTool,
  sellTokenTool,
  buyUsingMoonshotTool,
  sellUsingMoonshotTool,
];
