/**
 * AMM tools: Meteora DLMM, Raydium, FluxBeam and Orca Whirlpools.
 */

import { ToolError } from '../errors.js';
import { optional, parseChoice, parsePublicKey } from '../kit/arguments.js';
import { ActivationType } from '../kit/interface.js';
import { defineTool, type ToolDefinition } from './tool.js';

const ACTIVATION_TYPES: Readonly<Record<string, ActivationType>> = {
  Slot: ActivationType.Slot,
  Timestamp: ActivationType.Timestamp,
};

// ---- Meteora ----------------------------------------------------------------

export const createMeteoraDlmmPoolTool = defineTool({
  name: 'solana_create_meteora_dlmm_pool',
  description: `Create a Meteora DLMM pool.

Input (JSON string):
{
  "bin_step": 5,
  "token_a_mint": "mint address of token A",
  "token_b_mint": "mint address of token B",
  "initial_price": 1.23,
  "price_rounding_up": true,
  "fee_bps": 300,
  "activation_type": "Slot" | "Timestamp",
  "has_alpha_vault": false,
  "activation_point": "string" (optional)
}

Output data: { "result": ... }`,
  schema: {
    bin_step: { type: 'integer', required: true },
    token_a_mint: { type: 'string', required: true },
    token_b_mint: { type: 'string', required: true },
    initial_price: { type: 'number', required: true },
    price_rounding_up: { type: 'boolean', required: true },
    fee_bps: { type: 'integer', required: true },
    activation_type: { type: 'string', required: true },
    has_alpha_vault: { type: 'boolean', required: true },
    activation_point: { type: 'string' },
  },
  delegate: 'createMeteoraDlmmPool',
  successMessage: 'Meteora DLMM pool created successfully',
  async run(kit, args) {
    const result = await kit.createMeteoraDlmmPool({
      binStep: args.bin_step,
      tokenAMint: args.token_a_mint,
      tokenBMint: args.token_b_mint,
      initialPrice: args.initial_price,
      priceRoundingUp: args.price_rounding_up,
      feeBps: args.fee_bps,
      activationType: parseChoice('activation_type', args.activation_type, ACTIVATION_TYPES),
      hasAlphaVault: args.has_alpha_vault,
      activationPoint: optional(args.activation_point),
    });
    return { result };
  },
});

// ---- Raydium ----------------------------------------------------------------

export const raydiumBuyTool = defineTool({
  name: 'raydium_buy',
  description: `Buy tokens with SOL through a Raydium pool.

Input (JSON string):
{
  "pair_address": "address of the trading pair",
  "sol_in": 0.01 (optional, SOL to spend, default 0.01),
  "slippage": 5 (optional, percent 0-100, default 5)
}

Output data: { "pair_address", "sol_in", "slippage", "transaction" }`,
  schema: {
    pair_address: { type: 'string', required: true },
    sol_in: { type: 'number', min: 0 },
    slippage: { type: 'integer', min: 0, max: 100 },
  },
  delegate: 'buyWithRaydium',
  successMessage: 'Buy transaction completed successfully',
  async run(kit, args) {
    const solIn = args.sol_in ?? 0.01;
    const slippage = args.slippage ?? 5;
    if (solIn <= 0) {
      throw new ToolError('sol_in must be a positive number', 'INVALID_ARGUMENT');
    }
    const transaction = await kit.buyWithRaydium(args.pair_address, solIn, slippage);
    return { pair_address: args.pair_address, sol_in: solIn, slippage, transaction };
  },
});

export const raydiumSellTool = defineTool({
  name: 'raydium_sell',
  description: `Sell tokens for SOL through a Raydium pool.

Input (JSON string):
{
  "pair_address": "address of the trading pair",
  "percentage": 100 (optional, share of the balance to sell, default 100),
  "slippage": 5 (optional, percent 0-100, default 5)
}

Output data: { "pair_address", "percentage", "slippage", "transaction" }`,
  schema: {
    pair_address: { type: 'string', required: true },
    percentage: { type: 'integer', min: 0, max: 100 },
    slippage: { type: 'integer', min: 0, max: 100 },
  },
  delegate: 'sellWithRaydium',
  successMessage: 'Sell transaction completed successfully',
  async run(kit, args) {
    const percentage = args.percentage ?? 100;
    const slippage = args.slippage ?? 5;
    const transaction = await kit.sellWithRaydium(args.pair_address, percentage, slippage);
    return { pair_address: args.pair_address, percentage, slippage, transaction };
  },
});

// ---- FluxBeam ---------------------------------------------------------------

export const fluxbeamCreatePoolTool = defineTool({
  name: 'fluxbeam_create_pool',
  description: `Create a FluxBeam liquidity pool.

Input (JSON string):
{
  "token_a": "mint address of the first token",
  "token_a_amount": 100 (in token units),
  "token_b": "mint address of the second token",
  "token_b_amount": 100 (in token units)
}

Output data: { "transaction_signature": "..." }`,
  schema: {
    token_a: { type: 'string', required: true },
    token_a_amount: { type: 'number', required: true, min: 0 },
    token_b: { type: 'string', required: true },
    token_b_amount: { type: 'number', required: true, min: 0 },
  },
  delegate: 'fluxbeamCreatePool',
  async run(kit, args) {
    const signature = await kit.fluxbeamCreatePool({
      tokenA: parsePublicKey('token_a', args.token_a),
      tokenAAmount: args.token_a_amount,
      tokenB: parsePublicKey('token_b', args.token_b),
      tokenBAmount: args.token_b_amount,
    });
    return { transaction_signature: signature };
  },
});

// ---- Orca -------------------------------------------------------------------

export const orcaClosePositionTool = defineTool({
  name: 'orca_close_position',
  description: `Close an Orca Whirlpool position.

Input (JSON string):
{ "position_mint_address": "mint address of the position" }

Output data: { "closure_result": {...} }`,
  schema: { position_mint_address: { type: 'string', required: true } },
  delegate: 'closePosition',
  async run(kit, args) {
    return { closure_result: await kit.closePosition(args.position_mint_address) };
  },
});

export const orcaCreateClmmTool = defineTool({
  name: 'orca_create_clmm',
  description: `Create an Orca concentrated liquidity pool without initial liquidity.

Input (JSON string):
{
  "mint_deploy": "mint address of the deployed token",
  "mint_pair": "mint address of the paired token",
  "initial_price": 0.001,
  "fee_tier": "0.3"
}

Output data: { "clmm_data": {...} }`,
  schema: {
    mint_deploy: { type: 'string', required: true },
    mint_pair: { type: 'string', required: true },
    initial_price: { type: 'number', required: true },
    fee_tier: { type: 'string', required: true },
  },
  delegate: 'createClmm',
  async run(kit, args) {
    const clmm = await kit.createClmm({
      mintDeploy: args.mint_deploy,
      mintPair: args.mint_pair,
      initialPrice: args.initial_price,
      feeTier: args.fee_tier,
    });
    return { clmm_data: clmm };
  },
});

export const orcaCreateLiquidityPoolTool = defineTool({
  name: 'orca_create_liquidity_pool',
  description: `Create an Orca liquidity pool with a single-sided initial deposit.

Input (JSON string):
{
  "deposit_token_amount": 1000,
  "deposit_token_mint": "mint address of the deposited token",
  "other_token_mint": "mint address of the paired token",
  "initial_price": 0.001,
  "max_price": 5,
  "fee_tier": "0.3"
}

Output data: { "pool_data": {...} }`,
  schema: {
    deposit_token_amount: { type: 'number', required: true },
    deposit_token_mint: { type: 'string', required: true },
    other_token_mint: { type: 'string', required: true },
    initial_price: { type: 'number', required: true },
    max_price: { type: 'number', required: true },
    fee_tier: { type: 'string', required: true },
  },
  delegate: 'createLiquidityPool',
  async run(kit, args) {
    const pool = await kit.createLiquidityPool({
      depositTokenAmount: args.deposit_token_amount,
      depositTokenMint: args.deposit_token_mint,
      otherTokenMint: args.other_token_mint,
      initialPrice: args.initial_price,
      maxPrice: args.max_price,
      feeTier: args.fee_tier,
    });
    return { pool_data: pool };
  },
});

export const orcaFetchPositionsTool = defineTool({
  name: 'orca_fetch_positions',
  description: `Fetch every Orca Whirlpool position of the wallet. Takes no input.

Output data: { "positions": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'fetchPositions',
  async run(kit) {
    return { positions: await kit.fetchPositions() };
  },
});

export const orcaOpenCenteredPositionTool = defineTool({
  name: 'orca_open_centered_position',
  description: `Open an Orca position centred on the current price.

Input (JSON string):
{
  "whirlpool_address": "Whirlpool address",
  "price_offset_bps": 500,
  "input_token_mint": "mint address of the deposited token",
  "input_amount": 100
}

Output data: { "position_data": {...} }`,
  schema: {
    whirlpool_address: { type: 'string', required: true },
    price_offset_bps: { type: 'integer', required: true },
    input_token_mint: { type: 'string', required: true },
    input_amount: { type: 'number', required: true },
  },
  delegate: 'openCenteredPosition',
  async run(kit, args) {
    const position = await kit.openCenteredPosition({
      whirlpoolAddress: args.whirlpool_address,
      priceOffsetBps: args.price_offset_bps,
      inputTokenMint: args.input_token_mint,
      inputAmount: args.input_amount,
    });
    return { position_data: position };
  },
});

export const orcaOpenSingleSidedPositionTool = defineTool({
  name: 'orca_open_single_sided_position',
  description: `Open a single-sided Orca position away from the current price.

Input (JSON string):
{
  "whirlpool_address": "Whirlpool address",
  "distance_from_current_price_bps": 250,
  "width_bps": 500,
  "input_token_mint": "mint address of the deposited token",
  "input_amount": 100
}

Output data: { "position_data": {...} }`,
  schema: {
    whirlpool_address: { type: 'string', required: true },
    distance_from_current_price_bps: { type: 'integer', required: true },
    width_bps: { type: 'integer', required: true },
    input_token_mint: { type: 'string', required: true },
    input_amount: { type: 'number', required: true },
  },
  delegate: 'openSingleSidedPosition',
  async run(kit, args) {
    const position = await kit.openSingleSidedPosition({
      whirlpoolAddress: args.whirlpool_address,
      distanceFromCurrentPriceBps: args.distance_from_current_price_bps,
      widthBps: args.width_bps,
      inputTokenMint: args.input_token_mint,
      inputAmount: args.input_amount,
    });
    return { position_data: position };
  },
});

export const ammTools: ToolDefinition[] = [
  createMeteoraDlmmPoolTool,
  raydiumBuyTool,
  raydiumSellTool,
  fluxbeamCreatePoolTool,
  orcaClosePositionTool,
  orcaCreateClmmTool,
  orcaCreateLiquidityPoolTool,
  orcaFetchPositionsTool,
  orcaOpenCenteredPositionTool,
  orcaOpenSingleSidedPositionTool,
];
