/**
 * Token data tools: prices, metadata lookups and rug-check reports.
 */

import { defineTool, type ToolDefinition } from './tool.js';

export const fetchPriceTool = defineTool({
  name: 'solana_fetch_price',
  description: `Fetch the price of a token in USDC from Jupiter.

Input (JSON string):
{ "token_id": "token mint address" }

Output data: { "tokenId": "...", "priceInUSDC": "..." }`,
  schema: { token_id: { type: 'string', required: true } },
  delegate: 'fetchPrice',
  async run(kit, args) {
    const price = await kit.fetchPrice(args.token_id);
    return { tokenId: args.token_id, priceInUSDC: price };
  },
});

export const tokenDataTool = defineTool({
  name: 'solana_token_data',
  description: `Get token metadata by mint address.

Input (JSON string):
{ "mint_address": "token mint address" }

Output data: { "tokenData": {...} }`,
  schema: { mint_address: { type: 'string', required: true } },
  delegate: 'getTokenDataByAddress',
  async run(kit, args) {
    return { tokenData: await kit.getTokenDataByAddress(args.mint_address) };
  },
});

export const tokenDataByTickerTool = defineTool({
  name: 'solana_token_data_by_ticker',
  description: `Get token metadata by ticker symbol.

Input (JSON string):
{ "ticker": "e.g. USDC" }

Output data: { "tokenData": {...} }`,
  schema: { ticker: { type: 'string', required: true } },
  delegate: 'getTokenDataByTicker',
  async run(kit, args) {
    return { tokenData: await kit.getTokenDataByTicker(args.ticker) };
  },
});

export const pythGetPriceTool = defineTool({
  name: 'solana_pyth_get_price',
  description: `Get a token price from the Pyth oracle.

Input (JSON string):
{ "mint_address": "token mint address" }

Output data: { "price_data": {...} }`,
  schema: { mint_address: { type: 'string', required: true } },
  delegate: 'pythFetchPrice',
  async run(kit, args) {
    return { price_data: await kit.pythFetchPrice(args.mint_address) };
  },
});

export const storkGetPriceTool = defineTool({
  name: 'stork_get_price',
  description: `Get an asset price from the Stork oracle.

Input (JSON string):
{ "asset_id": "e.g. SOLUSD" }

Output data: { "price_data": {...} }`,
  schema: { asset_id: { type: 'string', required: true } },
  delegate: 'storkFetchPrice',
  async run(kit, args) {
    return { price_data: await kit.storkFetchPrice(args.asset_id) };
  },
});

export const tokenReportSummaryTool = defineTool({
  name: 'solana_fetch_token_report_summary',
  description: `Fetch the RugCheck summary report of a token.

Input (JSON string):
{ "mint": "token mint address" }

Output data: { "report": {...} }`,
  schema: { mint: { type: 'string', required: true } },
  delegate: 'fetchTokenReportSummary',
  async run(kit, args) {
    return { report: await kit.fetchTokenReportSummary(args.mint) };
  },
});

export const tokenDetailedReportTool = defineTool({
  name: 'solana_fetch_token_detailed_report',
  description: `Fetch the detailed RugCheck report of a token.

Input (JSON string):
{ "mint": "token mint address" }

Output data: { "report": {...} }`,
  schema: { mint: { type: 'string', required: true } },
  delegate: 'fetchTokenDetailedReport',
  async run(kit, args) {
    return { report: await kit.fetchTokenDetailedReport(args.mint) };
  },
});

export const tokenDataTools: ToolDefinition[] = [
  fetchPriceTool,
  tokenDataTool,
  tokenDataByTickerTool,
  pythGetPriceTool,
  storkGetPriceTool,
  tokenReportSummaryTool,
  tokenDetailedReportTool,
];
