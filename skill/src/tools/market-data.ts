/**
 * Market data tools: CoinGecko token and pool data, Elfa AI social
 * mentions.
 */

import { optional, parseStringList } from '../kit/arguments.js';
import { defineTool, type ToolDefinition } from './tool.js';

// ---- CoinGecko --------------------------------------------------------------

export const coingeckoTrendingTokensTool = defineTool({
  name: 'coingecko_get_trending_tokens',
  description: `Get trending tokens from CoinGecko. Takes no input.

Output data: { "trending_tokens": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'getTrendingTokens',
  async run(kit) {
    return { trending_tokens: await kit.getTrendingTokens() };
  },
});

export const coingeckoTrendingPoolsTool = defineTool({
  name: 'coingecko_get_trending_pools',
  description: `Get trending pools on Solana from CoinGecko.

Input (JSON string):
{ "duration": "5m" | "1h" | "6h" | "24h" (optional, default "24h") }

Output data: { "trending_pools": {...} }`,
  schema: { duration: { type: 'string' } },
  delegate: 'getTrendingPools',
  async run(kit, args) {
    return { trending_pools: await kit.getTrendingPools(args.duration ?? '24h') };
  },
});

export const coingeckoTopGainersTool = defineTool({
  name: 'coingecko_get_top_gainers',
  description: `Get the top gaining tokens from CoinGecko.

Input (JSON string):
{
  "duration": "1h" | "24h" | "7d" | "14d" | "30d" | "60d" | "1y" (optional, default "24h"),
  "top_coins": 300 | 500 | 1000 | "all" (optional, default "all")
}

Output data: { "top_gainers": {...} }`,
  schema: {
    duration: { type: 'string' },
    top_coins: { type: ['integer', 'string'] },
  },
  delegate: 'getTopGainers',
  async run(kit, args) {
    return { top_gainers: await kit.getTopGainers(args.duration ?? '24h', args.top_coins ?? 'all') };
  },
});

export const coingeckoTokenPriceDataTool = defineTool({
  name: 'coingecko_get_token_price_data',
  description: `Get price data for Solana tokens from CoinGecko.

Input (JSON string):
{ "token_addresses": ["token mint addresses"] }

Output data: { "price_data": {...} }`,
  schema: { token_addresses: { type: 'array', required: true } },
  delegate: 'getTokenPriceData',
  async run(kit, args) {
    const addresses = parseStringList('token_addresses', args.token_addresses);
    return { price_data: await kit.getTokenPriceData(addresses) };
  },
});

export const coingeckoTokenInfoTool = defineTool({
  name: 'coingecko_get_token_info',
  description: `Get token information from CoinGecko.

Input (JSON string):
{ "token_address": "token mint address" }

Output data: { "token_info": {...} }`,
  schema: { token_address: { type: 'string', required: true } },
  delegate: 'getTokenInfo',
  async run(kit, args) {
    return { token_info: await kit.getTokenInfo(args.token_address) };
  },
});

export const coingeckoLatestPoolsTool = defineTool({
  name: 'coingecko_get_latest_pools',
  description: `Get the latest pools on Solana from CoinGecko. Takes no input.

Output data: { "latest_pools": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'getLatestPools',
  async run(kit) {
    return { latest_pools: await kit.getLatestPools() };
  },
});

// ---- Elfa AI ----------------------------------------------------------------

export const elfaPingTool = defineTool({
  name: 'elfa_ai_ping_api',
  description: `Check that the Elfa AI API is reachable. Takes no input.

Output data: { "api_response": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'pingElfaAiApi',
  async run(kit) {
    return { api_response: await kit.pingElfaAiApi() };
  },
});

export const elfaApiKeyStatusTool = defineTool({
  name: 'elfa_ai_get_api_key_status',
  description: `Get the status and usage of the Elfa AI API key. Takes no input.

Output data: { "api_key_status": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'getElfaAiApiKeyStatus',
  async run(kit) {
    return { api_key_status: await kit.getElfaAiApiKeyStatus() };
  },
});

export const elfaSmartMentionsTool = defineTool({
  name: 'elfa_ai_get_smart_mentions',
  description: `Get the latest mentions by smart accounts.

Input (JSON string):
{
  "limit": 100 (optional),
  "offset": 0 (optional)
}

Output data: { "mentions_data": {...} }`,
  schema: {
    limit: { type: 'integer', min: 1 },
    offset: { type: 'integer', min: 0 },
  },
  delegate: 'getSmartMentions',
  async run(kit, args) {
    return { mentions_data: await kit.getSmartMentions(args.limit ?? 100, args.offset ?? 0) };
  },
});

export const elfaTopMentionsByTickerTool = defineTool({
  name: 'elfa_ai_get_top_mentions_by_ticker',
  description: `Get the top mentions of a ticker.

Input (JSON string):
{
  "ticker": "e.g. SOL",
  "time_window": "1h" (optional),
  "page": 1 (optional),
  "page_size": 10 (optional),
  "include_account_details": false (optional)
}

Output data: { "mentions_data": {...} }`,
  schema: {
    ticker: { type: 'string', required: true },
    time_window: { type: 'string' },
    page: { type: 'integer', min: 1 },
    page_size: { type: 'integer', min: 1 },
    include_account_details: { type: 'boolean' },
  },
  delegate: 'getTopMentionsByTicker',
  async run(kit, args) {
    const mentions = await kit.getTopMentionsByTicker({
      ticker: args.ticker,
      timeWindow: args.time_window ?? '1h',
      page: args.page ?? 1,
      pageSize: args.page_size ?? 10,
      includeAccountDetails: args.include_account_details ?? false,
    });
    return { mentions_data: mentions };
  },
});

export const elfaSearchMentionsTool = defineTool({
  name: 'elfa_ai_search_mentions_by_keywords',
  description: `Search mentions by keywords within a time range.

Input (JSON string):
{
  "keywords": "comma separated keywords",
  "from_timestamp": 1700000000 (unix seconds),
  "to_timestamp": 1700086400 (unix seconds),
  "limit": 20 (optional),
  "cursor": "pagination cursor" (optional)
}

Output data: { "search_results": {...} }`,
  schema: {
    keywords: { type: 'string', required: true },
    from_timestamp: { type: 'integer', required: true },
    to_timestamp: { type: 'integer', required: true },
    limit: { type: 'integer', min: 1 },
    cursor: { type: 'string' },
  },
  delegate: 'searchMentionsByKeywords',
  async run(kit, args) {
    const results = await kit.searchMentionsByKeywords({
      keywords: args.keywords,
      fromTimestamp: args.from_timestamp,
      toTimestamp: args.to_timestamp,
      limit: args.limit ?? 20,
      cursor: optional(args.cursor),
    });
    return { search_results: results };
  },
});

export const elfaTrendingTokensTool = defineTool({
  name: 'elfa_ai_get_trending_tokens',
  description: `Get tokens trending in social mentions.

Input (JSON string):
{
  "time_window": "24h" (optional),
  "page": 1 (optional),
  "page_size": 50 (optional),
  "min_mentions": 5 (optional)
}

Output data: { "trending_tokens": {...} }`,
  schema: {
    time_window: { type: 'string' },
    page: { type: 'integer', min: 1 },
    page_size: { type: 'integer', min: 1 },
    min_mentions: { type: 'integer', min: 0 },
  },
  delegate: 'getTrendingTokensUsingElfaAi',
  async run(kit, args) {
    const trending = await kit.getTrendingTokensUsingElfaAi({
      timeWindow: args.time_window ?? '24h',
      page: args.page ?? 1,
      pageSize: args.page_size ?? 50,
      minMentions: args.min_mentions ?? 5,
    });
    return { trending_tokens: trending };
  },
});

export const elfaTwitterAccountStatsTool = defineTool({
  name: 'elfa_ai_get_smart_twitter_account_stats',
  description: `Get smart-follower statistics of a Twitter account.

Input (JSON string):
{ "username": "Twitter handle without @" }

Output data: { "account_stats": {...} }`,
  schema: { username: { type: 'string', required: true } },
  delegate: 'getSmartTwitterAccountStats',
  async run(kit, args) {
    return { account_stats: await kit.getSmartTwitterAccountStats(args.username) };
  },
});

export const marketDataTools: ToolDefinition[] = [
  coingeckoTrendingTokensTool,
  coingeckoTrendingPoolsTool,
  coingeckoTopGainersTool,
  coingeckoTokenPriceDataTool,
  coingeckoTokenInfoTool,
  coingeckoLatestPoolsTool,
  elfaPingTool,
  elfaApiKeyStatusTool,
  elfaSmartMentionsTool,
  elfaTopMentionsByTickerTool,
  elfaSearchMentionsTool,
  elfaTrendingTokensTool,
  elfaTwitterAccountStatsTool,
];
