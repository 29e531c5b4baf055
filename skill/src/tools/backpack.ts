/**
 * Backpack exchange tools: account, capital, history, orders and market data.
 */

import { optional, parseLiteral } from '../kit/arguments.js';
import type { BackpackHistoryQuery, BackpackOrderRef } from '../kit/interface.js';
import { defineTool, type ToolDefinition } from './tool.js';

// ---- Shared query shapes ----------------------------------------------------

const HISTORY_SCHEMA = {
  symbol: { type: 'string', description: 'Market symbol, e.g. SOL_USDC' },
  order_id: { type: 'string' },
  from: { type: 'integer', description: 'Start time, ms since epoch' },
  to: { type: 'integer', description: 'End time, ms since epoch' },
  limit: { type: 'integer', min: 1 },
  offset: { type: 'integer', min: 0 },
} as const;

interface HistoryInput {
  symbol?: string | null;
  order_id?: string | null;
  from?: number | null;
  to?: number | null;
  limit?: number | null;
  offset?: number | null;
}

function toHistoryQuery(args: HistoryInput): BackpackHistoryQuery {
  return {
    symbol: optional(args.symbol),
    orderId: optional(args.order_id),
    from: optional(args.from),
    to: optional(args.to),
    limit: optional(args.limit),
    offset: optional(args.offset),
  };
}

const HISTORY_INPUT = `Input (JSON string, every field optional):
{ "symbol": "SOL_USDC", "order_id": "...", "from": 0, "to": 0, "limit": 100, "offset": 0 }`;

const ORDER_REF_SCHEMA = {
  symbol: { type: 'string', required: true },
  order_id: { type: 'string' },
  client_id: { type: 'integer' },
} as const;

interface OrderRefInput {
  symbol: string;
  order_id?: string | null;
  client_id?: number | null;
}

function toOrderRef(args: OrderRefInput): BackpackOrderRef {
  return { symbol: args.symbol, orderId: optional(args.order_id), clientId: optional(args.client_id) };
}

const SYMBOL_SCHEMA = { symbol: { type: 'string', required: true } } as const;

const SUB_ACCOUNT_SCHEMA = { sub_account_id: { type: 'integer' } } as const;

// ---- Account ----------------------------------------------------------------

export const backpackGetAccountBalancesTool = defineTool({
  name: 'backpack_get_account_balances',
  description: `Fetch the Backpack account balances. Takes no input.

Output data: { "balances": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'getAccountBalances',
  async run(kit) {
    return { balances: await kit.getAccountBalances() };
  },
});

export const backpackRequestWithdrawalTool = defineTool({
  name: 'backpack_request_withdrawal',
  description: `Request a withdrawal from Backpack.

Input (JSON string):
{
  "address": "destination address",
  "blockchain": "blockchain name, e.g. Solana",
  "quantity": "amount to withdraw, as a string",
  "symbol": "token symbol",
  "additional_params": {...} (optional, extra request fields)
}

Output data: { "result": {...} }`,
  schema: {
    address: { type: 'string', required: true },
    blockchain: { type: 'string', required: true },
    quantity: { type: 'string', required: true },
    symbol: { type: 'string', required: true },
    additional_params: { type: 'object' },
  },
  delegate: 'requestWithdrawal',
  async run(kit, args) {
    const result = await kit.requestWithdrawal({
      address: args.address,
      blockchain: args.blockchain,
      quantity: args.quantity,
      symbol: args.symbol,
      extra: args.additional_params ?? {},
    });
    return { result };
  },
});

export const backpackGetAccountSettingsTool = defineTool({
  name: 'backpack_get_account_settings',
  description: `Fetch the Backpack account settings. Takes no input.

Output data: { "settings": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'getAccountSettings',
  async run(kit) {
    return { settings: await kit.getAccountSettings() };
  },
});

export const backpackUpdateAccountSettingsTool = defineTool({
  name: 'backpack_update_account_settings',
  description: `Update the Backpack account settings. Omitted fields keep their value.

Input (JSON string):
{
  "auto_borrow_settlements": true (optional),
  "auto_lend": true (optional),
  "auto_repay_borrows": true (optional),
  "leverage_limit": "string" (optional)
}

Output data: { "result": ... }`,
  schema: {
    auto_borrow_settlements: { type: 'boolean' },
    auto_lend: { type: 'boolean' },
    auto_repay_borrows: { type: 'boolean' },
    leverage_limit: { type: 'string' },
  },
  delegate: 'updateAccountSettings',
  async run(kit, args) {
    const result = await kit.updateAccountSettings({
      autoBorrowSettlements: optional(args.auto_borrow_settlements),
      autoLend: optional(args.auto_lend),
      autoRepayBorrows: optional(args.auto_repay_borrows),
      leverageLimit: optional(args.leverage_limit),
    });
    return { result };
  },
});

// ---- Borrow / lend ----------------------------------------------------------

export const backpackGetBorrowLendPositionsTool = defineTool({
  name: 'backpack_get_borrow_lend_positions',
  description: `Fetch open borrow and lend positions. Takes no input.

Output data: { "positions": [...] }`,
  input: 'none',
  schema: {},
  delegate: 'getBorrowLendPositions',
  async run(kit) {
    return { positions: await kit.getBorrowLendPositions() };
  },
});

export const backpackExecuteBorrowLendTool = defineTool({
  name: 'backpack_execute_borrow_lend',
  description: `Borrow or lend an asset on Backpack.

Input (JSON string):
{ "quantity": "amount, as a string", "side": "borrow" | "lend", "symbol": "token symbol" }

Output data: { "result": ... }`,
  schema: {
    quantity: { type: 'string', required: true },
    side: { type: 'string', required: true },
    symbol: { type: 'string', required: true },
  },
  delegate: 'executeBorrowLend',
  async run(kit, args) {
    const side = parseLiteral('side', args.side, ['borrow', 'lend']);
    return { result: await kit.executeBorrowLend(args.quantity, side, args.symbol) };
  },
});

// ---- History ----------------------------------------------------------------

export const backpackGetFillHistoryTool = defineTool({
  name: 'backpack_get_fill_history',
  description: `Fetch the fill history.

${HISTORY_INPUT}

Output data: { "history": [...] }`,
  schema: HISTORY_SCHEMA,
  delegate: 'getFillHistory',
  async run(kit, args) {
    return { history: await kit.getFillHistory(toHistoryQuery(args)) };
  },
});

export const backpackGetBorrowPositionHistoryTool = defineTool({
  name: 'backpack_get_borrow_position_history',
  description: `Fetch the borrow position history.

${HISTORY_INPUT}

Output data: { "history": [...] }`,
  schema: HISTORY_SCHEMA,
  delegate: 'getBorrowPositionHistory',
  async run(kit, args) {
    return { history: await kit.getBorrowPositionHistory(toHistoryQuery(args)) };
  },
});

export const backpackGetFundingPaymentsTool = defineTool({
  name: 'backpack_get_funding_payments',
  description: `Fetch funding payments.

${HISTORY_INPUT}

Output data: { "payments": [...] }`,
  schema: HISTORY_SCHEMA,
  delegate: 'getFundingPayments',
  async run(kit, args) {
    return { payments: await kit.getFundingPayments(toHistoryQuery(args)) };
  },
});

export const backpackGetOrderHistoryTool = defineTool({
  name: 'backpack_get_order_history',
  description: `Fetch the order history.

${HISTORY_INPUT}

Output data: { "history": [...] }`,
  schema: HISTORY_SCHEMA,
  delegate: 'getOrderHistory',
  async run(kit, args) {
    return { history: await kit.getOrderHistory(toHistoryQuery(args)) };
  },
});

export const backpackGetPnlHistoryTool = defineTool({
  name: 'backpack_get_pnl_history',
  description: `Fetch the profit and loss history.

${HISTORY_INPUT}

Output data: { "history": [...] }`,
  schema: HISTORY_SCHEMA,
  delegate: 'getPnlHistory',
  async run(kit, args) {
    return { history: await kit.getPnlHistory(toHistoryQuery(args)) };
  },
});

export const backpackGetSettlementHistoryTool = defineTool({
  name: 'backpack_get_settlement_history',
  description: `Fetch the settlement history.

${HISTORY_INPUT}

Output data: { "history": [...] }`,
  schema: HISTORY_SCHEMA,
  delegate: 'getSettlementHistory',
  async run(kit, args) {
    return { history: await kit.getSettlementHistory(toHistoryQuery(args)) };
  },
});

export const backpackGetBorrowHistoryTool = defineTool({
  name: 'backpack_get_borrow_history',
  description: `Fetch the borrow history.

${HISTORY_INPUT}

Output data: { "borrow_history": [...] }`,
  schema: HISTORY_SCHEMA,
  delegate: 'getBorrowHistory',
  async run(kit, args) {
    return { borrow_history: await kit.getBorrowHistory(toHistoryQuery(args)) };
  },
});

export const backpackGetInterestHistoryTool = defineTool({
  name: 'backpack_get_interest_history',
  description: `Fetch the interest history.

${HISTORY_INPUT}

Output data: { "interest_history": [...] }`,
  schema: HISTORY_SCHEMA,
  delegate: 'getInterestHistory',
  async run(kit, args) {
    return { interest_history: await kit.getInterestHistory(toHistoryQuery(args)) };
  },
});

// ---- Orders -----------------------------------------------------------------

export const backpackGetUsersOpenOrdersTool = defineTool({
  name: 'backpack_get_users_open_orders',
  description: `Fetch one of the user's open orders.

Input (JSON string):
{ "symbol": "SOL_USDC", "order_id": "string" (optional), "client_id": 1 (optional) }

Output data: { "open_orders": ... }`,
  schema: ORDER_REF_SCHEMA,
  delegate: 'getUsersOpenOrders',
  async run(kit, args) {
    return { open_orders: await kit.getUsersOpenOrders(toOrderRef(args)) };
  },
});

export const backpackExecuteOrderTool = defineTool({
  name: 'backpack_execute_order',
  description: `Place an order on Backpack.

Input (JSON string):
{
  "symbol": "SOL_USDC",
  "side": "Bid" | "Ask",
  "order_type": "Limit" | "Market",
  "quantity": "string" (optional),
  "quote_quantity": "string" (optional, market orders),
  "price": "string" (optional, limit orders),
  "time_in_force": "GTC" | "IOC" | "FOK" (optional),
  "client_id": 1 (optional),
  "post_only": false (optional)
}

Output data: { "result": {...} }`,
  schema: {
    symbol: { type: 'string', required: true },
    side: { type: 'string', required: true },
    order_type: { type: 'string', required: true },
    quantity: { type: 'string' },
    quote_quantity: { type: 'string' },
    price: { type: 'string' },
    time_in_force: { type: 'string' },
    client_id: { type: 'integer' },
    post_only: { type: 'boolean' },
  },
  delegate: 'executeOrder',
  async run(kit, args) {
    const result = await kit.executeOrder({
      symbol: args.symbol,
      side: parseLiteral('side', args.side, ['Bid', 'Ask']),
      orderType: parseLiteral('order_type', args.order_type, ['Limit', 'Market']),
      quantity: optional(args.quantity),
      quoteQuantity: optional(args.quote_quantity),
      price: optional(args.price),
      timeInForce: optional(args.time_in_force),
      clientId: optional(args.client_id),
      postOnly: optional(args.post_only),
    });
    return { result };
  },
});

export const backpackCancelOpenOrderTool = defineTool({
  name: 'backpack_cancel_open_order',
  description: `Cancel an open order.

Input (JSON string):
{ "symbol": "SOL_USDC", "order_id": "string" (optional), "client_id": 1 (optional) }

Output data: { "result": ... }`,
  schema: ORDER_REF_SCHEMA,
  delegate: 'cancelOpenOrder',
  async run(kit, args) {
    return { result: await kit.cancelOpenOrder(toOrderRef(args)) };
  },
});

export const backpackGetOpenOrdersTool = defineTool({
  name: 'backpack_get_open_orders',
  description: `Fetch all open orders of a market.

Input (JSON string):
{ "symbol": "SOL_USDC" }

Output data: { "open_orders": [...] }`,
  schema: SYMBOL_SCHEMA,
  delegate: 'getOpenOrders',
  async run(kit, args) {
    return { open_orders: await kit.getOpenOrders(args.symbol) };
  },
});

export const backpackCancelOpenOrdersTool = defineTool({
  name: 'backpack_cancel_open_orders',
  description: `Cancel all open orders of a market.

Input (JSON string):
{ "symbol": "SOL_USDC" }

Output data: { "result": ... }`,
  schema: SYMBOL_SCHEMA,
  delegate: 'cancelOpenOrders',
  async run(kit, args) {
    return { result: await kit.cancelOpenOrders(args.symbol) };
  },
});

// ---- Markets ----------------------------------------------------------------

export const backpackGetSupportedAssetsTool = defineTool({
  name: 'backpack_get_supported_assets',
  description: `Fetch the assets supported by Backpack. Takes no input.

Output data: { "assets": [...] }`,
  input: 'none',
  schema: {},
  delegate: 'getSupportedAssets',
  async run(kit) {
    return { assets: await kit.getSupportedAssets() };
  },
});

export const backpackGetTickerInformationTool = defineTool({
  name: 'backpack_get_ticker_information',
  description: `Fetch 24h ticker information for a market.

Input (JSON string):
{ "symbol": "SOL_USDC" }

Output data: { "ticker_information": {...} }`,
  schema: SYMBOL_SCHEMA,
  delegate: 'getTickerInformation',
  async run(kit, args) {
    return { ticker_information: await kit.getTickerInformation(args.symbol) };
  },
});

export const backpackGetMarketsTool = defineTool({
  name: 'backpack_get_markets',
  description: `Fetch all markets. Takes no input.

Output data: { "markets": [...] }`,
  input: 'none',
  schema: {},
  delegate: 'getMarkets',
  async run(kit) {
    return { markets: await kit.getMarkets() };
  },
});

export const backpackGetMarketTool = defineTool({
  name: 'backpack_get_market',
  description: `Fetch one market.

Input (JSON string):
{ "symbol": "SOL_USDC" }

Output data: { "market": {...} }`,
  schema: SYMBOL_SCHEMA,
  delegate: 'getMarket',
  async run(kit, args) {
    return { market: await kit.getMarket(args.symbol) };
  },
});

export const backpackGetTickersTool = defineTool({
  name: 'backpack_get_tickers',
  description: `Fetch tickers for every market. Takes no input.

Output data: { "tickers": [...] }`,
  input: 'none',
  schema: {},
  delegate: 'getTickers',
  async run(kit) {
    return { tickers: await kit.getTickers() };
  },
});

export const backpackGetDepthTool = defineTool({
  name: 'backpack_get_depth',
  description: `Fetch the order book depth of a market.

Input (JSON string):
{ "symbol": "SOL_USDC" }

Output data: { "depth": {...} }`,
  schema: SYMBOL_SCHEMA,
  delegate: 'getDepth',
  async run(kit, args) {
    return { depth: await kit.getDepth(args.symbol) };
  },
});

export const backpackGetKlinesTool = defineTool({
  name: 'backpack_get_klines',
  description: `Fetch candlesticks for a market.

Input (JSON string):
{
  "symbol": "SOL_USDC",
  "interval": "1m" | "1h" | "1d" | ...,
  "start_time": 1700000000,
  "end_time": 1700086400 (optional)
}

Output data: { "klines": [...] }`,
  schema: {
    symbol: { type: 'string', required: true },
    interval: { type: 'string', required: true },
    start_time: { type: 'integer', required: true },
    end_time: { type: 'integer' },
  },
  delegate: 'getKlines',
  async run(kit, args) {
    const klines = await kit.getKlines({
      symbol: args.symbol,
      interval: args.interval,
      startTime: args.start_time,
      endTime: optional(args.end_time),
    });
    return { klines };
  },
});

export const backpackGetMarkPriceTool = defineTool({
  name: 'backpack_get_mark_price',
  description: `Fetch the mark price, index price and funding rate of a market.

Input (JSON string):
{ "symbol": "SOL_USDC_PERP" }

Output data: { "mark_price_data": {...} }`,
  schema: SYMBOL_SCHEMA,
  delegate: 'getMarkPrice',
  async run(kit, args) {
    return { mark_price_data: await kit.getMarkPrice(args.symbol) };
  },
});

export const backpackGetOpenInterestTool = defineTool({
  name: 'backpack_get_open_interest',
  description: `Fetch the open interest of a futures market.

Input (JSON string):
{ "symbol": "SOL_USDC_PERP" }

Output data: { "open_interest": {...} }`,
  schema: SYMBOL_SCHEMA,
  delegate: 'getOpenInterest',
  async run(kit, args) {
    return { open_interest: await kit.getOpenInterest(args.symbol) };
  },
});

export const backpackGetFundingIntervalRatesTool = defineTool({
  name: 'backpack_get_funding_interval_rates',
  description: `Fetch the funding interval rate history of a futures market.

Input (JSON string):
{ "symbol": "SOL_USDC_PERP", "limit": 100 (optional, default 100), "offset": 0 (optional, default 0) }

Output data: { "funding_rates": [...] }`,
  schema: {
    symbol: { type: 'string', required: true },
    limit: { type: 'integer' },
    offset: { type: 'integer' },
  },
  delegate: 'getFundingIntervalRates',
  async run(kit, args) {
    const rates = await kit.getFundingIntervalRates({
      symbol: args.symbol,
      limit: args.limit ?? 100,
      offset: args.offset ?? 0,
    });
    return { funding_rates: rates };
  },
});

// ---- System -----------------------------------------------------------------

export const backpackGetStatusTool = defineTool({
  name: 'backpack_get_status',
  description: `Fetch the exchange status and status messages. Takes no input.

Output data: { "status": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'getStatus',
  async run(kit) {
    return { status: await kit.getStatus() };
  },
});

export const backpackSendPingTool = defineTool({
  name: 'backpack_send_ping',
  description: `Ping the exchange; it answers "pong". Takes no input.

Output data: { "response": "pong" }`,
  input: 'none',
  schema: {},
  delegate: 'sendPing',
  async run(kit) {
    return { response: await kit.sendPing() };
  },
});

export const backpackGetSystemTimeTool = defineTool({
  name: 'backpack_get_system_time',
  description: `Fetch the exchange system time. Takes no input.

Output data: { "system_time": "..." }`,
  input: 'none',
  schema: {},
  delegate: 'getSystemTime',
  async run(kit) {
    return { system_time: await kit.getSystemTime() };
  },
});

// ---- Trades -----------------------------------------------------------------

export const backpackGetRecentTradesTool = defineTool({
  name: 'backpack_get_recent_trades',
  description: `Fetch the most recent trades of a market.

Input (JSON string):
{ "symbol": "SOL_USDC", "limit": 100 (optional, default 100) }

Output data: { "recent_trades": [...] }`,
  schema: {
    symbol: { type: 'string', required: true },
    limit: { type: 'integer' },
  },
  delegate: 'getRecentTrades',
  async run(kit, args) {
    return { recent_trades: await kit.getRecentTrades(args.symbol, args.limit ?? 100) };
  },
});

export const backpackGetHistoricalTradesTool = defineTool({
  name: 'backpack_get_historical_trades',
  description: `Fetch historical trades of a market.

Input (JSON string):
{ "symbol": "SOL_USDC", "limit": 100 (optional, default 100), "offset": 0 (optional, default 0) }

Output data: { "historical_trades": [...] }`,
  schema: {
    symbol: { type: 'string', required: true },
    limit: { type: 'integer' },
    offset: { type: 'integer' },
  },
  delegate: 'getHistoricalTrades',
  async run(kit, args) {
    const trades = await kit.getHistoricalTrades({
      symbol: args.symbol,
      limit: args.limit ?? 100,
      offset: args.offset ?? 0,
    });
    return { historical_trades: trades };
  },
});

// ---- Capital ----------------------------------------------------------------

export const backpackGetCollateralInfoTool = defineTool({
  name: 'backpack_get_collateral_info',
  description: `Fetch collateral information.

Input (JSON string):
{ "sub_account_id": 1 (optional) }

Output data: { "collateral_info": {...} }`,
  schema: SUB_ACCOUNT_SCHEMA,
  delegate: 'getCollateralInfo',
  async run(kit, args) {
    return { collateral_info: await kit.getCollateralInfo(optional(args.sub_account_id)) };
  },
});

export const backpackGetAccountDepositsTool = defineTool({
  name: 'backpack_get_account_deposits',
  description: `Fetch account deposits.

Input (JSON string):
{ "sub_account_id": 1 (optional) }

Output data: { "deposits": [...] }`,
  schema: SUB_ACCOUNT_SCHEMA,
  delegate: 'getAccountDeposits',
  async run(kit, args) {
    return { deposits: await kit.getAccountDeposits(optional(args.sub_account_id)) };
  },
});

export const backpackGetOpenPositionsTool = defineTool({
  name: 'backpack_get_open_positions',
  description: `Fetch open futures positions. Takes no input.

Output data: { "open_positions": [...] }`,
  input: 'none',
  schema: {},
  delegate: 'getOpenPositions',
  async run(kit) {
    return { open_positions: await kit.getOpenPositions() };
  },
});

export const backpackTools: ToolDefinition[] = [
  backpackGetAccountBalancesTool,
  backpackRequestWithdrawalTool,
  backpackGetAccountSettingsTool,
  backpackUpdateAccountSettingsTool,
  backpackGetBorrowLendPositionsTool,
  backpackExecuteBorrowLendTool,
  backpackGetFillHistoryTool,
  backpackGetBorrowPositionHistoryTool,
  backpackGetFundingPaymentsTool,
  backpackGetOrderHistoryTool,
  backpackGetPnlHistoryTool,
  backpackGetSettlementHistoryTool,
  backpackGetUsersOpenOrdersTool,
  backpackExecuteOrderTool,
  backpackCancelOpenOrderTool,
  backpackGetOpenOrdersTool,
  backpackCancelOpenOrdersTool,
  backpackGetSupportedAssetsTool,
  backpackGetTickerInformationTool,
  backpackGetMarketsTool,
  backpackGetMarketTool,
  backpackGetTickersTool,
  backpackGetDepthTool,
  backpackGetKlinesTool,
  backpackGetMarkPriceTool,
  backpackGetOpenInterestTool,
  backpackGetFundingIntervalRatesTool,
  backpackGetStatusTool,
  backpackSendPingTool,
  backpackGetSystemTimeTool,
  backpackGetRecentTradesTool,
  backpackGetHistoricalTradesTool,
  backpackGetCollateralInfoTool,
  backpackGetAccountDepositsTool,
  backpackGetOpenPositionsTool,
  backpackGetBorrowHistoryTool,
  backpackGetInterestHistoryTool,
];
