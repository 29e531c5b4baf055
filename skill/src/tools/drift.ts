/**
 * Drift tools: user accounts, perpetuals, spot swaps, insurance fund and vaults.
 */

import { optional, parseLiteral } from '../kit/arguments.js';
import type { DriftPerpTradeParams, DriftVaultParams } from '../kit/interface.js';
import { defineTool, type ToolDefinition } from './tool.js';

const PERP_TRADE_SCHEMA = {
  amount: { type: 'number', required: true },
  symbol: { type: 'string', required: true },
  action: { type: 'string', required: true },
  trade_type: { type: 'string', required: true },
  price: { type: 'number' },
} as const;

interface PerpTradeInput {
  amount: number;
  symbol: string;
  action: string;
  trade_type: string;
  price?: number | null;
}

function toPerpTrade(args: PerpTradeInput): DriftPerpTradeParams {
  return {
    amount: args.amount,
    symbol: args.symbol,
    action: parseLiteral('action', args.action, ['long', 'short']),
    tradeType: parseLiteral('trade_type', args.trade_type, ['market', 'limit']),
    price: optional(args.price),
  };
}

const VAULT_SCHEMA = {
  name: { type: 'string', required: true },
  market_name: { type: 'string', required: true, description: "Market in '<token>-<token>' form" },
  redeem_period: { type: 'integer', required: true },
  max_tokens: { type: 'integer', required: true },
  min_deposit_amount: { type: 'number', required: true },
  management_fee: { type: 'number', required: true },
  profit_share: { type: 'number', required: true },
  hurdle_rate: { type: 'number' },
  permissioned: { type: 'boolean' },
} as const;

interface VaultInput {
  name: string;
  market_name: string;
  redeem_period: number;
  max_tokens: number;
  min_deposit_amount: number;
  management_fee: number;
  profit_share: number;
  hurdle_rate?: number | null;
  permissioned?: boolean | null;
}

function toVaultParams(args: VaultInput): DriftVaultParams {
  return {
    name: args.name,
    marketName: args.market_name,
    redeemPeriod: args.redeem_period,
    maxTokens: args.max_tokens,
    minDepositAmount: args.min_deposit_amount,
    managementFee: args.management_fee,
    profitShare: args.profit_share,
    hurdleRate: optional(args.hurdle_rate),
    permissioned: optional(args.permissioned),
  };
}

const VAULT_INPUT_FIELDS = `  "name": "vault name",
  "market_name": "SOL-SOL",
  "redeem_period": 1000 (blocks),
  "max_tokens": 100000,
  "min_deposit_amount": 1,
  "management_fee": 2 (percent),
  "profit_share": 20 (percent),
  "hurdle_rate": 0 (optional),
  "permissioned": false (optional)`;

// ---- User account -----------------------------------------------------------

export const createDriftUserAccountTool = defineTool({
  name: 'create_drift_user_account',
  description: `Create a Drift user account with an initial deposit.

Input (JSON string):
{ "deposit_amount": 1.5, "deposit_symbol": "SOL" }

Output data: { "transaction": ... }`,
  schema: {
    deposit_amount: { type: 'number', required: true },
    deposit_symbol: { type: 'string', required: true },
  },
  delegate: 'createDriftUserAccount',
  async run(kit, args) {
    return { transaction: await kit.createDriftUserAccount(args.deposit_amount, args.deposit_symbol) };
  },
});

export const depositToDriftUserAccountTool = defineTool({
  name: 'deposit_to_drift_user_account',
  description: `Deposit funds into the Drift user account.

Input (JSON string):
{ "amount": 1.5, "symbol": "SOL", "is_repayment": false (optional, repay a loan) }

Output data: { "transaction": ... }`,
  schema: {
    amount: { type: 'number', required: true },
    symbol: { type: 'string', required: true },
    is_repayment: { type: 'boolean' },
  },
  delegate: 'depositToDriftUserAccount',
  async run(kit, args) {
    const transaction = await kit.depositToDriftUserAccount(args.amount, args.symbol, optional(args.is_repayment));
    return { transaction };
  },
});

export const withdrawFromDriftUserAccountTool = defineTool({
  name: 'withdraw_from_drift_user_account',
  description: `Withdraw funds from the Drift user account.

Input (JSON string):
{ "amount": 1.5, "symbol": "SOL", "is_borrow": false (optional, borrow when balance is short) }

Output data: { "transaction": ... }`,
  schema: {
    amount: { type: 'number', required: true },
    symbol: { type: 'string', required: true },
    is_borrow: { type: 'boolean' },
  },
  delegate: 'withdrawFromDriftUserAccount',
  async run(kit, args) {
    const transaction = await kit.withdrawFromDriftUserAccount(args.amount, args.symbol, optional(args.is_borrow));
    return { transaction };
  },
});

export const tradeUsingDriftPerpAccountTool = defineTool({
  name: 'trade_using_drift_perp_account',
  description: `Open a perpetual position from the Drift user account.

Input (JSON string):
{
  "amount": 10,
  "symbol": "SOL-PERP",
  "action": "long" | "short",
  "trade_type": "market" | "limit",
  "price": 150 (optional, limit orders)
}

Output data: { "transaction": ... }`,
  schema: PERP_TRADE_SCHEMA,
  delegate: 'tradeUsingDriftPerpAccount',
  async run(kit, args) {
    return { transaction: await kit.tradeUsingDriftPerpAccount(toPerpTrade(args)) };
  },
});

export const checkIfDriftAccountExistsTool = defineTool({
  name: 'check_if_drift_account_exists',
  description: `Check whether the agent has a Drift user account. Takes no input.

Output data: { "exists": true }`,
  input: 'none',
  schema: {},
  delegate: 'checkIfDriftAccountExists',
  async run(kit) {
    return { exists: await kit.checkIfDriftAccountExists() };
  },
});

export const driftUserAccountInfoTool = defineTool({
  name: 'drift_user_account_info',
  description: `Fetch the Drift user account details. Takes no input.

Output data: { "account_info": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'driftUserAccountInfo',
  async run(kit) {
    return { account_info: await kit.driftUserAccountInfo() };
  },
});

export const getAvailableDriftMarketsTool = defineTool({
  name: 'get_available_drift_markets',
  description: `List the markets available on Drift. Takes no input.

Output data: { "markets": {...} }`,
  input: 'none',
  schema: {},
  delegate: 'getAvailableDriftMarkets',
  async run(kit) {
    return { markets: await kit.getAvailableDriftMarkets() };
  },
});

// ---- Insurance fund ---------------------------------------------------------

export const stakeToDriftInsuranceFundTool = defineTool({
  name: 'stake_to_drift_insurance_fund',
  description: `Stake funds into the Drift insurance fund.

Input (JSON string):
{ "amount": 10, "symbol": "USDC" }

Output data: { "transaction": ... }`,
  schema: {
    amount: { type: 'number', required: true },
    symbol: { type: 'string', required: true },
  },
  delegate: 'stakeToDriftInsuranceFund',
  async run(kit, args) {
    return { transaction: await kit.stakeToDriftInsuranceFund(args.amount, args.symbol) };
  },
});

export const requestUnstakeFromDriftInsuranceFundTool = defineTool({
  name: 'request_unstake_from_drift_insurance_fund',
  description: `Request to unstake funds from the Drift insurance fund.

Input (JSON string):
{ "amount": 10, "symbol": "USDC" }

Output data: { "transaction": ... }`,
  schema: {
    amount: { type: 'number', required: true },
    symbol: { type: 'string', required: true },
  },
  delegate: 'requestUnstakeFromDriftInsuranceFund',
  async run(kit, args) {
    return { transaction: await kit.requestUnstakeFromDriftInsuranceFund(args.amount, args.symbol) };
  },
});

export const unstakeFromDriftInsuranceFundTool = defineTool({
  name: 'unstake_from_drift_insurance_fund',
  description: `Complete a pending unstake request on the Drift insurance fund.

Input (JSON string):
{ "symbol": "USDC" }

Output data: { "transaction": ... }`,
  schema: { symbol: { type: 'string', required: true } },
  delegate: 'unstakeFromDriftInsuranceFund',
  async run(kit, args) {
    return { transaction: await kit.unstakeFromDriftInsuranceFund(args.symbol) };
  },
});

// ---- Spot & market data -----------------------------------------------------

export const driftSwapSpotTokenTool = defineTool({
  name: 'drift_swap_spot_token',
  description: `Swap spot tokens on Drift. Give either from_amount or to_amount.

Input (JSON string):
{
  "from_symbol": "USDC",
  "to_symbol": "SOL",
  "slippage": 0.5 (optional, percent),
  "to_amount": 1 (optional),
  "from_amount": 100 (optional)
}

Output data: { "transaction": ... }`,
  schema: {
    from_symbol: { type: 'string', required: true },
    to_symbol: { type: 'string', required: true },
    slippage: { type: 'number' },
    to_amount: { type: 'number' },
    from_amount: { type: 'number' },
  },
  delegate: 'driftSwapSpotToken',
  async run(kit, args) {
    const transaction = await kit.driftSwapSpotToken({
      fromSymbol: args.from_symbol,
      toSymbol: args.to_symbol,
      slippage: optional(args.slippage),
      toAmount: optional(args.to_amount),
      fromAmount: optional(args.from_amount),
    });
    return { transaction };
  },
});

export const getDriftPerpMarketFundingRateTool = defineTool({
  name: 'get_drift_perp_market_funding_rate',
  description: `Fetch the funding rate of a Drift perpetual market.

Input (JSON string):
{ "symbol": "SOL-PERP", "period": "year" | "hour" (optional, default "year") }

Output data: { "funding_rate": {...} }`,
  schema: {
    symbol: { type: 'string', required: true },
    period: { type: 'string' },
  },
  delegate: 'getDriftPerpMarketFundingRate',
  async run(kit, args) {
    const period = parseLiteral('period', args.period ?? 'year', ['year', 'hour']);
    return { funding_rate: await kit.getDriftPerpMarketFundingRate(args.symbol, period) };
  },
});

export const getDriftEntryQuoteOfPerpTradeTool = defineTool({
  name: 'get_drift_entry_quote_of_perp_trade',
  description: `Quote the entry of a perpetual trade on Drift.

Input (JSON string):
{ "amount": 10, "symbol": "SOL-PERP", "action": "long" | "short" }

Output data: { "entry_quote": {...} }`,
  schema: {
    amount: { type: 'number', required: true },
    symbol: { type: 'string', required: true },
    action: { type: 'string', required: true },
  },
  delegate: 'getDriftEntryQuoteOfPerpTrade',
  async run(kit, args) {
    const action = parseLiteral('action', args.action, ['long', 'short']);
    return { entry_quote: await kit.getDriftEntryQuoteOfPerpTrade(args.amount, args.symbol, action) };
  },
});

export const getDriftLendBorrowApyTool = defineTool({
  name: 'get_drift_lend_borrow_apy',
  description: `Fetch the lending and borrowing APY of a token on Drift.

Input (JSON string):
{ "symbol": "USDC" }

Output data: { "apy_data": {...} }`,
  schema: { symbol: { type: 'string', required: true } },
  delegate: 'getDriftLendBorrowApy',
  async run(kit, args) {
    return { apy_data: await kit.getDriftLendBorrowApy(args.symbol) };
  },
});

// ---- Vaults -----------------------------------------------------------------

export const createDriftVaultTool = defineTool({
  name: 'create_drift_vault',
  description: `Create a Drift vault.

Input (JSON string):
{
${VAULT_INPUT_FIELDS}
}

Output data: { "vault_details": {...} }`,
  schema: VAULT_SCHEMA,
  delegate: 'createDriftVault',
  async run(kit, args) {
    return { vault_details: await kit.createDriftVault(toVaultParams(args)) };
  },
});

export const updateDriftVaultDelegateTool = defineTool({
  name: 'update_drift_vault_delegate',
  description: `Change the delegate of a Drift vault.

Input (JSON string):
{ "vault": "vault address", "delegate_address": "new delegate address" }

Output data: { "transaction": ... }`,
  schema: {
    vault: { type: 'string', required: true },
    delegate_address: { type: 'string', required: true },
  },
  delegate: 'updateDriftVaultDelegate',
  async run(kit, args) {
    return { transaction: await kit.updateDriftVaultDelegate(args.vault, args.delegate_address) };
  },
});

export const updateDriftVaultTool = defineTool({
  name: 'update_drift_vault',
  description: `Update the settings of a Drift vault.

Input (JSON string):
{
  "vault_address": "vault address",
${VAULT_INPUT_FIELDS}
}

Output data: { "vault_update": {...} }`,
  schema: { vault_address: { type: 'string', required: true }, ...VAULT_SCHEMA },
  delegate: 'updateDriftVault',
  async run(kit, args) {
    return { vault_update: await kit.updateDriftVault(args.vault_address, toVaultParams(args)) };
  },
});

export const getDriftVaultInfoTool = defineTool({
  name: 'get_drift_vault_info',
  description: `Fetch the details of a Drift vault by name.

Input (JSON string):
{ "vault_name": "vault name" }

Output data: { "vault_info": {...} }`,
  schema: { vault_name: { type: 'string', required: true } },
  delegate: 'getDriftVaultInfo',
  async run(kit, args) {
    return { vault_info: await kit.getDriftVaultInfo(args.vault_name) };
  },
});

export const depositIntoDriftVaultTool = defineTool({
  name: 'deposit_into_drift_vault',
  description: `Deposit funds into a Drift vault.

Input (JSON string):
{ "amount": 10, "vault": "vault address" }

Output data: { "transaction": ... }`,
  schema: {
    amount: { type: 'number', required: true },
    vault: { type: 'string', required: true },
  },
  delegate: 'depositIntoDriftVault',
  async run(kit, args) {
    return { transaction: await kit.depositIntoDriftVault(args.amount, args.vault) };
  },
});

export const requestWithdrawalFromDriftVaultTool = defineTool({
  name: 'request_withdrawal_from_drift_vault',
  description: `Request a withdrawal from a Drift vault.

Input (JSON string):
{ "amount": 10, "vault": "vault address" }

Output data: { "transaction": ... }`,
  schema: {
    amount: { type: 'number', required: true },
    vault: { type: 'string', required: true },
  },
  delegate: 'requestWithdrawalFromDriftVault',
  async run(kit, args) {
    return { transaction: await kit.requestWithdrawalFromDriftVault(args.amount, args.vault) };
  },
});

export const withdrawFromDriftVaultTool = defineTool({
  name: 'withdraw_from_drift_vault',
  description: `Withdraw from a Drift vault once the redeem period of a request has passed.

Input (JSON string):
{ "vault": "vault address" }

Output data: { "transaction": ... }`,
  schema: { vault: { type: 'string', required: true } },
  delegate: 'withdrawFromDriftVault',
  async run(kit, args) {
    return { transaction: await kit.withdrawFromDriftVault(args.vault) };
  },
});

export const deriveDriftVaultAddressTool = defineTool({
  name: 'derive_drift_vault_address',
  description: `Derive the address of a Drift vault from its name.

Input (JSON string):
{ "name": "vault name" }

Output data: { "vault_address": "..." }`,
  schema: { name: { type: 'string', required: true } },
  delegate: 'deriveDriftVaultAddress',
  async run(kit, args) {
    return { vault_address: await kit.deriveDriftVaultAddress(args.name) };
  },
});

export const tradeUsingDelegatedDriftVaultTool = defineTool({
  name: 'trade_using_delegated_drift_vault',
  description: `Trade perpetuals on behalf of a vault the agent is delegate of.

Input (JSON string):
{
  "vault": "vault address",
  "amount": 10,
  "symbol": "SOL-PERP",
  "action": "long" | "short",
  "trade_type": "market" | "limit",
  "price": 150 (optional, limit orders)
}

Output data: { "transaction": ... }`,
  schema: { vault: { type: 'string', required: true }, ...PERP_TRADE_SCHEMA },
  delegate: 'tradeUsingDelegatedDriftVault',
  async run(kit, args) {
    return { transaction: await kit.tradeUsingDelegatedDriftVault(args.vault, toPerpTrade(args)) };
  },
});

export const driftTools: ToolDefinition[] = [
  createDriftUserAccountTool,
  depositToDriftUserAccountTool,
  withdrawFromDriftUserAccountTool,
  tradeUsingDriftPerpAccountTool,
  checkIfDriftAccountExistsTool,
  driftUserAccountInfoTool,
  getAvailableDriftMarketsTool,
  stakeToDriftInsuranceFundTool,
  requestUnstakeFromDriftInsuranceFundTool,
  unstakeFromDriftInsuranceFundTool,
  driftSwapSpotTokenTool,
  getDriftPerpMarketFundingRateTool,
  getDriftEntryQuoteOfPerpTradeTool,
  getDriftLendBorrowApyTool,
  createDriftVaultTool,
  updateDriftVaultDelegateTool,
  updateDriftVaultTool,
  getDriftVaultInfoTool,
  depositIntoDriftVaultTool,
  requestWithdrawalFromDriftVaultTool,
  withdrawFromDriftVaultTool,
  deriveDriftVaultAddressTool,
  tradeUsingDelegatedDriftVaultTool,
];
