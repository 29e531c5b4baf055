/**
 * Wallet tools: balances, transfers, token deployment, swaps and account
 * housekeeping for the kit's own wallet.
 */

import { ToolError } from '../errors.js';
import { parseOptionalPublicKey, parsePublicKey, parseStringList } from '../kit/arguments.js';
import { defineTool, type ToolDefinition } from './tool.js';

export const balanceTool = defineTool({
  name: 'solana_balance',
  description: `Get the balance of the wallet, in SOL or in a token.

Input (plain text): a token mint address, or nothing for the SOL balance.

Output data: { "balance": number, "token": "mint address" | "SOL" }`,
  input: 'text',
  schema: { input: { type: 'string' } },
  delegate: 'getBalance',
  async run(kit, args) {
    const mint = parseOptionalPublicKey('input', args.input);
    const balance = await kit.getBalance(mint);
    return { balance, token: args.input ?? 'SOL' };
  },
});

export const transferTool = defineTool({
  name: 'solana_transfer',
  description: `Transfer SOL or an SPL token to another address.

Input (JSON string):
{
  "to": "recipient wallet address",
  "amount": 1,
  "mint": "token mint address" (optional, omit for SOL)
}

Output data: { "amount", "recipient", "token", "transaction" }`,
  schema: {
    to: { type: 'string', required: true },
    amount: { type: 'integer', required: true, min: 1 },
    mint: { type: 'string' },
  },
  delegate: 'transfer',
  successMessage: 'Transfer completed successfully',
  async run(kit, args) {
    const recipient = parsePublicKey('to', args.to);
    const mint = parseOptionalPublicKey('mint', args.mint);
    const transaction = await kit.transfer(recipient, args.amount, mint);
    return {
      amount: args.amount,
      recipient: args.to,
      token: args.mint ?? 'SOL',
      transaction,
    };
  },
});

export const deployTokenTool = defineTool({
  name: 'solana_deploy_token',
  description: `Deploy a new SPL token.

Input (JSON string):
{
  "decimals": 9 (0-9),
  "initialSupply": 1000000
}

Output data: { "mintAddress": "...", "decimals": number }`,
  schema: {
    decimals: { type: 'integer', required: true, min: 0, max: 9 },
    initialSupply: { type: 'integer', required: true, min: 1 },
  },
  delegate: 'deployToken',
  successMessage: 'Token deployed successfully',
  async run(kit, args) {
    const token = await kit.deployToken({ decimals: args.decimals, initialSupply: args.initialSupply });
    return { mintAddress: token.mint, decimals: args.decimals };
  },
});

export const tradeTool = defineTool({
  name: 'solana_trade',
  description: `Swap tokens through Jupiter.

Input (JSON string):
{
  "output_mint": "mint address of the token to receive",
  "input_amount": 1,
  "input_mint": "mint address of the token to sell" (optional, defaults to SOL),
  "slippage_bps": 100 (optional, default 100)
}

Output data: { "transaction": "..." }`,
  schema: {
    output_mint: { type: 'string', required: true },
    input_amount: { type: 'integer', required: true, min: 1 },
    input_mint: { type: 'string' },
    slippage_bps: { type: 'integer', min: 0 },
  },
  delegate: 'trade',
  successMessage: 'Trade executed successfully',
  async run(kit, args) {
    const transaction = await kit.trade({
      outputMint: parsePublicKey('output_mint', args.output_mint),
      inputAmount: args.input_amount,
      inputMint: parseOptionalPublicKey('input_mint', args.input_mint),
      slippageBps: args.slippage_bps ?? 100,
    });
    return { transaction };
  },
});

export const requestFundsTool = defineTool({
  name: 'solana_request_funds',
  description: `Request SOL from the faucet (devnet and testnet only). Takes no input.

Output data: { "result": "..." }`,
  input: 'none',
  schema: {},
  delegate: 'requestFaucetFunds',
  successMessage: 'Faucet funds requested successfully',
  async run(kit) {
    return { result: await kit.requestFaucetFunds() };
  },
});

const DECIMAL_AMOUNT = /^\d+(\.\d+)?$/;

export const stakeTool = defineTool({
  name: 'solana_stake',
  description: `Stake SOL with Jupiter.

Input (plain text): the amount of SOL to stake, e.g. "1.5".

Output data: { "result": "..." }`,
  input: 'text',
  schema: { input: { type: 'string', required: true } },
  delegate: 'stake',
  successMessage: 'Assets staked successfully',
  async run(kit, args) {
    const amount = DECIMAL_AMOUNT.test(args.input) ? Number(args.input) : NaN;
    if (!(amount > 0)) {
      throw new ToolError('Stake amount must be a positive number', 'INVALID_ARGUMENT');
    }
    return { result: await kit.stake(amount) };
  },
});

export const getWalletAddressTool = defineTool({
  name: 'solana_get_wallet_address',
  description: `Get the address of the agent's wallet. Takes no input.

Output data: { "result": "wallet address" }`,
  input: 'none',
  schema: {},
  delegate: 'getWalletAddress',
  successMessage: 'Wallet address fetched successfully',
  async run(kit) {
    return { result: await kit.getWalletAddress() };
  },
});

export const createImageTool = defineTool({
  name: 'solana_create_image',
  description: `Generate images from a text prompt.

Input (JSON string):
{
  "prompt": "description of the image",
  "size": "1024x1024" (optional),
  "n": 1 (optional, number of images)
}

Output data: { "images": ["image URLs"] }`,
  schema: {
    prompt: { type: 'string', required: true },
    size: { type: 'string' },
    n: { type: 'integer', min: 1 },
  },
  delegate: 'createImage',
  successMessage: 'Image created successfully',
  async run(kit, args) {
    if (args.prompt.trim() === '') {
      throw new ToolError('Prompt must be a non-empty string.', 'INVALID_ARGUMENT');
    }
    const generated = await kit.createImage(args.prompt, args.size ?? '1024x1024', args.n ?? 1);
    return { images: generated.images };
  },
});

export const getTpsTool = defineTool({
  name: 'solana_get_tps',
  description: `Get the current transactions per second on Solana. Takes no input.

Output data: { "tps": number }`,
  input: 'none',
  schema: {},
  delegate: 'getTps',
  successMessage: (data) => `Solana (mainnet-beta) current transactions per second: ${String(data.tps)}`,
  async run(kit) {
    return { tps: await kit.getTps() };
  },
});

export const burnAndCloseAccountTool = defineTool({
  name: 'solana_burn_and_close_account',
  description: `Burn any remaining balance of a token account and close it.

Input (JSON string):
{ "token_account": "token account address" }

Output data: { "result": ... }`,
  schema: { token_account: { type: 'string', required: true } },
  delegate: 'burnAndCloseAccounts',
  successMessage: 'Token account burned and closed successfully.',
  async run(kit, args) {
    return { result: await kit.burnAndCloseAccounts(args.token_account) };
  },
});

export const burnAndCloseMultipleAccountsTool = defineTool({
  name: 'solana_burn_and_close_multiple_accounts',
  description: `Burn and close several token accounts at once.

Input (JSON string):
{ "token_accounts": ["token account addresses"] }

Output data: { "result": ... }`,
  schema: { token_accounts: { type: 'array', required: true } },
  delegate: 'multipleBurnAndCloseAccounts',
  successMessage: 'Token accounts burned and closed successfully.',
  async run(kit, args) {
    const accounts = parseStringList('token_accounts', args.token_accounts);
    return { result: await kit.multipleBurnAndCloseAccounts(accounts) };
  },
});

export const sendCompressedAirdropTool = defineTool({
  name: 'lightprotocol_send_compressed_airdrop',
  description: `Airdrop a token to many recipients using ZK compression.

Input (JSON string):
{
  "mint_address": "token mint address",
  "amount": 10 (per recipient, in token units),
  "decimals": 6,
  "recipients": ["recipient addresses"],
  "priority_fee_in_lamports": 30000,
  "should_log": false (optional)
}

Output data: { "transaction_ids": ["..."] }`,
  schema: {
    mint_address: { type: 'string', required: true },
    amount: { type: 'number', required: true, min: 0 },
    decimals: { type: 'integer', required: true, min: 0 },
    recipients: { type: 'array', required: true },
    priority_fee_in_lamports: { type: 'integer', required: true, min: 0 },
    should_log: { type: 'boolean' },
  },
  delegate: 'sendCompressedAirdrop',
  async run(kit, args) {
    const ids = await kit.sendCompressedAirdrop({
      mintAddress: args.mint_address,
      amount: args.amount,
      decimals: args.decimals,
      recipients: parseStringList('recipients', args.recipients),
      priorityFeeInLamports: args.priority_fee_in_lamports,
      shouldLog: args.should_log ?? false,
    });
    return { transaction_ids: ids };
  },
});

export const walletTools: ToolDefinition[] = [
  balanceTool,
  transferTool,
  deployTokenTool,
  tradeTool,
  requestFundsTool,
  stakeTool,
  getWalletAddressTool,
  createImageTool,
  getTpsTool,
  burnAndCloseAccountTool,
  burnAndCloseMultipleAccountsTool,
  sendCompressedAirdropTool,
];
