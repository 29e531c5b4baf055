/**
 * Helius tools: balances, NFT indexes, enhanced transactions and webhooks.
 */

import { optional, parseOptionalStringList, parseStringList } from '../kit/arguments.js';
import type { WebhookParams } from '../kit/interface.js';
import { defineTool, type ToolDefinition } from './tool.js';

const WEBHOOK_FIELDS = {
  webhook_url: { type: 'string', required: true },
  transaction_types: { type: 'array', required: true },
  account_addresses: { type: 'array', required: true },
  webhook_type: { type: 'string', required: true },
  txn_status: { type: 'string' },
  auth_header: { type: 'string' },
} as const;

interface WebhookInput {
  webhook_url: string;
  transaction_types: unknown[];
  account_addresses: unknown[];
  webhook_type: string;
  txn_status?: string | null;
  auth_header?: string | null;
}

function toWebhookParams(args: WebhookInput): WebhookParams {
  return {
    webhookUrl: args.webhook_url,
    transactionTypes: parseStringList('transaction_types', args.transaction_types),
    accountAddresses: parseStringList('account_addresses', args.account_addresses),
    webhookType: args.webhook_type,
    txnStatus: args.txn_status ?? 'all',
    authHeader: optional(args.auth_header),
  };
}

export const heliusGetBalancesTool = defineTool({
  name: 'solana_helius_get_balances',
  description: `Fetch the token balances of a Solana address.

Input (JSON string):
{ "address": "string, the Solana address" }

Output data: { "balances": [...] }`,
  schema: { address: { type: 'string', required: true } },
  delegate: 'getBalances',
  async run(kit, args) {
    return { balances: await kit.getBalances(args.address) };
  },
});

export const heliusGetAddressNameTool = defineTool({
  name: 'solana_helius_get_address_name',
  description: `Fetch the name of a Solana address.

Input (JSON string):
{ "address": "string, the Solana address" }

Output data: { "name": "..." }`,
  schema: { address: { type: 'string', required: true } },
  delegate: 'getAddressName',
  async run(kit, args) {
    return { name: await kit.getAddressName(args.address) };
  },
});

export const heliusGetNftEventsTool = defineTool({
  name: 'solana_helius_get_nft_events',
  description: `Fetch NFT events matching the given filters.

Input (JSON string):
{
  "accounts": ["addresses to fetch NFT events for"],
  "types": ["event types"] (optional),
  "sources": ["sources"] (optional),
  "start_slot": 0, "end_slot": 0 (optional),
  "start_time": 0, "end_time": 0 (optional),
  "first_verified_creator": ["creator addresses"] (optional),
  "verified_collection_address": ["collection addresses"] (optional),
  "limit": 100 (optional),
  "sort_order": "string" (optional),
  "pagination_token": "string" (optional)
}

Output data: { "events": [...] }`,
  schema: {
    accounts: { type: 'array', required: true },
    types: { type: 'array' },
    sources: { type: 'array' },
    start_slot: { type: 'integer' },
    end_slot: { type: 'integer' },
    start_time: { type: 'integer' },
    end_time: { type: 'integer' },
    first_verified_creator: { type: 'array' },
    verified_collection_address: { type: 'array' },
    limit: { type: 'integer' },
    sort_order: { type: 'string' },
    pagination_token: { type: 'string' },
  },
  delegate: 'getNftEvents',
  async run(kit, args) {
    const events = await kit.getNftEvents({
      accounts: parseStringList('accounts', args.accounts),
      types: parseOptionalStringList('types', args.types),
      sources: parseOptionalStringList('sources', args.sources),
      startSlot: optional(args.start_slot),
      endSlot: optional(args.end_slot),
      startTime: optional(args.start_time),
      endTime: optional(args.end_time),
      firstVerifiedCreator: parseOptionalStringList('first_verified_creator', args.first_verified_creator),
      verifiedCollectionAddress: parseOptionalStringList(
        'verified_collection_address',
        args.verified_collection_address,
      ),
      limit: optional(args.limit),
      sortOrder: optional(args.sort_order),
      paginationToken: optional(args.pagination_token),
    });
    return { events };
  },
});

export const heliusGetMintlistsTool = defineTool({
  name: 'solana_helius_get_mintlists',
  description: `Fetch mintlists for a list of verified creators.

Input (JSON string):
{
  "first_verified_creators": ["creator addresses"],
  "verified_collection_addresses": ["collection addresses"] (optional),
  "limit": 100 (optional),
  "pagination_token": "string" (optional)
}

Output data: { "mintlists": [...] }`,
  schema: {
    first_verified_creators: { type: 'array', required: true },
    verified_collection_addresses: { type: 'array' },
    limit: { type: 'integer' },
    pagination_token: { type: 'string' },
  },
  delegate: 'getMintlists',
  async run(kit, args) {
    const mintlists = await kit.getMintlists({
      firstVerifiedCreators: parseStringList('first_verified_creators', args.first_verified_creators),
      verifiedCollectionAddresses: parseOptionalStringList(
        'verified_collection_addresses',
        args.verified_collection_addresses,
      ),
      limit: optional(args.limit),
      paginationToken: optional(args.pagination_token),
    });
    return { mintlists };
  },
});

export const heliusGetNftFingerprintTool = defineTool({
  name: 'solana_helius_get_nft_fingerprint',
  description: `Fetch NFT fingerprints for a list of mint addresses.

Input (JSON string):
{ "mints": ["mint addresses"] }

Output data: { "fingerprint": [...] }`,
  schema: { mints: { type: 'array', required: true } },
  delegate: 'getNftFingerprint',
  async run(kit, args) {
    return { fingerprint: await kit.getNftFingerprint(parseStringList('mints', args.mints)) };
  },
});

export const heliusGetActiveListingsTool = defineTool({
  name: 'solana_helius_get_active_listings',
  description: `Fetch active NFT listings across marketplaces.

Input (JSON string):
{
  "first_verified_creators": ["creator addresses"],
  "verified_collection_addresses": ["collection addresses"] (optional),
  "marketplaces": ["marketplace names"] (optional),
  "limit": 100 (optional),
  "pagination_token": "string" (optional)
}

Output data: { "active_listings": [...] }`,
  schema: {
    first_verified_creators: { type: 'array', required: true },
    verified_collection_addresses: { type: 'array' },
    marketplaces: { type: 'array' },
    limit: { type: 'integer' },
    pagination_token: { type: 'string' },
  },
  delegate: 'getActiveListings',
  async run(kit, args) {
    const listings = await kit.getActiveListings({
      firstVerifiedCreators: parseStringList('first_verified_creators', args.first_verified_creators),
      verifiedCollectionAddresses: parseOptionalStringList(
        'verified_collection_addresses',
        args.verified_collection_addresses,
      ),
      marketplaces: parseOptionalStringList('marketplaces', args.marketplaces),
      limit: optional(args.limit),
      paginationToken: optional(args.pagination_token),
    });
    return { active_listings: listings };
  },
});

export const heliusGetNftMetadataTool = defineTool({
  name: 'solana_helius_get_nft_metadata',
  description: `Fetch metadata for NFTs by mint address.

Input (JSON string):
{ "mint_addresses": ["mint addresses"] }

Output data: { "metadata": [...] }`,
  schema: { mint_addresses: { type: 'array', required: true } },
  delegate: 'getNftMetadata',
  async run(kit, args) {
    return { metadata: await kit.getNftMetadata(parseStringList('mint_addresses', args.mint_addresses)) };
  },
});

export const heliusGetRawTransactionsTool = defineTool({
  name: 'solana_helius_get_raw_transactions',
  description: `Fetch raw transactions by signature.

Input (JSON string):
{
  "signatures": ["transaction signatures"],
  "start_slot": 0, "end_slot": 0 (optional),
  "start_time": 0, "end_time": 0 (optional),
  "limit": 100 (optional),
  "sort_order": "string" (optional),
  "pagination_token": "string" (optional)
}

Output data: { "transactions": [...] }`,
  schema: {
    signatures: { type: 'array', required: true },
    start_slot: { type: 'integer' },
    end_slot: { type: 'integer' },
    start_time: { type: 'integer' },
    end_time: { type: 'integer' },
    limit: { type: 'integer' },
    sort_order: { type: 'string' },
    pagination_token: { type: 'string' },
  },
  delegate: 'getRawTransactions',
  async run(kit, args) {
    const transactions = await kit.getRawTransactions({
      signatures: parseStringList('signatures', args.signatures),
      startSlot: optional(args.start_slot),
      endSlot: optional(args.end_slot),
      startTime: optional(args.start_time),
      endTime: optional(args.end_time),
      limit: optional(args.limit),
      sortOrder: optional(args.sort_order),
      paginationToken: optional(args.pagination_token),
    });
    return { transactions };
  },
});

export const heliusGetParsedTransactionsTool = defineTool({
  name: 'solana_helius_get_parsed_transactions',
  description: `Fetch parsed transactions by signature.

Input (JSON string):
{ "signatures": ["transaction signatures"], "commitment": "string" (optional) }

Output data: { "parsed_transactions": [...] }`,
  schema: {
    signatures: { type: 'array', required: true },
    commitment: { type: 'string' },
  },
  delegate: 'getParsedTransactions',
  async run(kit, args) {
    const parsed = await kit.getParsedTransactions(
      parseStringList('signatures', args.signatures),
      optional(args.commitment),
    );
    return { parsed_transactions: parsed };
  },
});

export const heliusGetParsedTransactionHistoryTool = defineTool({
  name: 'solana_helius_get_parsed_transaction_history',
  description: `Fetch the parsed transaction history of an address.

Input (JSON string):
{
  "address": "string, the account address",
  "before": "string" (optional),
  "until": "string" (optional),
  "commitment": "string" (optional),
  "source": "string" (optional),
  "type": "string" (optional)
}

Output data: { "transaction_history": [...] }`,
  schema: {
    address: { type: 'string', required: true },
    before: { type: 'string' },
    until: { type: 'string' },
    commitment: { type: 'string' },
    source: { type: 'string' },
    type: { type: 'string' },
  },
  delegate: 'getParsedTransactionHistory',
  async run(kit, args) {
    const history = await kit.getParsedTransactionHistory({
      address: args.address,
      before: args.before ?? '',
      until: args.until ?? '',
      commitment: args.commitment ?? '',
      source: args.source ?? '',
      type: args.type ?? '',
    });
    return { transaction_history: history };
  },
});

export const heliusCreateWebhookTool = defineTool({
  name: 'solana_helius_create_webhook',
  description: `Create a webhook for transaction events.

Input (JSON string):
{
  "webhook_url": "URL receiving the events",
  "transaction_types": ["transaction types to listen for"],
  "account_addresses": ["accounts to monitor"],
  "webhook_type": "string",
  "txn_status": "string" (optional, default "all"),
  "auth_header": "string" (optional)
}

Output data: { "webhook": {...} }`,
  schema: WEBHOOK_FIELDS,
  delegate: 'createWebhook',
  async run(kit, args) {
    return { webhook: await kit.createWebhook(toWebhookParams(args)) };
  },
});

export const heliusGetAllWebhooksTool = defineTool({
  name: 'solana_helius_get_all_webhooks',
  description: `Fetch every webhook of the account. Takes no input.

Output data: { "webhooks": [...] }`,
  input: 'none',
  schema: {},
  delegate: 'getAllWebhooks',
  async run(kit) {
    return { webhooks: await kit.getAllWebhooks() };
  },
});

export const heliusGetWebhookTool = defineTool({
  name: 'solana_helius_get_webhook',
  description: `Fetch a webhook by ID.

Input (JSON string):
{ "webhook_id": "string" }

Output data: { "webhook": {...} }`,
  schema: { webhook_id: { type: 'string', required: true } },
  delegate: 'getWebhook',
  async run(kit, args) {
    return { webhook: await kit.getWebhook(args.webhook_id) };
  },
});

export const heliusEditWebhookTool = defineTool({
  name: 'solana_helius_edit_webhook',
  description: `Replace the settings of an existing webhook.

Input (JSON string):
{
  "webhook_id": "string",
  "webhook_url": "URL receiving the events",
  "transaction_types": ["transaction types"],
  "account_addresses": ["accounts to monitor"],
  "webhook_type": "string",
  "txn_status": "string" (optional, default "all"),
  "auth_header": "string" (optional)
}

Output data: { "webhook": {...} }`,
  schema: { webhook_id: { type: 'string', required: true }, ...WEBHOOK_FIELDS },
  delegate: 'editWebhook',
  async run(kit, args) {
    return { webhook: await kit.editWebhook(args.webhook_id, toWebhookParams(args)) };
  },
});

export const heliusDeleteWebhookTool = defineTool({
  name: 'solana_helius_delete_webhook',
  description: `Delete a webhook by ID.

Input (JSON string):
{ "webhook_id": "string" }

Output data: { "result": ... }`,
  schema: { webhook_id: { type: 'string', required: true } },
  delegate: 'deleteWebhook',
  successMessage: 'Webhook deleted',
  async run(kit, args) {
    return { result: await kit.deleteWebhook(args.webhook_id) };
  },
});

export const heliusTools: ToolDefinition[] = [
  heliusGetBalancesTool,
  heliusGetAddressNameTool,
  heliusGetNftEventsTool,
  heliusGetMintlistsTool,
  heliusGetNftFingerprintTool,
  heliusGetActiveListingsTool,
  heliusGetNftMetadataTool,
  heliusGetRawTransactionsTool,
  heliusGetParsedTransactionsTool,
  heliusGetParsedTransactionHistoryTool,
  heliusCreateWebhookTool,
  heliusGetAllWebhooksTool,
  heliusGetWebhookTool,
  heliusEditWebhookTool,
  heliusDeleteWebhookTool,
];
