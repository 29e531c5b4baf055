/**
 * NFT tools: Metaplex collections, assets and Core NFTs, plus 3Land
 * collections and items.
 */

import { optional } from '../kit/arguments.js';
import type { AssetQuery } from '../kit/interface.js';
import { defineTool, type ToolDefinition } from './tool.js';

// ---- Metaplex ---------------------------------------------------------------

const ASSET_QUERY_FIELDS = {
  sort_by: { type: 'string' },
  sort_direction: { type: 'string' },
  limit: { type: 'integer', min: 1 },
  page: { type: 'integer', min: 1 },
} as const;

interface AssetQueryInput {
  sort_by?: string | null;
  sort_direction?: string | null;
  limit?: number | null;
  page?: number | null;
}

function assetQuery(args: AssetQueryInput): AssetQuery {
  return {
    sortBy: optional(args.sort_by),
    sortDirection: optional(args.sort_direction),
    limit: optional(args.limit),
    page: optional(args.page),
  };
}

export const deployCollectionTool = defineTool({
  name: 'solana_deploy_collection',
  description: `Deploy a Metaplex NFT collection.

Input (JSON string):
{
  "name": "collection name",
  "uri": "metadata URI",
  "royalty_basis_points": 500 (0-10000),
  "creator_address": "creator wallet address"
}

Output data: { "result": {...} }`,
  schema: {
    name: { type: 'string', required: true },
    uri: { type: 'string', required: true },
    royalty_basis_points: { type: 'integer', required: true, min: 0, max: 10000 },
    creator_address: { type: 'string', required: true },
  },
  delegate: 'deployCollection',
  async run(kit, args) {
    const result = await kit.deployCollection({
      name: args.name,
      uri: args.uri,
      royaltyBasisPoints: args.royalty_basis_points,
      creatorAddress: args.creator_address,
    });
    return { result };
  },
});

export const getMetaplexAssetTool = defineTool({
  name: 'solana_get_metaplex_asset',
  description: `Fetch a Metaplex asset by id.

Input (JSON string):
{ "asset_id": "asset address" }

Output data: { "result": {...} }`,
  schema: { asset_id: { type: 'string', required: true } },
  delegate: 'getMetaplexAsset',
  async run(kit, args) {
    return { result: await kit.getMetaplexAsset(args.asset_id) };
  },
});

export const getMetaplexAssetsByCreatorTool = defineTool({
  name: 'solana_get_metaplex_assets_by_creator',
  description: `List Metaplex assets by creator.

Input (JSON string):
{
  "creator": "creator address",
  "only_verified": false (optional),
  "sort_by": "created" (optional),
  "sort_direction": "asc" | "desc" (optional),
  "limit": 10 (optional),
  "page": 1 (optional)
}

Output data: { "result": {...} }`,
  schema: {
    creator: { type: 'string', required: true },
    only_verified: { type: 'boolean' },
    ...ASSET_QUERY_FIELDS,
  },
  delegate: 'getMetaplexAssetsByCreator',
  async run(kit, args) {
    const result = await kit.getMetaplexAssetsByCreator({
      creator: args.creator,
      onlyVerified: args.only_verified ?? false,
      ...assetQuery(args),
    });
    return { result };
  },
});

export const getMetaplexAssetsByAuthorityTool = defineTool({
  name: 'solana_get_metaplex_assets_by_authority',
  description: `List Metaplex assets by update authority.

Input (JSON string):
{
  "authority": "authority address",
  "sort_by": "created" (optional),
  "sort_direction": "asc" | "desc" (optional),
  "limit": 10 (optional),
  "page": 1 (optional)
}

Output data: { "result": {...} }`,
  schema: {
    authority: { type: 'string', required: true },
    ...ASSET_QUERY_FIELDS,
  },
  delegate: 'getMetaplexAssetsByAuthority',
  async run(kit, args) {
    const result = await kit.getMetaplexAssetsByAuthority({
      authority: args.authority,
      ...assetQuery(args),
    });
    return { result };
  },
});

export const mintMetaplexCoreNftTool = defineTool({
  name: 'solana_mint_metaplex_core_nft',
  description: `Mint a Metaplex Core NFT into a collection.

Input (JSON string):
{
  "collection_mint": "collection address",
  "name": "NFT name",
  "uri": "metadata URI",
  "seller_fee_basis_points": 500 (0-10000),
  "address": "creator address",
  "share": "100",
  "recipient": "recipient wallet address"
}

Output data: { "result": {...} }`,
  schema: {
    collection_mint: { type: 'string', required: true },
    name: { type: 'string', required: true },
    uri: { type: 'string', required: true },
    seller_fee_basis_points: { type: 'integer', required: true, min: 0, max: 10000 },
    address: { type: 'string', required: true },
    share: { type: 'string', required: true },
    recipient: { type: 'string', required: true },
  },
  delegate: 'mintMetaplexCoreNft',
  async run(kit, args) {
    const result = await kit.mintMetaplexCoreNft({
      collectionMint: args.collection_mint,
      name: args.name,
      uri: args.uri,
      sellerFeeBasisPoints: args.seller_fee_basis_points,
      address: args.address,
      share: args.share,
      recipient: args.recipient,
    });
    return { result };
  },
});

// ---- 3Land ------------------------------------------------------------------

export const create3LandCollectionTool = defineTool({
  name: 'create_3land_collection',
  description: `Create a 3Land NFT collection.

Input (JSON string):
{
  "collection_symbol": "SYM",
  "collection_name": "collection name",
  "collection_description": "description",
  "main_image_url": "image URL" (optional),
  "cover_image_url": "image URL" (optional),
  "is_devnet": false (optional)
}

Output data: { "transaction": ... }`,
  schema: {
    collection_symbol: { type: 'string', required: true },
    collection_name: { type: 'string', required: true },
    collection_description: { type: 'string', required: true },
    main_image_url: { type: 'string' },
    cover_image_url: { type: 'string' },
    is_devnet: { type: 'boolean' },
  },
  delegate: 'create3LandCollection',
  async run(kit, args) {
    const transaction = await kit.create3LandCollection({
      collectionSymbol: args.collection_symbol,
      collectionName: args.collection_name,
      collectionDescription: args.collection_description,
      mainImageUrl: optional(args.main_image_url),
      coverImageUrl: optional(args.cover_image_url),
      isDevnet: args.is_devnet ?? false,
    });
    return { transaction };
  },
});

export const create3LandNftTool = defineTool({
  name: 'create_3land_nft',
  description: `Create an item in a 3Land collection.

Input (JSON string):
{
  "item_name": "item name",
  "seller_fee": 5,
  "item_amount": 10,
  "item_symbol": "SYM",
  "item_description": "description",
  "traits": "JSON-encoded traits",
  "price": 0.1 (optional),
  "main_image_url": "image URL" (optional),
  "cover_image_url": "image URL" (optional),
  "spl_hash": "payment token mint" (optional),
  "pool_name": "pool name" (optional),
  "is_devnet": false (optional),
  "with_pool": false (optional)
}

Output data: { "transaction": ... }`,
  schema: {
    item_name: { type: 'string', required: true },
    seller_fee: { type: 'number', required: true, min: 0 },
    item_amount: { type: 'integer', required: true, min: 1 },
    item_symbol: { type: 'string', required: true },
    item_description: { type: 'string', required: true },
    traits: { type: 'string', required: true },
    price: { type: 'number', min: 0 },
    main_image_url: { type: 'string' },
    cover_image_url: { type: 'string' },
    spl_hash: { type: 'string' },
    pool_name: { type: 'string' },
    is_devnet: { type: 'boolean' },
    with_pool: { type: 'boolean' },
  },
  delegate: 'create3LandNft',
  async run(kit, args) {
    const transaction = await kit.create3LandNft({
      itemName: args.item_name,
      sellerFee: args.seller_fee,
      itemAmount: args.item_amount,
      itemSymbol: args.item_symbol,
      itemDescription: args.item_description,
      traits: args.traits,
      price: optional(args.price),
      mainImageUrl: optional(args.main_image_url),
      coverImageUrl: optional(args.cover_image_url),
      splHash: optional(args.spl_hash),
      poolName: optional(args.pool_name),
      isDevnet: args.is_devnet ?? false,
      withPool: args.with_pool ?? false,
    });
    return { transaction };
  },
});

export const nftTools: ToolDefinition[] = [
  deployCollectionTool,
  getMetaplexAssetTool,
  getMetaplexAssetsByCreatorTool,
  getMetaplexAssetsByAuthorityTool,
  mintMetaplexCoreNftTool,
  create3LandCollectionTool,
  create3LandNftTool,
];
