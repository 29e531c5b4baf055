/**
 * Social tools: Gibwork bounties and Cybers coins.
 */

import { parsePublicKey, parseStringList } from '../kit/arguments.js';
import { defineTool, type ToolDefinition } from './tool.js';

export const createGibworkTaskTool = defineTool({
  name: 'solana_create_gibwork_task',
  description: `Create a new task on Gibwork.

Input (JSON string):
{
  "title": "title of the task",
  "content": "description of the task",
  "requirements": "requirements to complete the task",
  "tags": ["tag1", "tag2"],
  "token_mint_address": "mint of the payment token",
  "token_amount": 1000
}

Output data: { "result": ... }`,
  schema: {
    title: { type: 'string', required: true },
    content: { type: 'string', required: true },
    requirements: { type: 'string', required: true },
    tags: { type: 'array', required: true },
    token_mint_address: { type: 'string', required: true },
    token_amount: { type: 'integer', required: true, min: 1 },
  },
  delegate: 'createGibworkTask',
  successMessage: 'Gibwork task created successfully',
  async run(kit, args) {
    const result = await kit.createGibworkTask({
      title: args.title,
      content: args.content,
      requirements: args.requirements,
      tags: parseStringList('tags', args.tags),
      tokenMintAddress: parsePublicKey('token_mint_address', args.token_mint_address),
      tokenAmount: args.token_amount,
    });
    return { result };
  },
});

export const cybersCreateCoinTool = defineTool({
  name: 'cybers_create_coin',
  description: `Create a new coin on Cybers.

Input (JSON string):
{
  "name": "coin name",
  "symbol": "coin symbol",
  "image_path": "path to the coin image",
  "tweet_author_id": "Twitter ID of the author",
  "tweet_author_username": "Twitter username of the author"
}

Output data: { "coin_id": "..." }`,
  schema: {
    name: { type: 'string', required: true },
    symbol: { type: 'string', required: true },
    image_path: { type: 'string', required: true },
    tweet_author_id: { type: 'string', required: true },
    tweet_author_username: { type: 'string', required: true },
  },
  delegate: 'cybersCreateCoin',
  async run(kit, args) {
    const coinId = await kit.cybersCreateCoin({
      name: args.name,
      symbol: args.symbol,
      imagePath: args.image_path,
      tweetAuthorId: args.tweet_author_id,
      tweetAuthorUsername: args.tweet_author_username,
    });
    return { coin_id: coinId };
  },
});

export const socialTools: ToolDefinition[] = [createGibworkTaskTool, cybersCreateCoinTool];
