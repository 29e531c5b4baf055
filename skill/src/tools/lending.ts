/**
 * Lending tools: Lulo deposits and withdrawals.
 */

import { parsePublicKey } from '../kit/arguments.js';
import { defineTool, type ToolDefinition } from './tool.js';

const LULO_SCHEMA = {
  mint_address: { type: 'string', required: true },
  amount: { type: 'number', required: true, min: 0 },
} as const;

export const luloLendTool = defineTool({
  name: 'lulo_lend',
  description: `Lend tokens for yield through Lulo.

Input (JSON string):
{
  "mint_address": "mint address of the token to lend",
  "amount": 100
}

Output data: { "transaction_signature": "..." }`,
  schema: LULO_SCHEMA,
  delegate: 'luloLend',
  async run(kit, args) {
    const signature = await kit.luloLend(parsePublicKey('mint_address', args.mint_address), args.amount);
    return { transaction_signature: signature };
  },
});

export const luloWithdrawTool = defineTool({
  name: 'lulo_withdraw',
  description: `Withdraw lent tokens from Lulo.

Input (JSON string):
{
  "mint_address": "mint address of the lent token",
  "amount": 100
}

Output data: { "transaction_signature": "..." }`,
  schema: LULO_SCHEMA,
  delegate: 'luloWithdraw',
  async run(kit, args) {
    const signature = await kit.luloWithdraw(parsePublicKey('mint_address', args.mint_address), args.amount);
    return { transaction_signature: signature };
  },
});

export const lendingTools: ToolDefinition[] = [luloLendTool, luloWithdrawTool];
