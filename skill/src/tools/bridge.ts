/**
 * deBridge tools: cross-chain order creation, execution and tracking.
 */

import { defineTool, type ToolDefinition } from './tool.js';

export const debridgeCreateTransactionTool = defineTool({
  name: 'debridge_create_transaction',
  description: `Create a transaction bridging assets across chains with deBridge.

Input (JSON string):
{
  "src_chain_id": "source chain ID",
  "src_chain_token_in": "token address on the source chain",
  "src_chain_token_in_amount": "amount to send, as a string",
  "dst_chain_id": "destination chain ID",
  "dst_chain_token_out": "token address on the destination chain",
  "dst_chain_token_out_recipient": "recipient on the destination chain",
  "src_chain_order_authority_address": "order authority on the source chain",
  "dst_chain_order_authority_address": "order authority on the destination chain",
  "affiliate_fee_percent": "string" (optional, default "0"),
  "affiliate_fee_recipient": "string" (optional, default ""),
  "prepend_operating_expenses": true (optional, default true),
  "dst_chain_token_out_amount": "string" (optional, default "auto")
}

Output data: { "transaction_data": {...} }`,
  schema: {
    src_chain_id: { type: 'string', required: true },
    src_chain_token_in: { type: 'string', required: true },
    src_chain_token_in_amount: { type: 'string', required: true },
    dst_chain_id: { type: 'string', required: true },
    dst_chain_token_out: { type: 'string', required: true },
    dst_chain_token_out_recipient: { type: 'string', required: true },
    src_chain_order_authority_address: { type: 'string', required: true },
    dst_chain_order_authority_address: { type: 'string', required: true },
    affiliate_fee_percent: { type: 'string' },
    affiliate_fee_recipient: { type: 'string' },
    prepend_operating_expenses: { type: 'boolean' },
    dst_chain_token_out_amount: { type: 'string' },
  },
  delegate: 'createDebridgeTransaction',
  async run(kit, args) {
    const transactionData = await kit.createDebridgeTransaction({
      srcChainId: args.src_chain_id,
      srcChainTokenIn: args.src_chain_token_in,
      srcChainTokenInAmount: args.src_chain_token_in_amount,
      dstChainId: args.dst_chain_id,
      dstChainTokenOut: args.dst_chain_token_out,
      dstChainTokenOutRecipient: args.dst_chain_token_out_recipient,
      srcChainOrderAuthorityAddress: args.src_chain_order_authority_address,
      dstChainOrderAuthorityAddress: args.dst_chain_order_authority_address,
      affiliateFeePercent: args.affiliate_fee_percent ?? '0',
      affiliateFeeRecipient: args.affiliate_fee_recipient ?? '',
      prependOperatingExpenses: args.prepend_operating_expenses ?? true,
      dstChainTokenOutAmount: args.dst_chain_token_out_amount ?? 'auto',
    });
    return { transaction_data: transactionData };
  },
});

export const debridgeExecuteTransactionTool = defineTool({
  name: 'debridge_execute_transaction',
  description: `Execute a transaction prepared by debridge_create_transaction.

Input (JSON string):
{ "transaction_data": {...} }

Output data: { "result": ... }`,
  schema: { transaction_data: { type: 'object', required: true } },
  delegate: 'executeDebridgeTransaction',
  async run(kit, args) {
    return { result: await kit.executeDebridgeTransaction(args.transaction_data) };
  },
});

export const debridgeCheckTransactionStatusTool = defineTool({
  name: 'debridge_check_transaction_status',
  description: `Check the status of a deBridge transaction.

Input (JSON string):
{ "tx_hash": "transaction hash" }

Output data: { "transaction_status": ... }`,
  schema: { tx_hash: { type: 'string', required: true } },
  delegate: 'checkTransactionStatus',
  async run(kit, args) {
    return { transaction_status: await kit.checkTransactionStatus(args.tx_hash) };
  },
});

export const bridgeTools: ToolDefinition[] = [
  debridgeCreateTransactionTool,
  debridgeExecuteTransactionTool,
  debridgeCheckTransactionStatusTool,
];
