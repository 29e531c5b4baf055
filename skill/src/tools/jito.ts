/**
 * Jito tools: tip accounts and bundle submission.
 */

import { parseStringList } from '../kit/arguments.js';
import { defineTool, type ToolDefinition } from './tool.js';

export const getTipAccountsTool = defineTool({
  name: 'get_tip_accounts',
  description: `Get all available Jito tip accounts. Takes no input.

Output data: { "accounts": ["tip account addresses"] }`,
  input: 'none',
  schema: {},
  delegate: 'getTipAccounts',
  async run(kit) {
    return { accounts: await kit.getTipAccounts() };
  },
});

export const getRandomTipAccountTool = defineTool({
  name: 'get_random_tip_account',
  description: `Get a randomly selected Jito tip account. Takes no input.

Output data: { "account": "tip account address" }`,
  input: 'none',
  schema: {},
  delegate: 'getRandomTipAccount',
  async run(kit) {
    return { account: await kit.getRandomTipAccount() };
  },
});

export const getBundleStatusesTool = defineTool({
  name: 'get_bundle_statuses',
  description: `Get the statuses of Jito bundles.

Input (JSON string):
{ "bundle_uuids": ["bundle UUIDs"] }

Output data: { "statuses": [...] }`,
  schema: { bundle_uuids: { type: 'array', required: true } },
  delegate: 'getBundleStatuses',
  async run(kit, args) {
    return { statuses: await kit.getBundleStatuses(parseStringList('bundle_uuids', args.bundle_uuids)) };
  },
});

export const sendBundleTool = defineTool({
  name: 'send_bundle',
  description: `Send a bundle of transactions to the Jito block engine.

Input (JSON string):
{ "txn_signatures": ["signed transactions"] }

Output data: { "bundle_ids": [...] }`,
  schema: { txn_signatures: { type: 'array', required: true } },
  delegate: 'sendBundle',
  successMessage: 'Bundle sent',
  async run(kit, args) {
    return { bundle_ids: await kit.sendBundle(parseStringList('txn_signatures', args.txn_signatures)) };
  },
});

export const getInflightBundleStatusesTool = defineTool({
  name: 'get_inflight_bundle_statuses',
  description: `Get the statuses of bundles that are still in flight.

Input (JSON string):
{ "bundle_uuids": ["bundle UUIDs"] }

Output data: { "statuses": [...] }`,
  schema: { bundle_uuids: { type: 'array', required: true } },
  delegate: 'getInflightBundleStatuses',
  async run(kit, args) {
    const statuses = await kit.getInflightBundleStatuses(parseStringList('bundle_uuids', args.bundle_uuids));
    return { statuses };
  },
});

export const sendTxnTool = defineTool({
  name: 'send_txn',
  description: `Send a single transaction through Jito.

Input (JSON string):
{ "txn_signature": "signed transaction", "bundleOnly": true }

Output data: { "status": ... }`,
  schema: {
    txn_signature: { type: 'string', required: true },
    bundleOnly: { type: 'boolean', required: true },
  },
  delegate: 'sendTxn',
  successMessage: 'Transaction sent',
  async run(kit, args) {
    return { status: await kit.sendTxn(args.txn_signature, args.bundleOnly) };
  },
});

export const jitoTools: ToolDefinition[] = [
  getTipAccountsTool,
  getRandomTipAccountTool,
  getBundleStatusesTool,
  sendBundleTool,
  getInflightBundleStatusesTool,
  sendTxnTool,
];
