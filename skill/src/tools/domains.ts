/**
 * Domain tools: Solana Name Service and AllDomains.
 */

import { optional } from '../kit/arguments.js';
import { defineTool, type ToolDefinition } from './tool.js';

const NOT_FOUND = 'Not Found';

// ---- Solana Name Service ----------------------------------------------------

export const snsResolveTool = defineTool({
  name: 'solana_sns_resolve',
  description: `Resolve a .sol domain to a wallet address.

Input (JSON string):
{ "domain": "e.g. example.sol" }

Output data: { "address": "wallet address" | "Not Found" }`,
  schema: { domain: { type: 'string', required: true } },
  delegate: 'resolveNameToAddress',
  successMessage: (data) => (data.address === NOT_FOUND ? 'Domain not found.' : 'Success'),
  async run(kit, args) {
    const address = await kit.resolveNameToAddress(args.domain);
    return { address: address ?? NOT_FOUND };
  },
});

export const snsRegisterDomainTool = defineTool({
  name: 'solana_sns_register_domain',
  description: `Build a transaction registering a .sol domain.

Input (JSON string):
{
  "domain": "domain to register",
  "buyer": "buyer wallet address",
  "buyer_token_account": "buyer token account",
  "space": 1000 (bytes),
  "mint": "payment token mint" (optional),
  "referrer_key": "referrer address" (optional)
}

Output data: { "transaction": "serialized transaction" }`,
  schema: {
    domain: { type: 'string', required: true },
    buyer: { type: 'string', required: true },
    buyer_token_account: { type: 'string', required: true },
    space: { type: 'integer', required: true, min: 1 },
    mint: { type: 'string' },
    referrer_key: { type: 'string' },
  },
  delegate: 'getRegistrationTransaction',
  async run(kit, args) {
    const transaction = await kit.getRegistrationTransaction({
      domain: args.domain,
      buyer: args.buyer,
      buyerTokenAccount: args.buyer_token_account,
      space: args.space,
      mint: optional(args.mint),
      referrerKey: optional(args.referrer_key),
    });
    return { transaction };
  },
});

export const snsGetFavouriteDomainTool = defineTool({
  name: 'solana_sns_get_favourite_domain',
  description: `Get the favourite .sol domain of an owner.

Input (JSON string):
{ "owner": "owner wallet address" }

Output data: { "domain": "..." | "Not Found" }`,
  schema: { owner: { type: 'string', required: true } },
  delegate: 'getFavouriteDomain',
  async run(kit, args) {
    const domain = await kit.getFavouriteDomain(args.owner);
    return { domain: domain ?? NOT_FOUND };
  },
});

export const snsGetAllDomainsTool = defineTool({
  name: 'solana_sns_get_all_domains',
  description: `List every .sol domain an owner holds.

Input (JSON string):
{ "owner": "owner wallet address" }

Output data: { "domains": ["..."] }`,
  schema: { owner: { type: 'string', required: true } },
  delegate: 'getAllDomainsForOwner',
  async run(kit, args) {
    return { domains: await kit.getAllDomainsForOwner(args.owner) };
  },
});

// ---- AllDomains -------------------------------------------------------------

export const resolveAllDomainsTool = defineTool({
  name: 'resolve_all_domains',
  description: `Resolve a domain on any AllDomains TLD.

Input (JSON string):
{ "domain": "e.g. example.bonk" }

Output data: { "tld": ... }`,
  schema: { domain: { type: 'string', required: true } },
  delegate: 'resolveAllDomains',
  async run(kit, args) {
    return { tld: await kit.resolveAllDomains(args.domain) };
  },
});

export const getOwnedDomainsForTldTool = defineTool({
  name: 'get_owned_domains_for_tld',
  description: `List the wallet's domains under one TLD.

Input (JSON string):
{ "tld": "e.g. bonk" }

Output data: { "domains": ["..."] }`,
  schema: { tld: { type: 'string', required: true } },
  delegate: 'getOwnedDomainsForTld',
  async run(kit, args) {
    return { domains: await kit.getOwnedDomainsForTld(args.tld) };
  },
});

export const getAllDomainsTldsTool = defineTool({
  name: 'get_all_domains_tlds',
  description: `List every TLD known to AllDomains. Takes no input.

Output data: { "tlds": ["..."] }`,
  input: 'none',
  schema: {},
  delegate: 'getAllDomainsTlds',
  async run(kit) {
    return { tlds: await kit.getAllDomainsTlds() };
  },
});

export const getOwnedAllDomainsTool = defineTool({
  name: 'get_owned_all_domains',
  description: `List every AllDomains domain an owner holds.

Input (JSON string):
{ "owner": "owner wallet address" }

Output data: { "domains": ["..."] }`,
  schema: { owner: { type: 'string', required: true } },
  delegate: 'getOwnedAllDomains',
  async run(kit, args) {
    return { domains: await kit.getOwnedAllDomains(args.owner) };
  },
});

export const domainTools: ToolDefinition[] = [
  snsResolveTool,
  snsRegisterDomainTool,
  snsGetFavouriteDomainTool,
  snsGetAllDomainsTool,
  resolveAllDomainsTool,
  getOwnedDomainsForTldTool,
  getAllDomainsTldsTool,
  getOwnedAllDomainsTool,
];
