/**
 * Tools module: the tool catalogue and the factory that binds it to a kit.
 *
 * Definitions are grouped by integration; {@link TOOL_DEFINITIONS} keeps the
 * groups in a fixed order so enumeration is deterministic.
 */

import type { KitMethod, SolanaAgentKit } from '../kit/interface.js';
import { isRecord } from '../schema/validator.js';
import { ammTools } from './amm.js';
import { backpackTools } from './backpack.js';
import { bridgeTools } from './bridge.js';
import { domainTools } from './domains.js';
import { driftTools } from './drift.js';
import { heliusTools } from './helius.js';
import { jitoTools } from './jito.js';
import { launchpadTools } from './launchpads.js';
import { lendingTools } from './lending.js';
import { marketDataTools } from './market-data.js';
import { nftTools } from './nft.js';
import { orderbookTools } from './orderbook.js';
import { perpTools } from './perps.js';
import { socialTools } from './social.js';
import { tokenDataTools } from './token-data.js';
import { SolanaTool, type ToolDefinition } from './tool.js';
import { walletTools } from './wallet.js';

// ---- Catalogue --------------------------------------------------------------

/** Every tool, in registration order. */
export const TOOL_DEFINITIONS: readonly ToolDefinition[] = Object.freeze([
  ...walletTools,
  ...tokenDataTools,
  ...launchpadTools,
  ...ammTools,
  ...socialTools,
  ...heliusTools,
  ...domainTools,
  ...nftTools,
  ...bridgeTools,
  ...jitoTools,
  ...backpackTools,
  ...perpTools,
  ...driftTools,
  ...orderbookTools,
  ...marketDataTools,
  ...lendingTools,
]);

const byName = new Map(TOOL_DEFINITIONS.map((definition) => [definition.name, definition]));

/** Kit methods the catalogue calls, without duplicates. */
export const KIT_METHODS: readonly KitMethod[] = Object.freeze([
  ...new Set(TOOL_DEFINITIONS.map((definition) => definition.delegate)),
]);

export function findToolDefinition(name: string): ToolDefinition | undefined {
  return byName.get(name);
}

// ---- Kit checks -------------------------------------------------------------

/** Catalogue methods `value` does not expose as functions. */
export function missingKitMethods(value: unknown): KitMethod[] {
  if (!isRecord(value)) return [...KIT_METHODS];
  return KIT_METHODS.filter((method) => typeof value[method] !== 'function');
}

/** True when `value` exposes every method the catalogue calls. */
export function isAgentKit(value: unknown): value is SolanaAgentKit {
  return isRecord(value) && missingKitMethods(value).length === 0;
}

// ---- Factory ----------------------------------------------------------------

/** Bind every tool to `kit`, in catalogue order. */
export function createSolanaTools(kit: SolanaAgentKit): SolanaTool[] {
  return TOOL_DEFINITIONS.map((definition) => new SolanaTool(definition, kit));
}

export { SolanaTool, checkInput, defineTool } from './tool.js';
export type {
  CheckResult,
  InputMode,
  ToolData,
  ToolDefinition,
  ToolFailure,
  ToolResult,
  ToolSpec,
  ToolSuccess,
} from './tool.js';
export {
  ammTools,
  backpackTools,
  bridgeTools,
  domainTools,
  driftTools,
  heliusTools,
  jitoTools,
  launchpadTools,
  lendingTools,
  marketDataTools,
  nftTools,
  orderbookTools,
  perpTools,
  socialTools,
  tokenDataTools,
  walletTools,
};
