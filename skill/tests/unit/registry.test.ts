import { describe, expect, it, vi } from 'vitest';
import type { SolanaAgentKit } from '../../src/kit/interface.js';
import {
  KIT_METHODS,
  TOOL_DEFINITIONS,
  createSolanaTools,
  findToolDefinition,
  isAgentKit,
  missingKitMethods,
} from '../../src/tools/index.js';

function stubKit(): SolanaAgentKit {
  const candidate = Object.fromEntries(KIT_METHODS.map((method) => [method, vi.fn().mockResolvedValue('ok')]));
  if (!isAgentKit(candidate)) throw new Error('stub kit is incomplete');
  return candidate;
}

describe('TOOL_DEFINITIONS', () => {
  it('holds the whole catalogue', () => {
    expect(TOOL_DEFINITIONS).toHaveLength(164);
    expect(Object.isFrozen(TOOL_DEFINITIONS)).toBe(true);
  });

  it('has unique snake_case names', () => {
    const names = TOOL_DEFINITIONS.map((definition) => definition.name);
    expect(new Set(names).size).toBe(names.length);
    for (const name of names) {
      expect(name).toMatch(/^[a-z0-9]+(_[a-z0-9]+)*$/);
    }
  });

  it('starts with the wallet tools', () => {
    expect(TOOL_DEFINITIONS.slice(0, 3).map((definition) => definition.name)).toEqual([
      'solana_balance',
      'solana_transfer',
      'solana_deploy_token',
    ]);
  });

  it('describes every tool', () => {
    for (const definition of TOOL_DEFINITIONS) {
      expect(definition.description.trim()).not.toBe('');
      expect(definition.parameters.type).toBe('object');
    }
  });

  it('registers the burn-and-close tools', () => {
    expect(findToolDefinition('solana_burn_and_close_account')?.delegate).toBe('burnAndCloseAccounts');
    expect(findToolDefinition('solana_burn_and_close_multiple_accounts')?.delegate).toBe(
      'multipleBurnAndCloseAccounts',
    );
  });
});

describe('findToolDefinition', () => {
  it('returns undefined for unknown names', () => {
    expect(findToolDefinition('solana_teleport')).toBeUndefined();
  });
});

describe('kit checks', () => {
  it('lists every method for a non-object', () => {
    expect(missingKitMethods(null)).toEqual([...KIT_METHODS]);
    expect(isAgentKit('kit')).toBe(false);
  });

  it('lists the methods a partial kit lacks', () => {
    const missing = missingKitMethods({ getTps: vi.fn() });
    expect(missing).toHaveLength(KIT_METHODS.length - 1);
    expect(missing).not.toContain('getTps');
  });

  it('accepts methods inherited from a prototype', () => {
    class Kit {}
    for (const method of KIT_METHODS) {
      Reflect.set(Kit.prototype, method, () => Promise.resolve(undefined));
    }
    expect(isAgentKit(new Kit())).toBe(true);
  });
});

describe('createSolanaTools', () => {
  it('binds every definition in catalogue order', () => {
    const tools = createSolanaTools(stubKit());
    expect(tools.map((tool) => tool.name)).toEqual(TOOL_DEFINITIONS.map((definition) => definition.name));
  });

  it('shares one kit across tools', async () => {
    const kit = stubKit();
    const tools = createSolanaTools(kit);
    const tps = tools.find((tool) => tool.name === 'solana_get_tps');
    const address = tools.find((tool) => tool.name === 'solana_get_wallet_address');
    await tps?.invoke();
    await address?.invoke();
    expect(kit.getTps).toHaveBeenCalledTimes(1);
    expect(kit.getWalletAddress).toHaveBeenCalledTimes(1);
  });
});
