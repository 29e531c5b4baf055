import { afterEach, describe, expect, it, vi } from 'vitest';
import { SolToolsSkill } from '../../src/index.js';
import type { SolanaAgentKit } from '../../src/kit/interface.js';
import { logger } from '../../src/logger.js';
import { KIT_METHODS, TOOL_DEFINITIONS, isAgentKit } from '../../src/tools/index.js';

function stubKit(): SolanaAgentKit {
  const candidate = Object.fromEntries(KIT_METHODS.map((method) => [method, vi.fn().mockResolvedValue('ok')]));
  if (!isAgentKit(candidate)) throw new Error('stub kit is incomplete');
  return candidate;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('SolToolsSkill', () => {
  it('has no tools before init', () => {
    expect(new SolToolsSkill().getTools()).toEqual([]);
  });

  it('binds every enabled tool', () => {
    const skill = new SolToolsSkill();
    skill.init(stubKit(), { config: { logLevel: 'silent', disabledTools: [] } });
    expect(skill.isInitialized()).toBe(true);
    expect(skill.getTools()).toHaveLength(TOOL_DEFINITIONS.length);
    expect(skill.getTool('solana_get_tps')?.name).toBe('solana_get_tps');
  });

  it('drops disabled tools and warns about unknown names', () => {
    const warn = vi.spyOn(logger, 'warn');
    const skill = new SolToolsSkill();
    skill.init(stubKit(), { config: { logLevel: 'silent', disabledTools: ['solana_stake', 'solana_teleport'] } });
    expect(skill.getTools()).toHaveLength(TOOL_DEFINITIONS.length - 1);
    expect(skill.getTool('solana_stake')).toBeUndefined();
    expect(warn).toHaveBeenCalledWith('Unknown tool in disabled list: solana_teleport');
  });

  it('ignores a second init until shutdown', () => {
    const skill = new SolToolsSkill();
    skill.init(stubKit(), { config: { logLevel: 'silent', disabledTools: [] } });
    skill.init(stubKit(), { config: { logLevel: 'silent', disabledTools: ['solana_stake'] } });
    expect(skill.getTool('solana_stake')).toBeDefined();

    skill.shutdown();
    expect(skill.getTools()).toEqual([]);
    expect(skill.getConfig()).toBeNull();

    skill.init(stubKit(), { config: { logLevel: 'silent', disabledTools: ['solana_stake'] } });
    expect(skill.getTool('solana_stake')).toBeUndefined();
  });
});
