import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { findConfigPath, loadConfig } from '../../src/config.js';
import { logger } from '../../src/logger.js';

let workspace: string;
let home: string;

beforeEach(() => {
  workspace = mkdtempSync(join(tmpdir(), 'soltools-ws-'));
  home = mkdtempSync(join(tmpdir(), 'soltools-home-'));
});

afterEach(() => {
  rmSync(workspace, { recursive: true, force: true });
  rmSync(home, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function writeWorkspaceConfig(content: string): string {
  const path = join(workspace, 'soltools.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('loadConfig', () => {
  it('returns defaults when no file exists', () => {
    expect(loadConfig({ workspacePath: workspace, homeDir: home, env: {} })).toEqual({
      logLevel: 'info',
      disabledTools: [],
    });
  });

  it('reads the workspace file', () => {
    const path = writeWorkspaceConfig(
      ['log_level: debug', 'kit:', '  module: ./kit.js', 'tools:', '  disabled: [solana_stake, 42]', ''].join('\n'),
    );
    expect(loadConfig({ workspacePath: workspace, homeDir: home, env: {} })).toEqual({
      logLevel: 'debug',
      kitModule: join(workspace, 'kit.js'),
      disabledTools: ['solana_stake'],
      source: path,
    });
  });

  it('lets the environment override the file', () => {
    writeWorkspaceConfig('log_level: debug\ntools:\n  disabled: [solana_stake]\n');
    const config = loadConfig({
      workspacePath: workspace,
      homeDir: home,
      env: {
        SOLTOOLS_LOG_LEVEL: 'warn',
        SOLTOOLS_DISABLED_TOOLS: 'solana_trade, raydium_buy,,',
        SOLTOOLS_KIT_MODULE: 'my-kit-package',
      },
    });
    expect(config.logLevel).toBe('warn');
    expect(config.disabledTools).toEqual(['solana_trade', 'raydium_buy']);
    expect(config.kitModule).toBe('my-kit-package');
  });

  it('falls back to info for an unknown level', () => {
    const warn = vi.spyOn(logger, 'warn');
    const path = writeWorkspaceConfig('log_level: loud\n');
    expect(loadConfig({ workspacePath: workspace, homeDir: home, env: {} }).logLevel).toBe('info');
    expect(warn).toHaveBeenCalledWith(`Unknown log level in ${path}: loud; using info`);
  });

  it('ignores a file that is not a mapping', () => {
    const warn = vi.spyOn(logger, 'warn');
    const path = writeWorkspaceConfig('- just\n- a list\n');
    expect(loadConfig({ workspacePath: workspace, homeDir: home, env: {} })).toEqual({
      logLevel: 'info',
      disabledTools: [],
      source: path,
    });
    expect(warn).toHaveBeenCalledWith(`Ignoring ${path}: expected a mapping at the top level`);
  });

  it('ignores a file that fails to parse', () => {
    const warn = vi.spyOn(logger, 'warn');
    writeWorkspaceConfig('log_level: [debug\n');
    expect(loadConfig({ workspacePath: workspace, homeDir: home, env: {} }).logLevel).toBe('info');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('findConfigPath', () => {
  it('prefers an explicit path', () => {
    const explicit = join(home, 'custom.yaml');
    writeFileSync(explicit, 'log_level: error\n', 'utf-8');
    writeWorkspaceConfig('log_level: debug\n');
    expect(findConfigPath({ configPath: explicit, workspacePath: workspace, homeDir: home })).toBe(explicit);
  });

  it('returns null for a missing explicit path', () => {
    expect(findConfigPath({ configPath: join(home, 'absent.yaml'), homeDir: home })).toBeNull();
  });
});
