/**
 * Configuration loader.
 *
 * Settings come from `soltools.yaml` (explicit path, else the workspace
 * directory, else `~/.soltools/config.yaml`), then environment variables
 * override them.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isLogLevel, logger, type LogLevel } from './logger.js';
import { isRecord } from './schema/validator.js';

export const CONFIG_FILE_NAME = 'soltools.yaml';

export interface SolToolsConfig {
  logLevel: LogLevel;
  /** Absolute path or bare specifier of the module exporting the agent kit. */
  kitModule?: string;
  disabledTools: string[];
  /** File the settings were read from, if any. */
  source?: string;
}

export interface LoadConfigOptions {
  /** Read this file instead of searching. */
  configPath?: string;
  /** Directory searched for `soltools.yaml`. */
  workspacePath?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/** Locate the config file, or null when none exists. */
export function findConfigPath(options: LoadConfigOptions = {}): string | null {
  if (options.configPath) {
    return existsSync(options.configPath) ? options.configPath : null;
  }
  const candidates = [
    options.workspacePath ? join(options.workspacePath, CONFIG_FILE_NAME) : null,
    join(options.homeDir ?? homedir(), '.soltools', 'config.yaml'),
  ];
  for (const candidate of candidates) {
    if (candidate && existsSync(candidate)) return candidate;
  }
  return null;
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    logger.warn(`Ignoring ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
  if (parsed == null) return {};
  if (!isRecord(parsed)) {
    logger.warn(`Ignoring ${path}: expected a mapping at the top level`);
    return {};
  }
  return parsed;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
}

/** Module paths starting with `.` resolve against the directory of `base`. */
function resolveModule(specifier: string, baseDir: string): string {
  return specifier.startsWith('.') ? resolve(baseDir, specifier) : specifier;
}

function readLogLevel(value: unknown, origin: string): LogLevel | undefined {
  if (value == null) return undefined;
  if (isLogLevel(value)) return value;
  logger.warn(`Unknown log level in ${origin}: ${String(value)}; using info`);
  return 'info';
}

/** Load the effective configuration. */
export function loadConfig(options: LoadConfigOptions = {}): SolToolsConfig {
  const env = options.env ?? process.env;
  const config: SolToolsConfig = { logLevel: 'info', disabledTools: [] };

  const path = findConfigPath(options);
  if (path) {
    const file = readConfigFile(path);
    config.source = path;
    config.logLevel = readLogLevel(file['log_level'], path) ?? config.logLevel;

    const kit = file['kit'];
    if (isRecord(kit) && typeof kit['module'] === 'string') {
      config.kitModule = resolveModule(kit['module'], dirname(path));
    }

    const tools = file['tools'];
    if (isRecord(tools)) {
      config.disabledTools = stringList(tools['disabled']);
    }
  }

  // Environment variables override file config
  const envLevel = env['SOLTOOLS_LOG_LEVEL'];
  if (envLevel) {
    config.logLevel = readLogLevel(envLevel, 'SOLTOOLS_LOG_LEVEL') ?? config.logLevel;
  }

  const envDisabled = env['SOLTOOLS_DISABLED_TOOLS'];
  if (envDisabled !== undefined) {
    config.disabledTools = envDisabled
      .split(',')
      .map((name) => name.trim())
      .filter(Boolean);
  }

  const envKit = env['SOLTOOLS_KIT_MODULE'];
  if (envKit) {
    config.kitModule = resolveModule(envKit, process.cwd());
  }

  return config;
}
