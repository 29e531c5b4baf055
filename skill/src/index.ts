/**
 * SolTools Skill: Main Entrypoint
 *
 * Binds the tool catalogue to an agent kit for a host framework.
 * Exports the SolToolsSkill class, a default instance and the library API.
 */

import { loadConfig, type LoadConfigOptions, type SolToolsConfig } from './config.js';
import type { SolanaAgentKit } from './kit/interface.js';
import { logger } from './logger.js';
import { createSolanaTools, findToolDefinition } from './tools/index.js';
import type { SolanaTool } from './tools/tool.js';

export interface SkillOptions extends LoadConfigOptions {
  /** Use these settings instead of loading them. */
  config?: SolToolsConfig;
}

export class SolToolsSkill {
  private tools: SolanaTool[] = [];
  private config: SolToolsConfig | null = null;
  private initialized = false;

  /**
   * Load configuration and bind every enabled tool to `kit`.
   * Calling it again before {@link shutdown} does nothing.
   */
  init(kit: SolanaAgentKit, options: SkillOptions = {}): void {
    if (this.initialized) return;

    const config = options.config ?? loadConfig(options);
    logger.setLevel(config.logLevel);
    this.config = config;

    const disabled = new Set(config.disabledTools);
    for (const name of disabled) {
      if (!findToolDefinition(name)) {
        logger.warn(`Unknown tool in disabled list: ${name}`);
      }
    }

    this.tools = createSolanaTools(kit).filter((tool) => !disabled.has(tool.name));
    this.initialized = true;

    const skipped = disabled.size > 0 ? ` (${disabled.size} disabled)` : '';
    logger.info(`Initialized with ${this.tools.length} tool(s)${skipped}`);
  }

  /** Bound tools, in catalogue order. Empty before {@link init}. */
  getTools(): SolanaTool[] {
    return [...this.tools];
  }

  getTool(name: string): SolanaTool | undefined {
    return this.tools.find((tool) => tool.name === name);
  }

  getConfig(): SolToolsConfig | null {
    return this.config;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Release the kit binding. */
  shutdown(): void {
    if (!this.initialized) return;
    this.tools = [];
    this.config = null;
    this.initialized = false;
    logger.info('Shutdown complete');
  }
}

/** Default skill instance */
const soltools = new SolToolsSkill();
export default soltools;

export * from './errors.js';
export * from './kit/index.js';
export * from './schema/index.js';
export * from './tools/index.js';
export { CONFIG_FILE_NAME, findConfigPath, loadConfig } from './config.js';
export type { LoadConfigOptions, SolToolsConfig } from './config.js';
export { Logger, isLogLevel, logger } from './logger.js';
export type { LogLevel } from './logger.js';
