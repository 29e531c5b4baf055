/**
 * Shared config loader for SolTools CLI commands.
 * Reads soltools.yaml from the working directory (or --config).
 */

import { loadConfig, type SolToolsConfig } from "../../../skill/src/index.js";
import { error } from "./display.js";

/** Load the effective configuration for a CLI invocation. */
export function cliConfig(configPath?: string): SolToolsConfig {
  return loadConfig({ configPath, workspacePath: process.cwd() });
}

/** Kit module from the flag, else from config; exits when neither is set. */
export function requireKitModule(config: SolToolsConfig, flag?: string): string {
  const specifier = flag ?? config.kitModule;
  if (!specifier) {
    error("No agent kit module configured. Pass --kit <module> or set kit.module in soltools.yaml.");
    process.exit(1);
  }
  return specifier;
}
