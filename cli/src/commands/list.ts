import { Command } from "commander";
import chalk from "chalk";
import { TOOL_DEFINITIONS } from "../../../skill/src/index.js";
import { cliConfig } from "../utils/config.js";
import { banner, info, summarize, table } from "../utils/display.js";

export const listCommand = new Command("list")
  .description("List available tools")
  .option("-f, --filter <text>", "Only show tools whose name contains <text>")
  .option("-c, --config <path>", "Path to soltools.yaml")
  .action((opts: { filter?: string; config?: string }) => {
    banner();

    const config = cliConfig(opts.config);
    const disabled = new Set(config.disabledTools);
    const needle = opts.filter?.toLowerCase();

    const matches = TOOL_DEFINITIONS.filter((definition) => !needle || definition.name.includes(needle));
    if (matches.length === 0) {
      info(`No tools match "${opts.filter ?? ""}".`);
      return;
    }

    table(
      ["Tool", "Summary"],
      matches.map((definition) => [
        disabled.has(definition.name) ? chalk.dim(`${definition.name} (disabled)`) : definition.name,
        summarize(definition.description),
      ]),
    );
    console.log();
    info(`${matches.length} of ${TOOL_DEFINITIONS.length} tools`);
  });
