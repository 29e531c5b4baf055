import { Command } from "commander";
import chalk from "chalk";
import { findToolDefinition } from "../../../skill/src/index.js";
import { error, fieldRows, info, table } from "../utils/display.js";

export const describeCommand = new Command("describe")
  .description("Show a tool's description and input fields")
  .argument("<tool>", "Tool name")
  .option("--json", "Print the JSON Schema of the tool's input instead")
  .action((name: string, opts: { json?: boolean }) => {
    const definition = findToolDefinition(name);
    if (!definition) {
      error(`Unknown tool: ${name}`);
      process.exit(1);
    }

    if (opts.json) {
      console.log(JSON.stringify(definition.parameters, null, 2));
      return;
    }

    console.log(chalk.bold(`\n  ${definition.name}\n`));
    console.log(definition.description.replace(/^/gm, "  "));
    console.log();
    info(`Input mode: ${definition.input}`);
    info(`Kit method: ${definition.delegate}`);

    const rows = fieldRows(definition);
    if (rows.length > 0) {
      console.log();
      table(["Field", "Type", "Required", "Bounds"], rows);
    }
  });
