import { Command } from "commander";
import { createSolanaTools, findToolDefinition, logger, toFailure } from "../../../skill/src/index.js";
import { cliConfig, requireKitModule } from "../utils/config.js";
import { createSpinner, error, printResult } from "../utils/display.js";
import { loadKit } from "../utils/kit-loader.js";

export const runCommand = new Command("run")
  .description("Invoke a tool against an agent kit module")
  .argument("<tool>", "Tool name")
  .argument("[payload]", "JSON payload (or plain text for text-mode tools)", "")
  .option("-k, --kit <module>", "Module whose default export is the agent kit")
  .option("-c, --config <path>", "Path to soltools.yaml")
  .action(async (name: string, payload: string, opts: { kit?: string; config?: string }) => {
    const config = cliConfig(opts.config);
    logger.setLevel(config.logLevel);

    if (!findToolDefinition(name)) {
      error(`Unknown tool: ${name}`);
      process.exit(1);
    }
    if (config.disabledTools.includes(name)) {
      error(`Tool ${name} is disabled in configuration`);
      process.exit(1);
    }

    const kitModule = requireKitModule(config, opts.kit);
    const spinner = createSpinner("Loading agent kit...");
    spinner.start();

    const kit = await loadKit(kitModule).catch((err: unknown) => {
      spinner.fail("Could not load agent kit");
      error(toFailure(err).message);
      return process.exit(1);
    });

    const tool = createSolanaTools(kit).find((candidate) => candidate.name === name);
    if (!tool) {
      spinner.fail(`Unknown tool: ${name}`);
      process.exit(1);
    }

    spinner.text = `Running ${name}...`;
    const result = await tool.invoke(payload);
    if (result.status === "success") {
      spinner.succeed(result.message);
    } else {
      spinner.fail(`${name} failed`);
    }

    printResult(result);
    if (result.status === "error") process.exit(1);
  });
