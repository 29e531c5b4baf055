import { Command } from "commander";
import { checkInput, findToolDefinition } from "../../../skill/src/index.js";
import { error, success } from "../utils/display.js";

export const checkCommand = new Command("check")
  .description("Validate a payload against a tool's schema without calling the kit")
  .argument("<tool>", "Tool name")
  .argument("[payload]", "JSON payload (or plain text for text-mode tools)", "")
  .action((name: string, payload: string) => {
    const definition = findToolDefinition(name);
    if (!definition) {
      error(`Unknown tool: ${name}`);
      process.exit(1);
    }

    const result = checkInput(definition, payload);
    if (!result.ok) {
      error(`[${result.code}] ${result.message}`);
      process.exit(1);
    }

    success(`Payload is valid for ${definition.name}`);
    console.log(JSON.stringify(result.input, null, 2));
  });
