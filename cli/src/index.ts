#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { listCommand } from "./commands/list.js";
import { describeCommand } from "./commands/describe.js";
import { checkCommand } from "./commands/check.js";
import { runCommand } from "./commands/run.js";

const here = dirname(fileURLToPath(import.meta.url));

/** Walk up from current file to find the nearest package.json */
function findPackageJson(): string {
  let dir = here;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "package.json");
    try {
      readFileSync(candidate);
      return candidate;
    } catch {
      dir = dirname(dir);
    }
  }
  throw new Error("Could not find package.json");
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(findPackageJson(), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("soltools")
  .description("Solana agent kit operations as agent tools")
  .version(readVersion());

program.addCommand(listCommand);
program.addCommand(describeCommand);
program.addCommand(checkCommand);
program.addCommand(runCommand);

await program.parseAsync(process.argv);
