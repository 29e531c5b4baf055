/**
 * Loads a user-supplied agent kit module for `soltools run`.
 *
 * The module's default export (or a named `kit` export) must expose every
 * method the catalogue calls.
 */

import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import {
  ToolError,
  isAgentKit,
  isRecord,
  missingKitMethods,
  type SolanaAgentKit,
} from "../../../skill/src/index.js";

/** File paths become file URLs; bare specifiers are imported as packages. */
export function toImportSpecifier(specifier: string, cwd = process.cwd()): string {
  if (specifier.startsWith(".") || isAbsolute(specifier)) {
    return pathToFileURL(resolve(cwd, specifier)).href;
  }
  return specifier;
}

/** Pick the kit out of a loaded module namespace. */
export function extractKit(mod: unknown): unknown {
  if (!isRecord(mod)) return undefined;
  return mod["default"] ?? mod["kit"];
}

/** Check a candidate object and name what it lacks. */
export function assertAgentKit(candidate: unknown, source: string): SolanaAgentKit {
  if (isAgentKit(candidate)) return candidate;
  const missing = missingKitMethods(candidate);
  const preview = missing.slice(0, 5).join(", ");
  const more = missing.length > 5 ? ` and ${missing.length - 5} more` : "";
  throw new ToolError(
    `${source} does not export an agent kit (missing ${preview}${more})`,
    "NOT_SUPPORTED",
  );
}

export async function loadKit(specifier: string): Promise<SolanaAgentKit> {
  const mod: unknown = await import(toImportSpecifier(specifier));
  return assertAgentKit(extractKit(mod), specifier);
}
