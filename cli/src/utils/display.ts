import chalk from "chalk";
import ora, { type Ora } from "ora";
import {
  describeFieldType,
  type FieldSpec,
  type ToolDefinition,
  type ToolResult,
} from "../../../skill/src/index.js";

export function createSpinner(text: string): Ora {
  return ora({ text, spinner: "dots" });
}

export function success(msg: string): void {
  console.log(chalk.green("  " + msg));
}

export function error(msg: string): void {
  console.error(chalk.red("  " + msg));
}

export function info(msg: string): void {
  console.log(chalk.cyan("  " + msg));
}

/** Render rows as aligned columns. Cell widths ignore ANSI colour codes. */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const visible = (cell: string) => stripAnsi(cell).length;
  const colWidths = headers.map((h, i) => {
    const maxData = rows.reduce((max, row) => Math.max(max, visible(row[i] ?? "")), 0);
    return Math.max(h.length, maxData) + 2;
  });

  const pad = (cell: string, i: number) => cell + " ".repeat(Math.max(0, (colWidths[i] ?? 0) - visible(cell)));
  const formatRow = (cells: string[]) => headers.map((_, i) => pad(cells[i] ?? "", i)).join("|");

  return [formatRow(headers), colWidths.map((w) => "-".repeat(w)).join("+"), ...rows.map(formatRow)];
}

export function table(headers: string[], rows: string[][]): void {
  const [head, ...rest] = formatTable(headers, rows);
  console.log(chalk.bold(head));
  for (const line of rest) {
    console.log(line);
  }
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/** First line of a tool description. */
export function summarize(description: string): string {
  return description.split("\n", 1)[0]?.trim() ?? "";
}

/** Numeric bounds of a field, e.g. `0..100`, `>= 1`, or empty. */
export function formatBounds(spec: FieldSpec): string {
  if (spec.min !== undefined && spec.max !== undefined) return `${spec.min}..${spec.max}`;
  if (spec.min !== undefined) return `>= ${spec.min}`;
  if (spec.max !== undefined) return `<= ${spec.max}`;
  return "";
}

/** One row per schema field: name, types, required, bounds. */
export function fieldRows(definition: ToolDefinition): string[][] {
  return Object.entries(definition.schema).map(([name, spec]) => [
    name,
    describeFieldType(spec),
    spec.required ? "yes" : "no",
    formatBounds(spec),
  ]);
}

/** Pretty-print a result envelope, coloured by status. */
export function printResult(result: ToolResult): void {
  const json = JSON.stringify(result, null, 2);
  console.log(result.status === "success" ? chalk.green(json) : chalk.red(json));
}

export function banner(): void {
  console.log(chalk.cyan.bold("\n  soltools"));
  console.log(chalk.dim("  Solana agent kit operations as agent tools.\n"));
}
