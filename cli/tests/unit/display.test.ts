import { describe, expect, it } from "vitest";
import { findToolDefinition } from "../../../skill/src/index.js";
import { fieldRows, formatBounds, formatTable, summarize } from "../../src/utils/display.js";

describe("summarize", () => {
  it("keeps the first line of a description", () => {
    expect(summarize("Swap tokens through Jupiter.\n\nInput (JSON string): {}")).toBe("Swap tokens through Jupiter.");
  });
});

describe("formatBounds", () => {
  it("renders inclusive ranges", () => {
    expect(formatBounds({ type: "integer", min: 0, max: 100 })).toBe("0..100");
    expect(formatBounds({ type: "integer", min: 1 })).toBe(">= 1");
    expect(formatBounds({ type: "number", max: 9 })).toBe("<= 9");
    expect(formatBounds({ type: "string" })).toBe("");
  });
});

describe("fieldRows", () => {
  it("lists each schema field", () => {
    const transfer = findToolDefinition("solana_transfer");
    expect(transfer).toBeDefined();
    if (!transfer) return;
    expect(fieldRows(transfer)).toEqual([
      ["to", "string", "yes", ""],
      ["amount", "integer", "yes", ">= 1"],
      ["mint", "string", "no", ""],
    ]);
  });
});

describe("formatTable", () => {
  it("pads columns to the widest cell", () => {
    expect(formatTable(["A", "Bb"], [["x", "yyy"]])).toEqual(["A  |Bb   ", "---+-----", "x  |yyy  "]);
  });

  it("ignores colour codes when measuring", () => {
    const [, , row] = formatTable(["Tool"], [["\u001b[2mab\u001b[22m"]]);
    expect(row).toBe("\u001b[2mab\u001b[22m    ");
  });
});
