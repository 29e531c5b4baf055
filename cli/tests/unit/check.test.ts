import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { checkCommand } from "../../src/commands/check.js";

describe("check command", () => {
  let log: MockInstance<typeof console.log>;
  let errorLog: MockInstance<typeof console.error>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the validated input", async () => {
    await checkCommand.parseAsync(["solana_fetch_price", '{"token_id":"mint-1"}'], { from: "user" });

    expect(log).toHaveBeenCalledWith(expect.stringContaining("Payload is valid for solana_fetch_price"));
    expect(log).toHaveBeenLastCalledWith(JSON.stringify({ token_id: "mint-1" }, null, 2));
    expect(errorLog).not.toHaveBeenCalled();
  });

  it("reports a missing field and exits", async () => {
    await expect(checkCommand.parseAsync(["solana_fetch_price", "{}"], { from: "user" })).rejects.toThrow(
      "process.exit",
    );

    expect(errorLog).toHaveBeenCalledWith(
      expect.stringContaining("[INVALID_INPUT] Missing required field: token_id"),
    );
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it("rejects an unknown tool", async () => {
    await expect(checkCommand.parseAsync(["no_such_tool"], { from: "user" })).rejects.toThrow("process.exit");

    expect(errorLog).toHaveBeenCalledWith(expect.stringContaining("Unknown tool: no_such_tool"));
  });
});
