import { describe, expect, it, vi } from "vitest";
import { KIT_METHODS, ToolError } from "../../../skill/src/index.js";
import { assertAgentKit, extractKit, toImportSpecifier } from "../../src/utils/kit-loader.js";

describe("toImportSpecifier", () => {
  it("turns paths into file URLs", () => {
    expect(toImportSpecifier("./kit.js", "/srv/agent")).toBe("file:///srv/agent/kit.js");
    expect(toImportSpecifier("/opt/kit.js", "/srv/agent")).toBe("file:///opt/kit.js");
  });

  it("leaves package names alone", () => {
    expect(toImportSpecifier("my-kit-package", "/srv/agent")).toBe("my-kit-package");
  });
});

describe("extractKit", () => {
  it("prefers the default export", () => {
    const kit = { name: "default" };
    expect(extractKit({ default: kit, kit: { name: "named" } })).toBe(kit);
  });

  it("falls back to a named kit export", () => {
    const kit = { name: "named" };
    expect(extractKit({ kit })).toBe(kit);
  });

  it("returns undefined for a non-object", () => {
    expect(extractKit(undefined)).toBeUndefined();
  });
});

describe("assertAgentKit", () => {
  it("accepts a complete kit", () => {
    const kit = Object.fromEntries(KIT_METHODS.map((method) => [method, vi.fn()]));
    expect(assertAgentKit(kit, "./kit.js")).toBe(kit);
  });

  it("names what an incomplete kit lacks", () => {
    const [first, second, third, fourth, fifth] = KIT_METHODS;
    const check = () => assertAgentKit({}, "./kit.js");
    expect(check).toThrow(ToolError);
    expect(check).toThrow(
      `./kit.js does not export an agent kit (missing ${first}, ${second}, ${third}, ${fourth}, ${fifth} and ${KIT_METHODS.length - 5} more)`,
    );
  });
});
