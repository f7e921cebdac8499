import { describe, it, expect } from "vitest";
import { booleanFlag, numberFlag, parseArgs, stringFlag } from "../scripts/cli-args";
import { ConfigError } from "../lib/errors";

describe("parseArgs", () => {
  it("splits positionals, valued flags and switches", () => {
    const args = parseArgs(["fiverr", "--max-pages", "3", "--persist", "--out-dir", "data/raw"]);
    expect(args.positional).toEqual(["fiverr"]);
    expect(stringFlag(args, "out-dir")).toBe("data/raw");
    expect(numberFlag(args, "max-pages")).toBe(3);
    expect(booleanFlag(args, "persist")).toBe(true);
    expect(stringFlag(args, "persist")).toBeUndefined();
    expect(numberFlag(args, "missing")).toBeUndefined();
  });

  it("rejects a non-numeric value for a number flag", () => {
    expect(() => numberFlag(parseArgs(["--max-pages", "many"]), "max-pages")).toThrow(ConfigError);
  });
});
