import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { packageVersion, resolveConfig } from "../src/config.js";

describe("resolveConfig", () => {
  it("prefers the --rc option", () => {
    expect(resolveConfig({ rc: "a.rc" }, { TALLY_RC: "b.rc" })).toEqual({
      rcFile: "a.rc",
    });
  });

  it("falls back to TALLY_RC", () => {
    expect(resolveConfig({}, { TALLY_RC: "b.rc" })).toEqual({ rcFile: "b.rc" });
  });

  it("defaults to ~/.tallyrc", () => {
    expect(resolveConfig({}, {})).toEqual({
      rcFile: join(homedir(), ".tallyrc"),
    });
  });
});

describe("packageVersion", () => {
  it("reads the version from package.json", () => {
    expect(packageVersion()).toBe("0.3.0");
  });
});
