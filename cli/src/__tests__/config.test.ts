import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { loadConfigFile, mergeConfig, type CliOptions, type ConfigKey } from "../config";
import { captureError } from "../../../src/__tests__/test-helpers";

const cliDefaults: CliOptions = {
  style: "classic",
  indent: 2,
  filesFirst: false,
  skipSorting: false,
  sortKey: "natural",
  reverse: false,
  save: true,
  printout: false,
  stream: false,
  count: false,
  followSymlinks: false,
  debug: false,
};

describe("loadConfigFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "treeline-cfg-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(dir, "treeline.json");
    fs.writeFileSync(file, content, "utf8");
    return file;
  }

  it("returns an empty config without a path", () => {
    expect(loadConfigFile()).toEqual({});
  });

  it("reads a valid file", () => {
    const file = writeConfig(JSON.stringify({ ignoreDirs: [".git"], style: "dash", indent: 4, save: false }));
    expect(loadConfigFile(file)).toEqual({ ignoreDirs: [".git"], style: "dash", indent: 4, save: false });
  });

  it("rejects unknown keys", () => {
    const file = writeConfig(JSON.stringify({ colour: "red" }));
    const error = captureError(() => loadConfigFile(file));
    expect(error).toMatchObject({ code: "INVALID_CONFIG" });
  });

  it("rejects values of the wrong shape", () => {
    expect(captureError(() => loadConfigFile(writeConfig('{"indent": 0}')))).toMatchObject({ code: "INVALID_CONFIG" });
    expect(captureError(() => loadConfigFile(writeConfig('{"sortKey": "custom"}')))).toMatchObject({ code: "INVALID_CONFIG" });
    expect(captureError(() => loadConfigFile(writeConfig('{"ignoreFiles": "a.txt"}')))).toMatchObject({ code: "INVALID_CONFIG" });
  });

  it("rejects invalid JSON and missing files", () => {
    expect(captureError(() => loadConfigFile(writeConfig("{ style: dash }")))).toMatchObject({ code: "INVALID_CONFIG" });

    const missing = path.join(dir, "missing.json");
    const error = captureError(() => loadConfigFile(missing));
    expect(error).toMatchObject({ code: "INVALID_CONFIG" });
    expect(error instanceof Error && error.message.startsWith(`Cannot read config file '${missing}'`)).toBe(true);
  });
});

describe("mergeConfig", () => {
  it("lets the file fill in values the user did not type", () => {
    const merged = mergeConfig(cliDefaults, { style: "plus", reverse: true, ignoreDirs: ["dist"] }, () => false);

    expect(merged.style).toBe("plus");
    expect(merged.reverse).toBe(true);
    expect(merged.ignoreDirs).toEqual(["dist"]);
    expect(merged.indent).toBe(2);
  });

  it("lets explicit flags win over the file", () => {
    const explicit = new Set<ConfigKey>(["style", "save"]);
    const cli: CliOptions = { ...cliDefaults, style: "arrow", save: false };
    const merged = mergeConfig(cli, { style: "plus", save: true, count: true }, (key) => explicit.has(key));

    expect(merged.style).toBe("arrow");
    expect(merged.save).toBe(false);
    expect(merged.count).toBe(true);
  });

  it("drops the CLI-only options", () => {
    const merged = mergeConfig({ ...cliDefaults, cfg: "x.json", debug: true }, {}, () => false);
    expect(Object.keys(merged)).not.toContain("cfg");
    expect(Object.keys(merged)).not.toContain("debug");
  });
});
