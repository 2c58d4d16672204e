import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DEFAULT_CONFIG, getConfigPath, loadConfig, parseConfig } from "../../src/node/config.ts";

describe("Config - Parse", () => {
  test("JSONC with comments and a trailing comma", () => {
    const text = `{
      // wider rows
      "bytesPerLine": 8,
    }`;
    expect(parseConfig(text, "cfg")).toEqual({
      success: true,
      data: { bytesPerLine: 8, historyLimit: 0 },
    });
  });

  test("defaults", () => {
    expect(DEFAULT_CONFIG).toEqual({ bytesPerLine: 16, historyLimit: 0 });
    expect(parseConfig("{}", "cfg")).toEqual({ success: true, data: DEFAULT_CONFIG });
  });

  test("syntax errors name the file", () => {
    const result = parseConfig('{ "bytesPerLine": }', "cfg");
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toMatch(/^cfg: ValueExpected at offset \d+$/);
  });

  test("out of range values", () => {
    expect(parseConfig('{ "bytesPerLine": 0 }', "cfg")).toEqual({
      success: false,
      error: "cfg: bytesPerLine: Number must be greater than or equal to 1",
    });
  });

  test("unknown keys are rejected", () => {
    expect(parseConfig('{ "colour": true }', "cfg")).toEqual({
      success: false,
      error: "cfg: config: Unrecognized key(s) in object: 'colour'",
    });
  });
});

describe("Config - Load", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "hexmodal-config-"));
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  test("the config path follows HEXMODAL_HOME", () => {
    vi.stubEnv("HEXMODAL_HOME", dir);
    expect(getConfigPath()).toBe(path.join(dir, "config.jsonc"));
  });

  test("a missing file gives the defaults quietly", () => {
    expect(loadConfig(path.join(dir, "missing.jsonc"))).toEqual(DEFAULT_CONFIG);
    expect(console.error).not.toHaveBeenCalled();
  });

  test("a valid file is loaded", () => {
    const file = path.join(dir, "config.jsonc");
    fs.writeFileSync(file, '{ "historyLimit": 50 }');
    expect(loadConfig(file)).toEqual({ bytesPerLine: 16, historyLimit: 50 });
  });

  test("an invalid file warns and gives the defaults", () => {
    const file = path.join(dir, "config.jsonc");
    fs.writeFileSync(file, '{ "bytesPerLine": "wide" }');
    expect(loadConfig(file)).toEqual(DEFAULT_CONFIG);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
