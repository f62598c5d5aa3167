import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { withTempHome } from "../../test/helpers/temp-home.js";
import { DEFAULT_CONFIG, loadConfig, parseConfig } from "./config.js";
import { resolveConfigPath, resolveRegistryPath, resolveStateDir } from "./paths.js";

describe("resolveStateDir()", () => {
  it("prefers EASYIP_STATE_DIR", () => {
    expect(resolveStateDir({ EASYIP_STATE_DIR: " /srv/easyip " })).toBe("/srv/easyip");
  });

  it("places the registry and config under the state dir", () => {
    expect(resolveRegistryPath("/srv/easyip")).toBe(
      path.join("/srv/easyip", "registry", "devices.json"),
    );
    expect(resolveConfigPath("/srv/easyip")).toBe(path.join("/srv/easyip", "config.json"));
  });
});

describe("parseConfig()", () => {
  it("accepts a partial config", () => {
    expect(parseConfig({ discovery: { timeoutMs: 5000 } })).toEqual({
      discovery: { timeoutMs: 5000 },
    });
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig({ discovery: { port: 10670 } })).toThrow(/config is invalid/);
  });

  it("rejects out-of-range values with the offending path", () => {
    expect(() => parseConfig({ discovery: { timeoutMs: 50 } })).toThrow(/discovery\.timeoutMs/);
    expect(() => parseConfig({ registry: { missingThresholdHours: 0 } })).toThrow(
      /registry\.missingThresholdHours/,
    );
  });
});

describe("loadConfig()", () => {
  it("returns defaults when no config file exists", async () => {
    await withTempHome(async () => {
      expect(await loadConfig()).toEqual(DEFAULT_CONFIG);
    });
  });

  it("merges the file over the defaults", async () => {
    await withTempHome(async () => {
      const filePath = resolveConfigPath();
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(
        filePath,
        JSON.stringify({ discovery: { interface: "192.168.1.10" }, registry: { missingThresholdHours: 6 } }),
      );
      expect(await loadConfig()).toEqual({
        discovery: { interface: "192.168.1.10", timeoutMs: 3000 },
        registry: { missingThresholdHours: 6 },
      });
    });
  });

  it("fails with INVALID_CONFIG on unparsable JSON", async () => {
    await withTempHome(async () => {
      const filePath = resolveConfigPath();
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, "{ not json");
      await expect(loadConfig()).rejects.toMatchObject({ code: "INVALID_CONFIG" });
    });
  });
});
