import { afterEach, describe, expect, it } from "vitest";

import { loadConfig } from "../src/config";

const ENV_KEYS = [
  "SETTINGS_FILES",
  "SOURCE_WHITELIST",
  "SOURCE_BLACKLIST",
  "SOURCE_TABLE_PATTERN",
  "OVERWRITE_DESIGNS",
  "DRY_RUN",
  "MONITOR_PORT",
  "ETL_ID"
] as const;
const originalEnv = new Map<string, string | undefined>(
  ENV_KEYS.map((key): [string, string | undefined] => [key, process.env[key]])
);

afterEach(() => {
  for (const [key, value] of originalEnv) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

describe("loadConfig", () => {
  it("uses defaults when the environment is empty", () => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }

    const config = loadConfig();

    expect(config.settingsFiles).toEqual([]);
    expect(config.sourceWhitelist).toEqual(["public.*"]);
    expect(config.sourceBlacklist).toEqual([]);
    expect(config.tablePattern).toBeNull();
    expect(config.overwriteDesigns).toBe(false);
    expect(config.dryRun).toBe(false);
    expect(config.monitorPort).toBe(8086);
    expect(config.etlId).toBeNull();
  });

  it("splits comma separated lists", () => {
    process.env.SETTINGS_FILES = "config/local.yaml, config/prod ,";
    process.env.SOURCE_WHITELIST = "sales.*,inventory.*";
    process.env.SOURCE_BLACKLIST = "sales.*_archive";

    const config = loadConfig();

    expect(config.settingsFiles).toEqual(["config/local.yaml", "config/prod"]);
    expect(config.sourceWhitelist).toEqual(["sales.*", "inventory.*"]);
    expect(config.sourceBlacklist).toEqual(["sales.*_archive"]);
  });

  it("reads the table pattern and dump flags", () => {
    process.env.SOURCE_TABLE_PATTERN = "order*";
    process.env.OVERWRITE_DESIGNS = "true";
    process.env.DRY_RUN = "0";

    const config = loadConfig();

    expect(config.tablePattern).toBe("order*");
    expect(config.overwriteDesigns).toBe(true);
    expect(config.dryRun).toBe(false);
  });

  it("rejects non-numeric ports", () => {
    process.env.MONITOR_PORT = "http";

    expect(() => loadConfig()).toThrow("Invalid integer for MONITOR_PORT: http");
  });
});
