import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigurationError } from "../src/errors";
import { createTypeResolver } from "../src/rules/typeResolver";
import { loadSettings, mergeSettings, prepareEtlSettings } from "../src/settings";

const TYPE_MAPS_YAML = `
type_maps:
  as_is_att_type:
    integer: int
  cast_needed_att_type:
    text: ["varchar(10000)", "%s::varchar(10000)", string]
  default_att_type: ["varchar(256)", "%s::varchar(256)", string]
`;

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "etl-settings-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeSettings(name: string, contents: string): Promise<string> {
  const filename = path.join(dir, name);
  await writeFile(filename, contents, "utf8");
  return filename;
}

describe("loadSettings", () => {
  it("loads the packaged defaults", async () => {
    const settings = await loadSettings([]);
    const { ruleTable, retryPolicy } = prepareEtlSettings(settings);
    const resolver = createTypeResolver(ruleTable);

    expect(retryPolicy).toEqual({ extractRetries: 1, copyDataRetries: 3, insertDataRetries: 3 });
    expect(resolver.resolve("numeric(18,4)", "price")).toEqual({
      rule: "as_is",
      targetType: "numeric(18,4)",
      castExpression: '"price"',
      serializationFormat: "string"
    });
    expect(resolver.resolve("numeric", "price").castExpression).toBe('"price"::decimal(18,4)');
    expect(resolver.resolve("bigint", "id").serializationFormat).toBe("long");
    expect(resolver.resolve("bigint[]", "ids").targetType).toBe("varchar(65535)");
    expect(resolver.resolve("character varying(20)", "code").rule).toBe("as_is");
    expect(resolver.resolve("character varying", "code").targetType).toBe("varchar(10000)");
    expect(resolver.resolve("hstore", "attrs").castExpression).toBe(
      'public.hstore_to_json("attrs")::varchar(65535)'
    );
    expect(resolver.resolve("bytea", "blob").castExpression).toBe("encode(\"blob\", 'base64')");
    expect(resolver.resolve("timestamp with time zone", "created_at")).toEqual({
      rule: "cast_needed",
      targetType: "timestamp without time zone",
      castExpression: '"created_at"::varchar(256)',
      serializationFormat: "string"
    });
    expect(resolver.resolve("order_status", "status").rule).toBe("default");
  });

  it("merges later files into earlier sections", async () => {
    const override = await writeSettings(
      "local.yaml",
      `
retry:
  extract_retries: 0
type_maps:
  default_att_type: ["varchar(512)", "%s::varchar(512)", string]
`
    );

    const { ruleTable, retryPolicy } = prepareEtlSettings(await loadSettings([override]));

    expect(retryPolicy).toEqual({ extractRetries: 0, copyDataRetries: 3, insertDataRetries: 3 });
    expect(ruleTable.defaultRule.targetType).toBe("varchar(512)");
    expect(ruleTable.rules.length).toBeGreaterThan(0);
  });

  it("reads the settings files of a directory in name order", async () => {
    await writeSettings("20-retry.yaml", "retry:\n  copy_data_retries: 5\n");
    await writeSettings("10-retry.yaml", "retry:\n  copy_data_retries: 1\n");
    await writeSettings("notes.txt", "not settings");

    const { retryPolicy } = prepareEtlSettings(await loadSettings([dir]));

    expect(retryPolicy.copyDataRetries).toBe(5);
  });

  it("requires the retry section", async () => {
    const file = await writeSettings("types.yaml", TYPE_MAPS_YAML);
    const settings = await loadSettings([file], null);

    expect(() => prepareEtlSettings(settings)).toThrow("Retry settings are missing");
  });

  it("rejects malformed cast templates before anything resolves", async () => {
    const file = await writeSettings(
      "broken.yaml",
      `
type_maps:
  cast_needed_att_type:
    json: ["varchar(65535)", "varchar(65535)", string]
`
    );
    const settings = await loadSettings([file]);

    expect(() => prepareEtlSettings(settings)).toThrow(ConfigurationError);
    expect(() => prepareEtlSettings(settings)).toThrow('rule for "json"');
  });

  it("rejects unknown serialization formats", async () => {
    const file = await writeSettings(
      "formats.yaml",
      `
type_maps:
  as_is_att_type:
    integer: int32
`
    );

    await expect(loadSettings([file])).rejects.toThrow(
      /^Invalid settings: type_maps\.as_is_att_type\.integer: /
    );
  });

  it("rejects files that are not YAML mappings", async () => {
    const list = await writeSettings("list.yaml", "- one\n- two\n");
    const broken = await writeSettings("broken.yaml", "retry: [1, 2\n");

    await expect(loadSettings([list])).rejects.toThrow("must contain a mapping");
    await expect(loadSettings([broken])).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("mergeSettings", () => {
  it("merges mapping sections and replaces everything else", () => {
    expect(
      mergeSettings(
        { retry: { extract_retries: 1, copy_data_retries: 2 }, sources: [{ name: "a" }] },
        { retry: { copy_data_retries: 4 }, sources: [{ name: "b" }] }
      )
    ).toEqual({
      retry: { extract_retries: 1, copy_data_retries: 4 },
      sources: [{ name: "b" }]
    });
  });
});
