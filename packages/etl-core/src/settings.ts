import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigurationError } from "./errors";
import { parseRetryPolicy } from "./pipeline/retryPolicy";
import {
  createTypeRuleTable,
  rulesFromTypeMaps,
  type TypeRuleTable
} from "./rules/typeRules";
import { SERIALIZATION_FORMATS, type RetryPolicy } from "./types";

export const DEFAULT_SETTINGS_FILE = fileURLToPath(
  new URL("../config/default_settings.yaml", import.meta.url)
);

const SerializationFormatSchema = z.enum(SERIALIZATION_FORMATS);

const CastTripleSchema = z.tuple([
  z.string().min(1),
  z.string().min(1),
  SerializationFormatSchema
]);

const TypeMapsSchema = z.object({
  as_is_att_type: z.record(z.string(), SerializationFormatSchema),
  cast_needed_att_type: z.record(z.string(), CastTripleSchema),
  default_att_type: CastTripleSchema
});

export const SettingsSchema = z.object({
  retry: z.unknown(),
  type_maps: TypeMapsSchema
});

export type EtlSettings = z.infer<typeof SettingsSchema>;

export interface PreparedSettings {
  ruleTable: TypeRuleTable;
  retryPolicy: RetryPolicy;
}

type RawSettings = Record<string, unknown>;

function isMapping(value: unknown): value is RawSettings {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Later files update earlier ones section by section: mapping sections are
 * merged key by key, anything else is replaced.
 */
export function mergeSettings(base: RawSettings, update: RawSettings): RawSettings {
  const merged: RawSettings = { ...base };

  for (const [key, value] of Object.entries(update)) {
    const existing = merged[key];
    merged[key] = isMapping(existing) && isMapping(value) ? { ...existing, ...value } : value;
  }

  return merged;
}

function parseSettingsText(text: string, filename: string): RawSettings {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot parse settings file ${filename}: ${reason}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isMapping(parsed)) {
    throw new ConfigurationError(`Settings file ${filename} must contain a mapping`);
  }

  return parsed;
}

async function expandSettingsFiles(names: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const name of names) {
    const info = await stat(name);
    if (!info.isDirectory()) {
      files.push(name);
      continue;
    }

    const entries = (await readdir(name))
      .filter((entry) => entry.endsWith(".yaml") || entry.endsWith(".yml"))
      .sort();
    files.push(...entries.map((entry) => path.join(name, entry)));
  }

  return files;
}

export function validateSettings(raw: RawSettings): EtlSettings {
  const parsed = SettingsSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid settings: ${issues}`);
  }

  return parsed.data;
}

export async function loadSettings(
  files: string[],
  defaultFile: string | null = DEFAULT_SETTINGS_FILE
): Promise<EtlSettings> {
  const names = defaultFile ? [defaultFile, ...files] : files;
  let settings: RawSettings = {};

  for (const filename of await expandSettingsFiles(names)) {
    const text = await readFile(filename, "utf8");
    settings = mergeSettings(settings, parseSettingsText(text, filename));
  }

  return validateSettings(settings);
}

export function prepareEtlSettings(settings: EtlSettings): PreparedSettings {
  return {
    ruleTable: createTypeRuleTable(rulesFromTypeMaps(settings.type_maps)),
    retryPolicy: parseRetryPolicy(settings.retry)
  };
}
