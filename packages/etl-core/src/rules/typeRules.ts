import { ConfigurationError } from "../errors";
import type {
  SerializationFormat,
  TypePattern,
  TypeRule
} from "../types";
import { compileCastTemplate, type CastTemplate } from "./castTemplate";

export type CastTriple = [string, string, SerializationFormat];

export interface TypeMapsSettings {
  as_is_att_type: Record<string, SerializationFormat>;
  cast_needed_att_type: Record<string, CastTriple>;
  default_att_type: CastTriple;
}

export type CompiledTypeRule =
  | {
      kind: "as_is";
      pattern: TypePattern;
      matches: (sourceType: string) => boolean;
      serializationFormat: SerializationFormat;
    }
  | {
      kind: "cast_needed";
      pattern: TypePattern;
      matches: (sourceType: string) => boolean;
      targetType: string;
      cast: CastTemplate;
      serializationFormat: SerializationFormat;
    };

export interface CompiledDefaultRule {
  kind: "default";
  targetType: string;
  cast: CastTemplate;
  serializationFormat: SerializationFormat;
}

/**
 * Ordered, validated catalog of type rules. Rules are tried in order and
 * the first match wins; `defaultRule` applies when nothing matches.
 */
export interface TypeRuleTable {
  readonly rules: readonly CompiledTypeRule[];
  readonly defaultRule: CompiledDefaultRule;
}

function patternText(pattern: TypePattern): string {
  return pattern.kind === "literal" ? pattern.value : pattern.source;
}

function compileMatcher(pattern: TypePattern): (sourceType: string) => boolean {
  if (patternText(pattern).length === 0) {
    throw new ConfigurationError("Type pattern must not be empty");
  }

  if (pattern.kind === "literal") {
    const expected = pattern.value;
    return (sourceType) => sourceType === expected;
  }

  let regex: RegExp;
  try {
    // The bare source must parse on its own; otherwise an unbalanced ")" could
    // close the wrapping group and leave an alternative unanchored.
    new RegExp(pattern.source);
    regex = new RegExp(`^(?:${pattern.source})$`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Invalid type pattern "${pattern.source}": ${reason}`
    );
  }

  return (sourceType) => regex.test(sourceType);
}

function withContext<T>(description: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`${description}: ${error.message}`);
    }
    throw error;
  }
}

export function createTypeRuleTable(rules: readonly TypeRule[]): TypeRuleTable {
  const compiled: CompiledTypeRule[] = [];
  const seenPatterns = new Set<string>();
  let defaultRule: CompiledDefaultRule | null = null;

  for (const rule of rules) {
    if (rule.kind === "default") {
      if (defaultRule) {
        throw new ConfigurationError("Type rule table has more than one default rule");
      }

      defaultRule = withContext<CompiledDefaultRule>("default rule", () => ({
        kind: "default",
        targetType: rule.targetType,
        cast: compileCastTemplate(rule.castTemplate),
        serializationFormat: rule.serializationFormat
      }));
      continue;
    }

    const text = patternText(rule.pattern);
    if (seenPatterns.has(text)) {
      throw new ConfigurationError(`Duplicate type pattern: ${text}`);
    }
    seenPatterns.add(text);

    const description = `rule for "${text}"`;
    const matches = withContext(description, () => compileMatcher(rule.pattern));

    if (rule.kind === "as_is") {
      compiled.push({
        kind: "as_is",
        pattern: rule.pattern,
        matches,
        serializationFormat: rule.serializationFormat
      });
    } else {
      compiled.push({
        kind: "cast_needed",
        pattern: rule.pattern,
        matches,
        targetType: rule.targetType,
        cast: withContext(description, () => compileCastTemplate(rule.castTemplate)),
        serializationFormat: rule.serializationFormat
      });
    }
  }

  if (!defaultRule) {
    throw new ConfigurationError("Type rule table is missing its default rule");
  }

  return Object.freeze({
    rules: Object.freeze(compiled),
    defaultRule
  });
}

/**
 * Flattens the settings mapping into catalog order: as-is entries, then
 * cast-needed entries (each in declared order), then the default.
 */
export function rulesFromTypeMaps(typeMaps: TypeMapsSettings): TypeRule[] {
  const rules: TypeRule[] = [];

  for (const [source, serializationFormat] of Object.entries(typeMaps.as_is_att_type)) {
    rules.push({
      kind: "as_is",
      pattern: { kind: "regex", source },
      serializationFormat
    });
  }

  for (const [source, [targetType, castTemplate, serializationFormat]] of Object.entries(
    typeMaps.cast_needed_att_type
  )) {
    rules.push({
      kind: "cast_needed",
      pattern: { kind: "regex", source },
      targetType,
      castTemplate,
      serializationFormat
    });
  }

  const [targetType, castTemplate, serializationFormat] = typeMaps.default_att_type;
  rules.push({ kind: "default", targetType, castTemplate, serializationFormat });

  return rules;
}
