import type { ResolvedMapping } from "../types";
import type { TypeRuleTable } from "./typeRules";

export interface TypeResolver {
  resolve: (sourceType: string, columnName: string) => ResolvedMapping;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function createTypeResolver(table: TypeRuleTable): TypeResolver {
  return {
    resolve(sourceType: string, columnName: string): ResolvedMapping {
      const columnRef = quoteIdentifier(columnName);
      const rule = table.rules.find((candidate) => candidate.matches(sourceType));

      if (!rule) {
        const fallback = table.defaultRule;
        return Object.freeze({
          rule: "default",
          targetType: fallback.targetType,
          castExpression: fallback.cast.apply(columnRef),
          serializationFormat: fallback.serializationFormat
        });
      }

      if (rule.kind === "as_is") {
        return Object.freeze({
          rule: "as_is",
          targetType: sourceType,
          castExpression: columnRef,
          serializationFormat: rule.serializationFormat
        });
      }

      return Object.freeze({
        rule: "cast_needed",
        targetType: rule.targetType,
        castExpression: rule.cast.apply(columnRef),
        serializationFormat: rule.serializationFormat
      });
    }
  };
}
