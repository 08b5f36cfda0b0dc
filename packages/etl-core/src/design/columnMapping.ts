import type { TypeResolver } from "../rules/typeResolver";
import type { ColumnAttribute, ColumnDefinition } from "../types";

export const ID_COLUMN_NAME = "id";
export const ID_EXPRESSION = "row_number() OVER()";
export const MISSING_SOURCE_TYPE = "<missing>";

const SYNTHETIC_ID_COLUMN: ColumnDefinition = {
  name: ID_COLUMN_NAME,
  sourceSqlType: MISSING_SOURCE_TYPE,
  sqlType: "bigint",
  expression: ID_EXPRESSION,
  type: "long",
  notNull: true
};

export function mapColumn(
  attribute: ColumnAttribute,
  resolver: TypeResolver
): ColumnDefinition {
  const mapping = resolver.resolve(attribute.attributeType, attribute.attribute);

  return {
    name: attribute.attribute,
    sourceSqlType: attribute.attributeType,
    sqlType: mapping.targetType,
    expression: mapping.rule === "as_is" ? null : mapping.castExpression,
    type: attribute.notNull
      ? mapping.serializationFormat
      : ["null", mapping.serializationFormat],
    notNull: attribute.notNull
  };
}

/**
 * Maps source attributes onto warehouse columns. Every warehouse table needs
 * an `id` to key on, so one is synthesized from the row number when the
 * source relation has none.
 */
export function mapColumns(
  attributes: ColumnAttribute[],
  resolver: TypeResolver,
  onColumn?: (column: ColumnDefinition) => void
): ColumnDefinition[] {
  const columns: ColumnDefinition[] = [];

  for (const attribute of attributes) {
    const column = mapColumn(attribute, resolver);
    columns.push(column);
    onColumn?.(column);
  }

  if (!columns.some((column) => column.name === ID_COLUMN_NAME)) {
    columns.unshift({ ...SYNTHETIC_ID_COLUMN });
  }

  return columns;
}
