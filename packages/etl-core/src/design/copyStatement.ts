import { quoteIdentifier } from "../rules/typeResolver";
import type { ColumnDefinition } from "../types";

export const CSV_WRITE_FORMAT = "FORMAT csv, HEADER true, NULL '\\N'";

export function buildSelectList(columns: ColumnDefinition[]): string[] {
  return columns.map((column) =>
    column.expression === null
      ? quoteIdentifier(column.name)
      : `${column.expression} AS ${quoteIdentifier(column.name)}`
  );
}

export function createCopyStatement(
  tableName: string,
  columns: ColumnDefinition[],
  rowLimit?: number
): string {
  if (columns.length === 0) {
    throw new Error(`Cannot build COPY statement without columns for ${tableName}`);
  }

  if (rowLimit !== undefined && (!Number.isInteger(rowLimit) || rowLimit <= 0)) {
    throw new Error(`Row limit must be a positive integer: ${rowLimit}`);
  }

  const limit = rowLimit === undefined ? "" : `\nLIMIT ${rowLimit}`;

  return `COPY (SELECT ${buildSelectList(columns).join(",\n       ")}\n  FROM ${tableName}${limit}) TO STDOUT WITH (${CSV_WRITE_FORMAT})`;
}
