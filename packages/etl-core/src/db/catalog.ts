import { minimatch } from "minimatch";

import { RelationNotFoundError } from "../errors";
import { tableIdentifier } from "../design/tableDesign";
import type { ColumnAttribute, TableName } from "../types";

export interface ColumnRow {
  attribute: string | null;
  attribute_type: string | null;
  not_null_constraint: boolean | null;
}

export interface TableRow {
  schema: string;
  table: string;
}

/**
 * Glob patterns over `schema.table` names. The whitelist bounds every table
 * the ETL may touch, the blacklist removes tables from it, and the optional
 * table pattern narrows the result by bare table name.
 */
export interface TableSelection {
  whitelist: string[];
  blacklist: string[];
  tablePattern?: string | null;
}

export interface Queryable<Row> {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[] }>;
}

// `*` spans any run of characters in a `schema.table` name.
const GLOB_OPTIONS = { dot: true, nocomment: true, nonegate: true };

const SELECT_TABLES_SQL = `
SELECT nsp.nspname AS "schema", cls.relname AS "table"
FROM pg_catalog.pg_class cls
JOIN pg_catalog.pg_namespace nsp ON cls.relnamespace = nsp.oid
WHERE cls.relname NOT LIKE 'tmp%'
  AND cls.relkind IN ('r', 'm')
ORDER BY nsp.nspname, cls.relname;
`;

// Left joins keep one all-null row for a relation without user columns, so
// an empty result means the relation itself does not exist.
const SELECT_COLUMNS_SQL = `
SELECT ca.attname AS attribute,
       pg_catalog.format_type(ct.oid, ca.atttypmod) AS attribute_type,
       ca.attnotnull AS not_null_constraint
FROM pg_catalog.pg_class AS cls
JOIN pg_catalog.pg_namespace AS ns ON cls.relnamespace = ns.oid
LEFT JOIN pg_catalog.pg_attribute AS ca
  ON ca.attrelid = cls.oid AND ca.attnum > 0 AND NOT ca.attisdropped
LEFT JOIN pg_catalog.pg_type AS ct ON ca.atttypid = ct.oid
WHERE ns.nspname = $1
  AND cls.relname = $2
ORDER BY ca.attnum;
`;

function matchesAny(name: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(name, pattern, GLOB_OPTIONS));
}

export function selectTables(rows: TableRow[], selection: TableSelection): TableName[] {
  const tablePattern = selection.tablePattern ?? null;

  return rows
    .filter((row) => {
      const identifier = tableIdentifier(row);
      if (matchesAny(identifier, selection.blacklist)) {
        return false;
      }
      if (!matchesAny(identifier, selection.whitelist)) {
        return false;
      }
      return tablePattern === null || minimatch(row.table, tablePattern, GLOB_OPTIONS);
    })
    .map((row) => ({ schema: row.schema, table: row.table }));
}

export async function fetchTables(
  runner: Queryable<TableRow>,
  selection: TableSelection
): Promise<TableName[]> {
  if (selection.whitelist.length === 0) {
    return [];
  }

  const result = await runner.query(SELECT_TABLES_SQL);

  return selectTables(result.rows, selection);
}

export async function fetchColumns(
  runner: Queryable<ColumnRow>,
  table: TableName
): Promise<ColumnAttribute[]> {
  const result = await runner.query(SELECT_COLUMNS_SQL, [
    table.schema,
    table.table
  ]);

  if (result.rows.length === 0) {
    throw new RelationNotFoundError(tableIdentifier(table));
  }

  return result.rows.flatMap((row): ColumnAttribute[] =>
    row.attribute === null || row.attribute_type === null
      ? []
      : [
          {
            attribute: row.attribute,
            attributeType: row.attribute_type,
            notNull: row.not_null_constraint === true
          }
        ]
  );
}
