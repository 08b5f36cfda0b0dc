import { quoteIdentifier } from "../rules/typeResolver";
import type {
  ColumnDefinition,
  ColumnSerializationType,
  TableName
} from "../types";

export interface TableDesignField {
  name: string;
  sql_type: string;
  source_sql_type?: string;
  expression?: string;
  type: ColumnSerializationType;
  not_null: boolean;
}

export interface TableDesign {
  type: "record";
  name: string;
  source_name: string;
  fields: TableDesignField[];
  table_constraints: {
    primary_key: string[];
  };
  table_attributes: {
    diststyle: "even" | "all";
    sortkey: string[];
  };
}

export function tableIdentifier(table: TableName): string {
  return `${table.schema}.${table.table}`;
}

function toField(column: ColumnDefinition): TableDesignField {
  const field: TableDesignField = {
    name: column.name,
    sql_type: column.sqlType,
    type: column.type,
    not_null: column.notNull
  };

  if (column.sourceSqlType !== column.sqlType) {
    field.source_sql_type = column.sourceSqlType;
  }

  if (column.expression !== null) {
    field.expression = column.expression;
  }

  return field;
}

export function buildTableDesign(
  sourceName: string,
  table: TableName,
  columns: ColumnDefinition[]
): TableDesign {
  const target: TableName = { schema: sourceName, table: table.table };

  return {
    type: "record",
    name: tableIdentifier(target),
    source_name: `${sourceName}.${tableIdentifier(table)}`,
    fields: columns.map(toField),
    table_constraints: {
      primary_key: ["id"]
    },
    table_attributes: {
      diststyle: "even",
      sortkey: ["id"]
    }
  };
}

function joinColumnList(columns: string[]): string {
  return columns.map(quoteIdentifier).join(", ");
}

export function assembleTableDdl(design: TableDesign, tableName: string): string {
  const lines = design.fields.map((field) => {
    const notNull = field.not_null ? " NOT NULL" : "";
    return `${quoteIdentifier(field.name)} ${field.sql_type}${notNull}`;
  });

  if (design.table_constraints.primary_key.length > 0) {
    lines.push(`PRIMARY KEY ( ${joinColumnList(design.table_constraints.primary_key)} )`);
  }

  const attributes = [`DISTSTYLE ${design.table_attributes.diststyle.toUpperCase()}`];
  if (design.table_attributes.sortkey.length > 0) {
    attributes.push(`SORTKEY ( ${joinColumnList(design.table_attributes.sortkey)} )`);
  }

  return [
    `CREATE TABLE IF NOT EXISTS ${tableName} (`,
    lines.map((line) => `    ${line}`).join(",\n"),
    ")",
    attributes.join("\n")
  ].join("\n");
}
