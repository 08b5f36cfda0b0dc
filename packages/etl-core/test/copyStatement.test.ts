import { describe, expect, it } from "vitest";

import { createCopyStatement } from "../src/design/copyStatement";
import type { ColumnDefinition } from "../src/types";

const COLUMNS: ColumnDefinition[] = [
  {
    name: "id",
    sourceSqlType: "bigint",
    sqlType: "bigint",
    expression: null,
    type: "long",
    notNull: true
  },
  {
    name: "payload",
    sourceSqlType: "json",
    sqlType: "varchar(65535)",
    expression: '"payload"::varchar(65535)',
    type: ["null", "string"],
    notNull: false
  }
];

describe("createCopyStatement", () => {
  it("selects casts aliased to their column names", () => {
    expect(createCopyStatement("public.events", COLUMNS)).toBe(
      'COPY (SELECT "id",\n' +
        '       "payload"::varchar(65535) AS "payload"\n' +
        "  FROM public.events) TO STDOUT WITH (FORMAT csv, HEADER true, NULL '\\N')"
    );
  });

  it("appends a row limit", () => {
    const statement = createCopyStatement("public.events", COLUMNS, 10);

    expect(statement).toContain("  FROM public.events\nLIMIT 10) TO STDOUT");
  });

  it("rejects invalid row limits and empty column lists", () => {
    expect(() => createCopyStatement("public.events", COLUMNS, 0)).toThrow(
      "Row limit must be a positive integer: 0"
    );
    expect(() => createCopyStatement("public.events", COLUMNS, 2.5)).toThrow(
      "Row limit must be a positive integer: 2.5"
    );
    expect(() => createCopyStatement("public.events", [])).toThrow(
      "Cannot build COPY statement without columns for public.events"
    );
  });
});
