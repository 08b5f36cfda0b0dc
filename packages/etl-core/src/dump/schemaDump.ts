import { access, mkdir, writeFile as writeFileToDisk } from "node:fs/promises";
import path from "node:path";

import { mapColumns } from "../design/columnMapping";
import { buildTableDesign, tableIdentifier } from "../design/tableDesign";
import { fetchColumns, type ColumnRow, type Queryable } from "../db/catalog";
import type { TypeResolver } from "../rules/typeResolver";
import type { RunState } from "../tracking/runState";
import type { TableName } from "../types";

export const DUMP_STEP = "dump";

type WriteFileLike = (filename: string, contents: string) => Promise<void>;
type FileExists = (filename: string) => Promise<boolean>;

export interface SchemaDumpOptions {
  runner: Queryable<ColumnRow>;
  resolver: TypeResolver;
  sourceName: string;
  tables: TableName[];
  outputDir: string;
  state: RunState;
  overwrite?: boolean;
  dryRun?: boolean;
  writeFile?: WriteFileLike;
  exists?: FileExists;
  log?: (message: string) => void;
  onTable?: (table: TableName, filename: string) => void;
}

async function writeToDisk(filename: string, contents: string): Promise<void> {
  await mkdir(path.dirname(filename), { recursive: true });
  await writeFileToDisk(filename, contents, "utf8");
}

async function existsOnDisk(filename: string): Promise<boolean> {
  try {
    await access(filename);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export function designFilename(outputDir: string, table: TableName): string {
  return path.join(outputDir, `${table.schema}-${table.table}.json`);
}

/**
 * Writes one table design per source table. Existing design files are left
 * alone unless `overwrite` is set, and `dryRun` writes nothing. Progress for a
 * table counts its mapped columns; each table gets a started event followed by
 * finished, skipped or failed.
 */
export async function runSchemaDump(options: SchemaDumpOptions): Promise<string[]> {
  const writeFile = options.writeFile ?? writeToDisk;
  const exists = options.exists ?? existsOnDisk;
  const log = options.log ?? console.log;
  const { progress, events } = options.state;
  const written: string[] = [];

  for (const table of options.tables) {
    const identifier = tableIdentifier(table);
    events.append(identifier, DUMP_STEP, "started");

    let outcome: "finished" | "skipped";
    try {
      const attributes = await fetchColumns(options.runner, table);
      progress.setFinal(identifier, attributes.length);

      const columns = mapColumns(attributes, options.resolver, () => {
        progress.advance(identifier);
      });
      const filename = designFilename(options.outputDir, table);

      if (options.dryRun) {
        log(`dry-run: skipping table design (table=${identifier}, file=${filename})`);
        outcome = "skipped";
      } else if (!options.overwrite && (await exists(filename))) {
        log(`table design already exists, skipping (table=${identifier}, file=${filename})`);
        outcome = "skipped";
      } else {
        const design = buildTableDesign(options.sourceName, table, columns);
        await writeFile(filename, `${JSON.stringify(design, null, 4)}\n`);
        written.push(filename);
        options.onTable?.(table, filename);
        outcome = "finished";
      }
    } catch (error) {
      events.append(identifier, DUMP_STEP, "failed");
      throw error;
    }

    events.append(identifier, DUMP_STEP, outcome);
  }

  return written;
}
