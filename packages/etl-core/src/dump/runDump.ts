import { fetchTables } from "../db/catalog";
import { createPool } from "../db/pool";
import { createTypeResolver } from "../rules/typeResolver";
import { loadSettings, prepareEtlSettings } from "../settings";
import { createProgressLogger } from "../tracking/progressLogger";
import type { RunState } from "../tracking/runState";
import type { EtlConfig } from "../types";
import { runSchemaDump } from "./schemaDump";

export interface DumpSummary {
  tables: number;
  files: string[];
}

/**
 * Loads settings, validates the type rules and dumps table designs for every
 * source table selected by the configured whitelist, blacklist and pattern.
 */
export async function executeSchemaDump(
  config: EtlConfig,
  state: RunState
): Promise<DumpSummary> {
  const settings = await loadSettings(config.settingsFiles);
  const { ruleTable, retryPolicy } = prepareEtlSettings(settings);
  const resolver = createTypeResolver(ruleTable);

  console.log(
    `settings loaded (etlId=${state.etlId}, typeRules=${ruleTable.rules.length + 1}, extractRetries=${retryPolicy.extractRetries}, copyDataRetries=${retryPolicy.copyDataRetries}, insertDataRetries=${retryPolicy.insertDataRetries})`
  );

  const progressLogger = createProgressLogger({
    tracker: state.progress,
    intervalMs: config.progressLogIntervalMs
  });
  const pool = createPool(config.databaseUrl, { applicationName: `etl-schema-dump-${state.etlId}` });

  try {
    const tables = await fetchTables(pool, {
      whitelist: config.sourceWhitelist,
      blacklist: config.sourceBlacklist,
      tablePattern: config.tablePattern
    });
    console.log(
      `source tables found (source=${config.sourceName}, whitelist=${config.sourceWhitelist.join(",")}, blacklist=${config.sourceBlacklist.join(",")}, pattern=${config.tablePattern ?? "*"}, tables=${tables.length})`
    );

    const files = await runSchemaDump({
      runner: pool,
      resolver,
      sourceName: config.sourceName,
      tables,
      outputDir: config.tableDesignDir,
      state,
      overwrite: config.overwriteDesigns,
      dryRun: config.dryRun,
      onTable(table, filename) {
        progressLogger.tick();
        if (config.logLevel === "debug") {
          console.log(`table design written (table=${table.schema}.${table.table}, file=${filename})`);
        }
      }
    });

    progressLogger.flush();

    return { tables: tables.length, files };
  } finally {
    await pool.end();
  }
}
