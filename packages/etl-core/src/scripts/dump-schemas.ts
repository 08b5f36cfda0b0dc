import { loadConfig } from "../config";
import { executeSchemaDump } from "../dump/runDump";
import { createRunState } from "../tracking/runState";

async function main(): Promise<void> {
  const config = loadConfig();
  const state = createRunState({
    etlId: config.etlId,
    eventCapacity: config.eventLogCapacity
  });

  const summary = await executeSchemaDump(config, state);
  console.log(
    `schema dump complete (etlId=${state.etlId}, tables=${summary.tables}, files=${summary.files.length}, dir=${config.tableDesignDir})`
  );
}

main().catch((error: unknown) => {
  console.error("schema dump failed", error);
  process.exit(1);
});
