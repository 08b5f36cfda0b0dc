import { createRunState, executeSchemaDump, loadConfig } from "etl-core";

import { closeMonitorServer, startMonitorServer } from "./server";

async function main(): Promise<void> {
  const config = loadConfig();
  const state = createRunState({
    etlId: config.etlId,
    eventCapacity: config.eventLogCapacity
  });

  const server = await startMonitorServer(state, config.monitorPort);
  console.log(`etl monitor listening on port ${config.monitorPort} (etlId=${state.etlId})`);

  const shutdown = (signal: string): void => {
    console.log(`etl monitor shutting down (signal=${signal})`);
    closeMonitorServer(server).then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("etl monitor failed to close", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    const summary = await executeSchemaDump(config, state);
    console.log(
      `schema dump complete (tables=${summary.tables}, files=${summary.files.length}); monitor still serving until interrupted`
    );
  } catch (error) {
    await closeMonitorServer(server);
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error("etl monitor failed", error);
  process.exit(1);
});
