export * from "./types";
export * from "./errors";
export { loadConfig } from "./config";
export {
  DEFAULT_SETTINGS_FILE,
  SettingsSchema,
  loadSettings,
  mergeSettings,
  prepareEtlSettings,
  validateSettings,
  type EtlSettings,
  type PreparedSettings
} from "./settings";
export { CAST_PLACEHOLDER, compileCastTemplate, type CastTemplate } from "./rules/castTemplate";
export {
  createTypeRuleTable,
  rulesFromTypeMaps,
  type CastTriple,
  type CompiledDefaultRule,
  type CompiledTypeRule,
  type TypeMapsSettings,
  type TypeRuleTable
} from "./rules/typeRules";
export { createTypeResolver, quoteIdentifier, type TypeResolver } from "./rules/typeResolver";
export {
  ID_COLUMN_NAME,
  ID_EXPRESSION,
  MISSING_SOURCE_TYPE,
  mapColumn,
  mapColumns
} from "./design/columnMapping";
export {
  assembleTableDdl,
  buildTableDesign,
  tableIdentifier,
  type TableDesign,
  type TableDesignField
} from "./design/tableDesign";
export { CSV_WRITE_FORMAT, buildSelectList, createCopyStatement } from "./design/copyStatement";
export {
  fetchColumns,
  fetchTables,
  selectTables,
  type ColumnRow,
  type Queryable,
  type TableRow,
  type TableSelection
} from "./db/catalog";
export { createPool, type SourcePoolOptions } from "./db/pool";
export {
  RetrySettingsSchema,
  maxAttempts,
  parseRetryPolicy,
  retriesFor,
  type RetrySettings
} from "./pipeline/retryPolicy";
export { createProgressTracker, type ProgressTracker } from "./tracking/progressTracker";
export {
  DEFAULT_EVENT_LOG_CAPACITY,
  createEventLog,
  type EventLog,
  type EventLogOptions
} from "./tracking/eventLog";
export { createRunState, type RunState, type RunStateOptions } from "./tracking/runState";
export {
  createProgressLogger,
  type ProgressLogger,
  type ProgressLoggerOptions
} from "./tracking/progressLogger";
export { DUMP_STEP, designFilename, runSchemaDump, type SchemaDumpOptions } from "./dump/schemaDump";
export { executeSchemaDump, type DumpSummary } from "./dump/runDump";
