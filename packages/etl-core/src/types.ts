export const SERIALIZATION_FORMATS = [
  "int",
  "long",
  "double",
  "boolean",
  "string"
] as const;

export type SerializationFormat = (typeof SERIALIZATION_FORMATS)[number];

export type TypePattern =
  | { kind: "literal"; value: string }
  | { kind: "regex"; source: string };

export interface AsIsRule {
  kind: "as_is";
  pattern: TypePattern;
  serializationFormat: SerializationFormat;
}

export interface CastNeededRule {
  kind: "cast_needed";
  pattern: TypePattern;
  targetType: string;
  castTemplate: string;
  serializationFormat: SerializationFormat;
}

export interface DefaultRule {
  kind: "default";
  targetType: string;
  castTemplate: string;
  serializationFormat: SerializationFormat;
}

export type TypeRule = AsIsRule | CastNeededRule | DefaultRule;

export type ResolvedRuleKind = TypeRule["kind"];

export interface ResolvedMapping {
  rule: ResolvedRuleKind;
  targetType: string;
  castExpression: string;
  serializationFormat: SerializationFormat;
}

export interface TableName {
  schema: string;
  table: string;
}

export interface ColumnAttribute {
  attribute: string;
  attributeType: string;
  notNull: boolean;
}

export type ColumnSerializationType =
  | SerializationFormat
  | ["null", SerializationFormat];

export interface ColumnDefinition {
  name: string;
  sourceSqlType: string;
  sqlType: string;
  expression: string | null;
  type: ColumnSerializationType;
  notNull: boolean;
}

export interface ProgressIndex {
  name: string;
  current: number;
  final: number;
}

export interface EventRecord {
  target: string;
  step: string;
  event: string;
  timestamp: string;
  elapsed: number;
}

export type PipelineStage = "extract" | "copy" | "insert";

export interface RetryPolicy {
  extractRetries: number;
  copyDataRetries: number;
  insertDataRetries: number;
}

export interface EtlConfig {
  databaseUrl: string;
  settingsFiles: string[];
  tableDesignDir: string;
  sourceName: string;
  sourceWhitelist: string[];
  sourceBlacklist: string[];
  tablePattern: string | null;
  overwriteDesigns: boolean;
  dryRun: boolean;
  monitorPort: number;
  eventLogCapacity: number;
  progressLogIntervalMs: number;
  etlId: string | null;
  logLevel: string;
}
