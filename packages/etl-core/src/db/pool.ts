import { Pool } from "pg";

export interface SourcePoolOptions {
  maxConnections?: number;
  applicationName?: string;
}

/**
 * Pool for the upstream source database. Sessions are read-only since the
 * ETL only ever reads the catalog and table data upstream.
 */
export function createPool(databaseUrl: string, options: SourcePoolOptions = {}): Pool {
  return new Pool({
    connectionString: databaseUrl,
    max: options.maxConnections ?? 4,
    idleTimeoutMillis: 30_000,
    application_name: options.applicationName ?? "warehouse-etl",
    options: "-c default_transaction_read_only=on"
  });
}
