/**
 * Database and Connection Types
 *
 * Connection settings for the diagnostic session and the raw server
 * state collected through it.
 */

/**
 * Database type identifier (MySQL only)
 */
export type DatabaseType = "mysql";

/**
 * Connection settings after flags, environment and option file are merged
 */
export interface ConnectionConfig {
  /** Database type identifier */
  type: DatabaseType;

  host: string;
  port: number;
  user: string;
  password: string;

  /** Unix socket path; takes precedence over host/port when set */
  socketPath?: string | undefined;

  /** Connection timeout in ms (default: 10000) */
  connectTimeout?: number | undefined;
}

/**
 * One row of SHOW TABLE STATUS, reduced to what the engine statistics need
 */
export interface TableSizeRow {
  engine: string;

  /** Raw data length as reported; may be null or non-numeric */
  dataLength: string | number | null;
}

/**
 * Everything read from the server in one diagnostic run
 */
export interface ServerState {
  /** SHOW GLOBAL VARIABLES */
  variables: Record<string, string>;

  /** SHOW GLOBAL STATUS */
  status: Record<string, string>;

  /** SHOW ENGINES: engine name to its Support column */
  engines: Record<string, string>;

  /** Per-table engine and data length across all user databases */
  tables: TableSizeRow[];
}

/**
 * Query counters kept by the connection pool
 */
export interface PoolStats {
  /** Total queries executed */
  totalQueries: number;

  /** Queries that raised an error */
  failedQueries: number;
}
