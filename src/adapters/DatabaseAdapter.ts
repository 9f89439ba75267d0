/**
 * mysql-advisor - Database Adapter Interface
 *
 * Abstract base class for the server-state sources a diagnostic run reads
 * from. Subclasses provide the individual SHOW queries; the base assembles
 * them into one ServerState.
 */

import { logger } from "../utils/logger.js";
import type {
  ConnectionConfig,
  DatabaseType,
  ServerState,
  TableSizeRow,
} from "../types/index.js";

/**
 * Schemas that hold server metadata rather than user tables
 */
const SYSTEM_SCHEMAS = new Set(["information_schema", "performance_schema"]);

/**
 * Abstract base class for database adapters
 */
export abstract class DatabaseAdapter {
  /** Database type identifier */
  abstract readonly type: DatabaseType;

  /** Human-readable adapter name */
  abstract readonly name: string;

  /** Connection state */
  protected connected = false;

  // =========================================================================
  // Connection Lifecycle
  // =========================================================================

  abstract connect(config: ConnectionConfig): Promise<void>;

  abstract disconnect(): Promise<void>;

  isConnected(): boolean {
    return this.connected;
  }

  // =========================================================================
  // Server State
  // =========================================================================

  /**
   * Global configuration variables, name to raw value
   */
  abstract getVariables(): Promise<Record<string, string>>;

  /**
   * Global status counters, name to raw value
   */
  abstract getStatus(): Promise<Record<string, string>>;

  /**
   * Storage engines and their support level. Empty when the server cannot
   * list them.
   */
  abstract getEngines(): Promise<Record<string, string>>;

  abstract listDatabases(): Promise<string[]>;

  /**
   * Engine and data length of every table in a database
   */
  abstract getTableStatus(database: string): Promise<TableSizeRow[]>;

  /**
   * Read everything a diagnostic run needs, sequentially
   */
  async collectServerState(): Promise<ServerState> {
    const variables = await this.getVariables();
    const status = await this.getStatus();
    const engines = await this.getEngines();

    const tables: TableSizeRow[] = [];
    const databases = (await this.listDatabases()).filter(
      (database) => !SYSTEM_SCHEMAS.has(database.toLowerCase()),
    );
    for (const database of databases) {
      tables.push(...(await this.getTableStatus(database)));
    }

    logger.debug("Collected server state", {
      variables: Object.keys(variables).length,
      status: Object.keys(status).length,
      databases: databases.length,
      tables: tables.length,
    });

    return { variables, status, engines, tables };
  }
}
