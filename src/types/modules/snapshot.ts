/**
 * Snapshot Types
 *
 * Host facts, storage engine usage and the parsed server version that
 * together with raw variables/status make up one immutable Snapshot.
 */

/**
 * CPU architecture class of the database host
 */
export type Architecture = 32 | 64;

/**
 * Total on-disk MyISAM index size, or "unavailable" when it could not be
 * measured (insufficient privilege, remote server, unknown datadir)
 */
export type IndexSize = number | "unavailable";

export interface HostFacts {
  physicalMemoryBytes: number;
  architecture: Architecture;
  myisamIndexBytes: IndexSize;
}

export interface EngineUsageEntry {
  totalDataBytes: number;
  tableCount: number;
}

/**
 * Storage engine name (as reported by the server) to its usage.
 * Iteration order is the order engines were first seen.
 */
export type EngineUsage = ReadonlyMap<string, EngineUsageEntry>;

export interface ServerVersion {
  major: number;
  minor: number;
  patch: number;

  /** The version string as the server reported it */
  raw: string;
}

/**
 * Variable names for the five per-connection buffers
 */
export interface PerThreadBufferNames {
  read: string;
  readRnd: string;
  sort: string;
  threadStack: string;
  join: string;
}

/**
 * Version-dependent behaviour, resolved once per Snapshot
 */
export interface Capabilities {
  perThreadBuffers: PerThreadBufferNames;
  keyBlocksUnused: boolean;
  queryCache: boolean;
  concurrentInsert: boolean;
  tableCacheVariable: "table_open_cache" | "table_cache";
  slowQueryLogVariable: "slow_query_log" | "log_slow_queries";
}

/**
 * Legacy storage engines reported in the engine status line
 */
export type EngineFlag =
  | "Archive"
  | "BDB"
  | "Federated"
  | "InnoDB"
  | "ISAM"
  | "NDBCluster";

/**
 * Tri-state for ON/OFF style variables
 */
export type Switch = "on" | "off";
