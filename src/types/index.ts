/**
 * mysql-advisor - Type Definitions
 *
 * Barrel export for connection, snapshot and report types and the
 * error hierarchy.
 */

// Connection and raw server state
export type {
  DatabaseType,
  ConnectionConfig,
  TableSizeRow,
  ServerState,
  PoolStats,
} from "./modules/database.js";

// Snapshot building blocks
export type {
  Architecture,
  IndexSize,
  HostFacts,
  EngineUsageEntry,
  EngineUsage,
  ServerVersion,
  PerThreadBufferNames,
  Capabilities,
  EngineFlag,
  Switch,
} from "./modules/snapshot.js";

// Findings and report
export type {
  Severity,
  SectionId,
  Finding,
  RecommendationSet,
  Classification,
  ReportOptions,
} from "./modules/report.js";

// Error classes
export {
  AdvisorError,
  AcquisitionError,
  ConnectionError,
  AuthenticationError,
  PoolError,
  QueryError,
  MissingPrerequisiteError,
  HostFactError,
  ValidationError,
} from "./modules/errors.js";
