/**
 * mysql-advisor - Public API
 *
 * Exports the pipeline stages and collaborators for programmatic use.
 */

// Pipeline
export {
  acquireSnapshot,
  analyze,
  runAdvisor,
} from "./advisor/Advisor.js";
export type { AdvisorOptions, Analysis } from "./advisor/Advisor.js";
export { Snapshot } from "./advisor/Snapshot.js";
export type { SnapshotInput } from "./advisor/Snapshot.js";
export { derive } from "./advisor/derive.js";
export type { DerivedMetrics } from "./advisor/derive.js";
export { classify } from "./advisor/classify.js";
export { getAllRules } from "./advisor/rules/index.js";
export type {
  RuleContext,
  RuleDefinition,
  RuleEmitter,
} from "./advisor/rules/index.js";
export { aggregateEngineUsage } from "./advisor/engines.js";
export {
  CAPABILITY_RANGES,
  parseServerVersion,
  resolveCapabilities,
} from "./advisor/capabilities.js";

// Report
export { renderReport, DEFAULT_REPORT_OPTIONS } from "./report/Reporter.js";
export { buildProfile } from "./report/profile.js";
export type { ServerProfile } from "./report/profile.js";

// Adapters
export { DatabaseAdapter } from "./adapters/DatabaseAdapter.js";
export { MySQLAdapter } from "./adapters/mysql/MySQLAdapter.js";

// Pool
export { ConnectionPool } from "./pool/ConnectionPool.js";

// Host facts and configuration
export { gatherHostFacts } from "./host/HostFacts.js";
export type { HostFactOptions } from "./host/HostFacts.js";
export {
  resolveConnection,
  parseMySQLConnectionString,
} from "./config/connection.js";
export type { ConnectionOverrides } from "./config/connection.js";
export { readOptionFile, parseOptionFile } from "./config/optionFile.js";
export { DEFAULT_CONFIG } from "./config/defaults.js";

// Types
export type {
  DatabaseType,
  ConnectionConfig,
  TableSizeRow,
  ServerState,
  PoolStats,
  Architecture,
  IndexSize,
  HostFacts,
  EngineUsageEntry,
  EngineUsage,
  ServerVersion,
  Capabilities,
  EngineFlag,
  Severity,
  SectionId,
  Finding,
  RecommendationSet,
  Classification,
  ReportOptions,
} from "./types/index.js";

// Errors
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
} from "./types/index.js";

// Logger
export { logger } from "./utils/logger.js";
