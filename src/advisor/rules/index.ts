/**
 * mysql-advisor - Rule Registry
 *
 * The fixed, ordered rule list the Classifier evaluates. Order only affects
 * how the report reads.
 */

import type { RuleDefinition } from "./types.js";
import {
  createArchitectureRule,
  createPasswordlessRule,
  createVersionRule,
} from "./general.js";
import { createUnusedEngineRule } from "./engines.js";
import { createMemoryRule, createUptimeRule } from "./memory.js";
import {
  createJoinRule,
  createSlowQueryRule,
  createSortRule,
  createTempTableRule,
} from "./queries.js";
import {
  createAbortedConnectionRule,
  createConnectionUsageRule,
  createThreadCacheRule,
} from "./connections.js";
import {
  createKeyBufferRule,
  createOpenFilesRule,
  createQueryCacheRule,
  createTableCacheRule,
} from "./caches.js";
import { createConcurrentInsertRule, createTableLockRule } from "./tables.js";
import { createInnodbBufferPoolRule } from "./innodb.js";

export type { RuleContext, RuleDefinition, RuleEmitter } from "./types.js";
export { MEMORY_PRESSURE_PCT } from "./memory.js";

export function getAllRules(): RuleDefinition[] {
  return [
    // General statistics
    createPasswordlessRule(),
    createVersionRule(),
    createArchitectureRule(),

    // Storage engines
    createUnusedEngineRule(),

    // Performance metrics
    createUptimeRule(),
    createMemoryRule(),
    createSlowQueryRule(),
    createConnectionUsageRule(),
    createKeyBufferRule(),
    createQueryCacheRule(),
    createSortRule(),
    createJoinRule(),
    createTempTableRule(),
    createThreadCacheRule(),
    createTableCacheRule(),
    createOpenFilesRule(),
    createTableLockRule(),
    createConcurrentInsertRule(),
    createAbortedConnectionRule(),
    createInnodbBufferPoolRule(),
  ];
}
