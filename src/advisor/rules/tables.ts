/**
 * Table locking and concurrent insert rules
 */

import type { RuleDefinition } from "./types.js";

/**
 * concurrent_insert values that disable it, and the value to use instead
 */
const CONCURRENT_INSERT_FIXES: Record<string, string> = {
  OFF: "'ON'",
  "0": "1",
  NEVER: "'AUTO'",
};

export function createTableLockRule(): RuleDefinition {
  return {
    name: "table_locks",
    section: "performance",
    evaluate: ({ derived }, emit) => {
      const pct = derived.pctTableLocksImmediate;
      if (pct === undefined) return;

      const message = `Table locks acquired immediately: ${pct}%`;
      if (pct < 95) {
        emit.warn(message);
        emit.general("Optimize queries and/or use InnoDB to reduce lock wait");
      } else {
        emit.ok(message);
      }
    },
  };
}

export function createConcurrentInsertRule(): RuleDefinition {
  return {
    name: "concurrent_insert",
    section: "performance",
    evaluate: ({ snapshot }, emit) => {
      if (!snapshot.capabilities.concurrentInsert) {
        emit.general("Upgrade to MySQL 4.1+ to use concurrent MyISAM inserts");
        return;
      }
      const current = snapshot.variable("concurrent_insert")?.trim().toUpperCase();
      const fix = current === undefined ? undefined : CONCURRENT_INSERT_FIXES[current];
      if (fix !== undefined) {
        emit.general(`Enable concurrent_insert by setting it to ${fix}`);
      }
    },
  };
}
