/**
 * Query workload rules: slow queries, sorts, joins and temporary tables
 */

import type { RuleDefinition } from "./types.js";
import {
  formatBytes,
  formatBytesRounded,
  formatCount,
} from "../../utils/format.js";

const LARGE_TEMP_TABLE_BYTES = 256 * 1024 * 1024;

export function createSlowQueryRule(): RuleDefinition {
  return {
    name: "slow_queries",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const pct = derived.pctSlowQueries;
      const slow = snapshot.statusNumber("Slow_queries");
      if (pct !== undefined && slow !== undefined) {
        const questions = snapshot.requireStatus("Questions");
        const message = `Slow queries: ${pct}% (${formatCount(slow)}/${formatCount(questions)})`;
        if (pct > 5) {
          emit.warn(message);
        } else {
          emit.ok(message);
        }
      }

      const longQueryTime = snapshot.variableNumber("long_query_time");
      if (longQueryTime !== undefined && longQueryTime > 10) {
        emit.adjust("long_query_time (<= 10)");
      }
      const slowLog = snapshot.capabilities.slowQueryLogVariable;
      if (snapshot.variableSwitch(slowLog) === "off") {
        emit.general("Enable the slow query log to troubleshoot bad queries");
      }
    },
  };
}

/**
 * Quiet when no sorts have run
 */
export function createSortRule(): RuleDefinition {
  return {
    name: "sorts",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const pct = derived.pctSortsRequiringTempTable;
      if (pct === undefined) return;

      const message = `Sorts requiring temporary tables: ${pct}%`;
      if (pct <= 10) {
        emit.ok(message);
        return;
      }
      emit.warn(message);
      const { sort, readRnd } = snapshot.capabilities.perThreadBuffers;
      emit.adjust(
        `${sort} (> ${formatBytesRounded(snapshot.requireVariable(sort))})`,
      );
      emit.adjust(
        `${readRnd} (> ${formatBytesRounded(snapshot.requireVariable(readRnd))})`,
      );
    },
  };
}

/**
 * Quiet unless indexless joins are frequent
 */
export function createJoinRule(): RuleDefinition {
  return {
    name: "joins",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const perDay = derived.joinsWithoutIndexPerDay;
      const total = derived.joinsWithoutIndex;
      if (perDay === undefined || total === undefined || perDay <= 250) return;

      const joinBuffer = snapshot.capabilities.perThreadBuffers.join;
      emit.warn(`Joins performed without indexes: ${total}`);
      emit.adjust(
        `${joinBuffer} (> ${formatBytes(snapshot.requireVariable(joinBuffer))}, or always use indexes with joins)`,
      );
      emit.general("Adjust your join queries to always utilize indexes");
    },
  };
}

/**
 * Quiet when no temporary tables were created
 */
export function createTempTableRule(): RuleDefinition {
  return {
    name: "temp_tables",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const pct = derived.pctTempDiskTables;
      if (pct === undefined) return;

      const message = `Temporary tables created on disk: ${pct}%`;
      if (pct <= 25) {
        emit.ok(message);
        return;
      }
      emit.warn(message);
      if (derived.maxTempTableBytes < LARGE_TEMP_TABLE_BYTES) {
        for (const name of ["tmp_table_size", "max_heap_table_size"]) {
          emit.adjust(
            `${name} (> ${formatBytesRounded(snapshot.requireVariable(name))})`,
          );
        }
        emit.general("Be sure that tmp_table_size/max_heap_table_size are equal");
      } else {
        emit.general(
          "Temporary table size is already large - reduce result set size",
        );
      }
      emit.general("Reduce your SELECT DISTINCT queries without LIMIT clauses");
    },
  };
}
