/**
 * Connection handling rules
 */

import type { RuleDefinition } from "./types.js";

export function createConnectionUsageRule(): RuleDefinition {
  return {
    name: "connections",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const pct = derived.pctConnectionsUsed;
      const peak = snapshot.requireStatus("Max_used_connections");
      const max = snapshot.requireVariable("max_connections");

      if (pct <= 85) {
        emit.ok(`Highest usage of available connections: ${pct}% (${peak}/${max})`);
        return;
      }

      emit.warn(`Highest connection usage: ${pct}%  (${peak}/${max})`);
      emit.adjust(`max_connections (> ${max})`);
      for (const timeout of ["wait_timeout", "interactive_timeout"]) {
        const current = snapshot.variable(timeout);
        if (current !== undefined) {
          emit.adjust(`${timeout} (< ${current})`);
        }
      }
      emit.general(
        "Reduce or eliminate persistent connections to reduce connection usage",
      );
    },
  };
}

export function createThreadCacheRule(): RuleDefinition {
  return {
    name: "thread_cache",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const size = snapshot.variableNumber("thread_cache_size");
      if (size === undefined) return;

      if (size === 0) {
        emit.warn("Thread cache is disabled");
        emit.general("Set thread_cache_size to 4 as a starting value");
        emit.adjust("thread_cache_size (start at 4)");
        return;
      }

      const hitRate = derived.threadCacheHitRate;
      if (hitRate === undefined) return;
      const message = `Thread cache hit rate: ${hitRate}%`;
      if (hitRate <= 50) {
        emit.warn(message);
        emit.adjust(`thread_cache_size (> ${size})`);
      } else {
        emit.ok(message);
      }
    },
  };
}

export function createAbortedConnectionRule(): RuleDefinition {
  return {
    name: "aborted_connections",
    section: "performance",
    evaluate: ({ derived }, emit) => {
      const pct = derived.pctAbortedConnections;
      if (pct === undefined) return;

      const message = `Connections aborted: ${pct}%`;
      if (pct > 5) {
        emit.warn(message);
        emit.general("Your applications are not closing MySQL connections properly");
      } else {
        emit.ok(message);
      }
    },
  };
}
