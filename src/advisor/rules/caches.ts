/**
 * Cache sizing rules: MyISAM key buffer, query cache, table cache and the
 * open file limit
 */

import type { RuleDefinition } from "./types.js";
import {
  formatBytes,
  formatBytesRounded,
  formatTenth,
} from "../../utils/format.js";

export function createKeyBufferRule(): RuleDefinition {
  return {
    name: "key_buffer",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const indexBytes = snapshot.host.myisamIndexBytes;
      if (indexBytes === "unavailable") {
        emit.warn(
          "Cannot calculate MyISAM index size - re-run with elevated privileges",
        );
        return;
      }
      if (indexBytes === 0) {
        emit.warn("None of your MyISAM tables are indexed - add indexes immediately");
        return;
      }

      const keyBufferSize = snapshot.requireVariable("key_buffer_size");
      const hitRate = derived.pctKeysServedFromMemory;
      const sizing = `Key buffer size / total MyISAM indexes: ${formatBytes(keyBufferSize)}/${formatBytes(indexBytes)}`;
      if (keyBufferSize < indexBytes && hitRate !== undefined && hitRate < 95) {
        emit.warn(sizing);
        emit.adjust(`key_buffer_size (> ${formatBytesRounded(indexBytes)})`);
      } else {
        emit.ok(sizing);
      }

      // No key reads requested yet
      if (hitRate === undefined) return;
      const message = `Key buffer hit rate: ${formatTenth(hitRate)}%`;
      if (hitRate < 95) {
        emit.warn(message);
      } else {
        emit.ok(message);
      }
    },
  };
}

export function createQueryCacheRule(): RuleDefinition {
  return {
    name: "query_cache",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      if (snapshot.version.major < 4) {
        emit.general("Upgrade MySQL to version 4+ to utilize query caching");
        return;
      }
      if (!snapshot.capabilities.queryCache) return;

      const cacheSize = snapshot.variableNumber("query_cache_size") ?? 0;
      if (cacheSize < 1) {
        emit.warn("Query cache is disabled");
        emit.adjust("query_cache_size (>= 8M)");
        return;
      }
      if (snapshot.statusNumber("Com_select") === 0) {
        emit.warn("Query cache cannot be analyzed - no SELECT statements executed");
        return;
      }

      const efficiency = derived.queryCacheEfficiency;
      if (efficiency !== undefined) {
        const message = `Query cache efficiency: ${formatTenth(efficiency)}%`;
        if (efficiency < 20) {
          emit.warn(message);
          emit.adjust("query_cache_limit (> 1M, or use smaller result sets)");
        } else {
          emit.ok(message);
        }
      }

      const prunes = derived.queryCachePrunesPerDay;
      if (prunes !== undefined) {
        const message = `Query cache prunes per day: ${prunes}`;
        if (prunes > 98) {
          emit.warn(message);
          emit.adjust(`query_cache_size (> ${formatBytesRounded(cacheSize)})`);
        } else {
          emit.ok(message);
        }
      }
    },
  };
}

export function createTableCacheRule(): RuleDefinition {
  return {
    name: "table_cache",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const openTables = snapshot.statusNumber("Open_tables");
      const hitRate = derived.tableCacheHitRate;
      if (openTables === undefined || openTables <= 0 || hitRate === undefined) {
        return;
      }

      const message = `Table cache hit rate: ${hitRate}%`;
      if (hitRate >= 20) {
        emit.ok(message);
        return;
      }
      emit.warn(message);
      const variable = snapshot.capabilities.tableCacheVariable;
      const current = snapshot.variable(variable);
      if (current !== undefined) {
        emit.adjust(`${variable} (> ${current})`);
      }
      emit.general(
        `Increase ${variable} gradually to avoid file descriptor limits`,
      );
    },
  };
}

export function createOpenFilesRule(): RuleDefinition {
  return {
    name: "open_files",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const pct = derived.pctOpenFilesUsed;
      if (pct === undefined) return;

      const message = `Open file limit used: ${pct}%`;
      if (pct > 85) {
        emit.warn(message);
        emit.adjust(
          `open_files_limit (> ${snapshot.requireVariable("open_files_limit")})`,
        );
      } else {
        emit.ok(message);
      }
    },
  };
}
