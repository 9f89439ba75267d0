/**
 * mysql-advisor - Derivation Engine
 *
 * Pure computation of the derived metrics the rules classify. A metric that
 * cannot be computed (zero denominator, counter missing on this server,
 * capability absent) is undefined rather than a default number.
 *
 * A denominator that is absent from the snapshot altogether is a
 * MissingPrerequisiteError, as is a server that has answered no queries.
 */

import type { Snapshot } from "./Snapshot.js";
import { MissingPrerequisiteError } from "../types/index.js";
import { roundToTenth } from "../utils/format.js";

const SECONDS_PER_DAY = 86400;

export interface DerivedMetrics {
  // Memory
  perThreadBufferBytes: number;
  totalPerThreadBufferBytes: number;
  maxTotalPerThreadBufferBytes: number;
  maxTempTableBytes: number;
  serverWideBufferBytes: number;
  maxPossibleMemoryBytes: number;
  totalPossibleMemoryBytes: number;
  pctPhysicalMemory: number;

  // Activity
  queriesPerSecond: number | undefined;
  pctSlowQueries: number | undefined;
  pctConnectionsUsed: number;
  pctAbortedConnections: number | undefined;
  totalReads: number | undefined;
  totalWrites: number | undefined;
  pctReads: number | undefined;
  pctWrites: number | undefined;

  // Key cache
  pctKeyBufferUsed: number | undefined;
  pctKeysServedFromMemory: number | undefined;

  // Query cache
  queryCacheEfficiency: number | undefined;
  pctQueryCacheUsed: number | undefined;
  queryCachePrunesPerDay: number | undefined;

  // Sorts, joins, temporary tables
  totalSorts: number | undefined;
  pctSortsRequiringTempTable: number | undefined;
  joinsWithoutIndex: number | undefined;
  joinsWithoutIndexPerDay: number | undefined;
  pctTempDiskTables: number | undefined;

  // Table, file and thread caches
  tableCacheHitRate: number | undefined;
  pctOpenFilesUsed: number | undefined;
  pctTableLocksImmediate: number | undefined;
  threadCacheHitRate: number | undefined;

  // InnoDB
  innodbLogToBufferPoolPct: number | undefined;
}

/**
 * Sum that is unknown as soon as any term is unknown
 */
function sumKnown(...values: (number | undefined)[]): number | undefined {
  let total = 0;
  for (const value of values) {
    if (value === undefined) return undefined;
    total += value;
  }
  return total;
}

function percent(part: number, whole: number): number {
  return Math.trunc((part * 100) / whole);
}

function deriveMemory(snapshot: Snapshot) {
  const names = snapshot.capabilities.perThreadBuffers;
  const perThreadBufferBytes =
    snapshot.requireVariable(names.read) +
    snapshot.requireVariable(names.readRnd) +
    snapshot.requireVariable(names.sort) +
    snapshot.requireVariable(names.threadStack) +
    snapshot.requireVariable(names.join);

  const maxConnections = snapshot.requireVariable("max_connections");
  const maxUsedConnections = snapshot.requireStatus("Max_used_connections");

  const maxTempTableBytes = Math.min(
    snapshot.requireVariable("tmp_table_size"),
    snapshot.requireVariable("max_heap_table_size"),
  );

  // Engine-specific buffers may not exist on this server
  const optional = (name: string): number => snapshot.variableNumber(name) ?? 0;
  const serverWideBufferBytes =
    snapshot.requireVariable("key_buffer_size") +
    maxTempTableBytes +
    optional("innodb_buffer_pool_size") +
    optional("innodb_additional_mem_pool_size") +
    optional("innodb_log_buffer_size") +
    optional("query_cache_size");

  const totalPerThreadBufferBytes = perThreadBufferBytes * maxConnections;
  const maxTotalPerThreadBufferBytes = perThreadBufferBytes * maxUsedConnections;
  const totalPossibleMemoryBytes =
    serverWideBufferBytes + totalPerThreadBufferBytes;

  return {
    perThreadBufferBytes,
    totalPerThreadBufferBytes,
    maxTotalPerThreadBufferBytes,
    maxTempTableBytes,
    serverWideBufferBytes,
    maxPossibleMemoryBytes: serverWideBufferBytes + maxTotalPerThreadBufferBytes,
    totalPossibleMemoryBytes,
    pctPhysicalMemory: percent(
      totalPossibleMemoryBytes,
      snapshot.host.physicalMemoryBytes,
    ),
  };
}

function deriveActivity(snapshot: Snapshot, questions: number, uptime: number) {
  const slowQueries = snapshot.statusNumber("Slow_queries");

  const maxUsedConnections = snapshot.requireStatus("Max_used_connections");
  const maxConnections = snapshot.requireVariable("max_connections");
  const pctConnectionsUsed = Math.min(
    100,
    percent(maxUsedConnections, maxConnections),
  );

  const connections = snapshot.requireStatus("Connections");
  const abortedConnects = snapshot.statusNumber("Aborted_connects");

  const totalReads = snapshot.statusNumber("Com_select");
  const totalWrites = sumKnown(
    snapshot.statusNumber("Com_delete"),
    snapshot.statusNumber("Com_insert"),
    snapshot.statusNumber("Com_update"),
    snapshot.statusNumber("Com_replace"),
  );
  let pctReads: number | undefined;
  if (totalReads !== undefined && totalWrites !== undefined) {
    pctReads =
      totalReads === 0 ? 0 : percent(totalReads, totalReads + totalWrites);
  }

  return {
    queriesPerSecond: uptime > 0 ? questions / uptime : undefined,
    pctSlowQueries:
      slowQueries === undefined ? undefined : percent(slowQueries, questions),
    pctConnectionsUsed,
    pctAbortedConnections:
      connections > 0 && abortedConnects !== undefined
        ? percent(abortedConnects, connections)
        : undefined,
    totalReads,
    totalWrites,
    pctReads,
    pctWrites: pctReads === undefined ? undefined : 100 - pctReads,
  };
}

function deriveKeyCache(snapshot: Snapshot) {
  let pctKeyBufferUsed: number | undefined;
  if (snapshot.capabilities.keyBlocksUnused) {
    const keyBufferSize = snapshot.requireVariable("key_buffer_size");
    const unusedBlocks = snapshot.statusNumber("Key_blocks_unused");
    const blockSize = snapshot.variableNumber("key_cache_block_size");
    if (keyBufferSize > 0 && unusedBlocks !== undefined && blockSize !== undefined) {
      pctKeyBufferUsed = roundToTenth(
        (1 - (unusedBlocks * blockSize) / keyBufferSize) * 100,
      );
    }
  }

  const readRequests = snapshot.requireStatus("Key_read_requests");
  const diskReads = snapshot.statusNumber("Key_reads");
  const pctKeysServedFromMemory =
    readRequests > 0 && diskReads !== undefined
      ? roundToTenth((1 - diskReads / readRequests) * 100)
      : undefined;

  return { pctKeyBufferUsed, pctKeysServedFromMemory };
}

function deriveQueryCache(snapshot: Snapshot, uptime: number) {
  if (!snapshot.capabilities.queryCache) {
    return {
      queryCacheEfficiency: undefined,
      pctQueryCacheUsed: undefined,
      queryCachePrunesPerDay: undefined,
    };
  }

  const hits = snapshot.statusNumber("Qcache_hits");
  const selects = snapshot.statusNumber("Com_select");
  const lookups = sumKnown(selects, hits);
  const queryCacheEfficiency =
    hits !== undefined && lookups !== undefined && lookups > 0
      ? roundToTenth((hits * 100) / lookups)
      : undefined;

  const cacheSize = snapshot.variableNumber("query_cache_size") ?? 0;
  const freeMemory = snapshot.statusNumber("Qcache_free_memory");
  const pctQueryCacheUsed =
    cacheSize > 0 && freeMemory !== undefined
      ? roundToTenth(100 - (freeMemory * 100) / cacheSize)
      : undefined;

  const prunes = snapshot.statusNumber("Qcache_lowmem_prunes");
  let queryCachePrunesPerDay: number | undefined;
  if (prunes === 0) {
    queryCachePrunesPerDay = 0;
  } else if (prunes !== undefined && uptime > 0) {
    queryCachePrunesPerDay = Math.trunc((prunes * SECONDS_PER_DAY) / uptime);
  }

  return { queryCacheEfficiency, pctQueryCacheUsed, queryCachePrunesPerDay };
}

function deriveWorkload(snapshot: Snapshot, uptime: number) {
  const totalSorts = sumKnown(
    snapshot.requireStatus("Sort_scan"),
    snapshot.requireStatus("Sort_range"),
  );
  const mergePasses = snapshot.statusNumber("Sort_merge_passes");
  const pctSortsRequiringTempTable =
    totalSorts !== undefined && totalSorts > 0 && mergePasses !== undefined
      ? percent(mergePasses, totalSorts)
      : undefined;

  const joinsWithoutIndex = sumKnown(
    snapshot.statusNumber("Select_range_check"),
    snapshot.statusNumber("Select_full_join"),
  );
  const joinsWithoutIndexPerDay =
    joinsWithoutIndex !== undefined && uptime > 0
      ? Math.trunc((joinsWithoutIndex * SECONDS_PER_DAY) / uptime)
      : undefined;

  const tempTables = snapshot.requireStatus("Created_tmp_tables");
  const diskTempTables = snapshot.statusNumber("Created_tmp_disk_tables");
  const pctTempDiskTables =
    tempTables > 0 && diskTempTables !== undefined
      ? percent(diskTempTables, tempTables)
      : undefined;

  return {
    totalSorts,
    pctSortsRequiringTempTable,
    joinsWithoutIndex,
    joinsWithoutIndexPerDay,
    pctTempDiskTables,
  };
}

function deriveCaches(snapshot: Snapshot) {
  const openedTables = snapshot.requireStatus("Opened_tables");
  const openTables = snapshot.statusNumber("Open_tables");
  let tableCacheHitRate: number | undefined;
  if (openedTables === 0) {
    tableCacheHitRate = 100;
  } else if (openTables !== undefined) {
    tableCacheHitRate = percent(openTables, openedTables);
  }

  const openFilesLimit = snapshot.requireVariable("open_files_limit");
  const openFiles = snapshot.statusNumber("Open_files");
  const pctOpenFilesUsed =
    openFiles !== undefined && openFilesLimit > 0
      ? percent(openFiles, openFilesLimit)
      : undefined;

  const locksImmediate = snapshot.statusNumber("Table_locks_immediate");
  const locksWaited = snapshot.statusNumber("Table_locks_waited");
  let pctTableLocksImmediate: number | undefined;
  if (locksImmediate !== undefined && locksImmediate > 0) {
    pctTableLocksImmediate =
      locksWaited === undefined || locksWaited === 0
        ? 100
        : percent(locksImmediate, locksImmediate + locksWaited);
  }

  const connections = snapshot.requireStatus("Connections");
  const threadsCreated = snapshot.statusNumber("Threads_created");
  const threadCacheHitRate =
    connections > 0 && threadsCreated !== undefined
      ? Math.trunc(100 - (threadsCreated * 100) / connections)
      : undefined;

  return {
    tableCacheHitRate,
    pctOpenFilesUsed,
    pctTableLocksImmediate,
    threadCacheHitRate,
  };
}

function deriveInnodb(snapshot: Snapshot) {
  if (!snapshot.engineEnabled("InnoDB")) {
    return { innodbLogToBufferPoolPct: undefined };
  }
  const bufferPoolSize = snapshot.requireVariable("innodb_buffer_pool_size");
  const logFileSize = snapshot.variableNumber("innodb_log_file_size");
  return {
    innodbLogToBufferPoolPct:
      logFileSize !== undefined && bufferPoolSize > 0
        ? roundToTenth((logFileSize * 100) / bufferPoolSize)
        : undefined,
  };
}

/**
 * Compute every derived metric from one snapshot. Deterministic and free of
 * side effects.
 */
export function derive(snapshot: Snapshot): DerivedMetrics {
  const questions = snapshot.requireStatus("Questions");
  if (questions < 1) {
    throw new MissingPrerequisiteError(
      "Your server has not answered any queries - cannot continue",
      "Questions",
    );
  }
  const uptime = snapshot.requireStatus("Uptime");

  return Object.freeze({
    ...deriveMemory(snapshot),
    ...deriveActivity(snapshot, questions, uptime),
    ...deriveKeyCache(snapshot),
    ...deriveQueryCache(snapshot, uptime),
    ...deriveWorkload(snapshot, uptime),
    ...deriveCaches(snapshot),
    ...deriveInnodb(snapshot),
  });
}
