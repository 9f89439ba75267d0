import { describe, it, expect } from "vitest";
import { derive } from "../derive.js";
import { MissingPrerequisiteError } from "../../types/index.js";
import { createTestSnapshot } from "../../__tests__/mocks/index.js";

const GIB = 1024 ** 3;

describe("derive", () => {
  describe("baseline server", () => {
    const derived = derive(createTestSnapshot());

    it("should total memory buffers", () => {
      expect(derived.perThreadBufferBytes).toBe(2818048);
      expect(derived.totalPerThreadBufferBytes).toBe(281804800);
      expect(derived.maxTotalPerThreadBufferBytes).toBe(140902400);
      expect(derived.maxTempTableBytes).toBe(16777216);
      expect(derived.serverWideBufferBytes).toBe(1394606080);
      expect(derived.maxPossibleMemoryBytes).toBe(1535508480);
      expect(derived.totalPossibleMemoryBytes).toBe(1676410880);
      expect(derived.pctPhysicalMemory).toBe(19);
    });

    it("should compute truncated ratios", () => {
      expect(derived.pctSlowQueries).toBe(0);
      expect(derived.pctConnectionsUsed).toBe(50);
      expect(derived.pctAbortedConnections).toBe(0);
      expect(derived.pctSortsRequiringTempTable).toBe(1);
      expect(derived.pctTempDiskTables).toBe(10);
      expect(derived.tableCacheHitRate).toBe(50);
      expect(derived.pctOpenFilesUsed).toBe(9);
      expect(derived.pctTableLocksImmediate).toBe(99);
      expect(derived.threadCacheHitRate).toBe(99);
    });

    it("should round one-decimal ratios", () => {
      expect(derived.pctKeyBufferUsed).toBe(61.9);
      expect(derived.pctKeysServedFromMemory).toBe(99.9);
      expect(derived.queryCacheEfficiency).toBe(40);
      expect(derived.pctQueryCacheUsed).toBe(50);
      expect(derived.innodbLogToBufferPoolPct).toBe(25);
    });

    it("should split reads and writes", () => {
      expect(derived.totalReads).toBe(600000);
      expect(derived.totalWrites).toBe(250000);
      expect(derived.pctReads).toBe(70);
      expect(derived.pctWrites).toBe(30);
    });

    it("should scale counters to per-day rates", () => {
      expect(derived.queryCachePrunesPerDay).toBe(0);
      expect(derived.joinsWithoutIndex).toBe(100);
      expect(derived.joinsWithoutIndexPerDay).toBe(10);
    });

    it("should be frozen", () => {
      expect(Object.isFrozen(derived)).toBe(true);
    });
  });

  it("should abort when the server has answered no queries", () => {
    expect(() =>
      derive(createTestSnapshot({ status: { Questions: "0" } })),
    ).toThrow(MissingPrerequisiteError);
    expect(() =>
      derive(createTestSnapshot({ status: { Questions: "0" } })),
    ).toThrow("Your server has not answered any queries - cannot continue");
  });

  it("should abort when a denominator is absent", () => {
    expect(() =>
      derive(createTestSnapshot({ variables: { max_connections: undefined } })),
    ).toThrow("Server variable max_connections is not available");
    expect(() =>
      derive(createTestSnapshot({ status: { Connections: undefined } })),
    ).toThrow("Status counter Connections is not available");
  });

  it("should use legacy buffer names on old servers", () => {
    const derived = derive(
      createTestSnapshot({
        variables: {
          version: "3.23.58",
          read_buffer_size: undefined,
          read_rnd_buffer_size: undefined,
          sort_buffer_size: undefined,
          record_buffer: "1000",
          record_rnd_buffer: "2000",
          sort_buffer: "3000",
          thread_stack: "4000",
          join_buffer_size: "5000",
        },
      }),
    );
    expect(derived.perThreadBufferBytes).toBe(15000);
  });

  it("should default absent engine-specific buffers to 0", () => {
    const derived = derive(
      createTestSnapshot({
        variables: {
          innodb_buffer_pool_size: undefined,
          innodb_additional_mem_pool_size: undefined,
          innodb_log_buffer_size: undefined,
          query_cache_size: undefined,
          have_innodb: "NO",
        },
      }),
    );
    expect(derived.serverWideBufferBytes).toBe(268435456 + 16777216);
    expect(derived.innodbLogToBufferPoolPct).toBeUndefined();
  });

  it("should clamp connection usage to 100", () => {
    const derived = derive(
      createTestSnapshot({ status: { Max_used_connections: "151" } }),
    );
    expect(derived.pctConnectionsUsed).toBe(100);
  });

  it("should report 100% table cache hits when no tables were opened", () => {
    const derived = derive(
      createTestSnapshot({
        status: { Opened_tables: "0", Open_tables: "500" },
      }),
    );
    expect(derived.tableCacheHitRate).toBe(100);
  });

  it("should count all commands as writes when no SELECT ran", () => {
    const derived = derive(createTestSnapshot({ status: { Com_select: "0" } }));
    expect(derived.pctReads).toBe(0);
    expect(derived.pctWrites).toBe(100);
  });

  it("should keep reads and writes summing to 100", () => {
    const derived = derive(
      createTestSnapshot({
        status: {
          Com_select: "1",
          Com_insert: "2",
          Com_update: "0",
          Com_delete: "0",
          Com_replace: "0",
        },
      }),
    );
    expect(derived.pctReads).toBe(33);
    expect(derived.pctWrites).toBe(67);
  });

  it("should leave metrics undefined when their inputs are zero", () => {
    const derived = derive(
      createTestSnapshot({
        status: {
          Key_read_requests: "0",
          Sort_scan: "0",
          Sort_range: "0",
          Created_tmp_tables: "0",
          Open_files: "0",
          Table_locks_immediate: "0",
        },
      }),
    );
    expect(derived.pctKeysServedFromMemory).toBeUndefined();
    expect(derived.totalSorts).toBe(0);
    expect(derived.pctSortsRequiringTempTable).toBeUndefined();
    expect(derived.pctTempDiskTables).toBeUndefined();
    expect(derived.pctTableLocksImmediate).toBeUndefined();
  });

  it("should report 0% open files when none are open", () => {
    const derived = derive(createTestSnapshot({ status: { Open_files: "0" } }));
    expect(derived.pctOpenFilesUsed).toBe(0);
  });

  it("should skip open file usage without a limit", () => {
    const derived = derive(
      createTestSnapshot({ variables: { open_files_limit: "0" } }),
    );
    expect(derived.pctOpenFilesUsed).toBeUndefined();
  });

  it("should report 100% immediate locks when none waited", () => {
    const derived = derive(
      createTestSnapshot({ status: { Table_locks_waited: "0" } }),
    );
    expect(derived.pctTableLocksImmediate).toBe(100);
  });

  it("should leave numerators that the server lacks undefined", () => {
    const derived = derive(
      createTestSnapshot({ status: { Slow_queries: undefined, Key_reads: undefined } }),
    );
    expect(derived.pctSlowQueries).toBeUndefined();
    expect(derived.pctKeysServedFromMemory).toBeUndefined();
  });

  it("should skip query cache metrics where the server has none", () => {
    const derived = derive(createTestSnapshot({ variables: { version: "8.0.36" } }));
    expect(derived.queryCacheEfficiency).toBeUndefined();
    expect(derived.pctQueryCacheUsed).toBeUndefined();
    expect(derived.queryCachePrunesPerDay).toBeUndefined();
  });

  it("should skip key buffer usage before 4.1", () => {
    const derived = derive(createTestSnapshot({ variables: { version: "4.0.27" } }));
    expect(derived.pctKeyBufferUsed).toBeUndefined();
  });

  it("should scale prunes to a daily rate", () => {
    const derived = derive(
      createTestSnapshot({ status: { Qcache_lowmem_prunes: "5000" } }),
    );
    // 5000 prunes over 10 days
    expect(derived.queryCachePrunesPerDay).toBe(500);
  });

  it("should compare worst-case memory with installed RAM", () => {
    const derived = derive(
      createTestSnapshot({ host: { physicalMemoryBytes: GIB } }),
    );
    // 1676410880 * 100 / 1073741824 = 156.1...
    expect(derived.pctPhysicalMemory).toBe(156);
  });

  it("should be deterministic", () => {
    const snapshot = createTestSnapshot();
    expect(derive(snapshot)).toEqual(derive(snapshot));
  });
});
