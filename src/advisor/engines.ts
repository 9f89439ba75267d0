/**
 * mysql-advisor - Storage Engine Usage
 *
 * Aggregates per-table data sizes into per-engine totals and describes the
 * legacy engine switches the report checks.
 */

import type {
  EngineFlag,
  EngineUsage,
  EngineUsageEntry,
  TableSizeRow,
} from "../types/index.js";

export interface EngineFlagSpec {
  flag: EngineFlag;

  /** have_* variable exposed by older servers */
  variable: string;

  /** Names the engine goes by in SHOW ENGINES */
  aliases: readonly string[];
}

/**
 * Engines listed in the status line, in print order
 */
export const ENGINE_FLAGS: readonly EngineFlagSpec[] = [
  { flag: "Archive", variable: "have_archive", aliases: ["ARCHIVE"] },
  { flag: "BDB", variable: "have_bdb", aliases: ["BerkeleyDB", "BDB"] },
  { flag: "Federated", variable: "have_federated", aliases: ["FEDERATED"] },
  { flag: "InnoDB", variable: "have_innodb", aliases: ["InnoDB"] },
  { flag: "ISAM", variable: "have_isam", aliases: ["ISAM"] },
  {
    flag: "NDBCluster",
    variable: "have_ndbcluster",
    aliases: ["ndbcluster", "NDB"],
  },
];

/**
 * Engines that get a "disable it" recommendation when enabled but holding
 * no tables. Deliberately fixed; newer engines are not checked.
 */
export const UNUSED_ENGINE_CHECKS: readonly {
  flag: EngineFlag;
  skipOption: string;
}[] = [
  { flag: "InnoDB", skipOption: "skip-innodb" },
  { flag: "BDB", skipOption: "skip-bdb" },
  { flag: "ISAM", skipOption: "skip-isam" },
];

const NON_NEGATIVE_INTEGER = /^\d+$/;

/**
 * Data length as a byte count; anything that is not a non-negative integer
 * counts as 0
 */
export function parseDataLength(value: TableSizeRow["dataLength"]): number {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? value : 0;
  }
  if (typeof value === "string" && NON_NEGATIVE_INTEGER.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Total data bytes and table count per engine. Rows without an engine
 * (views) are skipped.
 */
export function aggregateEngineUsage(rows: Iterable<TableSizeRow>): EngineUsage {
  const usage = new Map<string, EngineUsageEntry>();

  for (const row of rows) {
    const engine = row.engine.trim();
    if (engine === "") continue;

    const size = parseDataLength(row.dataLength);
    const current = usage.get(engine);
    usage.set(engine, {
      totalDataBytes: (current?.totalDataBytes ?? 0) + size,
      tableCount: (current?.tableCount ?? 0) + 1,
    });
  }

  for (const [engine, entry] of usage) {
    usage.set(engine, Object.freeze(entry));
  }
  return usage;
}
