/**
 * Uptime and memory footprint rules
 */

import type { RuleDefinition } from "./types.js";
import { formatBytes } from "../../utils/format.js";

const ONE_DAY_SECONDS = 86400;
const TWO_GIB = 2 * 1024 ** 3;

/**
 * Percentage of installed RAM above which the configured worst case is
 * considered unsafe
 */
export const MEMORY_PRESSURE_PCT = 85;

export function createUptimeRule(): RuleDefinition {
  return {
    name: "uptime",
    section: "performance",
    evaluate: ({ snapshot }, emit) => {
      if (snapshot.requireStatus("Uptime") < ONE_DAY_SECONDS) {
        emit.general(
          "MySQL started within last 24 hours - recommendations may be inaccurate",
        );
      }
    },
  };
}

export function createMemoryRule(): RuleDefinition {
  return {
    name: "memory",
    section: "performance",
    evaluate: ({ snapshot, derived }, emit) => {
      const total = derived.totalPossibleMemoryBytes;
      const pct = derived.pctPhysicalMemory;
      const usage = `Maximum possible memory usage: ${formatBytes(total)} (${pct}% of installed RAM)`;
      const overAddressable =
        snapshot.host.architecture === 32 && total > TWO_GIB;

      if (overAddressable) {
        emit.warn(
          "Allocating > 2GB RAM on 32-bit systems can cause system instability",
        );
      }
      if (overAddressable || pct > MEMORY_PRESSURE_PCT) {
        emit.warn(usage);
      } else {
        emit.ok(usage);
      }
      if (pct > MEMORY_PRESSURE_PCT) {
        emit.general(
          "Reduce your overall MySQL memory footprint for system stability",
        );
      }
    },
  };
}
