/**
 * Storage engine rules
 */

import type { RuleDefinition } from "./types.js";
import { UNUSED_ENGINE_CHECKS } from "../engines.js";

/**
 * Legacy engines that are compiled in but hold no tables
 */
export function createUnusedEngineRule(): RuleDefinition {
  return {
    name: "unused_engine",
    section: "engines",
    evaluate: ({ snapshot, engineUsage }, emit) => {
      for (const { flag, skipOption } of UNUSED_ENGINE_CHECKS) {
        if (!snapshot.engineEnabled(flag) || engineUsage.has(flag)) continue;
        emit.warn(`${flag} is enabled but isn't being used`);
        emit.general(`Add ${skipOption} to MySQL configuration to disable ${flag}`);
      }
    },
  };
}
