/**
 * InnoDB buffer pool sizing
 */

import type { RuleDefinition } from "./types.js";
import { formatBytes, formatBytesRounded } from "../../utils/format.js";

export function createInnodbBufferPoolRule(): RuleDefinition {
  return {
    name: "innodb_buffer_pool",
    section: "performance",
    evaluate: ({ snapshot, engineUsage }, emit) => {
      const dataBytes = engineUsage.get("InnoDB")?.totalDataBytes;
      if (!snapshot.engineEnabled("InnoDB") || dataBytes === undefined) return;

      const poolBytes = snapshot.requireVariable("innodb_buffer_pool_size");
      const message = `InnoDB data size / buffer pool: ${formatBytes(dataBytes)}/${formatBytes(poolBytes)}`;
      if (poolBytes > dataBytes) {
        emit.ok(message);
      } else {
        emit.warn(message);
        emit.adjust(`innodb_buffer_pool_size (>= ${formatBytesRounded(dataBytes)})`);
      }
    },
  };
}
