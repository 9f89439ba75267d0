/**
 * mysql-advisor - Server Profile
 *
 * Descriptive facts for the INFO lines of the report. Nothing here is judged;
 * the values come straight from the Snapshot and DerivedMetrics.
 */

import type { Snapshot } from "../advisor/Snapshot.js";
import type { DerivedMetrics } from "../advisor/derive.js";
import { ENGINE_FLAGS } from "../advisor/engines.js";
import type { EngineFlag, EngineUsageEntry } from "../types/index.js";

export interface EngineStatus {
  flag: EngineFlag;
  enabled: boolean;
}

export interface EngineData extends EngineUsageEntry {
  engine: string;
}

export interface ServerProfile {
  engineStatus: readonly EngineStatus[];
  engineData: readonly EngineData[];

  uptimeSeconds: number;
  questions: number;
  queriesPerSecond: number | undefined;
  connections: number;
  bytesSent: number;
  bytesReceived: number;
  pctReads: number | undefined;
  pctWrites: number | undefined;

  perThreadBufferBytes: number;
  serverWideBufferBytes: number;
  pctPhysicalMemory: number;
  pctKeyBufferUsed: number | undefined;
  pctQueryCacheUsed: number | undefined;
  innodbLogToBufferPoolPct: number | undefined;
}

export function buildProfile(
  snapshot: Snapshot,
  derived: DerivedMetrics,
): ServerProfile {
  return Object.freeze({
    engineStatus: ENGINE_FLAGS.map(({ flag }) => ({
      flag,
      enabled: snapshot.engineEnabled(flag),
    })),
    engineData: Array.from(snapshot.engineUsage, ([engine, usage]) => ({
      engine,
      ...usage,
    })),

    uptimeSeconds: snapshot.requireStatus("Uptime"),
    questions: snapshot.requireStatus("Questions"),
    queriesPerSecond: derived.queriesPerSecond,
    connections: snapshot.requireStatus("Connections"),
    bytesSent: snapshot.statusNumber("Bytes_sent") ?? 0,
    bytesReceived: snapshot.statusNumber("Bytes_received") ?? 0,
    pctReads: derived.pctReads,
    pctWrites: derived.pctWrites,

    perThreadBufferBytes: derived.perThreadBufferBytes,
    serverWideBufferBytes: derived.serverWideBufferBytes,
    pctPhysicalMemory: derived.pctPhysicalMemory,
    pctKeyBufferUsed: derived.pctKeyBufferUsed,
    pctQueryCacheUsed: derived.pctQueryCacheUsed,
    innodbLogToBufferPoolPct: derived.innodbLogToBufferPoolPct,
  });
}
