/**
 * mysql-advisor - Pipeline
 *
 * Snapshot acquisition, derivation, classification and rendering, strictly
 * in that order.
 */

import type { DatabaseAdapter } from "../adapters/DatabaseAdapter.js";
import { MySQLAdapter } from "../adapters/mysql/MySQLAdapter.js";
import { gatherHostFacts, isLocalHost } from "../host/HostFacts.js";
import { buildProfile } from "../report/profile.js";
import type { ServerProfile } from "../report/profile.js";
import { DEFAULT_REPORT_OPTIONS, renderReport } from "../report/Reporter.js";
import type {
  Classification,
  ConnectionConfig,
  ReportOptions,
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import { classify } from "./classify.js";
import { derive } from "./derive.js";
import type { DerivedMetrics } from "./derive.js";
import { Snapshot } from "./Snapshot.js";

export interface AdvisorOptions {
  connection: ConnectionConfig;

  /** Installed memory override in MiB */
  forceMemoryMiB?: number | undefined;

  report?: ReportOptions;
}

export interface Analysis {
  derived: DerivedMetrics;
  classification: Classification;
  profile: ServerProfile;
}

/**
 * Build a Snapshot from a connected adapter and the host it runs on
 */
export async function acquireSnapshot(
  adapter: DatabaseAdapter,
  options: AdvisorOptions,
): Promise<Snapshot> {
  const { connection } = options;
  const state = await adapter.collectServerState();
  const host = await gatherHostFacts({
    datadir: state.variables["datadir"],
    local: isLocalHost(connection.host, connection.socketPath),
    forceMemoryMiB: options.forceMemoryMiB,
  });

  return Snapshot.create({
    state,
    host,
    passwordless: connection.password === "",
  });
}

export function analyze(snapshot: Snapshot): Analysis {
  const derived = derive(snapshot);
  return {
    derived,
    classification: classify(snapshot, derived, snapshot.engineUsage),
    profile: buildProfile(snapshot, derived),
  };
}

/**
 * Run one diagnostic pass and return the rendered report
 */
export async function runAdvisor(
  options: AdvisorOptions,
  adapter: DatabaseAdapter = new MySQLAdapter(),
): Promise<string> {
  await adapter.connect(options.connection);
  try {
    const snapshot = await acquireSnapshot(adapter, options);
    logger.info("Snapshot acquired", {
      version: snapshot.version.raw,
      engines: Array.from(snapshot.engineUsage.keys()),
    });

    const { classification, profile } = analyze(snapshot);
    return renderReport(
      classification,
      profile,
      options.report ?? DEFAULT_REPORT_OPTIONS,
    );
  } finally {
    await adapter.disconnect();
  }
}
