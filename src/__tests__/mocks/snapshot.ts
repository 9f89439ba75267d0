/**
 * mysql-advisor - Snapshot Fixtures
 *
 * A healthy MySQL 5.0 server on a 64-bit host with 8 GiB of RAM. Every
 * rule passes against the baseline; tests override what they exercise.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { Snapshot } from "../../advisor/Snapshot.js";
import type { HostFacts, ServerState } from "../../types/index.js";

const GIB = 1024 ** 3;
const MIB = 1024 ** 2;

const ServerStateSchema = z.object({
  variables: z.record(z.string()),
  status: z.record(z.string()),
  engines: z.record(z.string()),
  tables: z.array(
    z.object({
      engine: z.string(),
      dataLength: z.union([z.string(), z.number(), z.null()]),
    }),
  ),
});

const BASELINE: ServerState = ServerStateSchema.parse(
  JSON.parse(
    readFileSync(
      new URL("../fixtures/server-state.json", import.meta.url),
      "utf8",
    ),
  ),
);

export const BASELINE_HOST: HostFacts = {
  physicalMemoryBytes: 8 * GIB,
  architecture: 64,
  myisamIndexBytes: 128 * MIB,
};

/**
 * Overrides for the baseline; an undefined value removes the key
 */
export interface StateOverrides {
  variables?: Record<string, string | undefined>;
  status?: Record<string, string | undefined>;
  engines?: Record<string, string>;
  tables?: ServerState["tables"];
}

export interface SnapshotOverrides extends StateOverrides {
  host?: Partial<HostFacts>;
  passwordless?: boolean;
}

function merge(
  base: Record<string, string>,
  overrides: Record<string, string | undefined> = {},
): Record<string, string> {
  const result = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete result[key];
    } else {
      result[key] = value;
    }
  }
  return result;
}

export function createServerState(overrides: StateOverrides = {}): ServerState {
  return {
    variables: merge(BASELINE.variables, overrides.variables),
    status: merge(BASELINE.status, overrides.status),
    engines: overrides.engines ?? { ...BASELINE.engines },
    tables: overrides.tables ?? BASELINE.tables.map((row) => ({ ...row })),
  };
}

export function createTestSnapshot(overrides: SnapshotOverrides = {}): Snapshot {
  return Snapshot.create({
    state: createServerState(overrides),
    host: { ...BASELINE_HOST, ...overrides.host },
    passwordless: overrides.passwordless ?? false,
  });
}
