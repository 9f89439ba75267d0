/**
 * mysql-advisor - Version Capability Table
 *
 * Which variables exist and which metrics apply depends on the server
 * release. Each capability is keyed by a semver range and resolved once,
 * when the Snapshot is built.
 */

import semver from "semver";
import type {
  Capabilities,
  PerThreadBufferNames,
  ServerVersion,
} from "../types/index.js";
import { MissingPrerequisiteError } from "../types/index.js";

export const CAPABILITY_RANGES = {
  modernBufferNames: ">=4.0.0",
  keyBlocksUnused: ">=4.1.0",
  queryCache: ">=4.0.0 <8.0.0",
  concurrentInsert: ">=4.1.0",
  tableOpenCache: ">=5.1.0",
  slowQueryLog: ">=5.1.0",
} as const;

const MODERN_BUFFER_NAMES: PerThreadBufferNames = Object.freeze({
  read: "read_buffer_size",
  readRnd: "read_rnd_buffer_size",
  sort: "sort_buffer_size",
  threadStack: "thread_stack",
  join: "join_buffer_size",
});

const LEGACY_BUFFER_NAMES: PerThreadBufferNames = Object.freeze({
  read: "record_buffer",
  readRnd: "record_rnd_buffer",
  sort: "sort_buffer",
  threadStack: "thread_stack",
  join: "join_buffer_size",
});

const VERSION_PATTERN = /(\d+)\.(\d+)(?:\.(\d+))?/;

/**
 * Parse the server's version variable, e.g. "5.0.45-community-log"
 */
export function parseServerVersion(raw: string | undefined): ServerVersion {
  const match = raw === undefined ? null : VERSION_PATTERN.exec(raw);
  if (!raw || !match) {
    throw new MissingPrerequisiteError(
      `Cannot determine server version from '${raw ?? ""}'`,
      "version",
    );
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: match[3] === undefined ? 0 : Number(match[3]),
    raw,
  };
}

function satisfies(version: ServerVersion, range: string): boolean {
  const comparable = `${version.major}.${version.minor}.${version.patch}`;
  return semver.satisfies(comparable, range);
}

export function resolveCapabilities(version: ServerVersion): Capabilities {
  return Object.freeze({
    perThreadBuffers: satisfies(version, CAPABILITY_RANGES.modernBufferNames)
      ? MODERN_BUFFER_NAMES
      : LEGACY_BUFFER_NAMES,
    keyBlocksUnused: satisfies(version, CAPABILITY_RANGES.keyBlocksUnused),
    queryCache: satisfies(version, CAPABILITY_RANGES.queryCache),
    concurrentInsert: satisfies(version, CAPABILITY_RANGES.concurrentInsert),
    tableCacheVariable: satisfies(version, CAPABILITY_RANGES.tableOpenCache)
      ? "table_open_cache"
      : "table_cache",
    slowQueryLogVariable: satisfies(version, CAPABILITY_RANGES.slowQueryLog)
      ? "slow_query_log"
      : "log_slow_queries",
  });
}
