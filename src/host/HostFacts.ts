/**
 * mysql-advisor - Host Facts
 *
 * Physical memory, CPU architecture class and on-disk MyISAM index size of
 * the machine the server runs on. The index size needs read access to the
 * server's data directory; without it the fact is "unavailable".
 */

import * as os from "node:os";
import { readdir, realpath, stat } from "node:fs/promises";
import * as path from "node:path";
import type { Architecture, HostFacts, IndexSize } from "../types/index.js";
import { HostFactError, ValidationError } from "../types/index.js";
import { logger } from "../utils/logger.js";

const MIB = 1024 * 1024;
const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "::1"]);

export interface HostFactOptions {
  /** Server data directory, from the datadir variable */
  datadir: string | undefined;

  /** The server runs on this machine (loopback host or socket) */
  local: boolean;

  /** Installed memory override in MiB */
  forceMemoryMiB?: number | undefined;
}

export function isLocalHost(host: string, socketPath?: string): boolean {
  return socketPath !== undefined || LOCAL_HOSTS.has(host.toLowerCase());
}

export function detectArchitecture(machine: string = os.machine()): Architecture {
  return machine.includes("64") || machine === "s390x" ? 64 : 32;
}

export function physicalMemoryBytes(forceMemoryMiB?: number): number {
  if (forceMemoryMiB === undefined) {
    return os.totalmem();
  }
  if (!Number.isFinite(forceMemoryMiB) || forceMemoryMiB <= 0) {
    throw new ValidationError(`Invalid memory override: ${forceMemoryMiB}`, {
      forcemem: forceMemoryMiB,
    });
  }
  return Math.trunc(forceMemoryMiB * MIB);
}

/**
 * Errors that drop one entry of the walk instead of the whole measurement
 */
const SKIPPABLE_CODES = new Set<unknown>(["ENOENT", "EACCES", "EPERM", "ELOOP", "ENOTDIR"]);

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

/**
 * Total size of every *.MYI file below datadir. Symbolic links are followed;
 * each directory is visited once. Entries below datadir that vanish or cannot
 * be read are skipped; only a failure on datadir itself is an error.
 */
export async function measureMyisamIndexBytes(datadir: string): Promise<number> {
  const visited = new Set<string>();

  const skip = (entry: string, error: unknown): undefined => {
    if (!SKIPPABLE_CODES.has(errorCode(error))) throw error;
    logger.debug("Skipping unreadable data directory entry", {
      path: entry,
      code: errorCode(error),
    });
    return undefined;
  };

  const walkBelow = async (entry: string): Promise<number> =>
    (await walk(entry).catch((error: unknown) => skip(entry, error))) ?? 0;

  async function walk(directory: string): Promise<number> {
    const real = await realpath(directory);
    if (visited.has(real)) return 0;
    visited.add(real);

    let total = 0;
    for (const dirent of await readdir(directory, { withFileTypes: true })) {
      const entry = path.join(directory, dirent.name);
      const isIndex = dirent.name.endsWith(".MYI");

      if (dirent.isDirectory()) {
        total += await walkBelow(entry);
      } else if (dirent.isSymbolicLink() || (dirent.isFile() && isIndex)) {
        const info = await stat(entry).catch((error: unknown) => skip(entry, error));
        if (info === undefined) continue;
        if (info.isDirectory()) {
          total += await walkBelow(entry);
        } else if (info.isFile() && isIndex) {
          total += info.size;
        }
      }
    }
    return total;
  }

  try {
    return await walk(datadir);
  } catch (error) {
    throw new HostFactError(
      `Cannot read data directory ${datadir}`,
      "myisamIndexBytes",
      { cause: error instanceof Error ? error.message : String(error) },
    );
  }
}

async function indexSize(options: HostFactOptions): Promise<IndexSize> {
  if (!options.local) {
    logger.warn("Server is remote; MyISAM index size cannot be measured", {
      hint: "use --forcemem to give the remote host's memory",
    });
    return "unavailable";
  }
  if (options.datadir === undefined || options.datadir === "") {
    return "unavailable";
  }
  try {
    return await measureMyisamIndexBytes(options.datadir);
  } catch (error) {
    if (!(error instanceof HostFactError)) throw error;
    logger.warn(error.message, error.details);
    return "unavailable";
  }
}

export async function gatherHostFacts(
  options: HostFactOptions,
): Promise<HostFacts> {
  return {
    physicalMemoryBytes: physicalMemoryBytes(options.forceMemoryMiB),
    architecture: detectArchitecture(),
    myisamIndexBytes: await indexSize(options),
  };
}
