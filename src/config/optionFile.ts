/**
 * mysql-advisor - MySQL Option File
 *
 * Reads the [client] section of a my.cnf style file for connection
 * credentials.
 */

import { readFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ValidationError } from "../types/index.js";
import { logger } from "../utils/logger.js";

export interface ClientOptions {
  host?: string;
  port?: string;
  user?: string;
  password?: string;
  socket?: string;
}

const CLIENT_KEYS: ReadonlySet<string> = new Set([
  "host",
  "port",
  "user",
  "password",
  "socket",
]);

function isClientKey(key: string): key is keyof ClientOptions {
  return CLIENT_KEYS.has(key);
}

export function defaultOptionFilePath(): string {
  return path.join(os.homedir(), ".my.cnf");
}

function unquote(value: string): string {
  const match = /^(["'])(.*)\1$/.exec(value);
  return match?.[2] ?? value;
}

/**
 * Parse option file text. Later [client] sections and keys win; dashes and
 * underscores in key names are equivalent.
 */
export function parseOptionFile(content: string): ClientOptions {
  const options: ClientOptions = {};
  let inClient = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#") || line.startsWith(";")) continue;

    const section = /^\[([^\]]+)\]$/.exec(line);
    if (section?.[1] !== undefined) {
      inClient = section[1].trim().toLowerCase() === "client";
      continue;
    }
    if (!inClient) continue;

    const separator = line.indexOf("=");
    if (separator === -1) continue;
    const key = line.slice(0, separator).trim().toLowerCase().replace(/_/g, "-");
    const value = unquote(line.slice(separator + 1).trim());
    if (isClientKey(key)) {
      options[key] = value;
    }
  }

  return options;
}

/**
 * Read the [client] options. A missing default file yields no options; a
 * missing file the user named is an error.
 */
export async function readOptionFile(filePath?: string): Promise<ClientOptions> {
  const target = filePath ?? defaultOptionFilePath();
  try {
    const content = await readFile(target, "utf8");
    logger.debug("Loaded option file", { path: target });
    return parseOptionFile(content);
  } catch (error) {
    const code =
      error instanceof Error && "code" in error ? error.code : undefined;
    if (filePath === undefined && code === "ENOENT") {
      return {};
    }
    throw new ValidationError(`Cannot read option file ${target}`, {
      path: target,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
