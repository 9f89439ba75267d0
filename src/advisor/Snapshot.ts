/**
 * mysql-advisor - Snapshot
 *
 * One immutable capture of server variables, status counters, storage
 * engine usage and host facts, with typed accessors over the raw strings.
 * Absent keys stay absent: accessors return undefined, and the require*
 * variants raise MissingPrerequisiteError.
 */

import type {
  Capabilities,
  EngineFlag,
  EngineUsage,
  HostFacts,
  ServerState,
  ServerVersion,
  Switch,
} from "../types/index.js";
import { MissingPrerequisiteError } from "../types/index.js";
import { parseServerVersion, resolveCapabilities } from "./capabilities.js";
import { aggregateEngineUsage, ENGINE_FLAGS } from "./engines.js";

export interface SnapshotInput {
  state: ServerState;
  host: HostFacts;

  /** The session authenticated with an empty password */
  passwordless: boolean;
}

const SWITCH_VALUES: Record<string, Switch> = {
  ON: "on",
  YES: "on",
  TRUE: "on",
  "1": "on",
  OFF: "off",
  NO: "off",
  FALSE: "off",
  "0": "off",
  DISABLED: "off",
};

const ENGINE_SUPPORTED = new Set(["YES", "DEFAULT"]);

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (trimmed === "") return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function toMap(record: Record<string, string>): ReadonlyMap<string, string> {
  return new Map(Object.entries(record));
}

export class Snapshot {
  readonly version: ServerVersion;
  readonly capabilities: Capabilities;
  readonly host: Readonly<HostFacts>;
  readonly engineUsage: EngineUsage;
  readonly passwordless: boolean;

  private readonly variables: ReadonlyMap<string, string>;
  private readonly status: ReadonlyMap<string, string>;
  private readonly engineSupport: ReadonlyMap<string, string>;

  private constructor(input: SnapshotInput) {
    this.variables = toMap(input.state.variables);
    this.status = toMap(input.state.status);
    this.engineSupport = new Map(
      Object.entries(input.state.engines).map(([name, support]) => [
        name.toLowerCase(),
        support.toUpperCase(),
      ]),
    );
    this.version = Object.freeze(parseServerVersion(this.variables.get("version")));
    this.capabilities = resolveCapabilities(this.version);
    this.host = Object.freeze({ ...input.host });
    this.engineUsage = aggregateEngineUsage(input.state.tables);
    this.passwordless = input.passwordless;
    Object.freeze(this);
  }

  /**
   * Build a Snapshot. Fails with MissingPrerequisiteError when the server
   * version cannot be determined.
   */
  static create(input: SnapshotInput): Snapshot {
    return new Snapshot(input);
  }

  variable(name: string): string | undefined {
    return this.variables.get(name);
  }

  variableNumber(name: string): number | undefined {
    return parseNumber(this.variables.get(name));
  }

  requireVariable(name: string): number {
    const value = this.variableNumber(name);
    if (value === undefined) {
      throw new MissingPrerequisiteError(
        `Server variable ${name} is not available`,
        name,
      );
    }
    return value;
  }

  /**
   * ON/OFF style variable; undefined when absent or not a recognised switch
   */
  variableSwitch(name: string): Switch | undefined {
    const raw = this.variables.get(name);
    return raw === undefined ? undefined : SWITCH_VALUES[raw.trim().toUpperCase()];
  }

  statusNumber(name: string): number | undefined {
    return parseNumber(this.status.get(name));
  }

  requireStatus(name: string): number {
    const value = this.statusNumber(name);
    if (value === undefined) {
      throw new MissingPrerequisiteError(
        `Status counter ${name} is not available`,
        name,
      );
    }
    return value;
  }

  /**
   * Whether a storage engine is compiled in and enabled. The have_* variable
   * wins; servers that dropped it are answered from SHOW ENGINES.
   */
  engineEnabled(flag: EngineFlag): boolean {
    const spec = ENGINE_FLAGS.find((candidate) => candidate.flag === flag);
    if (!spec) return false;

    const declared = this.variables.get(spec.variable);
    if (declared !== undefined) {
      return declared.trim().toUpperCase() === "YES";
    }

    return spec.aliases.some((alias) => {
      const support = this.engineSupport.get(alias.toLowerCase());
      return support !== undefined && ENGINE_SUPPORTED.has(support);
    });
  }
}
