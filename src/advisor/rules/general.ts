/**
 * General statistics rules: server version, login hygiene, architecture
 */

import type { RuleDefinition } from "./types.js";

const TWO_GIB = 2 * 1024 ** 3;

export function createPasswordlessRule(): RuleDefinition {
  return {
    name: "passwordless_login",
    section: "general",
    evaluate: ({ snapshot }, emit) => {
      if (snapshot.passwordless) {
        emit.warn("Successfully authenticated with no password - SECURITY RISK!");
      }
    },
  };
}

export function createVersionRule(): RuleDefinition {
  return {
    name: "version",
    section: "general",
    evaluate: ({ snapshot }, emit) => {
      const { major, raw } = snapshot.version;
      if (major < 5) {
        emit.warn(`Your MySQL version ${raw} is EOL software!  Upgrade soon!`);
      } else {
        emit.ok(`Currently running supported MySQL version ${raw}`);
      }
    },
  };
}

export function createArchitectureRule(): RuleDefinition {
  return {
    name: "architecture",
    section: "general",
    evaluate: ({ snapshot }, emit) => {
      const { architecture, physicalMemoryBytes } = snapshot.host;
      if (architecture === 64) {
        emit.ok("Operating on 64-bit architecture");
      } else if (physicalMemoryBytes > TWO_GIB) {
        emit.warn("Switch to 64-bit OS - MySQL cannot currently use all of your RAM");
      } else {
        emit.ok("Operating on 32-bit architecture with less than 2GB RAM");
      }
    },
  };
}
