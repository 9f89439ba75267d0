/**
 * mysql-advisor - Reporter
 *
 * Renders the profile, classified findings and recommendations as the
 * plain-text report. Filters hide findings and INFO lines only; the
 * recommendations section is always complete.
 */

import { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type {
  Classification,
  Finding,
  ReportOptions,
  SectionId,
  Severity,
} from "../types/index.js";
import type { ServerProfile } from "./profile.js";
import { MEMORY_PRESSURE_PCT } from "../advisor/rules/index.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import {
  formatBytes,
  formatBytesRounded,
  formatCount,
  formatRate,
  formatTenth,
  formatUptime,
} from "../utils/format.js";

const RULE_WIDTH = 78;

const SECTION_TITLES: Record<SectionId, string> = {
  general: "General Statistics",
  engines: "Storage Engine Statistics",
  performance: "Performance Metrics",
};

const SECTION_ORDER: readonly SectionId[] = ["general", "engines", "performance"];

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  hideOk: false,
  hideWarn: false,
  hideInfo: false,
  color: true,
};

export function sectionHeader(title: string): string {
  return `-------- ${title} `.padEnd(RULE_WIDTH, "-");
}

function tag(chalk: ChalkInstance, severity: Severity): string {
  switch (severity) {
    case "OK":
      return `[${chalk.green("OK")}]`;
    case "WARN":
      return `[${chalk.red("!!")}]`;
    case "INFO":
      return `[${chalk.blue("--")}]`;
  }
}

function isVisible(severity: Severity, options: ReportOptions): boolean {
  switch (severity) {
    case "OK":
      return !options.hideOk;
    case "WARN":
      return !options.hideWarn;
    case "INFO":
      return !options.hideInfo;
  }
}

function infoLines(
  section: SectionId,
  profile: ServerProfile,
  chalk: ChalkInstance,
): string[] {
  switch (section) {
    case "general":
      return [];

    case "engines": {
      const status = profile.engineStatus
        .map(({ flag, enabled }) =>
          enabled ? chalk.green(`+${flag}`) : chalk.red(`-${flag}`),
        )
        .join(" ");
      return [
        `Status: ${status}`,
        ...profile.engineData.map(
          ({ engine, totalDataBytes, tableCount }) =>
            `Data in ${engine} tables: ${formatBytesRounded(totalDataBytes)} (Tables: ${tableCount})`,
        ),
      ];
    }

    case "performance": {
      const qps =
        profile.queriesPerSecond === undefined
          ? "n/a"
          : formatRate(profile.queriesPerSecond);
      const lines = [
        `Up for: ${formatUptime(profile.uptimeSeconds)} (${formatCount(profile.questions)} q [${qps} qps], ` +
          `${formatCount(profile.connections)} conn, TX: ${formatCount(profile.bytesSent)}, RX: ${formatCount(profile.bytesReceived)})`,
      ];
      if (profile.pctReads !== undefined && profile.pctWrites !== undefined) {
        lines.push(`Reads / Writes: ${profile.pctReads}% / ${profile.pctWrites}%`);
      }
      lines.push(
        `Total buffers: ${formatBytes(profile.perThreadBufferBytes)} per thread and ${formatBytes(profile.serverWideBufferBytes)} global`,
      );
      if (profile.pctKeyBufferUsed !== undefined) {
        lines.push(`Key buffer used: ${formatTenth(profile.pctKeyBufferUsed)}%`);
      }
      if (profile.pctQueryCacheUsed !== undefined) {
        lines.push(`Query cache used: ${formatTenth(profile.pctQueryCacheUsed)}%`);
      }
      if (profile.innodbLogToBufferPoolPct !== undefined) {
        lines.push(
          `InnoDB log file size / buffer pool: ${formatTenth(profile.innodbLogToBufferPoolPct)}%`,
        );
      }
      return lines;
    }
  }
}

function renderRecommendations(
  classification: Classification,
  profile: ServerProfile,
): string[] {
  const { generalRecommendations, variableAdjustments } =
    classification.recommendations;
  const lines = [sectionHeader("Recommendations")];

  if (generalRecommendations.length > 0) {
    lines.push("General recommendations:");
    for (const recommendation of generalRecommendations) {
      lines.push(`    ${recommendation}`);
    }
  }
  if (variableAdjustments.length > 0) {
    lines.push("Variables to adjust:");
    if (profile.pctPhysicalMemory > MEMORY_PRESSURE_PCT) {
      lines.push(
        "  *** MySQL's maximum memory usage exceeds your installed memory ***",
        "  *** Add more RAM before increasing any MySQL buffer variables  ***",
      );
    }
    for (const adjustment of variableAdjustments) {
      lines.push(`    ${adjustment}`);
    }
  }
  if (generalRecommendations.length === 0 && variableAdjustments.length === 0) {
    lines.push("No additional performance recommendations are available.");
  }
  return lines;
}

/**
 * Render the full report. The result ends with a newline.
 */
export function renderReport(
  classification: Classification,
  profile: ServerProfile,
  options: ReportOptions = DEFAULT_REPORT_OPTIONS,
): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const line = (severity: Severity, message: string): string =>
    `${tag(chalk, severity)} ${message}`;

  const lines = [
    "",
    ` >>  ${DEFAULT_CONFIG.name} ${DEFAULT_CONFIG.version}`,
    " >>  Run with '--help' for additional options and output filtering",
  ];

  for (const section of SECTION_ORDER) {
    lines.push("", sectionHeader(SECTION_TITLES[section]));

    if (isVisible("INFO", options)) {
      for (const info of infoLines(section, profile, chalk)) {
        lines.push(line("INFO", info));
      }
    }

    const findings = classification.findings.filter(
      (finding: Finding) =>
        finding.section === section && isVisible(finding.severity, options),
    );
    for (const finding of findings) {
      lines.push(line(finding.severity, finding.message));
    }
  }

  lines.push("", ...renderRecommendations(classification, profile), "");
  return lines.join("\n");
}
