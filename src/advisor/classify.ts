/**
 * mysql-advisor - Classifier
 *
 * Runs every rule in order against one Snapshot and its derived metrics and
 * folds their output into a single immutable Classification.
 */

import type { Snapshot } from "./Snapshot.js";
import type { DerivedMetrics } from "./derive.js";
import { getAllRules } from "./rules/index.js";
import type { RuleDefinition, RuleEmitter } from "./rules/index.js";
import type {
  Classification,
  EngineUsage,
  Finding,
} from "../types/index.js";

export function classify(
  snapshot: Snapshot,
  derived: DerivedMetrics,
  engineUsage: EngineUsage,
  rules: readonly RuleDefinition[] = getAllRules(),
): Classification {
  const findings: Finding[] = [];
  const generalRecommendations: string[] = [];
  const variableAdjustments: string[] = [];
  const context = { snapshot, derived, engineUsage };

  for (const rule of rules) {
    const finding = (severity: Finding["severity"], message: string): void => {
      findings.push(
        Object.freeze({ metric: rule.name, severity, message, section: rule.section }),
      );
    };
    const emit: RuleEmitter = {
      ok: (message) => finding("OK", message),
      warn: (message) => finding("WARN", message),
      general: (recommendation) => generalRecommendations.push(recommendation),
      adjust: (adjustment) => variableAdjustments.push(adjustment),
    };
    rule.evaluate(context, emit);
  }

  return Object.freeze({
    findings: Object.freeze(findings),
    recommendations: Object.freeze({
      generalRecommendations: Object.freeze(generalRecommendations),
      variableAdjustments: Object.freeze(variableAdjustments),
    }),
  });
}
