/**
 * Classifier rule contract
 */

import type { Snapshot } from "../Snapshot.js";
import type { DerivedMetrics } from "../derive.js";
import type { EngineUsage, SectionId } from "../../types/index.js";

/**
 * Read-only state every rule may consult
 */
export interface RuleContext {
  snapshot: Snapshot;
  derived: DerivedMetrics;
  engineUsage: EngineUsage;
}

/**
 * Sink a rule writes its findings and advice to. Findings are tagged with
 * the rule's metric and section.
 */
export interface RuleEmitter {
  ok(message: string): void;
  warn(message: string): void;
  general(recommendation: string): void;
  adjust(adjustment: string): void;
}

export interface RuleDefinition {
  /** Metric the findings are reported under */
  name: string;
  section: SectionId;
  evaluate: (context: RuleContext, emit: RuleEmitter) => void;
}
