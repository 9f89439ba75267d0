/**
 * Findings, Recommendations and Report Types
 */

/**
 * OK and WARN come from classifier rules; INFO is descriptive only
 */
export type Severity = "OK" | "WARN" | "INFO";

/**
 * Report sections, in print order
 */
export type SectionId = "general" | "engines" | "performance";

export interface Finding {
  /** Metric or rule the finding is about */
  metric: string;
  severity: Severity;
  message: string;
  section: SectionId;
}

/**
 * Advice collected during classification. Insertion order is kept and
 * duplicates are allowed.
 */
export interface RecommendationSet {
  generalRecommendations: readonly string[];
  variableAdjustments: readonly string[];
}

export interface Classification {
  findings: readonly Finding[];
  recommendations: RecommendationSet;
}

/**
 * Presentation switches layered over the report
 */
export interface ReportOptions {
  hideOk: boolean;
  hideWarn: boolean;
  hideInfo: boolean;
  color: boolean;
}
