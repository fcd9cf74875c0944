import type { Severity } from "../review/severity.js";

export const REVIEW_MODES = ["detailed", "quick", "security-focused"] as const;

export type ReviewMode = (typeof REVIEW_MODES)[number];

/** One issue reported by the analyzer. `referencedLine` is in new-file coordinates but may be off by a few lines. */
export type Finding = {
  filePath: string;
  referencedLine: number;
  severity: Severity;
  message: string;
  suggestedFix?: string;
};

export type Analyzer = {
  /** Aborting `signal` cancels the in-flight request and any pending retry. */
  analyze: (diffText: string, mode: ReviewMode, options?: { signal?: AbortSignal }) => Promise<Finding[]>;
};
