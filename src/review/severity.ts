export const SEVERITIES = ["low", "medium", "high", "critical"] as const;

export type Severity = (typeof SEVERITIES)[number];

const SEVERITY_RANK: Record<Severity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4
};

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK[severity];
}

export function meetsThreshold(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

export type SeverityCounts = Record<Severity, number>;

export function emptySeverityCounts(): SeverityCounts {
  return { low: 0, medium: 0, high: 0, critical: 0 };
}

export function countBySeverity(items: Array<{ severity: Severity }>): SeverityCounts {
  const counts = emptySeverityCounts();
  for (const item of items) {
    counts[item.severity] += 1;
  }
  return counts;
}
