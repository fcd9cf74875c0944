import type { PartialPublishPolicy } from "../config/env.js";
import { PublishError, errorMessage, withTimeout } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProviderClient, PullRequestRef } from "../providers/types.js";
import type { PlacedComment } from "./placement.js";
import { SEVERITIES, countBySeverity, severityRank, type Severity, type SeverityCounts } from "./severity.js";

export type ReviewStats = {
  counts: SeverityCounts;
  total: number;
  unplaced: number;
  filesReviewed: number;
  filesSkipped: number;
};

export type PublishReport = {
  posted: number;
  failed: number;
  summaryPosted: boolean;
  errors: PublishError[];
  /** Whether this revision may be recorded as reviewed under the partial-publish policy. */
  acceptable: boolean;
};

const SEVERITY_LABELS: Record<Severity, string> = {
  critical: "🔴 Critical",
  high: "⚠️ High",
  medium: "ℹ️ Medium",
  low: "💡 Low"
};

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  py: "python",
  js: "javascript",
  jsx: "javascript",
  ts: "typescript",
  tsx: "typescript",
  java: "java",
  go: "go",
  rs: "rust",
  cpp: "cpp",
  c: "c",
  cs: "csharp",
  rb: "ruby",
  php: "php"
};

export function fenceLanguage(path: string): string {
  const dot = path.lastIndexOf(".");
  if (dot === -1) return "";
  return LANGUAGE_BY_EXTENSION[path.slice(dot + 1).toLowerCase()] ?? "";
}

/** Strips fences and diff markers the analyzer sometimes wraps a fix in, keeping the resulting code. */
export function normalizeSuggestedFix(fix: string): string {
  let normalized = fix.replace(/\\n/g, "\n");
  normalized = normalized
    .replace(/^```[\w-]*\n?/, "")
    .replace(/\n?```\s*$/, "")
    .trim();
  const lines = normalized.split("\n");
  const hasDiffMarkers = lines.some((line) => line.startsWith("@@") || line.startsWith("+++ ") || line.startsWith("--- "));
  if (!hasDiffMarkers) return normalized;
  const kept: string[] = [];
  for (const line of lines) {
    if (line.startsWith("@@") || line.startsWith("+++ ") || line.startsWith("--- ") || line.startsWith("diff")) continue;
    if (line.startsWith("+") || line.startsWith(" ")) {
      kept.push(line.slice(1));
      continue;
    }
    if (!line.startsWith("-")) kept.push(line);
  }
  return kept.length > 0 ? kept.join("\n").trimEnd() : normalized;
}

export function formatInlineComment(comment: PlacedComment): string {
  const parts = ["<!-- prwatch:finding -->", `**${comment.severity.toUpperCase()}**: ${comment.message}`];
  const fix = comment.suggestedFix ? normalizeSuggestedFix(comment.suggestedFix) : "";
  if (fix) {
    parts.push(["**Suggested fix:**", "```" + fenceLanguage(comment.filePath), fix, "```"].join("\n"));
  }
  if (comment.approximated) {
    parts.push(`_Reported at line ${comment.referencedLine}; placed on the nearest changed line._`);
  }
  return parts.join("\n\n");
}

export function formatSummaryComment(pr: PullRequestRef, stats: ReviewStats): string {
  const lines = [
    `<!-- prwatch:summary ${pr.latestSourceCommit} -->`,
    "## 🤖 AI Code Review Summary",
    "",
    `**PR:** #${pr.number} - ${pr.title}`,
    `**Commit:** \`${pr.latestSourceCommit}\``,
    "",
    `**Total findings:** ${stats.total}`
  ];
  for (const severity of [...SEVERITIES].sort((a, b) => severityRank(b) - severityRank(a))) {
    lines.push(`- ${SEVERITY_LABELS[severity]}: ${stats.counts[severity]}`);
  }
  lines.push("");
  if (stats.unplaced > 0) {
    lines.push(`${stats.unplaced} finding(s) could not be placed on changed lines and were not posted.`, "");
  }
  lines.push(`Files reviewed: ${stats.filesReviewed}${stats.filesSkipped > 0 ? ` (${stats.filesSkipped} skipped)` : ""}`);
  lines.push(
    "",
    stats.total > 0
      ? "Please review the inline comments before merging."
      : "No issues found on the changed lines."
  );
  return lines.join("\n");
}

export function buildReviewStats(params: {
  placed: PlacedComment[];
  unplaced: number;
  filesReviewed: number;
  filesSkipped: number;
}): ReviewStats {
  return {
    counts: countBySeverity(params.placed),
    total: params.placed.length,
    unplaced: params.unplaced,
    filesReviewed: params.filesReviewed,
    filesSkipped: params.filesSkipped
  };
}

/**
 * Posts one inline comment per placement, then exactly one summary. No dedup
 * happens here: callers must only publish a (pr, commit) pair once.
 */
export async function publishReview(params: {
  client: ProviderClient;
  pr: PullRequestRef;
  comments: PlacedComment[];
  stats: ReviewStats;
  policy: PartialPublishPolicy;
  timeoutMs: number;
  logger: Logger;
}): Promise<PublishReport> {
  const { client, pr, logger } = params;
  const errors: PublishError[] = [];
  let posted = 0;

  for (const comment of params.comments) {
    try {
      await withTimeout(`post inline comment on ${comment.filePath}:${comment.resolvedLine}`, params.timeoutMs, (signal) =>
        client.postInlineComment(
          pr,
          {
            path: comment.filePath,
            ...(comment.previousPath ? { previousPath: comment.previousPath } : {}),
            line: comment.resolvedLine,
            ...(comment.oldLine !== undefined ? { oldLine: comment.oldLine } : {}),
            body: formatInlineComment(comment)
          },
          { signal }
        )
      );
      posted += 1;
    } catch (err) {
      const error = new PublishError(
        `inline comment on ${comment.filePath}:${comment.resolvedLine} failed: ${errorMessage(err)}`,
        { cause: err }
      );
      errors.push(error);
      logger.warn({ path: comment.filePath, line: comment.resolvedLine, err: errorMessage(err) }, "inline comment failed");
    }
  }

  let summaryPosted = false;
  try {
    await withTimeout("post summary comment", params.timeoutMs, (signal) =>
      client.postSummaryComment(pr, formatSummaryComment(pr, params.stats), { signal })
    );
    summaryPosted = true;
  } catch (err) {
    errors.push(new PublishError(`summary comment failed: ${errorMessage(err)}`, { cause: err }));
    logger.warn({ err: errorMessage(err) }, "summary comment failed");
  }

  const failed = params.comments.length - posted;
  const acceptable = summaryPosted && (params.policy === "accept" || failed === 0);
  return { posted, failed, summaryPosted, errors, acceptable };
}
