import type { Finding } from "../analysis/types.js";
import { PlacementError } from "../errors.js";
import type { DiffHunk, FileHunks } from "./diff.js";
import { normalizePath } from "./diff.js";
import { meetsThreshold, type Severity } from "./severity.js";

export type PlacedComment = {
  filePath: string;
  /** Set when the file was renamed; some hosts anchor comments on both paths. */
  previousPath?: string;
  resolvedLine: number;
  /** Old-side number of the resolved line when it is unchanged context. */
  oldLine?: number;
  referencedLine: number;
  approximated: boolean;
  severity: Severity;
  message: string;
  suggestedFix?: string;
};

export type DroppedFinding = {
  finding: Finding;
  error: PlacementError;
};

export type PlacementPolicy = {
  threshold: Severity;
  tolerance: number;
  maxComments: number;
};

export type PlacementResult = {
  placed: PlacedComment[];
  dropped: DroppedFinding[];
};

type AddressableLine = { newLine: number; oldLine?: number };

function addressableLines(hunk: DiffHunk): AddressableLine[] {
  const lines: AddressableLine[] = [];
  for (const line of hunk.lines) {
    if (line.kind === "added") lines.push({ newLine: line.newLineNumber });
    if (line.kind === "context") lines.push({ newLine: line.newLineNumber, oldLine: line.oldLineNumber });
  }
  return lines;
}

/**
 * Resolves one finding against the hunks of its file. Exact hits on a new-side
 * line win; otherwise the nearest new-side line of a single hunk within
 * `tolerance` is used, preferring the earlier line on ties.
 */
export function placeFinding(
  finding: Finding,
  hunks: readonly DiffHunk[] | undefined,
  tolerance: number
): PlacedComment {
  if (!hunks || hunks.length === 0) {
    throw new PlacementError("no-hunks-for-file", `no diff hunks for ${finding.filePath}`);
  }
  const target = finding.referencedLine;
  let best: { line: AddressableLine; distance: number } | null = null;

  for (const hunk of hunks) {
    for (const line of addressableLines(hunk)) {
      const distance = Math.abs(line.newLine - target);
      if (distance > tolerance) continue;
      if (!best || distance < best.distance || (distance === best.distance && line.newLine < best.line.newLine)) {
        best = { line, distance };
      }
    }
    if (best?.distance === 0) break;
  }

  if (!best) {
    throw new PlacementError(
      "out-of-range",
      `line ${target} of ${finding.filePath} is not within ${tolerance} lines of a changed hunk`
    );
  }
  return {
    filePath: normalizePath(finding.filePath),
    resolvedLine: best.line.newLine,
    ...(best.line.oldLine !== undefined ? { oldLine: best.line.oldLine } : {}),
    referencedLine: target,
    approximated: best.distance !== 0,
    severity: finding.severity,
    message: finding.message,
    ...(finding.suggestedFix ? { suggestedFix: finding.suggestedFix } : {})
  };
}

export function resolvePlacements(
  findings: Finding[],
  files: FileHunks[],
  policy: PlacementPolicy
): PlacementResult {
  const filesByPath = new Map<string, FileHunks>();
  for (const file of files) {
    filesByPath.set(normalizePath(file.path), file);
  }

  const placed: PlacedComment[] = [];
  const dropped: DroppedFinding[] = [];
  const seen = new Set<string>();

  for (const finding of findings) {
    if (!meetsThreshold(finding.severity, policy.threshold)) {
      dropped.push({
        finding,
        error: new PlacementError("below-threshold", `${finding.severity} is below ${policy.threshold}`)
      });
      continue;
    }
    let comment: PlacedComment;
    try {
      const file = filesByPath.get(normalizePath(finding.filePath));
      comment = placeFinding(finding, file?.hunks, policy.tolerance);
      if (file?.previousPath) comment = { ...comment, previousPath: file.previousPath };
    } catch (err) {
      if (!(err instanceof PlacementError)) throw err;
      dropped.push({ finding, error: err });
      continue;
    }
    const key = `${comment.filePath}|${comment.resolvedLine}|${comment.message.toLowerCase()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    if (placed.length >= policy.maxComments) {
      dropped.push({
        finding,
        error: new PlacementError("over-limit", `inline comment limit of ${policy.maxComments} reached`)
      });
      continue;
    }
    placed.push(comment);
  }

  return { placed, dropped };
}
