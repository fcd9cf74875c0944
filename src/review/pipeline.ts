import { minimatch } from "minimatch";
import type { Analyzer, Finding, ReviewMode } from "../analysis/types.js";
import type { PartialPublishPolicy } from "../config/env.js";
import { TimeoutError, errorMessage, withTimeout, type ErrorKind } from "../errors.js";
import type { Logger } from "../logger.js";
import type { FileDiff, ProviderClient, PullRequestRef } from "../providers/types.js";
import { mapFileDiffs, renderHunksForAnalysis, type FileHunks } from "./diff.js";
import { resolvePlacements } from "./placement.js";
import { buildReviewStats, publishReview } from "./publisher.js";
import type { Severity } from "./severity.js";

export type ReviewSettings = {
  mode: ReviewMode;
  threshold: Severity;
  tolerance: number;
  maxInlineComments: number;
  partialPublishPolicy: PartialPublishPolicy;
  ignorePaths: string[];
  platformTimeoutMs: number;
  analyzerTimeoutMs: number;
};

/** `internal` marks an unexpected exception caught by the scheduler. */
export type PrFailureKind = Extract<ErrorKind, "diff" | "analysis" | "publish" | "timeout"> | "internal";

export type PrOutcome =
  | {
      status: "reviewed";
      prId: string;
      commitId: string;
      commentsPosted: number;
      commentsFailed: number;
      findingsDropped: number;
    }
  | {
      status: "skipped";
      prId: string;
      commitId: string;
      reason: "no-reviewable-changes" | "draft";
    }
  | {
      status: "failed";
      prId: string;
      commitId: string;
      kind: PrFailureKind;
      message: string;
    };

export type PipelineDeps = {
  client: ProviderClient;
  analyzer: Analyzer;
  settings: ReviewSettings;
  logger: Logger;
};

function failureKind(err: unknown, fallback: PrFailureKind): PrFailureKind {
  return err instanceof TimeoutError ? "timeout" : fallback;
}

function isIgnored(path: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(path, pattern, { dot: true }));
}

/**
 * Runs diff → analysis → placement → publish for one revision. Every
 * recoverable failure becomes a `failed` outcome; nothing here throws for
 * collaborator errors.
 */
export async function reviewPullRequest(pr: PullRequestRef, deps: PipelineDeps): Promise<PrOutcome> {
  const { client, analyzer, settings } = deps;
  const logger = deps.logger.child({ pr: pr.id, commit: pr.latestSourceCommit });
  const base = { prId: pr.id, commitId: pr.latestSourceCommit };

  let fileDiffs: FileDiff[];
  try {
    fileDiffs = await withTimeout(`fetch diff for ${pr.id}`, settings.platformTimeoutMs, (signal) =>
      client.getDiff(pr, { signal })
    );
  } catch (err) {
    logger.error({ err: errorMessage(err) }, "diff fetch failed");
    return { ...base, status: "failed", kind: failureKind(err, "diff"), message: errorMessage(err) };
  }

  const reviewable = fileDiffs.filter((file) => !isIgnored(file.path, settings.ignorePaths));
  const mapped = mapFileDiffs(reviewable);
  for (const skipped of mapped.skipped) {
    if (skipped.reason === "malformed") {
      logger.warn({ path: skipped.path, err: skipped.error?.message }, "skipping file with malformed diff");
    } else {
      logger.debug({ path: skipped.path, reason: skipped.reason }, "skipping file");
    }
  }
  const files: FileHunks[] = mapped.files;
  const filesSkipped = fileDiffs.length - files.length;
  if (files.length === 0) {
    logger.info({ files: fileDiffs.length }, "no reviewable changes");
    return { ...base, status: "skipped", reason: "no-reviewable-changes" };
  }

  let findings: Finding[];
  try {
    findings = await withTimeout(`analyze ${pr.id}`, settings.analyzerTimeoutMs, (signal) =>
      analyzer.analyze(renderHunksForAnalysis(files), settings.mode, { signal })
    );
  } catch (err) {
    logger.error({ err: errorMessage(err) }, "analysis failed");
    return { ...base, status: "failed", kind: failureKind(err, "analysis"), message: errorMessage(err) };
  }

  const placement = resolvePlacements(findings, files, {
    threshold: settings.threshold,
    tolerance: settings.tolerance,
    maxComments: settings.maxInlineComments
  });
  for (const dropped of placement.dropped) {
    logger.debug(
      { path: dropped.finding.filePath, line: dropped.finding.referencedLine, reason: dropped.error.reason },
      "finding not placed"
    );
  }
  const unplaced = placement.dropped.filter((dropped) => dropped.error.reason !== "below-threshold").length;

  const report = await publishReview({
    client,
    pr,
    comments: placement.placed,
    stats: buildReviewStats({
      placed: placement.placed,
      unplaced,
      filesReviewed: files.length,
      filesSkipped
    }),
    policy: settings.partialPublishPolicy,
    timeoutMs: settings.platformTimeoutMs,
    logger
  });
  logger.info(
    {
      findings: findings.length,
      placed: placement.placed.length,
      dropped: placement.dropped.length,
      posted: report.posted,
      failed: report.failed,
      summaryPosted: report.summaryPosted
    },
    "review published"
  );

  if (!report.acceptable) {
    const message = report.errors.map((err) => err.message).join("; ");
    return { ...base, status: "failed", kind: "publish", message };
  }
  return {
    ...base,
    status: "reviewed",
    commentsPosted: report.posted,
    commentsFailed: report.failed,
    findingsDropped: placement.dropped.length
  };
}
