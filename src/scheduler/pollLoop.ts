import { setTimeout as delay } from "timers/promises";
import { StateStoreError, errorMessage, withTimeout } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProviderClient, PullRequestRef } from "../providers/types.js";
import type { PrOutcome } from "../review/pipeline.js";
import type { ReviewStateStore } from "../state/store.js";

export type SchedulerState = "idle" | "listing" | "processing" | "sleeping" | "stopped";

export type CycleReport = {
  cycle: number;
  startedAt: string;
  finishedAt: string | null;
  candidates: number;
  alreadyReviewed: number;
  outcomes: PrOutcome[];
  listError?: string;
  stateErrors: number;
};

export type SchedulerDeps = {
  client: ProviderClient;
  store: ReviewStateStore;
  review: (pr: PullRequestRef) => Promise<PrOutcome>;
  pollIntervalMs: number;
  listTimeoutMs: number;
  reviewDrafts: boolean;
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

async function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

/**
 * Poll loop as an explicit state machine:
 * idle → listing → processing (one PR per step) → sleeping → idle.
 * A stop request is honoured between PRs and interrupts sleeping.
 */
export class ReviewScheduler {
  private current: SchedulerState = "idle";
  private queue: PullRequestRef[] = [];
  private report: CycleReport | null = null;
  private last: CycleReport | null = null;
  private cycles = 0;
  private stopRequested = false;
  private readonly sleepAbort = new AbortController();
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly deps: SchedulerDeps) {
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get state(): SchedulerState {
    return this.current;
  }

  get lastCycle(): CycleReport | null {
    return this.last;
  }

  get pending(): number {
    return this.queue.length;
  }

  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.sleepAbort.abort();
    this.deps.logger.info({ state: this.current }, "stop requested");
  }

  /** Performs exactly one transition and returns the new state. */
  async step(): Promise<SchedulerState> {
    switch (this.current) {
      case "idle":
        if (this.stopRequested) {
          this.current = "stopped";
          break;
        }
        this.cycles += 1;
        this.report = {
          cycle: this.cycles,
          startedAt: this.now().toISOString(),
          finishedAt: null,
          candidates: 0,
          alreadyReviewed: 0,
          outcomes: [],
          stateErrors: 0
        };
        this.current = "listing";
        break;
      case "listing":
        this.current = (await this.list()) ? "processing" : this.finishCycle();
        break;
      case "processing": {
        if (this.stopRequested) {
          this.queue = [];
          this.finishCycle();
          this.current = "stopped";
          break;
        }
        const pr = this.queue.shift();
        if (!pr) {
          this.current = this.finishCycle();
          break;
        }
        await this.process(pr);
        break;
      }
      case "sleeping":
        if (!this.stopRequested) {
          await this.sleep(this.deps.pollIntervalMs, this.sleepAbort.signal);
        }
        this.current = this.stopRequested ? "stopped" : "idle";
        break;
      case "stopped":
        break;
    }
    return this.current;
  }

  /** Steps through one full cycle, ending before the inter-cycle sleep. */
  async runCycle(): Promise<CycleReport | null> {
    if (this.current === "sleeping") await this.step();
    do {
      await this.step();
    } while (this.current !== "sleeping" && this.current !== "stopped");
    return this.last;
  }

  async run(): Promise<void> {
    while (this.current !== "stopped") {
      await this.step();
    }
    this.deps.logger.info({ cycles: this.cycles }, "scheduler stopped");
  }

  private currentReport(): CycleReport {
    if (!this.report) {
      throw new Error(`scheduler is ${this.current} without an active cycle`);
    }
    return this.report;
  }

  private async list(): Promise<boolean> {
    const report = this.currentReport();
    const { client, store, logger } = this.deps;
    let candidates: PullRequestRef[];
    try {
      candidates = await withTimeout("list active pull requests", this.deps.listTimeoutMs, (signal) =>
        client.listActivePullRequests({ signal })
      );
    } catch (err) {
      report.listError = errorMessage(err);
      logger.error({ err: report.listError }, "listing pull requests failed");
      return false;
    }

    const seen = new Set<string>();
    for (const pr of candidates) {
      if (seen.has(pr.id)) continue;
      seen.add(pr.id);
      report.candidates += 1;
      if (store.isReviewed(pr.id, pr.latestSourceCommit)) {
        report.alreadyReviewed += 1;
        continue;
      }
      const previous = store.getRecord(pr.id);
      if (previous) {
        logger.info(
          { pr: pr.id, previousCommit: previous.reviewedCommitId, commit: pr.latestSourceCommit },
          "new commit on a reviewed pull request"
        );
      }
      if (pr.draft && !this.deps.reviewDrafts) {
        report.outcomes.push({ status: "skipped", prId: pr.id, commitId: pr.latestSourceCommit, reason: "draft" });
        continue;
      }
      this.queue.push(pr);
    }
    logger.debug(
      { candidates: report.candidates, queued: this.queue.length, alreadyReviewed: report.alreadyReviewed },
      "listed pull requests"
    );
    return true;
  }

  private async process(pr: PullRequestRef): Promise<void> {
    const report = this.currentReport();
    const { store, logger } = this.deps;
    let outcome: PrOutcome;
    try {
      outcome = await this.deps.review(pr);
    } catch (err) {
      logger.error({ pr: pr.id, err: errorMessage(err) }, "unexpected error while reviewing pull request");
      outcome = {
        status: "failed",
        prId: pr.id,
        commitId: pr.latestSourceCommit,
        kind: "internal",
        message: errorMessage(err)
      };
    }
    report.outcomes.push(outcome);

    const completed =
      outcome.status === "reviewed" || (outcome.status === "skipped" && outcome.reason === "no-reviewable-changes");
    if (!completed) return;

    store.markReviewed(pr.id, pr.latestSourceCommit, this.now());
    try {
      await store.persist();
    } catch (err) {
      if (!(err instanceof StateStoreError)) throw err;
      report.stateErrors += 1;
      logger.error({ pr: pr.id, err: err.message }, "review state not persisted; keeping in-memory state");
    }
  }

  private finishCycle(): SchedulerState {
    const report = this.currentReport();
    report.finishedAt = this.now().toISOString();
    this.last = report;
    this.report = null;
    const count = (status: PrOutcome["status"]) => report.outcomes.filter((outcome) => outcome.status === status).length;
    this.deps.logger.info(
      {
        cycle: report.cycle,
        candidates: report.candidates,
        alreadyReviewed: report.alreadyReviewed,
        reviewed: count("reviewed"),
        skipped: count("skipped"),
        failed: count("failed")
      },
      "review cycle complete"
    );
    return "sleeping";
  }
}
