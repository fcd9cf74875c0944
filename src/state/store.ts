import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { StateStoreError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { readAndValidateJson } from "../review/json.js";

export type ReviewRecord = {
  pullRequestId: string;
  reviewedCommitId: string;
  timestamp: string;
};

const ReviewRecordSchema = z.object({
  pullRequestId: z.string().min(1),
  reviewedCommitId: z.string().min(1),
  timestamp: z.string()
});

const StateFileSchema = z.object({
  version: z.literal(1),
  records: z.record(ReviewRecordSchema)
});

export type ReviewStateBackend = {
  describe: () => string;
  /** Returns null when nothing has been stored yet. */
  read: () => Promise<ReviewRecord[] | null>;
  write: (records: ReviewRecord[]) => Promise<void>;
};

export class MemoryStateBackend implements ReviewStateBackend {
  private records: ReviewRecord[] | null;
  writes = 0;

  constructor(initial: ReviewRecord[] | null = null) {
    this.records = initial ? initial.map((record) => ({ ...record })) : null;
  }

  describe(): string {
    return "memory";
  }

  async read(): Promise<ReviewRecord[] | null> {
    return this.records ? this.records.map((record) => ({ ...record })) : null;
  }

  async write(records: ReviewRecord[]): Promise<void> {
    this.records = records.map((record) => ({ ...record }));
    this.writes += 1;
  }
}

/** Stores records as pretty-printed JSON; deleting the file forces a full re-review. */
export class JsonFileStateBackend implements ReviewStateBackend {
  constructor(private readonly filePath: string) {}

  describe(): string {
    return this.filePath;
  }

  async read(): Promise<ReviewRecord[] | null> {
    try {
      await fs.access(this.filePath);
    } catch {
      return null;
    }
    const data = await readAndValidateJson(this.filePath, StateFileSchema);
    return Object.values(data.records);
  }

  async write(records: ReviewRecord[]): Promise<void> {
    const payload = {
      version: 1,
      records: Object.fromEntries(records.map((record) => [record.pullRequestId, record]))
    };
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await fs.rename(tmpPath, this.filePath);
  }
}

/** Remembers the last reviewed commit per pull request. */
export class ReviewStateStore {
  private readonly records = new Map<string, ReviewRecord>();

  constructor(
    private readonly backend: ReviewStateBackend,
    private readonly logger: Logger
  ) {}

  /** Never throws: a missing or unreadable store starts empty. */
  async load(): Promise<number> {
    this.records.clear();
    let stored: ReviewRecord[] | null;
    try {
      stored = await this.backend.read();
    } catch (err) {
      this.logger.error(
        { store: this.backend.describe(), err: errorMessage(err) },
        "review state is unreadable; starting with empty state"
      );
      return 0;
    }
    if (!stored) {
      this.logger.info({ store: this.backend.describe() }, "no review state found; starting fresh");
      return 0;
    }
    for (const record of stored) {
      this.records.set(record.pullRequestId, record);
    }
    this.logger.info({ store: this.backend.describe(), records: this.records.size }, "loaded review state");
    return this.records.size;
  }

  isReviewed(prId: string, commitId: string): boolean {
    return this.records.get(prId)?.reviewedCommitId === commitId;
  }

  getRecord(prId: string): ReviewRecord | null {
    return this.records.get(prId) ?? null;
  }

  markReviewed(prId: string, commitId: string, timestamp: Date): void {
    this.records.set(prId, {
      pullRequestId: prId,
      reviewedCommitId: commitId,
      timestamp: timestamp.toISOString()
    });
  }

  list(): ReviewRecord[] {
    return [...this.records.values()];
  }

  async persist(): Promise<void> {
    try {
      await this.backend.write(this.list());
    } catch (err) {
      throw new StateStoreError(`failed to persist review state to ${this.backend.describe()}: ${errorMessage(err)}`, {
        cause: err
      });
    }
  }
}
