export type ErrorKind = "config" | "diff" | "placement" | "analysis" | "publish" | "state" | "timeout";

export class ReviewBotError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

export class ConfigError extends ReviewBotError {
  constructor(message: string) {
    super("config", message);
  }
}

export class MalformedDiffError extends ReviewBotError {
  readonly path: string;
  readonly patchLine: number | null;

  constructor(path: string, message: string, patchLine: number | null = null) {
    super("diff", patchLine === null ? `${path}: ${message}` : `${path}:${patchLine}: ${message}`);
    this.path = path;
    this.patchLine = patchLine;
  }
}

export type PlacementFailure = "below-threshold" | "no-hunks-for-file" | "out-of-range" | "over-limit";

export class PlacementError extends ReviewBotError {
  readonly reason: PlacementFailure;

  constructor(reason: PlacementFailure, message: string) {
    super("placement", message);
    this.reason = reason;
  }
}

export class AnalysisError extends ReviewBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("analysis", message, options);
  }
}

export class PublishError extends ReviewBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("publish", message, options);
  }
}

export class StateStoreError extends ReviewBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("state", message, options);
  }
}

export class TimeoutError extends ReviewBotError {
  readonly operation: string;

  constructor(operation: string, timeoutMs: number) {
    super("timeout", `${operation} timed out after ${timeoutMs}ms`);
    this.operation = operation;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs `run` with a signal that is aborted once `timeoutMs` elapses, so the
 * collaborator stops its own work instead of running on in the background.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
