import parseDiff from "parse-diff";
import { MalformedDiffError } from "../errors.js";
import type { FileDiff } from "../providers/types.js";

export type DiffLine =
  | { kind: "added"; newLineNumber: number; oldLineNumber?: undefined; text: string }
  | { kind: "removed"; oldLineNumber: number; newLineNumber?: undefined; text: string }
  | { kind: "context"; oldLineNumber: number; newLineNumber: number; text: string };

export type DiffHunk = {
  readonly filePath: string;
  readonly oldStart: number;
  readonly oldLineCount: number;
  readonly newStart: number;
  readonly newLineCount: number;
  readonly lines: readonly DiffLine[];
};

export type FileHunks = {
  path: string;
  previousPath?: string;
  hunks: DiffHunk[];
};

export type SkippedFile = {
  path: string;
  reason: "malformed" | "binary" | "deleted" | "empty";
  error?: MalformedDiffError;
};

type HunkHeader = {
  oldStart: number;
  oldLineCount: number;
  newStart: number;
  newLineCount: number;
};

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

export function normalizePath(path: string): string {
  let normalized = path.replace(/^\//, "");
  if (normalized.startsWith("a/") || normalized.startsWith("b/")) {
    normalized = normalized.slice(2);
  }
  return normalized;
}

function patchLines(patch: string): string[] {
  const lines = patch.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Drops any file headers so only the hunks remain. */
function hunkText(patch: string): string | null {
  const lines = patchLines(patch);
  const first = lines.findIndex((line) => line.startsWith("@@"));
  if (first === -1) return null;
  return lines.slice(first).join("\n");
}

/**
 * Walks the hunk bodies with running counters and returns the parsed headers.
 * Throws when a header is unparsable, a marker is unknown, or a body does not
 * match its header counts.
 */
export function validatePatchStructure(path: string, patch: string): HunkHeader[] {
  const headers: HunkHeader[] = [];
  const lines = patchLines(patch);
  let remainingOld = 0;
  let remainingNew = 0;

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i];
    const lineNo = i + 1;
    if (line.startsWith("@@")) {
      if (remainingOld > 0 || remainingNew > 0) {
        throw new MalformedDiffError(path, "hunk ended before its header counts were reached", lineNo);
      }
      const match = HUNK_HEADER.exec(line);
      if (!match) {
        throw new MalformedDiffError(path, `unparsable hunk header ${JSON.stringify(line)}`, lineNo);
      }
      const header = {
        oldStart: Number(match[1]),
        oldLineCount: match[2] === undefined ? 1 : Number(match[2]),
        newStart: Number(match[3]),
        newLineCount: match[4] === undefined ? 1 : Number(match[4])
      };
      headers.push(header);
      remainingOld = header.oldLineCount;
      remainingNew = header.newLineCount;
      continue;
    }
    if (headers.length === 0) continue;
    if (line.startsWith("\\")) continue;
    if (remainingOld === 0 && remainingNew === 0) {
      throw new MalformedDiffError(path, "line outside of any hunk", lineNo);
    }
    const marker = line.charAt(0);
    if (marker === " ") {
      remainingOld -= 1;
      remainingNew -= 1;
    } else if (marker === "+") {
      remainingNew -= 1;
    } else if (marker === "-") {
      remainingOld -= 1;
    } else {
      throw new MalformedDiffError(path, `unrecognized line marker ${JSON.stringify(marker)}`, lineNo);
    }
    if (remainingOld < 0 || remainingNew < 0) {
      throw new MalformedDiffError(path, "hunk body exceeds its header counts", lineNo);
    }
  }

  if (remainingOld > 0 || remainingNew > 0) {
    throw new MalformedDiffError(path, "patch ended inside a hunk");
  }
  return headers;
}

function toDiffLines(chunk: parseDiff.Chunk): DiffLine[] {
  const lines: DiffLine[] = [];
  for (const change of chunk.changes) {
    // parse-diff repeats the previous change for "\ No newline at end of file"
    if (change.content.startsWith("\\")) continue;
    const text = change.content.slice(1);
    if (change.type === "add") {
      lines.push({ kind: "added", newLineNumber: change.ln, text });
    } else if (change.type === "del") {
      lines.push({ kind: "removed", oldLineNumber: change.ln, text });
    } else {
      lines.push({ kind: "context", oldLineNumber: change.ln1, newLineNumber: change.ln2, text });
    }
  }
  return lines;
}

function assertConsistent(path: string, header: HunkHeader, lines: DiffLine[]): void {
  let oldLine = header.oldStart;
  let newLine = header.newStart;
  let oldCount = 0;
  let newCount = 0;
  for (const line of lines) {
    if (line.kind !== "added") {
      if (line.oldLineNumber !== oldLine) break;
      oldLine += 1;
      oldCount += 1;
    }
    if (line.kind !== "removed") {
      if (line.newLineNumber !== newLine) break;
      newLine += 1;
      newCount += 1;
    }
  }
  if (oldCount !== header.oldLineCount || newCount !== header.newLineCount) {
    throw new MalformedDiffError(path, `hunk at -${header.oldStart} +${header.newStart} does not match its header`);
  }
}

/** Parses the hunks of one file. The patch may carry file headers or start at the first `@@`. */
export function parseFilePatch(path: string, patch: string): DiffHunk[] {
  const filePath = normalizePath(path);
  const body = hunkText(patch);
  if (body === null) return [];
  const headers = validatePatchStructure(filePath, body);
  const synthetic = `diff --git a/${filePath} b/${filePath}\n--- a/${filePath}\n+++ b/${filePath}\n${body}\n`;

  let parsed: parseDiff.File[];
  try {
    parsed = parseDiff(synthetic);
  } catch (err) {
    throw new MalformedDiffError(filePath, `diff parser rejected patch: ${err instanceof Error ? err.message : String(err)}`);
  }
  const chunks = parsed[0]?.chunks ?? [];
  if (chunks.length !== headers.length) {
    throw new MalformedDiffError(filePath, `expected ${headers.length} hunks, parsed ${chunks.length}`);
  }

  return chunks.map((chunk, index) => {
    const header = headers[index];
    const lines = toDiffLines(chunk);
    assertConsistent(filePath, header, lines);
    return Object.freeze({
      filePath,
      oldStart: header.oldStart,
      oldLineCount: header.oldLineCount,
      newStart: header.newStart,
      newLineCount: header.newLineCount,
      lines: Object.freeze(lines)
    });
  });
}

export function mapFileDiffs(files: FileDiff[]): { files: FileHunks[]; skipped: SkippedFile[] } {
  const mapped: FileHunks[] = [];
  const skipped: SkippedFile[] = [];
  for (const file of files) {
    const path = normalizePath(file.path);
    if (file.status === "removed") {
      skipped.push({ path, reason: "deleted" });
      continue;
    }
    if (!file.patch) {
      skipped.push({ path, reason: "binary" });
      continue;
    }
    try {
      const hunks = parseFilePatch(path, file.patch);
      if (hunks.length === 0) {
        skipped.push({ path, reason: "empty" });
        continue;
      }
      const previousPath = file.previousPath ? normalizePath(file.previousPath) : undefined;
      mapped.push({ path, ...(previousPath && previousPath !== path ? { previousPath } : {}), hunks });
    } catch (err) {
      if (!(err instanceof MalformedDiffError)) throw err;
      skipped.push({ path, reason: "malformed", error: err });
    }
  }
  return { files: mapped, skipped };
}

/** Renders hunks with new-file line numbers so analyzer references use the same coordinates as placement. */
export function renderHunksForAnalysis(files: FileHunks[]): string {
  const blocks: string[] = [];
  for (const file of files) {
    const lines = [`File: ${file.path}`];
    for (const hunk of file.hunks) {
      lines.push(`@@ -${hunk.oldStart},${hunk.oldLineCount} +${hunk.newStart},${hunk.newLineCount} @@`);
      for (const line of hunk.lines) {
        const number = line.newLineNumber === undefined ? "" : String(line.newLineNumber);
        const marker = line.kind === "added" ? "+" : line.kind === "removed" ? "-" : " ";
        lines.push(`${number.padStart(6)} ${marker}${line.text}`);
      }
    }
    blocks.push(lines.join("\n"));
  }
  return blocks.join("\n\n");
}
