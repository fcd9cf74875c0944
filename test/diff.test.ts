import test from "node:test";
import assert from "node:assert/strict";
import { MalformedDiffError } from "../src/errors.js";
import {
  mapFileDiffs,
  normalizePath,
  parseFilePatch,
  renderHunksForAnalysis,
  type DiffHunk
} from "../src/review/diff.js";
import { FOO_PATCH } from "./helpers/fakes.js";

function expectMalformed(fn: () => unknown, patchLine: number | null, pattern: RegExp) {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof MalformedDiffError);
    assert.equal(err.patchLine, patchLine);
    assert.match(err.message, pattern);
    return true;
  });
}

function countSides(hunk: DiffHunk) {
  return {
    old: hunk.lines.filter((line) => line.kind !== "added").length,
    new: hunk.lines.filter((line) => line.kind !== "removed").length
  };
}

test("parseFilePatch numbers context, added and removed lines from the hunk header", () => {
  const [hunk] = parseFilePatch("foo.py", FOO_PATCH);

  assert.equal(hunk.filePath, "foo.py");
  assert.deepEqual(
    { oldStart: hunk.oldStart, oldLineCount: hunk.oldLineCount, newStart: hunk.newStart, newLineCount: hunk.newLineCount },
    { oldStart: 8, oldLineCount: 4, newStart: 8, newLineCount: 7 }
  );
  assert.deepEqual(hunk.lines, [
    { kind: "context", oldLineNumber: 8, newLineNumber: 8, text: "line8" },
    { kind: "context", oldLineNumber: 9, newLineNumber: 9, text: "line9" },
    { kind: "added", newLineNumber: 10, text: "new10" },
    { kind: "added", newLineNumber: 11, text: "new11" },
    { kind: "added", newLineNumber: 12, text: "new12" },
    { kind: "context", oldLineNumber: 10, newLineNumber: 13, text: "line10" },
    { kind: "context", oldLineNumber: 11, newLineNumber: 14, text: "line11" }
  ]);
});

test("parseFilePatch advances only the old counter for removed lines", () => {
  const patch = ["@@ -3,3 +3,2 @@", " keep", "-drop", " tail"].join("\n");
  const [hunk] = parseFilePatch("src/a.ts", patch);

  assert.deepEqual(hunk.lines, [
    { kind: "context", oldLineNumber: 3, newLineNumber: 3, text: "keep" },
    { kind: "removed", oldLineNumber: 4, text: "drop" },
    { kind: "context", oldLineNumber: 5, newLineNumber: 4, text: "tail" }
  ]);
});

test("parseFilePatch keeps per-hunk counters across several hunks and strips file headers", () => {
  const patch = [
    "diff --git a/lib/util.ts b/lib/util.ts",
    "index 1111111..2222222 100644",
    "--- a/lib/util.ts",
    "+++ b/lib/util.ts",
    "@@ -1,2 +1,3 @@",
    " import a",
    "+import b",
    " ",
    "@@ -20,3 +21,3 @@ export function run() {",
    " start()",
    "-stop()",
    "+halt()",
    " end()"
  ].join("\n");
  const hunks = parseFilePatch("lib/util.ts", patch);

  assert.equal(hunks.length, 2);
  assert.deepEqual(
    hunks[1].lines.map((line) => [line.kind, line.oldLineNumber ?? null, line.newLineNumber ?? null]),
    [
      ["context", 20, 21],
      ["removed", 21, null],
      ["added", null, 22],
      ["context", 22, 23]
    ]
  );
});

test("parseFilePatch ignores the no-newline marker", () => {
  const patch = ["@@ -1 +1 @@", "-old", "\\ No newline at end of file", "+new", "\\ No newline at end of file"].join("\n");
  const [hunk] = parseFilePatch("a.txt", patch);

  assert.deepEqual(hunk.lines, [
    { kind: "removed", oldLineNumber: 1, text: "old" },
    { kind: "added", newLineNumber: 1, text: "new" }
  ]);
});

test("every hunk's line counts match its header", () => {
  const shapes = [
    [" a", "+b", "+c", " d"],
    ["-a", "-b", "+c"],
    ["+a", "+b", "+c", "+d", "+e"],
    [" a", "-b", " c", "+d", "-e", " f"]
  ];
  shapes.forEach((body, index) => {
    const oldCount = body.filter((line) => !line.startsWith("+")).length;
    const newCount = body.filter((line) => !line.startsWith("-")).length;
    const start = 10 * (index + 1);
    const patch = [`@@ -${start},${oldCount} +${start},${newCount} @@`, ...body].join("\n");
    const [hunk] = parseFilePatch("shape.ts", patch);
    assert.deepEqual(countSides(hunk), { old: hunk.oldLineCount, new: hunk.newLineCount });
    const newNumbers = hunk.lines.flatMap((line) => (line.newLineNumber === undefined ? [] : [line.newLineNumber]));
    assert.deepEqual(
      newNumbers,
      Array.from({ length: newCount }, (_, offset) => start + offset)
    );
  });
});

test("parseFilePatch rejects an unparsable hunk header", () => {
  const patch = ["@@ -1,2 +1,2 @@", " a", " b", "@@ broken @@", "+c"].join("\n");
  expectMalformed(() => parseFilePatch("foo.py", patch), 4, /unparsable hunk header/);
});

test("parseFilePatch rejects an unrecognized line marker", () => {
  const patch = ["@@ -1,2 +1,3 @@", " a", "?x", "+b"].join("\n");
  expectMalformed(() => parseFilePatch("foo.py", patch), 3, /unrecognized line marker "\?"/);
});

test("parseFilePatch rejects bodies that overrun or underrun the header", () => {
  expectMalformed(() => parseFilePatch("foo.py", ["@@ -1,1 +1,1 @@", " a", "+extra"].join("\n")), 3, /outside of any hunk/);
  expectMalformed(() => parseFilePatch("foo.py", ["@@ -1,3 +1,3 @@", " a"].join("\n")), null, /ended inside a hunk/);
});

test("mapFileDiffs skips malformed, deleted and binary files without dropping the rest", () => {
  const result = mapFileDiffs([
    { path: "bad.ts", status: "modified", patch: "@@ -1,2 +1,3 @@\n a\n?x\n+b" },
    { path: "foo.py", status: "modified", patch: FOO_PATCH },
    { path: "gone.ts", status: "removed", patch: "@@ -1 +0,0 @@\n-x" },
    { path: "logo.png", status: "modified", patch: null }
  ]);

  assert.deepEqual(
    result.files.map((file) => file.path),
    ["foo.py"]
  );
  assert.deepEqual(
    result.skipped.map((skipped) => [skipped.path, skipped.reason]),
    [
      ["bad.ts", "malformed"],
      ["gone.ts", "deleted"],
      ["logo.png", "binary"]
    ]
  );
  assert.ok(result.skipped[0].error instanceof MalformedDiffError);
});

test("mapFileDiffs keeps the previous path of renamed files", () => {
  const result = mapFileDiffs([
    { path: "b/src/new.ts", previousPath: "a/src/old.ts", status: "renamed", patch: "@@ -1 +1 @@\n-a\n+b" },
    { path: "src/same.ts", previousPath: "src/same.ts", status: "modified", patch: "@@ -1 +1 @@\n-a\n+b" }
  ]);

  assert.equal(result.files[0].path, "src/new.ts");
  assert.equal(result.files[0].previousPath, "src/old.ts");
  assert.equal(result.files[1].previousPath, undefined);
});

test("renderHunksForAnalysis prefixes lines with their new-file number", () => {
  const hunks = parseFilePatch("src/a.ts", ["@@ -1,3 +1,3 @@", " one", "-two", "+2", " three"].join("\n"));

  assert.equal(
    renderHunksForAnalysis([{ path: "src/a.ts", hunks }]),
    [
      "File: src/a.ts",
      "@@ -1,3 +1,3 @@",
      "     1  one",
      "       -two",
      "     2 +2",
      "     3  three"
    ].join("\n")
  );
});

test("normalizePath strips leading slash and a/ b/ prefixes", () => {
  assert.equal(normalizePath("/src/a.ts"), "src/a.ts");
  assert.equal(normalizePath("b/src/a.ts"), "src/a.ts");
  assert.equal(normalizePath("lib/b/c.ts"), "lib/b/c.ts");
});
