import test from "node:test";
import assert from "node:assert/strict";
import { createOpenAiAnalyzer, parseFindings } from "../src/analysis/openaiAnalyzer.js";
import { buildSystemPrompt, buildUserPrompt } from "../src/analysis/prompts.js";
import { AnalysisError } from "../src/errors.js";
import { logger } from "./helpers/fakes.js";

function completion(content: string | null, status = 200): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

function analyzerWith(responses: Response[], maxRetries = 0) {
  const requests: Array<{ url: string; body: unknown }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : null
    });
    const next = responses.shift();
    if (!next) throw new Error("no response queued");
    return next;
  };
  const analyzer = createOpenAiAnalyzer({
    baseUrl: "http://llm.test/v1/",
    apiKey: "test-secret",
    model: "review-model",
    timeoutMs: 1000,
    maxRetries,
    logger,
    fetchImpl,
    retryDelayMs: () => 0
  });
  return { analyzer, requests };
}

test("parseFindings keeps well-formed findings and normalizes their fields", () => {
  const raw = JSON.stringify({
    findings: [
      { file: "foo.py", line: 11, severity: "HIGH", message: "Possible None dereference", suggested_fix: "return None" },
      { file: "foo.py", line: "L12", severity: "low", message: "naming", suggested_fix: null }
    ]
  });

  assert.deepEqual(parseFindings(raw), [
    {
      filePath: "foo.py",
      referencedLine: 11,
      severity: "high",
      message: "Possible None dereference",
      suggestedFix: "return None"
    },
    { filePath: "foo.py", referencedLine: 12, severity: "low", message: "naming" }
  ]);
});

test("parseFindings drops malformed entries one by one", () => {
  const raw = JSON.stringify([
    { file: "a.ts", line: 3, severity: "urgent", message: "unknown severity" },
    { file: "a.ts", line: 0, severity: "low", message: "line zero" },
    { file: "", line: 4, severity: "low", message: "no file" },
    { file: "a.ts", line: 5, severity: "medium", message: "kept" }
  ]);

  assert.deepEqual(parseFindings(raw), [
    { filePath: "a.ts", referencedLine: 5, severity: "medium", message: "kept" }
  ]);
});

test("parseFindings repairs fenced output with trailing commas", () => {
  const raw = '```json\n{"findings": [{"file": "a.py", "line": "7", "severity": "critical", "message": "eval on input",},]}\n```';

  assert.deepEqual(parseFindings(raw), [
    { filePath: "a.py", referencedLine: 7, severity: "critical", message: "eval on input" }
  ]);
});

test("parseFindings treats a missing findings list as empty", () => {
  assert.deepEqual(parseFindings("{}"), []);
});

test("parseFindings treats null findings as empty", () => {
  assert.deepEqual(parseFindings('{"findings": null}'), []);
});

test("parseFindings accepts a single finding object in place of a list", () => {
  const raw = JSON.stringify({ findings: { file: "a.py", line: 3, severity: "high", message: "unchecked input" } });

  assert.deepEqual(parseFindings(raw), [
    { filePath: "a.py", referencedLine: 3, severity: "high", message: "unchecked input" }
  ]);
});

test("parseFindings ignores findings of any other type", () => {
  assert.deepEqual(parseFindings('{"findings": "none"}'), []);
  assert.deepEqual(parseFindings('{"findings": 3}'), []);
});

test("parseFindings rejects output that is not a findings document", () => {
  assert.throws(() => parseFindings("<html>502 Bad Gateway</html>"), AnalysisError);
});

test("parseFindings closes a truncated array and drops entries that are not findings", () => {
  assert.deepEqual(parseFindings("[1, 2"), []);
});

test("the analyzer posts both prompts and parses the completion", async () => {
  const content = JSON.stringify({
    findings: [{ file: "foo.py", line: 11, severity: "high", message: "Possible None dereference" }]
  });
  const { analyzer, requests } = analyzerWith([completion(content)]);

  const findings = await analyzer.analyze("File: foo.py", "security-focused");

  assert.deepEqual(findings, [
    { filePath: "foo.py", referencedLine: 11, severity: "high", message: "Possible None dereference" }
  ]);
  assert.equal(requests.length, 1);
  assert.equal(requests[0].url, "http://llm.test/v1/chat/completions");
  assert.deepEqual(requests[0].body, {
    model: "review-model",
    temperature: 0.3,
    response_format: { type: "json_object" },
    messages: [
      { role: "system", content: buildSystemPrompt("security-focused") },
      { role: "user", content: buildUserPrompt("File: foo.py") }
    ]
  });
});

test("the analyzer retries failed calls up to the configured limit", async () => {
  const { analyzer, requests } = analyzerWith(
    [new Response("overloaded", { status: 500 }), completion('{"findings": []}')],
    1
  );

  assert.deepEqual(await analyzer.analyze("File: foo.py", "quick"), []);
  assert.equal(requests.length, 2);
});

test("the analyzer gives up once retries are exhausted", async () => {
  const { analyzer, requests } = analyzerWith(
    [new Response("overloaded", { status: 500 }), new Response("still overloaded", { status: 503 })],
    1
  );

  await assert.rejects(analyzer.analyze("File: foo.py", "quick"), (err: unknown) => {
    assert.ok(err instanceof AnalysisError);
    assert.equal(err.message, "analyzer API error 503: still overloaded");
    return true;
  });
  assert.equal(requests.length, 2);
});

test("an aborted analysis stops the request and does not retry", async () => {
  let calls = 0;
  const fetchImpl: typeof fetch = (_input, init) => {
    calls += 1;
    const signal = init?.signal;
    return new Promise<Response>((_, reject) => {
      signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  };
  const analyzer = createOpenAiAnalyzer({
    baseUrl: "http://llm.test/v1",
    apiKey: "test-secret",
    model: "review-model",
    timeoutMs: 60000,
    maxRetries: 3,
    logger,
    fetchImpl,
    retryDelayMs: () => 0
  });
  const controller = new AbortController();

  const pending = analyzer.analyze("File: foo.py", "quick", { signal: controller.signal });
  controller.abort();

  await assert.rejects(pending, (err: unknown) => {
    assert.ok(err instanceof AnalysisError);
    assert.equal(err.message, "analyzer request cancelled");
    return true;
  });
  assert.equal(calls, 1);
});

test("the analyzer skips the call for an empty diff and accepts empty content", async () => {
  const empty = analyzerWith([]);
  assert.deepEqual(await empty.analyzer.analyze("  \n", "detailed"), []);
  assert.equal(empty.requests.length, 0);

  const silent = analyzerWith([completion(null)]);
  assert.deepEqual(await silent.analyzer.analyze("File: foo.py", "detailed"), []);
});

test("each review mode has its own focus list", () => {
  assert.match(buildSystemPrompt("security-focused"), /Injection attacks \(SQL, XSS, command\)/);
  assert.match(buildSystemPrompt("quick"), /Be concise but actionable\./);
  assert.doesNotMatch(buildSystemPrompt("detailed"), /Injection attacks/);
});
