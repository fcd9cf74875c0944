import { setTimeout as delay } from "timers/promises";
import { z } from "zod";
import { AnalysisError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { parseAndValidateJson } from "../review/json.js";
import { AnalysisOutputSchema, FindingSchema, findingEntries, toFinding } from "../review/schemas.js";
import { buildSystemPrompt, buildUserPrompt } from "./prompts.js";
import type { Analyzer, Finding, ReviewMode } from "./types.js";

export type OpenAiAnalyzerOptions = {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
  retryDelayMs?: (attempt: number) => number;
};

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() })
      })
    )
    .min(1)
});

/** Keeps every well-formed finding and drops the rest one by one. */
export function parseFindings(raw: string, logger?: Logger): Finding[] {
  let output: z.infer<typeof AnalysisOutputSchema>;
  try {
    output = parseAndValidateJson(raw, AnalysisOutputSchema);
  } catch (err) {
    throw new AnalysisError(`analyzer returned unparsable output: ${errorMessage(err)}`, { cause: err });
  }
  const { entries, shape } = findingEntries(output.findings);
  if (shape === "unexpected") {
    logger?.debug({ type: typeof output.findings }, "analyzer findings are neither a list nor an object; ignoring");
  }
  const findings: Finding[] = [];
  entries.forEach((entry, index) => {
    const parsed = FindingSchema.safeParse(entry);
    if (!parsed.success) {
      logger?.debug({ index, issues: parsed.error.issues.map((issue) => issue.message) }, "dropping malformed finding");
      return;
    }
    findings.push(toFinding(parsed.data));
  });
  return findings;
}

export function createOpenAiAnalyzer(options: OpenAiAnalyzerOptions): Analyzer {
  const fetchImpl = options.fetchImpl ?? fetch;
  const retryDelayMs = options.retryDelayMs ?? ((attempt: number) => Math.min(1000 * 2 ** (attempt - 1), 10000));
  const url = `${options.baseUrl.replace(/\/$/, "")}/chat/completions`;

  async function requestCompletion(diffText: string, mode: ReviewMode, cancel?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
    const onCancel = () => controller.abort();
    cancel?.addEventListener("abort", onCancel, { once: true });
    try {
      const res = await fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          model: options.model,
          temperature: 0.3,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: buildSystemPrompt(mode) },
            { role: "user", content: buildUserPrompt(diffText) }
          ]
        }),
        signal: controller.signal
      });
      if (!res.ok) {
        const text = await res.text();
        throw new AnalysisError(`analyzer API error ${res.status}: ${text.slice(0, 500)}`);
      }
      const json: unknown = await res.json();
      const parsed = ChatCompletionSchema.safeParse(json);
      if (!parsed.success) {
        throw new AnalysisError("analyzer API returned an unexpected response shape");
      }
      return parsed.data.choices[0].message.content ?? "";
    } catch (err) {
      if (err instanceof AnalysisError) throw err;
      if (cancel?.aborted) {
        throw new AnalysisError("analyzer request cancelled", { cause: err });
      }
      if (controller.signal.aborted) {
        throw new AnalysisError(`analyzer request timed out after ${options.timeoutMs}ms`, { cause: err });
      }
      throw new AnalysisError(`analyzer request failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timeout);
      cancel?.removeEventListener("abort", onCancel);
    }
  }

  return {
    analyze: async (diffText, mode, analyzeOptions) => {
      if (diffText.trim().length === 0) return [];
      const signal = analyzeOptions?.signal;
      let attempt = 0;
      while (true) {
        try {
          const content = await requestCompletion(diffText, mode, signal);
          if (content.trim().length === 0) return [];
          return parseFindings(content, options.logger);
        } catch (err) {
          attempt += 1;
          if (attempt > options.maxRetries || signal?.aborted) throw err;
          options.logger.warn({ attempt, err: errorMessage(err) }, "analyzer call failed; retrying");
          try {
            await delay(retryDelayMs(attempt), undefined, signal ? { signal } : undefined);
          } catch (delayErr) {
            if (!signal?.aborted) throw delayErr;
            throw err;
          }
        }
      }
    }
  };
}
