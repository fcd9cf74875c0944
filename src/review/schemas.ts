import { z } from "zod";
import { SEVERITIES } from "./severity.js";
import type { Finding } from "../analysis/types.js";

const LineSchema = z.union([
  z.number().int().positive(),
  z
    .string()
    .regex(/^\s*L?\d+\s*$/i)
    .transform((value) => Number(value.trim().replace(/^L/i, "")))
    .pipe(z.number().int().positive())
]);

export const FindingSchema = z.object({
  file: z.string().trim().min(1),
  line: LineSchema,
  severity: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(SEVERITIES)),
  message: z.string().trim().min(1),
  suggested_fix: z.string().nullish()
});

/**
 * The document around the findings. `findings` stays loose here so one odd
 * shape never rejects the whole answer; `findingEntries` normalizes it.
 */
export const AnalysisOutputSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { findings: value } : value),
  z.object({
    findings: z.unknown().optional()
  })
);

export type FindingEntries = { entries: unknown[]; shape: "list" | "single" | "missing" | "unexpected" };

export function findingEntries(value: unknown): FindingEntries {
  if (value === null || value === undefined) return { entries: [], shape: "missing" };
  if (Array.isArray(value)) return { entries: value, shape: "list" };
  if (typeof value === "object") return { entries: [value], shape: "single" };
  return { entries: [], shape: "unexpected" };
}

export type RawFinding = z.infer<typeof FindingSchema>;

export function toFinding(raw: RawFinding): Finding {
  const suggestedFix = raw.suggested_fix?.trim();
  return {
    filePath: raw.file,
    referencedLine: raw.line,
    severity: raw.severity,
    message: raw.message,
    ...(suggestedFix ? { suggestedFix } : {})
  };
}
