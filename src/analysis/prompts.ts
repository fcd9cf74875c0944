import type { ReviewMode } from "./types.js";

const BASE_PROMPT =
  "You are an expert code reviewer with deep knowledge of best practices, security, performance, and code quality. " +
  "Review the pull request diff you are given and report constructive, actionable findings.";

const FOCUS: Record<ReviewMode, string[]> = {
  detailed: [
    "Review the changes thoroughly and identify:",
    "1. Potential bugs and errors",
    "2. Security vulnerabilities",
    "3. Performance issues",
    "4. Code quality and maintainability",
    "5. Adherence to best practices and coding standards",
    "6. Documentation needs"
  ],
  quick: [
    "Provide a quick review focusing on:",
    "1. Critical bugs",
    "2. Security issues",
    "3. Obvious code quality problems",
    "Be concise but actionable."
  ],
  "security-focused": [
    "Focus primarily on security vulnerabilities:",
    "1. Injection attacks (SQL, XSS, command)",
    "2. Authentication and authorization issues",
    "3. Sensitive data exposure",
    "4. Insecure dependencies",
    "5. Misconfiguration",
    "6. Cryptographic failures"
  ]
};

const OUTPUT_RULES = [
  "Respond with JSON only, no prose, shaped as:",
  '{"findings": [{"file": "path/in/repo.ts", "line": 12, "severity": "low|medium|high|critical", "message": "what is wrong and why", "suggested_fix": "replacement code (optional)"}]}',
  "Rules:",
  "- Each diff line is prefixed with its line number in the new file. Use that number for `line`.",
  "- Only comment on added (+) lines or the context lines right next to them.",
  "- Removed (-) lines have no new-file number; do not report findings on them.",
  "- One finding per root cause. If there are no issues, return {\"findings\": []}."
];

export function buildSystemPrompt(mode: ReviewMode): string {
  return [BASE_PROMPT, "", ...FOCUS[mode], "", ...OUTPUT_RULES].join("\n");
}

export function buildUserPrompt(diffText: string): string {
  return `Please review the following pull request changes:\n\n${diffText}`;
}
