import { z } from "zod";
import { ConfigError } from "../errors.js";
import { REVIEW_MODES, type ReviewMode } from "../analysis/types.js";
import { SEVERITIES, type Severity } from "../review/severity.js";

const EnvSchema = z.object({
  PLATFORM: z.enum(["github", "gitlab", "azure"]).default("github"),
  REPOSITORY: z.string().min(1),
  GITHUB_TOKEN: z.string().default(""),
  GITHUB_API_URL: z.string().default(""),
  GITLAB_BASE_URL: z.string().default("https://gitlab.com"),
  GITLAB_API_TOKEN: z.string().default(""),
  AZURE_DEVOPS_ORG_URL: z.string().default(""),
  AZURE_DEVOPS_PERSONAL_ACCESS_TOKEN: z.string().default(""),
  OPENAI_COMPAT_BASE_URL: z.string().min(1),
  OPENAI_COMPAT_API_KEY: z.string().min(1),
  OPENAI_COMPAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_TIMEOUT_MS: z.string().default("120000"),
  OPENAI_MAX_RETRIES: z.string().default("2"),
  POLL_INTERVAL_SECONDS: z.string().default("30"),
  REVIEW_MODE: z.enum(REVIEW_MODES).default("detailed"),
  COMMENT_THRESHOLD: z.enum(SEVERITIES).default("medium"),
  PLACEMENT_TOLERANCE: z.string().default("3"),
  MAX_INLINE_COMMENTS: z.string().default("50"),
  PARTIAL_PUBLISH_POLICY: z.enum(["accept", "retry"]).default("accept"),
  PLATFORM_TIMEOUT_MS: z.string().default("30000"),
  STATE_FILE: z.string().default(".prwatch-state.json"),
  IGNORE_PATHS: z.string().default(""),
  REVIEW_DRAFTS: z.string().default("false"),
  STATUS_PORT: z.string().default(""),
  LOG_LEVEL: z.string().default("info")
});

export type PartialPublishPolicy = "accept" | "retry";

export type AppConfig = {
  platform: "github" | "gitlab" | "azure";
  repository: string;
  githubToken: string;
  githubApiUrl: string | null;
  gitlabBaseUrl: string;
  gitlabApiToken: string;
  azureOrgUrl: string;
  azurePersonalAccessToken: string;
  openaiBaseUrl: string;
  openaiApiKey: string;
  openaiModel: string;
  openaiTimeoutMs: number;
  openaiMaxRetries: number;
  pollIntervalMs: number;
  reviewMode: ReviewMode;
  commentThreshold: Severity;
  placementTolerance: number;
  maxInlineComments: number;
  partialPublishPolicy: PartialPublishPolicy;
  platformTimeoutMs: number;
  stateFile: string;
  ignorePaths: string[];
  reviewDrafts: boolean;
  statusPort: number | null;
  logLevel: string;
};

function positiveInt(raw: string, fallback: number): number {
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

function nonNegativeInt(raw: string, fallback: number): number {
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? Math.floor(value) : fallback;
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parseConfig(source: Record<string, string | undefined>): AppConfig {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const parsed = result.data;
  const githubToken = parsed.GITHUB_TOKEN.trim();
  const gitlabApiToken = parsed.GITLAB_API_TOKEN.trim();
  const azureOrgUrl = parsed.AZURE_DEVOPS_ORG_URL.trim();
  const azurePersonalAccessToken = parsed.AZURE_DEVOPS_PERSONAL_ACCESS_TOKEN.trim();
  if (parsed.PLATFORM === "github" && !githubToken) {
    throw new ConfigError("Invalid configuration: GITHUB_TOKEN is required when PLATFORM=github");
  }
  if (parsed.PLATFORM === "gitlab" && !gitlabApiToken) {
    throw new ConfigError("Invalid configuration: GITLAB_API_TOKEN is required when PLATFORM=gitlab");
  }
  if (parsed.PLATFORM === "azure" && (!azureOrgUrl || !azurePersonalAccessToken)) {
    throw new ConfigError(
      "Invalid configuration: AZURE_DEVOPS_ORG_URL and AZURE_DEVOPS_PERSONAL_ACCESS_TOKEN are required when PLATFORM=azure"
    );
  }
  if (parsed.PLATFORM === "github" && !/^[^/\s]+\/[^/\s]+$/.test(parsed.REPOSITORY.trim())) {
    throw new ConfigError("Invalid configuration: REPOSITORY must look like owner/name for github");
  }
  const statusPort = parsed.STATUS_PORT.trim();
  return {
    platform: parsed.PLATFORM,
    repository: parsed.REPOSITORY.trim(),
    githubToken,
    githubApiUrl: parsed.GITHUB_API_URL.trim() || null,
    gitlabBaseUrl: parsed.GITLAB_BASE_URL.trim(),
    gitlabApiToken,
    azureOrgUrl,
    azurePersonalAccessToken,
    openaiBaseUrl: parsed.OPENAI_COMPAT_BASE_URL.trim(),
    openaiApiKey: parsed.OPENAI_COMPAT_API_KEY,
    openaiModel: parsed.OPENAI_COMPAT_MODEL,
    openaiTimeoutMs: positiveInt(parsed.OPENAI_TIMEOUT_MS, 120000),
    openaiMaxRetries: nonNegativeInt(parsed.OPENAI_MAX_RETRIES, 2),
    pollIntervalMs: positiveInt(parsed.POLL_INTERVAL_SECONDS, 30) * 1000,
    reviewMode: parsed.REVIEW_MODE,
    commentThreshold: parsed.COMMENT_THRESHOLD,
    placementTolerance: nonNegativeInt(parsed.PLACEMENT_TOLERANCE, 3),
    maxInlineComments: positiveInt(parsed.MAX_INLINE_COMMENTS, 50),
    partialPublishPolicy: parsed.PARTIAL_PUBLISH_POLICY,
    platformTimeoutMs: positiveInt(parsed.PLATFORM_TIMEOUT_MS, 30000),
    stateFile: parsed.STATE_FILE.trim(),
    ignorePaths: splitList(parsed.IGNORE_PATHS),
    reviewDrafts: parsed.REVIEW_DRAFTS.trim().toLowerCase() === "true",
    statusPort: statusPort ? positiveInt(statusPort, 3000) : null,
    logLevel: parsed.LOG_LEVEL
  };
}

let cached: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cached) return cached;
  cached = parseConfig(process.env);
  return cached;
}
