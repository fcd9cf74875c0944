import test from "node:test";
import assert from "node:assert/strict";
import { parseConfig } from "../src/config/env.js";
import { ConfigError } from "../src/errors.js";

const minimal = {
  REPOSITORY: "acme/widgets",
  GITHUB_TOKEN: "test-secret",
  OPENAI_COMPAT_BASE_URL: "http://llm.test/v1",
  OPENAI_COMPAT_API_KEY: "test-secret"
};

test("parseConfig fills defaults for a minimal GitHub setup", () => {
  assert.deepEqual(parseConfig(minimal), {
    platform: "github",
    repository: "acme/widgets",
    githubToken: "test-secret",
    githubApiUrl: null,
    gitlabBaseUrl: "https://gitlab.com",
    gitlabApiToken: "",
    azureOrgUrl: "",
    azurePersonalAccessToken: "",
    openaiBaseUrl: "http://llm.test/v1",
    openaiApiKey: "test-secret",
    openaiModel: "gpt-4o-mini",
    openaiTimeoutMs: 120000,
    openaiMaxRetries: 2,
    pollIntervalMs: 30000,
    reviewMode: "detailed",
    commentThreshold: "medium",
    placementTolerance: 3,
    maxInlineComments: 50,
    partialPublishPolicy: "accept",
    platformTimeoutMs: 30000,
    stateFile: ".prwatch-state.json",
    ignorePaths: [],
    reviewDrafts: false,
    statusPort: null,
    logLevel: "info"
  });
});

test("parseConfig reads overrides", () => {
  const config = parseConfig({
    ...minimal,
    POLL_INTERVAL_SECONDS: "5",
    REVIEW_MODE: "security-focused",
    COMMENT_THRESHOLD: "high",
    PLACEMENT_TOLERANCE: "0",
    PARTIAL_PUBLISH_POLICY: "retry",
    IGNORE_PATHS: " dist/** , *.lock ,",
    REVIEW_DRAFTS: "TRUE",
    STATUS_PORT: "8080"
  });

  assert.equal(config.pollIntervalMs, 5000);
  assert.equal(config.reviewMode, "security-focused");
  assert.equal(config.commentThreshold, "high");
  assert.equal(config.placementTolerance, 0);
  assert.equal(config.partialPublishPolicy, "retry");
  assert.deepEqual(config.ignorePaths, ["dist/**", "*.lock"]);
  assert.equal(config.reviewDrafts, true);
  assert.equal(config.statusPort, 8080);
});

test("parseConfig falls back on unusable numbers", () => {
  const config = parseConfig({ ...minimal, POLL_INTERVAL_SECONDS: "soon", MAX_INLINE_COMMENTS: "-4" });

  assert.equal(config.pollIntervalMs, 30000);
  assert.equal(config.maxInlineComments, 50);
});

test("parseConfig rejects missing and invalid values", () => {
  assert.throws(
    () => parseConfig({ ...minimal, REPOSITORY: undefined }),
    (err: unknown) => err instanceof ConfigError && err.message === "Invalid configuration: REPOSITORY: Required"
  );
  assert.throws(() => parseConfig({ ...minimal, COMMENT_THRESHOLD: "urgent" }), ConfigError);
  assert.throws(() => parseConfig({ ...minimal, REVIEW_MODE: "thorough" }), ConfigError);
  assert.throws(
    () => parseConfig({ ...minimal, GITHUB_TOKEN: " " }),
    /GITHUB_TOKEN is required when PLATFORM=github/
  );
  assert.throws(() => parseConfig({ ...minimal, REPOSITORY: "widgets" }), /must look like owner\/name/);
});

test("parseConfig requires a GitLab token for GitLab", () => {
  const gitlab = { ...minimal, PLATFORM: "gitlab", REPOSITORY: "group/sub/widgets" };

  assert.throws(() => parseConfig(gitlab), /GITLAB_API_TOKEN is required when PLATFORM=gitlab/);
  const config = parseConfig({ ...gitlab, GITLAB_API_TOKEN: "test-secret" });
  assert.equal(config.platform, "gitlab");
  assert.equal(config.repository, "group/sub/widgets");
});

test("parseConfig requires an organization URL and token for Azure DevOps", () => {
  const azure = { ...minimal, PLATFORM: "azure", REPOSITORY: "Widgets", GITHUB_TOKEN: undefined };

  assert.throws(
    () => parseConfig({ ...azure, AZURE_DEVOPS_ORG_URL: "https://dev.azure.test/acme" }),
    /AZURE_DEVOPS_ORG_URL and AZURE_DEVOPS_PERSONAL_ACCESS_TOKEN are required when PLATFORM=azure/
  );
  const config = parseConfig({
    ...azure,
    AZURE_DEVOPS_ORG_URL: " https://dev.azure.test/acme ",
    AZURE_DEVOPS_PERSONAL_ACCESS_TOKEN: "test-secret"
  });
  assert.equal(config.platform, "azure");
  assert.equal(config.repository, "Widgets");
  assert.equal(config.azureOrgUrl, "https://dev.azure.test/acme");
  assert.equal(config.azurePersonalAccessToken, "test-secret");
});
