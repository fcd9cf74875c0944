import type { AppConfig } from "../config/env.js";
import { createAzureClient } from "./azure/adapter.js";
import { createGithubClient } from "./github/adapter.js";
import { createGitlabClient } from "./gitlab/adapter.js";
import type { ProviderClient } from "./types.js";

export function createProviderClient(config: AppConfig): ProviderClient {
  switch (config.platform) {
    case "github":
      return createGithubClient({
        repository: config.repository,
        token: config.githubToken,
        baseUrl: config.githubApiUrl
      });
    case "gitlab":
      return createGitlabClient({
        repository: config.repository,
        baseUrl: config.gitlabBaseUrl,
        token: config.gitlabApiToken
      });
    case "azure":
      return createAzureClient({
        orgUrl: config.azureOrgUrl,
        project: config.repository,
        token: config.azurePersonalAccessToken
      });
  }
}
