import { Octokit } from "@octokit/rest";
import { normalizePostedBody } from "../body.js";
import type { FileDiff, ProviderClient, PullRequestRef } from "../types.js";

type GithubPull = {
  number: number;
  title: string;
  html_url?: string | null;
  draft?: boolean | null;
  head: { ref: string; sha: string };
  base: { ref: string };
};

export function mapGithubPull(repository: string, pull: GithubPull): PullRequestRef {
  return {
    id: `${repository}#${pull.number}`,
    number: pull.number,
    title: pull.title,
    url: pull.html_url ?? null,
    sourceBranch: pull.head.ref,
    targetBranch: pull.base.ref,
    latestSourceCommit: pull.head.sha,
    draft: Boolean(pull.draft)
  };
}

export function createGithubClient(params: {
  repository: string;
  token: string;
  baseUrl?: string | null;
  octokit?: Octokit;
}): ProviderClient {
  const [owner, repo] = params.repository.split("/");
  const octokit =
    params.octokit ??
    new Octokit({
      auth: params.token,
      userAgent: "prwatch",
      ...(params.baseUrl ? { baseUrl: params.baseUrl } : {})
    });

  return {
    provider: "github",
    repository: params.repository,
    listActivePullRequests: async (options) => {
      const pulls = await octokit.paginate(octokit.pulls.list, {
        owner,
        repo,
        state: "open",
        per_page: 100,
        request: { signal: options?.signal }
      });
      return pulls.map((pull) => mapGithubPull(params.repository, pull));
    },
    getDiff: async (pr, options) => {
      const files = await octokit.paginate(octokit.pulls.listFiles, {
        owner,
        repo,
        pull_number: pr.number,
        per_page: 100,
        request: { signal: options?.signal }
      });
      return files.map(
        (file): FileDiff => ({
          path: file.filename,
          ...(file.previous_filename ? { previousPath: file.previous_filename } : {}),
          status: file.status,
          patch: file.patch ?? null
        })
      );
    },
    // Context lines are addressable on the RIGHT side too, so the old line is not needed.
    postInlineComment: async (pr, { path, line, body }, options) => {
      const created = await octokit.pulls.createReviewComment({
        owner,
        repo,
        pull_number: pr.number,
        commit_id: pr.latestSourceCommit,
        body: normalizePostedBody(body),
        path,
        line,
        side: "RIGHT",
        request: { signal: options?.signal }
      });
      return { id: String(created.data.id), url: created.data.html_url || null };
    },
    postSummaryComment: async (pr, body, options) => {
      const created = await octokit.issues.createComment({
        owner,
        repo,
        issue_number: pr.number,
        body: normalizePostedBody(body),
        request: { signal: options?.signal }
      });
      return { id: String(created.data.id), url: created.data.html_url || null };
    }
  };
}
