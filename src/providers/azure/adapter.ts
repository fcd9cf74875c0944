import { createPatch } from "diff";
import { z } from "zod";
import { normalizePostedBody } from "../body.js";
import type { FileDiff, ProviderClient, PullRequestRef } from "../types.js";

const API_VERSION = "7.0";
const PAGE_SIZE = 100;

const RepositorySchema = z.object({
  id: z.string(),
  name: z.string(),
  webUrl: z.string().nullish()
});

const RepositoryListSchema = z.object({
  value: z.array(RepositorySchema).default([])
});

const PullRequestSchema = z.object({
  pullRequestId: z.number().int(),
  title: z.string().default(""),
  sourceRefName: z.string(),
  targetRefName: z.string(),
  isDraft: z.boolean().optional(),
  lastMergeSourceCommit: z.object({ commitId: z.string() }).nullish()
});

const PullRequestListSchema = z.object({
  value: z.array(PullRequestSchema).default([])
});

const IterationListSchema = z.object({
  value: z
    .array(
      z.object({
        id: z.number().int(),
        sourceRefCommit: z.object({ commitId: z.string() }).nullish(),
        commonRefCommit: z.object({ commitId: z.string() }).nullish()
      })
    )
    .default([])
});

const IterationChangesSchema = z.object({
  changeEntries: z
    .array(
      z.object({
        changeType: z.string(),
        originalPath: z.string().nullish(),
        item: z.object({
          path: z.string(),
          gitObjectType: z.string().nullish(),
          isFolder: z.boolean().optional()
        })
      })
    )
    .default([])
});

const ItemSchema = z.object({
  content: z.string().nullish(),
  contentMetadata: z.object({ isBinary: z.boolean().optional() }).nullish()
});

const ThreadSchema = z.object({
  id: z.number().int(),
  comments: z.array(z.object({ id: z.number().int() })).default([])
});

type AzureRepository = z.infer<typeof RepositorySchema>;
type AzurePullRequest = z.infer<typeof PullRequestSchema>;

function branchName(ref: string): string {
  return ref.replace(/^refs\/heads\//, "");
}

export function mapAzurePullRequest(project: string, repo: AzureRepository, pr: AzurePullRequest): PullRequestRef {
  return {
    id: `${project}/${repo.name}#${pr.pullRequestId}`,
    number: pr.pullRequestId,
    title: pr.title,
    url: repo.webUrl ? `${repo.webUrl}/pullrequest/${pr.pullRequestId}` : null,
    repositoryId: repo.id,
    sourceBranch: branchName(pr.sourceRefName),
    targetBranch: branchName(pr.targetRefName),
    latestSourceCommit: pr.lastMergeSourceCommit?.commitId ?? "",
    draft: Boolean(pr.isDraft)
  };
}

/** `changeType` is a comma-separated flag list such as "rename, edit". */
function changeFlags(changeType: string): Set<string> {
  return new Set(
    changeType
      .split(",")
      .map((flag) => flag.trim().toLowerCase())
      .filter((flag) => flag.length > 0)
  );
}

/**
 * Azure DevOps has no per-file patch endpoint, so each changed file is read at
 * both ends of the latest iteration and diffed locally.
 */
export function createAzureClient(params: {
  orgUrl: string;
  project: string;
  token: string;
  fetchImpl?: typeof fetch;
}): ProviderClient {
  const fetchImpl = params.fetchImpl ?? fetch;
  const gitBase = `${params.orgUrl.replace(/\/$/, "")}/${encodeURIComponent(params.project)}/_apis/git`;
  const authorization = `Basic ${Buffer.from(`:${params.token}`).toString("base64")}`;

  async function azureRequest<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { method?: string; body?: Record<string, unknown>; signal?: AbortSignal } = {}
  ): Promise<T> {
    const separator = path.includes("?") ? "&" : "?";
    const res = await fetchImpl(`${gitBase}${path}${separator}api-version=${API_VERSION}`, {
      method: options.method || "GET",
      headers: {
        Authorization: authorization,
        "Content-Type": "application/json"
      },
      body: options.body ? JSON.stringify(options.body) : undefined,
      signal: options.signal
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Azure DevOps API ${res.status}: ${text}`);
    }
    return schema.parse(await res.json());
  }

  function repositoryOf(pr: PullRequestRef): string {
    if (!pr.repositoryId) {
      throw new Error(`pull request ${pr.id} has no repository id`);
    }
    return encodeURIComponent(pr.repositoryId);
  }

  async function readFile(repoId: string, path: string, commitId: string, signal?: AbortSignal) {
    const query = new URLSearchParams({
      path,
      "versionDescriptor.version": commitId,
      "versionDescriptor.versionType": "commit",
      includeContent: "true",
      $format: "json"
    });
    const item = await azureRequest(`/repositories/${repoId}/items?${query.toString()}`, ItemSchema, { signal });
    if (item.contentMetadata?.isBinary) return null;
    return item.content ?? null;
  }

  async function listActiveInRepository(repo: AzureRepository, signal?: AbortSignal): Promise<AzurePullRequest[]> {
    const all: AzurePullRequest[] = [];
    for (let skip = 0; ; skip += PAGE_SIZE) {
      const page = await azureRequest(
        `/repositories/${encodeURIComponent(repo.id)}/pullrequests?searchCriteria.status=active&$top=${PAGE_SIZE}&$skip=${skip}`,
        PullRequestListSchema,
        { signal }
      );
      all.push(...page.value);
      if (page.value.length < PAGE_SIZE) break;
    }
    return all;
  }

  return {
    provider: "azure",
    repository: params.project,
    listActivePullRequests: async (options) => {
      const repos = await azureRequest("/repositories", RepositoryListSchema, { signal: options?.signal });
      const pulls: PullRequestRef[] = [];
      for (const repo of repos.value) {
        const active = await listActiveInRepository(repo, options?.signal);
        pulls.push(...active.map((pr) => mapAzurePullRequest(params.project, repo, pr)));
      }
      return pulls;
    },
    getDiff: async (pr, options) => {
      const signal = options?.signal;
      const repoId = repositoryOf(pr);
      const iterations = await azureRequest(`/repositories/${repoId}/pullRequests/${pr.number}/iterations`, IterationListSchema, {
        signal
      });
      const latest = iterations.value.reduce<(typeof iterations.value)[number] | null>(
        (best, iteration) => (!best || iteration.id > best.id ? iteration : best),
        null
      );
      if (!latest) return [];
      const headCommit = latest.sourceRefCommit?.commitId ?? pr.latestSourceCommit;
      const baseCommit = latest.commonRefCommit?.commitId;
      if (!baseCommit) {
        throw new Error(`iteration ${latest.id} of ${pr.id} has no common commit`);
      }

      const changes = await azureRequest(
        `/repositories/${repoId}/pullRequests/${pr.number}/iterations/${latest.id}/changes?$top=2000`,
        IterationChangesSchema,
        { signal }
      );
      const files: FileDiff[] = [];
      for (const entry of changes.changeEntries) {
        if (entry.item.isFolder || (entry.item.gitObjectType && entry.item.gitObjectType !== "blob")) continue;
        const path = entry.item.path.replace(/^\//, "");
        const flags = changeFlags(entry.changeType);
        if (flags.has("delete")) {
          files.push({ path, status: "removed", patch: null });
          continue;
        }
        const previousPath =
          flags.has("rename") && entry.originalPath ? entry.originalPath.replace(/^\//, "") : undefined;
        const added = flags.has("add");
        const next = await readFile(repoId, entry.item.path, headCommit, signal);
        const previous = added ? "" : await readFile(repoId, entry.originalPath ?? entry.item.path, baseCommit, signal);
        files.push({
          path,
          ...(previousPath ? { previousPath } : {}),
          status: added ? "added" : previousPath ? "renamed" : "modified",
          patch: next === null || previous === null ? null : createPatch(path, previous, next, "", "", { context: 3 })
        });
      }
      return files;
    },
    // Right-side anchors address context lines too, so the old line is not needed.
    postInlineComment: async (pr, { path, line, body }, options) => {
      const thread = await azureRequest(`/repositories/${repositoryOf(pr)}/pullRequests/${pr.number}/threads`, ThreadSchema, {
        method: "POST",
        body: {
          comments: [{ parentCommentId: 0, content: normalizePostedBody(body), commentType: 1 }],
          status: "active",
          threadContext: {
            filePath: `/${path}`,
            rightFileStart: { line, offset: 1 },
            rightFileEnd: { line, offset: 1 }
          }
        },
        signal: options?.signal
      });
      const first = thread.comments[0];
      return { id: first ? `${thread.id}/${first.id}` : String(thread.id), url: null };
    },
    postSummaryComment: async (pr, body, options) => {
      const thread = await azureRequest(`/repositories/${repositoryOf(pr)}/pullRequests/${pr.number}/threads`, ThreadSchema, {
        method: "POST",
        body: {
          comments: [{ parentCommentId: 0, content: normalizePostedBody(body), commentType: 1 }],
          status: "active"
        },
        signal: options?.signal
      });
      return { id: String(thread.id), url: null };
    }
  };
}
