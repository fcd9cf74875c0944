import { z } from "zod";
import { normalizePostedBody } from "../body.js";
import type { FileDiff, InlineCommentTarget, ProviderClient, PullRequestRef } from "../types.js";

const MergeRequestSchema = z.object({
  iid: z.number().int(),
  title: z.string().default(""),
  web_url: z.string().nullish(),
  source_branch: z.string(),
  target_branch: z.string(),
  sha: z.string().nullish(),
  draft: z.boolean().optional(),
  work_in_progress: z.boolean().optional(),
  diff_refs: z
    .object({
      base_sha: z.string(),
      start_sha: z.string(),
      head_sha: z.string()
    })
    .nullish()
});

const ChangesSchema = z.object({
  changes: z
    .array(
      z.object({
        old_path: z.string(),
        new_path: z.string(),
        new_file: z.boolean().default(false),
        renamed_file: z.boolean().default(false),
        deleted_file: z.boolean().default(false),
        diff: z.string().nullish()
      })
    )
    .default([])
});

const NoteSchema = z.object({
  id: z.union([z.number(), z.string()])
});

const DiscussionSchema = z.object({
  id: z.string(),
  notes: z.array(NoteSchema).default([])
});

type MergeRequest = z.infer<typeof MergeRequestSchema>;

export function mapMergeRequest(repository: string, mr: MergeRequest): PullRequestRef {
  return {
    id: `${repository}!${mr.iid}`,
    number: mr.iid,
    title: mr.title,
    url: mr.web_url ?? null,
    sourceBranch: mr.source_branch,
    targetBranch: mr.target_branch,
    latestSourceCommit: mr.sha || mr.diff_refs?.head_sha || "",
    draft: Boolean(mr.draft || mr.work_in_progress)
  };
}

/**
 * GitLab needs both sides of a position: `old_path` always, and `old_line`
 * as well when the line is unchanged context.
 */
export function buildDiffPosition(
  diffRefs: { base_sha: string; start_sha: string; head_sha: string },
  target: InlineCommentTarget
): Record<string, string | number> {
  return {
    position_type: "text",
    base_sha: diffRefs.base_sha,
    start_sha: diffRefs.start_sha,
    head_sha: diffRefs.head_sha,
    old_path: target.previousPath ?? target.path,
    new_path: target.path,
    new_line: target.line,
    ...(target.oldLine !== undefined ? { old_line: target.oldLine } : {})
  };
}

export function createGitlabClient(params: {
  repository: string;
  baseUrl: string;
  token: string;
  fetchImpl?: typeof fetch;
}): ProviderClient {
  const fetchImpl = params.fetchImpl ?? fetch;
  const project = encodeURIComponent(params.repository);

  async function gitlabRequest<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { method?: string; body?: Record<string, unknown>; signal?: AbortSignal } = {}
  ): Promise<T> {
    const url = `${params.baseUrl.replace(/\/$/, "")}/api/v4${path}`;
    const res = await fetchImpl(url, {
      method: options.method || "GET",
      headers: {
        "Content-Type": "application/json",
        "PRIVATE-TOKEN": params.token
      },
      body: options.body ? JSON.stringify(options.body) : undefined,
      signal: options.signal
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`GitLab API ${res.status}: ${text}`);
    }
    return schema.parse(await res.json());
  }

  async function listOpenMergeRequests(signal?: AbortSignal): Promise<MergeRequest[]> {
    const all: MergeRequest[] = [];
    for (let page = 1; ; page += 1) {
      const batch = await gitlabRequest(
        `/projects/${project}/merge_requests?state=opened&per_page=100&page=${page}`,
        z.array(MergeRequestSchema),
        { signal }
      );
      all.push(...batch);
      if (batch.length < 100) break;
    }
    return all;
  }

  return {
    provider: "gitlab",
    repository: params.repository,
    listActivePullRequests: async (options) => {
      const mergeRequests = await listOpenMergeRequests(options?.signal);
      return mergeRequests.map((mr) => mapMergeRequest(params.repository, mr));
    },
    getDiff: async (pr, options) => {
      const data = await gitlabRequest(`/projects/${project}/merge_requests/${pr.number}/changes`, ChangesSchema, {
        signal: options?.signal
      });
      return data.changes.map(
        (change): FileDiff => ({
          path: change.new_path || change.old_path,
          ...(change.renamed_file ? { previousPath: change.old_path } : {}),
          status: change.new_file
            ? "added"
            : change.deleted_file
              ? "removed"
              : change.renamed_file
                ? "renamed"
                : "modified",
          patch: change.diff || null
        })
      );
    },
    postInlineComment: async (pr, target, options) => {
      const signal = options?.signal;
      const mr = await gitlabRequest(`/projects/${project}/merge_requests/${pr.number}`, MergeRequestSchema, {
        signal
      });
      if (!mr.diff_refs) {
        throw new Error(`merge request !${pr.number} has no diff_refs yet`);
      }
      const discussion = await gitlabRequest(
        `/projects/${project}/merge_requests/${pr.number}/discussions`,
        DiscussionSchema,
        {
          method: "POST",
          body: {
            body: normalizePostedBody(target.body),
            position: buildDiffPosition(mr.diff_refs, target)
          },
          signal
        }
      );
      const first = discussion.notes[0];
      return { id: first ? String(first.id) : discussion.id, url: null };
    },
    postSummaryComment: async (pr, body, options) => {
      const note = await gitlabRequest(`/projects/${project}/merge_requests/${pr.number}/notes`, NoteSchema, {
        method: "POST",
        body: { body: normalizePostedBody(body) },
        signal: options?.signal
      });
      return { id: String(note.id), url: null };
    }
  };
}
