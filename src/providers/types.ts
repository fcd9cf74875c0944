export type ProviderKind = "github" | "gitlab" | "azure";

/** A reviewable pull request revision. `id` is stable across pushes; `latestSourceCommit` is not. */
export type PullRequestRef = {
  id: string;
  number: number;
  title: string;
  url?: string | null;
  /** Provider key of the repository the PR lives in, where the project holds several. */
  repositoryId?: string;
  sourceBranch: string;
  targetBranch: string;
  latestSourceCommit: string;
  draft: boolean;
};

export type FileDiff = {
  path: string;
  previousPath?: string;
  status?: "added" | "modified" | "removed" | "renamed" | string;
  patch?: string | null;
};

export type ProviderComment = {
  id: string;
  url?: string | null;
};

/**
 * Where an inline comment goes. `line` is always on the new side; `oldLine`
 * is set when that line is unchanged context and so also exists on the old side.
 */
export type InlineCommentTarget = {
  path: string;
  previousPath?: string;
  line: number;
  oldLine?: number;
  body: string;
};

export type RequestOptions = {
  signal?: AbortSignal;
};

export type ProviderClient = {
  provider: ProviderKind;
  repository: string;
  listActivePullRequests: (options?: RequestOptions) => Promise<PullRequestRef[]>;
  getDiff: (pr: PullRequestRef, options?: RequestOptions) => Promise<FileDiff[]>;
  postInlineComment: (
    pr: PullRequestRef,
    comment: InlineCommentTarget,
    options?: RequestOptions
  ) => Promise<ProviderComment>;
  postSummaryComment: (pr: PullRequestRef, body: string, options?: RequestOptions) => Promise<ProviderComment>;
};
