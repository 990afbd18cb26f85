/** `owner/name` */
export type RepositoryIdentifier = string;

export type RateLimitInfo = {
  limit?: number;
  remaining?: number;
  reset?: number;
};

export type FetchFailure = {
  kind: "rate_limited" | "request_failed";
  status?: number;
  message: string;
};

/**
 * Result of a paginated read. A failed outcome still carries the pages that
 * arrived before the failure.
 */
export type FetchOutcome<T> =
  | { ok: true; items: T[]; pages: number }
  | { ok: false; items: T[]; pages: number; failure: FetchFailure };

export type PullRequest = {
  repository: RepositoryIdentifier;
  number: number;
  title: string;
  author: string | null;
  url: string;
  updatedAt: string;
  requestedReviewers: string[];
  assignees: string[];
};

export type ReviewAssessment = {
  hasFeedback: boolean;
  isStale: boolean;
  feedbackSource: "comment" | "review" | null;
  feedbackLookup: "ok" | "failed";
};

export type AnnotatedPullRequest = {
  repository: RepositoryIdentifier;
  number: number;
  title: string;
  author: string | null;
  url: string;
  updatedAt: string;
  inProgress: boolean;
  stale: boolean;
  feedbackLookup: "ok" | "failed";
};

export type ReviewerEntry = {
  developer: string;
  reviewingPrs: AnnotatedPullRequest[];
};

export type RepositoryStatus = {
  repository: RepositoryIdentifier;
  ok: boolean;
  pullRequests: number;
  failure?: FetchFailure;
};

export type ReviewReport = {
  generatedAt: string;
  staleDays: number;
  reviewers: ReviewerEntry[];
  repositories: RepositoryStatus[];
};

export type MonthWindow = {
  label: string;
  since: string;
  until: string;
};

export type CommitCount = {
  label: string;
  commits: number;
  ok: boolean;
};

export type CommitReport = {
  generatedAt: string;
  months: MonthWindow[];
  repositories: { repository: RepositoryIdentifier; counts: CommitCount[] }[];
};

export type StoredArtifact = {
  key: string;
  uri: string;
  size: number;
};

export type CommentSummary = {
  author: string | null;
};

export type ReviewSummary = {
  author: string | null;
  state: string;
};
