import type { GitHubClient } from "../github.js";
import { logger, type ContextLogger } from "../logger.js";
import { assessReview, DEFAULT_STALE_DAYS } from "../review.js";
import type {
  AnnotatedPullRequest,
  PullRequest,
  RepositoryIdentifier,
  RepositoryStatus,
  ReviewAssessment,
  ReviewReport
} from "../types.js";
import { withDuration } from "../utils.js";

export type ReviewJobClient = Pick<
  GitHubClient,
  "listOpenPullRequests" | "listIssueComments" | "listReviews"
>;

export type ReviewJobArgs = {
  client: ReviewJobClient;
  repositories: RepositoryIdentifier[];
  developers: string[];
  staleDays?: number;
  now?: Date;
  logger?: ContextLogger;
};

/**
 * Open pull requests across `repositories`, read one repository at a time.
 * A repository whose listing fails contributes the pull requests read before
 * the failure and a non-ok status.
 */
export async function collectOpenPullRequests(
  client: Pick<GitHubClient, "listOpenPullRequests">,
  repositories: RepositoryIdentifier[],
  jobLogger: ContextLogger = logger
) {
  const pullRequests: PullRequest[] = [];
  const statuses: RepositoryStatus[] = [];

  for (const repository of repositories) {
    const outcome = await client.listOpenPullRequests(repository);
    pullRequests.push(...outcome.items);
    if (outcome.ok) {
      statuses.push({ repository, ok: true, pullRequests: outcome.items.length });
      jobLogger.info("reviews.repository.done", {
        repository,
        pullRequests: outcome.items.length
      });
    } else {
      statuses.push({
        repository,
        ok: false,
        pullRequests: outcome.items.length,
        failure: outcome.failure
      });
      jobLogger.warn("reviews.repository.incomplete", {
        repository,
        pullRequests: outcome.items.length,
        failure: outcome.failure.kind
      });
    }
  }

  return { pullRequests, repositories: statuses };
}

/**
 * Builds the per-reviewer report: every open pull request that names a
 * person of interest as requested reviewer, annotated with that reviewer's
 * feedback and the pull request's staleness.
 */
export async function runReviewJob(args: ReviewJobArgs): Promise<ReviewReport> {
  const jobLogger = args.logger ?? logger.withContext({ job: "reviews" });
  const staleDays = args.staleDays ?? DEFAULT_STALE_DAYS;
  const now = args.now ?? new Date();
  const start = Date.now();

  jobLogger.info("reviews.start", {
    repositories: args.repositories.length,
    developers: args.developers.length,
    staleDays
  });

  const { pullRequests, repositories } = await collectOpenPullRequests(
    args.client,
    args.repositories,
    jobLogger
  );

  const byDeveloper = new Map<string, AnnotatedPullRequest[]>(
    args.developers.map((developer) => [developer, []])
  );

  for (const pr of pullRequests) {
    for (const reviewer of pr.requestedReviewers) {
      const assigned = byDeveloper.get(reviewer);
      if (!assigned) continue;
      const assessment = await assessReview(args.client, {
        repository: pr.repository,
        prNumber: pr.number,
        reviewer,
        updatedAt: pr.updatedAt,
        staleDays,
        now
      });
      assigned.push(annotate(pr, assessment));
    }
  }

  const reviewers = Array.from(byDeveloper, ([developer, reviewingPrs]) => ({
    developer,
    reviewingPrs
  })).filter((entry) => entry.reviewingPrs.length > 0);

  jobLogger.info("reviews.done", {
    pullRequests: pullRequests.length,
    reviewers: reviewers.length,
    incompleteRepositories: repositories.filter((repo) => !repo.ok).length,
    ...withDuration(start)
  });

  return {
    generatedAt: now.toISOString(),
    staleDays,
    reviewers,
    repositories
  };
}

function annotate(pr: PullRequest, assessment: ReviewAssessment): AnnotatedPullRequest {
  return {
    repository: pr.repository,
    number: pr.number,
    title: pr.title,
    author: pr.author,
    url: pr.url,
    updatedAt: pr.updatedAt,
    inProgress: assessment.hasFeedback,
    stale: assessment.isStale,
    feedbackLookup: assessment.feedbackLookup
  };
}
