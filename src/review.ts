import type { GitHubClient } from "./github.js";
import { logger } from "./logger.js";
import type { RepositoryIdentifier, ReviewAssessment } from "./types.js";

export const DEFAULT_STALE_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Review states that count as feedback. PENDING is an unsubmitted draft. */
const FEEDBACK_REVIEW_STATES = new Set(["COMMENTED", "APPROVED", "CHANGES_REQUESTED"]);

export type AssessReviewArgs = {
  repository: RepositoryIdentifier;
  prNumber: number;
  reviewer: string;
  updatedAt: string;
  staleDays?: number;
  now?: Date;
};

type FeedbackClient = Pick<GitHubClient, "listIssueComments" | "listReviews">;

/**
 * Decides whether `reviewer` has left feedback on a pull request and whether
 * the pull request has gone stale. Both reads are issued on every call.
 * A failed read reports no feedback rather than throwing.
 */
export async function assessReview(
  client: FeedbackClient,
  args: AssessReviewArgs
): Promise<ReviewAssessment> {
  const { repository, prNumber, reviewer } = args;
  const reviewLogger = logger.withContext({ repository, prNumber, reviewer });
  const isStale = isPullRequestStale(
    args.updatedAt,
    args.staleDays ?? DEFAULT_STALE_DAYS,
    args.now ?? new Date()
  );
  if (isStale === null) {
    reviewLogger.warn("review.updated_at.invalid", { updatedAt: args.updatedAt });
  }

  const comments = await client.listIssueComments(repository, prNumber);
  const reviews = await client.listReviews(repository, prNumber);

  if (!comments.ok || !reviews.ok) {
    reviewLogger.warn("review.assess.failed", {
      comments: comments.ok ? "ok" : comments.failure.message,
      reviews: reviews.ok ? "ok" : reviews.failure.message
    });
    return {
      hasFeedback: false,
      isStale: isStale ?? false,
      feedbackSource: null,
      feedbackLookup: "failed"
    };
  }

  const commented = comments.items.some((comment) => comment.author === reviewer);
  const reviewed = reviews.items.some(
    (review) => review.author === reviewer && FEEDBACK_REVIEW_STATES.has(review.state)
  );

  return {
    hasFeedback: commented || reviewed,
    isStale: isStale ?? false,
    feedbackSource: commented ? "comment" : reviewed ? "review" : null,
    feedbackLookup: "ok"
  };
}

/**
 * True once more than `staleDays` whole days have passed since `updatedAt`.
 * Returns null when the timestamp cannot be parsed.
 */
export function isPullRequestStale(updatedAt: string, staleDays: number, now: Date) {
  const updated = Date.parse(updatedAt);
  if (Number.isNaN(updated)) return null;
  return now.getTime() - updated > staleDays * DAY_MS;
}
