import type { GitHubClient } from "../github.js";
import { logger, type ContextLogger } from "../logger.js";
import type { CommitCount, CommitReport, RepositoryIdentifier } from "../types.js";
import { getLastFullMonths, withDuration } from "../utils.js";

export type CommitJobArgs = {
  client: Pick<GitHubClient, "listCommits">;
  repositories: RepositoryIdentifier[];
  months: number;
  now?: Date;
  logger?: ContextLogger;
};

/** Commit counts per repository for each of the last `months` full months. */
export async function runCommitJob(args: CommitJobArgs): Promise<CommitReport> {
  const jobLogger = args.logger ?? logger.withContext({ job: "commits" });
  const now = args.now ?? new Date();
  const months = getLastFullMonths(now, args.months);
  const start = Date.now();

  jobLogger.info("commits.start", {
    repositories: args.repositories.length,
    from: months[0]?.since ?? null,
    to: months[months.length - 1]?.until ?? null
  });

  const repositories: CommitReport["repositories"] = [];
  for (const repository of args.repositories) {
    const counts: CommitCount[] = [];
    for (const month of months) {
      const outcome = await args.client.listCommits(repository, {
        since: month.since,
        until: month.until
      });
      if (!outcome.ok) {
        jobLogger.warn("commits.count.partial", {
          repository,
          month: month.label,
          counted: outcome.items.length,
          failure: outcome.failure.kind
        });
      }
      counts.push({ label: month.label, commits: outcome.items.length, ok: outcome.ok });
    }
    repositories.push({ repository, counts });
  }

  jobLogger.info("commits.done", { repositories: repositories.length, ...withDuration(start) });
  return { generatedAt: now.toISOString(), months, repositories };
}
