import { Octokit } from "@octokit/rest";
import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import type {
  CommentSummary,
  FetchFailure,
  FetchOutcome,
  PullRequest,
  RateLimitInfo,
  RepositoryIdentifier,
  ReviewSummary
} from "./types.js";
import {
  isRateLimited,
  resolveRateLimitWait,
  updateRateLimit,
  type HeaderMap
} from "./github-rate-limit.js";
import { logger, toOctokitLog, type ContextLogger } from "./logger.js";
import { formatIssues } from "./utils.js";

export type GitHubConfig = {
  token: string;
  baseUrl: string;
  perPage: number;
  maxRateLimitRetries: number;
};

export type GitHubDeps = {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
  logger?: ContextLogger;
};

export type PagedResource<T> = {
  name: string;
  request: (page: number, perPage: number) => Promise<{ data: T[]; headers: HeaderMap }>;
};

export type GitHubClient = ReturnType<typeof createGitHubClient>;

const userSchema = z.object({ login: z.string() });

const pullRequestItemSchema = z.object({
  number: z.number(),
  title: z.string(),
  html_url: z.string(),
  updated_at: z.string(),
  user: userSchema.nullish(),
  base: z.object({ repo: z.object({ full_name: z.string() }) }),
  requested_reviewers: z.array(userSchema).nullish(),
  assignees: z.array(userSchema).nullish()
});

const commentItemSchema = z.object({ user: userSchema.nullish() });

const reviewItemSchema = z.object({ user: userSchema.nullish(), state: z.string() });

const commitItemSchema = z.object({ sha: z.string() });

export function createGitHubClient(config: GitHubConfig, deps: GitHubDeps = {}) {
  const clientLogger = deps.logger ?? logger.withContext({ component: "github" });
  const sleep = deps.sleep ?? delay;
  const now = deps.now ?? Date.now;
  const rateLimit: RateLimitInfo = {};
  const octokit = new Octokit({
    auth: config.token,
    baseUrl: config.baseUrl,
    log: toOctokitLog(clientLogger),
    request: deps.fetch ? { fetch: deps.fetch } : undefined
  });

  /**
   * Reads every page of a resource, one request at a time.
   *
   * A page shorter than `pageSize` ends the loop even though the server may
   * have more; callers get no stronger guarantee than that. A rate-limited
   * page is requested again after the reset time, up to
   * `maxRateLimitRetries` times per call, keeping the pages already read.
   */
  async function fetchAllPages<T>(
    resource: PagedResource<T>,
    pageSize: number = config.perPage
  ): Promise<FetchOutcome<T>> {
    const items: T[] = [];
    let page = 1;
    let pages = 0;
    let rateLimitRetries = 0;

    for (;;) {
      let response: { data: T[]; headers: HeaderMap };
      try {
        response = await resource.request(page, pageSize);
      } catch (error) {
        const details = describeRequestError(error);
        if (!isRateLimited(details.status, details.headers)) {
          clientLogger.error("github.page.failed", {
            resource: resource.name,
            page,
            status: details.status ?? null,
            error: details.message
          });
          return failed(items, pages, {
            kind: "request_failed",
            status: details.status,
            message: details.message
          });
        }
        if (rateLimitRetries >= config.maxRateLimitRetries) {
          clientLogger.error("github.rate_limit.exhausted", {
            resource: resource.name,
            page,
            attempts: rateLimitRetries
          });
          return failed(items, pages, {
            kind: "rate_limited",
            status: details.status,
            message: details.message
          });
        }
        const waitSeconds = resolveRateLimitWait(details.headers, now());
        rateLimitRetries += 1;
        clientLogger.warn("github.rate_limit.wait", {
          resource: resource.name,
          page,
          waitSeconds,
          attempt: rateLimitRetries
        });
        await sleep(waitSeconds * 1000);
        continue;
      }

      updateRateLimit(rateLimit, response.headers);
      if (!Array.isArray(response.data)) {
        clientLogger.error("github.page.malformed", { resource: resource.name, page });
        return failed(items, pages, {
          kind: "request_failed",
          message: `Expected a JSON array from ${resource.name}`
        });
      }

      const batch = response.data;
      if (batch.length === 0) break;
      items.push(...batch);
      pages += 1;
      if (batch.length < pageSize) break;
      page += 1;
    }

    clientLogger.debug("github.fetch.done", {
      resource: resource.name,
      pages,
      items: items.length
    });
    return { ok: true, items, pages };
  }

  async function listOpenPullRequests(
    repository: RepositoryIdentifier
  ): Promise<FetchOutcome<PullRequest>> {
    const identifier = repository.trim();
    const ref = parseRepository(identifier);
    if (!ref) return invalidRepository(repository);
    const name = `${identifier} pulls`;
    const outcome = await fetchAllPages({
      name,
      request: (page, perPage) =>
        octokit.rest.pulls.list({ ...ref, state: "open", per_page: perPage, page })
    });
    return mapOutcome(
      outcome,
      name,
      pullRequestItemSchema,
      (pr) => toPullRequest(identifier, pr, clientLogger),
      clientLogger
    );
  }

  async function listIssueComments(
    repository: RepositoryIdentifier,
    number: number
  ): Promise<FetchOutcome<CommentSummary>> {
    const ref = parseRepository(repository);
    if (!ref) return invalidRepository(repository);
    const name = `${repository}#${number} comments`;
    const outcome = await fetchAllPages({
      name,
      request: (page, perPage) =>
        octokit.rest.issues.listComments({
          ...ref,
          issue_number: number,
          per_page: perPage,
          page
        })
    });
    return mapOutcome(
      outcome,
      name,
      commentItemSchema,
      (comment) => ({ author: comment.user?.login ?? null }),
      clientLogger
    );
  }

  async function listReviews(
    repository: RepositoryIdentifier,
    number: number
  ): Promise<FetchOutcome<ReviewSummary>> {
    const ref = parseRepository(repository);
    if (!ref) return invalidRepository(repository);
    const name = `${repository}#${number} reviews`;
    const outcome = await fetchAllPages({
      name,
      request: (page, perPage) =>
        octokit.rest.pulls.listReviews({
          ...ref,
          pull_number: number,
          per_page: perPage,
          page
        })
    });
    return mapOutcome(
      outcome,
      name,
      reviewItemSchema,
      (review) => ({ author: review.user?.login ?? null, state: review.state }),
      clientLogger
    );
  }

  async function listCommits(
    repository: RepositoryIdentifier,
    range: { since: string; until: string }
  ): Promise<FetchOutcome<{ sha: string }>> {
    const ref = parseRepository(repository);
    if (!ref) return invalidRepository(repository);
    const name = `${repository} commits`;
    const outcome = await fetchAllPages({
      name,
      request: (page, perPage) =>
        octokit.rest.repos.listCommits({
          ...ref,
          since: range.since,
          until: range.until,
          per_page: perPage,
          page
        })
    });
    return mapOutcome(
      outcome,
      name,
      commitItemSchema,
      (commit) => ({ sha: commit.sha }),
      clientLogger
    );
  }

  function invalidRepository<T>(repository: string): FetchOutcome<T> {
    clientLogger.error("github.repository.invalid", { repository });
    return failed([], 0, {
      kind: "request_failed",
      message: `Repository must be owner/name, got "${repository}"`
    });
  }

  return {
    fetchAllPages,
    listOpenPullRequests,
    listIssueComments,
    listReviews,
    listCommits,
    rateLimit
  };
}

export function parseRepository(repository: RepositoryIdentifier) {
  const parts = repository.trim().split("/");
  if (parts.length !== 2) return null;
  const [owner, repo] = parts;
  if (!owner || !repo) return null;
  return { owner, repo };
}

function toPullRequest(
  repository: RepositoryIdentifier,
  pr: z.infer<typeof pullRequestItemSchema>,
  clientLogger: ContextLogger
): PullRequest {
  const baseRepository = pr.base.repo.full_name;
  if (baseRepository !== repository) {
    clientLogger.warn("github.pull.repository_mismatch", {
      repository,
      baseRepository,
      number: pr.number
    });
  }
  return {
    repository,
    number: pr.number,
    title: pr.title,
    author: pr.user?.login ?? null,
    url: pr.html_url,
    updatedAt: pr.updated_at,
    requestedReviewers: (pr.requested_reviewers ?? []).map((user) => user.login),
    assignees: (pr.assignees ?? []).map((user) => user.login)
  };
}

/**
 * Validates every item before mapping it. The first malformed item ends the
 * read as a failure that keeps the items mapped before it.
 */
function mapOutcome<S extends z.ZodTypeAny, U>(
  outcome: FetchOutcome<unknown>,
  name: string,
  schema: S,
  map: (item: z.infer<S>) => U,
  clientLogger: ContextLogger
): FetchOutcome<U> {
  const items: U[] = [];
  for (const [index, raw] of outcome.items.entries()) {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      clientLogger.error("github.page.malformed", { resource: name, index, error: issues });
      return failed(items, outcome.pages, {
        kind: "request_failed",
        message: `Malformed item ${index} from ${name}: ${issues}`
      });
    }
    items.push(map(parsed.data));
  }
  if (outcome.ok) {
    return { ok: true, items, pages: outcome.pages };
  }
  return { ok: false, items, pages: outcome.pages, failure: outcome.failure };
}

function failed<T>(items: T[], pages: number, failure: FetchFailure): FetchOutcome<T> {
  return { ok: false, items, pages, failure };
}

function describeRequestError(error: unknown): {
  status?: number;
  headers: HeaderMap;
  message: string;
} {
  if (!(error instanceof Error)) {
    return { headers: {}, message: String(error) };
  }
  const status =
    "status" in error && typeof error.status === "number" ? error.status : undefined;
  const response = "response" in error ? error.response : undefined;
  const headers =
    isRecord(response) && isRecord(response.headers) ? toHeaderMap(response.headers) : {};
  return { status, headers, message: error.message };
}

function toHeaderMap(raw: Record<string, unknown>): HeaderMap {
  const headers: HeaderMap = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string" || typeof value === "number") {
      headers[key.toLowerCase()] = value;
    }
  }
  return headers;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
