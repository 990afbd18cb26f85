import { describe, it, expect, vi } from "vitest";
import { createGitHubClient, parseRepository } from "./github.js";
import { apiPullRequest, createFakeFetch, type FakeReply } from "./testing/fake-fetch.js";

const NOW_SECONDS = 1_800_000_000;

function setup(handler: (url: URL) => FakeReply, overrides: { maxRateLimitRetries?: number } = {}) {
  const fake = createFakeFetch(handler);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const client = createGitHubClient(
    {
      token: "test-token",
      baseUrl: "https://api.github.test",
      perPage: 2,
      maxRateLimitRetries: overrides.maxRateLimitRetries ?? 3
    },
    {
      fetch: fake.fetch,
      sleep,
      now: () => NOW_SECONDS * 1000 + 400
    }
  );
  return { client, sleep, calls: fake.calls };
}

const pr = (number: number) => apiPullRequest({ repository: "acme/widgets", number });

function pageOf(url: URL) {
  return Number(url.searchParams.get("page"));
}

describe("fetchAllPages", () => {
  it("concatenates full pages until an empty page", async () => {
    const { client, calls } = setup((url) => {
      const page = pageOf(url);
      if (page === 1) return { body: [pr(1), pr(2)] };
      if (page === 2) return { body: [pr(3), pr(4)] };
      return { body: [] };
    });

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(outcome.ok).toBe(true);
    expect(outcome.items.map((item) => item.number)).toEqual([1, 2, 3, 4]);
    expect(outcome.pages).toBe(2);
    expect(calls.map(pageOf)).toEqual([1, 2, 3]);
  });

  it("stops after a short first page without requesting page 2", async () => {
    const { client, calls } = setup(() => ({ body: [pr(9)] }));

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(outcome).toMatchObject({ ok: true, pages: 1 });
    expect(outcome.items).toHaveLength(1);
    expect(calls).toHaveLength(1);
  });

  it("requests open pull requests with the page size", async () => {
    const { client, calls } = setup(() => ({ body: [] }));

    await client.listOpenPullRequests("acme/widgets");

    expect(calls[0]?.pathname).toBe("/repos/acme/widgets/pulls");
    expect(calls[0]?.searchParams.get("state")).toBe("open");
    expect(calls[0]?.searchParams.get("per_page")).toBe("2");
    expect(calls[0]?.searchParams.get("page")).toBe("1");
  });

  it("waits until one second past the reset time, then requests page 1 again", async () => {
    let rateLimited = true;
    const { client, sleep, calls } = setup(() => {
      if (rateLimited) {
        rateLimited = false;
        return {
          status: 403,
          body: { message: "API rate limit exceeded" },
          headers: {
            "x-ratelimit-remaining": "0",
            "x-ratelimit-reset": String(NOW_SECONDS + 30)
          }
        };
      }
      return { body: [pr(1)] };
    });

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(31_000);
    expect(calls.map(pageOf)).toEqual([1, 1]);
    expect(outcome.ok).toBe(true);
    expect(outcome.items.map((item) => item.number)).toEqual([1]);
  });

  it("does not sleep a negative time when the reset has already passed", async () => {
    let rateLimited = true;
    const { client, sleep } = setup(() => {
      if (rateLimited) {
        rateLimited = false;
        return {
          status: 403,
          body: { message: "API rate limit exceeded" },
          headers: {
            "x-ratelimit-remaining": "0",
            "x-ratelimit-reset": String(NOW_SECONDS - 10)
          }
        };
      }
      return { body: [] };
    });

    await client.listOpenPullRequests("acme/widgets");

    expect(sleep).toHaveBeenCalledWith(0);
  });

  it("keeps pages read before a rate limit and retries only the limited page", async () => {
    let limitedOnce = false;
    const { client, calls } = setup((url) => {
      const page = pageOf(url);
      if (page === 1) return { body: [pr(1), pr(2)] };
      if (!limitedOnce) {
        limitedOnce = true;
        return {
          status: 403,
          body: { message: "API rate limit exceeded" },
          headers: {
            "x-ratelimit-remaining": "0",
            "x-ratelimit-reset": String(NOW_SECONDS + 5)
          }
        };
      }
      return { body: [pr(3)] };
    });

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(calls.map(pageOf)).toEqual([1, 2, 2]);
    expect(outcome.ok).toBe(true);
    expect(outcome.items.map((item) => item.number)).toEqual([1, 2, 3]);
  });

  it("gives up after the configured number of rate-limit waits", async () => {
    const { client, sleep, calls } = setup(
      () => ({
        status: 403,
        body: { message: "API rate limit exceeded" },
        headers: {
          "x-ratelimit-remaining": "0",
          "x-ratelimit-reset": String(NOW_SECONDS + 1)
        }
      }),
      { maxRateLimitRetries: 1 }
    );

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(calls).toHaveLength(2);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe("rate_limited");
      expect(outcome.failure.status).toBe(403);
    }
  });

  it("treats a 403 without rate-limit headers as a plain failure", async () => {
    const { client, sleep, calls } = setup(() => ({
      status: 403,
      body: { message: "Resource not accessible by integration" }
    }));

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(sleep).not.toHaveBeenCalled();
    expect(calls).toHaveLength(1);
    expect(outcome).toMatchObject({ ok: false, items: [], pages: 0 });
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe("request_failed");
    }
  });

  it("returns the pages read before a server error", async () => {
    const { client } = setup((url) =>
      pageOf(url) === 1
        ? { body: [pr(1), pr(2)] }
        : { status: 502, body: { message: "Bad Gateway" } }
    );

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(outcome.ok).toBe(false);
    expect(outcome.items.map((item) => item.number)).toEqual([1, 2]);
    expect(outcome.pages).toBe(1);
    if (!outcome.ok) {
      expect(outcome.failure).toMatchObject({ kind: "request_failed", status: 502 });
    }
  });

  it("reports a network error as a failed outcome", async () => {
    const { client } = setup(() => {
      throw new TypeError("fetch failed");
    });

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(outcome.ok).toBe(false);
    expect(outcome.items).toEqual([]);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe("request_failed");
    }
  });

  it("rejects a body that is not an array", async () => {
    const { client } = setup(() => ({ body: { message: "not a list" } }));

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.message).toBe("Expected a JSON array from acme/widgets pulls");
    }
  });

  it("fails an invalid repository identifier without a request", async () => {
    const { client, calls } = setup(() => ({ body: [] }));

    const outcome = await client.listOpenPullRequests("widgets");

    expect(calls).toHaveLength(0);
    expect(outcome.ok).toBe(false);
  });

  it("waits sixty seconds when the reset header is missing", async () => {
    let rateLimited = true;
    const { client, sleep } = setup(() => {
      if (rateLimited) {
        rateLimited = false;
        return {
          status: 403,
          body: { message: "API rate limit exceeded" },
          headers: { "x-ratelimit-remaining": "0" }
        };
      }
      return { body: [] };
    });

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(sleep).toHaveBeenCalledWith(60_000);
    expect(outcome.ok).toBe(true);
  });

  it("tracks rate-limit headers from successful responses", async () => {
    const { client } = setup(() => ({
      body: [],
      headers: {
        "x-ratelimit-remaining": "4999",
        "x-ratelimit-limit": "5000",
        "x-ratelimit-reset": "1800000900"
      }
    }));

    await client.listOpenPullRequests("acme/widgets");

    expect(client.rateLimit).toEqual({ remaining: 4999, limit: 5000, reset: 1800000900 });
  });
});

describe("resource helpers", () => {
  it("maps pull requests to snapshots under the requested repository", async () => {
    const { client } = setup(() => ({
      body: [
        {
          ...apiPullRequest({
            repository: "acme/widgets",
            number: 7,
            title: "Add sprockets",
            author: "dana",
            updatedAt: "2026-10-01T08:30:00Z",
            reviewers: ["alice", "bob"],
            assignees: ["carol"]
          }),
          base: { repo: { full_name: "acme/widgets-renamed" } }
        }
      ]
    }));

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(outcome.items).toEqual([
      {
        repository: "acme/widgets",
        number: 7,
        title: "Add sprockets",
        author: "dana",
        url: "https://github.com/acme/widgets/pull/7",
        updatedAt: "2026-10-01T08:30:00Z",
        requestedReviewers: ["alice", "bob"],
        assignees: ["carol"]
      }
    ]);
  });

  it("fails the listing on a malformed pull request and keeps the items before it", async () => {
    const { client } = setup((url) =>
      pageOf(url) === 1 ? { body: [pr(1), { number: 2, title: "x" }] } : { body: [] }
    );

    const outcome = await client.listOpenPullRequests("acme/widgets");

    expect(outcome.ok).toBe(false);
    expect(outcome.items.map((item) => item.number)).toEqual([1]);
    if (!outcome.ok) {
      expect(outcome.failure).toEqual({
        kind: "request_failed",
        message:
          "Malformed item 1 from acme/widgets pulls: html_url: Required, updated_at: Required, base: Required"
      });
    }
  });

  it("fails a comment read that contains a null entry", async () => {
    const { client } = setup(() => ({ body: [null] }));

    const outcome = await client.listIssueComments("acme/widgets", 7);

    expect(outcome.ok).toBe(false);
    expect(outcome.items).toEqual([]);
    if (!outcome.ok) {
      expect(outcome.failure.message).toBe(
        "Malformed item 0 from acme/widgets#7 comments: (root): Expected object, received null"
      );
    }
  });

  it("fails a review read that contains an entry without a state", async () => {
    const { client } = setup(() => ({ body: [{ user: { login: "alice" } }] }));

    const outcome = await client.listReviews("acme/widgets", 7);

    expect(outcome.ok).toBe(false);
  });

  it("trims the repository identifier before using it", async () => {
    const fake = createFakeFetch(() => ({ body: [pr(5)] }));
    const clientLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const client = createGitHubClient(
      {
        token: "test-token",
        baseUrl: "https://api.github.test",
        perPage: 2,
        maxRateLimitRetries: 0
      },
      { fetch: fake.fetch, logger: clientLogger }
    );

    const outcome = await client.listOpenPullRequests(" acme/widgets ");

    expect(outcome.items.map((item) => item.repository)).toEqual(["acme/widgets"]);
    expect(clientLogger.warn).not.toHaveBeenCalled();
    expect(fake.calls[0]?.pathname).toBe("/repos/acme/widgets/pulls");
  });

  it("reads issue comments and reviews of a pull request", async () => {
    const { client, calls } = setup((url) =>
      url.pathname.endsWith("/comments")
        ? { body: [{ user: { login: "alice" } }, { user: null }] }
        : { body: [{ user: { login: "bob" }, state: "APPROVED" }] }
    );

    const comments = await client.listIssueComments("acme/widgets", 7);
    const reviews = await client.listReviews("acme/widgets", 7);

    expect(comments.items).toEqual([{ author: "alice" }, { author: null }]);
    expect(reviews.items).toEqual([{ author: "bob", state: "APPROVED" }]);
    expect(calls.map((url) => url.pathname)).toEqual([
      "/repos/acme/widgets/issues/7/comments",
      "/repos/acme/widgets/pulls/7/reviews"
    ]);
  });

  it("passes the commit date range", async () => {
    const { client, calls } = setup(() => ({ body: [{ sha: "abc" }] }));

    const outcome = await client.listCommits("acme/widgets", {
      since: "2026-09-01T00:00:00Z",
      until: "2026-09-30T23:59:59Z"
    });

    expect(outcome.items).toEqual([{ sha: "abc" }]);
    expect(calls[0]?.searchParams.get("since")).toBe("2026-09-01T00:00:00Z");
    expect(calls[0]?.searchParams.get("until")).toBe("2026-09-30T23:59:59Z");
  });
});

describe("parseRepository", () => {
  it("splits owner and name", () => {
    expect(parseRepository("acme/widgets")).toEqual({ owner: "acme", repo: "widgets" });
  });

  it("rejects identifiers that are not owner/name", () => {
    expect(parseRepository("acme")).toBeNull();
    expect(parseRepository("acme/widgets/extra")).toBeNull();
    expect(parseRepository("/widgets")).toBeNull();
  });
});
