import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadConfig, loadTargets } from "./config.js";
import { setLoggerConfig } from "./logger.js";

describe("loadConfig", () => {
  it("fails before any request when the token is missing", () => {
    expect(() => loadConfig({})).toThrow("Missing GITHUB_TOKEN environment variable.");
    expect(() => loadConfig({ GITHUB_TOKEN: "   " })).toThrow(
      "Missing GITHUB_TOKEN environment variable."
    );
  });

  it("falls back to the defaults file", () => {
    const config = loadConfig({ GITHUB_TOKEN: "test-token" });

    expect(config.github).toEqual({
      token: "test-token",
      baseUrl: "https://api.github.com",
      perPage: 100,
      maxRateLimitRetries: 3
    });
    expect(config.report).toEqual({
      configPath: "review-digest.config.json",
      staleDays: 7,
      commitMonths: 3
    });
    expect(config.storage.type).toBe("local");
    expect(config.storage.dir).toBe("out");
    expect(config.network).toEqual({ retryCount: 2, retryBackoffMs: 500 });
  });

  it("lets the environment override the defaults", () => {
    const config = loadConfig({
      GITHUB_TOKEN: "test-token",
      GITHUB_API_URL: "https://github.example.test/api/v3",
      GITHUB_PER_PAGE: "50",
      GITHUB_MAX_RATE_LIMIT_RETRIES: "0",
      STALE_DAYS: "3",
      COMMIT_MONTHS: "6",
      LOG_COLOR: "false",
      SLACK_WEBHOOK_URL: "https://hooks.example.test/services/T000"
    });

    expect(config.github.baseUrl).toBe("https://github.example.test/api/v3");
    expect(config.github.perPage).toBe(50);
    expect(config.github.maxRateLimitRetries).toBe(0);
    expect(config.report.staleDays).toBe(3);
    expect(config.report.commitMonths).toBe(6);
    expect(config.logging.color).toBe(false);
    expect(config.webhook.url).toBe("https://hooks.example.test/services/T000");
  });

  it("rejects an out-of-range page size", () => {
    expect(() => loadConfig({ GITHUB_TOKEN: "test-token", GITHUB_PER_PAGE: "500" })).toThrow(
      /^Invalid environment: GITHUB_PER_PAGE/
    );
  });

  it("requires a bucket name for S3 storage", () => {
    expect(() => loadConfig({ GITHUB_TOKEN: "test-token", BUCKET_TYPE: "s3" })).toThrow(
      "Missing BUCKET_NAME for S3 storage."
    );
  });
});

describe("loadTargets", () => {
  let dir: string;
  let lines: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "review-digest-config-"));
    lines = [];
    setLoggerConfig({ format: "json", write: (line) => lines.push(line) });
  });

  afterEach(async () => {
    setLoggerConfig({ write: () => {} });
    await rm(dir, { recursive: true, force: true });
  });

  const warnings = () =>
    lines.map((line) => {
      const entry: { msg: string } = JSON.parse(line);
      return entry.msg;
    });

  it("reads repositories, developers and overrides", async () => {
    const path = join(dir, "targets.json");
    await writeFile(
      path,
      JSON.stringify({
        repositories: ["acme/widgets", "acme/gears"],
        developers: ["alice", "bob"],
        staleDays: 5
      })
    );

    await expect(loadTargets(path)).resolves.toEqual({
      repositories: ["acme/widgets", "acme/gears"],
      developers: ["alice", "bob"],
      staleDays: 5
    });
    expect(lines).toEqual([]);
  });

  it("returns empty lists for a missing file", async () => {
    await expect(loadTargets(join(dir, "absent.json"))).resolves.toEqual({
      repositories: [],
      developers: []
    });
    expect(warnings()).toEqual(["config.targets.missing"]);
  });

  it("returns empty lists for a file that is not JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "repositories: [acme/widgets");

    await expect(loadTargets(path)).resolves.toEqual({ repositories: [], developers: [] });
    expect(warnings()).toEqual(["config.targets.invalid_json"]);
  });

  it("returns empty lists when the lists have the wrong shape", async () => {
    const path = join(dir, "shape.json");
    await writeFile(path, JSON.stringify({ repositories: "acme/widgets" }));

    await expect(loadTargets(path)).resolves.toEqual({ repositories: [], developers: [] });
    expect(warnings()).toEqual(["config.targets.invalid"]);
  });

  it("warns about an empty developer list", async () => {
    const path = join(dir, "partial.json");
    await writeFile(path, JSON.stringify({ repositories: ["acme/widgets"] }));

    await expect(loadTargets(path)).resolves.toEqual({
      repositories: ["acme/widgets"],
      developers: []
    });
    expect(warnings()).toEqual(["config.targets.no_developers"]);
  });
});
