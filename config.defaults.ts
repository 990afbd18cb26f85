import type { ConfigFile } from "./src/config.js";

export const defaultConfig: ConfigFile = {
  github: {
    baseUrl: "https://api.github.com", // REST API root (GitHub Enterprise: https://<host>/api/v3)
    perPage: 100, // Items per page in GitHub API pagination (max 100)
    maxRateLimitRetries: 3, // Waits for the rate-limit reset per paginated read before giving up
  },
  report: {
    configPath: "review-digest.config.json", // Repositories and developers to report on
    staleDays: 7, // A pull request untouched for longer than this is stale
    commitMonths: 3, // Full calendar months covered by the commit report
  },
  storage: {
    type: "local", // "local" (writes under dir) or "s3"
    dir: "out", // Output directory for local storage
    forcePathStyle: false, // Use path-style URLs (needed for S3-compatible services)
  },
  network: {
    retryCount: 2, // Retry attempts for webhook delivery
    retryBackoffMs: 500, // Initial delay between retries, doubled each attempt
  },
  logging: {
    level: "info", // Log level: "debug", "info", "warn", "error"
    format: "pretty", // Log format: "pretty" (human-readable) or "json"
    color: true, // Enable colored output in terminal logs
  },
  webhook: {}, // Slack incoming webhook (SLACK_WEBHOOK_URL, WEBHOOK_SECRET)
};
