#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { loadConfig, loadTargets, type AppConfig } from "./config.js";
import { createGitHubClient, type GitHubClient } from "./github.js";
import { formatTimestamp, logger, setLoggerConfig } from "./logger.js";
import { runCommitJob } from "./runner/commits.js";
import { collectOpenPullRequests, runReviewJob } from "./runner/reviews.js";
import { createStorageClient, describeStorage } from "./storage.js";
import { renderCommitReportHtml, renderReviewReportHtml } from "./templates.js";
import { formatSlackMessage, parseStoredReviewers, sendSlackMessage } from "./webhook.js";
import { errorMessage } from "./utils.js";

const REVIEW_JSON_KEY = "reviewers_prs.json";
const REVIEW_HTML_KEY = "reviewers_prs.html";
const COMMIT_HTML_KEY = "github_commits_report.html";

const program = new Command();
program
  .name("review-digest")
  .description("Open pull request review digests and commit reports from GitHub")
  .version("0.1.0");

program
  .command("reviews")
  .description("Report open pull requests waiting on each configured reviewer")
  .option("--config <file>", "Repositories and developers file (JSON)")
  .option("--stale-days <n>", "Days without updates before a pull request is stale", parseNonNegative)
  .option("--json", "Print the report JSON to stdout")
  .option("--html", "Also store an HTML page")
  .option("--notify", "Post the summary to the Slack webhook")
  .action(
    async (options: {
      config?: string;
      staleDays?: number;
      json?: boolean;
      html?: boolean;
      notify?: boolean;
    }) => {
      const config = loadBase();
      const targets = await loadTargets(options.config ?? config.report.configPath);
      if (targets.repositories.length === 0 || targets.developers.length === 0) {
        logger.error("reviews.nothing_to_do", {
          repositories: targets.repositories.length,
          developers: targets.developers.length
        });
        return;
      }
      if (options.notify && !config.webhook.url) {
        throw new Error("Missing SLACK_WEBHOOK_URL (required with --notify).");
      }

      const client = createClient(config);
      const report = await runReviewJob({
        client,
        repositories: targets.repositories,
        developers: targets.developers,
        staleDays: options.staleDays ?? targets.staleDays ?? config.report.staleDays
      });
      logRateLimit(client, config);

      const storage = createStorageClient(config.storage);
      logger.debug("storage.target", describeStorage(config.storage));
      const json = JSON.stringify(report.reviewers, null, 2);
      const stored = await storage.put(REVIEW_JSON_KEY, json, "application/json");
      logger.info("report.stored", { uri: stored.uri, size: stored.size });

      if (options.html) {
        const page = await storage.put(
          REVIEW_HTML_KEY,
          renderReviewReportHtml(report),
          "text/html; charset=utf-8"
        );
        logger.info("report.stored", { uri: page.uri, size: page.size });
      }

      if (options.json) {
        process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
      }

      if (options.notify) {
        await sendSlackMessage(config.webhook, formatSlackMessage(report.reviewers), {
          retries: config.network.retryCount,
          backoffMs: config.network.retryBackoffMs
        });
      }
    }
  );

program
  .command("open-prs")
  .description("List every open pull request with its assignees and requested reviewers")
  .option("--config <file>", "Repositories file (JSON)")
  .action(async (options: { config?: string }) => {
    const config = loadBase();
    const targets = await loadTargets(options.config ?? config.report.configPath);
    const client = createClient(config);
    const { pullRequests } = await collectOpenPullRequests(client, targets.repositories);
    logRateLimit(client, config);
    process.stdout.write(`${JSON.stringify(pullRequests, null, 2)}\n`);
  });

program
  .command("commits")
  .description("Store an HTML report of commit counts for the last full months")
  .option("--config <file>", "Repositories file (JSON)")
  .option("--months <n>", "Number of full calendar months", parsePositive)
  .action(async (options: { config?: string; months?: number }) => {
    const config = loadBase();
    const targets = await loadTargets(options.config ?? config.report.configPath);
    if (targets.repositories.length === 0) {
      logger.error("commits.nothing_to_do");
      return;
    }
    const client = createClient(config);
    const report = await runCommitJob({
      client,
      repositories: targets.repositories,
      months: options.months ?? targets.months ?? config.report.commitMonths
    });
    logRateLimit(client, config);

    const storage = createStorageClient(config.storage);
    const stored = await storage.put(
      COMMIT_HTML_KEY,
      renderCommitReportHtml(report),
      "text/html; charset=utf-8"
    );
    logger.info("report.stored", { uri: stored.uri, size: stored.size });
  });

program
  .command("notify")
  .description("Post a stored reviewer report to the Slack webhook")
  .option("--input <key>", "Stored report key", REVIEW_JSON_KEY)
  .action(async (options: { input: string }) => {
    const config = loadBase();
    if (!config.webhook.url) {
      throw new Error("Missing SLACK_WEBHOOK_URL.");
    }
    const storage = createStorageClient(config.storage);
    const text = await storage.get(options.input);
    if (text === null) {
      logger.error("notify.input.missing", { key: options.input });
      return;
    }

    const stored = parseStoredReviewers(text);
    if (!stored.ok) {
      logger.error(`notify.input.${stored.reason}`, {
        key: options.input,
        error: stored.detail ?? null
      });
      return;
    }

    await sendSlackMessage(config.webhook, formatSlackMessage(stored.reviewers), {
      retries: config.network.retryCount,
      backoffMs: config.network.retryBackoffMs
    });
  });

function loadBase(): AppConfig {
  const config = loadConfig();
  setLoggerConfig({
    level: config.logging.level,
    format: config.logging.format,
    color: config.logging.color,
    timeZone: config.logging.timeZone
  });
  return config;
}

function createClient(config: AppConfig) {
  return createGitHubClient(config.github);
}

function logRateLimit(client: GitHubClient, config: AppConfig) {
  const { rateLimit } = client;
  logger.info("github.rate_limit", {
    remaining: rateLimit.remaining ?? null,
    limit: rateLimit.limit ?? null,
    resetAt: rateLimit.reset
      ? formatTimestamp(new Date(rateLimit.reset * 1000), config.logging.timeZone)
      : null
  });
}

function parsePositive(value: string) {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseNonNegative(value: string) {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number.");
  }
  return parsed;
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
