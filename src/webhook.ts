import { createHmac } from "node:crypto";
import { z } from "zod";
import { logger } from "./logger.js";
import { withRetry, type RetryConfig } from "./retry.js";
import type { AnnotatedPullRequest, ReviewerEntry } from "./types.js";
import { errorMessage, formatIssues } from "./utils.js";

export type WebhookConfig = {
  url?: string;
  secret?: string;
};

type SlackTextBlock = {
  type: "section";
  text: { type: "mrkdwn"; text: string };
};

type SlackBlock = SlackTextBlock | { type: "divider" };

export type SlackMessage = { text: string } | { blocks: SlackBlock[] };

/**
 * Block Kit summary with one section per reviewer. Reviewers without pull
 * requests are left out.
 */
export function formatSlackMessage(reviewers: ReviewerEntry[]): SlackMessage {
  if (reviewers.length === 0) {
    return { text: "No PRs found for reviewers." };
  }

  const blocks: SlackBlock[] = [section("*GitHub PR Review Summary* 📢")];
  for (const reviewer of reviewers) {
    if (reviewer.reviewingPrs.length === 0) continue;
    const lines = reviewer.reviewingPrs.map(formatPullRequestLine).join("\n");
    blocks.push(section(`*${escapeSlack(reviewer.developer)}* 👤\n${lines}`));
    blocks.push({ type: "divider" });
  }
  return { blocks };
}

function formatPullRequestLine(pr: AnnotatedPullRequest) {
  const flags = [pr.inProgress ? "in progress" : null, pr.stale ? "stale" : null].filter(
    (flag): flag is string => flag !== null
  );
  const suffix = flags.length > 0 ? ` _${flags.join(", ")}_` : "";
  return `- <${pr.url}|${escapeSlack(pr.title)}>${suffix}`;
}

function section(text: string): SlackTextBlock {
  return { type: "section", text: { type: "mrkdwn", text } };
}

/** Slack reserves these three characters in mrkdwn text. */
export function escapeSlack(value: string) {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export async function sendSlackMessage(
  config: WebhookConfig,
  message: SlackMessage,
  retry: RetryConfig
): Promise<void> {
  const { url, secret } = config;
  if (!url) {
    throw new Error("Missing SLACK_WEBHOOK_URL.");
  }

  const body = JSON.stringify(message);
  const headers: Record<string, string> = {
    "content-type": "application/json"
  };
  if (secret) {
    headers["x-signature"] = signPayload(secret, body);
  }

  await withRetry(
    async () => {
      const response = await fetch(url, { method: "POST", headers, body });
      if (!response.ok) {
        const text = await response.text();
        logger.warn("webhook.send.failed", { status: response.status, body: text });
        throw new Error(`Webhook failed: ${response.status} ${text}`);
      }
    },
    retry,
    {
      onRetry: ({ attempt, waitMs }) => logger.info("webhook.send.retry", { attempt, waitMs })
    }
  );
  logger.info("webhook.send.done");
}

export function signPayload(secret: string, body: string) {
  return createHmac("sha256", secret).update(body).digest("hex");
}

const storedReviewersSchema = z.array(
  z.object({
    developer: z.string(),
    reviewingPrs: z.array(
      z.object({
        repository: z.string(),
        number: z.number(),
        title: z.string(),
        author: z.string().nullable().default(null),
        url: z.string(),
        updatedAt: z.string().default(""),
        inProgress: z.boolean().default(false),
        stale: z.boolean().default(false),
        feedbackLookup: z.enum(["ok", "failed"]).default("ok")
      })
    )
  })
);

export type StoredReviewers =
  | { ok: true; reviewers: ReviewerEntry[] }
  | { ok: false; reason: "invalid_json" | "invalid" | "empty"; detail?: string };

/** Reads a reviewer report written by the `reviews` command. */
export function parseStoredReviewers(text: string): StoredReviewers {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return { ok: false, reason: "invalid_json", detail: errorMessage(error) };
  }
  const parsed = storedReviewersSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: "invalid", detail: formatIssues(parsed.error) };
  }
  if (parsed.data.length === 0) {
    return { ok: false, reason: "empty" };
  }
  return { ok: true, reviewers: parsed.data };
}
