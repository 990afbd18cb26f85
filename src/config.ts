import "dotenv/config";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { defaultConfig } from "../config.defaults.js";
import { logger } from "./logger.js";
import { errorMessage, formatIssues } from "./utils.js";

const truthy = new Set(["true", "1", "yes"]);

const envSchema = z.object({
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_API_URL: z.string().url().optional(),
  GITHUB_PER_PAGE: z.coerce.number().int().positive().max(100).optional(),
  GITHUB_MAX_RATE_LIMIT_RETRIES: z.coerce.number().int().nonnegative().optional(),

  REPORT_CONFIG: z.string().optional(),
  STALE_DAYS: z.coerce.number().nonnegative().optional(),
  COMMIT_MONTHS: z.coerce.number().int().positive().optional(),

  OUTPUT_DIR: z.string().optional(),
  BUCKET_TYPE: z.enum(["local", "s3"]).optional(),
  BUCKET_NAME: z.string().optional(),
  BUCKET_REGION: z.string().optional(),
  BUCKET_ENDPOINT: z.string().optional(),
  BUCKET_FORCE_PATH_STYLE: z.string().optional(),
  BUCKET_ACCESS_KEY_ID: z.string().optional(),
  BUCKET_SECRET_ACCESS_KEY: z.string().optional(),

  SLACK_WEBHOOK_URL: z.string().url().optional(),
  WEBHOOK_SECRET: z.string().optional(),
  RETRY_COUNT: z.coerce.number().int().nonnegative().optional(),
  RETRY_BACKOFF_MS: z.coerce.number().int().positive().optional(),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  LOG_FORMAT: z.enum(["json", "pretty"]).optional(),
  LOG_COLOR: z.string().optional(),
  TIMEZONE: z.string().optional()
});

export const fileConfigSchema = z.object({
  github: z
    .object({
      baseUrl: z.string().url().default("https://api.github.com"),
      perPage: z.coerce.number().int().positive().max(100).default(100),
      maxRateLimitRetries: z.coerce.number().int().nonnegative().default(3)
    })
    .default({}),
  report: z
    .object({
      configPath: z.string().default("review-digest.config.json"),
      staleDays: z.coerce.number().nonnegative().default(7),
      commitMonths: z.coerce.number().int().positive().default(3)
    })
    .default({}),
  storage: z
    .object({
      type: z.enum(["local", "s3"]).default("local"),
      dir: z.string().default("out"),
      bucket: z.string().optional(),
      region: z.string().optional(),
      endpoint: z.string().optional(),
      forcePathStyle: z.boolean().default(false),
      accessKeyId: z.string().optional(),
      secretAccessKey: z.string().optional()
    })
    .default({}),
  webhook: z
    .object({
      url: z.string().url().optional(),
      secret: z.string().optional()
    })
    .default({}),
  network: z
    .object({
      retryCount: z.coerce.number().int().nonnegative().default(2),
      retryBackoffMs: z.coerce.number().int().positive().default(500)
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      format: z.enum(["json", "pretty"]).default("json"),
      color: z.boolean().default(false),
      timeZone: z.string().optional()
    })
    .default({})
});

export type ConfigFile = z.input<typeof fileConfigSchema>;

export type AppConfig = ReturnType<typeof loadConfig>;

/**
 * Resolves the run configuration from the environment over
 * `config.defaults.ts`. Throws when no GitHub token is available, before any
 * request is made.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new Error(`Invalid environment: ${formatIssues(parsedEnv.error)}`);
  }
  const vars = parsedEnv.data;
  const fileConfig = fileConfigSchema.parse(defaultConfig);

  const token = vars.GITHUB_TOKEN?.trim();
  if (!token) {
    throw new Error("Missing GITHUB_TOKEN environment variable.");
  }

  const storage = {
    type: vars.BUCKET_TYPE ?? fileConfig.storage.type,
    dir: vars.OUTPUT_DIR ?? fileConfig.storage.dir,
    bucket: vars.BUCKET_NAME ?? fileConfig.storage.bucket,
    region: vars.BUCKET_REGION ?? fileConfig.storage.region,
    endpoint: vars.BUCKET_ENDPOINT ?? fileConfig.storage.endpoint,
    forcePathStyle: resolveBool(vars.BUCKET_FORCE_PATH_STYLE, fileConfig.storage.forcePathStyle),
    accessKeyId: vars.BUCKET_ACCESS_KEY_ID ?? fileConfig.storage.accessKeyId,
    secretAccessKey: vars.BUCKET_SECRET_ACCESS_KEY ?? fileConfig.storage.secretAccessKey
  };

  if (storage.type === "s3" && !storage.bucket) {
    throw new Error("Missing BUCKET_NAME for S3 storage.");
  }

  return {
    github: {
      token,
      baseUrl: vars.GITHUB_API_URL ?? fileConfig.github.baseUrl,
      perPage: vars.GITHUB_PER_PAGE ?? fileConfig.github.perPage,
      maxRateLimitRetries:
        vars.GITHUB_MAX_RATE_LIMIT_RETRIES ?? fileConfig.github.maxRateLimitRetries
    },
    report: {
      configPath: vars.REPORT_CONFIG ?? fileConfig.report.configPath,
      staleDays: vars.STALE_DAYS ?? fileConfig.report.staleDays,
      commitMonths: vars.COMMIT_MONTHS ?? fileConfig.report.commitMonths
    },
    storage,
    webhook: {
      url: vars.SLACK_WEBHOOK_URL ?? fileConfig.webhook.url,
      secret: vars.WEBHOOK_SECRET ?? fileConfig.webhook.secret
    },
    network: {
      retryCount: vars.RETRY_COUNT ?? fileConfig.network.retryCount,
      retryBackoffMs: vars.RETRY_BACKOFF_MS ?? fileConfig.network.retryBackoffMs
    },
    logging: {
      level: vars.LOG_LEVEL ?? fileConfig.logging.level,
      format: vars.LOG_FORMAT ?? fileConfig.logging.format,
      color: resolveBool(vars.LOG_COLOR, fileConfig.logging.color),
      timeZone: vars.TIMEZONE ?? fileConfig.logging.timeZone
    }
  };
}

// =============================================================================
// TARGETS FILE
// =============================================================================

const targetsSchema = z.object({
  repositories: z.array(z.string().min(1)).default([]),
  developers: z.array(z.string().min(1)).default([]),
  staleDays: z.number().nonnegative().optional(),
  months: z.number().int().positive().optional()
});

export type ReportTargets = z.infer<typeof targetsSchema>;

const emptyTargets = (): ReportTargets => ({ repositories: [], developers: [] });

/**
 * Reads the repositories and people of interest. A missing or malformed file
 * is not fatal: it yields empty lists and a logged warning.
 */
export async function loadTargets(configPath: string): Promise<ReportTargets> {
  const absolutePath = resolve(process.cwd(), configPath);
  let text: string;
  try {
    text = await readFile(absolutePath, "utf8");
  } catch (error) {
    logger.warn("config.targets.missing", {
      path: absolutePath,
      error: errorMessage(error)
    });
    return emptyTargets();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    logger.warn("config.targets.invalid_json", {
      path: absolutePath,
      error: errorMessage(error)
    });
    return emptyTargets();
  }

  const parsed = targetsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("config.targets.invalid", {
      path: absolutePath,
      error: formatIssues(parsed.error)
    });
    return emptyTargets();
  }

  if (parsed.data.repositories.length === 0) {
    logger.warn("config.targets.no_repositories", { path: absolutePath });
  }
  if (parsed.data.developers.length === 0) {
    logger.warn("config.targets.no_developers", { path: absolutePath });
  }
  return parsed.data;
}

function resolveBool(value: string | undefined, fallback: boolean) {
  if (value === undefined) return fallback;
  return truthy.has(value.toLowerCase());
}
