export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggerConfig = {
  level: LogLevel;
  format: "json" | "pretty";
  color: boolean;
  timeZone?: string;
  baseContext?: Record<string, unknown>;
  write: (line: string) => void;
};

type LogEntry = {
  level: LogLevel;
  msg: string;
  ts: string;
  data?: Record<string, unknown>;
};

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// stdout is reserved for report output. Every log line goes to stderr.
let config: LoggerConfig = {
  level: "info",
  format: "json",
  color: false,
  timeZone: undefined,
  baseContext: {},
  write: (line) => process.stderr.write(`${line}\n`)
};

export function setLoggerConfig(next: Partial<LoggerConfig>) {
  config = { ...config, ...next };
}

export function getLoggerConfig(): LoggerConfig {
  return config;
}

export function log(level: LogLevel, msg: string, data?: Record<string, unknown>) {
  if (levelWeight[level] < levelWeight[config.level]) {
    return;
  }
  const entry: LogEntry = {
    level,
    msg,
    ts: formatTimestamp(new Date(), config.timeZone),
    data: mergeContext(config.baseContext, data)
  };
  config.write(formatLine(entry));
}

function bind(context?: Record<string, unknown>) {
  return {
    debug: (msg: string, data?: Record<string, unknown>) =>
      log("debug", msg, mergeContext(context, data)),
    info: (msg: string, data?: Record<string, unknown>) =>
      log("info", msg, mergeContext(context, data)),
    warn: (msg: string, data?: Record<string, unknown>) =>
      log("warn", msg, mergeContext(context, data)),
    error: (msg: string, data?: Record<string, unknown>) =>
      log("error", msg, mergeContext(context, data))
  };
}

export type ContextLogger = ReturnType<typeof bind>;

export const logger = {
  ...bind(),
  withContext: (context: Record<string, unknown>): ContextLogger => bind(context)
};

/**
 * Adapts a logger to the `log` option Octokit accepts. Octokit reports every
 * request at info level, which is too chatty for a batch job, so requests are
 * demoted to debug.
 */
export function toOctokitLog(target: ContextLogger) {
  return {
    debug: (message: string) => target.debug("octokit.debug", { message }),
    info: (message: string) => target.debug("octokit.request", { message }),
    warn: (message: string) => target.warn("octokit.warn", { message }),
    error: (message: string) => target.error("octokit.error", { message })
  };
}

function mergeContext(
  base?: Record<string, unknown>,
  extra?: Record<string, unknown>
) {
  if (!base && !extra) return undefined;
  if (!base) return extra;
  if (!extra) return base;
  return { ...base, ...extra };
}

function formatLine(entry: LogEntry) {
  if (config.format === "pretty") {
    return formatPretty(entry);
  }
  return JSON.stringify(entry);
}

function formatPretty(entry: LogEntry) {
  const level = config.color ? paint(levelColor[entry.level], entry.level) : entry.level;
  const msg = config.color ? paint("blue", entry.msg) : entry.msg;
  const header = `[${entry.ts}] ${level} ${msg}`;
  if (!entry.data || Object.keys(entry.data).length === 0) {
    return header;
  }
  return `${header} ${JSON.stringify(entry.data)}`;
}

const colors = {
  reset: "\u001b[0m",
  red: "\u001b[31m",
  yellow: "\u001b[33m",
  green: "\u001b[32m",
  blue: "\u001b[34m",
  magenta: "\u001b[35m"
};

type Color = Exclude<keyof typeof colors, "reset">;

const levelColor: Record<LogLevel, Color> = {
  debug: "magenta",
  info: "green",
  warn: "yellow",
  error: "red"
};

function paint(color: Color, text: string) {
  return `${colors[color]}${text}${colors.reset}`;
}

export function formatTimestamp(date: Date, timeZone?: string) {
  if (!timeZone) {
    return date.toISOString();
  }
  const parts = new Intl.DateTimeFormat("sv-SE", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false
  }).formatToParts(date);
  const map = Object.fromEntries(parts.map((part) => [part.type, part.value]));
  const ms = String(date.getMilliseconds()).padStart(3, "0");
  return `${map.year}-${map.month}-${map.day}T${map.hour}:${map.minute}:${map.second}.${ms} ${timeZone}`;
}
