import type { z } from "zod";
import type { MonthWindow } from "./types.js";

const monthLabel = new Intl.DateTimeFormat("en-US", {
  month: "long",
  year: "numeric",
  timeZone: "UTC"
});

/**
 * The `count` complete calendar months before the month of `now`, oldest
 * first, with UTC day bounds.
 */
export function getLastFullMonths(now: Date, count: number): MonthWindow[] {
  const months: MonthWindow[] = [];
  for (let offset = count; offset >= 1; offset -= 1) {
    const first = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - offset, 1));
    const last = new Date(Date.UTC(first.getUTCFullYear(), first.getUTCMonth() + 1, 0));
    months.push({
      label: monthLabel.format(first),
      since: `${toDateKey(first)}T00:00:00Z`,
      until: `${toDateKey(last)}T23:59:59Z`
    });
  }
  return months;
}

export function withDuration(startMs: number) {
  return { durationMs: Date.now() - startMs };
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function formatIssues(error: z.ZodError) {
  return error.errors
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join(", ");
}

function toDateKey(date: Date) {
  return date.toISOString().slice(0, 10);
}
