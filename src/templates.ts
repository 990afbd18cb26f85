import dedent from "dedent";
import type {
  AnnotatedPullRequest,
  CommitReport,
  RepositoryStatus,
  ReviewReport
} from "./types.js";

const reviewStyles = dedent`
  body { font-family: Arial, sans-serif; background: #f4f4f4; margin: 20px; padding: 20px; display: flex; flex-direction: column; align-items: center; }
  h1 { color: #333; font-size: 28px; }
  .developer-card { background: #fff; border-radius: 8px; box-shadow: 0 4px 8px rgba(0, 0, 0, 0.1); padding: 20px; margin: 10px; width: 60%; max-width: 600px; }
  h2 { color: #0366d6; font-size: 20px; margin-bottom: 10px; }
  ul { list-style-type: none; padding: 0; }
  li { margin: 8px 0; padding: 8px; border-radius: 6px; background: #f9f9f9; }
  a { text-decoration: none; color: #0366d6; font-weight: bold; }
  a:hover { text-decoration: underline; }
  .meta { color: #666; font-size: 12px; margin-left: 6px; }
  .badge { display: inline-block; font-size: 11px; padding: 2px 6px; border-radius: 10px; margin-left: 6px; }
  .badge-progress { background: #dcffe4; color: #22863a; }
  .badge-stale { background: #fff5b1; color: #735c0f; }
  .badge-unknown { background: #eee; color: #555; }
  .warnings { background: #fff5f5; border: 1px solid #f3c1c1; border-radius: 8px; padding: 12px 20px; width: 60%; max-width: 600px; }
`;

export function renderReviewReportHtml(report: ReviewReport) {
  const cards = report.reviewers.map((reviewer) =>
    [
      `<div class="developer-card"><h2>${escapeHtml(reviewer.developer)}</h2><ul>`,
      ...reviewer.reviewingPrs.map(renderPullRequestItem),
      `</ul></div>`
    ].join("\n")
  );
  const empty =
    report.reviewers.length === 0 ? `<p>No open pull requests are waiting on these reviewers.</p>` : "";

  return page({
    title: "GitHub PR Reviewers Report",
    styles: reviewStyles,
    body: [
      `<h1>GitHub PR Reviewers Report</h1>`,
      `<p class="meta">Generated ${escapeHtml(report.generatedAt)} · stale after ${report.staleDays} days</p>`,
      renderFetchWarnings(report.repositories),
      empty,
      ...cards
    ]
  });
}

export function renderPullRequestItem(pr: AnnotatedPullRequest) {
  const badges = [
    pr.inProgress ? `<span class="badge badge-progress">in progress</span>` : "",
    pr.stale ? `<span class="badge badge-stale">stale</span>` : "",
    pr.feedbackLookup === "failed" ? `<span class="badge badge-unknown">feedback unknown</span>` : ""
  ].join("");
  const link = `<a href="${escapeHtml(pr.url)}" target="_blank" rel="noopener">${escapeHtml(pr.title)}</a>`;
  const meta = `<span class="meta">${escapeHtml(pr.repository)}#${pr.number}</span>`;
  return `<li>${link}${meta}${badges}</li>`;
}

function renderFetchWarnings(repositories: RepositoryStatus[]) {
  const failedRepos = repositories.filter((repo) => !repo.ok);
  if (failedRepos.length === 0) return "";
  const items = failedRepos.map(
    (repo) =>
      `<li>${escapeHtml(repo.repository)}: ${escapeHtml(repo.failure?.message ?? "fetch failed")}</li>`
  );
  return [
    `<div class="warnings"><strong>Incomplete data</strong><ul>`,
    ...items,
    `</ul></div>`
  ].join("\n");
}

const commitStyles = dedent`
  body { font-family: Arial, sans-serif; background: #f8f9fa; margin: 40px; }
  .card { background: #fff; border-radius: 8px; box-shadow: 0 2px 6px rgba(0, 0, 0, 0.1); margin-bottom: 24px; max-width: 720px; }
  .card-header { background: #212529; color: #fff; padding: 12px 20px; border-radius: 8px 8px 0 0; }
  .card-header h2 { margin: 0; font-size: 18px; }
  table { width: 100%; border-collapse: collapse; }
  th, td { text-align: left; padding: 8px 20px; border-bottom: 1px solid #eee; }
  tbody tr:nth-child(odd) { background: #f2f2f2; }
  .partial { color: #b08800; }
`;

export function renderCommitReportHtml(report: CommitReport) {
  const months = report.months.length;
  const cards = report.repositories.map((repo) => {
    const rows = repo.counts.map((count) => {
      const value = count.ok
        ? String(count.commits)
        : `<span class="partial" title="fetch failed, count is partial">${count.commits}+</span>`;
      return `<tr><td>${escapeHtml(count.label)}</td><td>${value}</td></tr>`;
    });
    return [
      `<div class="card">`,
      `<div class="card-header"><h2>${escapeHtml(repo.repository)}</h2></div>`,
      `<table><thead><tr><th>Month</th><th>Commits</th></tr></thead><tbody>`,
      ...rows,
      `</tbody></table>`,
      `</div>`
    ].join("\n");
  });

  return page({
    title: "GitHub Commits Report",
    styles: commitStyles,
    body: [
      `<h1>GitHub Commits Report (Last ${months} ${months === 1 ? "Month" : "Months"})</h1>`,
      ...cards
    ]
  });
}

function page(args: { title: string; styles: string; body: string[] }) {
  const body = args.body.filter((part) => part.length > 0).join("\n");
  return [
    `<!DOCTYPE html>`,
    `<html lang="en">`,
    `<head>`,
    `<meta charset="UTF-8">`,
    `<meta name="viewport" content="width=device-width, initial-scale=1.0">`,
    `<title>${escapeHtml(args.title)}</title>`,
    `<style>`,
    args.styles,
    `</style>`,
    `</head>`,
    `<body>`,
    body,
    `</body>`,
    `</html>`,
    ""
  ].join("\n");
}

export function escapeHtml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
