import { isValid } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";
import type { CompletedPullRequest, PullRequestStatus } from "../github/types.js";
import type { AuthorSummary, ReportInput, StatusCounts } from "./model.js";

export const EMPTY_PERIOD_MESSAGE = "No pull requests were created in this period.";

const STATUS_ORDER: PullRequestStatus[] = ["open", "closed", "merged", "unknown"];

const STATUS_EMOJI: Record<PullRequestStatus, string> = {
  open: "🟢",
  closed: "🔴",
  merged: "🟣",
  unknown: "⚪",
};

function emptyCounts(): StatusCounts {
  return { open: 0, closed: 0, merged: 0, unknown: 0 };
}

/**
 * Per-author status counts, authors in order of first appearance.
 */
export function groupByAuthor(prs: CompletedPullRequest[]): AuthorSummary[] {
  const groups = new Map<string, AuthorSummary>();

  for (const pr of prs) {
    let group = groups.get(pr.author);
    if (!group) {
      group = { author: pr.author, total: 0, counts: emptyCounts() };
      groups.set(pr.author, group);
    }
    group.total++;
    group.counts[pr.status]++;
  }

  return Array.from(groups.values());
}

export function escapeTableCell(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/\|/g, "\\|").trim();
}

function singleLine(value: string): string {
  return value.replace(/\s*\r?\n\s*/g, " ").trim();
}

export function formatCreatedDate(createdAt: string, timezone: string): string {
  const date = new Date(createdAt);
  return isValid(date) ? formatInTimeZone(date, timezone, "yyyy-MM-dd") : createdAt;
}

export function describeCounts(prs: CompletedPullRequest[]): string {
  const counts = emptyCounts();
  for (const pr of prs) {
    counts[pr.status]++;
  }

  const noun = prs.length === 1 ? "pull request was" : "pull requests were";
  const breakdown = STATUS_ORDER.filter((status) => status !== "unknown" || counts.unknown > 0)
    .map((status) => `${counts[status]} ${status}`)
    .join(", ");

  return `${prs.length} ${noun} opened this week: ${breakdown}.`;
}

function renderTable(headers: string[], rows: string[][]): string[] {
  const lines = [
    `| ${headers.join(" | ")} |`,
    `|${headers.map((h) => "-".repeat(h.length + 2)).join("|")}|`,
  ];
  for (const row of rows) {
    lines.push(`| ${row.join(" | ")} |`);
  }
  return lines;
}

function prLink(pr: CompletedPullRequest): string {
  return pr.htmlUrl ? `[#${pr.number}](${pr.htmlUrl})` : `#${pr.number}`;
}

function renderDetail(pr: CompletedPullRequest): string[] {
  const parts: string[] = [];
  parts.push(`### ${pr.repo}#${pr.number}: ${singleLine(pr.title)}\n`);

  const metaParts = [
    `📁 **${pr.repo}**`,
    `👤 @${pr.author}`,
    `${STATUS_EMOJI[pr.status]} ${pr.status}`,
  ];
  if (pr.htmlUrl) metaParts.push(`[PR #${pr.number}](${pr.htmlUrl})`);
  parts.push(`> ${metaParts.join(" · ")}`);

  if (pr.stats) {
    const fileNoun = pr.stats.changedFiles === 1 ? "file" : "files";
    parts.push(
      `> 📝 +${pr.stats.additions}/-${pr.stats.deletions} across ${pr.stats.changedFiles} ${fileNoun}`
    );
  }

  parts.push("");
  parts.push(pr.summary.trim());
  parts.push("");
  parts.push("---");
  parts.push("");
  return parts;
}

/**
 * Renders the weekly report. Sections, in order: overview, summary by
 * author, PR dashboard, per-PR details. Dashboard rows and detail
 * sections follow the input order.
 */
export function renderReport(input: ReportInput): string {
  const { pullRequests, range, authors, overallSummary } = input;
  const parts: string[] = [];

  parts.push("# Weekly PR Report\n");
  parts.push(`**Date Range:** ${range.startDate} to ${range.endDate} (${range.timezone})  `);
  parts.push(`**Authors:** ${authors.length > 0 ? authors.join(", ") : "none"}\n`);

  parts.push("## Overview\n");
  if (pullRequests.length === 0) {
    parts.push(EMPTY_PERIOD_MESSAGE);
    return parts.join("\n") + "\n";
  }

  if (overallSummary && overallSummary.trim()) {
    parts.push(overallSummary.trim());
    parts.push("");
  }
  parts.push(describeCounts(pullRequests));
  parts.push("");

  parts.push("## Summary by Author\n");
  parts.push(
    ...renderTable(
      ["Author", "PRs", "Open", "Closed", "Merged", "Unknown"],
      groupByAuthor(pullRequests).map((group) => [
        escapeTableCell(group.author),
        String(group.total),
        ...STATUS_ORDER.map((status) => String(group.counts[status])),
      ])
    )
  );
  parts.push("");

  parts.push("## PR Dashboard\n");
  parts.push(
    ...renderTable(
      ["Repository", "PR", "Title", "Author", "Created", "Status"],
      pullRequests.map((pr) => [
        escapeTableCell(pr.repo),
        prLink(pr),
        escapeTableCell(pr.title),
        escapeTableCell(pr.author),
        formatCreatedDate(pr.createdAt, range.timezone),
        pr.status,
      ])
    )
  );
  parts.push("");

  parts.push("## Pull Request Details\n");
  for (const pr of pullRequests) {
    parts.push(...renderDetail(pr));
  }

  return parts.join("\n").trimEnd() + "\n";
}
