import { describe, it, expect } from "vitest";
import {
  EMPTY_PERIOD_MESSAGE,
  describeCounts,
  escapeTableCell,
  groupByAuthor,
  renderReport,
} from "../src/report/assembleMarkdown.js";
import type { CompletedPullRequest } from "../src/github/types.js";
import { createCompleted, marchRange } from "./helpers.js";

function render(pullRequests: CompletedPullRequest[], overallSummary: string | null = null): string {
  return renderReport({ pullRequests, range: marchRange(), authors: ["octocat"], overallSummary });
}

function section(markdown: string, heading: string): string {
  const start = markdown.indexOf(`## ${heading}`);
  const next = markdown.indexOf("\n## ", start + 1);
  return markdown.slice(start, next === -1 ? undefined : next);
}

function dashboardRows(markdown: string): string[] {
  return section(markdown, "PR Dashboard")
    .split("\n")
    .filter((line) => line.startsWith("|"))
    .slice(2);
}

const weekPrs = [
  createCompleted({
    repo: "acme/a",
    number: 10,
    title: "Add login page",
    createdAt: "2024-03-05T08:00:00Z",
    status: "merged",
    summary: "Adds the login page.",
    stats: { additions: 12, deletions: 3, changedFiles: 2 },
  }),
  createCompleted({
    repo: "acme/b",
    number: 11,
    title: "Fix | pipe",
    createdAt: "2024-03-09T10:00:00Z",
    status: "open",
    summary: "Fixes table escaping.",
  }),
];

describe("renderReport", () => {
  it("should render one dashboard row per PR in input order", () => {
    const markdown = render(weekPrs);

    expect(dashboardRows(markdown)).toEqual([
      "| acme/a | [#10](https://github.com/acme/a/pull/10) | Add login page | octocat | 2024-03-05 | merged |",
      "| acme/b | [#11](https://github.com/acme/b/pull/11) | Fix \\| pipe | octocat | 2024-03-09 | open |",
    ]);
  });

  it("should keep the row count equal to the number of PRs", () => {
    const prs = [5, 3, 9, 1, 7].map((number) => createCompleted({ number }));

    const rows = dashboardRows(render(prs));

    expect(rows).toHaveLength(5);
    expect(rows.map((row) => row.split(" | ")[1])).toEqual([
      "[#5](https://github.com/acme/a/pull/5)",
      "[#3](https://github.com/acme/a/pull/3)",
      "[#9](https://github.com/acme/a/pull/9)",
      "[#1](https://github.com/acme/a/pull/1)",
      "[#7](https://github.com/acme/a/pull/7)",
    ]);
  });

  it("should emit the sections in order", () => {
    const markdown = render(weekPrs);

    const positions = [
      "# Weekly PR Report",
      "## Overview",
      "## Summary by Author",
      "## PR Dashboard",
      "## Pull Request Details",
    ].map((heading) => markdown.indexOf(heading));

    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("should render per-author counts", () => {
    const table = section(render(weekPrs), "Summary by Author").split("\n");

    expect(table).toContain("| Author | PRs | Open | Closed | Merged | Unknown |");
    expect(table).toContain("|--------|-----|------|--------|--------|---------|");
    expect(table).toContain("| octocat | 2 | 1 | 0 | 1 | 0 |");
  });

  it("should write detail sections in table order", () => {
    const markdown = render(weekPrs);
    const details = section(markdown, "Pull Request Details");

    expect(details.indexOf("### acme/a#10: Add login page")).toBeLessThan(
      details.indexOf("### acme/b#11: Fix | pipe")
    );
    expect(details).toContain(
      "> 📁 **acme/a** · 👤 @octocat · 🟣 merged · [PR #10](https://github.com/acme/a/pull/10)\n> 📝 +12/-3 across 2 files\n\nAdds the login page."
    );
    expect(details).toContain("\n\nFixes table escaping.\n");
  });

  it("should put the overall summary before the counts", () => {
    const overview = section(render(weekPrs, "A week of auth work."), "Overview");

    expect(overview).toBe(
      "## Overview\n\nA week of auth work.\n\n2 pull requests were opened this week: 1 open, 0 closed, 1 merged.\n"
    );
  });

  it("should render an empty-state document without tables", () => {
    const markdown = render([]);

    expect(markdown).toBe(
      "# Weekly PR Report\n\n" +
        "**Date Range:** 2024-03-04 to 2024-03-10 (UTC)  \n" +
        "**Authors:** octocat\n\n" +
        "## Overview\n\n" +
        `${EMPTY_PERIOD_MESSAGE}\n`
    );
    expect(markdown.split("\n").filter((line) => line.startsWith("|"))).toHaveLength(0);
  });
});

describe("groupByAuthor", () => {
  it("should count statuses per author in first-seen order", () => {
    const groups = groupByAuthor([
      createCompleted({ author: "hubot", status: "closed" }),
      createCompleted({ author: "octocat", status: "merged" }),
      createCompleted({ author: "hubot", status: "unknown" }),
    ]);

    expect(groups).toEqual([
      { author: "hubot", total: 2, counts: { open: 0, closed: 1, merged: 0, unknown: 1 } },
      { author: "octocat", total: 1, counts: { open: 0, closed: 0, merged: 1, unknown: 0 } },
    ]);
  });
});

describe("describeCounts", () => {
  it("should mention unknown statuses only when present", () => {
    expect(describeCounts([createCompleted({ status: "unknown" })])).toBe(
      "1 pull request was opened this week: 0 open, 0 closed, 0 merged, 1 unknown."
    );
  });
});

describe("escapeTableCell", () => {
  it("should escape pipes and flatten newlines", () => {
    expect(escapeTableCell("a | b\nc")).toBe("a \\| b c");
  });
});
