import { type Config, loadConfig } from "../config.js";
import { githubOptionsFromConfig } from "../github/client.js";
import { fetchWeeklyPullRequests } from "../github/fetchPullRequests.js";
import { fetchPrFilesOrEmpty, resolveStatus } from "../github/status.js";
import type { CompletedPullRequest, PullRequestRecord } from "../github/types.js";
import { type CompletionClient, createCompletionClient } from "../llm/client.js";
import { SUMMARY_PLACEHOLDER, summarizePullRequest, summarizeWeek } from "../llm/summarize.js";
import { jobLogger } from "../logger.js";
import { renderReport } from "../report/assembleMarkdown.js";
import { type Clock, type DateRange, previousWeekRange, systemClock } from "../report/dateRange.js";
import { writeReport } from "../report/persist.js";
import { processInParallel } from "./parallel.js";

export interface JobDependencies {
  config?: Config;
  clock?: Clock;
  completionClient?: CompletionClient;
}

export interface WeeklyReportResult {
  outputPath: string;
  range: DateRange;
  pullRequests: CompletedPullRequest[];
  degraded: number;
}

async function completePullRequest(
  pr: PullRequestRecord,
  config: Config,
  client: CompletionClient
): Promise<CompletedPullRequest> {
  const options = githubOptionsFromConfig(config);

  const [{ status, stats }, files] = await Promise.all([
    resolveStatus(pr, options),
    fetchPrFilesOrEmpty(pr, options),
  ]);
  const summary = await summarizePullRequest(pr, status, files, client, config.retry);

  return { ...pr, status, stats, summary };
}

/**
 * Fetches last week's PRs, enriches each with status and summary, and
 * writes the Markdown report. Rejects, without writing anything, when
 * the configuration or the PR search fails; per-PR lookups degrade
 * instead.
 */
export async function runWeeklyReportJob(
  deps: JobDependencies = {}
): Promise<WeeklyReportResult> {
  const config = deps.config ?? loadConfig();
  const clock = deps.clock ?? systemClock;
  const client = deps.completionClient ?? createCompletionClient(config.llm);

  const range = previousWeekRange(clock, config.timezone);
  jobLogger.info(
    { from: range.startDate, to: range.endDate, timezone: range.timezone },
    "Generating weekly PR report"
  );

  const { authors, pullRequests } = await fetchWeeklyPullRequests(config, range);

  const startTime = Date.now();
  const completed = await processInParallel(
    pullRequests,
    config.concurrency,
    (pr) => completePullRequest(pr, config, client),
    (done, total) => jobLogger.debug({ done, total }, "Pull request processed")
  );
  jobLogger.info(
    { count: completed.length, durationMs: Date.now() - startTime },
    "Enriched pull requests"
  );

  const overallSummary = await summarizeWeek(completed, client, config.retry);

  const markdown = renderReport({ pullRequests: completed, range, authors, overallSummary });
  await writeReport(config.outputPath, markdown);

  const degraded = completed.filter(
    (pr) => pr.status === "unknown" || pr.summary === SUMMARY_PLACEHOLDER
  ).length;
  if (degraded > 0) {
    jobLogger.warn({ degraded }, "Report written with placeholder entries");
  }
  jobLogger.info({ outputPath: config.outputPath, count: completed.length }, "Report written");

  return { outputPath: config.outputPath, range, pullRequests: completed, degraded };
}
