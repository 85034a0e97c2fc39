import { errorMessage } from "../errors.js";
import type { CompletedPullRequest, PrFileChange, PullRequestRecord, PullRequestStatus } from "../github/types.js";
import { llmLogger } from "../logger.js";
import { type RetryPolicy, withRetry } from "../retry.js";
import type { CompletionClient } from "./client.js";
import { buildOverallSummaryPrompt, buildPrSummaryPrompt, loadPrompt } from "./prompts.js";

export const SUMMARY_PLACEHOLDER = "Summary unavailable.";
export const OVERALL_SUMMARY_PLACEHOLDER = "Overall summary unavailable.";

const OVERALL_SUMMARY_MAX_TOKENS = 150;

export function normaliseSummary(text: string): string {
  return text
    .trim()
    .replace(/^```[\w-]*\n?/, "")
    .replace(/\n?```$/, "")
    .trim();
}

/**
 * Asks the model for a summary of one PR. Transient failures are
 * retried per `retry`; whatever still fails yields SUMMARY_PLACEHOLDER.
 */
export async function summarizePullRequest(
  pr: PullRequestRecord,
  status: PullRequestStatus,
  files: PrFileChange[],
  client: CompletionClient,
  retry: RetryPolicy
): Promise<string> {
  const log = llmLogger.child({ repo: pr.repo, pr: pr.number });

  try {
    const template = await loadPrompt("pr-summary-prompt.md");
    const prompt = buildPrSummaryPrompt(template, pr, status, files);
    const raw = await withRetry(
      () => client.complete(prompt),
      retry,
      `summary ${pr.repo}#${pr.number}`,
      log
    );
    const summary = normaliseSummary(raw);
    return summary || SUMMARY_PLACEHOLDER;
  } catch (error) {
    log.error({ err: errorMessage(error) }, "Summary generation failed, using placeholder");
    return SUMMARY_PLACEHOLDER;
  }
}

/**
 * One overview paragraph over the whole week, or null when there is
 * nothing to summarize.
 */
export async function summarizeWeek(
  prs: CompletedPullRequest[],
  client: CompletionClient,
  retry: RetryPolicy
): Promise<string | null> {
  if (prs.length === 0) {
    return null;
  }

  try {
    const template = await loadPrompt("overall-summary-prompt.md");
    const prompt = buildOverallSummaryPrompt(template, prs);
    const raw = await withRetry(
      () => client.complete(prompt, { maxTokens: OVERALL_SUMMARY_MAX_TOKENS }),
      retry,
      "overall summary",
      llmLogger
    );
    return normaliseSummary(raw) || OVERALL_SUMMARY_PLACEHOLDER;
  } catch (error) {
    llmLogger.error({ err: errorMessage(error) }, "Overall summary failed, using placeholder");
    return OVERALL_SUMMARY_PLACEHOLDER;
  }
}
