import { errorMessage } from "../errors.js";
import { githubLogger } from "../logger.js";
import { type GitHubRequestOptions, getPullRequestDetail, listPrFiles } from "./client.js";
import type { PullRequestDetail } from "./schemas.js";
import type { PrFileChange, PrStatusResult, PullRequestRecord, PullRequestStatus } from "./types.js";

// Precedence: merged > closed > open
export function statusFromDetail(detail: PullRequestDetail): PullRequestStatus {
  if (detail.merged_at || detail.merged) {
    return "merged";
  }
  if (detail.state === "closed") {
    return "closed";
  }
  return "open";
}

/**
 * Looks up the PR's current state. A failed lookup yields "unknown"
 * and the run carries on.
 */
export async function resolveStatus(
  record: PullRequestRecord,
  options: GitHubRequestOptions
): Promise<PrStatusResult> {
  try {
    const detail = await getPullRequestDetail(record, options);
    const status = statusFromDetail(detail);
    githubLogger.debug({ repo: record.repo, pr: record.number, status }, "Resolved PR status");

    return {
      status,
      stats:
        detail.additions !== undefined && detail.deletions !== undefined
          ? {
              additions: detail.additions,
              deletions: detail.deletions,
              changedFiles: detail.changed_files ?? 0,
            }
          : undefined,
    };
  } catch (error) {
    githubLogger.warn(
      { repo: record.repo, pr: record.number, err: errorMessage(error) },
      "Status lookup failed, marking PR as unknown"
    );
    return { status: "unknown" };
  }
}

// Diff context for the summary prompt; the summary can do without it.
export async function fetchPrFilesOrEmpty(
  record: PullRequestRecord,
  options: GitHubRequestOptions
): Promise<PrFileChange[]> {
  try {
    return await listPrFiles(record, options);
  } catch (error) {
    githubLogger.warn(
      { repo: record.repo, pr: record.number, err: errorMessage(error) },
      "Could not list PR files, summarizing without diff"
    );
    return [];
  }
}
