import type { Config } from "../config.js";
import { githubLogger } from "../logger.js";
import type { DateRange } from "../report/dateRange.js";
import {
  getAuthenticatedLogin,
  githubOptionsFromConfig,
  searchPullRequests,
} from "./client.js";
import type { PullRequestRecord } from "./types.js";

export interface WeeklyPullRequests {
  authors: string[];
  pullRequests: PullRequestRecord[];
}

export async function resolveAuthors(config: Config): Promise<string[]> {
  if (config.githubAuthors.length > 0) {
    return config.githubAuthors;
  }
  const login = await getAuthenticatedLogin(githubOptionsFromConfig(config));
  return [login];
}

/**
 * PRs opened by every configured author during `range`. Authors are
 * searched one after another and their results concatenated; a PR is
 * kept once even if two author searches return it.
 */
export async function fetchWeeklyPullRequests(
  config: Config,
  range: DateRange
): Promise<WeeklyPullRequests> {
  const options = githubOptionsFromConfig(config);
  const authors = await resolveAuthors(config);

  const seen = new Set<string>();
  const pullRequests: PullRequestRecord[] = [];

  for (const author of authors) {
    const records = await searchPullRequests(author, range, options);
    for (const record of records) {
      const key = `${record.repo}#${record.number}`;
      if (seen.has(key)) continue;
      seen.add(key);
      pullRequests.push(record);
    }
  }

  githubLogger.info(
    { authors, count: pullRequests.length, from: range.startDate, to: range.endDate },
    "Collected pull requests for the week"
  );

  return { authors, pullRequests };
}
