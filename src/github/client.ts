import { formatInTimeZone } from "date-fns-tz";
import { fetch } from "undici";
import { z } from "zod";
import type { Config } from "../config.js";
import {
  GitHubAPIError,
  GitHubAuthError,
  GitHubRateLimitError,
  GitHubTimeoutError,
  GitHubTransientError,
  errorMessage,
} from "../errors.js";
import { githubLogger } from "../logger.js";
import { type DateRange, isWithinRange } from "../report/dateRange.js";
import { type RetryPolicy, withRetry } from "../retry.js";
import {
  AuthenticatedUserSchema,
  type PullRequestDetail,
  PullRequestDetailSchema,
  PullRequestFileSchema,
  type SearchIssueItem,
  SearchIssuesResponseSchema,
} from "./schemas.js";
import type { PrFileChange, PullRequestRecord } from "./types.js";

export interface GitHubRequestOptions {
  token: string;
  apiUrl: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

export function githubOptionsFromConfig(config: Config): GitHubRequestOptions {
  return {
    token: config.githubToken,
    apiUrl: config.githubApiUrl,
    timeoutMs: config.httpTimeoutMs,
    retry: config.retry,
  };
}

const PER_PAGE = 100;
// The search API never returns more than this many results per query
const SEARCH_RESULT_LIMIT = 1000;
const MAX_FILE_PAGES = 3;
const MAX_PATCH_LENGTH = 2000;

interface HeaderReader {
  get(name: string): string | null;
}

export function rateLimitWaitMs(headers: HeaderReader, now: number = Date.now()): number | undefined {
  const retryAfter = headers.get("retry-after");
  if (retryAfter !== null) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(seconds, 0) * 1000;
    }
  }

  const reset = headers.get("x-ratelimit-reset");
  if (reset !== null) {
    const resetMs = Number(reset) * 1000;
    if (Number.isFinite(resetMs)) {
      return Math.max(resetMs - now, 0);
    }
  }

  return undefined;
}

async function githubRequestOnce(url: string, options: GitHubRequestOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      headers: {
        Accept: "application/vnd.github+json",
        Authorization: `token ${options.token}`,
        "User-Agent": "weekly-pr-report",
        "X-GitHub-Api-Version": "2022-11-28",
      },
      signal: controller.signal,
    });

    if (response.ok) {
      return await response.json();
    }

    const text = await response.text();
    const detail = `GitHub API error: ${response.status} ${response.statusText}\n${text}`;

    if (response.status === 401) {
      throw new GitHubAuthError(
        `GitHub rejected the token (401). Check GITHUB_TOKEN.\n${text}`,
        401
      );
    }

    if (response.status === 403 || response.status === 429) {
      const rateLimited =
        response.status === 429 ||
        response.headers.get("x-ratelimit-remaining") === "0" ||
        response.headers.get("retry-after") !== null;

      if (rateLimited) {
        throw new GitHubRateLimitError(
          `GitHub rate limit exceeded (${response.status})`,
          response.status,
          rateLimitWaitMs(response.headers)
        );
      }
      throw new GitHubAuthError(`GitHub denied access (403).\n${text}`, 403);
    }

    if (response.status >= 500) {
      throw new GitHubTransientError(detail, response.status);
    }

    throw new GitHubAPIError(detail, response.status);
  } catch (error) {
    if (error instanceof GitHubAPIError || error instanceof GitHubTransientError) {
      throw error;
    }
    if (error instanceof Error && error.name === "AbortError") {
      throw new GitHubTimeoutError(options.timeoutMs, error);
    }
    throw new GitHubTransientError(
      `GitHub request failed: ${errorMessage(error)}`,
      undefined,
      undefined,
      error
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

async function githubRequest<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: GitHubRequestOptions
): Promise<z.infer<S>> {
  const data = await withRetry(
    () => githubRequestOnce(url, options),
    options.retry,
    `GET ${url}`,
    githubLogger
  );

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new GitHubAPIError(
      `Unexpected GitHub response from ${url}: ${parsed.error.message}`
    );
  }
  return parsed.data;
}

async function githubRequestPaginated<S extends z.ZodTypeAny>(
  url: string,
  itemSchema: S,
  options: GitHubRequestOptions,
  maxPages: number
): Promise<z.infer<S>[]> {
  const allResults: z.infer<S>[] = [];
  const pageSchema = z.array(itemSchema);

  for (let page = 1; page <= maxPages; page++) {
    const pageUrl = `${url}${url.includes("?") ? "&" : "?"}page=${page}&per_page=${PER_PAGE}`;
    const results = await githubRequest(pageUrl, pageSchema, options);

    allResults.push(...results);

    if (results.length < PER_PAGE) {
      break;
    }
  }

  return allResults;
}

export async function getAuthenticatedLogin(options: GitHubRequestOptions): Promise<string> {
  const user = await githubRequest(`${options.apiUrl}/user`, AuthenticatedUserSchema, options);
  githubLogger.info({ login: user.login }, "Resolved authenticated GitHub user");
  return user.login;
}

export function repoFromRepositoryUrl(repositoryUrl: string): string {
  const parts = repositoryUrl.replace(/\/+$/, "").split("/");
  if (parts.length < 2) {
    return "unknown";
  }
  return parts.slice(-2).join("/");
}

function toPullRequestRecord(item: SearchIssueItem, apiUrl: string): PullRequestRecord {
  const repo = repoFromRepositoryUrl(item.repository_url);
  return {
    repo,
    number: item.number,
    title: item.title,
    author: item.user?.login ?? "unknown",
    createdAt: item.created_at,
    htmlUrl: item.html_url,
    apiUrl: item.pull_request?.url ?? `${apiUrl}/repos/${repo}/pulls/${item.number}`,
    body: item.body ?? "",
  };
}

// Bare dates in a `created:` qualifier are UTC days, so the bounds carry their offset
function searchTimestamp(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, "yyyy-MM-dd'T'HH:mm:ssXXX");
}

export function buildSearchQuery(author: string, range: DateRange): string {
  const from = searchTimestamp(range.start, range.timezone);
  const to = searchTimestamp(range.end, range.timezone);
  return `is:pr author:${author} created:${from}..${to}`;
}

/**
 * All PRs opened by `author` inside `range`, in the order the search
 * API returns them.
 */
export async function searchPullRequests(
  author: string,
  range: DateRange,
  options: GitHubRequestOptions
): Promise<PullRequestRecord[]> {
  const query = buildSearchQuery(author, range);
  const records: PullRequestRecord[] = [];
  let fetched = 0;

  for (let page = 1; ; page++) {
    const params = new URLSearchParams({
      q: query,
      per_page: String(PER_PAGE),
      page: String(page),
    });
    githubLogger.info({ author, page, query }, "Searching pull requests");

    const result = await githubRequest(
      `${options.apiUrl}/search/issues?${params.toString()}`,
      SearchIssuesResponseSchema,
      options
    );

    if (result.incomplete_results) {
      githubLogger.warn({ author, page }, "GitHub search returned incomplete results");
    }

    fetched += result.items.length;
    for (const item of result.items) {
      const record = toPullRequestRecord(item, options.apiUrl);
      if (record.author.toLowerCase() !== author.toLowerCase()) {
        githubLogger.debug({ pr: record.number, author: record.author }, "Skipping PR by another author");
        continue;
      }
      if (!isWithinRange(record.createdAt, range)) {
        githubLogger.debug({ pr: record.number, createdAt: record.createdAt }, "Skipping PR outside date range");
        continue;
      }
      records.push(record);
    }

    if (result.items.length < PER_PAGE || fetched >= result.total_count) {
      break;
    }
    if (page * PER_PAGE >= SEARCH_RESULT_LIMIT) {
      githubLogger.warn(
        { author, totalCount: result.total_count },
        `Search capped at ${SEARCH_RESULT_LIMIT} results`
      );
      break;
    }
  }

  githubLogger.info({ author, count: records.length }, "Fetched pull requests");
  return records;
}

export async function getPullRequestDetail(
  record: PullRequestRecord,
  options: GitHubRequestOptions
): Promise<PullRequestDetail> {
  return githubRequest(record.apiUrl, PullRequestDetailSchema, options);
}

export async function listPrFiles(
  record: PullRequestRecord,
  options: GitHubRequestOptions
): Promise<PrFileChange[]> {
  const files = await githubRequestPaginated(
    `${record.apiUrl}/files`,
    PullRequestFileSchema,
    options,
    MAX_FILE_PAGES
  );

  return files.map((file) => ({
    filename: file.filename,
    status: file.status,
    additions: file.additions,
    deletions: file.deletions,
    patch: file.patch ? truncatePatch(file.patch, MAX_PATCH_LENGTH) : undefined,
  }));
}

// Truncate large patches to avoid token limits
export function truncatePatch(patch: string, maxLength: number): string {
  if (patch.length <= maxLength) return patch;
  return patch.slice(0, maxLength) + "\n... [truncated]";
}
