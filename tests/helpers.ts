import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from "undici";
import type { Config } from "../src/config.js";
import type { CompletedPullRequest, PullRequestRecord } from "../src/github/types.js";
import { previousWeekRange, type DateRange } from "../src/report/dateRange.js";

export const GITHUB_ORIGIN = "https://api.github.com";
export const LLM_ORIGIN = "https://llm.test";

// Monday 2024-03-11: last week is 2024-03-04 .. 2024-03-10
export const MONDAY_2024_03_11 = new Date("2024-03-11T09:00:00Z");

export function fixedClock(now: Date) {
  return { now: () => new Date(now.getTime()) };
}

export function marchRange(): DateRange {
  return previousWeekRange(fixedClock(MONDAY_2024_03_11), "UTC");
}

export function createTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    githubToken: "test-token",
    githubAuthors: ["octocat"],
    githubApiUrl: GITHUB_ORIGIN,
    httpTimeoutMs: 1000,
    llm: {
      endpoint: `${LLM_ORIGIN}/v1/completions`,
      token: "test-secret",
      model: "test-model",
      maxTokens: 200,
      temperature: 0.7,
      timeoutMs: 1000,
    },
    retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    timezone: "UTC",
    outputPath: "weekly-pr-report.md",
    concurrency: 2,
    ...overrides,
  };
}

export function createRecord(overrides: Partial<PullRequestRecord> = {}): PullRequestRecord {
  const repo = overrides.repo ?? "acme/a";
  const number = overrides.number ?? 10;
  return {
    repo,
    number,
    title: "Add login page",
    author: "octocat",
    createdAt: "2024-03-05T08:00:00Z",
    htmlUrl: `https://github.com/${repo}/pull/${number}`,
    apiUrl: `${GITHUB_ORIGIN}/repos/${repo}/pulls/${number}`,
    body: "Adds a login page.",
    ...overrides,
  };
}

export function createCompleted(overrides: Partial<CompletedPullRequest> = {}): CompletedPullRequest {
  return {
    ...createRecord(overrides),
    status: "open",
    summary: "A summary.",
    ...overrides,
  };
}

export interface SearchItemInput {
  number: number;
  repo: string;
  createdAt: string;
  login?: string;
  state?: "open" | "closed";
  title?: string;
}

export function searchItem(input: SearchItemInput) {
  return {
    number: input.number,
    title: input.title ?? `PR ${input.number}`,
    state: input.state ?? "open",
    body: null,
    html_url: `https://github.com/${input.repo}/pull/${input.number}`,
    repository_url: `${GITHUB_ORIGIN}/repos/${input.repo}`,
    created_at: input.createdAt,
    user: { login: input.login ?? "octocat" },
    pull_request: { url: `${GITHUB_ORIGIN}/repos/${input.repo}/pulls/${input.number}` },
  };
}

export function searchPage(page: number): (path: string) => boolean {
  return (path) =>
    path.startsWith("/search/issues?") &&
    new URLSearchParams(path.slice(path.indexOf("?") + 1)).get("page") === String(page);
}

export interface MockNetwork {
  agent: MockAgent;
  restore(): Promise<void>;
}

export function installMockAgent(): MockNetwork {
  const original: Dispatcher = getGlobalDispatcher();
  const agent = new MockAgent();
  agent.disableNetConnect();
  setGlobalDispatcher(agent);

  return {
    agent,
    async restore() {
      await agent.close();
      setGlobalDispatcher(original);
    },
  };
}
