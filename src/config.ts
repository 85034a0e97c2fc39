import "./env.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry.js";

export interface LlmConfig {
  endpoint: string;
  token: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface Config {
  githubToken: string;
  // Empty means "the token's own user"
  githubAuthors: string[];
  githubApiUrl: string;
  httpTimeoutMs: number;

  llm: LlmConfig;
  retry: RetryPolicy;

  timezone: string;
  outputPath: string;
  concurrency: number;
}

type Env = Record<string, string | undefined>;

function parseAuthors(authorsStr: string | undefined): string[] {
  return (authorsStr ?? "")
    .split(",")
    .map((author) => author.trim().replace(/^@/, ""))
    .filter((author) => author.length > 0);
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  { integer = true, min = 0 }: { integer?: boolean; min?: number } = {}
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < min) {
    throw new ConfigError(
      `Invalid ${name}: ${raw}. Expected ${integer ? "an integer" : "a number"} >= ${min}`
    );
  }
  return value;
}

function requireEnv(env: Env, name: string, hint?: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(hint ? `${name} is required (${hint})` : `${name} is required`);
  }
  return value;
}

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function loadConfig(env: Env = process.env): Config {
  const githubToken = requireEnv(env, "GITHUB_TOKEN");
  const githubAuthors = parseAuthors(env.GITHUB_AUTHORS);
  const githubApiUrl = (env.GITHUB_API_URL || "https://api.github.com").replace(/\/+$/, "");

  const llmEndpoint = requireEnv(env, "LLM_ENDPOINT", "URL of the completions endpoint");
  try {
    new URL(llmEndpoint);
  } catch (error) {
    throw new ConfigError(`Invalid LLM_ENDPOINT: ${llmEndpoint}`, error);
  }

  const llm: LlmConfig = {
    endpoint: llmEndpoint,
    token: requireEnv(env, "LLM_TOKEN"),
    model: env.LLM_MODEL || "granite-8b-code-instruct-128k",
    maxTokens: readNumber(env, "LLM_MAX_TOKENS", 200, { min: 1 }),
    temperature: readNumber(env, "LLM_TEMPERATURE", 0.7, { integer: false }),
    timeoutMs: readNumber(env, "LLM_TIMEOUT_MS", 60000, { min: 1 }),
  };

  const retry: RetryPolicy = {
    maxAttempts: readNumber(env, "RETRY_MAX_ATTEMPTS", DEFAULT_RETRY_POLICY.maxAttempts, { min: 1 }),
    baseDelayMs: readNumber(env, "RETRY_BASE_DELAY_MS", DEFAULT_RETRY_POLICY.baseDelayMs),
    maxDelayMs: readNumber(env, "RETRY_MAX_DELAY_MS", DEFAULT_RETRY_POLICY.maxDelayMs),
  };

  const timezone = env.REPORT_TIMEZONE || "UTC";
  if (!isValidTimezone(timezone)) {
    throw new ConfigError(`Invalid REPORT_TIMEZONE: ${timezone}`);
  }

  return {
    githubToken,
    githubAuthors,
    githubApiUrl,
    httpTimeoutMs: readNumber(env, "HTTP_TIMEOUT_MS", 30000, { min: 1 }),
    llm,
    retry,
    timezone,
    outputPath: env.REPORT_OUTPUT_PATH || "weekly-pr-report.md",
    concurrency: readNumber(env, "REPORT_CONCURRENCY", 3, { min: 1 }),
  };
}
