/**
 * Base error class for report job errors.
 */
export class ReportError extends Error {
  constructor(
    message: string,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Transient failures: the caller may retry these with backoff.
 */
export class RetryableError extends ReportError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/**
 * Failures that will not go away on retry.
 */
export class NonRetryableError extends ReportError {}

export class ConfigError extends NonRetryableError {}

export class GitHubAPIError extends NonRetryableError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

export class GitHubAuthError extends GitHubAPIError {}

export class GitHubTransientError extends RetryableError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    retryAfterMs?: number,
    cause?: unknown
  ) {
    super(message, retryAfterMs, cause);
  }
}

export class GitHubRateLimitError extends GitHubTransientError {}

export class GitHubTimeoutError extends GitHubTransientError {
  constructor(timeoutMs: number, cause?: unknown) {
    super(`GitHub request timed out after ${timeoutMs}ms`, undefined, undefined, cause);
  }
}

export class LLMProviderError extends RetryableError {}

export class LLMRejectedError extends NonRetryableError {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
  }
}

export class LLMTimeoutError extends LLMProviderError {
  constructor(timeoutMs: number, cause?: unknown) {
    super(`LLM request timed out after ${timeoutMs}ms`, undefined, cause);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
