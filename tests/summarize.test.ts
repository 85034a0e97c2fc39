import { describe, it, expect, vi } from "vitest";
import type { CompletionClient, CompletionOptions } from "../src/llm/client.js";
import {
  OVERALL_SUMMARY_PLACEHOLDER,
  SUMMARY_PLACEHOLDER,
  normaliseSummary,
  summarizePullRequest,
  summarizeWeek,
} from "../src/llm/summarize.js";
import { LLMRejectedError, LLMTimeoutError } from "../src/errors.js";
import type { RetryPolicy } from "../src/retry.js";
import { createCompleted, createRecord } from "./helpers.js";

const retry: RetryPolicy = { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 };

function fakeClient(reply = "Adds a login page backed by the session API.") {
  const complete = vi.fn(
    async (_prompt: string, _options?: CompletionOptions): Promise<string> => reply
  );
  const client: CompletionClient = { complete };
  return { client, complete };
}

describe("summarizePullRequest", () => {
  it("should embed the PR context in the prompt", async () => {
    const { client, complete } = fakeClient();
    const files = [
      { filename: "src/login.ts", status: "added", additions: 10, deletions: 2, patch: "+login()" },
    ];

    const summary = await summarizePullRequest(createRecord(), "merged", files, client, retry);

    expect(summary).toBe("Adds a login page backed by the session API.");
    const prompt = complete.mock.calls[0][0];
    expect(prompt).toContain("Repository: acme/a");
    expect(prompt).toContain("Pull request: #10 (merged)");
    expect(prompt).toContain("Title: Add login page");
    expect(prompt).toContain("### src/login.ts (+10/-2)");
    expect(prompt).not.toContain("{{");
  });

  it("should use a stand-in description when the body is empty", async () => {
    const { client, complete } = fakeClient();

    await summarizePullRequest(createRecord({ body: "  " }), "open", [], client, retry);

    const prompt = complete.mock.calls[0][0];
    expect(prompt).toContain("No description provided.");
    expect(prompt).toContain("No diff details available.");
  });

  it("should fall back to the placeholder after timing out twice", async () => {
    const { client, complete } = fakeClient();
    complete
      .mockRejectedValueOnce(new LLMTimeoutError(1000))
      .mockRejectedValueOnce(new LLMTimeoutError(1000));

    const summary = await summarizePullRequest(createRecord(), "open", [], client, retry);

    expect(summary).toBe(SUMMARY_PLACEHOLDER);
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("should retry a timeout once before succeeding", async () => {
    const { client, complete } = fakeClient("  Second time lucky.  ");
    complete.mockRejectedValueOnce(new LLMTimeoutError(1000));

    const summary = await summarizePullRequest(createRecord(), "open", [], client, retry);

    expect(summary).toBe("Second time lucky.");
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("should not retry a rejected request", async () => {
    const { client, complete } = fakeClient();
    complete.mockRejectedValueOnce(new LLMRejectedError("bad request", 400));

    const summary = await summarizePullRequest(createRecord(), "open", [], client, retry);

    expect(summary).toBe(SUMMARY_PLACEHOLDER);
    expect(complete).toHaveBeenCalledTimes(1);
  });
});

describe("summarizeWeek", () => {
  it("should skip the call when there are no PRs", async () => {
    const { client, complete } = fakeClient();

    await expect(summarizeWeek([], client, retry)).resolves.toBeNull();
    expect(complete).not.toHaveBeenCalled();
  });

  it("should list every PR with its status", async () => {
    const { client, complete } = fakeClient("A week of auth work.");
    const prs = [
      createCompleted({ number: 10, title: "Add login page", status: "merged" }),
      createCompleted({ repo: "acme/b", number: 11, title: "Fix logout", status: "open" }),
    ];

    const summary = await summarizeWeek(prs, client, retry);

    expect(summary).toBe("A week of auth work.");
    const [prompt, options] = complete.mock.calls[0];
    expect(prompt).toContain("- acme/a#10: Add login page (merged)\n- acme/b#11: Fix logout (open)");
    expect(options).toEqual({ maxTokens: 150 });
  });

  it("should fall back to the placeholder on failure", async () => {
    const { client, complete } = fakeClient();
    complete.mockRejectedValue(new LLMTimeoutError(1000));

    await expect(summarizeWeek([createCompleted()], client, retry)).resolves.toBe(
      OVERALL_SUMMARY_PLACEHOLDER
    );
  });
});

describe("normaliseSummary", () => {
  it("should strip surrounding code fences", () => {
    expect(normaliseSummary("```markdown\nAdds a login page.\n```")).toBe("Adds a login page.");
  });
});
