import { fetch } from "undici";
import { z } from "zod";
import type { LlmConfig } from "../config.js";
import {
  LLMProviderError,
  LLMRejectedError,
  LLMTimeoutError,
  errorMessage,
} from "../errors.js";
import { llmLogger } from "../logger.js";

export interface CompletionOptions {
  maxTokens?: number;
}

/**
 * Prompt in, text out. One call is one attempt; callers decide on
 * retries.
 */
export interface CompletionClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

// Text-completion servers answer with `text`, chat-style ones with `message.content`
const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        text: z.string().optional(),
        message: z.object({ content: z.string().nullable() }).optional(),
      })
    )
    .min(1),
});

function retryAfterMs(value: string | null): number | undefined {
  if (value === null) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? Math.max(seconds, 0) * 1000 : undefined;
}

export function createCompletionClient(llm: LlmConfig): CompletionClient {
  return {
    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), llm.timeoutMs);
      const startTime = Date.now();

      try {
        const response = await fetch(llm.endpoint, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${llm.token}`,
          },
          body: JSON.stringify({
            model: llm.model,
            prompt,
            max_tokens: options.maxTokens ?? llm.maxTokens,
            temperature: llm.temperature,
          }),
          signal: controller.signal,
        });

        if (!response.ok) {
          const text = await response.text();
          const message = `LLM endpoint error: ${response.status} ${response.statusText}\n${text}`;
          if (response.status === 408 || response.status === 429 || response.status >= 500) {
            throw new LLMProviderError(message, retryAfterMs(response.headers.get("retry-after")));
          }
          throw new LLMRejectedError(message, response.status);
        }

        const parsed = CompletionResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new LLMProviderError(`Unexpected LLM response: ${parsed.error.message}`);
        }

        const choice = parsed.data.choices[0];
        const text = (choice.text ?? choice.message?.content ?? "").trim();
        if (text.length === 0) {
          throw new LLMProviderError("LLM returned an empty completion");
        }

        llmLogger.debug(
          { durationMs: Date.now() - startTime, chars: text.length },
          "Completion received"
        );
        return text;
      } catch (error) {
        if (error instanceof LLMProviderError || error instanceof LLMRejectedError) {
          throw error;
        }
        if (error instanceof Error && error.name === "AbortError") {
          throw new LLMTimeoutError(llm.timeoutMs, error);
        }
        throw new LLMProviderError(`LLM request failed: ${errorMessage(error)}`, undefined, error);
      } finally {
        clearTimeout(timeout);
      }
    },
  };
}
