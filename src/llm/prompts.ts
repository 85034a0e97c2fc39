import { promises as fs } from "node:fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { PrFileChange, PullRequestRecord, PullRequestStatus } from "../github/types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type PromptName = "pr-summary-prompt.md" | "overall-summary-prompt.md";

// Max total diff size to send to the model
const MAX_DIFF_SIZE = 6000;
const MAX_BODY_LENGTH = 2000;

export async function loadPrompt(name: PromptName): Promise<string> {
  const promptPath = join(__dirname, "prompts", name);
  return fs.readFile(promptPath, "utf8");
}

/**
 * Replaces `{{key}}` placeholders. Unknown keys are left as they are.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

export function buildDiffSummary(files: PrFileChange[]): string {
  const parts: string[] = [];
  let totalSize = 0;

  // Most significant changes first
  const sortedFiles = [...files].sort(
    (a, b) => b.additions + b.deletions - (a.additions + a.deletions)
  );

  for (const [index, file] of sortedFiles.entries()) {
    if (totalSize >= MAX_DIFF_SIZE) {
      parts.push(`... and ${sortedFiles.length - index} more files (truncated for size)`);
      break;
    }

    const header = `### ${file.filename} (+${file.additions}/-${file.deletions})`;
    if (file.patch) {
      const entry = `${header}\n\`\`\`diff\n${file.patch}\n\`\`\``;
      if (totalSize + entry.length <= MAX_DIFF_SIZE) {
        parts.push(entry);
        totalSize += entry.length;
        continue;
      }
      parts.push(`${header} [diff truncated]`);
    } else {
      parts.push(header);
    }
    totalSize += header.length;
  }

  return parts.join("\n\n");
}

export function buildPrSummaryPrompt(
  template: string,
  pr: PullRequestRecord,
  status: PullRequestStatus,
  files: PrFileChange[]
): string {
  const body = pr.body.trim();
  return fillTemplate(template, {
    repo: pr.repo,
    number: String(pr.number),
    status,
    author: pr.author,
    title: pr.title,
    body: body ? body.slice(0, MAX_BODY_LENGTH) : "No description provided.",
    diff: buildDiffSummary(files) || "No diff details available.",
  });
}

export function buildOverallSummaryPrompt(
  template: string,
  prs: Array<Pick<PullRequestRecord, "repo" | "number" | "title"> & { status: PullRequestStatus }>
): string {
  const lines = prs.map((pr) => `- ${pr.repo}#${pr.number}: ${pr.title} (${pr.status})`);
  return fillTemplate(template, { pullRequests: lines.join("\n") });
}
