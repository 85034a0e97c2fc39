export type PullRequestStatus = "open" | "closed" | "merged" | "unknown";

export interface PullRequestRecord {
  repo: string; // "owner/name"
  number: number;
  title: string;
  author: string;
  createdAt: string; // ISO
  htmlUrl: string;
  apiUrl: string; // pulls/{number} endpoint
  body: string;
}

export interface PrFileChange {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  patch?: string; // The actual diff content
}

export interface PrDiffStats {
  additions: number;
  deletions: number;
  changedFiles: number;
}

export interface PrStatusResult {
  status: PullRequestStatus;
  stats?: PrDiffStats;
}

// Status and summary are always set: the renderer takes nothing less.
export interface CompletedPullRequest extends PullRequestRecord {
  status: PullRequestStatus;
  summary: string;
  stats?: PrDiffStats;
}
