import type { CompletedPullRequest, PullRequestStatus } from "../github/types.js";
import type { DateRange } from "./dateRange.js";

export type StatusCounts = Record<PullRequestStatus, number>;

export interface AuthorSummary {
  author: string;
  total: number;
  counts: StatusCounts;
}

export interface ReportInput {
  pullRequests: CompletedPullRequest[];
  range: DateRange;
  authors: string[];
  // AI overview of the week; null when not generated
  overallSummary: string | null;
}
