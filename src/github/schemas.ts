/**
 * Zod schemas for the parts of GitHub REST responses the report reads.
 * Unknown fields are ignored.
 */

import { z } from "zod";

export const SearchIssueItemSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().optional(),
  html_url: z.string(),
  repository_url: z.string(),
  created_at: z.string(),
  user: z.object({ login: z.string() }).nullable(),
  pull_request: z.object({ url: z.string() }).optional(),
});

export type SearchIssueItem = z.infer<typeof SearchIssueItemSchema>;

export const SearchIssuesResponseSchema = z.object({
  total_count: z.number().int(),
  incomplete_results: z.boolean().optional(),
  items: z.array(SearchIssueItemSchema),
});

export const PullRequestDetailSchema = z.object({
  number: z.number().int(),
  state: z.enum(["open", "closed"]),
  merged_at: z.string().nullable(),
  merged: z.boolean().optional(),
  additions: z.number().int().optional(),
  deletions: z.number().int().optional(),
  changed_files: z.number().int().optional(),
});

export type PullRequestDetail = z.infer<typeof PullRequestDetailSchema>;

export const PullRequestFileSchema = z.object({
  filename: z.string(),
  status: z.string(),
  additions: z.number().int(),
  deletions: z.number().int(),
  patch: z.string().optional(),
});

export const AuthenticatedUserSchema = z.object({
  login: z.string(),
});
