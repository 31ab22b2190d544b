import { z } from "zod";

// Schemas keep unknown keys so `--json` can print the payload GitHub returned.

const UserSchema = z.object({ login: z.string() }).passthrough();

const BranchRefSchema = z
  .object({
    ref: z.string(),
    sha: z.string().optional(),
  })
  .passthrough();

export const PullRequestSchema = z
  .object({
    number: z.number().int(),
    title: z.string(),
    body: z.string().nullable().optional(),
    html_url: z.string(),
    state: z.string().optional(),
    user: UserSchema.nullable().optional(),
    assignee: UserSchema.nullable().optional(),
    head: BranchRefSchema,
    base: BranchRefSchema,
  })
  .passthrough();

export type PullRequestRecord = z.infer<typeof PullRequestSchema>;

export const PullRequestFileSchema = z
  .object({
    filename: z.string(),
    status: z.string(),
    additions: z.number(),
    deletions: z.number(),
    patch: z.string().optional(),
  })
  .passthrough();

export type PullRequestFile = z.infer<typeof PullRequestFileSchema>;

export const LabelSchema = z.object({ name: z.string() }).passthrough();

export type Label = z.infer<typeof LabelSchema>;

export const IssueSearchSchema = z
  .object({
    total_count: z.number(),
    items: z.array(
      z
        .object({
          number: z.number().int(),
          pull_request: z.object({}).passthrough().optional(),
        })
        .passthrough()
    ),
  })
  .passthrough();

export const AuthorizationSchema = z
  .object({ token: z.string() })
  .passthrough();

export interface CreatePullRequestInput {
  base: string;
  head: string;
  title: string;
  body: string;
}

export interface UpdatePullRequestInput {
  title: string;
  body: string;
}
