import { Agent, fetch, type Dispatcher } from "undici";
import { z } from "zod";
import { ReleasePrError } from "../errors.js";
import { apiBaseUrl, type RemoteInfo } from "../git/remote.js";
import {
  IssueSearchSchema,
  LabelSchema,
  PullRequestFileSchema,
  PullRequestSchema,
  type CreatePullRequestInput,
  type Label,
  type PullRequestFile,
  type PullRequestRecord,
  type UpdatePullRequestInput,
} from "./types.js";

export interface GitHubClient {
  getPullRequest(number: number): Promise<PullRequestRecord>;
  listOpenPullRequests(): Promise<PullRequestRecord[]>;
  listPullRequestFiles(number: number): Promise<PullRequestFile[]>;
  createPullRequest(input: CreatePullRequestInput): Promise<PullRequestRecord | null>;
  updatePullRequest(
    number: number,
    input: UpdatePullRequestInput
  ): Promise<PullRequestRecord | null>;
  addLabels(number: number, labels: string[]): Promise<Label[]>;
  /** Numbers of closed pull requests that contain the given commit. */
  searchPullRequestNumbers(commit: string): Promise<number[]>;
}

export interface GitHubEndpoint {
  baseUrl: string;
  token?: string;
  dispatcher?: Dispatcher;
}

export interface GitHubRequestOptions {
  method?: "GET" | "POST" | "PATCH";
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Endpoint for the remote: api.github.com, or `<host>/api/v3` with TLS peer
 * verification turned off for enterprise hosts.
 */
export function createEndpoint(remote: RemoteInfo, token?: string): GitHubEndpoint {
  return {
    baseUrl: apiBaseUrl(remote),
    token,
    dispatcher: remote.host
      ? new Agent({ connect: { rejectUnauthorized: false } })
      : undefined,
  };
}

export async function githubRequest(
  endpoint: GitHubEndpoint,
  path: string,
  options: GitHubRequestOptions = {}
): Promise<unknown> {
  const url = path.startsWith("http") ? path : `${endpoint.baseUrl}${path}`;
  const headers: Record<string, string> = {
    Accept: "application/vnd.github.v3+json",
    "User-Agent": "release-pr",
    ...options.headers,
  };
  if (endpoint.token && !headers.Authorization) {
    headers.Authorization = `token ${endpoint.token}`;
  }
  if (options.body !== undefined) {
    headers["Content-Type"] = "application/json";
  }

  const response = await fetch(url, {
    method: options.method ?? "GET",
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
    dispatcher: endpoint.dispatcher,
  });

  if (!response.ok) {
    const text = await response.text();
    throw new ReleasePrError(
      `GitHub API error: ${response.status} ${response.statusText}\n${text}`,
      "GITHUB_API_ERROR",
      {
        status: response.status,
        body: text,
        otp: response.headers.get("x-github-otp") ?? undefined,
      }
    );
  }

  if (response.status === 204) {
    return null;
  }

  const text = await response.text();
  return text.length > 0 ? JSON.parse(text) : null;
}

async function githubRequestPaginated(
  endpoint: GitHubEndpoint,
  path: string
): Promise<unknown[]> {
  const allResults: unknown[] = [];
  let page = 1;
  const perPage = 100;

  while (true) {
    const pagePath = `${path}${path.includes("?") ? "&" : "?"}page=${page}&per_page=${perPage}`;
    const results = await githubRequest(endpoint, pagePath);

    if (!Array.isArray(results)) {
      throw new Error("Expected array from GitHub API");
    }

    if (results.length === 0) {
      break;
    }

    allResults.push(...results);
    page++;

    if (results.length < perPage) {
      break;
    }
  }

  return allResults;
}

function parseOrNull<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> | null {
  const parsed = schema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export function createGitHubClient(
  endpoint: GitHubEndpoint,
  repository: string
): GitHubClient {
  const repoPath = `/repos/${repository}`;

  return {
    async getPullRequest(number) {
      const data = await githubRequest(endpoint, `${repoPath}/pulls/${number}`);
      return PullRequestSchema.parse(data);
    },

    async listOpenPullRequests() {
      const data = await githubRequestPaginated(
        endpoint,
        `${repoPath}/pulls?state=open`
      );
      return z.array(PullRequestSchema).parse(data);
    },

    async listPullRequestFiles(number) {
      const data = await githubRequestPaginated(
        endpoint,
        `${repoPath}/pulls/${number}/files`
      );
      return z.array(PullRequestFileSchema).parse(data);
    },

    async createPullRequest(input) {
      const data = await githubRequest(endpoint, `${repoPath}/pulls`, {
        method: "POST",
        body: input,
      });
      return parseOrNull(PullRequestSchema, data);
    },

    async updatePullRequest(number, input) {
      const data = await githubRequest(endpoint, `${repoPath}/pulls/${number}`, {
        method: "PATCH",
        body: input,
      });
      return parseOrNull(PullRequestSchema, data);
    },

    async addLabels(number, labels) {
      const data = await githubRequest(
        endpoint,
        `${repoPath}/issues/${number}/labels`,
        { method: "POST", body: { labels } }
      );
      return parseOrNull(z.array(LabelSchema), data) ?? [];
    },

    async searchPullRequestNumbers(commit) {
      const query = encodeURIComponent(
        `repo:${repository} is:pr is:closed ${commit}`
      );
      const data = await githubRequest(endpoint, `/search/issues?q=${query}`);
      return IssueSearchSchema.parse(data)
        .items.filter((item) => item.pull_request !== undefined)
        .map((item) => item.number);
    },
  };
}
