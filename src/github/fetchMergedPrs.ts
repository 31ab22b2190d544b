import type { Logger } from "../logger.js";
import type { GitHubClient } from "./client.js";
import type { PullRequestRecord } from "./types.js";

/** Fetch full records for the merge-set, one request at a time, keeping order. */
export async function fetchMergedPrs(
  client: GitHubClient,
  numbers: number[],
  logger: Logger
): Promise<PullRequestRecord[]> {
  const results: PullRequestRecord[] = [];

  for (const number of numbers) {
    const pr = await client.getPullRequest(number);
    logger.info(`  #${pr.number} ${pr.title}`);
    results.push(pr);
  }

  return results;
}
