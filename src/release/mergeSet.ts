import type { Logger } from "../logger.js";

export interface CommitRef {
  hash: string;
  ref: string;
}

export interface MergeSetInput {
  /** Parent hashes of each merge commit between production and staging. */
  mergeParents: string[][];
  /** Pull request head refs on the remote. */
  remoteRefs: CommitRef[];
  /** Whether the commit is already reachable from production. */
  isReleased: (hash: string) => Promise<boolean>;
  logger: Logger;
}

const PULL_HEAD_REF = /^refs\/pull\/(\d+)\/head$/;

/** Parse `git log --pretty=format:%P` output: one line of parent hashes per commit. */
export function parseMergeParents(output: string): string[][] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => line.split(/\s+/));
}

/** Parse `git ls-remote` output: `<hash>\t<ref>` per line. */
export function parseRemoteRefs(output: string): CommitRef[] {
  const refs: CommitRef[] = [];
  for (const line of output.split("\n")) {
    const [hash, ref] = line.trim().split(/\s+/);
    if (hash && ref) {
      refs.push({ hash, ref });
    }
  }
  return refs;
}

export function pullRequestNumberOf(ref: string): number | undefined {
  const match = PULL_HEAD_REF.exec(ref);
  return match ? Number(match[1]) : undefined;
}

/**
 * Numbers of the pull requests merged into staging and not yet released,
 * in the order their head refs are listed by the remote.
 *
 * An empty list means there is nothing to release.
 */
export async function calculateMergeSet(input: MergeSetInput): Promise<number[]> {
  const { logger } = input;

  const mergedHeads = new Set<string>();
  for (const parents of input.mergeParents) {
    // parents[0] is staging itself, parents[1] the merged feature branch
    if (parents.length > 1) {
      mergedHeads.add(parents[1]);
    }
  }

  const numbers: number[] = [];
  for (const { hash, ref } of input.remoteRefs) {
    if (!mergedHeads.has(hash)) continue;

    const number = pullRequestNumberOf(ref);
    if (number === undefined) {
      logger.warn(`Unexpected ref name: ${ref}`);
      continue;
    }

    if (await input.isReleased(hash)) {
      logger.debug(`#${number} (${hash}) is already merged into production`);
      continue;
    }

    logger.debug(`#${number} (${hash}) will be released`);
    numbers.push(number);
  }

  return numbers;
}

/**
 * Append squash-merged pull requests found by commit, skipping numbers that
 * are already in the set.
 */
export async function appendSquashedPullRequests(
  numbers: number[],
  commits: string[],
  lookup: (commit: string) => Promise<number[]>,
  logger: Logger
): Promise<number[]> {
  const result = [...numbers];
  const seen = new Set(numbers);
  for (const commit of commits) {
    for (const number of await lookup(commit)) {
      if (seen.has(number)) continue;
      logger.debug(`#${number} found by squashed commit ${commit}`);
      seen.add(number);
      result.push(number);
    }
  }
  return result;
}
