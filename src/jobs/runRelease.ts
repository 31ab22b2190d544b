import {
  ExitCode,
  ReleasePrError,
  type ReleasePrErrorCode,
} from "../errors.js";
import { fetchMergedPrs } from "../github/fetchMergedPrs.js";
import type { PullRequestFile, PullRequestRecord } from "../github/types.js";
import {
  appendSquashedPullRequests,
  calculateMergeSet,
  parseMergeParents,
  parseRemoteRefs,
} from "../release/mergeSet.js";
import {
  ABSENT_RELEASE_PR,
  releaseLink,
  releasePayload,
  type ReleasePullRequest,
} from "../release/pullRequest.js";
import { reconcileBody } from "../release/reconcile.js";
import { renderRelease } from "../release/render.js";
import { loadTemplate } from "../release/template.js";
import type { RunContext } from "./context.js";

export const PLACEHOLDER_TITLE = "Preparing release pull request...";

export interface RunResult {
  exitCode: ExitCode;
  release?: ReleasePullRequest;
  title?: string;
  body?: string;
}

async function persist<T>(
  code: ReleasePrErrorCode,
  message: string,
  call: () => Promise<T | null>
): Promise<T> {
  let result: T | null;
  try {
    result = await call();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReleasePrError(`${message}: ${reason}`, code);
  }
  if (!result) {
    throw new ReleasePrError(message, code);
  }
  return result;
}

/** Numbers of the pull requests to release, or an empty list. */
export async function findMergeSet(ctx: RunContext): Promise<number[]> {
  const { git, github, logger, config, options } = ctx;
  const production = `origin/${config.productionBranch}`;
  const range = `${production}..origin/${config.stagingBranch}`;

  const numbers = await calculateMergeSet({
    mergeParents: parseMergeParents(await git.mergeParents(range)),
    remoteRefs: parseRemoteRefs(await git.remotePullRefs()),
    isReleased: (hash) => git.isAncestor(hash, production),
    logger,
  });

  if (!options.squashed) return numbers;

  const commits = (await git.commitHashes(range))
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return appendSquashedPullRequests(
    numbers,
    commits,
    (commit) => github.searchPullRequestNumbers(commit),
    logger
  );
}

export function findReleasePullRequest(
  openPullRequests: PullRequestRecord[],
  stagingBranch: string,
  productionBranch: string
): PullRequestRecord | undefined {
  return openPullRequests.find(
    (pr) => pr.head.ref === stagingBranch && pr.base.ref === productionBranch
  );
}

export async function runRelease(ctx: RunContext): Promise<RunResult> {
  const { git, github, logger, config, options } = ctx;

  logger.title(
    `🚀 ${ctx.remote.repository}: ${config.stagingBranch} → ${config.productionBranch}`
  );

  if (options.fetch) {
    logger.info("Fetching from origin...");
    await git.fetch("origin");
  }

  const numbers = await findMergeSet(ctx);
  if (numbers.length === 0) {
    logger.error("No pull requests to be released");
    return { exitCode: ExitCode.NothingToRelease };
  }

  logger.info(`Found ${numbers.length} pull request(s) to release:`);
  const mergedPullRequests = await fetchMergedPrs(github, numbers, logger);

  const existing = findReleasePullRequest(
    await github.listOpenPullRequests(),
    config.stagingBranch,
    config.productionBranch
  );

  let release: ReleasePullRequest;
  if (existing) {
    logger.info(`Release pull request exists: #${existing.number}`);
    release = { kind: "real", pr: existing };
  } else if (options.dryRun) {
    logger.info("No release pull request yet (dry run, not creating one)");
    release = ABSENT_RELEASE_PR;
  } else {
    logger.info("Creating release pull request...");
    const created = await persist("CREATE_FAILED", "Failed to create a new pull request", () =>
      github.createPullRequest({
        base: config.productionBranch,
        head: config.stagingBranch,
        title: PLACEHOLDER_TITLE,
        body: "",
      })
    );
    logger.notice(`Created #${created.number}`);
    release = { kind: "real", pr: created };
  }

  const changedFiles: PullRequestFile[] =
    release.kind === "real" ? await github.listPullRequestFiles(release.pr.number) : [];

  const rendered = renderRelease({
    release,
    mergedPullRequests,
    changedFiles,
    template: await loadTemplate(config.templatePath, logger),
    now: ctx.now(),
    timezone: config.timezone,
    mention: config.mention,
  });

  const previousBody = existing?.body;
  const body =
    previousBody && !options.overwriteDescription
      ? reconcileBody(previousBody, rendered.body, logger)
      : rendered.body;
  const title = rendered.title;

  const printJson = (releaseRecord: ReleasePullRequest) => {
    if (!options.json) return;
    ctx.print(
      JSON.stringify(
        {
          release_pull_request: releasePayload(releaseRecord),
          merged_pull_requests: mergedPullRequests,
          changed_files: changedFiles,
        },
        null,
        2
      )
    );
  };

  if (options.dryRun) {
    logger.notice("Dry run. Not updating the pull request.");
    logger.info(title);
    logger.info(body);
    printJson(release);
    return { exitCode: ExitCode.Success, release, title, body };
  }

  if (release.kind !== "real") {
    throw new ReleasePrError("No release pull request to update", "UPDATE_FAILED");
  }
  const releaseNumber = release.pr.number;

  const updated = await persist("UPDATE_FAILED", "Failed to update a pull request", () =>
    github.updatePullRequest(releaseNumber, { title, body })
  );
  release = { kind: "real", pr: updated };

  if (config.labels.length > 0) {
    await persist("LABEL_FAILED", "Failed to add labels", async () => {
      const labels = await github.addLabels(releaseNumber, config.labels);
      return labels.length > 0 ? labels : null;
    });
    logger.info(`Labels: ${config.labels.join(", ")}`);
  }

  logger.notice(`✅ ${existing ? "Updated" : "Created"} pull request: ${releaseLink(release)}`);
  printJson(release);

  return { exitCode: ExitCode.Success, release, title, body };
}
