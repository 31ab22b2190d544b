#!/usr/bin/env node
import { exitCodeFor, type ExitCode } from "../errors.js";
import { createGit } from "../git/runner.js";
import { createConsolePrompter } from "../github/token.js";
import { createLogger } from "../logger.js";
import { createRunContext, parseRunOptions } from "./context.js";
import { runRelease } from "./runRelease.js";

// Show help if requested
if (process.argv.includes("--help") || process.argv.includes("-h")) {
  console.log(`
📋 Release pull request updater

Usage: release-pr [options]

Options:
  -n, --dry-run              Render the title and body, change nothing
  --json                     Print the release pull request, merged pull
                             requests and changed files as JSON
  --no-fetch                 Do not fetch origin first
  --squashed                 Also find squash-merged pull requests
  --overwrite-description    Replace the body instead of merging it
  --verbose                  Show debug output (also DEBUG=1)
  --help, -h                 Show this help message

Settings (env RELEASE_PR_<KEY>, .release-pr, or git config release-pr.<key>):
  branch.production   default: master
  branch.staging      default: staging
  template            path to a body template
  labels              comma-separated labels for the release pull request
  mention             assignee (default) or author
  timezone            default: UTC
  token               GitHub token (also GITHUB_TOKEN)

Exit codes:
  0 success, 1 nothing to release, 2 create failed, 3 update failed,
  4 adding labels failed
`);
  process.exit(0);
}

const options = parseRunOptions(process.argv.slice(2));
const logger = createLogger({ debug: options.verbose, stderrOnly: options.json });

async function main(): Promise<ExitCode> {
  const ctx = await createRunContext(options, {
    git: await createGit(),
    logger,
    prompter: createConsolePrompter(),
  });
  const result = await runRelease(ctx);
  return result.exitCode;
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exit(exitCodeFor(err));
  });
