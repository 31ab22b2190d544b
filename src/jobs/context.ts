import { loadConfig, tokenConfigKey, type Config } from "../config.js";
import { createEndpoint, createGitHubClient, type GitHubClient } from "../github/client.js";
import { requestAccessToken, type Prompter } from "../github/token.js";
import { parseRemoteUrl, type RemoteInfo } from "../git/remote.js";
import type { GitRunner } from "../git/runner.js";
import type { Logger } from "../logger.js";

export interface RunOptions {
  dryRun: boolean;
  json: boolean;
  fetch: boolean;
  squashed: boolean;
  overwriteDescription: boolean;
  verbose: boolean;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  dryRun: false,
  json: false,
  fetch: true,
  squashed: false,
  overwriteDescription: false,
  verbose: false,
};

export function parseRunOptions(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): RunOptions {
  const has = (...flags: string[]) => flags.some((flag) => argv.includes(flag));
  return {
    dryRun: has("--dry-run", "-n"),
    json: has("--json"),
    fetch: !has("--no-fetch"),
    squashed: has("--squashed"),
    overwriteDescription: has("--overwrite-description"),
    verbose: has("--verbose") || Boolean(env.DEBUG),
  };
}

/** Everything one run needs, resolved once up front. */
export interface RunContext {
  options: RunOptions;
  remote: RemoteInfo;
  config: Config;
  git: GitRunner;
  github: GitHubClient;
  logger: Logger;
  now: () => Date;
  /** Machine-readable output (stdout). */
  print: (text: string) => void;
}

export interface ContextDependencies {
  git: GitRunner;
  logger: Logger;
  prompter: Prompter;
  env?: NodeJS.ProcessEnv;
  print?: (text: string) => void;
  now?: () => Date;
}

export async function createRunContext(
  options: RunOptions,
  deps: ContextDependencies
): Promise<RunContext> {
  const { git, logger } = deps;

  const remote = parseRemoteUrl(await git.remoteUrl("origin"));
  logger.debug(
    `Remote: host=${remote.host ?? "(default)"} repository=${remote.repository} scheme=${remote.scheme}`
  );

  const config = await loadConfig(git, remote, deps.env);

  let token = config.token;
  if (!token) {
    token = await requestAccessToken(createEndpoint(remote), deps.prompter, logger);
    await git.setGlobalConfig(tokenConfigKey(remote), token);
    logger.notice(`Saved the new token to git config ${tokenConfigKey(remote)}`);
  }

  return {
    options,
    remote,
    config: { ...config, token },
    git,
    github: createGitHubClient(createEndpoint(remote, token), remote.repository),
    logger,
    now: deps.now ?? (() => new Date()),
    print: deps.print ?? ((text) => console.log(text)),
  };
}
