import { simpleGit, type SimpleGit } from "simple-git";
import { ReleasePrError } from "../errors.js";

export interface ConfigReadOptions {
  // Read from this git-config formatted file instead of the git config chain.
  file?: string;
}

/** The git operations a release run needs. */
export interface GitRunner {
  /** Raw `git log --merges --pretty=format:%P <range>` output. */
  mergeParents(range: string): Promise<string>;
  /** Raw `git log --pretty=format:%H <range>` output. */
  commitHashes(range: string): Promise<string>;
  /** Raw `git ls-remote` output listing the pull request head refs of origin. */
  remotePullRefs(): Promise<string>;
  isAncestor(commit: string, ref: string): Promise<boolean>;
  getConfig(key: string, options?: ConfigReadOptions): Promise<string | undefined>;
  setGlobalConfig(key: string, value: string): Promise<void>;
  repositoryRoot(): Promise<string>;
  remoteUrl(remote: string): Promise<string>;
  fetch(remote: string): Promise<void>;
}

/** Create a git runner rooted at the repository containing `cwd` */
export async function createGit(cwd: string = process.cwd()): Promise<GitRunner> {
  const git = simpleGit(cwd);
  const root = (await run(git, ["rev-parse", "--show-toplevel"])).trim();
  await git.cwd(root);
  return new SimpleGitRunner(git, root);
}

async function run(git: SimpleGit, args: string[]): Promise<string> {
  try {
    return await git.raw(args);
  } catch (error) {
    throw new ReleasePrError(
      `git ${args.join(" ")} failed: ${error instanceof Error ? error.message : String(error)}`,
      "GIT_COMMAND_FAILED",
      { args }
    );
  }
}

export class SimpleGitRunner implements GitRunner {
  constructor(
    private git: SimpleGit,
    private root: string
  ) {}

  mergeParents(range: string): Promise<string> {
    return run(this.git, ["log", "--merges", "--pretty=format:%P", range]);
  }

  commitHashes(range: string): Promise<string> {
    return run(this.git, ["log", "--pretty=format:%H", range]);
  }

  remotePullRefs(): Promise<string> {
    return run(this.git, ["ls-remote", "origin", "refs/pull/*/head"]);
  }

  async isAncestor(commit: string, ref: string): Promise<boolean> {
    const base = await run(this.git, ["merge-base", commit, ref]);
    return base.trim() === commit;
  }

  async getConfig(
    key: string,
    options: ConfigReadOptions = {}
  ): Promise<string | undefined> {
    const args = options.file
      ? ["config", "-f", options.file, "--get", key]
      : ["config", "--get", key];
    // `git config --get` exits 1 for a missing key and 1/3 for a missing or broken file.
    try {
      const value = (await this.git.raw(args)).trim();
      return value.length > 0 ? value : undefined;
    } catch {
      return undefined;
    }
  }

  async setGlobalConfig(key: string, value: string): Promise<void> {
    await run(this.git, ["config", "--global", key, value]);
  }

  async repositoryRoot(): Promise<string> {
    return this.root;
  }

  async remoteUrl(remote: string): Promise<string> {
    return (await run(this.git, ["config", "--get", `remote.${remote}.url`])).trim();
  }

  async fetch(remote: string): Promise<void> {
    await run(this.git, ["fetch", remote]);
  }
}
