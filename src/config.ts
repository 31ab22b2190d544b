import dotenv from "dotenv";
import { isAbsolute, join } from "node:path";
import type { GitRunner } from "./git/runner.js";
import { configHost, type RemoteInfo } from "./git/remote.js";

dotenv.config();

export const CONFIG_SECTION = "release-pr";
export const LOCAL_CONFIG_FILE = ".release-pr";

export type MentionStyle = "assignee" | "author";

export interface Config {
  productionBranch: string;
  stagingBranch: string;
  templatePath?: string;
  labels: string[];
  token?: string;
  mention: MentionStyle;
  timezone: string;
}

export type ConfigKey =
  | "branch.production"
  | "branch.staging"
  | "template"
  | "labels"
  | "token"
  | "mention"
  | "timezone";

export function envName(key: ConfigKey): string {
  return `RELEASE_PR_${key.replace(/\./g, "_").toUpperCase()}`;
}

export function parseLabels(labelsStr: string | undefined): string[] {
  if (!labelsStr) return [];
  return labelsStr
    .split(",")
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

/**
 * Look a setting up: environment, then `<root>/.release-pr`, then the
 * host-qualified global key, then the plain global key.
 */
export async function readSetting(
  git: GitRunner,
  remote: RemoteInfo,
  key: ConfigKey,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | undefined> {
  const fromEnv = env[envName(key)];
  if (fromEnv) return fromEnv;

  const root = await git.repositoryRoot();
  const local = await git.getConfig(`${CONFIG_SECTION}.${key}`, {
    file: join(root, LOCAL_CONFIG_FILE),
  });
  if (local !== undefined) return local;

  const hostScoped = await git.getConfig(
    `${CONFIG_SECTION}.${configHost(remote)}.${key}`
  );
  if (hostScoped !== undefined) return hostScoped;

  return git.getConfig(`${CONFIG_SECTION}.${key}`);
}

export async function loadConfig(
  git: GitRunner,
  remote: RemoteInfo,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const setting = (key: ConfigKey) => readSetting(git, remote, key, env);

  const productionBranch = (await setting("branch.production")) || "master";
  const stagingBranch = (await setting("branch.staging")) || "staging";

  let templatePath = await setting("template");
  if (templatePath && !isAbsolute(templatePath)) {
    templatePath = join(await git.repositoryRoot(), templatePath);
  }

  const labels = parseLabels(await setting("labels"));

  const token =
    env.RELEASE_PR_TOKEN || env.GITHUB_TOKEN || (await setting("token"));

  const mention: MentionStyle =
    (await setting("mention")) === "author" ? "author" : "assignee";

  const timezone = (await setting("timezone")) || "UTC";

  return {
    productionBranch,
    stagingBranch,
    templatePath,
    labels,
    token,
    mention,
    timezone,
  };
}

/** Global key the acquired token is saved under. */
export function tokenConfigKey(remote: RemoteInfo): string {
  return `${CONFIG_SECTION}.${configHost(remote)}.token`;
}
