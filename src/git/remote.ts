import { ReleasePrError } from "../errors.js";

export const DEFAULT_HOST = "github.com";

export interface RemoteInfo {
  host?: string; // undefined => github.com
  repository: string; // "owner/name"
  scheme: "http" | "https";
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Resolve a git remote URL into the host, repository path and API scheme.
 *
 * Accepts URLs with a scheme (`https://host/org/repo.git`, `ssh://git@host/org/repo`)
 * as well as SCP-style remotes (`git@host:org/repo.git`).
 */
export function parseRemoteUrl(remoteUrl: string): RemoteInfo {
  const trimmed = remoteUrl.trim();
  const normalized = SCHEME_PATTERN.test(trimmed)
    ? trimmed
    : `ssh://${trimmed.replace(":", "/")}`;

  let url: URL;
  try {
    url = new URL(normalized);
  } catch {
    throw new ReleasePrError(
      `Cannot parse remote URL: ${remoteUrl}`,
      "INVALID_REMOTE",
      { remoteUrl }
    );
  }

  const repository = url.pathname.replace(/^\/+/, "").replace(/\.git$/, "");
  if (!url.hostname || repository.length === 0) {
    throw new ReleasePrError(
      `Remote URL has no repository path: ${remoteUrl}`,
      "INVALID_REMOTE",
      { remoteUrl }
    );
  }

  const hostname = url.hostname.toLowerCase();
  return {
    host: hostname === DEFAULT_HOST ? undefined : hostname,
    repository,
    scheme: url.protocol === "http:" ? "http" : "https",
  };
}

export function apiBaseUrl(remote: RemoteInfo): string {
  if (!remote.host) return "https://api.github.com";
  return `${remote.scheme}://${remote.host}/api/v3`;
}

/** Host name used to scope global configuration keys. */
export function configHost(remote: RemoteInfo): string {
  return remote.host ?? DEFAULT_HOST;
}
