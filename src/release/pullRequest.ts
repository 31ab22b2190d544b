import type { MentionStyle } from "../config.js";
import type { PullRequestRecord } from "../github/types.js";

/**
 * The release pull request, or a stand-in when none exists yet (dry run
 * before the first release pull request is created).
 */
export type ReleasePullRequest =
  | { kind: "real"; pr: PullRequestRecord }
  | { kind: "absent" };

export const ABSENT_RELEASE_PR: ReleasePullRequest = { kind: "absent" };

const PLACEHOLDER_NUMBER = "???";

export function mentionOf(
  pr: PullRequestRecord,
  style: MentionStyle = "assignee"
): string | undefined {
  if (style === "assignee" && pr.assignee?.login) {
    return pr.assignee.login;
  }
  return pr.user?.login ?? undefined;
}

/** `- [ ] #12 Title @login` */
export function checklistItem(
  pr: PullRequestRecord,
  style: MentionStyle = "assignee"
): string {
  const mention = mentionOf(pr, style);
  const suffix = mention ? ` @${mention}` : "";
  return `- [ ] #${pr.number} ${pr.title}${suffix}`;
}

export function releaseNumber(release: ReleasePullRequest): string {
  return release.kind === "real" ? String(release.pr.number) : PLACEHOLDER_NUMBER;
}

export function releaseChecklistItem(
  release: ReleasePullRequest,
  style: MentionStyle = "assignee"
): string {
  switch (release.kind) {
    case "real":
      return checklistItem(release.pr, style);
    case "absent":
      return `- [ ] #${PLACEHOLDER_NUMBER} Release pull request (not created yet)`;
  }
}

export function releaseLink(release: ReleasePullRequest): string {
  switch (release.kind) {
    case "real":
      return release.pr.html_url;
    case "absent":
      return `#${PLACEHOLDER_NUMBER}`;
  }
}

export function releasePayload(
  release: ReleasePullRequest
): PullRequestRecord | Record<string, never> {
  return release.kind === "real" ? release.pr : {};
}
