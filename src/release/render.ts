import type { MentionStyle } from "../config.js";
import type { PullRequestFile, PullRequestRecord } from "../github/types.js";
import { formatTimestamp } from "./dateUtils.js";
import {
  checklistItem,
  mentionOf,
  releaseChecklistItem,
  releaseLink,
  releaseNumber,
  type ReleasePullRequest,
} from "./pullRequest.js";
import { renderTemplate, type TemplateValues } from "./template.js";

export interface RenderInput {
  release: ReleasePullRequest;
  mergedPullRequests: PullRequestRecord[];
  changedFiles: PullRequestFile[];
  template: string;
  now: Date;
  timezone: string;
  mention?: MentionStyle;
}

export interface RenderedRelease {
  title: string;
  body: string;
}

export function buildTemplateValues(input: RenderInput): TemplateValues {
  const mention = input.mention ?? "assignee";
  return {
    DATE: formatTimestamp(input.now, input.timezone),
    CHECKLIST: input.mergedPullRequests
      .map((pr) => checklistItem(pr, mention))
      .join("\n"),
    COUNT: String(input.mergedPullRequests.length),
    RELEASE_PR_NUMBER: releaseNumber(input.release),
    RELEASE_PR_LINK: releaseLink(input.release),
    RELEASE_PR_CHECKLIST_ITEM: releaseChecklistItem(input.release, mention),
    CHANGED_FILES_COUNT: String(input.changedFiles.length),
    CHANGED_FILES: input.changedFiles
      .map((file) => `- \`${file.filename}\``)
      .join("\n"),
  };
}

/** Values for one merged pull request inside an `$ITEMS{...}` block. */
export function buildItemValues(
  pr: PullRequestRecord,
  mention: MentionStyle = "assignee"
): TemplateValues {
  return {
    NUMBER: String(pr.number),
    TITLE: pr.title,
    URL: pr.html_url,
    AUTHOR: pr.user?.login ?? "",
    ASSIGNEE: pr.assignee?.login ?? "",
    MENTION: mentionOf(pr, mention) ?? "",
    CHECKLIST_ITEM: checklistItem(pr, mention),
  };
}

/** First line of the rendered template is the title, the rest the body. */
export function splitTitleAndBody(content: string): RenderedRelease {
  const newline = content.indexOf("\n");
  if (newline === -1) {
    return { title: content, body: "" };
  }
  return {
    title: content.slice(0, newline),
    body: content.slice(newline + 1),
  };
}

export function renderRelease(input: RenderInput): RenderedRelease {
  const items = input.mergedPullRequests.map((pr) =>
    buildItemValues(pr, input.mention)
  );
  return splitTitleAndBody(
    renderTemplate(input.template, buildTemplateValues(input), items)
  );
}
