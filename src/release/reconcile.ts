import type { Logger } from "../logger.js";
import { diffLines } from "./diff.js";

const CHECKLIST_LINE = /^- \[[ x]\] /i;

export function isChecklistLine(line: string): boolean {
  return CHECKLIST_LINE.test(line);
}

export function splitLines(body: string): string[] {
  return body.split(/\r?\n/);
}

/**
 * Merge a regenerated release body into the one already on the pull request.
 *
 * - lines only in the old body are kept (hand-written notes)
 * - lines only in the new body are added
 * - when a checklist line was replaced by another checklist line, the old
 *   one wins so its check mark survives
 * - any other replacement keeps both lines, old first
 */
export function reconcileBody(
  oldBody: string,
  newBody: string,
  logger?: Logger
): string {
  const lines: string[] = [];

  for (const event of diffLines(splitLines(oldBody), splitLines(newBody))) {
    switch (event.kind) {
      case "equal":
      case "insert":
        lines.push(event.newLine);
        break;
      case "delete":
        lines.push(event.oldLine);
        break;
      case "replace":
        if (isChecklistLine(event.oldLine) && isChecklistLine(event.newLine)) {
          logger?.debug(`Keeping checklist state: ${event.oldLine}`);
          lines.push(event.oldLine);
        } else {
          lines.push(event.oldLine, event.newLine);
        }
        break;
      default: {
        const unknown: never = event;
        logger?.warn(`Unknown diff event: ${JSON.stringify(unknown)}`);
      }
    }
  }

  return lines.join("\n");
}
