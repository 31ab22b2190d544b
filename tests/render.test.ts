import { describe, it, expect } from "vitest";
import { promises as fs } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createMemoryLogger } from "../src/logger.js";
import {
  ABSENT_RELEASE_PR,
  checklistItem,
  releaseChecklistItem,
  releaseLink,
  releasePayload,
} from "../src/release/pullRequest.js";
import { renderRelease, splitTitleAndBody } from "../src/release/render.js";
import {
  DEFAULT_TEMPLATE,
  loadTemplate,
  renderTemplate,
} from "../src/release/template.js";
import { createPr } from "./fakes.js";

const NOW = new Date("2025-11-20T12:00:00Z");

describe("checklistItem", () => {
  it("should mention the assignee first", () => {
    const pr = createPr({
      number: 12,
      title: "Fix login",
      user: { login: "alice" },
      assignee: { login: "bob" },
    });
    expect(checklistItem(pr)).toBe("- [ ] #12 Fix login @bob");
  });

  it("should fall back to the author", () => {
    const pr = createPr({ number: 12, title: "Fix login", user: { login: "alice" } });
    expect(checklistItem(pr)).toBe("- [ ] #12 Fix login @alice");
  });

  it("should leave out the mention when there is nobody", () => {
    const pr = createPr({ number: 12, title: "Fix login", user: null });
    expect(checklistItem(pr)).toBe("- [ ] #12 Fix login");
  });

  it("should mention the author when configured", () => {
    const pr = createPr({
      number: 12,
      title: "Fix login",
      user: { login: "alice" },
      assignee: { login: "bob" },
    });
    expect(checklistItem(pr, "author")).toBe("- [ ] #12 Fix login @alice");
  });
});

describe("release pull request", () => {
  it("should render placeholders when it does not exist yet", () => {
    expect(releaseChecklistItem(ABSENT_RELEASE_PR)).toBe(
      "- [ ] #??? Release pull request (not created yet)"
    );
    expect(releaseLink(ABSENT_RELEASE_PR)).toBe("#???");
    expect(releasePayload(ABSENT_RELEASE_PR)).toEqual({});
  });

  it("should render the real pull request", () => {
    const pr = createPr({ number: 50, title: "Release", user: { login: "carol" } });
    expect(releaseChecklistItem({ kind: "real", pr })).toBe("- [ ] #50 Release @carol");
    expect(releaseLink({ kind: "real", pr })).toBe("https://github.com/org/repo/pull/50");
    expect(releasePayload({ kind: "real", pr })).toBe(pr);
  });
});

describe("renderTemplate", () => {
  it("should leave unknown placeholders alone", () => {
    expect(renderTemplate("$COUNT in $HOME", { COUNT: "2" })).toBe("2 in $HOME");
  });

  it("should repeat item blocks once per item", () => {
    expect(
      renderTemplate("Changes ($COUNT):\n$ITEMS{* #$NUMBER $TITLE}", { COUNT: "2" }, [
        { NUMBER: "1", TITLE: "Fix bug" },
        { NUMBER: "2", TITLE: "Add feature" },
      ])
    ).toBe("Changes (2):\n* #1 Fix bug\n* #2 Add feature");
  });

  it("should not expand placeholders inside substituted values", () => {
    expect(
      renderTemplate("$ITEMS{$TITLE ($DATE)}", { DATE: "today" }, [{ TITLE: "Costs $DATE" }])
    ).toBe("Costs $DATE (today)");
  });

  it("should render an empty item block without items", () => {
    expect(renderTemplate("Before\n$ITEMS{- $TITLE}", {})).toBe("Before\n");
  });

  it("should insert values literally", () => {
    expect(renderTemplate("$CHECKLIST", { CHECKLIST: "- [ ] #1 Costs $& more" })).toBe(
      "- [ ] #1 Costs $& more"
    );
  });
});

describe("splitTitleAndBody", () => {
  it("should split on the first newline", () => {
    expect(splitTitleAndBody("Title\nline 1\nline 2")).toEqual({
      title: "Title",
      body: "line 1\nline 2",
    });
  });

  it("should give an empty body to single-line content", () => {
    expect(splitTitleAndBody("Title only")).toEqual({ title: "Title only", body: "" });
  });
});

describe("renderRelease", () => {
  const merged = [
    createPr({ number: 1, title: "Fix bug", user: { login: "alice" } }),
    createPr({
      number: 2,
      title: "Add feature",
      user: { login: "bob" },
      assignee: { login: "carol" },
    }),
  ];

  it("should render the default template", () => {
    expect(
      renderRelease({
        release: ABSENT_RELEASE_PR,
        mergedPullRequests: merged,
        changedFiles: [],
        template: DEFAULT_TEMPLATE,
        now: NOW,
        timezone: "UTC",
      })
    ).toEqual({
      title: "Release 2025-11-20 12:00:00 +00:00",
      body: "- [ ] #1 Fix bug @alice\n- [ ] #2 Add feature @carol",
    });
  });

  it("should render an empty checklist", () => {
    expect(
      renderRelease({
        release: ABSENT_RELEASE_PR,
        mergedPullRequests: [],
        changedFiles: [],
        template: DEFAULT_TEMPLATE,
        now: NOW,
        timezone: "UTC",
      })
    ).toEqual({ title: "Release 2025-11-20 12:00:00 +00:00", body: "" });
  });

  it("should format the date in the configured time zone", () => {
    const rendered = renderRelease({
      release: ABSENT_RELEASE_PR,
      mergedPullRequests: [],
      changedFiles: [],
      template: "Release $DATE",
      now: NOW,
      timezone: "Asia/Tokyo",
    });
    expect(rendered.title).toBe("Release 2025-11-20 21:00:00 +09:00");
  });

  it("should expose the release pull request and changed files", () => {
    const release = {
      kind: "real" as const,
      pr: createPr({ number: 50, title: "Release", user: { login: "carol" } }),
    };
    const rendered = renderRelease({
      release,
      mergedPullRequests: merged,
      changedFiles: [
        { filename: "src/a.ts", status: "modified", additions: 1, deletions: 0 },
        { filename: "src/b.ts", status: "added", additions: 3, deletions: 0 },
      ],
      template:
        "Release #$RELEASE_PR_NUMBER ($COUNT PRs)\n$RELEASE_PR_LINK\n$CHANGED_FILES_COUNT files\n$CHANGED_FILES",
      now: NOW,
      timezone: "UTC",
    });
    expect(rendered).toEqual({
      title: "Release #50 (2 PRs)",
      body: "https://github.com/org/repo/pull/50\n2 files\n- `src/a.ts`\n- `src/b.ts`",
    });
  });

  it("should render a custom layout for each merged pull request", () => {
    const rendered = renderRelease({
      release: ABSENT_RELEASE_PR,
      mergedPullRequests: merged,
      changedFiles: [],
      template:
        "Deploy $DATE\n$ITEMS{- [#$NUMBER]($URL) $TITLE by $AUTHOR, owner: $ASSIGNEE}\n---\n$ITEMS{$CHECKLIST_ITEM}",
      now: NOW,
      timezone: "UTC",
    });
    expect(rendered).toEqual({
      title: "Deploy 2025-11-20 12:00:00 +00:00",
      body: [
        "- [#1](https://github.com/org/repo/pull/1) Fix bug by alice, owner: ",
        "- [#2](https://github.com/org/repo/pull/2) Add feature by bob, owner: carol",
        "---",
        "- [ ] #1 Fix bug @alice",
        "- [ ] #2 Add feature @carol",
      ].join("\n"),
    });
  });

  it("should render the placeholder release pull request", () => {
    const rendered = renderRelease({
      release: ABSENT_RELEASE_PR,
      mergedPullRequests: [],
      changedFiles: [],
      template: "Release for $RELEASE_PR_NUMBER\n$RELEASE_PR_CHECKLIST_ITEM",
      now: NOW,
      timezone: "UTC",
    });
    expect(rendered).toEqual({
      title: "Release for ???",
      body: "- [ ] #??? Release pull request (not created yet)",
    });
  });
});

describe("loadTemplate", () => {
  it("should use the default template without a path", async () => {
    expect(await loadTemplate(undefined, createMemoryLogger())).toBe(DEFAULT_TEMPLATE);
  });

  it("should read a template file", async () => {
    const dir = await fs.mkdtemp(join(tmpdir(), "release-pr-test-"));
    const path = join(dir, "template.md");
    await fs.writeFile(path, "Deploy $DATE\n$CHECKLIST\n", "utf8");

    expect(await loadTemplate(path, createMemoryLogger())).toBe("Deploy $DATE\n$CHECKLIST\n");
  });

  it("should fall back to the default template when the file is missing", async () => {
    const logger = createMemoryLogger();
    const template = await loadTemplate("/nonexistent/release-template.md", logger);

    expect(template).toBe(DEFAULT_TEMPLATE);
    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0]).toMatch(/^warn: Cannot read template \/nonexistent\/release-template\.md/);
  });
});
