import { describe, it, expect } from "vitest";
import { join } from "node:path";
import {
  envName,
  loadConfig,
  parseLabels,
  readSetting,
  tokenConfigKey,
} from "../src/config.js";
import { parseRemoteUrl } from "../src/git/remote.js";
import { FakeGit } from "./fakes.js";

const github = parseRemoteUrl("git@github.com:org/repo.git");
const enterprise = parseRemoteUrl("https://ghe.example.com/org/repo.git");
const localFile = join("/repo", ".release-pr");

describe("envName", () => {
  it("should turn dotted keys into environment names", () => {
    expect(envName("branch.production")).toBe("RELEASE_PR_BRANCH_PRODUCTION");
    expect(envName("labels")).toBe("RELEASE_PR_LABELS");
  });
});

describe("parseLabels", () => {
  it("should trim labels and drop empty ones", () => {
    expect(parseLabels(" release, deploy ,,")).toEqual(["release", "deploy"]);
    expect(parseLabels(undefined)).toEqual([]);
  });
});

describe("readSetting", () => {
  it("should prefer the repository file over the host-qualified key", async () => {
    const git = new FakeGit({
      config: {
        [`${localFile}::release-pr.branch.production`]: "main",
        "::release-pr.github.com.branch.production": "prod",
      },
    });
    expect(await readSetting(git, github, "branch.production", {})).toBe("main");
  });

  it("should prefer the host-qualified key over the plain key", async () => {
    const git = new FakeGit({
      config: {
        "::release-pr.ghe.example.com.token": "enterprise-token",
        "::release-pr.token": "plain-token",
      },
    });
    expect(await readSetting(git, enterprise, "token", {})).toBe("enterprise-token");
    expect(await readSetting(git, github, "token", {})).toBe("plain-token");
  });

  it("should prefer the environment over everything", async () => {
    const git = new FakeGit({
      config: { [`${localFile}::release-pr.branch.staging`]: "stage" },
    });
    expect(
      await readSetting(git, github, "branch.staging", {
        RELEASE_PR_BRANCH_STAGING: "develop",
      })
    ).toBe("develop");
  });
});

describe("loadConfig", () => {
  it("should fall back to defaults", async () => {
    expect(await loadConfig(new FakeGit(), github, {})).toEqual({
      productionBranch: "master",
      stagingBranch: "staging",
      templatePath: undefined,
      labels: [],
      token: undefined,
      mention: "assignee",
      timezone: "UTC",
    });
  });

  it("should read every setting", async () => {
    const git = new FakeGit({
      config: {
        [`${localFile}::release-pr.branch.production`]: "main",
        [`${localFile}::release-pr.branch.staging`]: "develop",
        [`${localFile}::release-pr.template`]: "templates/release.md",
        [`${localFile}::release-pr.labels`]: "release, deploy",
        [`${localFile}::release-pr.mention`]: "author",
        [`${localFile}::release-pr.timezone`]: "Asia/Tokyo",
        "::release-pr.github.com.token": "test-token",
      },
    });
    expect(await loadConfig(git, github, {})).toEqual({
      productionBranch: "main",
      stagingBranch: "develop",
      templatePath: join("/repo", "templates/release.md"),
      labels: ["release", "deploy"],
      token: "test-token",
      mention: "author",
      timezone: "Asia/Tokyo",
    });
  });

  it("should keep an absolute template path", async () => {
    const git = new FakeGit({
      config: { "::release-pr.template": "/etc/release-pr/template.md" },
    });
    expect((await loadConfig(git, github, {})).templatePath).toBe(
      "/etc/release-pr/template.md"
    );
  });

  it("should take the token from GITHUB_TOKEN", async () => {
    const config = await loadConfig(new FakeGit(), github, { GITHUB_TOKEN: "env-token" });
    expect(config.token).toBe("env-token");
  });
});

describe("tokenConfigKey", () => {
  it("should scope the saved token to the host", () => {
    expect(tokenConfigKey(github)).toBe("release-pr.github.com.token");
    expect(tokenConfigKey(enterprise)).toBe("release-pr.ghe.example.com.token");
  });
});
