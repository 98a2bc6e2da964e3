import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  FakeGitClient,
  TEST_DATABASE,
  makeTempDir,
  makeTestConfig,
  makeTestContext,
} from "../__tests__/helpers/release-fixtures.js";
import type { ReleaseContext } from "../app/context.js";
import { ConfigError, FormatError } from "../core/errors.js";

import { newReleaseBranch, releaseBranchName, resolveReleaseBranch } from "./new-release-branch.js";

describe("releaseBranchName", () => {
  it("keeps major and minor", () => {
    expect(releaseBranchName("1.14.2")).toBe("release-1.14.x");
  });

  it("rejects malformed versions", () => {
    expect(() => releaseBranchName("1.14")).toThrow(FormatError);
  });

  it("prefers an explicit branch", () => {
    expect(resolveReleaseBranch({ branch: "hotfix", releaseVersion: "2.0.0" })).toBe("hotfix");
    expect(() => resolveReleaseBranch({})).toThrow(ConfigError);
  });
});

describe("newReleaseBranch", () => {
  let workDir: string;
  let context: ReleaseContext | null = null;
  let git: FakeGitClient;

  beforeEach(() => {
    workDir = makeTempDir("new-release-branch-");
    git = new FakeGitClient();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    context?.close();
    context = null;
    vi.restoreAllMocks();
    await fse.remove(workDir);
  });

  function makeContext(): ReleaseContext {
    context = makeTestContext({
      config: makeTestConfig(workDir, { git_branch: "master", one_at_a_time: true }),
      command: "new-release-branch",
      git,
    });
    git.remoteBranches.set(gitDir("alpha"), ["origin/master", "origin/release-1.2.x"]);
    return context;
  }

  function gitDir(name: string): string {
    return path.join(workDir, "source", "new-release-branch", name);
  }

  it("creates and pushes the branch everywhere", async () => {
    const ctx = makeContext();

    const results = await newReleaseBranch(ctx, TEST_DATABASE, {
      releaseVersion: "1.3.0",
      existing: "fail",
    });

    expect(results).toEqual({ alpha: "created", beta: "created", gamma: "created" });
    expect(git.callsTo("pushBranch")).toEqual([
      [gitDir("alpha"), "release-1.3.x"],
      [gitDir("beta"), "release-1.3.x"],
      [gitDir("gamma"), "release-1.3.x"],
    ]);
  });

  it("fails on an existing branch but still handles the other repositories", async () => {
    const ctx = makeContext();

    await expect(
      newReleaseBranch(ctx, TEST_DATABASE, { releaseVersion: "1.2.0" }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(git.callsTo("pushBranch").map(([dir]) => dir)).toEqual([gitDir("beta"), gitDir("gamma")]);
  });

  it("skips an existing branch when asked", async () => {
    const ctx = makeContext();

    const results = await newReleaseBranch(ctx, TEST_DATABASE, {
      releaseVersion: "1.2.0",
      existing: "skip",
    });

    expect(results.alpha).toBe("skipped");
    expect(git.callsTo("createBranch").map(([dir]) => dir)).not.toContain(gitDir("alpha"));
  });

  it("deletes and recreates an existing branch when asked", async () => {
    const ctx = makeContext();

    const results = await newReleaseBranch(ctx, TEST_DATABASE, {
      branch: "release-1.2.x",
      existing: "delete",
    });

    expect(results.alpha).toBe("recreated");
    expect(git.callsTo("deleteRemoteBranch")).toEqual([[gitDir("alpha"), "release-1.2.x"]]);
    expect(git.callsTo("pushBranch")[0]).toEqual([gitDir("alpha"), "release-1.2.x"]);
  });
});
