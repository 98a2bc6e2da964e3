import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  FakeGitClient,
  InMemoryReleasePublisher,
  TEST_DATABASE,
  makeSummary,
  makeTempDir,
  makeTestConfig,
  makeTestContext,
} from "../__tests__/helpers/release-fixtures.js";
import type { ReleaseContext } from "../app/context.js";
import { loadBomFile } from "../bom/bom-io.js";
import { GitError } from "../core/errors.js";

import { changelogUri, publishRelease } from "./publish-release.js";

describe("changelogUri", () => {
  it("dashes the version under the base url", () => {
    expect(changelogUri("https://docs.example.test/releases/", "1.14.0")).toBe(
      "https://docs.example.test/releases/1-14-0-changelog",
    );
    expect(changelogUri(undefined, "1.14.0")).toBeNull();
  });
});

describe("publishRelease", () => {
  let workDir: string;
  let context: ReleaseContext | null = null;
  let git: FakeGitClient;
  let publisher: InMemoryReleasePublisher;

  beforeEach(async () => {
    workDir = makeTempDir("publish-release-");
    git = new FakeGitClient();
    publisher = new InMemoryReleasePublisher();
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    await publisher.publishBom({
      version: "master-42",
      timestamp: "2024-04-01 12:00:00",
      artifactSources: { gitPrefix: "https://git.example.test/acme" },
      dependencies: {},
      services: {
        "alpha-service": { commit: "a1", version: "1.2.3-42" },
        beta: { commit: "b1", version: "2.0.0-42" },
        retired: null,
      },
    });
    git.summaries.set(gitDir("alpha"), makeSummary("a1", "1.2.3"));
    git.summaries.set(gitDir("beta"), makeSummary("b1", "2.0.0"));
  });

  afterEach(async () => {
    context?.close();
    context = null;
    vi.restoreAllMocks();
    await fse.remove(workDir);
  });

  function gitDir(name: string): string {
    return path.join(workDir, "source", "publish-release", name);
  }

  function makeContext(): ReleaseContext {
    context = makeTestContext({
      config: makeTestConfig(workDir, {
        publishing: { changelog_base_url: "https://docs.example.test/releases" },
      }),
      command: "publish-release",
      git,
      publisher,
    });
    return context;
  }

  it("tags everything, then pushes, then records the release", async () => {
    const ctx = makeContext();

    const result = await publishRelease(ctx, TEST_DATABASE, {
      releaseVersion: "1.14.0",
      bomVersion: "master-42",
      alias: "Pluto",
    });

    expect(result.branch).toBe("release-1.14.x");
    expect(result.tags).toEqual({ alpha: "version-1.2.3", beta: "version-2.0.0" });
    expect(
      git.calls
        .filter((call) => ["tag", "pushBranch", "pushTag"].includes(call.method))
        .map((call) => `${call.method} ${path.basename(call.args[0])} ${call.args[1]}`),
    ).toEqual([
      "tag alpha version-1.2.3",
      "tag beta version-2.0.0",
      "pushBranch alpha release-1.14.x",
      "pushTag alpha version-1.2.3",
      "pushBranch beta release-1.14.x",
      "pushTag beta version-2.0.0",
    ]);
    expect(git.callsTo("createBranch")).toEqual([
      [gitDir("alpha"), "release-1.14.x"],
      [gitDir("beta"), "release-1.14.x"],
    ]);
    expect(publisher.releases).toEqual([
      {
        version: "1.14.0",
        alias: "Pluto",
        changelogUri: "https://docs.example.test/releases/1-14-0-changelog",
        minDependencyVersion: null,
      },
    ]);
    expect(result.bomPath).toBe(path.join(workDir, "output", "1.14.0.yml"));
    expect(loadBomFile(result.bomPath).version).toBe("1.14.0");
  });

  it("pushes nothing when tagging fails", async () => {
    const ctx = makeContext();
    git.failures.set(`tag:${gitDir("beta")}`, new GitError("tag already exists"));

    await expect(
      publishRelease(ctx, TEST_DATABASE, {
        releaseVersion: "1.14.0",
        bomVersion: "master-42",
        alias: "Pluto",
      }),
    ).rejects.toThrow("tag already exists");

    expect(git.callsTo("pushBranch")).toEqual([]);
    expect(git.callsTo("pushTag")).toEqual([]);
    expect(publisher.releases).toEqual([]);
    expect(ctx.metrics.lookupFamily("command.outcome")?.instances[0]?.labels).toEqual({
      command: "publish-release",
      success: false,
    });
  });
});
