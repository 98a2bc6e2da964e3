import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  FakeGitClient,
  TEST_DATABASE,
  makeTempDir,
  makeTestConfig,
  makeTestContext,
} from "../__tests__/helpers/release-fixtures.js";
import { createTempGitRepo } from "../__tests__/helpers/temp-git-repo.js";
import type { ReleaseContext } from "../app/context.js";
import type { Bom } from "../bom/bom.js";
import type { ReleaseConfigInput } from "../core/config.js";
import { ConfigError, UnexpectedError } from "../core/errors.js";
import { createGitClient, type GitClient } from "../git/git-client.js";

import { BomSourceCodeManager } from "./bom-scm.js";
import { allFilter, inBomFilter } from "./source-code-manager.js";

const PREFIX = "https://git.example.test/acme";

function makeBom(): Bom {
  return {
    version: "master-77",
    timestamp: "2024-04-01 12:00:00",
    artifactSources: { gitPrefix: PREFIX },
    dependencies: {},
    services: {
      "alpha-service": { commit: "a1", version: "1.2.3-77" },
      beta: { commit: "b1", version: "0.9.0", gitPrefix: "git@mirror.example.test:fork" },
      retired: null,
      gamma: { commit: "g1", version: "3.0.0-77" },
    },
  };
}

describe("BomSourceCodeManager", () => {
  let workDir: string;
  let context: ReleaseContext | null = null;

  beforeEach(() => {
    workDir = makeTempDir("bom-scm-");
  });

  afterEach(async () => {
    context?.close();
    context = null;
    await fse.remove(workDir);
  });

  function makeScm(
    options: { bom?: Bom; git?: GitClient; overrides?: Partial<ReleaseConfigInput> } = {},
  ): BomSourceCodeManager {
    context = makeTestContext({
      config: makeTestConfig(workDir, options.overrides),
      command: "fetch-source",
      git: options.git ?? new FakeGitClient(),
    });
    return new BomSourceCodeManager(context, TEST_DATABASE, options.bom ?? makeBom());
  }

  it("enumerates BOM services under their repository names", () => {
    const scm = makeScm();

    expect(scm.filterSourceRepositories(allFilter).map((r) => r.name)).toEqual([
      "alpha",
      "beta",
      "gamma",
    ]);
    expect(scm.filterSourceRepositories(inBomFilter).map((r) => r.name)).toEqual([
      "alpha",
      "beta",
    ]);
  });

  it("skips ignored services", () => {
    const scm = makeScm({ overrides: { ignore_services: ["beta"] } });

    expect(scm.filterSourceRepositories(allFilter).map((r) => r.name)).toEqual(["alpha", "gamma"]);
  });

  it("pins descriptors to the recorded commit and prefix", () => {
    const scm = makeScm();

    const alpha = scm.makeRepositoryDescriptor("alpha");
    const beta = scm.makeRepositoryDescriptor("beta");

    expect(alpha.origin).toBe(`${PREFIX}/alpha`);
    expect(alpha.commitId).toBe("a1");
    expect(alpha.upstreamOrNull()).toBeNull();
    expect(alpha.gitDir).toBe(path.join(workDir, "source", "fetch-source", "alpha"));
    expect(beta.origin).toBe("git@mirror.example.test:fork/beta");
  });

  it("rejects services missing from the BOM or without any prefix", () => {
    const bom = makeBom();
    bom.artifactSources = {};
    const scm = makeScm({ bom });

    expect(() => scm.makeRepositoryDescriptor("alpha")).toThrow(ConfigError);
    expect(() => scm.makeRepositoryDescriptor("retired")).toThrow(ConfigError);
  });

  it("reuses the build number recorded in the BOM", () => {
    const scm = makeScm({ overrides: { build_number: "configured" } });

    expect(scm.determineBuildNumber(scm.makeRepositoryDescriptor("alpha"))).toBe("77");
    expect(scm.determineBuildNumber(scm.makeRepositoryDescriptor("beta"))).toBe("configured");
  });

  it("refuses a working copy at another commit", async () => {
    const git = new FakeGitClient();
    const scm = makeScm({ git });
    const gamma = scm.makeRepositoryDescriptor("gamma");

    await scm.ensureLocalRepository(gamma);
    expect(git.callsTo("clone")).toEqual([["gamma", ""]]);

    git.commits.set(gamma.gitDir, "something-else");
    await expect(scm.ensureLocalRepository(gamma)).rejects.toBeInstanceOf(UnexpectedError);
    expect(git.callsTo("clone")).toHaveLength(1);
  });

  it("checks out the pinned commit of a real repository", async () => {
    const originRoot = path.join(workDir, "origins");
    const origin = await createTempGitRepo({ repoDir: path.join(originRoot, "beta") });
    await origin.writeFile("one.txt", "1\n");
    const pinned = await origin.commit("feat: first feature");
    await origin.writeFile("two.txt", "2\n");
    await origin.commit("feat: second feature");

    const bom = makeBom();
    bom.services = { beta: { commit: pinned, version: "1.0.0-5", gitPrefix: originRoot } };
    const git = createGitClient();
    const scm = makeScm({ bom, git });
    const beta = scm.makeRepositoryDescriptor("beta");

    await scm.ensureLocalRepository(beta);

    expect(await git.currentCommit(beta.gitDir)).toBe(pinned);
  });
});
