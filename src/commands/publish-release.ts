/**
 * publish-release stamps a stored BOM with a release version, tags and pushes every
 * service repository, and records the release.
 * Purpose: promote a validated BOM to a named release.
 * Assumptions: the BOM was stored earlier by build-bom --publish or publish-bom.
 * Usage: await publishRelease(context, database, { releaseVersion: "1.14.0", bomVersion: "master-42", alias: "Pluto" }).
 */

import path from "node:path";

import type { ReleaseContext } from "../app/context.js";
import { writeBomFile } from "../bom/bom-io.js";
import type { Bom } from "../bom/bom.js";
import type { RepositoryDatabase } from "../core/config.js";
import { logRepositoryEvent } from "../core/logger.js";
import type { RepositoryDescriptor } from "../core/repository.js";
import { SemanticVersion } from "../core/semver.js";
import { BomSourceCodeManager } from "../scm/bom-scm.js";
import { allFilter } from "../scm/source-code-manager.js";

import { releaseBranchName } from "./new-release-branch.js";

// =============================================================================
// TYPES
// =============================================================================

export type PublishReleaseOptions = {
  releaseVersion: string;
  bomVersion: string;
  alias: string;
  minDependencyVersion?: string;
};

export type PublishReleaseResult = {
  bom: Bom;
  bomPath: string;
  branch: string;
  tags: Record<string, string>;
  changelogUri: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** "<base>/1-14-0-changelog" for release 1.14.0, or null without a base URL. */
export function changelogUri(baseUrl: string | undefined, releaseVersion: string): string | null {
  if (!baseUrl) return null;
  return `${baseUrl.replace(/\/+$/, "")}/${releaseVersion.replace(/\./g, "-")}-changelog`;
}

export async function publishRelease(
  context: ReleaseContext,
  database: RepositoryDatabase,
  options: PublishReleaseOptions,
): Promise<PublishReleaseResult> {
  return context.metrics.trackOutcome("command.outcome", { command: context.command }, () =>
    runPublishRelease(context, database, options),
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runPublishRelease(
  context: ReleaseContext,
  database: RepositoryDatabase,
  options: PublishReleaseOptions,
): Promise<PublishReleaseResult> {
  const { config, git, logger, publisher } = context;

  const stored = await publisher.retrieveBomVersion(options.bomVersion);
  const bom: Bom = { ...stored, version: options.releaseVersion };
  const branch = releaseBranchName(options.releaseVersion);

  const scm = new BomSourceCodeManager(context, database, bom);
  const repositories = scm.filterSourceRepositories(allFilter);
  const tags: Record<string, string> = {};

  // Tag everything before pushing anything so a tagging failure leaves the origins untouched.
  for (const repository of repositories) {
    tags[repository.name] = await tagRepository(context, scm, repository, branch);
  }
  for (const repository of repositories) {
    await git.pushBranch(repository.gitDir, branch);
    await git.pushTag(repository.gitDir, tags[repository.name]);
    logRepositoryEvent(logger, "release.pushed", repository.name, {
      branch,
      tag: tags[repository.name],
    });
  }

  const bomPath = path.join(config.output_dir, `${options.releaseVersion}.yml`);
  writeBomFile(bomPath, bom);

  const uri = changelogUri(config.publishing.changelog_base_url, options.releaseVersion);
  await publisher.publishRelease({
    version: options.releaseVersion,
    alias: options.alias,
    changelogUri: uri,
    minDependencyVersion: options.minDependencyVersion ?? null,
  });
  logger.log({
    type: "release.published",
    payload: { version: options.releaseVersion, alias: options.alias, bom_version: options.bomVersion },
  });
  console.log(`Published release ${options.releaseVersion} (${options.alias}) from BOM ${options.bomVersion}`);

  return { bom, bomPath, branch, tags, changelogUri: uri };
}

async function tagRepository(
  context: ReleaseContext,
  scm: BomSourceCodeManager,
  repository: RepositoryDescriptor,
  branch: string,
): Promise<string> {
  const { config, git } = context;

  await scm.ensureLocalRepository(repository);
  const info = await scm.lookupSourceInfo(repository);
  const tag = SemanticVersion.parse(info.summary.version).toTag(config.tag_prefix);

  if ((await git.currentBranch(repository.gitDir)) !== branch) {
    await git.createBranch(repository.gitDir, branch);
  }
  await git.tag(repository.gitDir, tag);
  logRepositoryEvent(context.logger, "release.tagged", repository.name, { branch, tag });
  return tag;
}
