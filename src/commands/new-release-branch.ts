/*
Purpose: new-release-branch command; create and push a release branch in every repository.
Assumptions: working copies start at git_branch; the branch is created from their HEAD.
Usage: await newReleaseBranch(context, database, { releaseVersion: "1.14.0", existing: "skip" });
*/

import type { ReleaseContext } from "../app/context.js";
import { RepositoryCommand } from "../app/repository-command.js";
import type { RepositoryDatabase } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import type { RepositoryDescriptor } from "../core/repository.js";
import { SemanticVersion } from "../core/semver.js";
import { BranchSourceCodeManager } from "../scm/branch-scm.js";
import { allFilter } from "../scm/source-code-manager.js";

// =============================================================================
// TYPES
// =============================================================================

/** What to do when the branch already exists on the origin. */
export type ExistingBranchPolicy = "fail" | "skip" | "delete";

export type NewReleaseBranchOptions = {
  branch?: string;
  releaseVersion?: string;
  existing?: ExistingBranchPolicy;
};

export type BranchOutcome = "created" | "skipped" | "recreated";

// =============================================================================
// BRANCH NAMES
// =============================================================================

/** "1.14.2" -> "release-1.14.x" */
export function releaseBranchName(releaseVersion: string): string {
  const version = SemanticVersion.parse(releaseVersion);
  return `release-${version.major}.${version.minor}.x`;
}

export function resolveReleaseBranch(options: NewReleaseBranchOptions): string {
  if (options.branch) return options.branch;
  if (options.releaseVersion) return releaseBranchName(options.releaseVersion);
  throw new ConfigError("new-release-branch needs --branch or --release-version");
}

// =============================================================================
// COMMAND
// =============================================================================

export class NewReleaseBranchCommand extends RepositoryCommand<BranchOutcome> {
  constructor(
    context: ReleaseContext,
    scm: BranchSourceCodeManager,
    private readonly branch: string,
    private readonly existing: ExistingBranchPolicy,
  ) {
    super(context, scm, { filter: allFilter });
  }

  protected async processRepository(repository: RepositoryDescriptor): Promise<BranchOutcome> {
    const { git, logger } = this.context;
    const gitDir = repository.gitDir;

    const remoteBranches = await git.listRemoteBranches(gitDir);
    let outcome: BranchOutcome = "created";

    if (remoteBranches.includes(`origin/${this.branch}`)) {
      if (this.existing === "skip") {
        console.log(`${repository.name}: branch ${this.branch} already exists, skipping`);
        return "skipped";
      }
      if (this.existing !== "delete") {
        throw new ConfigError(`Branch "${this.branch}" already exists in "${repository.name}"`);
      }

      console.warn(`${repository.name}: branch ${this.branch} already exists, deleting`);
      await git.deleteRemoteBranch(gitDir, this.branch);
      outcome = "recreated";
    }

    await git.createBranch(gitDir, this.branch);
    await git.pushBranch(gitDir, this.branch);
    logger.log({
      type: "branch.pushed",
      repository: repository.name,
      payload: { branch: this.branch, outcome },
    });
    return outcome;
  }
}

export async function newReleaseBranch(
  context: ReleaseContext,
  database: RepositoryDatabase,
  options: NewReleaseBranchOptions,
): Promise<Record<string, BranchOutcome>> {
  const branch = resolveReleaseBranch(options);
  const scm = new BranchSourceCodeManager(context, database);
  return new NewReleaseBranchCommand(context, scm, branch, options.existing ?? "fail").run();
}
