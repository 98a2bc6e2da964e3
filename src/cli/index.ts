import { Command, InvalidArgumentError } from "commander";

import { createReleaseContext, type ReleaseContext } from "../app/context.js";
import { buildBom } from "../commands/build-bom.js";
import { fetchSource } from "../commands/fetch-source.js";
import { newReleaseBranch, type ExistingBranchPolicy } from "../commands/new-release-branch.js";
import { publishBom } from "../commands/publish-bom.js";
import { publishRelease } from "../commands/publish-release.js";
import type { ReleaseConfigInput, RepositoryDatabase } from "../core/config.js";

import { loadConfigForCli } from "./config.js";

// =============================================================================
// TYPES
// =============================================================================

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export type ReleaseFlags = {
  inputDir?: string;
  outputDir?: string;
  gitBranch?: string;
  gitFallbackBranch?: string;
  githubOwner?: string;
  githubFilesystemRoot?: string;
  githubPullSsh?: boolean;
  githubDisableUpstreamPush?: boolean;
  buildNumber?: string;
  oneAtATime?: boolean;
  maxParallel?: number;
  onlyRepositories?: string[];
  tagPrefix?: string;
  bomPath?: string;
};

// =============================================================================
// FLAG HELPERS
// =============================================================================

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function addReleaseFlags(command: Command): Command {
  return command
    .option("--input-dir <dir>", "Root directory for working copies")
    .option("--output-dir <dir>", "Directory for BOMs and logs")
    .option("--git-branch <branch>", "Branch to track in every repository")
    .option("--git-fallback-branch <branch>", "Branch to use where --git-branch is missing")
    .option("--github-owner <owner>", 'Owner to pull from ("default" uses the database owner)')
    .option("--github-filesystem-root <dir>", "Pull from <dir>/<host>/<owner>/<name> instead of a server")
    .option("--github-pull-ssh", "Pull over ssh instead of https")
    .option("--github-disable-upstream-push", "Disable pushes to the upstream remote")
    .option("--build-number <n>", "Build number stamped into versions")
    .option("--one-at-a-time", "Process repositories serially")
    .option("--max-parallel <n>", "Max repositories processed at once", parsePositiveInt)
    .option("--only-repositories <names>", "Comma-separated repository names", parseList)
    .option("--tag-prefix <prefix>", "Version tag prefix");
}

export function releaseOverrides(flags: ReleaseFlags): Partial<ReleaseConfigInput> {
  return {
    input_dir: flags.inputDir,
    output_dir: flags.outputDir,
    git_branch: flags.gitBranch,
    git_fallback_branch: flags.gitFallbackBranch,
    github_owner: flags.githubOwner,
    github_filesystem_root: flags.githubFilesystemRoot,
    github_pull_ssh: flags.githubPullSsh,
    github_disable_upstream_push: flags.githubDisableUpstreamPush,
    build_number: flags.buildNumber,
    one_at_a_time: flags.oneAtATime,
    max_parallel: flags.maxParallel,
    only_repositories: flags.onlyRepositories,
    tag_prefix: flags.tagPrefix,
    bom_path: flags.bomPath,
  };
}

// =============================================================================
// CLI
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  const withContext = async <T>(
    command: string,
    flags: ReleaseFlags,
    work: (context: ReleaseContext, database: RepositoryDatabase) => Promise<T>,
  ): Promise<T> => {
    const globals = program.opts<GlobalOptions>();
    const { config, database } = loadConfigForCli({
      explicitConfigPath: globals.config,
      overrides: releaseOverrides(flags),
    });

    const context = createReleaseContext({ config, command });
    try {
      return await work(context, database);
    } finally {
      context.close();
    }
  };

  program
    .name("bomsmith")
    .description("Build, publish and release multi-repository bills of materials")
    .version("0.1.0")
    .option("--config <path>", "Release config path (default: nearest bomsmith.yaml)")
    .option("--debug", "Show error codes, causes and stack traces", false);

  addReleaseFlags(
    program
      .command("build-bom")
      .description("Build a BOM from the current state of every in-BOM repository"),
  )
    .option("--bom-path <path>", "Where to write the BOM (default: <output_dir>/<version>.yml)")
    .option("--refresh-from-bom <path>", "Rebuild from this prior BOM")
    .option("--publish", "Store the BOM through the release publisher", false)
    .action(async (opts: ReleaseFlags & { refreshFromBom?: string; publish: boolean }) => {
      await withContext("build-bom", opts, (context, database) =>
        buildBom(context, database, { refreshFromBom: opts.refreshFromBom, publish: opts.publish }),
      );
    });

  program
    .command("publish-bom")
    .description("Store an existing BOM file through the release publisher")
    .argument("<bom>", "BOM file to publish")
    .action(async (bom: string) => {
      await withContext("publish-bom", {}, (context) => publishBom(context, bom));
    });

  addReleaseFlags(
    program
      .command("fetch-source")
      .description("Clone every repository at git_branch, or at the commits a BOM pins"),
  )
    .option("--bom <path>", "Pin repositories to this BOM")
    .action(async (opts: ReleaseFlags & { bom?: string }) => {
      await withContext("fetch-source", opts, (context, database) =>
        fetchSource(context, database, { bomPath: opts.bom }),
      );
    });

  addReleaseFlags(
    program
      .command("new-release-branch")
      .description("Create and push a release branch in every repository"),
  )
    .option("--release-version <version>", "Release version; the branch is release-<major>.<minor>.x")
    .option("--branch <name>", "Explicit branch name")
    .option("--skip-existing", "Leave repositories that already have the branch", false)
    .option("--delete-existing", "Delete and recreate the branch where it exists", false)
    .action(
      async (
        opts: ReleaseFlags & {
          releaseVersion?: string;
          branch?: string;
          skipExisting: boolean;
          deleteExisting: boolean;
        },
      ) => {
        const existing: ExistingBranchPolicy = opts.skipExisting
          ? "skip"
          : opts.deleteExisting
            ? "delete"
            : "fail";
        await withContext("new-release-branch", opts, (context, database) =>
          newReleaseBranch(context, database, {
            releaseVersion: opts.releaseVersion,
            branch: opts.branch,
            existing,
          }),
        );
      },
    );

  addReleaseFlags(
    program
      .command("publish-release")
      .description("Tag and push every service in a stored BOM and record the release"),
  )
    .requiredOption("--release-version <version>", "Version to publish, e.g. 1.14.0")
    .requiredOption("--bom-version <version>", "Stored BOM version to release")
    .requiredOption("--alias <name>", "Release alias")
    .option("--min-dependency-version <version>", "Minimum dependency version for this release")
    .action(
      async (
        opts: ReleaseFlags & {
          releaseVersion: string;
          bomVersion: string;
          alias: string;
          minDependencyVersion?: string;
        },
      ) => {
        await withContext("publish-release", opts, (context, database) =>
          publishRelease(context, database, {
            releaseVersion: opts.releaseVersion,
            bomVersion: opts.bomVersion,
            alias: opts.alias,
            minDependencyVersion: opts.minDependencyVersion,
          }),
        );
      },
    );

  return program;
}
