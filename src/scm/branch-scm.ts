/*
Purpose: branch-mode source code manager; repositories are tracked at the configured git branch.
Assumptions: origins are derived from the repository database plus github_* config options.
Usage: const scm = new BranchSourceCodeManager(context, database); scm.filterSourceRepositories(allFilter).
*/

import path from "node:path";

import type { ReleaseContext } from "../app/context.js";
import type { RepositoryDatabase } from "../core/config.js";
import { ConfigError, UnexpectedError } from "../core/errors.js";
import { RepositoryDescriptor } from "../core/repository.js";
import { pathExists } from "../core/utils.js";
import { makeHttpsUrl, makeSshUrl } from "../git/git-client.js";

import { BaseSourceCodeManager } from "./source-code-manager.js";

const OWNER_SENTINELS = new Set(["default", "upstream"]);

export class BranchSourceCodeManager extends BaseSourceCodeManager {
  private readonly branch: string;
  private readonly owner: string;
  // gitDir -> fallback branch, for working copies this manager cloned on the fallback.
  private readonly fallbackClones = new Map<string, string>();

  constructor(context: ReleaseContext, database: RepositoryDatabase) {
    super(context, database);

    const { git_branch: branch, github_owner: owner } = context.config;
    if (!branch) {
      throw new ConfigError(`"${context.command}" needs git_branch (--git-branch) to be set`);
    }
    if (!owner) {
      throw new ConfigError(`"${context.command}" needs github_owner (--github-owner) to be set`);
    }
    this.branch = branch;
    this.owner = owner;
  }

  makeRepositoryDescriptor(name: string): RepositoryDescriptor {
    const origin = this.determineOrigin(name);
    const upstream = this.determineUpstreamUrl(name);
    return new RepositoryDescriptor({
      name,
      gitDir: this.gitDirFor(name),
      origin,
      upstream,
      branch: this.branch,
    });
  }

  determineOrigin(name: string): string {
    return this.determineOriginForOwner(name, this.owner);
  }

  determineUpstreamUrl(name: string): string {
    return this.determineOriginForOwner(name, "default");
  }

  /**
   * Origin for `name` as owned by `owner`. The "default" and "upstream" owners
   * resolve to the database entry's owner, then the database-wide default.
   */
  determineOriginForOwner(name: string, owner: string): string {
    const entry = this.repositoryNameToDatabaseEntry(name);
    const databasePath = this.context.config.repository_database_path;

    let resolvedOwner = owner;
    if (OWNER_SENTINELS.has(owner)) {
      const candidate = entry.owner ?? this.database.default_git_owner;
      if (!candidate) {
        throw new ConfigError(`Unknown owner for "${name}" in ${databasePath}`);
      }
      resolvedOwner = candidate;
    }

    const hostname = entry.origin_hostname ?? this.database.default_origin_hostname;
    if (!hostname) {
      throw new ConfigError(`Unknown origin_hostname for "${name}" in ${databasePath}`);
    }

    const { github_filesystem_root: filesystemRoot, github_pull_ssh: pullSsh } =
      this.context.config;
    if (filesystemRoot) {
      return path.join(filesystemRoot, hostname, resolvedOwner, name);
    }
    if (pullSsh) {
      return makeSshUrl(hostname, resolvedOwner, name);
    }
    return makeHttpsUrl(hostname, resolvedOwner, name);
  }

  protected async ensureGitPath(repository: RepositoryDescriptor): Promise<void> {
    if (await pathExists(repository.gitDir)) return;

    const result = await this.context.git.clone(repository, {
      branch: repository.branch ?? this.branch,
      fallbackBranch: this.context.config.git_fallback_branch,
    });
    this.context.logger.log({
      type: "repository.cloned",
      repository: repository.name,
      payload: { origin: repository.origin, branch: result.branch },
    });
    if (result.branch && result.branch !== (repository.branch ?? this.branch)) {
      this.fallbackClones.set(repository.gitDir, result.branch);
    }
  }

  protected async checkRepositoryIsCurrent(repository: RepositoryDescriptor): Promise<void> {
    const expected =
      this.fallbackClones.get(repository.gitDir) ?? repository.branch ?? this.branch;
    const actual = await this.context.git.currentBranch(repository.gitDir);
    if (actual === expected) return;

    throw new UnexpectedError(
      `"${repository.gitDir}" is at branch "${actual}" instead of "${expected}"`,
    );
  }
}
