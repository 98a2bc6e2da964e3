/**
 * Source code managers resolve repository descriptors and keep local working copies.
 * Purpose: one contract for branch-mode and BOM-mode repository acquisition.
 * Assumptions: the repository database is read-only once loaded; working copies live under
 * `<input_dir>/<command>/<name>`.
 * Usage: const repos = scm.filterSourceRepositories(inBomFilter); await scm.ensureLocalRepository(repo).
 */

import path from "node:path";

import type { ReleaseContext } from "../app/context.js";
import type {
  MergedRepositoryEntry,
  RepositoryDatabase,
  RepositoryEntry,
  RepositoryEntryFilter,
} from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import { logRepositoryEvent } from "../core/logger.js";
import type { RepositoryDescriptor, SourceInfo } from "../core/repository.js";

// =============================================================================
// CONTRACT
// =============================================================================

export interface SourceCodeManager {
  readonly rootSourceDir: string;
  makeRepositoryDescriptor(name: string): RepositoryDescriptor;
  filterSourceRepositories(filter: RepositoryEntryFilter): RepositoryDescriptor[];
  repositoryNameToDatabaseEntry(name: string): RepositoryEntry;
  serviceNameForRepository(name: string): string;
  ensureLocalRepository(repository: RepositoryDescriptor): Promise<void>;
  determineBuildNumber(repository: RepositoryDescriptor): string;
  lookupSourceInfo(repository: RepositoryDescriptor): Promise<SourceInfo>;
}

// =============================================================================
// STOCK FILTERS
// =============================================================================

export const allFilter: RepositoryEntryFilter = () => true;

/** Only repositories whose entry says `in_bom: true` contribute to the BOM. */
export const inBomFilter: RepositoryEntryFilter = (_name, entry) => entry.in_bom === true;

// =============================================================================
// BASE IMPLEMENTATION
// =============================================================================

export abstract class BaseSourceCodeManager implements SourceCodeManager {
  readonly rootSourceDir: string;
  private readonly sourceInfoCache = new Map<string, SourceInfo>();

  protected constructor(
    protected readonly context: ReleaseContext,
    protected readonly database: RepositoryDatabase,
  ) {
    this.rootSourceDir = path.join(context.config.input_dir, context.command);
  }

  abstract makeRepositoryDescriptor(name: string): RepositoryDescriptor;

  /** Clone the working copy if it is missing. Never pulls. */
  protected abstract ensureGitPath(repository: RepositoryDescriptor): Promise<void>;

  /** Throws UnexpectedError when the working copy is not at the expected revision. */
  protected abstract checkRepositoryIsCurrent(repository: RepositoryDescriptor): Promise<void>;

  gitDirFor(name: string): string {
    return path.join(this.rootSourceDir, name);
  }

  repositoryNameToDatabaseEntry(name: string): RepositoryEntry {
    const entries = this.database.repositories;
    if (!Object.prototype.hasOwnProperty.call(entries, name)) {
      throw new ConfigError(`Unknown repository "${name}" in the repository database`);
    }
    return entries[name] ?? {};
  }

  serviceNameForRepository(name: string): string {
    return this.repositoryNameToDatabaseEntry(name).service_name ?? name;
  }

  /**
   * Database entries that pass `filter`, in database order. The filter sees each
   * entry overlaid on the database-wide owner and hostname defaults.
   */
  filterSourceRepositories(filter: RepositoryEntryFilter): RepositoryDescriptor[] {
    const result: RepositoryDescriptor[] = [];
    for (const name of Object.keys(this.database.repositories)) {
      if (filter(name, this.mergedDatabaseEntry(name))) {
        result.push(this.makeRepositoryDescriptor(name));
      }
    }
    return result;
  }

  /**
   * Applies `fn` to each descriptor in order and collects results by name.
   * No concurrency and no failure isolation; use RepositoryCommand for those.
   */
  async foreachSourceRepository<T, A extends unknown[]>(
    repositories: RepositoryDescriptor[],
    fn: (repository: RepositoryDescriptor, ...args: A) => T | Promise<T>,
    ...args: A
  ): Promise<Record<string, T>> {
    const results: Record<string, T> = {};
    for (const repository of repositories) {
      results[repository.name] = await fn(repository, ...args);
    }
    return results;
  }

  async ensureLocalRepository(repository: RepositoryDescriptor): Promise<void> {
    await this.ensureGitPath(repository);
    await this.checkRepositoryIsCurrent(repository);
  }

  determineBuildNumber(repository: RepositoryDescriptor): string {
    const configured = this.context.config.build_number;
    if (configured) return configured;

    logRepositoryEvent(this.context.logger, "build_number.default", repository.name, {
      build_number: this.context.defaultBuildNumber,
    });
    return this.context.defaultBuildNumber;
  }

  async lookupSourceInfo(repository: RepositoryDescriptor): Promise<SourceInfo> {
    const cached = this.sourceInfoCache.get(repository.name);
    if (cached) return cached;

    const summary = await this.context.git.collectSummary(
      repository.gitDir,
      this.context.config.tag_prefix,
    );
    const info: SourceInfo = { buildNumber: this.determineBuildNumber(repository), summary };
    this.sourceInfoCache.set(repository.name, info);
    return info;
  }

  protected mergedDatabaseEntry(name: string): MergedRepositoryEntry {
    const merged: MergedRepositoryEntry = {};
    if (this.database.default_git_owner) merged.owner = this.database.default_git_owner;
    if (this.database.default_origin_hostname) {
      merged.origin_hostname = this.database.default_origin_hostname;
    }

    const entry = this.database.repositories[name];
    if (!entry) return merged;

    for (const [key, value] of Object.entries(entry)) {
      if (value !== undefined) merged[key] = value;
    }
    return merged;
  }
}
