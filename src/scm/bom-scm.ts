/*
Purpose: BOM-mode source code manager; repositories are pinned to the commits a prior BOM recorded.
Assumptions: every service in the BOM resolves to an origin through its own or the shared gitPrefix.
Usage: const scm = new BomSourceCodeManager(context, database, bom); scm.filterSourceRepositories(allFilter).
*/

import type { ReleaseContext } from "../app/context.js";
import { serviceBuildNumber, type Bom, type BomService } from "../bom/bom.js";
import type { RepositoryDatabase, RepositoryEntryFilter } from "../core/config.js";
import { ConfigError, UnexpectedError } from "../core/errors.js";
import { RepositoryDescriptor } from "../core/repository.js";
import { pathExists } from "../core/utils.js";

import { BaseSourceCodeManager } from "./source-code-manager.js";

export class BomSourceCodeManager extends BaseSourceCodeManager {
  private readonly repositoryByService: Map<string, string>;
  private readonly ignoredServices: Set<string>;

  constructor(
    context: ReleaseContext,
    database: RepositoryDatabase,
    public readonly bom: Bom,
  ) {
    super(context, database);

    this.repositoryByService = new Map();
    for (const [name, entry] of Object.entries(database.repositories)) {
      if (entry?.service_name) {
        this.repositoryByService.set(entry.service_name, name);
      }
    }
    this.ignoredServices = new Set(context.config.ignore_services);
  }

  repositoryNameForService(serviceName: string): string {
    return this.repositoryByService.get(serviceName) ?? serviceName;
  }

  override serviceNameForRepository(name: string): string {
    if (Object.prototype.hasOwnProperty.call(this.database.repositories, name)) {
      return super.serviceNameForRepository(name);
    }
    return name;
  }

  makeRepositoryDescriptor(name: string): RepositoryDescriptor {
    const serviceName = this.serviceNameForRepository(name);
    const service = this.bomService(serviceName);

    const gitPrefix = service.gitPrefix ?? this.bom.artifactSources.gitPrefix;
    if (!gitPrefix) {
      throw new ConfigError(`BOM ${this.bom.version} has no gitPrefix for "${serviceName}"`);
    }

    return new RepositoryDescriptor({
      name,
      gitDir: this.gitDirFor(name),
      origin: `${gitPrefix}/${name}`,
      commitId: service.commit,
    });
  }

  /**
   * Services recorded in the BOM that pass `filter`, in BOM order. Null entries
   * and `ignore_services` are skipped.
   */
  override filterSourceRepositories(filter: RepositoryEntryFilter): RepositoryDescriptor[] {
    const result: RepositoryDescriptor[] = [];
    for (const [serviceName, service] of Object.entries(this.bom.services)) {
      if (!service || this.ignoredServices.has(serviceName)) continue;

      const name = this.repositoryNameForService(serviceName);
      if (filter(name, this.mergedDatabaseEntry(name))) {
        result.push(this.makeRepositoryDescriptor(name));
      }
    }
    return result;
  }

  /** The build number the BOM recorded for this service, else the default rule. */
  override determineBuildNumber(repository: RepositoryDescriptor): string {
    const service = this.bom.services[this.serviceNameForRepository(repository.name)];
    const recorded = service ? serviceBuildNumber(service.version) : null;
    return recorded ?? super.determineBuildNumber(repository);
  }

  protected async ensureGitPath(repository: RepositoryDescriptor): Promise<void> {
    if (await pathExists(repository.gitDir)) return;

    await this.context.git.clone(repository);
    this.context.logger.log({
      type: "repository.cloned",
      repository: repository.name,
      payload: { origin: repository.origin, commit: repository.commitId ?? null },
    });
  }

  protected async checkRepositoryIsCurrent(repository: RepositoryDescriptor): Promise<void> {
    const actual = await this.context.git.currentCommit(repository.gitDir);
    if (!repository.commitId || actual === repository.commitId) return;

    throw new UnexpectedError(
      `"${repository.gitDir}" is at commit ${actual} instead of ${repository.commitId}`,
    );
  }

  private bomService(serviceName: string): BomService {
    const service = this.bom.services[serviceName];
    if (!service) {
      throw new ConfigError(`BOM ${this.bom.version} has no service "${serviceName}"`);
    }
    return service;
  }
}
