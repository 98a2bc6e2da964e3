/**
 * BomBuilder accumulates repository facts and renders a BOM document.
 * Purpose: turn (prior BOM or defaults) + registered repositories + config + build time into a BOM.
 * Assumptions: called from a command's own control flow, never concurrently.
 * Usage:
 *   const builder = new BomBuilder(context, scm);
 *   builder.addRepository(repository, await scm.lookupSourceInfo(repository));
 *   const bom = builder.build();
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";

import type { ReleaseContext } from "../app/context.js";
import type { Dependencies } from "../core/config.js";
import { loadDependencies } from "../core/config-loader.js";
import {
  originPrefix,
  sourceInfoBuildVersion,
  type RepositoryDescriptor,
  type SourceInfo,
} from "../core/repository.js";
import { formatBomTimestamp } from "../core/utils.js";
import type { SourceCodeManager } from "../scm/source-code-manager.js";

import type { Bom, BomArtifactSources, BomService } from "./bom.js";

// =============================================================================
// DEFAULT DEPENDENCIES
// =============================================================================

// Source tree and compiled tree sit at different depths below the package root.
const DEFAULT_DEPENDENCIES_CANDIDATES = [
  "../../config/bom-dependencies.yaml",
  "../../../config/bom-dependencies.yaml",
];

export function defaultDependenciesPath(): string {
  const candidates = DEFAULT_DEPENDENCIES_CANDIDATES.map((relative) =>
    fileURLToPath(new URL(relative, import.meta.url)),
  );
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[0];
}

export function loadBomDependencies(context: ReleaseContext): Dependencies {
  return loadDependencies(context.config.bom_dependencies_path ?? defaultDependenciesPath());
}

// =============================================================================
// BUILDER
// =============================================================================

type RegisteredRepository = {
  repository: RepositoryDescriptor;
  serviceName: string;
};

export class BomBuilder {
  private readonly dependencies: Dependencies;
  private readonly services: Record<string, BomService | null>;
  private readonly registered = new Map<string, RegisteredRepository>();
  private readonly priorBom: Bom | null;

  constructor(
    private readonly context: ReleaseContext,
    private readonly scm: SourceCodeManager,
    options: { dependencies?: Dependencies; priorBom?: Bom } = {},
  ) {
    this.priorBom = options.priorBom ? structuredClone(options.priorBom) : null;
    this.dependencies = structuredClone(
      options.dependencies ?? this.priorBom?.dependencies ?? loadBomDependencies(context),
    );
    this.services = this.priorBom ? { ...this.priorBom.services } : {};
  }

  /** Seeds dependencies and services from a copy of `priorBom` for a rebuild. */
  static newFromBom(context: ReleaseContext, scm: SourceCodeManager, priorBom: Bom): BomBuilder {
    return new BomBuilder(context, scm, { priorBom });
  }

  addRepository(repository: RepositoryDescriptor, sourceInfo: SourceInfo): void {
    const serviceName = this.scm.serviceNameForRepository(repository.name);
    this.registered.set(repository.name, { repository, serviceName });
    this.services[serviceName] = {
      commit: sourceInfo.summary.commitId,
      version: sourceInfoBuildVersion(sourceInfo),
    };
  }

  /**
   * The origin prefix shared by most registered repositories. On a tie the
   * prefix that reached the top count first keeps winning.
   */
  determineMostCommonPrefix(): string | null {
    const counts = new Map<string, number>();
    let best: string | null = null;
    let bestCount = 0;

    for (const { repository } of this.registered.values()) {
      const prefix = originPrefix(repository.origin);
      const count = (counts.get(prefix) ?? 0) + 1;
      counts.set(prefix, count);
      if (count > bestCount) {
        best = prefix;
        bestCount = count;
      }
    }

    return best;
  }

  build(): Bom {
    const config = this.context.config;
    // A rebuild keeps the prior prefix so untouched services still resolve.
    const commonPrefix =
      this.priorBom?.artifactSources.gitPrefix ?? this.determineMostCommonPrefix();

    const services: Record<string, BomService | null> = structuredClone(this.services);
    for (const { repository, serviceName } of this.registered.values()) {
      const prefix = originPrefix(repository.origin);
      const entry = services[serviceName];
      if (entry && prefix !== commonPrefix) {
        entry.gitPrefix = prefix;
      }
    }

    const artifactSources: BomArtifactSources = this.priorBom
      ? structuredClone(this.priorBom.artifactSources)
      : {};
    if (commonPrefix) artifactSources.gitPrefix = commonPrefix;
    if (config.artifact_sources.debian_repository) {
      artifactSources.debianRepository = config.artifact_sources.debian_repository;
    }
    if (config.artifact_sources.docker_registry) {
      artifactSources.dockerRegistry = config.artifact_sources.docker_registry;
    }
    if (config.artifact_sources.google_image_project) {
      artifactSources.googleImageProject = config.artifact_sources.google_image_project;
    }

    const buildNumber = config.build_number ?? this.context.defaultBuildNumber;
    return {
      version: `${this.versionAlias()}-${buildNumber}`,
      timestamp: formatBomTimestamp(this.context.clock.now()),
      artifactSources,
      dependencies: structuredClone(this.dependencies),
      services,
    };
  }

  private versionAlias(): string {
    const alias = this.priorBom?.artifactSources.gitBranch ?? this.context.config.git_branch;
    return alias ?? "unversioned";
  }
}
