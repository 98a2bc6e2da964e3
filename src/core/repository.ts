/**
 * Repository value types shared by the source code managers, the BOM builder,
 * and the repository command orchestrator.
 */

// =============================================================================
// DESCRIPTOR
// =============================================================================

export type RepositoryDescriptorInit = {
  name: string;
  gitDir: string;
  origin: string;
  upstream?: string;
  commitId?: string;
  branch?: string;
};

/**
 * Immutable location of one source repository. A different target revision is a
 * different descriptor.
 */
export class RepositoryDescriptor {
  readonly name: string;
  readonly gitDir: string;
  readonly origin: string;
  readonly upstream?: string;
  readonly commitId?: string;
  readonly branch?: string;

  constructor(init: RepositoryDescriptorInit) {
    this.name = init.name;
    this.gitDir = init.gitDir;
    this.origin = init.origin;
    this.upstream = init.upstream;
    this.commitId = init.commitId;
    this.branch = init.branch;
    Object.freeze(this);
  }

  /** The upstream only when it names somewhere other than the origin. */
  upstreamOrNull(): string | null {
    if (!this.upstream || this.upstream === this.origin) return null;
    return this.upstream;
  }

  toString(): string {
    return `${this.name} (${this.origin})`;
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export type CommitMessage = {
  commitId: string;
  message: string;
};

export type RepositorySummary = {
  commitId: string;
  /** Nearest reachable version tag, or null when the history has none. */
  tag: string | null;
  version: string;
  prevVersion: string;
  /** Commits between `prevVersion` and `version`, most recent first. */
  commitMessages: CommitMessage[];
};

export type SourceInfo = {
  buildNumber: string;
  summary: RepositorySummary;
};

/**
 * Versioned name written into BOM service entries.
 */
export function sourceInfoBuildVersion(info: SourceInfo): string {
  return `${info.summary.version}-${info.buildNumber}`;
}

// =============================================================================
// ORIGIN HELPERS
// =============================================================================

/**
 * Strips the repository's own path segment from an origin.
 * "https://host/owner/repo" -> "https://host/owner", "git@host:owner/repo" -> "git@host:owner".
 */
export function originPrefix(origin: string): string {
  const trimmed = origin.replace(/\/+$/, "");
  const slash = trimmed.lastIndexOf("/");
  if (slash >= 0) {
    return trimmed.slice(0, slash);
  }

  const colon = trimmed.lastIndexOf(":");
  return colon >= 0 ? trimmed.slice(0, colon) : "";
}
