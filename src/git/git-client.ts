/**
 * Git-backed adapter for the source code managers and release commands.
 * Purpose: map GitClient calls onto the execa git helpers.
 * Assumptions: git is on PATH; working copies live on the local filesystem.
 * Usage: createGitClient({ disableUpstreamPush }) and hand it to createReleaseContext.
 */

import path from "node:path";

import { GitError } from "../core/errors.js";
import type { RepositoryDescriptor, RepositorySummary } from "../core/repository.js";
import { ensureDir, pathExists } from "../core/utils.js";

import {
  addRemote,
  checkout,
  checkoutNewBranch,
  cloneRepository,
  createTag,
  currentBranch,
  deleteRemoteRef,
  disableRemotePush,
  getRemoteUrl,
  headSha,
  listRemoteBranches,
  pushRef,
  remoteBranchExists,
} from "./git.js";
import { collectRepositorySummary } from "./summary.js";

// =============================================================================
// TYPES
// =============================================================================

export type CloneOptions = {
  branch?: string;
  fallbackBranch?: string;
};

export type CloneResult = {
  /** Branch actually checked out; null when cloned at the remote's default. */
  branch: string | null;
};

export interface GitClient {
  clone(repository: RepositoryDescriptor, options?: CloneOptions): Promise<CloneResult>;
  checkoutBranch(gitDir: string, branch: string): Promise<void>;
  checkoutCommit(gitDir: string, commitId: string): Promise<void>;
  createBranch(gitDir: string, branch: string): Promise<void>;
  currentBranch(gitDir: string): Promise<string>;
  currentCommit(gitDir: string): Promise<string>;
  collectSummary(gitDir: string, tagPrefix: string): Promise<RepositorySummary>;
  tag(gitDir: string, tag: string): Promise<void>;
  pushBranch(gitDir: string, branch: string): Promise<void>;
  pushTag(gitDir: string, tag: string): Promise<void>;
  deleteRemoteBranch(gitDir: string, branch: string): Promise<void>;
  listRemoteBranches(gitDir: string): Promise<string[]>;
  remoteUrl(gitDir: string, remote?: string): Promise<string | null>;
}

export type GitClientOptions = {
  disableUpstreamPush?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitClient(options: GitClientOptions = {}): GitClient {
  return {
    clone: (repository, cloneOptions = {}) => cloneDescriptor(repository, cloneOptions, options),
    checkoutBranch: checkout,
    checkoutCommit: checkout,
    createBranch: checkoutNewBranch,
    currentBranch,
    currentCommit: headSha,
    collectSummary: collectRepositorySummary,
    tag: createTag,
    pushBranch: (gitDir, branch) => pushRef(gitDir, branch),
    pushTag: (gitDir, tag) => pushRef(gitDir, `refs/tags/${tag}`),
    deleteRemoteBranch: (gitDir, branch) => deleteRemoteRef(gitDir, branch),
    listRemoteBranches,
    remoteUrl: getRemoteUrl,
  };
}

export function makeSshUrl(hostname: string, owner: string, name: string): string {
  return `git@${hostname}:${owner}/${name}`;
}

export function makeHttpsUrl(hostname: string, owner: string, name: string): string {
  return `https://${hostname}/${owner}/${name}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function cloneDescriptor(
  repository: RepositoryDescriptor,
  cloneOptions: CloneOptions,
  clientOptions: GitClientOptions,
): Promise<CloneResult> {
  if (await pathExists(repository.gitDir)) {
    throw new GitError(`Refusing to clone ${repository.name} over existing ${repository.gitDir}`);
  }

  const branch = await resolveCloneBranch(repository.origin, cloneOptions);
  await ensureDir(path.dirname(repository.gitDir));
  await cloneRepository(repository.origin, repository.gitDir, branch ?? undefined);

  if (repository.commitId) {
    await checkout(repository.gitDir, repository.commitId);
  }

  const upstream = repository.upstreamOrNull();
  if (upstream) {
    await addRemote(repository.gitDir, "upstream", upstream);
    if (clientOptions.disableUpstreamPush) {
      await disableRemotePush(repository.gitDir, "upstream");
    }
  }

  return { branch };
}

async function resolveCloneBranch(origin: string, options: CloneOptions): Promise<string | null> {
  if (!options.branch) {
    return null;
  }
  if (await remoteBranchExists(origin, options.branch)) {
    return options.branch;
  }
  if (options.fallbackBranch && (await remoteBranchExists(origin, options.fallbackBranch))) {
    return options.fallbackBranch;
  }

  const fallback = options.fallbackBranch ? ` or fallback "${options.fallbackBranch}"` : "";
  throw new GitError(`Branch "${options.branch}"${fallback} does not exist in ${origin}`);
}
