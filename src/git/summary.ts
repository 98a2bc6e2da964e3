/*
Purpose: derive a RepositorySummary (nearest version tag, next version, commits since) from a working copy.
Assumptions: version tags are named "<prefix>-X.Y.Z" and commit subjects loosely follow conventional commits.
Usage: const summary = await collectRepositorySummary(gitDir, "version");
*/

import type { CommitMessage, RepositorySummary } from "../core/repository.js";
import { SemanticVersion, type VersionComponentIndex } from "../core/semver.js";

import { git, headSha } from "./git.js";

// =============================================================================
// VERSION BUMPS
// =============================================================================

const BREAKING_PATTERN = /BREAKING[ -]CHANGE/;
const BREAKING_SUBJECT_PATTERN = /^\s*\w+(\([^)]*\))?!:/;
const PATCH_SUBJECT_PATTERN = /^\s*fix(\([^)]*\))?:/i;

/**
 * Which version component the given commits require bumping. Breaking changes
 * bump major; a history of nothing but fixes bumps patch; anything else
 * (features, chores, unconventional subjects) bumps minor.
 */
export function determineVersionBump(messages: CommitMessage[]): VersionComponentIndex {
  let bump: VersionComponentIndex = SemanticVersion.PATCH_INDEX;

  for (const { message } of messages) {
    const subject = message.split("\n", 1)[0] ?? "";
    if (BREAKING_PATTERN.test(message) || BREAKING_SUBJECT_PATTERN.test(subject)) {
      return SemanticVersion.MAJOR_INDEX;
    }
    if (!PATCH_SUBJECT_PATTERN.test(subject)) {
      bump = SemanticVersion.MINOR_INDEX;
    }
  }

  return bump;
}

// =============================================================================
// TAGS AND HISTORY
// =============================================================================

export type VersionTag = {
  tag: string;
  version: SemanticVersion;
};

/**
 * The highest "<prefix>-X.Y.Z" tag reachable from HEAD, or null.
 */
export async function findNearestVersionTag(
  gitDir: string,
  tagPrefix: string,
): Promise<VersionTag | null> {
  const res = await git(gitDir, ["tag", "--merged", "HEAD", "--list", `${tagPrefix}-*`]);
  const tagPattern = new RegExp(`^${escapeRegExp(tagPrefix)}-\\d+\\.\\d+\\.\\d+$`);

  const candidates = res.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((tag) => tagPattern.test(tag))
    .map((tag) => ({ tag, version: SemanticVersion.parse(tag) }))
    .sort((a, b) => SemanticVersion.compare(b.version, a.version));

  return candidates[0] ?? null;
}

const RECORD_SEPARATOR = "\x1e";
const FIELD_SEPARATOR = "\x00";

/**
 * Commits in `range` (or all of HEAD when null), most recent first.
 */
export async function listCommitMessages(
  gitDir: string,
  range: string | null,
): Promise<CommitMessage[]> {
  const res = await git(gitDir, ["log", "--format=%H%x00%B%x1e", range ?? "HEAD"]);

  return res.stdout
    .split(RECORD_SEPARATOR)
    .map((record) => record.trim())
    .filter((record) => record.length > 0)
    .map((record) => {
      const separator = record.indexOf(FIELD_SEPARATOR);
      return {
        commitId: record.slice(0, separator),
        message: record.slice(separator + 1).trim(),
      };
    });
}

// =============================================================================
// SUMMARY
// =============================================================================

export async function collectRepositorySummary(
  gitDir: string,
  tagPrefix: string,
): Promise<RepositorySummary> {
  const commitId = await headSha(gitDir);
  const nearest = await findNearestVersionTag(gitDir, tagPrefix);

  const baseVersion = nearest?.version ?? SemanticVersion.fromComponents(0, 0, 0);
  const commitMessages = await listCommitMessages(gitDir, nearest ? `${nearest.tag}..HEAD` : null);

  const version =
    commitMessages.length === 0 ? baseVersion : baseVersion.next(determineVersionBump(commitMessages));

  return {
    commitId,
    tag: nearest?.tag ?? null,
    version: version.toVersion(),
    prevVersion: baseVersion.toVersion(),
    commitMessages,
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
