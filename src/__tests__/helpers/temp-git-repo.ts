import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type TempGitRepo = {
  repoDir: string;
  writeFile: (relPath: string, contents: string) => Promise<void>;
  commit: (message: string) => Promise<string>;
  tag: (name: string) => Promise<void>;
  git: (args: string[]) => Promise<string>;
  cleanup: () => Promise<void>;
};

export type TempGitRepoOptions = {
  /** Create the repository here instead of a fresh temp directory. */
  repoDir?: string;
  /** Name given to the branch holding the initial commit. */
  initialBranch?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Creates a repository with one commit on `initialBranch` (default "master").
 */
export async function createTempGitRepo(options: TempGitRepoOptions = {}): Promise<TempGitRepo> {
  const tempRoot = options.repoDir
    ? null
    : await fs.mkdtemp(path.join(os.tmpdir(), "bomsmith-git-"));
  const repoDir = options.repoDir ?? path.join(tempRoot ?? os.tmpdir(), "repo");

  await fs.mkdir(repoDir, { recursive: true });
  await initGitRepo(repoDir);

  const git = async (args: string[]): Promise<string> => {
    const result = await execa("git", ["-C", repoDir, ...args]);
    return result.stdout;
  };

  const writeFile = async (relPath: string, contents: string): Promise<void> => {
    const absolutePath = path.join(repoDir, relPath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, contents, "utf8");
  };

  const commit = async (message: string): Promise<string> => {
    await git(["add", "-A"]);
    await git(["commit", "-m", message]);
    const sha = await git(["rev-parse", "HEAD"]);
    return sha.trim();
  };

  const tag = async (name: string): Promise<void> => {
    await git(["tag", name]);
  };

  const cleanup = async (): Promise<void> => {
    await fs.rm(tempRoot ?? repoDir, { recursive: true, force: true });
  };

  await writeFile("README.md", `# ${path.basename(repoDir)}\n`);
  await commit("chore: initial commit");
  await git(["branch", "-M", options.initialBranch ?? "master"]);

  return { repoDir, writeFile, commit, tag, git, cleanup };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function initGitRepo(repoDir: string): Promise<void> {
  await execa("git", ["init", "-q"], { cwd: repoDir });
  await execa("git", ["config", "user.name", "bomsmith-test"], { cwd: repoDir });
  await execa("git", ["config", "user.email", "bomsmith-test@example.com"], { cwd: repoDir });
  await execa("git", ["config", "commit.gpgsign", "false"], { cwd: repoDir });
  await execa("git", ["config", "tag.gpgsign", "false"], { cwd: repoDir });
}
