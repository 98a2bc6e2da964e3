import { execa, type Options } from "execa";

import { GitError } from "../core/errors.js";

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: outputText(res.stdout),
      stderr: outputText(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    const { stdout, stderr } = resolveExecaErrorOutput(err);
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${stderr}`, { stdout, stderr });
  }
}

export async function currentBranch(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]);
  return res.stdout.trim();
}

export async function headSha(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "HEAD"]);
  return res.stdout.trim();
}

export async function getRemoteUrl(cwd: string, remote = "origin"): Promise<string | null> {
  const res = await git(cwd, ["config", "--get", `remote.${remote}.url`], { reject: false });
  const url = res.stdout.trim();
  return res.exitCode === 0 && url.length > 0 ? url : null;
}

export async function checkout(cwd: string, ref: string): Promise<void> {
  await git(cwd, ["checkout", "-q", ref]);
}

export async function checkoutNewBranch(cwd: string, branch: string): Promise<void> {
  await git(cwd, ["checkout", "-q", "-b", branch]);
}

export async function addRemote(cwd: string, name: string, url: string): Promise<void> {
  await git(cwd, ["remote", "add", name, url]);
}

export async function disableRemotePush(cwd: string, name: string): Promise<void> {
  await git(cwd, ["remote", "set-url", "--push", name, "disabled"]);
}

export async function createTag(cwd: string, tag: string): Promise<void> {
  await git(cwd, ["tag", tag]);
}

export async function pushRef(cwd: string, ref: string, remote = "origin"): Promise<void> {
  await git(cwd, ["push", remote, ref]);
}

export async function deleteRemoteRef(cwd: string, ref: string, remote = "origin"): Promise<void> {
  await git(cwd, ["push", remote, "--delete", ref]);
}

export async function listRemoteBranches(cwd: string): Promise<string[]> {
  const res = await git(cwd, ["branch", "-r"]);
  return res.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.includes(" -> "));
}

/**
 * Whether `branch` exists as a head on the remote repository at `url`.
 * Works for URLs and filesystem paths without a local clone.
 */
export async function remoteBranchExists(url: string, branch: string): Promise<boolean> {
  const res = await git(process.cwd(), ["ls-remote", "--heads", url, branch]);
  return res.stdout
    .split("\n")
    .some((line) => line.trim().endsWith(`refs/heads/${branch}`));
}

export async function cloneRepository(
  origin: string,
  destDir: string,
  branch?: string,
): Promise<void> {
  const args = ["clone", "--quiet"];
  if (branch) {
    args.push("--branch", branch);
  }
  await git(process.cwd(), [...args, origin, destDir]);
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function outputText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}

function resolveExecaErrorOutput(err: unknown): { stdout: string; stderr: string } {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: String(err) };
  }

  const stdout = outputText("stdout" in err ? err.stdout : undefined);
  const stderr = outputText("stderr" in err ? err.stderr : undefined);
  if (stderr.length > 0) {
    return { stdout, stderr };
  }

  const message = "message" in err ? err.message : undefined;
  return { stdout, stderr: typeof message === "string" ? message : String(err) };
}
