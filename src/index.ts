import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

const QUIET_EXIT_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

/** Commander throws instead of exiting, and prints nothing itself on errors. */
function configureCliErrorHandling(command: Command): void {
  command.configureOutput({ outputError: () => undefined });
  command.exitOverride();
  for (const subcommand of command.commands) {
    configureCliErrorHandling(subcommand);
  }
}

/**
 * `--debug`/`--no-debug` on the command line win, then BOMSMITH_DEBUG. argv is
 * scanned directly since parsing may have failed before options were set.
 */
export function resolveDebugEnabled(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  if (debugFlag !== undefined) return debugFlag;

  const fromEnv = env.BOMSMITH_DEBUG?.trim().toLowerCase();
  return fromEnv === "1" || fromEnv === "true";
}

export function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const { exitCode } = error;
    if (typeof exitCode === "number" && Number.isFinite(exitCode) && exitCode !== 0) {
      return exitCode;
    }
  }

  return 1;
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && QUIET_EXIT_CODES.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: resolveDebugEnabled(argv) }));
    process.exitCode = resolveExitCode(error);
  }
}
