/**
 * ReleaseContext bundles the config and adapters one CLI invocation works with.
 * Purpose: make config, logging, metrics, the clock and ports explicit instead of process-wide singletons.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createReleaseContext({ config, command: "build-bom" }); ...; ctx.close().
 */

import path from "node:path";

import type { ReleaseConfig } from "../core/config.js";
import { JsonlLogger } from "../core/logger.js";
import { MetricsRegistry } from "../core/metrics.js";
import { defaultBuildNumber } from "../core/utils.js";
import { createGitClient, type GitClient } from "../git/git-client.js";
import {
  FilesystemReleasePublisher,
  type ReleasePublisher,
} from "../publish/release-publisher.js";

// =============================================================================
// TYPES
// =============================================================================

export interface Clock {
  now(): Date;
}

export type ReleaseContext = {
  config: ReleaseConfig;
  command: string;
  logger: JsonlLogger;
  metrics: MetricsRegistry;
  clock: Clock;
  git: GitClient;
  publisher: ReleasePublisher;
  /** Build number used for every repository when `build_number` is not configured. */
  defaultBuildNumber: string;
  close(): void;
};

export type CreateReleaseContextInput = {
  config: ReleaseConfig;
  command: string;
  clock?: Clock;
  git?: GitClient;
  publisher?: ReleasePublisher;
  logPath?: string;
};

export const systemClock: Clock = {
  now: () => new Date(),
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function commandLogPath(config: ReleaseConfig, command: string): string {
  return path.join(config.output_dir, "logs", `${command}.jsonl`);
}

export function createReleaseContext(input: CreateReleaseContextInput): ReleaseContext {
  const clock = input.clock ?? systemClock;
  const logger = new JsonlLogger(input.logPath ?? commandLogPath(input.config, input.command), {
    command: input.command,
  });

  return {
    config: input.config,
    command: input.command,
    logger,
    metrics: new MetricsRegistry(logger, () => clock.now().getTime()),
    clock,
    git:
      input.git ??
      createGitClient({ disableUpstreamPush: input.config.github_disable_upstream_push }),
    publisher:
      input.publisher ?? new FilesystemReleasePublisher(input.config.publishing.bom_store_dir),
    defaultBuildNumber: defaultBuildNumber(clock.now()),
    close: () => logger.close(),
  };
}
