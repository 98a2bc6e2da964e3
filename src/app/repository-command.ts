/**
 * RepositoryCommand runs one unit of work per repository and aggregates the results.
 * Purpose: give every release command the same fan-out, failure and telemetry behavior.
 * Assumptions: descriptors are resolved once at construction; processRepository is safe to run
 * concurrently for different repositories.
 * Usage:
 *   class TagCommand extends RepositoryCommand<string> { ... }
 *   const results = await new TagCommand(context, scm, { filter: inBomFilter }).run();
 * Commands that fold the results into something else extend AggregatingRepositoryCommand.
 */

import { minimatch } from "minimatch";

import type { RepositoryEntryFilter } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logErrorEvent, logRepositoryEvent } from "../core/logger.js";
import type { RepositoryDescriptor } from "../core/repository.js";
import { allFilter, type SourceCodeManager } from "../scm/source-code-manager.js";

import type { ReleaseContext } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type RepositoryCommandPhase =
  | "created"
  | "preprocessed"
  | "executing"
  | "postprocessed"
  | "done"
  | "failed";

/** The worker a repository ran on. Serial mode has exactly one lane. */
export type WorkerLane = {
  id: number;
};

export type RepositoryCommandOptions = {
  /** Explicit repositories; otherwise every database entry passing `filter`. */
  repositoryNames?: string[];
  filter?: RepositoryEntryFilter;
};

type RepositoryOutcome<TResult> =
  | { ok: true; value: TResult }
  | { ok: false; error: unknown };

/** `only_repositories` entries are exact names or globs such as `deck-*`. */
export function matchesAny(name: string, patterns: string[]): boolean {
  return patterns.some((pattern) => pattern === name || minimatch(name, pattern));
}

// =============================================================================
// COMMAND
// =============================================================================

export abstract class AggregatingRepositoryCommand<TResult, TOutput> {
  readonly repositories: RepositoryDescriptor[];
  private currentPhase: RepositoryCommandPhase = "created";

  constructor(
    protected readonly context: ReleaseContext,
    protected readonly scm: SourceCodeManager,
    options: RepositoryCommandOptions = {},
  ) {
    const selected = options.repositoryNames
      ? options.repositoryNames.map((name) => scm.makeRepositoryDescriptor(name))
      : scm.filterSourceRepositories(options.filter ?? allFilter);

    const only = context.config.only_repositories;
    this.repositories = only
      ? selected.filter((repository) => matchesAny(repository.name, only))
      : selected;
  }

  get phase(): RepositoryCommandPhase {
    return this.currentPhase;
  }

  protected async preprocess(): Promise<void> {}

  protected abstract processRepository(
    repository: RepositoryDescriptor,
    lane: WorkerLane,
  ): Promise<TResult>;

  /** Runs only when every repository succeeded. */
  protected abstract postprocess(results: Record<string, TResult>): Promise<TOutput> | TOutput;

  async run(): Promise<TOutput> {
    const { command, metrics } = this.context;

    return metrics.trackOutcome("command.outcome", { command }, async () => {
      this.context.logger.log({
        type: "command.start",
        payload: { repositories: this.repositories.length, lanes: this.laneCount() },
      });
      try {
        await this.preprocess();
        this.currentPhase = "preprocessed";

        this.currentPhase = "executing";
        const results = await this.executeAll();

        const output = await this.postprocess(results);
        this.currentPhase = "postprocessed";

        this.context.logger.log({
          type: "command.complete",
          payload: { repositories: this.repositories.map((repository) => repository.name) },
        });
        this.currentPhase = "done";
        return output;
      } catch (err) {
        this.currentPhase = "failed";
        throw err;
      }
    });
  }

  // ===========================================================================
  // FAN-OUT
  // ===========================================================================

  private laneCount(): number {
    const { one_at_a_time: serial, max_parallel: maxParallel } = this.context.config;
    if (serial) return 1;
    return Math.max(1, Math.min(maxParallel, this.repositories.length));
  }

  private async executeAll(): Promise<Record<string, TResult>> {
    const repositories = this.repositories;
    const outcomes: RepositoryOutcome<TResult>[] = [];
    let next = 0;

    const runLane = async (lane: WorkerLane): Promise<void> => {
      while (next < repositories.length) {
        const index = next;
        next += 1;
        outcomes[index] = await this.attempt(repositories[index], lane);
      }
    };

    const lanes = Array.from({ length: this.laneCount() }, (_, i) => ({ id: i + 1 }));
    await Promise.all(lanes.map((lane) => runLane(lane)));

    const results: Record<string, TResult> = {};
    for (const [index, repository] of repositories.entries()) {
      const outcome = outcomes[index];
      if (!outcome.ok) {
        throw outcome.error;
      }
      results[repository.name] = outcome.value;
    }
    return results;
  }

  private async attempt(
    repository: RepositoryDescriptor,
    lane: WorkerLane,
  ): Promise<RepositoryOutcome<TResult>> {
    const { command, logger, metrics } = this.context;

    try {
      const value = await metrics.trackOutcome(
        "repository_command.outcome",
        { command, repository: repository.name },
        async () => {
          await this.scm.ensureLocalRepository(repository);
          return this.processRepository(repository, lane);
        },
      );
      logRepositoryEvent(logger, "repository.complete", repository.name, { lane: lane.id });
      return { ok: true, value };
    } catch (error) {
      logErrorEvent(logger, "repository.failed", error, {
        repository: repository.name,
        payload: { lane: lane.id },
      });
      console.error(`${repository.name}: ${formatErrorMessage(error)}`);
      return { ok: false, error };
    }
  }
}

/** A command whose output is the per-repository results, keyed by name. */
export abstract class RepositoryCommand<TResult> extends AggregatingRepositoryCommand<
  TResult,
  Record<string, TResult>
> {
  protected postprocess(results: Record<string, TResult>): Record<string, TResult> {
    return results;
  }
}
