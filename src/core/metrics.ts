/**
 * MetricsRegistry keeps timer families for command and repository outcomes.
 * Purpose: record how long each unit of work took and whether it succeeded.
 * Assumptions: one registry per CLI invocation; observations are mirrored to the JSONL log.
 * Usage: await metrics.trackOutcome("command.outcome", { command }, () => work()).
 */

import type { JsonlLogger } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type MetricLabels = Record<string, string | boolean>;

export type TimerInstance = {
  labels: MetricLabels;
  count: number;
  totalMs: number;
};

export type TimerFamily = {
  name: string;
  instances: TimerInstance[];
};

// =============================================================================
// REGISTRY
// =============================================================================

export class MetricsRegistry {
  private readonly families = new Map<string, Map<string, TimerInstance>>();

  constructor(
    private readonly logger?: JsonlLogger,
    private readonly now: () => number = () => Date.now(),
  ) {}

  observeTimer(name: string, labels: MetricLabels, durationMs: number): void {
    const family = this.familyFor(name);
    const key = labelKey(labels);
    const instance = family.get(key) ?? { labels: { ...labels }, count: 0, totalMs: 0 };
    instance.count += 1;
    instance.totalMs += Math.max(0, durationMs);
    family.set(key, instance);

    this.logger?.log({
      type: "metric.timer",
      payload: { name, labels: { ...labels }, duration_ms: Math.max(0, durationMs) },
    });
  }

  /**
   * Times `work` and records it under `labels` plus `success`. The outcome is
   * recorded whether `work` resolves or rejects; rejections are rethrown.
   */
  async trackOutcome<T>(name: string, labels: MetricLabels, work: () => Promise<T>): Promise<T> {
    const startedAt = this.now();
    try {
      const result = await work();
      this.observeTimer(name, { ...labels, success: true }, this.now() - startedAt);
      return result;
    } catch (err) {
      this.observeTimer(name, { ...labels, success: false }, this.now() - startedAt);
      throw err;
    }
  }

  lookupFamily(name: string): TimerFamily | null {
    const family = this.families.get(name);
    if (!family) return null;
    return { name, instances: [...family.values()] };
  }

  private familyFor(name: string): Map<string, TimerInstance> {
    const existing = this.families.get(name);
    if (existing) return existing;

    const created = new Map<string, TimerInstance>();
    this.families.set(name, created);
    return created;
  }
}

function labelKey(labels: MetricLabels): string {
  return Object.keys(labels)
    .sort()
    .map((key) => `${key}=${String(labels[key])}`)
    .join(",");
}
