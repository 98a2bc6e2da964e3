import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, logErrorEvent, logRepositoryEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("writes events with command and repository metadata", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { command: "build-bom" });

    logRepositoryEvent(logger, "repository.start", "clouddriver", { worker: 1 });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);
    expect(events[0]?.type).toBe("repository.start");
    expect(events[0]?.command).toBe("build-bom");
    expect(events[0]?.repository).toBe("clouddriver");
    expect(events[0]?.payload).toEqual({ worker: 1 });
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");

    const first = new JsonlLogger(logPath, { command: "fetch-source" });
    first.log({ type: "first" });
    first.close();

    const second = new JsonlLogger(logPath, { command: "fetch-source" });
    second.log({ type: "second" });
    second.close();

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["first", "second"]);
  });

  it("records error name and message", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { command: "publish-release" });

    logErrorEvent(logger, "repository.failed", new RangeError("bad tag"), { repository: "deck" });
    logger.close();

    const [event] = readEvents(logPath);
    expect(event?.repository).toBe("deck");
    expect(event?.payload).toEqual({ message: "bad tag", name: "RangeError" });
  });

  it("warns on write failures with formatted messages", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { command: "build-bom" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "command.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    const message = String(warnSpy.mock.calls[0]?.[0]);
    expect(message).toContain(`Warning: failed to write log event to ${logPath}: disk full`);
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, ts: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) },
      { command: "build-bom", repository: "echo" },
    );

    expect(event).toEqual({
      ts: "2024-01-02T03:04:05.000Z",
      type: "sample",
      command: "build-bom",
      repository: "echo",
      payload: { key: "value" },
    });
  });

  it("drops empty payloads", () => {
    const event = eventWithTs({ type: "sample", payload: {} }, { command: "build-bom" });
    expect(event.payload).toBeUndefined();
  });

  it("throws when the command is missing", () => {
    expect(() => eventWithTs({ type: "orphan" })).toThrow(/command is required/i);
  });
});
