import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { EnvSchema } from "@shortloop/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { EXIT_ADVANCED, EXIT_FATAL, EXIT_IDLE, executeCommand, exitCodeFor, parseCliArgs } from "../src/commands";
import { buildWorkerConfig } from "../src/config";
import type { RunNotifier } from "../src/notifications/runNotifier";
import { WorkerRuntime } from "../src/runtime";
import type { RunSummary } from "../src/scheduler/scheduler";
import { JsonFileTrackingStore } from "../src/tracking/fileStore";
import { makeTempDir, NOW, removeTempDir, silenceLogs, stubExecutors } from "./helpers";

describe("parseCliArgs", () => {
  it("shows help without a command", () => {
    expect(parseCliArgs([])).toEqual({ command: "help" });
    expect(parseCliArgs(["--help"])).toEqual({ command: "help" });
  });

  it("parses run options", () => {
    expect(parseCliArgs(["run"])).toEqual({ command: "run", skipDiscovery: false });
    expect(parseCliArgs(["run", "--max-items", "3", "--skip-discovery"])).toEqual({
      command: "run",
      skipDiscovery: true,
      maxItems: 3,
    });
  });

  it("parses status options", () => {
    expect(parseCliArgs(["status", "--top", "2"])).toEqual({ command: "status", top: 2 });
  });

  it("rejects bad input", () => {
    expect(() => parseCliArgs(["run", "--max-items", "0"])).toThrow("--max-items expects a positive integer, got 0");
    expect(() => parseCliArgs(["run", "--max-items"])).toThrow("--max-items expects a positive integer, got nothing");
    expect(() => parseCliArgs(["run", "--fast"])).toThrow("Unknown option for run: --fast");
    expect(() => parseCliArgs(["publish"])).toThrow("Unknown command: publish");
  });
});

describe("exitCodeFor", () => {
  const base: RunSummary = {
    runId: "run-1",
    outcome: "advanced",
    attempted: 1,
    advanced: 1,
    failed: 0,
    retried: 0,
    skipped: 0,
    published: 0,
    completed: 0,
    quotaExhausted: false,
    usage: null,
    corrupt: [],
    publishedParts: [],
    completedItems: [],
    failedItems: [],
  };

  it("distinguishes advanced, idle and fatal runs", () => {
    expect(exitCodeFor(base)).toBe(EXIT_ADVANCED);
    expect(exitCodeFor({ ...base, outcome: "idle" })).toBe(EXIT_IDLE);
    expect(exitCodeFor({ ...base, outcome: "fatal" })).toBe(EXIT_FATAL);
  });
});

describe("executeCommand", () => {
  let dir: string;
  let path: string;
  let printed: string[];
  const print = (text: string) => {
    printed.push(text);
  };

  beforeEach(async () => {
    silenceLogs();
    dir = await makeTempDir();
    path = join(dir, "tracking.json");
    printed = [];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  function runtime(discover: () => Promise<{ id: string; priority: number; title: string; sourceUrl: string }[]>) {
    const config = buildWorkerConfig(EnvSchema.parse({ TRACKING_FILE: path }));
    const stubs = stubExecutors();
    return {
      stubs,
      runtime: new WorkerRuntime(config, {
        store: new JsonFileTrackingStore({ path }),
        executors: stubs.executors,
        discover,
        now: () => NOW,
      }),
    };
  }

  const fresh = { id: "abc", priority: 10, title: "Road trip", sourceUrl: "https://www.youtube.com/watch?v=abc" };

  function recordingNotifier() {
    const runFinished = vi.fn(async (_summary: RunSummary) => {});
    const runAborted = vi.fn(async (_error: string) => {});
    const notifier: RunNotifier = { runFinished, runAborted };
    return { notifier, runFinished, runAborted };
  }

  it("hands the finished run to the notifier", async () => {
    const { notifier, runFinished, runAborted } = recordingNotifier();
    const config = buildWorkerConfig(EnvSchema.parse({ TRACKING_FILE: path }));
    const rt = new WorkerRuntime(config, {
      store: new JsonFileTrackingStore({ path }),
      executors: stubExecutors().executors,
      discover: async () => [fresh],
      notifier,
      now: () => NOW,
    });

    await executeCommand({ command: "run", skipDiscovery: false }, rt, print);

    expect(runFinished).toHaveBeenCalledTimes(1);
    expect(runFinished.mock.calls[0]?.[0]).toMatchObject({ outcome: "advanced", attempted: 2 });
    expect(runAborted).not.toHaveBeenCalled();
  });

  it("reports a run that cannot start and rethrows", async () => {
    const { notifier, runFinished, runAborted } = recordingNotifier();
    const config = buildWorkerConfig(EnvSchema.parse({ TRACKING_FILE: path }));
    const rt = new WorkerRuntime(config, { store: new JsonFileTrackingStore({ path }), notifier, now: () => NOW });

    await expect(executeCommand({ command: "run", skipDiscovery: true }, rt, print)).rejects.toThrow(
      "YOUTUBE_ACCESS_TOKEN is required to publish",
    );
    expect(runAborted).toHaveBeenCalledWith("YOUTUBE_ACCESS_TOKEN is required to publish");
    expect(runFinished).not.toHaveBeenCalled();
  });

  it("discovers, advances the new item and exits 0", async () => {
    const { runtime: rt, stubs } = runtime(async () => [fresh]);

    const code = await executeCommand({ command: "run", skipDiscovery: false }, rt, print);

    expect(code).toBe(EXIT_ADVANCED);
    expect(stubs.fetch).toHaveBeenCalledTimes(1);
    expect(stubs.transform).toHaveBeenCalledTimes(1);
    const summary: unknown = JSON.parse(printed[0] ?? "null");
    expect(summary).toMatchObject({ outcome: "advanced", attempted: 2, advanced: 2 });
  });

  it("exits 2 when nothing is eligible", async () => {
    const { runtime: rt } = runtime(async () => []);
    await expect(executeCommand({ command: "run", skipDiscovery: false }, rt, print)).resolves.toBe(EXIT_IDLE);
  });

  it("keeps running when discovery fails", async () => {
    const { runtime: rt } = runtime(async () => {
      throw new Error("yt-dlp exited with code 1");
    });
    await expect(executeCommand({ command: "run", skipDiscovery: false }, rt, print)).resolves.toBe(EXIT_IDLE);
  });

  it("exits 1 when the tracking file is unreadable", async () => {
    await writeFile(path, "{ not json", "utf8");
    const { runtime: rt } = runtime(async () => []);
    await expect(executeCommand({ command: "run", skipDiscovery: true }, rt, print)).resolves.toBe(EXIT_FATAL);
  });

  it("prints a status report with today's quota", async () => {
    const { runtime: rt } = runtime(async () => [fresh]);
    await executeCommand({ command: "discover" }, rt, print);
    await executeCommand({ command: "status", top: 1 }, rt, print);

    expect(JSON.parse(printed[0] ?? "null")).toEqual({ created: 1, refreshed: 0, unchanged: 0, skipped: 0 });
    expect(JSON.parse(printed[1] ?? "null")).toMatchObject({
      total: 1,
      topPending: [{ id: "abc", status: "Discovered" }],
      quota: { date: "2026-03-02", consumedUnits: 0, dailyBudget: 10_000, remainingUnits: 10_000 },
    });
  });
});

describe("WorkerRuntime", () => {
  it("refuses to build the default publisher without an access token", () => {
    const config = buildWorkerConfig(EnvSchema.parse({}));
    const runtime = new WorkerRuntime(config, { store: new JsonFileTrackingStore({ path: "/unused/tracking.json" }) });
    expect(() => runtime.createExecutors()).toThrow("YOUTUBE_ACCESS_TOKEN is required to publish");
  });

  it("skips discovery when no source channel is configured", async () => {
    silenceLogs();
    const config = buildWorkerConfig(EnvSchema.parse({}));
    const runtime = new WorkerRuntime(config, { store: new JsonFileTrackingStore({ path: "/unused/tracking.json" }) });
    await expect(runtime.discover()).resolves.toBeNull();
    vi.restoreAllMocks();
  });
});
