import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  createRunNotifier,
  formatRunMessage,
  NoopRunNotifier,
  TelegramRunNotifier,
} from "../../src/notifications/runNotifier";
import type { RunSummary } from "../../src/scheduler/scheduler";
import { silenceLogs } from "../helpers";

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    runId: "run-1",
    outcome: "advanced",
    attempted: 3,
    advanced: 2,
    failed: 1,
    retried: 0,
    skipped: 0,
    published: 2,
    completed: 1,
    quotaExhausted: false,
    usage: { date: "2026-03-02", consumedUnits: 3200, dailyBudget: 10_000, remainingUnits: 6800 },
    corrupt: [],
    publishedParts: [
      { itemId: "abc", title: "Road trip <day 1>", segmentIndex: 1, totalSegments: 2, remoteId: "yt-1" },
      { itemId: "abc", title: "Road trip <day 1>", segmentIndex: 2, totalSegments: 2, remoteId: "yt-2" },
    ],
    completedItems: [{ itemId: "abc", title: "Road trip <day 1>" }],
    failedItems: [{ itemId: "bad", title: "Tom & Jerry", stage: "fetch", error: "Source is unavailable" }],
    ...overrides,
  };
}

describe("formatRunMessage", () => {
  it("lists published parts, completions, failures and the day's quota", () => {
    expect(formatRunMessage(summary())).toBe(
      [
        "<b>Shortloop run</b>",
        "",
        "<b>Published</b> (2)",
        "• Road trip &lt;day 1&gt;: part 1/2",
        "• Road trip &lt;day 1&gt;: part 2/2",
        "",
        "<b>Completed</b> (1)",
        "• Road trip &lt;day 1&gt;",
        "",
        "<b>Failed</b> (1)",
        "• Tom &amp; Jerry [fetch]: Source is unavailable",
        "",
        "Quota: 3200/10000 units on 2026-03-02",
      ].join("\n"),
    );
  });

  it("stays quiet when a run only fetched or transformed", () => {
    expect(formatRunMessage(summary({ publishedParts: [], completedItems: [], failedItems: [] }))).toBeNull();
  });

  it("reports a fatal run with its error", () => {
    expect(formatRunMessage(summary({ outcome: "fatal", error: "Tracking file ./data/tracking.json is not valid JSON" }))).toBe(
      "<b>Shortloop run aborted</b>\n\nTracking file ./data/tracking.json is not valid JSON",
    );
  });
});

describe("TelegramRunNotifier", () => {
  beforeEach(() => {
    silenceLogs();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends one message per finished run with something to report", async () => {
    const sendMessage = vi.fn(async (_html: string) => {});
    const notifier = new TelegramRunNotifier({ sendMessage });

    await notifier.runFinished(summary());
    await notifier.runFinished(summary({ publishedParts: [], completedItems: [], failedItems: [] }));

    expect(sendMessage).toHaveBeenCalledTimes(1);
    expect(sendMessage.mock.calls[0]?.[0]).toBe(formatRunMessage(summary()));
  });

  it("escapes the error of an aborted run", async () => {
    const sendMessage = vi.fn(async (_html: string) => {});

    await new TelegramRunNotifier({ sendMessage }).runAborted("YOUTUBE_ACCESS_TOKEN is required to <publish>");

    expect(sendMessage).toHaveBeenCalledWith(
      "<b>Shortloop run aborted</b>\n\nYOUTUBE_ACCESS_TOKEN is required to &lt;publish&gt;",
    );
  });

  it("logs a delivery failure instead of failing the run", async () => {
    const sendMessage = vi.fn(async (_html: string): Promise<void> => {
      throw new Error("Telegram sendMessage failed: 400 Bad Request: chat not found");
    });

    await expect(new TelegramRunNotifier({ sendMessage }).runAborted("boom")).resolves.toBeUndefined();

    const warned = vi.mocked(console.warn).mock.calls.map(([line]) => JSON.parse(String(line)));
    expect(warned).toEqual([
      expect.objectContaining({ event: "notification_failed", service: "worker" }),
    ]);
  });
});

describe("createRunNotifier", () => {
  it("does nothing without Telegram settings", () => {
    expect(createRunNotifier({})).toBeInstanceOf(NoopRunNotifier);
  });

  it("uses Telegram when a bot token and chat are configured", () => {
    expect(createRunNotifier({ telegram: { botToken: "test-secret", chatId: "1234" } })).toBeInstanceOf(
      TelegramRunNotifier,
    );
  });
});
