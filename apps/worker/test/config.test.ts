import { EnvSchema } from "@shortloop/shared";
import { describe, expect, it } from "vitest";

import { buildWorkerConfig } from "../src/config";

describe("buildWorkerConfig", () => {
  it("derives typed settings from the environment defaults", () => {
    const config = buildWorkerConfig(EnvSchema.parse({ PUBLISH_TAGS: " shorts, travel ,," }));

    expect(config.scheduler).toEqual({
      dailyBudget: 10_000,
      publishCost: 1600,
      maxItemsPerRun: 5,
      retryCeiling: 3,
      quotaTimeZone: "America/Los_Angeles",
      claimTtlSeconds: 3600,
    });
    expect(config.tracking).toMatchObject({ backend: "file", file: "./data/tracking.json" });
    expect(config.media.segments).toEqual({ segmentDurationSeconds: 60, maxSegments: 10, minTailSeconds: 10 });
    expect(config.publish).toEqual({ accessToken: undefined, visibility: "public", tags: ["shorts", "travel"] });
  });

  it("enables Telegram notifications only when both the token and the chat are set", () => {
    expect(buildWorkerConfig(EnvSchema.parse({ TELEGRAM_BOT_TOKEN: "test-secret" })).notify).toEqual({
      telegram: undefined,
    });
    expect(
      buildWorkerConfig(EnvSchema.parse({ TELEGRAM_BOT_TOKEN: "test-secret", TELEGRAM_CHAT_ID: "1234" })).notify,
    ).toEqual({ telegram: { botToken: "test-secret", chatId: "1234" } });
  });

  it("rejects a run cap below one", () => {
    expect(() => buildWorkerConfig(EnvSchema.parse({ MAX_ITEMS_PER_RUN: "0" }))).toThrow(
      "MAX_ITEMS_PER_RUN must be >= 1, got 0",
    );
  });

  it("rejects a fractional retry ceiling", () => {
    expect(() => buildWorkerConfig(EnvSchema.parse({ RETRY_CEILING: "2.5" }))).toThrow(
      'RETRY_CEILING must be an integer, got "2.5"',
    );
  });

  it("rejects a budget that is not a number", () => {
    expect(() => buildWorkerConfig(EnvSchema.parse({ DAILY_QUOTA_UNITS: "lots" }))).toThrow(
      'DAILY_QUOTA_UNITS must be a number, got "lots"',
    );
  });
});
