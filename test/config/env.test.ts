import { afterEach, describe, expect, it } from "vitest";

import { EnvSchema, getEnv } from "../../packages/shared/src/env";

describe("EnvSchema", () => {
  it("fills the scheduling defaults", () => {
    const env = EnvSchema.parse({});
    expect(env.TRACKING_BACKEND).toBe("file");
    expect(env.DAILY_QUOTA_UNITS).toBe("10000");
    expect(env.PUBLISH_COST_UNITS).toBe("1600");
    expect(env.QUOTA_TIMEZONE).toBe("America/Los_Angeles");
    expect(env.PUBLISH_VISIBILITY).toBe("public");
  });

  it("rejects an unknown tracking backend", () => {
    expect(EnvSchema.safeParse({ TRACKING_BACKEND: "redis" }).success).toBe(false);
  });
});

describe("getEnv", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("re-reads process.env in test mode", () => {
    process.env.MAX_ITEMS_PER_RUN = "7";
    expect(getEnv().MAX_ITEMS_PER_RUN).toBe("7");
    process.env.MAX_ITEMS_PER_RUN = "9";
    expect(getEnv().MAX_ITEMS_PER_RUN).toBe("9");
  });

  it("treats an empty optional value as unset", () => {
    process.env.SOURCE_CHANNEL_URL = "";
    expect(getEnv().SOURCE_CHANNEL_URL).toBeUndefined();
  });

  it("names the offending variable when validation fails", () => {
    process.env.PUBLISH_VISIBILITY = "friends";
    expect(() => getEnv()).toThrow(/PUBLISH_VISIBILITY/);
  });
});
