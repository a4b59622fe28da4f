import { describe, expect, it } from "vitest";

import {
  canTransition,
  InvalidTransitionError,
  isFullyPublished,
  isTerminalStatus,
  isValidStatus,
  nextStatusAfter,
  pendingSegmentIndices,
  statusOrdinal,
  transition,
} from "../../packages/shared/src/engine/lifecycle";
import { makeItem, makeSegments } from "../../packages/shared/test/fixtures";

describe("nextStatusAfter", () => {
  it("follows the forward sequence", () => {
    expect(nextStatusAfter("Discovered")).toBe("Fetched");
    expect(nextStatusAfter("Fetched")).toBe("Transformed");
    expect(nextStatusAfter("Transformed")).toBe("Completed");
  });

  it("returns null for terminal statuses", () => {
    expect(nextStatusAfter("Completed")).toBeNull();
    expect(nextStatusAfter("Failed")).toBeNull();
  });
});

describe("canTransition", () => {
  it("allows one step forward", () => {
    expect(canTransition("Discovered", "Fetched")).toBe(true);
    expect(canTransition("Transformed", "Completed")).toBe(true);
  });

  it("rejects skips and regressions", () => {
    expect(canTransition("Discovered", "Transformed")).toBe(false);
    expect(canTransition("Transformed", "Fetched")).toBe(false);
    expect(canTransition("Fetched", "Fetched")).toBe(false);
  });

  it("allows Failed only from non-terminal statuses", () => {
    expect(canTransition("Discovered", "Failed")).toBe(true);
    expect(canTransition("Transformed", "Failed")).toBe(true);
    expect(canTransition("Completed", "Failed")).toBe(false);
    expect(canTransition("Failed", "Discovered")).toBe(false);
  });
});

describe("statusOrdinal", () => {
  it("never decreases along any allowed transition", () => {
    const statuses = ["Discovered", "Fetched", "Transformed", "Completed", "Failed"] as const;
    for (const from of statuses) {
      for (const to of statuses) {
        if (canTransition(from, to)) {
          expect(statusOrdinal(to)).toBeGreaterThan(statusOrdinal(from));
        }
      }
    }
  });
});

describe("transition", () => {
  it("returns a moved copy with a new updatedAt", () => {
    const item = makeItem({ id: "a", status: "Fetched" });
    const now = new Date("2026-03-03T00:00:00.000Z");

    const moved = transition(item, "Transformed", now);

    expect(moved.status).toBe("Transformed");
    expect(moved.updatedAt).toBe("2026-03-03T00:00:00.000Z");
    expect(item.status).toBe("Fetched");
  });

  it("throws InvalidTransitionError on a regression", () => {
    const item = makeItem({ id: "a", status: "Completed" });
    expect(() => transition(item, "Transformed", new Date())).toThrow(InvalidTransitionError);
    expect(() => transition(item, "Transformed", new Date())).toThrow(
      "Invalid status transition Completed → Transformed",
    );
  });
});

describe("status helpers", () => {
  it("recognises terminal and valid statuses", () => {
    expect(isTerminalStatus("Completed")).toBe(true);
    expect(isTerminalStatus("Fetched")).toBe(false);
    expect(isValidStatus("Transformed")).toBe(true);
    expect(isValidStatus("transformed")).toBe(false);
    expect(isValidStatus(3)).toBe(false);
  });
});

describe("pendingSegmentIndices", () => {
  it("lists unpublished indices in order", () => {
    const item = makeItem({
      id: "a",
      status: "Transformed",
      segments: makeSegments(3).reverse(),
      publishedRefs: { 2: "remote-2" },
    });

    expect(pendingSegmentIndices(item)).toEqual([1, 3]);
    expect(isFullyPublished(item)).toBe(false);
  });

  it("treats an item without segments as not published", () => {
    expect(isFullyPublished(makeItem({ id: "a", status: "Transformed" }))).toBe(false);
  });

  it("is fully published when every segment has a ref", () => {
    const item = makeItem({
      id: "a",
      status: "Transformed",
      segments: makeSegments(2),
      publishedRefs: { 1: "r1", 2: "r2" },
    });
    expect(isFullyPublished(item)).toBe(true);
  });
});
