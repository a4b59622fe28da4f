import type { Segment, WorkItem } from "../src/types/tracking";

export const T0 = "2026-03-02T12:00:00.000Z";

export function makeSegments(count: number, prefix = "/work/segments/item"): Segment[] {
  return Array.from({ length: count }, (_, i) => ({
    index: i + 1,
    sourceRange: { start: i * 60, duration: 60 },
    localArtifactRef: `${prefix}/part${i + 1}.mp4`,
  }));
}

export function makeItem(overrides: Partial<WorkItem> & Pick<WorkItem, "id">): WorkItem {
  return {
    title: `Video ${overrides.id}`,
    sourceUrl: `https://www.youtube.com/watch?v=${overrides.id}`,
    priority: 0,
    status: "Discovered",
    sourceArtifactRef: null,
    segments: [],
    publishedRefs: {},
    retryCount: 0,
    lastError: null,
    claim: null,
    version: 1,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}
