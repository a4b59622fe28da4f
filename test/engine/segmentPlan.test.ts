import { describe, expect, it } from "vitest";

import { planSegments } from "../../packages/shared/src/engine/segmentPlan";

const options = { segmentDurationSeconds: 60, maxSegments: 10, minTailSeconds: 10 };

describe("planSegments", () => {
  it("drops a tail shorter than the minimum", () => {
    const plan = planSegments(185, options);
    expect(plan.map((part) => part.index)).toEqual([1, 2, 3]);
    expect(plan[2]).toEqual({ index: 3, sourceRange: { start: 120, duration: 60 } });
  });

  it("keeps a tail at least the minimum as a shorter last part", () => {
    const plan = planSegments(150, options);
    expect(plan).toEqual([
      { index: 1, sourceRange: { start: 0, duration: 60 } },
      { index: 2, sourceRange: { start: 60, duration: 60 } },
      { index: 3, sourceRange: { start: 120, duration: 30 } },
    ]);
  });

  it("yields a single part for a source shorter than the tail threshold", () => {
    expect(planSegments(5, options)).toEqual([{ index: 1, sourceRange: { start: 0, duration: 5 } }]);
  });

  it("caps the number of parts", () => {
    expect(planSegments(3600, { ...options, maxSegments: 4 })).toHaveLength(4);
  });

  it("returns nothing for an empty or invalid duration", () => {
    expect(planSegments(0, options)).toEqual([]);
    expect(planSegments(Number.NaN, options)).toEqual([]);
  });
});
