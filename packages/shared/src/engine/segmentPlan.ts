import type { SourceRange } from "../types/tracking";

export interface SegmentPlanOptions {
  segmentDurationSeconds: number;
  maxSegments: number;
  /** A trailing remainder shorter than this is dropped */
  minTailSeconds: number;
}

export interface PlannedSegment {
  index: number;
  sourceRange: SourceRange;
}

/**
 * Cuts a source of `durationSeconds` into consecutive fixed-length segments.
 *
 * @example
 * planSegments(185, { segmentDurationSeconds: 60, maxSegments: 10, minTailSeconds: 10 })
 * // 3 full minutes; the 5 s tail is dropped
 */
export function planSegments(durationSeconds: number, options: SegmentPlanOptions): PlannedSegment[] {
  const { segmentDurationSeconds, maxSegments, minTailSeconds } = options;

  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    return [];
  }
  if (segmentDurationSeconds <= 0 || maxSegments <= 0) {
    return [];
  }

  const fullParts = Math.floor(durationSeconds / segmentDurationSeconds);
  const remainder = durationSeconds - fullParts * segmentDurationSeconds;
  let count = fullParts + (remainder >= minTailSeconds ? 1 : 0);
  if (count === 0) {
    count = 1;
  }
  count = Math.min(count, maxSegments);

  const planned: PlannedSegment[] = [];
  for (let index = 1; index <= count; index++) {
    const start = (index - 1) * segmentDurationSeconds;
    const duration = Math.min(segmentDurationSeconds, durationSeconds - start);
    planned.push({ index, sourceRange: { start, duration } });
  }
  return planned;
}
