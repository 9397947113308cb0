/**
 * Splits a segment plan into parts at discontinuity boundaries.
 *
 * Each part is remuxed on its own, so timestamp resets between parts never
 * reach the engine in a single pass.
 */

import { ManifestError } from "../errors.js";
import type { Segment, SegmentPlan } from "./manifest.js";

export type PartStatus = "planned" | "downloading" | "downloaded" | "remuxed" | "failed";

export interface Part {
  /** Ascending ordinal starting at 0 */
  id: number;
  segments: readonly Segment[];
}

/**
 * Partition the plan. A new part starts at the first segment and at every
 * segment flagged as a discontinuity.
 */
export function planParts(plan: SegmentPlan): Part[] {
  if (plan.segments.length === 0) {
    throw new ManifestError("playlist contains no segments");
  }

  const runs: Segment[][] = [];
  for (const segment of plan.segments) {
    const current = runs[runs.length - 1];
    if (current === undefined || segment.discontinuity) {
      runs.push([segment]);
    } else {
      current.push(segment);
    }
  }

  const parts = runs.map((segments, id) => Object.freeze({ id, segments: Object.freeze(segments) }));
  validatePartition(plan, parts);
  return parts;
}

/**
 * Check that `parts` cover every segment of `plan` exactly once, in order,
 * with strictly increasing sequence numbers inside each part.
 */
export function validatePartition(plan: SegmentPlan, parts: readonly Part[]): void {
  let cursor = 0;

  parts.forEach((part, index) => {
    if (part.id !== index) {
      throw new Error(`part ids must be consecutive from 0; found ${part.id} at position ${index}`);
    }
    if (part.segments.length === 0) {
      throw new Error(`part ${part.id} is empty`);
    }
    part.segments.forEach((segment, offset) => {
      if (plan.segments[cursor] !== segment) {
        throw new Error(`part ${part.id} does not follow plan order at segment ${segment.sequence}`);
      }
      if (offset > 0 && segment.sequence <= part.segments[offset - 1].sequence) {
        throw new Error(`sequence numbers do not increase inside part ${part.id}`);
      }
      cursor += 1;
    });
  });

  if (cursor !== plan.segments.length) {
    throw new Error(`parts cover ${cursor} of ${plan.segments.length} segments`);
  }
}

/**
 * Sum of declared segment durations.
 */
export function partDuration(part: Part): number {
  return part.segments.reduce((total, segment) => total + segment.duration, 0);
}
