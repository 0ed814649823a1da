import path from "path";
import { MAX_RATIO, MIN_RATIO } from "../alignment/geometry";
import type { AlignedFrame } from "../frameStore";
import type { RatioIndex } from "./ratioIndex";

export const MAX_RATIO_ERROR = 20;

/** Returns a value in [0, 1). */
export type RandomSource = () => number;

/** 0, +1, -1, +2, -2, ... up to but not including +/-limit. */
export function probeOffsets(limit: number = MAX_RATIO_ERROR): number[] {
  const offsets = [0];
  for (let magnitude = 1; magnitude < limit; magnitude++) {
    offsets.push(magnitude, -magnitude);
  }
  return offsets;
}

function pick<T>(items: readonly T[], random: RandomSource): T {
  const i = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[i];
}

/**
 * Finds a stand-in for `target` among frames with a nearby ratio. Every
 * probe runs and each successful draw replaces the previous one, so the
 * result can come from a wider offset than the first hit. Candidates sharing
 * the target's file name are never chosen. Falls back to the target itself.
 */
export function findMatchingFrame(
  target: AlignedFrame,
  index: RatioIndex,
  random: RandomSource = Math.random,
): string {
  let match = target.path;

  for (const offset of probeOffsets()) {
    const ratio = target.ratio + offset;
    if (ratio < MIN_RATIO || ratio > MAX_RATIO) {
      continue;
    }
    const candidates = index.get(ratio) ?? [];
    if (candidates.length === 0) {
      continue;
    }
    if (
      offset === 0 &&
      candidates.length === 1 &&
      path.basename(candidates[0]) === target.fileName
    ) {
      continue;
    }
    const candidate = pick(candidates, random);
    if (path.basename(candidate) !== target.fileName) {
      match = candidate;
    }
  }

  return match;
}
