import type { AlignedFrame } from "../frameStore";

export type ContinuityBucket = AlignedFrame[];

export function minimumBucketLength(fps: number): number {
  return Math.ceil(fps / 2);
}

/**
 * Splits a source's frames (sorted by ordinal) into runs with no gaps.
 * Holes of one or two frames are bridged by repeating the last frame; a
 * larger jump closes the run, and a closed run shorter than half a second
 * is dropped. The run still open at the end is kept whatever its length.
 */
export function bucketize(frames: AlignedFrame[], fps: number): ContinuityBucket[] {
  if (frames.length === 0) {
    return [];
  }
  const minLength = minimumBucketLength(fps);
  const buckets: ContinuityBucket[] = [[frames[0]]];

  for (const frame of frames.slice(1)) {
    let current = buckets[buckets.length - 1];
    const tail = current[current.length - 1];
    const gap = frame.ordinal - tail.ordinal;

    if (gap === 2) {
      current.push(tail);
    } else if (gap === 3) {
      current.push(tail, tail);
    } else if (gap > 3) {
      current = [];
      buckets.push(current);
      if (buckets[buckets.length - 2].length < minLength) {
        buckets.splice(buckets.length - 2, 1);
      }
    }
    current.push(frame);
  }

  return buckets;
}
