import { describe, expect, it } from "vitest";
import { bucketize, minimumBucketLength } from "../../../services/compile/bucketizer";
import { framesAt } from "../../utils/frames";

function ordinals(buckets: ReturnType<typeof bucketize>): number[][] {
  return buckets.map((bucket) => bucket.map((frame) => frame.ordinal));
}

describe("minimumBucketLength", () => {
  it("is half a second of frames, rounded up", () => {
    expect(minimumBucketLength(12)).toBe(6);
    expect(minimumBucketLength(5)).toBe(3);
    expect(minimumBucketLength(25)).toBe(13);
  });
});

describe("bucketize", () => {
  it("returns nothing for no frames", () => {
    expect(bucketize([], 12)).toEqual([]);
  });

  it("bridges one- and two-frame holes by repeating the last frame", () => {
    expect(ordinals(bucketize(framesAt("a", [1, 2, 4, 5]), 12))).toEqual([[1, 2, 2, 4, 5]]);
    expect(ordinals(bucketize(framesAt("a", [1, 4]), 12))).toEqual([[1, 1, 1, 4]]);
  });

  it("drops a closed run shorter than the minimum", () => {
    expect(ordinals(bucketize(framesAt("a", [1, 2, 4, 5, 9]), 12))).toEqual([[9]]);
    expect(ordinals(bucketize(framesAt("a", [1, 2, 10]), 5))).toEqual([[10]]);
  });

  it("keeps closed runs that are long enough", () => {
    expect(ordinals(bucketize(framesAt("a", [1, 2, 3, 10, 11]), 4))).toEqual([
      [1, 2, 3],
      [10, 11],
    ]);
  });

  it("keeps the last run whatever its length", () => {
    expect(ordinals(bucketize(framesAt("a", [1, 2, 3, 4, 5, 6, 20]), 12))).toEqual([
      [1, 2, 3, 4, 5, 6],
      [20],
    ]);
  });

  it("repeats the same frame object, not a copy", () => {
    const [bucket] = bucketize(framesAt("a", [1, 3]), 12);
    expect(bucket).toHaveLength(3);
    expect(bucket[1]).toBe(bucket[0]);
  });
});
