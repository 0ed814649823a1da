import type { AudioSpan } from "../ffmpeg";
import type { ContinuityBucket } from "./bucketizer";

export function audioSpanFor(bucket: ContinuityBucket, fps: number): AudioSpan {
  if (bucket.length === 0) {
    throw new Error("Cannot take the audio span of an empty bucket");
  }
  const first = bucket[0].ordinal;
  const last = bucket[bucket.length - 1].ordinal;
  return {
    startSeconds: (first - 1) / fps,
    endSeconds: (last - 1) / fps,
  };
}
