import { existsSync } from "fs";
import * as fs from "fs/promises";
import path from "path";
import {
  writeConcatManifest,
  type AudioSpan,
  type Transcoder,
} from "../ffmpeg";
import { listSourceDirs } from "../frameStore";
import { audioSpanFor } from "./audioSegmenter";
import type { ContinuityBucket } from "./bucketizer";
import { findMatchingFrame, type RandomSource } from "./frameMatcher";
import type { RatioIndex } from "./ratioIndex";

export const BUCKETS_DIR = "buckets";
export const SOURCE_AUDIO = "audio.mp3";
export const CLIP_NAME = "video.mp4";
export const MANIFEST_NAME = "video_list.txt";
export const FRAME_PATTERN = "%05d.jpg";

export type BucketAssembly = {
  index: number;
  frames: Array<{ sourcePath: string; outputOrdinal: number }>;
  span: AudioSpan;
};

export function sequenceFileName(outputOrdinal: number): string {
  return `${String(outputOrdinal).padStart(5, "0")}.jpg`;
}

/** Picks a stand-in for every frame of a bucket and numbers them from 1. */
export function planBucket(
  bucketIndex: number,
  bucket: ContinuityBucket,
  ratioIndex: RatioIndex,
  fps: number,
  random: RandomSource,
): BucketAssembly {
  return {
    index: bucketIndex,
    frames: bucket.map((frame, i) => ({
      sourcePath: findMatchingFrame(frame, ratioIndex, random),
      outputOrdinal: i + 1,
    })),
    span: audioSpanFor(bucket, fps),
  };
}

/**
 * Renders one bucket into `<bucketsDir>/<index>/video.mp4`: audio slice,
 * renumbered frames, then the mux.
 */
export async function assembleBucket(
  assembly: BucketAssembly,
  sourceAudioPath: string,
  bucketsDir: string,
  fps: number,
  transcoder: Transcoder,
): Promise<string> {
  const bucketDir = path.join(bucketsDir, String(assembly.index));
  await fs.mkdir(bucketDir, { recursive: true });

  const audioPath = path.join(bucketDir, SOURCE_AUDIO);
  await transcoder.trimAudio(sourceAudioPath, audioPath, assembly.span);

  for (const frame of assembly.frames) {
    await fs.copyFile(
      frame.sourcePath,
      path.join(bucketDir, sequenceFileName(frame.outputOrdinal)),
    );
  }

  const clipPath = path.join(bucketDir, CLIP_NAME);
  await transcoder.muxImageSequence({
    framePattern: path.join(bucketDir, FRAME_PATTERN),
    audioPath,
    fps,
    outputPath: clipPath,
  });
  return clipPath;
}

/**
 * Rendered bucket clips under `bucketsDir`, ordered by numeric bucket
 * index (so 10 comes after 9, not after 1).
 */
export async function listBucketClips(bucketsDir: string): Promise<string[]> {
  const entries = await fs.readdir(bucketsDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory() && /^\d+$/.test(e.name))
    .map((e) => Number(e.name))
    .sort((a, b) => a - b)
    .map((n) => path.join(bucketsDir, String(n), CLIP_NAME))
    .filter((clip) => existsSync(clip));
}

export async function stitchBucketClips(
  bucketsDir: string,
  transcoder: Transcoder,
): Promise<string> {
  const clips = await listBucketClips(bucketsDir);
  if (clips.length === 0) {
    throw new Error(`No bucket clips to stitch in ${bucketsDir}`);
  }
  const manifestPath = path.join(bucketsDir, MANIFEST_NAME);
  const outputPath = path.join(bucketsDir, CLIP_NAME);

  console.log(`[Compile] Stitching ${clips.length} buckets in ${bucketsDir}`);
  await writeConcatManifest(manifestPath, clips);
  await transcoder.concat(manifestPath, outputPath);
  return outputPath;
}

/**
 * Joins every source's `buckets/video.mp4` into `<referenceDir>/video.mp4`,
 * sources taken in sorted directory order.
 */
export async function stitchAllSources(
  referenceDir: string,
  transcoder: Transcoder,
): Promise<string> {
  const manifestPath = path.join(referenceDir, MANIFEST_NAME);
  const outputPath = path.join(referenceDir, CLIP_NAME);
  await fs.rm(manifestPath, { force: true });
  await fs.rm(outputPath, { force: true });

  const clips: string[] = [];
  for (const sourceDir of await listSourceDirs(referenceDir)) {
    const clip = path.join(sourceDir, BUCKETS_DIR, CLIP_NAME);
    if (existsSync(clip)) {
      clips.push(clip);
    }
  }
  if (clips.length === 0) {
    throw new Error(`No compiled source videos to stitch in ${referenceDir}`);
  }

  console.log(`[Compile] Stitching ${clips.length} source videos in ${referenceDir}`);
  await writeConcatManifest(manifestPath, clips);
  await transcoder.concat(manifestPath, outputPath);
  return outputPath;
}
