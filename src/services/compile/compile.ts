import { existsSync } from "fs";
import * as fs from "fs/promises";
import path from "path";
import { MissingInputError } from "../../lib/errors";
import { createRunContext, logStep, recordStep } from "../../lib/progress";
import type { Transcoder } from "../ffmpeg";
import { listAlignedFrames, listSourceDirs } from "../frameStore";
import {
  BUCKETS_DIR,
  SOURCE_AUDIO,
  assembleBucket,
  planBucket,
  stitchAllSources,
  stitchBucketClips,
} from "./assembler";
import { bucketize } from "./bucketizer";
import type { RandomSource } from "./frameMatcher";
import { scanRatioIndex, type RatioIndex } from "./ratioIndex";

export interface CompileOptions {
  fps: number;
  transcoder: Transcoder;
  bucketRetries: number;
  random?: RandomSource;
}

export interface SourceCompileResult {
  sourceDir: string;
  buckets: number;
  assembled: number;
  failures: Array<{ bucket: number; error: string }>;
  outputPath: string;
}

export interface CompileRunOptions extends CompileOptions {
  referenceDir: string;
  sourceDir?: string;
  stitchAll: boolean;
}

export interface CompileRunResult {
  sources: SourceCompileResult[];
  failedSources: Array<{ sourceDir: string; error: string }>;
  finalPath: string | null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function withRetries<T>(
  attempts: number,
  label: string,
  fn: () => Promise<T>,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < attempts) {
        console.warn(`[Compile] ${label} failed, retrying (${attempt + 1}/${attempts}):`, errorMessage(err));
      }
    }
  }
  throw lastError;
}

/**
 * Rebuilds `<sourceDir>/buckets` from scratch: one clip per continuity
 * bucket, then the stitched `buckets/video.mp4`.
 */
export async function compileSource(
  sourceDir: string,
  ratioIndex: RatioIndex,
  options: CompileOptions,
): Promise<SourceCompileResult> {
  // A source that fails below must not keep a clip from an earlier run.
  const bucketsDir = path.join(sourceDir, BUCKETS_DIR);
  await fs.rm(bucketsDir, { recursive: true, force: true });

  const sourceAudio = path.join(sourceDir, SOURCE_AUDIO);
  if (!existsSync(sourceAudio)) {
    throw new MissingInputError("Source audio", sourceAudio);
  }

  console.log(`[Compile] Compiling a video from images in ${sourceDir}`);

  const frames = await listAlignedFrames(sourceDir);
  const buckets = bucketize(frames, options.fps);
  const random = options.random ?? Math.random;

  await fs.mkdir(bucketsDir, { recursive: true });

  const ctx = createRunContext("Compile", path.basename(sourceDir), buckets.length);
  const failures: SourceCompileResult["failures"] = [];
  let assembled = 0;

  for (let i = 0; i < buckets.length; i++) {
    const bucketIndex = i + 1;
    const started = Date.now();
    const plan = planBucket(bucketIndex, buckets[i], ratioIndex, options.fps, random);

    try {
      await withRetries(options.bucketRetries, `Bucket ${bucketIndex}`, async () => {
        await fs.rm(path.join(bucketsDir, String(bucketIndex)), { recursive: true, force: true });
        return assembleBucket(plan, sourceAudio, bucketsDir, options.fps, options.transcoder);
      });
      assembled++;
    } catch (err) {
      console.error(`[Compile] Bucket ${bucketIndex} of ${sourceDir} failed:`, err);
      failures.push({ bucket: bucketIndex, error: errorMessage(err) });
    }

    const elapsed = Date.now() - started;
    recordStep(ctx, elapsed);
    logStep(ctx, `bucket ${bucketIndex} (${plan.frames.length} frames)`, elapsed);
  }

  if (assembled === 0) {
    throw new Error(`No buckets could be assembled for ${sourceDir}`);
  }

  const outputPath = await stitchBucketClips(bucketsDir, options.transcoder);
  const seconds = await options.transcoder.probeDuration(outputPath);
  console.log(
    `[Compile] Done compiling ${sourceDir}: ${assembled}/${buckets.length} buckets, ${seconds.toFixed(1)}s`,
  );

  return {
    sourceDir,
    buckets: buckets.length,
    assembled,
    failures,
    outputPath,
  };
}

/**
 * One compile invocation. The ratio index is built once over every source in
 * `referenceDir`; then either the single `sourceDir` or every source is
 * compiled, and optionally all source videos are joined.
 */
export async function runCompile(options: CompileRunOptions): Promise<CompileRunResult> {
  const ratioIndex = await scanRatioIndex(options.referenceDir);

  const targets = options.sourceDir
    ? [options.sourceDir]
    : await listSourceDirs(options.referenceDir);

  const sources: SourceCompileResult[] = [];
  const failedSources: CompileRunResult["failedSources"] = [];

  for (const sourceDir of targets) {
    try {
      sources.push(await compileSource(sourceDir, ratioIndex, options));
    } catch (err) {
      if (options.sourceDir) {
        throw err;
      }
      console.error(`[Compile] Source ${sourceDir} failed:`, err);
      failedSources.push({ sourceDir, error: errorMessage(err) });
    }
  }

  let finalPath: string | null = null;
  if (options.stitchAll) {
    finalPath = await stitchAllSources(options.referenceDir, options.transcoder);
  }

  const summary = {
    compiledSources: sources.length,
    failedSources: failedSources.length,
    failedBuckets: sources.reduce((n, s) => n + s.failures.length, 0),
    finalPath,
  };
  console.log("[Compile] Summary:", JSON.stringify(summary, null, 2));

  return { sources, failedSources, finalPath };
}
