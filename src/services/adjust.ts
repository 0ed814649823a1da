import { existsSync } from "fs";
import path from "path";
import { MissingInputError } from "../lib/errors";
import { createRunContext, logStep, recordStep } from "../lib/progress";
import { alignFrame, type UnusableReason } from "./alignment/pipeline";
import { ANALYSIS_FILE, boxesForPerson, readAnalysis } from "./analysis";
import type { LandmarkDetector } from "./detectors/landmarks";
import {
  ADJUSTMENTS_DIR,
  FRAMES_DIR,
  adjustedOrdinals,
  listSourceDirs,
  prepareAdjustmentsDir,
  rawFrameOrdinal,
} from "./frameStore";

export interface AdjustOptions {
  person: string;
  clear: boolean;
  detector: LandmarkDetector;
}

export interface AdjustSummary {
  sourceDir: string;
  candidates: number;
  skipped: number;
  aligned: number;
  unusable: Record<UnusableReason, number>;
}

function emptyUnusable(): Record<UnusableReason, number> {
  return {
    "unreadable-frame": 0,
    "face-too-small": 0,
    "no-landmarks-for-ratio": 0,
    "no-landmarks-for-rotation": 0,
    "no-landmarks-for-centering": 0,
  };
}

/**
 * Aligns every frame of one source that shows `person`, writing the results
 * to `<sourceDir>/adjustments`. Frames already there are left alone unless
 * `clear` is set.
 */
export async function adjustSource(
  sourceDir: string,
  options: AdjustOptions,
): Promise<AdjustSummary> {
  const framesDir = path.join(sourceDir, FRAMES_DIR);
  const adjustmentsDir = path.join(sourceDir, ADJUSTMENTS_DIR);

  if (!existsSync(framesDir)) {
    throw new MissingInputError("Frames directory", framesDir);
  }
  const records = await readAnalysis(path.join(sourceDir, ANALYSIS_FILE));
  const boxes = boxesForPerson(records, options.person);

  await prepareAdjustmentsDir(adjustmentsDir, options.clear);
  const done = options.clear ? new Set<number>() : await adjustedOrdinals(adjustmentsDir);

  console.log(
    `[Adjust] Adjusting images in ${framesDir}, saving in ${adjustmentsDir}`,
  );

  const summary: AdjustSummary = {
    sourceDir,
    candidates: boxes.size,
    skipped: 0,
    aligned: 0,
    unusable: emptyUnusable(),
  };

  const pending: Array<{ fileName: string; ordinal: number }> = [];
  for (const fileName of boxes.keys()) {
    const ordinal = rawFrameOrdinal(fileName);
    if (ordinal === null) {
      console.warn(`[Adjust] Skipping ${fileName}: not a numbered frame`);
      continue;
    }
    if (done.has(ordinal)) {
      summary.skipped++;
      continue;
    }
    pending.push({ fileName, ordinal });
  }

  const ctx = createRunContext("Adjust", path.basename(sourceDir), pending.length);

  for (const { fileName, ordinal } of pending) {
    const box = boxes.get(fileName);
    if (!box) {
      continue;
    }
    const started = Date.now();
    const result = await alignFrame(
      {
        imagePath: path.join(framesDir, fileName),
        box,
        ordinal,
        outputDir: adjustmentsDir,
      },
      options.detector,
    );
    const elapsed = Date.now() - started;
    recordStep(ctx, elapsed);

    if (result.ok) {
      summary.aligned++;
      logStep(ctx, `${fileName} -> ${path.basename(result.outputPath)}`, elapsed);
    } else {
      summary.unusable[result.reason]++;
      logStep(ctx, `${fileName} unusable (${result.reason})`, elapsed);
    }
  }

  console.log(
    `[Adjust] Done with ${sourceDir}: ${summary.aligned} aligned, ${summary.skipped} already done, ${pending.length - summary.aligned} unusable`,
  );
  return summary;
}

export async function adjustSources(
  referenceDir: string,
  options: AdjustOptions,
): Promise<AdjustSummary[]> {
  if (!existsSync(referenceDir)) {
    throw new MissingInputError("Reference directory", referenceDir);
  }
  console.log(`[Adjust] Adjusting the sets of images in ${referenceDir}`);

  const summaries: AdjustSummary[] = [];
  for (const sourceDir of await listSourceDirs(referenceDir)) {
    summaries.push(await adjustSource(sourceDir, options));
  }

  console.log(`[Adjust] Done adjusting the sets of images in ${referenceDir}`);
  return summaries;
}
