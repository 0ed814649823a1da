import { existsSync } from "fs";
import path from "path";
import { MissingInputError } from "../../lib/errors";
import {
  ADJUSTMENTS_DIR,
  listAlignedFrames,
  listSourceDirs,
  type AlignedFrame,
} from "../frameStore";

/** Mouth open ratio -> paths of every aligned frame with that ratio. */
export type RatioIndex = ReadonlyMap<number, readonly string[]>;

export function buildRatioIndex(frames: Iterable<AlignedFrame>): RatioIndex {
  const index = new Map<number, string[]>();
  for (const frame of frames) {
    const bucket = index.get(frame.ratio);
    if (bucket) {
      bucket.push(frame.path);
    } else {
      index.set(frame.ratio, [frame.path]);
    }
  }
  return index;
}

export async function scanRatioIndex(referenceDir: string): Promise<RatioIndex> {
  if (!existsSync(referenceDir)) {
    throw new MissingInputError("Reference directory", referenceDir);
  }
  const frames: AlignedFrame[] = [];
  for (const sourceDir of await listSourceDirs(referenceDir)) {
    if (!existsSync(path.join(sourceDir, ADJUSTMENTS_DIR))) {
      console.warn(`[Compile] ${sourceDir} has no ${ADJUSTMENTS_DIR} directory, leaving it out of the index`);
      continue;
    }
    frames.push(...(await listAlignedFrames(sourceDir)));
  }
  const index = buildRatioIndex(frames);
  console.log(
    `[Compile] Indexed ${frames.length} aligned frames across ${index.size} ratios`,
  );
  return index;
}
