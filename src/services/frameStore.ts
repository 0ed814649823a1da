import { existsSync } from "fs";
import * as fs from "fs/promises";
import path from "path";
import { MAX_RATIO, MIN_RATIO } from "./alignment/geometry";

export const ADJUSTMENTS_DIR = "adjustments";
export const FRAMES_DIR = "frames";

const ADJUSTED_NAME = /^(\d{5,})_(\d{1,3})\.jpg$/;

export type AlignedFrame = {
  sourceId: string;
  ordinal: number;
  ratio: number;
  fileName: string;
  path: string;
};

export function adjustedFileName(ordinal: number, ratio: number): string {
  if (!Number.isInteger(ordinal) || ordinal < 1) {
    throw new Error(`Invalid frame ordinal: ${ordinal}`);
  }
  if (!Number.isInteger(ratio) || ratio < MIN_RATIO || ratio > MAX_RATIO) {
    throw new Error(`Invalid mouth open ratio: ${ratio}`);
  }
  return `${String(ordinal).padStart(5, "0")}_${ratio}.jpg`;
}

export function parseAdjustedFileName(
  fileName: string,
): { ordinal: number; ratio: number } | null {
  const match = ADJUSTED_NAME.exec(fileName);
  if (!match) {
    return null;
  }
  const ordinal = Number(match[1]);
  const ratio = Number(match[2]);
  if (ordinal < 1 || ratio < MIN_RATIO || ratio > MAX_RATIO) {
    return null;
  }
  return { ordinal, ratio };
}

/** Ordinal of a raw extracted frame such as `00042.jpg`. */
export function rawFrameOrdinal(fileName: string): number | null {
  const match = /^(\d+)\.jpg$/.exec(fileName);
  if (!match) {
    return null;
  }
  const ordinal = Number(match[1]);
  return ordinal >= 1 ? ordinal : null;
}

/**
 * Ordinals already present in an adjustments directory, whatever ratio they
 * were saved with. Used to resume an interrupted adjust run.
 */
export async function adjustedOrdinals(adjustmentsDir: string): Promise<Set<number>> {
  const done = new Set<number>();
  if (!existsSync(adjustmentsDir)) {
    return done;
  }
  for (const entry of await fs.readdir(adjustmentsDir)) {
    const parsed = parseAdjustedFileName(entry);
    if (parsed) {
      done.add(parsed.ordinal);
    }
  }
  return done;
}

export async function prepareAdjustmentsDir(
  adjustmentsDir: string,
  clear: boolean,
): Promise<void> {
  if (clear && existsSync(adjustmentsDir)) {
    await fs.rm(adjustmentsDir, { recursive: true, force: true });
  }
  await fs.mkdir(adjustmentsDir, { recursive: true });
}

/** A source's aligned frames sorted by ordinal. */
export async function listAlignedFrames(sourceDir: string): Promise<AlignedFrame[]> {
  const adjustmentsDir = path.join(sourceDir, ADJUSTMENTS_DIR);
  if (!existsSync(adjustmentsDir)) {
    return [];
  }
  const sourceId = path.basename(sourceDir);
  const frames: AlignedFrame[] = [];
  for (const entry of await fs.readdir(adjustmentsDir)) {
    const parsed = parseAdjustedFileName(entry);
    if (!parsed) {
      continue;
    }
    frames.push({
      sourceId,
      ordinal: parsed.ordinal,
      ratio: parsed.ratio,
      fileName: entry,
      path: path.join(adjustmentsDir, entry),
    });
  }
  return frames.sort((a, b) => a.ordinal - b.ordinal || a.ratio - b.ratio);
}

/** Subdirectories of a reference directory, sorted by name. */
export async function listSourceDirs(referenceDir: string): Promise<string[]> {
  const entries = await fs.readdir(referenceDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort()
    .map((name) => path.join(referenceDir, name));
}
