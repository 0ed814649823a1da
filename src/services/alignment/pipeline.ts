import path from "path";
import type { LandmarkDetector } from "../detectors/landmarks";
import { adjustedFileName } from "../frameStore";
import {
  CANONICAL_SIZE,
  levelAngle,
  mouthOpenRatio,
  mouthShift,
  squareCropRegion,
  type BoundingBox,
} from "./geometry";
import {
  cropWithPadding,
  loadRaster,
  resizeTo,
  rotateAboutCenter,
  toGrayscale,
  toRgbImage,
  translate,
  writeJpeg,
  type Raster,
} from "./imageOps";

export type UnusableReason =
  | "unreadable-frame"
  | "face-too-small"
  | "no-landmarks-for-ratio"
  | "no-landmarks-for-rotation"
  | "no-landmarks-for-centering";

export type AlignmentResult =
  | { ok: true; ratio: number; outputPath: string }
  | { ok: false; reason: UnusableReason };

export interface AlignFrameInput {
  imagePath: string;
  box: BoundingBox;
  ordinal: number;
  outputDir: string;
}

/**
 * Everything before Persist, on an already loaded raster. Returns the
 * canonical grayscale frame and the ratio measured right after cropping.
 */
export async function alignRaster(
  raster: Raster,
  box: BoundingBox,
  detector: LandmarkDetector,
): Promise<
  { ok: true; ratio: number; frame: Raster } | { ok: false; reason: UnusableReason }
> {
  const region = squareCropRegion(box);
  if (!region) {
    return { ok: false, reason: "face-too-small" };
  }
  let image = await cropWithPadding(raster, region);

  const ratioLandmarks = await detector.detect(toRgbImage(image));
  if (!ratioLandmarks) {
    return { ok: false, reason: "no-landmarks-for-ratio" };
  }
  const ratio = mouthOpenRatio(ratioLandmarks);

  const rotationLandmarks = await detector.detect(toRgbImage(image));
  if (!rotationLandmarks) {
    return { ok: false, reason: "no-landmarks-for-rotation" };
  }
  image = await rotateAboutCenter(image, -levelAngle(rotationLandmarks));

  const centeringLandmarks = await detector.detect(toRgbImage(image));
  if (!centeringLandmarks) {
    return { ok: false, reason: "no-landmarks-for-centering" };
  }
  const { dx, dy } = mouthShift(centeringLandmarks, image.width, image.height);
  image = await translate(image, dx, dy);

  image = await resizeTo(image, CANONICAL_SIZE);
  image = await toGrayscale(image);

  return { ok: true, ratio, frame: image };
}

export async function alignFrame(
  input: AlignFrameInput,
  detector: LandmarkDetector,
): Promise<AlignmentResult> {
  let raster: Raster;
  try {
    raster = await loadRaster(input.imagePath);
  } catch (err) {
    console.warn(
      `[Adjust] Cannot decode ${input.imagePath}:`,
      err instanceof Error ? err.message : err,
    );
    return { ok: false, reason: "unreadable-frame" };
  }
  const aligned = await alignRaster(raster, input.box, detector);
  if (!aligned.ok) {
    return aligned;
  }

  const outputPath = path.join(
    input.outputDir,
    adjustedFileName(input.ordinal, aligned.ratio),
  );
  await writeJpeg(aligned.frame, outputPath);
  return { ok: true, ratio: aligned.ratio, outputPath };
}
