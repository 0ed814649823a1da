export type Point = {
  x: number;
  y: number;
};

/**
 * The four landmark groups the alignment stages look at. Groups follow the
 * person's own left/right: `leftEyebrow` sits on the viewer's right.
 */
export type FaceLandmarks = {
  topLip: Point[];
  bottomLip: Point[];
  leftEyebrow: Point[];
  rightEyebrow: Point[];
};

export type RgbImage = {
  data: Uint8Array;
  width: number;
  height: number;
};

export interface LandmarkDetector {
  detect(image: RgbImage): Promise<FaceLandmarks | null>;
}

/**
 * Splits the 68-point iBUG layout into lip and eyebrow groups. Each lip is
 * twelve points: the outer contour of its half plus the inner contour,
 * sharing the mouth corners (48 and 54, 60 and 64).
 */
export function groupLandmarks68(points: Point[]): FaceLandmarks {
  if (points.length !== 68) {
    throw new Error(`Expected 68 landmarks, got ${points.length}`);
  }
  const at = (indices: number[]): Point[] =>
    indices.map((i) => ({ x: points[i].x, y: points[i].y }));

  return {
    rightEyebrow: at([17, 18, 19, 20, 21]),
    leftEyebrow: at([22, 23, 24, 25, 26]),
    topLip: at([48, 49, 50, 51, 52, 53, 54, 64, 63, 62, 61, 60]),
    bottomLip: at([54, 55, 56, 57, 58, 59, 48, 60, 67, 66, 65, 64]),
  };
}
