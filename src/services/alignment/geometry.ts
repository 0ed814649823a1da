import type { FaceLandmarks, Point } from "../detectors/landmarks";

export const MIN_FACE_SIZE = 150;
export const CANONICAL_SIZE = 300;
export const MIN_RATIO = 1;
export const MAX_RATIO = 100;

const MIN_LIP_WIDTH = 1e-6;

export type BoundingBox = {
  left: number;
  top: number;
  bottom: number;
  right: number;
};

export type CropRegion = {
  left: number;
  top: number;
  width: number;
  height: number;
};

/**
 * Square region around a face box, grown on its shorter side. Returns null
 * for faces below MIN_FACE_SIZE in either dimension.
 */
export function squareCropRegion(box: BoundingBox): CropRegion | null {
  let { left, top, bottom, right } = box;
  const width = right - left;
  const height = bottom - top;

  if (width < MIN_FACE_SIZE || height < MIN_FACE_SIZE) {
    return null;
  }

  if (width < height) {
    const diff = height - width;
    const before = Math.floor(diff / 2);
    left -= before;
    right += diff - before;
  } else if (height < width) {
    const diff = width - height;
    const before = Math.floor(diff / 2);
    top -= before;
    bottom += diff - before;
  }

  return { left, top, width: right - left, height: bottom - top };
}

export function clampRatio(value: number): number {
  return Math.min(Math.max(Math.round(value), MIN_RATIO), MAX_RATIO);
}

function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

function byX(points: Point[]): Point[] {
  return [...points].sort((a, b) => a.x - b.x);
}

export function mouthOpenRatio(landmarks: FaceLandmarks): number {
  const top = byX(landmarks.topLip);
  const bottom = byX(landmarks.bottomLip);
  if (top.length === 0 || bottom.length === 0) {
    throw new Error("Lip landmarks are empty");
  }

  const topWidth = distance(top[0], top[top.length - 1]);
  const bottomWidth = distance(bottom[0], bottom[bottom.length - 1]);
  const lipWidth = Math.max((topWidth + bottomWidth) / 2, MIN_LIP_WIDTH);

  const openHeight = distance(
    top[Math.floor(top.length / 2)],
    bottom[Math.floor(bottom.length / 2)],
  );

  return clampRatio((openHeight / lipWidth) * 100);
}

/**
 * Tilt of the eyebrow line in degrees, from the angle at the outer end of the
 * person's right eyebrow between a horizontal reference and the outer end of
 * the left eyebrow. Always in [0, 180].
 */
export function levelAngle(landmarks: FaceLandmarks): number {
  const left = byX(landmarks.leftEyebrow);
  const right = byX(landmarks.rightEyebrow);
  if (left.length === 0 || right.length === 0) {
    throw new Error("Eyebrow landmarks are empty");
  }

  const outerLeft = left[left.length - 1];
  const outerRight = right[0];

  const p1 = { x: outerLeft.x, y: outerRight.y };
  const p2 = outerRight;
  const p3 = outerLeft;

  const a = (p2.x - p1.x) ** 2 + (p2.y - p1.y) ** 2;
  const b = (p2.x - p3.x) ** 2 + (p2.y - p3.y) ** 2;
  const c = (p3.x - p1.x) ** 2 + (p3.y - p1.y) ** 2;

  if (a === 0 || b === 0) {
    return 0;
  }

  const cosine = Math.min(1, Math.max(-1, (a + b - c) / Math.sqrt(4 * a * b)));
  return (Math.acos(cosine) * 180) / Math.PI;
}

/**
 * Integer shift that moves the centre of the mouth box to the horizontal
 * middle, two thirds of the way down.
 */
export function mouthShift(
  landmarks: FaceLandmarks,
  width: number,
  height: number,
): { dx: number; dy: number } {
  const { topLip, bottomLip } = landmarks;
  const lips = [...topLip, ...bottomLip];
  if (topLip.length === 0 || bottomLip.length === 0) {
    throw new Error("Lip landmarks are empty");
  }

  const topOfLip = Math.min(...topLip.map((p) => p.y));
  const bottomOfLip = Math.max(...bottomLip.map((p) => p.y));
  const leftOfLip = Math.min(...lips.map((p) => p.x));
  const rightOfLip = Math.max(...lips.map((p) => p.x));

  const goalX = Math.trunc(width / 2);
  const goalY = Math.trunc(height * (2 / 3));
  const centerX = Math.trunc((leftOfLip + rightOfLip) / 2);
  const centerY = Math.trunc((topOfLip + bottomOfLip) / 2);

  return { dx: goalX - centerX, dy: goalY - centerY };
}
