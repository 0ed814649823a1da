import { describe, expect, it } from "vitest";
import type { FaceLandmarks } from "../../../services/detectors/landmarks";
import {
  clampRatio,
  levelAngle,
  mouthOpenRatio,
  mouthShift,
  squareCropRegion,
} from "../../../services/alignment/geometry";

function lips(
  topLip: FaceLandmarks["topLip"],
  bottomLip: FaceLandmarks["bottomLip"],
): FaceLandmarks {
  return {
    topLip,
    bottomLip,
    leftEyebrow: [{ x: 150, y: 60 }],
    rightEyebrow: [{ x: 50, y: 60 }],
  };
}

function brows(
  leftEyebrow: FaceLandmarks["leftEyebrow"],
  rightEyebrow: FaceLandmarks["rightEyebrow"],
): FaceLandmarks {
  return { topLip: [], bottomLip: [], leftEyebrow, rightEyebrow };
}

describe("squareCropRegion", () => {
  it("grows the height of a wide box evenly", () => {
    expect(squareCropRegion({ left: 10, top: 20, bottom: 180, right: 230 })).toEqual({
      left: 10,
      top: -10,
      width: 220,
      height: 220,
    });
  });

  it("puts the odd pixel after the box when widening a tall box", () => {
    expect(squareCropRegion({ left: 0, top: 100, bottom: 303, right: 200 })).toEqual({
      left: -1,
      top: 100,
      width: 203,
      height: 203,
    });
  });

  it("leaves a square box as it is", () => {
    expect(squareCropRegion({ left: 5, top: 5, bottom: 205, right: 205 })).toEqual({
      left: 5,
      top: 5,
      width: 200,
      height: 200,
    });
  });

  it("rejects faces under 150px on either side", () => {
    expect(squareCropRegion({ left: 0, top: 0, bottom: 300, right: 149 })).toBeNull();
    expect(squareCropRegion({ left: 0, top: 0, bottom: 149, right: 300 })).toBeNull();
    expect(squareCropRegion({ left: 0, top: 0, bottom: 150, right: 150 })).not.toBeNull();
  });
});

describe("mouthOpenRatio", () => {
  it("measures opening over width, whatever order the points come in", () => {
    const landmarks = lips(
      [
        { x: 20, y: 10 },
        { x: 0, y: 10 },
        { x: 10, y: 8 },
      ],
      [
        { x: 0, y: 10 },
        { x: 10, y: 14 },
        { x: 20, y: 10 },
      ],
    );
    expect(mouthOpenRatio(landmarks)).toBe(30);
  });

  it("rounds to the nearest integer", () => {
    const landmarks = lips(
      [
        { x: 0, y: 0 },
        { x: 4, y: 0 },
        { x: 8, y: 0 },
      ],
      [
        { x: 0, y: 0 },
        { x: 4, y: 3 },
        { x: 8, y: 0 },
      ],
    );
    expect(mouthOpenRatio(landmarks)).toBe(38);
  });

  it("clamps into 1..100", () => {
    const wide = lips(
      [
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 2, y: 0 },
      ],
      [
        { x: 0, y: 0 },
        { x: 1, y: 10 },
        { x: 2, y: 0 },
      ],
    );
    const shut = lips(
      [
        { x: 0, y: 0 },
        { x: 5, y: 0 },
        { x: 10, y: 0 },
      ],
      [
        { x: 0, y: 0 },
        { x: 5, y: 0 },
        { x: 10, y: 0 },
      ],
    );
    expect(mouthOpenRatio(wide)).toBe(100);
    expect(mouthOpenRatio(shut)).toBe(1);
  });

  it("does not divide by a zero lip width", () => {
    const vertical = lips(
      [
        { x: 5, y: 0 },
        { x: 5, y: 0 },
        { x: 5, y: 0 },
      ],
      [
        { x: 5, y: 0 },
        { x: 5, y: 4 },
        { x: 5, y: 0 },
      ],
    );
    expect(mouthOpenRatio(vertical)).toBe(100);
  });

  it("throws on empty lips", () => {
    expect(() => mouthOpenRatio(lips([], []))).toThrow("Lip landmarks are empty");
  });
});

describe("clampRatio", () => {
  it("rounds then clamps", () => {
    expect(clampRatio(0.2)).toBe(1);
    expect(clampRatio(42.5)).toBe(43);
    expect(clampRatio(250)).toBe(100);
  });
});

describe("levelAngle", () => {
  it("is zero for level eyebrows", () => {
    const landmarks = brows(
      [
        { x: 120, y: 60 },
        { x: 150, y: 60 },
      ],
      [
        { x: 50, y: 60 },
        { x: 80, y: 60 },
      ],
    );
    expect(levelAngle(landmarks)).toBe(0);
  });

  it("uses the outermost point of each eyebrow", () => {
    const landmarks = brows(
      [
        { x: 60, y: 90 },
        { x: 80, y: 80 },
      ],
      [
        { x: 40, y: 25 },
        { x: 20, y: 20 },
      ],
    );
    expect(levelAngle(landmarks)).toBeCloseTo(45, 6);
  });

  it("is zero when the outer points coincide", () => {
    const landmarks = brows([{ x: 10, y: 10 }], [{ x: 10, y: 10 }]);
    expect(levelAngle(landmarks)).toBe(0);
  });
});

describe("mouthShift", () => {
  it("moves the mouth centre to two thirds of the height", () => {
    const landmarks = lips(
      [
        { x: 100, y: 150 },
        { x: 150, y: 140 },
        { x: 200, y: 150 },
      ],
      [
        { x: 100, y: 150 },
        { x: 150, y: 170 },
        { x: 200, y: 150 },
      ],
    );
    expect(mouthShift(landmarks, 300, 300)).toEqual({ dx: 0, dy: 45 });
  });

  it("truncates the goal and centre", () => {
    const landmarks = lips(
      [
        { x: 10, y: 11 },
        { x: 20, y: 10 },
      ],
      [
        { x: 10, y: 11 },
        { x: 21, y: 15 },
      ],
    );
    // goal (50, 66), centre (trunc(15.5), trunc(12.5)) = (15, 12)
    expect(mouthShift(landmarks, 101, 100)).toEqual({ dx: 35, dy: 54 });
  });
});
