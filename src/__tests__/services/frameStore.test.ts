import { existsSync, mkdirSync } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  adjustedFileName,
  adjustedOrdinals,
  listAlignedFrames,
  listSourceDirs,
  parseAdjustedFileName,
  prepareAdjustmentsDir,
  rawFrameOrdinal,
} from "../../services/frameStore";
import { makeTempDir, removeDir, writeText } from "../utils/tempDir";

describe("adjustedFileName", () => {
  it("zero-pads the ordinal to five digits", () => {
    expect(adjustedFileName(7, 42)).toBe("00007_42.jpg");
    expect(adjustedFileName(1, 1)).toBe("00001_1.jpg");
    expect(adjustedFileName(99999, 100)).toBe("99999_100.jpg");
    expect(adjustedFileName(123456, 9)).toBe("123456_9.jpg");
  });

  it("rejects ordinals and ratios out of range", () => {
    expect(() => adjustedFileName(0, 10)).toThrow("Invalid frame ordinal: 0");
    expect(() => adjustedFileName(3, 0)).toThrow("Invalid mouth open ratio: 0");
    expect(() => adjustedFileName(3, 101)).toThrow("Invalid mouth open ratio: 101");
    expect(() => adjustedFileName(3, 12.5)).toThrow("Invalid mouth open ratio: 12.5");
  });
});

describe("parseAdjustedFileName", () => {
  it.each([
    [1, 1],
    [42, 37],
    [1, 100],
    [99999, 100],
  ])("reads back ordinal %i with ratio %i", (ordinal, ratio) => {
    expect(parseAdjustedFileName(adjustedFileName(ordinal, ratio))).toEqual({ ordinal, ratio });
  });

  it.each(["00001_1.jpg", "00042_37.jpg", "00001_100.jpg", "99999_100.jpg"])(
    "writes %s back unchanged",
    (fileName) => {
      const parsed = parseAdjustedFileName(fileName);
      expect(parsed).not.toBeNull();
      if (parsed) {
        expect(adjustedFileName(parsed.ordinal, parsed.ratio)).toBe(fileName);
      }
    },
  );

  it("ignores anything that is not an aligned frame", () => {
    expect(parseAdjustedFileName("00042.jpg")).toBeNull();
    expect(parseAdjustedFileName("0042_10.jpg")).toBeNull();
    expect(parseAdjustedFileName("00042_0.jpg")).toBeNull();
    expect(parseAdjustedFileName("00042_101.jpg")).toBeNull();
    expect(parseAdjustedFileName("00000_10.jpg")).toBeNull();
    expect(parseAdjustedFileName("00042_10.png")).toBeNull();
  });
});

describe("rawFrameOrdinal", () => {
  it("parses numbered frames", () => {
    expect(rawFrameOrdinal("00042.jpg")).toBe(42);
    expect(rawFrameOrdinal("7.jpg")).toBe(7);
  });

  it("returns null for anything else", () => {
    expect(rawFrameOrdinal("00000.jpg")).toBeNull();
    expect(rawFrameOrdinal("frame_1.jpg")).toBeNull();
    expect(rawFrameOrdinal("00042.png")).toBeNull();
  });
});

describe("adjustments directory", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it("lists aligned frames by ordinal and skips stray files", async () => {
    const source = path.join(root, "clipA");
    for (const name of ["00010_40.jpg", "00002_5.jpg", "00003_77.jpg", "notes.txt", "00004.jpg"]) {
      writeText(path.join(source, "adjustments", name), "x");
    }

    const frames = await listAlignedFrames(source);

    expect(frames.map((f) => f.fileName)).toEqual(["00002_5.jpg", "00003_77.jpg", "00010_40.jpg"]);
    expect(frames[0]).toEqual({
      sourceId: "clipA",
      ordinal: 2,
      ratio: 5,
      fileName: "00002_5.jpg",
      path: path.join(source, "adjustments", "00002_5.jpg"),
    });
  });

  it("returns no frames when there is no adjustments directory", async () => {
    expect(await listAlignedFrames(path.join(root, "missing"))).toEqual([]);
  });

  it("collects done ordinals regardless of ratio", async () => {
    const dir = path.join(root, "adjustments");
    writeText(path.join(dir, "00003_12.jpg"), "x");
    writeText(path.join(dir, "00009_80.jpg"), "x");
    writeText(path.join(dir, "junk.jpg"), "x");

    expect([...(await adjustedOrdinals(dir))].sort((a, b) => a - b)).toEqual([3, 9]);
    expect((await adjustedOrdinals(path.join(root, "nope"))).size).toBe(0);
  });

  it("clears the adjustments directory only when asked", async () => {
    const dir = path.join(root, "adjustments");
    const kept = writeText(path.join(dir, "00001_10.jpg"), "x");

    await prepareAdjustmentsDir(dir, false);
    expect(existsSync(kept)).toBe(true);

    await prepareAdjustmentsDir(dir, true);
    expect(existsSync(kept)).toBe(false);
    expect(existsSync(dir)).toBe(true);
  });

  it("lists source directories sorted by name", async () => {
    mkdirSync(path.join(root, "b"));
    mkdirSync(path.join(root, "a"));
    writeText(path.join(root, "video.mp4"), "x");

    expect(await listSourceDirs(root)).toEqual([path.join(root, "a"), path.join(root, "b")]);
  });
});
