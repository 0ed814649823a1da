import sharp from "sharp";
import type { RgbImage } from "../detectors/landmarks";
import type { CropRegion } from "./geometry";

export type Raster = {
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
};

const BLACK = { r: 0, g: 0, b: 0, alpha: 1 };

function open(raster: Raster): sharp.Sharp {
  return sharp(raster.data, {
    raw: {
      width: raster.width,
      height: raster.height,
      channels: raster.channels,
    },
  });
}

async function materialize(pipeline: sharp.Sharp): Promise<Raster> {
  const { data, info } = await pipeline
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });
  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}

export async function loadRaster(imagePath: string): Promise<Raster> {
  return materialize(sharp(imagePath).toColourspace("srgb"));
}

/** Crop that may reach past the image edges; the overflow comes back black. */
export async function cropWithPadding(
  raster: Raster,
  region: CropRegion,
): Promise<Raster> {
  const padLeft = Math.max(0, -region.left);
  const padTop = Math.max(0, -region.top);
  const padRight = Math.max(0, region.left + region.width - raster.width);
  const padBottom = Math.max(0, region.top + region.height - raster.height);

  let source = raster;
  if (padLeft + padTop + padRight + padBottom > 0) {
    source = await materialize(
      open(raster).extend({
        left: padLeft,
        top: padTop,
        right: padRight,
        bottom: padBottom,
        background: BLACK,
      }),
    );
  }

  return materialize(
    open(source).extract({
      left: region.left + padLeft,
      top: region.top + padTop,
      width: region.width,
      height: region.height,
    }),
  );
}

/**
 * Rotates counter-clockwise by `degrees` about the centre, keeping the
 * input canvas size. Corners that rotate in are black.
 */
export async function rotateAboutCenter(
  raster: Raster,
  degrees: number,
): Promise<Raster> {
  if (degrees === 0) {
    return raster;
  }
  // sharp turns clockwise for positive angles and grows the canvas to fit.
  const rotated = await materialize(
    open(raster).rotate(-degrees, { background: BLACK }),
  );
  const left = Math.max(0, Math.floor((rotated.width - raster.width) / 2));
  const top = Math.max(0, Math.floor((rotated.height - raster.height) / 2));
  return materialize(
    open(rotated).extract({
      left,
      top,
      width: Math.min(raster.width, rotated.width - left),
      height: Math.min(raster.height, rotated.height - top),
    }),
  );
}

/** Moves the content by (dx, dy) pixels at the same canvas size. */
export async function translate(
  raster: Raster,
  dx: number,
  dy: number,
): Promise<Raster> {
  if (dx === 0 && dy === 0) {
    return raster;
  }
  const shiftX = Math.min(Math.abs(dx), raster.width);
  const shiftY = Math.min(Math.abs(dy), raster.height);
  const extended = await materialize(
    open(raster).extend({
      left: dx > 0 ? shiftX : 0,
      right: dx < 0 ? shiftX : 0,
      top: dy > 0 ? shiftY : 0,
      bottom: dy < 0 ? shiftY : 0,
      background: BLACK,
    }),
  );
  return materialize(
    open(extended).extract({
      left: dx < 0 ? shiftX : 0,
      top: dy < 0 ? shiftY : 0,
      width: raster.width,
      height: raster.height,
    }),
  );
}

export async function resizeTo(raster: Raster, size: number): Promise<Raster> {
  return materialize(open(raster).resize(size, size, { fit: "fill" }));
}

export async function toGrayscale(raster: Raster): Promise<Raster> {
  return materialize(open(raster).greyscale().toColourspace("b-w"));
}

/** Single-channel rasters are written as single-channel JPEGs. */
export async function writeJpeg(raster: Raster, outputPath: string): Promise<void> {
  const pipeline = open(raster);
  if (raster.channels === 1) {
    pipeline.toColourspace("b-w");
  }
  await pipeline.jpeg({ quality: 90 }).toFile(outputPath);
}

export function toRgbImage(raster: Raster): RgbImage {
  if (raster.channels !== 3) {
    throw new Error(`Expected an RGB raster, got ${raster.channels} channels`);
  }
  return { data: raster.data, width: raster.width, height: raster.height };
}
