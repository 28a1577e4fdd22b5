import sharp from "sharp";
import type { Box, RasterImage } from "../contracts/contracts.js";

// 5x5 kernels matching the usual BLUR and SMOOTH_MORE image filters.
const BLUR_KERNEL = {
  width: 5,
  height: 5,
  scale: 16,
  kernel: [1, 1, 1, 1, 1, 1, 0, 0, 0, 1, 1, 0, 0, 0, 1, 1, 0, 0, 0, 1, 1, 1, 1, 1, 1],
};

const SMOOTH_MORE_KERNEL = {
  width: 5,
  height: 5,
  scale: 100,
  kernel: [1, 1, 1, 1, 1, 1, 5, 5, 5, 1, 1, 5, 44, 5, 1, 1, 5, 5, 5, 1, 1, 1, 1, 1, 1],
};

export const DEFAULT_THRESHOLD = 191;

export interface PixelBounds {
  xMin: number;
  yMin: number;
  /** Exclusive. */
  xMax: number;
  /** Exclusive. */
  yMax: number;
  blank: boolean;
}

export const decodeRaster = async (input: Buffer | string): Promise<RasterImage> => {
  const { data, info } = await sharp(input)
    .ensureAlpha()
    .removeAlpha()
    .grayscale()
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { data: new Uint8Array(data), width: info.width, height: info.height };
};

const convolve = async (
  image: RasterImage,
  kernel: typeof BLUR_KERNEL
): Promise<RasterImage> => {
  const { data, info } = await sharp(Buffer.from(image.data), {
    raw: { width: image.width, height: image.height, channels: 1 },
  })
    .convolve(kernel)
    .toColourspace("b-w")
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { data: new Uint8Array(data), width: info.width, height: info.height };
};

/** Runs the blur passes first, then the smoothing passes. */
export const filterRaster = async (
  image: RasterImage,
  numBlurs: number,
  numSmooths: number
): Promise<RasterImage> => {
  let current = image;
  for (let i = 0; i < numBlurs; i++) {
    current = await convolve(current, BLUR_KERNEL);
  }
  for (let i = 0; i < numSmooths; i++) {
    current = await convolve(current, SMOOTH_MORE_KERNEL);
  }
  return current;
};

/**
 * Smallest rectangle holding every ink pixel. A pixel is ink when it is darker
 * than the threshold; a negative threshold flips this for light-on-dark pages.
 * A page without ink yields the center point of the image.
 */
export const findInkBounds = (image: RasterImage, threshold: number): PixelBounds => {
  const { data, width, height } = image;
  const darkBackground = threshold < 0;
  const level = Math.abs(threshold);
  let xMin = width;
  let yMin = height;
  let xMax = -1;
  let yMax = -1;

  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      const value = data[row + x];
      const ink = darkBackground ? value >= level : value < level;
      if (!ink) continue;
      if (x < xMin) xMin = x;
      if (x > xMax) xMax = x;
      if (y < yMin) yMin = y;
      if (y > yMax) yMax = y;
    }
  }

  if (xMax < 0) {
    const cx = width / 2;
    const cy = height / 2;
    return { xMin: cx, yMin: cy, xMax: cx, yMax: cy, blank: true };
  }
  return { xMin, yMin, xMax: xMax + 1, yMax: yMax + 1, blank: false };
};

/**
 * Converts pixel bounds to page units with a bottom-left origin at zero. The
 * scale on each axis is the full-page box size over the image size.
 */
export const pixelBoundsToPageBox = (
  bounds: PixelBounds,
  imageWidth: number,
  imageHeight: number,
  fullPageBox: Box
): Box => {
  const scaleX = (fullPageBox[2] - fullPageBox[0]) / imageWidth;
  const scaleY = (fullPageBox[3] - fullPageBox[1]) / imageHeight;
  return [
    bounds.xMin * scaleX,
    (imageHeight - bounds.yMax) * scaleY,
    bounds.xMax * scaleX,
    (imageHeight - bounds.yMin) * scaleY,
  ];
};
