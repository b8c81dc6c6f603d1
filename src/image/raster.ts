import sharp from 'sharp';
import type { RasterImage } from '../pipeline/types.js';

type Matrix3x3 = [[number, number, number], [number, number, number], [number, number, number]];

const WHITE = { r: 255, g: 255, b: 255 };

// Rec.601 luma weights, the same ones used for the L conversion of an RGB image.
const LUMA = [0.299, 0.587, 0.114] as const;

const fromRaw = (data: Buffer, width: number, height: number, channels: 3 | 4) =>
  sharp(data, { raw: { width, height, channels } });

const toRgba = async (pipeline: sharp.Sharp): Promise<RasterImage> => {
  const { data, info } = await pipeline
    .ensureAlpha()
    .raw({ depth: 'uchar' })
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 4) {
    throw new Error(`Expected 4 channels after conversion, got ${info.channels}`);
  }
  return { width: info.width, height: info.height, data };
};

/**
 * Decode any format sharp understands into an sRGB RGBA raster.
 */
export const decodeImage = async (input: Buffer): Promise<RasterImage> => {
  const image = sharp(input, { failOn: 'error' }).toColourspace('srgb');
  const meta = await image.metadata();
  if (!meta.width || !meta.height) {
    throw new Error('Could not read image dimensions.');
  }
  return toRgba(image);
};

export const encodePng = async (image: RasterImage): Promise<Buffer> =>
  fromRaw(image.data, image.width, image.height, 4).png().toBuffer();

/**
 * Target size when the longest edge exceeds `maxDimension`; null when no resize is needed.
 * The long edge becomes exactly `maxDimension`, the short edge is floored.
 */
export const boundedSize = (
  width: number,
  height: number,
  maxDimension: number,
): { width: number; height: number } | null => {
  const longest = Math.max(width, height);
  if (longest <= maxDimension) return null;
  const scaleShort = (short: number) => Math.max(1, Math.floor((short * maxDimension) / longest));
  return width >= height
    ? { width: maxDimension, height: scaleShort(height) }
    : { width: scaleShort(width), height: maxDimension };
};

export const resizeToBound = async (image: RasterImage, maxDimension: number): Promise<RasterImage> => {
  const target = boundedSize(image.width, image.height, maxDimension);
  if (!target) return image;
  return toRgba(
    fromRaw(image.data, image.width, image.height, 4).resize(target.width, target.height, {
      fit: 'fill',
      kernel: sharp.kernel.lanczos3,
    }),
  );
};

export const hasTransparency = (image: RasterImage): boolean => {
  for (let i = 3; i < image.data.length; i += 4) {
    if (image.data[i] !== 255) return true;
  }
  return false;
};

/** Composite onto an opaque white canvas of the same size, alpha as the blend mask. */
export const flattenOntoWhite = async (image: RasterImage): Promise<RasterImage> =>
  toRgba(fromRaw(image.data, image.width, image.height, 4).flatten({ background: WHITE }));

const flattenToRgb = async (image: RasterImage): Promise<Buffer> =>
  fromRaw(image.data, image.width, image.height, 4)
    .flatten({ background: WHITE })
    .raw({ depth: 'uchar' })
    .toBuffer();

const saturationMatrix = (factor: number): Matrix3x3 => {
  const row = (channel: number): [number, number, number] => [
    (1 - factor) * LUMA[0] + (channel === 0 ? factor : 0),
    (1 - factor) * LUMA[1] + (channel === 1 ? factor : 0),
    (1 - factor) * LUMA[2] + (channel === 2 ? factor : 0),
  ];
  return [row(0), row(1), row(2)];
};

export interface EnhanceFactors {
  saturation: number;
  brightness: number;
  contrast: number;
}

export const DEFAULT_ENHANCE_FACTORS: EnhanceFactors = {
  saturation: 1.2,
  brightness: 1.1,
  contrast: 1.1,
};

/**
 * Saturation, then brightness, then contrast, each applied to the previous result.
 * Runs on the RGB view (transparency flattened onto white); returns opaque RGBA.
 */
export const enhanceColors = async (
  image: RasterImage,
  factors: EnhanceFactors = DEFAULT_ENHANCE_FACTORS,
): Promise<RasterImage> => {
  const { width, height } = image;
  const rgb = await flattenToRgb(image);

  const saturated = await fromRaw(rgb, width, height, 3)
    .recomb(saturationMatrix(factors.saturation))
    .raw({ depth: 'uchar' })
    .toBuffer();

  const brightened = await fromRaw(saturated, width, height, 3)
    .linear(factors.brightness, 0)
    .raw({ depth: 'uchar' })
    .toBuffer();

  // Contrast pivots around the mean grey level of the current image.
  const stats = await fromRaw(brightened, width, height, 3).stats();
  const meanGrey = Math.round(
    LUMA.reduce((sum, weight, channel) => sum + weight * (stats.channels[channel]?.mean ?? 0), 0),
  );
  const contrasted = fromRaw(brightened, width, height, 3).linear(
    factors.contrast,
    meanGrey * (1 - factors.contrast),
  );

  return toRgba(contrasted);
};
