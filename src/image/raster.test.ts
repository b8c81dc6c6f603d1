import { describe, it, expect } from 'vitest';
import {
  boundedSize,
  decodeImage,
  encodePng,
  enhanceColors,
  flattenOntoWhite,
  hasTransparency,
  resizeToBound,
} from './raster.js';
import { createPng, createRaster, pixelAt } from '../test-utils/fakes.js';

describe('boundedSize', () => {
  it('leaves images within the bound alone', () => {
    expect(boundedSize(2048, 100, 2048)).toBeNull();
    expect(boundedSize(640, 480, 2048)).toBeNull();
  });

  it('scales the long edge to the bound and floors the short edge', () => {
    expect(boundedSize(4000, 1000, 2048)).toEqual({ width: 2048, height: 512 });
    expect(boundedSize(1000, 4000, 2048)).toEqual({ width: 512, height: 2048 });
    expect(boundedSize(3001, 3, 2048)).toEqual({ width: 2048, height: 2 });
  });

  it('never produces a zero-sized edge', () => {
    expect(boundedSize(10000, 1, 2048)).toEqual({ width: 2048, height: 1 });
  });
});

describe('decodeImage', () => {
  it('decodes a PNG into an RGBA raster', async () => {
    const image = await decodeImage(await createPng(3, 2, { r: 255, g: 0, b: 0, alpha: 1 }));

    expect(image.width).toBe(3);
    expect(image.height).toBe(2);
    expect(image.data.length).toBe(3 * 2 * 4);
    expect(pixelAt(image, 2, 1)).toEqual([255, 0, 0, 255]);
  });

  it('rejects bytes that are not an image', async () => {
    await expect(decodeImage(Buffer.from('definitely not a picture'))).rejects.toThrow();
  });

  it('round-trips through PNG encoding', async () => {
    const image = await createRaster(4, 3, { r: 12, g: 34, b: 56, alpha: 1 });
    const decoded = await decodeImage(await encodePng(image));

    expect(decoded.width).toBe(4);
    expect(decoded.height).toBe(3);
    expect(pixelAt(decoded, 0, 0)).toEqual([12, 34, 56, 255]);
  });
});

describe('resizeToBound', () => {
  it('downscales preserving aspect ratio', async () => {
    const image = await createRaster(40, 10, { r: 0, g: 0, b: 255, alpha: 1 });
    const resized = await resizeToBound(image, 16);

    expect(resized.width).toBe(16);
    expect(resized.height).toBe(4);
    expect(resized.data.length).toBe(16 * 4 * 4);
  });

  it('returns the same raster when no resize is needed', async () => {
    const image = await createRaster(8, 8, { r: 0, g: 0, b: 255, alpha: 1 });
    expect(await resizeToBound(image, 16)).toBe(image);
  });
});

describe('transparency', () => {
  it('detects any non-opaque pixel', async () => {
    expect(hasTransparency(await createRaster(2, 2, { r: 0, g: 0, b: 0, alpha: 1 }))).toBe(false);
    expect(hasTransparency(await createRaster(2, 2, { r: 0, g: 0, b: 0, alpha: 0 }))).toBe(true);
  });

  it('flattens transparent pixels onto white', async () => {
    const flattened = await flattenOntoWhite(await createRaster(2, 2, { r: 0, g: 0, b: 0, alpha: 0 }));

    expect(hasTransparency(flattened)).toBe(false);
    expect(pixelAt(flattened, 0, 0)).toEqual([255, 255, 255, 255]);
  });

  it('keeps opaque colours when flattening', async () => {
    const flattened = await flattenOntoWhite(await createRaster(2, 2, { r: 255, g: 0, b: 0, alpha: 1 }));
    expect(pixelAt(flattened, 1, 1)).toEqual([255, 0, 0, 255]);
  });
});

describe('enhanceColors', () => {
  it('keeps white white', async () => {
    const enhanced = await enhanceColors(await createRaster(3, 3, { r: 255, g: 255, b: 255, alpha: 1 }));
    expect(pixelAt(enhanced, 1, 1)).toEqual([255, 255, 255, 255]);
  });

  it('keeps black black', async () => {
    const enhanced = await enhanceColors(await createRaster(3, 3, { r: 0, g: 0, b: 0, alpha: 1 }));
    expect(pixelAt(enhanced, 0, 2)).toEqual([0, 0, 0, 255]);
  });

  it('applies saturation, brightness and contrast to mid-tones', async () => {
    const enhanced = await enhanceColors(await createRaster(3, 3, { r: 100, g: 150, b: 200, alpha: 1 }));
    expect(pixelAt(enhanced, 1, 1)).toEqual([94, 167, 239, 255]);
  });

  it('applies each factor on its own', async () => {
    const image = await createRaster(3, 3, { r: 100, g: 150, b: 200, alpha: 1 });

    const saturated = await enhanceColors(image, { saturation: 1.2, brightness: 1, contrast: 1 });
    const brightened = await enhanceColors(image, { saturation: 1, brightness: 1.1, contrast: 1 });
    const contrasted = await enhanceColors(image, { saturation: 1, brightness: 1, contrast: 1.1 });
    const unchanged = await enhanceColors(image, { saturation: 1, brightness: 1, contrast: 1 });

    expect(pixelAt(saturated, 0, 0)).toEqual([91, 151, 211, 255]);
    expect(pixelAt(brightened, 0, 0)).toEqual([110, 165, 220, 255]);
    expect(pixelAt(contrasted, 0, 0)).toEqual([95, 150, 205, 255]);
    expect(pixelAt(unchanged, 0, 0)).toEqual([100, 150, 200, 255]);
  });

  it('chains saturation, then brightness, then contrast', async () => {
    const image = await createRaster(3, 3, { r: 100, g: 150, b: 200, alpha: 1 });

    let stepwise = await enhanceColors(image, { saturation: 1.2, brightness: 1, contrast: 1 });
    stepwise = await enhanceColors(stepwise, { saturation: 1, brightness: 1.1, contrast: 1 });
    stepwise = await enhanceColors(stepwise, { saturation: 1, brightness: 1, contrast: 1.1 });

    expect(stepwise.data.equals((await enhanceColors(image)).data)).toBe(true);
  });

  it('composites transparency onto white before enhancing', async () => {
    const enhanced = await enhanceColors(await createRaster(2, 2, { r: 0, g: 0, b: 0, alpha: 0 }));

    expect(enhanced.width).toBe(2);
    expect(enhanced.height).toBe(2);
    expect(pixelAt(enhanced, 0, 0)).toEqual([255, 255, 255, 255]);
  });
});
