import {
  decodeImage,
  enhanceColors as applyColorEnhancement,
  flattenOntoWhite,
  hasTransparency,
  resizeToBound,
} from '../../image/raster.js';
import { logger } from '../../logger.js';
import type { BackgroundRemover } from '../../services/types.js';
import { describeError, ImageDecodeError, ImageProcessingError } from '../errors.js';
import { fail, succeed } from '../types.js';
import type { CanonicalImage, RasterImage, StageResult } from '../types.js';

export interface NormalizeImageOptions {
  maxDimension: number;
  enhanceColors: boolean;
}

const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;

export const imageBytesFromInput = (input: string | Buffer): Buffer =>
  typeof input === 'string' ? Buffer.from(input.replace(DATA_URL_PREFIX, ''), 'base64') : input;

/**
 * Decode an uploaded image and turn it into the canonical form the shape stage expects:
 * bounded in size, flattened onto white, background removed, optionally colour-enhanced.
 */
export async function normalizeImage(
  input: string | Buffer,
  backgroundRemover: BackgroundRemover,
  options: NormalizeImageOptions,
): Promise<StageResult<CanonicalImage>> {
  let image: RasterImage;
  try {
    image = await decodeImage(imageBytesFromInput(input));
  } catch (err) {
    return fail(new ImageDecodeError(`Image processing error: ${describeError(err)}`, { cause: err }));
  }

  try {
    const original = { width: image.width, height: image.height };
    image = await resizeToBound(image, options.maxDimension);

    // The background remover always receives an opaque image.
    if (hasTransparency(image)) {
      image = await flattenOntoWhite(image);
    }

    image = await backgroundRemover.removeBackground(image);

    if (options.enhanceColors) {
      image = await applyColorEnhancement(image);
    }

    logger.debug(
      { original, canonical: { width: image.width, height: image.height }, enhanced: options.enhanceColors },
      'Input image normalized',
    );
    return succeed(image);
  } catch (err) {
    return fail(new ImageProcessingError(`Image processing error: ${describeError(err)}`, { cause: err }));
  }
}
