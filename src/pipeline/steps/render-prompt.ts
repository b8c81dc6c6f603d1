import { resizeToBound } from '../../image/raster.js';
import type { TextToImageGenerator } from '../../services/types.js';
import { describeError, PromptRenderError } from '../errors.js';
import { fail, succeed } from '../types.js';
import type { CanonicalImage, StageResult } from '../types.js';

export const TEXT_TO_3D_UNAVAILABLE =
  'Text-to-3D is not available: no text-to-image service is configured';

/**
 * Render a prompt to the canonical image used by the shape stage.
 * The rendered image is only size-bounded; it does not go through background removal
 * or colour enhancement.
 */
export async function renderPrompt(
  prompt: string,
  seed: number,
  textToImage: TextToImageGenerator | undefined,
  options: { maxDimension: number },
): Promise<StageResult<CanonicalImage>> {
  if (!textToImage) {
    return fail(new PromptRenderError(TEXT_TO_3D_UNAVAILABLE));
  }

  try {
    const image = await textToImage.renderPrompt(prompt, seed);
    return succeed(await resizeToBound(image, options.maxDimension));
  } catch (err) {
    return fail(new PromptRenderError(`Text-to-image error: ${describeError(err)}`, { cause: err }));
  }
}
