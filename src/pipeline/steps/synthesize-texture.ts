import { logger } from '../../logger.js';
import type { TextureGenerator } from '../../services/types.js';
import { describeError } from '../errors.js';
import type { CanonicalImage, Mesh, SurfaceResult } from '../types.js';

/**
 * Texture the mesh when a texture service is available.
 *
 * This stage never fails: a missing service or any error from it yields the untextured
 * mesh as a `shape-only` surface, and the reason is logged rather than reported.
 */
export async function synthesizeTexture(
  mesh: Mesh,
  image: CanonicalImage,
  textureGenerator: TextureGenerator | undefined,
): Promise<SurfaceResult> {
  if (!textureGenerator) {
    logger.info('No texture service configured, returning shape-only model');
    return { kind: 'shape-only', mesh, reason: 'no-texture-service' };
  }

  const startTime = Date.now();
  try {
    const textured = await textureGenerator.generateTexture(mesh, image);
    logger.info({ elapsed: Date.now() - startTime }, 'Texture generated');
    return { kind: 'textured', mesh: textured.mesh, material: textured.material };
  } catch (err) {
    const detail = describeError(err);
    logger.warn({ err, elapsed: Date.now() - startTime }, 'Texture generation failed, returning shape-only model');
    return { kind: 'shape-only', mesh, reason: 'texture-failed', detail };
  }
}
