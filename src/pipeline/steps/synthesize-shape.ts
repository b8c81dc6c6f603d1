import type { ShapeSettings } from '../../config.js';
import { logger } from '../../logger.js';
import { triangleCount } from '../../mesh/glb.js';
import type { ShapeGenerator } from '../../services/types.js';
import { describeError, ShapeGenerationError } from '../errors.js';
import { fail, succeed } from '../types.js';
import type { CanonicalImage, Mesh, StageResult } from '../types.js';

/**
 * Run the shape service with the deployment's fixed settings.
 * The same image, settings and seed always request the same mesh.
 */
export async function synthesizeShape(
  image: CanonicalImage,
  shapeGenerator: ShapeGenerator,
  settings: ShapeSettings,
): Promise<StageResult<Mesh>> {
  const startTime = Date.now();
  let mesh: Mesh;
  try {
    mesh = await shapeGenerator.generateShape({
      image,
      steps: settings.steps,
      octreeResolution: settings.octreeResolution,
      numChunks: settings.numChunks,
      seed: settings.seed,
    });
  } catch (err) {
    return fail(new ShapeGenerationError(`Shape generation error: ${describeError(err)}`, { cause: err }));
  }

  if (triangleCount(mesh) === 0) {
    return fail(new ShapeGenerationError('Shape generation error: the generated mesh has no faces'));
  }

  logger.info(
    { elapsed: Date.now() - startTime, vertices: mesh.positions.length / 3, faces: triangleCount(mesh) },
    '3D shape generated',
  );

  if (settings.releaseAfterShape && shapeGenerator.release) {
    try {
      await shapeGenerator.release();
    } catch (err) {
      logger.warn({ err }, 'Failed to release shape service resources');
    }
  }

  return succeed(mesh);
}
