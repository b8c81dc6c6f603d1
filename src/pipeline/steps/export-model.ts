import { rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { logger } from '../../logger.js';
import { encodeGlb } from '../../mesh/glb.js';
import { describeError, ExportError, SizeLimitError } from '../errors.js';
import { fail, succeed } from '../types.js';
import type { StageResult, SurfaceResult } from '../types.js';

export interface ExportModelOptions {
  /** Request-scoped temporary directory; the caller removes it. */
  outputDir: string;
  maxFileBytes: number;
}

export interface ExportedModel {
  filePath: string;
  fileSize: number;
}

/**
 * Write the surface as a GLB file and enforce the size ceiling.
 * An oversized file is deleted before the failure is returned.
 */
export async function exportModel(
  surface: SurfaceResult,
  filename: string,
  options: ExportModelOptions,
): Promise<StageResult<ExportedModel>> {
  const filePath = join(options.outputDir, filename);

  let fileSize: number;
  try {
    const glb = await encodeGlb(
      surface.kind === 'textured' ? { mesh: surface.mesh, material: surface.material } : { mesh: surface.mesh },
    );
    await writeFile(filePath, glb);
    fileSize = (await stat(filePath)).size;
  } catch (err) {
    await rm(filePath, { force: true });
    return fail(new ExportError(`Save error: ${describeError(err)}`, { cause: err }));
  }

  if (fileSize > options.maxFileBytes) {
    await rm(filePath, { force: true });
    logger.warn({ filename, fileSize, maxFileBytes: options.maxFileBytes }, 'Exported model exceeds size limit');
    return fail(new SizeLimitError(fileSize, options.maxFileBytes));
  }

  logger.info({ filename, fileSize, textured: surface.kind === 'textured' }, 'Model saved');
  return succeed({ filePath, fileSize });
}
