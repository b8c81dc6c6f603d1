import { readFile, rm } from 'fs/promises';
import type { GeneratorConfig } from '../config.js';
import { cleanupTempDir, createTempDir } from '../infra/temp.js';
import { logger } from '../logger.js';
import type { GenerationServices } from '../services/types.js';
import { describeError, InternalError } from './errors.js';
import type { GenerationError } from './errors.js';
import { ProgressLog } from './progress.js';
import { exportModel } from './steps/export-model.js';
import { normalizeImage } from './steps/normalize-image.js';
import { renderPrompt } from './steps/render-prompt.js';
import { synthesizeShape } from './steps/synthesize-shape.js';
import { synthesizeTexture } from './steps/synthesize-texture.js';
import type {
  CanonicalImage,
  GenerationFailure,
  GenerationKind,
  GenerationRequest,
  GenerationResult,
  PipelineState,
  ShapeOnlyReason,
  StageResult,
} from './types.js';

export type OrchestratorSettings = Pick<
  GeneratorConfig,
  'tmpDir' | 'maxFileBytes' | 'maxImageDimension' | 'enhanceColors' | 'promptDefaultSeed' | 'shape'
>;

export interface OrchestratorOptions {
  services: GenerationServices;
  settings: OrchestratorSettings;
  /** Clock used for output filenames. */
  now?: () => Date;
}

const pad = (value: number) => value.toString().padStart(2, '0');

/** `model_<kind>_<YYYYMMDD_HHMMSS>.glb`, local time. */
export const buildModelFilename = (kind: GenerationKind, date: Date): string => {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `model_${kind}_${day}_${time}.glb`;
};

const SHAPE_ONLY_MESSAGES: Record<ShapeOnlyReason, string> = {
  'no-texture-service': 'Using shape-only model (no texture pipeline)',
  'texture-failed': 'Using shape-only model (texture unavailable)',
};

/**
 * Runs one generation request through every stage, in order, and never throws.
 *
 * Start → InputResolved → ShapeGenerated → TextureResolved → Exported → Encoded → Done.
 * The first stage failure moves the run to Failed and nothing after it executes.
 * Texturing cannot fail the run.
 */
export class GenerationOrchestrator {
  private readonly services: GenerationServices;
  private readonly settings: OrchestratorSettings;
  private readonly now: () => Date;

  public constructor(options: OrchestratorOptions) {
    this.services = options.services;
    this.settings = options.settings;
    this.now = options.now ?? (() => new Date());
  }

  public get capabilities() {
    return {
      textTo3d: Boolean(this.services.textToImage),
      texture: Boolean(this.services.textureGenerator),
    };
  }

  public async run(request: GenerationRequest): Promise<GenerationResult> {
    const startTime = Date.now();
    const generationKind: GenerationKind = request.kind === 'prompt' ? 'text-to-3d' : 'image-to-3d';
    const progress = new ProgressLog();
    let state: PipelineState = 'start';
    let tempDir: string | undefined;

    const transition = (next: PipelineState) => {
      logger.debug({ from: state, to: next, generationKind }, 'Pipeline transition');
      state = next;
    };

    const failed = (error: GenerationError): GenerationFailure => {
      logger.error(
        { state, generationKind, code: error.code, err: error, elapsed: Date.now() - startTime },
        'Generation failed',
      );
      transition('failed');
      return { ok: false, error };
    };

    logger.info({ generationKind }, 'Generation started');

    try {
      const image = await this.resolveInput(request, progress);
      if (!image.ok) return failed(image.error);
      transition('input-resolved');

      progress.record('Generating 3D shape...', 10);
      const mesh = await synthesizeShape(image.value, this.services.shapeGenerator, this.settings.shape);
      if (!mesh.ok) return failed(mesh.error);
      progress.record('3D shape generated', 50);
      transition('shape-generated');

      progress.record('Generating texture...', 60);
      const surface = await synthesizeTexture(mesh.value, image.value, this.services.textureGenerator);
      progress.record(
        surface.kind === 'textured' ? 'Texture generated' : SHAPE_ONLY_MESSAGES[surface.reason],
        90,
      );
      transition('texture-resolved');

      tempDir = await createTempDir(this.settings.tmpDir, 'request');
      const filename = buildModelFilename(generationKind, this.now());
      const exported = await exportModel(surface, filename, {
        outputDir: tempDir,
        maxFileBytes: this.settings.maxFileBytes,
      });
      if (!exported.ok) return failed(exported.error);
      progress.record('Model saved', 100);
      transition('exported');

      const { filePath, fileSize } = exported.value;
      const bytes = await readFile(filePath);
      const fileData = bytes.toString('base64');
      await rm(filePath, { force: true });
      transition('encoded');

      const elapsedSeconds = (Date.now() - startTime) / 1000;
      transition('done');
      logger.info(
        { generationKind, filename, fileSize, elapsedSeconds, textured: surface.kind === 'textured' },
        'Generation completed',
      );

      return {
        ok: true,
        filename,
        fileData,
        fileSize,
        elapsedSeconds,
        generationKind,
        textured: surface.kind === 'textured',
        progress: progress.entries(),
      };
    } catch (err) {
      return failed(new InternalError(`Generation failed: ${describeError(err)}`, { cause: err }));
    } finally {
      if (tempDir) {
        await cleanupTempDir(tempDir).catch((err: unknown) => {
          logger.warn({ err, tempDir }, 'Failed to remove request temp directory');
        });
      }
    }
  }

  /** Both input sources converge here on a single canonical image. */
  private async resolveInput(
    request: GenerationRequest,
    progress: ProgressLog,
  ): Promise<StageResult<CanonicalImage>> {
    const { maxImageDimension, enhanceColors, promptDefaultSeed } = this.settings;

    if (request.kind === 'prompt') {
      progress.record(`Generating image from prompt: '${request.prompt}'`, 5);
      return renderPrompt(
        request.prompt,
        request.seed ?? promptDefaultSeed,
        this.services.textToImage,
        { maxDimension: maxImageDimension },
      );
    }

    progress.record('Processing input image', 5);
    return normalizeImage(request.image, this.services.backgroundRemover, {
      maxDimension: maxImageDimension,
      enhanceColors,
    });
  }
}
