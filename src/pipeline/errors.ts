export type ErrorCode =
  | 'INPUT_VALIDATION'
  | 'IMAGE_DECODE'
  | 'IMAGE_PROCESSING'
  | 'PROMPT_RENDER'
  | 'SHAPE_GENERATION'
  | 'EXPORT'
  | 'SIZE_LIMIT'
  | 'BUSY'
  | 'INTERNAL';

/**
 * Base class for every failure the pipeline reports to callers.
 * One message per failure; `code` lets callers branch without parsing it.
 */
export abstract class GenerationError extends Error {
  public abstract readonly code: ErrorCode;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputValidationError extends GenerationError {
  public readonly code = 'INPUT_VALIDATION' as const;
}

export class ImageDecodeError extends GenerationError {
  public readonly code = 'IMAGE_DECODE' as const;
}

export class ImageProcessingError extends GenerationError {
  public readonly code = 'IMAGE_PROCESSING' as const;
}

export class PromptRenderError extends GenerationError {
  public readonly code = 'PROMPT_RENDER' as const;
}

export class ShapeGenerationError extends GenerationError {
  public readonly code = 'SHAPE_GENERATION' as const;
}

export class ExportError extends GenerationError {
  public readonly code = 'EXPORT' as const;
}

export class SizeLimitError extends GenerationError {
  public readonly code = 'SIZE_LIMIT' as const;

  public constructor(
    public readonly fileSize: number,
    public readonly maxFileSize: number,
  ) {
    super(`File too large: ${formatMegabytes(fileSize)}MB (max: ${formatMegabytes(maxFileSize)}MB)`);
  }
}

export class InternalError extends GenerationError {
  public readonly code = 'INTERNAL' as const;
}

const formatMegabytes = (bytes: number) => (bytes / (1024 * 1024)).toFixed(1);

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
