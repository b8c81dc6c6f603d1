import type { ZodError } from 'zod';
import {
  BOTH_FIELDS_MESSAGE,
  imageInputSchema,
  MISSING_FIELD_MESSAGE,
  NO_INPUT_MESSAGE,
  promptInputSchema,
} from '../jobs/generation-request.js';
import type { GenerationResponse } from '../jobs/generation-request.js';
import { logger } from '../logger.js';
import { describeError, InputValidationError } from './errors.js';
import type { GenerationError } from './errors.js';
import { fail, succeed } from './types.js';
import type { GenerationRequest, GenerationResult, StageResult } from './types.js';

export interface GenerationRunner {
  run(request: GenerationRequest): Promise<GenerationResult>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const hasField = (input: Record<string, unknown>, field: string) =>
  input[field] !== undefined && input[field] !== null;

const invalid = (error: ZodError) =>
  new InputValidationError(`Invalid input: ${error.issues.map((issue) => issue.message).join('; ')}`);

/**
 * Turn a raw `{ input: {...} }` envelope into a typed request.
 * Exactly one of `image` or `prompt` must be present; both is rejected, never resolved by precedence.
 */
export function parseGenerationRequest(event: unknown): StageResult<GenerationRequest> {
  const input = isRecord(event) ? event.input : undefined;
  if (!isRecord(input) || Object.keys(input).length === 0) {
    return fail(new InputValidationError(NO_INPUT_MESSAGE));
  }

  const hasImage = hasField(input, 'image');
  const hasPrompt = hasField(input, 'prompt');

  if (hasImage && hasPrompt) {
    return fail(new InputValidationError(BOTH_FIELDS_MESSAGE));
  }

  if (hasImage) {
    const parsed = imageInputSchema.safeParse(input);
    return parsed.success
      ? succeed<GenerationRequest>({ kind: 'image', image: parsed.data.image })
      : fail(invalid(parsed.error));
  }

  if (hasPrompt) {
    const parsed = promptInputSchema.safeParse(input);
    return parsed.success
      ? succeed<GenerationRequest>({ kind: 'prompt', prompt: parsed.data.prompt, seed: parsed.data.seed })
      : fail(invalid(parsed.error));
  }

  return fail(new InputValidationError(MISSING_FIELD_MESSAGE));
}

const failureEnvelope = (error: GenerationError): GenerationResponse => ({
  error: error.message,
  code: error.code,
});

/**
 * Validate the envelope, run the pipeline and shape the wire response.
 * The progress trace is attached on success only.
 */
export async function handleGenerationRequest(
  event: unknown,
  runner: GenerationRunner,
): Promise<GenerationResponse> {
  try {
    const request = parseGenerationRequest(event);
    if (!request.ok) {
      logger.warn({ reason: request.error.message }, 'Rejected generation request');
      return failureEnvelope(request.error);
    }

    const result = await runner.run(request.value);
    if (!result.ok) {
      return failureEnvelope(result.error);
    }

    return {
      success: true,
      filename: result.filename,
      file_data: result.fileData,
      file_size: result.fileSize,
      generation_time: result.elapsedSeconds,
      generation_type: result.generationKind,
      textured: result.textured,
      progress: [...result.progress],
    };
  } catch (err) {
    logger.error({ err }, 'Unhandled error in generation handler');
    return { error: `Handler error: ${describeError(err)}`, code: 'INTERNAL' };
  }
}
