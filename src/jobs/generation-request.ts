import { z } from 'zod';
import type { ErrorCode } from '../pipeline/errors.js';
import type { GenerationKind, ProgressEvent } from '../pipeline/types.js';

export const NO_INPUT_MESSAGE = 'No input data provided';
export const MISSING_FIELD_MESSAGE = "Either 'image' or 'prompt' must be provided";
export const BOTH_FIELDS_MESSAGE = "Provide either 'image' or 'prompt', not both";

/** Image-to-3D input: the picture as base64 text (a data URL prefix is accepted). */
export const imageInputSchema = z.object({
  image: z
    .string({ invalid_type_error: 'image must be a base64 string' })
    .min(1, 'image must be a non-empty base64 string'),
});

/** Text-to-3D input. `seed` only affects the text-to-image render. */
export const promptInputSchema = z.object({
  prompt: z
    .string({ invalid_type_error: 'prompt must be a string' })
    .trim()
    .min(1, 'prompt must be a non-empty string'),
  seed: z
    .number({ invalid_type_error: 'seed must be a number' })
    .int('seed must be an integer')
    .nonnegative('seed must not be negative')
    .optional(),
});

/** Wire shape of a successful generation. */
export interface GenerationSuccessEnvelope {
  success: true;
  filename: string;
  file_data: string;
  file_size: number;
  generation_time: number;
  generation_type: GenerationKind;
  textured: boolean;
  progress: ProgressEvent[];
}

/** Wire shape of a failed generation; there is never a progress trace. */
export interface GenerationFailureEnvelope {
  error: string;
  code: ErrorCode;
}

export type GenerationResponse = GenerationSuccessEnvelope | GenerationFailureEnvelope;

export const isFailureEnvelope = (response: GenerationResponse): response is GenerationFailureEnvelope =>
  'error' in response;
