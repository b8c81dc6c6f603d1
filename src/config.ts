import { tmpdir } from 'os';
import { join } from 'path';
import { config as loadEnv } from 'dotenv';

loadEnv();

export type GeneratorProfile = 'standard' | 'memory-optimized';

export interface ShapeSettings {
  steps: number;
  octreeResolution: number;
  numChunks: number;
  seed: number;
  /** Ask the shape service to free transient compute right after each synthesis. */
  releaseAfterShape: boolean;
}

export interface ServiceEndpoints {
  backgroundRemovalUrl: string;
  shapeServiceUrl: string;
  textureServiceUrl?: string;
  textToImageUrl?: string;
  sharedSecret?: string;
  /** 0 disables the per-call timeout. */
  timeoutMs: number;
}

export interface GeneratorConfig {
  port: number;
  profile: GeneratorProfile;
  sharedSecret?: string;
  maxRequestBytes: number;
  /** Requests allowed to wait while a generation runs; more are answered 503. */
  maxQueuedRequests: number;
  tmpDir: string;
  maxFileBytes: number;
  maxImageDimension: number; // Max dimension of longest side (preserves aspect ratio)
  enhanceColors: boolean;
  promptDefaultSeed: number;
  shape: ShapeSettings;
  services: ServiceEndpoints;
}

const PROFILE_DEFAULTS: Record<GeneratorProfile, Omit<ShapeSettings, 'seed' | 'releaseAfterShape'>> = {
  standard: { steps: 50, octreeResolution: 380, numChunks: 20000 },
  'memory-optimized': { steps: 100, octreeResolution: 512, numChunks: 30000 },
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true' || value === '1';
};

const parseInteger = (name: string, value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
};

const trimTrailingSlash = (url: string) => url.replace(/\/$/, '');

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): GeneratorConfig => {
  const {
    PORT,
    GENERATOR_PROFILE,
    GENERATOR_SHARED_SECRET,
    MAX_REQUEST_BYTES,
    MAX_QUEUED_REQUESTS,
    GENERATOR_TMP_DIR,
    MAX_FILE_BYTES,
    MAX_IMAGE_DIMENSION,
    ENHANCE_COLORS,
    PROMPT_DEFAULT_SEED,
    SHAPE_INFERENCE_STEPS,
    SHAPE_OCTREE_RESOLUTION,
    SHAPE_NUM_CHUNKS,
    SHAPE_SEED,
    SHAPE_RELEASE_RESOURCES,
    BACKGROUND_REMOVAL_URL,
    SHAPE_SERVICE_URL,
    TEXTURE_SERVICE_URL,
    TEXT_TO_IMAGE_URL,
    INFERENCE_SHARED_SECRET,
    INFERENCE_TIMEOUT_MS,
  } = env;

  const profile: GeneratorProfile =
    GENERATOR_PROFILE === 'memory-optimized' ? 'memory-optimized' : 'standard';
  const defaults = PROFILE_DEFAULTS[profile];

  return {
    port: parseInteger('PORT', PORT, 4100),
    profile,
    sharedSecret: GENERATOR_SHARED_SECRET || undefined,
    maxRequestBytes: parseInteger('MAX_REQUEST_BYTES', MAX_REQUEST_BYTES, 64 * 1024 * 1024), // 64MB
    maxQueuedRequests: parseInteger('MAX_QUEUED_REQUESTS', MAX_QUEUED_REQUESTS, 1),
    tmpDir: GENERATOR_TMP_DIR ?? join(tmpdir(), 'mesh-forge'),
    maxFileBytes: parseInteger('MAX_FILE_BYTES', MAX_FILE_BYTES, 50 * 1024 * 1024), // 50MB
    maxImageDimension: parseInteger('MAX_IMAGE_DIMENSION', MAX_IMAGE_DIMENSION, 2048),
    enhanceColors: parseBoolean(ENHANCE_COLORS, true),
    promptDefaultSeed: parseInteger('PROMPT_DEFAULT_SEED', PROMPT_DEFAULT_SEED, 12345),
    shape: {
      steps: parseInteger('SHAPE_INFERENCE_STEPS', SHAPE_INFERENCE_STEPS, defaults.steps),
      octreeResolution: parseInteger('SHAPE_OCTREE_RESOLUTION', SHAPE_OCTREE_RESOLUTION, defaults.octreeResolution),
      numChunks: parseInteger('SHAPE_NUM_CHUNKS', SHAPE_NUM_CHUNKS, defaults.numChunks),
      seed: parseInteger('SHAPE_SEED', SHAPE_SEED, 12345),
      releaseAfterShape: parseBoolean(SHAPE_RELEASE_RESOURCES, profile === 'memory-optimized'),
    },
    services: {
      backgroundRemovalUrl: trimTrailingSlash(BACKGROUND_REMOVAL_URL ?? 'http://localhost:8001'),
      shapeServiceUrl: trimTrailingSlash(SHAPE_SERVICE_URL ?? 'http://localhost:8002'),
      textureServiceUrl: TEXTURE_SERVICE_URL ? trimTrailingSlash(TEXTURE_SERVICE_URL) : undefined,
      textToImageUrl: TEXT_TO_IMAGE_URL ? trimTrailingSlash(TEXT_TO_IMAGE_URL) : undefined,
      sharedSecret: INFERENCE_SHARED_SECRET || undefined,
      timeoutMs: parseInteger('INFERENCE_TIMEOUT_MS', INFERENCE_TIMEOUT_MS, 0),
    },
  };
};
