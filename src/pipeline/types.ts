import type { GenerationError } from './errors.js';

/** Interleaved 8-bit RGBA pixels, row-major. */
export interface RasterImage {
  width: number;
  height: number;
  data: Buffer;
}

/** Background-neutral, colour-enhanced, size-bounded image fed to the shape stage. */
export type CanonicalImage = RasterImage;

export interface Mesh {
  /** xyz triples */
  positions: Float32Array;
  /** Triangle list indices into `positions`. */
  indices: Uint32Array;
  normals?: Float32Array;
  uvs?: Float32Array;
}

export interface MeshMaterial {
  /** Encoded base colour map. */
  baseColorTexture: Buffer;
  /** Image type of `baseColorTexture`, e.g. `image/png` or `image/jpeg`. */
  mimeType: string;
}

export interface TexturedMesh {
  mesh: Mesh;
  material: MeshMaterial;
}

export type ShapeOnlyReason = 'no-texture-service' | 'texture-failed';

export type SurfaceResult =
  | { kind: 'textured'; mesh: Mesh; material: MeshMaterial }
  | { kind: 'shape-only'; mesh: Mesh; reason: ShapeOnlyReason; detail?: string };

export type GenerationKind = 'image-to-3d' | 'text-to-3d';

export type GenerationRequest =
  | { kind: 'image'; image: string | Buffer }
  | { kind: 'prompt'; prompt: string; seed?: number };

export interface ProgressEvent {
  message: string;
  percent: number;
}

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: GenerationError };

export const succeed = <T>(value: T): StageResult<T> => ({ ok: true, value });
export const fail = <T = never>(error: GenerationError): StageResult<T> => ({ ok: false, error });

export interface GenerationSuccess {
  ok: true;
  filename: string;
  /** Base64 of the GLB file. */
  fileData: string;
  /** Byte length of the GLB file (decoded `fileData`). */
  fileSize: number;
  elapsedSeconds: number;
  generationKind: GenerationKind;
  textured: boolean;
  progress: readonly ProgressEvent[];
}

export interface GenerationFailure {
  ok: false;
  error: GenerationError;
}

export type GenerationResult = GenerationSuccess | GenerationFailure;

export type PipelineState =
  | 'start'
  | 'input-resolved'
  | 'shape-generated'
  | 'texture-resolved'
  | 'exported'
  | 'encoded'
  | 'done'
  | 'failed';
