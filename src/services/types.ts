import type { Mesh, RasterImage, TexturedMesh } from '../pipeline/types.js';

export interface BackgroundRemover {
  /** Returns an RGBA image whose background is transparent. */
  removeBackground(image: RasterImage): Promise<RasterImage>;
}

export interface ShapeGenerationParams {
  image: RasterImage;
  steps: number;
  octreeResolution: number;
  numChunks: number;
  seed: number;
}

export interface ShapeGenerator {
  generateShape(params: ShapeGenerationParams): Promise<Mesh>;
  /** Frees transient compute held by the service between requests. */
  release?(): Promise<void>;
}

export interface TextureGenerator {
  generateTexture(mesh: Mesh, image: RasterImage): Promise<TexturedMesh>;
}

export interface TextToImageGenerator {
  renderPrompt(prompt: string, seed: number): Promise<RasterImage>;
}

/**
 * Model-service handles, built once at startup and shared read-only by every run.
 * Optional members are capabilities a deployment may not have.
 */
export interface GenerationServices {
  backgroundRemover: BackgroundRemover;
  shapeGenerator: ShapeGenerator;
  textureGenerator?: TextureGenerator;
  textToImage?: TextToImageGenerator;
}
