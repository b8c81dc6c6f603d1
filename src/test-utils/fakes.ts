import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { vi } from 'vitest';
import { decodeImage } from '../image/raster.js';
import type { OrchestratorSettings } from '../pipeline/orchestrator.js';
import type { Mesh, RasterImage, TexturedMesh } from '../pipeline/types.js';
import type {
  BackgroundRemover,
  GenerationServices,
  ShapeGenerationParams,
  ShapeGenerator,
  TextToImageGenerator,
  TextureGenerator,
} from '../services/types.js';

export interface Rgba {
  r: number;
  g: number;
  b: number;
  /** 0..1 */
  alpha: number;
}

export const createPng = (width: number, height: number, background: Rgba): Promise<Buffer> =>
  sharp({ create: { width, height, channels: 4, background } }).png().toBuffer();

export const createRaster = async (width: number, height: number, background: Rgba): Promise<RasterImage> =>
  decodeImage(await createPng(width, height, background));

export const pixelAt = (image: RasterImage, x: number, y: number): number[] => {
  const offset = (y * image.width + x) * 4;
  return Array.from(image.data.subarray(offset, offset + 4));
};

export const triangleMesh = (): Mesh => ({
  positions: Float32Array.from([0, 0, 0, 1, 0, 0, 0, 1, 0]),
  indices: Uint32Array.from([0, 1, 2]),
});

export const texturedTriangle = async (): Promise<TexturedMesh> => ({
  mesh: { ...triangleMesh(), uvs: Float32Array.from([0, 0, 1, 0, 0, 1]) },
  material: {
    baseColorTexture: await createPng(2, 2, { r: 200, g: 40, b: 40, alpha: 1 }),
    mimeType: 'image/png',
  },
});

export const passthroughRemover = () => {
  const remover = {
    removeBackground: vi.fn(async (image: RasterImage) => image),
  };
  return remover satisfies BackgroundRemover;
};

export const fakeShapeGenerator = (mesh: Mesh = triangleMesh()) => {
  const generator = {
    generateShape: vi.fn(async (_params: ShapeGenerationParams) => mesh),
    release: vi.fn(async () => undefined),
  };
  return generator satisfies ShapeGenerator;
};

export const fakeTextureGenerator = (result?: TexturedMesh) => {
  const generator = {
    generateTexture: vi.fn(
      async (mesh: Mesh, _image: RasterImage): Promise<TexturedMesh> => result ?? (await texturedTriangleFor(mesh)),
    ),
  };
  return generator satisfies TextureGenerator;
};

const texturedTriangleFor = async (mesh: Mesh): Promise<TexturedMesh> => {
  const textured = await texturedTriangle();
  return { mesh: { ...mesh, uvs: textured.mesh.uvs }, material: textured.material };
};

export const fakeTextToImage = (image?: RasterImage) => {
  const generator = {
    renderPrompt: vi.fn(
      async (_prompt: string, _seed: number): Promise<RasterImage> =>
        image ?? (await createRaster(8, 8, { r: 10, g: 120, b: 200, alpha: 1 })),
    ),
  };
  return generator satisfies TextToImageGenerator;
};

export const fakeServices = (overrides: Partial<GenerationServices> = {}): GenerationServices => ({
  backgroundRemover: passthroughRemover(),
  shapeGenerator: fakeShapeGenerator(),
  textureGenerator: fakeTextureGenerator(),
  textToImage: fakeTextToImage(),
  ...overrides,
});

export const makeTempRoot = () => mkdtemp(join(tmpdir(), 'mesh-forge-test-'));

export const testSettings = (tmpDir: string, overrides: Partial<OrchestratorSettings> = {}): OrchestratorSettings => ({
  tmpDir,
  maxFileBytes: 50 * 1024 * 1024,
  maxImageDimension: 2048,
  enhanceColors: true,
  promptDefaultSeed: 12345,
  shape: { steps: 50, octreeResolution: 380, numChunks: 20000, seed: 12345, releaseAfterShape: false },
  ...overrides,
});
