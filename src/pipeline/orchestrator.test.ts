import { readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { buildModelFilename, GenerationOrchestrator } from './orchestrator.js';
import { TEXT_TO_3D_UNAVAILABLE } from './steps/render-prompt.js';
import { decodeGlb } from '../mesh/glb.js';
import {
  createPng,
  fakeServices,
  fakeShapeGenerator,
  fakeTextToImage,
  fakeTextureGenerator,
  makeTempRoot,
  testSettings,
} from '../test-utils/fakes.js';

const fixedClock = () => new Date(2024, 0, 2, 3, 4, 5);

describe('buildModelFilename', () => {
  it('stamps the kind and local time', () => {
    expect(buildModelFilename('image-to-3d', fixedClock())).toBe('model_image-to-3d_20240102_030405.glb');
    expect(buildModelFilename('text-to-3d', new Date(2025, 10, 30, 23, 59, 1))).toBe(
      'model_text-to-3d_20251130_235901.glb',
    );
  });
});

describe('GenerationOrchestrator', () => {
  let tmpRoot: string;
  let pngBase64: string;

  beforeEach(async () => {
    tmpRoot = await makeTempRoot();
    pngBase64 = (await createPng(8, 8, { r: 200, g: 100, b: 50, alpha: 1 })).toString('base64');
  });

  afterEach(async () => {
    await rm(tmpRoot, { recursive: true, force: true });
  });

  it('generates a textured model from an image', async () => {
    const orchestrator = new GenerationOrchestrator({
      services: fakeServices(),
      settings: testSettings(tmpRoot),
      now: fixedClock,
    });

    const result = await orchestrator.run({ kind: 'image', image: pngBase64 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.filename).toBe('model_image-to-3d_20240102_030405.glb');
    expect(result.generationKind).toBe('image-to-3d');
    expect(result.textured).toBe(true);
    expect(result.elapsedSeconds).toBeGreaterThanOrEqual(0);
    expect(result.progress).toEqual([
      { message: 'Processing input image', percent: 5 },
      { message: 'Generating 3D shape...', percent: 10 },
      { message: '3D shape generated', percent: 50 },
      { message: 'Generating texture...', percent: 60 },
      { message: 'Texture generated', percent: 90 },
      { message: 'Model saved', percent: 100 },
    ]);

    const bytes = Buffer.from(result.fileData, 'base64');
    expect(bytes.length).toBe(result.fileSize);
    expect((await decodeGlb(bytes)).material).toBeDefined();
  });

  it('removes its request directory once the run is over', async () => {
    const orchestrator = new GenerationOrchestrator({ services: fakeServices(), settings: testSettings(tmpRoot) });

    await orchestrator.run({ kind: 'image', image: pngBase64 });

    expect(await readdir(tmpRoot)).toEqual([]);
  });

  it('renders prompts with the request seed or the default', async () => {
    const textToImage = fakeTextToImage();
    const orchestrator = new GenerationOrchestrator({
      services: fakeServices({ textToImage }),
      settings: testSettings(tmpRoot),
      now: fixedClock,
    });

    const seeded = await orchestrator.run({ kind: 'prompt', prompt: 'a teapot', seed: 7 });
    const unseeded = await orchestrator.run({ kind: 'prompt', prompt: 'a teapot' });

    expect(textToImage.renderPrompt).toHaveBeenNthCalledWith(1, 'a teapot', 7);
    expect(textToImage.renderPrompt).toHaveBeenNthCalledWith(2, 'a teapot', 12345);
    expect(seeded.ok && seeded.filename).toBe('model_text-to-3d_20240102_030405.glb');
    expect(unseeded.ok && unseeded.progress[0]).toEqual({
      message: "Generating image from prompt: 'a teapot'",
      percent: 5,
    });
  });

  it('does not run background removal on rendered prompts', async () => {
    const services = fakeServices();
    const orchestrator = new GenerationOrchestrator({ services, settings: testSettings(tmpRoot) });

    await orchestrator.run({ kind: 'prompt', prompt: 'a teapot' });

    expect(services.textToImage).toBeDefined();
    expect(services.backgroundRemover.removeBackground).not.toHaveBeenCalled();
  });

  it('fails prompt requests without a text-to-image service', async () => {
    const orchestrator = new GenerationOrchestrator({
      services: fakeServices({ textToImage: undefined }),
      settings: testSettings(tmpRoot),
    });

    const result = await orchestrator.run({ kind: 'prompt', prompt: 'a teapot' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PROMPT_RENDER');
    expect(result.error.message).toBe(TEXT_TO_3D_UNAVAILABLE);
  });

  it('still succeeds when texturing fails', async () => {
    const textureGenerator = fakeTextureGenerator();
    textureGenerator.generateTexture.mockRejectedValue(new Error('texture model crashed'));
    const orchestrator = new GenerationOrchestrator({
      services: fakeServices({ textureGenerator }),
      settings: testSettings(tmpRoot),
    });

    const result = await orchestrator.run({ kind: 'image', image: pngBase64 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.textured).toBe(false);
    expect(result.progress[4]).toEqual({ message: 'Using shape-only model (texture unavailable)', percent: 90 });
    expect((await decodeGlb(Buffer.from(result.fileData, 'base64'))).material).toBeUndefined();
  });

  it('reports shape-only models when no texture service is configured', async () => {
    const orchestrator = new GenerationOrchestrator({
      services: fakeServices({ textureGenerator: undefined }),
      settings: testSettings(tmpRoot),
    });

    const result = await orchestrator.run({ kind: 'image', image: pngBase64 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.textured).toBe(false);
    expect(result.progress[4]).toEqual({ message: 'Using shape-only model (no texture pipeline)', percent: 90 });
  });

  it('stops before texturing when shape generation fails', async () => {
    const shapeGenerator = fakeShapeGenerator();
    shapeGenerator.generateShape.mockRejectedValue(new Error('CUDA out of memory'));
    const services = fakeServices({ shapeGenerator });
    const orchestrator = new GenerationOrchestrator({ services, settings: testSettings(tmpRoot) });

    const result = await orchestrator.run({ kind: 'image', image: pngBase64 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('SHAPE_GENERATION');
    expect(result.error.message).toBe('Shape generation error: CUDA out of memory');
    expect(services.textureGenerator?.generateTexture).not.toHaveBeenCalled();
  });

  it('rejects undecodable images before calling any service', async () => {
    const services = fakeServices();
    const orchestrator = new GenerationOrchestrator({ services, settings: testSettings(tmpRoot) });

    const result = await orchestrator.run({ kind: 'image', image: Buffer.from('not an image').toString('base64') });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('IMAGE_DECODE');
    expect(services.shapeGenerator.generateShape).not.toHaveBeenCalled();
  });

  it('fails oversized models and leaves no files behind', async () => {
    const orchestrator = new GenerationOrchestrator({
      services: fakeServices(),
      settings: testSettings(tmpRoot, { maxFileBytes: 10 }),
    });

    const result = await orchestrator.run({ kind: 'image', image: pngBase64 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('SIZE_LIMIT');
    expect(result.error.message.startsWith('File too large: ')).toBe(true);
    expect(await readdir(tmpRoot)).toEqual([]);
  });

  it('turns unexpected errors into internal failures', async () => {
    const blocked = join(tmpRoot, 'not-a-directory');
    await writeFile(blocked, 'occupied');
    const orchestrator = new GenerationOrchestrator({
      services: fakeServices(),
      settings: testSettings(blocked),
    });

    const result = await orchestrator.run({ kind: 'image', image: pngBase64 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('INTERNAL');
    expect(result.error.message.startsWith('Generation failed: ')).toBe(true);
  });

  it('reports its capabilities', () => {
    const full = new GenerationOrchestrator({ services: fakeServices(), settings: testSettings(tmpRoot) });
    const minimal = new GenerationOrchestrator({
      services: fakeServices({ textureGenerator: undefined, textToImage: undefined }),
      settings: testSettings(tmpRoot),
    });

    expect(full.capabilities).toEqual({ textTo3d: true, texture: true });
    expect(minimal.capabilities).toEqual({ textTo3d: false, texture: false });
  });
});
