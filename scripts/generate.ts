import { readFile, writeFile } from 'fs/promises';
import { loadConfig } from '../src/config.js';
import { handleGenerationRequest } from '../src/pipeline/request-adapter.js';
import { GenerationOrchestrator } from '../src/pipeline/orchestrator.js';
import { createServices } from '../src/services/index.js';
import { isFailureEnvelope } from '../src/jobs/generation-request.js';

/**
 * Run one generation against the configured inference services and save the GLB locally.
 *
 * Usage:
 *   npm run generate -- --image ./chair.png [--out ./chair.glb]
 *   npm run generate -- --prompt "a wooden chair" [--seed 7] [--out ./chair.glb]
 */
const readFlag = (name: string): string | undefined => {
  const index = process.argv.indexOf(`--${name}`);
  return index >= 0 ? process.argv[index + 1] : undefined;
};

async function main() {
  const imagePath = readFlag('image');
  const prompt = readFlag('prompt');
  const seed = readFlag('seed');

  const input: Record<string, unknown> = {};
  if (imagePath) input.image = (await readFile(imagePath)).toString('base64');
  if (prompt) input.prompt = prompt;
  if (seed) input.seed = Number(seed);

  const cfg = loadConfig();
  const services = await createServices(cfg.services, { probeTexture: true });
  const orchestrator = new GenerationOrchestrator({ services, settings: cfg });

  const response = await handleGenerationRequest({ input }, orchestrator);
  if (isFailureEnvelope(response)) {
    console.error(`Generation failed [${response.code}]: ${response.error}`);
    process.exitCode = 1;
    return;
  }

  for (const { percent, message } of response.progress) {
    console.log(`${String(percent).padStart(3)}% ${message}`);
  }

  const outPath = readFlag('out') ?? response.filename;
  await writeFile(outPath, Buffer.from(response.file_data, 'base64'));
  console.log(
    `Saved ${outPath} (${(response.file_size / (1024 * 1024)).toFixed(2)} MB, ` +
      `${response.generation_type}, ${response.generation_time.toFixed(1)}s, ` +
      `${response.textured ? 'textured' : 'shape-only'})`,
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
