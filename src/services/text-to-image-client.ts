import { InferenceClient, readBase64Field } from './inference-client.js';
import { decodeImage } from '../image/raster.js';
import type { RasterImage } from '../pipeline/types.js';
import type { TextToImageGenerator } from './types.js';

export class TextToImageClient extends InferenceClient implements TextToImageGenerator {
  public async renderPrompt(prompt: string, seed: number): Promise<RasterImage> {
    const payload = await this.post('/text-to-image', { prompt, seed });
    return decodeImage(readBase64Field(this.service, payload, 'image'));
  }
}
