import { InferenceClient, readBase64Field } from './inference-client.js';
import { encodePng } from '../image/raster.js';
import { decodeGlb } from '../mesh/glb.js';
import type { Mesh } from '../pipeline/types.js';
import type { ShapeGenerationParams, ShapeGenerator } from './types.js';

export class ShapeClient extends InferenceClient implements ShapeGenerator {
  public async generateShape({ image, ...settings }: ShapeGenerationParams): Promise<Mesh> {
    const png = await encodePng(image);
    const payload = await this.post('/generate', { image: png.toString('base64'), ...settings });
    const { mesh } = await decodeGlb(readBase64Field(this.service, payload, 'mesh'));
    return mesh;
  }

  public async release(): Promise<void> {
    await this.post('/release');
  }
}
