import { InferenceClient, readBase64Field } from './inference-client.js';
import { decodeImage, encodePng } from '../image/raster.js';
import type { RasterImage } from '../pipeline/types.js';
import type { BackgroundRemover } from './types.js';

export class BackgroundRemovalClient extends InferenceClient implements BackgroundRemover {
  public async removeBackground(image: RasterImage): Promise<RasterImage> {
    const png = await encodePng(image);
    const payload = await this.post('/remove-background', { image: png.toString('base64') });
    return decodeImage(readBase64Field(this.service, payload, 'image'));
  }
}
