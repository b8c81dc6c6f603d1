import { InferenceClient, InferenceServiceError, readBase64Field } from './inference-client.js';
import { encodePng } from '../image/raster.js';
import { decodeGlb, encodeGlb } from '../mesh/glb.js';
import type { Mesh, RasterImage, TexturedMesh } from '../pipeline/types.js';
import type { TextureGenerator } from './types.js';

export class TextureClient extends InferenceClient implements TextureGenerator {
  public async generateTexture(mesh: Mesh, image: RasterImage): Promise<TexturedMesh> {
    const [glb, png] = await Promise.all([encodeGlb({ mesh }), encodePng(image)]);
    const payload = await this.post('/texture', {
      mesh: Buffer.from(glb).toString('base64'),
      image: png.toString('base64'),
    });

    const textured = await decodeGlb(readBase64Field(this.service, payload, 'mesh'));
    if (!textured.material) {
      throw new InferenceServiceError(this.service, `${this.service} returned a mesh without a texture`);
    }
    return { mesh: textured.mesh, material: textured.material };
  }
}
