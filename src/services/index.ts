import type { ServiceEndpoints } from '../config.js';
import { logger } from '../logger.js';
import { BackgroundRemovalClient } from './background-removal-client.js';
import { ShapeClient } from './shape-client.js';
import { TextureClient } from './texture-client.js';
import { TextToImageClient } from './text-to-image-client.js';
import type { GenerationServices } from './types.js';

export type { GenerationServices } from './types.js';

export interface CreateServicesOptions {
  /**
   * Check the optional texture service at startup and leave it out when it does not answer,
   * so requests degrade to shape-only without paying for a failing call each time.
   */
  probeTexture?: boolean;
}

export async function createServices(
  endpoints: ServiceEndpoints,
  options: CreateServicesOptions = {},
): Promise<GenerationServices> {
  const shared = { sharedSecret: endpoints.sharedSecret, timeoutMs: endpoints.timeoutMs };

  const services: GenerationServices = {
    backgroundRemover: new BackgroundRemovalClient({
      service: 'Background removal',
      baseUrl: endpoints.backgroundRemovalUrl,
      ...shared,
    }),
    shapeGenerator: new ShapeClient({
      service: 'Shape generation',
      baseUrl: endpoints.shapeServiceUrl,
      ...shared,
    }),
  };

  if (endpoints.textureServiceUrl) {
    const texture = new TextureClient({
      service: 'Texture generation',
      baseUrl: endpoints.textureServiceUrl,
      ...shared,
    });
    if (!options.probeTexture || (await texture.probe())) {
      services.textureGenerator = texture;
    } else {
      logger.warn({ url: endpoints.textureServiceUrl }, 'Texture service not available, models will be shape-only');
    }
  }

  if (endpoints.textToImageUrl) {
    services.textToImage = new TextToImageClient({
      service: 'Text-to-image',
      baseUrl: endpoints.textToImageUrl,
      ...shared,
    });
  }

  logger.info(
    {
      texture: Boolean(services.textureGenerator),
      textTo3d: Boolean(services.textToImage),
    },
    'Inference services ready',
  );

  return services;
}
