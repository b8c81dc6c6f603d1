import { createServer } from './server.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { GenerationOrchestrator } from './pipeline/orchestrator.js';
import { createServices } from './services/index.js';

const config = loadConfig();

const start = async () => {
  // Service handles are created once and reused by every request.
  const services = await createServices(config.services, { probeTexture: true });
  const orchestrator = new GenerationOrchestrator({ services, settings: config });

  const app = createServer(config, orchestrator);

  app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        profile: config.profile,
        hmacEnabled: !!config.sharedSecret,
        capabilities: orchestrator.capabilities,
      },
      'Mesh generator API listening',
    );
  });
};

start().catch((err) => {
  logger.error({ err }, 'Mesh generator failed to start');
  process.exitCode = 1;
});
