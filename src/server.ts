import express from 'express';
import type { Request, Response, NextFunction, Express } from 'express';
import { captureRawBody, verifySignature } from './auth.js';
import type { GeneratorConfig } from './config.js';
import { QueueFullError, SerialQueue } from './infra/serial.js';
import { isFailureEnvelope } from './jobs/generation-request.js';
import type { GenerationFailureEnvelope, GenerationResponse } from './jobs/generation-request.js';
import { logger } from './logger.js';
import { handleGenerationRequest } from './pipeline/request-adapter.js';
import type { GenerationRunner } from './pipeline/request-adapter.js';

export interface GenerationBackend extends GenerationRunner {
  readonly capabilities: { textTo3d: boolean; texture: boolean };
}

const BUSY_RESPONSE: GenerationFailureEnvelope = {
  error: 'Generator is busy, retry later',
  code: 'BUSY',
};

const statusFor = (response: GenerationResponse): number => {
  if (!isFailureEnvelope(response)) return 200;
  switch (response.code) {
    case 'INPUT_VALIDATION':
      return 400;
    case 'SIZE_LIMIT':
      return 413;
    case 'BUSY':
      return 503;
    default:
      return 500;
  }
};

export const createServer = (
  config: Pick<GeneratorConfig, 'maxRequestBytes' | 'maxQueuedRequests' | 'sharedSecret'>,
  backend: GenerationBackend,
): Express => {
  const app: Express = express();
  // One pipeline run at a time; a bounded number of later requests wait their turn.
  const queue = new SerialQueue(config.maxQueuedRequests);

  // Checked before the body is buffered so a full queue costs no memory.
  const rejectWhenBusy = (_req: Request, res: Response, next: NextFunction) => {
    if (queue.isFull) {
      logger.warn({ pending: queue.pending }, 'Generation queue full, rejecting request');
      res.status(statusFor(BUSY_RESPONSE)).json(BUSY_RESPONSE);
      return;
    }
    next();
  };

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', capabilities: backend.capabilities });
  });

  app.post(
    '/generate',
    rejectWhenBusy,
    captureRawBody(config.maxRequestBytes),
    verifySignature(config.sharedSecret),
    async (req: Request, res: Response) => {
      const body: unknown = req.body;
      try {
        if (queue.pending > 0) {
          logger.info({ pending: queue.pending }, 'Generation request waiting for the pipeline');
        }
        const response = await queue.run(() => handleGenerationRequest(body, backend));
        res.status(statusFor(response)).json(response);
      } catch (err) {
        if (err instanceof QueueFullError) {
          logger.warn({ pending: queue.pending }, 'Generation queue full, rejecting request');
          res.status(statusFor(BUSY_RESPONSE)).json(BUSY_RESPONSE);
          return;
        }
        const message = err instanceof Error ? err.message : 'Unknown error';
        logger.error({ err }, 'Failed to process generation request');
        res.status(500).json({ error: `Handler error: ${message}`, code: 'INTERNAL' });
      }
    },
  );

  return app;
};
