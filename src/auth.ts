/**
 * HMAC signature verification for incoming generation requests.
 * If GENERATOR_SHARED_SECRET is not set, verification is skipped (dev mode).
 */

import type { Request, Response, NextFunction } from 'express';
import { createHmac, timingSafeEqual } from 'crypto';
import { logger } from './logger.js';

const MAX_TIMESTAMP_DRIFT_MS = 5 * 60 * 1000; // 5 minutes

/** Extended request type that carries the raw body for HMAC verification. */
export interface RequestWithRawBody extends Request {
  rawBody?: string;
}

/**
 * Middleware that buffers the raw request body, rejects it past `maxBytes`,
 * and parses it as JSON. Malformed JSON leaves an empty body for validation to reject.
 */
export function captureRawBody(maxBytes: number) {
  return (req: RequestWithRawBody, res: Response, next: NextFunction): void => {
    const contentLength = parseInt(req.headers['content-length'] ?? '0', 10);
    if (contentLength > maxBytes) {
      res.status(413).json({ error: `Request body too large (max ${maxBytes} bytes)`, code: 'INPUT_VALIDATION' });
      return;
    }

    const chunks: Buffer[] = [];
    let received = 0;
    let rejected = false;

    req.on('data', (chunk: Buffer) => {
      if (rejected) return;
      received += chunk.length;
      if (received > maxBytes) {
        rejected = true;
        res.status(413).json({ error: `Request body too large (max ${maxBytes} bytes)`, code: 'INPUT_VALIDATION' });
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (rejected) return;
      const data = Buffer.concat(chunks).toString('utf8');
      req.rawBody = data;
      req.body = {};
      if (data) {
        try {
          req.body = JSON.parse(data);
        } catch (err) {
          logger.debug({ err }, 'Request body is not valid JSON');
        }
      }
      next();
    });
  };
}

export const signPayload = (sharedSecret: string, timestamp: string, body: string): string =>
  createHmac('sha256', sharedSecret).update(`${timestamp}.${body}`).digest('hex');

/**
 * Middleware to verify HMAC-SHA256 signature on incoming requests.
 *
 * Expects headers:
 *   X-Signature: hex-encoded HMAC of `<timestamp>.<raw body>`
 *   X-Timestamp: Unix timestamp in milliseconds
 */
export function verifySignature(sharedSecret: string | undefined) {
  return (req: RequestWithRawBody, res: Response, next: NextFunction): void => {
    if (!sharedSecret) {
      next();
      return;
    }

    const signature = req.header('x-signature');
    const timestamp = req.header('x-timestamp');

    if (!signature || !timestamp) {
      res.status(401).json({ error: 'Missing authentication headers' });
      return;
    }

    // Check timestamp to prevent replay attacks
    const ts = parseInt(timestamp, 10);
    if (isNaN(ts) || Math.abs(Date.now() - ts) > MAX_TIMESTAMP_DRIFT_MS) {
      res.status(401).json({ error: 'Request expired or invalid timestamp' });
      return;
    }

    const expected = signPayload(sharedSecret, timestamp, req.rawBody || '');
    const sigBuffer = Buffer.from(signature);
    const expectedBuffer = Buffer.from(expected);

    if (sigBuffer.length !== expectedBuffer.length || !timingSafeEqual(sigBuffer, expectedBuffer)) {
      logger.warn({ timestamp }, 'Invalid HMAC signature on generation request');
      res.status(401).json({ error: 'Invalid signature' });
      return;
    }

    next();
  };
}
