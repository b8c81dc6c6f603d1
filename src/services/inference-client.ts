/**
 * Shared HTTP transport for the external inference services.
 *
 * Every call is a JSON POST. When a shared secret is configured the body is signed
 * the same way incoming /generate requests are verified (see ../auth.ts).
 */

import { signPayload } from '../auth.js';
import { logger } from '../logger.js';

export interface InferenceClientOptions {
  /** Human-readable service name used in logs and errors. */
  service: string;
  baseUrl: string;
  sharedSecret?: string;
  /** 0 or undefined disables the timeout. */
  timeoutMs?: number;
}

export class InferenceServiceError extends Error {
  public constructor(
    public readonly service: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'InferenceServiceError';
  }
}

/**
 * Generate HMAC authentication headers for an inference request.
 * If sharedSecret is not set, returns empty headers (dev mode).
 */
export function getAuthHeaders(
  body: string,
  sharedSecret?: string,
  now: number = Date.now(),
): Record<string, string> {
  if (!sharedSecret) {
    return {};
  }
  const timestamp = now.toString();
  return {
    'X-Signature': signPayload(sharedSecret, timestamp, body),
    'X-Timestamp': timestamp,
  };
}

const parseErrorBody = (text: string): string => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') {
    return parsed.error;
  }
  return text;
};

export class InferenceClient {
  public constructor(protected readonly options: InferenceClientOptions) {}

  public get service(): string {
    return this.options.service;
  }

  protected async post(path: string, body: Record<string, unknown> = {}): Promise<unknown> {
    const { service, baseUrl, sharedSecret, timeoutMs } = this.options;
    const url = `${baseUrl}${path}`;
    const bodyStr = JSON.stringify(body);
    const startTime = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...getAuthHeaders(bodyStr, sharedSecret),
        },
        body: bodyStr,
        signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined,
      });
    } catch (err) {
      throw new InferenceServiceError(
        service,
        `${service} request failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!response.ok) {
      const errorMessage = parseErrorBody(await response.text());
      throw new InferenceServiceError(
        service,
        `${service} failed (HTTP ${response.status}): ${errorMessage}`,
      );
    }

    const result: unknown = await response.json();
    logger.debug({ service, path, elapsed: Date.now() - startTime }, 'Inference call completed');
    return result;
  }

  /** Resolves true when `GET {baseUrl}/health` answers 2xx. */
  public async probe(): Promise<boolean> {
    const { baseUrl, timeoutMs } = this.options;
    try {
      const response = await fetch(`${baseUrl}/health`, {
        signal: AbortSignal.timeout(timeoutMs || 5000),
      });
      return response.ok;
    } catch (err) {
      logger.debug({ err, service: this.options.service }, 'Health probe failed');
      return false;
    }
  }
}

/** Reads a required base64 string field out of a service response. */
export const readBase64Field = (service: string, payload: unknown, field: string): Buffer => {
  if (!payload || typeof payload !== 'object') {
    throw new InferenceServiceError(service, `${service} returned a non-object response`);
  }
  const value: unknown = Reflect.get(payload, field);
  if (typeof value !== 'string' || value.length === 0) {
    throw new InferenceServiceError(service, `${service} response is missing "${field}"`);
  }
  return Buffer.from(value, 'base64');
};
