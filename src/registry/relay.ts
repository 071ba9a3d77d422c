/**
 * Response Relay - streams an upstream response back to the client
 */

import { Response } from 'express';
import { pipeline } from 'stream/promises';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { UpstreamResponse } from '../types';
import { hasRateLimitHeaders, rateLimitHeaders, relayHeaders } from './upstream/headers';

const logger = createLogger('relay');

export interface RelayContext {
  registry: string;
  path: string;
}

/**
 * Copy status, headers and body; the body is piped, never buffered
 */
export async function relayResponse(upstream: UpstreamResponse, res: Response, context: RelayContext): Promise<void> {
  const headers = relayHeaders(upstream.headers);

  if ((upstream.status === 403 || upstream.status === 429) && hasRateLimitHeaders(upstream.headers)) {
    logger.warn(
      { ...context, status: upstream.status, rateLimit: rateLimitHeaders(upstream.headers) },
      'Relaying rate-limited response'
    );
  }

  res.status(upstream.status);
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
  if (!res.hasHeader('docker-distribution-api-version')) {
    res.setHeader('Docker-Distribution-API-Version', 'registry/2.0');
  }

  try {
    await pipeline(upstream.body, res);
    logger.debug({ ...context, status: upstream.status }, 'Response relayed');
  } catch (error) {
    // Headers are out and pipeline has destroyed both ends; nothing left to send
    logger.warn({ ...context, status: upstream.status, err: errorMessage(error) }, 'Relay interrupted');
  }
}
