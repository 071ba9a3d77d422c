/**
 * Upstream Executor - issues one outbound HTTP call and classifies it
 */

import { AxiosError, AxiosInstance, isAxiosError } from 'axios';
import { Readable } from 'stream';
import { errorMessage } from '../../errors';
import { createLogger } from '../../logger';
import { UpstreamOutcome, UpstreamResponse } from '../../types';
import { normalizeHeaders, headerString, quotaExhausted } from './headers';

const logger = createLogger('upstream');

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
// Gateway-class failures are worth another try; other 5xx are answers
const TRANSIENT_STATUSES = new Set([502, 503, 504]);

export interface ExecuteTarget {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: Readable;
  timeoutMs: number;
  signal?: AbortSignal;
}

function isTimeout(error: AxiosError): boolean {
  return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
}

/**
 * Release a response body we are not going to relay
 */
export function discard(response: UpstreamResponse | undefined): void {
  if (response && !response.body.destroyed) {
    response.body.destroy();
  }
}

function resolveLocation(location: string | undefined, base: string): string | undefined {
  if (!location) return undefined;
  try {
    return new URL(location, base).toString();
  } catch (error) {
    logger.warn({ location, base, err: errorMessage(error) }, 'Ignoring unparsable redirect location');
    return undefined;
  }
}

export function classify(response: UpstreamResponse): UpstreamOutcome {
  const { status, headers } = response;

  if (REDIRECT_STATUSES.has(status)) {
    const location = resolveLocation(headerString(headers, 'location'), response.url);
    if (location) {
      return { kind: 'redirect', location, response };
    }
    // Nothing to follow; the client gets the 30x as sent
    return { kind: 'success', response };
  }
  if (status === 401) {
    return { kind: 'unauthorized', response };
  }
  if (status === 429 || (status === 403 && quotaExhausted(headers))) {
    return { kind: 'rate-limited', response };
  }
  if (TRANSIENT_STATUSES.has(status)) {
    return {
      kind: 'transport-error',
      error: new Error(`Upstream responded ${status}`),
      timedOut: status === 504,
      response,
    };
  }
  return { kind: 'success', response };
}

export class UpstreamExecutor {
  constructor(private readonly http: AxiosInstance) {}

  async execute(target: ExecuteTarget): Promise<UpstreamOutcome> {
    logger.debug({ method: target.method, url: target.url }, 'Upstream request');

    try {
      const response = await this.http.request<Readable>({
        url: target.url,
        method: target.method,
        headers: target.headers,
        data: target.body,
        timeout: target.timeoutMs,
        signal: target.signal,
        responseType: 'stream',
        maxRedirects: 0,
        decompress: false,
        validateStatus: () => true,
      });

      const upstream: UpstreamResponse = {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: toReadable(response.data),
        url: target.url,
      };
      return classify(upstream);
    } catch (error) {
      if (isAxiosError(error)) {
        const timedOut = isTimeout(error);
        logger.debug({ url: target.url, code: error.code, timedOut }, 'Upstream transport failure');
        return { kind: 'transport-error', error, timedOut };
      }
      if (error instanceof Error) {
        return { kind: 'transport-error', error, timedOut: false };
      }
      return { kind: 'transport-error', error: new Error(String(error)), timedOut: false };
    }
  }
}

/**
 * Axios hands back a stream in Node; mocks may hand back a buffer or string
 */
function toReadable(data: unknown): Readable {
  if (data instanceof Readable) {
    return data;
  }
  if (data === undefined || data === null) {
    return Readable.from([]);
  }
  if (Buffer.isBuffer(data) || typeof data === 'string') {
    return Readable.from([data]);
  }
  return Readable.from([Buffer.from(JSON.stringify(data))]);
}
