/**
 * Redirect & CDN Fallback Handler
 *
 * Follows upstream 30x responses by hand. Redirect targets are pre-signed
 * storage URLs, so the registry Authorization header is stripped; Range is
 * kept so resumed layer downloads still work. When a blob's storage host
 * fails, the same path and query are tried against the registry's
 * alternate CDN hosts in order.
 */

import { createLogger } from '../../logger';
import { ResolvedRequest, RetryState, UpstreamOutcome } from '../../types';
import { discard, UpstreamExecutor } from './executor';
import { redirectHeaders } from './headers';

const logger = createLogger('redirect');

const MAX_HOPS = 5;

export interface FollowOptions {
  request: ResolvedRequest;
  // Headers sent on the attempt that was redirected
  headers: Record<string, string>;
  timeoutMs: number;
  state: RetryState;
  maxAttempts: number;
  signal?: AbortSignal;
}

function budgetExhausted(): UpstreamOutcome {
  return {
    kind: 'transport-error',
    error: new Error('Attempt budget exhausted while following redirect'),
    timedOut: false,
  };
}

export class RedirectHandler {
  constructor(private readonly executor: UpstreamExecutor) {}

  async follow(location: string, options: FollowOptions): Promise<UpstreamOutcome> {
    const headers = redirectHeaders(options.headers);
    const tried = new Set([new URL(location).host]);
    let outcome = await this.hop(location, headers, options);

    if (outcome.kind !== 'transport-error' || !options.request.isBlob) {
      return outcome;
    }

    for (const host of options.request.registry.cdnHosts) {
      if (options.signal?.aborted || options.state.attempt >= options.maxAttempts) {
        break;
      }
      const target = new URL(location);
      if (tried.has(host)) {
        continue;
      }
      tried.add(host);
      target.host = host;

      logger.warn(
        { registry: options.request.registry.id, failed: new URL(location).host, fallback: host, err: outcome.error.message },
        'Blob host failed, trying CDN fallback'
      );
      discard(outcome.response);
      outcome = await this.hop(target.toString(), headers, options);
      if (outcome.kind !== 'transport-error') {
        return outcome;
      }
    }

    return outcome;
  }

  /**
   * One request plus any nested redirects, each consuming an attempt
   */
  private async hop(url: string, headers: Record<string, string>, options: FollowOptions): Promise<UpstreamOutcome> {
    let current = url;
    for (let hops = 0; hops < MAX_HOPS; hops++) {
      if (options.state.attempt >= options.maxAttempts) {
        return budgetExhausted();
      }
      options.state.attempt++;
      options.state.hostsTried.add(new URL(current).host);

      logger.debug({ url: current, attempt: options.state.attempt }, 'Following redirect');
      const outcome = await this.executor.execute({
        url: current,
        method: options.request.method === 'HEAD' ? 'HEAD' : 'GET',
        headers,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
      });

      switch (outcome.kind) {
        case 'redirect':
          discard(outcome.response);
          current = outcome.location;
          continue;
        case 'unauthorized':
          // Storage auth failures are final answers, not registry challenges
          return { kind: 'success', response: outcome.response };
        case 'success':
          if (outcome.response.status >= 500) {
            return {
              kind: 'transport-error',
              error: new Error(`Storage host responded ${outcome.response.status}`),
              timedOut: false,
              response: outcome.response,
            };
          }
          return outcome;
        default:
          return outcome;
      }
    }

    return {
      kind: 'transport-error',
      error: new Error(`Too many redirects following ${url}`),
      timedOut: false,
    };
  }
}
