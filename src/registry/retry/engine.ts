/**
 * Retry/Backoff Engine - drives the state machine against the upstream
 */

import { setTimeout as delay } from 'timers/promises';
import { AuthNegotiator } from '../auth/negotiator';
import {
  AuthFailedError,
  ClientAbortedError,
  errorMessage,
  RateLimitedError,
  RedirectExhaustedError,
  UpstreamTransportError,
} from '../../errors';
import { createLogger } from '../../logger';
import { ResolvedRequest, RetryPolicy, RetryState, TimeoutPolicy, UpstreamOutcome, UpstreamResponse } from '../../types';
import { discard, UpstreamExecutor } from '../upstream/executor';
import {
  buildUpstreamHeaders,
  DEFAULT_USER_AGENTS,
  headerString,
  minimalHeaders,
  rateLimitHeaders,
} from '../upstream/headers';
import { RedirectHandler } from '../upstream/redirect';
import { initialState, nextStep } from './machine';

const logger = createLogger('retry');

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryEngineOptions {
  executor: UpstreamExecutor;
  redirects: RedirectHandler;
  auth: AuthNegotiator;
  policy: RetryPolicy;
  timeouts: TimeoutPolicy;
  userAgents?: string[];
  hintHeader?: string;
  lastResort?: boolean;
  random?: () => number;
  sleep?: Sleep;
  now?: () => number;
}

export interface EngineResult {
  response: UpstreamResponse;
  attempts: number;
  state: RetryState;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function rejectedToken(headers: Record<string, string>): string | undefined {
  const value = headers.Authorization ?? headers.authorization;
  return value?.startsWith('Bearer ') ? value.substring('Bearer '.length) : undefined;
}

export class RetryEngine {
  private readonly userAgents: string[];
  private readonly random: () => number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(private readonly options: RetryEngineOptions) {
    this.userAgents = options.userAgents && options.userAgents.length > 0 ? options.userAgents : DEFAULT_USER_AGENTS;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  userAgentFor(rotation: number): string {
    return this.userAgents[rotation % this.userAgents.length];
  }

  /**
   * Run one logical upstream operation to a relayable response or an error
   */
  async run(request: ResolvedRequest, signal?: AbortSignal): Promise<EngineResult> {
    const { policy, timeouts } = this.options;
    const { registry } = request;
    const state = initialState();
    const url = `https://${registry.primaryHost}${request.upstreamPath}${request.query}`;
    const timeoutMs = request.isBlob ? timeouts.blobMs : timeouts.manifestMs;
    const replayable = request.body === undefined;
    const log = logger.child({ registry: registry.id, method: request.method, path: request.upstreamPath });

    let grant = await this.options.auth.prepare(request, signal);
    let inLastResort = false;
    let redirectFailed = false;

    for (;;) {
      if (signal?.aborted) {
        throw new ClientAbortedError();
      }

      // A long backoff or a slow blob can outlive the token
      if (grant.expiresAt !== undefined && this.now() >= grant.expiresAt) {
        log.debug({ attempt: state.attempt + 1 }, 'Token expired, refreshing before retry');
        grant = await this.options.auth.prepare(request, signal);
      }

      const full = buildUpstreamHeaders(request.originalHeaders, {
        kind: request.kind,
        userAgent: this.userAgentFor(state.backoffCount),
        auth: grant.headers,
        hasBody: !replayable,
        drop: this.options.hintHeader ? [this.options.hintHeader] : [],
      });
      const headers = inLastResort ? minimalHeaders(full) : full;

      state.attempt++;
      state.hostsTried.add(registry.primaryHost);
      let outcome: UpstreamOutcome = await this.options.executor.execute({
        url,
        method: request.method,
        headers,
        body: request.body,
        timeoutMs,
        signal,
      });
      redirectFailed = false;

      const ctx = { policy, replayable, lastResort: this.options.lastResort ?? true, inLastResort, random: this.random };
      let step = nextStep(state, outcome.kind, ctx);

      if (step.kind === 'NEED_REDIRECT' && outcome.kind === 'redirect') {
        discard(outcome.response);
        outcome = await this.options.redirects.follow(outcome.location, {
          request,
          headers,
          timeoutMs,
          state,
          maxAttempts: policy.maxAttempts,
          signal,
        });
        redirectFailed = outcome.kind === 'transport-error';
        step = nextStep(state, outcome.kind, ctx);
      }

      if (signal?.aborted) {
        discard(outcome.response);
        throw new ClientAbortedError();
      }

      this.record(state, outcome, log);

      switch (step.kind) {
        case 'NEED_REDIRECT':
          // follow() resolves every redirect it is handed
          break;

        case 'SUCCESS':
          if (outcome.kind !== 'success') break;
          log.debug({ status: outcome.response.status, attempts: state.attempt }, 'Upstream operation succeeded');
          return { response: outcome.response, attempts: state.attempt, state };

        case 'NEED_AUTH_RETRY': {
          if (outcome.kind !== 'unauthorized') break;
          state.authRetried = true;
          try {
            grant = await this.options.auth.handleChallenge(
              request,
              headerString(outcome.response.headers, 'www-authenticate'),
              rejectedToken(grant.headers),
              signal
            );
          } catch (error) {
            if (error instanceof ClientAbortedError) {
              discard(outcome.response);
              throw error;
            }
            // Relay the upstream 401 so the client sees the registry's own answer
            log.warn({ err: errorMessage(error) }, 'Token exchange failed');
            state.lastError = error instanceof Error ? error : new AuthFailedError(errorMessage(error));
            return { response: outcome.response, attempts: state.attempt, state };
          }
          discard(outcome.response);
          continue;
        }

        case 'AUTH_FAILED':
          if (outcome.kind !== 'unauthorized') break;
          state.lastError = new AuthFailedError('Upstream rejected the request after authentication', {
            registry: registry.id,
            attempts: state.attempt,
          });
          log.warn({ attempts: state.attempt, authRetried: state.authRetried }, 'Authentication failed');
          return { response: outcome.response, attempts: state.attempt, state };

        case 'NEED_BACKOFF': {
          discard('response' in outcome ? outcome.response : undefined);
          state.backoffCount++;
          state.lastDelayMs = step.delayMs;
          log.info(
            { attempt: state.attempt, delayMs: step.delayMs, userAgent: this.userAgentFor(state.backoffCount) },
            'Backing off before retry'
          );
          try {
            await this.sleep(step.delayMs, signal);
          } catch (error) {
            if (signal?.aborted) throw new ClientAbortedError();
            throw error;
          }
          continue;
        }

        case 'EXHAUSTED': {
          const response = 'response' in outcome ? outcome.response : undefined;
          log.warn(
            {
              attempts: state.attempt,
              status: response?.status,
              rateLimit: response ? rateLimitHeaders(response.headers) : undefined,
              hostsTried: [...state.hostsTried],
              err: state.lastError?.message,
              lastResort: step.lastResort,
            },
            step.lastResort ? 'Retries exhausted, making last resort attempt' : 'Retries exhausted'
          );
          if (step.lastResort) {
            discard(response);
            inLastResort = true;
            continue;
          }
          if (response) {
            return { response, attempts: state.attempt, state };
          }
          if (redirectFailed && request.isBlob) {
            throw new RedirectExhaustedError([...state.hostsTried]);
          }
          throw state.lastError ?? new UpstreamTransportError('Upstream request failed', false);
        }
      }

      // Only reachable when a step does not match its outcome
      discard('response' in outcome ? outcome.response : undefined);
      throw new UpstreamTransportError(`Unexpected ${outcome.kind} outcome for step ${step.kind}`, false);
    }
  }

  /**
   * Remember and log a failed attempt
   */
  private record(state: RetryState, outcome: UpstreamOutcome, log: typeof logger): void {
    if (outcome.kind === 'rate-limited') {
      const headers = rateLimitHeaders(outcome.response.headers);
      state.lastError = new RateLimitedError(`Upstream rate limited the request (${outcome.response.status})`, headers);
      log.warn({ status: outcome.response.status, attempt: state.attempt, rateLimit: headers }, 'Upstream rate limited');
    } else if (outcome.kind === 'transport-error') {
      state.lastError = new UpstreamTransportError(outcome.error.message, outcome.timedOut, {
        status: outcome.response?.status,
      });
      log.warn(
        { attempt: state.attempt, err: outcome.error.message, timedOut: outcome.timedOut, status: outcome.response?.status },
        'Upstream attempt failed'
      );
    }
  }
}
