/**
 * Auth Negotiator - obtains bearer tokens for upstream registries
 *
 * Tokens come from the realm named in an upstream `WWW-Authenticate`
 * challenge, or from the registry's configured auth server when a request
 * can be pre-authenticated. Fetches for one (registry, scope) are coalesced
 * so a burst of layer downloads for the same image costs a single exchange.
 */

import { AxiosInstance } from 'axios';
import { AuthFailedError, ClientAbortedError, errorMessage } from '../../errors';
import { createLogger } from '../../logger';
import { AuthGrant, AuthToken, Credentials, RegistryDescriptor, ResolvedRequest } from '../../types';
import { parseBearerChallenge, scopeFor } from './challenge';
import { SingleFlight } from './single-flight';
import { TokenCache } from './token-cache';

const logger = createLogger('auth');

// Token servers that omit expires_in grant 60 seconds
const DEFAULT_TOKEN_TTL_SECONDS = 60;

export interface AuthNegotiatorOptions {
  http: AxiosInstance;
  cache: TokenCache;
  credentials?: Record<string, Credentials>;
  timeoutMs?: number;
  now?: () => number;
}

interface ObservedRealm {
  realm: string;
  service?: string;
}

const ANONYMOUS: AuthGrant = { headers: {} };

function bearer(token: AuthToken): AuthGrant {
  return { headers: { Authorization: `Bearer ${token.value}` }, expiresAt: token.expiresAt };
}

function readTokenBody(data: unknown): { value?: string; expiresIn?: number } {
  if (typeof data !== 'object' || data === null) {
    return {};
  }
  const token = 'token' in data && typeof data.token === 'string' && data.token ? data.token : undefined;
  const accessToken =
    'access_token' in data && typeof data.access_token === 'string' && data.access_token
      ? data.access_token
      : undefined;
  const expiresIn =
    'expires_in' in data && typeof data.expires_in === 'number' && data.expires_in > 0
      ? data.expires_in
      : undefined;
  return { value: token ?? accessToken, expiresIn };
}

export class AuthNegotiator {
  private readonly http: AxiosInstance;
  private readonly cache: TokenCache;
  private readonly credentials: Record<string, Credentials>;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly flights = new SingleFlight<AuthToken>();
  // Realm/service last seen in a challenge, per registry id
  private readonly observed: Map<string, ObservedRealm> = new Map();

  constructor(options: AuthNegotiatorOptions) {
    this.http = options.http;
    this.cache = options.cache;
    this.credentials = options.credentials ?? {};
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Headers to attach before an attempt; possibly empty. Called again once
   * a held token has expired.
   */
  async prepare(request: ResolvedRequest, signal?: AbortSignal): Promise<AuthGrant> {
    const { registry, repository } = request;
    if (!repository) {
      return ANONYMOUS;
    }

    const scope = scopeFor(repository, request.method);
    const cached = this.cache.get(registry.id, scope);
    if (cached) {
      return bearer(cached);
    }

    const observed = this.observed.get(registry.id);
    if (!registry.requiresAuth && !observed) {
      return ANONYMOUS;
    }
    if (!request.isBlob && !request.isManifest) {
      return ANONYMOUS;
    }

    const realm = observed?.realm ?? registry.authServerOverride;
    const service = observed?.service ?? registry.authService;
    if (!realm) {
      return ANONYMOUS;
    }
    // Without credentials, only pre-fetch once the registry has proven it wants a token
    if (!this.credentials[registry.id] && !observed) {
      return ANONYMOUS;
    }

    try {
      const token = await this.obtain(registry, realm, service, scope, signal);
      logger.debug({ registry: registry.id, scope }, 'Pre-authenticated request');
      return bearer(token);
    } catch (error) {
      if (error instanceof ClientAbortedError) {
        throw error;
      }
      logger.warn({ registry: registry.id, scope, err: errorMessage(error) }, 'Pre-authentication failed, continuing anonymously');
      return ANONYMOUS;
    }
  }

  /**
   * Answer a 401 challenge with a token for the challenged scope
   *
   * @param rejected token value the upstream just refused, if any
   * @param signal abandons the wait, not the shared exchange
   */
  async handleChallenge(
    request: ResolvedRequest,
    header: string | undefined,
    rejected?: string,
    signal?: AbortSignal
  ): Promise<AuthGrant> {
    const { registry } = request;
    const challenge = parseBearerChallenge(header);
    if (!challenge) {
      throw new AuthFailedError('Upstream did not send a usable bearer challenge', {
        registry: registry.id,
        header,
      });
    }

    this.observed.set(registry.id, { realm: challenge.realm, service: challenge.service });

    const scope =
      challenge.scope ?? (request.repository ? scopeFor(request.repository, request.method) : '');

    const cached = this.cache.get(registry.id, scope);
    if (cached && cached.value !== rejected) {
      return bearer(cached);
    }
    if (cached) {
      this.cache.invalidate(registry.id, scope);
    }

    const token = await this.obtain(registry, challenge.realm, challenge.service, scope, signal);
    return bearer(token);
  }

  private obtain(
    registry: RegistryDescriptor,
    realm: string,
    service: string | undefined,
    scope: string,
    signal?: AbortSignal
  ): Promise<AuthToken> {
    return this.flights.do(
      TokenCache.key(registry.id, scope),
      async () => {
        const cached = this.cache.get(registry.id, scope);
        if (cached) {
          return cached;
        }
        const token = await this.exchange(registry, realm, service, scope);
        this.cache.set(token);
        return token;
      },
      signal
    );
  }

  private async exchange(
    registry: RegistryDescriptor,
    realm: string,
    service: string | undefined,
    scope: string
  ): Promise<AuthToken> {
    const credentials = this.credentials[registry.id];
    const params: Record<string, string> = {};
    if (service) params.service = service;
    if (scope) params.scope = scope;
    if (credentials) params.account = credentials.username;

    logger.info(
      { registry: registry.id, realm, scope, account: credentials?.username ?? 'anonymous' },
      'Requesting token'
    );

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(realm, {
        params,
        auth: credentials ? { username: credentials.username, password: credentials.password } : undefined,
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw new AuthFailedError(`Token request to ${realm} failed: ${errorMessage(error)}`, {
        registry: registry.id,
        realm,
      });
    }

    if (status !== 200) {
      throw new AuthFailedError(`Token request failed: ${status}`, { registry: registry.id, realm, status });
    }

    const body = readTokenBody(data);
    if (!body.value) {
      throw new AuthFailedError('Token response carried no token', { registry: registry.id, realm });
    }

    const ttl = body.expiresIn ?? DEFAULT_TOKEN_TTL_SECONDS;
    return {
      registryId: registry.id,
      scope,
      value: body.value,
      expiresAt: this.now() + ttl * 1000,
    };
  }
}
