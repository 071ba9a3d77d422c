/**
 * Core types for the registry mirror
 */

import type { Readable } from 'stream';

/**
 * RegistryDescriptor describes one upstream registry
 */
export interface RegistryDescriptor {
  id: string;
  primaryHost: string;
  // Other host names that identify this registry in a host hint
  aliasHosts: string[];
  requiresAuth: boolean;
  authServerOverride?: string;
  // `service` parameter used when pre-authenticating without a challenge
  authService?: string;
  // Prefixed to single-segment repository names (Docker Hub: library)
  defaultNamespace?: string;
  // Alternate hosts tried for blob downloads when the redirect target fails
  cdnHosts: string[];
  // Path aliases accepted besides `id`
  aliases: string[];
}

export type RequestKind = 'blob' | 'manifest' | 'probe' | 'other';

export type HeaderMap = Record<string, string | string[] | undefined>;

/**
 * ResolvedRequest is one inbound request mapped onto its upstream registry
 */
export interface ResolvedRequest {
  registry: RegistryDescriptor;
  upstreamPath: string;
  // Query string including the leading '?', or ''
  query: string;
  method: string;
  kind: RequestKind;
  isBlob: boolean;
  isManifest: boolean;
  repository?: string;
  reference?: string;
  originalHeaders: HeaderMap;
  body?: Readable;
}

export interface AuthToken {
  registryId: string;
  scope: string;
  value: string;
  // Epoch milliseconds; absent means no known expiry
  expiresAt?: number;
}

/**
 * AuthGrant is what an upstream attempt sends for authentication
 */
export interface AuthGrant {
  headers: Record<string, string>;
  // Expiry of the token behind `headers`, epoch milliseconds
  expiresAt?: number;
}

export interface Credentials {
  username: string;
  password: string;
}

/**
 * BearerChallenge is a parsed `WWW-Authenticate: Bearer ...` header
 */
export interface BearerChallenge {
  realm: string;
  service?: string;
  scope?: string;
}

/**
 * UpstreamResponse is a response whose body has not been consumed yet
 */
export interface UpstreamResponse {
  status: number;
  headers: Record<string, string | string[]>;
  body: Readable;
  url: string;
}

export type UpstreamOutcome =
  | { kind: 'success'; response: UpstreamResponse }
  | { kind: 'redirect'; location: string; response: UpstreamResponse }
  | { kind: 'rate-limited'; response: UpstreamResponse }
  | { kind: 'unauthorized'; response: UpstreamResponse }
  | { kind: 'transport-error'; error: Error; timedOut: boolean; response?: UpstreamResponse };

export type OutcomeKind = UpstreamOutcome['kind'];

export interface RetryState {
  attempt: number;
  authRetried: boolean;
  hostsTried: Set<string>;
  lastError?: Error;
  backoffCount: number;
  lastDelayMs: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  // Fraction of the exponential delay added as random jitter, 0..1
  jitterRatio: number;
}

export interface TimeoutPolicy {
  manifestMs: number;
  blobMs: number;
}

export interface MirrorConfig {
  port: number;
  host: string;
  defaultRegistry?: string;
  hintHeader: string;
  registries: RegistryDescriptor[];
  credentials: Record<string, Credentials>;
  retry: RetryPolicy;
  timeouts: TimeoutPolicy;
  tokenCacheSize: number;
  userAgents: string[];
}

export interface RegistryErrorBody {
  errors: Array<{
    code: string;
    message: string;
    detail?: unknown;
  }>;
}
