/**
 * Header handling for upstream requests and relayed responses
 */

import { HeaderMap, RequestKind } from '../../types';

// Connection-scoped headers; never forwarded in either direction
const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

const RATE_LIMIT_HEADER = /^(x-)?ratelimit-|^retry-after$|^docker-ratelimit-source$/;

export const DEFAULT_USER_AGENTS = [
  'docker/24.0.7 go/go1.20.10 git-commit/311b9ff kernel/6.5.0 os/linux arch/amd64 UpstreamClient(Docker-Client/24.0.7 \\(linux\\))',
  'docker/20.10.12 go/go1.16.12 git-commit/459d0df kernel/5.10.47 os/linux arch/amd64 UpstreamClient(Docker-Client/20.10.12 \\(linux\\))',
  'containerd/v1.7.11',
  'buildkit/v0.12.4',
];

const BLOB_ACCEPT = [
  'application/octet-stream',
  'application/vnd.docker.image.rootfs.diff.tar.gzip',
  'application/vnd.oci.image.layer.v1.tar+gzip',
].join(', ');

const MANIFEST_ACCEPT = [
  'application/vnd.docker.distribution.manifest.v2+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.oci.image.index.v1+json',
  'application/json',
].join(', ');

export function defaultAccept(kind: RequestKind): string | undefined {
  if (kind === 'blob') return BLOB_ACCEPT;
  if (kind === 'manifest') return MANIFEST_ACCEPT;
  return undefined;
}

export interface UpstreamHeaderOptions {
  kind: RequestKind;
  userAgent: string;
  auth: Record<string, string>;
  hasBody: boolean;
  // Inbound-only headers such as the registry hint
  drop?: string[];
}

/**
 * Build the header set for an upstream call from the client's headers
 */
export function buildUpstreamHeaders(inbound: HeaderMap, options: UpstreamHeaderOptions): Record<string, string> {
  const drop = new Set(['host', 'authorization', ...(options.drop ?? []).map((h) => h.toLowerCase())]);
  if (!options.hasBody) {
    drop.add('content-length');
    drop.add('content-type');
  }

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(inbound)) {
    const key = name.toLowerCase();
    if (value === undefined || HOP_BY_HOP.has(key) || drop.has(key)) continue;
    headers[key] = Array.isArray(value) ? value.join(', ') : value;
  }

  headers['docker-distribution-api-version'] = 'registry/2.0';
  headers['user-agent'] = options.userAgent;
  const accept = defaultAccept(options.kind);
  if (!headers.accept && accept) {
    headers.accept = accept;
  }
  for (const [name, value] of Object.entries(options.auth)) {
    headers[name.toLowerCase()] = value;
  }
  return headers;
}

/**
 * Headers for a redirected request: storage URLs are pre-signed and must
 * not carry registry credentials
 */
export function redirectHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === 'authorization') continue;
    result[name] = value;
  }
  return result;
}

const MINIMAL = new Set(['accept', 'user-agent', 'authorization', 'range', 'docker-distribution-api-version']);

export function minimalHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (MINIMAL.has(name.toLowerCase())) {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Lower-case header names and flatten values to strings
 */
export function normalizeHeaders(raw: object): Record<string, string | string[]> {
  const entries: Array<[string, unknown]> = Object.entries(raw);
  const result: Record<string, string | string[]> = {};
  for (const [name, value] of entries) {
    if (value === undefined || value === null) continue;
    result[name.toLowerCase()] = Array.isArray(value) ? value.map(String) : String(value);
  }
  return result;
}

/**
 * Response headers safe to copy to the client
 */
export function relayHeaders(headers: Record<string, string | string[]>): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (HOP_BY_HOP.has(name.toLowerCase())) continue;
    result[name] = value;
  }
  return result;
}

export function rateLimitHeaders(headers: Record<string, string | string[]>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (RATE_LIMIT_HEADER.test(key)) {
      result[key] = Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return result;
}

export function hasRateLimitHeaders(headers: Record<string, string | string[]>): boolean {
  return Object.keys(rateLimitHeaders(headers)).length > 0;
}

/**
 * True when headers say the quota is spent: a Retry-After, or a
 * remaining count of zero (Docker Hub sends `ratelimit-remaining: 0;w=21600`)
 */
export function quotaExhausted(headers: Record<string, string | string[]>): boolean {
  if (headerString(headers, 'retry-after') !== undefined) return true;
  const remaining = headerString(headers, 'ratelimit-remaining') ?? headerString(headers, 'x-ratelimit-remaining');
  if (remaining === undefined) return false;
  return parseInt(remaining, 10) === 0;
}

export function headerString(headers: Record<string, string | string[]>, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
