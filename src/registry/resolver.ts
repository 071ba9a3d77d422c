/**
 * Path Resolver - maps an inbound request path onto an upstream registry
 *
 * Two request shapes are recognised:
 *   /{alias}/{rest...}   alias form, e.g. /quay/v2/coreos/etcd/manifests/latest
 *   /v2/{rest...}        native form, registry picked by host hint or default
 *
 * Pure: no I/O, no logging.
 */

import { RegistryCatalog } from './catalog';
import { UnresolvedPathError } from '../errors';
import { HeaderMap, RegistryDescriptor, RequestKind, ResolvedRequest } from '../types';

export interface ResolveInput {
  method: string;
  // Path with optional query string, as received
  url: string;
  headers: HeaderMap;
}

export interface ResolveOptions {
  defaultRegistry?: string;
  hintHeader: string;
}

interface Classification {
  kind: RequestKind;
  repository?: string;
  reference?: string;
}

const BLOB_PATH = /^\/v2\/(.+)\/blobs\/([^/]+)$/;
const MANIFEST_PATH = /^\/v2\/(.+)\/manifests\/([^/]+)$/;
// Repository-scoped endpoints whose name may need the default namespace
const NAMED_PATH = /^\/v2\/(.+)\/(manifests|blobs|tags|referrers)\/(.*)$/;

function headerValue(headers: HeaderMap, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

function splitUrl(url: string): [string, string] {
  const index = url.indexOf('?');
  if (index === -1) return [url, ''];
  return [url.substring(0, index), url.substring(index)];
}

/**
 * Turn the path left after an alias into a /v2 path
 */
function toV2Path(rest: string): string {
  if (rest === '' || rest === '/') return '/v2/';
  if (rest === '/v2' || rest === '/v2/' || rest.startsWith('/v2/')) {
    return rest === '/v2' ? '/v2/' : rest;
  }
  return `/v2${rest}`;
}

/**
 * Prefix single-segment repository names with the registry's namespace
 */
function applyDefaultNamespace(registry: RegistryDescriptor, path: string): string {
  if (!registry.defaultNamespace) return path;
  const match = NAMED_PATH.exec(path);
  if (!match) return path;
  const [, name, endpoint, rest] = match;
  if (name.includes('/')) return path;
  return `/v2/${registry.defaultNamespace}/${name}/${endpoint}/${rest}`;
}

export function classifyPath(path: string): Classification {
  if (path === '/v2/' || path === '/v2') {
    return { kind: 'probe' };
  }
  const blob = BLOB_PATH.exec(path);
  if (blob && blob[2] !== 'uploads' && !blob[1].endsWith('/blobs/uploads')) {
    return { kind: 'blob', repository: blob[1], reference: blob[2] };
  }
  const manifest = MANIFEST_PATH.exec(path);
  if (manifest) {
    return { kind: 'manifest', repository: manifest[1], reference: manifest[2] };
  }
  const named = NAMED_PATH.exec(path);
  if (named) {
    return { kind: 'other', repository: named[1] };
  }
  return { kind: 'other' };
}

export function resolveRequest(
  catalog: RegistryCatalog,
  input: ResolveInput,
  options: ResolveOptions
): ResolvedRequest {
  const [path, query] = splitUrl(input.url);
  const segments = path.split('/');
  const first = segments[1] ?? '';

  let registry: RegistryDescriptor | undefined;
  let upstreamPath: string;

  if (first === 'v2') {
    const hint = headerValue(input.headers, options.hintHeader);
    registry = hint
      ? catalog.byHint(hint)
      : options.defaultRegistry
        ? catalog.byPathAlias(options.defaultRegistry)
        : undefined;
    upstreamPath = path === '/v2' ? '/v2/' : path;
  } else {
    registry = first ? catalog.byPathAlias(first) : undefined;
    upstreamPath = toV2Path(path.substring(first.length + 1));
  }

  if (!registry) {
    throw new UnresolvedPathError(path);
  }

  upstreamPath = applyDefaultNamespace(registry, upstreamPath);
  const classification = classifyPath(upstreamPath);

  return {
    registry,
    upstreamPath,
    query,
    method: input.method.toUpperCase(),
    kind: classification.kind,
    isBlob: classification.kind === 'blob',
    isManifest: classification.kind === 'manifest',
    repository: classification.repository,
    reference: classification.reference,
    originalHeaders: input.headers,
  };
}
