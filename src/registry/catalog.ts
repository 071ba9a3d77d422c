/**
 * Registry Catalog - static mapping from path aliases and host hints
 * to upstream registry descriptors
 */

import { RegistryDescriptor } from '../types';
import { ConfigError } from '../errors';

export const DEFAULT_REGISTRIES: RegistryDescriptor[] = [
  {
    id: 'docker',
    primaryHost: 'registry-1.docker.io',
    aliasHosts: ['docker.io', 'index.docker.io'],
    requiresAuth: true,
    authServerOverride: 'https://auth.docker.io/token',
    authService: 'registry.docker.io',
    defaultNamespace: 'library',
    // Blob redirects already land on Docker's CDN; no other host serves the signed URLs
    cdnHosts: [],
    aliases: [],
  },
  {
    id: 'quay',
    primaryHost: 'quay.io',
    aliasHosts: [],
    requiresAuth: false,
    cdnHosts: ['cdn01.quay.io', 'cdn02.quay.io', 'cdn03.quay.io'],
    aliases: [],
  },
  { id: 'gcr', primaryHost: 'gcr.io', aliasHosts: [], requiresAuth: false, cdnHosts: [], aliases: [] },
  { id: 'k8s-gcr', primaryHost: 'k8s.gcr.io', aliasHosts: [], requiresAuth: false, cdnHosts: [], aliases: [] },
  {
    id: 'registry-k8s',
    primaryHost: 'registry.k8s.io',
    aliasHosts: [],
    requiresAuth: false,
    cdnHosts: [],
    aliases: ['k8s'],
  },
  { id: 'ghcr', primaryHost: 'ghcr.io', aliasHosts: [], requiresAuth: false, cdnHosts: [], aliases: [] },
  {
    id: 'cloudsmith',
    primaryHost: 'docker.cloudsmith.io',
    aliasHosts: [],
    requiresAuth: false,
    cdnHosts: [],
    aliases: [],
  },
  { id: 'nvcr', primaryHost: 'nvcr.io', aliasHosts: [], requiresAuth: false, cdnHosts: [], aliases: [] },
  {
    id: 'gitlab',
    primaryHost: 'registry.gitlab.com',
    aliasHosts: [],
    requiresAuth: false,
    cdnHosts: [],
    aliases: [],
  },
];

export class RegistryCatalog {
  private readonly byAlias: Map<string, RegistryDescriptor> = new Map();
  private readonly byHost: Map<string, RegistryDescriptor> = new Map();
  private readonly registries: readonly RegistryDescriptor[];

  constructor(registries: RegistryDescriptor[] = DEFAULT_REGISTRIES) {
    this.registries = Object.freeze(registries.map((r) => Object.freeze({ ...r })));
    for (const registry of this.registries) {
      for (const alias of [registry.id, ...registry.aliases]) {
        this.byAlias.set(alias.toLowerCase(), registry);
      }
      for (const host of [registry.primaryHost, ...registry.aliasHosts]) {
        this.byHost.set(host.toLowerCase(), registry);
      }
    }
  }

  /**
   * Look up a registry by its path alias
   */
  byPathAlias(alias: string): RegistryDescriptor | undefined {
    return this.byAlias.get(alias.toLowerCase());
  }

  /**
   * Look up a registry from a host hint; accepts aliases as well as hosts
   */
  byHint(hint: string): RegistryDescriptor | undefined {
    const key = hint.trim().toLowerCase();
    return this.byHost.get(key) ?? this.byAlias.get(key);
  }

  get(id: string): RegistryDescriptor | undefined {
    return this.registries.find((r) => r.id === id);
  }

  list(): readonly RegistryDescriptor[] {
    return this.registries;
  }
}

function stringList(value: unknown, field: string, id: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`Registry ${id}: ${field} must be an array of strings`);
  }
  return value;
}

function optionalString(value: unknown, field: string, id: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Registry ${id}: ${field} must be a string`);
  }
  return value;
}

/**
 * Validate one catalog entry read from a JSON file
 */
export function parseRegistryEntry(entry: unknown): RegistryDescriptor {
  if (typeof entry !== 'object' || entry === null) {
    throw new ConfigError('Registry entry must be an object');
  }
  const raw: Record<string, unknown> = { ...entry };
  if (typeof raw.id !== 'string' || !raw.id) {
    throw new ConfigError('Registry entry is missing id');
  }
  const id = raw.id;
  if (typeof raw.primaryHost !== 'string' || !raw.primaryHost) {
    throw new ConfigError(`Registry ${id} is missing primaryHost`);
  }

  return {
    id,
    primaryHost: raw.primaryHost,
    aliasHosts: stringList(raw.aliasHosts, 'aliasHosts', id),
    requiresAuth: raw.requiresAuth === true,
    authServerOverride: optionalString(raw.authServerOverride, 'authServerOverride', id),
    authService: optionalString(raw.authService, 'authService', id),
    defaultNamespace: optionalString(raw.defaultNamespace, 'defaultNamespace', id),
    cdnHosts: stringList(raw.cdnHosts, 'cdnHosts', id),
    aliases: stringList(raw.aliases, 'aliases', id),
  };
}
