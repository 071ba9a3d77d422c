/**
 * Configuration - read once from the environment at startup
 */

import * as fs from 'fs';
import { ConfigError } from './errors';
import { createLogger } from './logger';
import { DEFAULT_REGISTRIES, parseRegistryEntry } from './registry/catalog';
import { DEFAULT_USER_AGENTS } from './registry/upstream/headers';
import { Credentials, MirrorConfig, RegistryDescriptor } from './types';

const logger = createLogger('config');

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    logger.warn({ name, value: raw, fallback }, 'Invalid number in environment, using default');
    return fallback;
  }
  return value;
}

function ratioFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseFloat(raw);
  if (Number.isNaN(value) || value < 0 || value > 1) {
    logger.warn({ name, value: raw, fallback }, 'Ratio must be between 0 and 1, using default');
    return fallback;
  }
  return value;
}

/**
 * Load a registry catalog from a JSON file: either an array of entries or
 * `{ "registries": [...] }`
 */
export function loadCatalogFile(file: string): RegistryDescriptor[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read registry catalog ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const entries =
    typeof parsed === 'object' && parsed !== null && 'registries' in parsed ? parsed.registries : parsed;
  if (!Array.isArray(entries)) {
    throw new ConfigError(`Registry catalog ${file} must hold an array of registries`);
  }
  return entries.map((entry: unknown) => parseRegistryEntry(entry));
}

export function loadConfig(env: Env = process.env): MirrorConfig {
  const registries = env.REGISTRY_CATALOG_FILE ? loadCatalogFile(env.REGISTRY_CATALOG_FILE) : DEFAULT_REGISTRIES;

  const credentials: Record<string, Credentials> = {};
  if (env.DOCKERHUB_USERNAME && env.DOCKERHUB_PASSWORD) {
    credentials.docker = { username: env.DOCKERHUB_USERNAME, password: env.DOCKERHUB_PASSWORD };
  } else {
    logger.info('No Docker Hub credentials configured, using anonymous access');
  }

  const userAgents = env.USER_AGENTS
    ? env.USER_AGENTS.split('|').map((ua) => ua.trim()).filter(Boolean)
    : DEFAULT_USER_AGENTS;

  // An empty DEFAULT_REGISTRY turns off native /v2/ routing without a hint
  const defaultRegistry = env.DEFAULT_REGISTRY === undefined ? 'docker' : env.DEFAULT_REGISTRY || undefined;
  if (defaultRegistry && !registries.some((r) => r.id === defaultRegistry || r.aliases.includes(defaultRegistry))) {
    throw new ConfigError(`DEFAULT_REGISTRY ${defaultRegistry} is not in the registry catalog`);
  }

  const baseDelayMs = intFrom(env, 'BACKOFF_BASE_MS', 500);

  return {
    port: intFrom(env, 'PORT', 8080),
    host: env.HOST || '0.0.0.0',
    defaultRegistry,
    hintHeader: (env.REGISTRY_HINT_HEADER || 'x-registry-host').toLowerCase(),
    registries,
    credentials,
    retry: {
      maxAttempts: intFrom(env, 'MAX_ATTEMPTS', 5, 1),
      baseDelayMs,
      maxDelayMs: Math.max(baseDelayMs, intFrom(env, 'BACKOFF_MAX_MS', 10000)),
      jitterRatio: ratioFrom(env, 'BACKOFF_JITTER', 0.5),
    },
    timeouts: {
      manifestMs: intFrom(env, 'MANIFEST_TIMEOUT_MS', 30000, 1),
      blobMs: intFrom(env, 'BLOB_TIMEOUT_MS', 300000, 1),
    },
    tokenCacheSize: intFrom(env, 'TOKEN_CACHE_SIZE', 1000, 1),
    userAgents: userAgents.length > 0 ? userAgents : DEFAULT_USER_AGENTS,
  };
}
