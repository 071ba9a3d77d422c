/**
 * Shared fixtures for registry tests
 */

import { AxiosRequestConfig } from 'axios';
import { Readable } from 'stream';
import { DEFAULT_REGISTRIES } from './catalog';
import { MirrorConfig, RegistryDescriptor } from '../types';
import { Sleep } from './retry/engine';

const TEST_USER_AGENTS = ['test-agent/0', 'test-agent/1', 'test-agent/2'];

const TEST_DOCKER: RegistryDescriptor = {
  ...DEFAULT_REGISTRIES[0],
  cdnHosts: ['cdn-a.example.com', 'cdn-b.example.com'],
};

export function testConfig(overrides: Partial<MirrorConfig> = {}): MirrorConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    defaultRegistry: 'docker',
    hintHeader: 'x-registry-host',
    registries: [TEST_DOCKER, ...DEFAULT_REGISTRIES.slice(1)],
    credentials: {},
    retry: { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0.5 },
    timeouts: { manifestMs: 1000, blobMs: 5000 },
    tokenCacheSize: 100,
    userAgents: TEST_USER_AGENTS,
    ...overrides,
  };
}

/**
 * A sleep that returns at once and remembers what it was asked for
 */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  const sleep: Sleep = async (ms) => {
    delays.push(ms);
  };
  return { sleep, delays };
}

/**
 * Header value sent on a recorded request, matched case-insensitively
 */
export function headerOf(config: AxiosRequestConfig, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(config.headers ?? {})) {
    if (key.toLowerCase() === wanted && value !== undefined && value !== null) {
      return String(value);
    }
  }
  return undefined;
}

export function streamOf(text: string): Readable {
  return Readable.from([Buffer.from(text)]);
}

export async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
