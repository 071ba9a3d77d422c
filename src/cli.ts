#!/usr/bin/env node
/**
 * Registry Mirror CLI
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { RegistryCatalog } from './registry/catalog';
import { resolveRequest } from './registry/resolver';
import { createServer } from './server';
import { RegistryDescriptor, ResolvedRequest } from './types';

// package.json sits one level above both src/ and dist/
const packageJsonPath = path.join(__dirname, '..', 'package.json');
const VERSION: string = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8')).version;

export function formatResolution(resolved: ResolvedRequest): string {
  return JSON.stringify(
    {
      registry: resolved.registry.id,
      url: `https://${resolved.registry.primaryHost}${resolved.upstreamPath}${resolved.query}`,
      kind: resolved.kind,
      repository: resolved.repository,
      reference: resolved.reference,
    },
    null,
    2
  );
}

export function formatRegistries(registries: readonly RegistryDescriptor[]): string {
  return registries
    .map((r) => {
      const aliases = [r.id, ...r.aliases].join(',');
      const auth = r.requiresAuth ? 'auth' : 'anonymous';
      const cdn = r.cdnHosts.length > 0 ? r.cdnHosts.join(',') : '-';
      return `${aliases}\t${r.primaryHost}\t${auth}\t${cdn}`;
    })
    .join('\n');
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('registry-mirror')
    .description('Pull-through mirror for container image registries')
    .version(VERSION);

  program
    .command('serve')
    .description('Start the mirror server')
    .option('-p, --port <port>', 'Port to listen on')
    .option('-H, --host <host>', 'Address to bind')
    .action(async (options: { port?: string; host?: string }) => {
      const config = loadConfig({
        ...process.env,
        ...(options.port && { PORT: options.port }),
        ...(options.host && { HOST: options.host }),
      });
      await createServer(config).start();
    });

  program
    .command('resolve')
    .description('Show which upstream a request path maps to')
    .argument('<path>', 'Request path, e.g. /docker/library/ubuntu/manifests/latest')
    .option('-X, --method <method>', 'HTTP method', 'GET')
    .option('--registry-host <host>', 'Host hint for native /v2/ paths')
    .action((requestPath: string, options: { method: string; registryHost?: string }) => {
      const config = loadConfig();
      const headers: Record<string, string> = {};
      if (options.registryHost) {
        headers[config.hintHeader] = options.registryHost;
      }
      try {
        const resolved = resolveRequest(
          new RegistryCatalog(config.registries),
          { method: options.method, url: requestPath, headers },
          { defaultRegistry: config.defaultRegistry, hintHeader: config.hintHeader }
        );
        console.log(formatResolution(resolved));
      } catch (error) {
        console.error(errorMessage(error));
        process.exitCode = 1;
      }
    });

  program
    .command('registries')
    .alias('ls')
    .description('List configured upstream registries')
    .action(() => {
      console.log(formatRegistries(loadConfig().registries));
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync()
    .catch((error) => {
      logger.error('Command failed: %s', errorMessage(error));
      process.exitCode = 1;
    });
}
