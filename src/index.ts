/**
 * Registry Mirror - Entry point
 */

import { loadConfig } from './config';
import { logger } from './logger';
import { createServer } from './server';

export { loadConfig } from './config';
export { createServer } from './server';
export { createPipeline, createRegistryProxy } from './registry/proxy';
export { RegistryCatalog, DEFAULT_REGISTRIES } from './registry/catalog';
export { resolveRequest } from './registry/resolver';
export * from './errors';
export * from './types';

if (require.main === module) {
  const { start } = createServer(loadConfig());

  logger.info('Starting registry mirror...');
  start().catch((err) => {
    logger.error('Failed to start server: %s', err);
    process.exitCode = 1;
  });
}
