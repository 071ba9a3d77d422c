/**
 * HTTP server - mounts the mirror behind express
 */

import express, { Request, Response } from 'express';
import { Server } from 'http';
import { logger } from './logger';
import { createPipeline, createRegistryProxy, MirrorPipeline, PipelineOverrides } from './registry/proxy';
import { MirrorConfig } from './types';

export interface MirrorServer {
  app: express.Express;
  pipeline: MirrorPipeline;
  start: () => Promise<Server>;
}

export function createServer(config: MirrorConfig, overrides: PipelineOverrides = {}): MirrorServer {
  const pipeline = createPipeline(config, overrides);
  const app = express();

  app.disable('x-powered-by');

  // Docker probes the root on some setups; send it to the API root
  app.get('/', (req: Request, res: Response) => {
    res.redirect(301, '/v2/');
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // No body parsers: request bodies are streamed to the upstream untouched
  app.all('*', createRegistryProxy(pipeline));

  const start = (): Promise<Server> =>
    new Promise((resolve, reject) => {
      const server = app.listen(config.port, config.host, () => {
        logger.info(`Registry mirror listening on ${config.host}:${config.port}`);
        resolve(server);
      });
      server.on('error', reject);
    });

  return { app, pipeline, start };
}
