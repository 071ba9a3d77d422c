/**
 * Registry Proxy - express middleware that resolves an inbound request,
 * runs it through the upstream pipeline and relays the answer
 */

import axios, { AxiosInstance } from 'axios';
import { Request, RequestHandler, Response } from 'express';
import { ClientAbortedError, errorMessage, MirrorError } from '../errors';
import { createLogger } from '../logger';
import { MirrorConfig, RegistryErrorBody, ResolvedRequest } from '../types';
import { AuthNegotiator } from './auth/negotiator';
import { TokenCache } from './auth/token-cache';
import { RegistryCatalog } from './catalog';
import { relayResponse } from './relay';
import { resolveRequest, ResolveOptions } from './resolver';
import { RetryEngine, Sleep } from './retry/engine';
import { UpstreamExecutor } from './upstream/executor';
import { RedirectHandler } from './upstream/redirect';

const logger = createLogger('proxy');

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export interface MirrorPipeline {
  catalog: RegistryCatalog;
  auth: AuthNegotiator;
  tokens: TokenCache;
  engine: RetryEngine;
  resolveOptions: ResolveOptions;
}

export interface PipelineOverrides {
  http?: AxiosInstance;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
}

/**
 * Wire catalog, auth, executor, redirect handler and retry engine
 */
export function createPipeline(config: MirrorConfig, overrides: PipelineOverrides = {}): MirrorPipeline {
  const http = overrides.http ?? axios.create();
  const catalog = new RegistryCatalog(config.registries);
  const tokens = new TokenCache(config.tokenCacheSize, overrides.now);
  const auth = new AuthNegotiator({
    http,
    cache: tokens,
    credentials: config.credentials,
    timeoutMs: config.timeouts.manifestMs,
    now: overrides.now,
  });
  const executor = new UpstreamExecutor(http);
  const engine = new RetryEngine({
    executor,
    redirects: new RedirectHandler(executor),
    auth,
    policy: config.retry,
    timeouts: config.timeouts,
    userAgents: config.userAgents,
    hintHeader: config.hintHeader,
    random: overrides.random,
    sleep: overrides.sleep,
    now: overrides.now,
  });

  return {
    catalog,
    auth,
    tokens,
    engine,
    resolveOptions: { defaultRegistry: config.defaultRegistry, hintHeader: config.hintHeader },
  };
}

function hasBody(req: Request): boolean {
  if (!BODY_METHODS.has(req.method.toUpperCase())) return false;
  const length = req.headers['content-length'];
  if (length !== undefined) return parseInt(length, 10) > 0;
  return req.headers['transfer-encoding'] !== undefined;
}

/**
 * Send an error as a Registry API error body, or cut the connection when
 * a relay has already started
 */
export function sendError(res: Response, error: unknown): void {
  if (res.headersSent) {
    res.destroy();
    return;
  }

  res.set('Docker-Distribution-API-Version', 'registry/2.0');
  if (error instanceof MirrorError) {
    res.status(error.status).json(error.toBody());
    return;
  }

  const body: RegistryErrorBody = {
    errors: [{ code: 'INTERNAL_ERROR', message: errorMessage(error) }],
  };
  res.status(500).json(body);
}

export function createRegistryProxy(pipeline: MirrorPipeline): RequestHandler {
  return async (req: Request, res: Response) => {
    const started = Date.now();

    let resolved: ResolvedRequest;
    try {
      resolved = resolveRequest(
        pipeline.catalog,
        { method: req.method, url: req.originalUrl, headers: req.headers },
        pipeline.resolveOptions
      );
    } catch (error) {
      logger.info({ method: req.method, url: req.originalUrl }, 'Unresolved request path');
      sendError(res, error);
      return;
    }

    if (hasBody(req)) {
      resolved.body = req;
    }

    logger.info(
      { method: resolved.method, registry: resolved.registry.id, path: resolved.upstreamPath, kind: resolved.kind },
      'Proxying request'
    );

    // Abandoned clients cancel sleeps, upstream calls and streams
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      const result = await pipeline.engine.run(resolved, controller.signal);
      await relayResponse(result.response, res, {
        registry: resolved.registry.id,
        path: resolved.upstreamPath,
      });
      logger.info(
        {
          registry: resolved.registry.id,
          path: resolved.upstreamPath,
          status: result.response.status,
          attempts: result.attempts,
          ms: Date.now() - started,
        },
        'Request completed'
      );
    } catch (error) {
      if (error instanceof ClientAbortedError) {
        logger.info({ registry: resolved.registry.id, path: resolved.upstreamPath }, 'Client disconnected');
        return;
      }
      logger.error(
        { registry: resolved.registry.id, path: resolved.upstreamPath, err: errorMessage(error) },
        'Request failed'
      );
      sendError(res, error);
    } finally {
      res.off('close', onClose);
    }
  };
}
