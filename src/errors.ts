/**
 * Error kinds surfaced by the mirror, each mapped to a client status
 * and a Registry API error code
 */

import { RegistryErrorBody } from './types';

export class MirrorError extends Error {
  readonly status: number;
  readonly code: string;
  readonly detail?: unknown;

  constructor(message: string, status: number, code: string, detail?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.detail = detail;
  }

  toBody(): RegistryErrorBody {
    return {
      errors: [{ code: this.code, message: this.message, detail: this.detail }],
    };
  }
}

export class UnresolvedPathError extends MirrorError {
  constructor(path: string) {
    super(`No registry matches path ${path}`, 404, 'NAME_UNKNOWN', { path });
  }
}

export class AuthFailedError extends MirrorError {
  constructor(message: string, detail?: unknown) {
    super(message, 401, 'UNAUTHORIZED', detail);
  }
}

export class RateLimitedError extends MirrorError {
  constructor(message: string, detail?: unknown) {
    super(message, 429, 'TOOMANYREQUESTS', detail);
  }
}

export class UpstreamTransportError extends MirrorError {
  readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, detail?: unknown) {
    super(message, timedOut ? 504 : 502, 'UPSTREAM_UNAVAILABLE', detail);
    this.timedOut = timedOut;
  }
}

export class RedirectExhaustedError extends MirrorError {
  constructor(hostsTried: string[]) {
    super('All blob download hosts failed', 502, 'BLOB_UNAVAILABLE', { hostsTried });
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ClientAbortedError extends MirrorError {
  constructor() {
    super('Client closed the connection', 499, 'CLIENT_CLOSED');
  }
}
