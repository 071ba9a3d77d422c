/**
 * WWW-Authenticate challenge parsing
 */

import { BearerChallenge } from '../../types';

// key="quoted value" or key=token, separated by commas
const PARAM = /([a-zA-Z_][\w-]*)\s*=\s*(?:"((?:\\.|[^"\\])*)"|([^\s,]+))/g;

export function parseAuthParams(params: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const match of params.matchAll(PARAM)) {
    const key = match[1].toLowerCase();
    const value = match[2] !== undefined ? match[2].replace(/\\(.)/g, '$1') : match[3];
    result[key] = value;
  }
  return result;
}

/**
 * Parse a Bearer challenge; returns null for other schemes or a missing realm
 */
export function parseBearerChallenge(header: string | undefined): BearerChallenge | null {
  if (!header) return null;
  const trimmed = header.trim();
  const space = trimmed.indexOf(' ');
  if (space === -1) return null;

  const scheme = trimmed.substring(0, space);
  if (scheme.toLowerCase() !== 'bearer') return null;

  const params = parseAuthParams(trimmed.substring(space + 1));
  if (!params.realm) return null;

  return {
    realm: params.realm,
    service: params.service || undefined,
    scope: params.scope || undefined,
  };
}

/**
 * Scope requested for a repository: pull for reads, pull,push otherwise
 */
export function scopeFor(repository: string, method: string): string {
  const read = method === 'GET' || method === 'HEAD';
  return `repository:${repository}:${read ? 'pull' : 'pull,push'}`;
}
