import { UnresolvedPathError } from '../errors';
import { RegistryCatalog } from './catalog';
import { classifyPath, resolveRequest } from './resolver';

describe('resolveRequest', () => {
  const catalog = new RegistryCatalog();
  const options = { defaultRegistry: 'docker', hintHeader: 'x-registry-host' };

  const resolve = (url: string, headers: Record<string, string> = {}, method = 'GET') =>
    resolveRequest(catalog, { method, url, headers }, options);

  test('maps the alias form onto the registry /v2 path', () => {
    const resolved = resolve('/docker/library/ubuntu/manifests/latest');

    expect(resolved.registry.id).toBe('docker');
    expect(resolved.upstreamPath).toBe('/v2/library/ubuntu/manifests/latest');
    expect(resolved.kind).toBe('manifest');
    expect(resolved.isManifest).toBe(true);
    expect(resolved.isBlob).toBe(false);
    expect(resolved.repository).toBe('library/ubuntu');
    expect(resolved.reference).toBe('latest');
  });

  test('keeps an explicit /v2 segment after the alias', () => {
    const resolved = resolve('/quay/v2/coreos/etcd/manifests/v3.5.0');

    expect(resolved.registry.primaryHost).toBe('quay.io');
    expect(resolved.upstreamPath).toBe('/v2/coreos/etcd/manifests/v3.5.0');
  });

  test('routes native /v2 paths to the default registry with the library namespace', () => {
    const resolved = resolve('/v2/alpine/blobs/sha256:abc123');

    expect(resolved.registry.id).toBe('docker');
    expect(resolved.upstreamPath).toBe('/v2/library/alpine/blobs/sha256:abc123');
    expect(resolved.kind).toBe('blob');
    expect(resolved.repository).toBe('library/alpine');
    expect(resolved.reference).toBe('sha256:abc123');
  });

  test('picks the registry from the host hint header', () => {
    const resolved = resolve('/v2/coreos/etcd/tags/list', { 'x-registry-host': 'quay.io' });

    expect(resolved.registry.id).toBe('quay');
    expect(resolved.kind).toBe('other');
    expect(resolved.repository).toBe('coreos/etcd');
  });

  test('accepts secondary aliases', () => {
    expect(resolve('/k8s/pause/manifests/3.9').registry.primaryHost).toBe('registry.k8s.io');
  });

  test('splits off the query string', () => {
    const resolved = resolve('/ghcr/v2/owner/app/tags/list?n=10&last=v1');

    expect(resolved.upstreamPath).toBe('/v2/owner/app/tags/list');
    expect(resolved.query).toBe('?n=10&last=v1');
  });

  test('treats the bare alias as the API probe', () => {
    const resolved = resolve('/quay');

    expect(resolved.upstreamPath).toBe('/v2/');
    expect(resolved.kind).toBe('probe');
  });

  test('upper-cases the method', () => {
    expect(resolve('/quay/v2/', {}, 'head').method).toBe('HEAD');
  });

  test('rejects unknown aliases', () => {
    expect(() => resolve('/foo/bar')).toThrow(UnresolvedPathError);
  });

  test('rejects an unknown host hint', () => {
    expect(() => resolve('/v2/alpine/manifests/latest', { 'x-registry-host': 'unknown.example.com' })).toThrow(
      UnresolvedPathError
    );
  });

  test('rejects native paths when no default registry is set', () => {
    expect(() =>
      resolveRequest(
        catalog,
        { method: 'GET', url: '/v2/alpine/manifests/latest', headers: {} },
        { hintHeader: 'x-registry-host' }
      )
    ).toThrow(UnresolvedPathError);
  });
});

describe('classifyPath', () => {
  test('classifies the probe', () => {
    expect(classifyPath('/v2/')).toEqual({ kind: 'probe' });
  });

  test('does not treat upload sessions as blobs', () => {
    expect(classifyPath('/v2/library/ubuntu/blobs/uploads/')).toEqual({
      kind: 'other',
      repository: 'library/ubuntu',
    });
    expect(classifyPath('/v2/library/ubuntu/blobs/uploads')).toEqual({
      kind: 'other',
      repository: 'library/ubuntu',
    });
  });

  test('handles nested repository names', () => {
    expect(classifyPath('/v2/a/b/c/manifests/sha256:def')).toEqual({
      kind: 'manifest',
      repository: 'a/b/c',
      reference: 'sha256:def',
    });
  });

  test('falls back to other for unknown paths', () => {
    expect(classifyPath('/v2/_catalog')).toEqual({ kind: 'other' });
  });
});
