import { buildProgram, formatRegistries, formatResolution } from './cli';
import { DEFAULT_REGISTRIES, RegistryCatalog } from './registry/catalog';
import { resolveRequest } from './registry/resolver';

describe('cli', () => {
  test('formats a resolution as JSON', () => {
    const resolved = resolveRequest(
      new RegistryCatalog(),
      { method: 'GET', url: '/docker/ubuntu/manifests/latest', headers: {} },
      { hintHeader: 'x-registry-host' }
    );

    expect(JSON.parse(formatResolution(resolved))).toEqual({
      registry: 'docker',
      url: 'https://registry-1.docker.io/v2/library/ubuntu/manifests/latest',
      kind: 'manifest',
      repository: 'library/ubuntu',
      reference: 'latest',
    });
  });

  test('formats the registry table', () => {
    const k8s = DEFAULT_REGISTRIES.filter((r) => r.id === 'registry-k8s');

    expect(formatRegistries([DEFAULT_REGISTRIES[0], ...k8s])).toBe(
      'docker\tregistry-1.docker.io\tauth\t-\n' +
        'registry-k8s,k8s\tregistry.k8s.io\tanonymous\t-'
    );
  });

  test('registers the commands', () => {
    expect(buildProgram().commands.map((c) => c.name())).toEqual(['serve', 'resolve', 'registries']);
  });

  describe('resolve command', () => {
    let log: jest.SpyInstance;
    let error: jest.SpyInstance;
    const exitCode = process.exitCode;

    beforeEach(() => {
      log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      log.mockRestore();
      error.mockRestore();
      process.exitCode = exitCode;
    });

    test('prints where a path goes', async () => {
      await buildProgram().parseAsync(['node', 'registry-mirror', 'resolve', '/quay/coreos/etcd/blobs/sha256:abc']);

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
        registry: 'quay',
        url: 'https://quay.io/v2/coreos/etcd/blobs/sha256:abc',
        kind: 'blob',
      });
    });

    test('reports unknown paths', async () => {
      await buildProgram().parseAsync(['node', 'registry-mirror', 'resolve', '/foo/bar']);

      expect(error).toHaveBeenCalledWith('No registry matches path /foo/bar');
      expect(process.exitCode).toBe(1);
    });
  });
});
