import { TokenCache } from './token-cache';

describe('TokenCache', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1000;
  });

  test('returns a token until it expires', () => {
    const cache = new TokenCache(10, now);
    cache.set({ registryId: 'docker', scope: 'repository:a:pull', value: 'tok', expiresAt: 5000 });

    clock = 4999;
    expect(cache.get('docker', 'repository:a:pull')?.value).toBe('tok');

    clock = 5000;
    expect(cache.get('docker', 'repository:a:pull')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  test('keeps tokens without an expiry', () => {
    const cache = new TokenCache(10, now);
    cache.set({ registryId: 'quay', scope: 's', value: 'forever' });

    clock = Number.MAX_SAFE_INTEGER;
    expect(cache.get('quay', 's')?.value).toBe('forever');
  });

  test('keys tokens by registry and scope', () => {
    const cache = new TokenCache(10, now);
    cache.set({ registryId: 'docker', scope: 's', value: 'a' });
    cache.set({ registryId: 'quay', scope: 's', value: 'b' });

    expect(cache.get('docker', 's')?.value).toBe('a');
    expect(cache.get('quay', 's')?.value).toBe('b');
    expect(cache.get('docker', 'other')).toBeUndefined();
  });

  test('evicts the least recently used token when full', () => {
    const cache = new TokenCache(2, now);
    cache.set({ registryId: 'r', scope: 'one', value: '1' });
    cache.set({ registryId: 'r', scope: 'two', value: '2' });
    cache.get('r', 'one');
    cache.set({ registryId: 'r', scope: 'three', value: '3' });

    expect(cache.size).toBe(2);
    expect(cache.get('r', 'two')).toBeUndefined();
    expect(cache.get('r', 'one')?.value).toBe('1');
    expect(cache.get('r', 'three')?.value).toBe('3');
  });

  test('replaces and invalidates entries', () => {
    const cache = new TokenCache(10, now);
    cache.set({ registryId: 'r', scope: 's', value: 'old' });
    cache.set({ registryId: 'r', scope: 's', value: 'new' });
    expect(cache.get('r', 's')?.value).toBe('new');
    expect(cache.size).toBe(1);

    cache.invalidate('r', 's');
    expect(cache.get('r', 's')).toBeUndefined();
  });
});
