import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { RegistryCatalog } from '../catalog';
import { resolveRequest } from '../resolver';
import { initialState } from '../retry/machine';
import { headerOf, readAll, testConfig } from '../test-helpers';
import { RetryState } from '../../types';
import { UpstreamExecutor } from './executor';
import { RedirectHandler } from './redirect';

const STORAGE = 'https://storage.example.com/registry-v2/blobs/sha256/ab/data?sig=1&expires=2';
const CDN_A = 'https://cdn-a.example.com/registry-v2/blobs/sha256/ab/data?sig=1&expires=2';
const CDN_B = 'https://cdn-b.example.com/registry-v2/blobs/sha256/ab/data?sig=1&expires=2';

describe('RedirectHandler', () => {
  const catalog = new RegistryCatalog(testConfig().registries);
  const blob = resolveRequest(
    catalog,
    { method: 'GET', url: '/docker/library/alpine/blobs/sha256:ab', headers: {} },
    { hintHeader: 'x-registry-host' }
  );
  const manifest = resolveRequest(
    catalog,
    { method: 'GET', url: '/docker/library/alpine/manifests/latest', headers: {} },
    { hintHeader: 'x-registry-host' }
  );
  const sent = { authorization: 'Bearer test-token', range: 'bytes=0-1023', 'user-agent': 'test-agent/0' };

  let mock: MockAdapter;
  let handler: RedirectHandler;
  let state: RetryState;

  beforeEach(() => {
    const http = axios.create();
    mock = new MockAdapter(http);
    handler = new RedirectHandler(new UpstreamExecutor(http));
    state = initialState();
    state.attempt = 1;
  });

  afterEach(() => {
    mock.restore();
  });

  const follow = (request = blob, maxAttempts = 5) =>
    handler.follow(STORAGE, { request, headers: sent, timeoutMs: 1000, state, maxAttempts });

  test('drops Authorization and keeps Range on the storage request', async () => {
    mock.onGet(STORAGE).reply(206, 'layer-bytes');

    const outcome = await follow();

    expect(outcome.kind).toBe('success');
    if (outcome.kind !== 'success') return;
    await expect(readAll(outcome.response.body)).resolves.toBe('layer-bytes');
    expect(headerOf(mock.history.get[0], 'authorization')).toBeUndefined();
    expect(headerOf(mock.history.get[0], 'range')).toBe('bytes=0-1023');
    expect(state.attempt).toBe(2);
    expect(state.hostsTried.has('storage.example.com')).toBe(true);
  });

  test('follows nested redirects, spending an attempt on each', async () => {
    mock.onGet(STORAGE).reply(302, '', { location: CDN_B });
    mock.onGet(CDN_B).reply(200, 'ok');

    const outcome = await follow();

    expect(outcome.kind).toBe('success');
    expect(state.attempt).toBe(3);
    expect(mock.history.get.map((c) => c.url)).toEqual([STORAGE, CDN_B]);
  });

  test('falls back to CDN hosts when the storage host times out', async () => {
    mock.onGet(STORAGE).timeout();
    mock.onGet(CDN_A).reply(200, 'from-cdn');

    const outcome = await follow();

    expect(outcome.kind).toBe('success');
    if (outcome.kind !== 'success') return;
    await expect(readAll(outcome.response.body)).resolves.toBe('from-cdn');
    expect(mock.history.get.map((c) => c.url)).toEqual([STORAGE, CDN_A]);
    expect(headerOf(mock.history.get[1], 'authorization')).toBeUndefined();
  });

  test('treats a storage server error as a failed host', async () => {
    mock.onGet(STORAGE).reply(500, 'internal');
    mock.onGet(CDN_A).reply(200, 'from-cdn');

    const outcome = await follow();

    expect(outcome.kind).toBe('success');
    expect(mock.history.get.map((c) => c.url)).toEqual([STORAGE, CDN_A]);
  });

  test('reports a transport error once every host has failed', async () => {
    mock.onGet(STORAGE).networkError();
    mock.onGet(CDN_A).networkError();
    mock.onGet(CDN_B).reply(503, '');

    const outcome = await follow();

    expect(outcome.kind).toBe('transport-error');
    expect(mock.history.get).toHaveLength(3);
    expect(state.attempt).toBe(4);
  });

  test('stops falling back when the attempt budget is spent', async () => {
    state.attempt = 4;
    mock.onGet(STORAGE).networkError();
    mock.onGet(CDN_A).reply(200, 'unused');

    const outcome = await follow();

    expect(outcome.kind).toBe('transport-error');
    expect(mock.history.get).toHaveLength(1);
    expect(state.attempt).toBe(5);
  });

  test('does not use CDN hosts for manifests', async () => {
    mock.onGet(STORAGE).networkError();

    const outcome = await follow(manifest);

    expect(outcome.kind).toBe('transport-error');
    expect(mock.history.get).toHaveLength(1);
  });

  test('relays a storage 401 instead of treating it as a challenge', async () => {
    mock.onGet(STORAGE).reply(401, 'denied');

    const outcome = await follow();

    expect(outcome.kind).toBe('success');
    if (outcome.kind !== 'success') return;
    expect(outcome.response.status).toBe(401);
  });
});
