import express from 'express';
import request from 'supertest';
import { UpstreamResponse } from '../types';
import { relayResponse } from './relay';
import { streamOf } from './test-helpers';

function appRelaying(upstream: () => UpstreamResponse): express.Express {
  const app = express();
  app.get('/relay', async (req, res) => {
    await relayResponse(upstream(), res, { registry: 'quay', path: '/v2/' });
  });
  return app;
}

describe('relayResponse', () => {
  it('should copy status, body and end-to-end headers', async () => {
    const app = appRelaying(() => ({
      status: 206,
      headers: {
        'content-type': 'text/plain',
        'content-range': 'bytes 0-4/10',
        etag: '"layer"',
        upgrade: 'h2c',
        'proxy-authenticate': 'Basic',
      },
      body: streamOf('hello'),
      url: 'https://quay.io/v2/',
    }));

    const response = await request(app).get('/relay');

    expect(response.status).toBe(206);
    expect(response.text).toBe('hello');
    expect(response.headers['content-range']).toBe('bytes 0-4/10');
    expect(response.headers.etag).toBe('"layer"');
    expect(response.headers.upgrade).toBeUndefined();
    expect(response.headers['proxy-authenticate']).toBeUndefined();
    expect(response.headers['docker-distribution-api-version']).toBe('registry/2.0');
  });

  it('should keep the upstream API version header', async () => {
    const app = appRelaying(() => ({
      status: 200,
      headers: { 'docker-distribution-api-version': 'registry/2.1', 'content-type': 'text/plain' },
      body: streamOf('ok'),
      url: 'https://quay.io/v2/',
    }));

    const response = await request(app).get('/relay');

    expect(response.text).toBe('ok');
    expect(response.headers['docker-distribution-api-version']).toBe('registry/2.1');
  });

  it('should relay rate-limited responses unchanged', async () => {
    const app = appRelaying(() => ({
      status: 429,
      headers: { 'content-type': 'text/plain', 'ratelimit-remaining': '0;w=21600', 'retry-after': '30' },
      body: streamOf('slow down'),
      url: 'https://quay.io/v2/',
    }));

    const response = await request(app).get('/relay');

    expect(response.status).toBe(429);
    expect(response.text).toBe('slow down');
    expect(response.headers['retry-after']).toBe('30');
  });
});
