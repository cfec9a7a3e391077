import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import App from '../app';
import { loadConfig } from '../config';
import { PremiumService } from '../services/premium.service';
import { InMemoryPremiumStore, sampleEntries } from './helpers/memory-store';

const now = new Date(2023, 9, 1);
const json = { headers: { 'Content-Type': 'application/json' } };

describe('Premium API', () => {
  let store: InMemoryPremiumStore;
  let server: Server;
  let client: AxiosInstance;

  beforeAll(async () => {
    store = new InMemoryPremiumStore();
    const service = new PremiumService(
      store,
      { path: './premium_tables.xlsx', sheet: 'matrix' },
      () => now,
      async () => sampleEntries()
    );
    const { app } = new App(loadConfig({ NODE_ENV: 'test' }), service);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    client = axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      validateStatus: () => true,
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  beforeEach(async () => {
    store.failure = undefined;
    await store.clear();
    await store.replaceAll(sampleEntries());
  });

  it('answers the liveness probe', async () => {
    const res = await client.get('/');

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: 'ok' });
  });

  describe('POST /api/v1/healths/premiums', () => {
    it('returns the premium for the applicant', async () => {
      const res = await client.post(
        '/api/v1/healths/premiums',
        { code: '1A', sumInsured: '100000', dateOfBirth: '1977-09-14' },
        json
      );

      expect(res.status).toBe(200);
      expect(res.data).toEqual({
        success: true,
        data: {
          code: '1A',
          sumInsured: '100000',
          age: 46,
          ageBand: 3,
          premium: '750',
          calculatedAt: now.toISOString(),
        },
      });
    });

    it('accepts a charset on the content type', async () => {
      const res = await client.post(
        '/api/v1/healths/premiums',
        { code: '1A', sumInsured: '100000', dateOfBirth: '1990-06-07' },
        { headers: { 'Content-Type': 'application/json; charset=utf-8' } }
      );

      expect(res.status).toBe(200);
      expect(res.data.data.premium).toBe('450');
    });

    it('rejects a request that is not JSON', async () => {
      const res = await client.post('/api/v1/healths/premiums', 'code=1A', {
        headers: { 'Content-Type': 'text/plain' },
      });

      expect(res.status).toBe(415);
      expect(res.data).toEqual({
        success: false,
        code: '003',
        message: 'Header content-type not provided or invalid',
      });
    });

    it('rejects a malformed JSON body', async () => {
      const res = await client.post('/api/v1/healths/premiums', '{"code":', json);

      expect(res.status).toBe(400);
      expect(res.data).toEqual({ success: false, code: '002', message: 'Invalid request' });
    });

    it('lists the first problem with each field', async () => {
      const res = await client.post(
        '/api/v1/healths/premiums',
        { code: '1A', sumInsured: 100000 },
        json
      );

      expect(res.status).toBe(400);
      expect(res.data).toEqual({
        success: false,
        code: '002',
        message: 'Invalid request',
        errors: [
          { field: 'sumInsured', message: 'Sum insured must be a string' },
          { field: 'dateOfBirth', message: 'Date of birth must be a string' },
        ],
      });
    });

    it('rejects a date of birth that is not on the calendar', async () => {
      const res = await client.post(
        '/api/v1/healths/premiums',
        { code: '1A', sumInsured: '100000', dateOfBirth: '1990-02-30' },
        json
      );

      expect(res.status).toBe(400);
      expect(res.data.errors).toEqual([{ field: 'dateOfBirth', message: 'Date of birth is not a calendar date' }]);
    });

    it('cannot price an applicant under 18', async () => {
      const res = await client.post(
        '/api/v1/healths/premiums',
        { code: '1A', sumInsured: '100000', dateOfBirth: '2010-01-01' },
        json
      );

      expect(res.status).toBe(422);
      expect(res.data).toEqual({ success: false, code: '004', message: 'Cannot calculate risk for input' });
    });

    it('hides store failures behind an internal error', async () => {
      store.failure = new Error('connect ECONNREFUSED');

      const res = await client.post(
        '/api/v1/healths/premiums',
        { code: '1A', sumInsured: '100000', dateOfBirth: '1977-09-14' },
        json
      );

      expect(res.status).toBe(500);
      expect(res.data).toEqual({ success: false, code: '001', message: 'Internal server error' });
    });
  });

  describe('rate matrix management', () => {
    it('unloads, checks and reloads the matrix', async () => {
      const unloaded = await client.post('/api/v1/healths/premiums/unloads');
      expect(unloaded.status).toBe(200);
      expect(unloaded.data).toEqual({ success: true, data: { deleted: 2 }, message: 'Premium tables unloaded' });

      const empty = await client.get('/api/v1/healths/premiums/checks');
      expect(empty.data).toEqual({ success: true, data: { loaded: false, keys: 0 } });

      const loaded = await client.post('/api/v1/healths/premiums/loads');
      expect(loaded.status).toBe(200);
      expect(loaded.data).toEqual({ success: true, data: { keys: 2, entries: 14 }, message: 'Premium tables loaded' });

      const full = await client.get('/api/v1/healths/premiums/checks');
      expect(full.data).toEqual({ success: true, data: { loaded: true, keys: 2 } });
    });

    it('reports a load failure with code 001', async () => {
      store.failure = new Error('READONLY');

      const res = await client.post('/api/v1/healths/premiums/loads');

      expect(res.status).toBe(500);
      expect(res.data.code).toBe('001');
    });
  });

  describe('health and docs', () => {
    it('reports Redis reachability', async () => {
      const up = await client.get('/api/v1/health');
      expect(up.status).toBe(200);
      expect(up.data.redis).toBe('up');

      store.failure = new Error('connect ECONNREFUSED');
      const down = await client.get('/api/v1/health');
      expect(down.status).toBe(503);
      expect(down.data.redis).toBe('down');
    });

    it('serves the OpenAPI document', async () => {
      const res = await client.get('/api-docs.json');

      expect(res.status).toBe(200);
      expect(res.data.openapi).toBe('3.0.0');
      expect(res.data.info.title).toBe('Premium API');
    });

    it('answers unknown routes with 404', async () => {
      const res = await client.get('/api/v1/quotes');

      expect(res.status).toBe(404);
      expect(res.data).toEqual({ success: false, message: 'Route /api/v1/quotes not found' });
    });
  });
});
