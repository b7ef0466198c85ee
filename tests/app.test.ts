import { generateKeyPairSync } from 'crypto';
import { Server } from 'http';
import axios from 'axios';
import FormData from 'form-data';
import jwt from 'jsonwebtoken';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { AppDeps, createApp } from '../src/app';
import { createJwtAuth } from '../src/middleware/jwtAuth';
import { ConversionService } from '../src/services/conversionService';
import { PipelineService } from '../src/services/pipelineService';
import { UploadService } from '../src/services/uploadService';
import { PipelineReport, RequestFields } from '../src/types';
import { createFakeRasterizer, FakeRasterizer, makeTempDir, MemoryStore, removeDir } from './mocks';

async function listen(deps: AppDeps): Promise<{ server: Server; baseUrl: string }> {
  const server = createApp(deps).listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server did not bind a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function formOf(fields: Record<string, string | string[]>): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      form.append(name, item);
    }
  }
  return form;
}

const FIELDS = {
  pdf: 'uploads/doc.pdf',
  normal: 'out/prefix%d.jpg',
  small: 'out/prefix%d-small.jpg',
  large: 'out/prefix%d-large.jpg'
};

describe('HTTP API', () => {
  let scratchDir: string;
  let store: MemoryStore;
  let rasterizer: FakeRasterizer;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    scratchDir = await makeTempDir();
    store = new MemoryStore();
    store.sources.set('uploads/doc.pdf', Buffer.from('%PDF-1.4'));
    rasterizer = createFakeRasterizer(2);

    const pipeline = new PipelineService({
      store,
      conversion: new ConversionService(rasterizer, { conversionWorkers: 2, smallVariantSource: 'normal' }),
      upload: new UploadService(store, { uploadWorkers: 10 }),
      scratchDir
    });
    ({ server, baseUrl } = await listen({
      pipeline,
      store,
      rasterizer,
      rateLimitWindowMs: 60000,
      rateLimitMaxRequests: 1000
    }));
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await removeDir(scratchDir);
  });

  it('answers the liveness probe', async () => {
    const response = await axios.get(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ status: 'ok' });
  });

  it('reports a down dependency on the readiness probe', async () => {
    store.healthy = false;

    const response = await axios.get(`${baseUrl}/health`, { validateStatus: () => true });

    expect(response.status).toBe(503);
    expect(response.data).toMatchObject({ status: 'error', services: { storage: 'down', rasterizer: 'up' } });
  });

  it('converts a document posted as form fields', async () => {
    const form = formOf(FIELDS);

    const response = await axios.post(`${baseUrl}/convert`, form, { headers: form.getHeaders() });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      status: 'completed',
      pageCount: 2,
      objects: [
        'out/prefix1-large.jpg',
        'out/prefix1-small.jpg',
        'out/prefix1.jpg',
        'out/prefix2-large.jpg',
        'out/prefix2-small.jpg',
        'out/prefix2.jpg'
      ],
      failures: []
    });
  });

  it('accepts the same fields as JSON', async () => {
    const response = await axios.post(`${baseUrl}/convert`, FIELDS);

    expect(response.status).toBe(200);
    expect(store.objects.size).toBe(6);
  });

  it('rejects a field supplied twice with 400 and no store access', async () => {
    const form = formOf({ ...FIELDS, small: ['out/a%d.jpg', 'out/b%d.jpg'] });

    const response = await axios.post(`${baseUrl}/convert`, form, {
      headers: form.getHeaders(),
      validateStatus: () => true
    });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      error: 'ValidationFailure',
      code: 'VALIDATION_FAILURE',
      message: "Must specify exactly one value in the 'small' field",
      details: { field: 'small', count: 2 }
    });
    expect(store.fetch).not.toHaveBeenCalled();
  });

  it('returns the partial report with status 500 when pages are lost', async () => {
    rasterizer.rasterizePage.mockRejectedValueOnce(new Error('gs crashed'));

    const response = await axios.post(`${baseUrl}/convert`, FIELDS, { validateStatus: () => true });

    expect(response.status).toBe(500);
    expect(response.data.status).toBe('partial');
    expect(response.data.failures[0]).toEqual({ phase: 'conversion', page: 1, code: 'UNKNOWN', message: 'gs crashed' });
  });

  it('maps a store failure to 502', async () => {
    const response = await axios.post(
      `${baseUrl}/convert`,
      { ...FIELDS, pdf: 'uploads/missing.pdf' },
      { validateStatus: () => true }
    );

    expect(response.status).toBe(502);
    expect(response.data).toEqual({
      error: 'RemoteFailure',
      code: 'REMOTE_FAILURE',
      message: 'Could not fetch uploads/missing.pdf'
    });
    expect(response.data.details).toBeUndefined();
  });

  it('returns 404 for unknown routes', async () => {
    const response = await axios.get(`${baseUrl}/nope`, { validateStatus: () => true });

    expect(response.status).toBe(404);
    expect(response.data.error).toBe('Not found');
  });
});

describe('JWT authentication', () => {
  const keys = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' }
  });
  const otherKeys = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' }
  });

  const report: PipelineReport = { status: 'completed', pageCount: 0, objects: [], failures: [] };
  let run: Mock<(fields: RequestFields) => Promise<PipelineReport>>;
  let server: Server;
  let baseUrl: string;

  function sign(privateKey: string): string {
    return jwt.sign({ sub: 'tester' }, privateKey, {
      algorithm: 'RS256',
      keyid: 'test-kid',
      issuer: 'test-issuer',
      audience: 'page-render'
    });
  }

  beforeEach(async () => {
    run = vi.fn(async (_fields: RequestFields) => report);
    const store = new MemoryStore();
    ({ server, baseUrl } = await listen({
      pipeline: { run },
      store,
      rasterizer: createFakeRasterizer(0),
      auth: createJwtAuth({
        getSigningKey: async () => keys.publicKey,
        issuer: 'test-issuer',
        audience: 'page-render'
      }),
      rateLimitWindowMs: 60000,
      rateLimitMaxRequests: 1000
    }));
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('rejects a request without a token', async () => {
    const response = await axios.post(`${baseUrl}/convert`, FIELDS, { validateStatus: () => true });

    expect(response.status).toBe(401);
    expect(response.data).toEqual({ error: 'Missing Authorization header' });
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects a token signed with another key', async () => {
    const response = await axios.post(`${baseUrl}/convert`, FIELDS, {
      headers: { Authorization: `Bearer ${sign(otherKeys.privateKey)}` },
      validateStatus: () => true
    });

    expect(response.status).toBe(401);
    expect(response.data).toEqual({ error: 'Invalid token', detail: 'invalid signature' });
  });

  it('passes a valid token through to the pipeline', async () => {
    const response = await axios.post(`${baseUrl}/convert`, FIELDS, {
      headers: { Authorization: `Bearer ${sign(keys.privateKey)}` }
    });

    expect(response.status).toBe(200);
    expect(run).toHaveBeenCalledWith(FIELDS);
  });

  it('leaves the health probe open', async () => {
    const response = await axios.get(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
  });
});
