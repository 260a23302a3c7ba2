import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Express } from 'express';
import request from 'supertest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(),
  scrubSensitiveText: (text: string) => text,
}));

import { createApiApp } from '../../src/api/router.js';
import { BackendResolver } from '../../src/services/backend-resolver.js';
import { RouteClassifier } from '../../src/services/route-classifier.js';
import { DispatchForwarder } from '../../src/services/dispatch-forwarder.js';
import { HOST_PATHS, TelemetryCollector } from '../../src/services/telemetry-collector.js';
import { completionResponse, FakeGpu, FakeHostStats, MULTIMODAL, REASONING } from '../harness/fixtures.js';

const INDEX_HTML = '<!doctype html><title>dashboard</title>';

describe('gateway HTTP surface', () => {
  let workDir: string;
  let staticDir: string;
  let app: Express;
  let originalFetch: typeof globalThis.fetch;
  let fetchMock: Mock<typeof fetch>;

  beforeAll(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'gateway-static-'));
    staticDir = path.join(workDir, 'static');
    await mkdir(path.join(staticDir, 'nested'), { recursive: true });
    await writeFile(path.join(staticDir, 'index.html'), INDEX_HTML);
    await writeFile(path.join(staticDir, 'app.css'), 'body { margin: 0; }');
    await writeFile(path.join(workDir, 'secret.txt'), 'outside the static root');
  });

  afterAll(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    originalFetch = globalThis.fetch;
    fetchMock = vi.fn<typeof fetch>();
    globalThis.fetch = fetchMock;

    const resolver = new BackendResolver(REASONING, MULTIMODAL);
    const telemetry = new TelemetryCollector({
      hostStats: new FakeHostStats({
        [HOST_PATHS.meminfo]: 'MemTotal: 8388608 kB\nMemAvailable: 6291456 kB\n',
      }),
      gpu: new FakeGpu([12], { currentMhz: 900, maxMhz: 1800 }),
      now: () => 1_750_000_000_999,
    });
    app = createApiApp({
      config: { port: 0, staticDir },
      resolver,
      classifier: new RouteClassifier(resolver.reasoning, resolver.multimodal),
      forwarder: new DispatchForwarder(resolver),
      telemetry,
    });
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  // ── Health and discovery ────────────────────────────────────────────────────

  it('answers liveness on /health and /healthz with a correlation id', async () => {
    for (const route of ['/health', '/healthz']) {
      const response = await request(app).get(route);
      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok' });
      expect(response.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('lists both models and their aliases', async () => {
    const response = await request(app).get('/v1/models');

    expect(response.status).toBe(200);
    expect(response.body.object).toBe('list');
    expect(response.body.data.map((entry: { id: string }) => entry.id)).toEqual([
      REASONING.canonicalId,
      REASONING.alias,
      MULTIMODAL.canonicalId,
      MULTIMODAL.alias,
    ]);
  });

  it('returns a telemetry snapshot with unavailable metrics as null', async () => {
    const response = await request(app).get('/telemetry/snapshot');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      ok: true,
      source: 'local_system',
      memory_percent: 25,
      memory_used_gb: 2,
      memory_total_gb: 8,
      gpu_percent: 12,
      cpu_percent: null,
      cpu_clock_mhz: null,
      cpu_clock_max_mhz: null,
      gpu_clock_mhz: 900,
      gpu_clock_max_mhz: 1800,
      timestamp: 1_750_000_000,
      auth_mode: 'local_only',
      ts: 1_750_000_000,
    });
  });

  // ── Auto-route ──────────────────────────────────────────────────────────────

  it('routes reasoning text and reports the worker result', async () => {
    fetchMock.mockResolvedValueOnce(completionResponse('A = pi r^2'));

    const response = await request(app).post('/route').send({ text: '  Derive the area of a circle ' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      model: REASONING.canonicalId,
      confidence: 0.88,
      source: 'shortcut',
      probabilities: { [REASONING.canonicalId]: 0.88, [MULTIMODAL.canonicalId]: 0.12 },
      top_k_models: [REASONING.canonicalId, MULTIMODAL.canonicalId],
      dispatch_target: REASONING.alias,
      dispatch_backend: 'trtllm-serve',
      worker_invoked: true,
      worker_status: 'ok',
      worker_response: {
        details: {
          target_model: REASONING.canonicalId,
          target_alias: REASONING.alias,
          result: {
            text: 'A = pi r^2',
            used_precision: 'runtime',
            raw: { choices: [{ message: { role: 'assistant', content: 'A = pi r^2' } }] },
          },
        },
      },
    });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe(`${REASONING.backendEndpoint}/v1/chat/completions`);
    expect(JSON.parse(String(init?.body))).toEqual({
      model: REASONING.canonicalId,
      messages: [{ role: 'user', content: 'Derive the area of a circle' }],
      max_tokens: 256,
    });
  });

  it('routes image requests to the multimodal backend with multipart content', async () => {
    fetchMock.mockResolvedValueOnce(completionResponse('a cat'));

    const response = await request(app)
      .post('/route')
      .send({ text: 'what is in it', image_url: 'http://img.test/cat.png' });

    expect(response.status).toBe(200);
    expect(response.body.model).toBe(MULTIMODAL.canonicalId);
    expect(response.body.confidence).toBe(0.99);
    expect(response.body.dispatch_target).toBe(MULTIMODAL.alias);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe(`${MULTIMODAL.backendEndpoint}/v1/chat/completions`);
    expect(JSON.parse(String(init?.body)).messages[0].content).toEqual([
      { type: 'text', text: 'what is in it' },
      { type: 'image_url', image_url: { url: 'http://img.test/cat.png' } },
    ]);
  });

  it('still answers 200 when the backend fails', async () => {
    fetchMock.mockResolvedValueOnce(new Response('boom', { status: 500 }));

    const response = await request(app).post('/route').send({ text: 'hello', has_image: false });

    expect(response.status).toBe(200);
    expect(response.body.source).toBe('mlp_compat');
    expect(response.body.worker_invoked).toBe(true);
    expect(response.body.worker_status).toBe('error: backend status 500');
    expect(response.body.worker_response).toEqual({ details: { error: 'backend status 500' } });
  });

  it('rejects a missing or blank text field', async () => {
    for (const body of [{}, { text: '   ' }, { text: null }]) {
      const response = await request(app).post('/route').send(body);
      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'text is required' });
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects malformed JSON', async () => {
    const response = await request(app).post('/route').set('Content-Type', 'application/json').send('{"text": ');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Invalid JSON payload' });
  });

  // ── Passthrough ─────────────────────────────────────────────────────────────

  it('relays the raw body to the backend named by model', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('{"id":"cmpl-7","object":"text_completion"}', {
        status: 201,
        headers: { 'Content-Type': 'application/json' },
      }),
    );
    const raw = '{"model":"phi-4-multimodal-instruct",   "prompt":"hi"}';

    const response = await request(app)
      .post('/v1/completions')
      .set('Content-Type', 'application/json')
      .set('Authorization', 'Bearer test-token')
      .send(raw);

    expect(response.status).toBe(201);
    expect(response.text).toBe('{"id":"cmpl-7","object":"text_completion"}');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe(`${MULTIMODAL.backendEndpoint}/v1/completions`);
    const forwarded = init?.body;
    expect(Buffer.isBuffer(forwarded) ? forwarded.toString('utf8') : undefined).toBe(raw);
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' });
  });

  it('relays upstream error statuses unchanged', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('{"error":"context too long"}', { status: 400, headers: { 'Content-Type': 'application/json' } }),
    );

    const response = await request(app)
      .post('/v1/chat/completions')
      .send({ model: REASONING.canonicalId, messages: [] });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'context too long' });
  });

  it('relays an upstream 500 with the original body bytes', async () => {
    const upstreamBody = '{"error":{"message":"CUDA out of memory","code":500}}\n';
    fetchMock.mockResolvedValueOnce(
      new Response(upstreamBody, { status: 500, headers: { 'Content-Type': 'application/json' } }),
    );

    const response = await request(app)
      .post('/v1/chat/completions')
      .send({ model: MULTIMODAL.canonicalId, messages: [] });

    expect(response.status).toBe(500);
    expect(response.headers['content-type']).toBe('application/json');
    expect(response.text).toBe(upstreamBody);
  });

  it('answers 502 when the backend is unreachable', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    const response = await request(app)
      .post('/v1/chat/completions')
      .send({ model: REASONING.alias, messages: [] });

    expect(response.status).toBe(502);
    expect(response.body).toEqual({ error: 'Upstream failure: fetch failed' });
  });

  it('requires a model', async () => {
    const withoutModel = await request(app).post('/v1/chat/completions').send({ messages: [] });
    const emptyBody = await request(app).post('/v1/completions');

    for (const response of [withoutModel, emptyBody]) {
      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Request must include model' });
    }
  });

  it('treats every empty model value as missing', async () => {
    for (const model of [null, '', false, 0, [], {}]) {
      const response = await request(app).post('/v1/chat/completions').send({ model, messages: [] });
      expect(response.status, JSON.stringify(model)).toBe(400);
      expect(response.body).toEqual({ error: 'Request must include model' });
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects unknown and non-string models', async () => {
    const expected = {
      error:
        `Unknown model. Use one of: ${REASONING.canonicalId}, ${REASONING.alias}, ` +
        `${MULTIMODAL.canonicalId}, ${MULTIMODAL.alias}`,
    };

    for (const model of ['gpt-4o', 7]) {
      const response = await request(app).post('/v1/chat/completions').send({ model });
      expect(response.status).toBe(400);
      expect(response.body).toEqual(expected);
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('answers 404 Not Found for other POST paths without calling a backend', async () => {
    const response = await request(app).post('/v1/embeddings').send({ model: REASONING.alias });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Not Found' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  // ── Static assets ───────────────────────────────────────────────────────────

  it('serves the dashboard index at /', async () => {
    const response = await request(app).get('/');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/html/);
    expect(response.text).toBe(INDEX_HTML);
  });

  it('serves files under /static/', async () => {
    const response = await request(app).get('/static/app.css');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/css/);
    expect(response.text).toBe('body { margin: 0; }');
  });

  it('refuses paths that escape the static root', async () => {
    const response = await request(app).get('/static/..%2fsecret.txt');

    expect(response.status).toBe(403);
    expect(response.body).toEqual({ error: 'Forbidden' });
  });

  it('answers 404 for missing files, directories and unknown paths', async () => {
    for (const route of ['/static/missing.js', '/static/nested', '/dashboard']) {
      const response = await request(app).get(route);
      expect(response.status, route).toBe(404);
      expect(response.body).toEqual({ error: 'Not Found' });
    }
  });
});
