import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import type { AddressInfo } from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { after, before, test } from 'node:test';
import type http from 'node:http';
import express from 'express';
import { fetch, type Response } from 'undici';
import type { ExternalAudioDecoder } from '../src/audio/ffmpegDecoder';
import type { DecodedAudio } from '../src/audio/wavCodec';
import { InlineEngineHost } from '../src/engine/inlineEngineHost';
import { ModelSession } from '../src/engine/modelSession';
import { createHealthRouter } from '../src/routes/health';
import { statusForError } from '../src/routes/httpErrors';
import { buildServer } from '../src/server';
import { ResultStore } from '../src/storage/resultStore';
import { RequestCoordinator } from '../src/synthesis/requestCoordinator';
import { AudioIngestor } from '../src/voice/audioIngestor';
import { VoiceCatalog } from '../src/voice/catalog';
import { silenceWav, squareWav } from './audioFixtures';
import { FakeEngine, UnrecoverableHost } from './fakeEngine';

const MAX_UPLOAD_BYTES = 200_000;

const decoder: ExternalAudioDecoder = {
  decode(): Promise<DecodedAudio> {
    return Promise.reject(new Error('no external decoding in tests'));
  },
};

let server: http.Server;
let session: ModelSession;
let baseUrl = '';

before(async () => {
  const catalog = VoiceCatalog.fromEntries([
    { name: 'narrator', displayName: 'Narrator', language: 'en', bytes: squareWav(2, 16000) },
  ]);
  const ingestor = new AudioIngestor(
    catalog,
    {
      targetSampleRateHz: 16000,
      silenceThresholdDb: -40,
      silenceFrameMs: 20,
      normalizePeak: 0.95,
      minReferenceSeconds: 1,
      maxReferenceSeconds: 3,
      maxUploadBytes: MAX_UPLOAD_BYTES,
    },
    decoder,
  );
  session = new ModelSession(new InlineEngineHost(new FakeEngine()));
  const store = new ResultStore({
    storageDir: await fs.mkdtemp(path.join(os.tmpdir(), 'server-')),
    ttlMs: 60_000,
  });
  const coordinator = new RequestCoordinator(
    { ingestor, session, store },
    { maxTextLength: 100, requestTimeoutMs: 2_000, targetSampleRateHz: 16000 },
  );

  ({ server } = buildServer({ coordinator, ingestor, session, store }, { maxUploadBytes: MAX_UPLOAD_BYTES }));
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address: AddressInfo | string | null = server.address();
  assert.ok(address && typeof address === 'object');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  await session.dispose();
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

function postJson(route: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${route}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
}

function uploadBody(reference: Buffer, fields: Record<string, unknown>): Record<string, unknown> {
  return { ...fields, reference_audio: reference.toString('base64'), reference_mime: 'audio/wav' };
}

async function errorKind(response: Response): Promise<unknown> {
  const body: unknown = await response.json();
  assert.ok(body && typeof body === 'object' && 'error' in body);
  return body.error;
}

test('readiness follows the engine load', async () => {
  const live = await fetch(`${baseUrl}/health/live`);
  assert.equal(live.status, 200);
  assert.deepEqual(await live.json(), { status: 'ok' });

  const notReady = await fetch(`${baseUrl}/health/ready`);
  assert.equal(notReady.status, 503);
  await notReady.body?.cancel();

  await session.load();
  const ready = await fetch(`${baseUrl}/health/ready`);
  assert.equal(ready.status, 200);
  assert.deepEqual(await ready.json(), { status: 'ready' });
});

test('readiness fails once the engine cannot be brought back', async () => {
  const broken = new ModelSession(new UnrecoverableHost(), { onFatal: () => undefined });
  await broken.load();
  const app = express();
  app.use('/health', createHealthRouter(broken));
  const healthServer = app.listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => healthServer.once('listening', resolve));
  const address: AddressInfo | string | null = healthServer.address();
  assert.ok(address && typeof address === 'object');

  try {
    const result = await broken.synthesize({
      text: 'hello',
      language: 'en',
      reference: { samples: new Float32Array(16000), sampleRateHz: 16000 },
      params: {},
      deadline: Date.now() + 200,
    });
    assert.equal(result.ok ? null : result.error.kind, 'inference_timeout');
    await new Promise((resolve) => setImmediate(resolve));

    const ready = await fetch(`http://127.0.0.1:${address.port}/health/ready`);
    assert.equal(ready.status, 503);
    assert.deepEqual(await ready.json(), { status: 'not_ready' });
  } finally {
    healthServer.closeAllConnections();
    await new Promise<void>((resolve, reject) => healthServer.close((error) => (error ? reject(error) : resolve())));
  }
});

test('GET /v1/languages and /v1/samples list what can be requested', async () => {
  const languages = await fetch(`${baseUrl}/v1/languages`);
  assert.deepEqual(await languages.json(), { languages: { en: 'English', de: 'German' }, total: 2 });

  const samples = await fetch(`${baseUrl}/v1/samples`);
  assert.deepEqual(await samples.json(), {
    samples: [
      { language: 'en', language_name: 'English', voices: [{ name: 'narrator', display_name: 'Narrator' }] },
    ],
  });
});

test('a synthesized artifact can be downloaded and deleted', async () => {
  await session.load();
  const created = await postJson('/v1/synthesize', { text: 'Hello world', sample: 'narrator' });
  assert.equal(created.status, 200);
  const body: unknown = await created.json();
  assert.ok(body && typeof body === 'object' && 'artifact_key' in body && typeof body.artifact_key === 'string');
  const key = body.artifact_key;
  assert.ok('duration_ms' in body);
  assert.equal(body.duration_ms, 110);

  const download = await fetch(`${baseUrl}/v1/artifacts/${key}`);
  assert.equal(download.status, 200);
  assert.equal(download.headers.get('content-type'), 'audio/wav');
  const wav = Buffer.from(await download.arrayBuffer());
  assert.equal(wav.toString('ascii', 0, 4), 'RIFF');

  const removed = await fetch(`${baseUrl}/v1/artifacts/${key}`, { method: 'DELETE' });
  assert.equal(removed.status, 204);

  const gone = await fetch(`${baseUrl}/v1/artifacts/${key}`);
  assert.equal(gone.status, 404);
  assert.deepEqual(await gone.json(), {
    error: 'not_found',
    category: 'storage',
    retryable: false,
    message: `artifact not found: ${key}`,
  });
});

test('POST /v1/synthesize maps pipeline errors to HTTP statuses', async () => {
  await session.load();

  const invalid = await postJson('/v1/synthesize', { text: 'Hello' });
  assert.equal(invalid.status, 400);
  assert.deepEqual(await invalid.json(), { error: 'invalid_request', issues: ['sample: Required'] });

  const empty = await postJson('/v1/synthesize', { text: '   ', sample: 'narrator' });
  assert.equal(empty.status, 400);
  await empty.body?.cancel();

  const missing = await postJson('/v1/synthesize', { text: 'Hello', sample: 'nobody' });
  assert.equal(missing.status, 404);
  await missing.body?.cancel();

  const malformed = await fetch(`${baseUrl}/v1/synthesize`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: '{"text":',
  });
  assert.equal(malformed.status, 400);
  assert.deepEqual(await malformed.json(), { error: 'invalid_json' });
});

test('POST /v1/synthesize/upload clones an uploaded reference', async () => {
  await session.load();
  const reference = squareWav(1.5, 16000);

  const ok = await postJson('/v1/synthesize/upload', uploadBody(reference, { text: 'Hi there', language: 'de' }));
  assert.equal(ok.status, 200);
  await ok.body?.cancel();

  const corrupt = await postJson('/v1/synthesize/upload', uploadBody(Buffer.from('not audio'), { text: 'Hi' }));
  assert.equal(corrupt.status, 415);
  assert.equal(await errorKind(corrupt), 'unsupported_format');

  const tooLarge = await postJson('/v1/synthesize/upload', uploadBody(Buffer.alloc(300_000), { text: 'Hi' }));
  assert.equal(tooLarge.status, 413);
  assert.equal(await errorKind(tooLarge), 'file_too_large');

  const notBase64 = await postJson('/v1/synthesize/upload', { text: 'Hi', reference_audio: '***' });
  assert.equal(notBase64.status, 400);
  assert.deepEqual(await notBase64.json(), {
    error: 'invalid_request',
    issues: ['reference_audio: must be base64-encoded audio'],
  });
});

test('POST /v1/synthesize/upload accepts non-ASCII text up to the length limit', async () => {
  await session.load();
  const reference = squareWav(1.5, 16000);

  const atLimit = await postJson('/v1/synthesize/upload', uploadBody(reference, { text: 'ü'.repeat(100) }));
  assert.equal(atLimit.status, 200);
  await atLimit.body?.cancel();

  const overLimit = await postJson('/v1/synthesize/upload', uploadBody(reference, { text: 'ü'.repeat(101) }));
  assert.equal(overLimit.status, 400);
  assert.equal(await errorKind(overLimit), 'text_too_long');
});

test('POST /v1/synthesize/batch reports every line', async () => {
  await session.load();

  const response = await postJson('/v1/synthesize/batch', { texts: 'One\nTwo', sample: 'narrator' });
  assert.equal(response.status, 200);
  const body: unknown = await response.json();
  assert.ok(body && typeof body === 'object' && 'total' in body);
  assert.equal(body.total, 2);
});

test('POST /v1/synthesize/batch/upload clones every line from one uploaded reference', async () => {
  await session.load();

  const response = await postJson(
    '/v1/synthesize/batch/upload',
    uploadBody(squareWav(1.5, 16000), { texts: ['One', 'Two\n\nThree'] }),
  );
  assert.equal(response.status, 200);
  const body: unknown = await response.json();
  assert.ok(body && typeof body === 'object' && 'total' in body && 'results' in body && Array.isArray(body.results));
  assert.equal(body.total, 3);
  assert.deepEqual(
    body.results.map((item: unknown) => (item && typeof item === 'object' && 'status' in item ? item.status : null)),
    ['success', 'success', 'success'],
  );

  const silent = await postJson('/v1/synthesize/batch/upload', uploadBody(silenceWav(1.5, 16000), { texts: 'One' }));
  assert.equal(silent.status, 400);
  assert.equal(await errorKind(silent), 'silence_only');
});

test('GET /metrics exposes runtime counters', async () => {
  const response = await fetch(`${baseUrl}/metrics`);
  assert.equal(response.status, 200);
  assert.match(await response.text(), /voice_clone_runtime_synthesis_total/);
});

test('statusForError covers the retryable kinds', () => {
  assert.equal(statusForError('busy'), 503);
  assert.equal(statusForError('inference_timeout'), 504);
  assert.equal(statusForError('file_too_large'), 413);
});
