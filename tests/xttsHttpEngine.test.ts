import assert from 'node:assert/strict';
import { test } from 'node:test';
import { Response, type RequestInit } from 'undici';
import { z } from 'zod';
import { decodeWav, encodeWavPcm16 } from '../src/audio/wavCodec';
import type { EngineInvocation } from '../src/engine/types';
import { XttsHttpEngine, type FetchLike } from '../src/engine/xttsHttpEngine';
import { isTransient } from '../src/retry';

interface RecordedCall {
  url: string;
  init: RequestInit;
}

const SentBodySchema = z.object({
  text: z.string(),
  language: z.string(),
  speaker_wav: z.string(),
  temperature: z.number().optional(),
  top_p: z.number().optional(),
  top_k: z.number().optional(),
  speed: z.number().optional(),
  split_sentences: z.boolean().optional(),
});

function scriptedFetch(responses: Array<() => Response>): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const next = responses.shift();
    if (!next) {
      throw new Error('unexpected request');
    }
    return next();
  };
  return { fetchImpl, calls };
}

function wavResponse(samples: number[], sampleRateHz: number): Response {
  return new Response(new Uint8Array(encodeWavPcm16(new Float32Array(samples), sampleRateHz)), {
    status: 200,
    headers: { 'content-type': 'audio/wav' },
  });
}

const healthy = (): Response => new Response('ok', { status: 200 });

const invocation: EngineInvocation = {
  text: 'Guten Tag',
  language: 'de',
  reference: { samples: new Float32Array([0.5, -0.5]), sampleRateHz: 16000 },
  params: { temperature: 0.5, topP: 0.65, splitSentences: false },
};

test('load probes the health endpoint next to the synthesis URL', async () => {
  const { fetchImpl, calls } = scriptedFetch([healthy]);
  const engine = new XttsHttpEngine({ url: 'http://localhost:8020/tts_to_audio', retries: 0 }, fetchImpl);

  await engine.load();

  assert.equal(engine.device, 'xtts_http:localhost:8020');
  assert.equal(calls[0]?.url, 'http://localhost:8020/health');
  assert.equal(calls[0]?.init.method, 'GET');
});

test('load fails when the health check fails', async () => {
  const { fetchImpl } = scriptedFetch([() => new Response('down', { status: 503 })]);
  const engine = new XttsHttpEngine(
    { url: 'http://localhost:8020/tts_to_audio', healthUrl: 'http://localhost:8020/ready', retries: 0 },
    fetchImpl,
  );

  await assert.rejects(engine.load(), /xtts health check failed with status 503/);
});

test('synthesize refuses to run before load', async () => {
  const engine = new XttsHttpEngine({ url: 'http://localhost:8020/tts_to_audio', retries: 0 }, scriptedFetch([]).fetchImpl);

  await assert.rejects(engine.synthesize(invocation), /xtts engine is not loaded/);
});

test('synthesize posts text, language, tuning and the reference voice', async () => {
  const { fetchImpl, calls } = scriptedFetch([healthy, () => wavResponse([0.5, -0.5, 0.25], 24000)]);
  const engine = new XttsHttpEngine({ url: 'http://localhost:8020/tts_to_audio', retries: 0 }, fetchImpl);
  await engine.load();

  const waveform = await engine.synthesize(invocation);

  assert.equal(waveform.sampleRateHz, 24000);
  assert.deepEqual(Array.from(waveform.samples), [0.5, -0.5, 0.25]);

  const request = calls[1];
  assert.ok(request);
  assert.equal(request.url, 'http://localhost:8020/tts_to_audio');
  assert.equal(request.init.method, 'POST');
  assert.equal(typeof request.init.body, 'string');
  const sent = SentBodySchema.parse(JSON.parse(String(request.init.body)));
  assert.equal(sent.text, 'Guten Tag');
  assert.equal(sent.language, 'de');
  assert.equal(sent.temperature, 0.5);
  assert.equal(sent.top_p, 0.65);
  assert.equal(sent.top_k, undefined);
  assert.equal(sent.split_sentences, false);

  const reference = decodeWav(Buffer.from(sent.speaker_wav, 'base64'));
  assert.equal(reference.sampleRateHz, 16000);
  assert.deepEqual(Array.from(reference.channels[0]), [0.5, -0.5]);
});

test('synthesize surfaces JSON error bodies', async () => {
  const { fetchImpl } = scriptedFetch([
    healthy,
    () =>
      new Response(JSON.stringify({ detail: 'speaker_wav too short' }), {
        status: 200,
        headers: { 'content-type': 'application/json' },
      }),
  ]);
  const engine = new XttsHttpEngine({ url: 'http://localhost:8020/tts_to_audio', retries: 0 }, fetchImpl);
  await engine.load();

  await assert.rejects(engine.synthesize(invocation), /xtts: speaker_wav too short/);
});

test('synthesize retries server errors but not client errors', async () => {
  const retried = scriptedFetch([
    healthy,
    () => new Response('overloaded', { status: 502 }),
    () => wavResponse([0.25], 24000),
  ]);
  const engine = new XttsHttpEngine({ url: 'http://localhost:8020/tts_to_audio', retries: 1 }, retried.fetchImpl);
  await engine.load();
  assert.deepEqual(Array.from((await engine.synthesize(invocation)).samples), [0.25]);
  assert.equal(retried.calls.length, 3);

  const rejected = scriptedFetch([healthy, () => new Response('bad', { status: 400 })]);
  const strict = new XttsHttpEngine({ url: 'http://localhost:8020/tts_to_audio', retries: 1 }, rejected.fetchImpl);
  await strict.load();
  await assert.rejects(strict.synthesize(invocation), /xtts error 400/);
  assert.equal(rejected.calls.length, 2);
});

test('isTransient treats aborts as final', () => {
  const abort = new Error('The operation was aborted');
  abort.name = 'AbortError';

  assert.equal(isTransient(abort), false);
  assert.equal(isTransient(new Error('fetch failed')), true);
  assert.equal(isTransient(new Error('xtts error 503')), true);
  assert.equal(isTransient(new Error('xtts error 404')), false);
});
