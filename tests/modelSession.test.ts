import assert from 'node:assert/strict';
import { test } from 'node:test';
import { InlineEngineHost } from '../src/engine/inlineEngineHost';
import { ModelSession } from '../src/engine/modelSession';
import { FatalEngineError } from '../src/errors';
import { FAKE_ENGINE_RATE_HZ, FakeEngine, UnrecoverableHost } from './fakeEngine';

function request(text: string, budgetMs = 1000) {
  return {
    text,
    language: 'en',
    reference: { samples: new Float32Array(16000).fill(0.5), sampleRateHz: 16000 },
    params: { temperature: 0.5 },
    deadline: Date.now() + budgetMs,
  };
}

async function loadedSession(): Promise<{ session: ModelSession; engine: FakeEngine }> {
  const engine = new FakeEngine();
  const session = new ModelSession(new InlineEngineHost(engine));
  await session.load();
  return { session, engine };
}

test('synthesize fails with engine_failure before load', async () => {
  const session = new ModelSession(new InlineEngineHost(new FakeEngine()));

  const result = await session.synthesize(request('hello'));

  assert.equal(result.ok ? null : result.error.kind, 'engine_failure');
  assert.equal(result.ok ? null : result.error.message, 'inference engine is not loaded');
});

test('load failure surfaces as FatalEngineError', async () => {
  const engine = new FakeEngine();
  engine.loadError = new Error('weights missing');
  const session = new ModelSession(new InlineEngineHost(engine));

  await assert.rejects(session.load(), (error: unknown) => {
    assert.ok(error instanceof FatalEngineError);
    assert.equal(error.message, 'inference engine failed to load: weights missing');
    return true;
  });
  assert.equal(session.status().loaded, false);
});

test('synthesize returns the engine waveform', async () => {
  const { session, engine } = await loadedSession();

  const result = await session.synthesize(request('hello'));

  assert.ok(result.ok);
  assert.equal(result.value.sampleRateHz, FAKE_ENGINE_RATE_HZ);
  assert.equal(result.value.samples.length, 1200);
  assert.equal(engine.calls[0]?.text, 'hello');
  assert.deepEqual(engine.calls[0]?.params, { temperature: 0.5 });
  assert.deepEqual(session.status(), {
    loaded: true,
    corrupted: false,
    device: 'fake:cpu',
    busy: false,
    queueDepth: 0,
  });
});

test('concurrent callers never overlap inside the engine', async () => {
  const { session, engine } = await loadedSession();

  const results = await Promise.all(['one', 'two', 'three', 'four', 'five'].map((text) => session.synthesize(request(text))));

  assert.ok(results.every((result) => result.ok));
  assert.equal(engine.maxActive, 1);
  assert.deepEqual(
    engine.calls.map((call) => call.text),
    ['one', 'two', 'three', 'four', 'five'],
  );
});

test('a timed-out invocation holds the engine until it has settled', async () => {
  const { session, engine } = await loadedSession();

  const hung = session.synthesize(request('hang', 30));
  const next = session.synthesize(request('after', 2000));

  const timedOut = await hung;
  assert.equal(timedOut.ok ? null : timedOut.error.kind, 'inference_timeout');
  assert.equal(timedOut.ok ? null : timedOut.error.retryable, true);
  assert.equal(engine.active, 1);

  const after = await next;
  assert.ok(after.ok);
  assert.equal(engine.maxActive, 1);
});

test('a caller whose deadline passes in the queue gets busy', async () => {
  const { session } = await loadedSession();

  const slow = session.synthesize(request('slow', 2000));
  const impatient = await session.synthesize(request('quick', 20));

  assert.equal(impatient.ok ? null : impatient.error.kind, 'busy');
  assert.equal(impatient.ok ? null : impatient.error.retryable, true);
  assert.ok((await slow).ok);
});

test('engine errors map to engine_failure and leave the session usable', async () => {
  const { session } = await loadedSession();

  const failed = await session.synthesize(request('fail'));
  const next = await session.synthesize(request('hello'));

  assert.equal(failed.ok ? null : failed.error.kind, 'engine_failure');
  assert.equal(failed.ok ? null : failed.error.message, 'boom');
  assert.ok(next.ok);
});

test('dispose stops the engine and refuses later work', async () => {
  const { session, engine } = await loadedSession();

  await session.dispose();
  const result = await session.synthesize(request('hello'));

  assert.equal(engine.disposed, true);
  assert.equal(result.ok ? null : result.error.message, 'inference engine was shut down');
});

test('dispose turns queued callers away and waits for the running one', async () => {
  const { session, engine } = await loadedSession();

  const running = session.synthesize(request('slow', 2000));
  const queued = session.synthesize(request('queued', 2000));
  await new Promise((resolve) => setTimeout(resolve, 10));
  await session.dispose();

  assert.ok((await running).ok);
  const turnedAway = await queued;
  assert.equal(turnedAway.ok ? null : turnedAway.error.message, 'inference engine was shut down');
  assert.equal(engine.calls.length, 1);
  assert.equal(engine.disposed, true);
});

test('an engine that cannot be brought back is reported fatal once and refuses work', async () => {
  const host = new UnrecoverableHost();
  const fatal: FatalEngineError[] = [];
  const session = new ModelSession(host, { onFatal: (error) => fatal.push(error) });
  await session.load();

  const timedOut = await session.synthesize(request('hello', 200));
  await new Promise((resolve) => setImmediate(resolve));
  const refused = await session.synthesize(request('hello', 200));

  assert.equal(timedOut.ok ? null : timedOut.error.kind, 'inference_timeout');
  assert.equal(fatal.length, 1);
  assert.ok(fatal[0] instanceof FatalEngineError);
  assert.equal(fatal[0].message, 'inference engine could not be recovered: replacement worker failed to load');
  assert.equal(refused.ok ? null : refused.error.kind, 'engine_failure');
  assert.equal(refused.ok ? null : refused.error.message, 'inference engine is unusable and must be reloaded');
  assert.equal(host.runs, 1);
  assert.equal(session.status().corrupted, true);
});
