import { parentPort, workerData, type MessagePort } from 'worker_threads';
import { errorMessage } from '../errors';
import { log } from '../log';
import { EngineWorkerDataSchema, WorkerRequestSchema, type WorkerRequest, type WorkerResponse } from './protocol';
import { createEngine } from './registry';

// Entry point of the engine worker thread spawned by WorkerEngineHost.

function requireParentPort(): MessagePort {
  if (!parentPort) {
    throw new Error('engineWorker must be started as a worker thread');
  }
  return parentPort;
}

const port = requireParentPort();

const engine = createEngine(EngineWorkerDataSchema.parse(workerData).engine);

function send(message: WorkerResponse): void {
  port.postMessage(message);
}

async function handle(request: WorkerRequest): Promise<void> {
  switch (request.type) {
    case 'load':
      try {
        await engine.load();
        send({ type: 'ready', device: engine.device });
      } catch (error) {
        send({ type: 'load_failed', message: errorMessage(error) });
      }
      return;
    case 'synthesize':
      try {
        const waveform = await engine.synthesize(request.input);
        send({ type: 'result', id: request.id, waveform });
      } catch (error) {
        send({ type: 'error', id: request.id, message: errorMessage(error) });
      }
      return;
    case 'dispose':
      await engine.dispose();
      send({ type: 'disposed' });
      return;
  }
}

port.on('message', (raw: unknown) => {
  const parsed = WorkerRequestSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ event: 'engine_worker_bad_request', issues: parsed.error.issues }, 'engine worker got invalid request');
    return;
  }
  handle(parsed.data).catch((error: unknown) => {
    log.error({ event: 'engine_worker_handler_failed', err: errorMessage(error) }, 'engine worker handler failed');
    process.exit(1);
  });
});
