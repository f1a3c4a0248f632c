import { existsSync } from 'fs';
import path from 'path';
import { Worker } from 'worker_threads';
import { errorMessage } from '../errors';
import { log } from '../log';
import { clampTimerDelay } from './timerDelay';
import { WorkerResponseSchema, type WorkerRequest, type WorkerResponse } from './protocol';
import type { EngineHost, EngineInvocation, HostInvocation, HostOutcome } from './types';

const DISPOSE_GRACE_MS = 5_000;

export interface WorkerEngineHostOptions {
  /** Handed to the worker untouched; engineWorker expects an EngineWorkerData. */
  workerData: unknown;
  loadTimeoutMs: number;
  workerPath?: string;
}

interface PendingInvocation {
  id: number;
  complete: (outcome: HostOutcome) => void;
}

function defaultWorkerPath(): string {
  // Compiled output sits next to this file; under tsx the source is loaded directly.
  const compiled = path.join(__dirname, 'engineWorker.js');
  return existsSync(compiled) ? compiled : path.join(__dirname, 'engineWorker.ts');
}

/**
 * Hosts the engine in a worker thread. A timed-out invocation is stopped with
 * `worker.terminate()`, which also interrupts synchronous native-style calls, and a
 * fresh worker reloads the engine before the invocation counts as settled.
 */
export class WorkerEngineHost implements EngineHost {
  private worker: Worker | null = null;
  private deviceName = 'unloaded';
  private nextId = 1;
  private pending: PendingInvocation | null = null;
  private restartCount = 0;
  private readonly workerPath: string;

  constructor(private readonly options: WorkerEngineHostOptions) {
    this.workerPath = options.workerPath ?? defaultWorkerPath();
  }

  public get device(): string {
    return this.deviceName;
  }

  public get restarts(): number {
    return this.restartCount;
  }

  public get running(): boolean {
    return this.worker !== null;
  }

  public async start(): Promise<void> {
    const worker = new Worker(this.workerPath, { workerData: this.options.workerData });
    try {
      this.deviceName = await this.awaitReady(worker);
    } catch (error) {
      await worker.terminate();
      throw error;
    }

    this.worker = worker;
    worker.on('message', (raw: unknown) => this.onMessage(worker, raw));
    worker.on('error', (error) => this.onWorkerGone(worker, `worker error: ${error.message}`));
    worker.on('exit', (code) => this.onWorkerGone(worker, `worker exited with code ${code}`));
    log.info({ event: 'engine_worker_ready', device: this.deviceName, thread_id: worker.threadId }, 'engine worker ready');
  }

  public run(input: EngineInvocation, timeoutMs: number): HostInvocation {
    const worker = this.worker;
    if (!worker) {
      return {
        outcome: Promise.resolve({ ok: false, reason: 'engine_crashed', message: 'engine worker is not running' }),
        settled: this.recycle('not_running'),
      };
    }

    const id = this.nextId;
    this.nextId += 1;

    const completion = new Promise<HostOutcome>((resolve) => {
      this.pending = { id, complete: resolve };
    });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<true>((resolve) => {
      timer = setTimeout(() => resolve(true), clampTimerDelay(timeoutMs));
    });

    const first = Promise.race([
      completion.then((outcome) => ({ timedOut: false as const, outcome })),
      timedOut.then(() => ({ timedOut: true as const })),
    ]).finally(() => clearTimeout(timer));

    const outcome = first.then((winner): HostOutcome => {
      if (winner.timedOut) {
        return { ok: false, reason: 'timeout', message: `inference exceeded ${timeoutMs}ms` };
      }
      return winner.outcome;
    });

    const settled = first.then(async (winner) => {
      if (winner.timedOut) {
        this.pending = null;
        await this.recycle('timeout');
      } else if (!winner.outcome.ok && winner.outcome.reason === 'engine_crashed') {
        await this.recycle('crashed');
      }
    });

    const request: WorkerRequest = { type: 'synthesize', id, input };
    worker.postMessage(request);

    return { outcome, settled };
  }

  public async stop(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    if (!worker) {
      return;
    }
    this.detach(worker);

    const disposed = new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, DISPOSE_GRACE_MS);
      worker.on('message', (raw: unknown) => {
        const parsed = WorkerResponseSchema.safeParse(raw);
        if (parsed.success && parsed.data.type === 'disposed') {
          clearTimeout(timer);
          resolve();
        }
      });
    });
    const request: WorkerRequest = { type: 'dispose' };
    worker.postMessage(request);
    await disposed;
    await worker.terminate();
  }

  private awaitReady(worker: Worker): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        worker.off('message', onMessage);
        worker.off('error', onError);
        worker.off('exit', onExit);
      };
      const onMessage = (raw: unknown): void => {
        const parsed = WorkerResponseSchema.safeParse(raw);
        if (!parsed.success) return;
        if (parsed.data.type === 'ready') {
          cleanup();
          resolve(parsed.data.device);
        } else if (parsed.data.type === 'load_failed') {
          cleanup();
          reject(new Error(`engine load failed: ${parsed.data.message}`));
        }
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(new Error(`engine worker failed during load: ${error.message}`));
      };
      const onExit = (code: number): void => {
        cleanup();
        reject(new Error(`engine worker exited during load with code ${code}`));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error(`engine load timed out after ${this.options.loadTimeoutMs}ms`));
      }, clampTimerDelay(this.options.loadTimeoutMs));

      worker.on('message', onMessage);
      worker.on('error', onError);
      worker.on('exit', onExit);
      const request: WorkerRequest = { type: 'load' };
      worker.postMessage(request);
    });
  }

  private onMessage(worker: Worker, raw: unknown): void {
    if (worker !== this.worker) return;
    const parsed = WorkerResponseSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ event: 'engine_worker_bad_message', issues: parsed.error.issues }, 'engine worker sent invalid message');
      return;
    }
    this.settlePending(parsed.data);
  }

  private settlePending(message: WorkerResponse): void {
    const pending = this.pending;
    if (!pending) return;
    if (message.type === 'result' && message.id === pending.id) {
      this.pending = null;
      pending.complete({ ok: true, waveform: message.waveform });
    } else if (message.type === 'error' && message.id === pending.id) {
      this.pending = null;
      pending.complete({ ok: false, reason: 'engine_error', message: message.message });
    }
  }

  private onWorkerGone(worker: Worker, reason: string): void {
    if (worker !== this.worker) return;
    this.detach(worker);
    this.worker = null;
    log.error({ event: 'engine_worker_crashed', reason, thread_id: worker.threadId }, 'engine worker crashed');

    const pending = this.pending;
    this.pending = null;
    pending?.complete({ ok: false, reason: 'engine_crashed', message: reason });
  }

  private detach(worker: Worker): void {
    worker.removeAllListeners('message');
    worker.removeAllListeners('exit');
    worker.removeAllListeners('error');
    // A terminated worker may still report an uncaught error; it is no longer ours to handle.
    worker.on('error', (error) => {
      log.debug({ event: 'engine_worker_stale_error', err: errorMessage(error) }, 'stale engine worker error');
    });
  }

  private async recycle(reason: string): Promise<void> {
    const old = this.worker;
    this.worker = null;
    if (old) {
      this.detach(old);
      await old.terminate();
    }
    this.restartCount += 1;
    log.warn({ event: 'engine_worker_restart', reason, restarts: this.restartCount }, 'restarting engine worker');
    await this.start();
  }
}
