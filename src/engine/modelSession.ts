import { errorMessage, fail, FatalEngineError, ok, type Result } from '../errors';
import { log } from '../log';
import { setEngineQueueDepth, startStageTimer } from '../metrics';
import { ExclusiveToken } from './exclusiveToken';
import type { EngineHost, SynthesisParams, Waveform } from './types';

const DISPOSE_WAIT_MS = 30_000;

export interface SessionSynthesisInput {
  text: string;
  language: string;
  reference: Waveform;
  params: SynthesisParams;
  /** Absolute epoch-ms deadline covering both the token wait and the invocation. */
  deadline: number;
}

export interface ModelSessionStatus {
  loaded: boolean;
  corrupted: boolean;
  device: string;
  busy: boolean;
  queueDepth: number;
}

export interface ModelSessionOptions {
  now?: () => number;
  /** Called once when the engine can no longer be brought back. */
  onFatal?: (error: FatalEngineError) => void;
}

/**
 * Owns the single inference engine. Every invocation holds the exclusive token
 * from before it starts until its execution unit has really finished, so a
 * timed-out invocation keeps later callers queued until teardown completes.
 */
export class ModelSession {
  private readonly token = new ExclusiveToken();
  private readonly now: () => number;
  private readonly onFatal: (error: FatalEngineError) => void;
  private loaded = false;
  private corrupted = false;
  private disposed = false;
  private loading: Promise<void> | null = null;

  constructor(
    private readonly host: EngineHost,
    options: ModelSessionOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.onFatal = options.onFatal ?? (() => undefined);
  }

  public status(): ModelSessionStatus {
    return {
      loaded: this.loaded,
      corrupted: this.corrupted,
      device: this.host.device,
      busy: this.token.isHeld,
      queueDepth: this.token.queueDepth,
    };
  }

  /** Brings the engine up. Throws FatalEngineError on failure; there is no degraded mode. */
  public load(): Promise<void> {
    if (this.loaded) {
      return Promise.resolve();
    }
    if (!this.loading) {
      this.loading = this.startHost();
    }
    return this.loading;
  }

  public async synthesize(input: SessionSynthesisInput): Promise<Result<Waveform>> {
    const unavailable = this.unavailableReason();
    if (unavailable) {
      return fail('engine_failure', unavailable);
    }

    const endWait = startStageTimer('token_wait');
    const acquiring = this.token.acquire(input.deadline - this.now());
    setEngineQueueDepth(this.token.queueDepth);
    const release = await acquiring;
    setEngineQueueDepth(this.token.queueDepth);
    const waitedMs = endWait();

    if (!release) {
      if (this.disposed) {
        return fail('engine_failure', 'inference engine was shut down');
      }
      return fail('busy', `inference engine busy; token not granted within ${Math.round(waitedMs)}ms`);
    }

    const unavailableAfterWait = this.unavailableReason();
    if (unavailableAfterWait) {
      release();
      return fail('engine_failure', unavailableAfterWait);
    }

    const remainingMs = input.deadline - this.now();
    if (remainingMs <= 0) {
      release();
      return fail('busy', 'deadline reached before the inference engine became free');
    }

    const endInference = startStageTimer('inference');
    const invocation = this.host.run(
      {
        text: input.text,
        language: input.language,
        reference: { samples: input.reference.samples, sampleRateHz: input.reference.sampleRateHz },
        params: input.params,
      },
      remainingMs,
    );

    invocation.settled.then(
      () => release(),
      (error: unknown) => {
        this.markCorrupted(error);
        release();
      },
    );

    const outcome = await invocation.outcome;
    const inferenceMs = endInference();

    if (outcome.ok) {
      log.info(
        { event: 'inference_completed', language: input.language, inference_ms: Math.round(inferenceMs), samples: outcome.waveform.samples.length },
        'inference completed',
      );
      return ok(outcome.waveform);
    }

    log.warn(
      { event: 'inference_failed', reason: outcome.reason, message: outcome.message, inference_ms: Math.round(inferenceMs) },
      'inference failed',
    );
    if (outcome.reason === 'timeout') {
      return fail('inference_timeout', outcome.message);
    }
    return fail('engine_failure', outcome.message);
  }

  public async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    const turnedAway = this.token.rejectWaiters();
    const release = await this.token.acquire(DISPOSE_WAIT_MS);
    try {
      await this.host.stop();
    } finally {
      this.loaded = false;
      release?.();
    }
    log.info({ event: 'model_session_disposed', turned_away: turnedAway }, 'model session disposed');
  }

  private async startHost(): Promise<void> {
    const startedAt = this.now();
    try {
      await this.host.start();
    } catch (error) {
      this.loading = null;
      throw new FatalEngineError(`inference engine failed to load: ${errorMessage(error)}`, error);
    }
    this.loaded = true;
    log.info(
      { event: 'model_session_loaded', device: this.host.device, load_ms: this.now() - startedAt },
      'inference engine loaded',
    );
  }

  private unavailableReason(): string | null {
    if (this.disposed) return 'inference engine was shut down';
    if (!this.loaded) return 'inference engine is not loaded';
    if (this.corrupted) return 'inference engine is unusable and must be reloaded';
    return null;
  }

  private markCorrupted(error: unknown): void {
    if (this.corrupted) return;
    this.corrupted = true;
    const fatal = new FatalEngineError(`inference engine could not be recovered: ${errorMessage(error)}`, error);
    log.fatal({ event: 'engine_corrupted', err: fatal.message }, 'inference engine corrupted');
    this.onFatal(fatal);
  }
}
