import { errorMessage } from '../errors';
import { clampTimerDelay } from './timerDelay';
import type { EngineHost, EngineInvocation, HostInvocation, HostOutcome, InferenceEngine } from './types';

/**
 * Runs the engine on the main event loop. On timeout the invocation's signal is
 * aborted; `settled` still waits for the engine call to return, so only engines
 * that honour the signal (HTTP clients) should be hosted this way.
 */
export class InlineEngineHost implements EngineHost {
  constructor(private readonly engine: InferenceEngine) {}

  public get device(): string {
    return this.engine.device;
  }

  public async start(): Promise<void> {
    await this.engine.load();
  }

  public run(input: EngineInvocation, timeoutMs: number): HostInvocation {
    const controller = new AbortController();
    const completion: Promise<HostOutcome> = Promise.resolve()
      .then(() => this.engine.synthesize(input, controller.signal))
      .then(
        (waveform): HostOutcome => ({ ok: true, waveform }),
        (error: unknown): HostOutcome => ({ ok: false, reason: 'engine_error', message: errorMessage(error) }),
      );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<HostOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, reason: 'timeout', message: `inference exceeded ${timeoutMs}ms` });
      }, clampTimerDelay(timeoutMs));
    });

    const outcome = Promise.race([completion, timeout]).finally(() => clearTimeout(timer));
    return { outcome, settled: completion.then(() => undefined) };
  }

  public async stop(): Promise<void> {
    await this.engine.dispose();
  }
}
