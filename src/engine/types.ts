export interface Waveform {
  samples: Float32Array;
  sampleRateHz: number;
}

/** Generation knobs forwarded to the engine as-is; unset fields use engine defaults. */
export interface SynthesisParams {
  temperature?: number;
  topP?: number;
  topK?: number;
  speed?: number;
  splitSentences?: boolean;
}

export interface EngineInvocation {
  text: string;
  language: string;
  reference: Waveform;
  params: SynthesisParams;
}

/**
 * The voice-cloning model. Not reentrant: callers must never overlap
 * `synthesize` calls on one instance.
 */
export interface InferenceEngine {
  readonly device: string;
  load(): Promise<void>;
  synthesize(input: EngineInvocation, signal?: AbortSignal): Promise<Waveform>;
  dispose(): Promise<void>;
}

export type HostOutcome =
  | { ok: true; waveform: Waveform }
  | { ok: false; reason: 'timeout' | 'engine_error' | 'engine_crashed'; message: string };

export interface HostInvocation {
  /** Settles with the caller-facing outcome, at the latest when the timeout fires. */
  outcome: Promise<HostOutcome>;
  /**
   * Settles once the execution unit is really done: finished, or terminated and
   * replaced. Rejects when the replacement could not be brought up.
   */
  settled: Promise<void>;
}

/** Isolated execution context that owns the engine instance. */
export interface EngineHost {
  readonly device: string;
  start(): Promise<void>;
  run(input: EngineInvocation, timeoutMs: number): HostInvocation;
  stop(): Promise<void>;
}
