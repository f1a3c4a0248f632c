import { resampleLinear, durationMs } from '../audio/dsp';
import type { ModelSession } from '../engine/modelSession';
import { errorMessage, fail, ok, type Failure, type Result } from '../errors';
import { log } from '../log';
import { incPipelineError, incSynthesis, startStageTimer } from '../metrics';
import type { ResultStore } from '../storage/resultStore';
import type { AudioIngestor } from '../voice/audioIngestor';
import type { VoiceReference, VoiceSource } from '../voice/types';
import { isSupportedLanguage, languageNames, synthesisParams, type LanguageCode } from './languages';

export interface CoordinatorConfig {
  maxTextLength: number;
  requestTimeoutMs: number;
  targetSampleRateHz: number;
}

export interface SubmitInput {
  text: string;
  language: string;
  voice: VoiceSource;
  /** Overall budget for this request; defaults to, and is capped at, requestTimeoutMs. */
  deadlineMs?: number;
}

export interface BatchSubmitInput {
  /** Each entry may hold several newline-separated texts. */
  texts: string[];
  language: string;
  voice: VoiceSource;
  deadlineMs?: number;
}

export interface SynthesisResult {
  artifactKey: string;
  sampleRateHz: number;
  durationMs: number;
  createdAt: number;
  expiresAt: number;
}

export interface BatchItem {
  index: number;
  text: string;
  result: Result<SynthesisResult>;
}

export interface CoordinatorDeps {
  ingestor: AudioIngestor;
  session: ModelSession;
  store: ResultStore;
}

export class RequestCoordinator {
  private readonly now: () => number;

  constructor(
    private readonly deps: CoordinatorDeps,
    private readonly config: CoordinatorConfig,
    options: { now?: () => number } = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  public supportedLanguages(): Record<LanguageCode, string> {
    return languageNames();
  }

  public validateText(text: string): Result<string> {
    if (text.trim().length === 0) {
      return fail('empty_text', 'text must not be empty');
    }
    const length = Array.from(text).length;
    if (length > this.config.maxTextLength) {
      return fail('text_too_long', `text has ${length} characters; limit is ${this.config.maxTextLength}`);
    }
    return ok(text.trim());
  }

  public validateLanguage(language: string): Result<LanguageCode> {
    if (!isSupportedLanguage(language)) {
      const supported = Object.keys(languageNames()).join(', ');
      return fail('unsupported_language', `unsupported language "${language}"; supported: ${supported}`);
    }
    return ok(language);
  }

  /** Caller budgets never exceed the configured request timeout. */
  private deadlineFor(deadlineMs: number | undefined): number {
    const budget = Math.min(deadlineMs ?? this.config.requestTimeoutMs, this.config.requestTimeoutMs);
    return this.now() + budget;
  }

  public async submit(input: SubmitInput): Promise<Result<SynthesisResult>> {
    const deadline = this.deadlineFor(input.deadlineMs);

    const text = this.validateText(input.text);
    if (!text.ok) return this.reject(text);
    const language = this.validateLanguage(input.language);
    if (!language.ok) return this.reject(language);

    const reference = await this.ingest(input.voice);
    if (!reference.ok) return this.reject(reference);

    const result = await this.synthesizeAndStore(text.value, language.value, reference.value, deadline);
    return result.ok ? result : this.reject(result);
  }

  /**
   * Synthesizes several texts with one reference voice. Items run one after another
   * under a shared deadline; a bad item does not fail the batch, a bad voice does.
   */
  public async submitBatch(input: BatchSubmitInput): Promise<Result<BatchItem[]>> {
    const deadline = this.deadlineFor(input.deadlineMs);

    const texts = input.texts
      .flatMap((entry) => entry.split('\n'))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
    if (texts.length === 0) {
      return this.reject(fail('empty_text', 'batch contains no text'));
    }
    const language = this.validateLanguage(input.language);
    if (!language.ok) return this.reject(language);

    const reference = await this.ingest(input.voice);
    if (!reference.ok) return this.reject(reference);

    const items: BatchItem[] = [];
    for (const [index, rawText] of texts.entries()) {
      const text = this.validateText(rawText);
      const result = text.ok
        ? await this.synthesizeAndStore(text.value, language.value, reference.value, deadline)
        : text;
      items.push({ index, text: rawText, result: result.ok ? result : this.reject(result) });
    }

    log.info(
      {
        event: 'synthesis_batch_completed',
        total: items.length,
        succeeded: items.filter((item) => item.result.ok).length,
      },
      'synthesis batch completed',
    );
    return ok(items);
  }

  private async ingest(voice: VoiceSource): Promise<Result<VoiceReference>> {
    const endIngest = startStageTimer('ingest');
    const reference = await this.deps.ingestor.resolve(voice);
    endIngest();
    return reference;
  }

  private async synthesizeAndStore(
    text: string,
    language: LanguageCode,
    reference: VoiceReference,
    deadline: number,
  ): Promise<Result<SynthesisResult>> {
    const waveform = await this.deps.session.synthesize({
      text,
      language,
      reference,
      params: synthesisParams(language),
      deadline,
    });
    if (!waveform.ok) return waveform;

    const targetRate = this.config.targetSampleRateHz;
    const samples =
      waveform.value.sampleRateHz === targetRate
        ? waveform.value.samples
        : resampleLinear(waveform.value.samples, waveform.value.sampleRateHz, targetRate);
    if (samples.length === 0) {
      return fail('engine_failure', 'engine returned no audio');
    }

    const endStore = startStageTimer('store');
    try {
      const stored = await this.deps.store.put(samples, targetRate);
      endStore();
      incSynthesis(language, reference.origin);
      log.info(
        {
          event: 'synthesis_stored',
          artifact_key: stored.key,
          language,
          voice_origin: reference.origin,
          voice_identity: reference.identity,
          duration_ms: Math.round(durationMs(samples.length, targetRate)),
        },
        'synthesis stored',
      );
      return ok({
        artifactKey: stored.key,
        sampleRateHz: stored.sampleRateHz,
        durationMs: stored.durationMs,
        createdAt: stored.createdAt,
        expiresAt: stored.expiresAt,
      });
    } catch (error) {
      endStore();
      log.error({ event: 'artifact_store_failed', err: errorMessage(error) }, 'artifact store failed');
      return fail('storage_failure', 'synthesized audio could not be stored');
    }
  }

  private reject(failure: Failure): Failure {
    incPipelineError(failure.error.kind);
    log.info(
      { event: 'synthesis_rejected', kind: failure.error.kind, category: failure.error.category },
      failure.error.message,
    );
    return failure;
  }
}
