import { fetch, type RequestInit, type Response } from 'undici';
import { downmixToMono } from '../audio/dsp';
import { decodeWav, encodeWavPcm16 } from '../audio/wavCodec';
import { log } from '../log';
import { withRetry } from '../retry';
import type { EngineInvocation, InferenceEngine, Waveform } from './types';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface XttsHttpEngineOptions {
  url: string;
  healthUrl?: string;
  retries: number;
}

function deriveHealthUrl(url: string): string {
  const parsed = new URL(url);
  parsed.pathname = parsed.pathname.replace(/\/[^/]*$/, '/health');
  parsed.search = '';
  return parsed.toString();
}

/**
 * Client for an XTTS-compatible inference server: text + language + speaker_wav
 * (the reference voice, sent inline as base64 WAV). Returns WAV audio.
 */
export class XttsHttpEngine implements InferenceEngine {
  public readonly device: string;
  private loaded = false;
  private readonly healthUrl: string;

  constructor(
    private readonly options: XttsHttpEngineOptions,
    private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init),
  ) {
    this.device = `xtts_http:${new URL(options.url).host}`;
    this.healthUrl = options.healthUrl ?? deriveHealthUrl(options.url);
  }

  public async load(): Promise<void> {
    const response = await this.fetchImpl(this.healthUrl, { method: 'GET' });
    if (!response.ok) {
      throw new Error(`xtts health check failed with status ${response.status}`);
    }
    this.loaded = true;
    log.info({ event: 'xtts_engine_loaded', health_url: this.healthUrl }, 'xtts engine ready');
  }

  public async synthesize(input: EngineInvocation, signal?: AbortSignal): Promise<Waveform> {
    if (!this.loaded) {
      throw new Error('xtts engine is not loaded');
    }

    const body: Record<string, string | number | boolean> = {
      text: input.text,
      language: input.language,
      speaker_wav: encodeWavPcm16(input.reference.samples, input.reference.sampleRateHz).toString('base64'),
    };
    // XTTS v2 tuning: only what the caller set
    if (input.params.temperature != null) body.temperature = input.params.temperature;
    if (input.params.topP != null) body.top_p = input.params.topP;
    if (input.params.topK != null) body.top_k = input.params.topK;
    if (input.params.speed != null) body.speed = input.params.speed;
    if (input.params.splitSentences != null) body.split_sentences = input.params.splitSentences;

    log.info(
      { event: 'tts_request', provider: 'xtts_http', language: input.language, text_len: input.text.length },
      'xtts request',
    );

    const { contentType, raw } = await withRetry(
      async () => {
        const res = await this.fetchImpl(this.options.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(body),
          signal,
        });

        const ct = res.headers.get('content-type') ?? '';
        const rawBuf = Buffer.from(await res.arrayBuffer());

        if (!res.ok) {
          log.error({ status: res.status, body: rawBuf.toString('utf8').slice(0, 500) }, 'xtts error');
          throw new Error(`xtts error ${res.status}`);
        }

        return { contentType: ct, raw: rawBuf };
      },
      { label: 'xtts_http', retries: this.options.retries, signal },
    );

    if (contentType.includes('application/json')) {
      let errMsg: string;
      try {
        const json = JSON.parse(raw.toString('utf8')) as { error?: string; detail?: string };
        errMsg = json.error ?? json.detail ?? raw.toString('utf8');
      } catch {
        errMsg = raw.toString('utf8');
      }
      throw new Error(`xtts: ${errMsg}`);
    }

    const decoded = decodeWav(raw);
    return { samples: downmixToMono(decoded.channels), sampleRateHz: decoded.sampleRateHz };
  }

  public async dispose(): Promise<void> {
    this.loaded = false;
  }
}
