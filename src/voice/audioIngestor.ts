import { createHash } from 'crypto';
import {
  dbToAmplitude,
  downmixToMono,
  durationMs,
  normalizePeak,
  resampleLinear,
  trimSilence,
  truncate,
} from '../audio/dsp';
import type { ExternalAudioDecoder } from '../audio/ffmpegDecoder';
import { decodeWav, looksLikeWav, type DecodedAudio } from '../audio/wavCodec';
import { errorMessage, fail, ok, type Result } from '../errors';
import { log } from '../log';
import type { CatalogVoiceSummary, VoiceCatalog } from './catalog';
import type { IngestConfig, VoiceOrigin, VoiceReference, VoiceSource } from './types';

const MIN_INPUT_RATE_HZ = 4000;
const MAX_INPUT_RATE_HZ = 384_000;
// Audio kept ahead of resampling beyond the maximum reference, for silence to be trimmed from.
const TRIM_HEADROOM_SECONDS = 30;

const WAV_MIME_TYPES = new Set(['audio/wav', 'audio/x-wav', 'audio/wave', 'audio/vnd.wave']);

const EXTERNAL_MIME_TYPES = new Set([
  'audio/mpeg',
  'audio/mp3',
  'audio/flac',
  'audio/x-flac',
  'audio/mp4',
  'audio/m4a',
  'audio/x-m4a',
  'audio/aac',
  'audio/ogg',
  'audio/opus',
  'audio/webm',
]);

export function normalizeMime(mime: string): string {
  return mime.split(';')[0].trim().toLowerCase();
}

export function isSupportedUploadMime(mime: string): boolean {
  const normalized = normalizeMime(mime);
  return WAV_MIME_TYPES.has(normalized) || EXTERNAL_MIME_TYPES.has(normalized);
}

function copyReference(reference: VoiceReference): VoiceReference {
  return { ...reference, samples: Float32Array.from(reference.samples) };
}

export class AudioIngestor {
  private readonly sampleCache = new Map<string, VoiceReference>();
  private readonly silenceAmplitude: number;

  constructor(
    private readonly catalog: VoiceCatalog,
    private readonly config: IngestConfig,
    private readonly externalDecoder: ExternalAudioDecoder,
  ) {
    this.silenceAmplitude = dbToAmplitude(config.silenceThresholdDb);
  }

  public resolve(source: VoiceSource): Promise<Result<VoiceReference>> {
    if (source.kind === 'catalog') {
      return this.resolveSample(source.name);
    }
    return this.ingestUpload(source.bytes, source.mime);
  }

  public async resolveSample(name: string): Promise<Result<VoiceReference>> {
    const cached = this.sampleCache.get(name);
    if (cached) {
      return ok(copyReference(cached));
    }

    const entry = this.catalog.get(name);
    if (!entry) {
      return fail('sample_not_found', `sample voice not found: ${name}`);
    }

    let decoded: DecodedAudio;
    try {
      decoded = looksLikeWav(entry.bytes)
        ? decodeWav(entry.bytes)
        : await this.externalDecoder.decode(entry.bytes, 'application/octet-stream');
    } catch (error) {
      log.error({ event: 'catalog_decode_failed', voice: name, err: errorMessage(error) }, 'catalog sample decode failed');
      return fail('unsupported_format', `sample voice could not be decoded: ${name}`);
    }

    const result = this.safePreprocess(decoded, 'catalog', name);
    if (result.ok) {
      this.sampleCache.set(name, result.value);
      return ok(copyReference(result.value));
    }
    return result;
  }

  public async ingestUpload(bytes: Buffer, declaredMime: string): Promise<Result<VoiceReference>> {
    if (bytes.length > this.config.maxUploadBytes) {
      return fail(
        'file_too_large',
        `upload is ${bytes.length} bytes; limit is ${this.config.maxUploadBytes} bytes`,
      );
    }

    const mime = normalizeMime(declaredMime);
    let decoded: DecodedAudio;
    try {
      if (looksLikeWav(bytes)) {
        decoded = decodeWav(bytes);
      } else if (WAV_MIME_TYPES.has(mime)) {
        return fail('unsupported_format', 'upload declared as WAV but has no RIFF/WAVE header');
      } else if (EXTERNAL_MIME_TYPES.has(mime)) {
        decoded = await this.externalDecoder.decode(bytes, mime);
      } else {
        return fail('unsupported_format', `unsupported audio type: ${mime || 'unknown'}`);
      }
    } catch (error) {
      log.warn({ event: 'upload_decode_failed', mime, len: bytes.length, err: errorMessage(error) }, 'upload decode failed');
      return fail('unsupported_format', 'uploaded audio could not be decoded');
    }

    const identity = createHash('sha256').update(bytes).digest('hex');
    return this.safePreprocess(decoded, 'uploaded', identity);
  }

  /** Decodes and normalizes every catalog voice up front; returns the names that failed. */
  public async preloadCatalog(): Promise<string[]> {
    const failed: string[] = [];
    for (const name of this.catalog.names()) {
      const result = await this.resolveSample(name);
      if (!result.ok) {
        log.warn({ event: 'catalog_voice_unusable', voice: name, reason: result.error.kind }, 'catalog voice unusable');
        failed.push(name);
      }
    }
    return failed;
  }

  public listSamples(): Record<string, CatalogVoiceSummary[]> {
    return this.catalog.byLanguage();
  }

  private safePreprocess(decoded: DecodedAudio, origin: VoiceOrigin, identity: string): Result<VoiceReference> {
    if (decoded.sampleRateHz < MIN_INPUT_RATE_HZ || decoded.sampleRateHz > MAX_INPUT_RATE_HZ) {
      return fail(
        'unsupported_format',
        `sample rate ${decoded.sampleRateHz}Hz is outside ${MIN_INPUT_RATE_HZ}-${MAX_INPUT_RATE_HZ}Hz`,
      );
    }
    try {
      return this.preprocess(decoded, origin, identity);
    } catch (error) {
      log.error({ event: 'reference_preprocess_failed', origin, identity, err: errorMessage(error) }, 'reference preprocessing failed');
      return fail('unsupported_format', 'reference audio could not be processed');
    }
  }

  private preprocess(
    decoded: DecodedAudio,
    origin: VoiceOrigin,
    identity: string,
  ): Result<VoiceReference> {
    const targetRate = this.config.targetSampleRateHz;
    const inputLimit = Math.ceil((this.config.maxReferenceSeconds + TRIM_HEADROOM_SECONDS) * decoded.sampleRateHz);
    const mono = truncate(downmixToMono(decoded.channels), inputLimit);
    const resampled = resampleLinear(mono, decoded.sampleRateHz, targetRate);
    const trimmed = trimSilence(resampled, targetRate, this.silenceAmplitude, this.config.silenceFrameMs);

    if (trimmed.length === 0) {
      return fail('silence_only', 'reference audio contains only silence');
    }
    const minSamples = Math.ceil(this.config.minReferenceSeconds * targetRate);
    if (trimmed.length < minSamples) {
      const seconds = (trimmed.length / targetRate).toFixed(2);
      return fail(
        'silence_only',
        `reference audio has ${seconds}s of usable audio; at least ${this.config.minReferenceSeconds}s required`,
      );
    }

    const normalized = normalizePeak(trimmed, this.config.normalizePeak);
    const samples = truncate(normalized, this.config.maxReferenceSeconds * targetRate);

    log.debug(
      {
        event: 'reference_ingested',
        origin,
        identity,
        input_rate_hz: decoded.sampleRateHz,
        input_channels: decoded.channels.length,
        output_samples: samples.length,
      },
      'reference ingested',
    );

    return ok({
      samples,
      sampleRateHz: targetRate,
      origin,
      identity,
      durationMs: durationMs(samples.length, targetRate),
    });
  }
}
