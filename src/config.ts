import path from 'path';
import type { FfmpegDecoderOptions } from './audio/ffmpegDecoder';
import type { EngineSpec } from './engine/protocol';
import type { Env } from './env';
import type { ResultStoreConfig } from './storage/types';
import type { CoordinatorConfig } from './synthesis/requestCoordinator';
import type { IngestConfig } from './voice/types';

export interface RuntimeConfig {
  port: number;
  samplesDir: string;
  ingest: IngestConfig;
  decoder: FfmpegDecoderOptions;
  coordinator: CoordinatorConfig;
  store: ResultStoreConfig;
  sweepIntervalMs: number;
  engine: {
    isolation: 'worker' | 'inline';
    loadTimeoutMs: number;
    spec: EngineSpec;
  };
}

/** Splits the flat environment into the per-component records handed to constructors. */
export function buildRuntimeConfig(env: Env): RuntimeConfig {
  return {
    port: env.PORT,
    samplesDir: path.resolve(env.SAMPLES_DIR),
    ingest: {
      targetSampleRateHz: env.TARGET_SAMPLE_RATE_HZ,
      silenceThresholdDb: env.SILENCE_THRESHOLD_DB,
      silenceFrameMs: env.SILENCE_FRAME_MS,
      normalizePeak: env.NORMALIZE_PEAK,
      minReferenceSeconds: env.MIN_REFERENCE_SECONDS,
      maxReferenceSeconds: env.MAX_REFERENCE_SECONDS,
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
    },
    decoder: {
      ffmpegPath: env.FFMPEG_PATH,
      timeoutMs: env.FFMPEG_TIMEOUT_MS,
    },
    coordinator: {
      maxTextLength: env.MAX_TEXT_LENGTH,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
      targetSampleRateHz: env.TARGET_SAMPLE_RATE_HZ,
    },
    store: {
      storageDir: path.resolve(env.AUDIO_STORAGE_DIR),
      ttlMs: env.ARTIFACT_TTL_SECONDS * 1000,
    },
    sweepIntervalMs: env.ARTIFACT_SWEEP_INTERVAL_MS,
    engine: {
      isolation: env.ENGINE_ISOLATION,
      loadTimeoutMs: env.ENGINE_LOAD_TIMEOUT_MS,
      spec: {
        kind: 'xtts_http',
        url: env.XTTS_URL,
        healthUrl: env.XTTS_HEALTH_URL,
        retries: env.XTTS_REQUEST_RETRIES,
      },
    },
  };
}
