import dotenv from 'dotenv';
import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from './engine/timerDelay';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(7860)),
  TARGET_SAMPLE_RATE_HZ: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(8000).max(48000).default(22050),
  ),
  SILENCE_THRESHOLD_DB: z.preprocess(emptyToUndefined, z.coerce.number().max(0).default(-50)),
  SILENCE_FRAME_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(20)),
  NORMALIZE_PEAK: z.preprocess(emptyToUndefined, z.coerce.number().positive().max(1).default(0.95)),
  MIN_REFERENCE_SECONDS: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(2)),
  MAX_REFERENCE_SECONDS: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(30)),
  MAX_TEXT_LENGTH: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5000)),
  MAX_UPLOAD_BYTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(50 * 1024 * 1024),
  ),
  REQUEST_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(300_000),
  ),
  ARTIFACT_TTL_SECONDS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(3600),
  ),
  ARTIFACT_SWEEP_INTERVAL_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(60_000),
  ),
  AUDIO_STORAGE_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('./output')),
  SAMPLES_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('./samples')),
  ENGINE_ISOLATION: z.preprocess(emptyToUndefined, z.enum(['worker', 'inline']).default('worker')),
  ENGINE_LOAD_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(600_000),
  ),
  XTTS_URL: z.string().url(),
  XTTS_HEALTH_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  XTTS_REQUEST_RETRIES: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(1)),
  FFMPEG_PATH: z.preprocess(emptyToUndefined, z.string().min(1).default('ffmpeg')),
  FFMPEG_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30_000),
  ),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env: Env = parsed.data;
