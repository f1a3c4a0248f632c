import { z } from 'zod';

// Messages exchanged between WorkerEngineHost and engineWorker. Both sides parse what
// they receive, since structured clone gives no type guarantees.

const WaveformSchema = z.object({
  samples: z.instanceof(Float32Array),
  sampleRateHz: z.number().int().positive(),
});

const SynthesisParamsSchema = z.object({
  temperature: z.number().optional(),
  topP: z.number().optional(),
  topK: z.number().int().optional(),
  speed: z.number().positive().optional(),
  splitSentences: z.boolean().optional(),
});

export const EngineSpecSchema = z.object({
  kind: z.literal('xtts_http'),
  url: z.string().url(),
  healthUrl: z.string().url().optional(),
  retries: z.number().int().min(0),
});

export type EngineSpec = z.infer<typeof EngineSpecSchema>;

export const EngineWorkerDataSchema = z.object({
  engine: EngineSpecSchema,
});

export type EngineWorkerData = z.infer<typeof EngineWorkerDataSchema>;

export const WorkerRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('load') }),
  z.object({
    type: z.literal('synthesize'),
    id: z.number().int(),
    input: z.object({
      text: z.string(),
      language: z.string(),
      reference: WaveformSchema,
      params: SynthesisParamsSchema,
    }),
  }),
  z.object({ type: z.literal('dispose') }),
]);

export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;

export const WorkerResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready'), device: z.string() }),
  z.object({ type: z.literal('load_failed'), message: z.string() }),
  z.object({ type: z.literal('result'), id: z.number().int(), waveform: WaveformSchema }),
  z.object({ type: z.literal('error'), id: z.number().int(), message: z.string() }),
  z.object({ type: z.literal('disposed') }),
]);

export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;
