import express, { Request, Response, Router } from 'express';
import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../engine/timerDelay';
import type { Result } from '../errors';
import type { BatchItem, SynthesisResult, RequestCoordinator } from '../synthesis/requestCoordinator';
import type { AudioIngestor } from '../voice/audioIngestor';
import { asyncRoute, sendPipelineError } from './httpErrors';

const deadlineMs = z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).optional();

// Room for text and the other fields next to the encoded reference.
const UPLOAD_FIELDS_ALLOWANCE_BYTES = 1024 * 1024;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const referenceAudio = z.string().min(1).regex(BASE64_PATTERN, 'must be base64-encoded audio');
const texts = z.union([z.string(), z.array(z.string())]);

const CatalogSynthesisSchema = z.object({
  text: z.string(),
  language: z.string().default('en'),
  sample: z.string().min(1),
  deadline_ms: deadlineMs,
});

const UploadSynthesisSchema = z.object({
  text: z.string(),
  language: z.string().default('en'),
  reference_audio: referenceAudio,
  reference_mime: z.string().default(''),
  deadline_ms: deadlineMs,
});

const BatchSynthesisSchema = z.object({
  texts,
  language: z.string().default('en'),
  sample: z.string().min(1),
  deadline_ms: deadlineMs,
});

const BatchUploadSynthesisSchema = z.object({
  texts,
  language: z.string().default('en'),
  reference_audio: referenceAudio,
  reference_mime: z.string().default(''),
  deadline_ms: deadlineMs,
});

function base64Length(bytes: number): number {
  return Math.ceil(bytes / 3) * 4;
}

function toResponseBody(result: SynthesisResult): Record<string, string | number> {
  return {
    artifact_key: result.artifactKey,
    sample_rate: result.sampleRateHz,
    duration_ms: Math.round(result.durationMs),
    expires_at: new Date(result.expiresAt).toISOString(),
    url: `/v1/artifacts/${result.artifactKey}`,
  };
}

function sendBatch(res: Response, result: Result<BatchItem[]>): void {
  if (!result.ok) {
    sendPipelineError(res, result.error);
    return;
  }
  res.status(200).json({
    total: result.value.length,
    results: result.value.map((item) =>
      item.result.ok
        ? { index: item.index, text: item.text, status: 'success', ...toResponseBody(item.result.value) }
        : { index: item.index, text: item.text, status: 'error', error: item.result.error.kind, message: item.result.error.message },
    ),
  });
}

function sendInvalidRequest(res: Response, issues: z.ZodIssue[]): void {
  res.status(400).json({
    error: 'invalid_request',
    issues: issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
}

export function createSynthesisRouter(
  coordinator: RequestCoordinator,
  ingestor: AudioIngestor,
  options: { maxUploadBytes: number },
): Router {
  const router = Router();

  router.get('/languages', (_req, res) => {
    const languages = coordinator.supportedLanguages();
    res.status(200).json({ languages, total: Object.keys(languages).length });
  });

  router.get('/samples', (_req, res) => {
    const languages: Record<string, string> = coordinator.supportedLanguages();
    const samples = Object.entries(ingestor.listSamples()).map(([language, voices]) => ({
      language,
      language_name: languages[language] ?? language,
      voices: voices.map((voice) => ({ name: voice.name, display_name: voice.displayName })),
    }));
    res.status(200).json({ samples });
  });

  router.post('/synthesize', express.json({ limit: '1mb' }), asyncRoute(async (req: Request, res: Response) => {
    const parsed = CatalogSynthesisSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error.issues);
      return;
    }

    const result = await coordinator.submit({
      text: parsed.data.text,
      language: parsed.data.language,
      voice: { kind: 'catalog', name: parsed.data.sample },
      deadlineMs: parsed.data.deadline_ms,
    });
    if (!result.ok) {
      sendPipelineError(res, result.error);
      return;
    }
    res.status(200).json(toResponseBody(result.value));
  }));

  // The reference travels base64-encoded beside the text. The parser admits one
  // byte more than the upload limit so the ingestor reports file_too_large itself.
  const uploadJson = express.json({
    limit: base64Length(options.maxUploadBytes + 1) + UPLOAD_FIELDS_ALLOWANCE_BYTES,
  });

  const decodeReference = (res: Response, encoded: string): Buffer | null => {
    const bytes = Buffer.from(encoded, 'base64');
    if (bytes.length === 0) {
      res.status(400).json({ error: 'missing_reference_audio' });
      return null;
    }
    return bytes;
  };

  router.post('/synthesize/upload', uploadJson, asyncRoute(async (req: Request, res: Response) => {
    const parsed = UploadSynthesisSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error.issues);
      return;
    }
    const bytes = decodeReference(res, parsed.data.reference_audio);
    if (!bytes) {
      return;
    }

    const result = await coordinator.submit({
      text: parsed.data.text,
      language: parsed.data.language,
      voice: { kind: 'upload', bytes, mime: parsed.data.reference_mime },
      deadlineMs: parsed.data.deadline_ms,
    });
    if (!result.ok) {
      sendPipelineError(res, result.error);
      return;
    }
    res.status(200).json(toResponseBody(result.value));
  }));

  router.post('/synthesize/batch', express.json({ limit: '1mb' }), asyncRoute(async (req: Request, res: Response) => {
    const parsed = BatchSynthesisSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error.issues);
      return;
    }

    const result = await coordinator.submitBatch({
      texts: typeof parsed.data.texts === 'string' ? [parsed.data.texts] : parsed.data.texts,
      language: parsed.data.language,
      voice: { kind: 'catalog', name: parsed.data.sample },
      deadlineMs: parsed.data.deadline_ms,
    });
    sendBatch(res, result);
  }));

  router.post('/synthesize/batch/upload', uploadJson, asyncRoute(async (req: Request, res: Response) => {
    const parsed = BatchUploadSynthesisSchema.safeParse(req.body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error.issues);
      return;
    }
    const bytes = decodeReference(res, parsed.data.reference_audio);
    if (!bytes) {
      return;
    }

    const result = await coordinator.submitBatch({
      texts: typeof parsed.data.texts === 'string' ? [parsed.data.texts] : parsed.data.texts,
      language: parsed.data.language,
      voice: { kind: 'upload', bytes, mime: parsed.data.reference_mime },
      deadlineMs: parsed.data.deadline_ms,
    });
    sendBatch(res, result);
  }));

  return router;
}
