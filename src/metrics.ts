import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS; this module records
 * true milliseconds to match the *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_clone_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 120000],
  registers: [register],
});

// ingest / token_wait / inference / store
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Synthesis pipeline stage duration in milliseconds',
  labelNames: ['stage'] as const,
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 120000, 300000],
  registers: [register],
});

const pipelineErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}pipeline_errors_total`,
  help: 'Synthesis failures by error kind',
  labelNames: ['kind'] as const,
  registers: [register],
});

const synthesisTotal = new client.Counter({
  name: `${METRICS_PREFIX}synthesis_total`,
  help: 'Successful synthesis requests by language and voice origin',
  labelNames: ['language', 'origin'] as const,
  registers: [register],
});

const engineQueueDepth = new client.Gauge({
  name: `${METRICS_PREFIX}engine_queue_depth`,
  help: 'Callers waiting for the inference engine token',
  registers: [register],
});

const artifactsSweptTotal = new client.Counter({
  name: `${METRICS_PREFIX}artifacts_swept_total`,
  help: 'Expired artifacts removed from storage',
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return `${req.baseUrl}${routePath}`;
  }

  const raw = req.path || req.url || 'unknown';
  return raw.replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':key');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts a stage timer and returns an end() function that records
 * milliseconds in stageDurationMs.
 */
export function startStageTimer(stage: string): () => number {
  const start = nowNs();
  return () => {
    const durationMs = nsToMs(nowNs() - start);
    stageDurationMs.observe({ stage }, durationMs);
    return durationMs;
  };
}

export function incPipelineError(kind: string): void {
  pipelineErrorsTotal.inc({ kind });
}

export function incSynthesis(language: string, origin: string): void {
  synthesisTotal.inc({ language, origin });
}

export function setEngineQueueDepth(depth: number): void {
  engineQueueDepth.set(depth);
}

export function incArtifactsSwept(count: number): void {
  if (count > 0) artifactsSweptTotal.inc(count);
}
