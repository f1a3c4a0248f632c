import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import type { ModelSession } from './engine/modelSession';
import { fail } from './errors';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createArtifactsRouter } from './routes/artifacts';
import { createHealthRouter } from './routes/health';
import { asyncRoute, sendPipelineError } from './routes/httpErrors';
import { createSynthesisRouter } from './routes/synthesis';
import type { ResultStore } from './storage/resultStore';
import type { RequestCoordinator } from './synthesis/requestCoordinator';
import type { AudioIngestor } from './voice/audioIngestor';

type RequestWithId = Request & { id?: string };

export interface ServerDeps {
  coordinator: RequestCoordinator;
  ingestor: AudioIngestor;
  session: ModelSession;
  store: ResultStore;
}

export interface ServerOptions {
  maxUploadBytes: number;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  (req as RequestWithId).id = requestId;
  next();
}

/** body-parser failures carry a `type` tag; everything else is unexpected. */
function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('type' in err)) {
    return undefined;
  }
  return typeof err.type === 'string' ? err.type : undefined;
}

function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const type = bodyParserErrorType(err);
  if (type === 'entity.too.large') {
    sendPipelineError(res, fail('file_too_large', 'request body exceeds the upload limit').error);
    return;
  }
  if (type === 'entity.parse.failed') {
    res.status(400).json({ error: 'invalid_json' });
    return;
  }

  log.error({ err, request_id: (req as RequestWithId).id }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export function buildServer(deps: ServerDeps, options: ServerOptions): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter(deps.session));
  app.get('/metrics', asyncRoute(metricsHandler));
  app.use('/v1', createSynthesisRouter(deps.coordinator, deps.ingestor, options));
  app.use('/v1/artifacts', createArtifactsRouter(deps.store));

  app.use(errorHandler);

  const server = http.createServer(app);
  return { app, server };
}
