import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ErrorKind, PipelineError } from '../errors';

const BUSY_RETRY_AFTER_SECONDS = 5;

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  empty_text: 400,
  text_too_long: 400,
  unsupported_language: 400,
  sample_not_found: 404,
  unsupported_format: 415,
  file_too_large: 413,
  silence_only: 400,
  busy: 503,
  inference_timeout: 504,
  engine_failure: 500,
  not_found: 404,
  storage_failure: 500,
};

export function statusForError(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function sendPipelineError(res: Response, error: PipelineError): void {
  if (error.kind === 'busy') {
    res.setHeader('Retry-After', String(BUSY_RETRY_AFTER_SECONDS));
  }
  res.status(statusForError(error.kind)).json({
    error: error.kind,
    category: error.category,
    retryable: error.retryable,
    message: error.message,
  });
}

/** Express 4 does not observe rejected handlers; forward them to the error handler. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
