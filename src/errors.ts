const ERROR_CATEGORIES = {
  empty_text: 'validation',
  text_too_long: 'validation',
  unsupported_language: 'validation',
  sample_not_found: 'resource',
  unsupported_format: 'resource',
  file_too_large: 'resource',
  silence_only: 'resource',
  busy: 'concurrency',
  inference_timeout: 'inference',
  engine_failure: 'inference',
  not_found: 'storage',
  storage_failure: 'storage',
} as const;

export type ErrorKind = keyof typeof ERROR_CATEGORIES;
export type ErrorCategory = (typeof ERROR_CATEGORIES)[ErrorKind];

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['busy', 'inference_timeout']);

export interface PipelineError {
  kind: ErrorKind;
  category: ErrorCategory;
  retryable: boolean;
  message: string;
}

export interface Failure {
  ok: false;
  error: PipelineError;
}

export type Result<T> = { ok: true; value: T } | Failure;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(kind: ErrorKind, message: string): Failure {
  return {
    ok: false,
    error: {
      kind,
      category: ERROR_CATEGORIES[kind],
      retryable: RETRYABLE_KINDS.has(kind),
      message,
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Thrown for the two conditions the pipeline does not turn into a typed result:
 * engine load failure at startup and an engine that could not be recovered.
 */
export class FatalEngineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'FatalEngineError';
  }
}
