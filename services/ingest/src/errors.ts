import type { RunSummary } from './orchestrator/types';

export type IngestErrorCode =
  | 'http_error'
  | 'malformed_response'
  | 'auth_failed'
  | 'object_exists'
  | 'object_store_error'
  | 'partition_decode_failed'
  | 'run_failed';

export class HttpRequestError extends Error {
  readonly code: IngestErrorCode = 'http_error';
  readonly status: number | null;
  readonly url: string;
  readonly method: string;
  readonly responseBody?: string;

  constructor(options: { method: string; url: string; status: number | null; body?: string; message?: string; cause?: unknown }) {
    const baseMessage =
      options.message ??
      (options.status === null
        ? `Request to ${options.method.toUpperCase()} ${options.url} failed before a response was received`
        : `Request to ${options.method.toUpperCase()} ${options.url} failed with status ${options.status}`);
    super(baseMessage, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'HttpRequestError';
    this.status = options.status;
    this.url = options.url;
    this.method = options.method.toUpperCase();
    this.responseBody = options.body;
  }

  /** Network failures, 429 and 5xx responses. */
  get transient(): boolean {
    return this.status === null || this.status === 429 || this.status >= 500;
  }
}

export class MalformedResponseError extends Error {
  readonly code: IngestErrorCode = 'malformed_response';
  readonly url: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, url: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MalformedResponseError';
    this.url = url;
    this.details = details;
  }
}

export class AuthenticationError extends Error {
  readonly code: IngestErrorCode = 'auth_failed';
  readonly status: number | null;

  constructor(message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AuthenticationError';
    this.status = options.status ?? null;
  }
}

export class ObjectStoreError extends Error {
  readonly code: IngestErrorCode;
  readonly path: string;

  constructor(message: string, code: 'object_exists' | 'object_store_error', path: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ObjectStoreError';
    this.code = code;
    this.path = path;
  }
}

export class PartitionDecodeError extends Error {
  readonly code: IngestErrorCode = 'partition_decode_failed';
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Existing partition ${path} could not be decoded${reason}`, cause === undefined ? undefined : { cause });
    this.name = 'PartitionDecodeError';
    this.path = path;
  }
}

export class IngestionRunError extends Error {
  readonly code: IngestErrorCode = 'run_failed';
  readonly summary: RunSummary;

  constructor(summary: RunSummary) {
    super(`Ingestion run failed: ${summary.errorCount} errors and no successful streams`);
    this.name = 'IngestionRunError';
    this.summary = summary;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
