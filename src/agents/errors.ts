import { z } from 'zod';

export class TimeoutError extends Error {
  constructor(
    public readonly agent: string,
    public readonly timeoutMs: number
  ) {
    super(`Agent ${agent} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

/**
 * Failure reported by the text-generation service. `status` is the HTTP
 * status when the service gave one; network failures leave it undefined.
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServiceError';
  }
}

export class EmptyResponseError extends Error {
  constructor(public readonly agent: string) {
    super(`Agent ${agent} returned an empty response`);
    this.name = 'EmptyResponseError';
  }
}

/** Response text that could not be parsed or validated; retried with feedback. */
export class MalformedResponseError extends Error {
  constructor(
    public readonly agent: string,
    reason: string,
    public readonly validationErrors?: z.ZodError
  ) {
    super(`Agent ${agent} returned a malformed response: ${reason}`);
    this.name = 'MalformedResponseError';
  }
}

export class SchemaValidationError extends Error {
  constructor(
    public readonly agent: string,
    public readonly validationErrors: z.ZodError,
    public readonly attempts: number
  ) {
    super(
      `Agent ${agent} failed schema validation after ${attempts} attempts: ${validationErrors.message}`
    );
    this.name = 'SchemaValidationError';
  }
}

export class AgentExecutionError extends Error {
  constructor(
    public readonly agent: string,
    public readonly originalError: Error,
    public readonly attempts: number
  ) {
    super(`Agent ${agent} execution failed after ${attempts} attempt(s): ${originalError.message}`);
    this.name = 'AgentExecutionError';
    this.cause = originalError;
  }
}

export class ExtractionError extends Error {
  constructor(
    public readonly documentId: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to extract text from ${documentId}: ${reason}`, options);
    this.name = 'ExtractionError';
  }
}

export class AnalysisError extends Error {
  constructor(
    public readonly documentId: string,
    public readonly originalError: Error
  ) {
    super(`Failed to analyze ${documentId}: ${originalError.message}`);
    this.name = 'AnalysisError';
    this.cause = originalError;
  }
}

export class CitationError extends Error {
  constructor(
    public readonly documentId: string,
    public readonly originalError: Error
  ) {
    super(`Failed to resolve citation metadata for ${documentId}: ${originalError.message}`);
    this.name = 'CitationError';
    this.cause = originalError;
  }
}

export class SynthesisError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SynthesisError';
  }
}

export class RunCancelledError extends Error {
  constructor(stage: string) {
    super(`Review run cancelled during ${stage}`);
    this.name = 'RunCancelledError';
  }
}

/** Per-document failures that exclude the document from the review. */
export type DocumentError = ExtractionError | AnalysisError;

/** Run-level failures that abort the review without writing output. */
export type RunError = SynthesisError | RunCancelledError;

export type ErrorClass = 'transient' | 'permanent';

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

export function classifyError(error: unknown): ErrorClass {
  if (error instanceof RateLimitError) return 'transient';
  if (error instanceof TimeoutError) return 'transient';
  if (error instanceof EmptyResponseError) return 'transient';
  if (error instanceof MalformedResponseError) return 'transient';
  if (error instanceof ServiceError) {
    if (error.status === undefined) return 'transient';
    return TRANSIENT_STATUSES.has(error.status) ? 'transient' : 'permanent';
  }
  if (error instanceof RunCancelledError) return 'permanent';

  const msg = error instanceof Error ? error.message : String(error);
  const is429 =
    msg.includes(' 429 ') ||
    msg.includes('"code": "429"') ||
    msg.toLowerCase().includes('too many requests');
  const is5xx =
    msg.includes(' 500 ') ||
    msg.includes(' 502 ') ||
    msg.includes(' 503 ') ||
    msg.includes(' 504 ');
  return is429 || is5xx ? 'transient' : 'permanent';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
