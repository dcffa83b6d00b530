// ABOUTME: Error classes shared by the AI chat pipeline and the HTTP layer.
// ABOUTME: Each class maps to one HTTP status in routes.ts; ConflictError stays internal.

/**
 * Malformed input or a missing required field. Never retried.
 */
export class ValidationError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * The intent classifier could not label the message.
 */
export class UnknownIntentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnknownIntentError';
  }
}

/**
 * The post does not exist or its chat is not open for questions.
 */
export class NotAvailableError extends Error {
  constructor(message = 'post not found or AI not enabled') {
    super(message);
    this.name = 'NotAvailableError';
  }
}

/**
 * The embedding or generation service failed or answered with something unusable.
 */
export class UpstreamError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UpstreamError';
    this.status = options?.status;
  }
}

/**
 * The primary mutation committed but a dependent cleanup step did not.
 * Callers retry `step`; the committed state is not rolled back.
 */
export class PartialFailureError extends Error {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${step} failed after the post was updated: ${detail}`, { cause });
    this.name = 'PartialFailureError';
    this.step = step;
  }
}

/**
 * A compare-and-set on a post revision lost against a concurrent writer.
 */
export class ConflictError extends Error {
  constructor(postId: string, expectedRevision: number) {
    super(`post ${postId} changed since revision ${expectedRevision}`);
    this.name = 'ConflictError';
  }
}
