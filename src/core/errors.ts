/**
 * Error taxonomy for registrar calls and bulk runs
 */

export type RegistrarErrorCode =
  | 'TRANSIENT'
  | 'AUTH'
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'GENERATION_EXHAUSTED'
  | 'CANCELLED';

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Base class for structured registrar errors
 */
export class RegistrarError extends Error {
  constructor(
    message: string,
    public readonly code: RegistrarErrorCode,
    public readonly retryable: boolean = false,
    public readonly statusCode?: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'RegistrarError';
  }
}

/**
 * Network failure, timeout, 5xx or rate limiting. Retried with backoff.
 */
export class TransientError extends RegistrarError {
  constructor(message: string, statusCode?: number, details?: unknown) {
    super(message, 'TRANSIENT', true, statusCode, details);
    this.name = 'TransientError';
  }

  static network(cause: unknown): TransientError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new TransientError(`Network error: ${message}`, undefined, cause);
  }

  static rateLimited(message: string = 'Rate limited by registrar'): TransientError {
    return new TransientError(message, 429);
  }
}

/**
 * Rejected credentials or a domain without API access. Never retried;
 * aborts the rest of the domain's work.
 */
export class AuthError extends RegistrarError {
  constructor(message: string = 'Authentication failed', statusCode?: number) {
    super(message, 'AUTH', false, statusCode);
    this.name = 'AuthError';
  }
}

/**
 * Payload rejected locally or by the registrar. Fatal for that record only.
 */
export class ValidationError extends RegistrarError {
  constructor(
    message: string,
    public readonly issues: FieldIssue[] = [],
    statusCode?: number
  ) {
    super(message, 'VALIDATION', false, statusCode, issues);
    this.name = 'ValidationError';
  }

  static fromIssues(subject: string, issues: FieldIssue[]): ValidationError {
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join('; ');
    return new ValidationError(`Invalid ${subject}: ${summary}`, issues);
  }
}

export class NotFoundError extends RegistrarError {
  constructor(resource: string = 'Resource', statusCode?: number) {
    super(`${resource} not found`, 'NOT_FOUND', false, statusCode);
    this.name = 'NotFoundError';
  }
}

/**
 * Random label space saturated while generating an SPF chain
 */
export class GenerationExhaustedError extends RegistrarError {
  constructor(
    public readonly attempts: number,
    public readonly position: number
  ) {
    super(
      `Could not generate a unique label for chain link ${position} after ${attempts} attempts`,
      'GENERATION_EXHAUSTED'
    );
    this.name = 'GenerationExhaustedError';
  }
}

export class CancelledError extends RegistrarError {
  constructor(message: string = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/**
 * Map anything thrown into the taxonomy. Unknown errors are treated as
 * transport failures.
 */
export function toRegistrarError(error: unknown): RegistrarError {
  if (error instanceof RegistrarError) {
    return error;
  }
  return TransientError.network(error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
