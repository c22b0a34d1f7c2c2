// ═══════════════════════════════════════════════════════════════════════════════
// ABSTRACT API ERRORS — Remote, Transport, Decoding and Validation Failures
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The single structured error for anything that went wrong on the remote side:
 * non-2xx responses, transport failures (status 500) and undecodable bodies.
 */
export class AbstractApiError extends Error {
  readonly status: number;
  readonly details: unknown;

  constructor(status: number, message: string, details: unknown = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AbstractApiError';
    this.status = status;
    this.details = details;
  }

  override toString(): string {
    return `Abstract API Error ${this.status}: ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      status: this.status,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A 2xx body that does not match the capability's record shape.
 */
export class ResponseDecodeError extends AbstractApiError {
  constructor(message: string, details: unknown = null) {
    super(502, message, details);
    this.name = 'ResponseDecodeError';
  }
}

/**
 * Caller-supplied arguments that cannot produce a request. Raised before any network call.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function isAbstractApiError(error: unknown): error is AbstractApiError {
  return error instanceof AbstractApiError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
