import type { UploadAttempt } from './types.js';

export class AvatarVideoError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    public readonly details?: Record<string, unknown>,
    public readonly requestId?: string,
    public readonly raw?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AvatarVideoError';
    Object.setPrototypeOf(this, AvatarVideoError.prototype);
  }
}

export class ConfigurationError extends AvatarVideoError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class AuthenticationError extends AvatarVideoError {
  constructor(message = 'Invalid or missing API key', statusCode = 401, requestId?: string, raw?: unknown) {
    super(message, 'UNAUTHORIZED', statusCode, undefined, requestId, raw);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class InvalidRequestError extends AvatarVideoError {
  constructor(message: string, code = 'INVALID_REQUEST', details?: Record<string, unknown>, requestId?: string, raw?: unknown) {
    super(message, code, 400, details, requestId, raw);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class NotFoundError extends AvatarVideoError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND', requestId?: string, raw?: unknown) {
    super(message, code, 404, undefined, requestId, raw);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class RateLimitError extends AvatarVideoError {
  constructor(message = 'Too many requests', retryAfterSeconds?: number, requestId?: string, raw?: unknown) {
    super(
      message,
      'RATE_LIMITED',
      429,
      retryAfterSeconds !== undefined ? { retry_after_seconds: retryAfterSeconds } : undefined,
      requestId,
      raw,
    );
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/** Request never produced an HTTP response. */
export class TransportError extends AvatarVideoError {
  constructor(message: string, cause: unknown) {
    super(message, 'TRANSPORT_ERROR', undefined, undefined, undefined, undefined, { cause });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class EmptyPayloadError extends AvatarVideoError {
  constructor(label: string) {
    super(`Cannot upload ${label}: payload is empty`, 'EMPTY_PAYLOAD', undefined, { label });
    this.name = 'EmptyPayloadError';
    Object.setPrototypeOf(this, EmptyPayloadError.prototype);
  }
}

export class UploadError extends AvatarVideoError {
  constructor(
    message: string,
    public readonly label: string,
    public readonly attempts: UploadAttempt[],
    options?: { cause?: unknown },
  ) {
    const last = attempts[attempts.length - 1];
    super(
      message,
      'UPLOAD_FAILED',
      last?.status,
      { label, attempts: attempts.length },
      undefined,
      last?.body,
      options,
    );
    this.name = 'UploadError';
    Object.setPrototypeOf(this, UploadError.prototype);
  }

  get lastResponseBody(): unknown {
    return this.raw;
  }
}

export class JobStartError extends AvatarVideoError {
  constructor(message: string, statusCode?: number, raw?: unknown, options?: { cause?: unknown }) {
    super(message, 'JOB_START_FAILED', statusCode, undefined, undefined, raw, options);
    this.name = 'JobStartError';
    Object.setPrototypeOf(this, JobStartError.prototype);
  }
}

export class TransientPollError extends AvatarVideoError {
  constructor(
    message: string,
    public readonly handle: string,
    public readonly attempt: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'TRANSIENT_POLL_ERROR', undefined, { handle, attempt }, undefined, undefined, options);
    this.name = 'TransientPollError';
    Object.setPrototypeOf(this, TransientPollError.prototype);
  }
}

export class ProviderFailureError extends AvatarVideoError {
  constructor(
    message: string,
    public readonly handle: string,
    public readonly providerMessage: string | undefined,
  ) {
    super(message, 'PROVIDER_FAILURE', undefined, { handle });
    this.name = 'ProviderFailureError';
    Object.setPrototypeOf(this, ProviderFailureError.prototype);
  }
}

export class PollTimeoutError extends AvatarVideoError {
  constructor(public readonly handle: string, public readonly attempts: number, public readonly elapsedMs: number) {
    super(
      `Video ${handle} did not finish after ${attempts} status checks (${Math.round(elapsedMs / 1000)}s)`,
      'POLL_TIMEOUT',
      undefined,
      { handle, attempts, elapsed_ms: elapsedMs },
    );
    this.name = 'PollTimeoutError';
    Object.setPrototypeOf(this, PollTimeoutError.prototype);
  }
}

export class PollCancelledError extends AvatarVideoError {
  constructor(public readonly handle: string, reason?: unknown) {
    super(`Polling for video ${handle} was cancelled`, 'POLL_CANCELLED', undefined, { handle }, undefined, undefined, {
      cause: reason,
    });
    this.name = 'PollCancelledError';
    Object.setPrototypeOf(this, PollCancelledError.prototype);
  }
}
