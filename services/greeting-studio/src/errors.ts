export class StudioError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StudioError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends StudioError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends StudioError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class FeatureDisabledError extends StudioError {
  constructor(feature: string) {
    super(`The ${feature} capability is disabled in this deployment`, 'FEATURE_DISABLED', 409, { feature });
    this.name = 'FeatureDisabledError';
  }
}

export class InvalidSpeechTextError extends StudioError {
  constructor() {
    super('Speech text must contain at least one non-whitespace character', 'INVALID_SPEECH_TEXT', 400);
    this.name = 'InvalidSpeechTextError';
  }
}

export class NoProviderAvailableError extends StudioError {
  constructor() {
    super('No speech provider is configured', 'NO_SPEECH_PROVIDER', 503);
    this.name = 'NoProviderAvailableError';
  }
}

export class NoFallbackAvailableError extends StudioError {
  readonly provider: string;

  constructor(provider: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Speech provider ${provider} failed and no fallback is configured: ${reason}`,
      'SPEECH_PROVIDER_FAILED',
      502,
      { provider },
      { cause },
    );
    this.name = 'NoFallbackAvailableError';
    this.provider = provider;
  }
}

export class SpeechProviderError extends StudioError {
  readonly provider: string;

  constructor(provider: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Speech provider ${provider} failed: ${reason}`, 'SPEECH_PROVIDER_FAILED', 502, { provider }, { cause });
    this.name = 'SpeechProviderError';
    this.provider = provider;
  }
}

export class MessageGenerationError extends StudioError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MESSAGE_GENERATION_FAILED', 502, undefined, options);
    this.name = 'MessageGenerationError';
  }
}
