import {
  AuthenticationError,
  AvatarVideoError,
  ConfigurationError as VideoConfigurationError,
  NotFoundError,
  PollCancelledError,
  PollTimeoutError,
  ProviderFailureError,
  RateLimitError,
} from 'avatar-video';
import { ConfigurationError, NoProviderAvailableError, StudioError } from '../errors.js';

export type FailureKind =
  | 'authentication'
  | 'not_found'
  | 'rate_limited'
  | 'quota_exceeded'
  | 'configuration'
  | 'generic';

export interface FailureDescription {
  kind: FailureKind;
  code: string;
  message: string;
  hint: string;
}

const HINTS: Record<FailureKind, string> = {
  authentication: 'Check the API key of the provider named in the message.',
  not_found: 'The referenced voice, avatar or video does not exist for this account.',
  rate_limited: 'The provider is throttling requests; try again in a minute.',
  quota_exceeded: 'The provider account is out of credits; top up or switch provider.',
  configuration: 'Fix the service configuration (.env) and restart.',
  generic: 'Retry the request; if it keeps failing, check the service logs.',
};

const MAX_CAUSE_DEPTH = 5;

function numericStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  if ('status' in error && typeof error.status === 'number') return error.status;
  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : '';
}

function classify(error: unknown): FailureKind | undefined {
  if (
    error instanceof ConfigurationError ||
    error instanceof VideoConfigurationError ||
    error instanceof NoProviderAvailableError
  ) {
    return 'configuration';
  }
  if (/quota/i.test(messageOf(error))) return 'quota_exceeded';
  if (error instanceof AuthenticationError) return 'authentication';
  if (error instanceof NotFoundError) return 'not_found';
  if (error instanceof RateLimitError) return 'rate_limited';

  const status = numericStatus(error);
  if (status === 401 || status === 403) return 'authentication';
  if (status === 404) return 'not_found';
  if (status === 402) return 'quota_exceeded';
  if (status === 429) return 'rate_limited';
  return undefined;
}

function* causeChain(error: unknown): Generator<unknown> {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current !== undefined; depth += 1) {
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

function codeOf(error: unknown): string {
  if (error instanceof StudioError || error instanceof AvatarVideoError) return error.code;
  return 'INTERNAL_ERROR';
}

/**
 * Classifies a failure for the operator: the outermost error gives the code
 * and message, the first error in its cause chain that can be classified
 * gives the kind.
 */
export function describeFailure(error: unknown): FailureDescription {
  let kind: FailureKind = 'generic';
  for (const link of causeChain(error)) {
    const found = classify(link);
    if (found) {
      kind = found;
      break;
    }
  }

  return {
    kind,
    code: codeOf(error),
    message: messageOf(error) || 'Unexpected error',
    hint: HINTS[kind],
  };
}

/** HTTP status the service answers with for a failed operation. */
export function failureHttpStatus(error: unknown): number {
  if (error instanceof StudioError) return error.statusCode;
  if (error instanceof PollTimeoutError) return 504;
  if (error instanceof PollCancelledError) return 409;
  if (error instanceof ProviderFailureError || error instanceof AvatarVideoError) return 502;
  return 500;
}
