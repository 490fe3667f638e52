import { AuthenticationError, JobStartError, NotFoundError, PollTimeoutError, RateLimitError } from 'avatar-video';
import { describe, expect, it } from 'vitest';
import { ConfigurationError, NoFallbackAvailableError, ValidationError } from '../errors.js';
import { describeFailure, failureHttpStatus } from './failures.js';

class SdkStatusError extends Error {
  constructor(message: string, public readonly statusCode: number) {
    super(message);
  }
}

class FetchStatusError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
  }
}

describe('describeFailure', () => {
  it('classifies a wrapped authentication failure by its cause', () => {
    const error = new JobStartError('Starting the video failed: Invalid API key', 401, undefined, {
      cause: new AuthenticationError('Invalid API key'),
    });

    expect(describeFailure(error)).toEqual({
      kind: 'authentication',
      code: 'JOB_START_FAILED',
      message: 'Starting the video failed: Invalid API key',
      hint: 'Check the API key of the provider named in the message.',
    });
  });

  it('distinguishes missing resources and rate limits', () => {
    expect(describeFailure(new NotFoundError('Video not found')).kind).toBe('not_found');
    expect(describeFailure(new RateLimitError('slow down', 30)).kind).toBe('rate_limited');
  });

  it('reads the numeric status of third-party SDK errors through the cause chain', () => {
    const primary = new SdkStatusError('Status code: 401', 401);
    expect(describeFailure(new NoFallbackAvailableError('elevenlabs', primary))).toMatchObject({
      kind: 'authentication',
      code: 'SPEECH_PROVIDER_FAILED',
    });
    expect(describeFailure(new FetchStatusError('Too Many Requests', 429)).kind).toBe('rate_limited');
  });

  it('recognises quota exhaustion from the provider message', () => {
    const cause = new SdkStatusError('quota_exceeded: this request exceeds your quota', 401);

    expect(describeFailure(new NoFallbackAvailableError('elevenlabs', cause)).kind).toBe('quota_exceeded');
  });

  it('treats configuration problems as their own kind', () => {
    expect(describeFailure(new ConfigurationError('HEYGEN_API_KEY is required')).kind).toBe('configuration');
  });

  it('falls back to a generic description', () => {
    expect(describeFailure('boom')).toEqual({
      kind: 'generic',
      code: 'INTERNAL_ERROR',
      message: 'boom',
      hint: 'Retry the request; if it keeps failing, check the service logs.',
    });
  });
});

describe('failureHttpStatus', () => {
  it('maps service and provider errors onto response codes', () => {
    expect(failureHttpStatus(new ValidationError('bad'))).toBe(400);
    expect(failureHttpStatus(new PollTimeoutError('vid_1', 3, 15_000))).toBe(504);
    expect(failureHttpStatus(new NotFoundError())).toBe(502);
    expect(failureHttpStatus(new Error('boom'))).toBe(500);
  });
});
