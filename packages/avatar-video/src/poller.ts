import { setTimeout as delay } from 'node:timers/promises';
import {
  AvatarVideoError,
  InvalidRequestError,
  PollCancelledError,
  PollTimeoutError,
  ProviderFailureError,
  RateLimitError,
  TransientPollError,
  TransportError,
} from './errors.js';
import type { JobHandle, JobResult, PollOptions, RequestOptions, StatusSnapshot } from './types.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface StatusSource {
  status(handle: JobHandle, options?: RequestOptions): Promise<StatusSnapshot>;
}

export interface PollerDeps {
  sleep?: Sleep;
  now?: () => number;
}

const PROGRESS_STEP = 5;
const PROGRESS_CEILING = 90;

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

// Settles with the work, or rejects as soon as the signal aborts even if the work never settles.
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Transport failures, 429 and 5xx responses are retried on the next poll.
 * Anything else (bad key, unknown job id) ends the loop.
 */
export function isTransientPollFailure(error: unknown): boolean {
  if (!(error instanceof AvatarVideoError)) return true;
  if (error instanceof TransportError || error instanceof RateLimitError) return true;
  return (error.statusCode ?? 0) >= 500;
}

export class VideoPoller {
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(private readonly source: StatusSource, deps: PollerDeps = {}) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  async waitForCompletion(handle: JobHandle, options: PollOptions): Promise<JobResult> {
    const { pollIntervalSeconds, timeoutSeconds, maxAttempts, signal } = options;

    if (!Number.isFinite(pollIntervalSeconds) || pollIntervalSeconds < 0) {
      throw new InvalidRequestError('pollIntervalSeconds must be a non-negative number', 'INVALID_POLL_INTERVAL');
    }
    if (timeoutSeconds !== undefined && (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0)) {
      throw new InvalidRequestError('timeoutSeconds must be a finite positive number', 'INVALID_POLL_TIMEOUT');
    }
    if (maxAttempts !== undefined && (!Number.isInteger(maxAttempts) || maxAttempts <= 0)) {
      throw new InvalidRequestError('maxAttempts must be a positive integer', 'INVALID_POLL_ATTEMPTS');
    }
    if (timeoutSeconds === undefined && maxAttempts === undefined && !signal) {
      throw new InvalidRequestError(
        'Polling needs a timeoutSeconds, maxAttempts or an AbortSignal to stop it',
        'UNBOUNDED_POLL',
      );
    }

    const intervalMs = pollIntervalSeconds * 1000;
    const startedAt = this.now();
    const deadline = timeoutSeconds !== undefined ? startedAt + timeoutSeconds * 1000 : undefined;
    let attempt = 0;
    let progress = 0;

    while (true) {
      if (signal?.aborted) throw new PollCancelledError(handle, signal.reason);
      attempt += 1;

      // A query may not outlive the deadline, however long the provider takes to answer.
      const deadlineSignal =
        deadline !== undefined ? AbortSignal.timeout(Math.max(deadline - this.now(), 0)) : undefined;
      const querySignal =
        signal && deadlineSignal ? AbortSignal.any([signal, deadlineSignal]) : (deadlineSignal ?? signal);

      let snapshot: StatusSnapshot | undefined;
      try {
        const query = this.source.status(handle, { signal: querySignal });
        snapshot = await (querySignal ? untilAborted(query, querySignal) : query);
      } catch (error) {
        if (signal?.aborted) throw new PollCancelledError(handle, signal.reason);
        if (deadlineSignal?.aborted) throw new PollTimeoutError(handle, attempt, this.now() - startedAt);
        if (!isTransientPollFailure(error)) throw error;

        const reason = error instanceof Error ? error.message : String(error);
        options.onWarning?.({
          kind: 'transient_error',
          attempt,
          error: new TransientPollError(`Status check ${attempt} for video ${handle} failed: ${reason}`, handle, attempt, {
            cause: error,
          }),
        });
      }

      if (snapshot) {
        if (snapshot.status === 'completed') {
          if (!snapshot.videoUrl) {
            throw new ProviderFailureError(`Video ${handle} completed without a video_url`, handle, snapshot.error);
          }
          progress = 100;
          options.onProgress?.(progress, snapshot);
          return {
            handle,
            videoUrl: snapshot.videoUrl,
            thumbnailUrl: snapshot.thumbnailUrl,
            durationSeconds: snapshot.durationSeconds,
          };
        }

        if (snapshot.status === 'failed') {
          throw new ProviderFailureError(
            `Video ${handle} failed: ${snapshot.error ?? 'no reason given by the provider'}`,
            handle,
            snapshot.error,
          );
        }

        if (snapshot.status === 'unknown') {
          options.onWarning?.({ kind: 'unknown_status', attempt, rawStatus: snapshot.rawStatus });
        }

        progress = Math.max(progress, Math.min(progress + PROGRESS_STEP, PROGRESS_CEILING));
        options.onProgress?.(progress, snapshot);
      }

      if (maxAttempts !== undefined && attempt >= maxAttempts) {
        throw new PollTimeoutError(handle, attempt, this.now() - startedAt);
      }
      if (deadline !== undefined && this.now() + intervalMs > deadline) {
        throw new PollTimeoutError(handle, attempt, this.now() - startedAt);
      }

      try {
        await this.sleep(intervalMs, signal);
      } catch (error) {
        if (signal?.aborted) throw new PollCancelledError(handle, signal.reason);
        throw error;
      }
    }
  }
}
