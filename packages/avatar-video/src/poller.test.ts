import { describe, expect, it, vi } from 'vitest';
import {
  AuthenticationError,
  InvalidRequestError,
  PollCancelledError,
  PollTimeoutError,
  ProviderFailureError,
  TransportError,
} from './errors.js';
import { VideoPoller } from './poller.js';
import type { JobStatus, PollOptions, PollWarning, RequestOptions, StatusSnapshot } from './types.js';

const VIDEO_URL = 'https://cdn.example.com/videos/vid_1.mp4';

function scriptedSource(steps: Array<JobStatus | Error>) {
  const queue = [...steps];
  const status = vi.fn(async (handle: string): Promise<StatusSnapshot> => {
    const next = queue.shift();
    if (next === undefined) throw new AuthenticationError('status script exhausted');
    if (next instanceof Error) throw next;
    return {
      handle,
      status: next,
      rawStatus: next === 'unknown' ? 'rendering_queue' : next,
      videoUrl: next === 'completed' ? VIDEO_URL : undefined,
      error: next === 'failed' ? 'avatar rendering failed' : undefined,
    };
  });
  return { status };
}

function fakeSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
}

describe('VideoPoller', () => {
  it('returns the completed result after one wait per non-terminal status', async () => {
    const source = scriptedSource(['pending', 'processing', 'completed']);
    const sleep = fakeSleep();
    const poller = new VideoPoller(source, { sleep });

    const result = await poller.waitForCompletion('vid_1', { pollIntervalSeconds: 3, timeoutSeconds: 600 });

    expect(result).toEqual({ handle: 'vid_1', videoUrl: VIDEO_URL, thumbnailUrl: undefined, durationSeconds: undefined });
    expect(source.status).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([3000, 3000]);
  });

  it('raises the provider failure after one wait and stops querying', async () => {
    const source = scriptedSource(['processing', 'failed', 'completed']);
    const sleep = fakeSleep();
    const poller = new VideoPoller(source, { sleep });

    const error = await poller
      .waitForCompletion('vid_2', { pollIntervalSeconds: 3, timeoutSeconds: 600 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderFailureError);
    expect(error).toMatchObject({ providerMessage: 'avatar rendering failed', handle: 'vid_2' });
    expect(source.status).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('keeps polling through unknown statuses and reports each one', async () => {
    const source = scriptedSource(['unknown', 'unknown', 'completed']);
    const warnings: PollWarning[] = [];
    const poller = new VideoPoller(source, { sleep: fakeSleep() });

    await poller.waitForCompletion('vid_3', {
      pollIntervalSeconds: 1,
      maxAttempts: 10,
      onWarning: (warning) => warnings.push(warning),
    });

    expect(warnings).toEqual([
      { kind: 'unknown_status', attempt: 1, rawStatus: 'rendering_queue' },
      { kind: 'unknown_status', attempt: 2, rawStatus: 'rendering_queue' },
    ]);
  });

  it('treats transport failures as transient and retries after the same wait', async () => {
    const source = scriptedSource([new TransportError('socket hang up', new Error('ECONNRESET')), 'completed']);
    const sleep = fakeSleep();
    const warnings: PollWarning[] = [];
    const poller = new VideoPoller(source, { sleep });

    const result = await poller.waitForCompletion('vid_4', {
      pollIntervalSeconds: 5,
      maxAttempts: 5,
      onWarning: (warning) => warnings.push(warning),
    });

    expect(result.videoUrl).toBe(VIDEO_URL);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls[0]?.[0]).toBe(5000);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.kind).toBe('transient_error');
  });

  it('does not retry an authentication failure', async () => {
    const source = scriptedSource([new AuthenticationError('bad key')]);
    const sleep = fakeSleep();
    const poller = new VideoPoller(source, { sleep });

    await expect(
      poller.waitForCompletion('vid_5', { pollIntervalSeconds: 5, maxAttempts: 5 }),
    ).rejects.toBeInstanceOf(AuthenticationError);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops after maxAttempts status checks', async () => {
    const source = scriptedSource(['processing', 'processing', 'processing']);
    const sleep = fakeSleep();
    const poller = new VideoPoller(source, { sleep });

    await expect(
      poller.waitForCompletion('vid_6', { pollIntervalSeconds: 5, maxAttempts: 2 }),
    ).rejects.toBeInstanceOf(PollTimeoutError);
    expect(source.status).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('does not start a wait that would overrun the deadline', async () => {
    let clock = 0;
    const source = scriptedSource(['processing', 'processing', 'processing', 'processing']);
    const sleep = vi.fn(async (ms: number) => {
      clock += ms;
    });
    const poller = new VideoPoller(source, { sleep, now: () => clock });

    const error = await poller
      .waitForCompletion('vid_7', { pollIntervalSeconds: 5, timeoutSeconds: 10 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PollTimeoutError);
    expect(error).toMatchObject({ attempts: 3, elapsedMs: 10_000 });
    expect(source.status).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('cancels during a wait when the signal aborts', async () => {
    const controller = new AbortController();
    const source = scriptedSource(['processing', 'completed']);
    const sleep = vi.fn(async () => {
      controller.abort();
      throw new Error('The operation was aborted');
    });
    const poller = new VideoPoller(source, { sleep });

    await expect(
      poller.waitForCompletion('vid_8', { pollIntervalSeconds: 5, signal: controller.signal }),
    ).rejects.toBeInstanceOf(PollCancelledError);
    expect(source.status).toHaveBeenCalledTimes(1);
  });

  it('refuses to poll without any bound', async () => {
    const source = scriptedSource(['completed']);
    const poller = new VideoPoller(source, { sleep: fakeSleep() });

    await expect(
      poller.waitForCompletion('vid_9', { pollIntervalSeconds: 5 }),
    ).rejects.toBeInstanceOf(InvalidRequestError);
    expect(source.status).not.toHaveBeenCalled();
  });

  it.each<[string, Pick<PollOptions, 'timeoutSeconds' | 'maxAttempts'>]>([
    ['a NaN timeout', { timeoutSeconds: Number.NaN }],
    ['an infinite timeout', { timeoutSeconds: Number.POSITIVE_INFINITY }],
    ['a zero timeout', { timeoutSeconds: 0 }],
    ['a NaN attempt cap', { maxAttempts: Number.NaN }],
    ['a fractional attempt cap', { maxAttempts: 1.5 }],
  ])('refuses %s', async (_label, bound) => {
    const source = scriptedSource(['completed']);
    const poller = new VideoPoller(source, { sleep: fakeSleep() });

    await expect(
      poller.waitForCompletion('vid_9', { pollIntervalSeconds: 5, ...bound }),
    ).rejects.toBeInstanceOf(InvalidRequestError);
    expect(source.status).not.toHaveBeenCalled();
  });

  it('times out a status query that never answers', async () => {
    const status = vi.fn(
      (_handle: string, _options?: RequestOptions) => new Promise<StatusSnapshot>(() => {}),
    );
    const poller = new VideoPoller({ status });

    const error = await poller
      .waitForCompletion('vid_12', { pollIntervalSeconds: 0.01, timeoutSeconds: 0.2 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PollTimeoutError);
    expect(error).toMatchObject({ handle: 'vid_12', attempts: 1 });
    expect(status).toHaveBeenCalledTimes(1);
    expect(status.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
  });

  it('reports non-decreasing progress ending at 100', async () => {
    const source = scriptedSource(['pending', 'processing', 'completed']);
    const progress: number[] = [];
    const poller = new VideoPoller(source, { sleep: fakeSleep() });

    await poller.waitForCompletion('vid_10', {
      pollIntervalSeconds: 1,
      maxAttempts: 5,
      onProgress: (percent) => progress.push(percent),
    });

    expect(progress).toEqual([5, 10, 100]);
  });

  it('fails a completed status that carries no video url', async () => {
    const status = vi.fn(async (handle: string): Promise<StatusSnapshot> => ({ handle, status: 'completed' }));
    const poller = new VideoPoller({ status }, { sleep: fakeSleep() });

    await expect(
      poller.waitForCompletion('vid_11', { pollIntervalSeconds: 1, maxAttempts: 3 }),
    ).rejects.toBeInstanceOf(ProviderFailureError);
  });
});
