import { describe, expect, it } from 'vitest';
import { VideoJobStore } from './videoJobStore.js';

const FAILURE = { kind: 'generic' as const, code: 'INTERNAL_ERROR', message: 'boom', hint: 'retry' };

describe('VideoJobStore', () => {
  it('moves a job from queued through running to done', () => {
    const store = new VideoJobStore(60_000);
    const { record } = store.create('Lotte');

    expect(store.setRunning(record.id)).toBe(true);
    expect(store.setRunning(record.id)).toBe(false);
    store.setProgress(record.id, 40);
    store.setProgress(record.id, 20);
    expect(store.get(record.id)?.progress).toBe(40);

    store.setDone(record.id, { video_url: 'https://cdn.example.test/v.mp4' });
    expect(store.get(record.id)).toMatchObject({ status: 'done', progress: 100 });
    expect(store.stats()).toEqual({ queued: 0, running: 0, done: 1, failed: 0, cancelled: 0 });
  });

  it('hands out copies that do not change the stored record', () => {
    const store = new VideoJobStore(60_000);
    const { record } = store.create('Lotte');

    const copy = store.get(record.id);
    if (copy) copy.status = 'failed';

    expect(store.get(record.id)?.status).toBe('queued');
  });

  it('aborts the job signal on cancel and keeps the final state', () => {
    const store = new VideoJobStore(60_000);
    const { record, signal } = store.create('Mats');
    store.setRunning(record.id);

    expect(store.cancel(record.id)).toBe('cancelled');
    expect(signal.aborted).toBe(true);
    store.setFailed(record.id, FAILURE);
    expect(store.get(record.id)?.status).toBe('cancelled');
    expect(store.cancel(record.id)).toBe('already_finished');
    expect(store.cancel('missing')).toBe('not_found');
  });

  it('evicts finished jobs after the retention window', () => {
    let now = new Date('2026-12-05T10:00:00Z');
    const store = new VideoJobStore(60_000, () => now);
    const finished = store.create('Noor').record;
    const running = store.create('Bo').record;
    store.setRunning(finished.id);
    store.setRunning(running.id);
    store.setFailed(finished.id, FAILURE);

    now = new Date('2026-12-05T10:02:00Z');

    expect(store.evictFinished()).toBe(1);
    expect(store.get(finished.id)).toBeUndefined();
    expect(store.get(running.id)?.status).toBe('running');
  });
});
