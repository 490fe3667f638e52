import { randomUUID } from 'crypto';
import type { VideoJobRecord, VideoJobStatus } from '../types/greeting.js';
import type { FailureDescription } from './failures.js';

interface VideoJobEntry {
  record: VideoJobRecord;
  controller: AbortController;
}

export type CancelOutcome = 'cancelled' | 'not_found' | 'already_finished';

const TERMINAL: ReadonlySet<VideoJobStatus> = new Set(['done', 'failed', 'cancelled']);

export function isTerminal(status: VideoJobStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * Process-local registry of background video jobs. Records are snapshots:
 * callers get copies and change state only through the set* methods.
 */
export class VideoJobStore {
  private readonly jobs = new Map<string, VideoJobEntry>();

  constructor(
    private readonly retentionMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  create(childName: string): { record: VideoJobRecord; signal: AbortSignal } {
    const record: VideoJobRecord = {
      id: randomUUID(),
      child_name: childName,
      status: 'queued',
      progress: 0,
      created_at: this.now().toISOString(),
    };
    const controller = new AbortController();
    this.jobs.set(record.id, { record, controller });
    return { record: structuredClone(record), signal: controller.signal };
  }

  get(id: string): VideoJobRecord | undefined {
    const entry = this.jobs.get(id);
    return entry ? structuredClone(entry.record) : undefined;
  }

  setRunning(id: string): boolean {
    const entry = this.jobs.get(id);
    if (!entry || entry.record.status !== 'queued') return false;
    entry.record.status = 'running';
    entry.record.started_at = this.now().toISOString();
    return true;
  }

  setProviderVideo(id: string, providerVideoId: string): void {
    const entry = this.jobs.get(id);
    if (entry) entry.record.provider_video_id = providerVideoId;
  }

  setProgress(id: string, progress: number): void {
    const entry = this.jobs.get(id);
    if (!entry || isTerminal(entry.record.status)) return;
    entry.record.progress = Math.max(entry.record.progress, Math.min(100, Math.round(progress)));
  }

  setDone(id: string, result: NonNullable<VideoJobRecord['result']>): void {
    const entry = this.jobs.get(id);
    if (!entry || isTerminal(entry.record.status)) return;
    entry.record.status = 'done';
    entry.record.progress = 100;
    entry.record.result = result;
    entry.record.completed_at = this.now().toISOString();
  }

  setFailed(id: string, failure: FailureDescription): void {
    const entry = this.jobs.get(id);
    if (!entry || isTerminal(entry.record.status)) return;
    entry.record.status = 'failed';
    entry.record.error = { ...failure };
    entry.record.completed_at = this.now().toISOString();
  }

  cancel(id: string): CancelOutcome {
    const entry = this.jobs.get(id);
    if (!entry) return 'not_found';
    if (isTerminal(entry.record.status)) return 'already_finished';
    entry.record.status = 'cancelled';
    entry.record.completed_at = this.now().toISOString();
    entry.controller.abort();
    return 'cancelled';
  }

  /** Aborts every job still in flight; used at shutdown. */
  cancelAll(): number {
    let cancelled = 0;
    for (const id of this.jobs.keys()) {
      if (this.cancel(id) === 'cancelled') cancelled += 1;
    }
    return cancelled;
  }

  evictFinished(): number {
    const cutoff = this.now().getTime() - this.retentionMs;
    let evicted = 0;
    for (const [id, entry] of this.jobs) {
      const completedAt = entry.record.completed_at;
      if (completedAt && Date.parse(completedAt) < cutoff) {
        this.jobs.delete(id);
        evicted += 1;
      }
    }
    return evicted;
  }

  stats(): Record<VideoJobStatus, number> {
    const counts: Record<VideoJobStatus, number> = { queued: 0, running: 0, done: 0, failed: 0, cancelled: 0 };
    for (const { record } of this.jobs.values()) {
      counts[record.status] += 1;
    }
    return counts;
  }
}
