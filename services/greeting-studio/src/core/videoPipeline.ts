import { readFile } from 'fs/promises';
import { extname } from 'path';
import type { AvatarVideo, PollWarning, VideoAssetRefs } from 'avatar-video';
import type { VideoSettings } from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { VideoJobRecord } from '../types/greeting.js';
import { describeFailure } from './failures.js';
import type { VideoJobStore } from './videoJobStore.js';

const PORTRAIT_MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

export interface VideoRequest {
  childName: string;
  audio: Buffer;
  audioMimeType: string;
}

export interface VideoPipelineDeps {
  sdk: Pick<AvatarVideo, 'assets' | 'videos' | 'poller'>;
  store: VideoJobStore;
  settings: VideoSettings;
  readPortrait?: (path: string) => Promise<Buffer>;
}

function describeWarning(warning: PollWarning): string {
  if (warning.kind === 'unknown_status') {
    return `unknown status=${warning.rawStatus ?? 'missing'} attempt=${warning.attempt}`;
  }
  return `transient error attempt=${warning.attempt} message=${warning.error.message}`;
}

/**
 * Upload, start and poll for one talking-head video. Runs detached from the
 * HTTP request; progress and the outcome land in the job store.
 */
export class VideoPipeline {
  private readonly readPortrait: (path: string) => Promise<Buffer>;

  constructor(private readonly deps: VideoPipelineDeps) {
    this.readPortrait = deps.readPortrait ?? ((path) => readFile(path));
  }

  enqueue(request: VideoRequest): { record: VideoJobRecord; done: Promise<void> } {
    const { record, signal } = this.deps.store.create(request.childName);
    const done = this.run(record.id, request, signal);
    return { record, done };
  }

  private async run(jobId: string, request: VideoRequest, signal: AbortSignal): Promise<void> {
    const { store } = this.deps;
    if (!store.setRunning(jobId)) return;
    console.log(`[greeting-studio-video] started job_id=${jobId} child=${request.childName}`);

    try {
      const result = await this.produce(jobId, request, signal);
      store.setDone(jobId, {
        video_url: result.videoUrl,
        thumbnail_url: result.thumbnailUrl,
        duration_seconds: result.durationSeconds,
      });
      console.log(`[greeting-studio-video] done job_id=${jobId} url=${result.videoUrl}`);
    } catch (error) {
      if (signal.aborted) {
        console.log(`[greeting-studio-video] cancelled job_id=${jobId}`);
        return;
      }
      const failure = describeFailure(error);
      store.setFailed(jobId, failure);
      console.error(
        `[greeting-studio-video] failed job_id=${jobId} kind=${failure.kind} code=${failure.code} error=${failure.message}`,
      );
    }
  }

  private async produce(jobId: string, request: VideoRequest, signal: AbortSignal) {
    const { sdk, store, settings } = this.deps;

    const assetRefs: VideoAssetRefs = {
      voice: await sdk.assets.upload(request.audio, request.audioMimeType, 'Audio', { signal }),
    };
    store.setProgress(jobId, 5);

    if (!settings.avatarId) {
      if (!settings.portraitPath) {
        throw new ConfigurationError('Video needs HEYGEN_AVATAR_ID or VIDEO_PORTRAIT_PATH');
      }
      const portrait = await this.readPortrait(settings.portraitPath);
      const mimeType = PORTRAIT_MIME_TYPES[extname(settings.portraitPath).toLowerCase()] ?? 'image/png';
      assetRefs.talking_photo = await sdk.assets.upload(portrait, mimeType, 'Portrait', { signal });
    }

    const handle = await sdk.videos.start(assetRefs, {
      avatarId: settings.avatarId,
      dimension: { width: settings.width, height: settings.height },
      background: settings.backgroundColor ? { type: 'color', value: settings.backgroundColor } : undefined,
      test: settings.test,
      signal,
    });
    store.setProviderVideo(jobId, handle);
    console.log(`[greeting-studio-video] provider job job_id=${jobId} video_id=${handle}`);

    return sdk.poller.waitForCompletion(handle, {
      pollIntervalSeconds: settings.pollIntervalSeconds,
      timeoutSeconds: settings.pollTimeoutSeconds,
      signal,
      onProgress: (percent) => store.setProgress(jobId, percent),
      onWarning: (warning) => {
        console.warn(`[greeting-studio-video] job_id=${jobId} video_id=${handle} ${describeWarning(warning)}`);
      },
    });
  }
}
