import { AssetsResource, DEFAULT_UPLOAD_ENCODINGS } from './assets.js';
import { AvatarsResource } from './avatars.js';
import { AvatarVideoHttpClient } from './client.js';
import { VideoPoller, type PollerDeps } from './poller.js';
import { VideosResource } from './videos.js';
import type { AvatarVideoConfig } from './types.js';

export class AvatarVideo {
  public readonly assets: AssetsResource;
  public readonly videos: VideosResource;
  public readonly avatars: AvatarsResource;
  public readonly poller: VideoPoller;
  private readonly client: AvatarVideoHttpClient;

  constructor(config: AvatarVideoConfig, pollerDeps?: PollerDeps) {
    this.client = new AvatarVideoHttpClient(config);
    this.assets = new AssetsResource(
      this.client,
      config.uploadEncodings ?? DEFAULT_UPLOAD_ENCODINGS,
      config.stagingDir,
    );
    this.videos = new VideosResource(this.client);
    this.avatars = new AvatarsResource(this.client);
    this.poller = new VideoPoller(this.videos, pollerDeps);
  }
}

export { DEFAULT_UPLOAD_ENCODINGS, describeEncoding } from './assets.js';
export { filterAvatars, isCustomAvatar, isStudioAvatar } from './avatars.js';
export { isTransientPollFailure, type Sleep, type StatusSource } from './poller.js';
export { DEFAULT_DIMENSION, normalizeStatus } from './videos.js';
export type { PollerDeps };
export * from './types.js';
export * from './errors.js';
