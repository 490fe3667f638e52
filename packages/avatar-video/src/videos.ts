import type { AvatarVideoHttpClient } from './client.js';
import { AvatarVideoError, InvalidRequestError, JobStartError } from './errors.js';
import type {
  JobHandle,
  JobStatus,
  RequestOptions,
  StartVideoOptions,
  StatusSnapshot,
  VideoAssetRefs,
  VideoCharacter,
  VideoDimension,
  VideoGenerateRequest,
  VideoGenerateResponse,
  VideoStatusResponse,
} from './types.js';

export const DEFAULT_DIMENSION: VideoDimension = { width: 1280, height: 720 };

const STATUS_ALIASES: Record<string, JobStatus> = {
  pending: 'pending',
  waiting: 'pending',
  processing: 'processing',
  completed: 'completed',
  failed: 'failed',
};

export function normalizeStatus(raw: unknown): JobStatus {
  if (typeof raw !== 'string') return 'unknown';
  return STATUS_ALIASES[raw.trim().toLowerCase()] ?? 'unknown';
}

function providerErrorMessage(error: unknown): string | undefined {
  if (typeof error === 'string') return error || undefined;
  if (error && typeof error === 'object') {
    if ('message' in error && typeof error.message === 'string' && error.message) return error.message;
    if ('detail' in error && typeof error.detail === 'string' && error.detail) return error.detail;
    if ('code' in error && error.code !== undefined) return `error code ${String(error.code)}`;
  }
  return undefined;
}

function optionalString(value: string | null | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function buildCharacter(assetRefs: VideoAssetRefs, avatarId?: string): VideoCharacter {
  if (avatarId && avatarId.trim()) {
    return { type: 'avatar', avatar_id: avatarId.trim(), avatar_style: 'normal' };
  }
  if (assetRefs.talking_photo) {
    return { type: 'talking_photo', talking_photo_id: assetRefs.talking_photo };
  }
  throw new InvalidRequestError(
    'A video needs either an avatarId or a talking_photo asset',
    'MISSING_CHARACTER',
  );
}

export class VideosResource {
  constructor(private readonly client: AvatarVideoHttpClient) {}

  async start(assetRefs: VideoAssetRefs, options: StartVideoOptions = {}): Promise<JobHandle> {
    if (!assetRefs.voice) {
      throw new InvalidRequestError('A video needs a voice asset', 'MISSING_VOICE');
    }

    const character = buildCharacter(assetRefs, options.avatarId);
    const body: VideoGenerateRequest = {
      ...options.extra,
      video_inputs: [
        {
          character,
          voice: { type: 'audio', audio_asset_id: assetRefs.voice },
          ...(options.background ? { background: options.background } : {}),
        },
      ],
      dimension: options.dimension ?? DEFAULT_DIMENSION,
      test: options.test ?? false,
    };

    let response: VideoGenerateResponse;
    try {
      response = await this.client.request<VideoGenerateResponse>({
        host: 'api',
        method: 'POST',
        path: '/v2/video/generate',
        body: { kind: 'json', value: body },
        options,
      });
    } catch (error) {
      if (error instanceof AvatarVideoError) {
        throw new JobStartError(
          `Starting the video failed: ${error.message}`,
          error.statusCode,
          error.raw,
          { cause: error },
        );
      }
      throw error;
    }

    const videoId = response?.data?.video_id;
    if (typeof videoId !== 'string' || videoId.trim().length === 0) {
      throw new JobStartError('Video start response is missing data.video_id', 200, response);
    }
    return videoId;
  }

  async status(handle: JobHandle, options?: RequestOptions): Promise<StatusSnapshot> {
    const response = await this.client.request<VideoStatusResponse>({
      host: 'api',
      method: 'GET',
      path: '/v1/video_status.get',
      query: { video_id: handle },
      options,
    });

    const data = response?.data;
    if (!data) {
      return { handle, status: 'unknown' };
    }

    return {
      handle,
      status: normalizeStatus(data.status),
      rawStatus: typeof data.status === 'string' ? data.status : undefined,
      videoUrl: optionalString(data.video_url),
      thumbnailUrl: optionalString(data.thumbnail_url),
      durationSeconds: typeof data.duration === 'number' ? data.duration : undefined,
      error: providerErrorMessage(data.error),
    };
  }
}
