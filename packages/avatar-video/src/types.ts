export type AssetReference = string;
export type JobHandle = string;

export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed', 'unknown'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface AvatarVideoConfig {
  apiKey: string;
  apiBaseUrl?: string;
  uploadBaseUrl?: string;
  uploadEncodings?: readonly UploadEncoding[];
  stagingDir?: string;
  /** Upper bound for one HTTP request, response body included. Defaults to 120 s. */
  requestTimeoutMs?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export type UploadEncoding =
  | { kind: 'raw' }
  | { kind: 'multipart'; field: string };

export interface UploadAttempt {
  encoding: UploadEncoding;
  status?: number;
  body: unknown;
}

export interface AssetUploadResponse {
  code?: number;
  data?: {
    id?: string;
    name?: string;
    file_type?: string;
    url?: string;
  };
}

export interface VideoDimension {
  width: number;
  height: number;
}

export type VideoBackground =
  | { type: 'color'; value: string }
  | { type: 'image'; image_asset_id: AssetReference };

export type VideoCharacter =
  | { type: 'avatar'; avatar_id: string; avatar_style: 'normal' | 'closeUp' | 'circle' }
  | { type: 'talking_photo'; talking_photo_id: AssetReference };

export interface VideoAssetRefs {
  voice: AssetReference;
  talking_photo?: AssetReference;
}

export interface StartVideoOptions extends RequestOptions {
  avatarId?: string;
  dimension?: VideoDimension;
  background?: VideoBackground;
  test?: boolean;
  extra?: Record<string, unknown>;
}

export interface VideoGenerateRequest {
  video_inputs: Array<{
    character: VideoCharacter;
    voice: { type: 'audio'; audio_asset_id: AssetReference };
    background?: VideoBackground;
  }>;
  dimension: VideoDimension;
  test: boolean;
  [extra: string]: unknown;
}

export interface VideoGenerateResponse {
  error?: unknown;
  data?: {
    video_id?: string;
  } | null;
}

export interface VideoStatusResponse {
  code?: number;
  data?: {
    id?: string;
    status?: string;
    video_url?: string | null;
    thumbnail_url?: string | null;
    duration?: number | null;
    error?: { code?: string | number; message?: string; detail?: string } | string | null;
  } | null;
}

export interface StatusSnapshot {
  handle: JobHandle;
  status: JobStatus;
  rawStatus?: string;
  videoUrl?: string;
  thumbnailUrl?: string;
  durationSeconds?: number;
  error?: string;
}

export interface JobResult {
  handle: JobHandle;
  videoUrl: string;
  thumbnailUrl?: string;
  durationSeconds?: number;
}

export interface PollOptions {
  pollIntervalSeconds: number;
  timeoutSeconds?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
  onProgress?: (percent: number, snapshot: StatusSnapshot) => void;
  onWarning?: (warning: PollWarning) => void;
}

export type PollWarning =
  | { kind: 'unknown_status'; attempt: number; rawStatus?: string }
  | { kind: 'transient_error'; attempt: number; error: Error };

export interface AvatarSummary {
  avatar_id: string;
  avatar_name: string;
  avatar_type?: string;
  gender?: string;
  is_public?: boolean;
  preview_image_url?: string;
}

export interface TalkingPhotoSummary {
  talking_photo_id: string;
  talking_photo_name: string;
  preview_image_url?: string;
}

export interface AvatarListResponse {
  data?: {
    avatars?: Array<AvatarSummary | null>;
    talking_photos?: Array<TalkingPhotoSummary | null>;
  } | null;
}

export interface AvatarCatalog {
  avatars: AvatarSummary[];
  talkingPhotos: TalkingPhotoSummary[];
}

export type AvatarFilter = 'all' | 'studio' | 'custom';
