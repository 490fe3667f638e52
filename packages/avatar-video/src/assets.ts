import { openAsBlob } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AvatarVideoHttpClient, RequestBody } from './client.js';
import { AvatarVideoError, EmptyPayloadError, UploadError } from './errors.js';
import type {
  AssetReference,
  AssetUploadResponse,
  RequestOptions,
  UploadAttempt,
  UploadEncoding,
} from './types.js';

/**
 * Upload conventions accepted by the asset endpoint, tried in this order.
 * The raw body is the documented one; the multipart field names cover the
 * older endpoint revisions.
 */
export const DEFAULT_UPLOAD_ENCODINGS: readonly UploadEncoding[] = [
  { kind: 'raw' },
  { kind: 'multipart', field: 'content' },
  { kind: 'multipart', field: 'file' },
  { kind: 'multipart', field: 'asset' },
  { kind: 'multipart', field: 'data' },
];

const EXTENSIONS: Record<string, string> = {
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'video/mp4': 'mp4',
};

// Credentials and rate limits are the same for every encoding.
const NON_RETRYABLE_CLIENT_STATUSES = new Set([401, 403, 429]);

export function describeEncoding(encoding: UploadEncoding): string {
  return encoding.kind === 'raw' ? 'raw body' : `multipart field "${encoding.field}"`;
}

export function uploadFileName(label: string, contentType: string): string {
  const base = label.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'asset';
  return `${base}.${EXTENSIONS[contentType.toLowerCase()] ?? 'bin'}`;
}

function isUploadEnvelope(value: unknown): value is AssetUploadResponse {
  return typeof value === 'object' && value !== null;
}

async function withStagedPayload<T>(
  payload: Uint8Array,
  fileName: string,
  contentType: string,
  stagingRoot: string,
  fn: (blob: Blob) => Promise<T>,
): Promise<T> {
  const directory = await mkdtemp(join(stagingRoot, 'avatar-video-'));
  try {
    const stagedPath = join(directory, fileName);
    await writeFile(stagedPath, payload);
    const blob = await openAsBlob(stagedPath, { type: contentType });
    return await fn(blob);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}

export class AssetsResource {
  constructor(
    private readonly client: AvatarVideoHttpClient,
    private readonly encodings: readonly UploadEncoding[] = DEFAULT_UPLOAD_ENCODINGS,
    private readonly stagingRoot: string = tmpdir(),
  ) {}

  async upload(
    payload: Uint8Array,
    contentType: string,
    label: string,
    options?: RequestOptions,
  ): Promise<AssetReference> {
    if (payload.byteLength === 0) {
      throw new EmptyPayloadError(label);
    }
    if (this.encodings.length === 0) {
      throw new UploadError(`No upload encodings configured for ${label}`, label, []);
    }

    const fileName = uploadFileName(label, contentType);
    return withStagedPayload(payload, fileName, contentType, this.stagingRoot, (blob) =>
      this.tryEncodings(blob, contentType, label, fileName, options),
    );
  }

  private async tryEncodings(
    blob: Blob,
    contentType: string,
    label: string,
    fileName: string,
    options?: RequestOptions,
  ): Promise<AssetReference> {
    const attempts: UploadAttempt[] = [];

    for (const encoding of this.encodings) {
      let response: unknown;
      try {
        response = await this.client.request<unknown>({
          host: 'upload',
          method: 'POST',
          path: '/v1/asset',
          body: this.buildBody(encoding, blob, contentType, fileName),
          options,
        });
      } catch (error) {
        if (options?.signal?.aborted) throw error;

        const status = error instanceof AvatarVideoError ? error.statusCode : undefined;
        attempts.push({
          encoding,
          status,
          body: error instanceof AvatarVideoError ? error.raw : undefined,
        });

        if (status !== undefined && status >= 400 && status < 500 && !NON_RETRYABLE_CLIENT_STATUSES.has(status)) {
          continue;
        }

        const reason = error instanceof Error ? error.message : String(error);
        throw new UploadError(
          `Uploading ${label} failed with ${describeEncoding(encoding)}: ${reason}`,
          label,
          attempts,
          { cause: error },
        );
      }

      const assetId = isUploadEnvelope(response) ? response.data?.id : undefined;
      if (typeof assetId !== 'string' || assetId.trim().length === 0) {
        attempts.push({ encoding, status: 200, body: response });
        throw new UploadError(
          `Uploading ${label} returned a success envelope without data.id (${describeEncoding(encoding)})`,
          label,
          attempts,
        );
      }

      return assetId;
    }

    throw new UploadError(
      `Uploading ${label} was rejected for all ${attempts.length} encodings`,
      label,
      attempts,
    );
  }

  private buildBody(encoding: UploadEncoding, blob: Blob, contentType: string, fileName: string): RequestBody {
    if (encoding.kind === 'raw') {
      return { kind: 'binary', value: blob, contentType };
    }
    const form = new FormData();
    form.append(encoding.field, blob, fileName);
    return { kind: 'form', value: form };
  }
}
