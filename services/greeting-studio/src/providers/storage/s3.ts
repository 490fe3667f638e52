import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { S3Settings } from '../../config.js';
import { sha256Hex } from '../../core/artifacts.js';
import type { ArtifactStorage, SaveArtifactRequest, SaveArtifactResult } from './types.js';

function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '');
}

export function buildObjectKey(keyPrefix: string, fileName: string, now: Date = new Date()): string {
  const dateFolder = now.toISOString().slice(0, 10);
  const prefix = normalizePrefix(keyPrefix);
  return prefix ? `${prefix}/${dateFolder}/${fileName}` : `${dateFolder}/${fileName}`;
}

export class S3ArtifactStorage implements ArtifactStorage {
  readonly name = 's3';
  private readonly client: S3Client;

  constructor(private readonly settings: S3Settings, client?: S3Client) {
    this.client =
      client ??
      new S3Client({
        endpoint: settings.endpoint,
        region: settings.region,
        forcePathStyle: settings.forcePathStyle,
        credentials: {
          accessKeyId: settings.accessKeyId,
          secretAccessKey: settings.secretAccessKey,
        },
      });
  }

  async save(request: SaveArtifactRequest): Promise<SaveArtifactResult> {
    const key = buildObjectKey(this.settings.keyPrefix, request.fileName);
    const sha256 = sha256Hex(request.body);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.settings.bucket,
        Key: key,
        Body: request.body,
        ContentType: request.mimeType,
        ContentDisposition: `attachment; filename="${request.fileName}"`,
        Metadata: { sha256 },
      }),
    );

    const downloadUrl = await getSignedUrl(
      this.client,
      new GetObjectCommand({
        Bucket: this.settings.bucket,
        Key: key,
      }),
      { expiresIn: this.settings.signedUrlTtlSeconds },
    );

    return {
      downloadUrl,
      sizeBytes: request.body.byteLength,
      sha256,
    };
  }

  async cleanupExpired(_retentionHours: number): Promise<number> {
    // Expiry is left to the bucket's lifecycle rules.
    return 0;
  }
}
