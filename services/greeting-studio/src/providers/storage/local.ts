import { cleanupOldArtifacts, writeArtifact } from '../../core/artifacts.js';
import type { ArtifactStorage, SaveArtifactRequest, SaveArtifactResult } from './types.js';

export class LocalArtifactStorage implements ArtifactStorage {
  readonly name = 'local';

  constructor(
    private readonly directory: string,
    private readonly publicBaseUrl: string,
  ) {}

  async save(request: SaveArtifactRequest): Promise<SaveArtifactResult> {
    const artifact = await writeArtifact({
      directory: this.directory,
      fileName: request.fileName,
      body: request.body,
    });

    return {
      downloadUrl: `${this.publicBaseUrl}/artifacts/${encodeURIComponent(request.fileName)}`,
      sizeBytes: artifact.sizeBytes,
      sha256: artifact.sha256,
    };
  }

  async cleanupExpired(retentionHours: number): Promise<number> {
    return cleanupOldArtifacts(this.directory, retentionHours);
  }
}
