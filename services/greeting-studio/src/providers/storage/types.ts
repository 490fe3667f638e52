export interface SaveArtifactRequest {
  fileName: string;
  body: Buffer;
  mimeType: string;
}

export interface SaveArtifactResult {
  downloadUrl: string;
  sizeBytes: number;
  sha256: string;
}

export interface ArtifactStorage {
  readonly name: string;
  save(request: SaveArtifactRequest): Promise<SaveArtifactResult>;
  cleanupExpired(retentionHours: number): Promise<number>;
}
