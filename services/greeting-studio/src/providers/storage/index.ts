import type { StudioConfig } from '../../config.js';
import { ConfigurationError } from '../../errors.js';
import { LocalArtifactStorage } from './local.js';
import { S3ArtifactStorage } from './s3.js';
import type { ArtifactStorage } from './types.js';

export function createArtifactStorage(config: StudioConfig): ArtifactStorage {
  if (config.storage.backend === 's3') {
    if (!config.storage.s3) throw new ConfigurationError('STORAGE_BACKEND=s3 without S3 settings');
    return new S3ArtifactStorage(config.storage.s3);
  }
  return new LocalArtifactStorage(config.storage.artifactsDir, config.publicBaseUrl);
}

export function startArtifactCleanupLoop(
  storage: ArtifactStorage,
  options: { retentionHours: number; intervalMs: number },
): { stop: () => void } {
  const timer = setInterval(async () => {
    try {
      const deleted = await storage.cleanupExpired(options.retentionHours);
      if (deleted > 0) {
        console.log(`[greeting-studio] cleaned ${deleted} expired artifacts backend=${storage.name}`);
      }
    } catch (error) {
      console.error('[greeting-studio] artifact cleanup failed', error);
    }
  }, options.intervalMs);
  timer.unref();

  return {
    stop: () => clearInterval(timer),
  };
}
