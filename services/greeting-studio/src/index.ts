import 'dotenv/config';
import { mkdir } from 'fs/promises';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { buildContext } from './context.js';
import { startArtifactCleanupLoop } from './providers/storage/index.js';

async function main() {
  const config = loadConfig();

  if (config.storage.backend === 'local') {
    await mkdir(config.storage.artifactsDir, { recursive: true });
  }

  const ctx = buildContext(config);
  const app = createApp(ctx);
  const cleanup = startArtifactCleanupLoop(ctx.storage, {
    retentionHours: config.storage.retentionHours,
    intervalMs: config.storage.cleanupIntervalMs,
  });
  const eviction = setInterval(() => {
    const evicted = ctx.videoJobs.evictFinished();
    if (evicted > 0) {
      console.log(`[greeting-studio] evicted ${evicted} finished video jobs`);
    }
  }, config.storage.cleanupIntervalMs);
  eviction.unref();

  const server = app.listen(config.port, () => {
    const enabled = Object.entries(config.features)
      .filter(([, on]) => on)
      .map(([name]) => name)
      .join(',');
    console.log(`[greeting-studio] listening on ${config.publicBaseUrl}`);
    console.log(`[greeting-studio] features=${enabled || 'none'}`);
    console.log(
      `[greeting-studio] speech primary=${ctx.speech.primaryName ?? 'none'} secondary=${ctx.speech.secondaryName ?? 'none'}`,
    );
    if (config.video) {
      console.log(
        `[greeting-studio] video api_base=${config.video.apiBaseUrl} avatar=${config.video.avatarId ?? 'talking_photo'} poll_interval_s=${config.video.pollIntervalSeconds} poll_timeout_s=${config.video.pollTimeoutSeconds}`,
      );
    }
    if (config.storage.backend === 'local') {
      console.log(`[greeting-studio] artifacts_dir=${config.storage.artifactsDir}`);
    } else {
      console.log(`[greeting-studio] artifacts_bucket=${config.storage.s3?.bucket} endpoint=${config.storage.s3?.endpoint}`);
    }
  });

  const shutdown = () => {
    cleanup.stop();
    clearInterval(eviction);
    const cancelled = ctx.videoJobs.cancelAll();
    if (cancelled > 0) {
      console.log(`[greeting-studio] cancelled ${cancelled} running video jobs`);
    }
    server.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[greeting-studio] fatal startup error', error);
  process.exit(1);
});
