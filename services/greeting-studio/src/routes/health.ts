import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const { config } = ctx;
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      features: config.features,
      messages: {
        model: config.features.messages ? config.openai?.chatModel ?? null : null,
      },
      speech: {
        primary: ctx.speech.primaryName ?? null,
        secondary: ctx.speech.secondaryName ?? null,
      },
      storage: {
        backend: ctx.storage.name,
        retention_hours: config.storage.retentionHours,
      },
      video: {
        enabled: Boolean(ctx.video),
        jobs: ctx.videoJobs.stats(),
      },
    });
  });

  return router;
}
