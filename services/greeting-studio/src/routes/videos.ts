import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';
import { sendError } from './respond.js';

export function createVideosRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/v1/videos/:id', (req, res) => {
    const job = ctx.videoJobs.get(req.params.id);
    if (!job) {
      sendError(res, 404, 'JOB_NOT_FOUND', 'No video job found for that id');
      return;
    }
    res.json(job);
  });

  router.delete('/v1/videos/:id', (req, res) => {
    const outcome = ctx.videoJobs.cancel(req.params.id);
    if (outcome === 'not_found') {
      sendError(res, 404, 'JOB_NOT_FOUND', 'No video job found for that id');
      return;
    }
    if (outcome === 'already_finished') {
      sendError(res, 409, 'JOB_FINISHED', 'The video job has already finished');
      return;
    }
    console.log(`[greeting-studio-video] cancel requested job_id=${req.params.id}`);
    res.json(ctx.videoJobs.get(req.params.id));
  });

  return router;
}
