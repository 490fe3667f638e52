import { filterAvatars, type AvatarFilter } from 'avatar-video';
import { Router } from 'express';
import { FeatureDisabledError } from '../errors.js';
import type { AppContext } from '../types/appContext.js';
import { sendError, sendFailure } from './respond.js';

const FILTERS: readonly AvatarFilter[] = ['all', 'studio', 'custom'];

function parseFilter(value: unknown): AvatarFilter | undefined {
  if (value === undefined) return 'all';
  return FILTERS.find((filter) => filter === value);
}

export function createAvatarsRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/v1/avatars', async (req, res) => {
    const kind = parseFilter(req.query.kind);
    if (!kind) {
      sendError(res, 400, 'VALIDATION_ERROR', 'kind must be one of all, studio or custom');
      return;
    }
    if (!ctx.video) {
      sendFailure(res, new FeatureDisabledError('video'), 'avatar listing');
      return;
    }

    try {
      const catalog = await ctx.video.avatars.list();
      const configured = ctx.video.avatarId;
      const avatars = filterAvatars(catalog.avatars, kind).map((avatar) => ({
        ...avatar,
        configured: avatar.avatar_id === configured,
      }));
      res.json({
        kind,
        configured_avatar_id: configured ?? null,
        avatars,
        talking_photos: catalog.talkingPhotos,
        count: avatars.length,
      });
    } catch (error) {
      sendFailure(res, error, 'avatar listing');
    }
  });

  return router;
}
