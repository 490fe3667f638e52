import { Router } from 'express';
import { FeatureDisabledError } from '../errors.js';
import type { AppContext } from '../types/appContext.js';
import type { ChildProfile } from '../types/greeting.js';
import { isObject, sendError, sendFailure } from './respond.js';

export const MAX_TEXT_LENGTH = 5000;

type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

export function parseChildName(value: unknown): Parsed<string> {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return { ok: false, message: 'child_name is required and must be a non-empty string' };
  }
  if (value.trim().length > 80) {
    return { ok: false, message: 'child_name exceeds max length of 80 characters' };
  }
  return { ok: true, value: value.trim() };
}

export function parseMessageText(value: unknown): Parsed<string> {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return { ok: false, message: 'text is required and must be a non-empty string' };
  }
  if (value.length > MAX_TEXT_LENGTH) {
    return { ok: false, message: `text exceeds max length of ${MAX_TEXT_LENGTH} characters` };
  }
  return { ok: true, value: value.trim() };
}

export function parseChildProfile(input: unknown): Parsed<ChildProfile> {
  if (!isObject(input)) {
    return { ok: false, message: 'child must be a JSON object' };
  }

  const name = parseChildName(input.name);
  if (!name.ok) {
    return { ok: false, message: 'child.name is required and must be a non-empty string' };
  }

  const age = input.age;
  if (typeof age !== 'number' || !Number.isInteger(age) || age < 1 || age > 18) {
    return { ok: false, message: 'child.age must be an integer between 1 and 18' };
  }

  const gender = input.gender;
  if (gender !== 'boy' && gender !== 'girl') {
    return { ok: false, message: 'child.gender must be "boy" or "girl"' };
  }

  return {
    ok: true,
    value: {
      name: name.value,
      age,
      gender,
      anecdote: optionalText(input.anecdote),
      wishlist: optionalText(input.wishlist),
      favoriteItem: optionalText(input.favorite_item),
      shoePlaced: input.shoe_placed === true,
      useSlang: input.use_slang === true,
    },
  };
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function createMessagesRouter(ctx: AppContext): Router {
  const router = Router();

  router.post('/v1/messages', async (req, res) => {
    const body: unknown = req.body;
    if (!isObject(body)) {
      sendError(res, 400, 'VALIDATION_ERROR', 'Request body must be a JSON object');
      return;
    }

    if (body.mode === 'manual') {
      const childName = parseChildName(body.child_name);
      if (!childName.ok) {
        sendError(res, 400, 'VALIDATION_ERROR', childName.message);
        return;
      }
      const text = parseMessageText(body.text);
      if (!text.ok) {
        sendError(res, 400, 'VALIDATION_ERROR', text.message);
        return;
      }
      res.json({ mode: 'manual', child_name: childName.value, text: text.value, word_count: wordCount(text.value) });
      return;
    }

    if (body.mode !== 'auto') {
      sendError(res, 400, 'VALIDATION_ERROR', 'mode must be "auto" or "manual"');
      return;
    }

    const profile = parseChildProfile(body.child);
    if (!profile.ok) {
      sendError(res, 400, 'VALIDATION_ERROR', profile.message);
      return;
    }

    if (!ctx.messages) {
      sendFailure(res, new FeatureDisabledError('messages'), 'message generation');
      return;
    }

    try {
      const text = await ctx.messages.generate(profile.value);
      res.json({ mode: 'auto', child_name: profile.value.name, text, word_count: wordCount(text) });
    } catch (error) {
      sendFailure(res, error, 'message generation');
    }
  });

  return router;
}
