import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createHelpRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/help', (_req, res) => {
    res.json({
      service: 'greeting-studio',
      version: '0.1.0',
      summary:
        'Write or generate a personal Sinterklaas message for a child, then turn it into narrated audio, a talking-head video and a printable letter.',
      base_url: ctx.config.publicBaseUrl,
      capabilities: ctx.config.features,
      quickstart: [
        '1) POST /v1/messages with mode=auto and a child profile, or mode=manual with child_name and text',
        '2) POST /v1/greetings with child_name, text and outputs {audio, video, letter}',
        '3) Download audio and letter from their download_url',
        '4) When a video was requested, poll GET /v1/videos/{job_id} until status=done',
      ],
      messages: {
        auto_fields: ['name', 'age', 'gender', 'anecdote', 'wishlist', 'favorite_item', 'shoe_placed', 'use_slang'],
        genders: ['boy', 'girl'],
        age_range: [1, 18],
      },
      speech: {
        primary: ctx.speech.primaryName ?? null,
        secondary: ctx.speech.secondaryName ?? null,
        fallback: 'one hop from primary to secondary when the primary fails',
        prefer_primary_voice: 'set false to go straight to the secondary provider',
      },
      delivery: {
        video_job_states: ['queued', 'running', 'done', 'failed', 'cancelled'],
        retrieval: 'Poll GET /v1/videos/{job_id}; DELETE it to cancel',
        artifact_retention_hours: ctx.config.storage.retentionHours,
        letter_format: 'Self-contained HTML; print it from a browser to get the PDF letter',
      },
      errors: {
        envelope: '{ error: { code, message, kind?, hint? } }',
        kinds: ['authentication', 'not_found', 'rate_limited', 'quota_exceeded', 'configuration', 'generic'],
      },
    });
  });

  return router;
}
