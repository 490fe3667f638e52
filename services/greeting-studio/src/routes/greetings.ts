import { randomUUID } from 'crypto';
import { Router } from 'express';
import { artifactFileName } from '../core/artifacts.js';
import { formatLetter } from '../core/letterFormatter.js';
import { FeatureDisabledError } from '../errors.js';
import type { AppContext } from '../types/appContext.js';
import type { GreetingOutputs, GreetingRequest } from '../types/greeting.js';
import { parseChildName, parseMessageText } from './messages.js';
import { isObject, sendError, sendFailure } from './respond.js';

function parseOutputs(input: unknown): GreetingOutputs | undefined {
  if (!isObject(input)) return undefined;
  const outputs = {
    audio: input.audio === true,
    video: input.video === true,
    letter: input.letter === true,
  };
  // The avatar speaks the narration, so a video always brings its audio.
  if (outputs.video) outputs.audio = true;
  return outputs;
}

function parseGreetingBody(body: unknown): { ok: true; value: GreetingRequest } | { ok: false; message: string } {
  if (!isObject(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }
  const childName = parseChildName(body.child_name);
  if (!childName.ok) return childName;
  const text = parseMessageText(body.text);
  if (!text.ok) return text;

  const outputs = parseOutputs(body.outputs);
  if (!outputs || (!outputs.audio && !outputs.video && !outputs.letter)) {
    return { ok: false, message: 'outputs must request at least one of audio, video or letter' };
  }

  return {
    ok: true,
    value: {
      childName: childName.value,
      text: text.value,
      outputs,
      preferPrimaryVoice: body.prefer_primary_voice !== false,
    },
  };
}

function disabledOutput(ctx: AppContext, outputs: GreetingOutputs): string | undefined {
  const { features } = ctx.config;
  if (outputs.letter && !features.letter) return 'letter';
  if (outputs.audio && !features.speech) return 'speech';
  if (outputs.video && (!features.video || !ctx.video)) return 'video';
  return undefined;
}

export function createGreetingsRouter(ctx: AppContext): Router {
  const router = Router();

  router.post('/v1/greetings', async (req, res) => {
    const parsed = parseGreetingBody(req.body);
    if (!parsed.ok) {
      sendError(res, 400, 'VALIDATION_ERROR', parsed.message);
      return;
    }

    const request = parsed.value;
    const disabled = disabledOutput(ctx, request.outputs);
    if (disabled) {
      sendFailure(res, new FeatureDisabledError(disabled), 'greeting');
      return;
    }

    const greetingId = randomUUID().slice(0, 8);
    const response: Record<string, unknown> = { greeting_id: greetingId, child_name: request.childName };

    try {
      if (request.outputs.letter) {
        const letter = formatLetter(request.text);
        const html = await ctx.letters.render(letter, { title: `Brief van Sinterklaas voor ${request.childName}` });
        const fileName = artifactFileName({ kind: 'letter', childName: request.childName, id: greetingId, extension: 'html' });
        const saved = await ctx.storage.save({
          fileName,
          body: Buffer.from(html, 'utf8'),
          mimeType: 'text/html; charset=utf-8',
        });
        response.letter = {
          download_url: saved.downloadUrl,
          file_name: fileName,
          mime_type: 'text/html',
          size_bytes: saved.sizeBytes,
          sha256: saved.sha256,
          salutation: letter.salutation,
          paragraphs: letter.paragraphs,
        };
      }

      if (request.outputs.audio) {
        const speech = await ctx.speech.speak(request.text, { preferPrimary: request.preferPrimaryVoice });
        const fileName = artifactFileName({
          kind: 'audio',
          childName: request.childName,
          id: greetingId,
          extension: speech.extension,
        });
        const saved = await ctx.storage.save({ fileName, body: speech.audio, mimeType: speech.mimeType });
        response.audio = {
          download_url: saved.downloadUrl,
          file_name: fileName,
          mime_type: speech.mimeType,
          size_bytes: saved.sizeBytes,
          sha256: saved.sha256,
          provider: speech.provider,
          fell_back: speech.fellBack,
        };

        if (request.outputs.video && ctx.video) {
          const { record } = ctx.video.pipeline.enqueue({
            childName: request.childName,
            audio: speech.audio,
            audioMimeType: speech.mimeType,
          });
          response.video = {
            job_id: record.id,
            status: record.status,
            poll_url: `/v1/videos/${record.id}`,
          };
          res.status(202).json(response);
          return;
        }
      }

      res.json(response);
    } catch (error) {
      sendFailure(res, error, 'greeting');
    }
  });

  return router;
}
