import express, { type ErrorRequestHandler } from 'express';
import { createAvatarsRouter } from './routes/avatars.js';
import { createGreetingsRouter } from './routes/greetings.js';
import { createHealthRouter } from './routes/health.js';
import { createHelpRouter } from './routes/help.js';
import { createMessagesRouter } from './routes/messages.js';
import { sendError, sendFailure } from './routes/respond.js';
import { createVideosRouter } from './routes/videos.js';
import type { AppContext } from './types/appContext.js';

const handleUncaught: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  if (error instanceof SyntaxError) {
    sendError(res, 400, 'INVALID_JSON', 'Request body is not valid JSON');
    return;
  }
  sendFailure(res, error, 'request');
};

export function createApp(ctx: AppContext): express.Express {
  const app = express();

  app.use(express.json({ limit: '2mb' }));

  app.use(createHelpRouter(ctx));
  app.use(createHealthRouter(ctx));
  app.use(createMessagesRouter(ctx));
  app.use(createGreetingsRouter(ctx));
  app.use(createVideosRouter(ctx));
  app.use(createAvatarsRouter(ctx));
  if (ctx.config.storage.backend === 'local') {
    app.use('/artifacts', express.static(ctx.config.storage.artifactsDir));
  }

  app.use((req, res) => {
    sendError(res, 404, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
  });
  app.use(handleUncaught);

  return app;
}
