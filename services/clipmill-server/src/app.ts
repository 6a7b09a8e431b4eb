import express, { type Express } from 'express';
import { createErrorHandler, notFoundHandler } from './middleware/errors.js';
import { createDownloadRouter } from './routes/download.js';
import { createHealthRouter } from './routes/health.js';
import { createHelpRouter } from './routes/help.js';
import { createJobsRouter } from './routes/jobs.js';
import { createMediaRouter } from './routes/media.js';
import type { AppContext } from './types/appContext.js';

export function createApp(ctx: AppContext): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(createHelpRouter(ctx));
  app.use(createHealthRouter(ctx));
  app.use(createDownloadRouter(ctx));
  app.use(createJobsRouter(ctx));
  app.use(createMediaRouter(ctx));

  app.use(notFoundHandler);
  app.use(
    createErrorHandler({
      maxFileSize: ctx.config.maxFileSize,
      maxFiles: ctx.config.maxFiles,
    }),
  );

  return app;
}
