import { Router } from 'express';
import { stat } from 'fs/promises';
import { join } from 'path';
import { DownloadLinks, NotFoundError } from 'clipmill';
import { errnoCode } from '../core/artifacts.js';
import type { AppContext } from '../types/appContext.js';

const SAFE_TOKEN = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export function createDownloadRouter(ctx: AppContext): Router {
  const router = Router();
  const links = new DownloadLinks();

  router.get('/download/:token', async (req, res, next) => {
    try {
      const token = req.params.token;
      if (!SAFE_TOKEN.test(token)) {
        throw new NotFoundError('File not found');
      }
      if (ctx.config.secretKey) {
        links.verify(token, { expires: req.query.expires, signature: req.query.signature }, ctx.config.secretKey);
      }

      const filePath = join(ctx.config.outputDir, token);
      try {
        const fileStat = await stat(filePath);
        if (!fileStat.isFile()) throw new NotFoundError('File not found');
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') throw new NotFoundError('File not found');
        throw error;
      }

      res.download(filePath, token, (error) => {
        if (!error) return;
        if (!res.headersSent) {
          next(error);
          return;
        }
        // eslint-disable-next-line no-console
        console.error(`[clipmill] download of ${token} aborted`, error);
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
