import { Router, type Request } from 'express';
import {
  buildOutputFilename,
  parseConversionParams,
  parseMergeMethod,
  parseOutputName,
  validateMergeInputs,
  validateUploadSet,
  type JobKind,
  type MediaJobResponse,
} from 'clipmill';
import { createApiKeyMiddleware } from '../middleware/apiKey.js';
import { createContentLengthGuard, createUploader, removeUploads, uploadedFiles } from '../middleware/uploads.js';
import type { AppContext } from '../types/appContext.js';

type UploadedFile = Express.Multer.File;

function checkUploads(ctx: AppContext, files: UploadedFile[], kind: JobKind): void {
  validateUploadSet(
    files.map((file) => ({ filename: file.originalname, sizeBytes: file.size })),
    kind,
    { maxFileSize: ctx.config.maxFileSize, maxTotalSize: ctx.config.maxTotalSize },
  );
}

async function mergeVideos(ctx: AppContext, req: Request, files: UploadedFile[]): Promise<MediaJobResponse> {
  checkUploads(ctx, files, 'merge');
  const method = parseMergeMethod(req.body?.method);
  validateMergeInputs(method, files.length);
  const outputName = parseOutputName(req.body?.output_name);

  const { job, artifact } = await ctx.runner.runMerge({
    inputs: files.map((file) => ({ path: file.path, name: file.originalname })),
    method,
    outputName,
    fileName: buildOutputFilename({ kind: 'merge', outputName }),
  });

  return {
    success: true,
    job_id: job.id,
    download_url: artifact.downloadUrl,
    filename: artifact.fileName,
    message: 'Videos merged successfully!',
  };
}

async function convertAudio(ctx: AppContext, req: Request, files: UploadedFile[]): Promise<MediaJobResponse> {
  checkUploads(ctx, files, 'convert');
  const [audio] = files;
  if (!audio) throw new Error('Validated upload set is empty');
  const params = parseConversionParams(req.body ?? {});

  const { job, artifact } = await ctx.runner.runConvert({
    audio: { path: audio.path, name: audio.originalname },
    params,
    fileName: buildOutputFilename({
      kind: 'convert',
      outputName: params.outputName,
      sourceName: audio.originalname,
    }),
  });

  return {
    success: true,
    job_id: job.id,
    download_url: artifact.downloadUrl,
    filename: artifact.fileName,
    message: 'Audio converted to video successfully!',
  };
}

export function createMediaRouter(ctx: AppContext): Router {
  const router = Router();
  const uploadOptions = {
    uploadDir: ctx.config.uploadDir,
    maxFileSize: ctx.config.maxFileSize,
    maxFiles: ctx.config.maxFiles,
  };
  const requireKey = createApiKeyMiddleware(ctx.config.apiKey);
  const guard = createContentLengthGuard(ctx.config.maxTotalSize);
  const videoUploads = createUploader('video', uploadOptions).array('files', ctx.config.maxFiles);
  const audioUploads = createUploader('audio', uploadOptions).single('file');

  // Staged uploads are removed before the response goes out, on success and on failure.
  router.post('/merge-videos', requireKey, guard, videoUploads, async (req, res, next) => {
    const files = uploadedFiles(req);
    try {
      const body = await mergeVideos(ctx, req, files);
      await removeUploads(files);
      res.json(body);
    } catch (error) {
      await removeUploads(files);
      next(error);
    }
  });

  router.post('/convert-audio', requireKey, guard, audioUploads, async (req, res, next) => {
    const files = uploadedFiles(req);
    try {
      const body = await convertAudio(ctx, req, files);
      await removeUploads(files);
      res.json(body);
    } catch (error) {
      await removeUploads(files);
      next(error);
    }
  });

  return router;
}
