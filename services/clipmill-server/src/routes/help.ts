import { Router } from 'express';
import {
  AUDIO_EXTENSIONS,
  DEFAULT_COLOR,
  DEFAULT_FPS,
  DEFAULT_RESOLUTION,
  MAX_OVERLAY_INPUTS,
  MIN_MERGE_INPUTS,
  VIDEO_EXTENSIONS,
  formatFileSize,
  type FormatsResponse,
} from 'clipmill';
import type { AppContext } from '../types/appContext.js';

export function createHelpRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/formats', (_req, res) => {
    const body: FormatsResponse = { video: [...VIDEO_EXTENSIONS], audio: [...AUDIO_EXTENSIONS] };
    res.json(body);
  });

  router.get('/help', (_req, res) => {
    const { config } = ctx;
    res.json({
      service: 'clipmill',
      version: '0.1.0',
      summary: 'Merge uploaded videos into one, or turn an audio file into a video with a solid background.',
      base_url: config.publicBaseUrl,
      auth: config.apiKey
        ? { header: 'x-api-key: <API_KEY>', applies_to: ['POST /merge-videos', 'POST /convert-audio'] }
        : { header: null, note: 'No API key configured for this deployment.' },
      endpoints: {
        'POST /merge-videos': {
          fields: {
            files: `${MIN_MERGE_INPUTS} or more video files, merged in upload order`,
            method: `concatenate (default) or overlay (at most ${MAX_OVERLAY_INPUTS} files)`,
            output_name: 'optional output file name',
          },
        },
        'POST /convert-audio': {
          fields: {
            file: 'one audio file',
            resolution_width: DEFAULT_RESOLUTION.width,
            resolution_height: DEFAULT_RESOLUTION.height,
            fps: DEFAULT_FPS,
            color_r: DEFAULT_COLOR.r,
            color_g: DEFAULT_COLOR.g,
            color_b: DEFAULT_COLOR.b,
            output_name: 'optional output file name',
          },
        },
        'GET /download/{filename}': 'download a finished output',
        'GET /jobs/{job_id}': 'job status, parameters and output',
        'GET /formats': 'accepted file extensions',
        'GET /health': 'process, disk and job status',
      },
      limits: {
        max_file_size: formatFileSize(config.maxFileSize),
        max_total_size: formatFileSize(config.maxTotalSize),
        max_files: config.maxFiles,
        request_timeout_seconds: config.requestTimeoutSeconds,
        output_retention_minutes: config.outputRetentionMinutes,
        signed_downloads: Boolean(config.secretKey),
      },
      formats: { video: [...VIDEO_EXTENSIONS], audio: [...AUDIO_EXTENSIONS] },
    });
  });

  return router;
}
