import { Router } from 'express';
import { formatFileSize, type HealthResponse } from 'clipmill';
import { diskUsage, directoryUsage, memoryUsage } from '../lib/system.js';
import type { AppContext } from '../types/appContext.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();
  const startedAt = Date.now();

  router.get('/health', async (_req, res) => {
    try {
      const { config } = ctx;
      const [jobs, disk, uploads, outputs] = await Promise.all([
        ctx.store.stats(),
        diskUsage(config.outputDir),
        directoryUsage(config.uploadDir),
        directoryUsage(config.outputDir),
      ]);
      const memory = memoryUsage();

      const body: HealthResponse = {
        status: 'ok',
        timestamp: new Date().toISOString(),
        uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
        engine: ctx.engine.name,
        storage: ctx.storage.name,
        job_store: ctx.store.name,
        jobs,
        workers: ctx.gate.stats(),
        disk: {
          path: config.outputDir,
          free_bytes: disk.freeBytes,
          total_bytes: disk.totalBytes,
          free: formatFileSize(disk.freeBytes),
        },
        memory: {
          rss_bytes: memory.rssBytes,
          heap_used_bytes: memory.heapUsedBytes,
          system_free_bytes: memory.systemFreeBytes,
          system_total_bytes: memory.systemTotalBytes,
        },
        directories: {
          uploads: { file_count: uploads.fileCount, total_bytes: uploads.totalBytes },
          output: { file_count: outputs.fileCount, total_bytes: outputs.totalBytes },
        },
        limits: {
          max_file_size: config.maxFileSize,
          max_total_size: config.maxTotalSize,
          max_file_size_human: formatFileSize(config.maxFileSize),
          max_total_size_human: formatFileSize(config.maxTotalSize),
          request_timeout_seconds: config.requestTimeoutSeconds,
          retention_minutes: config.outputRetentionMinutes,
        },
      };
      res.json(body);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Health check failed';
      res.status(500).json({
        success: false,
        error: message,
        code: 'HEALTH_CHECK_FAILED',
      });
    }
  });

  return router;
}
