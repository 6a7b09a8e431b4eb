import type { ArtifactStorage } from '../providers/storage/types.js';
import { cleanupOldArtifacts } from './artifacts.js';
import type { JobStore } from './jobStore.js';

export interface CleanupLoopOptions {
  storage: ArtifactStorage;
  store: JobStore;
  uploadDir: string;
  retentionMs: number;
  intervalMs: number;
  /** Uploads still needed by a queued or running job; the sweep leaves them alone. */
  isUploadInUse?: (path: string) => boolean;
}

export interface CleanupSummary {
  outputs: number;
  uploads: number;
  jobs: number;
}

export interface CleanupLoop {
  sweep: () => Promise<CleanupSummary>;
  stop: () => void;
}

export function startCleanupLoop(options: CleanupLoopOptions): CleanupLoop {
  const sweep = async (): Promise<CleanupSummary> => {
    const outputs = await options.storage.cleanupExpired(options.retentionMs);
    const uploads = await cleanupOldArtifacts(
      options.uploadDir,
      options.retentionMs,
      Date.now(),
      options.isUploadInUse,
    );
    const jobs = await options.store.pruneBefore(new Date(Date.now() - options.retentionMs));
    if (outputs > 0 || uploads > 0 || jobs > 0) {
      // eslint-disable-next-line no-console
      console.log(`[clipmill] cleaned outputs=${outputs} uploads=${uploads} jobs=${jobs}`);
    }
    return { outputs, uploads, jobs };
  };

  const timer = setInterval(async () => {
    try {
      await sweep();
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[clipmill] cleanup sweep failed', error);
    }
  }, options.intervalMs);
  timer.unref();

  return {
    sweep,
    stop: () => clearInterval(timer),
  };
}
