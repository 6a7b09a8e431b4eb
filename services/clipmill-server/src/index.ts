import { mkdir } from 'fs/promises';
import { formatFileSize } from 'clipmill';
import { createApp } from './app.js';
import { config } from './config.js';
import { buildAppContext } from './context.js';
import { startCleanupLoop } from './core/cleanup.js';
import { MemoryJobStore, type JobStore } from './core/jobStore.js';
import { PostgresJobStore } from './core/postgresJobStore.js';
import { createDatabase, type Database } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createMediaEngine } from './providers/media/index.js';
import { createArtifactStorage } from './providers/storage/index.js';

async function main() {
  await mkdir(config.uploadDir, { recursive: true });
  await mkdir(config.outputDir, { recursive: true });

  let db: Database | undefined;
  let store: JobStore;
  if (config.jobStore === 'postgres') {
    db = createDatabase(config);
    await initializeSchema(db);
    store = new PostgresJobStore(db);
  } else {
    store = new MemoryJobStore();
  }

  const engine = createMediaEngine(config);
  const storage = createArtifactStorage(config);
  const ctx = buildAppContext({ config, engine, storage, store });
  const app = createApp(ctx);

  const cleanup = startCleanupLoop({
    storage,
    store,
    uploadDir: config.uploadDir,
    retentionMs: config.outputRetentionMinutes * 60 * 1000,
    intervalMs: config.cleanupIntervalMs,
    isUploadInUse: (path) => ctx.runner.isStaged(path),
  });
  await cleanup.sweep();

  const server = app.listen(config.port, () => {
    console.log(`[clipmill] listening on ${config.publicBaseUrl}`);
    console.log(`[clipmill] engine=${engine.name} storage=${storage.name} job_store=${store.name} workers=${config.workers}`);
    console.log(
      `[clipmill] max_file_size=${formatFileSize(config.maxFileSize)} max_total_size=${formatFileSize(config.maxTotalSize)} timeout=${config.requestTimeoutSeconds}s`,
    );
    console.log(`[clipmill] uploads_dir=${config.uploadDir} output_dir=${config.outputDir}`);
    if (storage.name === 's3') {
      console.log(`[clipmill] artifacts_bucket=${config.s3Bucket} endpoint=${config.s3Endpoint}`);
    }
  });
  // Longer than the job timeout.
  server.requestTimeout = (config.requestTimeoutSeconds + 30) * 1000;

  const shutdown = () => {
    cleanup.stop();
    server.close(async () => {
      await db?.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[clipmill] fatal startup error', error);
  process.exit(1);
});
