import 'dotenv/config';
import { resolve } from 'path';

const DEFAULT_PORT = 8080;

export type MediaEngineName = 'ffmpeg' | 'mock';
export type StorageBackend = 'local' | 's3';
export type JobStoreBackend = 'memory' | 'postgres';

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function boolFromEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase().trim();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return fallback;
}

function choiceFromEnv<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(', ')} (got ${raw})`);
  }
  return match;
}

export function loadConfig(env: Env = process.env) {
  const port = intFromEnv(env, 'PORT', DEFAULT_PORT);

  const config = {
    port,
    publicBaseUrl: (env.PUBLIC_BASE_URL || `http://localhost:${port}`).replace(/\/+$/, ''),
    maxFileSize: intFromEnv(env, 'MAX_FILE_SIZE', 500 * 1024 * 1024),
    maxTotalSize: intFromEnv(env, 'MAX_TOTAL_SIZE', 1024 * 1024 * 1024),
    maxFiles: intFromEnv(env, 'MAX_FILES', 20),
    requestTimeoutSeconds: intFromEnv(env, 'REQUEST_TIMEOUT_SECONDS', 600),
    workers: intFromEnv(env, 'WORKERS', 1),
    secretKey: env.SECRET_KEY || '',
    apiKey: env.API_KEY || '',
    uploadDir: resolve(process.cwd(), env.UPLOAD_DIR || 'uploads'),
    outputDir: resolve(process.cwd(), env.OUTPUT_DIR || 'output'),
    outputRetentionMinutes: intFromEnv(env, 'OUTPUT_RETENTION_MINUTES', 30),
    cleanupIntervalMs: intFromEnv(env, 'CLEANUP_INTERVAL_MS', 5 * 60 * 1000),
    mediaEngine: choiceFromEnv<MediaEngineName>(env, 'MEDIA_ENGINE', ['ffmpeg', 'mock'], 'ffmpeg'),
    ffmpegPath: env.FFMPEG_PATH || '',
    ffprobePath: env.FFPROBE_PATH || '',
    storageBackend: choiceFromEnv<StorageBackend>(env, 'STORAGE_BACKEND', ['local', 's3'], 'local'),
    s3Endpoint: env.S3_ENDPOINT || '',
    s3Bucket: env.S3_BUCKET || '',
    s3Region: env.S3_REGION || 'auto',
    s3AccessKeyId: env.S3_ACCESS_KEY_ID || '',
    s3SecretAccessKey: env.S3_SECRET_ACCESS_KEY || '',
    s3ForcePathStyle: boolFromEnv(env, 'S3_FORCE_PATH_STYLE', true),
    s3KeyPrefix: env.S3_KEY_PREFIX || 'outputs',
    jobStore: choiceFromEnv<JobStoreBackend>(env, 'JOB_STORE', ['memory', 'postgres'], 'memory'),
    databaseUrl: env.DATABASE_URL || '',
    dbHost: env.PGHOST || '',
    dbPort: intFromEnv(env, 'PGPORT', 5432),
    dbUser: env.PGUSER || '',
    dbPassword: env.PGPASSWORD || '',
    dbName: env.PGDATABASE || '',
    dbSsl: boolFromEnv(env, 'DB_SSL', true),
  };

  if (config.maxFileSize > config.maxTotalSize) {
    throw new Error('MAX_FILE_SIZE cannot exceed MAX_TOTAL_SIZE');
  }

  if (config.jobStore === 'postgres' && !config.databaseUrl && !(config.dbHost && config.dbUser && config.dbName)) {
    throw new Error('DATABASE_URL or PGHOST/PGUSER/PGDATABASE is required when JOB_STORE=postgres');
  }

  if (config.storageBackend === 's3') {
    if (!config.s3Endpoint) {
      throw new Error('S3_ENDPOINT is required when STORAGE_BACKEND=s3');
    }
    if (!config.s3Bucket) {
      throw new Error('S3_BUCKET is required when STORAGE_BACKEND=s3');
    }
    if (!config.s3AccessKeyId || !config.s3SecretAccessKey) {
      throw new Error('S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY are required when STORAGE_BACKEND=s3');
    }
  }

  return config;
}

export type ServiceConfig = ReturnType<typeof loadConfig>;

export const config = loadConfig();
