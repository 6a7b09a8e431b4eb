export type MergeMethod = 'concatenate' | 'overlay';
export type JobKind = 'merge' | 'convert';
export type JobStatus = 'pending' | 'running' | 'done' | 'failed';
export type UploadKind = 'video' | 'audio';

export interface ClipmillConfig {
  baseUrl?: string;
  apiKey?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface UploadEntry {
  filename: string;
  sizeBytes: number;
}

export interface UploadLimits {
  maxFileSize: number;
  maxTotalSize: number;
}

export interface Resolution {
  width: number;
  height: number;
}

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface ConversionParams {
  resolution: Resolution;
  fps: number;
  color: RgbColor;
  outputName?: string;
}

export interface MergeJobParams {
  method: MergeMethod;
  output_name?: string;
}

export interface ConvertJobParams {
  resolution: Resolution;
  fps: number;
  color: RgbColor;
  output_name?: string;
}

export type JobParams = MergeJobParams | ConvertJobParams;

export interface JobOutput {
  filename: string;
  download_url: string;
  size_bytes: number;
  sha256: string;
}

export interface JobRecord {
  id: string;
  kind: JobKind;
  status: JobStatus;
  inputs: string[];
  params: JobParams;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  output?: JobOutput;
  error?: {
    code: string;
    message: string;
  };
}

export interface ErrorResponse {
  success: false;
  error: string;
  code: string;
  details?: Record<string, unknown>;
}

export interface MediaJobResponse {
  success: true;
  job_id: string;
  download_url: string;
  filename: string;
  message: string;
}

export interface UploadFile {
  name: string;
  data: Blob | Uint8Array;
}

export interface MergeVideosRequest {
  files: UploadFile[];
  method?: MergeMethod;
  output_name?: string;
}

export interface ConvertAudioRequest {
  file: UploadFile;
  resolution_width?: number;
  resolution_height?: number;
  fps?: number;
  color_r?: number;
  color_g?: number;
  color_b?: number;
  output_name?: string;
}

export interface FormatsResponse {
  video: string[];
  audio: string[];
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  uptime_seconds: number;
  engine: string;
  storage: string;
  job_store: string;
  jobs: {
    total: number;
    pending: number;
    running: number;
    done: number;
    failed: number;
  };
  workers: {
    limit: number;
    active: number;
    waiting: number;
  };
  disk: {
    path: string;
    free_bytes: number;
    total_bytes: number;
    free: string;
  };
  memory: {
    rss_bytes: number;
    heap_used_bytes: number;
    system_free_bytes: number;
    system_total_bytes: number;
  };
  directories: Record<string, { file_count: number; total_bytes: number }>;
  limits: {
    max_file_size: number;
    max_total_size: number;
    max_file_size_human: string;
    max_total_size_human: string;
    request_timeout_seconds: number;
    retention_minutes: number;
  };
}
