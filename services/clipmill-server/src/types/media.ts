import type { MergeMethod, Resolution, RgbColor } from 'clipmill';

export interface MediaInfo {
  durationSeconds: number;
  width?: number;
  height?: number;
  fps?: number;
  hasVideo: boolean;
  hasAudio: boolean;
}

export interface ProbedInput {
  path: string;
  info: MediaInfo;
}

export interface MergeRequest {
  inputs: ProbedInput[];
  method: MergeMethod;
  outputPath: string;
  signal?: AbortSignal;
}

export interface ConvertRequest {
  audio: ProbedInput;
  outputPath: string;
  resolution: Resolution;
  fps: number;
  color: RgbColor;
  signal?: AbortSignal;
}

/**
 * Wraps the external media library. Implementations write exactly one file at
 * `outputPath` or reject; they never retry.
 */
export interface MediaEngine {
  readonly name: string;
  /** Rejects as soon as `signal` aborts. */
  probe(path: string, signal?: AbortSignal): Promise<MediaInfo>;
  merge(request: MergeRequest): Promise<void>;
  convert(request: ConvertRequest): Promise<void>;
}
