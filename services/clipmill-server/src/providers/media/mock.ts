import { readFile, writeFile } from 'fs/promises';
import { basename } from 'path';
import type { ConvertRequest, MediaEngine, MediaInfo, MergeRequest } from '../../types/media.js';
import { buildConcatGraph, buildOverlayGraph } from './filters.js';

const FAKE_MEDIA_PREFIX = 'FAKE_MEDIA::';

/** Serializes a placeholder media file the mock engine can probe. */
export function encodeFakeMedia(info: MediaInfo): string {
  return `${FAKE_MEDIA_PREFIX}${JSON.stringify(info)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function decodeFakeMedia(content: string): MediaInfo | undefined {
  if (!content.startsWith(FAKE_MEDIA_PREFIX)) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(FAKE_MEDIA_PREFIX.length));
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;

  const durationSeconds = optionalNumber(parsed.durationSeconds);
  if (durationSeconds === undefined || durationSeconds <= 0) return undefined;

  return {
    durationSeconds,
    width: optionalNumber(parsed.width),
    height: optionalNumber(parsed.height),
    fps: optionalNumber(parsed.fps),
    hasVideo: parsed.hasVideo === true,
    hasAudio: parsed.hasAudio === true,
  };
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Mock media job was cancelled'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Mock media job was cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Stands in for ffmpeg in tests and local runs. Inputs are placeholder files
 * written with `encodeFakeMedia`; outputs describe what the real engine would
 * have produced.
 */
export class MockMediaEngine implements MediaEngine {
  readonly name = 'mock';

  constructor(private readonly options: { latencyMs?: number } = {}) {}

  async probe(path: string, signal?: AbortSignal): Promise<MediaInfo> {
    if (signal?.aborted) {
      throw new Error(`Reading ${basename(path)} was cancelled`);
    }
    const info = decodeFakeMedia(await readFile(path, 'utf8'));
    if (!info) {
      throw new Error(`Could not read ${basename(path)}: invalid data found when processing input`);
    }
    return info;
  }

  async merge(request: MergeRequest): Promise<void> {
    const silent = request.inputs.find((input) => !input.info.hasVideo);
    if (silent) {
      throw new Error(`${basename(silent.path)} has no video stream`);
    }

    await wait(this.options.latencyMs ?? 0, request.signal);

    const infos = request.inputs.map((input) => input.info);
    const graph = request.method === 'overlay' ? buildOverlayGraph(infos) : buildConcatGraph(infos);
    const hasAudio = request.method === 'overlay' ? infos[0]?.hasAudio === true : true;

    await writeFile(
      request.outputPath,
      encodeFakeMedia({
        durationSeconds: graph.durationSeconds,
        width: graph.width,
        height: graph.height,
        fps: graph.fps,
        hasVideo: true,
        hasAudio,
      }),
    );
  }

  async convert(request: ConvertRequest): Promise<void> {
    if (!request.audio.info.hasAudio) {
      throw new Error(`${basename(request.audio.path)} has no audio stream`);
    }

    await wait(this.options.latencyMs ?? 0, request.signal);

    await writeFile(
      request.outputPath,
      encodeFakeMedia({
        durationSeconds: request.audio.info.durationSeconds,
        width: request.resolution.width,
        height: request.resolution.height,
        fps: request.fps,
        hasVideo: true,
        hasAudio: true,
      }),
    );
  }
}
