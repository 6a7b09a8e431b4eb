import ffmpeg from 'fluent-ffmpeg';
import { basename } from 'path';
import type { ConvertRequest, MediaEngine, MediaInfo, MergeRequest } from '../../types/media.js';
import { buildConcatGraph, buildOverlayGraph, colorSource, formatSeconds } from './filters.js';

const ENCODE_OPTIONS = [
  '-c:v',
  'libx264',
  '-pix_fmt',
  'yuv420p',
  '-preset',
  'medium',
  '-c:a',
  'aac',
  '-b:a',
  '192k',
  '-movflags',
  '+faststart',
];

export function parseFrameRate(raw?: string): number | undefined {
  if (!raw) return undefined;
  const [numerator, denominator = '1'] = raw.split('/');
  const value = Number(numerator) / Number(denominator);
  return Number.isFinite(value) && value > 0 ? Math.round(value * 1000) / 1000 : undefined;
}

function lastStderrLine(stderr: string | null | undefined): string | undefined {
  if (!stderr) return undefined;
  const lines = stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1];
}

function runCommand(command: ffmpeg.FfmpegCommand, outputPath: string, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Media job was cancelled before it started'));
      return;
    }

    const onAbort = () => command.kill('SIGKILL');
    signal?.addEventListener('abort', onAbort, { once: true });

    command
      .on('end', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      })
      .on('error', (error: Error, _stdout: string | null, stderr: string | null) => {
        signal?.removeEventListener('abort', onAbort);
        const detail = lastStderrLine(stderr);
        reject(new Error(detail ? `${error.message} (${detail})` : error.message));
      })
      .save(outputPath);
  });
}

export class FfmpegMediaEngine implements MediaEngine {
  readonly name = 'ffmpeg';

  constructor(options: { ffmpegPath?: string; ffprobePath?: string } = {}) {
    if (options.ffmpegPath) ffmpeg.setFfmpegPath(options.ffmpegPath);
    if (options.ffprobePath) ffmpeg.setFfprobePath(options.ffprobePath);
  }

  probe(path: string, signal?: AbortSignal): Promise<MediaInfo> {
    return new Promise<MediaInfo>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error(`Reading ${basename(path)} was cancelled`));
        return;
      }

      // ffprobe's child process is not exposed, so an abort stops waiting on it.
      const onAbort = () => reject(new Error(`Reading ${basename(path)} was cancelled`));
      signal?.addEventListener('abort', onAbort, { once: true });

      ffmpeg.ffprobe(path, (error: Error | null, data: ffmpeg.FfprobeData) => {
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(new Error(`Could not read ${basename(path)}: ${error.message}`));
          return;
        }

        const durationSeconds = Number(data.format.duration);
        if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
          reject(new Error(`Could not read the duration of ${basename(path)}`));
          return;
        }

        const video = data.streams.find((stream) => stream.codec_type === 'video');
        const audio = data.streams.find((stream) => stream.codec_type === 'audio');

        resolve({
          durationSeconds,
          width: video?.width,
          height: video?.height,
          fps: parseFrameRate(video?.avg_frame_rate) ?? parseFrameRate(video?.r_frame_rate),
          hasVideo: Boolean(video),
          hasAudio: Boolean(audio),
        });
      });
    });
  }

  async merge(request: MergeRequest): Promise<void> {
    const silent = request.inputs.find((input) => !input.info.hasVideo);
    if (silent) {
      throw new Error(`${basename(silent.path)} has no video stream`);
    }

    const infos = request.inputs.map((input) => input.info);
    const graph = request.method === 'overlay' ? buildOverlayGraph(infos) : buildConcatGraph(infos);

    const command = ffmpeg();
    for (const input of request.inputs) {
      command.input(input.path);
    }

    command.complexFilter(graph.filters).outputOptions([
      '-map',
      `[${graph.videoLabel}]`,
      '-map',
      graph.audioLabel ? `[${graph.audioLabel}]` : '0:a?',
      ...ENCODE_OPTIONS,
      '-t',
      formatSeconds(graph.durationSeconds),
    ]);

    await runCommand(command, request.outputPath, request.signal);
  }

  async convert(request: ConvertRequest): Promise<void> {
    if (!request.audio.info.hasAudio) {
      throw new Error(`${basename(request.audio.path)} has no audio stream`);
    }

    const command = ffmpeg()
      .input(colorSource(request.resolution, request.fps, request.color))
      .inputFormat('lavfi')
      .input(request.audio.path)
      .outputOptions(['-map', '0:v', '-map', '1:a', '-tune', 'stillimage', ...ENCODE_OPTIONS, '-shortest'])
      .duration(request.audio.info.durationSeconds);

    await runCommand(command, request.outputPath, request.signal);
  }
}
