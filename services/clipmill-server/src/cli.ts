import { stat } from 'fs/promises';
import { basename, resolve } from 'path';
import {
  allowedExtensions,
  ClipmillError,
  DEFAULT_COLOR,
  DEFAULT_FPS,
  DEFAULT_RESOLUTION,
  parseConversionParams,
  parseMergeMethod,
  ProcessingFailedError,
  stemOf,
  validateUploadSet,
  type ConversionParams,
  type JobKind,
  type MergeMethod,
  type UploadKind,
} from 'clipmill';
import { loadConfig } from './config.js';
import { errnoCode } from './core/artifacts.js';
import { JobGate } from './core/jobGate.js';
import { JobRunner } from './core/jobRunner.js';
import { MemoryJobStore } from './core/jobStore.js';
import { createMediaEngine } from './providers/media/index.js';
import { LocalArtifactStorage } from './providers/storage/local.js';
import type { MediaEngine } from './types/media.js';

const DEFAULT_OUTPUT_DIR = 'output';
const DEFAULT_MERGE_OUTPUT = 'merged_video.mp4';
const UNLIMITED = { maxFileSize: Number.POSITIVE_INFINITY, maxTotalSize: Number.POSITIVE_INFINITY };

export const USAGE = `Usage:
  clipmill merge <videos...> [-o NAME] [-m concatenate|overlay] [-d DIR]
  clipmill convert <audio...> [-o NAME] [-r W H] [-f FPS] [-c R G B] [-d DIR] [--batch]
  clipmill [merge|convert] --list-formats
  clipmill --help

Options:
  -o, --output NAME      output file name (merge: ${DEFAULT_MERGE_OUTPUT}, convert: <audio>_video.mp4)
  -m, --method METHOD    concatenate (default) or overlay
  -r, --resolution W H   video size for convert (default ${DEFAULT_RESOLUTION.width} ${DEFAULT_RESOLUTION.height})
  -f, --fps FPS          frame rate for convert (default ${DEFAULT_FPS})
  -c, --color R G B      background color for convert (default ${DEFAULT_COLOR.r} ${DEFAULT_COLOR.g} ${DEFAULT_COLOR.b})
  -d, --output-dir DIR   where outputs are written (default ${DEFAULT_OUTPUT_DIR})
  --batch                convert every file independently
  --list-formats         print the accepted extensions`;

export type CliCommand =
  | { command: 'help' }
  | { command: 'list-formats'; kinds: UploadKind[] }
  | { command: 'merge'; files: string[]; output?: string; method: MergeMethod; outputDir: string }
  | {
      command: 'convert';
      files: string[];
      output?: string;
      params: ConversionParams;
      outputDir: string;
      batch: boolean;
    };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

function takeValues(args: string[], index: number, flag: string, count: number): string[] {
  const values = args.slice(index + 1, index + 1 + count);
  if (values.length < count || values.some((value) => value.startsWith('-') && !/^-\d+$/.test(value))) {
    throw new CliUsageError(`${flag} expects ${count} value${count === 1 ? '' : 's'}`);
  }
  return values;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [subcommand, ...args] = argv;

  if (subcommand === undefined || subcommand === '-h' || subcommand === '--help') {
    return { command: 'help' };
  }
  if (subcommand === '--list-formats') {
    return { command: 'list-formats', kinds: ['video', 'audio'] };
  }
  if (subcommand !== 'merge' && subcommand !== 'convert') {
    throw new CliUsageError(`Unknown command: ${subcommand}`);
  }

  const kind: JobKind = subcommand;
  const files: string[] = [];
  const fields: Record<string, unknown> = {};
  let output: string | undefined;
  let method: string | undefined;
  let outputDir = DEFAULT_OUTPUT_DIR;
  let batch = false;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? '';

    switch (arg) {
      case '-h':
      case '--help':
        return { command: 'help' };
      case '--list-formats':
        return { command: 'list-formats', kinds: [kind === 'merge' ? 'video' : 'audio'] };
      case '-o':
      case '--output':
        [output] = takeValues(args, index, arg, 1);
        index += 1;
        break;
      case '-d':
      case '--output-dir':
        [outputDir = DEFAULT_OUTPUT_DIR] = takeValues(args, index, arg, 1);
        index += 1;
        break;
      case '-m':
      case '--method':
        if (kind !== 'merge') throw new CliUsageError(`${arg} only applies to merge`);
        [method] = takeValues(args, index, arg, 1);
        index += 1;
        break;
      case '-r':
      case '--resolution':
        if (kind !== 'convert') throw new CliUsageError(`${arg} only applies to convert`);
        [fields.resolution_width, fields.resolution_height] = takeValues(args, index, arg, 2);
        index += 2;
        break;
      case '-f':
      case '--fps':
        if (kind !== 'convert') throw new CliUsageError(`${arg} only applies to convert`);
        [fields.fps] = takeValues(args, index, arg, 1);
        index += 1;
        break;
      case '-c':
      case '--color':
        if (kind !== 'convert') throw new CliUsageError(`${arg} only applies to convert`);
        [fields.color_r, fields.color_g, fields.color_b] = takeValues(args, index, arg, 3);
        index += 3;
        break;
      case '--batch':
        if (kind !== 'convert') throw new CliUsageError(`${arg} only applies to convert`);
        batch = true;
        break;
      default:
        if (arg.startsWith('-')) throw new CliUsageError(`Unknown option: ${arg}`);
        files.push(arg);
    }
  }

  if (kind === 'merge') {
    return { command: 'merge', files, output, method: parseMergeMethod(method), outputDir };
  }
  return { command: 'convert', files, output, params: parseConversionParams(fields), outputDir, batch };
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  engine?: MediaEngine;
  log?: (line: string) => void;
  error?: (line: string) => void;
}

async function existingFiles(
  paths: readonly string[],
  label: string,
  warn: (line: string) => void,
): Promise<Array<{ path: string; sizeBytes: number }>> {
  const found: Array<{ path: string; sizeBytes: number }> = [];
  for (const path of paths) {
    try {
      const fileStat = await stat(path);
      if (fileStat.isFile()) {
        found.push({ path: resolve(path), sizeBytes: fileStat.size });
        continue;
      }
    } catch (error) {
      const code = errnoCode(error);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw error;
    }
    warn(`Warning: ${label} file not found: ${path}`);
  }
  return found;
}

function describeFailure(error: ClipmillError): string {
  if (error instanceof ProcessingFailedError && error.detail) {
    return `${error.message}: ${error.detail}`;
  }
  return error.message;
}

/** Runs one CLI invocation and resolves with the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.log ?? ((line: string) => console.log(line));
  const error = deps.error ?? ((line: string) => console.error(line));

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (parseError) {
    if (parseError instanceof CliUsageError || parseError instanceof ClipmillError) {
      error(`Error: ${parseError.message}`);
      error(USAGE);
      return 2;
    }
    throw parseError;
  }

  if (command.command === 'help') {
    log(USAGE);
    return 0;
  }
  if (command.command === 'list-formats') {
    for (const kind of command.kinds) {
      log(`Supported ${kind} formats:`);
      for (const extension of allowedExtensions(kind)) {
        log(`  .${extension}`);
      }
    }
    return 0;
  }

  const config = loadConfig(deps.env ?? process.env);
  const outputDir = resolve(command.outputDir);
  const engine = deps.engine ?? createMediaEngine(config);
  const storage = new LocalArtifactStorage({
    outputDir,
    publicBaseUrl: '',
    secretKey: '',
    outputRetentionMinutes: config.outputRetentionMinutes,
  });
  const runner = new JobRunner({
    engine,
    storage,
    store: new MemoryJobStore(),
    gate: new JobGate(1),
    outputDir,
    timeoutSeconds: config.requestTimeoutSeconds,
    logPrefix: '[clipmill-cli]',
  });

  if (command.command === 'merge') {
    const videos = await existingFiles(command.files, 'Video', error);
    if (videos.length === 0) {
      error('Error: No valid video files provided');
      return 1;
    }

    try {
      validateUploadSet(
        videos.map((video) => ({ filename: video.path, sizeBytes: video.sizeBytes })),
        'merge',
        UNLIMITED,
      );
      log(`Merging ${videos.length} videos using ${command.method} method...`);
      const { artifact } = await runner.runMerge({
        inputs: videos.map((video) => ({ path: video.path, name: basename(video.path) })),
        method: command.method,
        outputName: command.output,
        fileName: `${stemOf(command.output ?? DEFAULT_MERGE_OUTPUT, 'merged_video')}.mp4`,
      });
      log('Video merging completed successfully!');
      log(`Output file: ${artifact.location}`);
      return 0;
    } catch (mergeError) {
      if (!(mergeError instanceof ClipmillError)) throw mergeError;
      error(`Error: ${describeFailure(mergeError)}`);
      error('Video merging failed!');
      return 1;
    }
  }

  const audioFiles = await existingFiles(command.files, 'Audio', error);
  if (audioFiles.length === 0) {
    error('Error: No valid audio files provided');
    return 1;
  }

  const batch = command.batch || audioFiles.length > 1;
  if (batch) {
    log(`Converting ${audioFiles.length} audio files to video...`);
  } else {
    log('Converting audio to video...');
  }

  const converted: string[] = [];
  for (const audio of audioFiles) {
    const name = basename(audio.path);
    const stem = !batch && command.output ? stemOf(command.output, 'output') : `${stemOf(name, 'audio')}_video`;
    try {
      validateUploadSet([{ filename: audio.path, sizeBytes: audio.sizeBytes }], 'convert', UNLIMITED);
      const { artifact } = await runner.runConvert({
        audio: { path: audio.path, name },
        params: command.params,
        fileName: `${stem}.mp4`,
      });
      converted.push(artifact.location);
    } catch (convertError) {
      if (!(convertError instanceof ClipmillError)) throw convertError;
      error(`Error converting ${name}: ${describeFailure(convertError)}`);
    }
  }

  if (converted.length === 0) {
    error(batch ? 'No files were converted successfully!' : 'Audio to video conversion failed!');
    return 1;
  }

  if (batch) {
    log(`Successfully converted ${converted.length} files:`);
    for (const location of converted) log(`  ${location}`);
  } else {
    log('Audio to video conversion completed successfully!');
    log(`Output file: ${converted[0]}`);
  }
  return 0;
}
