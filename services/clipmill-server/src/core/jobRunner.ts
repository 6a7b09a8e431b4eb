import { mkdir, rm } from 'fs/promises';
import { join, resolve } from 'path';
import {
  ClipmillError,
  JobTimeoutError,
  ProcessingFailedError,
  validateMergeInputs,
  type ConversionParams,
  type JobKind,
  type JobParams,
  type JobRecord,
  type MergeMethod,
} from 'clipmill';
import type { ArtifactStorage, PublishedArtifact } from '../providers/storage/types.js';
import type { MediaEngine, ProbedInput } from '../types/media.js';
import { toStorageError } from './artifacts.js';
import type { JobGate } from './jobGate.js';
import type { JobStore } from './jobStore.js';

const GENERIC_FAILURE = 'Media processing failed';

export interface StagedInput {
  /** Where the upload sits on disk. */
  path: string;
  /** Name the client gave it. */
  name: string;
}

export interface MergeJobRequest {
  inputs: StagedInput[];
  method: MergeMethod;
  outputName?: string;
  fileName: string;
}

export interface ConvertJobRequest {
  audio: StagedInput;
  params: ConversionParams;
  fileName: string;
}

export interface JobResult {
  job: JobRecord;
  artifact: PublishedArtifact;
}

export interface JobRunnerDeps {
  engine: MediaEngine;
  storage: ArtifactStorage;
  store: JobStore;
  gate: JobGate;
  outputDir: string;
  timeoutSeconds: number;
  logPrefix?: string;
}

type EngineWork = (outputPath: string, signal: AbortSignal) => Promise<void>;

/** Engine failures reach the caller with a fixed message; the job keeps the cause. */
export function toJobFailure(error: unknown): ClipmillError {
  if (error instanceof ClipmillError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new ProcessingFailedError(GENERIC_FAILURE, detail);
}

function failureMessage(error: ClipmillError): string {
  if (error instanceof ProcessingFailedError && error.detail) return error.detail;
  return error.message;
}

export class JobRunner {
  private readonly prefix: string;
  /** Staged input paths held by queued or running jobs, with a count per path. */
  private readonly staged = new Map<string, number>();

  constructor(private readonly deps: JobRunnerDeps) {
    this.prefix = deps.logPrefix ?? '[clipmill]';
  }

  /** True while a queued or running job still needs the file at `path`. */
  isStaged(path: string): boolean {
    return this.staged.has(resolve(path));
  }

  async runMerge(request: MergeJobRequest): Promise<JobResult> {
    validateMergeInputs(request.method, request.inputs.length);

    const params: JobParams = request.outputName
      ? { method: request.method, output_name: request.outputName }
      : { method: request.method };

    return this.execute('merge', request.inputs, params, request.fileName, async (outputPath, signal) => {
      const inputs = await this.probeAll(request.inputs, signal);
      await this.deps.engine.merge({ inputs, method: request.method, outputPath, signal });
    });
  }

  async runConvert(request: ConvertJobRequest): Promise<JobResult> {
    const { resolution, fps, color, outputName } = request.params;
    const params: JobParams = outputName
      ? { resolution, fps, color, output_name: outputName }
      : { resolution, fps, color };

    return this.execute('convert', [request.audio], params, request.fileName, async (outputPath, signal) => {
      const [audio] = await this.probeAll([request.audio], signal);
      if (!audio) throw new Error('Audio input could not be probed');
      await this.deps.engine.convert({ audio, outputPath, resolution, fps, color, signal });
    });
  }

  private async execute(
    kind: JobKind,
    inputs: StagedInput[],
    params: JobParams,
    fileName: string,
    work: EngineWork,
  ): Promise<JobResult> {
    const { store, storage, gate } = this.deps;
    const held = inputs.map((input) => resolve(input.path));
    this.hold(held);

    try {
      const created = await store.create({ kind, inputs: inputs.map((input) => input.name), params });

      return await gate.run(async () => {
        await store.setRunning(created.id);
        const outputPath = join(this.deps.outputDir, fileName);
        const startedAt = Date.now();

        try {
          try {
            await mkdir(this.deps.outputDir, { recursive: true });
          } catch (error) {
            throw toStorageError(error, 'prepare the output directory');
          }

          await this.withTimeout(work, outputPath);
          const artifact = await storage.publish({ jobId: created.id, filePath: outputPath, fileName });
          const job = await store.setDone(created.id, {
            filename: artifact.fileName,
            download_url: artifact.downloadUrl,
            size_bytes: artifact.sizeBytes,
            sha256: artifact.sha256,
          });

          // eslint-disable-next-line no-console
          console.log(
            `${this.prefix} job=${job.id} kind=${kind} status=done file=${artifact.fileName} size=${artifact.sizeBytes} elapsed_ms=${Date.now() - startedAt}`,
          );
          return { job, artifact };
        } catch (error) {
          const failure = toJobFailure(error);
          await rm(outputPath, { force: true });
          await store.setFailed(created.id, failure.code, failureMessage(failure));

          // eslint-disable-next-line no-console
          console.error(
            `${this.prefix} job=${created.id} kind=${kind} status=failed code=${failure.code} message=${failureMessage(failure)}`,
          );
          throw failure;
        }
      });
    } finally {
      this.release(held);
    }
  }

  private hold(paths: string[]): void {
    for (const path of paths) {
      this.staged.set(path, (this.staged.get(path) ?? 0) + 1);
    }
  }

  private release(paths: string[]): void {
    for (const path of paths) {
      const count = (this.staged.get(path) ?? 0) - 1;
      if (count > 0) {
        this.staged.set(path, count);
      } else {
        this.staged.delete(path);
      }
    }
  }

  private async probeAll(inputs: StagedInput[], signal: AbortSignal): Promise<ProbedInput[]> {
    const probed: ProbedInput[] = [];
    for (const input of inputs) {
      if (signal.aborted) throw new Error('Input reads stopped: job was aborted');
      const info = await this.deps.engine.probe(input.path, signal);
      // eslint-disable-next-line no-console
      console.log(
        `${this.prefix} input=${input.name} duration=${info.durationSeconds.toFixed(2)}s` +
          (info.width && info.height ? ` size=${info.width}x${info.height}` : '') +
          (info.fps ? ` fps=${info.fps}` : '') +
          ` audio=${info.hasAudio ? 'yes' : 'no'}`,
      );
      probed.push({ path: input.path, info });
    }
    return probed;
  }

  /**
   * Races the engine against the wall clock. On expiry the engine is told to
   * abort and is awaited so the partial output is gone before cleanup runs.
   */
  private async withTimeout(work: EngineWork, outputPath: string): Promise<void> {
    const controller = new AbortController();
    const timeoutSeconds = this.deps.timeoutSeconds;
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new JobTimeoutError(timeoutSeconds));
      }, timeoutSeconds * 1000);
    });

    const task = work(outputPath, controller.signal);
    try {
      await Promise.race([task, expired]);
    } catch (error) {
      if (!controller.signal.aborted) throw error;
      await Promise.allSettled([task]);
      throw new JobTimeoutError(timeoutSeconds);
    } finally {
      clearTimeout(timer);
    }
  }
}
