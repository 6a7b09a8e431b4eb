import {
  FileTooLargeError,
  InsufficientInputsError,
  InvalidRequestError,
  PayloadTooLargeError,
  UnsupportedFormatError,
} from './errors.js';
import { allowedExtensions, isAllowedFile } from './formats.js';
import type {
  ConversionParams,
  JobKind,
  MergeMethod,
  RgbColor,
  UploadEntry,
  UploadLimits,
} from './types.js';

export const MIN_MERGE_INPUTS = 2;
export const MAX_OVERLAY_INPUTS = 5;

export const DEFAULT_RESOLUTION = { width: 1920, height: 1080 } as const;
export const DEFAULT_FPS = 30;
export const DEFAULT_COLOR: RgbColor = { r: 0, g: 0, b: 0 };

const MAX_WIDTH = 7680;
const MAX_HEIGHT = 4320;
const MAX_FPS = 120;

export function uploadKindFor(kind: JobKind): 'video' | 'audio' {
  return kind === 'merge' ? 'video' : 'audio';
}

/**
 * Rejects an upload set before any media work happens. Checks run in a fixed
 * order, each over the whole set: extension, per-file size, total size, count.
 */
export function validateUploadSet(
  entries: readonly UploadEntry[],
  kind: JobKind,
  limits: UploadLimits,
): void {
  const uploadKind = uploadKindFor(kind);

  for (const entry of entries) {
    if (!isAllowedFile(entry.filename, uploadKind)) {
      throw new UnsupportedFormatError(entry.filename, allowedExtensions(uploadKind));
    }
  }

  for (const entry of entries) {
    if (entry.sizeBytes > limits.maxFileSize) {
      throw new FileTooLargeError(limits.maxFileSize, entry.filename);
    }
  }

  const totalBytes = entries.reduce((sum, entry) => sum + entry.sizeBytes, 0);
  if (totalBytes > limits.maxTotalSize) {
    throw new PayloadTooLargeError(totalBytes, limits.maxTotalSize);
  }

  const required = kind === 'merge' ? MIN_MERGE_INPUTS : 1;
  if (entries.length < required) {
    throw new InsufficientInputsError(entries.length, required);
  }
  if (kind === 'convert' && entries.length > 1) {
    throw new InvalidRequestError('Only one audio file can be converted per request', 'TOO_MANY_INPUTS');
  }
}

export function parseMergeMethod(raw: unknown): MergeMethod {
  if (raw === undefined || raw === null || raw === '') return 'concatenate';
  if (raw === 'concatenate' || raw === 'overlay') return raw;
  throw new InvalidRequestError(
    `Unknown merge method: ${String(raw)} (expected concatenate or overlay)`,
    'INVALID_METHOD',
  );
}

export function validateMergeInputs(method: MergeMethod, count: number): void {
  if (method === 'overlay' && count > MAX_OVERLAY_INPUTS) {
    throw new InvalidRequestError(
      `Overlay accepts at most ${MAX_OVERLAY_INPUTS} videos (one base and ${MAX_OVERLAY_INPUTS - 1} overlays)`,
      'TOO_MANY_INPUTS',
      { received: count, max: MAX_OVERLAY_INPUTS },
    );
  }
}

function parseIntegerField(
  name: string,
  raw: unknown,
  fallback: number,
  min: number,
  max: number,
): number {
  if (raw === undefined || raw === null || raw === '') return fallback;
  const text = typeof raw === 'number' ? String(raw) : typeof raw === 'string' ? raw.trim() : '';
  if (!/^-?\d+$/.test(text)) {
    throw new InvalidRequestError(`${name} must be an integer`, 'INVALID_PARAMETER', { field: name });
  }
  const value = Number.parseInt(text, 10);
  if (value < min || value > max) {
    throw new InvalidRequestError(`${name} must be between ${min} and ${max}`, 'INVALID_PARAMETER', {
      field: name,
    });
  }
  return value;
}

export function parseColor(r: unknown, g: unknown, b: unknown): RgbColor {
  return {
    r: parseIntegerField('color_r', r, DEFAULT_COLOR.r, 0, 255),
    g: parseIntegerField('color_g', g, DEFAULT_COLOR.g, 0, 255),
    b: parseIntegerField('color_b', b, DEFAULT_COLOR.b, 0, 255),
  };
}

export function parseOutputName(raw: unknown): string | undefined {
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Reads the convert form fields, filling defaults for the ones left out. */
export function parseConversionParams(fields: Record<string, unknown>): ConversionParams {
  const width = parseIntegerField('resolution_width', fields.resolution_width, DEFAULT_RESOLUTION.width, 1, MAX_WIDTH);
  const height = parseIntegerField('resolution_height', fields.resolution_height, DEFAULT_RESOLUTION.height, 1, MAX_HEIGHT);
  const fps = parseIntegerField('fps', fields.fps, DEFAULT_FPS, 1, MAX_FPS);
  const color = parseColor(fields.color_r, fields.color_g, fields.color_b);

  const params: ConversionParams = { resolution: { width, height }, fps, color };
  const outputName = parseOutputName(fields.output_name);
  if (outputName) params.outputName = outputName;
  return params;
}
