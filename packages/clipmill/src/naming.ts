import { randomUUID } from 'node:crypto';
import type { JobKind } from './types.js';

const DEFAULT_MERGE_NAME = 'merged_video.mp4';

/**
 * Reduces an uploaded name to `[A-Za-z0-9_.-]` with no directory parts and no
 * leading or trailing dots/underscores. May return ''.
 */
export function sanitizeFilename(name: string): string {
  const ascii = name.normalize('NFKD').replace(/[^\x20-\x7e]/g, '');
  const words = ascii.replace(/[\\/]/g, ' ').trim().split(/\s+/);
  return words
    .join('_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

export function stemOf(name: string, fallback: string): string {
  const safe = sanitizeFilename(name);
  const dot = safe.lastIndexOf('.');
  const stem = dot > 0 ? safe.slice(0, dot) : safe;
  return stem.length > 0 ? stem : fallback;
}

export function shortId(): string {
  return randomUUID().slice(0, 8);
}

export interface OutputNameInput {
  kind: JobKind;
  outputName?: string;
  sourceName?: string;
  uniqueId?: string;
}

export function buildOutputFilename(input: OutputNameInput): string {
  const id = input.uniqueId ?? shortId();

  if (input.kind === 'merge') {
    return `${stemOf(input.outputName ?? DEFAULT_MERGE_NAME, 'merged_video')}_${id}.mp4`;
  }
  if (input.outputName) {
    return `${stemOf(input.outputName, 'output')}_${id}.mp4`;
  }
  return `${stemOf(input.sourceName ?? '', 'audio')}_video_${id}.mp4`;
}
