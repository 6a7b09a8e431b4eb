import type { UploadKind } from './types.js';

export const VIDEO_EXTENSIONS = ['mp4', 'avi', 'mov', 'mkv', 'wmv', 'flv', 'webm', 'm4v'] as const;
export const AUDIO_EXTENSIONS = ['mov', 'mp3', 'wav', 'aac', 'm4a', 'flac', 'ogg', 'wma'] as const;

export function allowedExtensions(kind: UploadKind): readonly string[] {
  return kind === 'video' ? VIDEO_EXTENSIONS : AUDIO_EXTENSIONS;
}

/** Lower-cased text after the last dot, or '' when the name has none. */
export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) return '';
  return filename.slice(dot + 1).toLowerCase();
}

export function isAllowedFile(filename: string, kind: UploadKind): boolean {
  const ext = extensionOf(filename);
  return ext.length > 0 && allowedExtensions(kind).includes(ext);
}

export function formatFileSize(sizeBytes: number): string {
  if (sizeBytes < 1024) return `${sizeBytes} B`;
  if (sizeBytes < 1024 * 1024) return `${Math.floor(sizeBytes / 1024)} KB`;
  if (sizeBytes < 1024 * 1024 * 1024) return `${Math.floor(sizeBytes / (1024 * 1024))} MB`;
  return `${Math.floor(sizeBytes / (1024 * 1024 * 1024))} GB`;
}
