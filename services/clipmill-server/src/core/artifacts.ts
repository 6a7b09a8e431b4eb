import { createHash } from 'crypto';
import { createReadStream, type Dirent } from 'fs';
import { readdir, rm, stat } from 'fs/promises';
import { join } from 'path';
import { StorageError } from 'clipmill';

const DISK_ERROR_CODES = new Set(['ENOSPC', 'EDQUOT', 'EACCES', 'EPERM', 'EROFS']);

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Rewraps disk-level failures as StorageError; anything else passes through. */
export function toStorageError(error: unknown, action: string): unknown {
  const code = errnoCode(error);
  if (code && DISK_ERROR_CODES.has(code)) {
    return new StorageError(`Failed to ${action}: ${code}`);
  }
  return error;
}

export function sha256File(path: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const hash = createHash('sha256');
    createReadStream(path)
      .on('data', (chunk) => hash.update(chunk))
      .on('end', () => resolve(hash.digest('hex')))
      .on('error', reject);
  });
}

export async function describeArtifact(path: string): Promise<{ sizeBytes: number; sha256: string }> {
  const fileStat = await stat(path);
  return { sizeBytes: fileStat.size, sha256: await sha256File(path) };
}

/**
 * Deletes regular files under `directory` last modified before
 * `now - retentionMs`. A missing directory, or a file that disappears
 * mid-sweep, counts as already clean. Paths `keep` accepts are skipped.
 */
export async function cleanupOldArtifacts(
  directory: string,
  retentionMs: number,
  now: number = Date.now(),
  keep?: (path: string) => boolean,
): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return 0;
    throw error;
  }

  const cutoffMs = now - retentionMs;
  let deleted = 0;

  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const fullPath = join(directory, entry.name);
    if (keep?.(fullPath)) continue;

    let modifiedMs: number;
    try {
      modifiedMs = (await stat(fullPath)).mtimeMs;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') continue;
      throw error;
    }

    if (modifiedMs < cutoffMs) {
      await rm(fullPath, { force: true });
      deleted += 1;
    }
  }

  return deleted;
}
