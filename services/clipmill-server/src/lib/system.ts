import { readdir, stat, statfs } from 'fs/promises';
import { freemem, totalmem } from 'os';
import { join } from 'path';
import { errnoCode } from '../core/artifacts.js';

export async function diskUsage(path: string): Promise<{ freeBytes: number; totalBytes: number }> {
  const stats = await statfs(path);
  return {
    freeBytes: stats.bavail * stats.bsize,
    totalBytes: stats.blocks * stats.bsize,
  };
}

export async function directoryUsage(directory: string): Promise<{ fileCount: number; totalBytes: number }> {
  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return { fileCount: 0, totalBytes: 0 };
    throw error;
  }

  let fileCount = 0;
  let totalBytes = 0;
  for (const name of names) {
    try {
      const fileStat = await stat(join(directory, name));
      if (!fileStat.isFile()) continue;
      fileCount += 1;
      totalBytes += fileStat.size;
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') throw error;
    }
  }
  return { fileCount, totalBytes };
}

export function memoryUsage(): {
  rssBytes: number;
  heapUsedBytes: number;
  systemFreeBytes: number;
  systemTotalBytes: number;
} {
  const usage = process.memoryUsage();
  return {
    rssBytes: usage.rss,
    heapUsedBytes: usage.heapUsed,
    systemFreeBytes: freemem(),
    systemTotalBytes: totalmem(),
  };
}
