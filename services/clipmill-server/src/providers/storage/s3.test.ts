import { StorageError } from 'clipmill';
import { describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../../config.js';
import { createArtifactStorage } from './index.js';
import { buildObjectKey, deleteExpiredObjects, type ObjectDeletion, type ObjectListing } from './s3.js';

describe('buildObjectKey', () => {
  const now = new Date('2026-03-14T09:26:53.000Z');

  it('files outputs by day and job under the prefix', () => {
    expect(buildObjectKey('/outputs/', 'job-1', 'clip.mp4', now)).toBe('outputs/2026-03-14/job-1/clip.mp4');
  });

  it('omits an empty prefix', () => {
    expect(buildObjectKey('', 'job-1', 'clip.mp4', now)).toBe('2026-03-14/job-1/clip.mp4');
  });
});

describe('deleteExpiredObjects', () => {
  const cutoff = new Date('2026-03-14T09:00:00.000Z');
  const old = new Date('2026-03-14T08:00:00.000Z');
  const fresh = new Date('2026-03-14T09:30:00.000Z');

  it('deletes expired artifacts across every listing page', async () => {
    const pages: Record<string, ObjectListing> = {
      first: {
        Contents: [
          { Key: 'outputs/2026-03-14/job-1/a.mp4', LastModified: old },
          { Key: 'outputs/2026-03-14/job-2/b.mp4', LastModified: fresh },
        ],
        IsTruncated: true,
        NextContinuationToken: 'page-2',
      },
      'page-2': {
        Contents: [
          { Key: 'outputs/2026-03-13/job-3/c.mp4', LastModified: old },
          { Key: 'outputs/notes.txt', LastModified: old },
        ],
        IsTruncated: false,
      },
    };
    const listPage = vi.fn(async (token?: string) => pages[token ?? 'first'] ?? {});
    const deleteKeys = vi.fn(async (keys: string[]): Promise<ObjectDeletion> => ({
      Deleted: keys.map((Key) => ({ Key })),
    }));

    expect(await deleteExpiredObjects('/outputs/', listPage, deleteKeys, cutoff)).toBe(2);
    expect(listPage.mock.calls).toEqual([[undefined], ['page-2']]);
    expect(deleteKeys.mock.calls).toEqual([
      [['outputs/2026-03-14/job-1/a.mp4']],
      [['outputs/2026-03-13/job-3/c.mp4']],
    ]);
  });

  it('skips the delete call when nothing has expired', async () => {
    const deleteKeys = vi.fn(async (_keys: string[]): Promise<ObjectDeletion> => ({}));
    const listPage = async (): Promise<ObjectListing> => ({
      Contents: [{ Key: '2026-03-14/job-1/a.mp4', LastModified: fresh }],
    });

    expect(await deleteExpiredObjects('', listPage, deleteKeys, cutoff)).toBe(0);
    expect(deleteKeys).not.toHaveBeenCalled();
  });

  it('reports objects the bucket refused to delete', async () => {
    const listPage = async (): Promise<ObjectListing> => ({
      Contents: [{ Key: '2026-03-14/job-1/a.mp4', LastModified: old }],
    });
    const deleteKeys = async (): Promise<ObjectDeletion> => ({
      Errors: [{ Key: '2026-03-14/job-1/a.mp4', Code: 'AccessDenied', Message: 'Access Denied' }],
    });

    const attempt = deleteExpiredObjects('', listPage, deleteKeys, cutoff);
    await expect(attempt).rejects.toBeInstanceOf(StorageError);
    await expect(attempt).rejects.toThrow('Failed to delete 2026-03-14/job-1/a.mp4: Access Denied');
  });
});

describe('createArtifactStorage', () => {
  it('picks the backend from config', () => {
    expect(createArtifactStorage(loadConfig({})).name).toBe('local');
    expect(
      createArtifactStorage(
        loadConfig({
          STORAGE_BACKEND: 's3',
          S3_ENDPOINT: 'http://s3.test',
          S3_BUCKET: 'clips',
          S3_ACCESS_KEY_ID: 'test-key',
          S3_SECRET_ACCESS_KEY: 'test-secret',
        }),
      ).name,
    ).toBe('s3');
  });
});
