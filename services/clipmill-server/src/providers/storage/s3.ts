import {
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  type DeleteObjectsCommandOutput,
  type ListObjectsV2CommandOutput,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { StorageError } from 'clipmill';
import { createReadStream } from 'fs';
import { rm } from 'fs/promises';
import type { ServiceConfig } from '../../config.js';
import { describeArtifact, toStorageError } from '../../core/artifacts.js';
import type { ArtifactStorage, PublishArtifactRequest, PublishedArtifact } from './types.js';

function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '');
}

export function buildObjectKey(prefix: string, jobId: string, fileName: string, now = new Date()): string {
  const dateFolder = now.toISOString().slice(0, 10);
  const normalized = normalizePrefix(prefix);
  const key = `${dateFolder}/${jobId}/${fileName}`;
  return normalized ? `${normalized}/${key}` : key;
}

export type ObjectListing = Pick<ListObjectsV2CommandOutput, 'Contents' | 'IsTruncated' | 'NextContinuationToken'>;
export type ObjectDeletion = Pick<DeleteObjectsCommandOutput, 'Deleted' | 'Errors'>;

const DATED_KEY = /^\d{4}-\d{2}-\d{2}\//;

/**
 * Walks every listing page and deletes the artifacts last modified before
 * `cutoff`, one batch per page. Only keys laid out by `buildObjectKey` under
 * `prefix` are considered.
 */
export async function deleteExpiredObjects(
  prefix: string,
  listPage: (continuationToken?: string) => Promise<ObjectListing>,
  deleteKeys: (keys: string[]) => Promise<ObjectDeletion>,
  cutoff: Date,
): Promise<number> {
  const normalized = normalizePrefix(prefix);
  const keyPrefix = normalized ? `${normalized}/` : '';
  let deleted = 0;
  let token: string | undefined;

  do {
    const page = await listPage(token);
    const expired: string[] = [];
    for (const object of page.Contents ?? []) {
      if (!object.Key || !object.LastModified) continue;
      if (!object.Key.startsWith(keyPrefix) || !DATED_KEY.test(object.Key.slice(keyPrefix.length))) continue;
      if (object.LastModified < cutoff) expired.push(object.Key);
    }

    if (expired.length > 0) {
      const result = await deleteKeys(expired);
      const [failure] = result.Errors ?? [];
      if (failure) {
        throw new StorageError(`Failed to delete ${failure.Key ?? 'object'}: ${failure.Message ?? failure.Code ?? 'unknown error'}`);
      }
      deleted += result.Deleted?.length ?? 0;
    }

    token = page.IsTruncated ? page.NextContinuationToken : undefined;
  } while (token);

  return deleted;
}

export class S3ArtifactStorage implements ArtifactStorage {
  readonly name = 's3';
  private readonly client: S3Client;

  constructor(private readonly config: ServiceConfig) {
    this.client = new S3Client({
      endpoint: config.s3Endpoint,
      region: config.s3Region,
      forcePathStyle: config.s3ForcePathStyle,
      credentials: {
        accessKeyId: config.s3AccessKeyId,
        secretAccessKey: config.s3SecretAccessKey,
      },
    });
  }

  async publish(request: PublishArtifactRequest): Promise<PublishedArtifact> {
    let artifact: { sizeBytes: number; sha256: string };
    try {
      artifact = await describeArtifact(request.filePath);
    } catch (error) {
      throw toStorageError(error, `read ${request.fileName}`);
    }

    const key = buildObjectKey(this.config.s3KeyPrefix, request.jobId, request.fileName);

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.config.s3Bucket,
          Key: key,
          Body: createReadStream(request.filePath),
          ContentLength: artifact.sizeBytes,
          ContentType: 'video/mp4',
          ContentDisposition: `attachment; filename="${request.fileName}"`,
          Metadata: { sha256: artifact.sha256, job_id: request.jobId },
        }),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : 'unknown error';
      throw new StorageError(`Failed to upload ${request.fileName}: ${message}`);
    }

    await rm(request.filePath, { force: true });

    const downloadUrl = await getSignedUrl(
      this.client,
      new GetObjectCommand({
        Bucket: this.config.s3Bucket,
        Key: key,
      }),
      { expiresIn: this.config.outputRetentionMinutes * 60 },
    );

    return {
      fileName: request.fileName,
      location: `s3://${this.config.s3Bucket}/${key}`,
      downloadUrl,
      sizeBytes: artifact.sizeBytes,
      sha256: artifact.sha256,
    };
  }

  async cleanupExpired(retentionMs: number): Promise<number> {
    const bucket = this.config.s3Bucket;
    const prefix = normalizePrefix(this.config.s3KeyPrefix);

    try {
      return await deleteExpiredObjects(
        prefix,
        (continuationToken) =>
          this.client.send(
            new ListObjectsV2Command({
              Bucket: bucket,
              Prefix: prefix ? `${prefix}/` : undefined,
              ContinuationToken: continuationToken,
            }),
          ),
        (keys) =>
          this.client.send(
            new DeleteObjectsCommand({
              Bucket: bucket,
              Delete: { Objects: keys.map((Key) => ({ Key })), Quiet: false },
            }),
          ),
        new Date(Date.now() - retentionMs),
      );
    } catch (error) {
      if (error instanceof StorageError) throw error;
      const message = error instanceof Error ? error.message : 'unknown error';
      throw new StorageError(`Failed to expire artifacts in ${bucket}: ${message}`);
    }
  }
}
