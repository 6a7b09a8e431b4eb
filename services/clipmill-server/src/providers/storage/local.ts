import { DownloadLinks } from 'clipmill';
import type { ServiceConfig } from '../../config.js';
import { cleanupOldArtifacts, describeArtifact, toStorageError } from '../../core/artifacts.js';
import type { ArtifactStorage, PublishArtifactRequest, PublishedArtifact } from './types.js';

type LocalStorageConfig = Pick<
  ServiceConfig,
  'outputDir' | 'publicBaseUrl' | 'secretKey' | 'outputRetentionMinutes'
>;

export class LocalArtifactStorage implements ArtifactStorage {
  readonly name = 'local';
  private readonly links = new DownloadLinks();

  constructor(private readonly config: LocalStorageConfig) {}

  async publish(request: PublishArtifactRequest): Promise<PublishedArtifact> {
    let artifact: { sizeBytes: number; sha256: string };
    try {
      artifact = await describeArtifact(request.filePath);
    } catch (error) {
      throw toStorageError(error, `read ${request.fileName}`);
    }

    return {
      fileName: request.fileName,
      location: request.filePath,
      downloadUrl: this.downloadUrl(request.fileName),
      sizeBytes: artifact.sizeBytes,
      sha256: artifact.sha256,
    };
  }

  /** Signed with an expiry matching the retention window when SECRET_KEY is set. */
  downloadUrl(fileName: string, now: number = Date.now()): string {
    const base = `${this.config.publicBaseUrl}/download/${encodeURIComponent(fileName)}`;
    if (!this.config.secretKey) return base;

    const expiresAt = Math.floor(now / 1000) + this.config.outputRetentionMinutes * 60;
    const signed = this.links.sign(fileName, this.config.secretKey, expiresAt);
    return `${base}?${this.links.toQuery(signed)}`;
  }

  async cleanupExpired(retentionMs: number): Promise<number> {
    return cleanupOldArtifacts(this.config.outputDir, retentionMs);
  }
}
