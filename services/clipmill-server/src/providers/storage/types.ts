export interface PublishArtifactRequest {
  jobId: string;
  /** Finished engine output, already under the output directory. */
  filePath: string;
  fileName: string;
}

export interface PublishedArtifact {
  fileName: string;
  location: string;
  downloadUrl: string;
  sizeBytes: number;
  sha256: string;
}

export interface ArtifactStorage {
  readonly name: string;
  publish(request: PublishArtifactRequest): Promise<PublishedArtifact>;
  cleanupExpired(retentionMs: number): Promise<number>;
}
