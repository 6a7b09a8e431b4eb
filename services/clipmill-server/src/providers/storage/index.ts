import type { ServiceConfig } from '../../config.js';
import { LocalArtifactStorage } from './local.js';
import { S3ArtifactStorage } from './s3.js';
import type { ArtifactStorage } from './types.js';

export function createArtifactStorage(config: ServiceConfig): ArtifactStorage {
  if (config.storageBackend === 's3') {
    return new S3ArtifactStorage(config);
  }
  return new LocalArtifactStorage(config);
}
