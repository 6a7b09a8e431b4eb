import { ClipmillHttpClient } from './client.js';
import { DownloadLinks } from './downloads.js';
import { JobsResource } from './jobs.js';
import { MediaResource } from './media.js';
import { SystemResource } from './system.js';
import type { ClipmillConfig } from './types.js';

export class Clipmill {
  public readonly media: MediaResource;
  public readonly jobs: JobsResource;
  public readonly system: SystemResource;
  public readonly downloads: DownloadLinks;
  private readonly client: ClipmillHttpClient;

  constructor(config: ClipmillConfig = {}) {
    this.client = new ClipmillHttpClient(config);
    this.media = new MediaResource(this.client);
    this.jobs = new JobsResource(this.client);
    this.system = new SystemResource(this.client);
    this.downloads = new DownloadLinks();
  }

  setApiKey(apiKey: string): void {
    this.client.setApiKey(apiKey);
  }
}

export { DownloadLinks, type SignedDownload } from './downloads.js';
export * from './types.js';
export * from './errors.js';
export * from './formats.js';
export * from './lifecycle.js';
export * from './naming.js';
export * from './validation.js';
