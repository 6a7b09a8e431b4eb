import type { ClipmillHttpClient } from './client.js';
import type { JobRecord, RequestOptions } from './types.js';

export class JobsResource {
  constructor(private readonly client: ClipmillHttpClient) {}

  retrieve(jobId: string, options?: RequestOptions): Promise<JobRecord> {
    return this.client.request<JobRecord>({
      method: 'GET',
      path: `/jobs/${encodeURIComponent(jobId)}`,
      options,
    });
  }
}
