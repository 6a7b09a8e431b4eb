import type { ClipmillHttpClient } from './client.js';
import type { FormatsResponse, HealthResponse, RequestOptions } from './types.js';

export class SystemResource {
  constructor(private readonly client: ClipmillHttpClient) {}

  health(options?: RequestOptions): Promise<HealthResponse> {
    return this.client.request<HealthResponse>({ method: 'GET', path: '/health', options });
  }

  formats(options?: RequestOptions): Promise<FormatsResponse> {
    return this.client.request<FormatsResponse>({ method: 'GET', path: '/formats', options });
  }
}
