import { ClipmillError, errorFromResponse } from './errors.js';
import type { ClipmillConfig, ErrorResponse, RequestOptions } from './types.js';

const DEFAULT_BASE_URL = 'http://localhost:8080';
const USER_AGENT = 'clipmill/0.1.0';

interface RequestConfig {
  path: string;
  method: 'GET' | 'POST';
  body?: FormData;
  options?: RequestOptions;
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function buildPath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

function parseResponseBody(raw: string): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return { message: raw };
  }
}

function isErrorResponse(input: unknown): input is ErrorResponse {
  if (!input || typeof input !== 'object') return false;
  const value = input as Record<string, unknown>;
  return value.success === false && typeof value.error === 'string' && typeof value.code === 'string';
}

export class ClipmillHttpClient {
  private readonly baseUrl: string;
  private apiKey?: string;

  constructor(config: ClipmillConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.apiKey = config.apiKey;
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  /** Absolute URLs (presigned or signed download links) pass through unchanged. */
  resolveUrl(pathOrUrl: string): string {
    if (/^https?:\/\//i.test(pathOrUrl)) return pathOrUrl;
    return `${this.baseUrl}${buildPath(pathOrUrl)}`;
  }

  async request<T>(config: RequestConfig): Promise<T> {
    const response = await this.send(config, 'application/json');
    const parsedBody = parseResponseBody(await response.text());

    if (!response.ok) {
      throw this.toApiError(response.status, parsedBody);
    }

    return parsedBody as T;
  }

  async requestBinary(config: RequestConfig): Promise<ArrayBuffer> {
    const response = await this.send(config, '*/*');

    if (!response.ok) {
      throw this.toApiError(response.status, parseResponseBody(await response.text()));
    }

    return response.arrayBuffer();
  }

  private send(config: RequestConfig, accept: string): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': USER_AGENT,
    };
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }

    return fetch(this.resolveUrl(config.path), {
      method: config.method,
      headers,
      body: config.body,
      signal: config.options?.signal,
    });
  }

  private toApiError(status: number, payload: unknown): ClipmillError {
    if (isErrorResponse(payload)) {
      return errorFromResponse(status, payload.code, payload.error, payload.details);
    }

    let message = `Clipmill request failed with status ${status}`;
    if (payload && typeof payload === 'object') {
      const value = payload as Record<string, unknown>;
      if (typeof value.message === 'string') message = value.message;
    }
    return new ClipmillError(message, 'UNKNOWN', status);
  }
}
