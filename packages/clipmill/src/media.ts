import type { ClipmillHttpClient } from './client.js';
import type {
  ConvertAudioRequest,
  MediaJobResponse,
  MergeVideosRequest,
  RequestOptions,
} from './types.js';

function toBlob(data: Blob | Uint8Array): Blob {
  return data instanceof Blob ? data : new Blob([data]);
}

function appendNumber(form: FormData, name: string, value: number | undefined): void {
  if (value !== undefined) form.append(name, String(value));
}

export class MediaResource {
  constructor(private readonly client: ClipmillHttpClient) {}

  merge(body: MergeVideosRequest, options?: RequestOptions): Promise<MediaJobResponse> {
    const form = new FormData();
    for (const file of body.files) {
      form.append('files', toBlob(file.data), file.name);
    }
    form.append('method', body.method ?? 'concatenate');
    if (body.output_name) form.append('output_name', body.output_name);

    return this.client.request<MediaJobResponse>({
      method: 'POST',
      path: '/merge-videos',
      body: form,
      options,
    });
  }

  convertAudio(body: ConvertAudioRequest, options?: RequestOptions): Promise<MediaJobResponse> {
    const form = new FormData();
    form.append('file', toBlob(body.file.data), body.file.name);
    appendNumber(form, 'resolution_width', body.resolution_width);
    appendNumber(form, 'resolution_height', body.resolution_height);
    appendNumber(form, 'fps', body.fps);
    appendNumber(form, 'color_r', body.color_r);
    appendNumber(form, 'color_g', body.color_g);
    appendNumber(form, 'color_b', body.color_b);
    if (body.output_name) form.append('output_name', body.output_name);

    return this.client.request<MediaJobResponse>({
      method: 'POST',
      path: '/convert-audio',
      body: form,
      options,
    });
  }

  /** Accepts a `download_url` from a job response or a bare output filename. */
  download(urlOrFilename: string, options?: RequestOptions): Promise<ArrayBuffer> {
    const path = urlOrFilename.includes('/')
      ? urlOrFilename
      : `/download/${encodeURIComponent(urlOrFilename)}`;

    return this.client.requestBinary({ method: 'GET', path, options });
  }
}
