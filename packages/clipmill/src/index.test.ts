import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AuthenticationError,
  Clipmill,
  ClipmillError,
  InvalidRequestError,
  NotFoundError,
  ProcessingFailedError,
} from './index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('Clipmill', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('posts merge uploads as multipart form data in order', async () => {
    const sdk = new Clipmill({ baseUrl: 'http://media.test/' });
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        success: true,
        job_id: 'job_1',
        download_url: 'http://media.test/download/clip_abcd1234.mp4',
        filename: 'clip_abcd1234.mp4',
        message: 'Videos merged successfully!',
      }),
    );

    const result = await sdk.media.merge({
      files: [
        { name: 'a.mp4', data: new Uint8Array([1, 2]) },
        { name: 'b.mp4', data: new Uint8Array([3]) },
      ],
      method: 'overlay',
      output_name: 'clip.mp4',
    });

    expect(result.filename).toBe('clip_abcd1234.mp4');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://media.test/merge-videos');
    expect(init?.method).toBe('POST');

    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (!(form instanceof FormData)) return;
    const files = form.getAll('files');
    expect(files).toHaveLength(2);
    const first = files[0];
    expect(typeof first === 'string' ? undefined : first?.name).toBe('a.mp4');
    expect(form.get('method')).toBe('overlay');
    expect(form.get('output_name')).toBe('clip.mp4');
  });

  it('sends only the convert fields that were given', async () => {
    const sdk = new Clipmill();
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ success: true, job_id: 'j', download_url: '/download/x.mp4', filename: 'x.mp4', message: 'ok' }),
    );

    await sdk.media.convertAudio({
      file: { name: 'talk.mp3', data: new Uint8Array([9]) },
      resolution_width: 640,
      fps: 25,
      color_r: 0,
    });

    const form = fetchMock.mock.calls[0]?.[1]?.body;
    if (!(form instanceof FormData)) throw new Error('expected multipart body');
    expect(form.get('resolution_width')).toBe('640');
    expect(form.get('fps')).toBe('25');
    expect(form.get('color_r')).toBe('0');
    expect(form.has('resolution_height')).toBe(false);
    expect(form.has('output_name')).toBe(false);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:8080/convert-audio');
  });

  it('attaches the api key header when configured', async () => {
    const sdk = new Clipmill({ apiKey: 'test-key' });
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ video: [], audio: [] }));

    await sdk.system.formats();

    const headers = fetchMock.mock.calls[0]?.[1]?.headers;
    expect(headers).toMatchObject({ 'x-api-key': 'test-key' });
  });

  it('maps failure responses to typed errors', async () => {
    const sdk = new Clipmill();
    vi.spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({ success: false, error: 'No job found for that id', code: 'JOB_NOT_FOUND' }, 404))
      .mockResolvedValueOnce(jsonResponse({ success: false, error: 'Failed to merge videos', code: 'PROCESSING_FAILED' }, 500))
      .mockResolvedValueOnce(jsonResponse({ success: false, error: 'Missing or invalid x-api-key', code: 'UNAUTHORIZED' }, 401))
      .mockResolvedValueOnce(
        jsonResponse({ success: false, error: 'At least 2 files are required (received 1)', code: 'INSUFFICIENT_INPUTS' }, 400),
      );

    await expect(sdk.jobs.retrieve('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(sdk.jobs.retrieve('broken')).rejects.toBeInstanceOf(ProcessingFailedError);
    await expect(sdk.system.health()).rejects.toBeInstanceOf(AuthenticationError);

    const error = await sdk.jobs.retrieve('x').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error).toMatchObject({
      code: 'INSUFFICIENT_INPUTS',
      statusCode: 400,
      message: 'At least 2 files are required (received 1)',
    });
  });

  it('falls back to a generic error for non-json failures', async () => {
    const sdk = new Clipmill();
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('Bad Gateway', { status: 502 }));

    const error = await sdk.system.health().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ClipmillError);
    expect(error).toMatchObject({ code: 'UNKNOWN', statusCode: 502, message: 'Bad Gateway' });
  });

  it('downloads by filename or by absolute link', async () => {
    const sdk = new Clipmill({ baseUrl: 'http://media.test' });
    const fetchMock = vi
      .spyOn(globalThis, 'fetch')
      .mockImplementation(async () => new Response(new Uint8Array([7, 8, 9])));

    const bytes = await sdk.media.download('merged video.mp4');
    expect(new Uint8Array(bytes)).toEqual(new Uint8Array([7, 8, 9]));
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://media.test/download/merged%20video.mp4');

    await sdk.media.download('https://bucket.example.com/out.mp4?X-Amz-Signature=abc');
    expect(fetchMock.mock.calls[1]?.[0]).toBe('https://bucket.example.com/out.mp4?X-Amz-Signature=abc');
  });
});
