import { InvalidJobTransitionError, NotFoundError } from 'clipmill';
import { describe, expect, it } from 'vitest';
import { MemoryJobStore } from './jobStore.js';

const convertParams = {
  resolution: { width: 640, height: 480 },
  fps: 25,
  color: { r: 0, g: 0, b: 0 },
};

const output = {
  filename: 'clip_abcd1234.mp4',
  download_url: 'http://media.test/download/clip_abcd1234.mp4',
  size_bytes: 42,
  sha256: 'f'.repeat(64),
};

describe('MemoryJobStore', () => {
  it('walks a job from pending to done', async () => {
    const store = new MemoryJobStore();
    const created = await store.create({
      kind: 'merge',
      inputs: ['a.mp4', 'b.mp4'],
      params: { method: 'concatenate' },
    });
    expect(created.status).toBe('pending');

    const running = await store.setRunning(created.id);
    expect(running.status).toBe('running');
    expect(running.started_at).toEqual(expect.any(String));

    const done = await store.setDone(created.id, output);
    expect(done.status).toBe('done');
    expect(done.output).toEqual(output);
    expect(await store.get(created.id)).toEqual(done);
  });

  it('refuses to move a terminal job', async () => {
    const store = new MemoryJobStore();
    const { id } = await store.create({ kind: 'convert', inputs: ['song.mp3'], params: convertParams });
    await store.setRunning(id);
    await store.setFailed(id, 'PROCESSING_FAILED', 'corrupt input');

    await expect(store.setDone(id, output)).rejects.toBeInstanceOf(InvalidJobTransitionError);
    expect((await store.get(id))?.error).toEqual({ code: 'PROCESSING_FAILED', message: 'corrupt input' });
  });

  it('refuses to finish a job that never started', async () => {
    const store = new MemoryJobStore();
    const { id } = await store.create({ kind: 'merge', inputs: [], params: { method: 'concatenate' } });
    await expect(store.setDone(id, output)).rejects.toThrow('Job cannot move from pending to done');
  });

  it('reports unknown ids as not found', async () => {
    const store = new MemoryJobStore();
    await expect(store.setRunning('missing')).rejects.toBeInstanceOf(NotFoundError);
    expect(await store.get('missing')).toBeUndefined();
  });

  it('counts jobs by status', async () => {
    const store = new MemoryJobStore();
    const first = await store.create({ kind: 'merge', inputs: [], params: { method: 'concatenate' } });
    await store.create({ kind: 'merge', inputs: [], params: { method: 'concatenate' } });
    await store.setRunning(first.id);

    expect(await store.stats()).toEqual({ total: 2, pending: 1, running: 1, done: 0, failed: 0 });
  });

  it('prunes finished jobs completed before the cutoff and keeps live ones', async () => {
    const store = new MemoryJobStore();
    const done = await store.create({ kind: 'merge', inputs: [], params: { method: 'concatenate' } });
    await store.setRunning(done.id);
    await store.setDone(done.id, output);
    const failed = await store.create({ kind: 'convert', inputs: ['song.mp3'], params: convertParams });
    await store.setRunning(failed.id);
    await store.setFailed(failed.id, 'PROCESSING_FAILED', 'corrupt input');
    const running = await store.create({ kind: 'merge', inputs: [], params: { method: 'concatenate' } });
    await store.setRunning(running.id);
    const pending = await store.create({ kind: 'merge', inputs: [], params: { method: 'concatenate' } });

    expect(await store.pruneBefore(new Date(Date.now() - 60_000))).toBe(0);
    expect(await store.pruneBefore(new Date(Date.now() + 60_000))).toBe(2);

    expect(await store.get(done.id)).toBeUndefined();
    expect(await store.get(failed.id)).toBeUndefined();
    expect((await store.get(running.id))?.status).toBe('running');
    expect((await store.get(pending.id))?.status).toBe('pending');
    expect(await store.stats()).toEqual({ total: 2, pending: 1, running: 1, done: 0, failed: 0 });
  });
});
