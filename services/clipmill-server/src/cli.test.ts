import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CliUsageError, parseCliArgs, runCli, USAGE } from './cli.js';
import { decodeFakeMedia, encodeFakeMedia, MockMediaEngine } from './providers/media/mock.js';

describe('parseCliArgs', () => {
  it('shows help with no arguments', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help' });
    expect(parseCliArgs(['convert', '--help'])).toEqual({ command: 'help' });
  });

  it('lists the formats of one kind after a subcommand', () => {
    expect(parseCliArgs(['--list-formats'])).toEqual({ command: 'list-formats', kinds: ['video', 'audio'] });
    expect(parseCliArgs(['convert', '--list-formats'])).toEqual({ command: 'list-formats', kinds: ['audio'] });
  });

  it('reads merge options', () => {
    expect(parseCliArgs(['merge', 'a.mp4', '-m', 'overlay', 'b.mp4', '-o', 'out.mp4', '-d', 'renders'])).toEqual({
      command: 'merge',
      files: ['a.mp4', 'b.mp4'],
      output: 'out.mp4',
      method: 'overlay',
      outputDir: 'renders',
    });
  });

  it('reads convert options with defaults for the rest', () => {
    expect(parseCliArgs(['convert', 'song.mp3', '-r', '1280', '720', '-c', '255', '0', '16', '--batch'])).toEqual({
      command: 'convert',
      files: ['song.mp3'],
      output: undefined,
      params: { resolution: { width: 1280, height: 720 }, fps: 30, color: { r: 255, g: 0, b: 16 } },
      outputDir: 'output',
      batch: true,
    });
  });

  it('rejects options that do not apply', () => {
    expect(() => parseCliArgs(['convert', 'song.mp3', '-m', 'overlay'])).toThrow('-m only applies to merge');
    expect(() => parseCliArgs(['merge', 'a.mp4', '--fps', '24'])).toThrow('--fps only applies to convert');
    expect(() => parseCliArgs(['merge', 'a.mp4', '--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseCliArgs(['split', 'a.mp4'])).toThrow(CliUsageError);
  });

  it('requires every value of a multi-value flag', () => {
    expect(() => parseCliArgs(['convert', 'song.mp3', '-r', '1280'])).toThrow('-r expects 2 values');
    expect(() => parseCliArgs(['convert', 'song.mp3', '-o'])).toThrow('-o expects 1 value');
  });
});

describe('runCli', () => {
  let workDir: string;
  let lines: string[];
  let errors: string[];

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'clipmill-cli-'));
    lines = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  function run(argv: string[]): Promise<number> {
    return runCli(argv, {
      env: {},
      engine: new MockMediaEngine(),
      log: (line) => lines.push(line),
      error: (line) => errors.push(line),
    });
  }

  async function video(name: string, durationSeconds: number): Promise<string> {
    const path = join(workDir, name);
    await writeFile(path, encodeFakeMedia({ durationSeconds, width: 640, height: 360, fps: 30, hasVideo: true, hasAudio: true }));
    return path;
  }

  async function audio(name: string, durationSeconds: number): Promise<string> {
    const path = join(workDir, name);
    await writeFile(path, encodeFakeMedia({ durationSeconds, hasVideo: false, hasAudio: true }));
    return path;
  }

  it('prints usage for help', async () => {
    expect(await run(['--help'])).toBe(0);
    expect(lines).toEqual([USAGE]);
  });

  it('lists extensions', async () => {
    expect(await run(['merge', '--list-formats'])).toBe(0);
    expect(lines.slice(0, 2)).toEqual(['Supported video formats:', '  .mp4']);
    expect(lines).toHaveLength(9);
  });

  it('exits with 2 on a usage error', async () => {
    expect(await run(['convert', 'song.mp3', '-c', '300', '0', '0'])).toBe(2);
    expect(errors).toEqual(['Error: color_r must be between 0 and 255', USAGE]);
  });

  it('merges videos into the output directory', async () => {
    const outputDir = join(workDir, 'out');
    const first = await video('first.mp4', 2);
    const second = await video('second.mkv', 3);

    expect(await run(['merge', first, second, '-o', 'combined.mov', '-d', outputDir])).toBe(0);

    expect(lines).toEqual([
      'Merging 2 videos using concatenate method...',
      'Video merging completed successfully!',
      `Output file: ${join(outputDir, 'combined.mp4')}`,
    ]);
    const merged = decodeFakeMedia(await readFile(join(outputDir, 'combined.mp4'), 'utf8'));
    expect(merged?.durationSeconds).toBe(5);
  });

  it('warns about missing inputs and fails when none remain', async () => {
    const missing = join(workDir, 'missing.mp4');

    expect(await run(['merge', missing])).toBe(1);
    expect(errors).toEqual([`Warning: Video file not found: ${missing}`, 'Error: No valid video files provided']);
  });

  it('reports a merge with too few readable videos', async () => {
    const only = await video('only.mp4', 2);

    expect(await run(['merge', only, join(workDir, 'gone.mp4'), '-d', join(workDir, 'out')])).toBe(1);
    expect(errors).toEqual([
      `Warning: Video file not found: ${join(workDir, 'gone.mp4')}`,
      'Error: At least 2 files are required (received 1)',
      'Video merging failed!',
    ]);
  });

  it('converts a single audio file under the requested name', async () => {
    const outputDir = join(workDir, 'out');
    const song = await audio('song.mp3', 4.5);

    expect(await run(['convert', song, '-o', 'cover art.mp4', '-r', '320', '240', '-d', outputDir])).toBe(0);

    expect(lines).toEqual([
      'Converting audio to video...',
      'Audio to video conversion completed successfully!',
      `Output file: ${join(outputDir, 'cover_art.mp4')}`,
    ]);
    expect(decodeFakeMedia(await readFile(join(outputDir, 'cover_art.mp4'), 'utf8'))).toEqual({
      durationSeconds: 4.5,
      width: 320,
      height: 240,
      fps: 30,
      hasVideo: true,
      hasAudio: true,
    });
  });

  it('converts several audio files and keeps going past failures', async () => {
    const outputDir = join(workDir, 'out');
    const first = await audio('intro.wav', 1);
    const broken = join(workDir, 'broken.mp3');
    await writeFile(broken, 'not audio');
    const second = await audio('outro.flac', 2);

    expect(await run(['convert', first, broken, second, '-d', outputDir])).toBe(0);

    expect(errors).toEqual([
      'Error converting broken.mp3: Media processing failed: Could not read broken.mp3: invalid data found when processing input',
    ]);
    expect(lines).toEqual([
      'Converting 3 audio files to video...',
      'Successfully converted 2 files:',
      `  ${join(outputDir, 'intro_video.mp4')}`,
      `  ${join(outputDir, 'outro_video.mp4')}`,
    ]);
    expect((await readdir(outputDir)).sort()).toEqual(['intro_video.mp4', 'outro_video.mp4']);
  });

  it('fails a batch where nothing converts', async () => {
    const broken = join(workDir, 'broken.mp3');
    await writeFile(broken, 'not audio');

    expect(await run(['convert', broken, '--batch', '-d', join(workDir, 'out')])).toBe(1);
    expect(errors.at(-1)).toBe('No files were converted successfully!');
  });
});
