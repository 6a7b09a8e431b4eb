import { describe, expect, it } from 'vitest';
import { buildOutputFilename, sanitizeFilename, shortId, stemOf } from './naming.js';

describe('sanitizeFilename', () => {
  it('keeps safe characters and joins words', () => {
    expect(sanitizeFilename('My Clip (1).mp4')).toBe('My_Clip_1.mp4');
  });

  it('drops directory parts and leading dots', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('etc_passwd');
  });

  it('strips accents', () => {
    expect(sanitizeFilename('café.mov')).toBe('cafe.mov');
  });
});

describe('stemOf', () => {
  it('removes the last extension only', () => {
    expect(stemOf('archive.tar.mp4', 'x')).toBe('archive.tar');
  });

  it('uses the fallback when nothing safe remains', () => {
    expect(stemOf('???', 'output')).toBe('output');
  });
});

describe('buildOutputFilename', () => {
  it('names merges after the requested name', () => {
    expect(buildOutputFilename({ kind: 'merge', outputName: 'holiday.mov', uniqueId: 'abcd1234' })).toBe(
      'holiday_abcd1234.mp4',
    );
    expect(buildOutputFilename({ kind: 'merge', uniqueId: 'abcd1234' })).toBe('merged_video_abcd1234.mp4');
  });

  it('names conversions after the upload when no name is given', () => {
    expect(buildOutputFilename({ kind: 'convert', sourceName: 'voice memo.m4a', uniqueId: '0000ffff' })).toBe(
      'voice_memo_video_0000ffff.mp4',
    );
    expect(
      buildOutputFilename({ kind: 'convert', sourceName: 'a.mp3', outputName: 'talk', uniqueId: '0000ffff' }),
    ).toBe('talk_0000ffff.mp4');
  });

  it('generates an eight character id', () => {
    expect(shortId()).toMatch(/^[0-9a-f]{8}$/);
  });
});
