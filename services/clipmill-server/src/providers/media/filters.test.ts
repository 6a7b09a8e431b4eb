import { describe, expect, it } from 'vitest';
import type { MediaInfo } from '../../types/media.js';
import {
  buildConcatGraph,
  buildOverlayGraph,
  colorHex,
  colorSource,
  cornerPosition,
  evenCeil,
  evenFloor,
} from './filters.js';

function video(durationSeconds: number, width: number, height: number, fps = 30, hasAudio = true): MediaInfo {
  return { durationSeconds, width, height, fps, hasVideo: true, hasAudio };
}

describe('filter helpers', () => {
  it('formats colors as ffmpeg hex', () => {
    expect(colorHex({ r: 255, g: 0, b: 16 })).toBe('0xff0010');
    expect(colorSource({ width: 640, height: 480 }, 25, { r: 0, g: 0, b: 0 })).toBe('color=c=0x000000:s=640x480:r=25');
  });

  it('rounds dimensions to even numbers', () => {
    expect(evenCeil(1079)).toBe(1080);
    expect(evenCeil(1080)).toBe(1080);
    expect(evenFloor(135)).toBe(134);
    expect(evenFloor(270.5)).toBe(270);
    expect(evenFloor(1)).toBe(2);
  });

  it('places overlay tiles in the corners', () => {
    const base = { width: 1920, height: 1080 };
    const tile = { width: 480, height: 270 };
    expect(cornerPosition('top-left', base, tile)).toEqual({ x: 0, y: 0 });
    expect(cornerPosition('top-right', base, tile)).toEqual({ x: 1440, y: 0 });
    expect(cornerPosition('bottom-left', base, tile)).toEqual({ x: 0, y: 810 });
    expect(cornerPosition('bottom-right', base, tile)).toEqual({ x: 1440, y: 810 });
  });
});

describe('buildConcatGraph', () => {
  it('normalises every input to the largest frame and the first frame rate', () => {
    const graph = buildConcatGraph([video(2, 1280, 720, 30), video(3.5, 1920, 1080, 25, false)]);

    expect(graph.width).toBe(1920);
    expect(graph.height).toBe(1080);
    expect(graph.fps).toBe(30);
    expect(graph.durationSeconds).toBe(5.5);
    expect(graph.filters).toEqual([
      '[0:v]scale=1920:1080:force_original_aspect_ratio=decrease,pad=1920:1080:(ow-iw)/2:(oh-ih)/2:color=black,setsar=1,fps=30,format=yuv420p[v0]',
      '[0:a]aresample=48000,aformat=sample_fmts=fltp:channel_layouts=stereo[a0]',
      '[1:v]scale=1920:1080:force_original_aspect_ratio=decrease,pad=1920:1080:(ow-iw)/2:(oh-ih)/2:color=black,setsar=1,fps=30,format=yuv420p[v1]',
      'anullsrc=channel_layout=stereo:sample_rate=48000,atrim=duration=3.500[a1]',
      '[v0][a0][v1][a1]concat=n=2:v=1:a=1[vout][aout]',
    ]);
    expect(graph.videoLabel).toBe('vout');
    expect(graph.audioLabel).toBe('aout');
  });

  it('rounds odd frame sizes up to even', () => {
    const graph = buildConcatGraph([video(1, 1279, 719), video(1, 640, 360)]);
    expect(graph.width).toBe(1280);
    expect(graph.height).toBe(720);
  });
});

describe('buildOverlayGraph', () => {
  it('pins each overlay to the next corner at a quarter of the base size', () => {
    const graph = buildOverlayGraph([
      video(10, 1920, 1080),
      video(4, 640, 360),
      video(4, 640, 360),
      video(4, 640, 360),
      video(12, 640, 360),
    ]);

    expect(graph.filters).toEqual([
      '[0:v]pad=1920:1080,setsar=1[base0]',
      '[1:v]scale=480:270,setsar=1[ov1]',
      '[base0][ov1]overlay=x=0:y=0:eof_action=pass[base1]',
      '[2:v]scale=480:270,setsar=1[ov2]',
      '[base1][ov2]overlay=x=1440:y=0:eof_action=pass[base2]',
      '[3:v]scale=480:270,setsar=1[ov3]',
      '[base2][ov3]overlay=x=0:y=810:eof_action=pass[base3]',
      '[4:v]scale=480:270,setsar=1[ov4]',
      '[base3][ov4]overlay=x=1440:y=810:eof_action=pass[base4]',
      '[base4]format=yuv420p[vout]',
    ]);
    expect(graph.durationSeconds).toBe(10);
    expect(graph.audioLabel).toBeUndefined();
  });

  it('rejects more overlays than corners', () => {
    const inputs = Array.from({ length: 6 }, () => video(1, 640, 360));
    expect(() => buildOverlayGraph(inputs)).toThrow('Overlay supports at most 4 overlays');
  });
});
