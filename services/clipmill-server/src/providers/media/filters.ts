import type { Resolution, RgbColor } from 'clipmill';
import type { MediaInfo } from '../../types/media.js';

const FALLBACK_WIDTH = 1280;
const FALLBACK_HEIGHT = 720;
const FALLBACK_FPS = 30;
const SAMPLE_RATE = 48000;

export const OVERLAY_CORNERS = ['top-left', 'top-right', 'bottom-left', 'bottom-right'] as const;
export type OverlayCorner = (typeof OVERLAY_CORNERS)[number];

export interface FilterGraph {
  filters: string[];
  videoLabel: string;
  /** Absent when the output should map the base input's audio directly. */
  audioLabel?: string;
  width: number;
  height: number;
  fps: number;
  durationSeconds: number;
}

export function evenCeil(value: number): number {
  const rounded = Math.ceil(value);
  return rounded % 2 === 0 ? rounded : rounded + 1;
}

export function evenFloor(value: number): number {
  const rounded = Math.floor(value);
  return Math.max(2, rounded - (rounded % 2));
}

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

function formatRate(fps: number): string {
  return Number.isInteger(fps) ? String(fps) : fps.toFixed(3);
}

export function colorHex(color: RgbColor): string {
  return `0x${[color.r, color.g, color.b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;
}

/** lavfi source for a solid background frame. */
export function colorSource(resolution: Resolution, fps: number, color: RgbColor): string {
  return `color=c=${colorHex(color)}:s=${resolution.width}x${resolution.height}:r=${formatRate(fps)}`;
}

/**
 * Every input is letterboxed into the largest frame among them, resampled to
 * the first input's rate, and paired with its own audio or with silence of
 * the same length.
 */
export function buildConcatGraph(inputs: readonly MediaInfo[]): FilterGraph {
  if (inputs.length === 0) {
    throw new Error('Concatenate needs at least one input');
  }

  const width = evenCeil(Math.max(...inputs.map((info) => info.width ?? 0)) || FALLBACK_WIDTH);
  const height = evenCeil(Math.max(...inputs.map((info) => info.height ?? 0)) || FALLBACK_HEIGHT);
  const fps = inputs[0]?.fps ?? FALLBACK_FPS;
  const rate = formatRate(fps);

  const filters: string[] = [];
  const segments: string[] = [];

  inputs.forEach((info, index) => {
    filters.push(
      `[${index}:v]scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
        `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:color=black,setsar=1,fps=${rate},format=yuv420p[v${index}]`,
    );
    if (info.hasAudio) {
      filters.push(`[${index}:a]aresample=${SAMPLE_RATE},aformat=sample_fmts=fltp:channel_layouts=stereo[a${index}]`);
    } else {
      filters.push(
        `anullsrc=channel_layout=stereo:sample_rate=${SAMPLE_RATE},atrim=duration=${formatSeconds(info.durationSeconds)}[a${index}]`,
      );
    }
    segments.push(`[v${index}][a${index}]`);
  });

  filters.push(`${segments.join('')}concat=n=${inputs.length}:v=1:a=1[vout][aout]`);

  return {
    filters,
    videoLabel: 'vout',
    audioLabel: 'aout',
    width,
    height,
    fps,
    durationSeconds: inputs.reduce((sum, info) => sum + info.durationSeconds, 0),
  };
}

export function cornerPosition(
  corner: OverlayCorner,
  base: Resolution,
  tile: Resolution,
): { x: number; y: number } {
  const right = base.width - tile.width;
  const bottom = base.height - tile.height;
  switch (corner) {
    case 'top-left':
      return { x: 0, y: 0 };
    case 'top-right':
      return { x: right, y: 0 };
    case 'bottom-left':
      return { x: 0, y: bottom };
    case 'bottom-right':
      return { x: right, y: bottom };
  }
}

/**
 * The first input is the base; each later input is shrunk to a quarter of the
 * base and pinned to the next corner until it runs out.
 */
export function buildOverlayGraph(inputs: readonly MediaInfo[]): FilterGraph {
  const [base, ...overlays] = inputs;
  if (!base) {
    throw new Error('Overlay needs a base input');
  }
  if (overlays.length > OVERLAY_CORNERS.length) {
    throw new Error(`Overlay supports at most ${OVERLAY_CORNERS.length} overlays`);
  }

  const frame = {
    width: evenCeil(base.width ?? FALLBACK_WIDTH),
    height: evenCeil(base.height ?? FALLBACK_HEIGHT),
  };
  const tile = { width: evenFloor(frame.width / 4), height: evenFloor(frame.height / 4) };

  const filters = [`[0:v]pad=${frame.width}:${frame.height},setsar=1[base0]`];
  let current = 'base0';

  overlays.forEach((_, offset) => {
    const index = offset + 1;
    const corner = OVERLAY_CORNERS[offset] ?? 'bottom-right';
    const { x, y } = cornerPosition(corner, frame, tile);
    filters.push(`[${index}:v]scale=${tile.width}:${tile.height},setsar=1[ov${index}]`);
    filters.push(`[${current}][ov${index}]overlay=x=${x}:y=${y}:eof_action=pass[base${index}]`);
    current = `base${index}`;
  });

  filters.push(`[${current}]format=yuv420p[vout]`);

  return {
    filters,
    videoLabel: 'vout',
    width: frame.width,
    height: frame.height,
    fps: base.fps ?? FALLBACK_FPS,
    durationSeconds: base.durationSeconds,
  };
}
