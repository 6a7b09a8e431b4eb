import type { ServiceConfig } from '../../config.js';
import type { MediaEngine } from '../../types/media.js';
import { FfmpegMediaEngine } from './ffmpeg.js';
import { MockMediaEngine } from './mock.js';

export function createMediaEngine(config: ServiceConfig): MediaEngine {
  if (config.mediaEngine === 'mock') {
    return new MockMediaEngine();
  }

  return new FfmpegMediaEngine({
    ffmpegPath: config.ffmpegPath || undefined,
    ffprobePath: config.ffprobePath || undefined,
  });
}
