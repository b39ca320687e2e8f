import type { Frame } from '../types/index.js';

/**
 * Mean luma of a frame, 0-255. RGB frames use BT.601 weights.
 */
export function meanBrightness(frame: Frame): number {
  const { data, channels } = frame;
  const pixels = Math.floor(data.length / channels);
  if (pixels === 0) return 0;

  let sum = 0;
  if (channels === 1) {
    for (let i = 0; i < pixels; i++) sum += data[i];
  } else {
    for (let i = 0; i < pixels; i++) {
      const o = i * 3;
      sum += 0.299 * data[o] + 0.587 * data[o + 1] + 0.114 * data[o + 2];
    }
  }
  return sum / pixels;
}

export function isDark(frame: Frame, threshold: number): boolean {
  return meanBrightness(frame) < threshold;
}
