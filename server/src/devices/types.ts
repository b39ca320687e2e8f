/**
 * Hardware device contracts.
 * Each physical device is opened by whoever currently holds its lease.
 */

import type { Frame } from '../types/index.js';

export interface MicrophoneDevice {
  open(sampleRate: number): Promise<void>;
  /**
   * Read the next block of mono float samples in [-1, 1].
   * Resolves to null once the device has been closed.
   */
  read(frameLength: number): Promise<Float32Array | null>;
  close(): Promise<void>;
}

export interface CameraDevice {
  open(): Promise<void>;
  /**
   * Grab one frame. Null means the read failed (no frame delivered).
   */
  read(): Promise<Frame | null>;
  close(): Promise<void>;
}

export interface SpeakerDevice {
  /**
   * Speak one utterance; resolves when playback finished.
   */
  say(text: string): Promise<void>;
}
