/**
 * Wakeword Engine Interface
 * Detects the configured wake phrase in microphone frames
 *
 * Real engines (Porcupine, openWakeWord) plug in behind the same contract:
 * they consume fixed-size PCM frames and answer "detected or not".
 */

import { logger } from '../utils/logger.js';

export interface WakewordEngine {
  /**
   * Phrase this engine listens for (for logs and status only)
   */
  readonly phrase: string;

  /**
   * Samples per frame the engine expects
   */
  readonly frameLength: number;

  /**
   * Sample rate the engine expects
   */
  readonly sampleRate: number;

  /**
   * Process one frame; true when the phrase was detected in it
   */
  process(frame: Float32Array): boolean;

  /**
   * Forget buffered audio. Called whenever the stream (re)opens.
   */
  reset?(): void;
}

/**
 * Mock implementation for testing without hardware
 * Wake is triggered from the UI and reported on the next processed frame, so
 * it goes through the same listener state checks as a real detection.
 */
export class ManualWakewordEngine implements WakewordEngine {
  private pending = false;

  constructor(
    readonly phrase: string,
    readonly frameLength: number,
    readonly sampleRate: number,
  ) {}

  /**
   * Called by WebSocket handler when UI triggers wake
   */
  triggerWake(): void {
    logger.info('Wakeword', `Wake requested from UI: "${this.phrase}"`);
    this.pending = true;
  }

  process(_frame: Float32Array): boolean {
    if (!this.pending) return false;
    this.pending = false;
    return true;
  }

  // A phrase "said" while the mic was closed was never heard
  reset(): void {
    if (this.pending) {
      logger.debug('Wakeword', 'Discarding wake requested while not listening');
    }
    this.pending = false;
  }
}
