/**
 * Speech Output
 * FIFO of utterances drained by a single worker under an exclusive speaker
 * lease. One utterance plays to completion before the next starts.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { delay } from '../utils/async.js';
import type { ResourceGuard } from '../resources/ResourceGuard.js';
import type { SpeakerDevice } from '../devices/types.js';
import type { ResourceLease } from '../types/index.js';

export interface SpeechOutputEvents {
  queued: (text: string) => void;
  spoken: (text: string) => void;
  idle: () => void;
}

const HOLDER = 'speech-output';

export class SpeechOutput extends EventEmitter {
  private queue: string[] = [];
  private worker: Promise<void> | null = null;
  private accepting = true;
  private drainWaiters: Array<() => void> = [];

  constructor(
    private readonly guard: ResourceGuard,
    private readonly speaker: SpeakerDevice,
  ) {
    super();
  }

  /**
   * Queue an utterance. Never waits for playback.
   */
  speak(text: string): void {
    const trimmed = text.trim();
    if (!trimmed) return;
    if (!this.accepting) {
      logger.warn('Speech', 'Dropped utterance after shutdown', { text: trimmed });
      return;
    }
    this.queue.push(trimmed);
    this.emit('queued', trimmed);
    this.ensureWorker();
  }

  pending(): number {
    return this.queue.length;
  }

  isSpeaking(): boolean {
    return this.worker !== null;
  }

  /**
   * Resolves once the queue is empty and nothing is playing.
   */
  drain(): Promise<void> {
    if (!this.worker) return Promise.resolve();
    return new Promise((resolve) => this.drainWaiters.push(resolve));
  }

  /**
   * Discard queued utterances, stop the worker and give in-flight speech
   * up to `graceMs` to finish.
   */
  async shutdown(graceMs: number): Promise<void> {
    this.accepting = false;
    const dropped = this.queue.length;
    this.queue = [];
    if (dropped > 0) {
      logger.info('Speech', `Shutdown discarded ${dropped} queued utterance(s)`);
    }
    const worker = this.worker;
    if (worker) {
      await Promise.race([worker, delay(graceMs)]);
    }
  }

  private ensureWorker(): void {
    if (this.worker) return;
    this.worker = this.work().finally(() => {
      this.worker = null;
      if (this.queue.length > 0 && this.accepting) {
        this.ensureWorker();
      } else {
        this.notifyDrained();
      }
    });
  }

  private async work(): Promise<void> {
    while (this.queue.length > 0) {
      let lease: ResourceLease;
      try {
        const result = await this.guard.acquire('exclusive', HOLDER);
        if (result.status === 'busy') {
          logger.error('Speech', `Speaker held by ${result.heldBy}, dropping ${this.queue.length} utterance(s)`);
          this.queue = [];
          return;
        }
        lease = result.lease;
      } catch (err) {
        logger.error('Speech', `Speaker unavailable, dropping ${this.queue.length} utterance(s)`, err);
        this.queue = [];
        return;
      }

      try {
        let text = this.queue.shift();
        while (text !== undefined) {
          await this.say(text);
          text = this.queue.shift();
        }
      } finally {
        await this.guard.release(lease);
      }
    }
  }

  private async say(text: string): Promise<void> {
    logger.info('Speech', `Speaking: "${text}"`);
    try {
      await this.speaker.say(text);
      this.emit('spoken', text);
    } catch (err) {
      logger.error('Speech', 'Error during speak', err);
    }
  }

  private notifyDrained(): void {
    this.emit('idle');
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
