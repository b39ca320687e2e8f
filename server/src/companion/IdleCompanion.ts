/**
 * Idle Companion
 * Offers a line every few minutes while the assistant sits unused. Each tick
 * asks the gate first; a closed gate skips that tick, it does not queue it.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { idlePrompt } from '../orchestrator/messages.js';

export interface IdleCompanionOptions {
  minDelayMs: number;
  maxDelayMs: number;
  random?: () => number;
  clock?: () => Date;
}

export interface IdleCompanionEvents {
  prompt: (text: string) => void;
}

export class IdleCompanion extends EventEmitter {
  private timer: NodeJS.Timeout | null = null;
  private readonly random: () => number;
  private readonly clock: () => Date;

  constructor(
    private readonly canSpeak: () => boolean,
    private readonly options: IdleCompanionOptions,
  ) {
    super();
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    logger.debug('Companion', 'Idle prompts on', { minDelayMs: this.options.minDelayMs, maxDelayMs: this.options.maxDelayMs });
    this.schedule();
  }

  stop(): void {
    if (!this.timer) return;
    clearTimeout(this.timer);
    this.timer = null;
    logger.debug('Companion', 'Idle prompts off');
  }

  private schedule(): void {
    const { minDelayMs, maxDelayMs } = this.options;
    const span = Math.max(0, maxDelayMs - minDelayMs);
    const delayMs = minDelayMs + Math.floor(this.random() * (span + 1));
    this.timer = setTimeout(() => this.tick(), delayMs);
  }

  private tick(): void {
    if (this.canSpeak()) {
      const text = idlePrompt(this.clock(), this.random());
      logger.info('Companion', `Idle prompt: "${text}"`);
      this.emit('prompt', text);
    } else {
      logger.debug('Companion', 'Busy; idle prompt skipped');
    }
    // stop() from a prompt listener must not be undone here
    if (this.timer) this.schedule();
  }
}
