/**
 * Single-consumer event channel.
 * Producers put() from anywhere; the one consumer sees events strictly in
 * order, each handler run finishing before the next event is handed over.
 */

import { logger } from './logger.js';

export type ChannelConsumer<T> = (event: T) => void | Promise<void>;

export class EventChannel<T> {
  private queue: T[] = [];
  private consumer: ChannelConsumer<T> | null = null;
  private draining = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly name: string) {}

  put(event: T): void {
    this.queue.push(event);
    this.pump();
  }

  consume(consumer: ChannelConsumer<T>): () => void {
    if (this.consumer) {
      throw new Error(`Channel ${this.name} already has a consumer`);
    }
    this.consumer = consumer;
    this.pump();
    return () => {
      if (this.consumer === consumer) this.consumer = null;
    };
  }

  size(): number {
    return this.queue.length;
  }

  /**
   * Resolves once every queued event has been handled.
   */
  settled(): Promise<void> {
    if (!this.draining && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    if (this.draining || !this.consumer) return;
    this.draining = true;
    this.drain().finally(() => {
      this.draining = false;
      if (this.queue.length > 0 && this.consumer) {
        this.pump();
        return;
      }
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }).catch((err: unknown) => {
      logger.error('Channel', `${this.name}: drain failed`, err);
    });
  }

  private async drain(): Promise<void> {
    let event = this.queue.shift();
    while (event !== undefined) {
      const consumer = this.consumer;
      if (!consumer) {
        this.queue.unshift(event);
        return;
      }
      try {
        await consumer(event);
      } catch (err) {
        logger.error('Channel', `${this.name}: consumer threw`, err);
      }
      event = this.queue.shift();
    }
  }
}
