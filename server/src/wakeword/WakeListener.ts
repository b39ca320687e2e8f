/**
 * Wake Listener
 * Background worker: holds a background microphone lease, streams frames into
 * the wakeword engine and emits `wake` on detection.
 *
 * Detection only surfaces while the listener is `active`; frames that were in
 * flight when it got paused or stopped are dropped at emit time.
 *
 * If the read loop dies on its own (engine throws, the mic stops delivering)
 * the listener reports a fault to the guard: it ends up `paused`, the mic is
 * degraded, and a reset of the mic starts it again.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { DeviceUnavailableError } from '../errors.js';
import type { ResourceGuard } from '../resources/ResourceGuard.js';
import type { MicrophoneDevice } from '../devices/types.js';
import type { WakewordEngine } from './engine.js';
import type { PreemptibleHolder, ResourceLease } from '../types/index.js';

export type WakeListenerState = 'active' | 'paused' | 'stopped';

export interface WakeEvent {
  phrase: string;
  ts: number;
}

export interface WakeListenerEvents {
  wake: (event: WakeEvent) => void;
  stateChange: (state: WakeListenerState) => void;
  failure: (error: unknown) => void;
}

const HOLDER = 'wake-listener';

export class WakeListener extends EventEmitter implements PreemptibleHolder {
  private state: WakeListenerState = 'stopped';
  private lease: ResourceLease | null = null;
  private pump: Promise<void> | null = null;
  private generation = 0;

  constructor(
    private readonly guard: ResourceGuard,
    private readonly mic: MicrophoneDevice,
    private readonly engine: WakewordEngine,
  ) {
    super();
  }

  getState(): WakeListenerState {
    return this.state;
  }

  getLease(): ResourceLease | null {
    return this.lease;
  }

  /**
   * Acquire the background lease and start listening. Starting twice is a no-op.
   */
  async start(): Promise<boolean> {
    if (this.lease) return true;

    const result = await this.guard.acquire('background', HOLDER, this);
    if (result.status === 'busy') {
      logger.warn('Wakeword', `Cannot start listener: microphone held by ${result.heldBy}`);
      return false;
    }

    this.lease = result.lease;
    if (this.guard.statusOf(result.lease) === 'active') {
      try {
        await this.openStream();
      } catch (err) {
        this.lease = null;
        await this.guard.release(result.lease);
        throw err;
      }
    } else {
      this.setState('paused');
    }
    logger.info('Wakeword', `Listening for "${this.engine.phrase}"`);
    return true;
  }

  /**
   * Stop listening and release the lease. Idempotent.
   */
  async stop(): Promise<void> {
    const lease = this.lease;
    if (!lease) return;
    this.lease = null;

    const wasActive = this.state === 'active';
    this.setState('stopped');
    if (wasActive) {
      await this.closeStream();
    }
    await this.guard.release(lease);
    logger.info('Wakeword', 'Listener stopped');
  }

  /**
   * Hold the listener paused until rearm(), regardless of other leases.
   */
  async standDown(): Promise<boolean> {
    if (!this.lease) return true;
    return this.guard.pause(this.lease);
  }

  async rearm(): Promise<boolean> {
    if (!this.lease) return true;
    return this.guard.resume(this.lease);
  }

  // ============== Lease hooks ==============

  async onPause(): Promise<void> {
    if (this.state !== 'active') return;
    this.setState('paused');
    await this.closeStream();
  }

  async onResume(): Promise<void> {
    if (this.state === 'stopped') return;
    await this.openStream();
  }

  // ============== Stream ==============

  private async openStream(): Promise<void> {
    try {
      await this.mic.open(this.engine.sampleRate);
    } catch (err) {
      throw new DeviceUnavailableError('mic', err);
    }
    this.engine.reset?.();
    this.setState('active');
    const generation = ++this.generation;
    this.pump = this.runPump(generation).catch((err: unknown) => {
      logger.error('Wakeword', 'Listener fault handling failed', err);
    });
  }

  private async closeStream(): Promise<void> {
    this.generation++;
    await this.mic.close();
    const pump = this.pump;
    this.pump = null;
    if (pump) await pump;
  }

  private async runPump(generation: number): Promise<void> {
    let failure: unknown = null;
    try {
      while (this.state === 'active' && generation === this.generation) {
        const frame = await this.mic.read(this.engine.frameLength);
        if (frame === null) {
          failure = new DeviceUnavailableError('mic', new Error('Microphone stopped delivering audio'));
          break;
        }
        if (this.engine.process(frame)) {
          this.handleDetection(generation);
        }
      }
    } catch (err) {
      failure = err;
    }

    // A pause or stop ended the loop: nothing went wrong
    if (failure === null || this.state !== 'active' || generation !== this.generation) return;

    logger.error('Wakeword', 'Listener loop stopped', failure);
    this.emit('failure', failure);
    const lease = this.lease;
    if (!lease) return;
    // The guard pauses us through onPause(), which must not wait on this loop
    this.pump = null;
    await this.guard.fault(lease, failure);
  }

  private handleDetection(generation: number): void {
    if (this.state !== 'active' || generation !== this.generation) {
      logger.debug('Wakeword', `Detection dropped while ${this.state}`);
      return;
    }
    logger.info('Wakeword', `Wake phrase detected: "${this.engine.phrase}"`);
    this.emit('wake', { phrase: this.engine.phrase, ts: Date.now() });
  }

  private setState(state: WakeListenerState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('stateChange', state);
  }
}
