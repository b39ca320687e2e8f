/**
 * Camera Monitor
 * Background worker watching the camera feed for tampering.
 *
 * Asymmetric hysteresis: obstruction needs K consecutive dark frames, the
 * first clear frame restores. M consecutive read failures also count as
 * blocked (cause `unavailable`) so a dead camera never goes unnoticed.
 *
 * It does not recognise faces; the identity verifier borrows the camera
 * through an exclusive lease, which pauses this monitor.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { DeviceUnavailableError } from '../errors.js';
import { isDark } from './brightness.js';
import type { ResourceGuard } from '../resources/ResourceGuard.js';
import type { CameraDevice } from '../devices/types.js';
import type { BlockedCause, Frame, ObstructionState, PreemptibleHolder, ResourceLease } from '../types/index.js';

export type CameraMonitorState = 'active' | 'paused' | 'stopped';

export interface CameraMonitorOptions {
  darkThreshold: number;
  darkFramesRequired: number;
  maxFailures: number;
  pollMs: number;
  retryMs: number;
}

export interface CameraBlockedEvent {
  cause: BlockedCause;
  ts: number;
}

export interface CameraMonitorEvents {
  blocked: (event: CameraBlockedEvent) => void;
  restored: (event: { ts: number }) => void;
  stateChange: (state: CameraMonitorState) => void;
}

const HOLDER = 'camera-monitor';

export class CameraMonitor extends EventEmitter implements PreemptibleHolder {
  private state: CameraMonitorState = 'stopped';
  private obstruction: ObstructionState = 'clear';
  private lease: ResourceLease | null = null;

  private darkCount = 0;
  private failures = 0;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private generation = 0;

  constructor(
    private readonly guard: ResourceGuard,
    private readonly camera: CameraDevice,
    private readonly options: CameraMonitorOptions,
  ) {
    super();
  }

  // ============== Getters ==============

  getState(): CameraMonitorState {
    return this.state;
  }

  getObstruction(): ObstructionState {
    return this.obstruction;
  }

  // ============== Lifecycle ==============

  async start(): Promise<boolean> {
    if (this.lease) return true;

    const result = await this.guard.acquire('background', HOLDER, this);
    if (result.status === 'busy') {
      logger.warn('Camera', `Cannot start monitor: camera held by ${result.heldBy}`);
      return false;
    }

    this.lease = result.lease;
    if (this.guard.statusOf(result.lease) === 'active') {
      try {
        await this.openFeed();
      } catch (err) {
        this.lease = null;
        await this.guard.release(result.lease);
        throw err;
      }
    } else {
      this.setState('paused');
    }
    logger.info('Camera', 'Camera monitor started');
    return true;
  }

  async stop(): Promise<void> {
    const lease = this.lease;
    if (!lease) return;
    this.lease = null;

    const wasActive = this.state === 'active';
    this.setState('stopped');
    if (wasActive) {
      await this.closeFeed();
    }
    await this.guard.release(lease);
    logger.info('Camera', 'Camera monitor stopped');
  }

  /**
   * Hand the camera back to the guard until resume().
   */
  async pause(): Promise<boolean> {
    if (!this.lease) return true;
    return this.guard.pause(this.lease);
  }

  async resume(): Promise<boolean> {
    if (!this.lease) return true;
    return this.guard.resume(this.lease);
  }

  // ============== Lease hooks ==============

  async onPause(): Promise<void> {
    if (this.state !== 'active') return;
    this.setState('paused');
    await this.closeFeed();
  }

  async onResume(): Promise<void> {
    if (this.state === 'stopped') return;
    await this.openFeed();
  }

  // ============== Sampling ==============

  /**
   * Read and classify one frame. Resolves to false when the read failed.
   */
  async sampleOnce(): Promise<boolean> {
    let frame: Frame | null;
    try {
      frame = await this.camera.read();
    } catch (err) {
      logger.warn('Camera', 'Frame read threw', err);
      frame = null;
    }

    // Paused or stopped while the read was in flight
    if (this.state !== 'active') return true;

    if (!frame) {
      this.recordFailure();
      return false;
    }

    this.failures = 0;
    this.darkCount = isDark(frame, this.options.darkThreshold) ? this.darkCount + 1 : 0;

    if (this.darkCount >= this.options.darkFramesRequired && this.obstruction === 'clear') {
      logger.warn('Camera', 'Camera appears covered/blocked');
      this.markBlocked('dark');
    } else if (this.darkCount === 0 && this.obstruction === 'obstructed') {
      this.obstruction = 'clear';
      logger.info('Camera', 'Camera feed restored');
      this.emit('restored', { ts: Date.now() });
    }
    return true;
  }

  private recordFailure(): void {
    this.failures++;
    if (this.failures < this.options.maxFailures) return;

    if (this.failures === this.options.maxFailures) {
      logger.error('Camera', `Camera appears unavailable after ${this.failures} consecutive read failures`);
    }
    if (this.obstruction === 'clear') {
      this.markBlocked('unavailable');
    }
  }

  private markBlocked(cause: BlockedCause): void {
    this.obstruction = 'obstructed';
    this.emit('blocked', { cause, ts: Date.now() });
  }

  // ============== Feed ==============

  private async openFeed(): Promise<void> {
    try {
      await this.camera.open();
    } catch (err) {
      throw new DeviceUnavailableError('camera', err);
    }
    // Counting starts over after every gap in delivery
    this.darkCount = 0;
    this.failures = 0;
    this.setState('active');
    this.schedule(0);
  }

  private async closeFeed(): Promise<void> {
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const inFlight = this.inFlight;
    if (inFlight) await inFlight;
    await this.camera.close();
  }

  private schedule(delayMs: number): void {
    if (this.state !== 'active') return;
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.sampleOnce()
        .then((ok) => {
          if (generation === this.generation) {
            this.schedule(ok ? this.options.pollMs : this.options.retryMs);
          }
        })
        .catch((err: unknown) => {
          logger.error('Camera', 'Sampling loop failed', err);
        })
        .finally(() => {
          this.inFlight = null;
        });
    }, delayMs);
  }

  private setState(state: CameraMonitorState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('stateChange', state);
  }
}
