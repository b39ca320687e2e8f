/**
 * Resource Guard
 * Mutual exclusion around one physical device (mic, speaker or camera).
 *
 * - At most one exclusive lease at a time; a second exclusive request is
 *   answered with `busy` immediately, never queued.
 * - At most one background lease. It is preempted (paused) while an exclusive
 *   lease is outstanding, and can additionally be held paused by its owner.
 *   It runs only when it is neither preempted nor held.
 * - Holder pause/resume hooks are awaited. A failing hook marks the resource
 *   degraded; every acquire then throws until reset().
 * - A background holder that breaks on its own reports it through fault():
 *   it is paused and the resource degraded until reset().
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { DeviceUnavailableError, ResourceDegradedError } from '../errors.js';
import type {
  AcquireResult,
  LeasePriority,
  LeaseStatus,
  PreemptibleHolder,
  ResourceHealth,
  ResourceKind,
  ResourceLease,
  ResourceSnapshot,
} from '../types/index.js';

export interface ResourceGuardEvents {
  change: (snapshot: ResourceSnapshot) => void;
  degraded: (kind: ResourceKind, error: unknown) => void;
}

interface BackgroundSlot {
  lease: ResourceLease;
  holder: PreemptibleHolder;
  status: 'active' | 'paused';
  preempted: boolean;
  held: boolean;
  faulted: boolean;
}

let leaseCounter = 0;

export class ResourceGuard extends EventEmitter {
  private exclusive: ResourceLease | null = null;
  private background: BackgroundSlot | null = null;
  private health: ResourceHealth = 'ok';

  // Hook calls run one at a time, in the order the flags were changed
  private hookQueue: Promise<unknown> = Promise.resolve();

  constructor(readonly kind: ResourceKind) {
    super();
  }

  // ============== Leases ==============

  acquire(priority: 'exclusive', holder: string): Promise<AcquireResult>;
  acquire(priority: 'background', holder: string, hooks: PreemptibleHolder): Promise<AcquireResult>;
  async acquire(priority: LeasePriority, holder: string, hooks?: PreemptibleHolder): Promise<AcquireResult> {
    if (this.health === 'degraded') {
      throw new ResourceDegradedError(this.kind);
    }

    if (priority === 'exclusive') {
      return this.acquireExclusive(holder);
    }

    if (!hooks) {
      throw new TypeError('Background leases need pause/resume hooks');
    }
    if (this.background) {
      return { status: 'busy', heldBy: this.background.lease.holder };
    }

    const lease = this.createLease(holder, 'background');
    const preempted = this.exclusive !== null;
    this.background = {
      lease,
      holder: hooks,
      status: preempted ? 'paused' : 'active',
      preempted,
      held: false,
      faulted: false,
    };
    logger.debug('Resource', `${this.kind}: background lease ${lease.id} granted to ${holder}`, { preempted });
    this.notifyChange();
    return { status: 'granted', lease };
  }

  private async acquireExclusive(holder: string): Promise<AcquireResult> {
    if (this.exclusive) {
      logger.warn('Resource', `${this.kind}: exclusive request from ${holder} refused, held by ${this.exclusive.holder}`);
      return { status: 'busy', heldBy: this.exclusive.holder };
    }

    // Reserve before awaiting anything so a concurrent request sees `busy`
    const lease = this.createLease(holder, 'exclusive');
    this.exclusive = lease;

    const slot = this.background;
    if (slot) {
      slot.preempted = true;
      const ok = await this.reconcile();
      if (!ok) {
        this.exclusive = null;
        // Nothing preempts the holder any more; reset() hands the device back
        slot.preempted = false;
        this.notifyChange();
        throw new DeviceUnavailableError(this.kind);
      }
    }

    logger.debug('Resource', `${this.kind}: exclusive lease ${lease.id} granted to ${holder}`);
    this.notifyChange();
    return { status: 'granted', lease };
  }

  /**
   * Release a lease. Releasing twice, or releasing a lease this guard does not
   * hold, is a no-op. Resolves to false when a preempted background holder
   * could not be resumed (resource degraded).
   */
  async release(lease: ResourceLease): Promise<boolean> {
    if (this.exclusive?.id === lease.id) {
      this.exclusive = null;
      logger.debug('Resource', `${this.kind}: exclusive lease ${lease.id} released`);
      const slot = this.background;
      let ok = true;
      if (slot) {
        slot.preempted = false;
        ok = await this.reconcile();
      }
      this.notifyChange();
      return ok;
    }

    if (this.background?.lease.id === lease.id) {
      this.background = null;
      logger.debug('Resource', `${this.kind}: background lease ${lease.id} released`);
      this.notifyChange();
      return true;
    }

    logger.debug('Resource', `${this.kind}: lease ${lease.id} already released`);
    return true;
  }

  /**
   * Hold a background lease paused until resume() is called, independent of
   * any exclusive preemption.
   */
  async pause(lease: ResourceLease): Promise<boolean> {
    const slot = this.slotFor(lease);
    if (!slot) return false;
    slot.held = true;
    const ok = await this.reconcile();
    this.notifyChange();
    return ok;
  }

  async resume(lease: ResourceLease): Promise<boolean> {
    const slot = this.slotFor(lease);
    if (!slot) return false;
    slot.held = false;
    const ok = await this.reconcile();
    this.notifyChange();
    return ok;
  }

  /**
   * Called by a background holder that stopped working without being asked
   * to. Pauses it and marks the resource degraded.
   */
  async fault(lease: ResourceLease, error: unknown): Promise<void> {
    const slot = this.slotFor(lease);
    if (!slot) return;
    slot.faulted = true;
    this.markDegraded(error);
    await this.reconcile();
    this.notifyChange();
  }

  /**
   * Clear the degraded flag and retry handing the device back to the
   * background holder.
   */
  async reset(): Promise<boolean> {
    if (this.health === 'ok') return true;
    logger.info('Resource', `${this.kind}: manual reset`);
    this.health = 'ok';
    if (this.background) this.background.faulted = false;
    const ok = await this.reconcile();
    this.notifyChange();
    return ok;
  }

  // ============== Queries ==============

  statusOf(lease: ResourceLease): LeaseStatus {
    if (this.exclusive?.id === lease.id) return 'active';
    if (this.background?.lease.id === lease.id) return this.background.status;
    return 'released';
  }

  isDegraded(): boolean {
    return this.health === 'degraded';
  }

  snapshot(): ResourceSnapshot {
    const slot = this.background;
    return {
      kind: this.kind,
      health: this.health,
      exclusiveHolder: this.exclusive?.holder ?? null,
      background: slot ? { holder: slot.lease.holder, status: slot.status, held: slot.held } : null,
    };
  }

  // ============== Internals ==============

  private createLease(holder: string, priority: LeasePriority): ResourceLease {
    return { id: `${this.kind}_${++leaseCounter}`, kind: this.kind, holder, priority };
  }

  private slotFor(lease: ResourceLease): BackgroundSlot | null {
    if (this.background?.lease.id !== lease.id) {
      logger.warn('Resource', `${this.kind}: pause/resume on a lease that is not the background lease`, { id: lease.id });
      return null;
    }
    return this.background;
  }

  private reconcile(): Promise<boolean> {
    const run = this.hookQueue.then(() => this.applyBackgroundState());
    this.hookQueue = run;
    return run;
  }

  /**
   * Drive the background holder towards the state its flags ask for.
   * Never rejects; failures are reported through the return value.
   */
  private async applyBackgroundState(): Promise<boolean> {
    const slot = this.background;
    if (!slot) return true;

    const wanted = slot.preempted || slot.held || slot.faulted ? 'paused' : 'active';
    if (slot.status === wanted) return true;

    if (wanted === 'paused') {
      try {
        await slot.holder.onPause();
        slot.status = 'paused';
        logger.debug('Resource', `${this.kind}: ${slot.lease.holder} paused`);
        return true;
      } catch (err) {
        slot.status = 'paused';
        this.markDegraded(err);
        return false;
      }
    }

    if (this.health === 'degraded') return false;
    try {
      await slot.holder.onResume();
      slot.status = 'active';
      logger.debug('Resource', `${this.kind}: ${slot.lease.holder} resumed`);
      return true;
    } catch (err) {
      this.markDegraded(err);
      return false;
    }
  }

  private markDegraded(err: unknown): void {
    this.health = 'degraded';
    logger.error('Resource', `${this.kind}: device unavailable, marked degraded`, err);
    this.emit('degraded', this.kind, err);
  }

  private notifyChange(): void {
    this.emit('change', this.snapshot());
  }
}

export type ResourceGuards = Record<ResourceKind, ResourceGuard>;

export function createResourceGuards(): ResourceGuards {
  return {
    mic: new ResourceGuard('mic'),
    speaker: new ResourceGuard('speaker'),
    camera: new ResourceGuard('camera'),
  };
}
