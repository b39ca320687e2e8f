/**
 * State Machine for Vigil
 * Owns the pipeline session and the security overlay. Only the orchestrator
 * mutates it; everyone else listens to `stageChange` / `securityChange`.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import type {
  PipelineSession,
  PipelineStage,
  ResourceLease,
  SecurityState,
  SessionOutcome,
  WakeSource,
} from '../types/index.js';

export interface StateMachineEvents {
  stageChange: (newStage: PipelineStage, oldStage: PipelineStage, session: PipelineSession | null) => void;
  securityChange: (newState: SecurityState, oldState: SecurityState) => void;
  sessionEnd: (session: PipelineSession) => void;
}

const TRANSITIONS: Record<PipelineStage, PipelineStage[]> = {
  idle: ['awake'],
  awake: ['recording', 'speaking', 'idle'],
  recording: ['verifying_voice', 'verifying_face', 'transcribing', 'speaking', 'idle'],
  verifying_voice: ['verifying_face', 'transcribing', 'speaking', 'idle'],
  verifying_face: ['transcribing', 'speaking', 'idle'],
  transcribing: ['dispatching', 'speaking', 'idle'],
  dispatching: ['speaking', 'idle'],
  speaking: ['idle'],
};

export type WakeDecision = { accepted: true } | { accepted: false; reason: string };

export function describeSecurity(state: SecurityState): string {
  return state.level === 'normal' ? 'normal' : `${state.level}(${state.reason})`;
}

export class StateMachine extends EventEmitter {
  private stage: PipelineStage = 'idle';
  private session: PipelineSession | null = null;
  private security: SecurityState = { level: 'normal' };

  // ============== Getters ==============

  getStage(): PipelineStage {
    return this.stage;
  }

  getSession(): Readonly<PipelineSession> | null {
    return this.session ? { ...this.session } : null;
  }

  getSecurity(): SecurityState {
    return { ...this.security };
  }

  isIdle(): boolean {
    return this.stage === 'idle';
  }

  // ============== Pipeline ==============

  canAcceptWake(): WakeDecision {
    if (this.stage !== 'idle') {
      return { accepted: false, reason: `session active (${this.stage})` };
    }
    if (this.security.level === 'lockdown' && this.security.reason === 'camera') {
      return { accepted: false, reason: 'camera lockdown' };
    }
    return { accepted: true };
  }

  /**
   * Start a session: idle -> awake
   */
  beginSession(source: WakeSource): PipelineSession {
    const decision = this.canAcceptWake();
    if (!decision.accepted) {
      throw new Error(`Cannot begin session: ${decision.reason}`);
    }
    this.session = {
      id: randomUUID(),
      stage: 'idle',
      source,
      startedAt: Date.now(),
      leases: [],
      recording: null,
      verifications: [],
      transcript: null,
      outcome: null,
    };
    this.advance('awake');
    return this.session;
  }

  /**
   * Move the active session to its next stage
   */
  advance(next: PipelineStage): void {
    const current = this.stage;
    if (current === next) return;
    if (!TRANSITIONS[current].includes(next)) {
      throw new Error(`Illegal pipeline transition: ${current} -> ${next}`);
    }

    logger.info('StateMachine', `Transition: ${current} -> ${next}`, undefined, this.session?.id);
    this.stage = next;
    if (this.session) this.session.stage = next;
    this.emit('stageChange', next, current, this.getSession());
  }

  /**
   * Close the active session and return to idle
   */
  endSession(outcome: SessionOutcome): PipelineSession | null {
    const session = this.session;
    if (session && session.outcome === null) {
      session.outcome = outcome;
    }
    this.advance('idle');
    this.session = null;
    if (session) {
      logger.info('StateMachine', `Session ended: ${session.outcome}`, {
        durationMs: Date.now() - session.startedAt,
      }, session.id);
      this.emit('sessionEnd', session);
    }
    return session;
  }

  setOutcome(outcome: SessionOutcome): void {
    if (this.session) this.session.outcome = outcome;
  }

  trackLease(lease: ResourceLease): void {
    this.session?.leases.push(lease);
  }

  untrackLease(lease: ResourceLease): void {
    if (!this.session) return;
    this.session.leases = this.session.leases.filter((l) => l.id !== lease.id);
  }

  updateSession(updates: Partial<Pick<PipelineSession, 'recording' | 'verifications' | 'transcript'>>): void {
    if (this.session) Object.assign(this.session, updates);
  }

  // ============== Security ==============

  setSecurity(next: SecurityState): void {
    const current = this.security;
    if (describeSecurity(current) === describeSecurity(next)) return;

    logger.info('StateMachine', `Security: ${describeSecurity(current)} -> ${describeSecurity(next)}`);
    this.security = { ...next };
    this.emit('securityChange', this.getSecurity(), current);
  }
}
